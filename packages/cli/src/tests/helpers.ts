// packages/cli/src/tests/helpers.ts
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { MemoryAccountStore } from '@epoch-stake/account-store';
import { isStakingError, type StakingErrorCode } from '@epoch-stake/staking-core';
import { keypairFromSecretHex } from '@epoch-stake/utils';

import type { Deployment } from '../deployment.js';
import { makePoolOpContext, type PoolOpContext } from '../pool/context.js';

export function b32(fill: number): Uint8Array {
  return new Uint8Array(32).fill(fill & 0xff);
}

export const DEPLOYMENT: Deployment = {
  programId: b32(0xa1),
  stakeAsset: b32(0x5a),
  rewardAsset: b32(0x7e),
};

export const OWNER = keypairFromSecretHex('11'.repeat(32));
export const ALICE = keypairFromSecretHex('22'.repeat(32));
export const BOB = keypairFromSecretHex('33'.repeat(32));
export const CAROL = keypairFromSecretHex('44'.repeat(32));

export function tmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function makeMemoryCtx(opts: { logFile?: string | null } = {}): { ctx: PoolOpContext; store: MemoryAccountStore } {
  const store = new MemoryAccountStore();
  const ctx = makePoolOpContext({
    store,
    deployment: DEPLOYMENT,
    logFile: opts.logFile ?? null,
    now: () => new Date('2026-03-01T12:00:00.000Z'),
  });
  return { ctx, store };
}

export async function rejectsWithCode(fn: () => Promise<unknown>, code: StakingErrorCode): Promise<void> {
  await assert.rejects(fn, (e: unknown) => {
    assert.ok(isStakingError(e), `expected a StakingError, got ${String(e)}`);
    assert.equal(e.code, code);
    return true;
  });
}
