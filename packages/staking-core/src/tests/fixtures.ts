// packages/staking-core/src/tests/fixtures.ts
import assert from 'node:assert/strict';

import { bytesToHex } from '@epoch-stake/utils';

import type { AccountRef, AssetTransfer, TransferArgs } from '../di.js';
import type { StakingInstruction } from '../instruction.js';
import type { PoolRecord, PositionRecord } from '../records.js';
import { encodeInstruction } from '../instruction.js';
import { POOL_RECORD_LEN, POSITION_RECORD_LEN, unpackPoolRecord, unpackPositionRecord } from '../records.js';
import { deriveCustodyAddress, derivePoolAddress, derivePositionAddress } from '../address.js';
import { collectProgramLog } from '../log.js';
import { isStakingError, type StakingErrorCode, type StakingErrorKind } from '../errors.js';
import { processInstruction } from '../processor.js';

export function b32(fill: number): Uint8Array {
  return new Uint8Array(32).fill(fill & 0xff);
}

export const PROGRAM_ID = b32(0xa1);
export const SYSTEM_OWNER = b32(0x00);
export const STAKE_ASSET = b32(0x5a);
export const REWARD_ASSET = b32(0x7e);

export type TransferCall = { asset: string; from: string; to: string; amount: bigint };

/** Records every call; throws instead when `failWith` is set. */
export type RecordingTransfer = AssetTransfer & { calls: TransferCall[]; failWith: Error | null };

export function makeRecordingTransfer(): RecordingTransfer {
  const t: RecordingTransfer = {
    calls: [],
    failWith: null,
    transfer(args: TransferArgs) {
      if (t.failWith) throw t.failWith;
      t.calls.push({
        asset: bytesToHex(args.asset),
        from: bytesToHex(args.from.key),
        to: bytesToHex(args.to.key),
        amount: args.amount,
      });
    },
  };
  return t;
}

export function makeHarness() {
  const poolKey = derivePoolAddress(PROGRAM_ID);

  const pool: AccountRef = {
    key: poolKey,
    isSigner: false,
    owner: PROGRAM_ID,
    data: new Uint8Array(POOL_RECORD_LEN),
  };

  const custody = (role: 'stake' | 'reward'): AccountRef => ({
    key: deriveCustodyAddress({ programId: PROGRAM_ID, pool: poolKey, role }),
    isSigner: false,
    owner: PROGRAM_ID,
    data: new Uint8Array(0),
  });

  const stakeCustody = custody('stake');
  const rewardCustody = custody('reward');

  const user = (fill: number, isSigner = true): AccountRef => ({
    key: b32(fill),
    isSigner,
    owner: SYSTEM_OWNER,
    data: new Uint8Array(0),
  });

  const positions = new Map<string, AccountRef>();
  const positionFor = (participant: AccountRef): AccountRef => {
    const id = bytesToHex(participant.key);
    const existing = positions.get(id);
    if (existing) return existing;
    const acc: AccountRef = {
      key: derivePositionAddress({ programId: PROGRAM_ID, pool: poolKey, participant: participant.key }),
      isSigner: false,
      owner: PROGRAM_ID,
      data: new Uint8Array(POSITION_RECORD_LEN),
    };
    positions.set(id, acc);
    return acc;
  };

  const transfer = makeRecordingTransfer();
  const log = collectProgramLog();

  const run = (accounts: AccountRef[], ix: StakingInstruction | Uint8Array) =>
    processInstruction({
      programId: PROGRAM_ID,
      accounts: [pool, ...accounts],
      instructionData: ix instanceof Uint8Array ? ix : encodeInstruction(ix),
      deps: { transfer, log },
    });

  const readPool = (): PoolRecord => unpackPoolRecord(pool.data);
  const readPosition = (participant: AccountRef): PositionRecord => unpackPositionRecord(positionFor(participant).data);

  const owner = user(0x0a);

  const initPool = () =>
    run([owner], { kind: 'initialize', assets: { stakeAsset: STAKE_ASSET, rewardAsset: REWARD_ASSET } });

  const depositFrom = (participant: AccountRef, amount: bigint) =>
    run([participant, stakeCustody, positionFor(participant)], { kind: 'deposit', amount });

  const withdrawFrom = (participant: AccountRef, amount: bigint) =>
    run([participant, stakeCustody, positionFor(participant)], { kind: 'withdraw', amount });

  const startEpoch = (startTime: bigint, endTime: bigint, rewardAmount: bigint, signer: AccountRef = owner) =>
    run([signer], { kind: 'startEpoch', startTime, endTime, rewardAmount });

  const claimFor = (participant: AccountRef) =>
    run([participant, rewardCustody, positionFor(participant)], { kind: 'claim' });

  return {
    poolKey,
    pool,
    owner,
    stakeCustody,
    rewardCustody,
    user,
    positionFor,
    transfer,
    log,
    run,
    readPool,
    readPosition,
    initPool,
    depositFrom,
    withdrawFrom,
    startEpoch,
    claimFor,
  };
}

export function assertStakingError(fn: () => unknown, kind: StakingErrorKind, code: StakingErrorCode): void {
  assert.throws(fn, (e: unknown) => {
    assert.ok(isStakingError(e), `expected a StakingError, got ${String(e)}`);
    assert.equal(e.kind, kind);
    assert.equal(e.code, code);
    return true;
  });
}
