// packages/cli/src/commands/shared.ts
import { InvalidArgumentError, type Command } from 'commander';
import { bytesToHex, hexToBytes, isU64 } from '@epoch-stake/utils';
import type { Keypair } from '@epoch-stake/utils';

import type { ProfilePaths } from '../paths.js';
import type { PoolOpContext } from '../pool/context.js';
import type { TxReceipt } from '../host/execute.js';

export type Out = (line: string) => void;

export type CliDeps = {
  getActivePaths: () => ProfilePaths;
  /** Loads config and the ledger store for the active profile. */
  openPoolCtx: () => Promise<PoolOpContext>;
  loadMeWallet: () => Keypair;
  out: Out;
};

export function getOrCreateSubcommand(program: Command, name: string, description: string): Command {
  const existing = program.commands.find((c) => c.name() === name);
  if (existing) return existing;
  return program.command(name).description(description);
}

/** commander option parser for u64 amounts and timestamps. */
export function parseU64Arg(value: string): bigint {
  const v = value.trim().replace(/_/g, '');
  if (!/^\d+$/.test(v)) throw new InvalidArgumentError('expected a non-negative integer');
  const n = BigInt(v);
  if (!isU64(n)) throw new InvalidArgumentError('value does not fit in u64');
  return n;
}

export function parseKeyArg(value: string): Uint8Array {
  const v = value.trim().toLowerCase();
  if (!/^[0-9a-f]{64}$/.test(v)) throw new InvalidArgumentError('expected a 64-hex key');
  return hexToBytes(v);
}

/** JSON with bigint as decimal strings and bytes as hex. */
export function toJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_k, v: unknown) => {
      if (typeof v === 'bigint') return v.toString();
      if (v instanceof Uint8Array) return bytesToHex(v);
      return v;
    },
    2
  );
}

export function printReceipt(out: Out, receipt: TxReceipt): void {
  for (const line of receipt.logs) out(`program: ${line}`);
}
