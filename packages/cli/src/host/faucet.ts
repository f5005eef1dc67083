// packages/cli/src/host/faucet.ts
//
// Host-side balance operations that do not go through the program: minting
// test balances and plain wallet-to-account transfers.
import { bytesToHex, isU64, type Keypair } from '@epoch-stake/utils';
import { getBalance } from '@epoch-stake/account-store';
import { toErrorJSON } from '@epoch-stake/staking-core';

import { StagedBalances } from './ledger.js';
import { appendEvent } from './events.js';
import { nowIso, type HostContext } from './context.js';

async function runBalanceOp(
  ctx: HostContext,
  ev: { op: string; signers: string[]; accounts: string[]; args: Record<string, string> },
  fn: (balances: StagedBalances) => void
): Promise<void> {
  await ctx.store.withLock(async () => {
    try {
      const balances = new StagedBalances(ctx.store);
      fn(balances);
      balances.commit();
      await ctx.store.flush();
      appendEvent(ctx.logFile, { ts: nowIso(ctx), ok: true, logs: [], ...ev });
    } catch (e) {
      appendEvent(ctx.logFile, { ts: nowIso(ctx), ok: false, logs: [], ...ev, error: toErrorJSON(e) });
      throw e;
    }
  });
}

export async function mint(
  ctx: HostContext,
  args: { asset: Uint8Array; to: Uint8Array; amount: bigint }
): Promise<bigint> {
  const { asset, to, amount } = args;
  let next = 0n;
  await runBalanceOp(
    ctx,
    {
      op: 'mint',
      signers: [],
      accounts: [bytesToHex(to)],
      args: { asset: bytesToHex(asset), amount: amount.toString() },
    },
    (balances) => {
      next = balances.get(asset, to) + amount;
      if (!isU64(next)) throw new RangeError(`mint would push balance past u64: ${next}`);
      balances.set(asset, to, next);
    }
  );
  return next;
}

/** Wallet-signed move of a plain balance, e.g. funding the reward custody. */
export async function hostTransfer(
  ctx: HostContext,
  args: { asset: Uint8Array; from: Keypair; to: Uint8Array; amount: bigint }
): Promise<void> {
  const { asset, from, to, amount } = args;
  await runBalanceOp(
    ctx,
    {
      op: 'transfer',
      signers: [bytesToHex(from.identity)],
      accounts: [bytesToHex(from.identity), bytesToHex(to)],
      args: { asset: bytesToHex(asset), amount: amount.toString() },
    },
    (balances) => balances.move(asset, from.identity, to, amount)
  );
}

export function readBalance(ctx: HostContext, asset: Uint8Array, holder: Uint8Array): bigint {
  return getBalance(ctx.store, asset, holder);
}
