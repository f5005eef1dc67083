// packages/cli/src/host/execute.ts
import { arraysEqual, bytesToHex, debugLog } from '@epoch-stake/utils';
import { getAccount, putAccount } from '@epoch-stake/account-store';
import {
  collectProgramLog,
  processInstruction,
  toErrorJSON,
  type AccountRef,
  type PoolRecord,
  type StakingInstruction,
} from '@epoch-stake/staking-core';

import type { Transaction } from './transaction.js';
import { verifySignatures } from './transaction.js';
import { StagedBalances, makeLedgerTransfer } from './ledger.js';
import { appendEvent } from './events.js';
import { SYSTEM_OWNER, nowIso, type HostContext } from './context.js';

/** Program-owned account the host creates, zero-filled, if it does not exist yet. */
export type AccountAllocation = {
  key: Uint8Array;
  size: number;
};

export type ExecuteOptions = {
  op: string;
  allocate?: AccountAllocation[];
  args?: Record<string, string>;
};

export type TxReceipt = {
  instruction: StakingInstruction;
  pool: PoolRecord;
  logs: string[];
  signers: string[];
};

function loadAccounts(ctx: HostContext, tx: Transaction, signers: Set<string>, allocate: AccountAllocation[]) {
  const { programId } = ctx.deployment;
  const byKey = new Map<string, AccountRef>();

  const refs = tx.accountKeys.map((key) => {
    const id = bytesToHex(key);
    const seen = byKey.get(id);
    if (seen) return seen;

    const stored = getAccount(ctx.store, key);
    const alloc = allocate.find((a) => arraysEqual(a.key, key));

    let ref: AccountRef;
    if (stored) {
      ref = { key: key.slice(), isSigner: signers.has(id), owner: stored.owner, data: stored.data };
    } else if (alloc) {
      ref = { key: key.slice(), isSigner: signers.has(id), owner: programId.slice(), data: new Uint8Array(alloc.size) };
      debugLog(`[host] allocating ${alloc.size}-byte account ${id}`);
    } else {
      ref = { key: key.slice(), isSigner: signers.has(id), owner: SYSTEM_OWNER, data: new Uint8Array(0) };
    }

    byKey.set(id, ref);
    return ref;
  });

  return { refs, unique: [...byKey.values()] };
}

/**
 * Run one signed transaction against the store.
 *
 * Transactions are serialized through the store lock and see the latest
 * persisted state. The program works on copies of the account buffers and a
 * staged balance overlay. Both are written to the store and flushed only
 * after the program returns; on any error nothing is written. One event is
 * appended either way.
 */
export async function executeTransaction(
  ctx: HostContext,
  tx: Transaction,
  opts: ExecuteOptions
): Promise<TxReceipt> {
  return ctx.store.withLock(() => applyTransaction(ctx, tx, opts));
}

async function applyTransaction(ctx: HostContext, tx: Transaction, opts: ExecuteOptions): Promise<TxReceipt> {
  const { programId } = ctx.deployment;
  const log = collectProgramLog();
  const accountIds = tx.accountKeys.map(bytesToHex);
  let signerIds: string[] = [];

  try {
    if (!arraysEqual(tx.programId, programId)) {
      throw new Error(`transaction targets program ${bytesToHex(tx.programId)}, host runs ${bytesToHex(programId)}`);
    }

    const signers = verifySignatures(tx);
    signerIds = [...signers];

    const { refs, unique } = loadAccounts(ctx, tx, signers, opts.allocate ?? []);
    const balances = new StagedBalances(ctx.store);

    const res = processInstruction({
      programId,
      accounts: refs,
      instructionData: tx.instruction,
      deps: { transfer: makeLedgerTransfer({ balances, programId }), log },
    });

    for (const acc of unique) {
      if (arraysEqual(acc.owner, programId)) putAccount(ctx.store, acc);
    }
    balances.commit();
    await ctx.store.flush();

    appendEvent(ctx.logFile, {
      ts: nowIso(ctx),
      op: opts.op,
      ok: true,
      signers: signerIds,
      accounts: accountIds,
      logs: log.lines,
      ...(opts.args ? { args: opts.args } : {}),
    });

    return { instruction: res.instruction, pool: res.pool, logs: log.lines, signers: signerIds };
  } catch (e) {
    appendEvent(ctx.logFile, {
      ts: nowIso(ctx),
      op: opts.op,
      ok: false,
      signers: signerIds,
      accounts: accountIds,
      logs: log.lines,
      ...(opts.args ? { args: opts.args } : {}),
      error: toErrorJSON(e),
    });
    throw e;
  }
}
