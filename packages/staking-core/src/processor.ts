// packages/staking-core/src/processor.ts
import type { AccountRef, HandlerContext, ProcessorDeps } from './di.js';
import type { StakingInstruction } from './instruction.js';
import type { PoolRecord } from './records.js';
import { decodeInstruction } from './instruction.js';
import { packPoolRecord, unpackPoolRecord } from './records.js';
import { accountAt, requireProgramOwned } from './accounts.js';
import { StateError } from './errors.js';
import { NOOP_PROGRAM_LOG } from './log.js';

import { initialize } from './handlers/initialize.js';
import { deposit } from './handlers/deposit.js';
import { withdraw } from './handlers/withdraw.js';
import { startEpoch } from './handlers/start_epoch.js';
import { claim } from './handlers/claim.js';

export type ProcessInstructionArgs = {
  programId: Uint8Array;
  /** [pool account, ...operation accounts] */
  accounts: readonly AccountRef[];
  instructionData: Uint8Array;
  deps: ProcessorDeps;
};

export type ProcessInstructionResult = {
  instruction: StakingInstruction;
  pool: PoolRecord;
};

function route(ctx: HandlerContext, pool: PoolRecord, ix: StakingInstruction): void {
  switch (ix.kind) {
    case 'initialize':
      return initialize(ctx, pool, ix);
    case 'deposit':
      return deposit(ctx, pool, ix);
    case 'withdraw':
      return withdraw(ctx, pool, ix);
    case 'startEpoch':
      return startEpoch(ctx, pool, ix);
    case 'claim':
      return claim(ctx, pool, ix);
  }
}

/**
 * Apply one instruction. The pool record is rehydrated from the pool
 * account, handed to the handler by reference and written back whole only
 * when the handler returns. Any throw leaves the pool buffer as it was.
 */
export function processInstruction(args: ProcessInstructionArgs): ProcessInstructionResult {
  const { programId, accounts, instructionData, deps } = args;
  const log = deps.log ?? NOOP_PROGRAM_LOG;

  const ix = decodeInstruction(instructionData);

  const poolAccount = accountAt(accounts, 0, 'staking pool');
  requireProgramOwned(poolAccount, programId, 'staking pool');

  const pool = unpackPoolRecord(poolAccount.data);
  if (ix.kind !== 'initialize' && !pool.initialized) {
    throw new StateError('Uninitialized', 'Staking pool is not initialized');
  }

  const ctx: HandlerContext = {
    programId,
    poolAccount,
    accounts: accounts.slice(1),
    transfer: deps.transfer,
    log,
  };

  route(ctx, pool, ix);

  packPoolRecord(pool, poolAccount.data);
  return { instruction: ix, pool };
}
