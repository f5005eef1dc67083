// packages/cli/src/pool/context.ts
import {
  deriveCustodyAddress,
  derivePoolAddress,
  derivePositionAddress,
  POOL_RECORD_LEN,
  POSITION_RECORD_LEN,
} from '@epoch-stake/staking-core';
import type { Keypair } from '@epoch-stake/utils';

import type { HostContext } from '../host/context.js';
import type { TxReceipt } from '../host/execute.js';
import { executeTransaction, type AccountAllocation } from '../host/execute.js';
import { signTransaction } from '../host/transaction.js';

export type PoolAddresses = {
  pool: Uint8Array;
  stakeCustody: Uint8Array;
  rewardCustody: Uint8Array;
};

export type PoolOpContext = HostContext & {
  addresses: PoolAddresses;
};

export function makePoolOpContext(host: HostContext): PoolOpContext {
  const { programId } = host.deployment;
  const pool = derivePoolAddress(programId);
  return {
    ...host,
    addresses: {
      pool,
      stakeCustody: deriveCustodyAddress({ programId, pool, role: 'stake' }),
      rewardCustody: deriveCustodyAddress({ programId, pool, role: 'reward' }),
    },
  };
}

export function positionAddressOf(ctx: PoolOpContext, participant: Uint8Array): Uint8Array {
  return derivePositionAddress({ programId: ctx.deployment.programId, pool: ctx.addresses.pool, participant });
}

export const POOL_ALLOCATION_SIZE = POOL_RECORD_LEN;
export const POSITION_ALLOCATION_SIZE = POSITION_RECORD_LEN;

/** Sign with `signers`, then execute. `accounts` excludes the pool account. */
export async function submit(
  ctx: PoolOpContext,
  args: {
    op: string;
    accounts: Uint8Array[];
    instruction: Uint8Array;
    signers: Keypair[];
    allocate?: AccountAllocation[];
    args?: Record<string, string>;
  }
): Promise<TxReceipt> {
  const tx = signTransaction(
    {
      programId: ctx.deployment.programId,
      accountKeys: [ctx.addresses.pool, ...args.accounts],
      instruction: args.instruction,
    },
    args.signers
  );
  return executeTransaction(ctx, tx, { op: args.op, allocate: args.allocate, args: args.args });
}
