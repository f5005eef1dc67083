// packages/cli/src/pool/ops/init.ts
import { encodeInstruction } from '@epoch-stake/staking-core';
import type { Keypair } from '@epoch-stake/utils';

import type { TxReceipt } from '../../host/execute.js';
import { POOL_ALLOCATION_SIZE, submit, type PoolOpContext } from '../context.js';

/**
 * Create the pool account and both custody accounts (if absent), then
 * initialize the pool with the deployment's asset ids.
 */
export async function runInit(ctx: PoolOpContext, opts: { owner: Keypair }): Promise<TxReceipt> {
  const { pool, stakeCustody, rewardCustody } = ctx.addresses;
  const { stakeAsset, rewardAsset } = ctx.deployment;

  // custody accounts ride along so they are allocated in the same commit
  return submit(ctx, {
    op: 'initialize',
    accounts: [opts.owner.identity, stakeCustody, rewardCustody],
    instruction: encodeInstruction({ kind: 'initialize', assets: { stakeAsset, rewardAsset } }),
    signers: [opts.owner],
    allocate: [
      { key: pool, size: POOL_ALLOCATION_SIZE },
      { key: stakeCustody, size: 0 },
      { key: rewardCustody, size: 0 },
    ],
  });
}
