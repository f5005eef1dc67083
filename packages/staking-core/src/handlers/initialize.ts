// packages/staking-core/src/handlers/initialize.ts
import { bytesToHex } from '@epoch-stake/utils';

import type { HandlerContext } from '../di.js';
import type { InitializeInstruction } from '../instruction.js';
import type { PoolRecord } from '../records.js';
import { accountAt, requireSigner } from '../accounts.js';
import { StateError } from '../errors.js';

// accounts: [owner]
export function initialize(ctx: HandlerContext, pool: PoolRecord, ix: InitializeInstruction): void {
  const owner = accountAt(ctx.accounts, 0, 'owner');
  requireSigner(owner, 'Owner');

  if (pool.initialized) {
    throw new StateError('AlreadyInitialized', 'Staking pool is already initialized', {
      details: { owner: bytesToHex(pool.owner) },
    });
  }

  pool.initialized = true;
  pool.owner = owner.key.slice();
  if (ix.assets) {
    pool.stakeAsset = ix.assets.stakeAsset.slice();
    pool.rewardAsset = ix.assets.rewardAsset.slice();
  }

  ctx.log.msg(`Initialized staking pool with owner ${bytesToHex(pool.owner)}`);
}
