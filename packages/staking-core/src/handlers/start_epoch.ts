// packages/staking-core/src/handlers/start_epoch.ts
import { bytesToHex } from '@epoch-stake/utils';

import type { HandlerContext } from '../di.js';
import type { StartEpochInstruction } from '../instruction.js';
import type { PoolRecord } from '../records.js';
import { accountAt, isPoolOwner, requireSigner } from '../accounts.js';
import { AuthorizationError, ValidationError } from '../errors.js';
import { checkedIncrementU16 } from '../math.js';

// accounts: [owner]
export function startEpoch(ctx: HandlerContext, pool: PoolRecord, ix: StartEpochInstruction): void {
  const owner = accountAt(ctx.accounts, 0, 'owner');
  requireSigner(owner, 'Owner');

  if (!isPoolOwner(pool, owner.key)) {
    throw new AuthorizationError('WrongOwner', 'Only the pool owner can start an epoch', {
      details: { owner: bytesToHex(pool.owner), signer: bytesToHex(owner.key) },
    });
  }

  if (ix.startTime <= pool.epochEnd) {
    throw new ValidationError('InvalidArgument', 'Epoch start time must be after the current epoch end time', {
      details: { startTime: ix.startTime.toString(), currentEnd: pool.epochEnd.toString() },
    });
  }
  if (ix.endTime <= ix.startTime) {
    throw new ValidationError('InvalidArgument', 'End time must be after start time', {
      details: { startTime: ix.startTime.toString(), endTime: ix.endTime.toString() },
    });
  }

  const nextId = checkedIncrementU16(pool.epochId, 'epoch id');

  pool.epochStart = ix.startTime;
  pool.epochEnd = ix.endTime;
  pool.epochReward = ix.rewardAmount;
  pool.epochId = nextId;
  pool.epochTotalStaked = pool.totalStaked;

  ctx.log.msg(`Started new epoch with ID ${pool.epochId}`);
}
