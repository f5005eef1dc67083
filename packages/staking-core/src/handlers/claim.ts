// packages/staking-core/src/handlers/claim.ts
import type { HandlerContext } from '../di.js';
import type { ClaimInstruction } from '../instruction.js';
import type { PoolRecord } from '../records.js';
import { accountAt, invokeTransfer, loadPosition, requireCustody, requireSigner, storePosition } from '../accounts.js';
import { StateError, ValidationError } from '../errors.js';
import { calculateReward, eligibleStake } from '../reward.js';

// accounts: [participant, reward custody, position]
//
// One claim per position per epoch, paid on stake held since the epoch
// started, out of the total snapshotted at start-epoch. Staked balances are
// read, never written.
export function claim(ctx: HandlerContext, pool: PoolRecord, _ix: ClaimInstruction): void {
  const participant = accountAt(ctx.accounts, 0, 'participant');
  const custody = accountAt(ctx.accounts, 1, 'reward custody');
  const positionAccount = accountAt(ctx.accounts, 2, 'position');

  requireSigner(participant, 'User');
  requireCustody(ctx, custody, 'reward');

  const position = loadPosition(ctx, positionAccount, participant.key, { requireInitialized: true });

  if (pool.epochId === 0) throw new ValidationError('NoActiveEpoch', 'No epoch has been started yet');
  if (position.lastClaimedEpoch === pool.epochId) {
    throw new StateError('AlreadyClaimed', `Rewards for epoch ${pool.epochId} were already claimed`, {
      details: { epochId: String(pool.epochId) },
    });
  }

  const reward = calculateReward(eligibleStake(pool, position), pool.epochReward, pool.epochTotalStaked);

  invokeTransfer(ctx, { asset: pool.rewardAsset, from: custody, to: participant, amount: reward });

  position.lastClaimedEpoch = pool.epochId;
  storePosition(positionAccount, position);

  ctx.log.msg(`Claimed ${reward} rewards`);
}
