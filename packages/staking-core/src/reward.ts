// packages/staking-core/src/reward.ts
import type { PoolRecord, PositionRecord } from './records.js';
import { requireU64 } from './math.js';

/**
 * Proportional share of an epoch's reward:
 *   floor(userStaked * epochReward / totalStaked)
 *
 * bigint keeps the full product (no 128-bit ceiling to hit); the quotient is
 * truncated and the remainder stays in custody. Returns 0 for an empty pool.
 */
export function calculateReward(userStaked: bigint, epochReward: bigint, totalStaked: bigint): bigint {
  requireU64(userStaked, 'userStaked');
  requireU64(epochReward, 'epochReward');
  requireU64(totalStaked, 'totalStaked');

  if (totalStaked === 0n) return 0n;

  return requireU64((userStaked * epochReward) / totalStaked, 'reward');
}

/**
 * The part of a position that counts toward the current epoch: its stake,
 * capped by what it held before its first deposit in this epoch.
 */
export function eligibleStake(pool: PoolRecord, position: PositionRecord): bigint {
  if (position.lastDepositEpoch !== pool.epochId) return position.stakedAmount;
  return position.stakeAtEpochStart < position.stakedAmount ? position.stakeAtEpochStart : position.stakedAmount;
}

/** What `claim` would pay right now; 0 when the position already claimed this epoch. */
export function previewClaimableReward(pool: PoolRecord, position: PositionRecord): bigint {
  if (!position.initialized || pool.epochId === 0) return 0n;
  if (position.lastClaimedEpoch === pool.epochId) return 0n;
  return calculateReward(eligibleStake(pool, position), pool.epochReward, pool.epochTotalStaked);
}
