// packages/staking-core/src/records.ts
import { readUint16le, readUint64le, uint16le, uint64le } from '@epoch-stake/utils';

import { StateError } from './errors.js';

/** 32-byte x-only public key. */
export type Identity = Uint8Array;
/** 32-byte asset class id. */
export type AssetId = Uint8Array;

export type PoolRecord = {
  initialized: boolean;
  owner: Identity;
  stakeAsset: AssetId;
  rewardAsset: AssetId;
  totalStaked: bigint; // u64
  epochReward: bigint; // u64
  epochStart: bigint; // u64
  epochEnd: bigint; // u64
  epochId: number; // u16
  /** totalStaked when the current epoch started; claims divide by this. */
  epochTotalStaked: bigint; // u64
};

export type PositionRecord = {
  initialized: boolean;
  owner: Identity;
  stakedAmount: bigint; // u64
  lastClaimedEpoch: number; // u16, 0 = never claimed
  lastDepositEpoch: number; // u16
  /** Stake held before the first deposit made during `lastDepositEpoch`. */
  stakeAtEpochStart: bigint; // u64
};

// initialized(1) owner(32) stake_asset(32) reward_asset(32)
// total_staked(8) epoch_reward(8) epoch_start(8) epoch_end(8) epoch_id(2)
// epoch_total_staked(8)
export const POOL_LAYOUT = {
  initialized: 0,
  owner: 1,
  stakeAsset: 33,
  rewardAsset: 65,
  totalStaked: 97,
  epochReward: 105,
  epochStart: 113,
  epochEnd: 121,
  epochId: 129,
  epochTotalStaked: 131,
} as const;
export const POOL_RECORD_LEN = 139;

// initialized(1) owner(32) staked_amount(8) last_claimed_epoch(2)
// last_deposit_epoch(2) stake_at_epoch_start(8)
export const POSITION_LAYOUT = {
  initialized: 0,
  owner: 1,
  stakedAmount: 33,
  lastClaimedEpoch: 41,
  lastDepositEpoch: 43,
  stakeAtEpochStart: 45,
} as const;
export const POSITION_RECORD_LEN = 53;

export function emptyPoolRecord(): PoolRecord {
  return {
    initialized: false,
    owner: new Uint8Array(32),
    stakeAsset: new Uint8Array(32),
    rewardAsset: new Uint8Array(32),
    totalStaked: 0n,
    epochReward: 0n,
    epochStart: 0n,
    epochEnd: 0n,
    epochId: 0,
    epochTotalStaked: 0n,
  };
}

export function emptyPositionRecord(): PositionRecord {
  return {
    initialized: false,
    owner: new Uint8Array(32),
    stakedAmount: 0n,
    lastClaimedEpoch: 0,
    lastDepositEpoch: 0,
    stakeAtEpochStart: 0n,
  };
}

function requireLen(buf: Uint8Array, len: number, label: string) {
  if (buf.length !== len) {
    throw new StateError('InvalidAccountData', `${label}: expected ${len} bytes, got ${buf.length}`, {
      details: { expected: String(len), actual: String(buf.length) },
    });
  }
}

function write32(dst: Uint8Array, offset: number, src: Uint8Array, label: string) {
  if (src.length !== 32) throw new StateError('InvalidAccountData', `${label} must be 32 bytes`);
  dst.set(src, offset);
}

/**
 * Serialize the whole record. Writes into `dst` when given (it must already
 * have the exact record length), otherwise into a fresh buffer.
 */
export function packPoolRecord(rec: PoolRecord, dst: Uint8Array = new Uint8Array(POOL_RECORD_LEN)): Uint8Array {
  requireLen(dst, POOL_RECORD_LEN, 'packPoolRecord');
  const L = POOL_LAYOUT;

  const out = new Uint8Array(POOL_RECORD_LEN);
  out[L.initialized] = rec.initialized ? 1 : 0;
  write32(out, L.owner, rec.owner, 'pool.owner');
  write32(out, L.stakeAsset, rec.stakeAsset, 'pool.stakeAsset');
  write32(out, L.rewardAsset, rec.rewardAsset, 'pool.rewardAsset');
  out.set(uint64le(rec.totalStaked), L.totalStaked);
  out.set(uint64le(rec.epochReward), L.epochReward);
  out.set(uint64le(rec.epochStart), L.epochStart);
  out.set(uint64le(rec.epochEnd), L.epochEnd);
  out.set(uint16le(rec.epochId), L.epochId);
  out.set(uint64le(rec.epochTotalStaked), L.epochTotalStaked);

  // encode fully before touching dst so a bad field never leaves a half-written buffer
  dst.set(out);
  return dst;
}

export function unpackPoolRecord(src: Uint8Array): PoolRecord {
  requireLen(src, POOL_RECORD_LEN, 'unpackPoolRecord');
  const L = POOL_LAYOUT;

  return {
    initialized: src[L.initialized] !== 0,
    owner: src.slice(L.owner, L.owner + 32),
    stakeAsset: src.slice(L.stakeAsset, L.stakeAsset + 32),
    rewardAsset: src.slice(L.rewardAsset, L.rewardAsset + 32),
    totalStaked: readUint64le(src, L.totalStaked),
    epochReward: readUint64le(src, L.epochReward),
    epochStart: readUint64le(src, L.epochStart),
    epochEnd: readUint64le(src, L.epochEnd),
    epochId: readUint16le(src, L.epochId),
    epochTotalStaked: readUint64le(src, L.epochTotalStaked),
  };
}

export function packPositionRecord(
  rec: PositionRecord,
  dst: Uint8Array = new Uint8Array(POSITION_RECORD_LEN)
): Uint8Array {
  requireLen(dst, POSITION_RECORD_LEN, 'packPositionRecord');
  const L = POSITION_LAYOUT;

  const out = new Uint8Array(POSITION_RECORD_LEN);
  out[L.initialized] = rec.initialized ? 1 : 0;
  write32(out, L.owner, rec.owner, 'position.owner');
  out.set(uint64le(rec.stakedAmount), L.stakedAmount);
  out.set(uint16le(rec.lastClaimedEpoch), L.lastClaimedEpoch);
  out.set(uint16le(rec.lastDepositEpoch), L.lastDepositEpoch);
  out.set(uint64le(rec.stakeAtEpochStart), L.stakeAtEpochStart);

  dst.set(out);
  return dst;
}

export function unpackPositionRecord(src: Uint8Array): PositionRecord {
  requireLen(src, POSITION_RECORD_LEN, 'unpackPositionRecord');
  const L = POSITION_LAYOUT;

  return {
    initialized: src[L.initialized] !== 0,
    owner: src.slice(L.owner, L.owner + 32),
    stakedAmount: readUint64le(src, L.stakedAmount),
    lastClaimedEpoch: readUint16le(src, L.lastClaimedEpoch),
    lastDepositEpoch: readUint16le(src, L.lastDepositEpoch),
    stakeAtEpochStart: readUint64le(src, L.stakeAtEpochStart),
  };
}
