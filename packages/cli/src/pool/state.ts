// packages/cli/src/pool/state.ts
import { getAccount } from '@epoch-stake/account-store';
import {
  previewClaimableReward,
  unpackPoolRecord,
  unpackPositionRecord,
  type PoolRecord,
  type PositionRecord,
} from '@epoch-stake/staking-core';

import { positionAddressOf, type PoolOpContext } from './context.js';

/** Decoded pool record, or null when the pool account was never created. */
export function readPool(ctx: PoolOpContext): PoolRecord | null {
  const acc = getAccount(ctx.store, ctx.addresses.pool);
  return acc ? unpackPoolRecord(acc.data) : null;
}

export type PositionView = {
  address: Uint8Array;
  position: PositionRecord | null;
  claimable: bigint;
};

export function readPosition(ctx: PoolOpContext, participant: Uint8Array): PositionView {
  const address = positionAddressOf(ctx, participant);
  const acc = getAccount(ctx.store, address);
  if (!acc) return { address, position: null, claimable: 0n };

  const position = unpackPositionRecord(acc.data);
  const pool = readPool(ctx);
  return { address, position, claimable: pool ? previewClaimableReward(pool, position) : 0n };
}
