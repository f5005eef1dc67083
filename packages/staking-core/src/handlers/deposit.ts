// packages/staking-core/src/handlers/deposit.ts
import type { HandlerContext } from '../di.js';
import type { DepositInstruction } from '../instruction.js';
import type { PoolRecord } from '../records.js';
import { accountAt, invokeTransfer, loadPosition, requireCustody, requireSigner, storePosition } from '../accounts.js';
import { checkedAddU64 } from '../math.js';

// accounts: [participant, stake custody, position]
export function deposit(ctx: HandlerContext, pool: PoolRecord, ix: DepositInstruction): void {
  const participant = accountAt(ctx.accounts, 0, 'participant');
  const custody = accountAt(ctx.accounts, 1, 'stake custody');
  const positionAccount = accountAt(ctx.accounts, 2, 'position');

  requireSigner(participant, 'User');
  requireCustody(ctx, custody, 'stake');

  const position = loadPosition(ctx, positionAccount, participant.key, { requireInitialized: false });
  if (!position.initialized) {
    position.initialized = true;
    position.owner = participant.key.slice();
  }

  const nextStaked = checkedAddU64(position.stakedAmount, ix.amount, 'position staked amount');
  const nextTotal = checkedAddU64(pool.totalStaked, ix.amount, 'pool total staked');

  invokeTransfer(ctx, { asset: pool.stakeAsset, from: participant, to: custody, amount: ix.amount });

  // stake added mid-epoch is not part of that epoch's claim base
  if (position.lastDepositEpoch !== pool.epochId) {
    position.stakeAtEpochStart = position.stakedAmount;
    position.lastDepositEpoch = pool.epochId;
  }
  position.stakedAmount = nextStaked;
  storePosition(positionAccount, position);
  pool.totalStaked = nextTotal;

  ctx.log.msg(`Deposited ${ix.amount} tokens`);
}
