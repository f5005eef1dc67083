// packages/staking-core/src/handlers/withdraw.ts
import type { HandlerContext } from '../di.js';
import type { WithdrawInstruction } from '../instruction.js';
import type { PoolRecord } from '../records.js';
import { accountAt, invokeTransfer, loadPosition, requireCustody, requireSigner, storePosition } from '../accounts.js';
import { InsufficientFundsError } from '../errors.js';
import { checkedSubU64 } from '../math.js';

// accounts: [participant, stake custody, position]
export function withdraw(ctx: HandlerContext, pool: PoolRecord, ix: WithdrawInstruction): void {
  const participant = accountAt(ctx.accounts, 0, 'participant');
  const custody = accountAt(ctx.accounts, 1, 'stake custody');
  const positionAccount = accountAt(ctx.accounts, 2, 'position');

  requireSigner(participant, 'User');
  requireCustody(ctx, custody, 'stake');

  const position = loadPosition(ctx, positionAccount, participant.key, { requireInitialized: true });

  if (position.stakedAmount < ix.amount) {
    throw new InsufficientFundsError('InsufficientFunds', 'Insufficient staked tokens', {
      details: { staked: position.stakedAmount.toString(), requested: ix.amount.toString() },
    });
  }

  const nextStaked = checkedSubU64(position.stakedAmount, ix.amount, 'position staked amount');
  const nextTotal = checkedSubU64(pool.totalStaked, ix.amount, 'pool total staked');

  invokeTransfer(ctx, { asset: pool.stakeAsset, from: custody, to: participant, amount: ix.amount });

  position.stakedAmount = nextStaked;
  storePosition(positionAccount, position);
  pool.totalStaked = nextTotal;

  ctx.log.msg(`Unstaked ${ix.amount} tokens`);
}
