// packages/cli/src/pool/ops/withdraw.ts
import { encodeInstruction } from '@epoch-stake/staking-core';
import type { Keypair } from '@epoch-stake/utils';

import type { TxReceipt } from '../../host/execute.js';
import { positionAddressOf, submit, type PoolOpContext } from '../context.js';

export async function runWithdraw(ctx: PoolOpContext, opts: { participant: Keypair; amount: bigint }): Promise<TxReceipt> {
  return submit(ctx, {
    op: 'withdraw',
    accounts: [
      opts.participant.identity,
      ctx.addresses.stakeCustody,
      positionAddressOf(ctx, opts.participant.identity),
    ],
    instruction: encodeInstruction({ kind: 'withdraw', amount: opts.amount }),
    signers: [opts.participant],
    args: { amount: opts.amount.toString() },
  });
}
