// packages/cli/src/pool/ops/deposit.ts
import { encodeInstruction } from '@epoch-stake/staking-core';
import type { Keypair } from '@epoch-stake/utils';

import type { TxReceipt } from '../../host/execute.js';
import { POSITION_ALLOCATION_SIZE, positionAddressOf, submit, type PoolOpContext } from '../context.js';

export async function runDeposit(ctx: PoolOpContext, opts: { participant: Keypair; amount: bigint }): Promise<TxReceipt> {
  const position = positionAddressOf(ctx, opts.participant.identity);

  return submit(ctx, {
    op: 'deposit',
    accounts: [opts.participant.identity, ctx.addresses.stakeCustody, position],
    instruction: encodeInstruction({ kind: 'deposit', amount: opts.amount }),
    signers: [opts.participant],
    allocate: [{ key: position, size: POSITION_ALLOCATION_SIZE }],
    args: { amount: opts.amount.toString() },
  });
}
