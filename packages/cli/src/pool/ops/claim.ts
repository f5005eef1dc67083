// packages/cli/src/pool/ops/claim.ts
import { encodeInstruction } from '@epoch-stake/staking-core';
import type { Keypair } from '@epoch-stake/utils';

import type { TxReceipt } from '../../host/execute.js';
import { positionAddressOf, submit, type PoolOpContext } from '../context.js';

export async function runClaim(ctx: PoolOpContext, opts: { participant: Keypair }): Promise<TxReceipt> {
  return submit(ctx, {
    op: 'claim',
    accounts: [
      opts.participant.identity,
      ctx.addresses.rewardCustody,
      positionAddressOf(ctx, opts.participant.identity),
    ],
    instruction: encodeInstruction({ kind: 'claim' }),
    signers: [opts.participant],
  });
}
