// packages/cli/src/pool/ops/epoch.ts
import { encodeInstruction } from '@epoch-stake/staking-core';
import type { Keypair } from '@epoch-stake/utils';

import type { TxReceipt } from '../../host/execute.js';
import { submit, type PoolOpContext } from '../context.js';

export async function runStartEpoch(
  ctx: PoolOpContext,
  opts: { owner: Keypair; startTime: bigint; endTime: bigint; rewardAmount: bigint }
): Promise<TxReceipt> {
  const { owner, startTime, endTime, rewardAmount } = opts;
  return submit(ctx, {
    op: 'startEpoch',
    accounts: [owner.identity],
    instruction: encodeInstruction({ kind: 'startEpoch', startTime, endTime, rewardAmount }),
    signers: [owner],
    args: { startTime: startTime.toString(), endTime: endTime.toString(), rewardAmount: rewardAmount.toString() },
  });
}
