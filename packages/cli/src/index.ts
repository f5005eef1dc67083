#!/usr/bin/env node
// packages/cli/src/index.ts
/**
 * stakectl: drive the epoch staking pool against a local ledger file.
 *
 * Quickstart (two profiles sharing one ledger):
 *   stakectl --profile owner wallet init
 *   stakectl --profile owner pool init
 *   stakectl --profile alice wallet init
 *   stakectl --profile alice asset mint --amount 1000
 *   stakectl --profile alice pool deposit --amount 250
 *   stakectl --profile owner asset mint --asset reward --amount 100
 *   stakectl --profile owner asset fund-rewards --amount 100
 *   stakectl --profile owner pool epoch --start 1 --end 100 --reward 100
 *   stakectl --profile alice pool claim
 */
import { isStakingError } from '@epoch-stake/staking-core';

import { makeProgram } from './program.js';

const program = makeProgram();

(async () => {
  await program.parseAsync(process.argv);
})().catch((err: unknown) => {
  if (isStakingError(err)) {
    console.error(`❌ ${err.kind}/${err.code}: ${err.message}`);
  } else if (err instanceof Error) {
    console.error('❌', process.env.STAKE_DEBUG ? err.stack : err.message);
  } else {
    console.error('❌', String(err));
  }
  process.exitCode = 1;
});
