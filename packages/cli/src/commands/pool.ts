// packages/cli/src/commands/pool.ts
import type { Command } from 'commander';

import { bytesToHex } from '@epoch-stake/utils';

import { runInit } from '../pool/ops/init.js';
import { runDeposit } from '../pool/ops/deposit.js';
import { runWithdraw } from '../pool/ops/withdraw.js';
import { runStartEpoch } from '../pool/ops/epoch.js';
import { runClaim } from '../pool/ops/claim.js';
import { readPool, readPosition } from '../pool/state.js';
import { getOrCreateSubcommand, parseKeyArg, parseU64Arg, printReceipt, toJson, type CliDeps } from './shared.js';

export function registerPoolCommands(program: Command, deps: CliDeps) {
  const pool = getOrCreateSubcommand(program, 'pool', 'Staking pool operations');
  const out = deps.out;

  pool
    .command('init')
    .description('Create and initialize the pool; the active wallet becomes its owner.')
    .action(async () => {
      const ctx = await deps.openPoolCtx();
      const owner = deps.loadMeWallet();
      printReceipt(out, await runInit(ctx, { owner }));
      out(`pool: ${bytesToHex(ctx.addresses.pool)}`);
    });

  pool
    .command('deposit')
    .description('Stake tokens from the active wallet.')
    .requiredOption('--amount <n>', 'amount to stake', parseU64Arg)
    .action(async (opts: { amount: bigint }) => {
      const ctx = await deps.openPoolCtx();
      const participant = deps.loadMeWallet();
      printReceipt(out, await runDeposit(ctx, { participant, amount: opts.amount }));
    });

  pool
    .command('withdraw')
    .description('Unstake tokens back to the active wallet.')
    .requiredOption('--amount <n>', 'amount to unstake', parseU64Arg)
    .action(async (opts: { amount: bigint }) => {
      const ctx = await deps.openPoolCtx();
      const participant = deps.loadMeWallet();
      printReceipt(out, await runWithdraw(ctx, { participant, amount: opts.amount }));
    });

  pool
    .command('epoch')
    .description('Start a new reward epoch (pool owner only).')
    .requiredOption('--start <t>', 'epoch start time', parseU64Arg)
    .requiredOption('--end <t>', 'epoch end time', parseU64Arg)
    .requiredOption('--reward <n>', 'reward distributed for the epoch', parseU64Arg)
    .action(async (opts: { start: bigint; end: bigint; reward: bigint }) => {
      const ctx = await deps.openPoolCtx();
      const owner = deps.loadMeWallet();
      printReceipt(
        out,
        await runStartEpoch(ctx, { owner, startTime: opts.start, endTime: opts.end, rewardAmount: opts.reward })
      );
    });

  pool
    .command('claim')
    .description("Claim the active wallet's share of the current epoch reward.")
    .action(async () => {
      const ctx = await deps.openPoolCtx();
      const participant = deps.loadMeWallet();
      printReceipt(out, await runClaim(ctx, { participant }));
    });

  pool
    .command('show')
    .description('Print the pool record.')
    .option('--json', 'print JSON', false)
    .action(async (opts: { json?: boolean }) => {
      const ctx = await deps.openPoolCtx();
      const rec = readPool(ctx);

      if (opts.json) {
        out(toJson({ address: ctx.addresses.pool, pool: rec }));
        return;
      }
      if (!rec) {
        out('no pool (run "stakectl pool init")');
        return;
      }

      out(`address:      ${bytesToHex(ctx.addresses.pool)}`);
      out(`initialized:  ${rec.initialized}`);
      out(`owner:        ${bytesToHex(rec.owner)}`);
      out(`stakeAsset:   ${bytesToHex(rec.stakeAsset)}`);
      out(`rewardAsset:  ${bytesToHex(rec.rewardAsset)}`);
      out(`totalStaked:  ${rec.totalStaked}`);
      out(`epochId:      ${rec.epochId}`);
      out(`epochStart:   ${rec.epochStart}`);
      out(`epochEnd:     ${rec.epochEnd}`);
      out(`epochReward:  ${rec.epochReward}`);
      out(`epochBase:    ${rec.epochTotalStaked}`);
    });

  pool
    .command('position')
    .description('Print a staking position (default: the active wallet).')
    .option('--of <identity>', 'participant identity (64-hex)', parseKeyArg)
    .option('--json', 'print JSON', false)
    .action(async (opts: { of?: Uint8Array; json?: boolean }) => {
      const ctx = await deps.openPoolCtx();
      const participant = opts.of ?? deps.loadMeWallet().identity;
      const view = readPosition(ctx, participant);

      if (opts.json) {
        out(toJson({ participant, ...view }));
        return;
      }
      if (!view.position || !view.position.initialized) {
        out(`no position for ${bytesToHex(participant)}`);
        return;
      }

      out(`address:          ${bytesToHex(view.address)}`);
      out(`owner:            ${bytesToHex(view.position.owner)}`);
      out(`stakedAmount:     ${view.position.stakedAmount}`);
      out(`lastClaimedEpoch: ${view.position.lastClaimedEpoch}`);
      out(`lastDepositEpoch: ${view.position.lastDepositEpoch}`);
      out(`claimable:        ${view.claimable}`);
    });

  return pool;
}
