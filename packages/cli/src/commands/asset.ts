// packages/cli/src/commands/asset.ts
import type { Command } from 'commander';

import { bytesToHex } from '@epoch-stake/utils';

import { assetLabel, resolveAssetArg } from '../deployment.js';
import { hostTransfer, mint, readBalance } from '../host/faucet.js';
import { getOrCreateSubcommand, parseKeyArg, parseU64Arg, toJson, type CliDeps } from './shared.js';

export function registerAssetCommands(program: Command, deps: CliDeps) {
  const asset = getOrCreateSubcommand(program, 'asset', 'Local asset balances (test faucet)');
  const out = deps.out;

  asset
    .command('mint')
    .description('Credit a balance out of thin air (local ledger only).')
    .option('--asset <asset>', 'stake, reward or a 64-hex asset id', 'stake')
    .requiredOption('--amount <n>', 'amount to mint', parseU64Arg)
    .option('--to <identity>', 'recipient (default: the active wallet)', parseKeyArg)
    .action(async (opts: { asset: string; amount: bigint; to?: Uint8Array }) => {
      const ctx = await deps.openPoolCtx();
      const id = resolveAssetArg(ctx.deployment, opts.asset);
      const to = opts.to ?? deps.loadMeWallet().identity;

      const balance = await mint(ctx, { asset: id, to, amount: opts.amount });
      out(`minted ${opts.amount} ${assetLabel(ctx.deployment, id)} to ${bytesToHex(to)}`);
      out(`balance: ${balance}`);
    });

  asset
    .command('balance')
    .description('Print stake and reward balances (default: the active wallet).')
    .option('--of <identity>', 'holder (64-hex)', parseKeyArg)
    .option('--json', 'print JSON', false)
    .action(async (opts: { of?: Uint8Array; json?: boolean }) => {
      const ctx = await deps.openPoolCtx();
      const holder = opts.of ?? deps.loadMeWallet().identity;
      const stake = readBalance(ctx, ctx.deployment.stakeAsset, holder);
      const reward = readBalance(ctx, ctx.deployment.rewardAsset, holder);

      if (opts.json) {
        out(toJson({ holder, stake, reward }));
        return;
      }
      out(`holder: ${bytesToHex(holder)}`);
      out(`stake:  ${stake}`);
      out(`reward: ${reward}`);
    });

  asset
    .command('fund-rewards')
    .description("Move reward tokens from the active wallet into the pool's reward custody.")
    .requiredOption('--amount <n>', 'amount to move', parseU64Arg)
    .action(async (opts: { amount: bigint }) => {
      const ctx = await deps.openPoolCtx();
      const from = deps.loadMeWallet();
      const custody = ctx.addresses.rewardCustody;

      await hostTransfer(ctx, { asset: ctx.deployment.rewardAsset, from, to: custody, amount: opts.amount });
      out(`reward custody: ${bytesToHex(custody)}`);
      out(`custody balance: ${readBalance(ctx, ctx.deployment.rewardAsset, custody)}`);
    });

  return asset;
}
