// packages/cli/src/commands/wallet.ts
import type { Command } from 'commander';

import { bytesToHex } from '@epoch-stake/utils';

import { getWalletFromConfig, initWallet } from '../wallets.js';
import { getOrCreateSubcommand, toJson, type CliDeps } from './shared.js';

export function registerWalletCommands(program: Command, deps: Pick<CliDeps, 'getActivePaths' | 'out'>) {
  const wallet = getOrCreateSubcommand(program, 'wallet', 'Wallet commands (one keypair per profile)');

  wallet
    .command('init')
    .description('Create (or import) the keypair for the active profile.')
    .option('--secret-hex <hex>', 'import an existing 32-byte secret key')
    .option('--force', 'replace an existing wallet', false)
    .action(async (opts: { secretHex?: string; force?: boolean }) => {
      const { configFile, profile } = deps.getActivePaths();

      const { keypair, created } = initWallet({
        configFile,
        profile,
        secretHex: opts.secretHex ?? null,
        force: !!opts.force,
      });

      deps.out(`profile:  ${profile}`);
      deps.out(`config:   ${configFile}`);
      deps.out(`identity: ${bytesToHex(keypair.identity)}`);
      if (!created) deps.out(`wallet already exists (use --force to replace)`);
    });

  wallet
    .command('show')
    .description('Print the identity of the active profile.')
    .option('--json', 'print JSON', false)
    .action(async (opts: { json?: boolean }) => {
      const { configFile, profile } = deps.getActivePaths();
      const w = getWalletFromConfig({ configFile, profile });

      if (opts.json) {
        deps.out(toJson({ profile, identity: w ? w.identity : null }));
        return;
      }

      if (!w) {
        deps.out(`profile:  ${profile}`);
        deps.out(`wallet:   missing`);
        deps.out(`hint:     run "stakectl --profile ${profile} wallet init"`);
        return;
      }
      deps.out(`profile:  ${profile}`);
      deps.out(`identity: ${bytesToHex(w.identity)}`);
    });

  return wallet;
}
