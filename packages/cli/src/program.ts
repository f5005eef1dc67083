// packages/cli/src/program.ts
import { Command } from 'commander';

import { FileBackedAccountStore } from '@epoch-stake/account-store';
import { debugLog } from '@epoch-stake/utils';

import { ensureConfigDefaults, readConfig } from './config_store.js';
import { resolveDeployment } from './deployment.js';
import { resolveProfilePaths, type ProfilePaths } from './paths.js';
import { makePoolOpContext, type PoolOpContext } from './pool/context.js';
import { requireWallet } from './wallets.js';

import { registerWalletCommands } from './commands/wallet.js';
import { registerStatusCommand } from './commands/status.js';
import { registerPoolCommands } from './commands/pool.js';
import { registerAssetCommands } from './commands/asset.js';
import type { CliDeps, Out } from './commands/shared.js';

type GlobalOpts = {
  profile?: string;
  ledgerFile?: string;
  logFile?: string;
};

export function makeProgram(opts: { out?: Out; cwd?: string } = {}): Command {
  const out: Out = opts.out ?? ((line) => console.log(line));
  const cwd = opts.cwd ?? process.cwd();

  const program = new Command();

  program
    .name('stakectl')
    .description('Epoch staking pool ledger')
    .option('--profile <name>', 'profile to act as (default: currentProfile from config)')
    .option('--ledger-file <path>', 'shared ledger store (default: .epoch-stake/ledger.json)')
    .option('--log-file <path>', 'events log (default: .epoch-stake/profiles/<profile>/events.ndjson)');

  const getActivePaths = (): ProfilePaths => {
    const g = program.opts<GlobalOpts>();
    let profile = g.profile;
    if (!profile) {
      const { configFile } = resolveProfilePaths({ cwd, profile: 'default' });
      profile = readConfig({ configFile })?.currentProfile ?? 'default';
    }
    return resolveProfilePaths({
      cwd,
      profile,
      ledgerOverride: g.ledgerFile ?? null,
      logOverride: g.logFile ?? null,
    });
  };

  const openPoolCtx = async (): Promise<PoolOpContext> => {
    const { configFile, ledgerFile, logFile } = getActivePaths();
    const cfg = ensureConfigDefaults(readConfig({ configFile }));

    const store = new FileBackedAccountStore({ filename: ledgerFile });
    await store.load();
    debugLog(`[stakectl] ledger=${ledgerFile} log=${logFile}`);

    return makePoolOpContext({ store, deployment: resolveDeployment(cfg), logFile });
  };

  const loadMeWallet = () => {
    const { configFile, profile } = getActivePaths();
    return requireWallet({ configFile, profile });
  };

  const deps: CliDeps = { getActivePaths, openPoolCtx, loadMeWallet, out };

  registerWalletCommands(program, deps);
  registerStatusCommand(program, deps);
  registerPoolCommands(program, deps);
  registerAssetCommands(program, deps);

  return program;
}
