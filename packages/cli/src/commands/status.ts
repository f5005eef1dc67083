// packages/cli/src/commands/status.ts
import fs from 'node:fs';
import type { Command } from 'commander';

import { bytesToHex } from '@epoch-stake/utils';

import { ensureConfigDefaults, readConfig } from '../config_store.js';
import { getWalletFromConfig } from '../wallets.js';
import { readPool } from '../pool/state.js';
import { getOrCreateSubcommand, type CliDeps } from './shared.js';

export function registerStatusCommand(program: Command, deps: Pick<CliDeps, 'getActivePaths' | 'openPoolCtx' | 'out'>) {
  const status = getOrCreateSubcommand(program, 'status', 'Show current context and readiness');

  status.action(async () => {
    const { configFile, profile, ledgerFile, logFile } = deps.getActivePaths();
    const out = deps.out;

    const cfg = ensureConfigDefaults(readConfig({ configFile }));
    const w = getWalletFromConfig({ configFile, profile });
    const ctx = await deps.openPoolCtx();
    const pool = readPool(ctx);

    out(`profile(flag):    ${profile}`);
    out(`currentProfile:   ${cfg.currentProfile}`);
    out(`config:           ${configFile}`);
    out(`program:          ${bytesToHex(ctx.deployment.programId)}`);
    out(`pool account:     ${bytesToHex(ctx.addresses.pool)}`);
    out(`pool:             ${pool ? (pool.initialized ? `initialized (epoch ${pool.epochId})` : 'allocated') : 'missing'}`);
    out(`wallet:           ${w ? 'ready' : 'missing'}`);
    if (w) {
      out(`identity:         ${bytesToHex(w.identity)}`);
    } else {
      out(`hint:             run "stakectl --profile ${profile} wallet init"`);
    }
    out(`ledger file:      ${ledgerFile} ${fs.existsSync(ledgerFile) ? '(exists)' : '(missing)'}`);
    out(`events log:       ${logFile} ${fs.existsSync(logFile) ? '(exists)' : '(missing)'}`);
  });

  return status;
}
