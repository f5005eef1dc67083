// packages/cli/src/wallets.ts
import { bytesToHex, generateKeypair, keypairFromSecretHex, type Keypair } from '@epoch-stake/utils';

import { readConfig, upsertProfile, writeConfig, ensureConfigDefaults } from './config_store.js';

export function getWalletFromConfig(args: { configFile: string; profile: string }): Keypair | null {
  const cfg = readConfig({ configFile: args.configFile });
  const w = cfg?.profiles[args.profile]?.wallet;
  if (!w) return null;
  return keypairFromSecretHex(w.secretKeyHex);
}

export function requireWallet(args: { configFile: string; profile: string }): Keypair {
  const w = getWalletFromConfig(args);
  if (!w) {
    throw new Error(
      `[wallet] no wallet found for profile "${args.profile}"\n` + `Try: stakectl --profile ${args.profile} wallet init`
    );
  }
  return w;
}

/**
 * Store a keypair under the profile. A fresh one is generated unless
 * `secretHex` is given. Refuses to replace an existing wallet without `force`.
 */
export function initWallet(args: {
  configFile: string;
  profile: string;
  secretHex?: string | null;
  force?: boolean;
}): { keypair: Keypair; created: boolean } {
  const { configFile, profile, secretHex, force } = args;

  const cfg0 = ensureConfigDefaults(readConfig({ configFile }));
  const existing = cfg0.profiles[profile]?.wallet;
  if (existing && !force) {
    return { keypair: keypairFromSecretHex(existing.secretKeyHex), created: false };
  }

  const keypair = secretHex ? keypairFromSecretHex(secretHex) : generateKeypair();

  const cfg1 = upsertProfile(cfg0, profile, {
    wallet: {
      secretKeyHex: bytesToHex(keypair.secretKey),
      kind: secretHex ? 'imported' : 'generated',
      createdAt: new Date().toISOString(),
    },
  });
  writeConfig({ configFile, config: cfg1 });

  return { keypair, created: true };
}
