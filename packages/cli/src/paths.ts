// packages/cli/src/paths.ts
import path from 'node:path';
import fs from 'node:fs';

export const STORE_DIRNAME = '.epoch-stake';

export type ProfilePaths = {
  profile: string;
  profileDir: string;

  // shared across profiles
  configFile: string;
  ledgerFile: string;

  // per profile
  logFile: string;
};

export function sanitizeProfileName(name: string): string {
  const n = name.trim();
  if (!n) return 'default';

  if (!/^[a-zA-Z0-9_-]+$/.test(n)) {
    throw new Error(`invalid --profile "${n}" (allowed: [a-zA-Z0-9_-])`);
  }
  return n;
}

/**
 * Find the nearest directory at-or-above `startCwd` containing `.epoch-stake/config.json`.
 * If not found, fall back to `startCwd`.
 */
export function findConfigRoot(startCwd: string): string {
  let dir = path.resolve(startCwd);

  while (true) {
    const candidate = path.join(dir, STORE_DIRNAME, 'config.json');
    if (fs.existsSync(candidate)) return dir;

    const parent = path.dirname(dir);
    if (parent === dir) break; // reached filesystem root
    dir = parent;
  }

  return path.resolve(startCwd);
}

/**
 * EPOCH_STAKE_HOME forces the directory that holds `.epoch-stake/`:
 *   <EPOCH_STAKE_HOME>/.epoch-stake/config.json
 *   <EPOCH_STAKE_HOME>/.epoch-stake/ledger.json
 *   <EPOCH_STAKE_HOME>/.epoch-stake/profiles/<profile>/events.ndjson
 */
function getForcedHomeFromEnv(): string | null {
  const raw = (process.env.EPOCH_STAKE_HOME ?? '').trim();
  if (!raw) return null;
  return path.resolve(process.cwd(), raw);
}

export function resolveRoot(cwd: string): string {
  return getForcedHomeFromEnv() ?? findConfigRoot(cwd);
}

export function resolveProfilePaths(args: {
  cwd: string;
  profile: string;

  ledgerOverride?: string | null;
  logOverride?: string | null;
}): ProfilePaths {
  const { cwd, profile, ledgerOverride, logOverride } = args;

  const prof = sanitizeProfileName(profile);
  const root = resolveRoot(cwd);

  const configFile = path.resolve(root, STORE_DIRNAME, 'config.json');
  const baseDir = path.resolve(root, STORE_DIRNAME, 'profiles', prof);

  const ledgerFile =
    (ledgerOverride && path.resolve(root, ledgerOverride)) || path.resolve(root, STORE_DIRNAME, 'ledger.json');

  const logFile =
    (logOverride && path.resolve(root, logOverride)) || path.resolve(baseDir, 'events.ndjson');

  return {
    profile: prof,
    profileDir: baseDir,
    configFile,
    ledgerFile,
    logFile,
  };
}
