// packages/cli/src/config_store.ts
import fs from 'node:fs';
import path from 'node:path';

import { isRecord } from '@epoch-stake/account-store';

export type ProfileWalletMaterial = {
  secretKeyHex: string;
  kind: 'generated' | 'imported';
  createdAt: string;
};

export type ProfileConfigV1 = {
  wallet?: ProfileWalletMaterial;
};

/** Which program and assets this home directory talks to. Hex, 32 bytes each. */
export type DeploymentConfigV1 = {
  programIdHex?: string;
  stakeAssetHex?: string;
  rewardAssetHex?: string;
};

export type StakectlConfigV1 = {
  version: 1;
  createdAt: string;
  currentProfile: string;
  deployment: DeploymentConfigV1;
  profiles: Record<string, ProfileConfigV1>;
};

function ensureParentDir(filename: string) {
  fs.mkdirSync(path.dirname(filename), { recursive: true });
}

function nonEmptyString(v: unknown): string | undefined {
  return typeof v === 'string' && v ? v : undefined;
}

function normalizeWallet(v: unknown): ProfileWalletMaterial | undefined {
  if (!isRecord(v)) return undefined;
  const secretKeyHex = nonEmptyString(v.secretKeyHex);
  if (!secretKeyHex) return undefined;
  return {
    secretKeyHex,
    kind: v.kind === 'imported' ? 'imported' : 'generated',
    createdAt: nonEmptyString(v.createdAt) ?? new Date(0).toISOString(),
  };
}

function normalizeProfiles(v: unknown): Record<string, ProfileConfigV1> {
  const out: Record<string, ProfileConfigV1> = {};
  if (!isRecord(v)) return out;
  for (const [name, raw] of Object.entries(v)) {
    const wallet = isRecord(raw) ? normalizeWallet(raw.wallet) : undefined;
    out[name] = wallet ? { wallet } : {};
  }
  return out;
}

function normalizeDeployment(v: unknown): DeploymentConfigV1 {
  if (!isRecord(v)) return {};
  const out: DeploymentConfigV1 = {};
  const programIdHex = nonEmptyString(v.programIdHex);
  const stakeAssetHex = nonEmptyString(v.stakeAssetHex);
  const rewardAssetHex = nonEmptyString(v.rewardAssetHex);
  if (programIdHex) out.programIdHex = programIdHex;
  if (stakeAssetHex) out.stakeAssetHex = stakeAssetHex;
  if (rewardAssetHex) out.rewardAssetHex = rewardAssetHex;
  return out;
}

export function ensureConfigDefaults(partial?: unknown): StakectlConfigV1 {
  const p = isRecord(partial) ? partial : {};
  return {
    version: 1,
    createdAt: nonEmptyString(p.createdAt) ?? new Date().toISOString(),
    currentProfile: nonEmptyString(p.currentProfile) ?? 'default',
    deployment: normalizeDeployment(p.deployment),
    profiles: normalizeProfiles(p.profiles),
  };
}

export function readConfig(args: { configFile: string }): StakectlConfigV1 | null {
  const { configFile } = args;
  if (!fs.existsSync(configFile)) return null;

  const raw = fs.readFileSync(configFile, 'utf8');
  const parsed: unknown = JSON.parse(raw);
  return ensureConfigDefaults(parsed);
}

export function writeConfig(args: { configFile: string; config: StakectlConfigV1 }): void {
  const { configFile, config } = args;
  ensureParentDir(configFile);
  const normalized = ensureConfigDefaults(config);
  fs.writeFileSync(configFile, JSON.stringify(normalized, null, 2) + '\n', 'utf8');
}

export function upsertProfile(
  config: StakectlConfigV1,
  profile: string,
  patch: Partial<ProfileConfigV1>
): StakectlConfigV1 {
  const c = ensureConfigDefaults(config);
  const prev = c.profiles[profile] ?? {};
  return {
    ...c,
    profiles: {
      ...c.profiles,
      [profile]: { ...prev, ...patch },
    },
  };
}
