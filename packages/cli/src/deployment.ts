// packages/cli/src/deployment.ts
import { assetIdFromLabel, defaultProgramId } from '@epoch-stake/staking-core';
import { bytesToHex, ensureBytesLen, hexToBytes } from '@epoch-stake/utils';

import type { StakectlConfigV1 } from './config_store.js';

export type Deployment = {
  programId: Uint8Array;
  stakeAsset: Uint8Array;
  rewardAsset: Uint8Array;
};

function from32(hex: string | undefined, label: string, fallback: () => Uint8Array): Uint8Array {
  if (!hex) return fallback();
  return ensureBytesLen(hexToBytes(hex), 32, label);
}

export function resolveDeployment(cfg: StakectlConfigV1): Deployment {
  const d = cfg.deployment;
  return {
    programId: from32(d.programIdHex, 'deployment.programIdHex', defaultProgramId),
    stakeAsset: from32(d.stakeAssetHex, 'deployment.stakeAssetHex', () => assetIdFromLabel('STAKE')),
    rewardAsset: from32(d.rewardAssetHex, 'deployment.rewardAssetHex', () => assetIdFromLabel('REWARD')),
  };
}

/** Accepts `stake`, `reward` or a 64-hex asset id. */
export function resolveAssetArg(dep: Deployment, raw: string): Uint8Array {
  const v = raw.trim().toLowerCase();
  if (v === 'stake') return dep.stakeAsset;
  if (v === 'reward') return dep.rewardAsset;
  if (/^[0-9a-f]{64}$/.test(v)) return hexToBytes(v);
  throw new Error(`invalid asset "${raw}" (expected stake, reward or 64-hex id)`);
}

export function assetLabel(dep: Deployment, asset: Uint8Array): string {
  const hex = bytesToHex(asset);
  if (hex === bytesToHex(dep.stakeAsset)) return 'stake';
  if (hex === bytesToHex(dep.rewardAsset)) return 'reward';
  return hex;
}
