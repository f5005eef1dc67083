// packages/cli/src/tests/config_store.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ensureConfigDefaults, readConfig, upsertProfile, writeConfig } from '../config_store.js';
import { getWalletFromConfig, initWallet } from '../wallets.js';

function tmpConfig(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'epoch-stake-cfg-'));
  return path.join(dir, '.epoch-stake', 'config.json');
}

test('ensureConfigDefaults: fills gaps and drops malformed entries', () => {
  const cfg = ensureConfigDefaults({
    createdAt: '2026-01-01T00:00:00.000Z',
    profiles: { alice: { wallet: { secretKeyHex: 'ab' } }, bob: { wallet: 42 } },
    deployment: { programIdHex: '', stakeAssetHex: 'cd' },
  });

  assert.equal(cfg.version, 1);
  assert.equal(cfg.createdAt, '2026-01-01T00:00:00.000Z');
  assert.equal(cfg.currentProfile, 'default');
  assert.deepEqual(cfg.deployment, { stakeAssetHex: 'cd' });
  assert.equal(cfg.profiles.alice?.wallet?.secretKeyHex, 'ab');
  assert.equal(cfg.profiles.alice?.wallet?.kind, 'generated');
  assert.deepEqual(cfg.profiles.bob, {});
});

test('readConfig: missing file is null; write then read round-trips', () => {
  const configFile = tmpConfig();
  assert.equal(readConfig({ configFile }), null);

  const cfg = upsertProfile(ensureConfigDefaults(null), 'alice', {});
  writeConfig({ configFile, config: cfg });

  const back = readConfig({ configFile });
  assert.ok(back);
  assert.deepEqual(Object.keys(back.profiles), ['alice']);
});

test('initWallet: imports a secret, keeps it unless forced', () => {
  const configFile = tmpConfig();

  const first = initWallet({ configFile, profile: 'alice', secretHex: '01'.repeat(32) });
  assert.equal(first.created, true);

  const again = initWallet({ configFile, profile: 'alice' });
  assert.equal(again.created, false);
  assert.deepEqual(again.keypair.identity, first.keypair.identity);

  const w = getWalletFromConfig({ configFile, profile: 'alice' });
  assert.ok(w);
  assert.deepEqual(w.identity, first.keypair.identity);
  assert.equal(readConfig({ configFile })?.profiles.alice?.wallet?.kind, 'imported');

  const replaced = initWallet({ configFile, profile: 'alice', secretHex: '02'.repeat(32), force: true });
  assert.equal(replaced.created, true);
  assert.notDeepEqual(replaced.keypair.identity, first.keypair.identity);

  assert.equal(getWalletFromConfig({ configFile, profile: 'bob' }), null);
});
