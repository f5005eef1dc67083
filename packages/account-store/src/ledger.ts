// packages/account-store/src/ledger.ts
import { bytesToHex, hexToBytes, isU64 } from '@epoch-stake/utils';

import type { AccountStore, StoredAccount } from './types.js';
import { isRecord } from './keys.js';

// Layout inside the store:
//   accounts.<keyHex>                 -> { ownerHex, dataHex }
//   balances.<assetHex>.<holderHex>   -> decimal u64 string

export const ACCOUNTS_KEY = 'accounts';
export const BALANCES_KEY = 'balances';

export type AccountRecord = {
  key: Uint8Array;
  owner: Uint8Array;
  data: Uint8Array;
};

function accountKey(key: Uint8Array): string {
  return `${ACCOUNTS_KEY}.${bytesToHex(key)}`;
}

function balanceKey(asset: Uint8Array, holder: Uint8Array): string {
  return `${BALANCES_KEY}.${bytesToHex(asset)}.${bytesToHex(holder)}`;
}

function isStoredAccount(v: unknown): v is StoredAccount {
  return isRecord(v) && typeof v.ownerHex === 'string' && typeof v.dataHex === 'string';
}

export function getAccount(store: AccountStore, key: Uint8Array): AccountRecord | null {
  const raw = store.get(accountKey(key));
  if (raw === undefined) return null;
  if (!isStoredAccount(raw)) throw new Error(`Malformed account entry for ${bytesToHex(key)}`);
  return {
    key: key.slice(),
    owner: hexToBytes(raw.ownerHex),
    data: hexToBytes(raw.dataHex),
  };
}

export function putAccount(store: AccountStore, acc: AccountRecord): void {
  const entry: StoredAccount = {
    ownerHex: bytesToHex(acc.owner),
    dataHex: bytesToHex(acc.data),
  };
  store.set(accountKey(acc.key), entry);
}

export function listAccountKeys(store: AccountStore): string[] {
  const all = store.get(ACCOUNTS_KEY);
  return isRecord(all) ? Object.keys(all).sort() : [];
}

export function getBalance(store: AccountStore, asset: Uint8Array, holder: Uint8Array): bigint {
  const raw = store.get(balanceKey(asset, holder));
  if (raw === undefined) return 0n;
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) {
    throw new Error(`Malformed balance for ${bytesToHex(holder)}: ${String(raw)}`);
  }
  return BigInt(raw);
}

export function setBalance(store: AccountStore, asset: Uint8Array, holder: Uint8Array, amount: bigint): void {
  if (!isU64(amount)) throw new RangeError(`balance out of u64 range: ${amount}`);
  if (amount === 0n) {
    store.delete(balanceKey(asset, holder));
    return;
  }
  store.set(balanceKey(asset, holder), amount.toString());
}
