// packages/account-store/src/types.ts
export type LedgerSchemaVersion = 1;

export type LedgerFile = {
  schemaVersion: LedgerSchemaVersion;
  updatedAt: string; // ISO
  data: Record<string, unknown>;
};

/** Dotted-key JSON store. `load()` before use, `flush()` to persist. */
export interface AccountStore {
  load(): Promise<void>;
  flush(): Promise<void>;

  get(key: string): unknown;
  set(key: string, value: unknown): void;
  delete(key: string): void;

  snapshot(): Record<string, unknown>;

  /**
   * Run `fn` with exclusive access to the backing storage, against contents
   * re-read once access is held. In-memory changes made by a failing `fn`
   * are rolled back.
   */
  withLock<T>(fn: () => Promise<T>): Promise<T>;
}

/** Stored shape of one account; bytes are hex. */
export type StoredAccount = {
  ownerHex: string;
  dataHex: string;
};
