// packages/account-store/src/filestore.ts
import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import lockfile from 'proper-lockfile';

import type { AccountStore, LedgerFile } from './types.js';
import { deletePath, getPath, isRecord, setPath } from './keys.js';

const DEFAULT_FILE: LedgerFile = {
  schemaVersion: 1,
  updatedAt: new Date(0).toISOString(),
  data: {},
};

export type FileBackedStoreOptions = {
  filename: string;
};

// a transaction holds the lock for a few milliseconds; waiters back off up to ~10s in total
const LOCK_RETRIES = { retries: 40, factor: 1.3, minTimeout: 10, maxTimeout: 500 };

let tmpSeq = 0;

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

function parseLedgerFile(raw: string, filename: string): LedgerFile {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) throw new Error(`Ledger file is not a JSON object: ${filename}`);
  if (parsed.schemaVersion !== 1) {
    throw new Error(`Unsupported schemaVersion: ${String(parsed.schemaVersion)}`);
  }
  const data = parsed.data;
  return {
    schemaVersion: 1,
    updatedAt: typeof parsed.updatedAt === 'string' ? parsed.updatedAt : DEFAULT_FILE.updatedAt,
    data: isRecord(data) ? data : {},
  };
}

/**
 * JSON file store. Writes go to a per-writer temp file and are renamed into
 * place, so a crash mid-write never leaves a half-written ledger.
 *
 * Several processes may share one file: wrap each read-modify-flush cycle in
 * `withLock()`, which holds `<file>.lock` and re-reads the file first.
 */
export class FileBackedAccountStore implements AccountStore {
  public readonly filename: string;
  private file: LedgerFile = structuredClone(DEFAULT_FILE);
  private loaded = false;

  constructor(opts: FileBackedStoreOptions) {
    this.filename = opts.filename;
  }

  async load(): Promise<void> {
    if (this.loaded) return;
    await this.readFromDisk();
  }

  private async readFromDisk(): Promise<void> {
    try {
      const raw = await fs.readFile(this.filename, 'utf8');
      this.file = parseLedgerFile(raw, this.filename);
    } catch (e) {
      if (!isMissingFile(e)) throw e;
      // start new
      this.file = structuredClone(DEFAULT_FILE);
    }

    this.loaded = true;
  }

  private requireLoaded(): void {
    if (!this.loaded) throw new Error('State not loaded. Call load() first.');
  }

  get(key: string): unknown {
    this.requireLoaded();
    return getPath(this.file.data, key);
  }

  set(key: string, value: unknown): void {
    this.requireLoaded();
    setPath(this.file.data, key, value);
    this.file.updatedAt = new Date().toISOString();
  }

  delete(key: string): void {
    this.requireLoaded();
    deletePath(this.file.data, key);
    this.file.updatedAt = new Date().toISOString();
  }

  snapshot(): Record<string, unknown> {
    this.requireLoaded();
    return structuredClone(this.file.data);
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await fs.mkdir(path.dirname(this.filename), { recursive: true });
    const release = await lockfile.lock(this.filename, { realpath: false, retries: LOCK_RETRIES });

    try {
      await this.readFromDisk();
      const before = structuredClone(this.file);
      try {
        return await fn();
      } catch (e) {
        this.file = before;
        throw e;
      }
    } finally {
      await release();
    }
  }

  async flush(): Promise<void> {
    this.requireLoaded();

    await fs.mkdir(path.dirname(this.filename), { recursive: true });

    const tmp = `${this.filename}.${process.pid}.${++tmpSeq}.tmp`;
    const json = JSON.stringify(this.file, null, 2);

    await fs.writeFile(tmp, json, 'utf8');
    await fs.rename(tmp, this.filename);
  }
}
