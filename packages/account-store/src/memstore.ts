// packages/account-store/src/memstore.ts
import type { AccountStore } from './types.js';
import { deletePath, getPath, setPath } from './keys.js';

/** In-process store with the same key semantics as the file store. */
export class MemoryAccountStore implements AccountStore {
  private data: Record<string, unknown>;
  private queue: Promise<void> = Promise.resolve();
  public flushCount = 0;

  constructor(initial: Record<string, unknown> = {}) {
    this.data = structuredClone(initial);
  }

  async load(): Promise<void> {}

  async flush(): Promise<void> {
    this.flushCount++;
  }

  get(key: string): unknown {
    return getPath(this.data, key);
  }

  set(key: string, value: unknown): void {
    setPath(this.data, key, value);
  }

  delete(key: string): void {
    deletePath(this.data, key);
  }

  snapshot(): Record<string, unknown> {
    return structuredClone(this.data);
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const before = structuredClone(this.data);
      try {
        return await fn();
      } catch (e) {
        this.data = before;
        throw e;
      }
    });
    // the caller gets the rejection; the queue only needs to know it settled
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
