import { Logger } from '@nestjs/common';
import { describeError } from '../sync/sync.errors';
import { KeyValueStore, isIndexedStore } from './key-value-store.interface';

/**
 * Read-through cache in front of another store. Reads are served from memory
 * once seen (misses included), and every write drops the local entry so the
 * next read goes back to the inner store.
 */
export class CachedStore implements KeyValueStore {
  private readonly logger = new Logger(CachedStore.name);
  private readonly entries = new Map<string, string | null>();

  constructor(private readonly inner: KeyValueStore) {}

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  async get(key: string): Promise<string | null> {
    if (this.entries.has(key)) {
      return this.entries.get(key) ?? null;
    }
    const value = await this.inner.get(key);
    this.entries.set(key, value);
    return value;
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.delete(key);
    await this.inner.set(key, value);
  }

  /** Preloads every key the inner store has indexed. Returns how many were loaded. */
  async warm(): Promise<number> {
    if (!isIndexedStore(this.inner)) return 0;

    const keys = await this.inner.indexedKeys();
    let loaded = 0;
    for (const key of keys) {
      try {
        const value = await this.inner.get(key);
        if (value === null) continue;
        this.entries.set(key, value);
        loaded++;
      } catch (error) {
        this.logger.warn(`[STORE] warm skipped key=${key} reason=${describeError(error)}`);
      }
    }
    return loaded;
  }
}
