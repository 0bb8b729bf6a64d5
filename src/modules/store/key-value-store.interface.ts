export const KEY_VALUE_STORE = Symbol('KEY_VALUE_STORE');
export const REDIS_CLIENT = Symbol('REDIS_CLIENT');

/**
 * Raw text store. `get` resolves null for a missing key and rejects with
 * StoreReadError on transport failure; `set` rejects with StoreWriteError.
 * Values never expire.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
}

/** A store that records every key it has written and can list them back. */
export interface IndexedKeyValueStore extends KeyValueStore {
  indexedKeys(): Promise<string[]>;
}

export function isIndexedStore(store: KeyValueStore): store is IndexedKeyValueStore {
  return 'indexedKeys' in store && typeof store.indexedKeys === 'function';
}
