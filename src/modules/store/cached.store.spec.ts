import { InMemoryStore } from '../../testing/fakes';
import { CachedStore } from './cached.store';
import { KeyValueStore } from './key-value-store.interface';

describe('CachedStore', () => {
  let inner: InMemoryStore;
  let cache: CachedStore;

  beforeEach(() => {
    inner = new InMemoryStore();
    cache = new CachedStore(inner);
  });

  it('serves repeated reads from memory, misses included', async () => {
    inner.data.set('k', 'v');

    expect(await cache.get('k')).toBe('v');
    expect(await cache.get('k')).toBe('v');
    expect(await cache.get('missing')).toBeNull();
    expect(await cache.get('missing')).toBeNull();

    expect(inner.reads).toEqual(['k', 'missing']);
  });

  it('invalidates the local entry on write', async () => {
    inner.data.set('k', 'old');
    await cache.get('k');

    await cache.set('k', 'new');
    expect(cache.has('k')).toBe(false);
    expect(await cache.get('k')).toBe('new');
    expect(inner.reads).toEqual(['k', 'k']);
  });

  it('drops the local entry even when the write fails', async () => {
    inner.data.set('k', 'old');
    await cache.get('k');
    inner.failWrites.add('k');

    await expect(cache.set('k', 'new')).rejects.toThrow('store write failed key=k');
    expect(cache.has('k')).toBe(false);
  });

  it('propagates read errors without caching them', async () => {
    inner.failReads.add('k');
    await expect(cache.get('k')).rejects.toThrow('store read failed key=k');
    expect(cache.has('k')).toBe(false);
  });

  it('warms every indexed key', async () => {
    await inner.set('a', '1');
    await inner.set('b', '2');
    inner.reads.length = 0;

    expect(await cache.warm()).toBe(2);
    expect(cache.size).toBe(2);
    expect(await cache.get('a')).toBe('1');
    expect(inner.reads).toEqual(['a', 'b']);
  });

  it('skips keys that fail to load during warm-up', async () => {
    await inner.set('a', '1');
    await inner.set('b', '2');
    inner.failReads.add('a');

    expect(await cache.warm()).toBe(1);
    expect(cache.has('a')).toBe(false);
    expect(cache.has('b')).toBe(true);
  });

  it('does nothing on warm-up when the inner store keeps no index', async () => {
    const plain: KeyValueStore = {
      get: async () => null,
      set: async () => undefined,
    };
    expect(await new CachedStore(plain).warm()).toBe(0);
  });
});
