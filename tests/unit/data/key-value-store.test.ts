/**
 * @fileoverview Unit tests for the in-memory key-value store
 */

import { MemoryKeyValueStore } from '../../../src';

describe('MemoryKeyValueStore', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should store and remove values', async () => {
    const store = new MemoryKeyValueStore();

    await store.set('articles:1', '{"id":"1"}');
    await expect(store.get('articles:1')).resolves.toBe('{"id":"1"}');
    await expect(store.delete('articles:1')).resolves.toBe(true);
    await expect(store.get('articles:1')).resolves.toBeUndefined();
  });

  it('should clear everything', async () => {
    const store = new MemoryKeyValueStore();
    await store.set('a', '1');
    await store.set('b', '2');

    await store.clear();

    expect(store.size).toBe(0);
  });

  it('should respect its capacity', async () => {
    const store = new MemoryKeyValueStore({ capacity: 1 });
    await store.set('a', '1');
    await store.set('b', '2');

    await expect(store.get('a')).resolves.toBeUndefined();
    await expect(store.get('b')).resolves.toBe('2');
  });

  it('should apply the default TTL unless one is given', async () => {
    jest.useFakeTimers();
    jest.setSystemTime(0);
    const store = new MemoryKeyValueStore({ defaultTtlMs: 10 });
    await store.set('short', 's');
    await store.set('long', 'l', 1000);

    jest.setSystemTime(11);

    await expect(store.get('short')).resolves.toBeUndefined();
    await expect(store.get('long')).resolves.toBe('l');
  });
});
