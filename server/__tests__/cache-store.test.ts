import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemoryCacheStore, assertValidTtl } from '../cache-store';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('MemoryCacheStore', () => {
  let store: MemoryCacheStore;

  beforeEach(() => {
    store = new MemoryCacheStore();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns null for an absent key', async () => {
    expect(await store.get('dashboard_metrics:24')).toBeNull();
  });

  it('stores and returns a payload', async () => {
    expect(await store.set('dashboard_metrics:24', '[{"a":1}]', 300)).toBe(true);
    expect(await store.get('dashboard_metrics:24')).toBe('[{"a":1}]');
  });

  it('treats an expired entry as absent', async () => {
    await store.set('short', 'v', 0.05);
    await sleep(120);
    expect(await store.get('short')).toBeNull();
  });

  it('deletes a key, and deleting an absent key still succeeds', async () => {
    await store.set('k', 'v', 60);
    expect(await store.delete('k')).toBe(true);
    expect(await store.get('k')).toBeNull();
    expect(await store.delete('never-set')).toBe(true);
  });

  it('evicts the least recently used entry beyond capacity', async () => {
    const small = new MemoryCacheStore(2);
    await small.set('a', '1', 60);
    await small.set('b', '2', 60);
    await small.get('a');
    await small.set('c', '3', 60);

    expect(await small.get('a')).toBe('1');
    expect(await small.get('b')).toBeNull();
    expect(await small.get('c')).toBe('3');
  });

  it('rejects a non-positive TTL', async () => {
    await expect(store.set('k', 'v', 0)).rejects.toThrow(RangeError);
    await expect(store.expire('k', -1)).rejects.toThrow(RangeError);
  });

  describe('counters', () => {
    it('increments integers from zero', async () => {
      expect(await store.increment('orders:last_hour')).toBe(1);
      expect(await store.increment('orders:last_hour', 2)).toBe(3);
      expect(await store.get('orders:last_hour')).toBe('3');
    });

    it('increments floats', async () => {
      expect(await store.incrementFloat('revenue:last_hour', 1.5)).toBe(1.5);
      expect(await store.incrementFloat('revenue:last_hour', 2.75)).toBe(4.25);
    });

    it('returns 0 and logs when the stored value is not a number', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      await store.set('k', 'not-a-number', 60);

      expect(await store.increment('k')).toBe(0);
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(await store.get('k')).toBe('not-a-number');
    });
  });

  describe('expire', () => {
    it('is false for an absent key', async () => {
      expect(await store.expire('missing', 60)).toBe(false);
    });

    it('gives an existing counter a new lifetime', async () => {
      await store.increment('orders:last_hour');
      expect(await store.expire('orders:last_hour', 0.05)).toBe(true);
      await sleep(120);
      expect(await store.get('orders:last_hour')).toBeNull();
    });
  });

  it('pings true and clears on close', async () => {
    await store.set('k', 'v', 60);
    expect(await store.ping()).toBe(true);
    await store.close();
    expect(await store.get('k')).toBeNull();
  });
});

describe('assertValidTtl', () => {
  it('accepts positive finite seconds', () => {
    expect(() => assertValidTtl(300)).not.toThrow();
    expect(() => assertValidTtl(0.5)).not.toThrow();
  });

  it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])('rejects %s', (ttl) => {
    expect(() => assertValidTtl(ttl)).toThrow(RangeError);
  });
});
