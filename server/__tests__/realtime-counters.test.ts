import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { COUNTER_WINDOW_SECONDS, REALTIME_COUNTER_KEYS, RealtimeCounters } from '../realtime-counters';
import { FakeCacheStore } from './analytics-fakes';

function seed(store: FakeCacheStore, key: string, value: string): void {
  store.entries.set(key, { payload: value, expiresAt: Number.POSITIVE_INFINITY });
}

describe('RealtimeCounters', () => {
  let store: FakeCacheStore;
  let counters: RealtimeCounters;

  beforeEach(() => {
    store = new FakeCacheStore();
    counters = new RealtimeCounters(store);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('read', () => {
    it('reads absent counters as zero', async () => {
      expect(await counters.read()).toEqual({
        active_users_now: 0,
        orders_last_hour: 0,
        revenue_last_hour: 0,
        events_per_second: 0,
      });
    });

    it('truncates the count fields', async () => {
      seed(store, REALTIME_COUNTER_KEYS.active_users_now, '12.7');
      seed(store, REALTIME_COUNTER_KEYS.orders_last_hour, '4');
      seed(store, REALTIME_COUNTER_KEYS.revenue_last_hour, '310.5');
      seed(store, REALTIME_COUNTER_KEYS.events_per_second, '3.25');

      expect(await counters.read()).toEqual({
        active_users_now: 12,
        orders_last_hour: 4,
        revenue_last_hour: 310.5,
        events_per_second: 3.25,
      });
    });

    it('reads a non-numeric counter as zero and warns', async () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      seed(store, REALTIME_COUNTER_KEYS.orders_last_hour, 'abc');

      expect((await counters.read()).orders_last_hour).toBe(0);
      expect(warnSpy).toHaveBeenCalledWith(
        "[DataTransform] Invalid numeric value for 'orders_last_hour' in realtime-counter: abc, using fallback 0"
      );
    });

    it('reads zeros when the store is unreachable', async () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      store.failing.get = true;

      expect((await counters.read()).revenue_last_hour).toBe(0);
      expect(warnSpy).toHaveBeenCalledWith(
        '[cache] Counter read failed for "revenue:last_hour":',
        'store unreachable'
      );
    });
  });

  describe('recordOrder', () => {
    it('opens an hourly window on the first order', async () => {
      const expireSpy = vi.spyOn(store, 'expire');

      await counters.recordOrder(25.5);
      await counters.recordOrder(10);

      expect(await counters.read()).toMatchObject({ orders_last_hour: 2, revenue_last_hour: 35.5 });
      expect(expireSpy.mock.calls).toEqual([
        ['orders:last_hour', COUNTER_WINDOW_SECONDS],
        ['revenue:last_hour', COUNTER_WINDOW_SECONDS],
      ]);
    });

    it('retries a window expiry that failed until it is set', async () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const expireSpy = vi.spyOn(store, 'expire').mockResolvedValueOnce(false);

      await counters.recordOrder(25.5);

      expect(warnSpy).toHaveBeenCalledWith(
        '[cache] Counter window expiry not set for "orders:last_hour", retrying on next increment'
      );
      expect(store.entries.get('orders:last_hour')?.expiresAt).toBe(Number.POSITIVE_INFINITY);

      await counters.recordOrder(10);
      await counters.recordOrder(5);

      expect(expireSpy.mock.calls).toEqual([
        ['orders:last_hour', COUNTER_WINDOW_SECONDS],
        ['revenue:last_hour', COUNTER_WINDOW_SECONDS],
        ['orders:last_hour', COUNTER_WINDOW_SECONDS],
      ]);
      store.advance(COUNTER_WINDOW_SECONDS + 1);
      expect(await counters.read()).toMatchObject({ orders_last_hour: 0, revenue_last_hour: 0 });
    });

    it('starts a new window once the previous one has expired', async () => {
      await counters.recordOrder(25.5);
      store.advance(COUNTER_WINDOW_SECONDS + 1);

      expect((await counters.read()).orders_last_hour).toBe(0);

      await counters.recordOrder(8);
      expect(await counters.read()).toMatchObject({ orders_last_hour: 1, revenue_last_hour: 8 });
    });
  });
});
