/**
 * Realtime counters
 *
 * Read-only view of counters that ingestion keeps in the cache store. They
 * are telemetry: an absent key or unreadable value reads as 0.
 */

import type { RealtimeMetrics } from '@shared/analytics-types';
import { ensureNumeric } from '@shared/utils/number-utils';
import type { CacheStore } from './cache-store';

export const REALTIME_COUNTER_KEYS = {
  active_users_now: 'active_users:now',
  orders_last_hour: 'orders:last_hour',
  revenue_last_hour: 'revenue:last_hour',
  events_per_second: 'events:per_second',
} as const satisfies Record<keyof RealtimeMetrics, string>;

/** Expiry of the hourly counter window, set on its first increment. */
export const COUNTER_WINDOW_SECONDS = 3600;

export class RealtimeCounters {
  private readonly windowsWithoutExpiry = new Set<string>();

  constructor(private readonly store: CacheStore) {}

  async read(): Promise<RealtimeMetrics> {
    const [activeUsers, orders, revenue, eventsPerSecond] = await Promise.all([
      this.readCounter('active_users_now'),
      this.readCounter('orders_last_hour'),
      this.readCounter('revenue_last_hour'),
      this.readCounter('events_per_second'),
    ]);
    return {
      active_users_now: Math.trunc(activeUsers),
      orders_last_hour: Math.trunc(orders),
      revenue_last_hour: revenue,
      events_per_second: eventsPerSecond,
    };
  }

  /** Count one completed order toward the hourly window. */
  async recordOrder(amount: number): Promise<void> {
    const ordersKey = REALTIME_COUNTER_KEYS.orders_last_hour;
    const revenueKey = REALTIME_COUNTER_KEYS.revenue_last_hour;
    const [orderCount, revenue] = await Promise.all([
      this.store.increment(ordersKey, 1),
      this.store.incrementFloat(revenueKey, amount),
    ]);
    // first increment opens the window
    await Promise.all([
      this.openWindow(ordersKey, orderCount === 1),
      this.openWindow(revenueKey, revenue === amount),
    ]);
  }

  /**
   * Sets the window expiry on a counter's first increment. A failed expire is
   * retried on each later increment until it sticks, so a counter never
   * outlives its window indefinitely.
   */
  private async openWindow(key: string, firstIncrement: boolean): Promise<void> {
    if (!firstIncrement && !this.windowsWithoutExpiry.has(key)) return;
    if (await this.store.expire(key, COUNTER_WINDOW_SECONDS)) {
      this.windowsWithoutExpiry.delete(key);
      return;
    }
    this.windowsWithoutExpiry.add(key);
    console.warn(`[cache] Counter window expiry not set for "${key}", retrying on next increment`);
  }

  private async readCounter(field: keyof RealtimeMetrics): Promise<number> {
    const key = REALTIME_COUNTER_KEYS[field];
    let raw: string | null = null;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      console.warn(`[cache] Counter read failed for "${key}":`, error instanceof Error ? error.message : error);
    }
    return ensureNumeric(field, raw, 0, { context: 'realtime-counter' });
  }
}
