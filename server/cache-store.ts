/**
 * Cache Store
 *
 * Key/value store with per-key TTL, atomic counters and deletion. Used by the
 * analytics cache, the refresh coordinator and the realtime counter reader.
 *
 * Contract: every operation is best-effort. Implementations never throw on a
 * backend fault; it is logged as CacheUnavailableError and degrades to a miss
 * (get), `false` (set/delete/expire/ping) or `0` (increments). TTLs are in
 * seconds and must be positive.
 */

import { LRUCache } from 'lru-cache';
import { CacheUnavailableError } from './analytics-errors';

export interface CacheStore {
  /** Backend name for logs and health output ('redis', 'memory'). */
  readonly name: string;
  get(key: string): Promise<string | null>;
  /** Resolves false when the write did not happen. */
  set(key: string, payload: string, ttlSeconds: number): Promise<boolean>;
  /** Resolves false when the backend could not be reached; deleting an absent key is true. */
  delete(key: string): Promise<boolean>;
  increment(key: string, amount?: number): Promise<number>;
  incrementFloat(key: string, amount: number): Promise<number>;
  expire(key: string, ttlSeconds: number): Promise<boolean>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export function assertValidTtl(ttlSeconds: number): void {
  if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
    throw new RangeError(`Cache TTL must be a positive number of seconds, got ${ttlSeconds}`);
  }
}

export function logCacheFault(operation: string, key: string, error: unknown): void {
  const fault = new CacheUnavailableError(operation, { cause: error });
  console.error(
    `[cache] ${fault.message} for key "${key}":`,
    error instanceof Error ? error.message : error
  );
}

// ============================================================================
// In-process store
// ============================================================================

/** Default capacity of the in-process store. */
const DEFAULT_MAX_ENTRIES = 5_000;

/**
 * Single-process store backed by lru-cache. Used when no REDIS_URL is
 * configured; entries are lost on restart and not shared between instances.
 */
export class MemoryCacheStore implements CacheStore {
  readonly name = 'memory';
  private readonly entries: LRUCache<string, string>;

  constructor(maxEntries: number = DEFAULT_MAX_ENTRIES) {
    this.entries = new LRUCache<string, string>({ max: maxEntries });
  }

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, payload: string, ttlSeconds: number): Promise<boolean> {
    assertValidTtl(ttlSeconds);
    this.entries.set(key, payload, { ttl: ttlSeconds * 1000 });
    return true;
  }

  async delete(key: string): Promise<boolean> {
    this.entries.delete(key);
    return true;
  }

  async increment(key: string, amount = 1): Promise<number> {
    return this.add(key, Math.trunc(amount), (current) => Math.trunc(current));
  }

  async incrementFloat(key: string, amount: number): Promise<number> {
    return this.add(key, amount, (current) => current);
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    assertValidTtl(ttlSeconds);
    const value = this.entries.get(key);
    if (value === undefined) return false;
    this.entries.set(key, value, { ttl: ttlSeconds * 1000 });
    return true;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  private add(key: string, amount: number, coerce: (current: number) => number): number {
    const raw = this.entries.get(key);
    const current = raw === undefined ? 0 : Number(raw);
    if (!Number.isFinite(current)) {
      logCacheFault('increment', key, new Error('value is not a number'));
      return 0;
    }
    const next = coerce(current) + amount;
    // noUpdateTTL keeps the expiry of an existing counter window
    this.entries.set(key, String(next), { noUpdateTTL: true });
    return next;
  }
}
