/**
 * Redis-backed Cache Store (ioredis)
 *
 * The client is created with the offline queue disabled and a single retry
 * per request, so a Redis outage turns into immediate failed commands (logged,
 * degraded per the CacheStore contract) instead of requests hanging while
 * ioredis reconnects.
 */

import Redis, { type RedisOptions } from 'ioredis';
import { assertValidTtl, logCacheFault, type CacheStore } from './cache-store';

/**
 * The ioredis commands this store uses. Declared structurally so an existing
 * client (or ioredis-mock in tests) can be injected.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', ttlMs: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  incrby(key: string, amount: number): Promise<number>;
  incrbyfloat(key: string, amount: number): Promise<string>;
  pexpire(key: string, ttlMs: number): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

export function createRedisClient(url: string, options: RedisOptions = {}): Redis {
  const client = new Redis(url, {
    lazyConnect: false,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    connectTimeout: 5_000,
    ...options,
  });

  let lastStatus: 'ready' | 'error' | null = null;
  client.on('ready', () => {
    if (lastStatus !== 'ready') console.log('[cache] Redis connection ready');
    lastStatus = 'ready';
  });
  client.on('error', (error: Error) => {
    // ioredis emits on every reconnect attempt; log transitions only
    if (lastStatus !== 'error') console.error('[cache] Redis connection error:', error.message);
    lastStatus = 'error';
  });

  return client;
}

export class RedisCacheStore implements CacheStore {
  readonly name = 'redis';

  constructor(private readonly redis: RedisCommands) {}

  async get(key: string): Promise<string | null> {
    try {
      return await this.redis.get(key);
    } catch (error) {
      logCacheFault('get', key, error);
      return null;
    }
  }

  async set(key: string, payload: string, ttlSeconds: number): Promise<boolean> {
    assertValidTtl(ttlSeconds);
    try {
      await this.redis.set(key, payload, 'PX', toTtlMs(ttlSeconds));
      return true;
    } catch (error) {
      logCacheFault('set', key, error);
      return false;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      await this.redis.del(key);
      return true;
    } catch (error) {
      logCacheFault('delete', key, error);
      return false;
    }
  }

  async increment(key: string, amount = 1): Promise<number> {
    try {
      return await this.redis.incrby(key, Math.trunc(amount));
    } catch (error) {
      logCacheFault('increment', key, error);
      return 0;
    }
  }

  async incrementFloat(key: string, amount: number): Promise<number> {
    try {
      return Number(await this.redis.incrbyfloat(key, amount));
    } catch (error) {
      logCacheFault('increment', key, error);
      return 0;
    }
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    assertValidTtl(ttlSeconds);
    try {
      return (await this.redis.pexpire(key, toTtlMs(ttlSeconds))) === 1;
    } catch (error) {
      logCacheFault('expire', key, error);
      return false;
    }
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch (error) {
      logCacheFault('ping', '*', error);
      return false;
    }
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      logCacheFault('close', '*', error);
    }
  }
}

function toTtlMs(ttlSeconds: number): number {
  return Math.max(1, Math.round(ttlSeconds * 1000));
}
