/**
 * Cache-Aside Orchestrator
 *
 * Serves catalog operations through the cache store:
 *
 *   resolve operation -> validate params -> derive key
 *     -> hit:  decode and return (the executor is not called)
 *     -> miss: execute under the operation's timeout, shape rows,
 *              store with the operation's TTL, return
 *
 * Operations without a cache policy always execute. Cache faults are absorbed
 * here (a failed read is a miss, a failed write is logged and the fresh rows
 * are still returned). Validation, unknown-operation and query errors
 * propagate to the caller.
 *
 * Concurrent misses on one key share a single computation. Keys written for
 * aggregate-dependent operations are tracked so a refresh can invalidate every
 * variant, not only the default one.
 */

import type { AnalyticsOperationName, AnalyticsRequest, QueryRow } from '@shared/analytics-types';
import { buildCacheKey, type AnalyticsCatalog, type BoundParams, type CatalogOperation } from './analytics-catalog';
import { logCacheFault, type CacheStore } from './cache-store';
import type { QueryExecutor } from './query-executor';
import { deserializeResult, serializeResult } from './result-codec';

export interface AnalyticsResult {
  operation: AnalyticsOperationName;
  /** null for operations that are never cached */
  cacheKey: string | null;
  cached: boolean;
  executionTimeMs: number;
  rows: QueryRow[];
}

export interface AnalyticsCacheStats {
  hits: number;
  misses: number;
  uncached: number;
  /** Misses that joined a computation already in flight for the same key. */
  sharedComputations: number;
  cacheWriteFailures: number;
  hitRate: number | null;
  trackedKeys: number;
}

export interface InvalidationResult {
  invalidatedKeys: string[];
  failedKeys: string[];
}

export interface AnalyticsCacheOptions {
  /** Deduplicate concurrent misses per key (default true). */
  singleFlight?: boolean;
}

interface InFlight {
  epoch: number;
  rows: Promise<QueryRow[]>;
}

export class AnalyticsCache {
  private readonly singleFlight: boolean;
  private readonly inFlight = new Map<string, InFlight>();
  private readonly trackedKeys = new Set<string>();
  /** Bumped by every invalidation; computations started earlier do not write back dependent keys. */
  private epoch = 0;
  private counters = { hits: 0, misses: 0, uncached: 0, sharedComputations: 0, cacheWriteFailures: 0 };

  constructor(
    private readonly catalog: AnalyticsCatalog,
    private readonly store: CacheStore,
    private readonly executor: QueryExecutor,
    options: AnalyticsCacheOptions = {}
  ) {
    this.singleFlight = options.singleFlight ?? true;
  }

  async getOrCompute(operationName: string, params?: unknown): Promise<QueryRow[]> {
    const result = await this.execute(operationName, params);
    return result.rows;
  }

  /** Typed entry point: the operation name selects the parameter shape. */
  async query(request: AnalyticsRequest): Promise<QueryRow[]> {
    return this.getOrCompute(request.operation, request.params);
  }

  async execute(operationName: string, rawParams?: unknown): Promise<AnalyticsResult> {
    const operation = this.catalog.resolve(operationName);
    const params = this.catalog.parseParams(operation, rawParams);
    const cacheKey = buildCacheKey(operation, params);
    const startTime = Date.now();

    const finish = (rows: QueryRow[], cached: boolean): AnalyticsResult => ({
      operation: operation.name,
      cacheKey,
      cached,
      executionTimeMs: Date.now() - startTime,
      rows,
    });

    const policy = operation.cache;
    if (policy === null || cacheKey === null) {
      this.counters.uncached++;
      return finish(await this.compute(operation, params), false);
    }

    const cachedRows = await this.readCache(cacheKey);
    if (cachedRows) {
      this.counters.hits++;
      return finish(cachedRows, true);
    }

    this.counters.misses++;
    const rows = await this.computeOnce(cacheKey, async (epoch) => {
      const fresh = await this.compute(operation, params);
      await this.writeCache(operation, cacheKey, fresh, policy.ttlSeconds, epoch);
      return fresh;
    });
    return finish(rows, false);
  }

  /**
   * Delete every cache key derived from the materialized aggregates: the
   * default-parameter key of each dependent operation plus every variant this
   * process has written. Keys whose delete fails stay tracked for the next
   * attempt.
   */
  async invalidateAggregateDependents(): Promise<InvalidationResult> {
    const keys = new Set<string>();
    for (const operation of this.catalog.aggregateDependents()) {
      const key = this.catalog.defaultCacheKey(operation);
      if (key) keys.add(key);
    }
    for (const key of this.trackedKeys) keys.add(key);
    this.epoch++;

    const outcomes = await Promise.all(
      Array.from(keys, async (key) => ({ key, deleted: await this.deleteKey(key) }))
    );

    const result: InvalidationResult = { invalidatedKeys: [], failedKeys: [] };
    for (const { key, deleted } of outcomes) {
      if (deleted) {
        this.trackedKeys.delete(key);
        result.invalidatedKeys.push(key);
      } else {
        result.failedKeys.push(key);
      }
    }
    return result;
  }

  getStats(): AnalyticsCacheStats {
    const { hits, misses } = this.counters;
    const lookups = hits + misses;
    return {
      ...this.counters,
      hitRate: lookups === 0 ? null : hits / lookups,
      trackedKeys: this.trackedKeys.size,
    };
  }

  // --------------------------------------------------------------------------

  private async compute(operation: CatalogOperation, params: BoundParams): Promise<QueryRow[]> {
    const rows = await this.executor.execute(operation.sql, params, operation.timeoutSeconds);
    return operation.shapeRows ? operation.shapeRows(rows) : rows;
  }

  private computeOnce(
    key: string,
    run: (epoch: number) => Promise<QueryRow[]>
  ): Promise<QueryRow[]> {
    if (!this.singleFlight) return run(this.epoch);

    const existing = this.inFlight.get(key);
    if (existing && existing.epoch === this.epoch) {
      this.counters.sharedComputations++;
      return existing.rows;
    }

    const entry: InFlight = { epoch: this.epoch, rows: run(this.epoch) };
    this.inFlight.set(key, entry);
    const release = () => {
      if (this.inFlight.get(key) === entry) this.inFlight.delete(key);
    };
    entry.rows.then(release, release);
    return entry.rows;
  }

  private async readCache(key: string): Promise<QueryRow[] | null> {
    let payload: string | null;
    try {
      payload = await this.store.get(key);
    } catch (error) {
      logCacheFault('get', key, error);
      return null;
    }
    if (payload === null) return null;

    const rows = deserializeResult(payload);
    if (rows === null) {
      console.warn(`[analytics] Ignoring undecodable cache entry "${key}"`);
    }
    return rows;
  }

  private async writeCache(
    operation: CatalogOperation,
    key: string,
    rows: QueryRow[],
    ttlSeconds: number,
    epoch: number
  ): Promise<void> {
    // an invalidation ran while this computation was in flight
    if (operation.dependsOnAggregates && epoch !== this.epoch) return;

    let written = false;
    try {
      written = await this.store.set(key, serializeResult(rows), ttlSeconds);
    } catch (error) {
      logCacheFault('set', key, error);
    }

    if (!written) {
      this.counters.cacheWriteFailures++;
      return;
    }
    if (!operation.dependsOnAggregates) return;
    if (epoch === this.epoch) {
      this.trackedKeys.add(key);
      return;
    }
    // invalidated during the write: the entry predates the refresh
    if (!(await this.deleteKey(key))) this.trackedKeys.add(key);
  }

  private async deleteKey(key: string): Promise<boolean> {
    try {
      return await this.store.delete(key);
    } catch (error) {
      logCacheFault('delete', key, error);
      return false;
    }
  }
}
