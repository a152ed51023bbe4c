/**
 * Refresh Coordinator
 *
 * Owns the background loop that recomputes the materialized aggregates and
 * invalidates the cache entries derived from them.
 *
 *   idle --(timer fires | refreshNow)--> refreshing --(success | failed)--> idle
 *
 * A cycle (1) runs refresh_dashboard_views(), (2) deletes every
 * aggregate-dependent cache key, and (3) broadcasts DATA_REFRESHED. If step 1
 * or 2 fails the outcome is `failed`, nothing is broadcast and cached entries
 * age out through their TTL; the next tick is scheduled either way.
 *
 * The timer is a setTimeout chain (the next wait starts when a cycle ends), so
 * cycles never overlap. A manual trigger while a cycle is running joins it.
 */

import type { ChangeNotification, RefreshOutcome, RefreshTrigger } from '@shared/analytics-types';
import { RefreshFailedError, describeError } from './analytics-errors';
import type { InvalidationResult } from './analytics-cache';
import type { AggregateRefresher } from './query-executor';

export interface DependentKeyInvalidator {
  invalidateAggregateDependents(): Promise<InvalidationResult>;
}

export interface ChangeBroadcaster {
  broadcast(message: ChangeNotification): Promise<unknown>;
}

export interface RefreshCoordinatorOptions {
  intervalSeconds: number;
}

export type RefreshState = 'idle' | 'refreshing';

export interface RefreshStatus {
  state: RefreshState;
  /** True between start() and stop(). */
  scheduled: boolean;
  nextRunAt: string | null;
  lastOutcome: RefreshOutcome | null;
}

export class RefreshCoordinator {
  private readonly intervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private started = false;
  private nextRunAt: Date | null = null;
  private inFlight: Promise<RefreshOutcome> | null = null;
  private lastOutcome: RefreshOutcome | null = null;

  constructor(
    private readonly refresher: AggregateRefresher,
    private readonly invalidator: DependentKeyInvalidator,
    private readonly notifier: ChangeBroadcaster,
    options: RefreshCoordinatorOptions
  ) {
    if (!Number.isFinite(options.intervalSeconds) || options.intervalSeconds <= 0) {
      throw new RangeError(`Refresh interval must be positive, got ${options.intervalSeconds}`);
    }
    this.intervalMs = options.intervalSeconds * 1000;
  }

  /** Schedule the first cycle one interval from now. Idempotent. */
  start(): void {
    if (this.started) return;
    this.started = true;
    console.log(`[refresh] Aggregate refresh every ${this.intervalMs / 1000}s`);
    this.scheduleNext();
  }

  /** Cancel the timer and wait for a running cycle to finish. */
  async stop(): Promise<void> {
    this.started = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRunAt = null;
    if (this.inFlight) await this.inFlight;
  }

  /**
   * Run a cycle now, or join the one already running. Never rejects; the
   * outcome reports failure.
   */
  refreshNow(trigger: RefreshTrigger = 'manual'): Promise<RefreshOutcome> {
    if (this.inFlight) return this.inFlight;

    const cycle = this.runCycle(trigger);
    this.inFlight = cycle;
    const clear = () => {
      this.inFlight = null;
    };
    cycle.then(clear, clear);
    return cycle;
  }

  getStatus(): RefreshStatus {
    return {
      state: this.inFlight ? 'refreshing' : 'idle',
      scheduled: this.started,
      nextRunAt: this.nextRunAt ? this.nextRunAt.toISOString() : null,
      lastOutcome: this.lastOutcome,
    };
  }

  private scheduleNext(): void {
    if (!this.started || this.timer) return;
    this.nextRunAt = new Date(Date.now() + this.intervalMs);
    this.timer = setTimeout(() => {
      this.timer = null;
      const next = () => this.scheduleNext();
      this.refreshNow('scheduled').then(next, next);
    }, this.intervalMs);
    this.timer.unref();
  }

  private async runCycle(trigger: RefreshTrigger): Promise<RefreshOutcome> {
    const startedAt = new Date();
    let invalidatedKeys: string[] = [];
    let failure: RefreshFailedError | null = null;

    try {
      await this.refresher.refreshAggregates();

      const invalidation = await this.invalidator.invalidateAggregateDependents();
      invalidatedKeys = invalidation.invalidatedKeys;
      if (invalidation.failedKeys.length > 0) {
        throw new RefreshFailedError(
          `Could not invalidate cache keys: ${invalidation.failedKeys.join(', ')}`
        );
      }

      await this.notifier.broadcast({
        type: 'DATA_REFRESHED',
        data: { trigger, invalidatedKeys },
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      failure =
        error instanceof RefreshFailedError
          ? error
          : new RefreshFailedError('Aggregate refresh failed', { cause: error });
      console.error(`[refresh] ${trigger} refresh failed: ${describeError(failure)}`);
    }

    const finishedAt = new Date();
    const outcome: RefreshOutcome = {
      status: failure ? 'failed' : 'success',
      trigger,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      invalidatedKeys,
    };
    if (failure) {
      outcome.error = describeError(failure);
    } else {
      console.log(
        `[refresh] ${trigger} refresh completed in ${outcome.durationMs}ms, invalidated ${invalidatedKeys.length} key(s)`
      );
    }

    this.lastOutcome = outcome;
    return outcome;
  }
}
