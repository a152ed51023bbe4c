/**
 * Query Executor
 *
 * Runs catalog SQL templates against PostgreSQL under a per-call statement
 * timeout. Every execution gets its own transaction so `SET LOCAL
 * statement_timeout` is scoped to that one statement's connection; drizzle's
 * transaction wrapper checks the connection out of the pool and releases it
 * on every exit path, including errors.
 *
 * Rows are returned in JSON form (see toJsonRows) so that a freshly computed
 * result and one reconstructed from the cache are indistinguishable.
 */

import { sql, type SQL } from 'drizzle-orm';
import type { QueryRow } from '@shared/analytics-types';
import { QueryTimeoutError } from './analytics-errors';
import { bindSqlTemplate } from './sql-template';
import { toJsonRows } from './result-codec';

/** PostgreSQL SQLSTATE for a statement cancelled by statement_timeout. */
const QUERY_CANCELED = '57014';

export interface QueryExecutor {
  execute(
    template: string,
    params: Readonly<Record<string, unknown>>,
    timeoutSeconds: number
  ): Promise<QueryRow[]>;
}

/** Recomputes the store's materialized aggregates. */
export interface AggregateRefresher {
  refreshAggregates(): Promise<void>;
}

/**
 * The slice of a drizzle node-postgres database this module needs. Declared
 * structurally so tests can supply an in-process stand-in.
 */
export interface SqlRunner {
  execute(query: SQL): PromiseLike<{ rows: Record<string, unknown>[] }>;
}

export interface TransactionalDatabase extends SqlRunner {
  transaction<T>(run: (tx: SqlRunner) => Promise<T>): Promise<T>;
}

export interface PgQueryExecutorOptions {
  /** Statement timeout for refresh_dashboard_views(). */
  refreshTimeoutSeconds: number;
}

export class PgQueryExecutor implements QueryExecutor, AggregateRefresher {
  constructor(
    private readonly db: TransactionalDatabase,
    private readonly options: PgQueryExecutorOptions
  ) {}

  async execute(
    template: string,
    params: Readonly<Record<string, unknown>>,
    timeoutSeconds: number
  ): Promise<QueryRow[]> {
    const query = bindSqlTemplate(template, params);
    const rows = await this.runWithTimeout(query, timeoutSeconds);
    return toJsonRows(rows);
  }

  async refreshAggregates(): Promise<void> {
    await this.runWithTimeout(
      sql`SELECT refresh_dashboard_views()`,
      this.options.refreshTimeoutSeconds
    );
  }

  /**
   * Run a diagnostic statement (EXPLAIN output) under the same timeout rules.
   * The statement text comes from a fixed allowlist, never from a caller.
   */
  async explain(statement: string, timeoutSeconds: number): Promise<unknown> {
    const rows = await this.runWithTimeout(
      sql.raw(`EXPLAIN (ANALYZE, BUFFERS, FORMAT JSON) ${statement}`),
      timeoutSeconds
    );
    const first = rows[0];
    return first ? first['QUERY PLAN'] : null;
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.execute(sql`SELECT 1`);
      return true;
    } catch (error) {
      console.error('[db] Health check failed:', error);
      return false;
    }
  }

  private async runWithTimeout(
    query: SQL,
    timeoutSeconds: number
  ): Promise<Record<string, unknown>[]> {
    const timeoutMs = toTimeoutMs(timeoutSeconds);
    try {
      return await this.db.transaction(async (tx) => {
        // SET does not accept bind parameters; timeoutMs is a validated integer.
        await tx.execute(sql.raw(`SET LOCAL statement_timeout = ${timeoutMs}`));
        const result = await tx.execute(query);
        return result.rows;
      });
    } catch (error) {
      if (isStatementTimeout(error)) {
        throw new QueryTimeoutError(timeoutSeconds, { cause: error });
      }
      throw error;
    }
  }
}

function toTimeoutMs(timeoutSeconds: number): number {
  if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
    throw new RangeError(`Query timeout must be a positive number of seconds, got ${timeoutSeconds}`);
  }
  return Math.max(1, Math.round(timeoutSeconds * 1000));
}

/** Matches the pg error directly or wrapped once (drizzle wraps driver errors as `cause`). */
export function isStatementTimeout(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ('code' in error && error.code === QUERY_CANCELED) return true;
  return error.cause instanceof Error && 'code' in error.cause && error.cause.code === QUERY_CANCELED;
}
