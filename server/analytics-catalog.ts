/**
 * Analytics Query Catalog
 *
 * The closed set of analytical operations the API will run. Each entry binds
 * an operation name to its SQL template, parameter schema (from
 * ANALYTICS_PARAM_SCHEMAS), cache policy and statement timeout. Nothing
 * outside this table can reach the query executor.
 *
 * Entries are checked when the catalog is constructed: every template
 * placeholder must be a declared parameter, cache keys must name every
 * declared parameter exactly once, and TTLs and timeouts must be positive.
 */

import type { z } from 'zod';
import {
  ANALYTICS_OPERATION_NAMES,
  ANALYTICS_PARAM_SCHEMAS,
  isAnalyticsOperationName,
  type AnalyticsOperationName,
  type AnalyticsParams,
  type QueryRow,
} from '@shared/analytics-types';
import { CatalogDefinitionError, UnknownOperationError, ValidationError } from './analytics-errors';
import {
  ANOMALY_DETECTION_SQL,
  COHORT_RETENTION_SQL,
  DASHBOARD_METRICS_SQL,
  FUNNEL_STEPS_SQL,
  RFM_SCORES_SQL,
  ROLLING_REVENUE_SQL,
  TOP_PRODUCTS_SQL,
} from './analytics-queries';
import { shapeFunnelSteps, shapeRfmCustomers } from './analytics-transforms';
import { templateParameterNames } from './sql-template';

// ============================================================================
// Definitions
// ============================================================================

export interface CachePolicy<K extends AnalyticsOperationName> {
  /** Parameters rendered into the key, in order, after the operation name. */
  keyParams: readonly (keyof AnalyticsParams<K> & string)[];
  ttlSeconds: number;
}

export interface AnalyticsOperationDefinition<K extends AnalyticsOperationName> {
  description: string;
  sql: string;
  /** null: never cached, always computed fresh. */
  cache: CachePolicy<K> | null;
  /** Overrides the configured default statement timeout. */
  timeoutSeconds?: number;
  /** Reads materialized aggregates; cached results are invalidated on refresh. */
  dependsOnAggregates: boolean;
  shapeRows?: (rows: readonly QueryRow[]) => QueryRow[];
}

export type AnalyticsOperationDefinitions = {
  [K in AnalyticsOperationName]: AnalyticsOperationDefinition<K>;
};

export const ANALYTICS_OPERATIONS: AnalyticsOperationDefinitions = {
  dashboard_metrics: {
    description: 'Hourly event, user and revenue metrics with 24h rolling average',
    sql: DASHBOARD_METRICS_SQL,
    cache: { keyParams: ['hours'], ttlSeconds: 300 },
    dependsOnAggregates: true,
  },
  cohort_analysis: {
    description: 'Weekly acquisition cohorts with day-by-day retention',
    sql: COHORT_RETENTION_SQL,
    cache: { keyParams: ['weeks', 'source'], ttlSeconds: 600 },
    timeoutSeconds: 10,
    dependsOnAggregates: true,
  },
  funnel_analysis: {
    description: 'Conversion funnel from page view to purchase',
    sql: FUNNEL_STEPS_SQL,
    cache: { keyParams: ['days'], ttlSeconds: 300 },
    dependsOnAggregates: false,
    shapeRows: shapeFunnelSteps,
  },
  rolling_revenue: {
    description: 'Daily revenue with 7-day rolling average and growth',
    sql: ROLLING_REVENUE_SQL,
    cache: null,
    dependsOnAggregates: false,
  },
  rfm_analysis: {
    description: 'Customer recency/frequency/monetary scores and segments',
    sql: RFM_SCORES_SQL,
    cache: null,
    timeoutSeconds: 15,
    dependsOnAggregates: false,
    shapeRows: shapeRfmCustomers,
  },
  anomaly_detection: {
    description: 'Hourly event volume z-scores against the trailing 24 hours',
    sql: ANOMALY_DETECTION_SQL,
    cache: null,
    timeoutSeconds: 10,
    dependsOnAggregates: false,
  },
  top_products: {
    description: 'Top 20 products by completed-order revenue',
    sql: TOP_PRODUCTS_SQL,
    cache: { keyParams: ['days'], ttlSeconds: 600 },
    timeoutSeconds: 10,
    dependsOnAggregates: false,
  },
};

// ============================================================================
// Resolved operations
// ============================================================================

/** Validated parameters, with absent optional values as null. */
export type BoundParams = Readonly<Record<string, string | number | null>>;

export interface CatalogOperation {
  readonly name: AnalyticsOperationName;
  readonly description: string;
  readonly sql: string;
  readonly schema: z.AnyZodObject;
  readonly paramNames: readonly string[];
  readonly cache: { readonly keyParams: readonly string[]; readonly ttlSeconds: number } | null;
  readonly timeoutSeconds: number;
  readonly dependsOnAggregates: boolean;
  readonly shapeRows?: (rows: readonly QueryRow[]) => QueryRow[];
}

export interface AnalyticsCatalogOptions {
  /** Statement timeout for operations without their own override. */
  defaultTimeoutSeconds: number;
}

const ABSENT_KEY_VALUE = 'all';

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

export class AnalyticsCatalog {
  private readonly operations = new Map<AnalyticsOperationName, CatalogOperation>();

  constructor(
    options: AnalyticsCatalogOptions,
    definitions: AnalyticsOperationDefinitions = ANALYTICS_OPERATIONS
  ) {
    if (!isPositive(options.defaultTimeoutSeconds)) {
      throw new CatalogDefinitionError('*', 'default timeout must be positive');
    }
    for (const name of ANALYTICS_OPERATION_NAMES) {
      this.operations.set(name, compileOperation(name, definitions[name], options));
    }
  }

  /** Throws UnknownOperationError for any name outside the catalog. */
  resolve(name: string): CatalogOperation {
    const operation = isAnalyticsOperationName(name) ? this.operations.get(name) : undefined;
    if (!operation) throw new UnknownOperationError(name);
    return operation;
  }

  list(): CatalogOperation[] {
    return Array.from(this.operations.values());
  }

  /** Operations whose cached results go stale when aggregates are recomputed. */
  aggregateDependents(): CatalogOperation[] {
    return this.list().filter((operation) => operation.dependsOnAggregates);
  }

  /**
   * Validate raw parameters against the operation's schema, applying
   * defaults. Throws ValidationError listing every failing field.
   */
  parseParams(operation: CatalogOperation, raw: unknown): BoundParams {
    const result = operation.schema.safeParse(raw ?? {});
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`)
        .join('; ');
      throw new ValidationError(
        `Invalid parameters for ${operation.name}: ${detail}`,
        result.error.issues
      );
    }

    const data: Record<string, unknown> = result.data;
    const bound: Record<string, string | number | null> = {};
    for (const name of operation.paramNames) {
      const value = data[name];
      bound[name] = typeof value === 'string' || typeof value === 'number' ? value : null;
    }
    return bound;
  }

  /** Cache key for the operation's default parameters, or null when uncached. */
  defaultCacheKey(operation: CatalogOperation): string | null {
    return buildCacheKey(operation, this.parseParams(operation, {}));
  }
}

/**
 * `{operation}:{v1}:{v2}...` in key-parameter order. Absent values render as
 * "all"; strings are URI-encoded so a value can never introduce a separator.
 * Returns null for uncached operations.
 */
export function buildCacheKey(operation: CatalogOperation, params: BoundParams): string | null {
  if (!operation.cache) return null;
  const parts = operation.cache.keyParams.map((name) => formatKeyValue(params[name]));
  return [operation.name, ...parts].join(':');
}

function formatKeyValue(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return ABSENT_KEY_VALUE;
  if (typeof value === 'number') return String(value);
  const encoded = encodeURIComponent(value);
  // %61 decodes to "a"; keeps a literal "all" distinct from an absent value
  return encoded === ABSENT_KEY_VALUE ? `%61${encoded.slice(1)}` : encoded;
}

/** Any catalog entry, with its key parameters widened to plain strings. */
type UntypedDefinition = Omit<AnalyticsOperationDefinition<AnalyticsOperationName>, 'cache'> & {
  cache: { keyParams: readonly string[]; ttlSeconds: number } | null;
};

function compileOperation(
  name: AnalyticsOperationName,
  definition: UntypedDefinition,
  options: AnalyticsCatalogOptions
): CatalogOperation {
  const schema: z.AnyZodObject = ANALYTICS_PARAM_SCHEMAS[name];
  const paramNames = Object.keys(schema.shape);
  const declared = new Set(paramNames);

  for (const placeholder of templateParameterNames(definition.sql)) {
    if (!declared.has(placeholder)) {
      throw new CatalogDefinitionError(
        name,
        `SQL placeholder :${placeholder} is not a declared parameter`
      );
    }
  }

  let cache: CatalogOperation['cache'] = null;
  if (definition.cache) {
    const { keyParams } = definition.cache;
    const unique = new Set(keyParams);
    const missing = paramNames.filter((param) => !unique.has(param));
    if (unique.size !== keyParams.length || unique.size !== declared.size || missing.length > 0) {
      throw new CatalogDefinitionError(
        name,
        `cache key must name each parameter exactly once (missing: ${missing.join(', ') || 'none'})`
      );
    }
    if (!isPositive(definition.cache.ttlSeconds)) {
      throw new CatalogDefinitionError(name, 'cache TTL must be positive');
    }
    cache = { keyParams, ttlSeconds: definition.cache.ttlSeconds };
  }

  const timeoutSeconds = definition.timeoutSeconds ?? options.defaultTimeoutSeconds;
  if (!isPositive(timeoutSeconds)) {
    throw new CatalogDefinitionError(name, 'timeout must be positive');
  }

  return {
    name,
    description: definition.description,
    sql: definition.sql,
    schema,
    paramNames,
    cache,
    timeoutSeconds,
    dependsOnAggregates: definition.dependsOnAggregates,
    shapeRows: definition.shapeRows,
  };
}
