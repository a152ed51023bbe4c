/**
 * Analytics Serving Types
 *
 * Shared request/response contracts for the analytics dashboard API.
 * The parameter schemas are the single source of truth for operation names
 * and parameter bounds: both the server catalog and the HTTP routes derive
 * from ANALYTICS_PARAM_SCHEMAS.
 */

import { z } from 'zod';

// ============================================================================
// Parameter schemas (one per analytical operation)
// ============================================================================

const boundedInt = (min: number, max: number, fallback: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

export const ANALYTICS_PARAM_SCHEMAS = {
  dashboard_metrics: z.object({
    hours: boundedInt(1, 168, 24),
  }),
  cohort_analysis: z.object({
    weeks: boundedInt(1, 52, 12),
    source: z.string().trim().min(1).max(100).optional(),
  }),
  funnel_analysis: z.object({
    days: boundedInt(1, 30, 7),
  }),
  rolling_revenue: z.object({
    days: boundedInt(7, 365, 30),
  }),
  rfm_analysis: z.object({
    limit: boundedInt(10, 10_000, 1000),
  }),
  anomaly_detection: z.object({
    days: boundedInt(1, 30, 7),
  }),
  top_products: z.object({
    days: boundedInt(1, 90, 30),
  }),
} satisfies Record<string, z.AnyZodObject>;

export type AnalyticsOperationName = keyof typeof ANALYTICS_PARAM_SCHEMAS;

/** Validated parameters (defaults applied) for an operation. */
export type AnalyticsParams<K extends AnalyticsOperationName> = z.output<
  (typeof ANALYTICS_PARAM_SCHEMAS)[K]
>;

/** Parameters as a caller may supply them (every field optional where defaulted). */
export type AnalyticsParamsInput<K extends AnalyticsOperationName> = z.input<
  (typeof ANALYTICS_PARAM_SCHEMAS)[K]
>;

/** One variant per operation, each carrying its own parameter shape. */
export type AnalyticsRequest = {
  [K in AnalyticsOperationName]: { operation: K; params?: AnalyticsParamsInput<K> };
}[AnalyticsOperationName];

export function isAnalyticsOperationName(name: string): name is AnalyticsOperationName {
  return Object.prototype.hasOwnProperty.call(ANALYTICS_PARAM_SCHEMAS, name);
}

export const ANALYTICS_OPERATION_NAMES: readonly AnalyticsOperationName[] = Object.keys(
  ANALYTICS_PARAM_SCHEMAS
).filter(isAnalyticsOperationName);

// ============================================================================
// Result rows
// ============================================================================

/**
 * A single result row as served to clients. Values are already in their
 * JSON form: timestamps are ISO-8601 strings, NUMERIC and BIGINT columns are
 * decimal strings.
 */
export type QueryRow = Record<string, unknown>;

export type DashboardMetricRow = {
  hour: string;
  event_type: string;
  event_count: number;
  unique_users: number;
  revenue: string;
  order_count: number;
  avg_order_value: number;
  rolling_24h_avg: number | null;
  prev_day_same_hour: number | null;
};

export type CohortRetentionRow = {
  cohort_date: string;
  /** 'unknown' when the user has no recorded source */
  acquisition_source: string;
  day_diff: number;
  active_users: number;
  retention_pct: string | null;
};

export type FunnelStepRow = {
  step_number: number;
  step_name: string;
  total_entries: number;
  progressed: number;
  avg_time_minutes: number | null;
  drop_off_pct: number | null;
  /** null for the first step and whenever the prior step had no entries */
  step_conversion_pct: number | null;
};

export type RevenueDayRow = {
  date: string;
  revenue: string;
  orders: number;
  unique_customers: number;
  rolling_7d_avg: string | null;
  daily_growth_pct: string | null;
  cumulative_revenue: string;
};

export type RfmSegment =
  | 'Champions'
  | 'Loyal Customers'
  | 'New Customers'
  | 'At Risk'
  | 'Cannot Lose Them'
  | 'Others';

export type RfmCustomerRow = {
  user_id: string;
  recency_days: number;
  frequency: number;
  monetary_value: string;
  r_score: number;
  f_score: number;
  m_score: number;
  rfm_total: number;
  segment: RfmSegment;
};

export type AnomalyRow = {
  hour: string;
  event_count: number;
  avg_24h: number | null;
  stddev: number | null;
  z_score: number | null;
};

export type TopProductRow = {
  product_id: string | null;
  times_purchased: number;
  total_revenue: string;
};

// ============================================================================
// Realtime counters & notifications
// ============================================================================

export interface RealtimeMetrics {
  active_users_now: number;
  orders_last_hour: number;
  revenue_last_hour: number;
  events_per_second: number;
}

export interface CustomQueryResponse {
  query_type: AnalyticsOperationName;
  execution_time_ms: number;
  rows_count: number;
  cached: boolean;
  data: QueryRow[];
}

export type RefreshTrigger = 'scheduled' | 'manual';

export interface RefreshOutcome {
  status: 'success' | 'failed';
  trigger: RefreshTrigger;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  invalidatedKeys: string[];
  error?: string;
}

/** Envelope pushed to every connected dashboard over /ws. */
export interface ChangeNotification {
  type: 'DATA_REFRESHED';
  data: { trigger: RefreshTrigger; invalidatedKeys: string[] };
  timestamp: string;
}
