/**
 * SQL templates for the analytics catalog.
 *
 * Placeholders use `:name` syntax and are bound as parameters by
 * sql-template.ts; nothing here is ever concatenated with caller input.
 *
 * Hourly metrics and cohort retention read the materialized views that
 * refresh_dashboard_views() rebuilds; everything else reads the raw tables.
 */

export const DASHBOARD_METRICS_SQL = `
  SELECT
    hour,
    event_type,
    event_count,
    unique_users,
    revenue,
    order_count,
    avg_order_value,
    rolling_24h_avg,
    prev_day_same_hour
  FROM mv_hourly_metrics
  WHERE hour >= NOW() - (INTERVAL '1 hour' * :hours)
  ORDER BY hour DESC, event_type
`;

export const COHORT_RETENTION_SQL = `
  SELECT
    cohort_date,
    acquisition_source,
    day_diff,
    active_users,
    retention_pct
  FROM mv_cohort_retention
  WHERE cohort_date >= NOW() - (INTERVAL '1 week' * :weeks)
    AND (:source::text IS NULL OR acquisition_source = :source)
  ORDER BY cohort_date DESC, acquisition_source, day_diff
`;

/**
 * Per-step entry and progression counts. Step names, drop-off and
 * step-over-step conversion are derived in code (see shapeFunnelSteps) so
 * that steps with no events still appear.
 */
export const FUNNEL_STEPS_SQL = `
  WITH user_funnel AS (
    SELECT
      session_id,
      created_at AS event_time,
      CASE event_type
        WHEN 'page_view' THEN 1
        WHEN 'add_to_cart' THEN 2
        WHEN 'checkout_start' THEN 3
        WHEN 'purchase_complete' THEN 4
      END AS step_number,
      LEAD(event_type) OVER (PARTITION BY session_id ORDER BY created_at) AS next_step,
      LEAD(created_at) OVER (PARTITION BY session_id ORDER BY created_at) AS next_step_time
    FROM events
    WHERE created_at >= NOW() - (INTERVAL '1 day' * :days)
      AND event_type IN ('page_view', 'add_to_cart', 'checkout_start', 'purchase_complete')
  )
  SELECT
    step_number,
    COUNT(*)::int AS total_entries,
    COUNT(next_step)::int AS progressed,
    AVG(EXTRACT(EPOCH FROM (next_step_time - event_time)) / 60)::float AS avg_time_minutes
  FROM user_funnel
  GROUP BY step_number
  ORDER BY step_number
`;

export const ROLLING_REVENUE_SQL = `
  WITH daily_revenue AS (
    SELECT
      DATE_TRUNC('day', created_at) AS date,
      SUM(amount) AS revenue,
      COUNT(*)::int AS orders,
      COUNT(DISTINCT user_id)::int AS unique_customers
    FROM orders
    WHERE status = 'completed'
      AND created_at >= CURRENT_DATE - (INTERVAL '1 day' * :days)
    GROUP BY 1
  )
  SELECT
    date,
    revenue,
    orders,
    unique_customers,
    ROUND(AVG(revenue) OVER (ORDER BY date ROWS BETWEEN 6 PRECEDING AND CURRENT ROW), 2)
      AS rolling_7d_avg,
    ROUND(
      100.0 * (revenue - LAG(revenue, 1) OVER (ORDER BY date))
        / NULLIF(LAG(revenue, 1) OVER (ORDER BY date), 0),
      2
    ) AS daily_growth_pct,
    SUM(revenue) OVER (ORDER BY date) AS cumulative_revenue
  FROM daily_revenue
  ORDER BY date DESC
`;

/**
 * Recency/frequency/monetary quintiles via NTILE(5). The segment label is
 * assigned in code by assignRfmSegment().
 */
export const RFM_SCORES_SQL = `
  WITH customer_stats AS (
    SELECT
      user_id,
      COUNT(*)::int AS frequency,
      SUM(amount) AS monetary,
      (CURRENT_DATE - MAX(created_at)::date) AS recency_days
    FROM orders
    WHERE status = 'completed'
      AND user_id IS NOT NULL
      AND created_at >= CURRENT_DATE - INTERVAL '1 year'
    GROUP BY user_id
  ),
  rfm_scores AS (
    SELECT
      user_id,
      recency_days,
      frequency,
      monetary,
      NTILE(5) OVER (ORDER BY recency_days DESC) AS r_score,
      NTILE(5) OVER (ORDER BY frequency ASC) AS f_score,
      NTILE(5) OVER (ORDER BY monetary ASC) AS m_score
    FROM customer_stats
  )
  SELECT
    user_id,
    recency_days,
    frequency,
    ROUND(monetary, 2) AS monetary_value,
    r_score,
    f_score,
    m_score
  FROM rfm_scores
  ORDER BY (r_score + f_score + m_score) DESC, user_id
  LIMIT :limit
`;

export const ANOMALY_DETECTION_SQL = `
  WITH hourly_stats AS (
    SELECT
      DATE_TRUNC('hour', created_at) AS hour,
      COUNT(*)::int AS event_count
    FROM events
    WHERE created_at >= NOW() - (INTERVAL '1 day' * :days)
    GROUP BY 1
  )
  SELECT
    hour,
    event_count,
    (AVG(event_count) OVER trailing)::float AS avg_24h,
    (STDDEV(event_count) OVER trailing)::float AS stddev,
    ((event_count - AVG(event_count) OVER trailing)
      / NULLIF(STDDEV(event_count) OVER trailing, 0))::float AS z_score
  FROM hourly_stats
  WINDOW trailing AS (ORDER BY hour ROWS BETWEEN 24 PRECEDING AND 1 PRECEDING)
  ORDER BY hour DESC
  LIMIT 48
`;

export const TOP_PRODUCTS_SQL = `
  SELECT
    metadata->>'product_id' AS product_id,
    COUNT(*)::int AS times_purchased,
    SUM(amount) AS total_revenue
  FROM orders
  WHERE status = 'completed'
    AND created_at >= NOW() - (INTERVAL '1 day' * :days)
  GROUP BY 1
  ORDER BY total_revenue DESC
  LIMIT 20
`;

/** Statements available to the query-plan diagnostics endpoint. */
export const EXPLAINABLE_QUERIES = {
  hourly_metrics: 'SELECT * FROM mv_hourly_metrics LIMIT 100',
  funnel: 'SELECT * FROM mv_funnel_daily LIMIT 10',
  cohort: 'SELECT * FROM mv_cohort_retention LIMIT 50',
} as const;

export type ExplainableQueryName = keyof typeof EXPLAINABLE_QUERIES;

export function isExplainableQueryName(name: string): name is ExplainableQueryName {
  return Object.prototype.hasOwnProperty.call(EXPLAINABLE_QUERIES, name);
}
