/**
 * Row shapers applied to freshly executed results, before they are cached.
 */

import type {
  FunnelStepRow,
  QueryRow,
  RfmCustomerRow,
  RfmSegment,
} from '@shared/analytics-types';
import { ensureNumeric, nullableNumeric, roundTo } from '@shared/utils/number-utils';

// ============================================================================
// Funnel
// ============================================================================

export const FUNNEL_STEPS = [
  'Page View',
  'Add to Cart',
  'Checkout Start',
  'Purchase Complete',
] as const;

function percentOf(numerator: number, denominator: number): number | null {
  if (denominator === 0) return null;
  return roundTo((100 * numerator) / denominator, 2);
}

/**
 * Expand per-step counts into the full four-step funnel. Steps with no rows
 * are reported with zero entries and no conversion; percentages whose
 * denominator is zero are null rather than 0.
 */
export function shapeFunnelSteps(rows: readonly QueryRow[]): FunnelStepRow[] {
  const byStep = new Map<number, QueryRow>();
  for (const row of rows) {
    const step = nullableNumeric(row.step_number);
    if (step !== null) byStep.set(step, row);
  }

  const steps: FunnelStepRow[] = [];
  FUNNEL_STEPS.forEach((stepName, index) => {
    const stepNumber = index + 1;
    const row = byStep.get(stepNumber);
    const context = { id: stepNumber, context: 'funnel-step' };
    const totalEntries = ensureNumeric('total_entries', row?.total_entries, 0, context);
    const progressed = ensureNumeric('progressed', row?.progressed, 0, context);
    const avgTime = nullableNumeric(row?.avg_time_minutes);
    const previous = steps[index - 1];

    steps.push({
      step_number: stepNumber,
      step_name: stepName,
      total_entries: totalEntries,
      progressed,
      avg_time_minutes: avgTime === null ? null : roundTo(avgTime, 2),
      drop_off_pct: percentOf(totalEntries - progressed, totalEntries),
      step_conversion_pct:
        row && previous ? percentOf(progressed, previous.total_entries) : null,
    });
  });
  return steps;
}

// ============================================================================
// RFM
// ============================================================================

interface RfmRule {
  segment: RfmSegment;
  matches: (r: number, f: number, m: number) => boolean;
}

/** Evaluated in order; the first match wins. */
const RFM_RULES: readonly RfmRule[] = [
  { segment: 'Champions', matches: (r, f, m) => r >= 4 && f >= 4 && m >= 4 },
  { segment: 'Loyal Customers', matches: (r, f, m) => r >= 3 && f >= 3 && m >= 3 },
  { segment: 'New Customers', matches: (r, f) => r >= 4 && f <= 2 },
  { segment: 'At Risk', matches: (r, f) => r <= 2 && f >= 3 },
  { segment: 'Cannot Lose Them', matches: (r, f, m) => r <= 2 && f <= 2 && m >= 3 },
];

export function assignRfmSegment(r: number, f: number, m: number): RfmSegment {
  return RFM_RULES.find((rule) => rule.matches(r, f, m))?.segment ?? 'Others';
}

export function shapeRfmCustomers(rows: readonly QueryRow[]): RfmCustomerRow[] {
  return rows.map((row) => {
    const context = { id: String(row.user_id), context: 'rfm-customer' };
    const r = ensureNumeric('r_score', row.r_score, 1, context);
    const f = ensureNumeric('f_score', row.f_score, 1, context);
    const m = ensureNumeric('m_score', row.m_score, 1, context);
    return {
      user_id: String(row.user_id),
      recency_days: ensureNumeric('recency_days', row.recency_days, 0, context),
      frequency: ensureNumeric('frequency', row.frequency, 0, context),
      monetary_value: String(row.monetary_value ?? '0'),
      r_score: r,
      f_score: f,
      m_score: m,
      rfm_total: r + f + m,
      segment: assignRfmSegment(r, f, m),
    };
  });
}
