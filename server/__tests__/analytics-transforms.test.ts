import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  FUNNEL_STEPS,
  assignRfmSegment,
  shapeFunnelSteps,
  shapeRfmCustomers,
} from '../analytics-transforms';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('shapeFunnelSteps', () => {
  it('computes drop-off and step conversion for a full funnel', () => {
    const steps = shapeFunnelSteps([
      { step_number: 1, total_entries: '1000', progressed: '400', avg_time_minutes: 2.456 },
      { step_number: 2, total_entries: 400, progressed: 200, avg_time_minutes: '11.5' },
      { step_number: 3, total_entries: 200, progressed: 150, avg_time_minutes: null },
      { step_number: 4, total_entries: 150, progressed: 150, avg_time_minutes: null },
    ]);

    expect(steps).toEqual([
      {
        step_number: 1,
        step_name: 'Page View',
        total_entries: 1000,
        progressed: 400,
        avg_time_minutes: 2.46,
        drop_off_pct: 60,
        step_conversion_pct: null,
      },
      {
        step_number: 2,
        step_name: 'Add to Cart',
        total_entries: 400,
        progressed: 200,
        avg_time_minutes: 11.5,
        drop_off_pct: 50,
        step_conversion_pct: 20,
      },
      {
        step_number: 3,
        step_name: 'Checkout Start',
        total_entries: 200,
        progressed: 150,
        avg_time_minutes: null,
        drop_off_pct: 25,
        step_conversion_pct: 37.5,
      },
      {
        step_number: 4,
        step_name: 'Purchase Complete',
        total_entries: 150,
        progressed: 150,
        avg_time_minutes: null,
        drop_off_pct: 0,
        step_conversion_pct: 75,
      },
    ]);
  });

  it('reports missing steps with zero entries and no conversion', () => {
    const steps = shapeFunnelSteps([
      { step_number: 1, total_entries: 100, progressed: 0, avg_time_minutes: null },
    ]);

    expect(steps.map((s) => s.step_name)).toEqual([...FUNNEL_STEPS]);
    expect(steps.map((s) => s.total_entries)).toEqual([100, 0, 0, 0]);
    expect(steps.map((s) => s.drop_off_pct)).toEqual([100, null, null, null]);
    expect(steps.map((s) => s.step_conversion_pct)).toEqual([null, null, null, null]);
  });

  it('computes conversion for a recorded step with no progress', () => {
    const [, second] = shapeFunnelSteps([
      { step_number: 1, total_entries: 100, progressed: 40 },
      { step_number: 2, total_entries: 40, progressed: 0 },
    ]);

    expect(second.drop_off_pct).toBe(100);
    expect(second.step_conversion_pct).toBe(0);
  });

  it('returns four empty steps for an empty result', () => {
    const steps = shapeFunnelSteps([]);

    expect(steps).toHaveLength(4);
    expect(steps.every((s) => s.total_entries === 0 && s.drop_off_pct === null)).toBe(true);
  });

  it('rounds percentages to two decimals', () => {
    const [first, second] = shapeFunnelSteps([
      { step_number: 1, total_entries: 3, progressed: 2 },
      { step_number: 2, total_entries: 2, progressed: 1 },
    ]);

    expect(first.drop_off_pct).toBe(33.33);
    expect(second.step_conversion_pct).toBe(33.33);
  });
});

describe('assignRfmSegment', () => {
  it.each([
    [5, 5, 5, 'Champions'],
    [4, 4, 3, 'Loyal Customers'],
    [3, 3, 3, 'Loyal Customers'],
    [5, 1, 1, 'New Customers'],
    [4, 2, 5, 'New Customers'],
    [1, 5, 1, 'At Risk'],
    [2, 3, 5, 'At Risk'],
    [1, 1, 5, 'Cannot Lose Them'],
    [3, 2, 2, 'Others'],
    [1, 1, 1, 'Others'],
  ])('r=%i f=%i m=%i is %s', (r, f, m, segment) => {
    expect(assignRfmSegment(r, f, m)).toBe(segment);
  });
});

describe('shapeRfmCustomers', () => {
  it('adds the score total and segment to each customer', () => {
    const [customer] = shapeRfmCustomers([
      {
        user_id: '7b0d7c5e-0000-4000-8000-000000000001',
        recency_days: 3,
        frequency: '12',
        monetary_value: '1520.00',
        r_score: 5,
        f_score: 5,
        m_score: 4,
      },
    ]);

    expect(customer).toEqual({
      user_id: '7b0d7c5e-0000-4000-8000-000000000001',
      recency_days: 3,
      frequency: 12,
      monetary_value: '1520.00',
      r_score: 5,
      f_score: 5,
      m_score: 4,
      rfm_total: 14,
      segment: 'Champions',
    });
  });

  it('falls back to the lowest score for a missing one', () => {
    const [customer] = shapeRfmCustomers([
      { user_id: 'u1', recency_days: 90, frequency: 1, monetary_value: null, r_score: 1, f_score: 1, m_score: null },
    ]);

    expect(customer.m_score).toBe(1);
    expect(customer.rfm_total).toBe(3);
    expect(customer.monetary_value).toBe('0');
    expect(customer.segment).toBe('Others');
  });

  it('warns about a score that is present but not numeric', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const [customer] = shapeRfmCustomers([
      { user_id: 'u2', recency_days: 1, frequency: 1, monetary_value: '5', r_score: 'high', f_score: 1, m_score: 1 },
    ]);

    expect(customer.r_score).toBe(1);
    expect(warnSpy).toHaveBeenCalledWith(
      "[DataTransform] Invalid numeric value for 'r_score' in rfm-customer#u2: high, using fallback 1"
    );
  });
});
