/**
 * Number Utility Functions
 *
 * Numeric coercion for values read from PostgreSQL (NUMERIC and BIGINT arrive
 * as strings) and from cache counters (always strings).
 */

export interface TransformContext {
  /** Record identifier (for debugging) */
  id?: string | number;
  /** Context description (e.g., 'funnel-step', 'realtime-counter') */
  context: string;
}

function parseNumeric(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const num = Number(value);
    return Number.isFinite(num) ? num : null;
  }
  return null;
}

/**
 * Numeric value with validation and fallback
 *
 * Absent values (null/undefined) fall back silently; present but
 * non-numeric values fall back with a warning.
 *
 * @example
 * ```typescript
 * const entries = ensureNumeric('total_entries', row.total_entries, 0, { context: 'funnel-step' });
 * ```
 */
export function ensureNumeric(
  fieldName: string,
  value: unknown,
  fallback: number,
  context: TransformContext
): number {
  if (value === null || value === undefined) return fallback;

  const num = parseNumeric(value);
  if (num === null) {
    const where = context.id !== undefined ? `${context.context}#${context.id}` : context.context;
    console.warn(
      `[DataTransform] Invalid numeric value for '${fieldName}' in ${where}: ${String(value)}, using fallback ${fallback}`
    );
    return fallback;
  }
  return num;
}

/** Like ensureNumeric, but absent or invalid values stay null. */
export function nullableNumeric(value: unknown): number | null {
  return parseNumeric(value);
}

/** Round half away from zero to `digits` decimals, as SQL ROUND does. */
export function roundTo(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}
