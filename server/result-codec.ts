/**
 * Result serialization for the cache.
 *
 * node-postgres hands back Date objects for timestamps, strings for NUMERIC
 * and BIGINT, numbers for INTEGER/FLOAT and parsed objects for JSON columns.
 * toJsonRows() converts a fresh result into exactly what a JSON round trip
 * produces, so NUMERIC precision survives (decimal stays a string) and a
 * cached result equals a fresh one.
 */

import { z } from 'zod';
import type { QueryRow } from '@shared/analytics-types';

const cachedResultSchema = z.array(z.record(z.unknown()));

function toJsonValue(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (Buffer.isBuffer(value)) return value.toString('base64');
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = toJsonValue(inner);
    }
    return out;
  }
  return value;
}

export function toJsonRows(rows: readonly Record<string, unknown>[]): QueryRow[] {
  return rows.map((row) => {
    const out: QueryRow = {};
    for (const [column, value] of Object.entries(row)) {
      out[column] = toJsonValue(value);
    }
    return out;
  });
}

export function serializeResult(rows: readonly QueryRow[]): string {
  return JSON.stringify(rows);
}

/**
 * Decode a cached payload. Returns null for anything that is not a JSON array
 * of row objects; callers treat that as a cache miss.
 */
export function deserializeResult(payload: string): QueryRow[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return null;
  }
  const result = cachedResultSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
