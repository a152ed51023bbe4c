/**
 * Named-placeholder SQL templates.
 *
 * Catalog queries are written with `:name` placeholders. A template is split
 * once into literal text segments and placeholder names; binding turns each
 * placeholder into a drizzle parameter chunk, so values travel to PostgreSQL
 * as `$n` bind parameters and never as SQL text.
 *
 * `::type` casts are not placeholders.
 */

import { sql, type SQL } from 'drizzle-orm';

const PLACEHOLDER_RE = /(?<!:):([A-Za-z_][A-Za-z0-9_]*)/g;

export interface ParsedSqlTemplate {
  /** Literal text; always one more segment than there are placeholders. */
  readonly segments: readonly string[];
  /** Placeholder names in order of appearance (may repeat). */
  readonly placeholders: readonly string[];
}

export function parseSqlTemplate(template: string): ParsedSqlTemplate {
  const segments: string[] = [];
  const placeholders: string[] = [];
  let cursor = 0;

  for (const match of template.matchAll(PLACEHOLDER_RE)) {
    const start = match.index ?? 0;
    segments.push(template.slice(cursor, start));
    placeholders.push(match[1]);
    cursor = start + match[0].length;
  }
  segments.push(template.slice(cursor));

  return { segments, placeholders };
}

/** Distinct placeholder names referenced by a template. */
export function templateParameterNames(template: string): string[] {
  return Array.from(new Set(parseSqlTemplate(template).placeholders));
}

/**
 * Build a parameterized drizzle SQL object from a template.
 *
 * Throws when a placeholder has no value in `params`; `undefined` is not a
 * value, `null` is.
 */
export function bindSqlTemplate(template: string, params: Readonly<Record<string, unknown>>): SQL {
  const { segments, placeholders } = parseSqlTemplate(template);
  const chunks: SQL[] = [];

  segments.forEach((segment, i) => {
    if (segment.length > 0) chunks.push(sql.raw(segment));
    if (i >= placeholders.length) return;

    const name = placeholders[i];
    const value = params[name];
    if (value === undefined) {
      throw new Error(`No value bound for SQL placeholder :${name}`);
    }
    chunks.push(sql`${value}`);
  });

  return sql.join(chunks);
}
