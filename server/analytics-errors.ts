/**
 * Analytics Error Taxonomy
 *
 * Each error carries a stable `code` and the HTTP `status` the routes map it
 * to. Cache and refresh errors never reach a client; they exist so the
 * components that absorb them can log a uniform shape.
 */

import type { ZodIssue } from 'zod';

export abstract class AnalyticsError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Parameters failed the operation's schema. Raised before any cache read or query. */
export class ValidationError extends AnalyticsError {
  readonly code = 'VALIDATION_FAILED';
  readonly status = 400;

  constructor(
    message: string,
    readonly issues: ZodIssue[] = []
  ) {
    super(message);
  }
}

export class UnknownOperationError extends AnalyticsError {
  readonly code = 'UNKNOWN_OPERATION';
  readonly status = 404;

  constructor(readonly operation: string) {
    super(`Unknown analytics operation: ${operation}`);
  }
}

export class QueryTimeoutError extends AnalyticsError {
  readonly code = 'QUERY_TIMEOUT';
  readonly status = 504;

  constructor(
    readonly timeoutSeconds: number,
    options?: { cause?: unknown }
  ) {
    super(`Query exceeded its ${timeoutSeconds}s statement timeout`, options);
  }
}

export class CacheUnavailableError extends AnalyticsError {
  readonly code = 'CACHE_UNAVAILABLE';
  readonly status = 503;

  constructor(
    readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(`Cache ${operation} failed`, options);
  }
}

export class RefreshFailedError extends AnalyticsError {
  readonly code = 'REFRESH_FAILED';
  readonly status = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A catalog entry is malformed. Thrown at startup, never at request time. */
export class CatalogDefinitionError extends Error {
  constructor(
    readonly operation: string,
    message: string
  ) {
    super(`Invalid analytics operation "${operation}": ${message}`);
    this.name = 'CatalogDefinitionError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.cause instanceof Error ? `${error.message} (${error.cause.message})` : error.message;
  }
  return String(error);
}

export interface ErrorResponse {
  status: number;
  body: Record<string, unknown>;
}

/** HTTP mapping for errors escaping a request handler. Unknown errors are 500. */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return {
      status: error.status,
      body: { error: error.message, code: error.code, details: error.issues },
    };
  }
  if (error instanceof AnalyticsError) {
    return { status: error.status, body: { error: error.message, code: error.code } };
  }
  return {
    status: 500,
    body: {
      error: 'Internal server error',
      message: error instanceof Error ? error.message : 'Unknown error',
    },
  };
}
