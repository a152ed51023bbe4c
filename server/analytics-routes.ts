/**
 * Analytics API Routes
 *
 * Read side of the dashboard. Every catalog operation is served through the
 * cache-aside orchestrator; query strings are validated by the operation's
 * own schema, so out-of-range values are a 400 before any cache or database
 * access.
 *
 * Routes:
 * - GET  /api/analytics/dashboard?hours=24
 * - GET  /api/analytics/cohorts?weeks=12&source=organic
 * - GET  /api/analytics/funnel?days=7
 * - GET  /api/analytics/revenue?days=30
 * - GET  /api/analytics/rfm?limit=1000
 * - GET  /api/analytics/anomalies?days=7
 * - GET  /api/analytics/top-products?days=30
 * - GET  /api/analytics/realtime
 * - POST /api/analytics/custom-query  { query_type, params }
 * - GET  /api/analytics/operations
 * - GET  /api/analytics/stats
 */

import { Router, type Response } from 'express';
import { z } from 'zod';
import type { AnalyticsOperationName, CustomQueryResponse } from '@shared/analytics-types';
import type { AnalyticsCache } from './analytics-cache';
import type { AnalyticsCatalog } from './analytics-catalog';
import { toErrorResponse } from './analytics-errors';
import type { RealtimeCounters } from './realtime-counters';
import type { RefreshCoordinator } from './refresh-coordinator';

export interface AnalyticsRouteDeps {
  cache: Pick<AnalyticsCache, 'execute' | 'getStats'>;
  catalog: AnalyticsCatalog;
  counters: Pick<RealtimeCounters, 'read'>;
  refresh: Pick<RefreshCoordinator, 'getStatus'>;
  /** Cache backend name, reported by /stats. */
  cacheBackend: string;
}

const OPERATION_ROUTES: ReadonlyArray<readonly [path: string, operation: AnalyticsOperationName]> = [
  ['/dashboard', 'dashboard_metrics'],
  ['/cohorts', 'cohort_analysis'],
  ['/funnel', 'funnel_analysis'],
  ['/revenue', 'rolling_revenue'],
  ['/rfm', 'rfm_analysis'],
  ['/anomalies', 'anomaly_detection'],
  ['/top-products', 'top_products'],
];

const CustomQueryBodySchema = z.object({
  query_type: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

function sendError(res: Response, context: string, error: unknown): void {
  const { status, body } = toErrorResponse(error);
  if (status >= 500) {
    console.error(`[analytics] ${context} failed:`, error);
  }
  res.status(status).json(body);
}

export function createAnalyticsRouter(deps: AnalyticsRouteDeps): Router {
  const router = Router();

  for (const [path, operation] of OPERATION_ROUTES) {
    router.get(path, async (req, res) => {
      try {
        const result = await deps.cache.execute(operation, req.query);
        if (result.cacheKey !== null) res.set('X-Cache', result.cached ? 'HIT' : 'MISS');
        res.json(result.rows);
      } catch (error) {
        sendError(res, operation, error);
      }
    });
  }

  router.get('/realtime', async (_req, res) => {
    try {
      res.json(await deps.counters.read());
    } catch (error) {
      sendError(res, 'realtime', error);
    }
  });

  router.post('/custom-query', async (req, res) => {
    const body = CustomQueryBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({
        error: 'Invalid request body',
        code: 'VALIDATION_FAILED',
        details: body.error.issues,
      });
      return;
    }

    try {
      const result = await deps.cache.execute(body.data.query_type, body.data.params);
      const response: CustomQueryResponse = {
        query_type: result.operation,
        execution_time_ms: result.executionTimeMs,
        rows_count: result.rows.length,
        cached: result.cached,
        data: result.rows,
      };
      res.json(response);
    } catch (error) {
      sendError(res, `custom-query ${body.data.query_type}`, error);
    }
  });

  router.get('/operations', (_req, res) => {
    res.json(
      deps.catalog.list().map((operation) => ({
        name: operation.name,
        description: operation.description,
        parameters: operation.paramNames,
        cache_ttl_seconds: operation.cache ? operation.cache.ttlSeconds : null,
        timeout_seconds: operation.timeoutSeconds,
      }))
    );
  });

  router.get('/stats', (_req, res) => {
    res.json({
      cache: { backend: deps.cacheBackend, ...deps.cache.getStats() },
      refresh: deps.refresh.getStatus(),
    });
  });

  return router;
}
