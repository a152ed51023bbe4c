/**
 * Admin and diagnostics routes
 *
 * - POST /api/admin/refresh-views          run an aggregate refresh cycle now
 * - GET  /api/query/performance/:queryName EXPLAIN ANALYZE for an allowlisted query
 * - GET  /api/health                        database and cache reachability
 */

import { Router } from 'express';
import { EXPLAINABLE_QUERIES, isExplainableQueryName } from './analytics-queries';
import { toErrorResponse } from './analytics-errors';
import type { CacheStore } from './cache-store';
import type { PgQueryExecutor } from './query-executor';
import type { RefreshCoordinator } from './refresh-coordinator';

export interface AdminRouteDeps {
  refresh: Pick<RefreshCoordinator, 'refreshNow'>;
  database: Pick<PgQueryExecutor, 'explain' | 'ping'>;
  store: Pick<CacheStore, 'name' | 'ping'>;
  queryTimeoutSeconds: number;
}

export function createAdminRouter(deps: AdminRouteDeps): Router {
  const router = Router();

  // Same cycle as the periodic timer; joins a cycle already in progress
  router.post('/admin/refresh-views', async (_req, res) => {
    const outcome = await deps.refresh.refreshNow('manual');
    res.status(outcome.status === 'success' ? 200 : 500).json(outcome);
  });

  router.get('/query/performance/:queryName', async (req, res) => {
    const { queryName } = req.params;
    if (!isExplainableQueryName(queryName)) {
      res.status(404).json({
        error: 'Query not found',
        available: Object.keys(EXPLAINABLE_QUERIES),
      });
      return;
    }

    try {
      const plan = await deps.database.explain(
        EXPLAINABLE_QUERIES[queryName],
        deps.queryTimeoutSeconds
      );
      res.json({
        query: queryName,
        execution_plan: plan,
        optimization_tips: 'Check for Seq Scan operations and consider indexes',
      });
    } catch (error) {
      console.error(`[admin] EXPLAIN ${queryName} failed:`, error);
      const { status, body } = toErrorResponse(error);
      res.status(status).json(body);
    }
  });

  router.get('/health', async (_req, res) => {
    const [databaseUp, cacheUp] = await Promise.all([deps.database.ping(), deps.store.ping()]);
    const status = !databaseUp ? 'unhealthy' : cacheUp ? 'healthy' : 'degraded';
    res.status(databaseUp ? 200 : 503).json({
      status,
      database: databaseUp ? 'connected' : 'disconnected',
      cache: { backend: deps.store.name, status: cacheUp ? 'connected' : 'disconnected' },
    });
  });

  return router;
}
