import type { Express } from 'express';
import { createAdminRouter, type AdminRouteDeps } from './admin-routes';
import { createAnalyticsRouter, type AnalyticsRouteDeps } from './analytics-routes';
import { createIngestionRouter, type IngestionRouteDeps } from './ingestion-routes';

export type RouteServices = AnalyticsRouteDeps & AdminRouteDeps & IngestionRouteDeps;

export function registerRoutes(app: Express, services: RouteServices): void {
  // Cached analytical reads, realtime counters and the custom-query allowlist
  app.use('/api/analytics', createAnalyticsRouter(services));

  // Event and order ingestion
  app.use('/api/ingest', createIngestionRouter(services));

  // Manual refresh, query plans and health
  app.use('/api', createAdminRouter(services));
}
