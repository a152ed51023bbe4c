/**
 * Ingestion API Routes
 *
 * Write side of the dashboard: raw events and completed orders. Writes go
 * straight to PostgreSQL; cached analytics pick them up on expiry or on the
 * next aggregate refresh, not immediately.
 *
 * Routes:
 * - POST /api/ingest/events
 * - POST /api/ingest/orders
 */

import { Router, type Response } from 'express';
import type { ZodError } from 'zod';
import { insertEventSchema, insertOrderSchema } from '@shared/analytics-schema';
import type { RealtimeCounters } from './realtime-counters';
import type { IStorage } from './storage';

export interface IngestionRouteDeps {
  storage: IStorage;
  counters: Pick<RealtimeCounters, 'recordOrder'>;
}

function rejectInvalid(res: Response, error: ZodError): void {
  res.status(400).json({
    error: 'Invalid request body',
    code: 'VALIDATION_FAILED',
    details: error.flatten().fieldErrors,
  });
}

export function createIngestionRouter({ storage, counters }: IngestionRouteDeps): Router {
  const router = Router();

  router.post('/events', async (req, res) => {
    const parsed = insertEventSchema.safeParse(req.body);
    if (!parsed.success) {
      rejectInvalid(res, parsed.error);
      return;
    }

    try {
      const event = parsed.data;
      if (event.user_id) await storage.ensureUser(event.user_id);
      const record = await storage.insertEvent(event);
      res.status(201).json(record);
    } catch (error) {
      console.error('[ingest] Error recording event:', error);
      res.status(500).json({
        error: 'Failed to record event',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  router.post('/orders', async (req, res) => {
    const parsed = insertOrderSchema.safeParse(req.body);
    if (!parsed.success) {
      rejectInvalid(res, parsed.error);
      return;
    }

    try {
      const order = parsed.data;
      if (order.user_id) await storage.ensureUser(order.user_id);
      const record = await storage.insertOrder(order);
      await counters.recordOrder(order.amount);
      res.status(201).json(record);
    } catch (error) {
      console.error('[ingest] Error recording order:', error);
      res.status(500).json({
        error: 'Failed to record order',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  return router;
}
