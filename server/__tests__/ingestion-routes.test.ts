import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { ChangeNotification } from '@shared/analytics-types';
import { createAppHarness, type AppHarness } from './app-harness';

const USER_ID = '3f1c2a9e-5b7d-4c1e-9a2f-000000000001';
const SESSION_ID = '3f1c2a9e-5b7d-4c1e-9a2f-0000000000aa';

describe('Ingestion routes', () => {
  let harness: AppHarness;
  let delivered: ChangeNotification[];

  beforeEach(() => {
    harness = createAppHarness();
    delivered = [];
    harness.notifier.register({
      id: 'dashboard-1',
      deliver: async (message) => {
        delivered.push(message);
      },
    });
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('POST /api/ingest/events', () => {
    it('records the event and its user without notifying dashboards', async () => {
      const response = await request(harness.app)
        .post('/api/ingest/events')
        .send({ user_id: USER_ID, session_id: SESSION_ID, event_type: 'page_view', page_path: '/pricing' })
        .expect(201);

      expect(response.body).toEqual({ id: 'event-1', created_at: '2026-03-01T12:00:00.000Z' });
      expect(harness.storage.users.has(USER_ID)).toBe(true);
      expect(harness.storage.events).toEqual([
        { user_id: USER_ID, session_id: SESSION_ID, event_type: 'page_view', page_path: '/pricing', metadata: {} },
      ]);
      expect(delivered).toHaveLength(0);
    });

    it('accepts an anonymous event', async () => {
      await request(harness.app)
        .post('/api/ingest/events')
        .send({ session_id: SESSION_ID, event_type: 'page_view' })
        .expect(201);

      expect(harness.storage.users.size).toBe(0);
    });

    it('rejects a body that fails validation', async () => {
      const response = await request(harness.app)
        .post('/api/ingest/events')
        .send({ session_id: 'not-a-uuid', event_type: '' })
        .expect(400);

      expect(response.body.error).toBe('Invalid request body');
      expect(response.body.code).toBe('VALIDATION_FAILED');
      expect(Object.keys(response.body.details).sort()).toEqual(['event_type', 'session_id']);
      expect(harness.storage.events).toHaveLength(0);
      expect(delivered).toHaveLength(0);
    });

    it('returns 500 when the insert fails', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      harness.storage.failWith = new Error('connection terminated');

      const response = await request(harness.app)
        .post('/api/ingest/events')
        .send({ session_id: SESSION_ID, event_type: 'page_view' })
        .expect(500);

      expect(response.body).toEqual({ error: 'Failed to record event', message: 'connection terminated' });
      expect(delivered).toHaveLength(0);
    });
  });

  describe('POST /api/ingest/orders', () => {
    it('records a completed order and counts it toward the hourly window', async () => {
      const response = await request(harness.app)
        .post('/api/ingest/orders')
        .send({ user_id: USER_ID, order_number: 'ORD-1001', amount: '49.90', currency: 'eur', items_count: 2 })
        .expect(201);

      expect(response.body.id).toBe('order-1');
      expect(harness.storage.orders[0]).toMatchObject({
        user_id: USER_ID,
        order_number: 'ORD-1001',
        amount: 49.9,
        currency: 'EUR',
        items_count: 2,
      });

      const realtime = await request(harness.app).get('/api/analytics/realtime').expect(200);
      expect(realtime.body).toMatchObject({ orders_last_hour: 1, revenue_last_hour: 49.9 });
      expect(delivered).toHaveLength(0);
    });

    it('responds without waiting on a stalled dashboard socket', async () => {
      harness.notifier.register({ id: 'stalled', deliver: () => new Promise<void>(() => {}) });

      const response = await request(harness.app)
        .post('/api/ingest/orders')
        .send({ order_number: 'ORD-1003', amount: 5 })
        .expect(201);

      expect(response.body.id).toBe('order-1');
    });

    it('defaults currency and item count', async () => {
      await request(harness.app)
        .post('/api/ingest/orders')
        .send({ order_number: 'ORD-1002', amount: 10 })
        .expect(201);

      expect(harness.storage.orders[0]).toMatchObject({ currency: 'USD', items_count: 0, metadata: {} });
    });

    it.each([
      ['a negative amount', { order_number: 'ORD-1', amount: -5 }],
      ['a missing order number', { amount: 5 }],
      ['a currency code that is not three letters', { order_number: 'ORD-1', amount: 5, currency: 'EURO' }],
    ])('rejects %s', async (_label, body) => {
      await request(harness.app).post('/api/ingest/orders').send(body).expect(400);

      expect(harness.storage.orders).toHaveLength(0);
    });

    it('does not count an order that failed to insert', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      harness.storage.failWith = new Error('duplicate key value violates unique constraint');

      const response = await request(harness.app)
        .post('/api/ingest/orders')
        .send({ order_number: 'ORD-1001', amount: 12 })
        .expect(500);

      expect(response.body.error).toBe('Failed to record order');
      expect(harness.store.has('orders:last_hour')).toBe(false);
    });
  });
});
