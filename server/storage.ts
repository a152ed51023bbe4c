import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pkg from 'pg';
import * as schema from '@shared/analytics-schema';
import {
  events,
  orders,
  users,
  type InsertEventPayload,
  type InsertOrderPayload,
} from '@shared/analytics-schema';
import type { AppConfig } from './config';

const { Pool } = pkg;

export type AnalyticsDatabase = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  db: AnalyticsDatabase;
  close(): Promise<void>;
}

/**
 * Open the bounded connection pool and wrap it in drizzle. The pool is the
 * only one in the process; every query path checks connections out of it.
 */
export function createAnalyticsDatabase(config: AppConfig['database']): DatabaseHandle {
  const pool = new Pool({
    connectionString: config.connectionString,
    max: config.poolSize,
    idleTimeoutMillis: 30_000,
  });

  // An idle client losing its connection must not crash the process
  pool.on('error', (error) => {
    console.error('[db] Idle client error:', error.message);
  });

  return {
    db: drizzle(pool, { schema }),
    close: () => pool.end(),
  };
}

// ============================================================================
// Ingestion storage
// ============================================================================

export interface InsertedRecord {
  id: string;
  created_at: string;
}

export interface IStorage {
  /** Insert-if-absent on the user id; never creates a duplicate. */
  ensureUser(userId: string): Promise<void>;
  insertEvent(event: InsertEventPayload): Promise<InsertedRecord>;
  /** Orders are recorded as completed. */
  insertOrder(order: InsertOrderPayload): Promise<InsertedRecord>;
}

function toInsertedRecord(row: { id: string; createdAt: Date | null } | undefined): InsertedRecord {
  if (!row) throw new Error('INSERT returned no row');
  return { id: row.id, created_at: (row.createdAt ?? new Date()).toISOString() };
}

export class DrizzleStorage implements IStorage {
  constructor(private readonly db: AnalyticsDatabase) {}

  async ensureUser(userId: string): Promise<void> {
    await this.db
      .insert(users)
      .values({ id: userId, email: `user_${userId}@example.com` })
      .onConflictDoNothing();
  }

  async insertEvent(event: InsertEventPayload): Promise<InsertedRecord> {
    const [row] = await this.db
      .insert(events)
      .values({
        userId: event.user_id ?? null,
        sessionId: event.session_id,
        eventType: event.event_type,
        pagePath: event.page_path ?? null,
        metadata: event.metadata,
      })
      .returning({ id: events.id, createdAt: events.createdAt });
    return toInsertedRecord(row);
  }

  async insertOrder(order: InsertOrderPayload): Promise<InsertedRecord> {
    const now = new Date();
    const [row] = await this.db
      .insert(orders)
      .values({
        userId: order.user_id ?? null,
        orderNumber: order.order_number,
        status: 'completed',
        amount: order.amount.toFixed(2),
        currency: order.currency ?? 'USD',
        itemsCount: order.items_count ?? 0,
        metadata: order.metadata,
        completedAt: now,
      })
      .returning({ id: orders.id, createdAt: orders.createdAt });
    return toInsertedRecord(row);
  }
}
