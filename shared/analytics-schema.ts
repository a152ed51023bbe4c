import {
  pgTable,
  uuid,
  text,
  varchar,
  char,
  integer,
  numeric,
  jsonb,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { createInsertSchema } from 'drizzle-zod';
import { z } from 'zod';

/**
 * Users Table
 * Acquisition attributes feed the cohort retention materialized view.
 */
export const users = pgTable(
  'users',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    email: varchar('email', { length: 255 }).notNull().unique(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
    firstSeenAt: timestamp('first_seen_at', { withTimezone: true }).defaultNow(),
    lastSeenAt: timestamp('last_seen_at', { withTimezone: true }).defaultNow(),
    acquisitionSource: varchar('acquisition_source', { length: 100 }),
    countryCode: char('country_code', { length: 2 }),
    deviceType: varchar('device_type', { length: 50 }),
  },
  (table) => [
    index('idx_users_created_at').on(table.createdAt.desc()),
    index('idx_users_acquisition').on(table.acquisitionSource, table.createdAt.desc()),
  ]
);

/**
 * Events Table
 * Raw clickstream. Funnel and anomaly queries read this directly; hourly
 * metrics read it through mv_hourly_metrics.
 */
export const events = pgTable(
  'events',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id').references(() => users.id),
    sessionId: uuid('session_id').notNull(),
    eventType: varchar('event_type', { length: 50 }).notNull(),
    pagePath: text('page_path'),
    metadata: jsonb('metadata')
      .$type<Record<string, unknown>>()
      .default(sql`'{}'::jsonb`),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
  },
  (table) => [
    index('idx_events_created_at').on(table.createdAt.desc()),
    index('idx_events_user_time').on(table.userId, table.createdAt.desc()),
    index('idx_events_session').on(table.sessionId, table.createdAt),
    index('idx_events_type_time').on(table.eventType, table.createdAt.desc()),
  ]
);

/**
 * Orders Table
 * Only `completed` orders count towards revenue, RFM and top products.
 */
export const orders = pgTable(
  'orders',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id').references(() => users.id),
    orderNumber: varchar('order_number', { length: 50 }).notNull().unique(),
    status: varchar('status', { length: 50 }).default('pending'),
    amount: numeric('amount', { precision: 10, scale: 2 }).notNull(),
    currency: varchar('currency', { length: 3 }).default('USD'),
    itemsCount: integer('items_count').default(0),
    metadata: jsonb('metadata')
      .$type<Record<string, unknown>>()
      .default(sql`'{}'::jsonb`),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
    completedAt: timestamp('completed_at', { withTimezone: true }),
  },
  (table) => [
    index('idx_orders_user_time').on(table.userId, table.createdAt.desc()),
    index('idx_orders_created_at').on(table.createdAt.desc()),
  ]
);

export type User = typeof users.$inferSelect;
export type Event = typeof events.$inferSelect;
export type Order = typeof orders.$inferSelect;

// ============================================================================
// Ingestion payload schemas (snake_case wire format)
// ============================================================================

const metadataSchema = z.record(z.unknown()).default({});

const eventColumns = createInsertSchema(events, {
  userId: z.string().uuid(),
  sessionId: z.string().uuid(),
  eventType: z.string().trim().min(1).max(50),
  pagePath: z.string().max(2000),
});

export const insertEventSchema = z.object({
  user_id: eventColumns.shape.userId,
  session_id: eventColumns.shape.sessionId,
  event_type: eventColumns.shape.eventType,
  page_path: eventColumns.shape.pagePath,
  metadata: metadataSchema,
});

const orderColumns = createInsertSchema(orders, {
  userId: z.string().uuid(),
  orderNumber: z.string().trim().min(1).max(50),
  currency: z.string().length(3).toUpperCase(),
  itemsCount: z.number().int().min(0),
});

export const insertOrderSchema = z.object({
  user_id: orderColumns.shape.userId,
  order_number: orderColumns.shape.orderNumber,
  amount: z.coerce.number().positive().max(99_999_999.99),
  currency: orderColumns.shape.currency.default('USD'),
  items_count: orderColumns.shape.itemsCount.default(0),
  metadata: metadataSchema,
});

export type InsertEventPayload = z.infer<typeof insertEventSchema>;
export type InsertOrderPayload = z.infer<typeof insertOrderSchema>;
