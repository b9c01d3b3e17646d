// ============================================================================
// Status Registry — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  serial,
  varchar,
  boolean,
  timestamp,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';

// --- Custom Statuses Table ---
// Clinic-defined statuses. Built-ins live in code and never get a row here.
// Codes are stored lower-case, so the unique index is also case-insensitive.
// Rows are deactivated, never deleted: historical entries keep the code.

export const customStatuses = pgTable(
  'custom_statuses',
  {
    id: serial('id').primaryKey(),
    code: varchar('code', { length: 50 }).notNull(),
    displayName: varchar('display_name', { length: 100 }).notNull(),
    color: varchar('color', { length: 7 }).notNull(),
    category: varchar('category', { length: 30 }).notNull().default('other'),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('custom_statuses_code_unique_idx').on(table.code),
    index('custom_statuses_category_active_idx').on(
      table.category,
      table.isActive,
    ),
  ],
);

// --- Inferred Types ---

export type InsertCustomStatus = typeof customStatuses.$inferInsert;
export type SelectCustomStatus = typeof customStatuses.$inferSelect;
