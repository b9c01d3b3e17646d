// ============================================================================
// Patient Reference — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  serial,
  varchar,
  text,
  date,
  timestamp,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';

// --- Patients Table ---
// Reference rows only. The ledgers consume patient_id; phone is the natural
// key the importer deduplicates on.

export const patients = pgTable(
  'patients',
  {
    id: serial('id').primaryKey(),
    fullName: varchar('full_name', { length: 200 }).notNull(),
    phone: varchar('phone', { length: 32 }).notNull(),
    email: varchar('email', { length: 200 }),
    address: text('address'),
    dateOfBirth: date('date_of_birth', { mode: 'string' }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('patients_phone_unique_idx').on(table.phone),
    index('patients_full_name_idx').on(table.fullName),
  ],
);

// --- Inferred Types ---

export type InsertPatient = typeof patients.$inferInsert;
export type SelectPatient = typeof patients.$inferSelect;
