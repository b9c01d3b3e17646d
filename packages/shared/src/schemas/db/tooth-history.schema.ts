// ============================================================================
// Tooth History Ledger — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  serial,
  integer,
  smallint,
  varchar,
  text,
  date,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import { patients } from './patient.schema.js';
import { examinations } from './examination.schema.js';

// --- Tooth History Entries Table ---
// Append-only. There is no UPDATE or DELETE path for this table.
// The row with the highest id for (examination_id, tooth_number, record_type)
// is the current status of that tooth in that stream.

export const toothHistoryEntries = pgTable(
  'tooth_history_entries',
  {
    id: serial('id').primaryKey(),
    patientId: integer('patient_id')
      .notNull()
      .references(() => patients.id),
    examinationId: integer('examination_id')
      .notNull()
      .references(() => examinations.id),
    toothNumber: smallint('tooth_number').notNull(),
    recordType: varchar('record_type', { length: 20 }).notNull(),
    statuses: text('statuses').array().notNull(),
    description: text('description').notNull().default(''),
    dateRecorded: date('date_recorded', { mode: 'string' }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('tooth_history_exam_tooth_type_idx').on(
      table.examinationId,
      table.toothNumber,
      table.recordType,
      table.id,
    ),
    index('tooth_history_patient_recorded_idx').on(
      table.patientId,
      table.dateRecorded,
    ),
  ],
);

// --- Inferred Types ---

export type InsertToothHistoryEntry = typeof toothHistoryEntries.$inferInsert;
export type SelectToothHistoryEntry = typeof toothHistoryEntries.$inferSelect;
