// ============================================================================
// Visit Record Ledger — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  serial,
  integer,
  numeric,
  text,
  date,
  timestamp,
  index,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { patients } from './patient.schema.js';
import { examinations } from './examination.schema.js';

// --- Visit Records Table ---
// Insert-only. amount_paid is exact decimal; totals are summed in cents by
// the service, never cached.

export const visitRecords = pgTable(
  'visit_records',
  {
    id: serial('id').primaryKey(),
    patientId: integer('patient_id')
      .notNull()
      .references(() => patients.id),
    examinationId: integer('examination_id')
      .notNull()
      .references(() => examinations.id),
    visitDate: date('visit_date', { mode: 'string' }).notNull(),
    amountPaid: numeric('amount_paid', { precision: 10, scale: 2 })
      .notNull()
      .default('0.00'),
    chiefComplaint: text('chief_complaint').notNull().default(''),
    diagnosis: text('diagnosis').notNull().default(''),
    treatmentPerformed: text('treatment_performed').notNull().default(''),
    advice: text('advice').notNull().default(''),
    affectedTeeth: integer('affected_teeth').array().notNull().default(sql`'{}'::integer[]`),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('visit_records_exam_date_idx').on(
      table.examinationId,
      table.visitDate,
      table.id,
    ),
    index('visit_records_patient_date_idx').on(
      table.patientId,
      table.visitDate,
    ),
    check('visit_records_amount_non_negative', sql`${table.amountPaid} >= 0`),
  ],
);

// --- Inferred Types ---

export type InsertVisitRecord = typeof visitRecords.$inferInsert;
export type SelectVisitRecord = typeof visitRecords.$inferSelect;
