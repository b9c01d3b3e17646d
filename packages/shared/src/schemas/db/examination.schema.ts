// ============================================================================
// Examination Manager — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  serial,
  integer,
  text,
  date,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import { patients } from './patient.schema.js';

// --- Examinations Table ---
// One clinical episode. Tooth history and visits hang off examination_id,
// so a later episode starts from an empty chart.

export const examinations = pgTable(
  'examinations',
  {
    id: serial('id').primaryKey(),
    patientId: integer('patient_id')
      .notNull()
      .references(() => patients.id),
    examinationDate: date('examination_date', { mode: 'string' }).notNull(),
    chiefComplaint: text('chief_complaint').notNull().default(''),
    findings: text('findings').notNull().default(''),
    diagnosis: text('diagnosis').notNull().default(''),
    treatmentPlan: text('treatment_plan').notNull().default(''),
    notes: text('notes').notNull().default(''),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    // Current-examination lookup: newest date, then highest id
    index('examinations_patient_date_idx').on(
      table.patientId,
      table.examinationDate,
      table.id,
    ),
  ],
);

// --- Inferred Types ---

export type InsertExamination = typeof examinations.$inferInsert;
export type SelectExamination = typeof examinations.$inferSelect;
