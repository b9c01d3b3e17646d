import { eq, and, asc, desc, gte, lte, type SQL } from 'drizzle-orm';
import {
  visitRecords,
  type InsertVisitRecord,
  type SelectVisitRecord,
} from '@tooth-ledger/shared/schemas/db/visit.schema.js';
import { type Database } from '../../lib/db.js';

// ---------------------------------------------------------------------------
// Visit Repository
// ---------------------------------------------------------------------------

export function createVisitRepository(db: Database) {
  return {
    async insert(data: InsertVisitRecord): Promise<SelectVisitRecord> {
      const rows = await db.insert(visitRecords).values(data).returning();
      return rows[0];
    },

    async listForExamination(examinationId: number): Promise<SelectVisitRecord[]> {
      return db
        .select()
        .from(visitRecords)
        .where(eq(visitRecords.examinationId, examinationId))
        .orderBy(asc(visitRecords.visitDate), asc(visitRecords.id));
    },

    async listForPatient(patientId: number): Promise<SelectVisitRecord[]> {
      return db
        .select()
        .from(visitRecords)
        .where(eq(visitRecords.patientId, patientId))
        .orderBy(desc(visitRecords.visitDate), desc(visitRecords.id));
    },

    /** Across all patients; either bound may be open. */
    async listInDateRange(from?: string, to?: string): Promise<SelectVisitRecord[]> {
      const filters: SQL[] = [];
      if (from !== undefined) {
        filters.push(gte(visitRecords.visitDate, from));
      }
      if (to !== undefined) {
        filters.push(lte(visitRecords.visitDate, to));
      }
      return db
        .select()
        .from(visitRecords)
        .where(and(...filters))
        .orderBy(asc(visitRecords.visitDate), asc(visitRecords.id));
    },

    async listAmountsForExamination(examinationId: number): Promise<string[]> {
      const rows = await db
        .select({ amountPaid: visitRecords.amountPaid })
        .from(visitRecords)
        .where(eq(visitRecords.examinationId, examinationId));
      return rows.map((r) => r.amountPaid);
    },
  };
}

export type VisitRepository = ReturnType<typeof createVisitRepository>;
