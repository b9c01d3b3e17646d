import { eq, and, asc, desc, count, gte } from 'drizzle-orm';
import {
  examinations,
  type InsertExamination,
  type SelectExamination,
} from '@tooth-ledger/shared/schemas/db/examination.schema.js';
import { toothHistoryEntries } from '@tooth-ledger/shared/schemas/db/tooth-history.schema.js';
import { visitRecords } from '@tooth-ledger/shared/schemas/db/visit.schema.js';
import { type Database } from '../../lib/db.js';

export type ExaminationChanges = Partial<
  Pick<
    InsertExamination,
    | 'examinationDate'
    | 'chiefComplaint'
    | 'findings'
    | 'diagnosis'
    | 'treatmentPlan'
    | 'notes'
  >
>;

export interface ExaminationChildCounts {
  toothHistoryEntries: number;
  visitRecords: number;
}

// ---------------------------------------------------------------------------
// Examination Repository
// ---------------------------------------------------------------------------

export function createExaminationRepository(db: Database) {
  return {
    async create(data: InsertExamination): Promise<SelectExamination> {
      const rows = await db.insert(examinations).values(data).returning();
      return rows[0];
    },

    async findById(examinationId: number): Promise<SelectExamination | undefined> {
      const rows = await db
        .select()
        .from(examinations)
        .where(eq(examinations.id, examinationId))
        .limit(1);
      return rows[0];
    },

    /**
     * Newest examination_date wins; ties go to the highest id.
     */
    async findLatestForPatient(
      patientId: number,
    ): Promise<SelectExamination | undefined> {
      const rows = await db
        .select()
        .from(examinations)
        .where(eq(examinations.patientId, patientId))
        .orderBy(desc(examinations.examinationDate), desc(examinations.id))
        .limit(1);
      return rows[0];
    },

    async listForPatient(patientId: number): Promise<SelectExamination[]> {
      return db
        .select()
        .from(examinations)
        .where(eq(examinations.patientId, patientId))
        .orderBy(desc(examinations.examinationDate), desc(examinations.id));
    },

    /**
     * Oldest first. Used by the exporter so references read in creation order.
     */
    async listForPatientChronological(
      patientId: number,
    ): Promise<SelectExamination[]> {
      return db
        .select()
        .from(examinations)
        .where(eq(examinations.patientId, patientId))
        .orderBy(asc(examinations.id));
    },

    /**
     * Candidates for import matching, in creation order.
     */
    async listForPatientOnDate(
      patientId: number,
      examinationDate: string,
    ): Promise<SelectExamination[]> {
      return db
        .select()
        .from(examinations)
        .where(
          and(
            eq(examinations.patientId, patientId),
            eq(examinations.examinationDate, examinationDate),
          ),
        )
        .orderBy(asc(examinations.id));
    },

    async countForPatient(patientId: number, since?: string): Promise<number> {
      const filters = [eq(examinations.patientId, patientId)];
      if (since !== undefined) {
        filters.push(gte(examinations.examinationDate, since));
      }
      const [row] = await db
        .select({ total: count() })
        .from(examinations)
        .where(and(...filters));
      return row?.total ?? 0;
    },

    async update(
      examinationId: number,
      changes: ExaminationChanges,
    ): Promise<SelectExamination | undefined> {
      const rows = await db
        .update(examinations)
        .set({ ...changes, updatedAt: new Date() })
        .where(eq(examinations.id, examinationId))
        .returning();
      return rows[0];
    },

    async delete(examinationId: number): Promise<boolean> {
      const rows = await db
        .delete(examinations)
        .where(eq(examinations.id, examinationId))
        .returning({ id: examinations.id });
      return rows.length > 0;
    },

    async countChildren(examinationId: number): Promise<ExaminationChildCounts> {
      const [history] = await db
        .select({ total: count() })
        .from(toothHistoryEntries)
        .where(eq(toothHistoryEntries.examinationId, examinationId));
      const [visits] = await db
        .select({ total: count() })
        .from(visitRecords)
        .where(eq(visitRecords.examinationId, examinationId));
      return {
        toothHistoryEntries: history?.total ?? 0,
        visitRecords: visits?.total ?? 0,
      };
    },
  };
}

export type ExaminationRepository = ReturnType<typeof createExaminationRepository>;
