import { eq, and, gt, gte, asc, desc, count } from 'drizzle-orm';
import {
  toothHistoryEntries,
  type InsertToothHistoryEntry,
  type SelectToothHistoryEntry,
} from '@tooth-ledger/shared/schemas/db/tooth-history.schema.js';
import { type RecordType } from '@tooth-ledger/shared/constants/tooth.constants.js';
import { type Database } from '../../lib/db.js';

export interface ToothEntryCount {
  toothNumber: number;
  entries: number;
}

export interface RecordTypeCount {
  recordType: string;
  entries: number;
}

// ---------------------------------------------------------------------------
// Tooth History Repository
// ---------------------------------------------------------------------------
// Insert and select only. Every per-tooth query filters on exactly one
// record_type so the two streams never mix.

export function createToothHistoryRepository(db: Database) {
  return {
    async insert(data: InsertToothHistoryEntry): Promise<SelectToothHistoryEntry> {
      const rows = await db.insert(toothHistoryEntries).values(data).returning();
      return rows[0];
    },

    async findLatest(
      examinationId: number,
      toothNumber: number,
      recordType: RecordType,
    ): Promise<SelectToothHistoryEntry | undefined> {
      const rows = await db
        .select()
        .from(toothHistoryEntries)
        .where(
          and(
            eq(toothHistoryEntries.examinationId, examinationId),
            eq(toothHistoryEntries.toothNumber, toothNumber),
            eq(toothHistoryEntries.recordType, recordType),
          ),
        )
        .orderBy(desc(toothHistoryEntries.id))
        .limit(1);
      return rows[0];
    },

    /**
     * One page of a tooth's history in id order, strictly after `afterId`.
     */
    async listPage(
      examinationId: number,
      toothNumber: number,
      recordType: RecordType,
      afterId: number,
      limit: number,
    ): Promise<SelectToothHistoryEntry[]> {
      return db
        .select()
        .from(toothHistoryEntries)
        .where(
          and(
            eq(toothHistoryEntries.examinationId, examinationId),
            eq(toothHistoryEntries.toothNumber, toothNumber),
            eq(toothHistoryEntries.recordType, recordType),
            gt(toothHistoryEntries.id, afterId),
          ),
        )
        .orderBy(asc(toothHistoryEntries.id))
        .limit(limit);
    },

    /**
     * Latest entry per tooth for one stream of one examination.
     */
    async listLatestPerTooth(
      examinationId: number,
      recordType: RecordType,
    ): Promise<SelectToothHistoryEntry[]> {
      return db
        .selectDistinctOn([toothHistoryEntries.toothNumber])
        .from(toothHistoryEntries)
        .where(
          and(
            eq(toothHistoryEntries.examinationId, examinationId),
            eq(toothHistoryEntries.recordType, recordType),
          ),
        )
        .orderBy(asc(toothHistoryEntries.toothNumber), desc(toothHistoryEntries.id));
    },

    async countPerTooth(
      examinationId: number,
      recordType: RecordType,
    ): Promise<ToothEntryCount[]> {
      return db
        .select({
          toothNumber: toothHistoryEntries.toothNumber,
          entries: count(),
        })
        .from(toothHistoryEntries)
        .where(
          and(
            eq(toothHistoryEntries.examinationId, examinationId),
            eq(toothHistoryEntries.recordType, recordType),
          ),
        )
        .groupBy(toothHistoryEntries.toothNumber);
    },

    /**
     * Entry counts per record type for a patient, optionally only those
     * recorded on or after `since`.
     */
    async countByRecordType(
      patientId: number,
      since?: string,
    ): Promise<RecordTypeCount[]> {
      const filters = [eq(toothHistoryEntries.patientId, patientId)];
      if (since !== undefined) {
        filters.push(gte(toothHistoryEntries.dateRecorded, since));
      }
      return db
        .select({
          recordType: toothHistoryEntries.recordType,
          entries: count(),
        })
        .from(toothHistoryEntries)
        .where(and(...filters))
        .groupBy(toothHistoryEntries.recordType);
    },

    async listForExamination(examinationId: number): Promise<SelectToothHistoryEntry[]> {
      return db
        .select()
        .from(toothHistoryEntries)
        .where(eq(toothHistoryEntries.examinationId, examinationId))
        .orderBy(asc(toothHistoryEntries.id));
    },
  };
}

export type ToothHistoryRepository = ReturnType<typeof createToothHistoryRepository>;
