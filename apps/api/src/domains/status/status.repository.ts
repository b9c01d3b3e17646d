import { eq, asc, sql } from 'drizzle-orm';
import {
  customStatuses,
  type InsertCustomStatus,
  type SelectCustomStatus,
} from '@tooth-ledger/shared/schemas/db/status.schema.js';
import { type Database } from '../../lib/db.js';

// ---------------------------------------------------------------------------
// Custom status changes
// ---------------------------------------------------------------------------

export type CustomStatusChanges = Partial<
  Pick<InsertCustomStatus, 'displayName' | 'color' | 'category' | 'isActive'>
>;

// ---------------------------------------------------------------------------
// Status Repository
// ---------------------------------------------------------------------------

export function createStatusRepository(db: Database) {
  return {
    /**
     * Case-insensitive lookup, active or not.
     */
    async findCustomByCode(code: string): Promise<SelectCustomStatus | undefined> {
      const rows = await db
        .select()
        .from(customStatuses)
        .where(eq(sql`lower(${customStatuses.code})`, code.toLowerCase()))
        .limit(1);
      return rows[0];
    },

    async listCustom(): Promise<SelectCustomStatus[]> {
      return db
        .select()
        .from(customStatuses)
        .orderBy(asc(customStatuses.category), asc(customStatuses.displayName));
    },

    async listActiveCustom(): Promise<SelectCustomStatus[]> {
      return db
        .select()
        .from(customStatuses)
        .where(eq(customStatuses.isActive, true))
        .orderBy(asc(customStatuses.category), asc(customStatuses.displayName));
    },

    async createCustom(data: InsertCustomStatus): Promise<SelectCustomStatus> {
      const rows = await db.insert(customStatuses).values(data).returning();
      return rows[0];
    },

    async updateCustom(
      code: string,
      changes: CustomStatusChanges,
    ): Promise<SelectCustomStatus | undefined> {
      const rows = await db
        .update(customStatuses)
        .set({ ...changes, updatedAt: new Date() })
        .where(eq(customStatuses.code, code.toLowerCase()))
        .returning();
      return rows[0];
    },
  };
}

export type StatusRepository = ReturnType<typeof createStatusRepository>;
