import { eq, asc } from 'drizzle-orm';
import {
  patients,
  type InsertPatient,
  type SelectPatient,
} from '@tooth-ledger/shared/schemas/db/patient.schema.js';
import { type Database } from '../../lib/db.js';

export type PatientChanges = Partial<
  Pick<InsertPatient, 'fullName' | 'email' | 'address' | 'dateOfBirth'>
>;

// ---------------------------------------------------------------------------
// Patient Repository
// ---------------------------------------------------------------------------
// Reference rows only: the ledgers need an id to hang records on, the
// importer needs phone lookups, the exporter needs the row itself.

export function createPatientRepository(db: Database) {
  return {
    async findById(patientId: number): Promise<SelectPatient | undefined> {
      const rows = await db
        .select()
        .from(patients)
        .where(eq(patients.id, patientId))
        .limit(1);
      return rows[0];
    },

    /**
     * Exact match on the normalised phone. Used for import de-duplication.
     */
    async findByPhone(phone: string): Promise<SelectPatient | undefined> {
      const rows = await db
        .select()
        .from(patients)
        .where(eq(patients.phone, phone))
        .limit(1);
      return rows[0];
    },

    async listAll(): Promise<SelectPatient[]> {
      return db.select().from(patients).orderBy(asc(patients.id));
    },

    async create(data: InsertPatient): Promise<SelectPatient> {
      const rows = await db.insert(patients).values(data).returning();
      return rows[0];
    },

    async update(
      patientId: number,
      changes: PatientChanges,
    ): Promise<SelectPatient | undefined> {
      const rows = await db
        .update(patients)
        .set({ ...changes, updatedAt: new Date() })
        .where(eq(patients.id, patientId))
        .returning();
      return rows[0];
    },
  };
}

export type PatientRepository = ReturnType<typeof createPatientRepository>;
