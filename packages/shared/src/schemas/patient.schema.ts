// ============================================================================
// Patient Reference — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';

// --- Patient ID Parameter ---

export const patientIdParamSchema = z.object({
  patientId: z.coerce.number().int().positive(),
});

export type PatientIdParam = z.infer<typeof patientIdParamSchema>;

// --- Patient Reference Row ---
// The only patient fields the ledger carries; used when importing.

export const patientReferenceSchema = z.object({
  full_name: z.string().trim().min(1).max(200),
  phone: z.string().trim().min(1).max(32),
  email: z.string().trim().email().max(200).optional(),
  address: z.string().trim().optional(),
  date_of_birth: z.string().date().optional(),
});

export type PatientReference = z.infer<typeof patientReferenceSchema>;
