// ============================================================================
// Tooth History Ledger — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { RECORD_TYPES } from '../constants/tooth.constants.js';

// --- Tooth Parameters ---
// FDI validity is checked by the ledger so it can answer INVALID_TOOTH.

export const toothParamsSchema = z.object({
  patientId: z.coerce.number().int().positive(),
  examinationId: z.coerce.number().int().positive(),
  toothNumber: z.coerce.number().int(),
});

export type ToothParams = z.infer<typeof toothParamsSchema>;

// --- Record Type Query ---

export const recordTypeQuerySchema = z.object({
  record_type: z.enum(RECORD_TYPES),
});

export type RecordTypeQuery = z.infer<typeof recordTypeQuerySchema>;

// --- Record Entry ---

export const recordToothEntrySchema = z.object({
  record_type: z.enum(RECORD_TYPES),
  statuses: z.array(z.string().trim().min(1).max(50)).min(1).max(20),
  description: z.string().max(2000).default(''),
  date_recorded: z.string().date().optional(),
});

export type RecordToothEntry = z.infer<typeof recordToothEntrySchema>;

// --- Statistics Query ---

export const toothStatisticsQuerySchema = z.object({
  as_of: z.string().date().optional(),
});

export type ToothStatisticsQuery = z.infer<typeof toothStatisticsQuerySchema>;
