// ============================================================================
// Examination Manager — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';

// --- Examination Parameters ---

export const examinationParamsSchema = z.object({
  patientId: z.coerce.number().int().positive(),
  examinationId: z.coerce.number().int().positive(),
});

export type ExaminationParams = z.infer<typeof examinationParamsSchema>;

// --- Create Examination ---
// Every descriptive field is optional here; the service rejects a record
// with nothing in it.

export const createExaminationSchema = z.object({
  examination_date: z.string().date().optional(),
  chief_complaint: z.string().max(2000).default(''),
  findings: z.string().max(5000).default(''),
  diagnosis: z.string().max(5000).default(''),
  treatment_plan: z.string().max(5000).default(''),
  notes: z.string().max(5000).default(''),
});

export type CreateExamination = z.infer<typeof createExaminationSchema>;

// --- Update Examination ---

export const updateExaminationSchema = z
  .object({
    examination_date: z.string().date().optional(),
    chief_complaint: z.string().max(2000).optional(),
    findings: z.string().max(5000).optional(),
    diagnosis: z.string().max(5000).optional(),
    treatment_plan: z.string().max(5000).optional(),
    notes: z.string().max(5000).optional(),
  })
  .refine((body) => Object.values(body).some((v) => v !== undefined), {
    message: 'At least one field must be provided',
  });

export type UpdateExamination = z.infer<typeof updateExaminationSchema>;

// --- Statistics Query ---

export const examinationStatisticsQuerySchema = z.object({
  as_of: z.string().date().optional(),
});

export type ExaminationStatisticsQuery = z.infer<typeof examinationStatisticsQuerySchema>;
