// ============================================================================
// Visit Record Ledger — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';

// --- Add Visit ---
// amount_paid accepts "125.50" or 125.5; precision and sign are checked by
// the ledger in cents.

export const createVisitSchema = z.object({
  visit_date: z.string().date().optional(),
  amount_paid: z.union([z.string().trim().min(1), z.number()]).default('0.00'),
  chief_complaint: z.string().max(2000).default(''),
  diagnosis: z.string().max(5000).default(''),
  treatment_performed: z.string().max(5000).default(''),
  advice: z.string().max(5000).default(''),
  affected_teeth: z.array(z.number().int()).max(32).default([]),
  tooth_findings: z
    .object({
      statuses: z.array(z.string().trim().min(1).max(50)).min(1).max(20),
    })
    .optional(),
});

export type CreateVisit = z.infer<typeof createVisitSchema>;

// --- Date Range Queries ---

export const visitDateRangeQuerySchema = z.object({
  from: z.string().date(),
  to: z.string().date(),
});

export type VisitDateRangeQuery = z.infer<typeof visitDateRangeQuerySchema>;

export const visitStatisticsQuerySchema = z.object({
  from: z.string().date().optional(),
  to: z.string().date().optional(),
});

export type VisitStatisticsQuery = z.infer<typeof visitStatisticsQuerySchema>;
