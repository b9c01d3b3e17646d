// ============================================================================
// Status Registry — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  STATUS_CATEGORIES,
  STATUS_CODE_PATTERN,
  STATUS_COLOR_PATTERN,
} from '../constants/status.constants.js';

// --- Status Code Parameter ---

export const statusCodeParamSchema = z.object({
  code: z.string().trim().min(1).max(50),
});

export type StatusCodeParam = z.infer<typeof statusCodeParamSchema>;

// --- Status Lookup Query ---
// describe=true also answers for inactive and unknown codes.

export const statusLookupQuerySchema = z.object({
  describe: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export type StatusLookupQuery = z.infer<typeof statusLookupQuerySchema>;

// --- Register Custom Status ---

export const createCustomStatusSchema = z.object({
  code: z
    .string()
    .trim()
    .toLowerCase()
    .regex(STATUS_CODE_PATTERN, 'Use lower-case letters, digits and underscores'),
  display_name: z.string().trim().min(1).max(100),
  color: z.string().regex(STATUS_COLOR_PATTERN, 'Colour must be #RRGGBB'),
  category: z.enum(STATUS_CATEGORIES).optional(),
});

export type CreateCustomStatus = z.infer<typeof createCustomStatusSchema>;

// --- Update Custom Status ---

export const updateCustomStatusSchema = z
  .object({
    display_name: z.string().trim().min(1).max(100).optional(),
    color: z.string().regex(STATUS_COLOR_PATTERN, 'Colour must be #RRGGBB').optional(),
    category: z.enum(STATUS_CATEGORIES).optional(),
  })
  .refine((body) => Object.values(body).some((v) => v !== undefined), {
    message: 'At least one field must be provided',
  });

export type UpdateCustomStatus = z.infer<typeof updateCustomStatusSchema>;

// --- Activate / Deactivate Custom Status ---

export const setStatusActiveSchema = z.object({
  is_active: z.boolean(),
});

export type SetStatusActive = z.infer<typeof setStatusActiveSchema>;
