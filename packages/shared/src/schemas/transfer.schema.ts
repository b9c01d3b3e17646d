// ============================================================================
// Import / Export — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { type FlatExportColumn } from '../constants/transfer.constants.js';

// --- Import Request ---

export const importCsvSchema = z.object({
  content: z.string().min(1).max(20_000_000),
});

export type ImportCsv = z.infer<typeof importCsvSchema>;

// --- Flat Row ---
// One cell per export column; blanks are empty strings.

export type FlatRow = Record<FlatExportColumn, string>;
