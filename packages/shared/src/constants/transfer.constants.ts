// ============================================================================
// Import / Export — Constants
// ============================================================================

// --- Flat Row Kinds ---
// Import applies rows in this order regardless of their position in the file.

export const FlatRowKind = {
  PATIENT: 'patient',
  EXAMINATION: 'examination',
  TOOTH_HISTORY: 'tooth_history',
  VISIT: 'visit',
} as const;

export type FlatRowKind = (typeof FlatRowKind)[keyof typeof FlatRowKind];

export const FLAT_ROW_KIND_ORDER: readonly FlatRowKind[] = Object.freeze([
  FlatRowKind.PATIENT,
  FlatRowKind.EXAMINATION,
  FlatRowKind.TOOTH_HISTORY,
  FlatRowKind.VISIT,
]);

// --- Flat Export Columns ---

export const FLAT_EXPORT_COLUMNS = [
  'kind',
  'phone',
  'full_name',
  'email',
  'address',
  'date_of_birth',
  'examination_ref',
  'examination_date',
  'chief_complaint',
  'findings',
  'diagnosis',
  'treatment_plan',
  'notes',
  'tooth_number',
  'record_type',
  'statuses',
  'description',
  'date_recorded',
  'visit_date',
  'amount_paid',
  'treatment_performed',
  'advice',
  'affected_teeth',
] as const;

export type FlatExportColumn = (typeof FLAT_EXPORT_COLUMNS)[number];

/** Separator for list values (statuses, affected teeth) inside one cell. */
export const LIST_SEPARATOR = '|';

// --- Import header aliases ---
// Lower-cased, trimmed header → canonical column. Covers the column names of
// older patient-only exports ("Phone Number", "Name", ...).

export const IMPORT_COLUMN_ALIASES: ReadonlyMap<string, FlatExportColumn> = new Map<
  string,
  FlatExportColumn
>([
  ['phone number', 'phone'],
  ['phone_number', 'phone'],
  ['telephone', 'phone'],
  ['name', 'full_name'],
  ['full name', 'full_name'],
  ['patient name', 'full_name'],
  ['email address', 'email'],
  ['dob', 'date_of_birth'],
  ['date of birth', 'date_of_birth'],
  ['birth_date', 'date_of_birth'],
  ['exam_ref', 'examination_ref'],
  ['exam_date', 'examination_date'],
  ['tooth', 'tooth_number'],
  ['status', 'statuses'],
  ['amount', 'amount_paid'],
]);

export const EXPORT_FILE_PREFIX = 'tooth-ledger-export';
