// ============================================================================
// Tooth History — Constants
// ============================================================================

// --- Record Types ---
// The two observation streams. Entries of one type never feed reads of the other.

export const RecordType = {
  PATIENT_PROBLEM: 'patient_problem',
  DOCTOR_FINDING: 'doctor_finding',
} as const;

export type RecordType = (typeof RecordType)[keyof typeof RecordType];

export const RECORD_TYPES = [
  RecordType.PATIENT_PROBLEM,
  RecordType.DOCTOR_FINDING,
] as const;

// --- Quadrants (FDI) ---

export const Quadrant = {
  UPPER_RIGHT: 1,
  UPPER_LEFT: 2,
  LOWER_LEFT: 3,
  LOWER_RIGHT: 4,
} as const;

export type Quadrant = (typeof Quadrant)[keyof typeof Quadrant];

export const QUADRANT_LABELS: Readonly<Record<Quadrant, string>> = Object.freeze({
  1: 'Upper Right',
  2: 'Upper Left',
  3: 'Lower Left',
  4: 'Lower Right',
});

export const TEETH_PER_QUADRANT = 8;

// --- Permanent dentition, FDI two-digit codes ---
// 11–18, 21–28, 31–38, 41–48 in chart order.

export const TOOTH_NUMBERS: readonly number[] = Object.freeze(
  [Quadrant.UPPER_RIGHT, Quadrant.UPPER_LEFT, Quadrant.LOWER_LEFT, Quadrant.LOWER_RIGHT].flatMap(
    (quadrant) =>
      Array.from({ length: TEETH_PER_QUADRANT }, (_, i) => quadrant * 10 + i + 1),
  ),
);

// --- History statistics window ---

export const RECENT_HISTORY_WINDOW_DAYS = 30;
