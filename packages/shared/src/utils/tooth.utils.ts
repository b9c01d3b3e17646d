// ============================================================================
// Tooth Numbering — FDI Utilities
// ============================================================================

import {
  QUADRANT_LABELS,
  TEETH_PER_QUADRANT,
  type Quadrant,
} from '../constants/tooth.constants.js';

/**
 * True for the 32 permanent FDI codes (11–18, 21–28, 31–38, 41–48).
 */
export function isValidToothNumber(toothNumber: number): boolean {
  if (!Number.isInteger(toothNumber)) return false;
  const quadrant = Math.floor(toothNumber / 10);
  const position = toothNumber % 10;
  return (
    quadrant >= 1 &&
    quadrant <= 4 &&
    position >= 1 &&
    position <= TEETH_PER_QUADRANT
  );
}

export function toothQuadrant(toothNumber: number): Quadrant | null {
  if (!isValidToothNumber(toothNumber)) return null;
  const quadrant = Math.floor(toothNumber / 10);
  switch (quadrant) {
    case 1:
    case 2:
    case 3:
    case 4:
      return quadrant;
    default:
      return null;
  }
}

/**
 * Display form "quadrant.position", e.g. 11 → "1.1", 48 → "4.8".
 * Invalid codes are returned unchanged as a string.
 */
export function formatToothNumber(toothNumber: number): string {
  if (!isValidToothNumber(toothNumber)) return String(toothNumber);
  return `${Math.floor(toothNumber / 10)}.${toothNumber % 10}`;
}

export function describeTooth(toothNumber: number): string {
  const quadrant = toothQuadrant(toothNumber);
  if (quadrant === null) return `Tooth ${toothNumber}`;
  return `${QUADRANT_LABELS[quadrant]} ${formatToothNumber(toothNumber)}`;
}

/**
 * Accepts the two-digit code ("21") or the display form ("2.1").
 * Returns null when the input is not a valid permanent tooth.
 */
export function parseToothNumber(input: string | number): number | null {
  if (typeof input === 'number') {
    return isValidToothNumber(input) ? input : null;
  }

  const trimmed = input.trim();
  let candidate: number;

  const dotted = /^([1-4])\.([1-8])$/.exec(trimmed);
  if (dotted) {
    candidate = Number(dotted[1]) * 10 + Number(dotted[2]);
  } else if (/^\d{2}$/.test(trimmed)) {
    candidate = Number(trimmed);
  } else {
    return null;
  }

  return isValidToothNumber(candidate) ? candidate : null;
}

/**
 * Sorted, de-duplicated copy of a tooth list.
 */
export function normaliseToothList(teeth: readonly number[]): number[] {
  return [...new Set(teeth)].sort((a, b) => a - b);
}
