import { describe, it, expect } from 'vitest';
import {
  TOOTH_NUMBERS,
  describeTooth,
  formatToothNumber,
  isValidToothNumber,
  normaliseToothList,
  parseToothNumber,
  toothQuadrant,
} from '@tooth-ledger/shared';

describe('isValidToothNumber', () => {
  it('accepts exactly the 32 permanent FDI codes', () => {
    const valid = Array.from({ length: 100 }, (_, n) => n).filter(isValidToothNumber);
    expect(valid).toEqual([...TOOTH_NUMBERS]);
    expect(valid).toHaveLength(32);
  });

  it('rejects deciduous codes and non-integers', () => {
    expect(isValidToothNumber(51)).toBe(false);
    expect(isValidToothNumber(19)).toBe(false);
    expect(isValidToothNumber(11.5)).toBe(false);
  });
});

describe('TOOTH_NUMBERS', () => {
  it('runs quadrant by quadrant in chart order', () => {
    expect(TOOTH_NUMBERS.slice(0, 9)).toEqual([11, 12, 13, 14, 15, 16, 17, 18, 21]);
    expect(TOOTH_NUMBERS[31]).toBe(48);
  });
});

describe('formatToothNumber', () => {
  it('renders quadrant.position', () => {
    expect(formatToothNumber(11)).toBe('1.1');
    expect(formatToothNumber(48)).toBe('4.8');
  });

  it('returns invalid codes unchanged', () => {
    expect(formatToothNumber(99)).toBe('99');
  });
});

describe('toothQuadrant / describeTooth', () => {
  it('names the quadrant', () => {
    expect(toothQuadrant(26)).toBe(2);
    expect(describeTooth(26)).toBe('Upper Left 2.6');
    expect(describeTooth(41)).toBe('Lower Right 4.1');
  });

  it('falls back for invalid codes', () => {
    expect(toothQuadrant(60)).toBeNull();
    expect(describeTooth(60)).toBe('Tooth 60');
  });
});

describe('parseToothNumber', () => {
  it('accepts the two-digit and dotted forms', () => {
    expect(parseToothNumber('21')).toBe(21);
    expect(parseToothNumber(' 2.1 ')).toBe(21);
    expect(parseToothNumber(37)).toBe(37);
  });

  it('returns null for anything else', () => {
    expect(parseToothNumber('2.9')).toBeNull();
    expect(parseToothNumber('19')).toBeNull();
    expect(parseToothNumber('tooth 11')).toBeNull();
    expect(parseToothNumber(5)).toBeNull();
  });
});

describe('normaliseToothList', () => {
  it('sorts and removes repeats', () => {
    expect(normaliseToothList([36, 11, 36, 21])).toEqual([11, 21, 36]);
  });
});
