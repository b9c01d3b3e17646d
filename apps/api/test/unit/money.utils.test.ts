import { describe, it, expect } from 'vitest';
import { formatCents, normaliseAmount, parseAmountToCents, sumAmounts } from '@tooth-ledger/shared';

describe('parseAmountToCents', () => {
  it.each([
    ['0', 0],
    ['12', 1200],
    ['12.5', 1250],
    ['12.05', 1205],
    [' 99999999.99 ', 9999999999],
    [0.1, 10],
    [150.25, 15025],
  ])('parses %s', (input, cents) => {
    expect(parseAmountToCents(input)).toBe(cents);
  });

  it.each(['-1', '1.234', '1,50', '', 'abc', '.5'])('rejects %j', (input) => {
    expect(parseAmountToCents(input)).toBeNull();
  });

  it('rejects negative, fractional-cent and non-finite numbers', () => {
    expect(parseAmountToCents(-0.01)).toBeNull();
    expect(parseAmountToCents(1.005)).toBeNull();
    expect(parseAmountToCents(Number.NaN)).toBeNull();
  });
});

describe('formatCents / normaliseAmount', () => {
  it('renders two decimals', () => {
    expect(formatCents(0)).toBe('0.00');
    expect(formatCents(5)).toBe('0.05');
    expect(formatCents(12345)).toBe('123.45');
    expect(normaliseAmount('7.5')).toBe('7.50');
    expect(normaliseAmount('seven')).toBeNull();
  });
});

describe('sumAmounts', () => {
  it('adds in cents without float drift', () => {
    expect(sumAmounts(['0.10', '0.20'])).toBe('0.30');
    expect(sumAmounts(['100.10', 0.2, '50'])).toBe('150.30');
    expect(sumAmounts([])).toBe('0.00');
  });

  it('throws on an invalid stored amount', () => {
    expect(() => sumAmounts(['1.00', 'oops'])).toThrow('Invalid amount: oops');
  });
});
