// ============================================================================
// Money — Decimal Amount Utilities
// ============================================================================

// Amounts travel as decimal strings ("125.50") and are summed as integer
// cents. Floating point is never used for arithmetic on stored amounts.

const AMOUNT_PATTERN = /^(\d{1,8})(?:\.(\d{1,2}))?$/;

/**
 * Parses a non-negative amount with at most two decimals into cents.
 * Returns null for negative, malformed or over-precise input.
 */
export function parseAmountToCents(value: string | number): number | null {
  const text = typeof value === 'number' ? numberToAmountText(value) : value.trim();
  if (text === null) return null;

  const match = AMOUNT_PATTERN.exec(text);
  if (!match) return null;

  const whole = Number(match[1]);
  const fraction = (match[2] ?? '').padEnd(2, '0');
  return whole * 100 + Number(fraction);
}

function numberToAmountText(value: number): string | null {
  if (!Number.isFinite(value) || value < 0) return null;
  const cents = Math.round(value * 100);
  if (Math.abs(value * 100 - cents) > 1e-6) return null;
  return formatCents(cents);
}

/**
 * 12345 → "123.45"
 */
export function formatCents(cents: number): string {
  const whole = Math.floor(cents / 100);
  const fraction = String(cents % 100).padStart(2, '0');
  return `${whole}.${fraction}`;
}

/**
 * Normalises a stored amount ("12.5", "12.50", 12.5) to "12.50".
 */
export function normaliseAmount(value: string | number): string | null {
  const cents = parseAmountToCents(value);
  return cents === null ? null : formatCents(cents);
}

export function sumAmounts(values: ReadonlyArray<string | number>): string {
  let total = 0;
  for (const value of values) {
    const cents = parseAmountToCents(value);
    if (cents === null) {
      throw new RangeError(`Invalid amount: ${String(value)}`);
    }
    total += cents;
  }
  return formatCents(total);
}
