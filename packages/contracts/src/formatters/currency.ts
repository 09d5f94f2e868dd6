/**
 * Brazilian currency notation: "." for thousands, "," for decimals,
 * always two decimal places.
 */

const PLAIN_DECIMAL = /^-?\d+(?:\.\d+)?$/;
const BRAZILIAN_NOTATION = /^-?\d{1,3}(?:\.\d{3})*,\d{2}$/;

export type CurrencyFormatResult =
  | { formatted: true; value: string | null }
  | { formatted: false; value: unknown };

/**
 * Integer and cent digits of a non-negative amount, rounded half to even.
 *
 * A double sits exactly halfway between two cents only when it is an odd
 * number of eighths (x.125, x.375, ...); toFixed rounds those up, so they
 * are settled here with BigInt arithmetic. Amounts from 1e21 up are whole
 * numbers that toFixed would print in exponent form.
 */
function splitCents(abs: number): [string, string] {
  if (abs >= 1e21) {
    return [BigInt(abs).toString(), '00'];
  }

  const eighths = abs * 8;
  if (Number.isInteger(eighths) && eighths % 2 === 1) {
    const lower = (BigInt(eighths) * 25n - 1n) / 2n;
    const cents = lower % 2n === 0n ? lower : lower + 1n;
    return [(cents / 100n).toString(), (cents % 100n).toString().padStart(2, '0')];
  }

  const [integerPart = '0', fractionPart = '00'] = abs.toFixed(2).split('.');
  return [integerPart, fractionPart];
}

/**
 * Format a number, e.g. 1234567.89 -> "1.234.567,89", 0.5 -> "0,50"
 */
export function formatBrazilianCurrency(amount: number): string {
  const [integerPart, fractionPart] = splitCents(Math.abs(amount));
  const grouped = integerPart.replace(/\B(?=(\d{3})+(?!\d))/g, '.');
  const sign = amount < 0 ? '-' : '';
  return `${sign}${grouped},${fractionPart}`;
}

/**
 * Format a cell value. Numbers and plain-decimal strings are formatted,
 * null/undefined become null and values already in Brazilian notation are
 * kept. Anything else comes back unchanged with `formatted: false`.
 */
export function tryFormatBrazilianCurrency(value: unknown): CurrencyFormatResult {
  if (value === null || value === undefined) {
    return { formatted: true, value: null };
  }

  if (typeof value === 'number') {
    return Number.isFinite(value)
      ? { formatted: true, value: formatBrazilianCurrency(value) }
      : { formatted: false, value };
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (PLAIN_DECIMAL.test(trimmed)) {
      return { formatted: true, value: formatBrazilianCurrency(Number(trimmed)) };
    }
    if (BRAZILIAN_NOTATION.test(trimmed)) {
      return { formatted: true, value: trimmed };
    }
  }

  return { formatted: false, value };
}
