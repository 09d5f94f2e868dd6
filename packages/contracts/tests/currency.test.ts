import { describe, expect, it } from 'vitest';
import { formatBrazilianCurrency, tryFormatBrazilianCurrency } from '../src/index.js';

describe('formatBrazilianCurrency', () => {
  it('uses "." for thousands and "," for decimals', () => {
    expect(formatBrazilianCurrency(1234567.89)).toBe('1.234.567,89');
    expect(formatBrazilianCurrency(0.5)).toBe('0,50');
    expect(formatBrazilianCurrency(999)).toBe('999,00');
    expect(formatBrazilianCurrency(1000)).toBe('1.000,00');
    expect(formatBrazilianCurrency(-1234.5)).toBe('-1.234,50');
  });

  it('rounds exact half cents to the even cent', () => {
    expect(formatBrazilianCurrency(0.125)).toBe('0,12');
    expect(formatBrazilianCurrency(0.375)).toBe('0,38');
    expect(formatBrazilianCurrency(1.625)).toBe('1,62');
    expect(formatBrazilianCurrency(-2.875)).toBe('-2,88');
    expect(formatBrazilianCurrency(0.126)).toBe('0,13');
  });

  it('groups very large amounts without exponent notation', () => {
    expect(formatBrazilianCurrency(1e21)).toBe('1.000.000.000.000.000.000.000,00');
  });
});

describe('tryFormatBrazilianCurrency', () => {
  it('formats numbers and plain decimal strings', () => {
    expect(tryFormatBrazilianCurrency(1234567.89)).toEqual({ formatted: true, value: '1.234.567,89' });
    expect(tryFormatBrazilianCurrency('25000.1')).toEqual({ formatted: true, value: '25.000,10' });
  });

  it('keeps values already in Brazilian notation', () => {
    expect(tryFormatBrazilianCurrency('1.234.567,89')).toEqual({ formatted: true, value: '1.234.567,89' });
  });

  it('maps missing values to null', () => {
    expect(tryFormatBrazilianCurrency(null)).toEqual({ formatted: true, value: null });
    expect(tryFormatBrazilianCurrency(undefined)).toEqual({ formatted: true, value: null });
  });

  it('leaves other values untouched', () => {
    expect(tryFormatBrazilianCurrency('sem valor')).toEqual({ formatted: false, value: 'sem valor' });
    expect(tryFormatBrazilianCurrency(Number.NaN)).toEqual({ formatted: false, value: Number.NaN });
  });
});
