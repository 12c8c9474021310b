import { describe, it, expect } from 'vitest';
import { Decimal } from 'decimal.js';
import {
  parseAmount,
  parseOptionalAmount,
  roundToCents,
  formatAmount,
  formatCurrency,
  sumAmounts,
} from '@payout-ledger/types';

describe('parseAmount', () => {
  it('should parse positive amounts exactly', () => {
    expect(parseAmount('100.00').toFixed(2)).toBe('100.00');
    expect(parseAmount('1,234.56').toFixed(2)).toBe('1234.56');
    expect(parseAmount('$99.99').toFixed(2)).toBe('99.99');
    expect(parseAmount('HK$2,685.87').toFixed(2)).toBe('2685.87');
  });

  it('should parse negative amounts', () => {
    expect(parseAmount('-100.00').toFixed(2)).toBe('-100.00');
    expect(parseAmount('(50.00)').toFixed(2)).toBe('-50.00');
    expect(parseAmount('-$1,234.56').toFixed(2)).toBe('-1234.56');
  });

  it('should handle whitespace', () => {
    expect(parseAmount(' 100.00 ').toFixed(2)).toBe('100.00');
    expect(parseAmount('$ 50.00').toFixed(2)).toBe('50.00');
  });

  it('should keep sums free of binary rounding', () => {
    expect(parseAmount('0.1').plus(parseAmount('0.2')).toString()).toBe('0.3');
  });

  it('should throw on invalid input', () => {
    expect(() => parseAmount('invalid')).toThrow('Unable to parse amount');
    expect(() => parseAmount('')).toThrow('Unable to parse amount');
    expect(() => parseAmount('1.2.3')).toThrow('Unable to parse amount');
  });
});

describe('parseOptionalAmount', () => {
  it('should read blank cells as zero', () => {
    expect(parseOptionalAmount('').isZero()).toBe(true);
    expect(parseOptionalAmount('  ').isZero()).toBe(true);
    expect(parseOptionalAmount('3.55').toFixed(2)).toBe('3.55');
  });
});

describe('roundToCents', () => {
  it('should round half up', () => {
    expect(roundToCents(new Decimal('100.455')).toFixed(2)).toBe('100.46');
    expect(roundToCents(new Decimal('100.454')).toFixed(2)).toBe('100.45');
    expect(roundToCents(new Decimal('-0.005')).toFixed(2)).toBe('-0.01');
  });
});

describe('formatAmount', () => {
  it('should always print two decimals', () => {
    expect(formatAmount(new Decimal('554.77'))).toBe('554.77');
    expect(formatAmount(new Decimal('12'))).toBe('12.00');
    expect(formatAmount(new Decimal('-103.44'))).toBe('-103.44');
  });
});

describe('formatCurrency', () => {
  it('should format with symbol and grouping', () => {
    expect(formatCurrency(new Decimal('2636.78'), 'HKD')).toBe('HK$2,636.78');
    expect(formatCurrency(new Decimal('100'), 'USD')).toBe('US$100.00');
  });

  it('should put the sign before the symbol', () => {
    expect(formatCurrency(new Decimal('-1234567.5'), 'HKD')).toBe('-HK$1,234,567.50');
  });

  it('should fall back to the currency code', () => {
    expect(formatCurrency(new Decimal('5'), 'SGD')).toBe('SGD 5.00');
  });
});

describe('sumAmounts', () => {
  it('should sum exactly', () => {
    const amounts = ['2685.87', '-103.44', '54.35'].map((v) => new Decimal(v));
    expect(sumAmounts(amounts).toFixed(2)).toBe('2636.78');
  });

  it('should return zero for an empty list', () => {
    expect(sumAmounts([]).isZero()).toBe(true);
  });
});
