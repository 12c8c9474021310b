import { Decimal } from 'decimal.js';

export const ZERO = new Decimal(0);

const AMOUNT_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse a CSV amount into an exact decimal. Accepts thousands separators,
 * a leading currency symbol, a leading minus sign, and accounting-style
 * parentheses for negatives.
 */
export function parseAmount(amountStr: string): Decimal {
  let body = amountStr.trim();
  let isNegative = false;

  if (body.startsWith('(') && body.endsWith(')')) {
    isNegative = true;
    body = body.slice(1, -1).trim();
  }
  if (body.startsWith('-') || body.startsWith('+')) {
    isNegative = isNegative || body.startsWith('-');
    body = body.slice(1);
  }

  const digits = body.replace(/^(HK|US|CN)?\$/i, '').replace(/[,\s]/g, '');
  if (!AMOUNT_PATTERN.test(digits)) {
    throw new Error(`Unable to parse amount: "${amountStr}"`);
  }

  const value = new Decimal(digits);
  return isNegative ? value.neg() : value;
}

/** Blank cells read as zero. */
export function parseOptionalAmount(amountStr: string): Decimal {
  return amountStr.trim() === '' ? ZERO : parseAmount(amountStr);
}

export function roundToCents(amount: Decimal): Decimal {
  return amount.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

/** Fixed two-decimal string, no grouping: `-1234.50`. */
export function formatAmount(amount: Decimal): string {
  return roundToCents(amount).toFixed(2);
}

const CURRENCY_SYMBOLS: Readonly<Record<string, string>> = {
  HKD: 'HK$',
  USD: 'US$',
  CNY: 'CN¥',
  EUR: '€',
  GBP: '£',
};

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/** Display form with symbol and grouping: `-HK$1,234.50`. */
export function formatCurrency(amount: Decimal, currency: string): string {
  const rounded = roundToCents(amount);
  const [whole = '0', cents = '00'] = rounded.abs().toFixed(2).split('.');
  const symbol = CURRENCY_SYMBOLS[currency] ?? `${currency} `;
  const sign = rounded.isNegative() && !rounded.isZero() ? '-' : '';
  return `${sign}${symbol}${groupThousands(whole)}.${cents}`;
}

export function sumAmounts(amounts: readonly Decimal[]): Decimal {
  return amounts.reduce<Decimal>((sum, amt) => sum.plus(amt), ZERO);
}
