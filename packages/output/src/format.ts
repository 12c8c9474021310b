import type { Decimal } from 'decimal.js';
import { formatAmount } from '@payout-ledger/types';

export type DateFormat = 'iso' | 'us';

/** YYYY-MM-DD, or MM/DD/YYYY for `us`. */
export function formatDate(isoDate: string | null, format: DateFormat = 'iso'): string {
  if (isoDate === null || isoDate === '') {
    return '';
  }
  const day = isoDate.slice(0, 10);
  if (format === 'us') {
    const [year, month, date] = day.split('-');
    if (year !== undefined && month !== undefined && date !== undefined) {
      return `${month}/${date}/${year}`;
    }
  }
  return day;
}

/** Blank for null, two decimals otherwise. */
export function formatCell(amount: Decimal | null): string {
  return amount === null ? '' : formatAmount(amount);
}
