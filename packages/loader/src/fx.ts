import type { Decimal } from 'decimal.js';
import { RowParseError } from '@payout-ledger/types';

/** Units of reporting currency per unit of the keyed currency. */
export type FxRates = ReadonlyMap<string, Decimal>;

export function convertToReporting(
  amount: Decimal,
  fromCurrency: string,
  reportingCurrency: string,
  rates: FxRates
): Decimal {
  if (fromCurrency === reportingCurrency) {
    return amount;
  }
  const rate = rates.get(fromCurrency);
  if (rate === undefined) {
    throw new RowParseError(
      `No conversion rate from ${fromCurrency} to ${reportingCurrency}; set LEDGER_FX_RATES`
    );
  }
  return amount.times(rate);
}
