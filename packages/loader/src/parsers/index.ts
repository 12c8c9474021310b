import type { KnownCsvShape } from '@payout-ledger/types';
import type { RowParser } from './common.js';
import { parseUnifiedPaymentRow } from './unified-payments.js';
import { parseBalanceHistoryRow } from './balance-history.js';
import { parseItemisedActivityRow } from './itemised-activity.js';

export const ROW_PARSERS: Readonly<Record<KnownCsvShape, RowParser>> = {
  unified_payments: parseUnifiedPaymentRow,
  balance_history: parseBalanceHistoryRow,
  itemised_balance_activity: parseItemisedActivityRow,
};

export { parseUnifiedPaymentRow, parseBalanceHistoryRow, parseItemisedActivityRow };
export type { ParseContext, RowParser } from './common.js';
