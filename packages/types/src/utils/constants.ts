export const LEDGER_VERSION = '0.1.0';

export const DEFAULT_REPORTING_CURRENCY = 'HKD';

/** Counterparty shown on processing-fee postings. */
export const PROCESSOR_NAME = 'Stripe';

export const PAYOUT_PARTY = 'Bank transfer';

export const OPENING_BALANCE_LABEL = 'Opening Balance';
export const CLOSING_BALANCE_LABEL = 'Closing Balance';
export const BROUGHT_FORWARD = 'Brought Forward';
export const CARRIED_FORWARD = 'Carried Forward';

export const NATURE_LABELS = {
  payment: 'Payment',
  refund: 'Refund',
  payout: 'Payout',
  processing_fee: 'Processing Fee',
  adjustment: 'Adjustment',
} as const;

/** Working-directory folders searched for exports, in priority order. */
export const DATA_ROOT_CONVENTIONS = ['csv_data', 'complete_csv', 'new_csv'] as const;

export const BACKUP_FILE_SUFFIX = '_backup.csv';
