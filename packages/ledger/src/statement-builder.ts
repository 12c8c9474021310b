import type { Decimal } from 'decimal.js';
import {
  BROUGHT_FORWARD,
  CARRIED_FORWARD,
  CLOSING_BALANCE_LABEL,
  NATURE_LABELS,
  OPENING_BALANCE_LABEL,
  ZERO,
  periodEndDate,
  periodStartDate,
  toIsoDate,
  type ClassifiedRecord,
  type CustomerSummary,
  type LedgerPosting,
  type LedgerRow,
  type ReconciliationPeriod,
  type Statement,
  type StatementCompany,
  type StatementWarning,
} from '@payout-ledger/types';
import { partyOf, postingsFor } from './classifier.js';
import { compareClassified } from './engine.js';
import { assertStatementIntegrity } from './integrity.js';

export interface BuildStatementInput {
  company: StatementCompany;
  period: ReconciliationPeriod;
  secondaryRecords?: readonly ClassifiedRecord[];
  warnings?: readonly StatementWarning[];
}

function descriptionOf(posting: LedgerPosting): string {
  const { record } = posting.source;
  if (posting.kind === 'fee') {
    return `Processing fee for ${record.id}`;
  }
  return record.description ?? '';
}

function postingRow(posting: LedgerPosting, balance: Decimal): LedgerRow {
  const isCredit = posting.amount.isNegative();
  return {
    kind: 'transaction',
    date: toIsoDate(posting.source.record.createdAt),
    nature: posting.nature,
    label: NATURE_LABELS[posting.nature],
    party: partyOf(posting),
    description: descriptionOf(posting),
    debit: isCredit ? null : posting.amount,
    credit: isCredit ? posting.amount.abs() : null,
    balance,
    recordId: posting.source.record.id,
  };
}

/**
 * Opening row, one row per posting in ledger order with a running balance,
 * a subtotal row, and the closing row.
 */
export function buildLedgerRows(period: ReconciliationPeriod): LedgerRow[] {
  const rows: LedgerRow[] = [
    {
      kind: 'opening',
      date: periodStartDate(period),
      nature: null,
      label: OPENING_BALANCE_LABEL,
      party: BROUGHT_FORWARD,
      description: '',
      debit: null,
      credit: null,
      balance: period.openingBalance,
      recordId: null,
    },
  ];

  let balance = period.openingBalance;
  let debits = ZERO;
  let credits = ZERO;

  const ordered = [...period.records].sort(compareClassified);
  for (const posting of ordered.flatMap(postingsFor)) {
    balance = balance.plus(posting.amount);
    const row = postingRow(posting, balance);
    debits = debits.plus(row.debit ?? ZERO);
    credits = credits.plus(row.credit ?? ZERO);
    rows.push(row);
  }

  const endDate = periodEndDate(period);
  rows.push(
    {
      kind: 'subtotal',
      date: endDate,
      nature: null,
      label: 'Subtotal',
      party: '',
      description: '',
      debit: debits,
      credit: credits,
      balance: null,
      recordId: null,
    },
    {
      kind: 'closing',
      date: endDate,
      nature: null,
      label: CLOSING_BALANCE_LABEL,
      party: CARRIED_FORWARD,
      description: '',
      debit: null,
      credit: null,
      balance,
      recordId: null,
    }
  );
  return rows;
}

/** Payments of the month by customer. */
export function buildCustomerSummary(records: readonly ClassifiedRecord[]): CustomerSummary {
  const rows = [...records]
    .filter((item) => item.tier === 'primary' && item.nature === 'payment')
    .sort(compareClassified)
    .map((item) => ({
      date: toIsoDate(item.record.createdAt),
      recordId: item.record.id,
      customerName: item.customer.name,
      email: item.customer.email,
      party: item.customer.party,
      amount: item.contribution,
    }));

  return {
    rows,
    total: rows.reduce<Decimal>((sum, row) => sum.plus(row.amount), ZERO),
  };
}

/**
 * Assemble a statement from a reconciled period. Throws
 * ReconciliationInconsistencyError if the ledger does not close at the
 * period's closing balance.
 */
export function buildStatement(input: BuildStatementInput): Statement {
  const ledgerRows = buildLedgerRows(input.period);
  const subtotal = ledgerRows.find((row) => row.kind === 'subtotal');

  const statement: Statement = {
    company: input.company,
    period: input.period,
    ledgerRows,
    totals: {
      debit: subtotal?.debit ?? ZERO,
      credit: subtotal?.credit ?? ZERO,
    },
    customerSummary: buildCustomerSummary(input.period.records),
    secondaryRecords: [...(input.secondaryRecords ?? [])].sort(compareClassified),
    warnings: input.warnings ?? [],
  };

  assertStatementIntegrity(statement);
  return statement;
}
