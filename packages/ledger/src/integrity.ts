/**
 * Statement integrity check
 *
 * opening + debits - credits = closing, and every running balance equals the
 * previous balance plus that row's debit minus its credit. Discrepancies are
 * reported, never corrected.
 */

import type { Decimal } from 'decimal.js';
import {
  ReconciliationInconsistencyError,
  ZERO,
  formatAmount,
  formatPeriod,
  type Statement,
} from '@payout-ledger/types';

export interface BalanceDiscrepancy {
  check: 'opening' | 'running' | 'closing';
  rowIndex: number | null;
  expected: Decimal;
  actual: Decimal;
  delta: Decimal;
  message: string;
}

export interface StatementIntegrityResult {
  statementId: string;
  isValid: boolean;
  balanceCheck: {
    passed: boolean;
    openingBalance: Decimal;
    totalDebits: Decimal;
    totalCredits: Decimal;
    calculatedClosing: Decimal;
    closingBalance: Decimal;
    delta: Decimal;
  };
  discrepancies: BalanceDiscrepancy[];
}

export function statementId(statement: Statement): string {
  return `${statement.company.code}-${formatPeriod(statement.period)}`;
}

function discrepancy(
  check: BalanceDiscrepancy['check'],
  rowIndex: number | null,
  expected: Decimal,
  actual: Decimal,
  message: string
): BalanceDiscrepancy {
  return { check, rowIndex, expected, actual, delta: actual.minus(expected), message };
}

export function checkStatementIntegrity(statement: Statement): StatementIntegrityResult {
  const { period, ledgerRows } = statement;
  const discrepancies: BalanceDiscrepancy[] = [];

  const opening = ledgerRows[0];
  const openingBalance = opening?.balance ?? ZERO;
  if (opening?.kind !== 'opening' || !openingBalance.equals(period.openingBalance)) {
    discrepancies.push(
      discrepancy(
        'opening',
        0,
        period.openingBalance,
        openingBalance,
        `Opening row shows ${formatAmount(openingBalance)}, period opens at ${formatAmount(period.openingBalance)}`
      )
    );
  }

  let running = openingBalance;
  let totalDebits = ZERO;
  let totalCredits = ZERO;
  ledgerRows.forEach((row, index) => {
    if (row.kind !== 'transaction') return;
    totalDebits = totalDebits.plus(row.debit ?? ZERO);
    totalCredits = totalCredits.plus(row.credit ?? ZERO);
    running = running.plus(row.debit ?? ZERO).minus(row.credit ?? ZERO);
    if (row.balance === null || !row.balance.equals(running)) {
      discrepancies.push(
        discrepancy(
          'running',
          index,
          running,
          row.balance ?? ZERO,
          `Row ${index} (${row.recordId ?? row.label}) shows balance ${row.balance === null ? 'none' : formatAmount(row.balance)}, expected ${formatAmount(running)}`
        )
      );
      running = row.balance ?? running;
    }
  });

  const calculatedClosing = openingBalance.plus(totalDebits).minus(totalCredits);
  const closingRow = ledgerRows[ledgerRows.length - 1];
  const closingBalance = closingRow?.kind === 'closing' && closingRow.balance !== null ? closingRow.balance : ZERO;
  const balancePassed =
    calculatedClosing.equals(closingBalance) && closingBalance.equals(period.closingBalance);

  if (!balancePassed) {
    discrepancies.push(
      discrepancy(
        'closing',
        closingRow === undefined ? null : ledgerRows.length - 1,
        period.closingBalance,
        calculatedClosing,
        `Balance mismatch: ${formatAmount(openingBalance)} + ${formatAmount(totalDebits)} - ${formatAmount(totalCredits)} = ${formatAmount(calculatedClosing)}, but period closes at ${formatAmount(period.closingBalance)}`
      )
    );
  }

  return {
    statementId: statementId(statement),
    isValid: discrepancies.length === 0,
    balanceCheck: {
      passed: balancePassed,
      openingBalance,
      totalDebits,
      totalCredits,
      calculatedClosing,
      closingBalance,
      delta: calculatedClosing.minus(period.closingBalance),
    },
    discrepancies,
  };
}

export function assertStatementIntegrity(statement: Statement): void {
  const result = checkStatementIntegrity(statement);
  const first = result.discrepancies[0];
  if (first !== undefined) {
    throw new ReconciliationInconsistencyError(
      formatAmount(first.expected),
      formatAmount(first.actual),
      `${result.statementId}: ${first.message}`
    );
  }
}
