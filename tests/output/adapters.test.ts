import { describe, it, expect } from 'vitest';
import { validateOutput } from '@payout-ledger/types';
import {
  renderBalanceSummary,
  renderFeeSummary,
  renderPayoutReport,
  renderStatement,
  toBalanceSummaryJson,
  toFeeSummaryJson,
  toPayoutReportJson,
  toStatementJson,
} from '@payout-ledger/output';
import { sampleBalanceSummary, sampleFeeSummary, sampleReport, sampleStatement } from '../helpers/statements.js';

describe('toStatementJson', () => {
  const json = toStatementJson(sampleStatement());

  it('should convert amounts to two-decimal strings', () => {
    expect(json.schemaVersion).toBe('statement.v1');
    expect(json.period).toEqual({ year: 2025, month: 7, label: '2025-07' });
    expect(json.openingBalance).toBe('10.00');
    expect(json.closingBalance).toBe('57.00');
    expect(json.totals).toEqual({
      grossActivity: '100.00',
      feeActivity: '3.00',
      netActivity: '97.00',
      adjustments: '0.00',
      payouts: '50.00',
      debit: '100.00',
      credit: '53.00',
    });
    expect(json.ledgerRows[1]).toEqual({
      kind: 'transaction',
      date: '2025-07-02',
      nature: 'payment',
      label: 'Payment',
      party: 'alice@example.com',
      description: 'Workshop, "Level 2"',
      debit: '100.00',
      credit: null,
      balance: '110.00',
      recordId: 'ch_1',
    });
  });

  it('should satisfy the published schema', () => {
    expect(validateOutput('statement.v1', json)).toEqual({ valid: true, errors: [] });
  });
});

describe('toPayoutReportJson', () => {
  const json = toPayoutReportJson(sampleReport());

  it('should convert sections', () => {
    expect(json.payoutReconciliation.charges).toEqual({
      count: 1,
      grossAmount: '100.00',
      fees: '-3.00',
      netAmount: '97.00',
    });
    expect(json.payoutReconciliation.totalPaidOut).toBe('97.00');
    expect(json.endingBalanceReconciliation.endingBalance).toBe('0.00');
    expect(json.payoutTransactions.map((t) => t.id)).toEqual(['ch_1']);
    expect(json.endingBalanceTransactions).toEqual([]);
  });

  it('should satisfy the published schema', () => {
    expect(validateOutput('payout-report.v1', json).valid).toBe(true);
  });
});

describe('toFeeSummaryJson', () => {
  const json = toFeeSummaryJson(sampleFeeSummary());

  it('should convert every bucket', () => {
    const charge = { count: 1, amount: '100.00', fee: '3.00', net: '97.00' };
    const none = { count: 0, amount: '0.00', fee: '0.00', net: '0.00' };

    expect(json.range).toEqual({ from: '2025-07-01', to: '2025-07-31' });
    expect(json.total).toEqual(charge);
    expect(json.byCategory).toEqual({ Conference: none, Subscription: none, Other: charge });
    expect(json.bySource).toEqual({ unified_payments: charge, balance_history: none, itemised_balance_activity: none });
    expect(json.byCompany).toEqual([
      { company: 'cgge', ...charge, byCategory: { Conference: none, Subscription: none, Other: charge } },
    ]);
  });

  it('should satisfy the published schema', () => {
    expect(validateOutput('fee-summary.v1', json)).toEqual({ valid: true, errors: [] });
  });
});

describe('toBalanceSummaryJson', () => {
  const json = toBalanceSummaryJson(sampleBalanceSummary());

  it('should lay out the balance movement', () => {
    expect(json).toMatchObject({
      schemaVersion: 'balance-summary.v1',
      range: { from: '2025-07-01', to: '2025-07-31' },
      startDay: 1,
      endDay: 31,
      startingBalance: '10.00',
      startingBalanceSource: 'carried-forward',
      activity: {
        chargeCount: 1,
        refundCount: 0,
        charges: '100.00',
        refunds: '0.00',
        gross: '100.00',
        fee: '-3.00',
        net: '97.00',
      },
      adjustments: { count: 0, amount: '0.00' },
      payouts: { count: 1, gross: '-50.00', fee: '0.00', net: '-50.00' },
      endingBalance: '57.00',
    });
  });

  it('should satisfy the published schema', () => {
    expect(validateOutput('balance-summary.v1', json)).toEqual({ valid: true, errors: [] });
  });
});

describe('render', () => {
  it('should render summaries in every format', async () => {
    const fees = await renderFeeSummary(sampleFeeSummary(), 'json');
    const balance = await renderBalanceSummary(sampleBalanceSummary(), 'html');
    const balancePdf = await renderBalanceSummary(sampleBalanceSummary(), 'pdf');

    expect(JSON.parse(String(fees.body))).toMatchObject({ schemaVersion: 'fee-summary.v1' });
    expect(balance.contentType).toBe('text/html; charset=utf-8');
    expect(Buffer.isBuffer(balancePdf.body)).toBe(true);
  });

  it('should pick the content type by format', async () => {
    const csv = await renderStatement(sampleStatement(), 'csv');
    const pdf = await renderPayoutReport(sampleReport(), 'pdf');
    const json = await renderPayoutReport(sampleReport(), 'json');

    expect(csv.contentType).toBe('text/csv; charset=utf-8');
    expect(pdf.contentType).toBe('application/pdf');
    expect(Buffer.isBuffer(pdf.body)).toBe(true);
    expect(JSON.parse(String(json.body))).toMatchObject({ schemaVersion: 'payout-report.v1' });
  });
});
