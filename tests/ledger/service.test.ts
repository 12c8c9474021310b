import { describe, it, expect } from 'vitest';
import {
  CompanyRegistry,
  ConfigError,
  type Company,
  type LoadResult,
  type StatementWarning,
  type TransactionRecord,
} from '@payout-ledger/types';
import type { TransactionSource } from '@payout-ledger/loader';
import { StatementService } from '@payout-ledger/ledger';
import { TEST_COMPANY, createRecord, dec } from '../helpers/records.js';

class FakeSource implements TransactionSource {
  loads = 0;

  constructor(
    private readonly records: readonly TransactionRecord[],
    private readonly warnings: readonly StatementWarning[] = []
  ) {}

  async load(company: Company): Promise<LoadResult> {
    this.loads += 1;
    return {
      company: company.code,
      records: this.records,
      warnings: this.warnings,
      health: {
        company: company.code,
        status: this.records.length > 0 ? 'healthy' : 'degraded',
        dataRoot: '/data',
        filesFound: 1,
        filesParsed: 1,
        rowsRead: this.records.length,
        rowsSkipped: 0,
        recordCount: this.records.length,
        lastParsedAt: '2025-08-01T00:00:00.000Z',
      },
    };
  }
}

const records = [
  createRecord({ id: 'ch_jun', createdAt: '2025-06-15T10:00:00.000Z', amountGross: dec('100.00') }),
  createRecord({
    id: 'ch_jul',
    createdAt: '2025-07-02T10:00:00.000Z',
    transferDate: '2025-07-04T00:00:00.000Z',
    amountGross: dec('50.00'),
    fee: dec('2.00'),
  }),
  createRecord({ id: 'ch_fail', createdAt: '2025-07-03T10:00:00.000Z', status: 'failed' }),
];

const serviceWith = (source: TransactionSource, openingBalances: Record<string, string> = {}) =>
  new StatementService({ registry: new CompanyRegistry([TEST_COMPANY]), source, openingBalances });

describe('StatementService', () => {
  it('should default the first month to zero with a warning', async () => {
    const loadWarning: StatementWarning = { code: 'ROW_PARSE_ERROR', message: 'bad row', file: 'a.csv', row: 2 };
    const service = serviceWith(new FakeSource(records, [loadWarning]));

    const statement = await service.buildMonthlyStatement('cgge', 2025, 6);

    expect(statement.period.openingBalanceSource).toBe('default-zero');
    expect(statement.period.closingBalance.toFixed(2)).toBe('100.00');
    expect(statement.warnings).toEqual([
      loadWarning,
      {
        code: 'PERIOD_NOT_FOUND',
        message: 'No data before 2025-06 for cgge; opening balance defaults to 0.00',
      },
    ]);
  });

  it('should carry the previous closing balance forward', async () => {
    const service = serviceWith(new FakeSource(records));

    const statement = await service.buildMonthlyStatement('cgge', 2025, 7);

    expect(statement.period.openingBalance.toFixed(2)).toBe('100.00');
    expect(statement.period.openingBalanceSource).toBe('carried-forward');
    expect(statement.period.closingBalance.toFixed(2)).toBe('148.00');
    expect(statement.secondaryRecords.map((c) => c.record.id)).toEqual(['ch_fail']);
    expect(statement.warnings).toEqual([]);
    expect(statement.company).toEqual({
      code: 'cgge',
      name: 'CGGE',
      legalName: 'CGGE Limited',
      currency: 'HKD',
    });
  });

  it('should honour a per-call opening balance', async () => {
    const service = serviceWith(new FakeSource(records));
    const statement = await service.buildMonthlyStatement('cgge', 2025, 7, '25');
    expect(statement.period.openingBalanceSource).toBe('override');
    expect(statement.period.closingBalance.toFixed(2)).toBe('73.00');
  });

  it('should honour configured opening balances', async () => {
    const service = serviceWith(new FakeSource(records), { 'cgge:2025-07': '200.00', 'ki:2025-07': '1.00' });
    const statement = await service.buildMonthlyStatement('cgge', 2025, 7);
    expect(statement.period.openingBalance.toFixed(2)).toBe('200.00');
    expect(statement.period.openingBalanceSource).toBe('override');
  });

  it('should build a payout report', async () => {
    const service = serviceWith(new FakeSource(records));
    const report = await service.buildPayoutReconciliation('cgge', 2025, 7);
    expect(report.payoutReconciliation.totalPaidOut.toFixed(2)).toBe('48.00');
    expect(report.endingBalanceReconciliation.endingBalance.toFixed(2)).toBe('100.00');
  });

  it('should list months with activity', async () => {
    const service = serviceWith(new FakeSource(records));
    expect(await service.availableMonths('cgge')).toEqual([
      { year: 2025, month: 6 },
      { year: 2025, month: 7 },
    ]);
  });

  it('should list the registered companies', () => {
    const service = serviceWith(new FakeSource(records));
    expect(service.listCompanies().map((c) => c.code)).toEqual(['cgge']);
  });

  it('should reject unknown companies and invalid months', async () => {
    const service = serviceWith(new FakeSource(records));
    await expect(service.buildMonthlyStatement('zzz', 2025, 7)).rejects.toThrow(ConfigError);
    await expect(service.buildMonthlyStatement('cgge', 2025, 13)).rejects.toThrow(ConfigError);
    await expect(service.buildMonthlyStatement('cgge', 2025, 13)).rejects.toMatchObject({
      code: 'CONFIG_ERROR',
      message: 'Invalid period: year=2025, month=13',
    });
  });

  it('should reject a malformed opening balance override', async () => {
    const service = serviceWith(new FakeSource(records));
    await expect(service.buildMonthlyStatement('cgge', 2025, 7, '12,50')).rejects.toThrow(ConfigError);
    await expect(service.buildMonthlyStatement('cgge', 2025, 7, 'abc')).rejects.toThrow(
      'Invalid opening balance "abc": Must be a decimal number such as 554.77'
    );
  });

  it('should summarize fees across companies', async () => {
    const service = serviceWith(new FakeSource(records));
    const summary = await service.buildFeeSummary('2025-07-01', '2025-07-31');

    expect(summary.currency).toBe('HKD');
    expect(summary.byCompany.map((entry) => entry.company)).toEqual(['cgge']);
    expect(summary.total.count).toBe(1);
    expect(summary.byCategory.Other.fee.toFixed(2)).toBe('2.00');
  });

  it('should refuse to total fees across currencies', async () => {
    const usd: Company = { ...TEST_COMPANY, code: 'usco', directory: 'usco', filePrefixes: ['usco_'], currency: 'USD' };
    const service = new StatementService({
      registry: new CompanyRegistry([TEST_COMPANY, usd]),
      source: new FakeSource(records),
    });

    await expect(service.buildFeeSummary('2025-07-01', '2025-07-31')).rejects.toThrow(
      'Cannot total fees across currencies: HKD, USD'
    );
    expect((await service.buildFeeSummary('2025-07-01', '2025-07-31', ['usco'])).currency).toBe('USD');
    await expect(service.buildFeeSummary('2025-07-01', '2025-07-32')).rejects.toThrow(ConfigError);
  });

  it('should build a balance summary from the carried balance', async () => {
    const service = serviceWith(new FakeSource(records));

    const fromSecond = await service.buildBalanceSummary('cgge', 2025, 7, { startDay: 2 });
    expect(fromSecond.startingBalance.toFixed(2)).toBe('100.00');
    expect(fromSecond.activity.net.toFixed(2)).toBe('48.00');
    expect(fromSecond.endingBalance.toFixed(2)).toBe('148.00');

    const later = await service.buildBalanceSummary('cgge', 2025, 7, { startDay: 3 });
    expect(later.startingBalance.toFixed(2)).toBe('148.00');
    expect(later.activity.chargeCount).toBe(0);
    expect(later.endingBalance.toFixed(2)).toBe('148.00');
  });

  it('should start a balance summary from an explicit balance', async () => {
    const service = serviceWith(new FakeSource(records));
    const summary = await service.buildBalanceSummary('cgge', 2025, 7, { startingBalance: '10' });

    expect(summary.startingBalanceSource).toBe('override');
    expect(summary.endingBalance.toFixed(2)).toBe('58.00');
    expect(summary.warnings).toEqual([]);
  });

  it('should warn when a balance summary has no prior data', async () => {
    const service = serviceWith(new FakeSource(records));
    const summary = await service.buildBalanceSummary('cgge', 2025, 6);

    expect(summary.startingBalanceSource).toBe('default-zero');
    expect(summary.endingBalance.toFixed(2)).toBe('100.00');
    expect(summary.warnings).toEqual([
      { code: 'PERIOD_NOT_FOUND', message: 'No data before 2025-06 for cgge; opening balance defaults to 0.00' },
    ]);
  });

  it('should reject invalid day ranges and starting balances', async () => {
    const service = serviceWith(new FakeSource(records));
    await expect(service.buildBalanceSummary('cgge', 2025, 6, { endDay: 31 })).rejects.toThrow(
      'Invalid day range 1-31 for 2025-06'
    );
    await expect(service.buildBalanceSummary('cgge', 2025, 7, { startDay: 20, endDay: 10 })).rejects.toThrow(
      ConfigError
    );
    await expect(service.buildBalanceSummary('cgge', 2025, 7, { startingBalance: 'x' })).rejects.toThrow(ConfigError);
  });

  it('should report degraded health when a company has no data', async () => {
    const service = serviceWith(new FakeSource([]));
    const health = await service.health();
    expect(health.status).toBe('degraded');
    expect(health.companies.map((c) => c.company)).toEqual(['cgge']);
  });

  it('should reload records on every call', async () => {
    const source = new FakeSource(records);
    const service = serviceWith(source);
    await service.buildMonthlyStatement('cgge', 2025, 7);
    await service.buildMonthlyStatement('cgge', 2025, 7);
    expect(source.loads).toBe(2);
  });
});
