import { Decimal } from 'decimal.js';
import {
  CompanyRegistry,
  ConfigError,
  DEFAULT_REPORTING_CURRENCY,
  DecimalStringSchema,
  PeriodNotFoundError,
  formatAmount,
  formatPeriod,
  makeDateRange,
  makePeriod,
  openingBalancesFor,
  periodRange,
  silentLogger,
  toFxRates,
  type BalanceSummary,
  type ClassifiedRecord,
  type Company,
  type FeeSummary,
  type LedgerConfig,
  type LoaderHealth,
  type Logger,
  type PayoutReport,
  type Period,
  type ReconciliationPeriod,
  type Statement,
  type StatementCompany,
  type StatementWarning,
} from '@payout-ledger/types';
import { CachedTransactionSource, TransactionLoader, type TransactionSource } from '@payout-ledger/loader';
import { classifyRecords } from './classifier.js';
import {
  closingBalanceOf,
  computePeriodTotals,
  groupByCreatedPeriod,
  periodsWithActivity,
  resolveOpeningBalance,
  type BalanceOverrides,
} from './engine.js';
import { buildBalanceSummary, startingBalanceFor, type StartingBalance } from './balance-summary.js';
import { buildFeeSummary } from './fee-summary.js';
import { buildPayoutReport } from './payout-reconciliation.js';
import { buildStatement } from './statement-builder.js';

export interface StatementServiceOptions {
  registry: CompanyRegistry;
  source: TransactionSource;
  /** Keyed `<company>:<YYYY-MM>` */
  openingBalances?: Readonly<Record<string, string>>;
  logger?: Logger;
}

export interface ServiceHealth {
  status: LoaderHealth['status'];
  companies: LoaderHealth[];
}

interface CompanyData {
  company: Company;
  classified: ClassifiedRecord[];
  warnings: readonly StatementWarning[];
}

export function toStatementCompany(company: Company): StatementCompany {
  return {
    code: company.code,
    name: company.name,
    legalName: company.legalName ?? null,
    currency: company.currency,
  };
}

function overrideAmount(value: Decimal.Value): Decimal {
  if (value instanceof Decimal) return value;
  const text = String(value);
  const parsed = DecimalStringSchema.safeParse(text);
  if (!parsed.success) {
    throw new ConfigError(`Invalid opening balance "${text}": ${parsed.error.issues[0]?.message ?? 'not a decimal'}`);
  }
  return new Decimal(parsed.data);
}

export interface BalanceSummaryOptions {
  /** First day of the range, 1 by default. */
  startDay?: number;
  /** Last day of the range, the month's last day by default. */
  endDay?: number;
  /** Balance at the start of `startDay`; derived from the ledger when omitted. */
  startingBalance?: Decimal.Value;
}

/**
 * Entry point for statements and payout reports. Each call reloads (or
 * revalidates) the company's records, so results always reflect the files
 * on disk.
 */
export class StatementService {
  private readonly logger: Logger;

  constructor(private readonly options: StatementServiceOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  listCompanies(): readonly Company[] {
    return this.options.registry.companies;
  }

  private async loadCompany(companyCode: string): Promise<CompanyData> {
    const company = this.options.registry.get(companyCode);
    const result = await this.options.source.load(company);
    return { company, classified: classifyRecords(result.records), warnings: result.warnings };
  }

  private overridesFor(companyCode: string): BalanceOverrides {
    return openingBalancesFor(this.options.openingBalances ?? {}, companyCode);
  }

  /**
   * Monthly statement for a company. `openingBalanceOverride` replaces the
   * carried-forward opening balance for this call only.
   */
  async buildMonthlyStatement(
    companyCode: string,
    year: number,
    month: number,
    openingBalanceOverride?: Decimal.Value
  ): Promise<Statement> {
    const period = makePeriod(year, month);
    const override = openingBalanceOverride === undefined ? undefined : overrideAmount(openingBalanceOverride);
    const { company, classified, warnings } = await this.loadCompany(companyCode);
    const groups = groupByCreatedPeriod(classified);
    const statementWarnings: StatementWarning[] = [...warnings];

    const resolution =
      override !== undefined
        ? { amount: override, source: 'override' as const }
        : resolveOpeningBalance(groups, period, this.overridesFor(company.code));

    if (resolution.source === 'default-zero') {
      const notice = new PeriodNotFoundError(
        `No data before ${formatPeriod(period)} for ${company.code}; opening balance defaults to 0.00`
      );
      statementWarnings.push(notice.toWarning());
      this.logger.warn(notice.message);
    }

    const records = groups.get(formatPeriod(period)) ?? [];
    const totals = computePeriodTotals(records);
    const reconciliation: ReconciliationPeriod = {
      company: company.code,
      year: period.year,
      month: period.month,
      openingBalance: resolution.amount,
      openingBalanceSource: resolution.source,
      records,
      totals,
      closingBalance: closingBalanceOf(resolution.amount, totals),
    };

    const secondaryRecords = classified.filter(
      (item) => item.tier === 'secondary' && item.record.createdAt.slice(0, 7) === formatPeriod(period)
    );

    this.logger.info(
      `${company.code} ${formatPeriod(period)}: opening ${formatAmount(reconciliation.openingBalance)} (${resolution.source}), closing ${formatAmount(reconciliation.closingBalance)}`
    );

    return buildStatement({
      company: toStatementCompany(company),
      period: reconciliation,
      secondaryRecords,
      warnings: statementWarnings,
    });
  }

  async buildPayoutReconciliation(companyCode: string, year: number, month: number): Promise<PayoutReport> {
    const period = makePeriod(year, month);
    const { company, classified, warnings } = await this.loadCompany(companyCode);
    const report = buildPayoutReport(toStatementCompany(company), classified, period, warnings);
    this.logger.info(
      `${company.code} ${formatPeriod(period)}: paid out ${formatAmount(report.payoutReconciliation.totalPaidOut)}, ending balance ${formatAmount(report.endingBalanceReconciliation.endingBalance)}`
    );
    return report;
  }

  /**
   * Fees on settled charges between two days, across the given companies
   * (all registered companies by default). Companies must share a currency.
   */
  async buildFeeSummary(from: string, to: string, companyCodes?: readonly string[]): Promise<FeeSummary> {
    const range = makeDateRange(from, to);
    const codes = companyCodes ?? this.options.registry.companies.map((company) => company.code);
    const loaded = await Promise.all(codes.map((code) => this.loadCompany(code)));

    const currencies = [...new Set(loaded.map(({ company }) => company.currency))];
    if (currencies.length > 1) {
      throw new ConfigError(`Cannot total fees across currencies: ${currencies.join(', ')}`);
    }

    const summary = buildFeeSummary({
      range,
      currency: currencies[0] ?? DEFAULT_REPORTING_CURRENCY,
      companies: loaded.map(({ company, classified }) => ({ company: company.code, records: classified })),
      warnings: loaded.flatMap(({ warnings }) => warnings),
    });
    this.logger.info(
      `Fees ${range.from}..${range.to} across ${loaded.length} company(ies): ${formatAmount(summary.total.fee)} on ${summary.total.count} charge(s)`
    );
    return summary;
  }

  /** Balance summary over days of one month. */
  async buildBalanceSummary(
    companyCode: string,
    year: number,
    month: number,
    options: BalanceSummaryOptions = {}
  ): Promise<BalanceSummary> {
    const period = makePeriod(year, month);
    const range = periodRange(period, options.startDay, options.endDay);
    const explicit = options.startingBalance === undefined ? undefined : overrideAmount(options.startingBalance);
    const { company, classified, warnings } = await this.loadCompany(companyCode);
    const groups = groupByCreatedPeriod(classified);
    const records = groups.get(formatPeriod(period)) ?? [];
    const summaryWarnings: StatementWarning[] = [...warnings];

    let starting: StartingBalance;
    if (explicit !== undefined) {
      starting = { amount: explicit, source: 'override' };
    } else {
      const opening = resolveOpeningBalance(groups, period, this.overridesFor(company.code));
      if (opening.source === 'default-zero') {
        const notice = new PeriodNotFoundError(
          `No data before ${formatPeriod(period)} for ${company.code}; opening balance defaults to 0.00`
        );
        summaryWarnings.push(notice.toWarning());
        this.logger.warn(notice.message);
      }
      starting = startingBalanceFor(opening, records, range);
    }

    const summary = buildBalanceSummary({
      company: toStatementCompany(company),
      period,
      range,
      starting,
      records,
      warnings: summaryWarnings,
    });
    this.logger.info(
      `${company.code} ${range.from}..${range.to}: starting ${formatAmount(summary.startingBalance)}, ending ${formatAmount(summary.endingBalance)}`
    );
    return summary;
  }

  async availableMonths(companyCode: string): Promise<Period[]> {
    const { classified } = await this.loadCompany(companyCode);
    return periodsWithActivity(groupByCreatedPeriod(classified));
  }

  async health(): Promise<ServiceHealth> {
    const companies = await Promise.all(
      this.options.registry.companies.map(async (company) => (await this.options.source.load(company)).health)
    );
    return {
      status: companies.every((entry) => entry.status === 'healthy') ? 'healthy' : 'degraded',
      companies,
    };
  }
}

export interface CreateServiceOptions {
  cwd?: string;
  fallbackRoot?: string | null;
  now?: () => Date;
}

/** Wire a service from resolved configuration. */
export function createStatementService(
  config: LedgerConfig,
  logger: Logger = silentLogger,
  options: CreateServiceOptions = {}
): StatementService {
  const loader = new TransactionLoader({
    ...options,
    dataRoot: config.dataRoot,
    fxRates: toFxRates(config.fxRates),
    logger,
  });

  return new StatementService({
    registry: CompanyRegistry.fromFile(config.companiesFile),
    source: config.cache ? new CachedTransactionSource(loader) : loader,
    openingBalances: config.openingBalances,
    logger,
  });
}
