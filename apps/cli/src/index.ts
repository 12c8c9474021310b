#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { writeFile, mkdir } from 'fs/promises';
import { resolve, dirname } from 'path';
import {
  LEDGER_VERSION,
  createConsoleLogger,
  envBool,
  formatAmount,
  formatPeriod,
  loadConfig,
  parsePeriod,
  type LedgerConfig,
  type Logger,
} from '@payout-ledger/types';
import { createStatementService, type StatementService } from '@payout-ledger/ledger';
import {
  OUTPUT_FORMATS,
  isOutputFormat,
  renderBalanceSummary,
  renderFeeSummary,
  renderPayoutReport,
  renderStatement,
  type OutputFormat,
  type RenderedDocument,
} from '@payout-ledger/output';
import { configOverrides, parseCompanyList, parseDay, type GlobalOptions } from './options.js';

interface ReportOptions {
  company: string;
  period: string;
  format: string;
  out?: string;
}

const program = new Command();

function setup(): { service: StatementService; logger: Logger; config: LedgerConfig } {
  const overrides = configOverrides(program.opts<GlobalOptions>(), program.getOptionValueSource('cache'));
  const config = loadConfig(process.env, overrides);
  const logger = createConsoleLogger({ verbose: config.verbose });
  return { service: createStatementService(config, logger), logger, config };
}

function parseFormat(value: string): OutputFormat {
  const format = value.toLowerCase();
  if (!isOutputFormat(format)) {
    throw new Error(`Unsupported format "${value}". Available formats: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

async function emit(document: RenderedDocument, out: string | undefined, logger: Logger): Promise<void> {
  if (out === undefined) {
    process.stdout.write(document.body);
    return;
  }
  const target = resolve(out);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, document.body);
  logger.info(`Wrote ${document.format.toUpperCase()} to ${target}`);
}

function fail(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[ERROR] ${message}`);
  if (program.opts<GlobalOptions>().verbose && error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
  process.exit(1);
}

program
  .name('payout-ledger')
  .description('Monthly statements and payout reconciliation from payment-processor CSV exports')
  .version(LEDGER_VERSION)
  .option('--data-root <dir>', 'Directory holding the CSV exports', process.env['CSV_DATA_PATH'])
  .option('--companies-file <path>', 'Company registry JSON', process.env['LEDGER_COMPANIES_FILE'])
  .option('-v, --verbose', 'Enable verbose output', envBool(process.env, 'LEDGER_VERBOSE', false))
  .option('--no-cache', 'Reload CSV files on every request');

program
  .command('statement')
  .description('Build the monthly statement for a company')
  .requiredOption('-c, --company <code>', 'Company code, e.g. cgge')
  .requiredOption('-p, --period <YYYY-MM>', 'Statement month')
  .option('--opening-balance <amount>', 'Override the opening balance for this run')
  .option('-f, --format <format>', `Output format (${OUTPUT_FORMATS.join(', ')})`, 'html')
  .option('-o, --out <file>', 'Write to a file instead of stdout')
  .action(async (options: ReportOptions & { openingBalance?: string }) => {
    try {
      const { service, logger } = setup();
      const period = parsePeriod(options.period);
      const format = parseFormat(options.format);
      const statement = await service.buildMonthlyStatement(
        options.company,
        period.year,
        period.month,
        options.openingBalance
      );
      await emit(await renderStatement(statement, format), options.out, logger);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('payouts')
  .description('Build the payout reconciliation report for a company')
  .requiredOption('-c, --company <code>', 'Company code, e.g. cgge')
  .requiredOption('-p, --period <YYYY-MM>', 'Report month')
  .option('-f, --format <format>', `Output format (${OUTPUT_FORMATS.join(', ')})`, 'json')
  .option('-o, --out <file>', 'Write to a file instead of stdout')
  .action(async (options: ReportOptions) => {
    try {
      const { service, logger } = setup();
      const period = parsePeriod(options.period);
      const format = parseFormat(options.format);

      const report = await service.buildPayoutReconciliation(options.company, period.year, period.month);
      await emit(await renderPayoutReport(report, format), options.out, logger);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('fees')
  .description('Summarize processing fees by category, export and company')
  .requiredOption('--from <YYYY-MM-DD>', 'First day, inclusive')
  .requiredOption('--to <YYYY-MM-DD>', 'Last day, inclusive')
  .option('-c, --companies <codes>', 'Comma-separated company codes (default: all)')
  .option('-f, --format <format>', `Output format (${OUTPUT_FORMATS.join(', ')})`, 'json')
  .option('-o, --out <file>', 'Write to a file instead of stdout')
  .action(async (options: { from: string; to: string; companies?: string; format: string; out?: string }) => {
    try {
      const { service, logger } = setup();
      const format = parseFormat(options.format);
      const summary = await service.buildFeeSummary(options.from, options.to, parseCompanyList(options.companies));
      await emit(await renderFeeSummary(summary, format), options.out, logger);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('balance')
  .description('Build a balance summary over days of one month')
  .requiredOption('-c, --company <code>', 'Company code, e.g. cgge')
  .requiredOption('-p, --period <YYYY-MM>', 'Month')
  .option('--start-day <day>', 'First day of the range (default: 1)')
  .option('--end-day <day>', 'Last day of the range (default: end of month)')
  .option('--starting-balance <amount>', 'Balance at the start of the range')
  .option('-f, --format <format>', `Output format (${OUTPUT_FORMATS.join(', ')})`, 'json')
  .option('-o, --out <file>', 'Write to a file instead of stdout')
  .action(
    async (options: ReportOptions & { startDay?: string; endDay?: string; startingBalance?: string }) => {
      try {
        const { service, logger } = setup();
        const period = parsePeriod(options.period);
        const format = parseFormat(options.format);
        const summary = await service.buildBalanceSummary(options.company, period.year, period.month, {
          startDay: parseDay(options.startDay, '--start-day'),
          endDay: parseDay(options.endDay, '--end-day'),
          startingBalance: options.startingBalance,
        });
        await emit(await renderBalanceSummary(summary, format), options.out, logger);
      } catch (error) {
        fail(error);
      }
    }
  );

program
  .command('health')
  .description('Report data-source health for every company')
  .action(async () => {
    try {
      const { service } = setup();
      const health = await service.health();
      console.log(JSON.stringify(health, null, 2));
      if (health.status !== 'healthy') {
        process.exitCode = 2;
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('companies')
  .description('List configured companies')
  .action(() => {
    try {
      const { service } = setup();
      for (const company of service.listCompanies()) {
        console.log(`${company.code}\t${company.name}\t${company.currency}`);
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('months')
  .description('List months with settled activity for a company')
  .requiredOption('-c, --company <code>', 'Company code, e.g. cgge')
  .action(async (options: { company: string }) => {
    try {
      const { service } = setup();
      for (const period of await service.availableMonths(options.company)) {
        const statement = await service.buildMonthlyStatement(options.company, period.year, period.month);
        console.log(`${formatPeriod(period)}\tclosing ${formatAmount(statement.period.closingBalance)}`);
      }
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync(process.argv);
