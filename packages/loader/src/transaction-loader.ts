import {
  DataSourceUnavailableError,
  LedgerError,
  RowParseError,
  errorMessage,
  formatPeriod,
  periodOfTimestamp,
  silentLogger,
  type Company,
  type KnownCsvShape,
  type LoadResult,
  type LoaderHealth,
  type Logger,
  type StatementWarning,
  type TransactionRecord,
} from '@payout-ledger/types';
import { readCsvTable, type CsvTable } from './csv-reader.js';
import { resolveDataRoot, type DataRootOptions } from './data-root.js';
import { scanCompanyFiles, type CsvFileInfo } from './directory-scanner.js';
import type { FxRates } from './fx.js';
import { ROW_PARSERS, type ParseContext } from './parsers/index.js';
import { SHAPE_PRIORITY, detectShape } from './shapes.js';

/** Anything that can produce a company's normalized records. */
export interface TransactionSource {
  load(company: Company): Promise<LoadResult>;
}

export interface TransactionLoaderOptions {
  dataRoot?: string | null;
  cwd?: string;
  fallbackRoot?: string | null;
  fxRates?: FxRates;
  logger?: Logger;
  now?: () => Date;
}

export interface CompanyFileListing {
  root: string | null;
  files: CsvFileInfo[];
}

interface ParsedFile {
  file: CsvFileInfo;
  shape: KnownCsvShape;
  table: CsvTable;
}

const CHARGE_TYPES = new Set(['charge', 'payment']);

/**
 * Records describing the same underlying movement share this key. Charges
 * match across shapes on the charge id; every other balance-level row is its
 * own balance transaction, even when it shares a source with another row
 * (a payout and its reversal both point at `po_...`).
 */
function dedupeKey(record: TransactionRecord): string {
  if (record.origin.shape === 'unified_payments') {
    return isDerivedRefund(record) ? `txn:${record.id}` : `charge:${record.id}`;
  }
  if (record.sourceId !== null && record.sourceType !== null && CHARGE_TYPES.has(record.sourceType)) {
    return `charge:${record.sourceId}`;
  }
  return `txn:${record.id}`;
}

/** Refund synthesized from a unified row's refunded amount. */
function isDerivedRefund(record: TransactionRecord): boolean {
  return record.origin.shape === 'unified_payments' && record.sourceType === 'refund';
}

const monthOf = (record: TransactionRecord): string => formatPeriod(periodOfTimestamp(record.createdAt));

/**
 * Balance-level exports list refunds as their own rows. In a month they cover,
 * refunds synthesized from unified rows would count the same refund twice.
 */
function dropCoveredRefunds(records: readonly TransactionRecord[]): TransactionRecord[] {
  const covered = new Set(
    records.filter((record) => record.origin.shape !== 'unified_payments').map(monthOf)
  );
  return records.filter((record) => !(isDerivedRefund(record) && covered.has(monthOf(record))));
}

function warningFor(error: unknown, file: string, row?: number): StatementWarning {
  const code = error instanceof LedgerError ? error.code : 'ROW_PARSE_ERROR';
  const warning: StatementWarning = { code, message: errorMessage(error), file };
  if (row !== undefined) warning.row = row;
  return warning;
}

/**
 * Discovers a company's CSV exports and normalizes every row into
 * TransactionRecords. Bad rows and unreadable files become warnings; the
 * load itself only fails on programming errors.
 */
export class TransactionLoader implements TransactionSource {
  private readonly logger: Logger;
  private readonly fxRates: FxRates;
  private readonly now: () => Date;

  constructor(private readonly options: TransactionLoaderOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.fxRates = options.fxRates ?? new Map();
    this.now = options.now ?? (() => new Date());
  }

  private rootOptions(): DataRootOptions {
    const rootOptions: DataRootOptions = { logger: this.logger };
    if (this.options.dataRoot !== undefined) rootOptions.explicit = this.options.dataRoot;
    if (this.options.cwd !== undefined) rootOptions.cwd = this.options.cwd;
    if (this.options.fallbackRoot !== undefined) rootOptions.fallback = this.options.fallbackRoot;
    return rootOptions;
  }

  async listFiles(company: Company): Promise<CompanyFileListing> {
    const resolution = await resolveDataRoot(this.rootOptions());
    if (resolution.path === null) {
      return { root: null, files: [] };
    }
    const scan = await scanCompanyFiles(resolution.path, company);
    for (const skipped of scan.skipped) {
      this.logger.debug(`Skipping ${skipped.fileName}: ${skipped.reason}`);
    }
    return { root: resolution.path, files: scan.files };
  }

  async load(company: Company): Promise<LoadResult> {
    const warnings: StatementWarning[] = [];
    const health: LoaderHealth = {
      company: company.code,
      status: 'healthy',
      dataRoot: null,
      filesFound: 0,
      filesParsed: 0,
      rowsRead: 0,
      rowsSkipped: 0,
      recordCount: 0,
      lastParsedAt: null,
    };
    const degrade = (error: DataSourceUnavailableError): void => {
      health.status = 'degraded';
      warnings.push(error.toWarning());
      this.logger.warn(error.message);
    };

    const listing = await this.listFiles(company);
    health.dataRoot = listing.root;
    health.filesFound = listing.files.length;

    if (listing.root === null) {
      degrade(new DataSourceUnavailableError(null, `No data root found for ${company.code}`));
      return { company: company.code, records: [], warnings, health };
    }
    if (listing.files.length === 0) {
      degrade(
        new DataSourceUnavailableError(listing.root, `No CSV exports for ${company.code} under ${listing.root}`)
      );
      return { company: company.code, records: [], warnings, health };
    }

    const parsedFiles: ParsedFile[] = [];
    for (const file of listing.files) {
      let table: CsvTable;
      try {
        table = await readCsvTable(file.filePath);
      } catch (error) {
        degrade(
          new DataSourceUnavailableError(file.fileName, `Cannot read ${file.fileName}: ${errorMessage(error)}`, {
            cause: error,
          })
        );
        continue;
      }

      const shape = detectShape(table.header);
      if (shape === 'unrecognized') {
        const error = new LedgerError('UNRECOGNIZED_FILE', `Unrecognized CSV layout in ${file.fileName}`);
        warnings.push(warningFor(error, file.fileName));
        this.logger.warn(error.message);
        continue;
      }
      parsedFiles.push({ file, shape, table });
    }

    parsedFiles.sort(
      (a, b) => SHAPE_PRIORITY[a.shape] - SHAPE_PRIORITY[b.shape] || a.file.fileName.localeCompare(b.file.fileName)
    );

    const loaded: TransactionRecord[] = [];
    const seen = new Set<string>();

    for (const { file, shape, table } of parsedFiles) {
      const parseRow = ROW_PARSERS[shape];
      const ctx: ParseContext = { company, file: file.fileName, fxRates: this.fxRates };
      let duplicates = 0;

      for (const row of table.rows) {
        if (row.isBlank()) continue;
        health.rowsRead += 1;

        let parsed: TransactionRecord[];
        try {
          parsed = parseRow(row, ctx);
        } catch (error) {
          if (!(error instanceof RowParseError)) throw error;
          health.rowsSkipped += 1;
          warnings.push(warningFor(error, file.fileName, row.index));
          this.logger.warn(`${file.fileName} row ${row.index}: ${error.message}`);
          continue;
        }

        for (const record of parsed) {
          const key = dedupeKey(record);
          if (seen.has(key)) {
            duplicates += 1;
            continue;
          }
          seen.add(key);
          loaded.push(record);
        }
      }

      if (duplicates > 0) {
        health.rowsSkipped += duplicates;
        this.logger.debug(`${file.fileName}: ${duplicates} duplicate record(s) ignored`);
      }
      health.filesParsed += 1;
      this.logger.debug(`Parsed ${file.fileName} as ${shape} (${table.rows.length} rows)`);
    }

    const records = dropCoveredRefunds(loaded);
    if (records.length < loaded.length) {
      const dropped = loaded.length - records.length;
      health.rowsSkipped += dropped;
      this.logger.debug(`${dropped} unified refund(s) superseded by balance-level refund rows`);
    }

    health.recordCount = records.length;
    health.lastParsedAt = this.now().toISOString();
    this.logger.info(
      `Loaded ${records.length} records for ${company.code} from ${health.filesParsed}/${health.filesFound} files`
    );

    return { company: company.code, records, warnings, health };
  }
}
