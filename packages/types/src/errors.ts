import type { StatementWarning } from './types/index.js';

export type LedgerErrorCode =
  | 'DATA_SOURCE_UNAVAILABLE'
  | 'ROW_PARSE_ERROR'
  | 'DATE_FORMAT_UNRECOGNIZED'
  | 'UNRECOGNIZED_FILE'
  | 'RECONCILIATION_INCONSISTENCY'
  | 'PERIOD_NOT_FOUND'
  | 'CONFIG_ERROR';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  toWarning(): StatementWarning {
    return { code: this.code, message: this.message };
  }
}

export class DataSourceUnavailableError extends LedgerError {
  constructor(
    readonly path: string | null,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('DATA_SOURCE_UNAVAILABLE', message, options);
  }

  override toWarning(): StatementWarning {
    return this.path === null
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, file: this.path };
  }
}

export class RowParseError extends LedgerError {
  constructor(message: string, code: LedgerErrorCode = 'ROW_PARSE_ERROR') {
    super(code, message);
  }
}

export class DateFormatUnrecognizedError extends RowParseError {
  constructor(readonly value: string) {
    super(`Unrecognized date format: "${value}"`, 'DATE_FORMAT_UNRECOGNIZED');
  }
}

/** Raised when the ledger walk does not land on the computed closing balance. */
export class ReconciliationInconsistencyError extends LedgerError {
  constructor(
    readonly expected: string,
    readonly actual: string,
    context: string
  ) {
    super(
      'RECONCILIATION_INCONSISTENCY',
      `${context}: ledger closes at ${actual}, expected ${expected}`
    );
  }
}

export class PeriodNotFoundError extends LedgerError {
  constructor(message: string) {
    super('PERIOD_NOT_FOUND', message);
  }
}

export class ConfigError extends LedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
