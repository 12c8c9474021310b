export {
  CompanySchema,
  CompanyRegistryFileSchema,
  DecimalStringSchema,
  FxRatesSchema,
  LedgerConfigSchema,
  OpeningBalancesSchema,
  PeriodStringSchema,
} from './config.js';

export type {
  Company,
  CompanyRegistryFile,
  FxRateTable,
  LedgerConfig,
  OpeningBalances,
} from './config.js';

export {
  getSchemaPath,
  getSchema,
  isOutputSchemaName,
  assertOutputSchemaName,
  validateOutput,
  validateOutputOrThrow,
  AVAILABLE_OUTPUT_SCHEMAS,
} from './schema-registry.js';

export type { OutputSchemaName, ValidationResult, ValidationError } from './schema-registry.js';
