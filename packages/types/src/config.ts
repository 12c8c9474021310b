import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { Decimal } from 'decimal.js';
import type { ZodError } from 'zod';
import {
  CompanyRegistryFileSchema,
  LedgerConfigSchema,
  OpeningBalancesSchema,
  type Company,
  type FxRateTable,
  type LedgerConfig,
  type OpeningBalances,
} from './schemas/index.js';
import { ConfigError, errorMessage } from './errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_COMPANIES_FILE = resolve(__dirname, '../config/companies.json');

export type Environment = Readonly<Record<string, string | undefined>>;

function envValue(env: Environment, key: string): string | undefined {
  const value = env[key]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

export function envBool(env: Environment, key: string, defaultVal: boolean): boolean {
  const val = envValue(env, key);
  if (val === undefined) return defaultVal;
  return val === 'true' || val === '1';
}

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function readJsonFile(filePath: string, what: string): unknown {
  try {
    return JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read ${what} at ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Parse `CNY:1.08,USD:7.8` into a rate table. Codes are upper-cased.
 */
export function parseFxRates(value: string): FxRateTable {
  const rates: FxRateTable = {};
  for (const entry of value.split(',')) {
    const trimmed = entry.trim();
    if (trimmed === '') continue;

    const [code, rate, ...rest] = trimmed.split(':');
    if (code === undefined || rate === undefined || rest.length > 0) {
      throw new ConfigError(`Invalid FX rate entry "${trimmed}": expected CODE:RATE`);
    }
    rates[code.trim().toUpperCase()] = rate.trim();
  }
  return rates;
}

export function loadOpeningBalances(filePath: string): OpeningBalances {
  const result = OpeningBalancesSchema.safeParse(readJsonFile(filePath, 'opening balances'));
  if (!result.success) {
    throw new ConfigError(`Invalid opening balances in ${filePath}: ${describeZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Resolve configuration from the environment. Explicit overrides (CLI flags)
 * take precedence over environment variables, which take precedence over
 * defaults.
 *
 * - CSV_DATA_PATH: data root holding the exports
 * - LEDGER_COMPANIES_FILE: company registry JSON
 * - LEDGER_FX_RATES: fixed conversion rates, `CNY:1.08,USD:7.8`
 * - LEDGER_OPENING_BALANCES: JSON file of `<company>:<YYYY-MM>` opening balances
 * - LEDGER_VERBOSE, LEDGER_CACHE: booleans
 */
export function loadConfig(
  env: Environment = process.env,
  overrides: Partial<LedgerConfig> = {}
): LedgerConfig {
  const fxEnv = envValue(env, 'LEDGER_FX_RATES');
  const balancesFile = envValue(env, 'LEDGER_OPENING_BALANCES');

  const candidate = {
    dataRoot: envValue(env, 'CSV_DATA_PATH') ?? null,
    companiesFile: envValue(env, 'LEDGER_COMPANIES_FILE') ?? DEFAULT_COMPANIES_FILE,
    fxRates: fxEnv !== undefined ? parseFxRates(fxEnv) : {},
    openingBalances: balancesFile !== undefined ? loadOpeningBalances(balancesFile) : {},
    verbose: envBool(env, 'LEDGER_VERBOSE', false),
    cache: envBool(env, 'LEDGER_CACHE', true),
    ...overrides,
  };

  const result = LedgerConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${describeZodError(result.error)}`);
  }
  return result.data;
}

export function toFxRates(table: FxRateTable): ReadonlyMap<string, Decimal> {
  return new Map(Object.entries(table).map(([code, rate]) => [code, new Decimal(rate)]));
}

/**
 * Opening-balance overrides for one company, keyed by `YYYY-MM`.
 */
export function openingBalancesFor(
  balances: OpeningBalances,
  companyCode: string
): ReadonlyMap<string, Decimal> {
  const prefix = `${companyCode}:`;
  const overrides = new Map<string, Decimal>();
  for (const [key, amount] of Object.entries(balances)) {
    if (key.startsWith(prefix)) {
      overrides.set(key.slice(prefix.length), new Decimal(amount));
    }
  }
  return overrides;
}

export class CompanyRegistry {
  private readonly byCode: ReadonlyMap<string, Company>;

  constructor(readonly companies: readonly Company[]) {
    this.byCode = new Map(companies.map((company) => [company.code, company]));
  }

  static fromFile(filePath: string = DEFAULT_COMPANIES_FILE): CompanyRegistry {
    const result = CompanyRegistryFileSchema.safeParse(readJsonFile(filePath, 'company registry'));
    if (!result.success) {
      throw new ConfigError(`Invalid company registry ${filePath}: ${describeZodError(result.error)}`);
    }
    return new CompanyRegistry(result.data.companies);
  }

  has(code: string): boolean {
    return this.byCode.has(code);
  }

  get(code: string): Company {
    const company = this.byCode.get(code);
    if (company === undefined) {
      const known = this.companies.map((c) => c.code).join(', ');
      throw new ConfigError(`Unknown company "${code}". Known companies: ${known}`);
    }
    return company;
  }
}
