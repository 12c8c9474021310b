import AjvModule from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import ajvFormatsModule from 'ajv-formats';
import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const Ajv = AjvModule.default;
const addFormats = ajvFormatsModule.default;

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export type OutputSchemaName = 'statement.v1' | 'payout-report.v1' | 'fee-summary.v1' | 'balance-summary.v1';

export const AVAILABLE_OUTPUT_SCHEMAS: readonly OutputSchemaName[] = [
  'statement.v1',
  'payout-report.v1',
  'fee-summary.v1',
  'balance-summary.v1',
] as const;

const schemaCache = new Map<OutputSchemaName, object>();

export function getSchemaPath(name: OutputSchemaName): string {
  const schemaDir = resolve(__dirname, '../../schemas');
  return resolve(schemaDir, `${name}.schema.json`);
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

/**
 * Load and return the JSON schema for an output document
 */
export function getSchema(name: OutputSchemaName): object {
  assertOutputSchemaName(name);

  const cached = schemaCache.get(name);
  if (cached !== undefined) {
    return cached;
  }

  const parsed: unknown = JSON.parse(readFileSync(getSchemaPath(name), 'utf-8'));
  if (!isObject(parsed)) {
    throw new Error(`Schema file for "${name}" does not contain a JSON object`);
  }
  schemaCache.set(name, parsed);
  return parsed;
}

export function isOutputSchemaName(name: string): name is OutputSchemaName {
  return AVAILABLE_OUTPUT_SCHEMAS.some((available) => available === name);
}

export function assertOutputSchemaName(name: string): asserts name is OutputSchemaName {
  if (!isOutputSchemaName(name)) {
    throw new Error(
      `Unknown output schema: "${name}". Available schemas: ${AVAILABLE_OUTPUT_SCHEMAS.join(', ')}`
    );
  }
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
}

const validatorCache = new Map<OutputSchemaName, ValidateFunction>();

function getValidator(name: OutputSchemaName): ValidateFunction {
  const cached = validatorCache.get(name);
  if (cached !== undefined) {
    return cached;
  }

  const ajv = new Ajv({ allErrors: true, strict: false, validateFormats: true });
  addFormats(ajv);

  const validate = ajv.compile(getSchema(name));
  validatorCache.set(name, validate);
  return validate;
}

/**
 * Validate a rendered document against its JSON schema
 */
export function validateOutput(name: OutputSchemaName, payload: unknown): ValidationResult {
  const validate = getValidator(name);

  if (validate(payload)) {
    return { valid: true, errors: [] };
  }

  const rawErrors: ErrorObject[] = validate.errors ?? [];
  const errors: ValidationError[] = rawErrors.map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
  }));

  return { valid: false, errors };
}

export function validateOutputOrThrow(name: OutputSchemaName, payload: unknown): void {
  const result = validateOutput(name, payload);
  if (!result.valid) {
    const errorMessages = result.errors
      .map((e) => `  ${e.path}: ${e.message} (${e.keyword})`)
      .join('\n');
    throw new Error(`Schema validation failed for "${name}":\n${errorMessages}`);
  }
}
