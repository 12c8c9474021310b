import { z } from 'zod';
import { DEFAULT_REPORTING_CURRENCY } from '../utils/constants.js';

const CurrencyCodeSchema = z.string().regex(/^[A-Z]{3}$/, 'Currency must be a 3-letter ISO code');

export const DecimalStringSchema = z
  .string()
  .trim()
  .regex(/^-?\d+(\.\d+)?$/, 'Must be a decimal number such as 554.77');

export const PeriodStringSchema = z.string().regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'Period must be YYYY-MM');

export const CompanySchema = z.object({
  code: z.string().regex(/^[a-z][a-z0-9_]*$/, 'Company code must be lowercase'),
  name: z.string().min(1),
  legalName: z.string().min(1).optional(),
  directory: z.string().min(1),
  filePrefixes: z.array(z.string().min(1)).min(1),
  currency: CurrencyCodeSchema.default(DEFAULT_REPORTING_CURRENCY),
});
export type Company = z.infer<typeof CompanySchema>;

export const CompanyRegistryFileSchema = z
  .object({
    companies: z.array(CompanySchema).min(1),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.companies.forEach((company, index) => {
      if (seen.has(company.code)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['companies', index, 'code'],
          message: `Duplicate company code "${company.code}"`,
        });
      }
      seen.add(company.code);
    });
  });
export type CompanyRegistryFile = z.infer<typeof CompanyRegistryFileSchema>;

/** Keys are `<company>:<YYYY-MM>`; values override that month's opening balance. */
export const OpeningBalancesSchema = z.record(
  z.string().regex(/^[a-z][a-z0-9_]*:\d{4}-(0[1-9]|1[0-2])$/, 'Key must be <company>:<YYYY-MM>'),
  DecimalStringSchema
);
export type OpeningBalances = z.infer<typeof OpeningBalancesSchema>;

/** Rate converting one unit of the keyed currency into the reporting currency. */
export const FxRatesSchema = z.record(CurrencyCodeSchema, DecimalStringSchema);
export type FxRateTable = z.infer<typeof FxRatesSchema>;

export const LedgerConfigSchema = z.object({
  dataRoot: z.string().min(1).nullable(),
  companiesFile: z.string().min(1),
  fxRates: FxRatesSchema,
  openingBalances: OpeningBalancesSchema,
  verbose: z.boolean(),
  cache: z.boolean(),
});
export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;
