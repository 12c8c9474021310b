import {
  ZERO,
  isInRange,
  type ClassifiedRecord,
  type CompanyFeeBucket,
  type DateRange,
  type FeeBucket,
  type FeeCategory,
  type FeeSummary,
  type KnownCsvShape,
  type StatementWarning,
  type TransactionRecord,
} from '@payout-ledger/types';

export interface FeeCategoryRules {
  /** Substrings, matched against lower-cased product text. */
  conference: readonly string[];
  subscription: readonly string[];
  /** Plan codes such as `m1`; matched as whole words only. */
  subscriptionPlanCodes: readonly string[];
}

export const DEFAULT_FEE_CATEGORY_RULES: FeeCategoryRules = {
  conference: [
    'conference',
    'summit',
    'event',
    'ticket',
    'day pass',
    'one day',
    '全票',
    '一日票',
    '门票',
    '門票',
  ],
  subscription: [
    'subscription',
    'member',
    'vip',
    'premium',
    'monthly',
    'yearly',
    'recharge',
    '会员',
    '會員',
    '一年',
    '订阅',
    '訂閱',
  ],
  subscriptionPlanCodes: ['m1', 'm3', 'm6', 'y1', 'sy1'],
};

const PLAN_COLUMNS = ['stripe_plan (metadata)', 'subs_type (metadata)'] as const;

const PRODUCT_COLUMNS = [
  '4. Product name (metadata)',
  'product_name (metadata)',
  '1. Site (metadata)',
  'site (metadata)',
  '5. Type (metadata)',
  'type (metadata)',
  ...PLAN_COLUMNS,
] as const;

function productText(record: TransactionRecord): string {
  const parts = PRODUCT_COLUMNS.map((column) => record.metadata[column] ?? '');
  parts.push(record.description ?? '');
  return parts.join(' ').toLowerCase();
}

/**
 * Category of the fee charged on a record, from its product metadata and
 * description. Conference keywords win over subscription keywords; a plan
 * column with no keyword match still means a subscription.
 */
export function categorizeFee(
  record: TransactionRecord,
  rules: FeeCategoryRules = DEFAULT_FEE_CATEGORY_RULES
): FeeCategory {
  const text = productText(record);
  if (rules.conference.some((keyword) => text.includes(keyword))) return 'Conference';
  if (rules.subscription.some((keyword) => text.includes(keyword))) return 'Subscription';

  const words = new Set(text.split(/[^\p{L}\p{N}]+/u));
  if (rules.subscriptionPlanCodes.some((code) => words.has(code))) return 'Subscription';
  if (PLAN_COLUMNS.some((column) => record.metadata[column] !== undefined)) return 'Subscription';
  return 'Other';
}

/** Settled charges only: refunded, failed and pending charges carry no kept fee. */
export function isFeeBearingCharge(item: ClassifiedRecord): boolean {
  return item.tier === 'primary' && item.nature === 'payment' && item.record.status === 'succeeded';
}

function emptyBucket(): FeeBucket {
  return { count: 0, amount: ZERO, fee: ZERO, net: ZERO };
}

function emptyCategories(): Record<FeeCategory, FeeBucket> {
  return { Conference: emptyBucket(), Subscription: emptyBucket(), Other: emptyBucket() };
}

function addTo(bucket: FeeBucket, item: ClassifiedRecord): FeeBucket {
  const amount = bucket.amount.plus(item.contribution);
  const fee = bucket.fee.plus(item.record.fee);
  return { count: bucket.count + 1, amount, fee, net: amount.minus(fee) };
}

export interface CompanyFeeInput {
  company: string;
  records: readonly ClassifiedRecord[];
}

export interface BuildFeeSummaryInput {
  range: DateRange;
  currency: string;
  companies: readonly CompanyFeeInput[];
  warnings?: readonly StatementWarning[];
  rules?: FeeCategoryRules;
}

/**
 * Fees on settled charges created within the range, totalled overall and
 * split by category, by the export the record came from, and by company.
 */
export function buildFeeSummary(input: BuildFeeSummaryInput): FeeSummary {
  const rules = input.rules ?? DEFAULT_FEE_CATEGORY_RULES;
  let total = emptyBucket();
  const byCategory = emptyCategories();
  const bySource: Record<KnownCsvShape, FeeBucket> = {
    unified_payments: emptyBucket(),
    balance_history: emptyBucket(),
    itemised_balance_activity: emptyBucket(),
  };

  const byCompany = input.companies.map(({ company, records }): CompanyFeeBucket => {
    let companyTotal = emptyBucket();
    const companyCategories = emptyCategories();

    for (const item of records) {
      if (!isFeeBearingCharge(item) || !isInRange(item.record.createdAt, input.range)) continue;
      const category = categorizeFee(item.record, rules);
      const source = item.record.origin.shape;

      total = addTo(total, item);
      byCategory[category] = addTo(byCategory[category], item);
      bySource[source] = addTo(bySource[source], item);
      companyTotal = addTo(companyTotal, item);
      companyCategories[category] = addTo(companyCategories[category], item);
    }

    return { company, ...companyTotal, byCategory: companyCategories };
  });

  return {
    range: input.range,
    currency: input.currency,
    total,
    byCategory,
    bySource,
    byCompany,
    warnings: input.warnings ?? [],
  };
}
