export {
  tierOf,
  natureOf,
  signedContribution,
  resolveCustomerIdentity,
  classifyRecord,
  classifyRecords,
  partyOf,
  postingsFor,
} from './classifier.js';
export {
  compareClassified,
  groupByCreatedPeriod,
  emptyTotals,
  computePeriodTotals,
  closingBalanceOf,
  resolveOpeningBalance,
  periodsWithActivity,
} from './engine.js';
export type { BalanceOverrides, PeriodBalance, OpeningBalanceResolution } from './engine.js';
export { summarizeSections, sectionsTotal, buildPayoutReport } from './payout-reconciliation.js';
export { buildLedgerRows, buildCustomerSummary, buildStatement } from './statement-builder.js';
export type { BuildStatementInput } from './statement-builder.js';
export { checkStatementIntegrity, assertStatementIntegrity, statementId } from './integrity.js';
export type { BalanceDiscrepancy, StatementIntegrityResult } from './integrity.js';
export {
  categorizeFee,
  isFeeBearingCharge,
  buildFeeSummary,
  DEFAULT_FEE_CATEGORY_RULES,
} from './fee-summary.js';
export type { FeeCategoryRules, CompanyFeeInput, BuildFeeSummaryInput } from './fee-summary.js';
export { startingBalanceFor, buildBalanceSummary } from './balance-summary.js';
export type { StartingBalance, BuildBalanceSummaryInput } from './balance-summary.js';
export { StatementService, createStatementService, toStatementCompany } from './service.js';
export type {
  StatementServiceOptions,
  ServiceHealth,
  CreateServiceOptions,
  BalanceSummaryOptions,
} from './service.js';
