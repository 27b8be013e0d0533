/**
 * Ledger Reconciliation Engine
 *
 * Pure, deterministic functions that reconcile a partner statement against
 * a processor settlement report by PartnerPin:
 * - PartnerPin extraction from free text
 * - Per-ledger normalization, duplicate grouping and eligibility tagging
 * - Full outer join with rounded variance
 *
 * Usage:
 * ```typescript
 * import { reconcileLedgers, toResultTable } from './reconciliation';
 *
 * const { results, summary } = reconcileLedgers(statementRows, settlementRows);
 * const table = toResultTable(results);
 * ```
 */

// Main function
export { reconcileLedgers, resolveMatchOptions } from './reconcileLedgers';

// Individual stages (for testing/debugging)
export { extractPartnerPin, isPartnerPin } from './extractPartnerPin';
export { normalizeStatement, isStatementEligible } from './normalizeStatement';
export { normalizeSettlement, isSettlementEligible } from './normalizeSettlement';
export { matchLedgers, varianceStatus } from './matchLedgers';
export { toResultTable, toResultRow, formatAmount } from './resultTable';
export { columnIndex, cellText, parseDecimal, roundCurrency } from './cells';

// Errors
export {
  ReconciliationError,
  MalformedKeyError,
  UnparseableAmountError,
  DivisionByZeroError,
  DuplicateKeyCollisionError,
  InvalidLedgerError,
  isFatalReconciliationError,
} from './errors';
export type { ReconciliationErrorCode } from './errors';

// Constants
export {
  PARTNER_PIN_LENGTH,
  STATEMENT_LAYOUT,
  SETTLEMENT_LAYOUT,
  ACTION_LABELS,
  DEFAULT_MATCH_OPTIONS,
  CLASSIFICATION_LABELS,
  FINAL_STATUS_LABELS,
  RESULT_TABLE_HEADER,
} from './constants';

// Types
export type {
  RawCell,
  RawRow,
  RawTable,
  PartnerPin,
  LedgerSource,
  LedgerLayout,
  StatementRecord,
  SettlementRecord,
  SkippedRow,
  NormalizedLedger,
  Classification,
  FinalReconcileStatus,
  CollisionPolicy,
  MatchOptions,
  ReconciliationResult,
  KeyCollision,
  MatchOutcome,
  ReconciliationSummary,
  ReconciliationReport,
} from './types';
