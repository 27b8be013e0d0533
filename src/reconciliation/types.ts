/**
 * Type Definitions for the Ledger Reconciliation Engine
 *
 * These types define the input/output contracts between the normalizers,
 * the matcher and the HTTP/CLI shell. Every record is produced once and
 * never mutated afterwards.
 */

import type { ReconciliationErrorCode } from './errors';

// ============================================
// INPUT TYPES
// ============================================

/**
 * A single spreadsheet cell as read from CSV or XLSX.
 */
export type RawCell = string | number | boolean | null | undefined;

/**
 * A row addressed by fixed column position, never by header name.
 */
export type RawRow = readonly RawCell[];

/**
 * A whole uploaded sheet, top to bottom, including boilerplate rows.
 */
export type RawTable = readonly RawRow[];

/**
 * An 11-digit join key taken from the end of a free-text field.
 */
export type PartnerPin = string & { readonly __brand: 'PartnerPin' };

/**
 * Which ledger a record or diagnostic came from.
 */
export type LedgerSource = 'statement' | 'settlement';

/**
 * Fixed-position layout of an uploaded ledger.
 */
export interface LedgerLayout<TColumn extends string> {
  /** 0-based row indexes that are always boilerplate */
  skipRows: readonly number[];
  /** 0-based index of the column header row */
  headerRow: number;
  /** Spreadsheet column letter for every field the normalizer reads */
  columns: Readonly<Record<TColumn, string>>;
}

export type StatementColumn = 'action' | 'description' | 'settleAmount';
export type SettlementColumn = 'pin' | 'action' | 'payoutRoundAmt' | 'apiRate';

// ============================================
// NORMALIZED RECORDS
// ============================================

export interface StatementRecord {
  /** 1-based row number in the uploaded sheet */
  rowNumber: number;
  pin: PartnerPin;
  actionLabel: string;
  settleAmount: number;
  isDuplicatePin: boolean;
  reconcileEligible: boolean;
}

export interface SettlementRecord {
  rowNumber: number;
  pin: PartnerPin;
  actionLabel: string;
  payoutRoundAmt: number;
  apiRate: number;
  /** payoutRoundAmt / apiRate, unrounded */
  amountUSD: number;
  isDuplicatePin: boolean;
  reconcileEligible: boolean;
}

/**
 * A data row that was dropped from keyed processing.
 */
export interface SkippedRow {
  source: LedgerSource;
  rowNumber: number;
  code: ReconciliationErrorCode;
  reason: string;
}

/**
 * Output of a normalizer: the kept records plus why the others were dropped.
 */
export interface NormalizedLedger<TRecord> {
  records: readonly TRecord[];
  skipped: readonly SkippedRow[];
  /** Number of non-blank data rows after the header */
  rowsRead: number;
}

// ============================================
// MATCHING TYPES
// ============================================

export type Classification =
  | 'PresentInBoth'
  | 'PresentInSettlementOnly'
  | 'PresentInStatementOnly';

export type FinalReconcileStatus =
  | 'Reconciled'
  | 'AmountMismatch'
  | 'MissingInStatement'
  | 'MissingInSettlement';

/**
 * How the matcher treats a pin with several eligible records on one side.
 * - sum: fold the amounts into one and report a warning
 * - reject: fail the run
 */
export type CollisionPolicy = 'sum' | 'reject';

export interface MatchOptions {
  collisionPolicy: CollisionPolicy;
  /** Largest absolute rounded variance still treated as reconciled */
  varianceTolerance: number;
}

export interface ReconciliationResult {
  pin: PartnerPin;
  classification: Classification;
  statementAmount?: number;
  settlementAmountUSD?: number;
  /** Present if and only if classification is PresentInBoth */
  amountVariance?: number;
  finalStatus: FinalReconcileStatus;
}

/**
 * A pin folded under the 'sum' collision policy.
 */
export interface KeyCollision {
  source: LedgerSource;
  pin: PartnerPin;
  recordCount: number;
  rowNumbers: number[];
}

export interface MatchOutcome {
  results: ReconciliationResult[];
  collisions: KeyCollision[];
}

// ============================================
// RUN REPORT
// ============================================

export interface LedgerSummary {
  rowsRead: number;
  recordsKept: number;
  rowsSkipped: number;
  duplicatePins: number;
  eligible: number;
}

export interface ReconciliationSummary {
  statement: LedgerSummary;
  settlement: LedgerSummary;
  byClassification: Record<Classification, number>;
  byFinalStatus: Record<FinalReconcileStatus, number>;
  skippedRows: SkippedRow[];
  collisions: KeyCollision[];
}

export interface ReconciliationReport {
  results: ReconciliationResult[];
  summary: ReconciliationSummary;
}
