/**
 * Constants for the Ledger Reconciliation Engine
 *
 * Column letters and boilerplate row positions follow the fixed export
 * formats of the partner statement and the processor settlement report.
 * Adjust the layouts here when a source format drifts; nothing else
 * reads raw positions.
 */

import type {
  Classification,
  FinalReconcileStatus,
  LedgerLayout,
  MatchOptions,
  SettlementColumn,
  StatementColumn,
} from './types';

// ============================================
// KEY FORMAT
// ============================================

/**
 * Exact length of a PartnerPin.
 */
export const PARTNER_PIN_LENGTH = 11;

// ============================================
// LEDGER LAYOUTS
// ============================================

/**
 * Partner statement export.
 *
 * Rows 1-9 carry the partner letterhead and legal text, row 10 is the column
 * header and row 11 is an opening-balance line. Data starts at row 12.
 */
export const STATEMENT_LAYOUT: LedgerLayout<StatementColumn> = {
  skipRows: [0, 1, 2, 3, 4, 5, 6, 7, 8, 10],
  headerRow: 9,
  columns: {
    action: 'B',
    description: 'D',
    settleAmount: 'L',
  },
};

/**
 * Processor settlement report.
 *
 * Rows 1-2 are the report title and run parameters, row 3 is the column header.
 */
export const SETTLEMENT_LAYOUT: LedgerLayout<SettlementColumn> = {
  skipRows: [0, 1],
  headerRow: 2,
  columns: {
    pin: 'D',
    action: 'F',
    payoutRoundAmt: 'K',
    apiRate: 'M',
  },
};

// ============================================
// ACTION LABELS
// ============================================

/**
 * Action labels, compared case-insensitively after trimming.
 */
export const ACTION_LABELS = {
  CANCEL: 'cancel',
  DOLLAR_RECEIVED: 'dollar received',
} as const;

// ============================================
// MATCHING DEFAULTS
// ============================================

export const DEFAULT_MATCH_OPTIONS: MatchOptions = {
  collisionPolicy: 'sum',
  varianceTolerance: 0.01,
};

// ============================================
// OUTPUT LABELS
// ============================================

/**
 * Wording used in exported result tables.
 */
export const CLASSIFICATION_LABELS: Readonly<Record<Classification, string>> = {
  PresentInBoth: 'Present in Both',
  PresentInSettlementOnly: 'Present in the Settlement File but not in the Partner Statement File',
  PresentInStatementOnly: 'Not Present in the Settlement File but are present in the Statement File',
};

export const FINAL_STATUS_LABELS: Readonly<Record<FinalReconcileStatus, string>> = {
  Reconciled: 'Reconciled',
  AmountMismatch: 'Amount Mismatch',
  MissingInStatement: 'Missing in Statement',
  MissingInSettlement: 'Missing in Settlement',
};

export const RESULT_TABLE_HEADER = [
  'PartnerPin',
  'Classification',
  'StatementAmount',
  'SettlementAmountUSD',
  'AmountVariance',
  'FinalReconcileStatus',
] as const;
