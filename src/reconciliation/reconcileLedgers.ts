/**
 * One reconciliation run: normalize both ledgers, match them and summarize.
 *
 * Pure over its inputs; the caller does all reading, writing and logging.
 */

import { DEFAULT_MATCH_OPTIONS } from './constants';
import { matchLedgers } from './matchLedgers';
import { normalizeSettlement } from './normalizeSettlement';
import { normalizeStatement } from './normalizeStatement';
import type {
  Classification,
  FinalReconcileStatus,
  LedgerSummary,
  MatchOptions,
  NormalizedLedger,
  RawTable,
  ReconciliationReport,
  ReconciliationResult,
} from './types';

function summarizeLedger<TRecord extends { isDuplicatePin: boolean; reconcileEligible: boolean }>(
  ledger: NormalizedLedger<TRecord>
): LedgerSummary {
  return {
    rowsRead: ledger.rowsRead,
    recordsKept: ledger.records.length,
    rowsSkipped: ledger.skipped.length,
    duplicatePins: ledger.records.filter((record) => record.isDuplicatePin).length,
    eligible: ledger.records.filter((record) => record.reconcileEligible).length,
  };
}

function countClassifications(
  results: readonly ReconciliationResult[]
): Record<Classification, number> {
  const count = (classification: Classification): number =>
    results.filter((result) => result.classification === classification).length;
  return {
    PresentInBoth: count('PresentInBoth'),
    PresentInSettlementOnly: count('PresentInSettlementOnly'),
    PresentInStatementOnly: count('PresentInStatementOnly'),
  };
}

function countFinalStatuses(
  results: readonly ReconciliationResult[]
): Record<FinalReconcileStatus, number> {
  const count = (status: FinalReconcileStatus): number =>
    results.filter((result) => result.finalStatus === status).length;
  return {
    Reconciled: count('Reconciled'),
    AmountMismatch: count('AmountMismatch'),
    MissingInStatement: count('MissingInStatement'),
    MissingInSettlement: count('MissingInSettlement'),
  };
}

/**
 * Fills unset options from `defaults`. Keys present but undefined count as unset.
 */
export function resolveMatchOptions(
  overrides: Partial<MatchOptions>,
  defaults: MatchOptions = DEFAULT_MATCH_OPTIONS
): MatchOptions {
  return {
    collisionPolicy: overrides.collisionPolicy ?? defaults.collisionPolicy,
    varianceTolerance: overrides.varianceTolerance ?? defaults.varianceTolerance,
  };
}

/**
 * Reconciles a raw statement sheet against a raw settlement sheet.
 *
 * @throws InvalidLedgerError when either sheet has the wrong shape
 * @throws DuplicateKeyCollisionError under the 'reject' collision policy
 */
export function reconcileLedgers(
  statementTable: RawTable,
  settlementTable: RawTable,
  options: Partial<MatchOptions> = {}
): ReconciliationReport {
  const matchOptions = resolveMatchOptions(options);

  const statement = normalizeStatement(statementTable);
  const settlement = normalizeSettlement(settlementTable);
  const { results, collisions } = matchLedgers(statement.records, settlement.records, matchOptions);

  return {
    results,
    summary: {
      statement: summarizeLedger(statement),
      settlement: summarizeLedger(settlement),
      byClassification: countClassifications(results),
      byFinalStatus: countFinalStatuses(results),
      skippedRows: [...statement.skipped, ...settlement.skipped],
      collisions,
    },
  };
}

export default reconcileLedgers;
