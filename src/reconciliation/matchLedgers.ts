/**
 * Reconciliation Matcher
 *
 * Full outer join of the eligible statement and settlement records on
 * PartnerPin.
 *
 * Flow:
 * 1. Keep only reconcileEligible records on each side
 * 2. Index each side by pin, applying the collision policy
 * 3. Classify every pin found on either side
 * 4. Compute the rounded variance for pins present in both
 * 5. Sort by pin for reproducible output
 */

import { roundCurrency } from './cells';
import { DEFAULT_MATCH_OPTIONS } from './constants';
import { DuplicateKeyCollisionError } from './errors';
import type {
  FinalReconcileStatus,
  KeyCollision,
  LedgerSource,
  MatchOptions,
  MatchOutcome,
  PartnerPin,
  ReconciliationResult,
  SettlementRecord,
  StatementRecord,
} from './types';

interface KeyedAmount {
  amount: number;
  rowNumbers: number[];
}

interface EligibleEntry {
  pin: PartnerPin;
  rowNumber: number;
  amount: number;
}

/**
 * Indexes eligible entries by pin.
 * Under 'reject' a second entry for a pin throws; under 'sum' the amounts
 * are added and the pin is reported as a collision.
 */
function indexByPin(
  source: LedgerSource,
  entries: readonly EligibleEntry[],
  options: MatchOptions,
  collisions: KeyCollision[]
): Map<PartnerPin, KeyedAmount> {
  const index = new Map<PartnerPin, KeyedAmount>();

  for (const entry of entries) {
    const existing = index.get(entry.pin);
    if (existing === undefined) {
      index.set(entry.pin, { amount: entry.amount, rowNumbers: [entry.rowNumber] });
      continue;
    }
    existing.amount += entry.amount;
    existing.rowNumbers.push(entry.rowNumber);
  }

  for (const [pin, keyed] of index) {
    if (keyed.rowNumbers.length < 2) continue;

    if (options.collisionPolicy === 'reject') {
      throw new DuplicateKeyCollisionError(source, pin, keyed.rowNumbers.length);
    }
    collisions.push({
      source,
      pin,
      recordCount: keyed.rowNumbers.length,
      rowNumbers: [...keyed.rowNumbers],
    });
  }

  return index;
}

/**
 * Final status for a pin present in both ledgers.
 */
export function varianceStatus(amountVariance: number, tolerance: number): FinalReconcileStatus {
  return Math.abs(amountVariance) <= tolerance ? 'Reconciled' : 'AmountMismatch';
}

/**
 * Joins the two normalized ledgers.
 *
 * This function is pure and deterministic - the same records always give
 * the same results in the same order.
 *
 * @throws DuplicateKeyCollisionError under the 'reject' policy when a pin
 * has more than one eligible record on one side
 *
 * @example
 * matchLedgers(statement.records, settlement.records)
 * // { results: [{ pin: '12345678901', classification: 'PresentInBoth',
 * //               amountVariance: -2, finalStatus: 'AmountMismatch', ... }],
 * //   collisions: [] }
 */
export function matchLedgers(
  statementRecords: readonly StatementRecord[],
  settlementRecords: readonly SettlementRecord[],
  options: MatchOptions = DEFAULT_MATCH_OPTIONS
): MatchOutcome {
  const collisions: KeyCollision[] = [];

  const statementIndex = indexByPin(
    'statement',
    statementRecords
      .filter((record) => record.reconcileEligible)
      .map((record) => ({ pin: record.pin, rowNumber: record.rowNumber, amount: record.settleAmount })),
    options,
    collisions
  );
  const settlementIndex = indexByPin(
    'settlement',
    settlementRecords
      .filter((record) => record.reconcileEligible)
      .map((record) => ({ pin: record.pin, rowNumber: record.rowNumber, amount: record.amountUSD })),
    options,
    collisions
  );

  const pins = new Set<PartnerPin>([...statementIndex.keys(), ...settlementIndex.keys()]);
  const results: ReconciliationResult[] = [];

  for (const pin of pins) {
    const statement = statementIndex.get(pin);
    const settlement = settlementIndex.get(pin);

    if (statement !== undefined && settlement !== undefined) {
      const amountVariance = roundCurrency(settlement.amount - statement.amount);
      results.push({
        pin,
        classification: 'PresentInBoth',
        statementAmount: statement.amount,
        settlementAmountUSD: settlement.amount,
        amountVariance,
        finalStatus: varianceStatus(amountVariance, options.varianceTolerance),
      });
    } else if (settlement !== undefined) {
      results.push({
        pin,
        classification: 'PresentInSettlementOnly',
        settlementAmountUSD: settlement.amount,
        finalStatus: 'MissingInStatement',
      });
    } else if (statement !== undefined) {
      results.push({
        pin,
        classification: 'PresentInStatementOnly',
        statementAmount: statement.amount,
        finalStatus: 'MissingInSettlement',
      });
    }
  }

  results.sort((a, b) => (a.pin < b.pin ? -1 : a.pin > b.pin ? 1 : 0));

  return { results, collisions };
}

export default matchLedgers;
