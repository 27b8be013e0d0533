/**
 * Settlement Normalizer
 *
 * Turns the raw processor settlement sheet into tagged SettlementRecords
 * carrying a derived USD amount (PayoutRoundAmt ÷ APIRate).
 *
 * A row whose payout or rate cannot be parsed, or whose rate is zero, is
 * skipped outright: it takes no part in presence matching or duplicate
 * grouping, and is listed in `skipped`.
 */

import { cellText, parseDecimal, readCell } from './cells';
import { ACTION_LABELS, SETTLEMENT_LAYOUT } from './constants';
import {
  DivisionByZeroError,
  MalformedKeyError,
  ReconciliationError,
  UnparseableAmountError,
} from './errors';
import { extractPartnerPin } from './extractPartnerPin';
import { extractDataRows, findDuplicatePins, labelEquals } from './ledger';
import type {
  LedgerLayout,
  NormalizedLedger,
  RawRow,
  RawTable,
  SettlementColumn,
  SettlementRecord,
  SkippedRow,
} from './types';

type ParsedSettlementRow = Omit<SettlementRecord, 'isDuplicatePin' | 'reconcileEligible'>;

/**
 * Decides whether a settlement row takes part in matching.
 * There is no "Dollar Received" analog in this ledger.
 */
export function isSettlementEligible(actionLabel: string, isDuplicatePin: boolean): boolean {
  return !isDuplicatePin || labelEquals(actionLabel, ACTION_LABELS.CANCEL);
}

/**
 * Parses one data row, returning the row-level error instead of throwing.
 */
function parseRow(
  rowNumber: number,
  cells: RawRow,
  layout: LedgerLayout<SettlementColumn>
): ParsedSettlementRow | ReconciliationError {
  const pinText = cellText(readCell(cells, layout.columns.pin));
  const pin = extractPartnerPin(pinText);
  if (pin === null) {
    return new MalformedKeyError(pinText);
  }

  const payoutCell = readCell(cells, layout.columns.payoutRoundAmt);
  const payoutRoundAmt = parseDecimal(payoutCell);
  if (payoutRoundAmt === null) {
    return new UnparseableAmountError('PayoutRoundAmt', cellText(payoutCell));
  }

  const rateCell = readCell(cells, layout.columns.apiRate);
  const apiRate = parseDecimal(rateCell);
  if (apiRate === null) {
    return new UnparseableAmountError('APIRate', cellText(rateCell));
  }
  if (apiRate === 0) {
    return new DivisionByZeroError('APIRate');
  }

  return {
    rowNumber,
    pin,
    actionLabel: cellText(readCell(cells, layout.columns.action)),
    payoutRoundAmt,
    apiRate,
    amountUSD: payoutRoundAmt / apiRate,
  };
}

/**
 * Normalizes a raw settlement sheet.
 *
 * @throws InvalidLedgerError when the sheet has the wrong shape or no data
 */
export function normalizeSettlement(
  table: RawTable,
  layout: LedgerLayout<SettlementColumn> = SETTLEMENT_LAYOUT
): NormalizedLedger<SettlementRecord> {
  const dataRows = extractDataRows(table, layout, 'settlement');
  const parsed: ParsedSettlementRow[] = [];
  const skipped: SkippedRow[] = [];

  for (const { rowNumber, cells } of dataRows) {
    const result = parseRow(rowNumber, cells, layout);
    if (result instanceof ReconciliationError) {
      skipped.push({ source: 'settlement', rowNumber, code: result.code, reason: result.message });
    } else {
      parsed.push(result);
    }
  }

  const duplicates = findDuplicatePins(parsed.map((row) => row.pin));

  const records = parsed.map((row): SettlementRecord => {
    const isDuplicatePin = duplicates.has(row.pin);
    return {
      ...row,
      isDuplicatePin,
      reconcileEligible: isSettlementEligible(row.actionLabel, isDuplicatePin),
    };
  });

  return { records, skipped, rowsRead: dataRows.length };
}

export default normalizeSettlement;
