/**
 * Statement Normalizer
 *
 * Turns the raw partner statement sheet into tagged StatementRecords.
 *
 * Tagging rules, first match wins:
 * 1. "Dollar Received" → not eligible, duplicated or not
 * 2. duplicated pin + "Cancel" → eligible
 * 3. pin not duplicated → eligible
 * 4. duplicated pin + any other label → not eligible
 */

import { cellText, parseDecimal, readCell } from './cells';
import { ACTION_LABELS, STATEMENT_LAYOUT } from './constants';
import { MalformedKeyError, UnparseableAmountError } from './errors';
import { extractPartnerPin } from './extractPartnerPin';
import { extractDataRows, findDuplicatePins, labelEquals } from './ledger';
import type {
  LedgerLayout,
  NormalizedLedger,
  PartnerPin,
  RawTable,
  SkippedRow,
  StatementColumn,
  StatementRecord,
} from './types';

interface ParsedStatementRow {
  rowNumber: number;
  pin: PartnerPin;
  actionLabel: string;
  settleAmount: number;
}

/**
 * Decides whether a statement row takes part in matching.
 */
export function isStatementEligible(actionLabel: string, isDuplicatePin: boolean): boolean {
  if (labelEquals(actionLabel, ACTION_LABELS.DOLLAR_RECEIVED)) {
    return false;
  }
  if (isDuplicatePin) {
    return labelEquals(actionLabel, ACTION_LABELS.CANCEL);
  }
  return true;
}

/**
 * Normalizes a raw statement sheet.
 *
 * Rows without a trailing 11-digit pin or with an unparseable Settle.Amt are
 * skipped and listed in `skipped`; they do not count towards duplicates.
 *
 * @throws InvalidLedgerError when the sheet has the wrong shape or no data
 */
export function normalizeStatement(
  table: RawTable,
  layout: LedgerLayout<StatementColumn> = STATEMENT_LAYOUT
): NormalizedLedger<StatementRecord> {
  const dataRows = extractDataRows(table, layout, 'statement');
  const parsed: ParsedStatementRow[] = [];
  const skipped: SkippedRow[] = [];

  for (const { rowNumber, cells } of dataRows) {
    const description = cellText(readCell(cells, layout.columns.description));
    const pin = extractPartnerPin(description);
    if (pin === null) {
      const error = new MalformedKeyError(description);
      skipped.push({ source: 'statement', rowNumber, code: error.code, reason: error.message });
      continue;
    }

    const amountCell = readCell(cells, layout.columns.settleAmount);
    const settleAmount = parseDecimal(amountCell);
    if (settleAmount === null) {
      const error = new UnparseableAmountError('Settle.Amt', cellText(amountCell));
      skipped.push({ source: 'statement', rowNumber, code: error.code, reason: error.message });
      continue;
    }

    parsed.push({
      rowNumber,
      pin,
      actionLabel: cellText(readCell(cells, layout.columns.action)),
      settleAmount,
    });
  }

  const duplicates = findDuplicatePins(parsed.map((row) => row.pin));

  const records = parsed.map((row): StatementRecord => {
    const isDuplicatePin = duplicates.has(row.pin);
    return {
      ...row,
      isDuplicatePin,
      reconcileEligible: isStatementEligible(row.actionLabel, isDuplicatePin),
    };
  });

  return { records, skipped, rowsRead: dataRows.length };
}

export default normalizeStatement;
