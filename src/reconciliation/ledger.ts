/**
 * Shared steps of both normalizers: dropping boilerplate rows, validating
 * the table shape, duplicate grouping and label comparison.
 */

import { columnIndex, isBlankRow } from './cells';
import { InvalidLedgerError } from './errors';
import type { LedgerLayout, LedgerSource, PartnerPin, RawRow, RawTable } from './types';

export interface DataRow {
  /** 1-based row number in the uploaded sheet */
  rowNumber: number;
  cells: RawRow;
}

/**
 * Returns the candidate data rows of a ledger, in sheet order.
 *
 * @throws InvalidLedgerError when the header row is missing, narrower than
 * the mapped columns, or no data rows follow it
 */
export function extractDataRows<TColumn extends string>(
  table: RawTable,
  layout: LedgerLayout<TColumn>,
  source: LedgerSource
): DataRow[] {
  const header = table[layout.headerRow];
  if (header === undefined) {
    throw new InvalidLedgerError(
      source,
      `expected a header on row ${layout.headerRow + 1} but the sheet has ${table.length} rows`
    );
  }

  const letters: string[] = Object.values(layout.columns);
  const requiredWidth = Math.max(...letters.map(columnIndex)) + 1;
  if (header.length < requiredWidth) {
    throw new InvalidLedgerError(
      source,
      `header row has ${header.length} columns, expected at least ${requiredWidth}`
    );
  }

  const skip = new Set(layout.skipRows);
  const rows: DataRow[] = [];
  table.forEach((cells, index) => {
    if (index <= layout.headerRow || skip.has(index) || isBlankRow(cells)) return;
    rows.push({ rowNumber: index + 1, cells });
  });

  if (rows.length === 0) {
    throw new InvalidLedgerError(source, 'no data rows after the header');
  }

  return rows;
}

/**
 * Pins that occur on two or more rows.
 */
export function findDuplicatePins(pins: readonly PartnerPin[]): Set<PartnerPin> {
  const counts = new Map<PartnerPin, number>();
  for (const pin of pins) {
    counts.set(pin, (counts.get(pin) ?? 0) + 1);
  }

  const duplicates = new Set<PartnerPin>();
  for (const [pin, count] of counts) {
    if (count > 1) duplicates.add(pin);
  }
  return duplicates;
}

/**
 * Case-insensitive, whitespace-tolerant label comparison.
 */
export function labelEquals(label: string, expected: string): boolean {
  return label.trim().toLowerCase() === expected;
}
