/**
 * Cell helpers for fixed-position spreadsheet rows.
 */

import type { RawCell, RawRow } from './types';

/**
 * Converts a spreadsheet column letter to a 0-based index.
 *
 * @example
 * columnIndex('A')  // 0
 * columnIndex('L')  // 11
 * columnIndex('AA') // 26
 */
export function columnIndex(letter: string): number {
  const normalized = letter.trim().toUpperCase();
  if (!/^[A-Z]+$/.test(normalized)) {
    throw new Error(`Invalid column letter: "${letter}"`);
  }

  let index = 0;
  for (const char of normalized) {
    index = index * 26 + (char.charCodeAt(0) - 64);
  }
  return index - 1;
}

/**
 * Renders a cell as trimmed text.
 * Integral numbers print without a fraction so numeric key cells
 * ("12345678901" stored as a number) keep their digits.
 */
export function cellText(cell: RawCell): string {
  if (cell === null || cell === undefined) {
    return '';
  }
  if (typeof cell === 'number') {
    return Number.isInteger(cell) ? cell.toFixed(0) : String(cell);
  }
  return String(cell).trim();
}

/**
 * Reads the cell under a column letter; short rows read as empty.
 */
export function readCell(row: RawRow, column: string): RawCell {
  return row[columnIndex(column)];
}

/**
 * A row with no content in any cell.
 */
export function isBlankRow(row: RawRow): boolean {
  return row.every((cell) => cellText(cell) === '');
}

// Currency marks that may sit next to an amount
const CURRENCY_MARKS = /[$€£¥₹]|USD|EUR|GBP|INR|CAD|AUD|JPY/gi;

const DECIMAL = /^-?(\d+\.?\d*|\.\d+)$/;
const ACCOUNTING_NEGATIVE = /^\((\d+\.?\d*|\.\d+)\)$/;

/**
 * Parses a currency-like cell into a number.
 * Handles: 1234.5, "1234.56", "$1,234.56", "-500.00", " 48 USD ", "(50.00)"
 *
 * Only currency marks, thousands separators and whitespace are stripped;
 * anything else left over makes the cell unparseable.
 *
 * @returns null for empty or unparseable values
 */
export function parseDecimal(cell: RawCell): number | null {
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : null;
  }

  const cleaned = cellText(cell).replace(CURRENCY_MARKS, '').replace(/[,\s]+/g, '');

  const accounting = ACCOUNTING_NEGATIVE.exec(cleaned);
  if (accounting !== null) {
    const amount = Number(accounting[1]);
    return amount === 0 ? 0 : -amount;
  }

  return DECIMAL.test(cleaned) ? Number(cleaned) : null;
}

/**
 * Rounds to cents, halves away from zero.
 *
 * @example
 * roundCurrency(-2.4488) // -2.45
 * roundCurrency(2.445)   // 2.45
 * roundCurrency(-2.445)  // -2.45
 */
export function roundCurrency(value: number): number {
  // toPrecision(15) drops binary noise such as 244.49999999999997
  const cents = Math.round(Number((Math.abs(value) * 100).toPrecision(15)));
  const rounded = cents / 100;
  // Avoid handing out -0
  return value < 0 && rounded !== 0 ? -rounded : rounded;
}
