/**
 * Spreadsheet Utilities for the Reconciliation Service
 *
 * Reads uploaded ledgers into positional rows and writes the result table.
 *
 * Key features:
 * - CSV via csv-parse, XLSX/XLS via SheetJS
 * - Rows are kept exactly where the sheet has them (blank rows included),
 *   since ledger layouts address rows and columns by position
 * - Unreadable files surface as 400 errors
 */

import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import { AppError } from './AppError';
import type { RawCell, RawTable } from '../reconciliation';

// ============================================
// Types
// ============================================

export type ResultFormat = 'csv' | 'xlsx';

export const SUPPORTED_EXTENSIONS = ['.csv', '.xlsx', '.xls'] as const;

const csvRowsSchema = z.array(z.array(z.string()));

// ============================================
// Reading
// ============================================

/**
 * Lower-cased extension including the dot, or '' when there is none.
 */
export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? '' : filename.slice(dot).toLowerCase();
}

export function isSupportedFile(filename: string): boolean {
  const extension = fileExtension(filename);
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

/**
 * Parses CSV text into rows of strings. Ragged rows are allowed.
 */
export function parseCsvTable(content: string): RawTable {
  const records: unknown = parse(content, {
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: false,
  });
  return csvRowsSchema.parse(records);
}

/**
 * Reads the first worksheet of an XLSX/XLS workbook into rows.
 *
 * The range is widened to start at A1 so row and column positions match
 * what the user sees in a spreadsheet program.
 */
export function parseWorkbookTable(buffer: Buffer): RawTable {
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  const ref = sheet?.['!ref'];
  if (sheet === undefined || ref === undefined) {
    return [];
  }

  const range = XLSX.utils.decode_range(ref);
  range.s.r = 0;
  range.s.c = 0;

  return XLSX.utils.sheet_to_json<RawCell[]>(sheet, {
    header: 1,
    range,
    blankrows: true,
    defval: null,
    raw: true,
  });
}

/**
 * Reads an uploaded ledger file into positional rows.
 *
 * @throws AppError (400) for unsupported or unreadable files
 */
export function readTable(buffer: Buffer, filename: string): RawTable {
  const extension = fileExtension(filename);

  try {
    if (extension === '.csv') {
      return parseCsvTable(buffer.toString('utf-8'));
    }
    if (extension === '.xlsx' || extension === '.xls') {
      return parseWorkbookTable(buffer);
    }
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw AppError.badRequest(`Could not read ${filename}: ${detail}`);
  }

  throw AppError.badRequest(
    `Unsupported file type for ${filename}. Allowed: ${SUPPORTED_EXTENSIONS.join(', ')}`
  );
}

// ============================================
// Writing
// ============================================

/**
 * Serializes a table of strings as CSV or XLSX.
 */
export function writeTable(rows: readonly (readonly string[])[], format: ResultFormat): Buffer {
  const sheet = XLSX.utils.aoa_to_sheet(rows.map((row) => [...row]));

  if (format === 'csv') {
    return Buffer.from(XLSX.utils.sheet_to_csv(sheet), 'utf-8');
  }

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, 'Reconciliation');
  const output: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(output)) {
    throw AppError.internal('Workbook writer did not return a buffer');
  }
  return output;
}

export const RESULT_CONTENT_TYPES: Readonly<Record<ResultFormat, string>> = {
  csv: 'text/csv; charset=utf-8',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};
