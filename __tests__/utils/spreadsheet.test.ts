/**
 * Tests for spreadsheet reading and writing
 */

import * as XLSX from 'xlsx';
import {
  fileExtension,
  isSupportedFile,
  parseCsvTable,
  readTable,
  writeTable,
  parseWorkbookTable,
} from '../../src/utils/spreadsheet';
import { AppError } from '../../src/utils/AppError';

describe('Spreadsheet Utilities', () => {
  describe('file types', () => {
    it('should extract lower-cased extensions', () => {
      expect(fileExtension('Statement.XLSX')).toBe('.xlsx');
      expect(fileExtension('settlement.2026-09.csv')).toBe('.csv');
      expect(fileExtension('README')).toBe('');
    });

    it('should accept csv, xlsx and xls only', () => {
      expect(isSupportedFile('a.csv')).toBe(true);
      expect(isSupportedFile('a.xlsx')).toBe(true);
      expect(isSupportedFile('a.xls')).toBe(true);
      expect(isSupportedFile('a.pdf')).toBe(false);
      expect(isSupportedFile('csv')).toBe(false);
    });
  });

  describe('parseCsvTable', () => {
    it('should keep rows positional, including quoted commas and ragged rows', () => {
      const table = parseCsvTable('Settlement Report\n"",""\nA,B,C\n1,"2,5",3');

      expect(table).toEqual([['Settlement Report'], ['', ''], ['A', 'B', 'C'], ['1', '2,5', '3']]);
    });

    it('should strip a byte order mark', () => {
      expect(parseCsvTable('\uFEFFPartnerPin\n12345678901')).toEqual([['PartnerPin'], ['12345678901']]);
    });
  });

  describe('readTable', () => {
    it('should read CSV buffers', () => {
      expect(readTable(Buffer.from('a,b\nc,d'), 'ledger.csv')).toEqual([
        ['a', 'b'],
        ['c', 'd'],
      ]);
    });

    it('should read the first worksheet of an XLSX workbook from A1', () => {
      const workbook = XLSX.utils.book_new();
      XLSX.utils.book_append_sheet(
        workbook,
        XLSX.utils.aoa_to_sheet([['Settlement Report'], [], ['', '', '', 12345678901]]),
        'Settlement'
      );
      const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });

      const table = readTable(buffer, 'settlement.xlsx');

      expect(table).toHaveLength(3);
      expect(table[0][0]).toBe('Settlement Report');
      expect(table[2][3]).toBe(12345678901);
    });

    it('should reject unsupported file types', () => {
      expect(() => readTable(Buffer.from('x'), 'ledger.pdf')).toThrow(
        'Unsupported file type for ledger.pdf. Allowed: .csv, .xlsx, .xls'
      );
    });

    it('should report unreadable CSV as a bad request', () => {
      let caught: unknown;
      try {
        readTable(Buffer.from('"unterminated,quote\nx'), 'ledger.csv');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AppError);
      expect(caught).toMatchObject({ statusCode: 400 });
    });
  });

  describe('writeTable', () => {
    const rows = [
      ['PartnerPin', 'Classification', 'AmountVariance'],
      ['12345678901', 'Present in Both', '-2.00'],
    ];

    it('should write CSV that reads back to the same rows', () => {
      const csv = writeTable(rows, 'csv');

      expect(parseCsvTable(csv.toString('utf-8'))).toEqual(rows);
    });

    it('should write an XLSX workbook with the rows on the first sheet', () => {
      const xlsx = writeTable(rows, 'xlsx');

      expect(parseWorkbookTable(xlsx)).toEqual(rows);
    });
  });
});
