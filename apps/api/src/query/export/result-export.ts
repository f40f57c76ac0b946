import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { ExportError } from '../errors';
import { ResultSet, formatCell, numericValue } from '../result-set';

export type ExportFormat = 'csv' | 'xlsx';

export type ExportedFile = {
  filename: string;
  contentType: string;
  body: Buffer;
};

export const SHEET_NAME = 'Results';

/** Longest string an xlsx cell may hold. */
export const XLSX_MAX_TEXT_LENGTH = 32767;

/** Accepts the format names offered by the download form. */
export function parseExportFormat(value: string | undefined): ExportFormat | null {
  switch ((value ?? 'csv').trim().toLowerCase()) {
    case 'csv':
      return 'csv';
    case 'xlsx':
    case 'excel':
      return 'xlsx';
    default:
      return null;
  }
}

export function toCsv(result: ResultSet): string {
  return Papa.unparse({
    fields: result.columns,
    data: result.rows.map((row) => row.map(formatCell)),
  });
}

export function toXlsx(result: ResultSet): Buffer {
  const rows = result.rows.map((row) => row.map((cell) => numericValue(cell) ?? formatCell(cell)));
  const tooLong = [result.columns, ...rows].some((row) =>
    row.some((value) => typeof value === 'string' && value.length > XLSX_MAX_TEXT_LENGTH),
  );
  if (tooLong) {
    throw new ExportError('A value is too long for an Excel cell; download the results as CSV instead.');
  }
  const sheet = XLSX.utils.aoa_to_sheet([result.columns, ...rows]);
  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(book, sheet, SHEET_NAME);
  const out: unknown = XLSX.write(book, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(out)) throw new Error('xlsx writer did not return a buffer');
  return out;
}

export function exportResult(result: ResultSet, format: ExportFormat): ExportedFile {
  if (format === 'csv') {
    return {
      filename: 'query_results.csv',
      contentType: 'text/csv; charset=utf-8',
      body: Buffer.from(toCsv(result), 'utf8'),
    };
  }
  return {
    filename: 'query_results.xlsx',
    contentType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
    body: toXlsx(result),
  };
}
