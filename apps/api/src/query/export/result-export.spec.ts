import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { FIRST_FIVE_CUSTOMERS } from '../../../test/fakes';
import { ResultSet, formatCell, toResultSet } from '../result-set';
import { ExportError } from '../errors';
import { SHEET_NAME, XLSX_MAX_TEXT_LENGTH, exportResult, parseExportFormat, toCsv, toXlsx } from './result-export';

const customers = toResultSet(FIRST_FIVE_CUSTOMERS);

function tableView(result: ResultSet): string[][] {
  return [result.columns, ...result.rows.map((row) => row.map(formatCell))];
}

describe('parseExportFormat', () => {
  it('defaults to csv and accepts the excel alias', () => {
    expect(parseExportFormat(undefined)).toBe('csv');
    expect(parseExportFormat(' CSV ')).toBe('csv');
    expect(parseExportFormat('xlsx')).toBe('xlsx');
    expect(parseExportFormat('excel')).toBe('xlsx');
    expect(parseExportFormat('pdf')).toBeNull();
  });
});

describe('toCsv', () => {
  it('writes a header row and one line per row', () => {
    const lines = toCsv(customers).split('\r\n');

    expect(lines).toHaveLength(6);
    expect(lines[0]).toBe('id,first_name,last_name,email,city,signup_date');
    expect(lines[1]).toBe('1,Alice,Johnson,alice@example.com,New York,2022-01-15');
    expect(lines[5]).toBe('5,Elena,Garcia,elena@example.com,,2022-06-30');
  });

  it('quotes values containing separators, quotes or line breaks', () => {
    const csv = toCsv({
      columns: ['note'],
      rows: [[{ kind: 'text', value: 'a, "b"\nc' }]],
    });

    expect(csv).toBe('note\r\n"a, ""b""\nc"');
  });

  it('reads back to the same cells the table shows', () => {
    const parsed = Papa.parse<string[]>(toCsv(customers));

    expect(parsed.errors).toEqual([]);
    expect(parsed.data).toEqual(tableView(customers));
  });

  it('keeps the header when there are no rows', () => {
    expect(toCsv({ columns: ['id', 'email'], rows: [] })).toBe('id,email\r\n');
  });
});

describe('toXlsx', () => {
  it('reads back to the same column names, row count and cells', () => {
    const book = XLSX.read(toXlsx(customers), { type: 'buffer' });
    const sheet = book.Sheets[SHEET_NAME];
    const data = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '' });

    expect(book.SheetNames).toEqual([SHEET_NAME]);
    expect(data.map((row) => row.map(String))).toEqual(tableView(customers));
  });

  it('stores integers and floats as numbers and exact decimals as text', () => {
    const book = XLSX.read(
      toXlsx({
        columns: ['n', 'f', 'd', 'big'],
        rows: [
          [
            { kind: 'integer', value: 3n },
            { kind: 'float', value: 0.5 },
            { kind: 'decimal', value: '249.00' },
            { kind: 'integer', value: 9007199254740993n },
          ],
        ],
      }),
      { type: 'buffer' },
    );
    const data = XLSX.utils.sheet_to_json<unknown[]>(book.Sheets[SHEET_NAME], { header: 1 });

    expect(data[1]).toEqual([3, 0.5, '249.00', '9007199254740993']);
  });

  it('refuses values longer than a spreadsheet cell holds', () => {
    const long: ResultSet = {
      columns: ['note'],
      rows: [[{ kind: 'text', value: 'x'.repeat(XLSX_MAX_TEXT_LENGTH + 1) }]],
    };

    expect(() => toXlsx(long)).toThrow(ExportError);
    expect(() => toXlsx(long)).toThrow('A value is too long for an Excel cell; download the results as CSV instead.');
  });

  it('accepts a value of exactly the cell limit', () => {
    const atLimit: ResultSet = {
      columns: ['note'],
      rows: [[{ kind: 'text', value: 'x'.repeat(XLSX_MAX_TEXT_LENGTH) }]],
    };

    expect(XLSX.read(toXlsx(atLimit), { type: 'buffer' }).SheetNames).toEqual([SHEET_NAME]);
  });
});

describe('exportResult', () => {
  it('names the csv attachment and types it', () => {
    const file = exportResult(customers, 'csv');

    expect(file.filename).toBe('query_results.csv');
    expect(file.contentType).toBe('text/csv; charset=utf-8');
    expect(file.body.toString('utf8').startsWith('id,first_name')).toBe(true);
  });

  it('names the spreadsheet attachment and types it', () => {
    const file = exportResult(customers, 'xlsx');

    expect(file.filename).toBe('query_results.xlsx');
    expect(file.contentType).toBe('application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
    // xlsx files are zip archives
    expect(file.body.subarray(0, 2).toString('latin1')).toBe('PK');
  });
});
