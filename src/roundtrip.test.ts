import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import ExcelJS from 'exceljs';
import { FileIOError, SchemaError } from './errors';
import { Table } from './types';
import {
  formatError,
  formatSize,
  loadTable,
  normalizeCellValue,
  readTable,
  readWorkbook,
  saveWorkbook,
  writeTable
} from './utils';

// Test directory for temporary files
let testDir: string;

beforeAll(() => {
  testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sheet-actions-roundtrip-'));
});

afterAll(() => {
  // Clean up test directory
  fs.rmSync(testDir, { recursive: true, force: true });
});

describe('Roundtrip: table → XLSX → table', () => {
  it('keeps column names, kinds and empty cells', async () => {
    const table: Table = {
      columns: ['Name', 'Joined', 'Salary', 'Active'],
      rows: [
        ['Alice', new Date(Date.UTC(2024, 0, 31)), 100.5, true],
        ['Bob', null, 200, false]
      ]
    };
    const filePath = path.join(testDir, 'staff.xlsx');

    const bytes = await saveWorkbook(writeTable(table, 'Staff'), filePath);
    expect(bytes).toBe(fs.statSync(filePath).size);

    const loaded = await loadTable(filePath);
    expect(loaded.sheetName).toBe('Staff');
    expect(loaded.table).toEqual(table);
  });

  it('writes a bold header row', async () => {
    const workbook = writeTable({ columns: ['A'], rows: [[1]] }, 'Data');
    const sheet = workbook.getWorksheet('Data');
    expect(sheet?.getCell('A1').font?.bold).toBe(true);
    expect(sheet?.getColumn(1).width).toBe(20);
  });

  it('creates missing output directories', async () => {
    const filePath = path.join(testDir, 'nested', 'deeper', 'out.xlsx');
    await saveWorkbook(writeTable({ columns: ['A'], rows: [] }, 'Sheet1'), filePath);
    expect(fs.existsSync(filePath)).toBe(true);
  });

  it('reads a named sheet and reports unknown ones', async () => {
    const workbook = new ExcelJS.Workbook();
    workbook.addWorksheet('First').addRow(['A']);
    const second = workbook.addWorksheet('Second');
    second.addRow(['B']);
    second.addRow([2]);
    const filePath = path.join(testDir, 'two-sheets.xlsx');
    await saveWorkbook(workbook, filePath);

    expect((await loadTable(filePath, 'Second')).table).toEqual({ columns: ['B'], rows: [[2]] });
    await expect(loadTable(filePath, 'Secnd')).rejects.toThrow('Sheet "Secnd" not found. Did you mean: "Second"?');
    await expect(loadTable(filePath, 'Secnd')).rejects.toBeInstanceOf(SchemaError);
  });

  it('fails with FileIOError for unreadable input', async () => {
    await expect(readWorkbook(path.join(testDir, 'missing.xlsx'))).rejects.toBeInstanceOf(FileIOError);

    const notAWorkbook = path.join(testDir, 'plain.xlsx');
    fs.writeFileSync(notAWorkbook, 'just text', 'utf-8');
    await expect(readWorkbook(notAWorkbook)).rejects.toMatchObject({ kind: 'IOError', parameter: 'input' });
  });
});

describe('readTable', () => {
  it('names empty and repeated headers and skips blank rows', () => {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Raw');
    sheet.getCell('A1').value = 'A';
    sheet.getCell('C1').value = 'A';
    sheet.getCell('A2').value = 1;
    sheet.getCell('B2').value = 2;
    sheet.getCell('C2').value = 3;
    sheet.getCell('B4').value = 5;

    expect(readTable(sheet)).toEqual({
      columns: ['A', 'Unnamed: 1', 'A.1'],
      rows: [
        [1, 2, 3],
        [null, 5, null]
      ]
    });
  });

  it('reads an empty sheet as an empty table', () => {
    const workbook = new ExcelJS.Workbook();
    expect(readTable(workbook.addWorksheet('Empty'))).toEqual({ columns: [], rows: [] });
  });
});

describe('normalizeCellValue', () => {
  it('reduces rich values to plain ones', () => {
    expect(normalizeCellValue({ richText: [{ text: 'Hel' }, { text: 'lo' }] })).toBe('Hello');
    expect(normalizeCellValue({ text: 'Site', hyperlink: 'https://example.com' })).toBe('Site');
    expect(normalizeCellValue({ formula: 'B1*2', result: 4, date1904: false })).toBe(4);
    expect(normalizeCellValue({ error: '#DIV/0!' })).toBeNull();
    expect(normalizeCellValue('')).toBeNull();
    expect(normalizeCellValue(undefined)).toBeNull();
  });
});

describe('reporting helpers', () => {
  it('formats sizes and errors', () => {
    expect(formatSize(2048)).toBe('2.00 KB');

    const error = new SchemaError('Column "X" not found', { parameter: 'column', value: 'X' });
    error.action = 'filter';
    expect(formatError(error)).toBe('[SchemaError] filter --column: Column "X" not found');
  });
});
