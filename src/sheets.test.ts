import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import ExcelJS from 'exceljs';
import { CellRangeError, ConflictError, ParseError, SchemaError, ValidationError } from './errors';
import { duplicateSheet, updateCells } from './sheets';
import { readWorkbook, saveWorkbook, writeTable } from './utils';

/**
 * Workbook with a 2×2 sheet "S1" followed by a sheet "Notes"
 */
function makeWorkbook(): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('S1');
  sheet.addRow(['Name', 'Score']);
  sheet.addRow(['Alice', 10]);
  sheet.getColumn(1).width = 30;
  workbook.addWorksheet('Notes').addRow(['hello']);
  return workbook;
}

function sheetNames(workbook: ExcelJS.Workbook): string[] {
  return workbook.worksheets.map(ws => ws.name);
}

describe('updateCells', () => {
  it('overwrites only the addressed cells', () => {
    const workbook = makeWorkbook();
    expect(updateCells(workbook, 'S1', [{ reference: 'A1', value: 'X' }])).toBe(1);

    const sheet = workbook.getWorksheet('S1');
    expect(sheet?.getCell('A1').value).toBe('X');
    expect(sheet?.getCell('B1').value).toBe('Score');
    expect(sheet?.getCell('A2').value).toBe('Alice');
    expect(sheet?.getCell('B2').value).toBe(10);
  });

  it('writes typed values and clears cells', () => {
    const workbook = makeWorkbook();
    updateCells(workbook, 'S1', [
      { reference: 'B2', value: 42 },
      { reference: 'a2', value: null }
    ]);
    const sheet = workbook.getWorksheet('S1');
    expect(sheet?.getCell('B2').value).toBe(42);
    expect(sheet?.getCell('A2').value).toBeNull();
  });

  it('fails on references outside the sheet and changes nothing', () => {
    const workbook = makeWorkbook();
    const updates = [
      { reference: 'A1', value: 'X' },
      { reference: 'Z99', value: 'Y' }
    ];

    expect(() => updateCells(workbook, 'S1', updates)).toThrow(CellRangeError);
    expect(() => updateCells(workbook, 'S1', updates)).toThrow('Cell Z99 is outside sheet "S1" (last cell is B2)');
    expect(() => updateCells(workbook, 'S1', [{ reference: 'C1', value: 1 }])).toThrow(CellRangeError);
    expect(() => updateCells(workbook, 'S1', [{ reference: 'A3', value: 1 }])).toThrow(CellRangeError);
    expect(workbook.getWorksheet('S1')?.getCell('A1').value).toBe('Name');
  });

  it('reports the kind as RangeError', () => {
    try {
      updateCells(makeWorkbook(), 'S1', [{ reference: 'Z99', value: 'X' }]);
      throw new Error('expected a failure');
    } catch (error) {
      expect(error).toMatchObject({ kind: 'RangeError', parameter: 'updates', value: 'Z99' });
    }
  });

  it('fails on a malformed reference or a missing sheet', () => {
    expect(() => updateCells(makeWorkbook(), 'S1', [{ reference: 'A0', value: 1 }])).toThrow(ParseError);
    expect(() => updateCells(makeWorkbook(), 'S2', [{ reference: 'A1', value: 1 }])).toThrow(SchemaError);
  });
});

describe('duplicateSheet', () => {
  it('appends a copy with values and column widths', () => {
    const workbook = makeWorkbook();
    const copy = duplicateSheet(workbook, 'S1', 'S1 copy');

    expect(sheetNames(workbook)).toEqual(['S1', 'Notes', 'S1 copy']);
    expect(copy.getCell('A1').value).toBe('Name');
    expect(copy.getCell('B2').value).toBe(10);
    expect(copy.getColumn(1).width).toBe(30);
  });

  it('leaves the source untouched when the copy changes', () => {
    const workbook = makeWorkbook();
    const copy = duplicateSheet(workbook, 'S1', 'S2');
    copy.getCell('A2').value = 'Bob';
    expect(workbook.getWorksheet('S1')?.getCell('A2').value).toBe('Alice');
  });

  it('copies merged ranges', () => {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Report');
    sheet.getCell('A1').value = 'Title';
    sheet.mergeCells('A1:C1');
    sheet.getCell('A2').value = 1;

    const copy = duplicateSheet(workbook, 'Report', 'Report 2');
    expect(copy.getCell('A1').value).toBe('Title');
    expect(copy.getCell('C1').isMerged).toBe(true);
    expect(copy.getCell('A2').value).toBe(1);
  });

  it('refuses to overwrite an existing sheet', () => {
    const workbook = makeWorkbook();
    expect(() => duplicateSheet(workbook, 'S1', 'S1')).toThrow(ConflictError);
    expect(() => duplicateSheet(workbook, 'S1', 'notes')).toThrow('Sheet "Notes" already exists');
    expect(sheetNames(workbook)).toEqual(['S1', 'Notes']);
  });

  it('fails on a missing source or an invalid name', () => {
    const workbook = makeWorkbook();
    expect(() => duplicateSheet(workbook, 'S3', 'Copy')).toThrow(SchemaError);
    expect(() => duplicateSheet(workbook, 'S1', 'Q1/Q2')).toThrow(ValidationError);
    expect(sheetNames(workbook)).toEqual(['S1', 'Notes']);
  });
});

describe('duplicateSheet on saved workbooks', () => {
  let testDir: string;

  beforeAll(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sheet-actions-sheets-'));
  });

  afterAll(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('copies a sheet written by writeTable', async () => {
    const filePath = path.join(testDir, 'staff.xlsx');
    await saveWorkbook(writeTable({ columns: ['Name', 'Salary'], rows: [['Alice', 100]] }, 'Staff'), filePath);

    const workbook = await readWorkbook(filePath);
    const copy = duplicateSheet(workbook, 'Staff', 'Staff copy');

    expect(sheetNames(workbook)).toEqual(['Staff', 'Staff copy']);
    expect(copy.getCell('A2').value).toBe('Alice');
    expect(copy.getCell('B2').value).toBe(100);
    expect(copy.getColumn(2).width).toBe(20);
  });

  it('keeps merged ranges and widths through save and load', async () => {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Report');
    sheet.getCell('A1').value = 'Title';
    sheet.mergeCells('A1:C2');
    sheet.getCell('A3').value = 7;
    sheet.getColumn(2).width = 35;
    const sourcePath = path.join(testDir, 'report.xlsx');
    await saveWorkbook(workbook, sourcePath);

    const loaded = await readWorkbook(sourcePath);
    duplicateSheet(loaded, 'Report', 'Report 2');
    const copyPath = path.join(testDir, 'report-copy.xlsx');
    await saveWorkbook(loaded, copyPath);

    const copy = (await readWorkbook(copyPath)).getWorksheet('Report 2');
    expect(copy?.getCell('A1').value).toBe('Title');
    expect(copy?.getCell('C2').isMerged).toBe(true);
    expect(copy?.getCell('C2').master.address).toBe('A1');
    expect(copy?.getCell('A3').value).toBe(7);
    expect(copy?.getColumn(2).width).toBe(35);
  });
});
