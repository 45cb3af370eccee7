/**
 * Utility functions for file operations and Excel handling
 */

import * as fs from 'fs';
import * as path from 'path';
import ExcelJS from 'exceljs';
import { ActionError, FileIOError, SchemaError } from './errors';
import { ActionSummary, CellValue, ExcelWriteOptions, NamedTable, Table } from './types';
import { suggestionText } from './validation';

/**
 * Formatting applied to every sheet written from a table
 */
export const OUTPUT_OPTIONS: ExcelWriteOptions = {
  columnWidth: 20,
  boldHeaders: true
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reduce an ExcelJS cell value to a plain value.
 * Rich text and hyperlinks become their text, formulas their cached result,
 * error values and empty text an empty cell.
 */
export function normalizeCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'string') {
    return value === '' ? null : value;
  }
  if (typeof value !== 'object') {
    return value;
  }

  // Handle richText objects (formatted cells in Excel)
  if ('richText' in value) {
    return normalizeCellValue(value.richText.map(rt => rt.text).join(''));
  }
  if ('hyperlink' in value) {
    return normalizeCellValue(value.text);
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return normalizeCellValue(value.result ?? null);
  }
  return null;
}

/**
 * Load an .xlsx file
 * @param parameter - Option the path came from, for error reports
 */
export async function readWorkbook(filePath: string, parameter: string = 'input'): Promise<ExcelJS.Workbook> {
  const resolvedPath = path.resolve(filePath);

  if (!fs.existsSync(resolvedPath)) {
    throw new FileIOError(`Input file "${filePath}" does not exist`, { parameter, value: filePath });
  }

  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(resolvedPath);
  } catch (error) {
    throw new FileIOError(`Cannot read workbook "${filePath}": ${describeError(error)}`, {
      parameter,
      value: filePath,
      cause: error
    });
  }
  return workbook;
}

/**
 * Find a sheet by name, or the first sheet when no name is given
 * @throws SchemaError when the sheet does not exist
 */
export function requireWorksheet(
  workbook: ExcelJS.Workbook,
  sheetName: string | undefined,
  parameter: string
): ExcelJS.Worksheet {
  const names = workbook.worksheets.map(ws => ws.name);

  if (sheetName === undefined) {
    const first = workbook.worksheets[0];
    if (!first) {
      throw new SchemaError('Workbook has no sheets', { parameter });
    }
    return first;
  }

  const worksheet = workbook.worksheets.find(ws => ws.name === sheetName);
  if (!worksheet) {
    throw new SchemaError(`Sheet "${sheetName}" not found${suggestionText(sheetName, names)}`, {
      parameter,
      value: sheetName
    });
  }
  return worksheet;
}

/**
 * Read a worksheet into a table. Row 1 holds the column names; empty header cells
 * become "Unnamed: <index>" and repeated names get ".1", ".2" suffixes.
 * Rows with no values are skipped.
 */
export function readTable(worksheet: ExcelJS.Worksheet): Table {
  const columns: string[] = [];
  const seen = new Map<string, number>();
  const columnCount = worksheet.columnCount;

  const headerRow = worksheet.getRow(1);
  for (let colIdx = 1; colIdx <= columnCount; colIdx++) {
    const raw = normalizeCellValue(headerRow.getCell(colIdx).value);
    const base = raw === null
      ? `Unnamed: ${colIdx - 1}`
      : raw instanceof Date ? raw.toISOString() : String(raw);

    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    columns.push(count === 0 ? base : `${base}.${count}`);
  }

  const rows: CellValue[][] = [];
  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber++) {
    const row = worksheet.getRow(rowNumber);
    const values = columns.map((_, i) => normalizeCellValue(row.getCell(i + 1).value));
    if (values.some(v => v !== null)) {
      rows.push(values);
    }
  }

  return { columns, rows };
}

/**
 * Load a workbook and read one of its sheets as a table
 */
export async function loadTable(
  filePath: string,
  sheetName?: string,
  parameter: string = 'input'
): Promise<NamedTable> {
  const workbook = await readWorkbook(filePath, parameter);
  const worksheet = requireWorksheet(workbook, sheetName, 'sheet');
  return { sheetName: worksheet.name, table: readTable(worksheet) };
}

/**
 * Write a table into a new single-sheet workbook
 * @param options - Excel writing options
 */
export function writeTable(
  table: Table,
  sheetName: string,
  options: ExcelWriteOptions = OUTPUT_OPTIONS
): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(sheetName);

  if (table.columns.length > 0) {
    worksheet.columns = table.columns.map(header => ({
      header: header,
      key: header,
      width: options.columnWidth ?? 20
    }));

    if (options.boldHeaders !== false) {
      const headerRow = worksheet.getRow(1);
      headerRow.font = { bold: true };
      headerRow.commit();
    }
  }

  table.rows.forEach(row => {
    worksheet.addRow(row);
  });

  return workbook;
}

/**
 * Render a workbook and write it to disk in one call, creating the parent directory.
 * @returns Number of bytes written
 */
export async function saveWorkbook(
  workbook: ExcelJS.Workbook,
  filePath: string,
  parameter: string = 'output'
): Promise<number> {
  const resolvedPath = path.resolve(filePath);

  let buffer: Buffer;
  try {
    buffer = Buffer.from(await workbook.xlsx.writeBuffer());
  } catch (error) {
    throw new FileIOError(`Cannot render workbook: ${describeError(error)}`, { parameter, value: filePath, cause: error });
  }

  try {
    fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
    fs.writeFileSync(resolvedPath, buffer);
  } catch (error) {
    throw new FileIOError(`Cannot write "${filePath}": ${describeError(error)}`, { parameter, value: filePath, cause: error });
  }

  return buffer.byteLength;
}

/**
 * Format file size in bytes to KB string
 * @param bytes - Size in bytes
 * @returns Formatted string (e.g., "1.23 KB")
 */
export function formatSize(bytes: number): string {
  return (bytes / 1024).toFixed(2) + ' KB';
}

/**
 * Report a completed action to the console
 */
export function reportResult(summary: ActionSummary): void {
  console.log(
    `✅ Action '${summary.action}' completed successfully. Output saved to ${summary.output} (${formatSize(summary.bytes)})`
  );
  console.log(`   📊 ${summary.detail}`);
}

/**
 * One-line description of a failed action: kind, action, offending option, message
 */
export function formatError(error: ActionError): string {
  const where = [error.action, error.parameter ? `--${error.parameter}` : undefined]
    .filter((part): part is string => part !== undefined)
    .join(' ');
  return `[${error.kind}]${where ? ` ${where}` : ''}: ${error.message}`;
}

/**
 * Report a failure to the console
 */
export function reportError(error: unknown): void {
  if (error instanceof ActionError) {
    console.error(`❌ ${formatError(error)}`);
  } else {
    console.error('❌ Unexpected error:', describeError(error));
  }
}
