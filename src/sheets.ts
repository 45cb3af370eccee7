/**
 * Structural edits on a whole workbook: copying a sheet and overwriting cells.
 * These work on the ExcelJS workbook itself so styles, widths and merges survive.
 */

import ExcelJS from 'exceljs';
import { CellAddress, formatA1Cell, parseA1Cell } from './a1';
import { CellRangeError, ConflictError } from './errors';
import { CellUpdate } from './types';
import { requireWorksheet } from './utils';
import { validateSheetName } from './validation';

interface MergeBounds {
  top: number;
  left: number;
  bottom: number;
  right: number;
}

/**
 * Copy a sheet to a new sheet appended after the existing ones.
 * Sheet names are compared case-insensitively, as Excel does.
 * @returns The new worksheet
 */
export function duplicateSheet(
  workbook: ExcelJS.Workbook,
  sourceName: string,
  newName: string
): ExcelJS.Worksheet {
  const source = requireWorksheet(workbook, sourceName, 'source-sheet');
  validateSheetName(newName, 'new-sheet-name');

  const taken = workbook.worksheets.find(ws => ws.name.toLowerCase() === newName.toLowerCase());
  if (taken) {
    throw new ConflictError(`Sheet "${taken.name}" already exists`, { parameter: 'new-sheet-name', value: newName });
  }

  const copy = workbook.addWorksheet(newName, {
    properties: { ...source.properties },
    pageSetup: { ...source.pageSetup },
    views: (source.views ?? []).map(view => ({ ...view }))
  });

  for (let colIdx = 1; colIdx <= source.columnCount; colIdx++) {
    const column = source.getColumn(colIdx);
    const target = copy.getColumn(colIdx);
    if (column.width !== undefined) {
      target.width = column.width;
    }
    target.hidden = column.hidden;
    target.style = { ...column.style };
  }

  const merges = new Map<string, MergeBounds>();

  source.eachRow({ includeEmpty: true }, (row, rowNumber) => {
    const targetRow = copy.getRow(rowNumber);
    if (row.height !== undefined) {
      targetRow.height = row.height;
    }

    row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
      const targetCell = targetRow.getCell(colNumber);
      targetCell.style = { ...cell.style };

      if (!cell.isMerged) {
        targetCell.value = cell.value;
        return;
      }

      const master = cell.master;
      const bounds = merges.get(master.address) ?? {
        top: Number(master.row),
        left: Number(master.col),
        bottom: rowNumber,
        right: colNumber
      };
      bounds.bottom = Math.max(bounds.bottom, rowNumber);
      bounds.right = Math.max(bounds.right, colNumber);
      merges.set(master.address, bounds);

      if (master.address === cell.address) {
        targetCell.value = cell.value;
      }
    });
  });

  for (const { top, left, bottom, right } of merges.values()) {
    if (bottom > top || right > left) {
      copy.mergeCells(`${formatA1Cell({ row: top, col: left })}:${formatA1Cell({ row: bottom, col: right })}`);
    }
  }

  return copy;
}

/**
 * Overwrite cells in one sheet. Every reference is parsed and checked against the
 * sheet's current size before any cell changes; nothing outside the used area is written.
 * @returns Number of cells written
 */
export function updateCells(workbook: ExcelJS.Workbook, sheetName: string, updates: CellUpdate[]): number {
  const worksheet = requireWorksheet(workbook, sheetName, 'sheet-name');
  const rowCount = worksheet.rowCount;
  const columnCount = worksheet.columnCount;

  const targets: Array<{ address: CellAddress; update: CellUpdate }> = updates.map(update => {
    const address = parseA1Cell(update.reference, 'updates');
    if (address.row > rowCount || address.col > columnCount) {
      const last = rowCount > 0 && columnCount > 0
        ? formatA1Cell({ row: rowCount, col: columnCount })
        : undefined;
      throw new CellRangeError(
        `Cell ${formatA1Cell(address)} is outside sheet "${worksheet.name}"` +
          (last ? ` (last cell is ${last})` : ' (the sheet is empty)'),
        { parameter: 'updates', value: update.reference }
      );
    }
    return { address, update };
  });

  for (const { address, update } of targets) {
    worksheet.getCell(address.row, address.col).value = update.value;
  }

  return targets.length;
}
