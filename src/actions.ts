/**
 * Action dispatch: load the input, run exactly one transformation, save the output.
 * Nothing is written unless the transformation succeeds.
 */

import { ActionError } from './errors';
import { duplicateSheet, updateCells } from './sheets';
import {
  calculateColumn,
  dropDuplicates,
  filterRows,
  mergeTables,
  renameColumns,
  sortRows,
  summarize
} from './transforms';
import { ActionSummary, AggregateFunction, CellUpdate, JoinType, SortOrder, Table } from './types';
import { loadTable, readWorkbook, saveWorkbook, writeTable } from './utils';
import { coerceToColumn, requireColumn } from './validation';

interface TableActionBase {
  input: string;
  output: string;
  sheet?: string;
}

export interface FilterRequest extends TableActionBase {
  action: 'filter';
  column: string;
  /** Raw text; coerced to the column's kind before comparing */
  value: string;
}

export interface SummarizeRequest extends TableActionBase {
  action: 'summarize';
  groupBy: string;
  aggColumn: string;
  aggFunction: AggregateFunction;
}

export interface CalculateRequest extends TableActionBase {
  action: 'calculate';
  newColumn: string;
  expression: string;
}

export interface MergeRequest {
  action: 'merge';
  left: string;
  right: string;
  output: string;
  on: string;
  how: JoinType;
}

export interface SortRequest extends TableActionBase {
  action: 'sort';
  by: string[];
  order: SortOrder;
}

export interface RenameRequest extends TableActionBase {
  action: 'rename';
  renames: Map<string, string>;
}

export interface DropDuplicatesRequest extends TableActionBase {
  action: 'drop_duplicates';
  subset?: string[];
}

export interface DuplicateSheetRequest {
  action: 'duplicate_sheet';
  input: string;
  output: string;
  sourceSheet: string;
  newSheetName: string;
}

export interface UpdateCellsRequest {
  action: 'update_cells';
  input: string;
  output: string;
  sheetName: string;
  updates: CellUpdate[];
}

export type ActionRequest =
  | FilterRequest
  | SummarizeRequest
  | CalculateRequest
  | MergeRequest
  | SortRequest
  | RenameRequest
  | DropDuplicatesRequest
  | DuplicateSheetRequest
  | UpdateCellsRequest;

export type ActionName = ActionRequest['action'];

function rowChange(before: Table, after: Table): string {
  return `${before.rows.length} → ${after.rows.length} rows, ${after.columns.length} columns`;
}

function applyTableAction(request: Exclude<ActionRequest, MergeRequest | DuplicateSheetRequest | UpdateCellsRequest>, table: Table): Table {
  switch (request.action) {
    case 'filter': {
      const index = requireColumn(table, request.column, 'column');
      const target = coerceToColumn(table.rows.map(row => row[index]), request.value);
      return filterRows(table, request.column, target);
    }
    case 'summarize':
      return summarize(table, request.groupBy, request.aggColumn, request.aggFunction);
    case 'calculate':
      return calculateColumn(table, request.newColumn, request.expression);
    case 'sort':
      return sortRows(table, request.by, request.order);
    case 'rename':
      return renameColumns(table, request.renames);
    case 'drop_duplicates':
      return dropDuplicates(table, request.subset);
  }
}

async function execute(request: ActionRequest): Promise<ActionSummary> {
  const base = { action: request.action, output: request.output };

  switch (request.action) {
    case 'merge': {
      const left = await loadTable(request.left, undefined, 'input1');
      const right = await loadTable(request.right, undefined, 'input2');
      const merged = mergeTables(left.table, right.table, request.on, request.how);
      const bytes = await saveWorkbook(writeTable(merged, left.sheetName), request.output);
      return {
        ...base,
        bytes,
        detail: `${left.table.rows.length} × ${right.table.rows.length} → ${merged.rows.length} rows (${request.how} join on "${request.on}")`
      };
    }

    case 'duplicate_sheet': {
      const workbook = await readWorkbook(request.input);
      duplicateSheet(workbook, request.sourceSheet, request.newSheetName);
      const bytes = await saveWorkbook(workbook, request.output);
      return {
        ...base,
        bytes,
        detail: `Copied "${request.sourceSheet}" to "${request.newSheetName}" (${workbook.worksheets.length} sheets)`
      };
    }

    case 'update_cells': {
      const workbook = await readWorkbook(request.input);
      const written = updateCells(workbook, request.sheetName, request.updates);
      const bytes = await saveWorkbook(workbook, request.output);
      return { ...base, bytes, detail: `Updated ${written} cell(s) in "${request.sheetName}"` };
    }

    default: {
      const { sheetName, table } = await loadTable(request.input, request.sheet);
      const result = applyTableAction(request, table);
      const bytes = await saveWorkbook(writeTable(result, sheetName), request.output);
      return { ...base, bytes, detail: rowChange(table, result) };
    }
  }
}

/**
 * Run one action end to end
 * @throws ActionError tagged with the action name
 */
export async function runAction(request: ActionRequest): Promise<ActionSummary> {
  try {
    return await execute(request);
  } catch (error) {
    if (error instanceof ActionError && error.action === undefined) {
      error.action = request.action;
    }
    throw error;
  }
}
