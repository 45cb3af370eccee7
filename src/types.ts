/**
 * Type definitions for the sheet actions
 */

/**
 * A single cell value after normalization. `null` is an empty cell.
 */
export type CellValue = number | string | boolean | Date | null;

/**
 * One sheet loaded as rows of values aligned with the column names
 */
export interface Table {
  columns: string[];
  rows: CellValue[][];
}

/**
 * A table together with the name of the sheet it was read from
 */
export interface NamedTable {
  sheetName: string;
  table: Table;
}

export type AggregateFunction = 'mean' | 'sum' | 'count' | 'min' | 'max';

export type SortOrder = 'asc' | 'desc';

export type JoinType = 'inner' | 'left' | 'right' | 'outer';

/**
 * A requested cell write, before the reference is parsed
 */
export interface CellUpdate {
  reference: string;
  value: CellValue;
}

/**
 * Outcome of one action, for the console report
 */
export interface ActionSummary {
  action: string;
  output: string;
  bytes: number;
  detail: string;
}

/**
 * Options for Excel worksheet creation
 */
export interface ExcelWriteOptions {
  columnWidth?: number;
  boldHeaders?: boolean;
}
