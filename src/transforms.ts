/**
 * Row and column transformations over a single table
 */

import { EvaluationError, ConflictError } from './errors';
import { compileExpression, evaluate } from './expression';
import { AggregateFunction, CellValue, JoinType, SortOrder, Table } from './types';
import { requireColumn } from './validation';

// Ordering between kinds when a column mixes them
const KIND_RANK = { boolean: 0, number: 1, date: 2, string: 3 } as const;

function rankOf(value: Exclude<CellValue, null>): number {
  if (value instanceof Date) return KIND_RANK.date;
  if (typeof value === 'boolean') return KIND_RANK.boolean;
  if (typeof value === 'number') return KIND_RANK.number;
  return KIND_RANK.string;
}

/**
 * Type-aware equality: numbers, text and booleans by value, dates by instant.
 * Values of different kinds are never equal.
 */
export function valuesEqual(a: CellValue, b: CellValue): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}

/**
 * Order two values of any kind; empty values sort after everything else
 */
export function compareValues(a: CellValue, b: CellValue): number {
  if (a === null || b === null) {
    return a === b ? 0 : a === null ? 1 : -1;
  }
  const rankDiff = rankOf(a) - rankOf(b);
  if (rankDiff !== 0) {
    return rankDiff;
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  const left = String(a);
  const right = String(b);
  return left === right ? 0 : left < right ? -1 : 1;
}

/**
 * Key identifying a value by kind and content, for grouping and de-duplication
 */
function valueKey(value: CellValue): string {
  if (value === null) return 'n';
  if (value instanceof Date) return `t${value.getTime()}`;
  return `${typeof value}:${String(value)}`;
}

function rowKey(row: CellValue[], indices: number[]): string {
  return JSON.stringify(indices.map(i => valueKey(row[i])));
}

/**
 * Keep the rows whose column equals the target value
 */
export function filterRows(table: Table, column: string, value: CellValue): Table {
  const index = requireColumn(table, column, 'column');
  return {
    columns: [...table.columns],
    rows: table.rows.filter(row => valuesEqual(row[index], value))
  };
}

function aggregate(fn: AggregateFunction, values: CellValue[], column: string): CellValue {
  const present = values.filter((v): v is Exclude<CellValue, null> => v !== null);

  if (fn === 'count') {
    return present.length;
  }

  if (fn === 'sum' || fn === 'mean') {
    const numbers: number[] = [];
    for (const value of present) {
      if (typeof value !== 'number') {
        throw new EvaluationError(
          `Cannot compute ${fn} of column "${column}": found non-numeric value "${String(value)}"`,
          { parameter: 'agg-col', value: column }
        );
      }
      numbers.push(value);
    }
    const total = numbers.reduce((acc, n) => acc + n, 0);
    if (fn === 'sum') {
      return total;
    }
    return numbers.length === 0 ? null : total / numbers.length;
  }

  if (present.length === 0) {
    return null;
  }
  const rank = rankOf(present[0]);
  if (present.some(v => rankOf(v) !== rank)) {
    throw new EvaluationError(
      `Cannot compute ${fn} of column "${column}": it mixes numbers, dates, text or booleans`,
      { parameter: 'agg-col', value: column }
    );
  }
  return present.reduce((best, v) => {
    const diff = compareValues(v, best);
    return (fn === 'min' ? diff < 0 : diff > 0) ? v : best;
  });
}

/**
 * Group rows by the distinct values of one column and aggregate another.
 * Groups appear in order of first appearance; rows with an empty group key are dropped.
 */
export function summarize(
  table: Table,
  groupBy: string,
  aggColumn: string,
  fn: AggregateFunction
): Table {
  const groupIndex = requireColumn(table, groupBy, 'group-by');
  const aggIndex = requireColumn(table, aggColumn, 'agg-col');

  const groups = new Map<string, { key: CellValue; values: CellValue[] }>();
  for (const row of table.rows) {
    const key = row[groupIndex];
    if (key === null) {
      continue;
    }
    const id = valueKey(key);
    let group = groups.get(id);
    if (!group) {
      group = { key, values: [] };
      groups.set(id, group);
    }
    group.values.push(row[aggIndex]);
  }

  const columns = groupBy === aggColumn ? [groupBy] : [groupBy, aggColumn];
  const rows = Array.from(groups.values()).map(group => {
    const result = aggregate(fn, group.values, aggColumn);
    return columns.length === 1 ? [result] : [group.key, result];
  });

  return { columns, rows };
}

/**
 * Add (or overwrite) a column computed from an expression over each row.
 * Every row is evaluated before the result is built, so a failing row leaves no partial column.
 */
export function calculateColumn(table: Table, newColumn: string, expression: string): Table {
  const compiled = compileExpression(expression, table.columns);
  const indices = new Map(table.columns.map((name, i) => [name, i]));

  const results = table.rows.map((row, rowIndex) => {
    try {
      return evaluate(compiled.root, name => row[indices.get(name) ?? -1] ?? null);
    } catch (error) {
      if (error instanceof EvaluationError) {
        // +2: header row and 1-based numbering, as in the sheet
        throw new EvaluationError(`Row ${rowIndex + 2}: ${error.message}`, {
          parameter: 'expr',
          value: expression,
          cause: error
        });
      }
      throw error;
    }
  });

  const existing = table.columns.indexOf(newColumn);
  if (existing !== -1) {
    return {
      columns: [...table.columns],
      rows: table.rows.map((row, i) => row.map((value, c) => (c === existing ? results[i] : value)))
    };
  }
  return {
    columns: [...table.columns, newColumn],
    rows: table.rows.map((row, i) => [...row, results[i]])
  };
}

/**
 * Join two tables on equal values of a shared column.
 * The result holds the left columns, then the right columns without the join column;
 * other names present on both sides get "_x" / "_y" suffixes.
 */
export function mergeTables(left: Table, right: Table, on: string, how: JoinType = 'inner'): Table {
  const leftKey = requireColumn(left, on, 'on');
  const rightKey = requireColumn(right, on, 'on');

  const rightKept = right.columns.map((_, i) => i).filter(i => i !== rightKey);
  const shared = new Set(left.columns.filter((name, i) => i !== leftKey && right.columns.includes(name) && name !== on));
  const columns = [
    ...left.columns.map(name => (shared.has(name) ? `${name}_x` : name)),
    ...rightKept.map(i => (shared.has(right.columns[i]) ? `${right.columns[i]}_y` : right.columns[i]))
  ];

  const rightByKey = new Map<string, number[]>();
  right.rows.forEach((row, i) => {
    const key = row[rightKey];
    if (key === null) return;
    const id = valueKey(key);
    rightByKey.set(id, [...(rightByKey.get(id) ?? []), i]);
  });

  const leftByKey = new Map<string, number[]>();
  left.rows.forEach((row, i) => {
    const key = row[leftKey];
    if (key === null) return;
    const id = valueKey(key);
    leftByKey.set(id, [...(leftByKey.get(id) ?? []), i]);
  });

  const emptyLeft = (key: CellValue): CellValue[] => left.columns.map((_, i) => (i === leftKey ? key : null));
  const emptyRight = rightKept.map(() => null);
  const combine = (l: CellValue[], r: CellValue[] | undefined): CellValue[] => [
    ...l,
    ...(r ? rightKept.map(i => r[i]) : emptyRight)
  ];
  const matchesFor = (index: Map<string, number[]>, key: CellValue): number[] =>
    key === null ? [] : index.get(valueKey(key)) ?? [];

  const rows: CellValue[][] = [];

  if (how === 'right') {
    for (const r of right.rows) {
      const matches = matchesFor(leftByKey, r[rightKey]);
      if (matches.length === 0) {
        rows.push(combine(emptyLeft(r[rightKey]), r));
      }
      for (const i of matches) {
        rows.push(combine(left.rows[i], r));
      }
    }
    return { columns, rows };
  }

  const matchedRight = new Set<number>();
  for (const l of left.rows) {
    const matches = matchesFor(rightByKey, l[leftKey]);
    if (matches.length === 0 && how !== 'inner') {
      rows.push(combine(l, undefined));
    }
    for (const i of matches) {
      matchedRight.add(i);
      rows.push(combine(l, right.rows[i]));
    }
  }

  if (how === 'outer') {
    right.rows.forEach((r, i) => {
      if (!matchedRight.has(i)) {
        rows.push(combine(emptyLeft(r[rightKey]), r));
      }
    });
  }

  return { columns, rows };
}

/**
 * Stable sort by several columns, all in the same direction.
 * Empty values go last in both directions.
 */
export function sortRows(table: Table, by: string[], order: SortOrder = 'asc'): Table {
  const indices = by.map(column => requireColumn(table, column, 'by'));
  const direction = order === 'asc' ? 1 : -1;

  const rows = [...table.rows].sort((a, b) => {
    for (const i of indices) {
      const x = a[i];
      const y = b[i];
      if (x === null || y === null) {
        const diff = compareValues(x, y);
        if (diff !== 0) return diff;
        continue;
      }
      const diff = compareValues(x, y);
      if (diff !== 0) return diff * direction;
    }
    return 0;
  });

  return { columns: [...table.columns], rows };
}

/**
 * Rename columns; all renames apply at once, so "A:B,B:A" swaps two columns
 */
export function renameColumns(table: Table, renames: ReadonlyMap<string, string>): Table {
  for (const oldName of renames.keys()) {
    requireColumn(table, oldName, 'map');
  }

  const columns = table.columns.map(name => renames.get(name) ?? name);
  const seen = new Set<string>();
  for (const name of columns) {
    if (seen.has(name)) {
      throw new ConflictError(`Renaming would create two columns named "${name}"`, { parameter: 'map', value: name });
    }
    seen.add(name);
  }

  return { columns, rows: table.rows.map(row => [...row]) };
}

/**
 * Remove rows that repeat an earlier row on the subset columns (default: all columns)
 */
export function dropDuplicates(table: Table, subset?: string[]): Table {
  const indices = subset && subset.length > 0
    ? subset.map(column => requireColumn(table, column, 'subset'))
    : table.columns.map((_, i) => i);

  const seen = new Set<string>();
  const rows = table.rows.filter(row => {
    const key = rowKey(row, indices);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });

  return { columns: [...table.columns], rows };
}
