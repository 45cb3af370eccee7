import { ParseError } from './errors';

export interface CellAddress {
  row: number;
  col: number;
}

// Absolute markers ($A$1) are accepted and ignored.
const CELL_RE = /^\$?([A-Z]{1,3})\$?([1-9]\d*)$/i;

export function columnLabelToIndex(label: string): number {
  const normalized = label.trim().toUpperCase();
  if (!/^[A-Z]+$/.test(normalized)) {
    throw new ParseError(`Invalid column label: ${label}`, { value: label });
  }

  let value = 0;
  for (const char of normalized) {
    value = value * 26 + (char.charCodeAt(0) - 64);
  }
  return value;
}

export function columnIndexToLabel(index: number): string {
  if (!Number.isInteger(index) || index <= 0) {
    throw new ParseError(`Invalid column index: ${index}`, { value: String(index) });
  }

  let value = index;
  let label = '';
  while (value > 0) {
    const remainder = (value - 1) % 26;
    label = String.fromCharCode(65 + remainder) + label;
    value = Math.floor((value - 1) / 26);
  }

  return label;
}

/**
 * Parse a COLUMNROW reference such as "B7" into 1-based row and column numbers
 */
export function parseA1Cell(input: string, parameter?: string): CellAddress {
  const match = CELL_RE.exec(input.trim());
  if (!match) {
    throw new ParseError(`Invalid cell reference "${input}" (expected column letters then a row number, e.g. "B7")`, {
      parameter,
      value: input
    });
  }

  return { row: Number(match[2]), col: columnLabelToIndex(match[1]) };
}

export function formatA1Cell(address: CellAddress): string {
  return `${columnIndexToLabel(address.col)}${address.row}`;
}
