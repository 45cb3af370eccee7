/**
 * Parameter parsing, column lookup and typo suggestions
 */

import { ParseError, SchemaError, ValidationError } from './errors';
import { AggregateFunction, CellUpdate, CellValue, JoinType, SortOrder, Table } from './types';

export const AGGREGATE_FUNCTIONS: readonly AggregateFunction[] = ['mean', 'sum', 'count', 'min', 'max'];
export const SORT_ORDERS: readonly SortOrder[] = ['asc', 'desc'];
export const JOIN_TYPES: readonly JoinType[] = ['inner', 'left', 'right', 'outer'];

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
// No leading zeros, exponents or signs other than '-': "007" and "1e3" stay text
const PLAIN_DECIMAL_PATTERN = /^-?(0|[1-9]\d*)(\.\d+)?$/;
const INVALID_SHEET_NAME_CHARS = /[[\]:*?/\\]/;
const MAX_SHEET_NAME_LENGTH = 31;

/**
 * Calculate Levenshtein distance between two strings
 * Used for finding similar strings (typo suggestions)
 */
function levenshteinDistance(str1: string, str2: string): number {
  const len1 = str1.length;
  const len2 = str2.length;
  const matrix: number[][] = [];

  for (let i = 0; i <= len1; i++) {
    matrix[i] = [i];
  }

  for (let j = 0; j <= len2; j++) {
    matrix[0][j] = j;
  }

  for (let i = 1; i <= len1; i++) {
    for (let j = 1; j <= len2; j++) {
      if (str1[i - 1] === str2[j - 1]) {
        matrix[i][j] = matrix[i - 1][j - 1];
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1, // substitution
          matrix[i][j - 1] + 1,     // insertion
          matrix[i - 1][j] + 1      // deletion
        );
      }
    }
  }

  return matrix[len1][len2];
}

/**
 * Find closest matches using Levenshtein distance
 * @param value - The value to match
 * @param options - Candidate names
 * @param maxSuggestions - Maximum number of suggestions to return
 * @returns Closest matches, nearest first
 */
export function findClosestMatches(value: string, options: readonly string[], maxSuggestions: number = 3): string[] {
  const valueLower = value.toLowerCase();

  const distances = options.map(option => ({
    option,
    distance: levenshteinDistance(valueLower, option.toLowerCase())
  }));

  distances.sort((a, b) => a.distance - b.distance);

  // Only suggest names that are reasonably close (distance <= 3)
  return distances
    .filter(d => d.distance <= 3)
    .slice(0, maxSuggestions)
    .map(d => d.option);
}

/**
 * Format a "Did you mean" hint for an unknown name, or an empty string
 */
export function suggestionText(value: string, options: readonly string[]): string {
  const suggestions = findClosestMatches(value, options);
  if (suggestions.length === 0) {
    return '';
  }
  return `. Did you mean: ${suggestions.map(s => `"${s}"`).join(', ')}?`;
}

/**
 * Resolve a column name to its index
 * @throws SchemaError when the table has no such column
 */
export function requireColumn(table: Table, column: string, parameter: string): number {
  const index = table.columns.indexOf(column);
  if (index === -1) {
    throw new SchemaError(
      `Column "${column}" not found${suggestionText(column, table.columns)}`,
      { parameter, value: column }
    );
  }
  return index;
}

function parseChoice<T extends string>(
  text: string,
  choices: readonly T[],
  parameter: string,
  label: string
): T {
  const normalized = text.trim().toLowerCase();
  const choice = choices.find(c => c === normalized);
  if (choice === undefined) {
    throw new ValidationError(
      `Unknown ${label} "${text}" (expected one of: ${choices.join(', ')})`,
      { parameter, value: text }
    );
  }
  return choice;
}

export function parseAggregateFunction(text: string, parameter: string = 'agg-func'): AggregateFunction {
  return parseChoice(text, AGGREGATE_FUNCTIONS, parameter, 'aggregate function');
}

export function parseSortOrder(text: string, parameter: string = 'order'): SortOrder {
  return parseChoice(text, SORT_ORDERS, parameter, 'sort order');
}

export function parseJoinType(text: string, parameter: string = 'how'): JoinType {
  return parseChoice(text, JOIN_TYPES, parameter, 'join type');
}

/**
 * Parse a number the way a cell would hold it, or undefined if the text is not numeric
 */
export function parseNumber(text: string): number | undefined {
  const trimmed = text.trim();
  if (!NUMBER_PATTERN.test(trimmed)) {
    return undefined;
  }
  return Number(trimmed);
}

/**
 * Coerce command-line text to the kind of value a column holds, so that
 * "100" matches a numeric column and "2024-01-31" a date column.
 * Text that does not fit the column's kind stays text.
 */
export function coerceToColumn(values: readonly CellValue[], text: string): CellValue {
  if (text === '') {
    return null;
  }
  const sample = values.find(v => v !== null);

  if (typeof sample === 'number') {
    const number = parseNumber(text);
    return number === undefined ? text : number;
  }
  if (typeof sample === 'boolean') {
    const lower = text.trim().toLowerCase();
    return lower === 'true' || lower === 'false' ? lower === 'true' : text;
  }
  if (sample instanceof Date) {
    const time = Date.parse(text);
    return Number.isNaN(time) ? text : new Date(time);
  }
  return text;
}

/**
 * Split "key:value,key:value" into pairs, on the first colon of each entry
 */
function parsePairs(text: string, parameter: string, example: string): Array<[string, string]> {
  if (text.trim() === '') {
    throw new ParseError(`Expected entries like "${example}" but got nothing`, { parameter, value: text });
  }

  return text.split(',').map(entry => {
    const separator = entry.indexOf(':');
    if (separator === -1) {
      throw new ParseError(`Entry "${entry}" is missing ":" (expected "${example}")`, { parameter, value: entry });
    }
    return [entry.slice(0, separator), entry.slice(separator + 1)];
  });
}

/**
 * Parse a rename map written as "OldName:NewName,Another:New"
 */
export function parseRenameMap(text: string, parameter: string = 'map'): Map<string, string> {
  const renames = new Map<string, string>();

  for (const [rawOld, rawNew] of parsePairs(text, parameter, 'OldName:NewName')) {
    const oldName = rawOld.trim();
    const newName = rawNew.trim();
    if (oldName === '' || newName === '') {
      throw new ParseError(
        `Entry "${rawOld}:${rawNew}" needs both an old and a new column name`,
        { parameter, value: `${rawOld}:${rawNew}` }
      );
    }
    if (renames.has(oldName)) {
      throw new ParseError(`Column "${oldName}" is renamed more than once`, { parameter, value: oldName });
    }
    renames.set(oldName, newName);
  }

  return renames;
}

/**
 * Type a value written into a cell. Only plain decimals become numbers, so
 * text such as "007" is written exactly as given.
 */
export function parseUpdateValue(text: string): CellValue {
  if (text === '') {
    return null;
  }
  if (PLAIN_DECIMAL_PATTERN.test(text)) {
    return Number(text);
  }
  const lower = text.toLowerCase();
  if (lower === 'true' || lower === 'false') {
    return lower === 'true';
  }
  return text;
}

/**
 * Parse cell updates written as "A1:NewValue,B2:AnotherValue".
 * References are checked later against the sheet.
 */
export function parseCellUpdates(text: string, parameter: string = 'updates'): CellUpdate[] {
  return parsePairs(text, parameter, 'A1:NewValue').map(([reference, value]) => ({
    reference: reference.trim(),
    value: parseUpdateValue(value)
  }));
}

/**
 * Check a name against Excel's sheet naming rules
 * @throws ValidationError when Excel would reject the name
 */
export function validateSheetName(name: string, parameter: string): void {
  if (name.trim() === '') {
    throw new ValidationError('Sheet name must not be empty', { parameter, value: name });
  }
  if (name.length > MAX_SHEET_NAME_LENGTH) {
    throw new ValidationError(
      `Sheet name "${name}" is longer than ${MAX_SHEET_NAME_LENGTH} characters`,
      { parameter, value: name }
    );
  }
  if (INVALID_SHEET_NAME_CHARS.test(name)) {
    throw new ValidationError(
      `Sheet name "${name}" contains one of the characters [ ] : * ? / \\`,
      { parameter, value: name }
    );
  }
  if (name.startsWith("'") || name.endsWith("'")) {
    throw new ValidationError(`Sheet name "${name}" must not start or end with an apostrophe`, { parameter, value: name });
  }
}
