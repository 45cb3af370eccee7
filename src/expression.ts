/**
 * Column expressions for the calculate action.
 *
 * An expression is tokenized and parsed once, its column references are checked
 * against the table, and only then is it evaluated row by row. Column names are
 * bare identifiers or any text in backticks (`Base Salary`).
 */

import { EvaluationError } from './errors';
import { CellValue } from './types';
import { suggestionText } from './validation';

export type UnaryOperator = '-' | '+' | 'not';

export type BinaryOperator =
  | 'or' | 'and'
  | '==' | '!=' | '<' | '<=' | '>' | '>='
  | '+' | '-' | '*' | '/' | '//' | '%' | '**';

export type ExpressionNode =
  | { kind: 'literal'; value: CellValue }
  | { kind: 'column'; name: string }
  | { kind: 'unary'; operator: UnaryOperator; operand: ExpressionNode }
  | { kind: 'binary'; operator: BinaryOperator; left: ExpressionNode; right: ExpressionNode };

type Token =
  | { type: 'number'; value: number; position: number }
  | { type: 'string'; value: string; position: number }
  | { type: 'boolean'; value: boolean; position: number }
  | { type: 'identifier'; name: string; position: number }
  | { type: 'operator'; operator: string; position: number }
  | { type: 'end'; position: number };

const NUMBER_RE = /^(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?/;
const IDENTIFIER_RE = /^[\p{L}_][\p{L}\p{N}_]*/u;
const TWO_CHAR_OPERATORS = ['**', '//', '==', '!=', '<=', '>='];
const ONE_CHAR_OPERATORS = ['+', '-', '*', '/', '%', '<', '>', '(', ')', '&', '|', '~'];
const WORD_OPERATORS = ['and', 'or', 'not'];
const BOOLEAN_WORDS = new Map<string, boolean>([['true', true], ['True', true], ['false', false], ['False', false]]);
const COMPARISON_OPERATORS: readonly BinaryOperator[] = ['==', '!=', '<', '<=', '>', '>='];

function syntaxError(source: string, message: string): EvaluationError {
  return new EvaluationError(`Invalid expression: ${message}`, { parameter: 'expr', value: source });
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];
    const rest = source.slice(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const number = NUMBER_RE.exec(rest);
    if (number) {
      tokens.push({ type: 'number', value: Number(number[0]), position: i });
      i += number[0].length;
      continue;
    }

    if (ch === '`') {
      const close = source.indexOf('`', i + 1);
      if (close === -1) {
        throw syntaxError(source, `unclosed backtick at position ${i}`);
      }
      tokens.push({ type: 'identifier', name: source.slice(i + 1, close), position: i });
      i = close + 1;
      continue;
    }

    if (ch === '"' || ch === "'") {
      let value = '';
      let j = i + 1;
      while (j < source.length && source[j] !== ch) {
        if (source[j] === '\\' && j + 1 < source.length) {
          j++;
        }
        value += source[j];
        j++;
      }
      if (j >= source.length) {
        throw syntaxError(source, `unclosed string at position ${i}`);
      }
      tokens.push({ type: 'string', value, position: i });
      i = j + 1;
      continue;
    }

    const identifier = IDENTIFIER_RE.exec(rest);
    if (identifier) {
      const word = identifier[0];
      const flag = BOOLEAN_WORDS.get(word);
      if (WORD_OPERATORS.includes(word)) {
        tokens.push({ type: 'operator', operator: word, position: i });
      } else if (flag !== undefined) {
        tokens.push({ type: 'boolean', value: flag, position: i });
      } else {
        tokens.push({ type: 'identifier', name: word, position: i });
      }
      i += word.length;
      continue;
    }

    const two = source.slice(i, i + 2);
    if (TWO_CHAR_OPERATORS.includes(two)) {
      tokens.push({ type: 'operator', operator: two, position: i });
      i += 2;
      continue;
    }
    if (ONE_CHAR_OPERATORS.includes(ch)) {
      tokens.push({ type: 'operator', operator: ch, position: i });
      i++;
      continue;
    }

    throw syntaxError(source, `unexpected character "${ch}" at position ${i}`);
  }

  tokens.push({ type: 'end', position: source.length });
  return tokens;
}

/**
 * Recursive-descent parser. Precedence, lowest first:
 * or |, and &, not ~, comparisons, + -, * / // %, unary - +, **
 */
class Parser {
  private index = 0;

  constructor(private readonly source: string, private readonly tokens: Token[]) {}

  parse(): ExpressionNode {
    const node = this.parseOr();
    const token = this.peek();
    if (token.type !== 'end') {
      throw this.unexpected(token);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private matchOperator(...operators: string[]): string | undefined {
    const token = this.peek();
    if (token.type === 'operator' && operators.includes(token.operator)) {
      this.index++;
      return token.operator;
    }
    return undefined;
  }

  private unexpected(token: Token): EvaluationError {
    if (token.type === 'end') {
      return syntaxError(this.source, 'unexpected end of expression');
    }
    const text = this.source.slice(token.position).split(/\s/)[0];
    return syntaxError(this.source, `unexpected "${text}" at position ${token.position}`);
  }

  private parseOr(): ExpressionNode {
    let left = this.parseAnd();
    while (this.matchOperator('or', '|')) {
      left = { kind: 'binary', operator: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ExpressionNode {
    let left = this.parseNot();
    while (this.matchOperator('and', '&')) {
      left = { kind: 'binary', operator: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ExpressionNode {
    if (this.matchOperator('not', '~')) {
      return { kind: 'unary', operator: 'not', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): ExpressionNode {
    const left = this.parseAdditive();
    const operator = COMPARISON_OPERATORS.find(op => this.matchOperator(op) !== undefined);
    if (operator === undefined) {
      return left;
    }
    const right = this.parseAdditive();
    const next = this.peek();
    if (next.type === 'operator' && COMPARISON_OPERATORS.some(op => op === next.operator)) {
      throw syntaxError(this.source, `chained comparison at position ${next.position}; combine comparisons with "and"`);
    }
    return { kind: 'binary', operator, left, right };
  }

  private parseAdditive(): ExpressionNode {
    let left = this.parseTerm();
    for (let op = this.matchOperator('+', '-'); op; op = this.matchOperator('+', '-')) {
      left = { kind: 'binary', operator: op === '+' ? '+' : '-', left, right: this.parseTerm() };
    }
    return left;
  }

  private parseTerm(): ExpressionNode {
    let left = this.parseUnary();
    for (let op = this.matchOperator('*', '/', '//', '%'); op; op = this.matchOperator('*', '/', '//', '%')) {
      const operator: BinaryOperator = op === '*' ? '*' : op === '/' ? '/' : op === '//' ? '//' : '%';
      left = { kind: 'binary', operator, left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): ExpressionNode {
    const op = this.matchOperator('-', '+');
    if (op) {
      return { kind: 'unary', operator: op === '-' ? '-' : '+', operand: this.parseUnary() };
    }
    return this.parsePower();
  }

  private parsePower(): ExpressionNode {
    const base = this.parsePrimary();
    if (this.matchOperator('**')) {
      // right-associative, and the exponent may carry a sign: 2 ** -1
      return { kind: 'binary', operator: '**', left: base, right: this.parseUnary() };
    }
    return base;
  }

  private parsePrimary(): ExpressionNode {
    const token = this.peek();
    switch (token.type) {
      case 'number':
      case 'string':
      case 'boolean':
        this.index++;
        return { kind: 'literal', value: token.value };
      case 'identifier':
        this.index++;
        return { kind: 'column', name: token.name };
      case 'operator':
        if (token.operator === '(') {
          this.index++;
          const inner = this.parseOr();
          if (!this.matchOperator(')')) {
            throw this.unexpected(this.peek());
          }
          return inner;
        }
        throw this.unexpected(token);
      case 'end':
        throw this.unexpected(token);
    }
  }
}

export function parseExpression(source: string): ExpressionNode {
  if (source.trim() === '') {
    throw syntaxError(source, 'expression is empty');
  }
  return new Parser(source, tokenize(source)).parse();
}

/**
 * Collect the column names an expression reads, in order of first use
 */
export function referencedColumns(node: ExpressionNode, found: string[] = []): string[] {
  switch (node.kind) {
    case 'column':
      if (!found.includes(node.name)) {
        found.push(node.name);
      }
      break;
    case 'unary':
      referencedColumns(node.operand, found);
      break;
    case 'binary':
      referencedColumns(node.left, found);
      referencedColumns(node.right, found);
      break;
    case 'literal':
      break;
  }
  return found;
}

function kindOf(value: CellValue): string {
  if (value === null) return 'empty';
  if (value instanceof Date) return 'date';
  if (typeof value === 'string') return 'text';
  return typeof value;
}

function mismatch(operator: string, left: CellValue, right: CellValue): EvaluationError {
  return new EvaluationError(`Cannot apply "${operator}" to ${kindOf(left)} and ${kindOf(right)}`);
}

function arithmetic(operator: BinaryOperator, left: CellValue, right: CellValue): CellValue {
  if (left === null || right === null) {
    return null;
  }
  if (operator === '+' && typeof left === 'string' && typeof right === 'string') {
    return left + right;
  }
  if (typeof left !== 'number' || typeof right !== 'number') {
    throw mismatch(operator, left, right);
  }
  if ((operator === '/' || operator === '//' || operator === '%') && right === 0) {
    throw new EvaluationError(`Division by zero in "${operator}"`);
  }

  let result: number;
  switch (operator) {
    case '+': result = left + right; break;
    case '-': result = left - right; break;
    case '*': result = left * right; break;
    case '/': result = left / right; break;
    case '//': result = Math.floor(left / right); break;
    // modulo takes the sign of the divisor
    case '%': result = left - right * Math.floor(left / right); break;
    case '**': result = Math.pow(left, right); break;
    default: throw mismatch(operator, left, right);
  }

  if (!Number.isFinite(result)) {
    throw new EvaluationError(`Result of "${operator}" is not a finite number`);
  }
  return result;
}

// Both sides are already known to be of the same kind.
function comparable(value: Date | number | string | boolean): string | number {
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'boolean') return Number(value);
  return value;
}

function compare(operator: BinaryOperator, left: CellValue, right: CellValue): boolean {
  if (left === null || right === null) {
    return operator === '!=';
  }
  if (kindOf(left) !== kindOf(right)) {
    if (operator === '==' || operator === '!=') {
      return operator === '!=';
    }
    throw mismatch(operator, left, right);
  }

  const a = comparable(left);
  const b = comparable(right);
  const less = typeof a === 'number' && typeof b === 'number' ? a < b : String(a) < String(b);
  const order = a === b ? 0 : less ? -1 : 1;
  switch (operator) {
    case '==': return order === 0;
    case '!=': return order !== 0;
    case '<': return order < 0;
    case '<=': return order <= 0;
    case '>': return order > 0;
    case '>=': return order >= 0;
    default: throw mismatch(operator, left, right);
  }
}

function requireBoolean(operator: string, value: CellValue): boolean {
  if (typeof value !== 'boolean') {
    throw new EvaluationError(`"${operator}" needs true/false values, got ${kindOf(value)}`);
  }
  return value;
}

/**
 * Evaluate a parsed expression against one row
 * @param lookup - Returns the row's value for a column name
 */
export function evaluate(node: ExpressionNode, lookup: (column: string) => CellValue): CellValue {
  switch (node.kind) {
    case 'literal':
      return node.value;
    case 'column':
      return lookup(node.name);
    case 'unary': {
      const operand = evaluate(node.operand, lookup);
      if (node.operator === 'not') {
        return !requireBoolean('not', operand);
      }
      if (operand === null) {
        return null;
      }
      if (typeof operand !== 'number') {
        throw new EvaluationError(`Cannot apply unary "${node.operator}" to ${kindOf(operand)}`);
      }
      return node.operator === '-' ? -operand : operand;
    }
    case 'binary': {
      if (node.operator === 'and' || node.operator === 'or') {
        const left = requireBoolean(node.operator, evaluate(node.left, lookup));
        if (node.operator === 'and' ? !left : left) {
          return left;
        }
        return requireBoolean(node.operator, evaluate(node.right, lookup));
      }
      const left = evaluate(node.left, lookup);
      const right = evaluate(node.right, lookup);
      if (COMPARISON_OPERATORS.includes(node.operator)) {
        return compare(node.operator, left, right);
      }
      return arithmetic(node.operator, left, right);
    }
  }
}

export interface CompiledExpression {
  source: string;
  root: ExpressionNode;
  columns: string[];
}

/**
 * Parse an expression and check that every column it reads exists
 * @throws EvaluationError on a syntax error or an unknown column
 */
export function compileExpression(source: string, available: readonly string[]): CompiledExpression {
  const root = parseExpression(source);
  const columns = referencedColumns(root);

  for (const column of columns) {
    if (!available.includes(column)) {
      throw new EvaluationError(
        `Unknown column "${column}" in expression${suggestionText(column, available)}`,
        { parameter: 'expr', value: source }
      );
    }
  }

  return { source, root, columns };
}
