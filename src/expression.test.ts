import { EvaluationError } from './errors';
import { compileExpression, evaluate, parseExpression, referencedColumns } from './expression';
import { CellValue } from './types';

function evalRow(source: string, row: Record<string, CellValue> = {}): CellValue {
  const compiled = compileExpression(source, Object.keys(row));
  return evaluate(compiled.root, name => row[name]);
}

describe('arithmetic', () => {
  it('computes a column-based value', () => {
    expect(evalRow('Salary * 0.1', { Salary: 100 })).toBe(10);
  });

  it('follows operator precedence', () => {
    expect(evalRow('2 + 3 * 4')).toBe(14);
    expect(evalRow('(2 + 3) * 4')).toBe(20);
    expect(evalRow('2 ** 3 ** 2')).toBe(512);
    expect(evalRow('-2 ** 2')).toBe(-4);
    expect(evalRow('2 ** -1')).toBe(0.5);
  });

  it('floors integer division and keeps the divisor sign for modulo', () => {
    expect(evalRow('7 // 2')).toBe(3);
    expect(evalRow('-7 // 2')).toBe(-4);
    expect(evalRow('7 % -3')).toBe(-2);
  });

  it('concatenates text with +', () => {
    expect(evalRow("First + ' ' + Last", { First: 'Ada', Last: 'Lovelace' })).toBe('Ada Lovelace');
  });

  it('propagates empty operands', () => {
    expect(evalRow('Salary * 2', { Salary: null })).toBeNull();
    expect(evalRow('-Salary', { Salary: null })).toBeNull();
  });

  it('reads backtick-quoted column names', () => {
    expect(evalRow('`Base Salary` + Bonus', { 'Base Salary': 10, Bonus: 5 })).toBe(15);
  });
});

describe('comparisons and logic', () => {
  it('combines comparisons with and/or/not', () => {
    expect(evalRow('Salary > 100 and Dept == "Eng"', { Salary: 150, Dept: 'Eng' })).toBe(true);
    expect(evalRow('Salary > 100 | Dept == "Eng"', { Salary: 50, Dept: 'Sales' })).toBe(false);
    expect(evalRow('not (Salary > 100)', { Salary: 50 })).toBe(true);
    expect(evalRow('~Active', { Active: false })).toBe(true);
    expect(evalRow('Active == True', { Active: true })).toBe(true);
  });

  it('compares dates by instant', () => {
    const row = { Start: new Date(Date.UTC(2024, 0, 1)), End: new Date(Date.UTC(2024, 5, 1)) };
    expect(evalRow('Start < End', row)).toBe(true);
  });

  it('treats empty and mismatched operands as unequal', () => {
    expect(evalRow('Salary == 1', { Salary: null })).toBe(false);
    expect(evalRow('Salary != 1', { Salary: null })).toBe(true);
    expect(evalRow('Name == 1', { Name: 'a' })).toBe(false);
  });

  it('refuses to order values of different kinds', () => {
    expect(() => evalRow('Name < 1', { Name: 'a' })).toThrow('Cannot apply "<" to text and number');
  });
});

describe('errors', () => {
  it('reports syntax errors', () => {
    expect(() => compileExpression('Salary *', ['Salary'])).toThrow('Invalid expression: unexpected end of expression');
    expect(() => compileExpression('Salary $ 2', ['Salary'])).toThrow(
      'Invalid expression: unexpected character "$" at position 7'
    );
    expect(() => compileExpression("'abc", [])).toThrow('Invalid expression: unclosed string at position 0');
    expect(() => compileExpression('1 < 2 < 3', [])).toThrow(EvaluationError);
    expect(() => compileExpression('   ', [])).toThrow('Invalid expression: expression is empty');
  });

  it('reports unknown columns before evaluating anything', () => {
    expect(() => compileExpression('Salry * 2', ['Salary'])).toThrow(
      'Unknown column "Salry" in expression. Did you mean: "Salary"?'
    );
  });

  it('rejects division by zero and type mismatches', () => {
    expect(() => evalRow('Salary / 0', { Salary: 1 })).toThrow('Division by zero in "/"');
    expect(() => evalRow('Name * 2', { Name: 'x' })).toThrow('Cannot apply "*" to text and number');
    expect(() => evalRow('Salary and true', { Salary: 1 })).toThrow('"and" needs true/false values, got number');
  });
});

describe('referencedColumns', () => {
  it('lists each column once in order of use', () => {
    expect(referencedColumns(parseExpression('A + B * A'))).toEqual(['A', 'B']);
  });
});
