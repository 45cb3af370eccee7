#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { ActionName, ActionRequest, runAction } from './actions';
import { ActionError } from './errors';
import { reportError, reportResult } from './utils';
import {
  parseAggregateFunction,
  parseCellUpdates,
  parseJoinType,
  parseRenameMap,
  parseSortOrder
} from './validation';

interface FileOptions {
  input: string;
  output: string;
}

interface TableOptions extends FileOptions {
  sheet?: string;
}

interface FilterOptions extends TableOptions {
  column: string;
  value: string;
}

interface SummarizeOptions extends TableOptions {
  groupBy: string;
  aggCol: string;
  aggFunc: string;
}

interface CalculateOptions extends TableOptions {
  newCol: string;
  expr: string;
}

interface MergeOptions {
  input1: string;
  input2: string;
  output: string;
  on: string;
  how: string;
}

interface SortOptions extends TableOptions {
  by: string[];
  order: string;
}

interface RenameOptions extends TableOptions {
  map: string;
}

interface DropDuplicatesOptions extends TableOptions {
  subset?: string[];
}

interface DuplicateSheetOptions extends FileOptions {
  sourceSheet: string;
  newSheetName: string;
}

interface UpdateCellsOptions extends FileOptions {
  sheetName: string;
  updates: string;
}

/**
 * Build the CLI. Each subcommand turns its options into an ActionRequest and hands
 * it to `onRequest`; parameters with their own syntax are parsed here.
 */
export function createProgram(onRequest: (request: ActionRequest) => void): Command {
  // Set before any subcommand exists: subcommands copy the exit handler when created
  const program = new Command().exitOverride();

  program
    .name('sheet-actions')
    .description('A versatile CLI tool for automating Excel workflows: one action per run')
    .version('1.0.0');

  // Errors raised while parsing an option are tagged with the action they belong to
  function handle<T>(action: ActionName, toRequest: (options: T) => ActionRequest) {
    return (options: T): void => {
      try {
        onRequest(toRequest(options));
      } catch (error) {
        if (error instanceof ActionError && error.action === undefined) {
          error.action = action;
        }
        throw error;
      }
    };
  }

  function tableCommand(name: ActionName, description: string): Command {
    return program
      .command(name)
      .description(description)
      .requiredOption('-i, --input <file>', 'Input Excel file')
      .requiredOption('-o, --output <file>', 'Output Excel file')
      .option('--sheet <name>', 'Sheet to read (default: the first sheet)');
  }

  tableCommand('filter', 'Filter rows based on a column value')
    .requiredOption('--column <name>', 'Column to filter on')
    .requiredOption('--value <value>', 'Value to filter for (matched against the column\'s type)')
    .action(handle<FilterOptions>('filter', options => ({
      action: 'filter',
      input: options.input,
      output: options.output,
      sheet: options.sheet,
      column: options.column,
      value: options.value
    })));

  tableCommand('summarize', 'Summarize data by grouping and aggregating')
    .requiredOption('--group-by <name>', 'Column to group by')
    .requiredOption('--agg-col <name>', 'Column to aggregate')
    .requiredOption('--agg-func <name>', 'Aggregation function: mean, sum, count, min or max')
    .action(handle<SummarizeOptions>('summarize', options => ({
      action: 'summarize',
      input: options.input,
      output: options.output,
      sheet: options.sheet,
      groupBy: options.groupBy,
      aggColumn: options.aggCol,
      aggFunction: parseAggregateFunction(options.aggFunc)
    })));

  tableCommand('calculate', 'Calculate a new column using an expression')
    .requiredOption('--new-col <name>', 'Name of the new column')
    .requiredOption('--expr <expression>', 'Expression over existing columns (e.g., "Salary * 1.1")')
    .action(handle<CalculateOptions>('calculate', options => ({
      action: 'calculate',
      input: options.input,
      output: options.output,
      sheet: options.sheet,
      newColumn: options.newCol,
      expression: options.expr
    })));

  program
    .command('merge')
    .description('Merge two Excel files on a shared column')
    .requiredOption('--input1 <file>', 'First input Excel file (left)')
    .requiredOption('--input2 <file>', 'Second input Excel file (right)')
    .requiredOption('-o, --output <file>', 'Output Excel file')
    .requiredOption('--on <name>', 'Column to merge on')
    .option('--how <type>', 'Type of merge: inner, left, right or outer', 'inner')
    .action(handle<MergeOptions>('merge', options => ({
      action: 'merge',
      left: options.input1,
      right: options.input2,
      output: options.output,
      on: options.on,
      how: parseJoinType(options.how)
    })));

  tableCommand('sort', 'Sort rows based on columns')
    .requiredOption('--by <columns...>', 'Column(s) to sort by')
    .option('--order <order>', 'Sort order: asc or desc', 'asc')
    .action(handle<SortOptions>('sort', options => ({
      action: 'sort',
      input: options.input,
      output: options.output,
      sheet: options.sheet,
      by: options.by,
      order: parseSortOrder(options.order)
    })));

  tableCommand('rename', 'Rename one or more columns')
    .requiredOption('--map <mapping>', 'Mapping of old to new names (e.g., "OldName:NewName,Another:New")')
    .action(handle<RenameOptions>('rename', options => ({
      action: 'rename',
      input: options.input,
      output: options.output,
      sheet: options.sheet,
      renames: parseRenameMap(options.map)
    })));

  tableCommand('drop_duplicates', 'Remove duplicate rows')
    .option('--subset <columns...>', 'Column(s) to consider for identifying duplicates')
    .action(handle<DropDuplicatesOptions>('drop_duplicates', options => ({
      action: 'drop_duplicates',
      input: options.input,
      output: options.output,
      sheet: options.sheet,
      subset: options.subset
    })));

  program
    .command('duplicate_sheet')
    .description('Duplicate a sheet in an Excel file')
    .requiredOption('-i, --input <file>', 'Input Excel file')
    .requiredOption('-o, --output <file>', 'Output Excel file')
    .requiredOption('--source-sheet <name>', 'Name of the sheet to duplicate')
    .requiredOption('--new-sheet-name <name>', 'Name for the new duplicated sheet')
    .action(handle<DuplicateSheetOptions>('duplicate_sheet', options => ({
      action: 'duplicate_sheet',
      input: options.input,
      output: options.output,
      sourceSheet: options.sourceSheet,
      newSheetName: options.newSheetName
    })));

  program
    .command('update_cells')
    .description('Update one or more cells in a sheet')
    .requiredOption('-i, --input <file>', 'Input Excel file')
    .requiredOption('-o, --output <file>', 'Output Excel file')
    .requiredOption('--sheet-name <name>', 'Name of the sheet to update')
    .requiredOption('--updates <updates>', 'Cell updates in the format "A1:NewValue,B2:AnotherValue"; plain decimals become numbers, true/false booleans, anything else stays text')
    .action(handle<UpdateCellsOptions>('update_cells', options => ({
      action: 'update_cells',
      input: options.input,
      output: options.output,
      sheetName: options.sheetName,
      updates: parseCellUpdates(options.updates)
    })));

  return program;
}

/**
 * Parse the command line, run the chosen action and report the outcome
 * @param argv - Full argument vector, as in process.argv
 * @returns Process exit code
 */
export async function run(argv: string[]): Promise<number> {
  const parsed: { request?: ActionRequest } = {};
  const program = createProgram(request => {
    parsed.request = request;
  });

  try {
    await program.parseAsync(argv);
    if (!parsed.request) {
      return 0;
    }
    reportResult(await runAction(parsed.request));
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    reportError(error);
    return error instanceof ActionError ? error.exitCode : 1;
  }
}

// Only run CLI if this is the main module
if (require.main === module) {
  run(process.argv)
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
