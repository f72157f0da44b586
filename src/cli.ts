#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { ZodError } from 'zod';
import { extractOptionsSchema, OUTPUT_FORMATS } from './cli-options';
import { extractTable, listSheets } from './command';
import { isUsageError } from './errors';
import { logger, setLogLevel } from './logger';

const program = new Command();

function startSpinner(text: string, quiet: boolean): Ora | undefined {
  return quiet || !process.stderr.isTTY ? undefined : ora(text).start();
}

function fail(spinner: Ora | undefined, title: string, error: unknown): never {
  spinner?.fail(title);
  if (error instanceof ZodError) {
    error.issues.forEach(issue => logger.error(`  • --${issue.path.join('.')}: ${issue.message}`));
    process.exit(2);
  }
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(isUsageError(error) ? 2 : 1);
}

program
  .name('xltable')
  .description('Extract a table with multi-row or merged headers from a spreadsheet sheet')
  .version('1.0.0');

program
  .command('extract', { isDefault: true })
  .description('Read a table from a sheet and write its records')
  .argument('<sheetspec>', 'path/to/workbook!sheet, or path/to/workbook for the leftmost sheet')
  .option('-s, --start <address>', "start row and column, e.g. 'A1' or 'R1C1'")
  .option('-S, --stop <address>', "stop row and column, e.g. 'Z99' or 'R99C26'")
  .option('-r, --start-row <row>', 'start row of the table')
  .option('-R, --stop-row <row>', 'stop row of the table, or the first-cell value that ends it')
  .option('-c, --start-col <col>', 'start column of the table')
  .option('-C, --stop-col <col>', 'stop column of the table, or the header name that ends it')
  .option('--header', 'write the field names as the first line')
  .option('--header-rows <n>', 'rows to read as field names', '1')
  .option('--empty <value>', 'value for empty cells')
  .option('--repeat', 'repeat the previous row value in blank cells')
  .option('--raw', 'keep timestamps at midnight as timestamps')
  .option('-f, --format <format>', `output format (${OUTPUT_FORMATS.join('|')})`, 'csv')
  .option('-o, --output <path>', 'output file path')
  .option('-p, --password <password>', 'password of an encrypted workbook')
  .option('--no-safety', 'skip the pre-flight file checks')
  .option('-v, --verbose', 'detailed operation output')
  .option('-q, --quiet', 'errors only')
  .addHelpText(
    'after',
    `
Notations for ROW, COL and --empty:
  A, $A, BZ ...        column letters
  1, 2, ...            row or column number
  T:text, T(text)      text value
  N:1.5, N(1.5)        numeric value
  1.0, 1.5 ...         numeric value`
  )
  .action(async (sheetspec: string, rawOptions: unknown) => {
    let spinner: Ora | undefined;

    try {
      const options = extractOptionsSchema.parse(rawOptions);
      setLogLevel(options.quiet ? 'error' : options.verbose ? 'debug' : 'warn');
      spinner = startSpinner('Reading table...', options.quiet || !options.output);

      const result = await extractTable(sheetspec, options);

      if (options.output) {
        spinner?.succeed(`${result.recordCount} records from ${result.sheet} written to ${chalk.green(options.output)}`);
      } else {
        process.stdout.write(result.output);
      }
    } catch (error) {
      fail(spinner, 'Extraction failed', error);
    }
  });

program
  .command('sheets')
  .description('List the sheets of a workbook')
  .argument('<input>', 'input file path')
  .option('-p, --password <password>', 'password of an encrypted workbook')
  .option('--no-safety', 'skip the pre-flight file checks')
  .option('--json', 'JSON output for automation')
  .action(async (input: string, options: { password?: string; safety: boolean; json?: boolean }) => {
    const spinner = startSpinner('Reading workbook...', Boolean(options.json));

    try {
      const sheets = await listSheets(input, options);
      spinner?.stop();

      if (options.json) {
        console.log(JSON.stringify(sheets, null, 2));
        return;
      }

      sheets.forEach((sheet, index) => {
        const merges = sheet.mergeCount ? chalk.gray(`, ${sheet.mergeCount} merged`) : '';
        console.log(
          `  ${index + 1}. ${chalk.cyan(sheet.name)} ${sheet.range || '(empty)'}` +
            chalk.gray(` ${sheet.rowCount}x${sheet.columnCount}`) +
            merges
        );
      });
    } catch (error) {
      fail(spinner, 'Failed to read workbook', error);
    }
  });

process.on('unhandledRejection', reason => {
  logger.error(`Unhandled rejection: ${reason instanceof Error ? reason.message : String(reason)}`);
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => fail(undefined, 'xltable failed', error));
