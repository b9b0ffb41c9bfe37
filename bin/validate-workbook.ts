#!/usr/bin/env node
/**
 * Workbook Validator - CLI Entry Point
 *
 * Checks that a .twb parses and reports its datasources, worksheets,
 * duplicate declarations and references to undeclared fields.
 *
 * Exit codes:
 * - 0: Valid (warnings allowed)
 * - 1: Invalid (malformed or unsupported workbook)
 * - 2: Fatal error (file not readable)
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { formatIssue } from '../src/summary.js';
import { validateTableauWorkbook } from '../src/tools/index.js';

type CliOptions = {
  workbook: string;
  json?: boolean;
};

const program = new Command();

program
  .name('validate-workbook')
  .description('Validate a Tableau workbook (.twb)')
  .version('1.0.0')
  .requiredOption('--workbook <path>', 'Tableau workbook file')
  .option('--json', 'Print the full report as JSON')
  .parse(process.argv);

const opts = program.opts<CliOptions>();

async function main(): Promise<number> {
  const report = await validateTableauWorkbook(opts.workbook);

  if (opts.json) {
    console.log(JSON.stringify(report, null, 2));
    return report.valid ? 0 : 1;
  }

  const { summary } = report;
  console.log(chalk.cyan(`Workbook:     ${summary.filePath}`));
  console.log(`Version:      ${summary.version ?? 'unknown'}`);
  console.log(`Datasources:  ${summary.datasources}`);
  console.log(`Worksheets:   ${summary.worksheets}`);
  console.log(`Fields:       ${summary.fields}`);
  console.log(`References:   ${summary.references}`);
  for (const issue of report.issues) {
    const line = formatIssue(issue);
    console.log(issue.severity === 'error' ? chalk.red(line) : chalk.yellow(line));
  }

  if (!report.valid) {
    console.log(chalk.red('Validation failed: workbook cannot be remapped'));
    return 1;
  }
  console.log(chalk.green('✓ Workbook is valid'));
  return 0;
}

main()
  .then(code => process.exit(code))
  .catch(err => {
    console.error(chalk.red('Fatal error during validation:'));
    console.error(err instanceof Error ? err.message : err);
    process.exit(2);
  });
