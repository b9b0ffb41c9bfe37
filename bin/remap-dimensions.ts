#!/usr/bin/env node
/**
 * Dimension Remapper - CLI Entry Point
 *
 * Applies a mapping CSV to a Tableau workbook and writes the renamed copy.
 * The input workbook is never modified; an --output equal to --workbook is rejected.
 *
 * Exit codes:
 * - 0: Workbook written
 * - 1: Remap failed (nothing written)
 * - 2: Fatal error (bad options, I/O failure)
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, withOverrides } from '../src/config.js';
import { formatIssue, renderSummaryBox } from '../src/summary.js';
import { defaultRemapOutputPath } from '../src/tools/fileIO.js';
import { remapDimensions } from '../src/tools/index.js';

type CliOptions = {
  mapping: string;
  workbook: string;
  output?: string;
  strict?: boolean;
  skipHeader?: boolean;
  quiet?: boolean;
  json?: boolean;
};

const program = new Command();

program
  .name('remap-dimensions')
  .description('Rename dimensions in a Tableau workbook using a mapping CSV')
  .version('1.0.0')
  .requiredOption('--mapping <path>', 'Mapping CSV file (original,replacement)')
  .requiredOption('--workbook <path>', 'Tableau workbook file')
  .option('--output <path>', 'Output workbook (default: <name>_remapped_<timestamp>.twb next to the input)')
  .option('--strict', 'Fail when a mapping names a field the workbook does not declare')
  .option('--skip-header', 'Treat the first row of the mapping as a header')
  .option('--quiet', 'Suppress progress output')
  .option('--json', 'Print the result as JSON')
  .parse(process.argv);

const opts = program.opts<CliOptions>();

async function main(): Promise<number> {
  const config = withOverrides(loadConfig(), {
    strict: opts.strict,
    skipHeader: opts.skipHeader,
    quiet: opts.quiet || opts.json
  });
  const outputPath = opts.output ?? defaultRemapOutputPath(opts.workbook);

  const result = await remapDimensions(opts.mapping, opts.workbook, outputPath, {
    strict: config.strict,
    skipHeader: config.skipHeader,
    quiet: config.quiet
  });

  if (opts.json) {
    console.log(JSON.stringify(result, null, 2));
    return result.success ? 0 : 1;
  }

  for (const issue of result.issues) {
    const line = formatIssue(issue);
    console.log(issue.severity === 'error' ? chalk.red(line) : chalk.yellow(line));
  }
  console.log(renderSummaryBox(result));

  if (!result.success) {
    console.error(chalk.red(`Remap failed: ${result.error.message}`));
    return 1;
  }
  return 0;
}

main()
  .then(code => process.exit(code))
  .catch(err => {
    console.error(chalk.red('Fatal error during remap:'));
    console.error(err instanceof Error ? err.message : err);
    process.exit(2);
  });
