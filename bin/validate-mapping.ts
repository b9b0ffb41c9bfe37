#!/usr/bin/env node
/**
 * Mapping Validator - CLI Entry Point
 *
 * Checks a rename CSV (original,replacement) before it is applied.
 *
 * Exit codes:
 * - 0: Valid (warnings allowed)
 * - 1: Invalid (errors found)
 * - 2: Fatal error (bad options, file not readable)
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, withOverrides } from '../src/config.js';
import { formatIssue } from '../src/summary.js';
import { validateMappingFile } from '../src/tools/index.js';

type CliOptions = {
  mapping: string;
  skipHeader?: boolean;
  json?: boolean;
};

const program = new Command();

program
  .name('validate-mapping')
  .description('Validate a dimension mapping CSV')
  .version('1.0.0')
  .requiredOption('--mapping <path>', 'Mapping CSV file (original,replacement)')
  .option('--skip-header', 'Treat the first row as a header')
  .option('--json', 'Print the full report as JSON')
  .parse(process.argv);

const opts = program.opts<CliOptions>();

async function main(): Promise<number> {
  const config = withOverrides(loadConfig(), { skipHeader: opts.skipHeader });
  const report = await validateMappingFile(opts.mapping, { skipHeader: config.skipHeader });

  if (opts.json) {
    console.log(JSON.stringify(report, null, 2));
    return report.valid ? 0 : 1;
  }

  console.log(chalk.cyan(`Mapping file: ${report.summary.filePath}`));
  console.log(`Entries:      ${chalk.green(String(report.summary.totalEntries))}`);
  for (const entry of report.summary.entries) {
    console.log(`  ${entry.original} → ${entry.replacement}`);
  }
  for (const issue of report.issues) {
    const line = formatIssue(issue);
    console.log(issue.severity === 'error' ? chalk.red(line) : chalk.yellow(line));
  }

  if (!report.valid) {
    console.log(chalk.red('Validation failed: mapping has errors'));
    return 1;
  }
  console.log(chalk.green('✓ Mapping is valid'));
  return 0;
}

main()
  .then(code => process.exit(code))
  .catch(err => {
    console.error(chalk.red('Fatal error during validation:'));
    console.error(err instanceof Error ? err.message : err);
    process.exit(2);
  });
