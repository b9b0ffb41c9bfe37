#!/usr/bin/env node
/**
 * Mapping Suggestions - CLI Entry Point
 *
 * Writes a starter mapping CSV with normalized names for the rename
 * candidates of a workbook. Review it before running remap-dimensions.
 *
 * Exit codes:
 * - 0: Suggestions written (possibly none)
 * - 1: Workbook could not be read as a Tableau workbook
 * - 2: Fatal error (bad options, I/O failure)
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, withOverrides } from '../src/config.js';
import { suggestMappings } from '../src/tools/index.js';

type CliOptions = {
  workbook: string;
  output: string;
  reorderNames?: boolean;
  calculated?: boolean;
  json?: boolean;
};

const program = new Command();

program
  .name('suggest-mappings')
  .description('Suggest a mapping CSV for the dimensions of a Tableau workbook')
  .version('1.0.0')
  .requiredOption('--workbook <path>', 'Tableau workbook file')
  .requiredOption('--output <path>', 'Mapping CSV to write')
  .option('--reorder-names', 'Move name qualifiers last ("First Name" → "Name First")')
  .option('--no-calculated', 'Do not suggest names for calculated fields')
  .option('--json', 'Print the result as JSON')
  .parse(process.argv);

const opts = program.opts<CliOptions>();

async function main(): Promise<number> {
  const config = withOverrides(loadConfig(), {
    reorderNameQualifiers: opts.reorderNames,
    includeCalculated: opts.calculated === false ? false : undefined
  });
  const result = await suggestMappings(opts.workbook, opts.output, {
    includeCalculated: config.includeCalculated,
    reorderNameQualifiers: config.reorderNameQualifiers
  });

  if (opts.json) {
    console.log(JSON.stringify(result, null, 2));
    return result.success ? 0 : 1;
  }

  if (!result.success) {
    console.error(chalk.red(`${result.error.code}: ${result.error.message}`));
    return 1;
  }

  for (const entry of result.entries) {
    console.log(`  ${entry.original} → ${chalk.green(entry.replacement)}`);
  }
  if (result.count === 0) {
    console.log(chalk.yellow('No suggestions: every candidate name is already normalized'));
  }
  console.log(`Wrote ${result.count} suggestion(s) to ${chalk.cyan(result.outputPath)}`);
  return 0;
}

main()
  .then(code => process.exit(code))
  .catch(err => {
    console.error(chalk.red('Fatal error while suggesting mappings:'));
    console.error(err instanceof Error ? err.message : err);
    process.exit(2);
  });
