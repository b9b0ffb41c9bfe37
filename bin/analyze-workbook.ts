#!/usr/bin/env node
/**
 * Workbook Analyzer - CLI Entry Point
 *
 * Lists the declared fields of a workbook, which of them are rename
 * candidates, its worksheets and the name prefixes fields share.
 *
 * Exit codes:
 * - 0: Analysis complete
 * - 1: Workbook could not be analyzed
 * - 2: Fatal error (bad options, file not readable)
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, withOverrides } from '../src/config.js';
import { analyzeWorkbook } from '../src/tools/index.js';

type CliOptions = {
  workbook: string;
  calculated?: boolean;
  json?: boolean;
};

const program = new Command();

program
  .name('analyze-workbook')
  .description('Show the fields and rename candidates of a Tableau workbook')
  .version('1.0.0')
  .requiredOption('--workbook <path>', 'Tableau workbook file')
  .option('--no-calculated', 'Do not treat calculated fields as candidates')
  .option('--json', 'Print the full analysis as JSON')
  .parse(process.argv);

const opts = program.opts<CliOptions>();

async function main(): Promise<number> {
  // --no-calculated defaults the flag to true, so only an explicit false overrides the env
  const config = withOverrides(loadConfig(), {
    includeCalculated: opts.calculated === false ? false : undefined
  });
  const result = await analyzeWorkbook(opts.workbook, { includeCalculated: config.includeCalculated });

  if (opts.json) {
    console.log(JSON.stringify(result, null, 2));
    return result.success ? 0 : 1;
  }

  if (!result.success) {
    console.error(chalk.red(`${result.error.code}: ${result.error.message}`));
    return 1;
  }

  console.log(chalk.cyan(`Workbook ${result.filePath} (version ${result.version ?? 'unknown'})`));
  console.log('');
  console.log(chalk.cyan('Fields:'));
  for (const field of result.fields) {
    const label = field.caption !== undefined ? `${field.name} ("${field.caption}")` : field.name;
    const marker = field.candidate ? chalk.green('●') : ' ';
    console.log(`  ${marker} ${label.padEnd(32)} ${field.kind.padEnd(10)} ${field.role.padEnd(10)} ${field.references} use(s)`);
  }
  console.log('');
  console.log(`Candidates: ${chalk.green(String(result.candidates.length))} of ${result.fields.length}`);
  console.log(`Worksheets: ${result.worksheets.join(', ') || '(none)'}`);

  if (result.namingPatterns.length > 0) {
    console.log('');
    console.log(chalk.cyan('Naming patterns:'));
    for (const pattern of result.namingPatterns) {
      console.log(`  ${pattern.prefix}: ${pattern.fields.join(', ')}`);
    }
  }
  if (result.unresolved.length > 0) {
    console.log('');
    console.log(chalk.yellow(`Undeclared references: ${result.unresolved.join(', ')}`));
  }
  return 0;
}

main()
  .then(code => process.exit(code))
  .catch(err => {
    console.error(chalk.red('Fatal error during analysis:'));
    console.error(err instanceof Error ? err.message : err);
    process.exit(2);
  });
