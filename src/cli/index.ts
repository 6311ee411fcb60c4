#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from 'commander';
import { DEFAULT_DIALECTS, DEFAULT_OUT_PREFIX, parseDialectList, toDialectSpecs, type DialectSpec } from '../server/config';
import { ConfigurationError } from '../server/errors';
import { runAnalysis, type AnalyzeCommandOptions } from './analyze';
import * as output from './output';

function parseDialectOption(value: string): DialectSpec[] {
  try {
    return parseDialectList(value);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new InvalidArgumentError(error.message);
    }
    throw error;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('sql-deps')
    .description('Infer table and script dependencies across SQL scripts and output Mermaid diagrams')
    .version('0.1.0')
    .requiredOption('--sql-dir <path>', 'Path to folder containing .sql scripts')
    .option('--out-prefix <prefix>', 'Output prefix for generated files', DEFAULT_OUT_PREFIX)
    .option('--out-dir <path>', 'Directory the output files are written to', '.')
    .addOption(
      new Option('--dialects <list>', 'Comma separated dialects to try, in order')
        .argParser(parseDialectOption)
        .default(toDialectSpecs(DEFAULT_DIALECTS), DEFAULT_DIALECTS.join(','))
    )
    .action((options: AnalyzeCommandOptions) => {
      try {
        runAnalysis(options);
      } catch (error) {
        output.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
      }
    });

  program.addHelpText(
    'after',
    `
Examples:
  $ sql-deps --sql-dir ./sql_scripts
  $ sql-deps --sql-dir ./etl --out-prefix etl --out-dir ./docs
  $ sql-deps --sql-dir ./etl --dialects postgresql,mysql
`
  );

  return program;
}

if (require.main === module) {
  createProgram().parse(process.argv);
}
