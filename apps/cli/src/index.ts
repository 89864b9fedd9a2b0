#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command, Option } from 'commander';
import { DEFAULT_DATE_THRESHOLD, MIN_MONTHS, PARSER_VERSION } from '@ledgerline/types';
import { AVAILABLE_FORMATS, envBool, envString, parseCliOptions } from './options.js';
import { createConsoleIO, processDirectory, processSingleFile } from './run.js';

const program = new Command();

program
  .name('ledgerline')
  .description('Turn bank statement PDFs and CSV exports into a signed, date-ordered transaction ledger')
  .version(PARSER_VERSION)
  .argument('[file]', 'Path to a statement PDF or CSV export')
  .option('-d, --inputDir <directory>', 'Directory containing statement files to process', envString('LEDGERLINE_INPUT_DIR'))
  .option('-o, --out <file>', 'Output file path (default: stdout)', envString('LEDGERLINE_OUTPUT_FILE'))
  .addOption(
    new Option('-f, --format <format>', 'Output format')
      .choices(AVAILABLE_FORMATS)
      .default(envString('LEDGERLINE_FORMAT') ?? 'json')
  )
  .option('-v, --verbose', 'Enable verbose output', envBool('LEDGERLINE_VERBOSE', false))
  .option('--pretty', 'Pretty-print JSON output', envBool('LEDGERLINE_PRETTY', true))
  .option('--no-pretty', 'Disable pretty-printing')
  .option(
    '--min-months <number>',
    'Months of history below which a short-history warning is raised',
    envString('LEDGERLINE_MIN_MONTHS') ?? String(MIN_MONTHS)
  )
  .option(
    '--date-threshold <ratio>',
    'Share of date values a single format must parse to be adopted (exclusive)',
    envString('LEDGERLINE_DATE_THRESHOLD') ?? String(DEFAULT_DATE_THRESHOLD)
  )
  .action(async (file: string | undefined, rawOptions: unknown) => {
    const verbose = typeof rawOptions === 'object' && rawOptions !== null && 'verbose' in rawOptions && rawOptions.verbose === true;
    const io = createConsoleIO(verbose);
    try {
      const options = parseCliOptions(rawOptions);

      if (options.inputDir !== undefined) {
        process.exitCode = await processDirectory(options.inputDir, options, io);
      } else if (file !== undefined) {
        process.exitCode = await processSingleFile(file, options, io);
      } else {
        io.logger.error('Either a statement file or --inputDir must be specified');
        process.exitCode = 1;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      io.logger.error(message);
      if (verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exitCode = 1;
    }
  });

await program.parseAsync();
