import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import {
  processBatch,
  processStatement,
  scanDirectoryForStatements,
  validateDirectory,
  type ParseError,
} from '@ledgerline/ingest';
import { exportDocumentsCsv, exportLedgerCsv, toBatchLedgerOutput, toLedgerOutput } from '@ledgerline/output';
import { PARSER_VERSION, validateLedgerOutputOrThrow, type PipelineOptions } from '@ledgerline/types';
import type { CliOptions } from './options.js';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface CliIO {
  logger: Logger;
  /** Receives the output document when no `--out` is given. */
  stdout(text: string): void;
}

/** Diagnostics go to stderr so stdout carries only the output document. */
export function createConsoleIO(verbose: boolean): CliIO {
  return {
    logger: {
      info: (message) => {
        if (verbose) console.error(`[INFO] ${message}`);
      },
      warn: (message) => console.error(`[WARN] ${message}`),
      error: (message) => console.error(`[ERROR] ${message}`),
    },
    stdout: (text) => console.log(text),
  };
}

function pipelineOptions(options: CliOptions): PipelineOptions {
  return { minMonths: options.minMonths, dateThreshold: options.dateThreshold };
}

async function emit(content: string, options: CliOptions, io: CliIO): Promise<void> {
  if (options.out === undefined) {
    io.stdout(content);
    return;
  }
  const outPath = resolve(options.out);
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, content, 'utf-8');
  io.logger.info(`Output written to: ${outPath}`);
}

/**
 * Process one statement file and write its ledger.
 * Returns the process exit code.
 */
export async function processSingleFile(file: string, options: CliOptions, io: CliIO): Promise<number> {
  const filePath = resolve(file);
  io.logger.info(`Processing: ${filePath}`);
  io.logger.info(`Parser version: ${PARSER_VERSION}`);

  const result = await processStatement(filePath, pipelineOptions(options));
  if (!result.ok) {
    io.logger.error(result.message);
    return 1;
  }

  io.logger.info(`Method: ${result.method}`);
  io.logger.info(`Transactions: ${result.ledger.length}`);
  for (const warning of result.warnings) io.logger.warn(warning);

  if (options.format === 'csv') {
    await emit(exportLedgerCsv(result.ledger), options, io);
    return 0;
  }

  const output = toLedgerOutput(result);
  validateLedgerOutputOrThrow(output);
  await emit(JSON.stringify(output, null, options.pretty ? 2 : undefined), options, io);
  return 0;
}

/**
 * Process every statement in a directory. Fails only when nothing could be
 * processed; individual failures are reported and skipped.
 */
export async function processDirectory(inputDir: string, options: CliOptions, io: CliIO): Promise<number> {
  const dirPath = resolve(inputDir);
  io.logger.info(`Batch mode: scanning directory`);
  io.logger.info(`Directory: ${dirPath}`);

  const validation = await validateDirectory(dirPath);
  if (!validation.valid) {
    io.logger.error(validation.error);
    return 1;
  }

  const scanResult = await scanDirectoryForStatements(dirPath);
  if (scanResult.files.length === 0) {
    io.logger.error('No statement files (.pdf, .csv) found in directory');
    for (const skip of scanResult.skipped) {
      io.logger.info(`Skipped ${skip.fileName}: ${skip.reason}`);
    }
    return 1;
  }

  io.logger.info(`Found ${scanResult.files.length} statement file(s)`);
  if (scanResult.skipped.length > 0) {
    io.logger.info(`Skipped ${scanResult.skipped.length} file(s)`);
  }

  const result = await processBatch(scanResult.files, {
    pipeline: pipelineOptions(options),
    onProgress: (current, total, filename) => {
      io.logger.info(`Parsing ${current}/${total}: ${filename}`);
    },
    onError: (error: ParseError) => {
      io.logger.error(`Failed to parse ${error.filename}: ${error.error}`);
    },
  });

  for (const run of result.results) {
    for (const warning of run.warnings) io.logger.warn(`${run.source.fileName}: ${warning}`);
  }

  io.logger.info(
    `Files succeeded: ${result.summary.filesSucceeded}/${result.summary.totalFilesFound}, transactions: ${result.totalTransactions}`
  );

  if (result.summary.filesSucceeded === 0) {
    return 1;
  }

  const batch = toBatchLedgerOutput(result.results, result.parseErrors);
  if (options.format === 'csv') {
    await emit(exportDocumentsCsv(batch.documents), options, io);
    return 0;
  }

  for (const document of batch.documents) {
    validateLedgerOutputOrThrow(document);
  }
  await emit(JSON.stringify(batch, null, options.pretty ? 2 : undefined), options, io);
  return 0;
}
