import type { PipelineOptions } from '@ledgerline/types';
import type { StatementFileInfo } from './directory-scanner.js';
import { processStatement, type PipelineSuccess } from './pipeline.js';

export interface ParseError {
  filename: string;
  filePath: string;
  error: string;
  stack: string | undefined;
  timestamp: string;
}

export interface BatchProcessResult {
  results: PipelineSuccess[];
  totalTransactions: number;
  parseErrors: ParseError[];
  summary: {
    totalFilesFound: number;
    filesSucceeded: number;
    filesFailed: number;
  };
}

export interface BatchProcessOptions {
  pipeline?: PipelineOptions;
  onProgress?: (current: number, total: number, filename: string) => void;
  onError?: (error: ParseError) => void;
}

/**
 * Processes statement files one after another. A file that fails is recorded
 * in `parseErrors` and the batch carries on with the next one.
 */
export async function processBatch(
  files: readonly StatementFileInfo[],
  options: BatchProcessOptions = {}
): Promise<BatchProcessResult> {
  const results: PipelineSuccess[] = [];
  const parseErrors: ParseError[] = [];

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    if (file === undefined) continue;

    if (options.onProgress !== undefined) {
      options.onProgress(i + 1, files.length, file.fileName);
    }

    let parseError: ParseError | null = null;
    try {
      const result = await processStatement(file.filePath, options.pipeline);
      if (result.ok) {
        results.push(result);
      } else {
        parseError = createParseError(file, result.error);
      }
    } catch (error) {
      parseError = createParseError(file, error);
    }

    if (parseError !== null) {
      parseErrors.push(parseError);
      if (options.onError !== undefined) {
        options.onError(parseError);
      }
    }
  }

  return {
    results,
    totalTransactions: results.reduce((sum, result) => sum + result.ledger.length, 0),
    parseErrors,
    summary: {
      totalFilesFound: files.length,
      filesSucceeded: results.length,
      filesFailed: parseErrors.length,
    },
  };
}

/**
 * Creates a structured parse error from an exception.
 */
function createParseError(file: StatementFileInfo, error: unknown): ParseError {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    filename: file.fileName,
    filePath: file.filePath,
    error: message,
    stack,
    timestamp: new Date().toISOString(),
  };
}
