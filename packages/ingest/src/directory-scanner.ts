import { open, readdir, stat } from 'fs/promises';
import type { Dirent } from 'fs';
import { extname, join, normalize } from 'path';
import type { DocumentKind } from '@ledgerline/types';
import { detectDocumentKind, hasPdfMagic } from './loaders/document-kind.js';

export const STATEMENT_EXTENSIONS: ReadonlySet<string> = new Set(['.pdf', '.csv']);

/** Bytes read from the top of each candidate to check its signature. */
const SIGNATURE_BYTES = 8;

export interface StatementFileInfo {
  filePath: string;
  fileName: string;
  kind: DocumentKind;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface SkippedFile {
  fileName: string;
  reason: string;
}

export interface ScanResult {
  files: StatementFileInfo[];
  skipped: SkippedFile[];
  directoryPath: string;
}

export type DirectoryCheck = { valid: true; directoryPath: string } | { valid: false; error: string };

type EntryVerdict = { status: 'statement'; file: StatementFileInfo } | { status: 'skipped'; skip: SkippedFile } | { status: 'ignored' };

async function readSignature(filePath: string): Promise<Uint8Array> {
  const handle = await open(filePath, 'r');
  try {
    const buffer = new Uint8Array(SIGNATURE_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SIGNATURE_BYTES, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * Decide what one directory entry is. Statement extensions are listed; a
 * `.pdf` must also carry the PDF signature, and a file without an extension
 * is taken as a PDF when it carries one.
 */
async function inspectEntry(directoryPath: string, entry: Dirent): Promise<EntryVerdict> {
  if (!entry.isFile()) return { status: 'ignored' };

  const fileName = entry.name;
  const extension = extname(fileName).toLowerCase();
  if (extension !== '' && !STATEMENT_EXTENSIONS.has(extension)) return { status: 'ignored' };

  // Office lock files and dotfiles
  if (fileName.startsWith('~$') || fileName.startsWith('.')) {
    return { status: 'skipped', skip: { fileName, reason: 'Temporary file (starts with ~$ or .)' } };
  }

  const filePath = join(directoryPath, fileName);
  const fileStat = await stat(filePath);
  if (fileStat.size === 0) {
    return extension === '' ? { status: 'ignored' } : { status: 'skipped', skip: { fileName, reason: 'Zero-byte file' } };
  }

  const signature = extension === '.csv' ? undefined : await readSignature(filePath);
  if (signature !== undefined && !hasPdfMagic(signature)) {
    if (extension === '') return { status: 'ignored' };
    return { status: 'skipped', skip: { fileName, reason: 'Not a PDF document (missing %PDF- signature)' } };
  }

  return {
    status: 'statement',
    file: {
      filePath,
      fileName,
      kind: detectDocumentKind(fileName, signature),
      sizeBytes: fileStat.size,
      modifiedAt: fileStat.mtime,
    },
  };
}

/**
 * Lists the statements in a directory, sorted by file name. Temporary,
 * empty and mislabelled files are reported in `skipped`; anything else that
 * is not a statement is left out silently.
 */
export async function scanDirectoryForStatements(directoryPath: string): Promise<ScanResult> {
  const normalizedPath = normalize(directoryPath);
  const entries = await readdir(normalizedPath, { withFileTypes: true });
  const verdicts = await Promise.all(entries.map((entry) => inspectEntry(normalizedPath, entry)));

  const files: StatementFileInfo[] = [];
  const skipped: SkippedFile[] = [];
  for (const verdict of verdicts) {
    if (verdict.status === 'statement') files.push(verdict.file);
    else if (verdict.status === 'skipped') skipped.push(verdict.skip);
  }

  const byName = (a: { fileName: string }, b: { fileName: string }): number => a.fileName.localeCompare(b.fileName);
  files.sort(byName);
  skipped.sort(byName);

  return { files, skipped, directoryPath: normalizedPath };
}

const ACCESS_ERRORS: Readonly<Record<string, (path: string) => string>> = Object.freeze({
  ENOENT: (path: string) => `Directory does not exist: ${path}`,
  EACCES: (path: string) => `Permission denied: ${path}`,
  EPERM: (path: string) => `Permission denied: ${path}`,
});

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

/**
 * Checks that a path names a readable directory before a batch run.
 */
export async function validateDirectory(directoryPath: string): Promise<DirectoryCheck> {
  const normalizedPath = normalize(directoryPath);
  try {
    const dirStat = await stat(normalizedPath);
    if (!dirStat.isDirectory()) {
      return { valid: false, error: `Path is not a directory: ${normalizedPath}` };
    }
    return { valid: true, directoryPath: normalizedPath };
  } catch (error) {
    const describe = ACCESS_ERRORS[errorCode(error) ?? ''];
    return { valid: false, error: describe !== undefined ? describe(directoryPath) : `Cannot access directory: ${directoryPath}` };
  }
}
