import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { scanDirectoryForStatements, validateDirectory } from '@ledgerline/ingest';

const PDF_BYTES = '%PDF-1.4\n%test\n';

describe('directory-scanner', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'ledgerline-scan-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('validateDirectory', () => {
    it('should accept an existing directory', async () => {
      expect(await validateDirectory(testDir)).toEqual({ valid: true, directoryPath: testDir });
    });

    it('should report a missing directory', async () => {
      const missing = join(testDir, 'nonexistent');

      expect(await validateDirectory(missing)).toEqual({ valid: false, error: `Directory does not exist: ${missing}` });
    });

    it('should report a path that is a file', async () => {
      const filePath = join(testDir, 'file.csv');
      await writeFile(filePath, 'test');

      expect(await validateDirectory(filePath)).toEqual({ valid: false, error: `Path is not a directory: ${filePath}` });
    });
  });

  describe('scanDirectoryForStatements', () => {
    it('should find PDF and CSV files sorted by name', async () => {
      await writeFile(join(testDir, 'c-march.csv'), 'content');
      await writeFile(join(testDir, 'a-january.pdf'), PDF_BYTES);
      await writeFile(join(testDir, 'b-february.CSV'), 'content');
      await writeFile(join(testDir, 'readme.txt'), 'not a statement');
      await mkdir(join(testDir, 'nested.pdf'));

      const result = await scanDirectoryForStatements(testDir);

      expect(result.files.map((file) => [file.fileName, file.kind])).toEqual([
        ['a-january.pdf', 'pdf'],
        ['b-february.CSV', 'csv'],
        ['c-march.csv', 'csv'],
      ]);
      expect(result.skipped).toEqual([]);
    });

    it('should skip a .pdf without the PDF signature', async () => {
      await writeFile(join(testDir, 'renamed.pdf'), 'Date,Narration,Amount');

      const result = await scanDirectoryForStatements(testDir);

      expect(result.files).toEqual([]);
      expect(result.skipped).toEqual([
        { fileName: 'renamed.pdf', reason: 'Not a PDF document (missing %PDF- signature)' },
      ]);
    });

    it('should pick up an extensionless PDF by its signature', async () => {
      await writeFile(join(testDir, 'statement'), PDF_BYTES);
      await writeFile(join(testDir, 'notes'), 'plain text');

      const result = await scanDirectoryForStatements(testDir);

      expect(result.files.map((file) => [file.fileName, file.kind])).toEqual([['statement', 'pdf']]);
      expect(result.skipped).toEqual([]);
    });

    it('should skip temporary and hidden files', async () => {
      await writeFile(join(testDir, '~$temp.pdf'), PDF_BYTES);
      await writeFile(join(testDir, '.hidden.csv'), 'hidden content');
      await writeFile(join(testDir, 'normal.pdf'), PDF_BYTES);

      const result = await scanDirectoryForStatements(testDir);

      expect(result.files.map((file) => file.fileName)).toEqual(['normal.pdf']);
      expect(result.skipped).toHaveLength(2);
      expect(result.skipped).toContainEqual({ fileName: '.hidden.csv', reason: 'Temporary file (starts with ~$ or .)' });
      expect(result.skipped).toContainEqual({ fileName: '~$temp.pdf', reason: 'Temporary file (starts with ~$ or .)' });
    });

    it('should skip zero-byte files', async () => {
      await writeFile(join(testDir, 'empty.csv'), '');
      await writeFile(join(testDir, 'nonempty.csv'), 'content');

      const result = await scanDirectoryForStatements(testDir);

      expect(result.files.map((file) => file.fileName)).toEqual(['nonempty.csv']);
      expect(result.skipped).toEqual([{ fileName: 'empty.csv', reason: 'Zero-byte file' }]);
    });

    it('should include file size and modification time', async () => {
      const content = 'Date,Narration,Amount';
      await writeFile(join(testDir, 'test.csv'), content);

      const result = await scanDirectoryForStatements(testDir);

      expect(result.files[0]?.sizeBytes).toBe(content.length);
      expect(result.files[0]?.modifiedAt).toBeInstanceOf(Date);
      expect(result.files[0]?.filePath).toBe(join(testDir, 'test.csv'));
    });
  });
});
