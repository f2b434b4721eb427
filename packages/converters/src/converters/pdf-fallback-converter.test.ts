import type { LoggerMethods } from '@docmill/logger';
import type { SourceDocument } from '@docmill/model';

import { spawnAsync } from '@docmill/shared';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { resolveConversionOptions } from '../options/conversion-options';
import { PdfFallbackConverter } from './pdf-fallback-converter';

vi.mock('@docmill/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@docmill/shared')>()),
  spawnAsync: vi.fn(),
}));

const spawnMock = vi.mocked(spawnAsync);

const PAGE_ONE = [
  'Annual Report',
  '',
  'Item    Cost',
  'Paper   5',
  '',
  'Details at https://example.com/x.',
  '',
].join('\n');

function mockPoppler(pages: Record<number, string>, info: string): void {
  spawnMock.mockImplementation(async (command, args) => {
    if (command === 'pdfinfo') {
      return { stdout: info, stderr: '', code: 0 };
    }
    const page = Number(args[1]);
    return { stdout: pages[page] ?? '', stderr: '', code: 0 };
  });
}

describe('PdfFallbackConverter', () => {
  let workDir: string;
  let logger: LoggerMethods;
  let document: SourceDocument;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'pdf-fallback-'));
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const path = join(workDir, 'annual.pdf');
    writeFileSync(path, '%PDF-1.4\n%%EOF');
    document = {
      path,
      name: 'annual.pdf',
      extension: 'pdf',
      format: 'pdf',
      sizeBytes: 14,
    };
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  test('should only support pdf', () => {
    const converter = new PdfFallbackConverter(logger);

    expect(converter.id).toBe('pdf-fallback');
    expect(converter.variant).toBe('format-fallback');
    expect(converter.supports('pdf')).toBe(true);
    expect(converter.supports('docx')).toBe(false);
  });

  test('should convert the text layer page by page', async () => {
    mockPoppler(
      { 1: PAGE_ONE, 2: '\f' },
      'Title:   Annual Report\nAuthor:  Finance Team\nPages:   2\n',
    );
    const converter = new PdfFallbackConverter(logger);

    const result = await converter.convert(
      document,
      join(workDir, 'out'),
      resolveConversionOptions(),
    );

    expect(result.success).toBe(true);
    expect(result.markdown).toBe(
      [
        'Annual Report',
        '',
        '| Item | Cost |',
        '| --- | --- |',
        '| Paper | 5 |',
        '',
        'Details at https://example.com/x.',
        '',
      ].join('\n'),
    );
    expect(result.metadata).toEqual({
      title: 'Annual Report',
      author: 'Finance Team',
      subject: undefined,
      keywords: undefined,
      creationDate: undefined,
      modificationDate: undefined,
      pageCount: 2,
      wordCount: 9,
    });
    expect(result.hyperlinks).toEqual([
      { url: 'https://example.com/x', text: 'https://example.com/x' },
    ]);
    expect(result.images).toEqual([]);
    expect(result.warnings).toEqual(['No text layer on page(s) 2']);
  });

  test('should fail with UnsupportedFormat when pdfinfo rejects the file', async () => {
    spawnMock.mockResolvedValue({
      stdout: '',
      stderr: 'May not be a PDF file',
      code: 1,
    });
    const converter = new PdfFallbackConverter(logger);

    const result = await converter.convert(
      document,
      join(workDir, 'out'),
      resolveConversionOptions(),
    );

    expect(result).toMatchObject({
      success: false,
      error: {
        kind: 'UnsupportedFormat',
        message: 'pdfinfo failed: May not be a PDF file',
      },
    });
  });

  test('should fail instead of keeping text from a crashed pdftotext', async () => {
    spawnMock.mockImplementation(async (command, args) => {
      if (command === 'pdfinfo') {
        return { stdout: 'Pages: 2\n', stderr: '', code: 0 };
      }
      if (args[1] === '2') {
        return { stdout: 'Half a sent', stderr: '', code: 139, signal: 'SIGSEGV' };
      }
      return { stdout: PAGE_ONE, stderr: '', code: 0 };
    });
    const converter = new PdfFallbackConverter(logger);

    const result = await converter.convert(
      document,
      join(workDir, 'out'),
      resolveConversionOptions(),
    );

    expect(result).toMatchObject({
      success: false,
      markdown: '',
      error: {
        kind: 'ProcessingError',
        message: 'pdftotext was killed by SIGSEGV on page 2',
      },
    });
  });

  test('should fail when no page has a text layer', async () => {
    mockPoppler({}, 'Pages: 3\n');
    const converter = new PdfFallbackConverter(logger);

    const result = await converter.convert(
      document,
      join(workDir, 'out'),
      resolveConversionOptions(),
    );

    expect(result).toMatchObject({
      success: false,
      error: {
        kind: 'ProcessingError',
        message: 'Conversion produced no content',
      },
    });
    expect(result.warnings).toEqual(['No text layer on page(s) 1, 2, 3']);
  });

  test('should fail with ProcessingError when the page count is zero', async () => {
    mockPoppler({}, 'Title: Empty\n');
    const converter = new PdfFallbackConverter(logger);

    const result = await converter.convert(
      document,
      join(workDir, 'out'),
      resolveConversionOptions(),
    );

    expect(result).toMatchObject({
      success: false,
      error: {
        kind: 'ProcessingError',
        message: 'No pages reported for annual.pdf',
      },
    });
  });

  test('should stop between pages when cancelled', async () => {
    const controller = new AbortController();
    spawnMock.mockImplementation(async (command) => {
      if (command === 'pdfinfo') {
        return { stdout: 'Pages: 5\n', stderr: '', code: 0 };
      }
      controller.abort();
      return { stdout: 'Some text', stderr: '', code: 0 };
    });
    const converter = new PdfFallbackConverter(logger);

    const result = await converter.convert(
      document,
      join(workDir, 'out'),
      resolveConversionOptions(),
      controller.signal,
    );

    expect(result).toMatchObject({
      success: false,
      error: { kind: 'Cancelled' },
    });
    expect(
      spawnMock.mock.calls.filter(([command]) => command === 'pdftotext'),
    ).toHaveLength(1);
  });
});
