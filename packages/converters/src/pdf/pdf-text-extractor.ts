import type { LoggerMethods } from '@docmill/logger';

import type { SpawnResult } from '@docmill/shared';

import { spawnAsync } from '@docmill/shared';

import { ProcessingError, UnsupportedFormatError } from '../errors';

/**
 * Document information reported by pdfinfo
 */
export interface PdfInfo {
  pages: number;
  title?: string;
  author?: string;
  subject?: string;
  keywords?: string[];
  creationDate?: string;
  modificationDate?: string;
}

/**
 * Extracts text and document information from PDFs with Poppler's
 * pdftotext and pdfinfo command-line tools.
 *
 * ## System Requirements
 * - Poppler utils (`apt install poppler-utils` / `brew install poppler`)
 */
export class PdfTextExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Read page count and document properties with `pdfinfo -isodates`.
   *
   * @throws UnsupportedFormatError when pdfinfo cannot parse the file
   */
  async readInfo(pdfPath: string, signal?: AbortSignal): Promise<PdfInfo> {
    const result = await spawnAsync('pdfinfo', ['-isodates', pdfPath], {
      signal,
    });
    assertNotKilled('pdfinfo', result);
    if (result.code !== 0) {
      throw new UnsupportedFormatError(
        `pdfinfo failed: ${result.stderr.trim() || 'Unknown error'}`,
      );
    }

    const fields = new Map<string, string>();
    for (const line of result.stdout.split('\n')) {
      const match = line.match(/^([A-Za-z ]+):\s*(.*)$/);
      if (match && match[2].trim()) {
        fields.set(match[1].trim(), match[2].trim());
      }
    }

    const keywords = fields
      .get('Keywords')
      ?.split(/[,;]/)
      .map((keyword) => keyword.trim())
      .filter((keyword) => keyword.length > 0);

    return {
      pages: parseInt(fields.get('Pages') ?? '0', 10) || 0,
      title: fields.get('Title'),
      author: fields.get('Author'),
      subject: fields.get('Subject'),
      keywords: keywords && keywords.length > 0 ? keywords : undefined,
      creationDate: fields.get('CreationDate'),
      modificationDate: fields.get('ModDate'),
    };
  }

  /**
   * Extract text from a single PDF page, preserving its layout.
   * Returns empty string when pdftotext exits with an error (logged as
   * warning).
   *
   * @throws ProcessingError when pdftotext is killed; its partial output
   * is never used as page text
   */
  async extractPageText(
    pdfPath: string,
    page: number,
    signal?: AbortSignal,
  ): Promise<string> {
    const result = await spawnAsync(
      'pdftotext',
      [
        '-f',
        page.toString(),
        '-l',
        page.toString(),
        '-layout',
        '-enc',
        'UTF-8',
        pdfPath,
        '-',
      ],
      { signal },
    );
    assertNotKilled('pdftotext', result, page);

    if (result.code !== 0) {
      this.logger.warn(
        `[PdfTextExtractor] pdftotext failed for page ${page}: ${result.stderr.trim() || 'Unknown error'}`,
      );
      return '';
    }

    return result.stdout.replace(/\f/g, '');
  }

  /**
   * Extract the whole document in reading order without layout.
   *
   * @throws ProcessingError when pdftotext exits with an error
   */
  async extractRawText(pdfPath: string, signal?: AbortSignal): Promise<string> {
    const result = await spawnAsync(
      'pdftotext',
      ['-enc', 'UTF-8', pdfPath, '-'],
      { signal },
    );
    assertNotKilled('pdftotext', result);
    if (result.code !== 0) {
      throw new ProcessingError(
        `pdftotext failed: ${result.stderr.trim() || 'Unknown error'}`,
      );
    }
    return result.stdout.replace(/\f/g, '\n');
  }
}

/**
 * A tool killed mid-run leaves truncated output behind.
 */
function assertNotKilled(
  tool: string,
  result: SpawnResult,
  page?: number,
): void {
  if (result.signal) {
    const where = page === undefined ? '' : ` on page ${page}`;
    throw new ProcessingError(
      `${tool} was killed by ${result.signal}${where}`,
    );
  }
}
