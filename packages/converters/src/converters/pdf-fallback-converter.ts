import type { LoggerMethods } from '@docmill/logger';
import type { DocumentFormat, Hyperlink } from '@docmill/model';

import { throwIfAborted } from '@docmill/shared';

import type { ConversionContext, ConversionDraft } from './base-converter';

import { PDF_FALLBACK } from '../config/constants';
import { ProcessingError } from '../errors';
import { countWords } from '../markdown/text-stats';
import { findUrls, layoutTextToMarkdown } from '../pdf/layout-text';
import { PdfTextExtractor } from '../pdf/pdf-text-extractor';
import { BaseConverter } from './base-converter';

/**
 * Text-layer PDF converter built on Poppler.
 *
 * Reads the text layer page by page with `pdftotext -layout`, recovering
 * column-aligned runs as tables. Scanned pages without a text layer produce
 * nothing; images are not extracted.
 */
export class PdfFallbackConverter extends BaseConverter {
  readonly id = 'pdf-fallback';
  readonly variant = 'format-fallback';
  protected readonly formats: ReadonlySet<DocumentFormat> = new Set(['pdf']);

  private readonly extractor: PdfTextExtractor;

  constructor(logger: LoggerMethods) {
    super(logger, 'PdfFallbackConverter');
    this.extractor = new PdfTextExtractor(logger);
  }

  protected async run({
    document,
    signal,
    warn,
  }: ConversionContext): Promise<ConversionDraft> {
    const info = await this.extractor.readInfo(document.path, signal);
    if (info.pages === 0) {
      throw new ProcessingError(`No pages reported for ${document.name}`);
    }
    this.log('debug', `${document.name}: ${info.pages} pages`);

    const blocks: string[] = [];
    const hyperlinks: Hyperlink[] = [];
    const emptyPages: number[] = [];

    for (let page = 1; page <= info.pages; page++) {
      throwIfAborted(signal, 'Conversion was aborted');

      const text = await this.extractor.extractPageText(
        document.path,
        page,
        signal,
      );
      const pageBlocks = layoutTextToMarkdown(text, {
        minTableRows: PDF_FALLBACK.MIN_TABLE_ROWS,
        columnGap: PDF_FALLBACK.COLUMN_GAP,
      });
      if (pageBlocks.length === 0) {
        emptyPages.push(page);
        continue;
      }
      blocks.push(...pageBlocks);

      for (const url of findUrls(text)) {
        if (!hyperlinks.some((link) => link.url === url)) {
          hyperlinks.push({ url, text: url });
        }
      }
    }

    if (emptyPages.length > 0) {
      warn(`No text layer on page(s) ${emptyPages.join(', ')}`);
    }

    const markdown = blocks.length > 0 ? `${blocks.join('\n\n')}\n` : '';

    return {
      markdown,
      metadata: {
        title: info.title,
        author: info.author,
        subject: info.subject,
        keywords: info.keywords,
        creationDate: info.creationDate,
        modificationDate: info.modificationDate,
        pageCount: info.pages,
        wordCount: countWords(markdown),
      },
      images: [],
      hyperlinks,
    };
  }
}
