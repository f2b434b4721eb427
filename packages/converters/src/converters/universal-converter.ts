import type { LoggerMethods } from '@docmill/logger';
import type { DocumentFormat, SourceDocument } from '@docmill/model';

import { DOCUMENT_FORMATS } from '@docmill/model';
import { isAbortError, throwIfAborted } from '@docmill/shared';
import { load } from 'cheerio';
import { readFile } from 'node:fs/promises';

import type { ConversionContext, ConversionDraft } from './base-converter';

import { DocumentConversionError } from '../errors';
import { countWords } from '../markdown/text-stats';
import { loadXml, readPackage } from '../ooxml/ooxml-package';
import { PdfTextExtractor } from '../pdf/pdf-text-extractor';
import { BaseConverter } from './base-converter';

const HTML_BLOCKS =
  'h1, h2, h3, h4, h5, h6, p, li, pre, blockquote, td, th, dt, dd, figcaption';
const SLIDE_PART = /^ppt\/slides\/slide(\d+)\.xml$/;

/**
 * Last-resort converter for every format: plain text, no structure.
 *
 * Never fails on unreadable input; it emits a placeholder document with a
 * warning instead. Only cancellation and the deadline make it fail.
 */
export class UniversalConverter extends BaseConverter {
  readonly id = 'universal-fallback';
  readonly variant = 'universal-fallback';
  protected readonly formats: ReadonlySet<DocumentFormat> = new Set(
    DOCUMENT_FORMATS,
  );

  private readonly pdfExtractor: PdfTextExtractor;

  constructor(logger: LoggerMethods) {
    super(logger, 'UniversalConverter');
    this.pdfExtractor = new PdfTextExtractor(logger);
  }

  protected async run({
    document,
    signal,
    warn,
  }: ConversionContext): Promise<ConversionDraft> {
    let paragraphs: string[] = [];

    try {
      paragraphs = await this.readParagraphs(document, signal);
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      const message = DocumentConversionError.getErrorMessage(error);
      this.log('warn', `Could not read ${document.name}: ${message}`);
      warn(`Could not read ${document.name}: ${message}`);
    }

    const content = paragraphs.filter((text) => text.trim().length > 0);
    if (content.length === 0) {
      warn(`No readable content found in ${document.name}`);
      return {
        markdown: `# ${document.name}\n\n_No readable content found._\n`,
        metadata: {},
        images: [],
        hyperlinks: [],
      };
    }

    const markdown = `${content.join('\n\n')}\n`;
    return {
      markdown,
      metadata: { wordCount: countWords(markdown) },
      images: [],
      hyperlinks: [],
    };
  }

  private async readParagraphs(
    document: SourceDocument,
    signal: AbortSignal,
  ): Promise<string[]> {
    switch (document.format) {
      case 'md':
      case 'txt': {
        const text = normalizeLineEndings(
          await readFile(document.path, 'utf-8'),
        ).trim();
        return text ? [text] : [];
      }
      case 'html':
        return this.readHtml(document, signal);
      case 'docx':
        return this.readDocx(document, signal);
      case 'pptx':
        return this.readPptx(document, signal);
      case 'pdf': {
        const text = await this.pdfExtractor.extractRawText(
          document.path,
          signal,
        );
        return splitParagraphs(text, signal);
      }
    }
  }

  private async readHtml(
    document: SourceDocument,
    signal: AbortSignal,
  ): Promise<string[]> {
    const $ = load(await readFile(document.path, 'utf-8'));
    $('script, style, noscript, template').remove();

    const paragraphs: string[] = [];
    for (const element of $(HTML_BLOCKS).toArray()) {
      throwIfAborted(signal, 'Conversion was aborted');
      if ($(element).parents(HTML_BLOCKS).length > 0) {
        continue;
      }
      paragraphs.push(collapse($(element).text()));
    }

    if (paragraphs.every((text) => !text)) {
      return [collapse($('body').text() || $.root().text())];
    }
    return paragraphs;
  }

  private async readDocx(
    document: SourceDocument,
    signal: AbortSignal,
  ): Promise<string[]> {
    const parts = await readPackage(
      document.path,
      document.name,
      (part) => part === 'word/document.xml',
    );
    const xml = parts.get('word/document.xml');
    if (!xml) {
      return [];
    }

    const $ = loadXml(xml.toString('utf-8'));
    const paragraphs: string[] = [];
    for (const paragraph of $('w\\:p').toArray()) {
      throwIfAborted(signal, 'Conversion was aborted');
      paragraphs.push(collapse($(paragraph).find('w\\:t').text()));
    }
    return paragraphs;
  }

  private async readPptx(
    document: SourceDocument,
    signal: AbortSignal,
  ): Promise<string[]> {
    const parts = await readPackage(document.path, document.name, (part) =>
      SLIDE_PART.test(part),
    );
    const slides = [...parts.entries()].sort(
      ([a], [b]) =>
        Number(SLIDE_PART.exec(a)?.[1] ?? 0) -
        Number(SLIDE_PART.exec(b)?.[1] ?? 0),
    );

    const paragraphs: string[] = [];
    for (const [, xml] of slides) {
      const $ = loadXml(xml.toString('utf-8'));
      for (const paragraph of $('a\\:p').toArray()) {
        throwIfAborted(signal, 'Conversion was aborted');
        paragraphs.push(collapse($(paragraph).find('a\\:t').text()));
      }
    }
    return paragraphs;
  }
}

function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function splitParagraphs(text: string, signal: AbortSignal): string[] {
  return normalizeLineEndings(text)
    .split(/\n\s*\n/)
    .map((paragraph) => {
      throwIfAborted(signal, 'Conversion was aborted');
      return collapse(paragraph);
    });
}
