import type { LoggerMethods } from '@docmill/logger';
import type { DocumentFormat } from '@docmill/model';

import { DOCUMENT_FORMATS } from '@docmill/model';
import { basename, extname } from 'node:path';

import type { InferenceEngine } from '../engine/inference-engine';
import type { ConversionContext, ConversionDraft } from './base-converter';

import { DoclingMarkdownRenderer } from '../markdown/docling-renderer';
import { countWords } from '../markdown/text-stats';
import { BaseConverter } from './base-converter';

/**
 * AI-primary converter: layout inference through the injected engine, then
 * markdown rendering of the returned DoclingDocument.
 */
export class DoclingConverter extends BaseConverter {
  readonly id = 'docling-ai';
  readonly variant = 'ai-primary';
  protected readonly formats: ReadonlySet<DocumentFormat>;

  constructor(
    logger: LoggerMethods,
    private readonly engine: InferenceEngine,
  ) {
    super(logger, 'DoclingConverter');
    this.formats = new Set(
      DOCUMENT_FORMATS.filter((format) => engine.supports(format)),
    );
  }

  protected async run({
    document,
    options,
    signal,
  }: ConversionContext): Promise<ConversionDraft> {
    this.log('debug', `Running ${this.engine.name} inference`);
    const doc = await this.engine.infer(document, signal);

    const renderer = new DoclingMarkdownRenderer(
      this.logger,
      options.imageFormat,
    );
    const rendered = renderer.render(doc, signal);
    const sourceName = doc.origin?.filename ?? document.name;

    return {
      markdown: rendered.markdown,
      metadata: {
        title: rendered.title ?? basename(sourceName, extname(sourceName)),
        pageCount: rendered.pageCount > 0 ? rendered.pageCount : undefined,
        wordCount: countWords(rendered.markdown),
      },
      images: rendered.images,
      hyperlinks: rendered.hyperlinks,
    };
  }
}
