import type { LoggerMethods } from '@docmill/logger';
import type { DocumentFormat, VariantKind } from '@docmill/model';

import { DOCUMENT_FORMATS } from '@docmill/model';

import type { InferenceEngine } from '../engine/inference-engine';
import type { Converter } from './converter';

import { ProgrammerError } from '../errors';
import { DoclingConverter } from './docling-converter';
import { DocxFallbackConverter } from './docx-fallback-converter';
import { HtmlFallbackConverter } from './html-fallback-converter';
import { PdfFallbackConverter } from './pdf-fallback-converter';
import { PptxFallbackConverter } from './pptx-fallback-converter';
import { UniversalConverter } from './universal-converter';

/**
 * Order in which variants are tried for a document
 */
export const VARIANT_ORDER: readonly VariantKind[] = [
  'ai-primary',
  'format-fallback',
  'universal-fallback',
];

type TableKey = `${VariantKind}:${DocumentFormat}`;

/**
 * Dispatch table from (variant kind, document format) to the converter
 * that handles it. At most one converter per cell.
 */
export class ConverterTable {
  private readonly cells = new Map<TableKey, Converter>();

  /**
   * Standard table: the AI-primary converter (when an engine is given),
   * the four format-specific fallbacks and the universal converter.
   */
  static createDefault(
    logger: LoggerMethods,
    engine?: InferenceEngine,
  ): ConverterTable {
    const table = new ConverterTable();
    if (engine) {
      table.register(new DoclingConverter(logger, engine));
    }
    return table
      .register(new PdfFallbackConverter(logger))
      .register(new DocxFallbackConverter(logger))
      .register(new PptxFallbackConverter(logger))
      .register(new HtmlFallbackConverter(logger))
      .register(new UniversalConverter(logger));
  }

  /**
   * Add a converter to every cell of its variant whose format it supports.
   *
   * @throws ProgrammerError when a cell is already taken
   */
  register(converter: Converter): this {
    for (const format of DOCUMENT_FORMATS) {
      if (!converter.supports(format)) {
        continue;
      }
      const key: TableKey = `${converter.variant}:${format}`;
      const existing = this.cells.get(key);
      if (existing) {
        throw new ProgrammerError(
          `${converter.id} conflicts with ${existing.id} for ${converter.variant} ${format}`,
        );
      }
      this.cells.set(key, converter);
    }
    return this;
  }

  get(variant: VariantKind, format: DocumentFormat): Converter | undefined {
    return this.cells.get(`${variant}:${format}`);
  }

  /**
   * Converters to try for `format`, in {@link VARIANT_ORDER}, skipping
   * variants without a converter for it.
   */
  chainFor(format: DocumentFormat): Converter[] {
    return VARIANT_ORDER.flatMap((variant) => {
      const converter = this.get(variant, format);
      return converter ? [converter] : [];
    });
  }
}
