/**
 * Identifier of the converter variant that produced a result.
 */
export type ConverterId =
  | 'docling-ai'
  | 'pdf-fallback'
  | 'docx-fallback'
  | 'pptx-fallback'
  | 'html-fallback'
  | 'universal-fallback';

/**
 * Role a converter plays in the fallback chain.
 */
export type VariantKind = 'ai-primary' | 'format-fallback' | 'universal-fallback';

/**
 * Classification of a failed conversion.
 *
 * - UnknownFormat: extension not recognized
 * - UnsupportedFormat: recognized extension, invalid or corrupt content
 * - EngineUnavailable: the inference engine is down or erroring transiently
 * - ProcessingError: the variant hit an unrecoverable internal fault
 * - ProgrammerError: caller contract violation (invalid arguments)
 * - Timeout: the per-attempt soft deadline expired
 * - Cancelled: the caller cancelled the conversion
 */
export type ConversionErrorKind =
  | 'UnknownFormat'
  | 'UnsupportedFormat'
  | 'EngineUnavailable'
  | 'ProcessingError'
  | 'ProgrammerError'
  | 'Timeout'
  | 'Cancelled';

/**
 * Document properties; every field is absent when the source lacks it.
 */
export interface ConversionMetadata {
  title?: string;
  author?: string;
  subject?: string;
  keywords?: string[];
  /** ISO 8601 timestamp */
  creationDate?: string;
  /** ISO 8601 timestamp */
  modificationDate?: string;
  pageCount?: number;
  wordCount?: number;
}

/**
 * Image pulled out of the source document.
 *
 * The bytes stay in memory until the packaging layer writes them.
 */
export interface ExtractedImage {
  /** Output file name, referenced from the markdown as `images/<filename>` */
  filename: string;

  /** Raw image bytes */
  data: Uint8Array;

  mimeType: string;

  sizeBytes: number;

  /** 1-based page or slide the image came from, when known */
  pageIndex?: number;
}

export interface Hyperlink {
  url: string;
  /** Anchor text ("" when the link has none) */
  text: string;
}

export interface ConversionError {
  kind: ConversionErrorKind;
  message: string;
}

interface ConversionResultBase {
  metadata: ConversionMetadata;
  images: ExtractedImage[];
  hyperlinks: Hyperlink[];
  durationMs: number;
  warnings: string[];
}

export interface SuccessfulConversion extends ConversionResultBase {
  success: true;
  /** UTF-8 markdown, never empty */
  markdown: string;
  converterUsed: ConverterId;
}

export interface FailedConversion extends ConversionResultBase {
  success: false;
  markdown: '';
  error: ConversionError;
  /** Absent when the document failed before any converter ran */
  converterUsed?: ConverterId;
}

/**
 * Outcome of a single converter variant run.
 */
export type ConversionResult = SuccessfulConversion | FailedConversion;
