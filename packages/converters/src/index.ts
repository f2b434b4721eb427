export {
  CONVERSION_DEFAULTS,
  CONVERTER,
  DOCLING_ENGINE,
  FORMAT_SNIFFER,
  PDF_FALLBACK,
} from './config/constants';
export {
  DocumentConversionError,
  EngineUnavailableError,
  ProcessingError,
  ProgrammerError,
  UnknownFormatError,
  UnsupportedFormatError,
} from './errors';
export { EXTENSION_FORMATS, FormatSniffer } from './sniffer/format-sniffer';
export {
  isDoclingDocument,
  type InferenceEngine,
} from './engine/inference-engine';
export {
  DoclingInferenceEngine,
  isConnectionError,
  type DoclingEngineConnection,
  type DoclingEngineOptions,
} from './engine/docling-engine';
export {
  assertConversionOptions,
  conversionOptionsSchema,
  formatZodIssues,
  resolveConversionOptions,
} from './options/conversion-options';
export type { Converter } from './converters/converter';
export {
  BaseConverter,
  type ConversionContext,
  type ConversionDraft,
} from './converters/base-converter';
export { DoclingConverter } from './converters/docling-converter';
export { PdfFallbackConverter } from './converters/pdf-fallback-converter';
export { DocxFallbackConverter } from './converters/docx-fallback-converter';
export { PptxFallbackConverter } from './converters/pptx-fallback-converter';
export {
  createTurndownService,
  HtmlFallbackConverter,
} from './converters/html-fallback-converter';
export { UniversalConverter } from './converters/universal-converter';
export { ConverterTable, VARIANT_ORDER } from './converters/converter-table';
export {
  DoclingMarkdownRenderer,
  type RenderedDocument,
} from './markdown/docling-renderer';
export { renderMarkdownTable } from './markdown/markdown-table';
export { countWords } from './markdown/text-stats';
export { ZipReader } from './utils/zip-reader';
