export { DOCUMENT_FORMATS } from './source-document';
export type { DocumentFormat, SourceDocument } from './source-document';
export type { ConversionOptions, ImageFormat } from './conversion-options';
export type {
  ConversionError,
  ConversionErrorKind,
  ConversionMetadata,
  ConversionResult,
  ConverterId,
  ExtractedImage,
  FailedConversion,
  Hyperlink,
  SuccessfulConversion,
  VariantKind,
} from './conversion-result';
export type {
  OrchestrationOutcome,
  OrchestrationState,
  VariantAttempt,
} from './orchestration';
export type {
  BatchJob,
  BatchProgress,
  BatchStatus,
  BatchSummary,
} from './batch';
export type {
  DoclingBBox,
  DoclingBaseNode,
  DoclingBody,
  DoclingDocument,
  DoclingGroupItem,
  DoclingImageRef,
  DoclingOrigin,
  DoclingPage,
  DoclingPictureItem,
  DoclingProv,
  DoclingReference,
  DoclingTableCell,
  DoclingTableData,
  DoclingTableItem,
  DoclingTextItem,
} from './docling-document';
