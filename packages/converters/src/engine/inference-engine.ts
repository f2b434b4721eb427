import type {
  DoclingDocument,
  DocumentFormat,
  SourceDocument,
} from '@docmill/model';

/**
 * Model-inference engine used by the AI-primary converter.
 *
 * Implementations are shared read-only across concurrent conversions.
 */
export interface InferenceEngine {
  /** Short name used in log messages */
  readonly name: string;

  /** Whether the engine accepts documents of this format */
  supports(format: DocumentFormat): boolean;

  /**
   * Run layout/structure inference on a document.
   *
   * @throws EngineUnavailableError when the engine cannot be reached
   * @throws ProcessingError when the engine rejects the document
   * @throws AbortError when the signal fires
   */
  infer(
    document: SourceDocument,
    signal?: AbortSignal,
  ): Promise<DoclingDocument>;
}

/**
 * Structural check for a DoclingDocument JSON export.
 */
export function isDoclingDocument(value: unknown): value is DoclingDocument {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'body' in value &&
    typeof value.body === 'object' &&
    value.body !== null &&
    'texts' in value &&
    Array.isArray(value.texts) &&
    'groups' in value &&
    Array.isArray(value.groups) &&
    'tables' in value &&
    Array.isArray(value.tables) &&
    'pictures' in value &&
    Array.isArray(value.pictures)
  );
}
