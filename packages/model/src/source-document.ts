/**
 * Document formats the pipeline can classify and convert.
 */
export const DOCUMENT_FORMATS = [
  'pdf',
  'docx',
  'pptx',
  'html',
  'txt',
  'md',
] as const;

export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

/**
 * A file on disk whose format has been determined by content inspection.
 *
 * Created once by the format sniffer and never mutated afterwards.
 */
export interface SourceDocument {
  /** Absolute path to the file */
  readonly path: string;

  /** File name including extension (e.g., "report.pdf") */
  readonly name: string;

  /** Lower-cased extension without the dot ("" when the file has none) */
  readonly extension: string;

  /** Detected format; content signature wins over the extension */
  readonly format: DocumentFormat;

  /** File size in bytes at classification time */
  readonly sizeBytes: number;
}
