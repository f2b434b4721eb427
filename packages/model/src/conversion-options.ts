/**
 * Output encoding for extracted images.
 */
export type ImageFormat = 'png' | 'jpeg';

/**
 * Options recognized by every converter variant.
 *
 * Passed by value and frozen once resolved; converters never mutate them.
 */
export interface ConversionOptions {
  /** Keep images embedded in the source document */
  readonly extractImages: boolean;

  /** Keep document properties (title, author, dates, page count) */
  readonly extractMetadata: boolean;

  /** Keep (url, anchor text) pairs found in the document */
  readonly extractHyperlinks: boolean;

  /** Images larger than this many bytes are dropped */
  readonly maxImageSize: number;

  /**
   * File extension given to extracted images whose MIME type is not
   * recognized. Naming only: image bytes are never re-encoded, and images
   * of a known type keep their own extension.
   */
  readonly imageFormat: ImageFormat;

  /** Minimum quality score (0..1) for a result to be accepted without fallback */
  readonly qualityThreshold: number;

  /** Soft deadline in milliseconds for each variant attempt */
  readonly timeoutMs: number;
}
