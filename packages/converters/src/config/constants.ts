/**
 * Configuration constants for FormatSniffer
 */
export const FORMAT_SNIFFER = {
  /**
   * Bytes read from the start of a file for signature detection
   */
  HEAD_BYTES: 8192,

  /**
   * Bytes read from the end of a file (PDF trailer detection)
   */
  TAIL_BYTES: 1024,
} as const;

/**
 * Configuration constants shared by every converter variant
 */
export const CONVERTER = {
  /**
   * Inputs larger than this are rejected as a processing error
   */
  MAX_FILE_SIZE_BYTES: 100 * 1024 * 1024,

  /**
   * Name of the per-attempt scratch directory inside the output directory
   */
  SCRATCH_DIR_PREFIX: '.docmill-',
} as const;

/**
 * Defaults applied by resolveConversionOptions
 */
export const CONVERSION_DEFAULTS = {
  EXTRACT_IMAGES: true,
  EXTRACT_METADATA: true,
  EXTRACT_HYPERLINKS: true,

  /**
   * 5 MiB
   */
  MAX_IMAGE_SIZE_BYTES: 5 * 1024 * 1024,

  IMAGE_FORMAT: 'png',

  QUALITY_THRESHOLD: 0.5,

  /**
   * Soft deadline for one variant attempt
   */
  TIMEOUT_MS: 300000,
} as const;

/**
 * Configuration constants for DoclingInferenceEngine
 */
export const DOCLING_ENGINE = {
  /**
   * Default timeout for API calls in milliseconds
   */
  DEFAULT_API_TIMEOUT_MS: 100000,

  /**
   * Interval for progress polling in milliseconds
   */
  POLL_INTERVAL_MS: 1000,

  /**
   * Maximum number of health check attempts before giving up
   */
  MAX_HEALTH_CHECK_ATTEMPTS: 60,

  /**
   * Interval between health check attempts in milliseconds
   */
  HEALTH_CHECK_INTERVAL_MS: 2000,

  /**
   * Log every Nth failed health check (the first one always)
   */
  HEALTH_CHECK_LOG_EVERY: 5,
} as const;

/**
 * Configuration constants for PdfFallbackConverter
 */
export const PDF_FALLBACK = {
  /**
   * Minimum run of spaces that separates two layout columns
   */
  COLUMN_GAP: 2,

  /**
   * Minimum consecutive aligned lines before a block is treated as a table
   */
  MIN_TABLE_ROWS: 2,
} as const;
