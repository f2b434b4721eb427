/**
 * QualityScorer configuration constants
 */
export const QUALITY_SCORER = {
  /**
   * Trimmed markdown shorter than this earns no content credit
   */
  MIN_CONTENT_LENGTH: 50,

  /**
   * Default signal weights (sum to 1)
   */
  WEIGHTS: {
    content: 0.4,
    title: 0.15,
    author: 0.15,
    headings: 0.15,
    tables: 0.15,
  },
} as const;

/**
 * BatchCoordinator configuration constants
 */
export const BATCH = {
  /**
   * Prefix of the scratch directory used when no work directory is given
   */
  WORK_DIR_PREFIX: 'docmill-batch-',

  /**
   * Largest value accepted by setTimeout
   */
  MAX_DEADLINE_MS: 2_147_483_647,
} as const;

/**
 * Output packaging constants
 */
export const PACKAGING = {
  MARKDOWN_EXTENSION: '.md',

  IMAGES_DIR: 'images',

  MANIFEST_FILE: 'manifest.json',

  /**
   * Fixed timestamp for archive entries so repeated runs produce identical
   * archives (ZIP dates start in 1980)
   */
  ARCHIVE_ENTRY_DATE: '1980-01-01T00:00:00.000Z',

  /**
   * zlib compression level for archives
   */
  ARCHIVE_COMPRESSION_LEVEL: 6,
} as const;
