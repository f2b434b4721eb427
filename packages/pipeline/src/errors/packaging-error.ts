/**
 * PackagingError
 *
 * Writing converted output (markdown, images, manifest or archive) failed.
 */
export class PackagingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PackagingError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create PackagingError from unknown error with context
   */
  static fromError(context: string, error: unknown): PackagingError {
    return new PackagingError(
      `${context}: ${PackagingError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
