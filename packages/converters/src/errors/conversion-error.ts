import type { ConversionErrorKind } from '@docmill/model';

import { isAbortError } from '@docmill/shared';

/**
 * DocumentConversionError
 *
 * Base error class for conversion failures. `kind` is the classification
 * reported in a failed ConversionResult.
 */
export class DocumentConversionError extends Error {
  readonly kind: ConversionErrorKind;

  constructor(
    kind: ConversionErrorKind,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'DocumentConversionError';
    this.kind = kind;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Classification of an arbitrary thrown value.
   *
   * Conversion errors keep their kind, AbortErrors count as cancellation and
   * anything else is a processing error.
   */
  static classify(error: unknown): ConversionErrorKind {
    if (error instanceof DocumentConversionError) {
      return error.kind;
    }
    if (isAbortError(error)) {
      return 'Cancelled';
    }
    return 'ProcessingError';
  }
}

/**
 * UnknownFormatError
 *
 * The file extension is not one the pipeline recognizes.
 */
export class UnknownFormatError extends DocumentConversionError {
  constructor(message: string, options?: ErrorOptions) {
    super('UnknownFormat', message, options);
    this.name = 'UnknownFormatError';
  }
}

/**
 * UnsupportedFormatError
 *
 * The extension is recognized but the content is empty, truncated or not
 * a valid instance of any supported format.
 */
export class UnsupportedFormatError extends DocumentConversionError {
  constructor(message: string, options?: ErrorOptions) {
    super('UnsupportedFormat', message, options);
    this.name = 'UnsupportedFormatError';
  }

  static fromError(context: string, error: unknown): UnsupportedFormatError {
    return new UnsupportedFormatError(
      `${context}: ${DocumentConversionError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * EngineUnavailableError
 *
 * The inference engine could not be reached or reported a transient fault.
 */
export class EngineUnavailableError extends DocumentConversionError {
  constructor(message: string, options?: ErrorOptions) {
    super('EngineUnavailable', message, options);
    this.name = 'EngineUnavailableError';
  }

  static fromError(context: string, error: unknown): EngineUnavailableError {
    return new EngineUnavailableError(
      `${context}: ${DocumentConversionError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * ProcessingError
 *
 * A converter hit an unrecoverable fault while reading or rendering.
 */
export class ProcessingError extends DocumentConversionError {
  constructor(message: string, options?: ErrorOptions) {
    super('ProcessingError', message, options);
    this.name = 'ProcessingError';
  }

  static fromError(context: string, error: unknown): ProcessingError {
    return new ProcessingError(
      `${context}: ${DocumentConversionError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * ProgrammerError
 *
 * The caller broke the contract (missing input, bad options, wrong format
 * for the variant). Always thrown, never folded into a result.
 */
export class ProgrammerError extends DocumentConversionError {
  constructor(message: string, options?: ErrorOptions) {
    super('ProgrammerError', message, options);
    this.name = 'ProgrammerError';
  }
}
