import type { LoggerMethods } from '@docmill/logger';
import type {
  ConversionErrorKind,
  ConversionMetadata,
  ConversionOptions,
  ConversionResult,
  ConverterId,
  DocumentFormat,
  ExtractedImage,
  Hyperlink,
  SourceDocument,
  VariantKind,
} from '@docmill/model';

import {
  createAbortError,
  linkAbortSignals,
  throwIfAborted,
} from '@docmill/shared';
import { mkdir, mkdtemp, rm, stat } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';

import type { Converter } from './converter';

import { CONVERTER } from '../config/constants';
import {
  DocumentConversionError,
  ProcessingError,
  ProgrammerError,
} from '../errors';
import { assertConversionOptions } from '../options/conversion-options';

/**
 * What a variant produces before the shared post-processing step.
 */
export interface ConversionDraft {
  markdown: string;
  metadata: ConversionMetadata;
  images: ExtractedImage[];
  hyperlinks: Hyperlink[];
}

/**
 * Per-invocation state handed to {@link BaseConverter.run}.
 */
export interface ConversionContext {
  document: SourceDocument;
  options: ConversionOptions;

  /** Scratch directory inside the output directory, removed afterwards */
  workDir: string;

  /** Fires on caller cancellation or when the attempt deadline passes */
  signal: AbortSignal;

  /** Record a non-fatal problem on the result */
  warn: (message: string) => void;
}

/**
 * Abstract base class for all converter variants
 *
 * Provides the template around {@link run}:
 * - argument validation (ProgrammerError is the only thing thrown)
 * - input size check, scratch directory lifecycle
 * - per-attempt deadline combined with the caller's signal
 * - failure classification into a `success: false` result
 * - option-driven post-processing of images, metadata and hyperlinks
 */
export abstract class BaseConverter implements Converter {
  abstract readonly id: ConverterId;
  abstract readonly variant: VariantKind;
  protected abstract readonly formats: ReadonlySet<DocumentFormat>;

  constructor(
    protected readonly logger: LoggerMethods,
    protected readonly componentName: string,
  ) {}

  supports(format: DocumentFormat): boolean {
    return this.formats.has(format);
  }

  async convert(
    document: SourceDocument,
    outputDirectory: string,
    options: ConversionOptions,
    signal?: AbortSignal,
  ): Promise<ConversionResult> {
    this.validateArguments(document, outputDirectory, options);
    const sizeBytes = await this.statInput(document);

    const startTime = Date.now();
    const warnings: string[] = [];
    const deadline = new AbortController();
    const timer = setTimeout(
      () => deadline.abort(createAbortError('Conversion deadline exceeded')),
      options.timeoutMs,
    );
    const linked = linkAbortSignals(signal, deadline.signal);
    let workDir: string | undefined;

    this.log('info', `Converting ${document.name} (${document.format})`);

    try {
      throwIfAborted(linked.signal, 'Conversion was aborted');

      if (sizeBytes > CONVERTER.MAX_FILE_SIZE_BYTES) {
        throw new ProcessingError(
          `File too large: ${sizeBytes} bytes (max ${CONVERTER.MAX_FILE_SIZE_BYTES})`,
        );
      }

      await mkdir(outputDirectory, { recursive: true });
      workDir = await mkdtemp(
        join(outputDirectory, CONVERTER.SCRATCH_DIR_PREFIX),
      );

      const draft = await this.run({
        document,
        options,
        workDir,
        signal: linked.signal,
        warn: (message) => warnings.push(message),
      });
      throwIfAborted(linked.signal, 'Conversion was aborted');

      return this.finalize(draft, options, warnings, startTime);
    } catch (error) {
      if (error instanceof ProgrammerError) {
        throw error;
      }
      const kind = this.classifyFailure(error, signal, deadline.signal);
      const message = this.describeFailure(kind, error, options);
      this.log('warn', `${document.name} failed (${kind}): ${message}`);
      return this.failure(kind, message, warnings, startTime);
    } finally {
      clearTimeout(timer);
      linked.dispose();
      if (workDir) {
        await rm(workDir, { recursive: true, force: true });
      }
    }
  }

  /**
   * Produce the markdown and extracted artifacts for one document.
   *
   * Implementations check `context.signal` at every page, slide or
   * paragraph boundary.
   */
  protected abstract run(context: ConversionContext): Promise<ConversionDraft>;

  /**
   * Log a message with consistent component name prefix
   */
  protected log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    this.logger[level](`[${this.componentName}] ${message}`, ...args);
  }

  private validateArguments(
    document: SourceDocument,
    outputDirectory: string,
    options: ConversionOptions,
  ): void {
    if (!isAbsolute(document.path)) {
      throw new ProgrammerError(
        `Document path must be absolute: ${document.path}`,
      );
    }
    if (!isAbsolute(outputDirectory)) {
      throw new ProgrammerError(
        `Output directory must be absolute: ${outputDirectory}`,
      );
    }
    if (!this.supports(document.format)) {
      throw new ProgrammerError(
        `${this.id} does not support ${document.format} documents`,
      );
    }
    assertConversionOptions(options);
  }

  private async statInput(document: SourceDocument): Promise<number> {
    const stats = await stat(document.path).catch((error: unknown) => {
      throw new ProgrammerError(`Document not found: ${document.path}`, {
        cause: error,
      });
    });
    if (!stats.isFile()) {
      throw new ProgrammerError(`Not a regular file: ${document.path}`);
    }
    return stats.size;
  }

  private classifyFailure(
    error: unknown,
    callerSignal: AbortSignal | undefined,
    deadlineSignal: AbortSignal,
  ): ConversionErrorKind {
    if (callerSignal?.aborted) {
      return 'Cancelled';
    }
    if (deadlineSignal.aborted) {
      return 'Timeout';
    }
    return DocumentConversionError.classify(error);
  }

  private describeFailure(
    kind: ConversionErrorKind,
    error: unknown,
    options: ConversionOptions,
  ): string {
    switch (kind) {
      case 'Cancelled':
        return 'Conversion was cancelled';
      case 'Timeout':
        return `Conversion exceeded ${options.timeoutMs}ms`;
      default:
        return DocumentConversionError.getErrorMessage(error);
    }
  }

  private finalize(
    draft: ConversionDraft,
    options: ConversionOptions,
    warnings: string[],
    startTime: number,
  ): ConversionResult {
    let markdown = draft.markdown;
    const images: ExtractedImage[] = [];

    for (const image of draft.images) {
      if (!options.extractImages) {
        markdown = removeImageReference(markdown, image.filename);
      } else if (image.sizeBytes > options.maxImageSize) {
        warnings.push(
          `Dropped ${image.filename}: ${image.sizeBytes} bytes exceeds ${options.maxImageSize}`,
        );
        markdown = removeImageReference(markdown, image.filename);
      } else {
        images.push(image);
      }
    }

    if (markdown.trim().length === 0) {
      return this.failure(
        'ProcessingError',
        'Conversion produced no content',
        warnings,
        startTime,
      );
    }

    const durationMs = Date.now() - startTime;
    this.log('info', `Converted in ${durationMs}ms`);

    return {
      success: true,
      markdown,
      metadata: options.extractMetadata ? draft.metadata : {},
      images,
      hyperlinks: options.extractHyperlinks ? draft.hyperlinks : [],
      converterUsed: this.id,
      durationMs,
      warnings,
    };
  }

  private failure(
    kind: ConversionErrorKind,
    message: string,
    warnings: string[],
    startTime: number,
  ): ConversionResult {
    return {
      success: false,
      markdown: '',
      error: { kind, message },
      metadata: {},
      images: [],
      hyperlinks: [],
      converterUsed: this.id,
      durationMs: Date.now() - startTime,
      warnings,
    };
  }
}

/**
 * Drop `![alt](images/<filename>)` references and the blank lines they
 * leave behind.
 */
function removeImageReference(markdown: string, filename: string): string {
  const escaped = filename.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return markdown
    .replace(new RegExp(`!\\[[^\\]]*\\]\\(images/${escaped}\\)`, 'g'), '')
    .replace(/\n{3,}/g, '\n\n')
    .replace(/^\n+/, '');
}
