import type { LoggerMethods } from '@docmill/logger';
import type {
  BatchSummary,
  ConversionOptions,
  OrchestrationOutcome,
} from '@docmill/model';

import {
  ConverterTable,
  DoclingInferenceEngine,
  DocumentConversionError,
  FormatSniffer,
  ProgrammerError,
  resolveConversionOptions,
} from '@docmill/converters';
import { basename, join, resolve } from 'node:path';

import type { BatchRunOptions } from '../batch/batch-coordinator';
import type {
  DocmillSettings,
  FallbackStrategy,
  OutputMode,
} from '../config/settings';
import type {
  OutputPackager,
  PackagedOutput,
} from '../packaging/output-packager';
import type { ConversionTelemetry } from '../telemetry/conversion-telemetry';

import { BatchCoordinator } from '../batch/batch-coordinator';
import { FallbackOrchestrator } from '../orchestration/fallback-orchestrator';
import { ArchivePackager } from '../packaging/archive-packager';
import { DirectoryPackager } from '../packaging/directory-packager';
import { QualityScorer } from '../scoring/quality-scorer';
import { LoggerTelemetry } from '../telemetry/conversion-telemetry';

/**
 * Lifecycle of the engine behind the AI-primary variant.
 */
export interface EngineLifecycle {
  waitForReady(): Promise<void>;
  dispose(): void;
}

export interface DocumentConverterServiceOptions {
  /** Defaults merged under the options passed to each call */
  defaults?: Partial<ConversionOptions>;
  strategy?: FallbackStrategy;
  outputMode?: OutputMode;
  concurrency?: number;
  recursive?: boolean;
  scorer?: QualityScorer;
  telemetry?: ConversionTelemetry;
  engine?: EngineLifecycle;
}

export interface DocumentConversion {
  outcome: OrchestrationOutcome;
  output: PackagedOutput;
}

export interface DirectoryConversion {
  summary: BatchSummary;
  output: PackagedOutput;
}

const DEFAULT_ARCHIVE_NAME = 'documents';

/**
 * DocumentConverterService
 *
 * Entry point that wires sniffing, fallback orchestration, batching and
 * packaging together.
 *
 * @example
 * ```typescript
 * const service = DocumentConverterService.create(loadSettings(), logger);
 * await service.init();
 * const { summary } = await service.convertDirectory('./inbox', './out');
 * service.dispose();
 * ```
 */
export class DocumentConverterService {
  private readonly sniffer: FormatSniffer;
  private readonly orchestrator: FallbackOrchestrator;
  private readonly batch: BatchCoordinator;
  private readonly directoryPackager: DirectoryPackager;
  private readonly archivePackager: ArchivePackager;

  constructor(
    private readonly logger: LoggerMethods,
    table: ConverterTable,
    private readonly options: DocumentConverterServiceOptions = {},
  ) {
    const { telemetry } = options;
    this.sniffer = new FormatSniffer(logger);
    this.orchestrator = new FallbackOrchestrator(
      logger,
      table,
      options.scorer ?? new QualityScorer(),
      { strategy: options.strategy, telemetry },
    );
    this.batch = new BatchCoordinator(logger, this.sniffer, this.orchestrator, {
      telemetry,
    });
    this.directoryPackager = new DirectoryPackager(logger);
    this.archivePackager = new ArchivePackager(logger);
  }

  /**
   * Build a service from runtime settings. The AI-primary variant is only
   * registered when a docling URL is configured.
   */
  static create(
    settings: DocmillSettings,
    logger: LoggerMethods,
  ): DocumentConverterService {
    const engine = settings.doclingUrl
      ? DoclingInferenceEngine.connect(
          logger,
          { baseUrl: settings.doclingUrl },
          { taskTimeoutMs: settings.timeoutMs },
        )
      : undefined;
    if (!engine) {
      logger.info(
        '[DocumentConverterService] No docling URL configured, using fallback converters only',
      );
    }

    return new DocumentConverterService(
      logger,
      ConverterTable.createDefault(logger, engine),
      {
        defaults: {
          timeoutMs: settings.timeoutMs,
          qualityThreshold: settings.qualityThreshold,
          maxImageSize: settings.maxImageSize,
        },
        strategy: settings.fallbackStrategy,
        outputMode: settings.outputMode,
        concurrency: settings.concurrency,
        recursive: settings.recursive,
        telemetry: new LoggerTelemetry(logger),
        engine,
      },
    );
  }

  /**
   * Wait until the inference engine answers its health check.
   *
   * @throws EngineUnavailableError when it never does
   */
  async init(): Promise<void> {
    if (this.options.engine) {
      await this.options.engine.waitForReady();
      this.logger.info('[DocumentConverterService] Engine is ready');
    }
  }

  /**
   * Convert one file and write it under `outputDirectory`.
   *
   * Classification failures come back as an exhausted outcome with a failed
   * result; only ProgrammerError is thrown.
   */
  async convertDocument(
    path: string,
    outputDirectory: string,
    options: Partial<ConversionOptions> = {},
    signal?: AbortSignal,
  ): Promise<DocumentConversion> {
    const resolved = this.resolveOptions(options);
    const outputRoot = resolve(outputDirectory);
    const sourcePath = resolve(path);

    let outcome: OrchestrationOutcome;
    try {
      const document = await this.sniffer.classify(sourcePath);
      outcome = await this.orchestrator.orchestrate(
        document,
        outputRoot,
        resolved,
        signal,
      );
    } catch (error) {
      if (error instanceof ProgrammerError) {
        throw error;
      }
      outcome = this.unconvertible(error);
    }

    const output = await this.directoryPackager.write(
      new Map([[sourcePath, outcome.result]]),
      outputRoot,
    );
    return { outcome, output };
  }

  /**
   * Convert every document of a directory and package the batch as a
   * directory tree or as `<outputDirectory>/<input name>.zip`.
   */
  async convertDirectory(
    directory: string,
    outputDirectory: string,
    options: Partial<ConversionOptions> = {},
    batchOptions: BatchRunOptions = {},
  ): Promise<DirectoryConversion> {
    const resolved = this.resolveOptions(options);
    const outputRoot = resolve(outputDirectory);

    const summary = await this.batch.run(directory, resolved, {
      concurrency: this.options.concurrency,
      recursive: this.options.recursive,
      workDirectory: outputRoot,
      ...batchOptions,
    });

    const archive = this.options.outputMode === 'archive';
    const packager: OutputPackager = archive
      ? this.archivePackager
      : this.directoryPackager;
    const destination = archive
      ? join(
          outputRoot,
          `${basename(summary.inputDirectory) || DEFAULT_ARCHIVE_NAME}.zip`,
        )
      : outputRoot;

    const output = await packager.write(summary, destination);
    return { summary, output };
  }

  dispose(): void {
    this.options.engine?.dispose();
  }

  private resolveOptions(
    options: Partial<ConversionOptions>,
  ): ConversionOptions {
    return resolveConversionOptions({ ...this.options.defaults, ...options });
  }

  private unconvertible(error: unknown): OrchestrationOutcome {
    const kind = DocumentConversionError.classify(error);
    const message = DocumentConversionError.getErrorMessage(error);
    this.logger.warn(
      `[DocumentConverterService] Cannot convert (${kind}): ${message}`,
    );
    return {
      state: kind === 'Cancelled' ? 'cancelled' : 'exhausted',
      result: {
        success: false,
        markdown: '',
        error: { kind, message },
        metadata: {},
        images: [],
        hyperlinks: [],
        durationMs: 0,
        warnings: [],
      },
      score: 0,
      attempts: [],
      fallbackUsed: false,
    };
  }
}
