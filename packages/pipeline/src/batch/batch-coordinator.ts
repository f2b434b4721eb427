import type { FormatSniffer } from '@docmill/converters';
import type { LoggerMethods } from '@docmill/logger';
import type {
  BatchJob,
  BatchProgress,
  BatchStatus,
  BatchSummary,
  ConversionOptions,
  ConversionResult,
} from '@docmill/model';

import {
  assertConversionOptions,
  DocumentConversionError,
  ProgrammerError,
} from '@docmill/converters';
import {
  ConcurrentPool,
  createAbortError,
  linkAbortSignals,
} from '@docmill/shared';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { availableParallelism, tmpdir } from 'node:os';
import { basename, join, resolve } from 'node:path';

import type { FallbackOrchestrator } from '../orchestration/fallback-orchestrator';
import type { ConversionTelemetry } from '../telemetry/conversion-telemetry';

import { BATCH } from '../config/constants';
import { safeRecord } from '../telemetry/conversion-telemetry';
import { FileEnumerator } from './file-enumerator';

export interface BatchRunOptions {
  /** Worker count (default: available parallelism) */
  concurrency?: number;

  /** Descend into subdirectories */
  recursive?: boolean;

  signal?: AbortSignal;

  /**
   * Called once per completed document. Errors thrown here are logged and
   * otherwise ignored.
   */
  onProgress?: (progress: BatchProgress) => void;

  /** Cancel the whole batch after this many milliseconds */
  deadlineMs?: number;

  /** Scratch space for converters; a temporary directory when omitted */
  workDirectory?: string;
}

export interface BatchCoordinatorOptions {
  telemetry?: ConversionTelemetry;
  enumerator?: FileEnumerator;
}

type ItemOutcome =
  | { kind: 'completed'; result: ConversionResult; fallbackUsed: boolean }
  | { kind: 'cancelled' };

/**
 * BatchCoordinator
 *
 * Converts every document of a directory on a bounded worker pool. Each
 * document is sniffed and orchestrated in isolation: whatever it throws
 * becomes that document's failed result, never the batch's.
 */
export class BatchCoordinator {
  private readonly telemetry?: ConversionTelemetry;
  private readonly enumerator: FileEnumerator;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly sniffer: FormatSniffer,
    private readonly orchestrator: FallbackOrchestrator,
    options: BatchCoordinatorOptions = {},
  ) {
    this.telemetry = options.telemetry;
    this.enumerator = options.enumerator ?? new FileEnumerator(logger);
  }

  /**
   * Convert all documents in `directory`.
   *
   * @throws ProgrammerError when the directory or options are invalid; no
   *   document is touched in that case
   */
  async run(
    directory: string,
    options: ConversionOptions,
    runOptions: BatchRunOptions = {},
  ): Promise<BatchSummary> {
    const startTime = Date.now();
    const {
      concurrency = availableParallelism(),
      recursive = false,
      signal,
      onProgress,
      deadlineMs,
    } = runOptions;

    this.validateRunOptions(concurrency, deadlineMs);
    assertConversionOptions(options);
    const inputDirectory = await this.resolveDirectory(directory);

    const job: BatchJob = {
      inputDirectory,
      options,
      documents: await this.enumerator.enumerate(inputDirectory, recursive),
      results: new Map(),
      fallbackUsed: new Set(),
      status: 'pending',
    };
    const total = job.documents.length;
    this.logger.info(
      `[BatchCoordinator] Converting ${total} document(s) from ${inputDirectory} with concurrency ${concurrency}`,
    );

    const deadline = new AbortController();
    const timer =
      deadlineMs === undefined
        ? undefined
        : setTimeout(
            () => deadline.abort(createAbortError('Batch deadline exceeded')),
            deadlineMs,
          );
    const linked = linkAbortSignals(signal, deadline.signal);
    const ownsWorkDirectory = runOptions.workDirectory === undefined;
    const workDirectory =
      runOptions.workDirectory ??
      (await mkdtemp(join(tmpdir(), BATCH.WORK_DIR_PREFIX)));

    job.status = 'running';
    try {
      await ConcurrentPool.run(
        job.documents,
        concurrency,
        (path) => this.convertOne(path, options, workDirectory, linked.signal),
        {
          abortSignal: linked.signal,
          onItemComplete: (outcome, index) => {
            if (outcome.kind === 'cancelled') {
              return;
            }
            const path = job.documents[index];
            job.results.set(path, outcome.result);
            if (outcome.fallbackUsed) {
              job.fallbackUsed.add(path);
            }
            this.notifyProgress(onProgress, {
              completed: job.results.size,
              total,
              path,
            });
          },
        },
      );
    } finally {
      clearTimeout(timer);
      linked.dispose();
      if (ownsWorkDirectory) {
        await rm(workDirectory, { recursive: true, force: true });
      }
    }

    const summary = this.summarize(
      job,
      linked.signal.aborted,
      Date.now() - startTime,
    );
    this.logger.info(
      `[BatchCoordinator] Batch ${summary.status}: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.cancelled.length} cancelled in ${summary.durationMs}ms`,
    );
    safeRecord(
      this.telemetry,
      {
        type: 'batch-completed',
        directory: inputDirectory,
        status: summary.status,
        total: summary.total,
        succeeded: summary.succeeded,
        failed: summary.failed,
        fallbackUsed: summary.fallbackUsed,
        cancelled: summary.cancelled.length,
        durationMs: summary.durationMs,
      },
      this.logger,
    );

    return summary;
  }

  private async convertOne(
    path: string,
    options: ConversionOptions,
    workDirectory: string,
    signal: AbortSignal,
  ): Promise<ItemOutcome> {
    const startTime = Date.now();
    try {
      const document = await this.sniffer.classify(path);
      const outcome = await this.orchestrator.orchestrate(
        document,
        workDirectory,
        options,
        signal,
      );
      if (outcome.state === 'cancelled') {
        return { kind: 'cancelled' };
      }
      return {
        kind: 'completed',
        result: outcome.result,
        fallbackUsed: outcome.fallbackUsed,
      };
    } catch (error) {
      const kind = DocumentConversionError.classify(error);
      if (kind === 'Cancelled') {
        return { kind: 'cancelled' };
      }
      const message = DocumentConversionError.getErrorMessage(error);
      this.logger.warn(
        `[BatchCoordinator] ${basename(path)} failed (${kind}): ${message}`,
      );
      safeRecord(
        this.telemetry,
        { type: 'document-failed', document: path, errorKind: kind, message },
        this.logger,
      );
      return {
        kind: 'completed',
        fallbackUsed: false,
        result: {
          success: false,
          markdown: '',
          error: { kind, message },
          metadata: {},
          images: [],
          hyperlinks: [],
          durationMs: Date.now() - startTime,
          warnings: [],
        },
      };
    }
  }

  private notifyProgress(
    onProgress: BatchRunOptions['onProgress'],
    progress: BatchProgress,
  ): void {
    if (!onProgress) {
      return;
    }
    try {
      onProgress(progress);
    } catch (error) {
      this.logger.warn(
        `[BatchCoordinator] Progress callback failed: ${DocumentConversionError.getErrorMessage(error)}`,
      );
    }
  }

  private summarize(
    job: BatchJob,
    aborted: boolean,
    durationMs: number,
  ): BatchSummary {
    const results = new Map<string, ConversionResult>();
    const cancelled: string[] = [];
    let succeeded = 0;

    for (const path of job.documents) {
      const result = job.results.get(path);
      if (!result) {
        cancelled.push(path);
        continue;
      }
      results.set(path, result);
      if (result.success) {
        succeeded++;
      }
    }
    const failed = results.size - succeeded;

    let status: BatchStatus = failed > 0 ? 'partially-failed' : 'completed';
    if (aborted && cancelled.length > 0) {
      status = 'cancelled';
    }
    job.status = status;

    return {
      inputDirectory: job.inputDirectory,
      status,
      total: job.documents.length,
      succeeded,
      failed,
      fallbackUsed: job.fallbackUsed.size,
      cancelled,
      results,
      durationMs,
    };
  }

  private validateRunOptions(
    concurrency: number,
    deadlineMs: number | undefined,
  ): void {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ProgrammerError(
        `concurrency must be an integer >= 1, got ${concurrency}`,
      );
    }
    if (
      deadlineMs !== undefined &&
      (!Number.isInteger(deadlineMs) ||
        deadlineMs < 1 ||
        deadlineMs > BATCH.MAX_DEADLINE_MS)
    ) {
      throw new ProgrammerError(
        `deadlineMs must be an integer between 1 and ${BATCH.MAX_DEADLINE_MS}, got ${deadlineMs}`,
      );
    }
  }

  private async resolveDirectory(directory: string): Promise<string> {
    const inputDirectory = resolve(directory);
    const stats = await stat(inputDirectory).catch((error: unknown) => {
      throw new ProgrammerError(
        `Input directory not found: ${inputDirectory}`,
        { cause: error },
      );
    });
    if (!stats.isDirectory()) {
      throw new ProgrammerError(`Not a directory: ${inputDirectory}`);
    }
    return inputDirectory;
  }
}
