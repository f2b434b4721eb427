import type { LoggerMethods } from '@docmill/logger';
import type {
  DoclingDocument,
  DocumentFormat,
  SourceDocument,
} from '@docmill/model';
import type {
  AsyncConversionTask,
  ConversionOptions,
  DoclingAPIClient,
} from 'docling-sdk';

import { createAbortError, throwIfAborted } from '@docmill/shared';
import { Docling } from 'docling-sdk';
import { createWriteStream } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';

import type { InferenceEngine } from './inference-engine';

import { DOCLING_ENGINE } from '../config/constants';
import {
  DocumentConversionError,
  EngineUnavailableError,
  ProcessingError,
} from '../errors';
import { LocalFileServer } from '../utils/local-file-server';
import { ZipReader } from '../utils/zip-reader';
import { isDoclingDocument } from './inference-engine';

const SUPPORTED_FORMATS: ReadonlySet<DocumentFormat> = new Set([
  'pdf',
  'docx',
  'pptx',
  'html',
  'md',
]);

const CONNECTION_ERROR_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EHOSTUNREACH',
];

export interface DoclingEngineOptions {
  /** Overall limit for one engine task, independent of the caller's signal */
  taskTimeoutMs?: number;

  pollIntervalMs?: number;
}

export interface DoclingEngineConnection {
  baseUrl: string;

  /** Timeout for individual API calls */
  apiTimeoutMs?: number;
}

/**
 * Inference engine backed by a docling-serve instance.
 *
 * Local files are exposed through a short-lived {@link LocalFileServer},
 * converted with the async source API into a ZIP target, and the JSON
 * export inside the archive is returned as the DoclingDocument.
 */
export class DoclingInferenceEngine implements InferenceEngine {
  readonly name = 'docling';

  private readonly taskTimeoutMs: number;
  private readonly pollIntervalMs: number;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly client: DoclingAPIClient,
    options: DoclingEngineOptions = {},
  ) {
    this.taskTimeoutMs =
      options.taskTimeoutMs ?? DOCLING_ENGINE.DEFAULT_API_TIMEOUT_MS * 3;
    this.pollIntervalMs =
      options.pollIntervalMs ?? DOCLING_ENGINE.POLL_INTERVAL_MS;
  }

  /**
   * Create an engine with a docling-sdk client for the given server.
   */
  static connect(
    logger: LoggerMethods,
    connection: DoclingEngineConnection,
    options?: DoclingEngineOptions,
  ): DoclingInferenceEngine {
    logger.info('[DoclingEngine] Using server:', connection.baseUrl);
    const client = new Docling({
      api: {
        baseUrl: connection.baseUrl,
        timeout:
          connection.apiTimeoutMs ?? DOCLING_ENGINE.DEFAULT_API_TIMEOUT_MS,
      },
    });
    return new DoclingInferenceEngine(logger, client, options);
  }

  supports(format: DocumentFormat): boolean {
    return SUPPORTED_FORMATS.has(format);
  }

  /**
   * Poll the health endpoint until the server answers.
   *
   * @throws EngineUnavailableError once every health check has failed
   */
  async waitForReady(): Promise<void> {
    const { MAX_HEALTH_CHECK_ATTEMPTS: attempts, HEALTH_CHECK_LOG_EVERY } =
      DOCLING_ENGINE;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.client.health();
        this.logger.info(
          `[DoclingEngine] Health check passed after ${attempt} attempt(s)`,
        );
        return;
      } catch (error) {
        lastError = error;
        if ((attempt - 1) % HEALTH_CHECK_LOG_EVERY === 0) {
          this.logger.info(
            `[DoclingEngine] Health check ${attempt}/${attempts} failed: ${DocumentConversionError.getErrorMessage(error)}`,
          );
        }
      }
      if (attempt < attempts) {
        await delay(DOCLING_ENGINE.HEALTH_CHECK_INTERVAL_MS);
      }
    }

    throw EngineUnavailableError.fromError(
      `No healthy response after ${attempts} health checks`,
      lastError,
    );
  }

  async infer(
    document: SourceDocument,
    signal?: AbortSignal,
  ): Promise<DoclingDocument> {
    throwIfAborted(signal, 'Inference was aborted');
    if (!this.supports(document.format)) {
      throw new ProcessingError(
        `Docling engine does not accept ${document.format} documents`,
      );
    }

    const scratchDir = await mkdtemp(join(tmpdir(), 'docmill-docling-'));
    const server = new LocalFileServer();

    try {
      const httpUrl = await server.start(document.path);
      this.logger.debug(
        '[DoclingEngine] Serving',
        document.name,
        'at',
        httpUrl,
      );

      const task = await this.guardConnection('Failed to start task', () =>
        this.client.convertSourceAsync({
          sources: [{ kind: 'http', url: httpUrl }],
          options: this.buildConversionOptions(),
          target: { kind: 'zip' },
        }),
      );
      this.logger.info(
        `[DoclingEngine] Task created for ${document.name}: ${task.taskId}`,
      );

      await this.trackTaskProgress(task, signal);
      throwIfAborted(signal, 'Inference was aborted');

      const zipPath = join(scratchDir, 'result.zip');
      await this.downloadResult(task.taskId, zipPath);
      return await this.readDocument(zipPath, document.name);
    } finally {
      await server.stop();
      await rm(scratchDir, { recursive: true, force: true });
    }
  }

  dispose(): void {
    this.client.destroy();
  }

  private buildConversionOptions(): ConversionOptions {
    return {
      to_formats: ['json'],
      image_export_mode: 'embedded',
      generate_picture_images: true,
      images_scale: 2.0,
    };
  }

  private async trackTaskProgress(
    task: AsyncConversionTask,
    signal?: AbortSignal,
  ): Promise<void> {
    const startTime = Date.now();
    let lastStatus = '';

    while (true) {
      if (signal?.aborted) {
        throw createAbortError('Inference was aborted');
      }
      if (Date.now() - startTime > this.taskTimeoutMs) {
        throw new EngineUnavailableError(
          `Task ${task.taskId} timed out after ${this.taskTimeoutMs}ms`,
        );
      }

      const status = await this.guardConnection('Failed to poll task', () =>
        task.poll(),
      );

      if (status.task_status !== lastStatus) {
        lastStatus = status.task_status;
        this.logger.debug(
          `[DoclingEngine] Task ${task.taskId} status: ${status.task_status}`,
        );
      }

      if (status.task_status === 'success') {
        return;
      }

      if (status.task_status === 'failure') {
        throw new ProcessingError(
          `Task ${task.taskId} failed: ${await failureReason(task)}`,
        );
      }

      await delay(this.pollIntervalMs);
    }
  }

  private async downloadResult(taskId: string, zipPath: string): Promise<void> {
    const zipResult = await this.guardConnection(
      'Failed to download result',
      () => this.client.getTaskResultFile(taskId),
    );

    if (!zipResult.success || !zipResult.fileStream) {
      throw new EngineUnavailableError('Failed to get ZIP file result');
    }

    await pipeline(zipResult.fileStream, createWriteStream(zipPath));
  }

  private async readDocument(
    zipPath: string,
    documentName: string,
  ): Promise<DoclingDocument> {
    const entries = await ZipReader.readEntries(zipPath, (name) =>
      name.endsWith('.json'),
    );
    const [jsonEntry] = [...entries.values()];
    if (!jsonEntry) {
      throw new ProcessingError(
        `Engine result for ${documentName} has no JSON export`,
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(jsonEntry.toString('utf-8'));
    } catch (error) {
      throw ProcessingError.fromError(
        `Engine result for ${documentName} is not valid JSON`,
        error,
      );
    }

    if (!isDoclingDocument(parsed)) {
      throw new ProcessingError(
        `Engine result for ${documentName} is not a DoclingDocument`,
      );
    }
    return parsed;
  }

  /**
   * Run a client call, turning connection failures into
   * EngineUnavailableError and leaving other errors untouched.
   */
  private async guardConnection<T>(
    context: string,
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof DocumentConversionError) {
        throw error;
      }
      if (isConnectionError(error)) {
        throw EngineUnavailableError.fromError(context, error);
      }
      throw ProcessingError.fromError(context, error);
    }
  }
}

/**
 * Whether an error means the server could not be reached.
 */
export function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const serialized = `${error.message} ${JSON.stringify(error)} ${
    error.cause instanceof Error ? error.cause.message : ''
  }`;
  return (
    CONNECTION_ERROR_CODES.some((code) => serialized.includes(code)) ||
    serialized.includes('fetch failed')
  );
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Error messages the engine attached to a failed task. A result that cannot
 * be fetched is described rather than thrown, so the task failure itself
 * stays the reported error.
 */
async function failureReason(task: AsyncConversionTask): Promise<string> {
  try {
    const result = await task.getResult();
    const messages = (result.errors ?? []).map(
      (error: { message: string }) => error.message,
    );
    return messages.length > 0
      ? messages.join('; ')
      : `no error details (status ${result.status ?? 'unknown'})`;
  } catch (error) {
    return `result unavailable (${DocumentConversionError.getErrorMessage(error)})`;
  }
}
