import type { LoggerMethods } from '@docmill/logger';
import type {
  BatchProgress,
  ConversionResult,
  SourceDocument,
} from '@docmill/model';

import {
  ConverterTable,
  FormatSniffer,
  ProgrammerError,
  resolveConversionOptions,
} from '@docmill/converters';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import type { TelemetryEvent } from '../telemetry/conversion-telemetry';
import type { StubResponse } from '../testing/stub-converter';

import { FallbackOrchestrator } from '../orchestration/fallback-orchestrator';
import { QualityScorer } from '../scoring/quality-scorer';
import { failedResult, successfulResult } from '../testing/results';
import { StubConverter } from '../testing/stub-converter';
import { BatchCoordinator } from './batch-coordinator';

const unreadable = vi.hoisted(() => new Set<string>());

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    readdir: (...args: Parameters<typeof actual.readdir>) => {
      const path = String(args[0]);
      if (unreadable.has(path)) {
        const error = new Error(
          `EACCES: permission denied, scandir '${path}'`,
        );
        return Promise.reject(Object.assign(error, { code: 'EACCES' }));
      }
      return actual.readdir(...args);
    },
  };
});

const succeed: StubResponse = () =>
  successfulResult({ converterUsed: 'universal-fallback' });

/** Resolves as cancelled once the signal fires */
const waitForAbort: StubResponse = (_document, signal) =>
  new Promise<ConversionResult>((resolve) => {
    if (!signal || signal.aborted) {
      resolve(failedResult('Cancelled', 'Conversion was cancelled'));
      return;
    }
    signal.addEventListener(
      'abort',
      () => resolve(failedResult('Cancelled', 'Conversion was cancelled')),
      { once: true },
    );
  });

describe('BatchCoordinator', () => {
  let root: string;
  let logger: LoggerMethods;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'docmill-batch-test-'));
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  afterEach(async () => {
    unreadable.clear();
    await rm(root, { recursive: true, force: true });
  });

  async function writeDocuments(names: string[]): Promise<string[]> {
    for (const name of names) {
      await writeFile(join(root, name), `Contents of ${name}`);
    }
    return names.map((name) => join(root, name)).sort();
  }

  function numbered(count: number): string[] {
    return Array.from(
      { length: count },
      (_, i) => `doc-${String(i).padStart(2, '0')}.txt`,
    );
  }

  function createCoordinator(
    respond: StubResponse,
    options: { aiFails?: boolean; events?: TelemetryEvent[] } = {},
  ) {
    const universal = new StubConverter(
      'universal-fallback',
      'universal-fallback',
      respond,
    );
    const table = new ConverterTable().register(universal);
    if (options.aiFails) {
      table.register(
        new StubConverter('docling-ai', 'ai-primary', () =>
          failedResult('EngineUnavailable'),
        ),
      );
    }
    const events = options.events;
    const telemetry = events
      ? {
          record: (event: TelemetryEvent) => {
            events.push(event);
          },
        }
      : undefined;
    const orchestrator = new FallbackOrchestrator(
      logger,
      table,
      new QualityScorer(),
      { telemetry },
    );
    const coordinator = new BatchCoordinator(
      logger,
      new FormatSniffer(logger),
      orchestrator,
      { telemetry },
    );
    return { coordinator, universal };
  }

  test('should record unknown formats as failures and convert the rest', async () => {
    await writeDocuments([...numbered(8), 'legacy.doc', 'data.xyz']);
    const { coordinator } = createCoordinator(succeed, { aiFails: true });

    const summary = await coordinator.run(root, resolveConversionOptions(), {
      concurrency: 4,
    });

    expect(summary).toMatchObject({
      inputDirectory: root,
      status: 'partially-failed',
      total: 10,
      succeeded: 8,
      failed: 2,
      fallbackUsed: 8,
      cancelled: [],
    });
    expect(summary.results.get(join(root, 'legacy.doc'))).toMatchObject({
      success: false,
      error: {
        kind: 'UnknownFormat',
        message: 'Unrecognized extension ".doc": legacy.doc',
      },
    });
    expect(summary.results.get(join(root, 'data.xyz'))).toMatchObject({
      success: false,
      error: { kind: 'UnknownFormat' },
    });
    expect(summary.results.get(join(root, 'doc-00.txt'))).toMatchObject({
      success: true,
      converterUsed: 'universal-fallback',
    });
  });

  test('should order results by path', async () => {
    const paths = await writeDocuments(['c.txt', 'a.txt', 'b.md']);
    const { coordinator } = createCoordinator(succeed);

    const summary = await coordinator.run(root, resolveConversionOptions(), {
      concurrency: 3,
    });

    expect([...summary.results.keys()]).toEqual(paths);
    expect(summary.status).toBe('completed');
  });

  test('should stop dispatching once cancelled', async () => {
    const paths = await writeDocuments(numbered(10));
    const { coordinator, universal } = createCoordinator(succeed);
    const controller = new AbortController();

    const summary = await coordinator.run(root, resolveConversionOptions(), {
      concurrency: 1,
      signal: controller.signal,
      onProgress: ({ completed }) => {
        if (completed === 3) {
          controller.abort();
        }
      },
    });

    expect(summary.status).toBe('cancelled');
    expect([...summary.results.keys()]).toEqual(paths.slice(0, 3));
    expect(summary.cancelled).toEqual(paths.slice(3));
    expect(summary.succeeded).toBe(3);
    expect(universal.calls).toHaveLength(3);
  });

  test('should list in-flight documents as cancelled', async () => {
    const paths = await writeDocuments(['a.txt', 'b.txt', 'c.txt', 'd.txt']);
    const { coordinator } = createCoordinator((document, signal) =>
      document.name === 'a.txt'
        ? succeed(document, signal)
        : waitForAbort(document, signal),
    );
    const controller = new AbortController();

    const summary = await coordinator.run(root, resolveConversionOptions(), {
      concurrency: 2,
      signal: controller.signal,
      onProgress: () => controller.abort(),
    });

    expect(summary.status).toBe('cancelled');
    expect([...summary.results.keys()]).toEqual([paths[0]]);
    expect(summary.cancelled).toEqual(paths.slice(1));
  });

  test('should cancel the batch when the deadline passes', async () => {
    const paths = await writeDocuments(['a.txt', 'b.txt']);
    const { coordinator } = createCoordinator(waitForAbort);

    const summary = await coordinator.run(root, resolveConversionOptions(), {
      concurrency: 2,
      deadlineMs: 50,
    });

    expect(summary.status).toBe('cancelled');
    expect(summary.results.size).toBe(0);
    expect(summary.cancelled).toEqual(paths);
  });

  test('should isolate a failing document from the others', async () => {
    await writeDocuments(['a.txt', 'b.txt', 'c.txt', 'd.txt']);
    const { coordinator } = createCoordinator(
      (document: SourceDocument, signal) => {
        if (document.name === 'b.txt') {
          throw new Error('boom');
        }
        if (document.name === 'c.txt') {
          throw new ProgrammerError('bad contract');
        }
        return succeed(document, signal);
      },
    );

    const summary = await coordinator.run(root, resolveConversionOptions(), {
      concurrency: 2,
    });

    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(2);
    expect(summary.status).toBe('partially-failed');
    expect(summary.results.get(join(root, 'b.txt'))).toMatchObject({
      success: false,
      error: { kind: 'ProcessingError', message: 'boom' },
    });
    expect(summary.results.get(join(root, 'c.txt'))).toMatchObject({
      success: false,
      error: { kind: 'ProgrammerError', message: 'bad contract' },
    });
    expect(logger.warn).toHaveBeenCalledWith(
      '[BatchCoordinator] b.txt failed (ProcessingError): boom',
    );
  });

  test('should report progress one completion at a time', async () => {
    await writeDocuments(numbered(6));
    const { coordinator } = createCoordinator(succeed);
    const progress: BatchProgress[] = [];

    await coordinator.run(root, resolveConversionOptions(), {
      concurrency: 3,
      onProgress: (update) => progress.push(update),
    });

    expect(progress.map((update) => update.completed)).toEqual([
      1, 2, 3, 4, 5, 6,
    ]);
    expect(progress.every((update) => update.total === 6)).toBe(true);
    expect(new Set(progress.map((update) => update.path)).size).toBe(6);
  });

  test('should log and ignore progress callback errors', async () => {
    await writeDocuments(['a.txt', 'b.txt']);
    const { coordinator } = createCoordinator(succeed);

    const summary = await coordinator.run(root, resolveConversionOptions(), {
      concurrency: 1,
      onProgress: () => {
        throw new Error('progress broke');
      },
    });

    expect(summary.status).toBe('completed');
    expect(summary.succeeded).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith(
      '[BatchCoordinator] Progress callback failed: progress broke',
    );
  });

  test('should include subdirectories only when recursive', async () => {
    await writeDocuments(['top.txt']);
    await mkdir(join(root, 'nested'));
    await writeFile(join(root, 'nested', 'deep.md'), '# Deep');
    const { coordinator } = createCoordinator(succeed);

    const flat = await coordinator.run(root, resolveConversionOptions(), {
      concurrency: 1,
    });
    const deep = await coordinator.run(root, resolveConversionOptions(), {
      concurrency: 1,
      recursive: true,
    });

    expect(flat.total).toBe(1);
    expect(deep.total).toBe(2);
    expect(deep.results.has(join(root, 'nested', 'deep.md'))).toBe(true);
  });

  test('should convert what it can read when a subdirectory is unreadable', async () => {
    await writeDocuments(['a.txt']);
    await mkdir(join(root, 'locked'));
    await writeFile(join(root, 'locked', 'b.txt'), 'hidden from the batch');
    unreadable.add(join(root, 'locked'));
    const { coordinator } = createCoordinator(succeed);

    const summary = await coordinator.run(root, resolveConversionOptions(), {
      concurrency: 1,
      recursive: true,
    });

    expect(summary).toMatchObject({
      status: 'completed',
      total: 1,
      succeeded: 1,
      failed: 0,
    });
    expect([...summary.results.keys()]).toEqual([join(root, 'a.txt')]);
  });

  test('should complete an empty directory', async () => {
    const { coordinator } = createCoordinator(succeed);

    const summary = await coordinator.run(root, resolveConversionOptions());

    expect(summary).toMatchObject({
      status: 'completed',
      total: 0,
      succeeded: 0,
      failed: 0,
      cancelled: [],
    });
  });

  test('should emit a batch-completed event', async () => {
    await writeDocuments(['a.txt', 'b.unknown']);
    const events: TelemetryEvent[] = [];
    const { coordinator } = createCoordinator(succeed, { events });

    await coordinator.run(root, resolveConversionOptions(), {
      concurrency: 1,
    });

    expect(events.at(-1)).toMatchObject({
      type: 'batch-completed',
      directory: root,
      status: 'partially-failed',
      total: 2,
      succeeded: 1,
      failed: 1,
      fallbackUsed: 0,
      cancelled: 0,
    });
    expect(events).toContainEqual({
      type: 'document-failed',
      document: join(root, 'b.unknown'),
      errorKind: 'UnknownFormat',
      message: 'Unrecognized extension ".unknown": b.unknown',
    });
  });

  describe('argument validation', () => {
    test.each([0, -1, 1.5])(
      'should reject concurrency %s',
      async (concurrency) => {
        const { coordinator } = createCoordinator(succeed);

        await expect(
          coordinator.run(root, resolveConversionOptions(), { concurrency }),
        ).rejects.toThrow(
          `concurrency must be an integer >= 1, got ${concurrency}`,
        );
      },
    );

    test('should reject a missing directory', async () => {
      const { coordinator } = createCoordinator(succeed);
      const missing = join(root, 'missing');

      await expect(
        coordinator.run(missing, resolveConversionOptions()),
      ).rejects.toThrow(`Input directory not found: ${missing}`);
    });

    test('should reject a file in place of a directory', async () => {
      const [file] = await writeDocuments(['a.txt']);
      const { coordinator, universal } = createCoordinator(succeed);

      await expect(
        coordinator.run(file, resolveConversionOptions()),
      ).rejects.toThrow(ProgrammerError);
      expect(universal.calls).toHaveLength(0);
    });

    test('should reject an invalid deadline', async () => {
      const { coordinator } = createCoordinator(succeed);

      await expect(
        coordinator.run(root, resolveConversionOptions(), { deadlineMs: 0 }),
      ).rejects.toThrow(ProgrammerError);
    });
  });
});
