import type { InferenceEngine } from '@docmill/converters';
import type { LoggerMethods } from '@docmill/logger';
import type { DoclingDocument, DoclingTextItem } from '@docmill/model';

import {
  ConverterTable,
  DoclingConverter,
  ProgrammerError,
  UniversalConverter,
  ZipReader,
} from '@docmill/converters';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { loadSettings } from '../config/settings';
import { failedResult, successfulResult } from '../testing/results';
import { StubConverter } from '../testing/stub-converter';
import { DocumentConverterService } from './document-converter-service';

function textItem(index: number, label: string, text: string): DoclingTextItem {
  return {
    self_ref: `#/texts/${index}`,
    parent: { $ref: '#/body' },
    children: [],
    content_layer: 'body',
    label,
    prov: [
      {
        page_no: 1,
        bbox: { l: 0, t: 0, r: 1, b: 1, coord_origin: 'TOPLEFT' },
        charspan: [0, text.length],
      },
    ],
    orig: text,
    text,
  };
}

/** Engine that answers every document with the same structure */
function deterministicEngine(): InferenceEngine {
  const texts = [
    textItem(0, 'title', 'Field Notes'),
    textItem(
      1,
      'text',
      'The survey covered three sites and recorded forty distinct features.',
    ),
  ];
  const doc: DoclingDocument = {
    schema_name: 'DoclingDocument',
    version: '1.3.0',
    name: 'notes',
    groups: [],
    texts,
    pictures: [],
    tables: [],
    pages: {},
    body: {
      self_ref: '#/body',
      children: texts.map((item) => ({ $ref: item.self_ref })),
      content_layer: 'body',
      name: '_root_',
      label: 'unspecified',
    },
  };
  return {
    name: 'deterministic',
    supports: () => true,
    infer: async () => structuredClone(doc),
  };
}

describe('DocumentConverterService', () => {
  let root: string;
  let input: string;
  let output: string;
  let logger: LoggerMethods;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'docmill-service-'));
    input = join(root, 'inbox');
    output = join(root, 'out');
    await mkdir(input);
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function stubTable(): ConverterTable {
    return new ConverterTable()
      .register(
        new StubConverter('docling-ai', 'ai-primary', () =>
          failedResult('EngineUnavailable', 'connection refused'),
        ),
      )
      .register(
        new StubConverter('universal-fallback', 'universal-fallback', () =>
          successfulResult({
            markdown: '# Notes\n\nConverted text.\n',
            converterUsed: 'universal-fallback',
          }),
        ),
      );
  }

  describe('convertDocument', () => {
    test('should convert and write a single document', async () => {
      const source = join(input, 'notes.txt');
      await writeFile(source, 'plain notes');
      const service = new DocumentConverterService(logger, stubTable());

      const { outcome, output: written } = await service.convertDocument(
        source,
        output,
      );

      expect(outcome.result.converterUsed).toBe('universal-fallback');
      expect(outcome.fallbackUsed).toBe(true);
      expect(written.files).toEqual(['notes.md', 'manifest.json']);
      expect(await readFile(join(output, 'notes.md'), 'utf-8')).toBe(
        '# Notes\n\nConverted text.\n',
      );
    });

    test('should write byte-identical output when run twice', async () => {
      const source = join(input, 'notes.md');
      await writeFile(source, '# Field Notes\n');
      const table = new ConverterTable()
        .register(new DoclingConverter(logger, deterministicEngine()))
        .register(new UniversalConverter(logger));
      const service = new DocumentConverterService(logger, table);

      const first = await service.convertDocument(source, join(output, 'a'));
      const second = await service.convertDocument(source, join(output, 'b'));

      expect(first.outcome.result.converterUsed).toBe('docling-ai');
      expect(second.output.files).toEqual(first.output.files);
      for (const file of first.output.files) {
        expect(await readFile(join(output, 'b', file))).toEqual(
          await readFile(join(output, 'a', file)),
        );
      }
      expect(first.outcome.result.markdown).toBe(
        second.outcome.result.markdown,
      );
    });

    test('should report an unknown format without throwing', async () => {
      const source = join(input, 'archive.rar');
      await writeFile(source, 'binary');
      const service = new DocumentConverterService(logger, stubTable());

      const { outcome, output: written } = await service.convertDocument(
        source,
        output,
      );

      expect(outcome).toMatchObject({
        state: 'exhausted',
        attempts: [],
        result: {
          success: false,
          error: {
            kind: 'UnknownFormat',
            message: 'Unrecognized extension ".rar": archive.rar',
          },
        },
      });
      expect(written.files).toEqual(['manifest.json']);
    });

    test('should throw ProgrammerError for a missing file', async () => {
      const service = new DocumentConverterService(logger, stubTable());

      await expect(
        service.convertDocument(join(input, 'missing.pdf'), output),
      ).rejects.toThrow(ProgrammerError);
    });

    test('should reject invalid options', async () => {
      const service = new DocumentConverterService(logger, stubTable());

      await expect(
        service.convertDocument(join(input, 'notes.txt'), output, {
          qualityThreshold: 2,
        }),
      ).rejects.toThrow(ProgrammerError);
    });
  });

  describe('convertDirectory', () => {
    beforeEach(async () => {
      await writeFile(join(input, 'a.txt'), 'first');
      await writeFile(join(input, 'b.md'), '# second');
      await writeFile(join(input, 'c.bin'), 'unknown');
    });

    test('should write a directory tree by default', async () => {
      const service = new DocumentConverterService(logger, stubTable(), {
        concurrency: 2,
      });

      const { summary, output: written } = await service.convertDirectory(
        input,
        output,
      );

      expect(summary).toMatchObject({
        status: 'partially-failed',
        total: 3,
        succeeded: 2,
        failed: 1,
        fallbackUsed: 2,
      });
      expect(written.destination).toBe(output);
      expect((await readdir(output)).sort()).toEqual([
        'a.md',
        'b.md',
        'manifest.json',
      ]);
    });

    test('should write an archive in archive mode', async () => {
      const service = new DocumentConverterService(logger, stubTable(), {
        outputMode: 'archive',
      });

      const { output: written } = await service.convertDirectory(
        input,
        output,
        {},
        { concurrency: 1 },
      );

      expect(written.destination).toBe(join(output, 'inbox.zip'));
      expect(await ZipReader.listEntries(written.destination)).toEqual([
        'a.md',
        'b.md',
        'manifest.json',
      ]);
    });
  });

  describe('engine lifecycle', () => {
    test('should wait for the engine on init and release it on dispose', async () => {
      const engine = {
        waitForReady: vi.fn().mockResolvedValue(undefined),
        dispose: vi.fn(),
      };
      const service = new DocumentConverterService(logger, stubTable(), {
        engine,
      });

      await service.init();
      service.dispose();

      expect(engine.waitForReady).toHaveBeenCalledTimes(1);
      expect(engine.dispose).toHaveBeenCalledTimes(1);
    });

    test('should propagate engine health failures from init', async () => {
      const service = new DocumentConverterService(logger, stubTable(), {
        engine: {
          waitForReady: () => Promise.reject(new Error('engine down')),
          dispose: vi.fn(),
        },
      });

      await expect(service.init()).rejects.toThrow('engine down');
    });
  });

  describe('create', () => {
    test('should use the fallback converters without a docling URL', async () => {
      const source = join(input, 'readme.md');
      await writeFile(
        source,
        '# Readme\n\nThis markdown file goes straight through the universal converter.\n',
      );
      const service = DocumentConverterService.create(loadSettings({}), logger);

      await service.init();
      const { outcome } = await service.convertDocument(source, output);
      service.dispose();

      expect(outcome.state).toBe('accepted');
      expect(outcome.result.converterUsed).toBe('universal-fallback');
      expect(outcome.fallbackUsed).toBe(false);
      expect(logger.info).toHaveBeenCalledWith(
        '[DocumentConverterService] No docling URL configured, using fallback converters only',
      );
    });
  });
});
