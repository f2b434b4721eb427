import type { LoggerMethods } from '@docmill/logger';
import type { SourceDocument } from '@docmill/model';

import { mkdtempSync, rmSync, statSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { resolveConversionOptions } from '../options/conversion-options';
import {
  appProperties,
  presentationSlide,
  relationships,
} from '../testing/ooxml-fixture';
import { writeZipFixture } from '../testing/zip-fixture';
import { PptxFallbackConverter } from './pptx-fallback-converter';

function titleShape(text: string, type = 'title'): string {
  return `<p:sp><p:nvSpPr><p:cNvPr id="1" name="Title"/><p:cNvSpPr/><p:nvPr><p:ph type="${type}"/></p:nvPr></p:nvSpPr><p:txBody><a:bodyPr/><a:p><a:r><a:t>${text}</a:t></a:r></a:p></p:txBody></p:sp>`;
}

function tableCell(text: string): string {
  return `<a:tc><a:txBody><a:bodyPr/><a:p><a:r><a:t>${text}</a:t></a:r></a:p></a:txBody></a:tc>`;
}

const SLIDE_ONE = presentationSlide(
  [
    titleShape('Quarterly Review', 'ctrTitle'),
    '<p:sp><p:nvSpPr><p:cNvPr id="2" name="Body"/><p:cNvSpPr/><p:nvPr><p:ph idx="1"/></p:nvPr></p:nvSpPr><p:txBody><a:bodyPr/>',
    '<a:p><a:r><a:rPr b="1"/><a:t>Revenue</a:t></a:r><a:r><a:t xml:space="preserve"> up</a:t></a:r></a:p>',
    '<a:p><a:pPr lvl="1"/><a:r><a:t>Costs flat</a:t></a:r></a:p>',
    '<a:p><a:r><a:t xml:space="preserve">See </a:t></a:r><a:r><a:rPr><a:hlinkClick r:id="rId2"/></a:rPr><a:t>report</a:t></a:r></a:p>',
    '<a:p/>',
    '</p:txBody></p:sp>',
  ].join(''),
);

const SLIDE_TWO = presentationSlide(
  [
    '<p:graphicFrame><p:nvGraphicFramePr><p:cNvPr id="3" name="Table"/></p:nvGraphicFramePr><a:graphic><a:graphicData><a:tbl>',
    `<a:tr>${tableCell('Region')}${tableCell('Sales')}</a:tr>`,
    `<a:tr>${tableCell('North')}${tableCell('40')}</a:tr>`,
    '</a:tbl></a:graphicData></a:graphic></p:graphicFrame>',
    '<p:pic><p:nvPicPr><p:cNvPr id="4" name="Picture" descr="Chart"/><p:cNvPicPr/><p:nvPr/></p:nvPicPr><p:blipFill><a:blip r:embed="rId3"/></p:blipFill></p:pic>',
  ].join(''),
);

describe('PptxFallbackConverter', () => {
  let workDir: string;
  let logger: LoggerMethods;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'pptx-fallback-'));
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  async function createPptx(
    entries: Record<string, string | Buffer>,
  ): Promise<SourceDocument> {
    const path = join(workDir, 'deck.pptx');
    await writeZipFixture(path, entries);
    return {
      path,
      name: 'deck.pptx',
      extension: 'pptx',
      format: 'pptx',
      sizeBytes: statSync(path).size,
    };
  }

  test('should convert slides in numeric order', async () => {
    const document = await createPptx({
      'ppt/presentation.xml': '<p:presentation/>',
      'ppt/slides/slide10.xml': presentationSlide(titleShape('Appendix')),
      'ppt/slides/slide2.xml': SLIDE_TWO,
      'ppt/slides/slide1.xml': SLIDE_ONE,
      'ppt/slides/_rels/slide1.xml.rels': relationships([
        { id: 'rId2', target: 'https://example.com/q3', external: true },
      ]),
      'ppt/slides/_rels/slide2.xml.rels': relationships([
        { id: 'rId3', target: '../media/image1.png' },
      ]),
      'ppt/media/image1.png': Buffer.from('PNG'),
    });
    const converter = new PptxFallbackConverter(logger);

    const result = await converter.convert(
      document,
      join(workDir, 'out'),
      resolveConversionOptions(),
    );

    expect(result.success).toBe(true);
    expect(result.markdown).toBe(
      [
        '## Slide 1: Quarterly Review',
        '',
        '- **Revenue** up',
        '  - Costs flat',
        '- See [report](https://example.com/q3)',
        '',
        '## Slide 2',
        '',
        '| Region | Sales |',
        '| --- | --- |',
        '| North | 40 |',
        '',
        '![Chart](images/image-001.png)',
        '',
        '## Slide 3: Appendix',
        '',
      ].join('\n'),
    );
    expect(result.metadata).toEqual({
      title: 'Quarterly Review',
      pageCount: 3,
      wordCount: 20,
    });
    expect(result.hyperlinks).toEqual([
      { url: 'https://example.com/q3', text: 'report' },
    ]);
    expect(result.images).toHaveLength(1);
    expect(result.images[0]).toMatchObject({
      filename: 'image-001.png',
      mimeType: 'image/png',
      pageIndex: 2,
      sizeBytes: 3,
    });
  });

  test('should prefer the slide count from app properties', async () => {
    const document = await createPptx({
      'ppt/slides/slide1.xml': presentationSlide(titleShape('Only')),
      'docProps/app.xml': appProperties({ Slides: 4 }),
    });
    const converter = new PptxFallbackConverter(logger);

    const result = await converter.convert(
      document,
      join(workDir, 'out'),
      resolveConversionOptions(),
    );

    expect(result.markdown).toBe('## Slide 1: Only\n');
    expect(result.metadata.pageCount).toBe(4);
  });

  test('should fail with UnsupportedFormat when there are no slides', async () => {
    const document = await createPptx({
      'ppt/presentation.xml': '<p:presentation/>',
    });
    const converter = new PptxFallbackConverter(logger);

    const result = await converter.convert(
      document,
      join(workDir, 'out'),
      resolveConversionOptions(),
    );

    expect(result).toMatchObject({
      success: false,
      error: { kind: 'UnsupportedFormat', message: 'No slides in deck.pptx' },
    });
  });

  test('should stop between slides when cancelled', async () => {
    const document = await createPptx({
      'ppt/slides/slide1.xml': presentationSlide(titleShape('One')),
    });
    const controller = new AbortController();
    controller.abort();
    const converter = new PptxFallbackConverter(logger);

    const result = await converter.convert(
      document,
      join(workDir, 'out'),
      resolveConversionOptions(),
      controller.signal,
    );

    expect(result).toMatchObject({
      success: false,
      error: { kind: 'Cancelled' },
    });
  });
});
