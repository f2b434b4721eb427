import type { LoggerMethods } from '@docmill/logger';
import type { DocumentFormat, Hyperlink } from '@docmill/model';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

import { throwIfAborted } from '@docmill/shared';
import { posix } from 'node:path';

import type { InlineSegment } from '../ooxml/inline-text';
import type { Relationship } from '../ooxml/ooxml-package';
import type { ConversionContext, ConversionDraft } from './base-converter';

import { UnsupportedFormatError } from '../errors';
import { renderMarkdownTable } from '../markdown/markdown-table';
import { countWords } from '../markdown/text-stats';
import { renderSegments } from '../ooxml/inline-text';
import {
  loadXml,
  parseCoreProperties,
  parseRelationships,
  readAppCount,
  readPackage,
  relationshipsPartFor,
  resolvePartPath,
} from '../ooxml/ooxml-package';
import { ImageCollector, mimeTypeForExtension } from '../utils/image-collector';
import { BaseConverter } from './base-converter';

const SLIDE_PART = /^ppt\/slides\/slide(\d+)\.xml$/;
const SLIDE_RELS_PART = /^ppt\/slides\/_rels\/slide\d+\.xml\.rels$/;
const TITLE_PLACEHOLDERS = new Set(['title', 'ctrTitle']);

interface SlideContext {
  $: CheerioAPI;
  slidePath: string;
  slideNumber: number;
  parts: Map<string, Buffer>;
  relationships: Map<string, Relationship>;
  images: ImageCollector;
  hyperlinks: Hyperlink[];
}

interface RenderedSlide {
  title?: string;
  markdown: string;
}

/**
 * Structural PPTX converter: one `## Slide N` section per slide.
 */
export class PptxFallbackConverter extends BaseConverter {
  readonly id = 'pptx-fallback';
  readonly variant = 'format-fallback';
  protected readonly formats: ReadonlySet<DocumentFormat> = new Set(['pptx']);

  constructor(logger: LoggerMethods) {
    super(logger, 'PptxFallbackConverter');
  }

  protected async run({
    document,
    options,
    signal,
  }: ConversionContext): Promise<ConversionDraft> {
    const parts = await readPackage(
      document.path,
      document.name,
      (part) =>
        SLIDE_PART.test(part) ||
        SLIDE_RELS_PART.test(part) ||
        part.startsWith('docProps/') ||
        (options.extractImages && part.startsWith('ppt/media/')),
    );

    const slidePaths = [...parts.keys()]
      .filter((part) => SLIDE_PART.test(part))
      .sort((a, b) => slideNumberOf(a) - slideNumberOf(b));
    if (slidePaths.length === 0) {
      throw new UnsupportedFormatError(`No slides in ${document.name}`);
    }
    this.log('debug', `${document.name}: ${slidePaths.length} slides`);

    const images = new ImageCollector(options.imageFormat);
    const hyperlinks: Hyperlink[] = [];
    const sections: string[] = [];
    let firstTitle: string | undefined;

    for (const [index, slidePath] of slidePaths.entries()) {
      throwIfAborted(signal, 'Conversion was aborted');

      const slide = this.renderSlide({
        $: loadXml(parts.get(slidePath)?.toString('utf-8') ?? ''),
        slidePath,
        slideNumber: index + 1,
        parts,
        relationships: parseRelationships(
          parts.get(relationshipsPartFor(slidePath))?.toString('utf-8'),
        ),
        images,
        hyperlinks,
      });
      firstTitle ??= slide.title;
      sections.push(slide.markdown);
    }

    const markdown = `${sections.join('\n\n')}\n`;
    const core = parseCoreProperties(
      parts.get('docProps/core.xml')?.toString('utf-8'),
    );

    return {
      markdown,
      metadata: {
        ...core,
        title: core.title ?? firstTitle,
        pageCount:
          readAppCount(
            parts.get('docProps/app.xml')?.toString('utf-8'),
            'Slides',
          ) ?? slidePaths.length,
        wordCount: countWords(markdown),
      },
      images: images.images,
      hyperlinks,
    };
  }

  private renderSlide(context: SlideContext): RenderedSlide {
    const { $ } = context;
    const blocks: string[] = [];
    let bullets: string[] = [];
    let title: string | undefined;

    const flushBullets = () => {
      if (bullets.length > 0) {
        blocks.push(bullets.join('\n'));
        bullets = [];
      }
    };

    const shapes = $('p\\:spTree')
      .first()
      .find('*')
      .toArray()
      .filter((node) =>
        ['p:sp', 'p:graphicFrame', 'p:pic'].includes(node.name),
      );

    for (const shape of shapes) {
      if (shape.name === 'p:sp') {
        const placeholder = $(shape)
          .find('p\\:nvSpPr p\\:nvPr p\\:ph')
          .attr('type');
        const paragraphs = $(shape)
          .children('p\\:txBody')
          .children('a\\:p')
          .toArray();

        if (placeholder && TITLE_PLACEHOLDERS.has(placeholder) && !title) {
          title = paragraphs
            .map((paragraph) => this.renderParagraph(context, paragraph))
            .filter((text) => text.length > 0)
            .join(' ');
          continue;
        }

        for (const paragraph of paragraphs) {
          const text = this.renderParagraph(context, paragraph);
          if (text) {
            const level =
              parseInt(
                $(paragraph).children('a\\:pPr').attr('lvl') ?? '0',
                10,
              ) || 0;
            bullets.push(`${'  '.repeat(level)}- ${text}`);
          }
        }
      } else if (shape.name === 'p:graphicFrame') {
        const table = $(shape).find('a\\:tbl').first();
        if (table.length > 0) {
          flushBullets();
          const markdown = this.renderTable(context, table.toArray()[0]);
          if (markdown) {
            blocks.push(markdown);
          }
        }
      } else {
        const reference = this.embedPicture(context, shape);
        if (reference) {
          flushBullets();
          blocks.push(reference);
        }
      }
    }
    flushBullets();

    const heading = title
      ? `## Slide ${context.slideNumber}: ${title}`
      : `## Slide ${context.slideNumber}`;
    return {
      title: title || undefined,
      markdown: [heading, ...blocks].join('\n\n'),
    };
  }

  private renderParagraph(context: SlideContext, paragraph: Element): string {
    const { $ } = context;
    const segments: InlineSegment[] = [];

    for (const child of $(paragraph).children().toArray()) {
      if (child.name === 'a:br') {
        segments.push({ text: ' ' });
        continue;
      }
      if (child.name !== 'a:r' && child.name !== 'a:fld') {
        continue;
      }

      const properties = $(child).children('a\\:rPr');
      const text = $(child).children('a\\:t').text();
      const relationship = context.relationships.get(
        properties.children('a\\:hlinkClick').attr('r:id') ?? '',
      );

      if (relationship?.external) {
        context.hyperlinks.push({ url: relationship.target, text: text.trim() });
        segments.push({
          text: text.trim()
            ? `[${text.trim()}](${relationship.target})`
            : relationship.target,
          raw: true,
        });
      } else {
        segments.push({
          text,
          bold: properties.attr('b') === '1',
          italic: properties.attr('i') === '1',
        });
      }
    }

    return renderSegments(segments);
  }

  private renderTable(context: SlideContext, table: Element): string {
    const { $ } = context;
    const rows = $(table)
      .children('a\\:tr')
      .toArray()
      .map((row) =>
        $(row)
          .children('a\\:tc')
          .toArray()
          .map((cell) =>
            $(cell)
              .find('a\\:p')
              .toArray()
              .map((paragraph) => this.renderParagraph(context, paragraph))
              .filter((text) => text.length > 0)
              .join(' '),
          ),
      );
    return renderMarkdownTable(rows);
  }

  private embedPicture(
    context: SlideContext,
    picture: Element,
  ): string | undefined {
    const { $ } = context;
    const relationshipId = $(picture).find('a\\:blip').attr('r:embed');
    const relationship = relationshipId
      ? context.relationships.get(relationshipId)
      : undefined;
    if (!relationship || relationship.external) {
      return undefined;
    }

    const partPath = resolvePartPath(context.slidePath, relationship.target);
    const data = context.parts.get(partPath);
    if (!data) {
      return undefined;
    }

    const image = context.images.add(
      data,
      mimeTypeForExtension(posix.extname(partPath)) ??
        'application/octet-stream',
      context.slideNumber,
    );
    const alt = ($(picture).find('p\\:cNvPr').attr('descr') ?? '').replace(
      /[[\]]/g,
      '',
    );
    return `![${alt}](images/${image.filename})`;
  }
}

function slideNumberOf(part: string): number {
  return Number(SLIDE_PART.exec(part)?.[1] ?? 0);
}
