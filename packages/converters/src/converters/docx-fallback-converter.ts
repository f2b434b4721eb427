import type { LoggerMethods } from '@docmill/logger';
import type { DocumentFormat, Hyperlink } from '@docmill/model';
import type { Cheerio, CheerioAPI } from 'cheerio';
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

const DOCUMENT_PART = 'word/document.xml';
const NUMBERING_PART = 'word/numbering.xml';
const HEADING_STYLE = /^heading\s*([1-6])$/i;
const TITLE_STYLE = /^title$/i;
const UNORDERED_FORMATS = new Set(['bullet', 'none']);

/** Containers whose children are walked as if they were inline */
const TRANSPARENT_INLINE = new Set([
  'w:ins',
  'w:smartTag',
  'w:fldSimple',
  'w:sdt',
  'w:sdtContent',
]);

interface RenderedParagraph {
  text: string;
  list: boolean;
  title: boolean;
}

/**
 * State of one conversion; never shared between invocations.
 */
interface DocxState {
  $: CheerioAPI;
  parts: Map<string, Buffer>;
  relationships: Map<string, Relationship>;

  /** numId → ilvl → numFmt */
  numbering: Map<string, Map<number, string>>;

  /** `${numId}:${ilvl}` → last ordinal emitted */
  counters: Map<string, number>;

  images: ImageCollector;
  hyperlinks: Hyperlink[];
}

/**
 * Structural DOCX converter reading WordprocessingML directly.
 */
export class DocxFallbackConverter extends BaseConverter {
  readonly id = 'docx-fallback';
  readonly variant = 'format-fallback';
  protected readonly formats: ReadonlySet<DocumentFormat> = new Set(['docx']);

  constructor(logger: LoggerMethods) {
    super(logger, 'DocxFallbackConverter');
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
        part === DOCUMENT_PART ||
        part === NUMBERING_PART ||
        part === relationshipsPartFor(DOCUMENT_PART) ||
        part.startsWith('docProps/') ||
        (options.extractImages && part.startsWith('word/media/')),
    );

    const documentXml = parts.get(DOCUMENT_PART)?.toString('utf-8');
    if (!documentXml) {
      throw new UnsupportedFormatError(
        `No ${DOCUMENT_PART} in ${document.name}`,
      );
    }

    const state: DocxState = {
      $: loadXml(documentXml),
      parts,
      relationships: parseRelationships(
        parts.get(relationshipsPartFor(DOCUMENT_PART))?.toString('utf-8'),
      ),
      numbering: parseNumbering(parts.get(NUMBERING_PART)?.toString('utf-8')),
      counters: new Map(),
      images: new ImageCollector(options.imageFormat),
      hyperlinks: [],
    };
    const { $ } = state;

    const blocks: string[] = [];
    let listLines: string[] = [];
    let firstTitle: string | undefined;

    const flushList = () => {
      if (listLines.length > 0) {
        blocks.push(listLines.join('\n'));
        listLines = [];
      }
    };

    const body = $('w\\:body').first().children().toArray();
    this.log('debug', `${document.name}: ${body.length} body elements`);

    for (const element of body) {
      throwIfAborted(signal, 'Conversion was aborted');

      if (element.name === 'w:tbl') {
        flushList();
        const table = this.renderTable(state, element);
        if (table) {
          blocks.push(table);
        }
        continue;
      }
      if (element.name !== 'w:p') {
        continue;
      }

      const paragraph = this.renderParagraph(state, element);
      if (!paragraph) {
        continue;
      }
      if (paragraph.title && firstTitle === undefined) {
        firstTitle = paragraph.text.replace(/^#+ /, '');
      }
      if (paragraph.list) {
        listLines.push(paragraph.text);
      } else {
        flushList();
        blocks.push(paragraph.text);
      }
    }
    flushList();

    const markdown = blocks.length > 0 ? `${blocks.join('\n\n')}\n` : '';
    const core = parseCoreProperties(
      parts.get('docProps/core.xml')?.toString('utf-8'),
    );

    return {
      markdown,
      metadata: {
        ...core,
        title: core.title ?? firstTitle,
        pageCount: readAppCount(
          parts.get('docProps/app.xml')?.toString('utf-8'),
          'Pages',
        ),
        wordCount: countWords(markdown),
      },
      images: state.images.images,
      hyperlinks: state.hyperlinks,
    };
  }

  private renderParagraph(
    state: DocxState,
    paragraph: Element,
  ): RenderedParagraph | undefined {
    const { $ } = state;
    const node = $(paragraph);
    const text = this.renderInline(state, paragraph);
    if (!text) {
      return undefined;
    }

    const properties = node.children('w\\:pPr');
    const styleId = properties.children('w\\:pStyle').attr('w:val') ?? '';

    if (TITLE_STYLE.test(styleId)) {
      return { text: `# ${text}`, list: false, title: true };
    }
    const heading = HEADING_STYLE.exec(styleId);
    if (heading) {
      const level = Math.min(Number(heading[1]) + 1, 6);
      return { text: `${'#'.repeat(level)} ${text}`, list: false, title: false };
    }

    const numbering = properties.children('w\\:numPr');
    const numId = numbering.children('w\\:numId').attr('w:val');
    if (numId && numId !== '0') {
      const level =
        parseInt(numbering.children('w\\:ilvl').attr('w:val') ?? '0', 10) || 0;
      const marker = this.listMarker(state, numId, level);
      return {
        text: `${'  '.repeat(level)}${marker} ${text}`,
        list: true,
        title: false,
      };
    }

    return { text, list: false, title: false };
  }

  private listMarker(state: DocxState, numId: string, level: number): string {
    for (const key of state.counters.keys()) {
      const [id, keyLevel] = key.split(':');
      if (id === numId && Number(keyLevel) > level) {
        state.counters.delete(key);
      }
    }

    const format = state.numbering.get(numId)?.get(level) ?? 'bullet';
    if (UNORDERED_FORMATS.has(format)) {
      return '-';
    }

    const key = `${numId}:${level}`;
    const ordinal = (state.counters.get(key) ?? 0) + 1;
    state.counters.set(key, ordinal);
    return `${ordinal}.`;
  }

  private renderTable(state: DocxState, table: Element): string {
    const { $ } = state;
    const rows = $(table)
      .children('w\\:tr')
      .toArray()
      .map((row) =>
        $(row)
          .children('w\\:tc')
          .toArray()
          .map((cell) =>
            $(cell)
              .children('w\\:p')
              .toArray()
              .map((paragraph) => this.renderInline(state, paragraph))
              .filter((text) => text.length > 0)
              .join(' '),
          ),
      );
    return renderMarkdownTable(rows);
  }

  private renderInline(state: DocxState, paragraph: Element): string {
    const segments: InlineSegment[] = [];
    this.collectSegments(state, state.$(paragraph).children().toArray(), segments);
    return renderSegments(segments);
  }

  private collectSegments(
    state: DocxState,
    elements: Element[],
    segments: InlineSegment[],
  ): void {
    const { $ } = state;

    for (const element of elements) {
      if (element.name === 'w:r') {
        this.collectRun(state, element, segments);
      } else if (element.name === 'w:hyperlink') {
        const inner: InlineSegment[] = [];
        this.collectSegments(state, $(element).children().toArray(), inner);
        const text = renderSegments(inner);
        const relationship = state.relationships.get(
          $(element).attr('r:id') ?? '',
        );

        if (relationship?.external) {
          state.hyperlinks.push({ url: relationship.target, text });
          if (text) {
            segments.push({
              text: `[${text}](${relationship.target})`,
              raw: true,
            });
          }
        } else {
          segments.push(...inner);
        }
      } else if (TRANSPARENT_INLINE.has(element.name)) {
        this.collectSegments(state, $(element).children().toArray(), segments);
      }
    }
  }

  private collectRun(
    state: DocxState,
    run: Element,
    segments: InlineSegment[],
  ): void {
    const { $ } = state;
    const properties = $(run).children('w\\:rPr');
    const bold = isToggleOn(properties.children('w\\:b'));
    const italic = isToggleOn(properties.children('w\\:i'));

    for (const child of $(run).children().toArray()) {
      switch (child.name) {
        case 'w:t':
          segments.push({ text: $(child).text(), bold, italic });
          break;
        case 'w:tab':
        case 'w:br':
        case 'w:cr':
          segments.push({ text: ' ' });
          break;
        case 'w:drawing':
        case 'w:pict': {
          const reference = this.embedImage(state, child);
          if (reference) {
            segments.push({ text: ` ${reference} `, raw: true });
          }
          break;
        }
      }
    }
  }

  /**
   * Resolve an `a:blip` (or legacy VML `v:imagedata`) to a media part and
   * return its markdown reference.
   */
  private embedImage(state: DocxState, drawing: Element): string | undefined {
    const { $ } = state;
    const node = $(drawing);
    const relationshipId =
      node.find('a\\:blip').attr('r:embed') ??
      node.find('v\\:imagedata').attr('r:id');
    if (!relationshipId) {
      return undefined;
    }

    const relationship = state.relationships.get(relationshipId);
    if (!relationship || relationship.external) {
      return undefined;
    }

    const partPath = resolvePartPath(DOCUMENT_PART, relationship.target);
    const data = state.parts.get(partPath);
    if (!data) {
      return undefined;
    }

    const image = state.images.add(
      data,
      mimeTypeForExtension(posix.extname(partPath)) ??
        'application/octet-stream',
    );
    const alt = (node.find('wp\\:docPr').attr('descr') ?? '').replace(
      /[[\]]/g,
      '',
    );
    return `![${alt}](images/${image.filename})`;
  }
}

/**
 * `<w:b/>` is on; `<w:b w:val="0"/>` (or false/off) is off.
 */
function isToggleOn(element: Cheerio<Element>): boolean {
  if (element.length === 0) {
    return false;
  }
  const value = element.attr('w:val');
  return value === undefined || !['0', 'false', 'off'].includes(value);
}

function parseNumbering(
  xml: string | undefined,
): Map<string, Map<number, string>> {
  const numbering = new Map<string, Map<number, string>>();
  if (!xml) {
    return numbering;
  }

  const $ = loadXml(xml);
  const abstractLevels = new Map<string, Map<number, string>>();

  $('w\\:abstractNum').each((_, abstractNum) => {
    const id = $(abstractNum).attr('w:abstractNumId');
    const levels = new Map<number, string>();
    $(abstractNum)
      .children('w\\:lvl')
      .each((__, level) => {
        levels.set(
          parseInt($(level).attr('w:ilvl') ?? '0', 10),
          $(level).children('w\\:numFmt').attr('w:val') ?? 'bullet',
        );
      });
    if (id) {
      abstractLevels.set(id, levels);
    }
  });

  $('w\\:num').each((_, num) => {
    const numId = $(num).attr('w:numId');
    const abstractId = $(num).children('w\\:abstractNumId').attr('w:val');
    const levels = abstractId ? abstractLevels.get(abstractId) : undefined;
    if (numId && levels) {
      numbering.set(numId, levels);
    }
  });

  return numbering;
}
