import type { LoggerMethods } from '@docmill/logger';
import type {
  ConversionMetadata,
  DocumentFormat,
  Hyperlink,
} from '@docmill/model';
import type { CheerioAPI } from 'cheerio';

import { throwIfAborted } from '@docmill/shared';
import { gfm } from '@truto/turndown-plugin-gfm';
import { load } from 'cheerio';
import { readFile } from 'node:fs/promises';
import TurndownService from 'turndown';

import type { ConversionContext, ConversionDraft } from './base-converter';

import { countWords } from '../markdown/text-stats';
import { decodeDataUri, ImageCollector } from '../utils/image-collector';
import { BaseConverter } from './base-converter';

const STRIPPED_ELEMENTS = ['script', 'style', 'noscript', 'template', 'iframe'];
const LINK_PROTOCOL = /^(https?:|mailto:)/i;

/**
 * Turndown configured for ATX headings, fenced code and `-` bullets, with
 * GFM tables and strikethrough.
 */
export function createTurndownService(): TurndownService {
  const service = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    fence: '```',
    bulletListMarker: '-',
    emDelimiter: '_',
    strongDelimiter: '**',
  });
  service.use(gfm);
  return service;
}

/**
 * HTML converter: cheerio for metadata, links and embedded images, turndown
 * for the body, one top-level block at a time.
 */
export class HtmlFallbackConverter extends BaseConverter {
  readonly id = 'html-fallback';
  readonly variant = 'format-fallback';
  protected readonly formats: ReadonlySet<DocumentFormat> = new Set(['html']);

  constructor(logger: LoggerMethods) {
    super(logger, 'HtmlFallbackConverter');
  }

  protected async run({
    document,
    options,
    signal,
  }: ConversionContext): Promise<ConversionDraft> {
    const html = await readFile(document.path, 'utf-8');
    const $ = load(html);

    const metadata = readMetadata($);
    $(STRIPPED_ELEMENTS.join(', ')).remove();

    const hyperlinks = collectHyperlinks($);
    const images = new ImageCollector(options.imageFormat);

    $('img[src]').each((_, element) => {
      const decoded = decodeDataUri($(element).attr('src') ?? '');
      if (decoded) {
        const image = images.add(decoded.data, decoded.mimeType);
        $(element).attr('src', `images/${image.filename}`);
      }
    });

    const body = $('body');
    const nodes = (
      body.length > 0 ? body.contents() : $.root().contents()
    ).toArray();
    const turndown = createTurndownService();
    const blocks: string[] = [];

    for (const node of nodes) {
      throwIfAborted(signal, 'Conversion was aborted');

      const markdown = turndown.turndown($.html(node)).trim();
      if (markdown) {
        blocks.push(markdown);
      }
    }

    const markdown = blocks.length > 0 ? `${blocks.join('\n\n')}\n` : '';

    return {
      markdown,
      metadata: { ...metadata, wordCount: countWords(markdown) },
      images: images.images,
      hyperlinks,
    };
  }
}

function readMetadata($: CheerioAPI): ConversionMetadata {
  const meta = (selector: string): string | undefined =>
    $(selector).first().attr('content')?.trim() || undefined;

  const keywords = meta('meta[name="keywords"]')
    ?.split(',')
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword.length > 0);

  return {
    title:
      $('title').first().text().trim() ||
      $('h1').first().text().trim() ||
      undefined,
    author: meta('meta[name="author"]'),
    subject: meta('meta[name="description"]'),
    keywords: keywords && keywords.length > 0 ? keywords : undefined,
    creationDate:
      meta('meta[name="dcterms.created"]') ??
      meta('meta[property="article:published_time"]'),
    modificationDate:
      meta('meta[name="dcterms.modified"]') ??
      meta('meta[property="article:modified_time"]'),
  };
}

function collectHyperlinks($: CheerioAPI): Hyperlink[] {
  const hyperlinks: Hyperlink[] = [];
  $('a[href]').each((_, element) => {
    const url = $(element).attr('href')?.trim() ?? '';
    if (LINK_PROTOCOL.test(url)) {
      hyperlinks.push({
        url,
        text: $(element).text().replace(/\s+/g, ' ').trim(),
      });
    }
  });
  return hyperlinks;
}
