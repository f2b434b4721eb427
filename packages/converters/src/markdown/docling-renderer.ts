import type { LoggerMethods } from '@docmill/logger';
import type {
  DoclingDocument,
  DoclingGroupItem,
  DoclingPictureItem,
  DoclingProv,
  DoclingReference,
  DoclingTableItem,
  DoclingTextItem,
  ExtractedImage,
  Hyperlink,
  ImageFormat,
} from '@docmill/model';

import { throwIfAborted } from '@docmill/shared';

import type { ResolvedNode } from './ref-resolver';

import { ImageCollector, decodeDataUri } from '../utils/image-collector';
import { renderMarkdownTable } from './markdown-table';
import { RefResolver } from './ref-resolver';

export interface RenderedDocument {
  markdown: string;
  images: ExtractedImage[];
  hyperlinks: Hyperlink[];
  /** Text of the first `title` item, when there is one */
  title?: string;
  pageCount: number;
}

interface RenderContext {
  resolver: RefResolver;
  images: ImageCollector;
  hyperlinks: Hyperlink[];
  captionRefs: Set<string>;
  signal?: AbortSignal;
  lastPage?: number;
  title?: string;
}

const LIST_GROUP_LABELS = new Set(['list', 'ordered_list']);
const FURNITURE_LABELS = new Set(['page_header', 'page_footer']);

/**
 * Renders a DoclingDocument body to markdown in reading order.
 *
 * The cancellation signal is checked every time the walk crosses into a new
 * page, so a long document stops within one page of the abort.
 */
export class DoclingMarkdownRenderer {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly imageFormat: ImageFormat = 'png',
  ) {}

  render(doc: DoclingDocument, signal?: AbortSignal): RenderedDocument {
    const context: RenderContext = {
      resolver: new RefResolver(this.logger, doc),
      images: new ImageCollector(this.imageFormat),
      hyperlinks: [],
      captionRefs: collectCaptionRefs(doc),
      signal,
    };

    throwIfAborted(signal, 'Rendering was aborted');
    const blocks = this.renderChildren(doc.body.children, context);
    const markdown = blocks.join('\n\n');

    return {
      markdown: markdown ? `${markdown}\n` : '',
      images: context.images.images,
      hyperlinks: context.hyperlinks,
      title: context.title,
      pageCount: Object.keys(doc.pages).length,
    };
  }

  private renderChildren(
    refs: DoclingReference[],
    context: RenderContext,
  ): string[] {
    const blocks: string[] = [];
    for (const ref of refs) {
      const node = context.resolver.resolve(ref.$ref);
      if (!node) {
        continue;
      }
      const block = this.renderNode(node, context);
      if (block) {
        blocks.push(block);
      }
    }
    return blocks;
  }

  private renderNode(node: ResolvedNode, context: RenderContext): string {
    switch (node.kind) {
      case 'text':
        if (context.captionRefs.has(node.item.self_ref)) {
          return '';
        }
        this.checkpoint(node.item.prov, context);
        return this.renderText(node.item, context);
      case 'group':
        return this.renderGroup(node.item, context);
      case 'table':
        this.checkpoint(node.item.prov, context);
        return this.renderTable(node.item, context);
      case 'picture':
        this.checkpoint(node.item.prov, context);
        return this.renderPicture(node.item, context);
    }
  }

  private checkpoint(prov: DoclingProv[], context: RenderContext): void {
    const page = prov[0]?.page_no;
    if (page !== undefined && page !== context.lastPage) {
      context.lastPage = page;
      throwIfAborted(context.signal, 'Rendering was aborted');
    }
  }

  private renderText(item: DoclingTextItem, context: RenderContext): string {
    const content = item.text.trim();
    if (!content || FURNITURE_LABELS.has(item.label)) {
      return '';
    }

    switch (item.label) {
      case 'title':
        if (context.title === undefined) {
          context.title = content;
        }
        return `# ${content}`;
      case 'section_header': {
        const depth = Math.min((item.level ?? 1) + 1, 6);
        return `${'#'.repeat(depth)} ${content}`;
      }
      case 'list_item':
        return `- ${this.inline(item, content, context)}`;
      case 'code':
        return `\`\`\`\n${item.text.replace(/\n+$/, '')}\n\`\`\``;
      case 'formula':
        return `$$\n${content}\n$$`;
      case 'caption':
        return `_${content}_`;
      default:
        return this.inline(item, content, context);
    }
  }

  private inline(
    item: DoclingTextItem,
    content: string,
    context: RenderContext,
  ): string {
    if (!item.hyperlink) {
      return content;
    }
    context.hyperlinks.push({ url: item.hyperlink, text: content });
    return `[${content}](${item.hyperlink})`;
  }

  private renderGroup(group: DoclingGroupItem, context: RenderContext): string {
    if (LIST_GROUP_LABELS.has(group.label) || group.name === 'list') {
      return this.renderList(group, 0, context);
    }
    return this.renderChildren(group.children, context).join('\n\n');
  }

  /**
   * Render a list group, indenting nested lists by two spaces per level.
   */
  private renderList(
    group: DoclingGroupItem,
    depth: number,
    context: RenderContext,
  ): string {
    const lines: string[] = [];
    const ordered = group.label === 'ordered_list';
    let position = 0;

    for (const ref of group.children) {
      const node = context.resolver.resolve(ref.$ref);
      if (!node) {
        continue;
      }

      if (node.kind === 'group') {
        const nested = LIST_GROUP_LABELS.has(node.item.label)
          ? this.renderList(node.item, depth + 1, context)
          : this.renderGroup(node.item, context);
        if (nested) {
          lines.push(nested);
        }
        continue;
      }

      if (node.kind === 'text') {
        this.checkpoint(node.item.prov, context);
        const content = node.item.text.trim();
        if (!content) {
          continue;
        }
        position++;
        const marker = ordered || node.item.enumerated ? `${position}.` : '-';
        lines.push(
          `${'  '.repeat(depth)}${marker} ${this.inline(node.item, content, context)}`,
        );
        continue;
      }

      const block = this.renderNode(node, context);
      if (block) {
        lines.push(block);
      }
    }

    return lines.join('\n');
  }

  private renderTable(table: DoclingTableItem, context: RenderContext): string {
    const rows = table.data.grid.map((row) => row.map((cell) => cell.text));
    const markdown = renderMarkdownTable(rows);
    const caption = this.captionText(table.captions, context);

    return [markdown, caption ? `_${caption}_` : '']
      .filter((part) => part.length > 0)
      .join('\n\n');
  }

  private renderPicture(
    picture: DoclingPictureItem,
    context: RenderContext,
  ): string {
    const caption = this.captionText(picture.captions, context);
    const decoded = picture.image ? decodeDataUri(picture.image.uri) : null;

    if (!decoded) {
      return caption ? `_${caption}_` : '';
    }

    const image = context.images.add(
      decoded.data,
      decoded.mimeType,
      picture.prov[0]?.page_no,
    );
    const alt = (caption || image.filename).replace(/[[\]]/g, '');
    const reference = `![${alt}](images/${image.filename})`;
    return caption ? `${reference}\n\n_${caption}_` : reference;
  }

  private captionText(
    refs: DoclingReference[],
    context: RenderContext,
  ): string {
    return refs
      .map((ref) => context.resolver.resolveText(ref.$ref)?.text.trim() ?? '')
      .filter((text) => text.length > 0)
      .join(' ');
  }
}

function collectCaptionRefs(doc: DoclingDocument): Set<string> {
  const refs = new Set<string>();
  for (const item of [...doc.tables, ...doc.pictures]) {
    for (const caption of item.captions) {
      refs.add(caption.$ref);
    }
  }
  return refs;
}
