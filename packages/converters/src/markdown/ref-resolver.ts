import type { LoggerMethods } from '@docmill/logger';
import type {
  DoclingDocument,
  DoclingGroupItem,
  DoclingPictureItem,
  DoclingTableItem,
  DoclingTextItem,
} from '@docmill/model';

/** Node behind a `$ref`, tagged with the collection it lives in */
export type ResolvedNode =
  | { kind: 'text'; item: DoclingTextItem }
  | { kind: 'group'; item: DoclingGroupItem }
  | { kind: 'table'; item: DoclingTableItem }
  | { kind: 'picture'; item: DoclingPictureItem };

const COLLECTIONS = ['texts', 'groups', 'tables', 'pictures'] as const;
type Collection = (typeof COLLECTIONS)[number];

const REFERENCE = /^#\/(\w+)\/\d+$/;

function isCollection(name: string): name is Collection {
  return COLLECTIONS.some((collection) => collection === name);
}

/**
 * Lookup table for the JSON pointers (`#/texts/0`) a docling document uses
 * to link its reading-order tree. Dangling or malformed pointers resolve
 * to null with a warning, so rendering can skip them.
 */
export class RefResolver {
  private readonly nodes = new Map<string, ResolvedNode>();

  constructor(
    private readonly logger: LoggerMethods,
    doc: DoclingDocument,
  ) {
    for (const item of doc.texts) {
      this.nodes.set(item.self_ref, { kind: 'text', item });
    }
    for (const item of doc.groups) {
      this.nodes.set(item.self_ref, { kind: 'group', item });
    }
    for (const item of doc.tables) {
      this.nodes.set(item.self_ref, { kind: 'table', item });
    }
    for (const item of doc.pictures) {
      this.nodes.set(item.self_ref, { kind: 'picture', item });
    }

    this.logger.debug(
      `[RefResolver] Indexed ${doc.texts.length} texts, ${doc.pictures.length} pictures, ${doc.tables.length} tables, ${doc.groups.length} groups`,
    );
  }

  resolve(ref: string): ResolvedNode | null {
    const collection = REFERENCE.exec(ref)?.[1];
    if (collection === undefined) {
      this.logger.warn(`[RefResolver] Invalid reference format: ${ref}`);
      return null;
    }
    if (!isCollection(collection)) {
      this.logger.warn(`[RefResolver] Unknown collection type: ${collection}`);
      return null;
    }

    const node = this.nodes.get(ref);
    if (!node) {
      this.logger.warn(`[RefResolver] Reference not found: ${ref}`);
      return null;
    }
    return node;
  }

  /** Text of a caption or footnote pointer; null for anything else */
  resolveText(ref: string): DoclingTextItem | null {
    const node = this.nodes.get(ref);
    return node?.kind === 'text' ? node.item : null;
  }
}
