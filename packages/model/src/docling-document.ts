/**
 * JSON export of a document converted by docling-serve.
 *
 * Only the parts the markdown renderer reads are modelled precisely; label
 * unions stay open (`| string`) because the engine adds labels over time.
 */

/** JSON pointer into the document, e.g. `#/texts/4` */
export interface DoclingReference {
  $ref: string;
}

interface DoclingSize {
  width: number;
  height: number;
}

export interface DoclingBBox {
  l: number;
  t: number;
  r: number;
  b: number;
  coord_origin: 'BOTTOMLEFT' | 'TOPLEFT' | string;
}

/** Where an item sits in the source */
export interface DoclingProv {
  /** 1-based */
  page_no: number;
  bbox: DoclingBBox;
  charspan: [number, number];
}

export interface DoclingOrigin {
  mimetype: string;
  binary_hash: number;
  filename: string;
}

export interface DoclingBaseNode {
  self_ref: string;
  /** Absent on the body and furniture roots */
  parent?: DoclingReference;
  children: DoclingReference[];
  content_layer: string;
  label?: string;
}

/** Items that carry caption, reference and footnote pointers */
interface DoclingFloatingItem extends DoclingBaseNode {
  prov: DoclingProv[];
  captions: DoclingReference[];
  references: DoclingReference[];
  footnotes: DoclingReference[];
}

type DoclingTextLabel =
  | 'title'
  | 'text'
  | 'paragraph'
  | 'section_header'
  | 'list_item'
  | 'footnote'
  | 'caption'
  | 'code'
  | 'formula'
  | 'page_header'
  | 'page_footer';

export interface DoclingTextItem extends DoclingBaseNode {
  label: DoclingTextLabel | string;
  prov: DoclingProv[];
  /** Text before the engine's normalization */
  orig: string;
  text: string;
  /** Heading depth of a section_header */
  level?: number;
  /** list_item only: true inside an ordered list */
  enumerated?: boolean;
  marker?: string;
  hyperlink?: string;
}

export interface DoclingGroupItem extends DoclingBaseNode {
  name: 'list' | 'group' | string;
  label: 'list' | 'ordered_list' | 'key_value_area' | string;
}

/** Image payload; `uri` is a data URI when images are embedded */
export interface DoclingImageRef {
  mimetype: string;
  dpi: number;
  size: DoclingSize;
  uri: string;
}

export interface DoclingPictureItem extends DoclingFloatingItem {
  label: 'picture' | string;
  image?: DoclingImageRef;
}

/**
 * One cell of a table grid. Spanning cells appear once per covered grid
 * position.
 */
export interface DoclingTableCell {
  bbox?: DoclingBBox;
  row_span: number;
  col_span: number;
  start_row_offset_idx: number;
  end_row_offset_idx: number;
  start_col_offset_idx: number;
  end_col_offset_idx: number;
  text: string;
  column_header: boolean;
  row_header: boolean;
  row_section: boolean;
}

export interface DoclingTableData {
  table_cells: DoclingTableCell[];
  num_rows: number;
  num_cols: number;
  /** Row-major; `grid[row][col]` */
  grid: DoclingTableCell[][];
}

export interface DoclingTableItem extends DoclingFloatingItem {
  label: 'table' | 'document_index' | string;
  data: DoclingTableData;
}

/** Root of the reading-order tree (`body`) or of headers and footers */
export interface DoclingBody extends DoclingBaseNode {
  name: '_root_' | string;
  label: 'unspecified' | string;
}

export interface DoclingPage {
  size: DoclingSize;
  image?: DoclingImageRef;
  page_no: number;
}

export interface DoclingDocument {
  schema_name: 'DoclingDocument' | string;
  version: string;
  name: string;
  origin?: DoclingOrigin;
  furniture?: DoclingBody;
  body: DoclingBody;
  groups: DoclingGroupItem[];
  texts: DoclingTextItem[];
  pictures: DoclingPictureItem[];
  tables: DoclingTableItem[];
  /** Keyed by page number as a string */
  pages: Record<string, DoclingPage>;
}
