import { renderMarkdownTable } from '../markdown/markdown-table';

const URL_PATTERN = /https?:\/\/[^\s<>()"'[\]]+/g;
const TRAILING_PUNCTUATION = /[.,;:!?]+$/;

export interface LayoutTextOptions {
  /** Minimum consecutive aligned lines treated as a table (default 2) */
  minTableRows?: number;

  /** Minimum run of spaces separating two columns (default 2) */
  columnGap?: number;
}

/**
 * Convert `pdftotext -layout` output of one page to markdown blocks.
 *
 * Consecutive lines that split into the same number (two or more) of
 * columns become a table; every other run of non-blank lines becomes one
 * paragraph with its whitespace collapsed.
 */
export function layoutTextToMarkdown(
  pageText: string,
  options: LayoutTextOptions = {},
): string[] {
  const minTableRows = options.minTableRows ?? 2;
  const columnSplit = new RegExp(`\\s{${options.columnGap ?? 2},}`);
  const blocks: string[] = [];
  let paragraph: string[] = [];
  let tableRows: string[][] = [];

  const flushParagraph = () => {
    if (paragraph.length > 0) {
      blocks.push(paragraph.join(' '));
      paragraph = [];
    }
  };

  const flushTable = () => {
    if (tableRows.length >= minTableRows) {
      flushParagraph();
      blocks.push(renderMarkdownTable(tableRows));
    } else {
      for (const row of tableRows) {
        paragraph.push(row.join(' '));
      }
    }
    tableRows = [];
  };

  for (const rawLine of pageText.split('\n')) {
    const line = rawLine.trim();
    if (!line) {
      flushTable();
      flushParagraph();
      continue;
    }

    const columns = line.split(columnSplit);
    if (columns.length >= 2) {
      const width = tableRows[0]?.length;
      if (width !== undefined && width !== columns.length) {
        flushTable();
      }
      tableRows.push(columns);
      continue;
    }

    flushTable();
    paragraph.push(line.replace(/\s+/g, ' '));
  }

  flushTable();
  flushParagraph();
  return blocks;
}

/**
 * Bare http(s) URLs in the text, in order of appearance, without
 * duplicates.
 */
export function findUrls(text: string): string[] {
  const urls: string[] = [];
  for (const match of text.matchAll(URL_PATTERN)) {
    const url = match[0].replace(TRAILING_PUNCTUATION, '');
    if (!urls.includes(url)) {
      urls.push(url);
    }
  }
  return urls;
}
