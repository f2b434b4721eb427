/**
 * Render rows of cell text as a GFM table.
 *
 * The first row becomes the header. Short rows are padded so every row has
 * the same cell count as the widest row. Returns '' when there is nothing
 * to render.
 *
 * @example
 * ```
 * | Chapter | Page |
 * | --- | --- |
 * | Introduction | 1 |
 * ```
 */
export function renderMarkdownTable(rows: readonly string[][]): string {
  const nonEmpty = rows.filter((row) => row.length > 0);
  if (nonEmpty.length === 0) {
    return '';
  }

  const width = Math.max(...nonEmpty.map((row) => row.length));
  const lines: string[] = [];

  nonEmpty.forEach((row, rowIdx) => {
    const cells = Array.from({ length: width }, (_, i) =>
      escapeTableCell(row[i] ?? ''),
    );
    lines.push(`| ${cells.join(' | ')} |`);

    if (rowIdx === 0) {
      const separator = cells.map(() => '---').join(' | ');
      lines.push(`| ${separator} |`);
    }
  });

  return lines.join('\n');
}

/**
 * Escape special characters in table cell content
 */
export function escapeTableCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ').trim();
}
