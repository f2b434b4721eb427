/**
 * A run of text with its character formatting. `raw` segments are already
 * markdown (links, image references) and are emitted untouched.
 */
export interface InlineSegment {
  text: string;
  bold?: boolean;
  italic?: boolean;
  raw?: boolean;
}

/**
 * Render runs as inline markdown, merging neighbours that share formatting
 * so `**a****b**` comes out as `**ab**`. Whitespace is collapsed.
 */
export function renderSegments(segments: readonly InlineSegment[]): string {
  const merged: InlineSegment[] = [];

  for (const segment of segments) {
    const last = merged.at(-1);
    if (
      last &&
      !last.raw &&
      !segment.raw &&
      Boolean(last.bold) === Boolean(segment.bold) &&
      Boolean(last.italic) === Boolean(segment.italic)
    ) {
      merged[merged.length - 1] = { ...last, text: last.text + segment.text };
    } else {
      merged.push({ ...segment });
    }
  }

  return merged
    .map((segment) => (segment.raw ? segment.text : emphasize(segment)))
    .join('')
    .replace(/\s+/g, ' ')
    .trim();
}

function emphasize({ text, bold, italic }: InlineSegment): string {
  const match = /^(\s*)(.*?)(\s*)$/s.exec(text);
  if (!match || !match[2] || (!bold && !italic)) {
    return text;
  }
  const open = `${bold ? '**' : ''}${italic ? '_' : ''}`;
  const close = `${italic ? '_' : ''}${bold ? '**' : ''}`;
  return `${match[1]}${open}${match[2]}${close}${match[3]}`;
}
