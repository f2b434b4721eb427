const ORDERED_MARKER = /^\d+[.)]$/;

/**
 * Count words in rendered markdown, ignoring markup-only tokens such as
 * `#`, `|`, `---` and list markers.
 */
export function countWords(markdown: string): number {
  return markdown
    .split(/\s+/)
    .filter(
      (token) => /[\p{L}\p{N}]/u.test(token) && !ORDERED_MARKER.test(token),
    ).length;
}
