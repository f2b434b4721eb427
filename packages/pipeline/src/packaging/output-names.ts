import { basename, extname } from 'node:path';

const FALLBACK_STEM = 'document';

/**
 * Assign every source path a unique output stem.
 *
 * The stem is the file name without its extension. Sources are visited in
 * sorted order; a stem already taken (compared case-insensitively, so the
 * tree survives case-insensitive filesystems) gets the first free `-2`,
 * `-3`, ... suffix.
 */
export function assignOutputStems(
  sources: Iterable<string>,
): Map<string, string> {
  const stems = new Map<string, string>();
  const taken = new Set<string>();

  for (const source of [...sources].sort()) {
    const base = stemOf(source);
    let stem = base;
    for (let n = 2; taken.has(stem.toLowerCase()); n++) {
      stem = `${base}-${n}`;
    }
    taken.add(stem.toLowerCase());
    stems.set(source, stem);
  }

  return stems;
}

function stemOf(source: string): string {
  const name = basename(source);
  const stem = name.slice(0, name.length - extname(name).length);
  return stem.length > 0 ? stem : FALLBACK_STEM;
}
