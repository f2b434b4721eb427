import type { ConversionMetadata } from '@docmill/model';
import type { CheerioAPI } from 'cheerio';

import { load } from 'cheerio';
import { posix } from 'node:path';

import { UnsupportedFormatError } from '../errors';
import { ZipReader } from '../utils/zip-reader';

/**
 * Entry of a `_rels/*.rels` part
 */
export interface Relationship {
  target: string;
  type: string;

  /** `TargetMode="External"`: the target is a URL, not a package part */
  external: boolean;
}

/**
 * Parse XML from an Office Open XML part. Namespaced elements are selected
 * with an escaped colon, e.g. `$('w\\:p')`.
 */
export function loadXml(xml: string): CheerioAPI {
  return load(xml, { xml: true });
}

/**
 * Read the package parts accepted by `filter` into memory as UTF-8 text or
 * raw bytes (media).
 *
 * @throws UnsupportedFormatError when the ZIP container cannot be read
 */
export async function readPackage(
  path: string,
  name: string,
  filter: (part: string) => boolean,
): Promise<Map<string, Buffer>> {
  try {
    return await ZipReader.readEntries(path, filter);
  } catch (error) {
    throw UnsupportedFormatError.fromError(`Unreadable package ${name}`, error);
  }
}

export function parseRelationships(
  xml: string | undefined,
): Map<string, Relationship> {
  const relationships = new Map<string, Relationship>();
  if (!xml) {
    return relationships;
  }

  const $ = loadXml(xml);
  $('Relationship').each((_, element) => {
    const node = $(element);
    const id = node.attr('Id');
    const target = node.attr('Target');
    if (id && target) {
      relationships.set(id, {
        target,
        type: node.attr('Type') ?? '',
        external: node.attr('TargetMode') === 'External',
      });
    }
  });
  return relationships;
}

/**
 * Path of the relationships part belonging to `part`
 * (`word/document.xml` → `word/_rels/document.xml.rels`).
 */
export function relationshipsPartFor(part: string): string {
  return posix.join(
    posix.dirname(part),
    '_rels',
    `${posix.basename(part)}.rels`,
  );
}

/**
 * Resolve a relationship target against the part that declares it.
 */
export function resolvePartPath(sourcePart: string, target: string): string {
  if (target.startsWith('/')) {
    return target.slice(1);
  }
  return posix.normalize(posix.join(posix.dirname(sourcePart), target));
}

/**
 * Document properties from `docProps/core.xml` (Dublin Core).
 */
export function parseCoreProperties(
  xml: string | undefined,
): ConversionMetadata {
  if (!xml) {
    return {};
  }

  const $ = loadXml(xml);
  const text = (selector: string): string | undefined =>
    $(selector).first().text().trim() || undefined;

  const keywords = text('cp\\:keywords')
    ?.split(/[,;]/)
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword.length > 0);

  return {
    title: text('dc\\:title'),
    author: text('dc\\:creator'),
    subject: text('dc\\:subject'),
    keywords: keywords && keywords.length > 0 ? keywords : undefined,
    creationDate: text('dcterms\\:created'),
    modificationDate: text('dcterms\\:modified'),
  };
}

/**
 * Numeric property from `docProps/app.xml` (`Pages`, `Slides`, `Words`).
 */
export function readAppCount(
  xml: string | undefined,
  property: string,
): number | undefined {
  if (!xml) {
    return undefined;
  }
  const value = parseInt(loadXml(xml)(property).first().text(), 10);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}
