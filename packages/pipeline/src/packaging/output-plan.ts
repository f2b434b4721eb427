import type {
  BatchSummary,
  ConversionError,
  ConversionResult,
  ConverterId,
} from '@docmill/model';

import { posix, relative } from 'node:path';

import { PACKAGING } from '../config/constants';
import { assignOutputStems } from './output-names';

/**
 * What a packager accepts: a batch summary, or bare results keyed by
 * absolute source path.
 */
export type PackagerInput =
  | BatchSummary
  | ReadonlyMap<string, ConversionResult>;

export type ManifestStatus = 'succeeded' | 'failed' | 'cancelled';

export interface ManifestEntry {
  /** Source path, relative to the input directory when known */
  source: string;
  /** Markdown file relative to the output root; null when nothing was written */
  output: string | null;
  status: ManifestStatus;
  converter: ConverterId | null;
  error: ConversionError | null;
  warnings: string[];
  images: number;
}

/**
 * Written next to the converted files. Carries no timestamps or durations
 * so identical input yields identical bytes.
 */
export interface Manifest {
  status?: BatchSummary['status'];
  documents: ManifestEntry[];
}

export interface PlannedFile {
  /** Path relative to the output root, always with `/` separators */
  path: string;
  data: string | Uint8Array;
}

/**
 * Every file a packager writes, in a fixed order.
 */
export interface OutputPlan {
  files: PlannedFile[];
  manifest: Manifest;
}

/**
 * Lay out the output tree for a set of results.
 *
 * Each successful document becomes `<stem>.md`; its images move to
 * `images/<stem>/` and the markdown links are rewritten to match.
 */
export function planOutput(input: PackagerInput): OutputPlan {
  const { results, cancelled, inputDirectory, status } = normalize(input);
  const successful = [...results].filter(([, result]) => result.success);
  const stems = assignOutputStems(successful.map(([source]) => source));

  const files: PlannedFile[] = [];
  const entries: ManifestEntry[] = [];
  const sourceName = (source: string) =>
    inputDirectory ? relative(inputDirectory, source) : source;

  for (const [source, result] of [...results].sort(byPath)) {
    const stem = stems.get(source);
    if (!result.success || stem === undefined) {
      entries.push({
        source: sourceName(source),
        output: null,
        status: 'failed',
        converter: result.converterUsed ?? null,
        error: result.success ? null : result.error,
        warnings: result.warnings,
        images: 0,
      });
      continue;
    }

    const output = `${stem}${PACKAGING.MARKDOWN_EXTENSION}`;
    const imageDir = posix.join(PACKAGING.IMAGES_DIR, stem);
    let markdown = result.markdown;

    for (const image of result.images) {
      markdown = markdown
        .split(`](${PACKAGING.IMAGES_DIR}/${image.filename})`)
        .join(
          `](${PACKAGING.IMAGES_DIR}/${encodeURIComponent(stem)}/${image.filename})`,
        );
      files.push({
        path: posix.join(imageDir, image.filename),
        data: image.data,
      });
    }
    files.push({ path: output, data: markdown });

    entries.push({
      source: sourceName(source),
      output,
      status: 'succeeded',
      converter: result.converterUsed,
      error: null,
      warnings: result.warnings,
      images: result.images.length,
    });
  }

  for (const source of [...cancelled].sort()) {
    entries.push({
      source: sourceName(source),
      output: null,
      status: 'cancelled',
      converter: null,
      error: null,
      warnings: [],
      images: 0,
    });
  }

  const manifest: Manifest = { status, documents: entries };
  files.push({
    path: PACKAGING.MANIFEST_FILE,
    data: `${JSON.stringify(manifest, null, 2)}\n`,
  });

  return { files, manifest };
}

function normalize(input: PackagerInput): {
  results: ReadonlyMap<string, ConversionResult>;
  cancelled: readonly string[];
  inputDirectory?: string;
  status?: BatchSummary['status'];
} {
  if (isBatchSummary(input)) {
    return {
      results: input.results,
      cancelled: input.cancelled,
      inputDirectory: input.inputDirectory,
      status: input.status,
    };
  }
  return { results: input, cancelled: [] };
}

function isBatchSummary(input: PackagerInput): input is BatchSummary {
  return 'inputDirectory' in input;
}

function byPath(
  [a]: [string, ConversionResult],
  [b]: [string, ConversionResult],
): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
