import type { ConversionResult } from '@docmill/model';

import { ProgrammerError } from '@docmill/converters';

import { QUALITY_SCORER } from '../config/constants';

/**
 * Relative weight of each quality signal.
 */
export interface ScoringWeights {
  /** Trimmed markdown reaches the minimum content length */
  content: number;
  title: number;
  author: number;
  /** At least one ATX heading */
  headings: number;
  /** Every markdown table is well formed (true when there is none) */
  tables: number;
}

export interface QualityScorerOptions {
  weights?: Partial<ScoringWeights>;
  minContentLength?: number;
}

/**
 * Points earned per signal; `total` is their sum in [0, 1].
 */
export interface ScoreBreakdown extends ScoringWeights {
  total: number;
}

const SIGNALS = ['content', 'title', 'author', 'headings', 'tables'] as const;
const HEADING_MARKER = /^#{1,6} /m;
const TABLE_SEPARATOR = /^\|(\s*:?-{3,}:?\s*\|)+$/;

/**
 * Deterministic quality heuristic for a conversion result.
 *
 * Weights are normalized when they add up to more than 1, so a score never
 * exceeds 1. A failed result always scores 0.
 */
export class QualityScorer {
  readonly weights: Readonly<ScoringWeights>;
  readonly minContentLength: number;

  constructor(options: QualityScorerOptions = {}) {
    const weights: ScoringWeights = {
      ...QUALITY_SCORER.WEIGHTS,
      ...options.weights,
    };
    for (const signal of SIGNALS) {
      const weight = weights[signal];
      if (!Number.isFinite(weight) || weight < 0) {
        throw new ProgrammerError(
          `Scoring weight "${signal}" must be a non-negative number, got ${weight}`,
        );
      }
    }

    const sum = SIGNALS.reduce((acc, signal) => acc + weights[signal], 0);
    if (sum === 0) {
      throw new ProgrammerError('Scoring weights must not all be zero');
    }
    const scale = sum > 1 + 1e-9 ? 1 / sum : 1;
    this.weights = Object.freeze({
      content: weights.content * scale,
      title: weights.title * scale,
      author: weights.author * scale,
      headings: weights.headings * scale,
      tables: weights.tables * scale,
    });

    const minContentLength =
      options.minContentLength ?? QUALITY_SCORER.MIN_CONTENT_LENGTH;
    if (!Number.isInteger(minContentLength) || minContentLength < 0) {
      throw new ProgrammerError(
        `minContentLength must be a non-negative integer, got ${minContentLength}`,
      );
    }
    this.minContentLength = minContentLength;
  }

  score(result: ConversionResult): number {
    return this.explain(result).total;
  }

  /**
   * Per-signal breakdown of {@link score}.
   */
  explain(result: ConversionResult): ScoreBreakdown {
    if (!result.success) {
      return {
        content: 0,
        title: 0,
        author: 0,
        headings: 0,
        tables: 0,
        total: 0,
      };
    }

    const earned: ScoringWeights = {
      content:
        result.markdown.trim().length >= this.minContentLength
          ? this.weights.content
          : 0,
      title: result.metadata.title?.trim() ? this.weights.title : 0,
      author: result.metadata.author?.trim() ? this.weights.author : 0,
      headings: HEADING_MARKER.test(result.markdown) ? this.weights.headings : 0,
      tables: tablesAreBalanced(result.markdown) ? this.weights.tables : 0,
    };
    const total = SIGNALS.reduce((acc, signal) => acc + earned[signal], 0);

    return { ...earned, total: Math.min(1, total) };
  }
}

/**
 * Every block of consecutive `|`-prefixed lines has a separator as its
 * second line and the same cell count on every row.
 */
export function tablesAreBalanced(markdown: string): boolean {
  const blocks: string[][] = [];
  let current: string[] = [];

  for (const rawLine of markdown.split('\n')) {
    const line = rawLine.trim();
    if (line.startsWith('|')) {
      current.push(line);
    } else if (current.length > 0) {
      blocks.push(current);
      current = [];
    }
  }
  if (current.length > 0) {
    blocks.push(current);
  }

  return blocks.every((rows) => {
    if (rows.length < 2 || !TABLE_SEPARATOR.test(rows[1])) {
      return false;
    }
    const width = countCells(rows[0]);
    return rows.every((row) => countCells(row) === width);
  });
}

function countCells(row: string): number {
  return row.replace(/\\\|/g, '').replace(/\|$/, '').split('|').length - 1;
}
