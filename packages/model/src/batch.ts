import type { ConversionOptions } from './conversion-options';
import type { ConversionResult } from './conversion-result';

/**
 * Lifecycle of a batch job.
 */
export type BatchStatus =
  | 'pending'
  | 'running'
  | 'completed'
  | 'partially-failed'
  | 'cancelled';

/**
 * Progress notification; `completed` increases by exactly one per call.
 */
export interface BatchProgress {
  completed: number;
  total: number;
  /** Path of the document that just finished */
  path: string;
}

/**
 * Mutable state of a running batch, owned by the batch coordinator.
 */
export interface BatchJob {
  readonly inputDirectory: string;
  readonly options: ConversionOptions;
  readonly documents: readonly string[];
  readonly results: Map<string, ConversionResult>;
  readonly fallbackUsed: Set<string>;
  status: BatchStatus;
}

/**
 * Aggregated outcome of a batch run.
 */
export interface BatchSummary {
  inputDirectory: string;
  status: BatchStatus;
  total: number;
  succeeded: number;
  failed: number;
  /** Documents whose selected result came from a fallback variant */
  fallbackUsed: number;
  /** Documents that never completed because the batch was cancelled */
  cancelled: string[];
  /** Completed documents only, keyed by absolute input path */
  results: ReadonlyMap<string, ConversionResult>;
  durationMs: number;
}
