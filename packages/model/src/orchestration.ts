import type {
  ConversionErrorKind,
  ConversionResult,
  ConverterId,
  VariantKind,
} from './conversion-result';

/**
 * Terminal state of a fallback orchestration.
 *
 * - accepted: a variant succeeded with a score at or above the threshold
 * - exhausted: every variant ran and none met the threshold
 * - cancelled: the caller cancelled before a result was accepted
 */
export type OrchestrationState = 'accepted' | 'exhausted' | 'cancelled';

/**
 * Log entry for one variant attempt.
 */
export interface VariantAttempt {
  converterId: ConverterId;
  variant: VariantKind;
  success: boolean;
  score: number;
  durationMs: number;
  errorKind?: ConversionErrorKind;
}

export interface OrchestrationOutcome {
  state: OrchestrationState;

  /** Selected result: the accepted one, or the best-scoring candidate */
  result: ConversionResult;

  /** Quality score of `result` */
  score: number;

  /** Attempts in execution order */
  attempts: VariantAttempt[];

  /** True when the selected result did not come from the first variant tried */
  fallbackUsed: boolean;
}
