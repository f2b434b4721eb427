import type { Converter, ConverterTable } from '@docmill/converters';
import type { LoggerMethods } from '@docmill/logger';
import type {
  ConversionOptions,
  ConversionResult,
  OrchestrationOutcome,
  OrchestrationState,
  SourceDocument,
  VariantAttempt,
} from '@docmill/model';

import { ProgrammerError } from '@docmill/converters';

import type { FallbackStrategy } from '../config/settings';
import type { ConversionTelemetry } from '../telemetry/conversion-telemetry';

import { QualityScorer } from '../scoring/quality-scorer';
import { safeRecord } from '../telemetry/conversion-telemetry';

export interface FallbackOrchestratorOptions {
  /**
   * - first-acceptable: stop at the first successful result that meets the
   *   quality threshold (default)
   * - best-of-all: run every variant and keep the highest score
   */
  strategy?: FallbackStrategy;

  telemetry?: ConversionTelemetry;
}

interface Candidate {
  result: ConversionResult;
  score: number;
  /** Position in the variant chain */
  index: number;
}

/**
 * FallbackOrchestrator
 *
 * Runs the variant chain of a document (AI-primary, format-specific,
 * universal) until one result is good enough, keeping the best-scoring
 * result seen so far as the answer when none is.
 *
 * ProgrammerError thrown by a variant propagates; every other failure is a
 * result that moves the chain forward.
 */
export class FallbackOrchestrator {
  private readonly strategy: FallbackStrategy;
  private readonly telemetry?: ConversionTelemetry;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly table: ConverterTable,
    private readonly scorer: QualityScorer = new QualityScorer(),
    options: FallbackOrchestratorOptions = {},
  ) {
    this.strategy = options.strategy ?? 'first-acceptable';
    this.telemetry = options.telemetry;
  }

  async orchestrate(
    document: SourceDocument,
    outputDirectory: string,
    options: ConversionOptions,
    signal?: AbortSignal,
  ): Promise<OrchestrationOutcome> {
    const chain = this.table.chainFor(document.format);
    if (chain.length === 0) {
      throw new ProgrammerError(
        `No converter registered for ${document.format} documents`,
      );
    }

    const attempts: VariantAttempt[] = [];
    let best: Candidate | undefined;

    for (const [index, converter] of chain.entries()) {
      if (signal?.aborted) {
        return this.cancel(document, attempts);
      }

      const candidate = await this.attempt(
        converter,
        index,
        document,
        outputDirectory,
        options,
        attempts,
        signal,
      );

      if (
        !candidate.result.success &&
        candidate.result.error.kind === 'Cancelled'
      ) {
        return this.cancel(document, attempts, candidate.result);
      }
      if (isBetter(candidate, best)) {
        best = candidate;
      }
      if (
        this.strategy === 'first-acceptable' &&
        this.isAcceptable(candidate, options)
      ) {
        return this.finish('accepted', document, candidate, attempts);
      }
      if (index < chain.length - 1) {
        this.logger.info(
          `[FallbackOrchestrator] ${document.name}: ${describeShortfall(candidate)} from ${converter.id}, trying ${chain[index + 1].id}`,
        );
      }
    }

    if (!best) {
      throw new ProgrammerError(`No variant ran for ${document.name}`);
    }
    const state: OrchestrationState = this.isAcceptable(best, options)
      ? 'accepted'
      : 'exhausted';
    return this.finish(state, document, best, attempts);
  }

  private async attempt(
    converter: Converter,
    index: number,
    document: SourceDocument,
    outputDirectory: string,
    options: ConversionOptions,
    attempts: VariantAttempt[],
    signal: AbortSignal | undefined,
  ): Promise<Candidate> {
    safeRecord(
      this.telemetry,
      {
        type: 'variant-attempted',
        document: document.path,
        converterId: converter.id,
        variant: converter.variant,
      },
      this.logger,
    );

    const result = await converter.convert(
      document,
      outputDirectory,
      options,
      signal,
    );
    const breakdown = this.scorer.explain(result);
    const errorKind = result.success ? undefined : result.error.kind;

    attempts.push({
      converterId: converter.id,
      variant: converter.variant,
      success: result.success,
      score: breakdown.total,
      durationMs: result.durationMs,
      errorKind,
    });
    safeRecord(
      this.telemetry,
      {
        type: 'variant-completed',
        document: document.path,
        converterId: converter.id,
        variant: converter.variant,
        success: result.success,
        score: breakdown.total,
        breakdown,
        durationMs: result.durationMs,
        errorKind,
      },
      this.logger,
    );

    return { result, score: breakdown.total, index };
  }

  private isAcceptable(
    candidate: Candidate,
    options: ConversionOptions,
  ): boolean {
    return (
      candidate.result.success && candidate.score >= options.qualityThreshold
    );
  }

  private finish(
    state: OrchestrationState,
    document: SourceDocument,
    selected: Candidate,
    attempts: VariantAttempt[],
  ): OrchestrationOutcome {
    const { result, score, index } = selected;

    if (result.success) {
      this.logger.info(
        `[FallbackOrchestrator] ${document.name}: ${state === 'accepted' ? 'accepted' : 'kept best result from'} ${result.converterUsed} (score ${score.toFixed(2)})`,
      );
      if (state === 'accepted') {
        safeRecord(
          this.telemetry,
          {
            type: 'variant-accepted',
            document: document.path,
            converterId: result.converterUsed,
            score,
          },
          this.logger,
        );
      }
    } else {
      this.reportFailure(document, result);
    }

    return {
      state,
      result,
      score,
      attempts,
      fallbackUsed: index > 0,
    };
  }

  private cancel(
    document: SourceDocument,
    attempts: VariantAttempt[],
    cancelled?: ConversionResult,
  ): OrchestrationOutcome {
    const result: ConversionResult = cancelled ?? {
      success: false,
      markdown: '',
      error: { kind: 'Cancelled', message: 'Conversion was cancelled' },
      metadata: {},
      images: [],
      hyperlinks: [],
      durationMs: 0,
      warnings: [],
    };
    this.logger.info(
      `[FallbackOrchestrator] ${document.name}: cancelled after ${attempts.length} attempt(s)`,
    );
    this.reportFailure(document, result);

    return {
      state: 'cancelled',
      result,
      score: 0,
      attempts,
      fallbackUsed: false,
    };
  }

  private reportFailure(
    document: SourceDocument,
    result: ConversionResult,
  ): void {
    if (result.success) {
      return;
    }
    this.logger.warn(
      `[FallbackOrchestrator] ${document.name}: no usable result (${result.error.kind}: ${result.error.message})`,
    );
    safeRecord(
      this.telemetry,
      {
        type: 'document-failed',
        document: document.path,
        errorKind: result.error.kind,
        message: result.error.message,
      },
      this.logger,
    );
  }
}

/**
 * Higher score wins; on a tie the earlier candidate stays unless only the
 * newer one succeeded.
 */
function isBetter(candidate: Candidate, best: Candidate | undefined): boolean {
  if (!best) {
    return true;
  }
  if (candidate.score !== best.score) {
    return candidate.score > best.score;
  }
  return candidate.result.success && !best.result.success;
}

function describeShortfall({ result, score }: Candidate): string {
  return result.success
    ? `score ${score.toFixed(2)} below threshold`
    : `${result.error.kind}`;
}
