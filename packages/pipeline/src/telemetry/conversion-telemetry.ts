import type { LoggerMethods } from '@docmill/logger';
import type {
  BatchStatus,
  ConversionErrorKind,
  ConverterId,
  VariantKind,
} from '@docmill/model';

import type { ScoreBreakdown } from '../scoring/quality-scorer';

export interface VariantAttemptedEvent {
  type: 'variant-attempted';
  document: string;
  converterId: ConverterId;
  variant: VariantKind;
}

export interface VariantCompletedEvent {
  type: 'variant-completed';
  document: string;
  converterId: ConverterId;
  variant: VariantKind;
  success: boolean;
  score: number;
  breakdown: ScoreBreakdown;
  durationMs: number;
  errorKind?: ConversionErrorKind;
}

export interface VariantAcceptedEvent {
  type: 'variant-accepted';
  document: string;
  converterId: ConverterId;
  score: number;
}

export interface DocumentFailedEvent {
  type: 'document-failed';
  document: string;
  errorKind: ConversionErrorKind;
  message: string;
}

export interface BatchCompletedEvent {
  type: 'batch-completed';
  directory: string;
  status: BatchStatus;
  total: number;
  succeeded: number;
  failed: number;
  fallbackUsed: number;
  cancelled: number;
  durationMs: number;
}

export type TelemetryEvent =
  | VariantAttemptedEvent
  | VariantCompletedEvent
  | VariantAcceptedEvent
  | DocumentFailedEvent
  | BatchCompletedEvent;

/**
 * Sink for conversion events. Implementations may be async, but nothing
 * waits for them; failures are contained by {@link safeRecord}.
 */
export interface ConversionTelemetry {
  record(event: TelemetryEvent): void | Promise<void>;
}

/**
 * Telemetry sink that writes one log line per event.
 */
export class LoggerTelemetry implements ConversionTelemetry {
  constructor(private readonly logger: LoggerMethods) {}

  record(event: TelemetryEvent): void {
    switch (event.type) {
      case 'variant-attempted':
        this.logger.debug(
          `[Telemetry] ${event.document}: trying ${event.converterId} (${event.variant})`,
        );
        break;
      case 'variant-completed':
        this.logger.info(
          `[Telemetry] ${event.document}: ${event.converterId} ${event.success ? 'succeeded' : `failed (${event.errorKind})`} score=${event.score.toFixed(2)} in ${event.durationMs}ms`,
        );
        break;
      case 'variant-accepted':
        this.logger.info(
          `[Telemetry] ${event.document}: accepted ${event.converterId} score=${event.score.toFixed(2)}`,
        );
        break;
      case 'document-failed':
        this.logger.warn(
          `[Telemetry] ${event.document}: failed (${event.errorKind}) ${event.message}`,
        );
        break;
      case 'batch-completed':
        this.logger.info(
          `[Telemetry] Batch ${event.directory} ${event.status}: ${event.succeeded}/${event.total} succeeded, ${event.failed} failed, ${event.cancelled} cancelled, ${event.fallbackUsed} used fallback in ${event.durationMs}ms`,
        );
        break;
    }
  }
}

/**
 * Hand an event to the sink without waiting for it. A sink that throws or
 * rejects is logged; one that never settles does not hold up the caller.
 */
export function safeRecord(
  telemetry: ConversionTelemetry | undefined,
  event: TelemetryEvent,
  logger: LoggerMethods,
): void {
  if (!telemetry) {
    return;
  }
  const warn = (error: unknown): void => {
    logger.warn(
      `[Telemetry] Failed to record ${event.type}: ${error instanceof Error ? error.message : String(error)}`,
    );
  };
  try {
    const pending = telemetry.record(event);
    if (pending instanceof Promise) {
      pending.catch(warn);
    }
  } catch (error) {
    warn(error);
  }
}
