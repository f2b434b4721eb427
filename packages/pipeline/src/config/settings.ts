import type { LogLevel } from '@docmill/logger';

import {
  CONVERSION_DEFAULTS,
  formatZodIssues,
  ProgrammerError,
} from '@docmill/converters';
import { z } from 'zod';

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const settingsSchema = z.object({
  DOCMILL_DOCLING_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  DOCMILL_TIMEOUT_MS: z.preprocess(
    emptyAsUndefined,
    z.coerce
      .number()
      .int()
      .positive()
      .max(2_147_483_647)
      .default(CONVERSION_DEFAULTS.TIMEOUT_MS),
  ),
  DOCMILL_CONCURRENCY: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().min(1).optional(),
  ),
  DOCMILL_QUALITY_THRESHOLD: z.preprocess(
    emptyAsUndefined,
    z.coerce
      .number()
      .min(0)
      .max(1)
      .default(CONVERSION_DEFAULTS.QUALITY_THRESHOLD),
  ),
  DOCMILL_MAX_IMAGE_SIZE: z.preprocess(
    emptyAsUndefined,
    z.coerce
      .number()
      .int()
      .positive()
      .default(CONVERSION_DEFAULTS.MAX_IMAGE_SIZE_BYTES),
  ),
  DOCMILL_RECURSIVE: z.preprocess(
    emptyAsUndefined,
    booleanFlag.default('false'),
  ),
  DOCMILL_LOG_LEVEL: z.preprocess(
    emptyAsUndefined,
    z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  ),
  DOCMILL_FALLBACK_STRATEGY: z.preprocess(
    emptyAsUndefined,
    z.enum(['first-acceptable', 'best-of-all']).default('first-acceptable'),
  ),
  DOCMILL_OUTPUT_MODE: z.preprocess(
    emptyAsUndefined,
    z.enum(['directory', 'archive']).default('directory'),
  ),
});

export type FallbackStrategy = 'first-acceptable' | 'best-of-all';

export type OutputMode = 'directory' | 'archive';

/**
 * Runtime settings read from `DOCMILL_*` environment variables.
 */
export interface DocmillSettings {
  /** docling-serve base URL; without it only fallback converters run */
  doclingUrl?: string;
  timeoutMs: number;
  /** Batch worker count; defaults to the available parallelism */
  concurrency?: number;
  qualityThreshold: number;
  maxImageSize: number;
  recursive: boolean;
  logLevel: LogLevel;
  fallbackStrategy: FallbackStrategy;
  outputMode: OutputMode;
}

/**
 * Parse settings from an environment map.
 *
 * @throws ProgrammerError listing every invalid variable
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env,
): DocmillSettings {
  const parsed = settingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new ProgrammerError(
      `Invalid settings: ${formatZodIssues(parsed.error)}`,
    );
  }

  const values = parsed.data;
  return {
    doclingUrl: values.DOCMILL_DOCLING_URL,
    timeoutMs: values.DOCMILL_TIMEOUT_MS,
    concurrency: values.DOCMILL_CONCURRENCY,
    qualityThreshold: values.DOCMILL_QUALITY_THRESHOLD,
    maxImageSize: values.DOCMILL_MAX_IMAGE_SIZE,
    recursive: values.DOCMILL_RECURSIVE,
    logLevel: values.DOCMILL_LOG_LEVEL,
    fallbackStrategy: values.DOCMILL_FALLBACK_STRATEGY,
    outputMode: values.DOCMILL_OUTPUT_MODE,
  };
}
