import type { ConversionOptions } from '@docmill/model';
import type { ZodError } from 'zod';

import { omitBy } from 'es-toolkit';
import { z } from 'zod';

import { CONVERSION_DEFAULTS } from '../config/constants';
import { ProgrammerError } from '../errors';

/** setTimeout stores delays as a signed 32-bit integer */
const MAX_TIMEOUT_MS = 2_147_483_647;

export const conversionOptionsSchema = z.object({
  extractImages: z.boolean(),
  extractMetadata: z.boolean(),
  extractHyperlinks: z.boolean(),
  maxImageSize: z.number().int().nonnegative(),
  imageFormat: z.enum(['png', 'jpeg']),
  qualityThreshold: z.number().min(0).max(1),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS),
});

/**
 * Format zod issues as "path: message" pairs
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

/**
 * Fill defaults into partial options, validate and freeze the result.
 * Keys explicitly set to undefined take the default.
 *
 * @throws ProgrammerError when a value is out of range
 */
export function resolveConversionOptions(
  partial: Partial<ConversionOptions> = {},
): ConversionOptions {
  const candidate = {
    extractImages: CONVERSION_DEFAULTS.EXTRACT_IMAGES,
    extractMetadata: CONVERSION_DEFAULTS.EXTRACT_METADATA,
    extractHyperlinks: CONVERSION_DEFAULTS.EXTRACT_HYPERLINKS,
    maxImageSize: CONVERSION_DEFAULTS.MAX_IMAGE_SIZE_BYTES,
    imageFormat: CONVERSION_DEFAULTS.IMAGE_FORMAT,
    qualityThreshold: CONVERSION_DEFAULTS.QUALITY_THRESHOLD,
    timeoutMs: CONVERSION_DEFAULTS.TIMEOUT_MS,
    ...omitBy(partial, (value) => value === undefined),
  };
  return Object.freeze(parseConversionOptions(candidate));
}

/**
 * Validate fully specified options.
 *
 * @throws ProgrammerError when a value is missing or out of range
 */
export function assertConversionOptions(options: ConversionOptions): void {
  parseConversionOptions(options);
}

function parseConversionOptions(candidate: unknown): ConversionOptions {
  const result = conversionOptionsSchema.safeParse(candidate);
  if (!result.success) {
    throw new ProgrammerError(
      `Invalid conversion options: ${formatZodIssues(result.error)}`,
      { cause: result.error },
    );
  }
  return result.data;
}
