import type { PackagerInput } from './output-plan';

export interface PackagedOutput {
  /** Directory or archive that was written */
  destination: string;
  /** Paths written, relative to the output root */
  files: string[];
}

/**
 * Writes converted documents somewhere durable.
 */
export interface OutputPackager {
  write(input: PackagerInput, destination: string): Promise<PackagedOutput>;
}
