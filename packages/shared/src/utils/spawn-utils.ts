import type { SpawnOptions } from 'node:child_process';
import type { Readable } from 'node:stream';

import { spawn } from 'node:child_process';
import { constants } from 'node:os';

const SIGNAL_NUMBERS = new Map<string, number>(
  Object.entries(constants.signals),
);

export interface SpawnResult {
  stdout: string;
  stderr: string;
  /** Exit code; `128 + signal number` when the process was killed */
  code: number;
  /** Set when the process was killed by a signal instead of exiting */
  signal?: NodeJS.Signals;
}

export interface SpawnAsyncOptions extends SpawnOptions {
  /** Collect stdout (default: true) */
  captureStdout?: boolean;

  /** Collect stderr (default: true) */
  captureStderr?: boolean;
}

/**
 * Run a command to completion and collect its output.
 *
 * Output is buffered as bytes and decoded as UTF-8 only once the process
 * closes, so a multi-byte character split across chunks stays intact.
 * A non-zero exit code resolves normally; callers decide what it means.
 * A process killed by a signal (a crash, the OOM killer) never reports 0:
 * `signal` is set and `code` follows the shell's `128 + n` convention.
 * With `signal`, aborting kills the child and the promise rejects with the
 * AbortError raised by `child_process`.
 *
 * @example
 * ```typescript
 * const { code, stdout } = await spawnAsync('pdfinfo', ['-isodates', path], {
 *   signal,
 * });
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const {
    captureStdout = true,
    captureStderr = true,
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, spawnOptions);
    const readStdout = collect(captureStdout ? child.stdout : null);
    const readStderr = collect(captureStderr ? child.stderr : null);

    child.once('error', reject);
    child.once(
      'close',
      (code: number | null, signal: NodeJS.Signals | null) => {
        const result: SpawnResult = {
          stdout: readStdout(),
          stderr: readStderr(),
          code: code ?? 128 + (signal ? (SIGNAL_NUMBERS.get(signal) ?? 0) : 0),
        };
        if (signal) {
          result.signal = signal;
        }
        resolve(result);
      },
    );
  });
}

/**
 * Buffer everything a stream emits; the returned function decodes it.
 */
function collect(stream: Readable | null): () => string {
  const chunks: Buffer[] = [];
  stream?.on('data', (chunk: Buffer | string) => {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  });
  return () => Buffer.concat(chunks).toString('utf-8');
}
