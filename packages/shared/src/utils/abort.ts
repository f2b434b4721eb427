/**
 * Create an error recognized as a cancellation by {@link isAbortError}.
 */
export function createAbortError(message = 'Operation was aborted'): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

/**
 * Throw an AbortError when the signal has already fired.
 */
export function throwIfAborted(
  signal: AbortSignal | undefined,
  message?: string,
): void {
  if (signal?.aborted) {
    throw createAbortError(message);
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Linked abort controller returned by {@link linkAbortSignals}.
 */
export interface LinkedAbortSignal {
  signal: AbortSignal;

  /** Detach listeners from the parent signals */
  dispose: () => void;
}

/**
 * Derive a signal that aborts as soon as any parent aborts.
 *
 * Callers must invoke `dispose` once the linked signal is no longer needed,
 * otherwise the listeners stay attached to long-lived parents.
 */
export function linkAbortSignals(
  ...parents: Array<AbortSignal | undefined>
): LinkedAbortSignal {
  const controller = new AbortController();
  const attached: Array<{ parent: AbortSignal; listener: () => void }> = [];

  const dispose = () => {
    for (const { parent, listener } of attached) {
      parent.removeEventListener('abort', listener);
    }
    attached.length = 0;
  };

  for (const parent of parents) {
    if (!parent) {
      continue;
    }
    if (parent.aborted) {
      dispose();
      controller.abort(parent.reason);
      return { signal: controller.signal, dispose };
    }
    const listener = () => {
      dispose();
      controller.abort(parent.reason);
    };
    parent.addEventListener('abort', listener);
    attached.push({ parent, listener });
  }

  return { signal: controller.signal, dispose };
}
