export {
  ConcurrentPool,
  type ConcurrentPoolOptions,
} from './utils/concurrent-pool';
export {
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
export {
  createAbortError,
  isAbortError,
  linkAbortSignals,
  throwIfAborted,
  type LinkedAbortSignal,
} from './utils/abort';
