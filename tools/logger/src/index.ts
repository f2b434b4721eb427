type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const noop: LogFn = () => {};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }

  /**
   * Wrap existing methods so that calls below `level` are dropped.
   */
  static withLevel(methods: LoggerMethods, level: LogLevel): Logger {
    const threshold = LOG_LEVEL_ORDER[level];
    const pick = (methodLevel: Exclude<LogLevel, 'silent'>): LogFn =>
      LOG_LEVEL_ORDER[methodLevel] >= threshold ? methods[methodLevel] : noop;

    return new Logger({
      debug: pick('debug'),
      info: pick('info'),
      warn: pick('warn'),
      error: pick('error'),
    });
  }
}

interface ConsoleLoggerOptions {
  level?: LogLevel;
}

/**
 * Logger backed by the global console.
 */
function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return Logger.withLevel(
    {
      debug: (...args) => console.debug(...args),
      info: (...args) => console.info(...args),
      warn: (...args) => console.warn(...args),
      error: (...args) => console.error(...args),
    },
    options.level ?? 'info',
  );
}

export { LOG_LEVEL_ORDER, Logger, createConsoleLogger };
export type { ConsoleLoggerOptions, LogFn, LogLevel, LoggerMethods };
