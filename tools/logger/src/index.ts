type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

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
}

interface GetLoggerOptions {
  /**
   * Lowest level that is forwarded (default: 'info')
   */
  level?: LogLevel;

  /**
   * Destination for forwarded messages (default: console)
   */
  sink?: LoggerMethods;
}

/**
 * Check whether a string names a log level
 */
function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_ORDER, value);
}

/**
 * Build a Logger that forwards to `sink` and drops messages below `level`.
 *
 * @example
 * ```typescript
 * const logger = getLogger({ level: 'debug' });
 * logger.info('[Main] Starting...');
 * ```
 */
function getLogger(options: GetLoggerOptions = {}): Logger {
  const threshold = LOG_LEVEL_ORDER[options.level ?? 'info'];
  const sink: LoggerMethods = options.sink ?? {
    debug: (...args) => console.debug(...args),
    info: (...args) => console.info(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
  };

  const forward =
    (level: LogLevel): LogFn =>
    (...args) => {
      if (LOG_LEVEL_ORDER[level] >= threshold) {
        sink[level](...args);
      }
    };

  return new Logger({
    debug: forward('debug'),
    info: forward('info'),
    warn: forward('warn'),
    error: forward('error'),
  });
}

export { Logger, getLogger, isLogLevel };
export type { GetLoggerOptions, LoggerMethods, LogFn, LogLevel };
