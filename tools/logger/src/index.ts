type LogFn = (...args: unknown[]) => void;

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

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

/**
 * Logger that writes to the console.
 *
 * Used as the default wherever a caller does not inject its own logger.
 */
function getLogger(): Logger {
  return new Logger({
    debug: (...args) => console.debug(...args),
    info: (...args) => console.info(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
  });
}

export { Logger, getLogger };
export type { LoggerMethods, LogFn };
