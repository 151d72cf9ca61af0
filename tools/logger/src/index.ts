type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
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

interface ConsoleLoggerOptions {
  /**
   * Minimum level that reaches the console (default: 'info')
   */
  level?: LogLevel | 'silent';

  /**
   * Console-like sink, mainly for tests (default: global console)
   */
  sink?: Pick<Console, LogLevel>;
}

const noop: LogFn = () => {};

/**
 * Creates a Logger writing to the console, dropping messages below `level`.
 */
function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { level = 'info', sink = console } = options;
  const threshold = LOG_LEVEL_ORDER[level];

  const method = (name: LogLevel): LogFn =>
    LOG_LEVEL_ORDER[name] >= threshold
      ? (...args) => sink[name](...args)
      : noop;

  return new Logger({
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  });
}

export { Logger, createConsoleLogger };
export type { ConsoleLoggerOptions, LoggerMethods, LogFn, LogLevel };
