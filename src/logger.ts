export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some(level => level === value);
}

class ConsoleLogger implements Logger {
  constructor(private readonly prefix: string, private level: LogLevel) {}

  private shouldLog(level: LogLevel): boolean {
    return this.level !== 'silent' && LEVELS.indexOf(this.level) <= LEVELS.indexOf(level);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

/**
 * Resolve the default level: MDRECORDS_LOG_LEVEL, then silent under tests, then info.
 */
export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fromEnv = env['MDRECORDS_LOG_LEVEL'];
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

/**
 * Create a console logger whose lines start with `prefix`, e.g. "[Loader] ".
 */
export function createLogger(prefix = '', level?: LogLevel): Logger {
  return new ConsoleLogger(prefix, level ?? defaultLogLevel());
}

const registry: Logger[] = [];

/**
 * Shared module loggers, so the CLI can raise verbosity for all of them at once.
 */
export function moduleLogger(prefix: string): Logger {
  const logger = createLogger(prefix);
  registry.push(logger);
  return logger;
}

export function registeredLoggerCount(): number {
  return registry.length;
}

export function setGlobalLogLevel(level: LogLevel): void {
  for (const logger of registry) {
    logger.setLevel(level);
  }
}
