/**
 * Logger for pdu-cycle
 *
 * Core stays I/O free: the caller supplies the output function.
 * The CLI writes every line to stderr so stdout only carries the report.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type Logger = {
  level: LogLevel;
  error(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  debug(obj: unknown, msg?: string): void;
  trace(obj: unknown, msg?: string): void;
  child(prefix: string): Logger;
};

/**
 * Log levels with numeric values for comparison
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Check if a log level should be output
 */
export function shouldLog(currentLevel: LogLevel, messageLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] <= LOG_LEVELS[currentLevel];
}

/**
 * Pick the effective level: an environment override wins over the configured one.
 * Unknown values are ignored.
 */
export function resolveLogLevel(configured: LogLevel, override?: string): LogLevel {
  if (override === undefined) {
    return configured;
  }
  const normalized = override.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : configured;
}

export type LoggerOptions = {
  level?: LogLevel;
  prefix?: string;
  json?: boolean;
  output?: (message: string) => void;
  now?: () => Date;
};

const noOutput: (message: string) => void = () => {};

function formatLogMessage(
  timestamp: string,
  level: LogLevel,
  obj: unknown,
  msg: string | undefined,
  prefix: string,
  json: boolean
): string {
  if (json) {
    const record: Record<string, unknown> = { time: timestamp, level };
    if (prefix) record.prefix = prefix;
    const text = msg ?? (typeof obj === 'string' ? obj : undefined);
    if (text !== undefined) record.msg = text;
    if (typeof obj !== 'string' && obj !== undefined) record.data = obj;
    return JSON.stringify(record);
  }

  const prefixStr = prefix ? ` ${prefix}` : '';
  const messageStr = msg ?? (typeof obj === 'string' ? obj : JSON.stringify(obj));
  const dataStr =
    msg && obj !== undefined && typeof obj !== 'string' ? ` ${JSON.stringify(obj)}` : '';

  return `[${timestamp}] [${level.toUpperCase()}]${prefixStr} ${messageStr}${dataStr}`;
}

/**
 * Create a functional logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const prefix = options.prefix ?? '';
  const json = options.json ?? false;
  const output = options.output ?? noOutput;
  const now = options.now ?? (() => new Date());

  const log = (logLevel: LogLevel, obj: unknown, msg?: string): void => {
    if (!shouldLog(level, logLevel)) {
      return;
    }
    output(formatLogMessage(now().toISOString(), logLevel, obj, msg, prefix, json));
  };

  return {
    level,
    error: (obj, msg) => log('error', obj, msg),
    warn: (obj, msg) => log('warn', obj, msg),
    info: (obj, msg) => log('info', obj, msg),
    debug: (obj, msg) => log('debug', obj, msg),
    trace: (obj, msg) => log('trace', obj, msg),
    child: (childPrefix: string) =>
      createLogger({
        ...options,
        prefix: `${prefix}[${childPrefix}]`
      })
  };
}

export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}
