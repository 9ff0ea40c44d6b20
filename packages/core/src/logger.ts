/**
 * Logger contract for plinth
 *
 * Library packages log through this shape only. The server package hands in
 * a pino instance, which satisfies it structurally.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

type LogData = {
  [key: string]: unknown;
};

export type Logger = {
  level: string;
  error(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  debug(obj: unknown, msg?: string): void;
  trace(obj: unknown, msg?: string): void;
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

export function shouldLog(currentLevel: LogLevel, messageLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] <= LOG_LEVELS[currentLevel];
}

/**
 * Client-facing log levels (RFC 5424 names), most verbose first
 */
export const CLIENT_LOG_LEVELS = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency'
] as const;

export type ClientLogLevel = (typeof CLIENT_LOG_LEVELS)[number];

export function isClientLogLevel(value: unknown): value is ClientLogLevel {
  return CLIENT_LOG_LEVELS.some((level) => level === value);
}

/**
 * True when a message at `messageLevel` passes a `threshold` set by the client
 */
export function meetsClientLevel(threshold: ClientLogLevel, messageLevel: ClientLogLevel): boolean {
  return CLIENT_LOG_LEVELS.indexOf(messageLevel) >= CLIENT_LOG_LEVELS.indexOf(threshold);
}

export type LoggerOptions = {
  level?: LogLevel;
  prefix?: string;
  output?: (message: string) => void;
};

/**
 * Create a functional logger writing JSON lines to `output`
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const prefix = options.prefix;
  const output = options.output ?? (() => {});

  const log = (logLevel: LogLevel, obj: unknown, msg?: string): void => {
    if (!shouldLog(level, logLevel)) {
      return;
    }
    const record: LogData = { time: new Date().toISOString(), level: logLevel };
    if (prefix) record.prefix = prefix;
    if (msg !== undefined) {
      record.msg = msg;
      record.data = obj;
    } else if (typeof obj === 'string') {
      record.msg = obj;
    } else {
      record.data = obj;
    }
    output(JSON.stringify(record));
  };

  return {
    level,
    error: (obj, msg) => log('error', obj, msg),
    warn: (obj, msg) => log('warn', obj, msg),
    info: (obj, msg) => log('info', obj, msg),
    debug: (obj, msg) => log('debug', obj, msg),
    trace: (obj, msg) => log('trace', obj, msg)
  };
}

/**
 * Logger that forwards each call to whatever `resolve` returns at call time
 */
export function createForwardingLogger(resolve: () => Logger): Logger {
  const forward =
    (level: Exclude<LogLevel, 'silent'>) =>
    (obj: unknown, msg?: string): void => {
      const target = resolve();
      if (msg === undefined) {
        target[level](obj);
      } else {
        target[level](obj, msg);
      }
    };

  return {
    get level() {
      return resolve().level;
    },
    error: forward('error'),
    warn: forward('warn'),
    info: forward('info'),
    debug: forward('debug'),
    trace: forward('trace')
  };
}

/**
 * Create a silent logger (no-op)
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}
