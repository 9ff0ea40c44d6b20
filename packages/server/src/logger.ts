/**
 * Process logger
 *
 * pino writing to stderr so stdout stays free for command output.
 */

import type { LogFormat, LogLevel } from '@plinth/core';
import pino, { type Logger, type LoggerOptions } from 'pino';

export type ProcessLoggerOptions = {
  level?: LogLevel;
  format?: LogFormat;
  /** Bound to every record as `component` */
  component?: string;
};

const REDACT_PATHS = [
  'authorization',
  '*.authorization',
  'headers.authorization',
  'token',
  '*.token',
  'password',
  '*.password',
  'secret',
  '*.secret'
];

export function createProcessLogger(options: ProcessLoggerOptions = {}): Logger {
  const config: LoggerOptions = {
    level: options.level ?? 'info',
    base: { component: options.component ?? 'plinth' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label })
    },
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' }
  };

  if (options.format === 'pretty') {
    return pino({
      ...config,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'hostname,pid',
          destination: 2
        }
      }
    });
  }

  return pino(config, pino.destination(2));
}

/**
 * Map CLI verbosity flags to a level; undefined leaves it to configuration
 */
export function getLogLevel(options: { verbose?: boolean; quiet?: boolean; logLevel?: string }): string | undefined {
  if (options.quiet) return 'error';
  if (options.verbose) return 'debug';
  return options.logLevel;
}
