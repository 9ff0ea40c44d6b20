/**
 * Per-call handle offering logging and progress side channels to handlers.
 * Built for a single invocation and dropped when the handler returns.
 */

import type { Logger, Metadata, RequestId } from '@plinth/core';

export type ContextLogLevel = 'debug' | 'info' | 'warning' | 'error';

export type ContextLogEntry = {
  level: ContextLogLevel;
  message: string;
  data?: unknown;
};

export type ProgressUpdate = {
  progressToken: RequestId;
  progress: number;
  total?: number;
  message?: string;
};

/**
 * Receiver for context side channels; the hub broadcasts both to open streams
 */
export type ContextSink = {
  log(entry: ContextLogEntry & { logger: string; requestId?: RequestId }): void;
  progress(update: ProgressUpdate): void;
};

/** What the transport knows about the call that triggered an invocation */
export type CallInfo = {
  requestId?: RequestId;
  progressToken?: RequestId;
  /** `_meta` of the request params */
  meta?: Metadata;
};

export type ContextOptions = CallInfo & {
  /** Name of the tool, resource or prompt being invoked */
  source: string;
  logger: Logger;
  sink?: ContextSink;
};

const LOGGER_METHOD = {
  debug: 'debug',
  info: 'info',
  warning: 'warn',
  error: 'error'
} as const satisfies Record<ContextLogLevel, keyof Logger>;

export class Context {
  readonly requestId?: RequestId;
  readonly progressToken?: RequestId;
  readonly meta: Readonly<Metadata>;
  readonly logMessages: ContextLogEntry[] = [];
  private readonly source: string;
  private readonly logger: Logger;
  private readonly sink?: ContextSink;

  constructor(options: ContextOptions) {
    this.requestId = options.requestId;
    this.progressToken = options.progressToken ?? options.requestId;
    this.meta = options.meta ?? {};
    this.source = options.source;
    this.logger = options.logger;
    this.sink = options.sink;
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warning(message: string, data?: unknown): void {
    this.log('warning', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /**
   * Report progress on the current call. Without a request id or progress
   * token there is nobody to correlate with, so the update is dropped.
   */
  reportProgress(progress: number, total?: number, message?: string): void {
    if (this.progressToken === undefined) {
      this.logger.debug({ source: this.source, progress }, 'Progress dropped: no progress token');
      return;
    }
    const update: ProgressUpdate = { progressToken: this.progressToken, progress };
    if (total !== undefined) update.total = total;
    if (message !== undefined) update.message = message;
    this.sink?.progress(update);
  }

  private log(level: ContextLogLevel, message: string, data?: unknown): void {
    const entry: ContextLogEntry = data === undefined ? { level, message } : { level, message, data };
    this.logMessages.push(entry);
    this.logger[LOGGER_METHOD[level]](
      { source: this.source, requestId: this.requestId, data },
      message
    );
    this.sink?.log({ ...entry, logger: this.source, requestId: this.requestId });
  }
}
