/**
 * HTTP Mode Implementation
 *
 * Serves an McpServer through @hono/node-server and shuts it down cleanly.
 */

import { serve as serveNode, type ServerType } from '@hono/node-server';
import { DEFAULT_HOST, DEFAULT_PORT, DEFAULT_SHUTDOWN_TIMEOUT_MS, type Logger, ROUTES, toErrorMessage } from '@plinth/core';
import { createHttpApp, type McpServer, normalizePrefix } from '@plinth/hub';

export type ServeOptions = {
  host?: string;
  port?: number;
  pathPrefix?: string;
  shutdownTimeoutMs?: number;
  /** Defaults to the server's own logger */
  logger?: Logger;
  /** Install SIGINT/SIGTERM handlers that shut down and exit; default true */
  handleSignals?: boolean;
};

export type RunningServer = {
  server: ServerType;
  /** Stop listening, close every open stream and drop lingering sockets */
  close(): Promise<void>;
};

/**
 * Seal the registry and start listening
 */
export function serve(server: McpServer, options: ServeOptions = {}): RunningServer {
  const host = options.host ?? DEFAULT_HOST;
  const port = options.port ?? DEFAULT_PORT;
  const prefix = normalizePrefix(options.pathPrefix ?? '');
  const logger = options.logger ?? server.logger;

  server.seal();
  const app = createHttpApp(server, { pathPrefix: prefix });

  const node = serveNode({ fetch: app.fetch, hostname: host, port }, (info) => {
    const base = `http://${host}:${info.port}${prefix}`;
    logger.info({ url: base }, `${server.info.name} ${server.info.version} listening`);
    logger.info(
      {
        sse: `${base}${ROUTES.sse}`,
        mcp: `${base}${ROUTES.mcp}`,
        openapi: `${base}${ROUTES.openapi}`,
        discovery: `${base}${ROUTES.discovery}`
      },
      'Endpoints'
    );
  });

  const close = createShutdown({
    server: node,
    streams: server.streams,
    logger,
    timeoutMs: options.shutdownTimeoutMs
  });
  if (options.handleSignals ?? true) {
    setupGracefulShutdown(close, { logger });
  }

  return { server: node, close };
}

type MinimalSocket = { on: (ev: 'close', fn: () => void) => void; destroy?: () => void };
type MinimalServer = {
  close: (cb: () => void) => void;
  on: (ev: 'connection', fn: (s: MinimalSocket) => void) => void;
};

/**
 * Build an idempotent shutdown for a listening server
 */
export function createShutdown(args: {
  server: MinimalServer;
  streams: { closeAll: () => Promise<void> };
  logger: Logger;
  timeoutMs?: number;
}): () => Promise<void> {
  const { server, streams, logger } = args;
  const timeoutMs = args.timeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
  const sockets = new Set<MinimalSocket>();

  server.on('connection', (socket: MinimalSocket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });

  const shutdown = async (): Promise<void> => {
    logger.info({ timeoutMs }, 'Starting graceful shutdown');
    const closePromise = new Promise<void>((resolve) => server.close(() => resolve()));
    // Open streams keep their responses alive; end them so close() can finish
    await streams.closeAll();

    let timer: ReturnType<typeof setTimeout> | undefined;
    await Promise.race([
      closePromise,
      new Promise<void>((resolve) => {
        timer = setTimeout(resolve, timeoutMs);
      })
    ]);
    clearTimeout(timer);

    if (sockets.size > 0) {
      logger.info({ count: sockets.size }, 'Forcing close of remaining sockets');
      for (const socket of sockets) {
        socket.destroy?.();
      }
    }
    logger.info('Shutdown complete');
  };

  let running: Promise<void> | undefined;
  return () => {
    running ??= shutdown();
    return running;
  };
}

/** Where signals come from; `process` unless a test hands in an emitter */
export type SignalSource = {
  once(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
};

/**
 * Run `shutdown` on SIGINT or SIGTERM, then exit
 */
export function setupGracefulShutdown(
  shutdown: () => Promise<void>,
  options: { logger: Logger; exit?: (code: number) => void; signals?: SignalSource }
): void {
  const { logger } = options;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const signals = options.signals ?? process;

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Received signal');
    void shutdown().then(
      () => exit(0),
      (error: unknown) => {
        logger.error({ error: toErrorMessage(error) }, 'Error during shutdown');
        exit(1);
      }
    );
  };

  signals.once('SIGINT', onSignal);
  signals.once('SIGTERM', onSignal);
}
