/**
 * CLI commands
 */

import type { ServerConfig } from '@plinth/core';
import { Command } from 'commander';
import { describeApp, loadApp } from './app-loader.js';
import { loadServerConfig, type Environment } from './config.js';
import { type RunningServer, serve, type ServeOptions } from './http.js';
import { createProcessLogger, getLogLevel } from './logger.js';

export const CLI_VERSION = '0.1.0';

export type StartOptions = {
  app: string;
  host?: string;
  port?: string;
  pathPrefix?: string;
  logLevel?: string;
  logFormat?: string;
  verbose?: boolean;
  quiet?: boolean;
};

export type StartResult = {
  config: ServerConfig;
  running: RunningServer;
};

/**
 * Load the app, resolve configuration and start listening
 */
export async function startApp(
  options: StartOptions,
  env: Environment = process.env,
  listen: Pick<ServeOptions, 'handleSignals'> = {}
): Promise<StartResult> {
  const app = await loadApp(options.app);
  const config = loadServerConfig(
    {
      name: app.info.name,
      version: app.info.version,
      host: options.host,
      port: options.port,
      pathPrefix: options.pathPrefix,
      logLevel: getLogLevel(options),
      logFormat: options.logFormat
    },
    env
  );

  const logger = createProcessLogger({ level: config.logLevel, format: config.logFormat });
  app.configure({ logger, keepAliveMs: config.keepAliveMs });
  logger.debug({ config }, 'Configuration loaded');

  const running = serve(app, {
    host: config.host,
    port: config.port,
    pathPrefix: config.pathPrefix,
    shutdownTimeoutMs: config.shutdownTimeoutMs,
    logger,
    handleSignals: listen.handleSignals
  });
  return { config, running };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('plinth')
    .description('Serve tools, resources and prompts over JSON-RPC, HTTP and SSE')
    .version(CLI_VERSION);

  program
    .command('start')
    .description('Start the HTTP server for an app module')
    .requiredOption('-a, --app <path>', 'Module exporting an McpServer')
    .option('--host <host>', 'Listen address (default: 0.0.0.0)')
    .option('-p, --port <port>', 'Listen port (default: 8000)')
    .option('--path-prefix <prefix>', 'Path prefix stripped before routing')
    .option('--log-level <level>', 'Log level: silent, error, warn, info, debug, trace')
    .option('--log-format <format>', 'Log format: json | pretty')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('-q, --quiet', 'Only log errors')
    .action(async (options: StartOptions) => {
      await startApp(options);
    });

  program
    .command('inspect')
    .description('Print the tools, resources and prompts an app module registers')
    .requiredOption('-a, --app <path>', 'Module exporting an McpServer')
    .action(async (options: { app: string }) => {
      const app = await loadApp(options.app);
      process.stdout.write(`${JSON.stringify(describeApp(app), null, 2)}\n`);
    });

  return program;
}
