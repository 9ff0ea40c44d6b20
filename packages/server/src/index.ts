/**
 * @plinth/server - Node process wiring for plinth
 *
 * Can be used as a library or run directly via CLI.
 */

export { describeApp, loadApp } from './app-loader.js';
export {
  type ConfigOverrides,
  ENV_VARIABLES,
  type Environment,
  loadServerConfig,
  readEnvironment
} from './config.js';
export {
  createShutdown,
  type RunningServer,
  serve,
  type ServeOptions,
  type SignalSource,
  setupGracefulShutdown
} from './http.js';
export { createProcessLogger, getLogLevel, type ProcessLoggerOptions } from './logger.js';
export { CLI_VERSION, createProgram, startApp, type StartOptions, type StartResult } from './program.js';
