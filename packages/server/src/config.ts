/**
 * Configuration Loader
 *
 * Merges PLINTH_* environment variables under explicit overrides and
 * validates the result with Zod.
 */

import { ConfigError, type ServerConfig, type ServerConfigInput, safeParseServerConfig } from '@plinth/core';
import { normalizePrefix } from '@plinth/hub';

export type Environment = Record<string, string | undefined>;

/** Unvalidated values from flags or code, keyed like the config */
export type ConfigOverrides = Partial<Record<keyof ServerConfigInput, unknown>>;

export const ENV_VARIABLES = {
  host: 'PLINTH_HOST',
  port: 'PLINTH_PORT',
  pathPrefix: 'PLINTH_PATH_PREFIX',
  logLevel: 'PLINTH_LOG_LEVEL',
  logFormat: 'PLINTH_LOG_FORMAT',
  keepAliveMs: 'PLINTH_KEEPALIVE_MS',
  shutdownTimeoutMs: 'PLINTH_SHUTDOWN_TIMEOUT_MS'
} as const satisfies Partial<Record<keyof ServerConfigInput, string>>;

type EnvField = keyof typeof ENV_VARIABLES;

const ENV_FIELDS: readonly EnvField[] = [
  'host',
  'port',
  'pathPrefix',
  'logLevel',
  'logFormat',
  'keepAliveMs',
  'shutdownTimeoutMs'
];

/**
 * Configuration values present in the environment. Empty strings count as unset.
 */
export function readEnvironment(env: Environment): Partial<Record<EnvField, string>> {
  const values: Partial<Record<EnvField, string>> = {};
  for (const field of ENV_FIELDS) {
    const value = env[ENV_VARIABLES[field]];
    if (value !== undefined && value !== '') {
      values[field] = value;
    }
  }
  return values;
}

function withoutUndefined(input: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

/**
 * Load configuration
 * @param overrides values from flags or code; they win over the environment
 * @throws ConfigError listing every validation issue
 */
export function loadServerConfig(
  overrides: ConfigOverrides,
  env: Environment = process.env
): ServerConfig {
  const merged = { ...readEnvironment(env), ...withoutUndefined(overrides) };
  const result = safeParseServerConfig(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${result.issues.map((issue) => `  - ${issue}`).join('\n')}`);
  }
  return { ...result.data, pathPrefix: normalizePrefix(result.data.pathPrefix) };
}
