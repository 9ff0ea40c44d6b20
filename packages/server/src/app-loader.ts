/**
 * App module loader
 *
 * An app module builds an McpServer and exports it as `default` or `server`.
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { ConfigError, toErrorMessage } from '@plinth/core';
import { McpServer } from '@plinth/hub';

export async function loadApp(modulePath: string, cwd: string = process.cwd()): Promise<McpServer> {
  const absolutePath = resolve(cwd, modulePath);

  let exports: Record<string, unknown>;
  try {
    exports = await import(pathToFileURL(absolutePath).href);
  } catch (error) {
    throw new ConfigError(`Failed to load app module ${absolutePath}: ${toErrorMessage(error)}`, { cause: error });
  }

  const candidate = exports.default ?? exports.server;
  if (!(candidate instanceof McpServer)) {
    throw new ConfigError(`App module ${absolutePath} must export an McpServer as default or as "server"`);
  }
  return candidate;
}

/**
 * Listing of everything an app registers, as printed by `plinth inspect`
 */
export function describeApp(server: McpServer) {
  return {
    name: server.info.name,
    version: server.info.version,
    tools: server.listTools(),
    resources: server.listResources(),
    prompts: server.listPrompts()
  };
}
