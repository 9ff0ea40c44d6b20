import { fileURLToPath } from 'node:url';
import { ConfigError } from '@plinth/core';
import { McpServer } from '@plinth/hub';
import { describe, expect, it } from 'vitest';
import { describeApp, loadApp } from './app-loader.js';

const examplePath = fileURLToPath(new URL('../../../examples/calculator/server.ts', import.meta.url));
const fixtures = fileURLToPath(new URL('./__fixtures__/', import.meta.url));

describe('loadApp', () => {
  it('should load the server exported by a module', async () => {
    const server = await loadApp(examplePath);
    expect(server).toBeInstanceOf(McpServer);
    expect(server.info.name).toBe('simple-calculator');
  });

  it('should resolve relative paths against cwd', async () => {
    await expect(loadApp('not-a-server.ts', fixtures)).rejects.toThrow(
      'must export an McpServer as default or as "server"'
    );
  });

  it('should wrap import failures in ConfigError', async () => {
    await expect(loadApp('missing-module.ts', fixtures)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('describeApp', () => {
  it('should list everything the app registers', async () => {
    const listing = describeApp(await loadApp(examplePath));

    expect(listing.name).toBe('simple-calculator');
    expect(listing.version).toBe('1.0.0');
    expect(listing.tools.map((tool) => tool.name)).toEqual(['add', 'power', 'subtract', 'multiply', 'divide']);
    expect(listing.resources).toEqual([
      {
        uri: 'config://calculator/settings',
        name: 'settings',
        description: 'Get calculator settings.',
        mimeType: 'application/json'
      }
    ]);
    expect(listing.prompts[0]?.arguments).toEqual([
      { name: 'expression', required: true, description: 'Expression to evaluate' }
    ]);
  });
});
