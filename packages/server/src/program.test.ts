import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createProgram, startApp } from './program.js';

vi.mock('@hono/node-server', async () => {
  const { EventEmitter } = await import('node:events');
  return {
    serve: vi.fn(() =>
      Object.assign(new EventEmitter(), {
        close: (cb: () => void) => cb()
      })
    )
  };
});

const examplePath = fileURLToPath(new URL('../../../examples/calculator/server.ts', import.meta.url));

describe('plinth inspect', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print the listing as JSON', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await createProgram().parseAsync(['inspect', '--app', examplePath], { from: 'user' });

    expect(write).toHaveBeenCalledTimes(1);
    const printed = JSON.parse(String(write.mock.calls[0]?.[0]));
    expect(printed.name).toBe('simple-calculator');
    expect(printed.tools).toHaveLength(5);
    expect(printed.resources).toHaveLength(1);
    expect(printed.prompts).toHaveLength(1);
  });
});

describe('startApp', () => {
  it('should merge flags over the environment', async () => {
    const { config, running } = await startApp(
      { app: examplePath, port: '9100', quiet: true },
      { PLINTH_HOST: '127.0.0.1', PLINTH_PORT: '9000', PLINTH_KEEPALIVE_MS: '0' },
      { handleSignals: false }
    );

    expect(config).toMatchObject({
      name: 'simple-calculator',
      host: '127.0.0.1',
      port: 9100,
      logLevel: 'error',
      keepAliveMs: 0
    });
    await running.close();
  });
});
