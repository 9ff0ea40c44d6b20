import { createHttpApp, type StreamEvent } from '@plinth/hub';
import { describe, expect, it } from 'vitest';
import server from './server.js';

const app = createHttpApp(server);

const postJson = (path: string, body: unknown) =>
  app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });

describe('calculator example', () => {
  it('should add through a direct tool call', async () => {
    const res = await postJson('/tools/add', { a: 2, b: 3 });
    expect(await res.json()).toEqual({ result: '5' });
  });

  it('should refuse to divide by zero', async () => {
    const res = await postJson('/tools/divide', { a: 1, b: 0 });
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Cannot divide by zero' });
  });

  it('should advertise tags on power', async () => {
    const res = await postJson('/mcp', { jsonrpc: '2.0', id: 1, method: 'tools/list' });
    const body = await res.json();
    expect(body.result.tools.map((tool: { name: string }) => tool.name)).toEqual([
      'add',
      'power',
      'subtract',
      'multiply',
      'divide'
    ]);
    expect(body.result.tools[1]._meta).toEqual({ tags: ['math', 'advanced'] });
  });

  it('should read the settings resource', async () => {
    const res = await postJson('/mcp', {
      jsonrpc: '2.0',
      id: 2,
      method: 'resources/read',
      params: { uri: 'config://calculator/settings' }
    });
    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: {
        contents: [
          {
            uri: 'config://calculator/settings',
            mimeType: 'application/json',
            text: '{"precision":10,"max_value":1e+308,"supported_operations":["add","subtract","multiply","divide","power"]}'
          }
        ]
      }
    });
  });

  it('should render the calculate prompt', async () => {
    const res = await postJson('/mcp', {
      jsonrpc: '2.0',
      id: 3,
      method: 'prompts/get',
      params: { name: 'calculate', arguments: { expression: '6*7' } }
    });
    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      id: 3,
      result: {
        description: 'Generate a calculation prompt.',
        messages: [{ role: 'user', content: { type: 'text', text: 'Please calculate: 6*7' } }]
      }
    });
  });

  it('should broadcast the log line power writes', async () => {
    const events: StreamEvent[] = [];
    const id = await server.streams.connect(
      {
        send: async (event) => {
          events.push(event);
        },
        comment: async () => {},
        close: async () => {}
      },
      { event: 'open', data: '{}' }
    );

    const res = await postJson('/mcp', {
      jsonrpc: '2.0',
      id: 4,
      method: 'tools/call',
      params: { name: 'power', arguments: { base: 2, exponent: 10 } }
    });
    const body = await res.text();
    await server.streams.whenIdle();
    await server.streams.disconnect(id);

    expect(JSON.parse(body).result).toEqual({ content: [{ type: 'text', text: '1024' }], isError: false });
    expect(events.map((event) => event.data)).toEqual([
      '{}',
      '{"jsonrpc":"2.0","method":"notifications/message","params":{"level":"info","logger":"power","data":"Computing 2^10"}}',
      body
    ]);
  });
});
