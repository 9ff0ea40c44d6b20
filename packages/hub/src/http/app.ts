/**
 * hono application exposing an McpServer over HTTP and SSE
 */

import { NotFoundError, ROUTES, RpcErrorCode, toErrorMessage } from '@plinth/core';
import { stringifyValue } from '@plinth/runtime';
import { type Context, Hono } from 'hono';
import { cors } from 'hono/cors';
import { errorResponse } from '../rpc/dispatch.js';
import type { McpServer } from '../server.js';
import { createPrefixedGetPath, normalizePrefix, pathnameOf } from './prefix.js';
import { openStream } from './sse.js';

export type HttpAppOptions = {
  /** Prefix stripped before routing, e.g. "/proxy/8000" */
  pathPrefix?: string;
};

const JSON_HEADERS = { 'Content-Type': 'application/json' };

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Synchronous JSON-RPC. The envelope is serialised once; that same string
 * is returned to the caller and broadcast to every open stream.
 */
async function handleRpcPost(c: Context, server: McpServer): Promise<Response> {
  const parsed = parseJson(await c.req.text());
  if (!parsed.ok) {
    const body = JSON.stringify(errorResponse(null, RpcErrorCode.PARSE_ERROR, 'Parse error'));
    return c.body(body, 400, JSON_HEADERS);
  }

  const response = await server.handleMessage(parsed.value);
  if (!response) {
    return c.json({ status: 'accepted' }, 202);
  }

  const body = JSON.stringify(response);
  void server.streams.broadcast(body);
  return c.body(body, 200, JSON_HEADERS);
}

/**
 * Direct tool call: the body is the argument map, the reply `{result}`
 */
async function handleDirectCall(c: Context, server: McpServer): Promise<Response> {
  const name = c.req.param('name') ?? '';
  const text = await c.req.text();
  let args: unknown = {};
  if (text.trim() !== '') {
    const parsed = parseJson(text);
    if (!parsed.ok) {
      return c.json({ error: 'Invalid JSON body' }, 400);
    }
    args = parsed.value;
  }

  try {
    const value = await server.callToolDirect(name, args);
    return c.json({ result: stringifyValue(value) });
  } catch (error) {
    if (error instanceof NotFoundError) {
      return c.json({ error: error.message }, 404);
    }
    server.logger.warn({ tool: name, error: toErrorMessage(error) }, '[HTTP] Direct tool call failed');
    return c.json({ error: toErrorMessage(error) }, 500);
  }
}

/** Raw path the combined stream was opened on, without a trailing slash */
function endpointPathOf(c: Context): string {
  const path = pathnameOf(c.req.raw).replace(/\/+$/, '');
  return path === '' ? '/' : path;
}

export function createHttpApp(server: McpServer, options: HttpAppOptions = {}): Hono {
  const prefix = normalizePrefix(options.pathPrefix ?? '');
  const app = new Hono({ getPath: createPrefixedGetPath(prefix) });

  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'OPTIONS', 'DELETE'],
      allowHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id']
    })
  );

  // Bare stream: `open` first, then broadcasts
  app.get(ROUTES.sse, (c) => openStream(c, server.streams, { event: 'open', data: '{}' }, server.logger));

  // Combined stream: `endpoint` names the POST path
  app.get(ROUTES.mcp, (c) =>
    openStream(c, server.streams, { event: 'endpoint', data: endpointPathOf(c) }, server.logger)
  );
  app.post(ROUTES.mcp, (c) => handleRpcPost(c, server));
  app.post('/', (c) => handleRpcPost(c, server));

  app.post(`${ROUTES.tools}/:name`, (c) => handleDirectCall(c, server));

  app.get(ROUTES.openapi, (c) => c.json(server.openApiDocument()));
  app.get(ROUTES.discovery, (c) => c.json(server.discoveryDocument()));

  // Everything else answers with the summary
  app.get('*', (c) => c.json(server.summary()));

  return app;
}
