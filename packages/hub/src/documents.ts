/**
 * Read-only documents derived from the registry
 */

import { PROTOCOL_VERSION, ROUTES, SERVER_CAPABILITIES, TRANSPORTS } from '@plinth/core';
import type { CapabilityRegistry, ToolInputSchema } from '@plinth/runtime';
import type { ServerInfo } from './rpc/types.js';

type OpenApiOperation = {
  operationId?: string;
  summary: string;
  requestBody?: {
    required: boolean;
    content: { 'application/json': { schema: ToolInputSchema | { type: 'object' } } };
  };
  responses: Record<string, { description: string; content?: Record<string, { schema: unknown }> }>;
};

export type OpenApiDocument = {
  openapi: '3.1.0';
  info: { title: string; version: string; description: string };
  paths: Record<string, Record<string, OpenApiOperation>>;
};

const jsonObjectResponse = (description: string) => ({
  description,
  content: { 'application/json': { schema: { type: 'object' } } }
});

/**
 * OpenAPI 3.1 view: the JSON-RPC endpoint plus one POST path per tool
 */
export function buildOpenApiDocument(info: ServerInfo, registry: CapabilityRegistry): OpenApiDocument {
  const paths: OpenApiDocument['paths'] = {
    [ROUTES.mcp]: {
      get: {
        summary: 'Open an event stream announcing the JSON-RPC endpoint',
        responses: { '200': { description: 'Server-sent event stream' } }
      },
      post: {
        summary: 'Send a JSON-RPC 2.0 message',
        requestBody: {
          required: true,
          content: { 'application/json': { schema: { type: 'object' } } }
        },
        responses: {
          '200': jsonObjectResponse('JSON-RPC response'),
          '202': { description: 'Notification accepted' }
        }
      }
    }
  };

  for (const tool of registry.list('tool')) {
    paths[`${ROUTES.tools}/${tool.name}`] = {
      post: {
        operationId: tool.name,
        summary: tool.description || tool.name,
        requestBody: {
          required: true,
          content: { 'application/json': { schema: tool.inputSchema } }
        },
        responses: {
          '200': jsonObjectResponse('Successful response'),
          '404': { description: 'Tool not found' },
          '500': { description: 'Tool execution failed' }
        }
      }
    };
  }

  return {
    openapi: '3.1.0',
    info: {
      title: info.name,
      version: info.version,
      description: 'MCP Server exposing tools as OpenAPI endpoints'
    },
    paths
  };
}

export type DiscoveryDocument = {
  mcpVersion: string;
  serverInfo: { name: string; version: string };
  capabilities: typeof SERVER_CAPABILITIES;
  transports: typeof TRANSPORTS;
};

export function buildDiscoveryDocument(info: ServerInfo): DiscoveryDocument {
  return {
    mcpVersion: PROTOCOL_VERSION,
    serverInfo: { name: info.name, version: info.version },
    capabilities: SERVER_CAPABILITIES,
    transports: TRANSPORTS
  };
}

export type ServerSummary = {
  name: string;
  version: string;
  status: 'running';
  tools: number;
  resources: number;
  prompts: number;
  endpoints: { sse: string; mcp: string; openapi: string };
};

export function buildSummary(info: ServerInfo, registry: CapabilityRegistry): ServerSummary {
  return {
    name: info.name,
    version: info.version,
    status: 'running',
    tools: registry.size('tool'),
    resources: registry.size('resource'),
    prompts: registry.size('prompt'),
    endpoints: { sse: ROUTES.sse, mcp: ROUTES.mcp, openapi: ROUTES.openapi }
  };
}
