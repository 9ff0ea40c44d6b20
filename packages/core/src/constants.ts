/**
 * Global constants for plinth
 * Keep values environment-agnostic and dependency-free.
 */

/** MCP protocol version spoken by the engine */
export const PROTOCOL_VERSION = '2024-11-05' as const;

/** Version reported when a server does not name one */
export const DEFAULT_SERVER_VERSION = '1.0.0' as const;

/**
 * Capability set advertised by `initialize` and the discovery document.
 * Fixed regardless of what is registered.
 */
export const SERVER_CAPABILITIES = {
  tools: {},
  resources: {},
  prompts: {},
  logging: {}
} as const;

/** Route table of the HTTP surface (before any path prefix) */
export const ROUTES = {
  sse: '/sse',
  mcp: '/mcp',
  openapi: '/openapi.json',
  discovery: '/.well-known/mcp.json',
  tools: '/tools'
} as const;

/** Transport descriptors published by the discovery document */
export const TRANSPORTS = [
  { type: 'sse', endpoint: ROUTES.sse },
  { type: 'streamable-http', endpoint: ROUTES.mcp }
] as const;
