/**
 * @plinth/hub - JSON-RPC dispatcher, stream hub and HTTP binding
 *
 * Dependency direction: core → runtime → hub → server
 */

export {
  buildDiscoveryDocument,
  buildOpenApiDocument,
  buildSummary,
  type DiscoveryDocument,
  type OpenApiDocument,
  type ServerSummary
} from './documents.js';
export { createHttpApp, type HttpAppOptions } from './http/app.js';
export { createPrefixedGetPath, normalizePrefix, stripPrefix } from './http/prefix.js';
export { createStreamWriter, openStream } from './http/sse.js';
export {
  type PromptEntry,
  type ResourceEntry,
  type ToolEntry,
  toPromptEntry,
  toResourceEntry,
  toToolEntry
} from './listings.js';
export { type ClassifiedMessage, classifyMessage, isRequestId } from './rpc/classify.js';
export { dispatchMessage, errorResponse, isRpcMethod, RPC_DISPATCH } from './rpc/dispatch.js';
export type { RpcHandler, RpcHost, ServerInfo } from './rpc/types.js';
export { McpServer, type McpServerOptions, type RuntimeOptions } from './server.js';
export {
  type ConnectOptions,
  type StreamEvent,
  StreamHub,
  type StreamHubOptions,
  type StreamWriter
} from './stream-hub.js';
