/**
 * Type exports for plinth core
 */

// Re-export MCP SDK types for convenience
export type {
  CallToolResult,
  GetPromptResult,
  ImageContent,
  PromptArgument,
  PromptMessage,
  ReadResourceResult,
  TextContent
} from '@modelcontextprotocol/sdk/types.js';
export type {
  JsonRpcErrorObject,
  JsonRpcFailure,
  JsonRpcNotification,
  JsonRpcParams,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcSuccess,
  JsonValue,
  NotificationMethod,
  RequestId,
  RpcMethod
} from './rpc.js';

/**
 * JSON Schema fragment produced by the schema deriver.
 * `{}` is the unconstrained schema.
 */
export type JsonSchema = {
  type?: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description?: string;
  [key: string]: unknown;
};

export type ObjectJsonSchema = {
  type: 'object';
  properties: Record<string, JsonSchema>;
  required: string[];
  [key: string]: unknown;
};

/** Free-form metadata attached to a definition */
export type Metadata = Record<string, unknown>;
