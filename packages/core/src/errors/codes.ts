/**
 * JSON-RPC 2.0 error codes used by the dispatcher
 */
export const RpcErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603
} as const;

export type RpcErrorCodeValue = (typeof RpcErrorCode)[keyof typeof RpcErrorCode];

/** Capability categories held by the registry */
export type CapabilityCategory = 'tool' | 'resource' | 'prompt';

/** Human label for each category, as used in not-found messages */
export const CATEGORY_LABEL = {
  tool: 'Tool',
  resource: 'Resource',
  prompt: 'Prompt'
} as const satisfies Record<CapabilityCategory, string>;
