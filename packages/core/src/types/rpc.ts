/**
 * JSON-RPC 2.0 envelope types and the method literals the engine serves.
 */

/**
 * Request methods answered by the dispatcher.
 * Keep this list in sync with RPC_METHOD.
 */
export type RpcMethod =
  | 'initialize'
  | 'ping'
  | 'tools/list'
  | 'tools/call'
  | 'resources/list'
  | 'resources/read'
  | 'prompts/list'
  | 'prompts/get'
  | 'logging/setLevel';

/** Notification methods the engine accepts or emits */
export type NotificationMethod =
  | 'notifications/initialized'
  | 'notifications/cancelled'
  | 'notifications/progress'
  | 'notifications/message';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Any JSON value other than null; echoed back unchanged */
export type RequestId = Exclude<JsonValue, null>;

export type JsonRpcParams = Record<string, unknown>;

export type JsonRpcRequest = {
  jsonrpc: '2.0';
  id: RequestId;
  method: string;
  params?: JsonRpcParams;
};

export type JsonRpcNotification = {
  jsonrpc: '2.0';
  method: string;
  params?: JsonRpcParams;
};

export type JsonRpcErrorObject = {
  code: number;
  message: string;
  data?: unknown;
};

export type JsonRpcSuccess = {
  jsonrpc: '2.0';
  id: RequestId;
  result: unknown;
};

/**
 * Error envelope. `id` is null only when the offending message carried no
 * usable id (parse errors, invalid envelopes).
 */
export type JsonRpcFailure = {
  jsonrpc: '2.0';
  id: RequestId | null;
  error: JsonRpcErrorObject;
};

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;
