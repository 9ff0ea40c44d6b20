/**
 * RPC dispatch table
 * Maps method name to handler function; classification and error mapping
 * live here as well.
 */

import {
  type JsonRpcFailure,
  type JsonRpcParams,
  type JsonRpcResponse,
  NOTIFICATION_METHOD,
  NotFoundError,
  ProtocolError,
  type RequestId,
  RPC_METHOD,
  RpcErrorCode,
  type RpcMethod,
  toErrorMessage
} from '@plinth/core';
import type { CallInfo } from '@plinth/runtime';
import { classifyMessage, isRequestId } from './classify.js';
import {
  handleInitialize,
  handleLoggingSetLevel,
  handlePing,
  handlePromptsGet,
  handlePromptsList,
  handleResourcesList,
  handleResourcesRead,
  handleToolsCall,
  handleToolsList
} from './handlers.js';
import type { RpcHandler, RpcHost } from './types.js';

export const RPC_DISPATCH = {
  [RPC_METHOD.initialize]: (host) => handleInitialize(host),
  [RPC_METHOD.ping]: () => handlePing(),
  [RPC_METHOD.tools_list]: (host) => handleToolsList(host),
  [RPC_METHOD.tools_call]: (host, params, call) => handleToolsCall(host, params, call),
  [RPC_METHOD.resources_list]: (host) => handleResourcesList(host),
  [RPC_METHOD.resources_read]: (host, params, call) => handleResourcesRead(host, params, call),
  [RPC_METHOD.prompts_list]: (host) => handlePromptsList(host),
  [RPC_METHOD.prompts_get]: (host, params, call) => handlePromptsGet(host, params, call),
  [RPC_METHOD.logging_setLevel]: (host, params) => handleLoggingSetLevel(host, params)
} as const satisfies Record<RpcMethod, RpcHandler>;

// Type guard for dynamic method strings
export function isRpcMethod(method: string): method is RpcMethod {
  return Object.prototype.hasOwnProperty.call(RPC_DISPATCH, method);
}

export function errorResponse(id: RequestId | null, code: number, message: string): JsonRpcFailure {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

function toErrorResponse(id: RequestId | null, error: unknown): JsonRpcFailure {
  if (error instanceof NotFoundError || error instanceof ProtocolError) {
    return errorResponse(id, error.code, error.message);
  }
  return errorResponse(id, RpcErrorCode.INTERNAL_ERROR, toErrorMessage(error));
}

function callInfoOf(params: JsonRpcParams, requestId?: RequestId): CallInfo {
  const call: CallInfo = { requestId };
  const meta = params._meta;
  if (typeof meta === 'object' && meta !== null && !Array.isArray(meta)) {
    const metadata: Record<string, unknown> = { ...meta };
    call.meta = metadata;
    if (isRequestId(metadata.progressToken)) {
      call.progressToken = metadata.progressToken;
    }
  }
  return call;
}

/**
 * Handle one parsed JSON-RPC message.
 * @returns the response envelope, or undefined for a notification
 */
export async function dispatchMessage(host: RpcHost, raw: unknown): Promise<JsonRpcResponse | undefined> {
  const classified = classifyMessage(raw);

  if (classified.kind === 'invalid') {
    host.logger.debug({ error: classified.error }, '[RPC] Invalid message');
    return errorResponse(classified.id, classified.error.code, classified.error.message);
  }

  if (classified.kind === 'ignored') {
    host.logger.debug({ reason: classified.reason }, '[RPC] Ignoring message without id');
    return undefined;
  }

  if (classified.kind === 'notification') {
    await handleNotification(host, classified.message.method, classified.message.params ?? {});
    return undefined;
  }

  const { id, method } = classified.message;
  const params = classified.message.params ?? {};
  host.logger.debug({ id, method }, '[RPC] Request');

  if (!isRpcMethod(method)) {
    return errorResponse(id, RpcErrorCode.METHOD_NOT_FOUND, `Method not found: ${method}`);
  }

  try {
    const result = await RPC_DISPATCH[method](host, params, callInfoOf(params, id));
    return { jsonrpc: '2.0', id, result };
  } catch (error) {
    const response = toErrorResponse(id, error);
    const level = response.error.code === RpcErrorCode.INTERNAL_ERROR ? 'error' : 'debug';
    host.logger[level]({ id, method, error: response.error }, '[RPC] Request failed');
    return response;
  }
}

/**
 * Notifications run for side effects only; nothing is returned, and a
 * failure is logged rather than answered.
 */
async function handleNotification(host: RpcHost, method: string, params: JsonRpcParams): Promise<void> {
  if (method === NOTIFICATION_METHOD.initialized || method === NOTIFICATION_METHOD.cancelled) {
    host.logger.debug({ method }, '[RPC] Notification');
    return;
  }
  if (!isRpcMethod(method)) {
    host.logger.debug({ method }, '[RPC] Ignoring unknown notification');
    return;
  }
  try {
    await RPC_DISPATCH[method](host, params, callInfoOf(params));
  } catch (error) {
    host.logger.warn({ method, error: toErrorMessage(error) }, '[RPC] Notification handler failed');
  }
}
