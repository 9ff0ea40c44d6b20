/**
 * Inbound message classification
 *
 * A message with any non-null JSON `id` is a request and gets exactly one
 * response echoing that id. No `id` (or `id: null`) makes it a notification,
 * which never gets one, even when it is malformed.
 */

import {
  type JsonRpcErrorObject,
  type JsonRpcNotification,
  type JsonRpcParams,
  type JsonRpcRequest,
  type JsonValue,
  type RequestId,
  RpcErrorCode
} from '@plinth/core';

export type ClassifiedMessage =
  | { kind: 'request'; message: JsonRpcRequest }
  | { kind: 'notification'; message: JsonRpcNotification }
  | { kind: 'invalid'; id: RequestId | null; error: JsonRpcErrorObject }
  | { kind: 'ignored'; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  return isRecord(value) && Object.values(value).every(isJsonValue);
}

export function isRequestId(value: unknown): value is RequestId {
  return value !== null && isJsonValue(value);
}

const invalid = (id: RequestId | null, code: number, message: string): ClassifiedMessage => ({
  kind: 'invalid',
  id,
  error: { code, message }
});

export function classifyMessage(raw: unknown): ClassifiedMessage {
  if (Array.isArray(raw)) {
    return invalid(null, RpcErrorCode.INVALID_REQUEST, 'Invalid Request: batch requests are not supported');
  }
  if (!isRecord(raw)) {
    return invalid(null, RpcErrorCode.INVALID_REQUEST, 'Invalid Request: expected a JSON object');
  }

  const { id, method, params } = raw;
  const requestId = isRequestId(id) ? id : null;

  if (typeof method !== 'string') {
    if (requestId === null) {
      return { kind: 'ignored', reason: 'method must be a string' };
    }
    return invalid(requestId, RpcErrorCode.INVALID_REQUEST, 'Invalid Request: method must be a string');
  }

  let checkedParams: JsonRpcParams | undefined;
  if (isRecord(params)) {
    checkedParams = params;
  } else if (params !== undefined && requestId !== null) {
    return invalid(requestId, RpcErrorCode.INVALID_PARAMS, 'Invalid params: expected an object');
  }

  if (requestId === null) {
    const message: JsonRpcNotification = { jsonrpc: '2.0', method };
    if (checkedParams) message.params = checkedParams;
    return { kind: 'notification', message };
  }

  const message: JsonRpcRequest = { jsonrpc: '2.0', id: requestId, method };
  if (checkedParams) message.params = checkedParams;
  return { kind: 'request', message };
}
