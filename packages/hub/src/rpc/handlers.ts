/**
 * JSON-RPC method handlers
 */

import {
  isClientLogLevel,
  PROTOCOL_VERSION,
  ProtocolError,
  RpcErrorCode,
  SERVER_CAPABILITIES,
  type JsonRpcParams
} from '@plinth/core';
import type { CallInfo } from '@plinth/runtime';
import { toPromptEntry, toResourceEntry, toToolEntry } from '../listings.js';
import type { RpcHost } from './types.js';

function requireString(params: JsonRpcParams, key: string): string {
  const value = params[key];
  if (typeof value !== 'string') {
    throw new ProtocolError(RpcErrorCode.INVALID_PARAMS, `Invalid params: '${key}' must be a string`);
  }
  return value;
}

/** `arguments` defaults to an empty object; binding rejects other shapes */
function argumentsOf(params: JsonRpcParams): unknown {
  return params.arguments ?? {};
}

export function handleInitialize(host: RpcHost): unknown {
  const result: Record<string, unknown> = {
    protocolVersion: PROTOCOL_VERSION,
    capabilities: SERVER_CAPABILITIES,
    serverInfo: { name: host.info.name, version: host.info.version }
  };
  if (host.info.instructions) {
    result.instructions = host.info.instructions;
  }
  return result;
}

export function handlePing(): unknown {
  return {};
}

export function handleToolsList(host: RpcHost): unknown {
  return { tools: host.registry.list('tool').map(toToolEntry) };
}

export function handleToolsCall(host: RpcHost, params: JsonRpcParams, call: CallInfo): Promise<unknown> {
  const name = requireString(params, 'name');
  host.logger.debug({ tool: name, requestId: call.requestId }, '[RPC] tools/call');
  return host.invoker.callTool(name, argumentsOf(params), call);
}

export function handleResourcesList(host: RpcHost): unknown {
  return { resources: host.registry.list('resource').map(toResourceEntry) };
}

export function handleResourcesRead(host: RpcHost, params: JsonRpcParams, call: CallInfo): Promise<unknown> {
  const uri = requireString(params, 'uri');
  return host.invoker.readResource(uri, call);
}

export function handlePromptsList(host: RpcHost): unknown {
  return { prompts: host.registry.list('prompt').map(toPromptEntry) };
}

export function handlePromptsGet(host: RpcHost, params: JsonRpcParams, call: CallInfo): Promise<unknown> {
  const name = requireString(params, 'name');
  return host.invoker.getPrompt(name, argumentsOf(params), call);
}

export function handleLoggingSetLevel(host: RpcHost, params: JsonRpcParams): unknown {
  const level = params.level;
  if (!isClientLogLevel(level)) {
    throw new ProtocolError(RpcErrorCode.INVALID_PARAMS, `Invalid params: unknown log level '${String(level)}'`);
  }
  host.setClientLogLevel(level);
  return {};
}
