/**
 * Handler return values to protocol envelopes
 */

import { PromptMessageSchema } from '@modelcontextprotocol/sdk/types.js';
import {
  type CallToolResult,
  type GetPromptResult,
  type PromptMessage,
  type ReadResourceResult,
  toErrorMessage
} from '@plinth/core';
import { Message, PromptResult, ResourceResult, textContent, ToolResult } from './results.js';

/**
 * String form of a handler value. Strings pass unchanged, scalars use their
 * text form, everything else is compact JSON.
 */
export function stringifyValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return '';
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (typeof value === 'function' || typeof value === 'symbol') {
    return String(value);
  }
  return JSON.stringify(value);
}

export function toolErrorResult(error: unknown): CallToolResult {
  return { content: [textContent(toErrorMessage(error))], isError: true };
}

export function normalizeToolResult(value: unknown): CallToolResult {
  if (value instanceof ToolResult) {
    return value.toJSON();
  }
  if (value instanceof Error) {
    return toolErrorResult(value);
  }
  if (value === undefined) {
    return { content: [], isError: false };
  }
  return { content: [textContent(stringifyValue(value))], isError: false };
}

export function normalizeResourceResult(
  value: unknown,
  resource: { uri: string; mimeType?: string }
): ReadResourceResult {
  if (value instanceof ResourceResult) {
    return value.toJSON(resource);
  }
  if (value instanceof Error) {
    throw value;
  }
  const text = stringifyValue(value);
  return {
    contents: [
      resource.mimeType === undefined
        ? { uri: resource.uri, text }
        : { uri: resource.uri, mimeType: resource.mimeType, text }
    ]
  };
}

function toPromptMessage(item: unknown, index: number): PromptMessage {
  if (item instanceof Message) {
    return item.toJSON();
  }
  if (typeof item === 'string') {
    return new Message(item).toJSON();
  }
  const parsed = PromptMessageSchema.safeParse(item);
  if (!parsed.success) {
    throw new TypeError(`Invalid prompt message at index ${index}: ${parsed.error.issues[0]?.message ?? 'unrecognised shape'}`);
  }
  return parsed.data;
}

export function normalizePromptResult(value: unknown, description?: string): GetPromptResult {
  if (value instanceof Error) {
    throw value;
  }

  let result: GetPromptResult;
  if (value instanceof PromptResult) {
    result = value.toJSON();
  } else if (Array.isArray(value)) {
    result = { messages: value.map((item: unknown, index) => toPromptMessage(item, index)) };
  } else if (value instanceof Message) {
    result = { messages: [value.toJSON()] };
  } else {
    result = { messages: [new Message(stringifyValue(value)).toJSON()] };
  }

  if (result.description === undefined && description) {
    result.description = description;
  }
  return result;
}
