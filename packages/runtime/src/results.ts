/**
 * Pre-built result wrappers. Handlers return these to take full control of
 * the envelope; the normalizer passes them through verbatim.
 */

import type {
  CallToolResult,
  GetPromptResult,
  ImageContent,
  Metadata,
  PromptMessage,
  ReadResourceResult,
  TextContent
} from '@plinth/core';

export type ContentBlock = CallToolResult['content'][number];
export type PromptContent = PromptMessage['content'];
export type Role = PromptMessage['role'];

export type ResourceContentsInput =
  | { uri?: string; mimeType?: string; text: string }
  | { uri?: string; mimeType?: string; blob: string };

export function textContent(text: string): TextContent {
  return { type: 'text', text };
}

/**
 * Image content block; raw bytes are base64 encoded
 */
export function imageContent(data: string | Uint8Array, mimeType = 'image/png'): ImageContent {
  const encoded = typeof data === 'string' ? data : Buffer.from(data).toString('base64');
  return { type: 'image', data: encoded, mimeType };
}

export class ToolResult {
  readonly content: ContentBlock[];
  readonly isError: boolean;
  readonly meta?: Metadata;

  constructor(content: ContentBlock[] | string, options: { isError?: boolean; meta?: Metadata } = {}) {
    this.content = typeof content === 'string' ? [textContent(content)] : content;
    this.isError = options.isError ?? false;
    this.meta = options.meta;
  }

  toJSON(): CallToolResult {
    const result: CallToolResult = { content: this.content, isError: this.isError };
    if (this.meta) result._meta = this.meta;
    return result;
  }
}

export class ResourceResult {
  readonly contents: ResourceContentsInput[];
  readonly meta?: Metadata;

  constructor(contents: ResourceContentsInput[], options: { meta?: Metadata } = {}) {
    this.contents = contents;
    this.meta = options.meta;
  }

  /**
   * Contents without a URI inherit the requested one; the resource's MIME
   * type fills in where an entry names none.
   */
  toJSON(defaults: { uri: string; mimeType?: string }): ReadResourceResult {
    const result: ReadResourceResult = {
      contents: this.contents.map((entry) => {
        const mimeType = entry.mimeType ?? defaults.mimeType;
        return {
          ...entry,
          uri: entry.uri ?? defaults.uri,
          ...(mimeType === undefined ? {} : { mimeType })
        };
      })
    };
    if (this.meta) result._meta = this.meta;
    return result;
  }
}

export class Message {
  readonly role: Role;
  readonly content: PromptContent;

  constructor(content: string | PromptContent, role: Role = 'user') {
    this.role = role;
    this.content = typeof content === 'string' ? textContent(content) : content;
  }

  toJSON(): PromptMessage {
    return { role: this.role, content: this.content };
  }
}

export type PromptItem = Message | PromptMessage | string;

export class PromptResult {
  readonly messages: PromptItem[];
  readonly description?: string;
  readonly meta?: Metadata;

  constructor(
    messages: PromptItem[] | string,
    options: { description?: string; meta?: Metadata } = {}
  ) {
    this.messages = typeof messages === 'string' ? [messages] : messages;
    this.description = options.description;
    this.meta = options.meta;
  }

  toJSON(): GetPromptResult {
    const result: GetPromptResult = {
      messages: this.messages.map((item) =>
        typeof item === 'string' ? new Message(item).toJSON() : item instanceof Message ? item.toJSON() : item
      )
    };
    if (this.description !== undefined) result.description = this.description;
    if (this.meta) result._meta = this.meta;
    return result;
  }
}
