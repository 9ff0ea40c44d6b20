/**
 * Listing entries for tools/list, resources/list and prompts/list
 */

import type { Metadata, PromptArgument } from '@plinth/core';
import type {
  CapabilityDefinition,
  PromptDefinition,
  ResourceDefinition,
  ToolDefinition,
  ToolInputSchema
} from '@plinth/runtime';

export type ToolEntry = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  _meta?: Metadata;
};

export type ResourceEntry = {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
  _meta?: Metadata;
};

export type PromptEntry = {
  name: string;
  description?: string;
  arguments?: PromptArgument[];
  _meta?: Metadata;
};

/**
 * Metadata map plus tags, or undefined when both are empty
 */
function metaOf(definition: CapabilityDefinition): Metadata | undefined {
  const meta: Metadata = { ...definition.meta };
  if (definition.tags.length > 0) {
    meta.tags = [...definition.tags];
  }
  return Object.keys(meta).length > 0 ? meta : undefined;
}

export function toToolEntry(definition: ToolDefinition): ToolEntry {
  const entry: ToolEntry = {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema
  };
  const meta = metaOf(definition);
  if (meta) entry._meta = meta;
  return entry;
}

export function toResourceEntry(definition: ResourceDefinition): ResourceEntry {
  const entry: ResourceEntry = { uri: definition.uri, name: definition.name };
  if (definition.description) entry.description = definition.description;
  if (definition.mimeType) entry.mimeType = definition.mimeType;
  const meta = metaOf(definition);
  if (meta) entry._meta = meta;
  return entry;
}

export function toPromptEntry(definition: PromptDefinition): PromptEntry {
  const entry: PromptEntry = { name: definition.name };
  if (definition.description) entry.description = definition.description;
  if (definition.arguments.length > 0) entry.arguments = [...definition.arguments];
  const meta = metaOf(definition);
  if (meta) entry._meta = meta;
  return entry;
}
