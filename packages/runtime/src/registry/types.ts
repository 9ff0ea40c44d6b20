/**
 * Capability definition types
 */

import type { CapabilityCategory, Metadata, PromptArgument } from '@plinth/core';
import type { z } from 'zod';
import type { Context } from '../context.js';
import type { ParameterDescriptor } from '../schema/derive.js';
import type { BoundArgs } from '../schema/bind.js';

/** Explicit input schema supplied at registration; replaces derivation */
export type ToolInputSchema = {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
};

/** Lazily builds the Context for a call; only invoked for context-aware handlers */
export type ContextFactory = () => Context;

type Common = {
  description?: string;
  tags?: readonly string[];
  meta?: Metadata;
};

/**
 * Handler shape. `wantsContext: true` is the only way a handler receives a
 * Context; it is never taken from caller arguments.
 */
export type HandlerConfig<Args extends unknown[], R = unknown> =
  | { wantsContext?: false; handler: (...args: Args) => R }
  | { wantsContext: true; handler: (...args: [...Args, Context]) => R };

export type ToolConfig<S extends z.ZodRawShape = {}> = Common & {
  name: string;
  /** Declared parameters; `{}` for a tool that takes none */
  params: S;
  inputSchema?: ToolInputSchema;
} & HandlerConfig<[args: BoundArgs<S>]>;

export type ResourceConfig = Common & {
  uri: string;
  name?: string;
  mimeType?: string;
} & HandlerConfig<[]>;

export type PromptConfig<S extends z.ZodRawShape = {}> = Common & {
  name: string;
  params: S;
} & HandlerConfig<[args: BoundArgs<S>]>;

type DefinitionBase = {
  readonly description?: string;
  readonly tags: readonly string[];
  readonly meta: Readonly<Metadata>;
  readonly wantsContext: boolean;
};

export type ToolDefinition = DefinitionBase & {
  readonly kind: 'tool';
  readonly name: string;
  readonly description: string;
  readonly parameters: readonly ParameterDescriptor[];
  readonly inputSchema: ToolInputSchema;
  invoke(args: unknown, context: ContextFactory): Promise<unknown>;
};

export type ResourceDefinition = DefinitionBase & {
  readonly kind: 'resource';
  readonly uri: string;
  readonly name: string;
  readonly mimeType?: string;
  invoke(context: ContextFactory): Promise<unknown>;
};

export type PromptDefinition = DefinitionBase & {
  readonly kind: 'prompt';
  readonly name: string;
  readonly parameters: readonly ParameterDescriptor[];
  readonly arguments: readonly PromptArgument[];
  invoke(args: unknown, context: ContextFactory): Promise<unknown>;
};

export type CapabilityDefinition = ToolDefinition | ResourceDefinition | PromptDefinition;

export type DefinitionOf<C extends CapabilityCategory> = Extract<CapabilityDefinition, { kind: C }>;

/** Registry key of a definition: URI for resources, name otherwise */
export function keyOf(definition: CapabilityDefinition): string {
  return definition.kind === 'resource' ? definition.uri : definition.name;
}
