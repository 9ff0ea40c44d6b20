/**
 * Definition builders. Each runs the schema deriver once and freezes the
 * result; nothing about a definition changes after registration.
 */

import type { z } from 'zod';
import { bindArguments } from '../schema/bind.js';
import { deriveInputSchema, derivePromptArguments, describeParameters } from '../schema/derive.js';
import type {
  ContextFactory,
  PromptConfig,
  PromptDefinition,
  ResourceConfig,
  ResourceDefinition,
  ToolConfig,
  ToolDefinition
} from './types.js';

export function defineTool<S extends z.ZodRawShape = {}>(config: ToolConfig<S>): ToolDefinition {
  const parameters = describeParameters(config.params);

  const invoke = async (args: unknown, context: ContextFactory): Promise<unknown> => {
    const bound = bindArguments(config.params, args);
    return config.wantsContext === true ? config.handler(bound, context()) : config.handler(bound);
  };

  const definition: ToolDefinition = {
    kind: 'tool',
    name: config.name,
    description: config.description ?? '',
    parameters: Object.freeze(parameters),
    // An explicit schema replaces derivation entirely
    inputSchema: config.inputSchema ?? deriveInputSchema(parameters),
    tags: Object.freeze([...(config.tags ?? [])]),
    meta: Object.freeze({ ...config.meta }),
    wantsContext: config.wantsContext === true,
    invoke
  };
  return Object.freeze(definition);
}

export function defineResource(config: ResourceConfig): ResourceDefinition {
  const invoke = async (context: ContextFactory): Promise<unknown> =>
    config.wantsContext === true ? config.handler(context()) : config.handler();

  const definition: ResourceDefinition = {
    kind: 'resource',
    uri: config.uri,
    name: config.name ?? config.uri,
    description: config.description,
    mimeType: config.mimeType,
    tags: Object.freeze([...(config.tags ?? [])]),
    meta: Object.freeze({ ...config.meta }),
    wantsContext: config.wantsContext === true,
    invoke
  };
  return Object.freeze(definition);
}

export function definePrompt<S extends z.ZodRawShape = {}>(config: PromptConfig<S>): PromptDefinition {
  const parameters = describeParameters(config.params);

  const invoke = async (args: unknown, context: ContextFactory): Promise<unknown> => {
    const bound = bindArguments(config.params, args);
    return config.wantsContext === true ? config.handler(bound, context()) : config.handler(bound);
  };

  const definition: PromptDefinition = {
    kind: 'prompt',
    name: config.name,
    description: config.description,
    parameters: Object.freeze(parameters),
    arguments: Object.freeze(derivePromptArguments(parameters)),
    tags: Object.freeze([...(config.tags ?? [])]),
    meta: Object.freeze({ ...config.meta }),
    wantsContext: config.wantsContext === true,
    invoke
  };
  return Object.freeze(definition);
}
