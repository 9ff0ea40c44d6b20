/**
 * Registry exports
 */

export { definePrompt, defineResource, defineTool } from './definitions.js';
export { CapabilityRegistry } from './registry.js';
export type {
  CapabilityDefinition,
  ContextFactory,
  DefinitionOf,
  HandlerConfig,
  PromptConfig,
  PromptDefinition,
  ResourceConfig,
  ResourceDefinition,
  ToolConfig,
  ToolDefinition,
  ToolInputSchema
} from './types.js';
export { keyOf } from './types.js';
