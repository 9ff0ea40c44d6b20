/**
 * @plinth/runtime - capability registry and invocation
 *
 * Dependency direction: core → runtime → hub → server
 */

export {
  type CallInfo,
  Context,
  type ContextLogEntry,
  type ContextLogLevel,
  type ContextOptions,
  type ContextSink,
  type ProgressUpdate
} from './context.js';
export { Invoker, type InvokerOptions } from './invoker.js';
export { createMutex, type Mutex } from './mutex.js';
export {
  normalizePromptResult,
  normalizeResourceResult,
  normalizeToolResult,
  stringifyValue,
  toolErrorResult
} from './normalize.js';
export * from './registry/index.js';
export {
  type ContentBlock,
  imageContent,
  Message,
  type PromptItem,
  PromptResult,
  type ResourceContentsInput,
  ResourceResult,
  textContent,
  ToolResult
} from './results.js';
export { type BoundArgs, bindArguments } from './schema/bind.js';
export {
  deriveInputSchema,
  derivePromptArguments,
  describeParameters,
  jsonTypeOf,
  type ParameterDescriptor
} from './schema/derive.js';
