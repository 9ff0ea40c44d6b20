/**
 * Invoker - resolves capabilities and runs their handlers
 */

import {
  type CallToolResult,
  createSilentLogger,
  type GetPromptResult,
  type Logger,
  type ReadResourceResult,
  toErrorMessage
} from '@plinth/core';
import { type CallInfo, Context, type ContextSink } from './context.js';
import {
  normalizePromptResult,
  normalizeResourceResult,
  normalizeToolResult,
  toolErrorResult
} from './normalize.js';
import type { CapabilityRegistry } from './registry/registry.js';

export type InvokerOptions = {
  logger?: Logger;
  /** Receives context log and progress events */
  sink?: ContextSink;
};

export class Invoker {
  private readonly registry: CapabilityRegistry;
  private readonly logger: Logger;
  private readonly sink?: ContextSink;

  constructor(registry: CapabilityRegistry, options: InvokerOptions = {}) {
    this.registry = registry;
    this.logger = options.logger ?? createSilentLogger();
    this.sink = options.sink;
  }

  /**
   * Call a tool. Handler failures, including argument binding failures,
   * become an `isError` result; only an unknown name raises.
   * @throws NotFoundError
   */
  async callTool(name: string, args: unknown, call: CallInfo = {}): Promise<CallToolResult> {
    const tool = this.registry.require('tool', name);
    try {
      const value = await tool.invoke(args, () => this.createContext(name, call));
      return normalizeToolResult(value);
    } catch (error) {
      this.logger.warn({ tool: name, requestId: call.requestId, error: toErrorMessage(error) }, 'Tool call failed');
      return toolErrorResult(error);
    }
  }

  /**
   * @throws NotFoundError for an unknown URI, or whatever the handler raised
   */
  async readResource(uri: string, call: CallInfo = {}): Promise<ReadResourceResult> {
    const resource = this.registry.require('resource', uri);
    const value = await resource.invoke(() => this.createContext(uri, call));
    return normalizeResourceResult(value, resource);
  }

  /**
   * @throws NotFoundError for an unknown name, or whatever the handler raised
   */
  async getPrompt(name: string, args: unknown, call: CallInfo = {}): Promise<GetPromptResult> {
    const prompt = this.registry.require('prompt', name);
    const value = await prompt.invoke(args, () => this.createContext(name, call));
    return normalizePromptResult(value, prompt.description);
  }

  /**
   * Direct (non JSON-RPC) call returning the handler's raw value.
   * Errors propagate so the transport can map them to HTTP statuses.
   */
  async callToolDirect(name: string, args: unknown): Promise<unknown> {
    const tool = this.registry.require('tool', name);
    const value = await tool.invoke(args, () => this.createContext(name, {}));
    if (value instanceof Error) {
      throw value;
    }
    return value;
  }

  private createContext(source: string, call: CallInfo): Context {
    return new Context({ ...call, source, logger: this.logger, sink: this.sink });
  }
}
