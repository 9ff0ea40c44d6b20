/**
 * McpServer - registration surface and protocol entry point
 */

import {
  type ClientLogLevel,
  createForwardingLogger,
  createSilentLogger,
  DEFAULT_SERVER_VERSION,
  type JsonRpcResponse,
  type Logger,
  meetsClientLevel,
  NOTIFICATION_METHOD
} from '@plinth/core';
import {
  type CapabilityDefinition,
  CapabilityRegistry,
  type ContextSink,
  definePrompt,
  defineResource,
  defineTool,
  Invoker,
  type PromptConfig,
  type ResourceConfig,
  type ToolConfig
} from '@plinth/runtime';
import type { z } from 'zod';
import {
  buildDiscoveryDocument,
  buildOpenApiDocument,
  buildSummary,
  type DiscoveryDocument,
  type OpenApiDocument,
  type ServerSummary
} from './documents.js';
import {
  type PromptEntry,
  type ResourceEntry,
  type ToolEntry,
  toPromptEntry,
  toResourceEntry,
  toToolEntry
} from './listings.js';
import { dispatchMessage } from './rpc/dispatch.js';
import type { RpcHost, ServerInfo } from './rpc/types.js';
import { StreamHub } from './stream-hub.js';

export type McpServerOptions = {
  name: string;
  version?: string;
  instructions?: string;
  logger?: Logger;
  /** Keep-alive interval for open streams; 0 disables */
  keepAliveMs?: number;
};

export type RuntimeOptions = Pick<McpServerOptions, 'logger' | 'keepAliveMs'>;

export class McpServer implements RpcHost {
  readonly info: ServerInfo;
  readonly registry = new CapabilityRegistry();
  readonly streams: StreamHub;
  readonly invoker: Invoker;
  readonly logger: Logger;
  private target: Logger;
  private clientLogLevel: ClientLogLevel = 'debug';

  constructor(options: McpServerOptions) {
    this.info = {
      name: options.name,
      version: options.version ?? DEFAULT_SERVER_VERSION,
      instructions: options.instructions
    };
    this.target = options.logger ?? createSilentLogger();
    this.logger = createForwardingLogger(() => this.target);
    this.streams = new StreamHub({ logger: this.logger, keepAliveMs: options.keepAliveMs });
    this.invoker = new Invoker(this.registry, { logger: this.logger, sink: this.createContextSink() });
  }

  tool<S extends z.ZodRawShape = {}>(config: ToolConfig<S>): this {
    this.registry.register(defineTool(config));
    return this;
  }

  resource(config: ResourceConfig): this {
    this.registry.register(defineResource(config));
    return this;
  }

  prompt<S extends z.ZodRawShape = {}>(config: PromptConfig<S>): this {
    this.registry.register(definePrompt(config));
    return this;
  }

  /** Register a definition built elsewhere with defineTool and friends */
  register(definition: CapabilityDefinition): this {
    this.registry.register(definition);
    return this;
  }

  /**
   * Swap the process-level pieces an app module could not know about when
   * it built the server
   */
  configure(options: RuntimeOptions): this {
    if (options.logger) {
      this.target = options.logger;
    }
    if (options.keepAliveMs !== undefined) {
      this.streams.setKeepAlive(options.keepAliveMs);
    }
    return this;
  }

  /** Close registration; the transport calls this before serving */
  seal(): void {
    this.registry.seal();
  }

  /**
   * Handle one parsed JSON-RPC message
   * @returns the response envelope, or undefined for a notification
   */
  handleMessage(message: unknown): Promise<JsonRpcResponse | undefined> {
    return dispatchMessage(this, message);
  }

  /**
   * Direct tool call with the body as the argument map
   * @throws NotFoundError for an unknown tool, or whatever the handler raised
   */
  callToolDirect(name: string, args: unknown): Promise<unknown> {
    return this.invoker.callToolDirect(name, args);
  }

  setClientLogLevel(level: ClientLogLevel): void {
    this.clientLogLevel = level;
    this.logger.debug({ level }, '[Server] Client log level set');
  }

  getClientLogLevel(): ClientLogLevel {
    return this.clientLogLevel;
  }

  listTools(): ToolEntry[] {
    return this.registry.list('tool').map(toToolEntry);
  }

  listResources(): ResourceEntry[] {
    return this.registry.list('resource').map(toResourceEntry);
  }

  listPrompts(): PromptEntry[] {
    return this.registry.list('prompt').map(toPromptEntry);
  }

  openApiDocument(): OpenApiDocument {
    return buildOpenApiDocument(this.info, this.registry);
  }

  discoveryDocument(): DiscoveryDocument {
    return buildDiscoveryDocument(this.info);
  }

  summary(): ServerSummary {
    return buildSummary(this.info, this.registry);
  }

  /** Context log and progress events go out to every open stream */
  private createContextSink(): ContextSink {
    return {
      log: (entry) => {
        if (!meetsClientLevel(this.clientLogLevel, entry.level)) {
          return;
        }
        void this.streams.notify({
          jsonrpc: '2.0',
          method: NOTIFICATION_METHOD.message,
          params: {
            level: entry.level,
            logger: entry.logger,
            data: entry.data === undefined ? entry.message : { message: entry.message, data: entry.data }
          }
        });
      },
      progress: (update) => {
        void this.streams.notify({
          jsonrpc: '2.0',
          method: NOTIFICATION_METHOD.progress,
          params: { ...update }
        });
      }
    };
  }
}
