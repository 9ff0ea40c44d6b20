import type { ClientLogLevel, JsonRpcParams, Logger } from '@plinth/core';
import type { CallInfo, CapabilityRegistry, Invoker } from '@plinth/runtime';

export type ServerInfo = {
  name: string;
  version: string;
  instructions?: string;
};

/**
 * What the dispatcher needs from the server it runs in
 */
export type RpcHost = {
  readonly info: ServerInfo;
  readonly registry: CapabilityRegistry;
  readonly invoker: Invoker;
  readonly logger: Logger;
  setClientLogLevel(level: ClientLogLevel): void;
};

/**
 * Method handler. Returns the `result` value or throws; the dispatcher
 * builds the envelope.
 */
export type RpcHandler = (
  host: RpcHost,
  params: JsonRpcParams,
  call: CallInfo
) => Promise<unknown> | unknown;
