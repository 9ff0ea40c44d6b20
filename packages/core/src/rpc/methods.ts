import type { NotificationMethod, RpcMethod } from '../types/rpc.js';

/**
 * RPC method name constants. Single source of truth.
 * Keep values strictly equal to RpcMethod literals.
 */
export const RPC_METHOD = {
  initialize: 'initialize',
  ping: 'ping',
  tools_list: 'tools/list',
  tools_call: 'tools/call',
  resources_list: 'resources/list',
  resources_read: 'resources/read',
  prompts_list: 'prompts/list',
  prompts_get: 'prompts/get',
  logging_setLevel: 'logging/setLevel'
} as const satisfies Record<string, RpcMethod>;

export const NOTIFICATION_METHOD = {
  initialized: 'notifications/initialized',
  cancelled: 'notifications/cancelled',
  progress: 'notifications/progress',
  message: 'notifications/message'
} as const satisfies Record<string, NotificationMethod>;
