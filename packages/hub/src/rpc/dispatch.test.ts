import type { RpcMethod } from '@plinth/core';
import { describe, expect, it } from 'vitest';
import { errorResponse, isRpcMethod, RPC_DISPATCH } from './dispatch.js';

// Keep this list typed to RpcMethod so compiler forces updates on union change.
const ALL_METHODS: RpcMethod[] = [
  'initialize',
  'ping',
  'tools/list',
  'tools/call',
  'resources/list',
  'resources/read',
  'prompts/list',
  'prompts/get',
  'logging/setLevel'
];

describe('RPC dispatch mapping', () => {
  it('has handler for every RpcMethod', () => {
    for (const m of ALL_METHODS) {
      expect(typeof RPC_DISPATCH[m]).toBe('function');
    }
  });

  it('does not expose unknown methods', () => {
    expect(Object.keys(RPC_DISPATCH).sort()).toEqual([...ALL_METHODS].sort());
  });

  it('isRpcMethod recognizes supported/unsupported methods', () => {
    expect(isRpcMethod('tools/list')).toBe(true);
    expect(isRpcMethod('resources/templates/list')).toBe(false);
    expect(isRpcMethod('toString')).toBe(false);
  });
});

describe('errorResponse', () => {
  it('builds a failure envelope', () => {
    expect(errorResponse(null, -32700, 'Parse error')).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32700, message: 'Parse error' }
    });
  });
});
