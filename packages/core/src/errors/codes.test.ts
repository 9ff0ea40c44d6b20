/**
 * Tests for JSON-RPC error codes and error classes
 */

import { describe, expect, it } from 'vitest';
import {
  ArgumentError,
  ConfigError,
  DuplicateKeyError,
  NotFoundError,
  ProtocolError,
  RegistrySealedError,
  RpcErrorCode,
  toErrorMessage
} from './index.js';

describe('RpcErrorCode', () => {
  it('should use the JSON-RPC 2.0 reserved codes', () => {
    expect(RpcErrorCode.PARSE_ERROR).toBe(-32700);
    expect(RpcErrorCode.INVALID_REQUEST).toBe(-32600);
    expect(RpcErrorCode.METHOD_NOT_FOUND).toBe(-32601);
    expect(RpcErrorCode.INVALID_PARAMS).toBe(-32602);
    expect(RpcErrorCode.INTERNAL_ERROR).toBe(-32603);
  });

  it('should have unique codes', () => {
    const codes = Object.values(RpcErrorCode);
    expect(new Set(codes).size).toBe(codes.length);
  });
});

describe('error classes', () => {
  it('should describe duplicate keys by category', () => {
    const error = new DuplicateKeyError('resource', 'config://app');
    expect(error.message).toBe('Resource already registered: config://app');
    expect(error.name).toBe('DuplicateKeyError');
    expect(error.key).toBe('config://app');
  });

  it('should map not-found to method-not-found', () => {
    const error = new NotFoundError('tool', 'missing');
    expect(error.message).toBe('Tool not found: missing');
    expect(error.code).toBe(-32601);
    expect(error).toBeInstanceOf(Error);
  });

  it('should name the sealed registration', () => {
    const error = new RegistrySealedError('prompt', 'greet');
    expect(error.message).toBe(
      "Registry is sealed; cannot register prompt 'greet' after serving has started"
    );
  });

  it('should carry protocol codes and causes', () => {
    const cause = new Error('root');
    const error = new ProtocolError(RpcErrorCode.INVALID_PARAMS, 'bad params', { cause });
    expect(error.code).toBe(-32602);
    expect(error.cause).toBe(cause);
  });

  it('should keep the offending argument name', () => {
    const error = new ArgumentError('Missing required argument: a', { argument: 'a' });
    expect(error.argument).toBe('a');
    expect(new ConfigError('bad').name).toBe('ConfigError');
  });
});

describe('toErrorMessage', () => {
  it('should read Error messages', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('should pass strings through', () => {
    expect(toErrorMessage('plain')).toBe('plain');
  });

  it('should serialise other values', () => {
    expect(toErrorMessage({ reason: 'x' })).toBe('{"reason":"x"}');
    expect(toErrorMessage(undefined)).toBe('undefined');
  });
});
