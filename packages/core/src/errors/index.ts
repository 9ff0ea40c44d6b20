/**
 * Error classes for plinth
 * Plain Error subclasses carrying a name and an optional cause
 */

import {
  CATEGORY_LABEL,
  type CapabilityCategory,
  RpcErrorCode,
  type RpcErrorCodeValue
} from './codes.js';

export {
  CATEGORY_LABEL,
  type CapabilityCategory,
  RpcErrorCode,
  type RpcErrorCodeValue
} from './codes.js';

type ErrorOptions = { cause?: unknown };

/**
 * Raised at setup time when a name or URI is registered twice
 */
export class DuplicateKeyError extends Error {
  readonly category: CapabilityCategory;
  readonly key: string;

  constructor(category: CapabilityCategory, key: string) {
    super(`${CATEGORY_LABEL[category]} already registered: ${key}`);
    this.name = 'DuplicateKeyError';
    this.category = category;
    this.key = key;
  }
}

export class RegistrySealedError extends Error {
  constructor(category: CapabilityCategory, key: string) {
    super(`Registry is sealed; cannot register ${category} '${key}' after serving has started`);
    this.name = 'RegistrySealedError';
  }
}

/**
 * Unknown tool name, resource URI or prompt name
 */
export class NotFoundError extends Error {
  readonly category: CapabilityCategory;
  readonly key: string;
  readonly code = RpcErrorCode.METHOD_NOT_FOUND;

  constructor(category: CapabilityCategory, key: string) {
    super(`${CATEGORY_LABEL[category]} not found: ${key}`);
    this.name = 'NotFoundError';
    this.category = category;
    this.key = key;
  }
}

/**
 * Malformed envelope, unknown method or bad params
 */
export class ProtocolError extends Error {
  readonly code: RpcErrorCodeValue;

  constructor(code: RpcErrorCodeValue, message: string, options?: ErrorOptions) {
    super(message);
    this.name = 'ProtocolError';
    this.code = code;
    if (options?.cause) this.cause = options.cause;
  }
}

/** Caller-supplied arguments could not be bound to the declared parameters */
export class ArgumentError extends Error {
  readonly argument?: string;

  constructor(message: string, options?: ErrorOptions & { argument?: string }) {
    super(message);
    this.name = 'ArgumentError';
    this.argument = options?.argument;
    if (options?.cause) this.cause = options.cause;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message);
    this.name = 'ConfigError';
    if (options?.cause) this.cause = options.cause;
  }
}

/**
 * Extract a message from anything thrown
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
