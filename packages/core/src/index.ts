/**
 * @plinth/core - protocol constants, envelope types, errors and configuration
 *
 * Pure definitions with no side effects.
 * Dependency direction: core → runtime → hub → server
 */

export * from './constants.js';
// Error system
export * from './errors/index.js';
// Logger contract
export * from './logger.js';
// RPC method table
export * from './rpc/methods.js';
// Configuration schemas
export * from './schemas.js';
// Protocol and types
export * from './types/index.js';
