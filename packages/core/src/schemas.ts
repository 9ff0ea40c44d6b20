/**
 * Configuration schemas for plinth
 * Using Zod for runtime validation and type inference
 */

import { z } from 'zod';

export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_PORT = 8000;
export const DEFAULT_KEEPALIVE_MS = 30000; // 30 seconds
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000; // 5 seconds

export const LogLevelSchema = z
  .enum(['silent', 'error', 'warn', 'info', 'debug', 'trace'])
  .describe('Process log level');

export const LogFormatSchema = z.enum(['json', 'pretty']).describe('Process log output format');

/**
 * Server process configuration
 */
export const ServerConfigSchema = z.object({
  name: z.string().min(1).describe('Server name reported to clients'),
  version: z.string().min(1).default('1.0.0').describe('Server version reported to clients'),
  instructions: z.string().optional().describe('Usage instructions returned by initialize'),
  host: z.string().min(1).default(DEFAULT_HOST).describe('Listen address'),
  port: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT).describe('Listen port'),
  pathPrefix: z
    .string()
    .default('')
    .describe('Path prefix stripped before routing (reverse-proxied deployments)'),
  logLevel: LogLevelSchema.default('info'),
  logFormat: LogFormatSchema.default('json'),
  keepAliveMs: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_KEEPALIVE_MS)
    .describe('Stream keep-alive interval in milliseconds, 0 disables'),
  shutdownTimeoutMs: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_SHUTDOWN_TIMEOUT_MS)
    .describe('Grace period before open sockets are destroyed on shutdown')
});

export type ServerConfigInput = z.input<typeof ServerConfigSchema>;
export type ServerConfig = z.output<typeof ServerConfigSchema>;

export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Safe parse with formatted issues
 */
export function safeParseServerConfig(
  data: unknown
): { success: true; data: ServerConfig } | { success: false; issues: string[] } {
  const result = ServerConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    issues: result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
  };
}
