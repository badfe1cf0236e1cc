/**
 * Config Schema Validation
 *
 * Zod schemas for the bridge client configuration file and environment
 * overrides.
 */

import { z } from 'zod';

// --- Reusable Validators ---

const portSchema = z.number().int().min(1).max(65535);

const hostSchema = z.string().min(1).refine(
  (val) => {
    const ipv4 = /^(\d{1,3}\.){3}\d{1,3}$/;
    const hostname = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*$/;
    return val === 'localhost' || ipv4.test(val) || hostname.test(val);
  },
  { message: 'Invalid host: must be IP address or hostname' }
);

const durationSchema = z.number().int().min(1);

// --- Bridge Session Config ---

export const sessionConfigSchema = z.object({
  host: hostSchema.default('127.0.0.1'),
  port: portSchema.default(8080),
  timeoutMs: durationSchema.default(5000),
  pollIntervalMs: z.number().int().min(0).default(50),
  maxConsecutiveFailures: z.number().int().min(1).default(10),
  debug: z.boolean().default(false),
  readyBackoffMs: durationSchema.default(100),
  emulate: z.boolean().default(false),
});

// --- Logging Config ---

const loggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  pretty: z.boolean().optional(),
});

// --- Full File Schema ---

export const clientConfigSchema = z.object({
  bridge: sessionConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

// --- Type Exports ---

export type SessionConfigInput = z.input<typeof sessionConfigSchema>;
export type SessionConfigOutput = z.output<typeof sessionConfigSchema>;
export type ClientConfigInput = z.input<typeof clientConfigSchema>;
export type ClientConfigOutput = z.output<typeof clientConfigSchema>;

/**
 * Validate a full config document (YAML file contents plus env overrides)
 */
export function validateClientConfig(data: unknown): ClientConfigOutput {
  return clientConfigSchema.parse(data);
}

/**
 * Validate bridge session settings on their own, filling defaults
 */
export function validateSessionConfig(data: unknown): SessionConfigOutput {
  return sessionConfigSchema.parse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
