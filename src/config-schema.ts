/**
 * Config Schema Validation
 *
 * Zod schemas for validating the Light Deck configuration.
 */

import { z } from 'zod';

// --- Reusable Validators ---

const portSchema = z.number().int().min(1).max(65535);

const hostSchema = z.string().min(1).refine(
  (val) => {
    // Accept IP addresses, hostnames, and special values
    const ipv4 = /^(\d{1,3}\.){3}\d{1,3}$/;
    const hostname = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*$/;
    return val === 'localhost' || val === '0.0.0.0' || ipv4.test(val) || hostname.test(val);
  },
  { message: 'Invalid host: must be IP address or hostname' }
);

// --- Sections ---

const serverConfigSchema = z.object({
  listenAddress: hostSchema.default('0.0.0.0'),
  port: portSchema.default(8080),
});

const bridgeConfigSchema = z.object({
  configPath: z.string().min(1).default('bridge-config.json'),
});

const sessionConfigSchema = z.object({
  elementQueryTimeoutMs: z.number().int().min(100).default(5000),
  pendingPageTtlMs: z.number().int().min(1000).default(60000),
});

const uiConfigSchema = z.object({
  title: z.string().min(1).default('Light Deck'),
});

const loggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  pretty: z.boolean().optional(),
});

/** Initial user-defined light groups: group name → light IDs */
const groupsSchema = z.record(z.string().min(1), z.array(z.string().regex(/^[A-Za-z0-9_-]+$/, {
  message: 'Light IDs may only contain letters, digits, underscores and hyphens',
})));

// --- Full Config Schema ---

export const lightDeckConfigSchema = z.object({
  server: serverConfigSchema.default({}),
  bridge: bridgeConfigSchema.default({}),
  session: sessionConfigSchema.default({}),
  ui: uiConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  groups: groupsSchema.default({}),
});

// --- Type Exports ---

export type LightDeckConfigInput = z.input<typeof lightDeckConfigSchema>;
export type LightDeckConfig = z.output<typeof lightDeckConfigSchema>;

export function validateConfig(data: unknown): LightDeckConfig {
  return lightDeckConfigSchema.parse(data);
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
