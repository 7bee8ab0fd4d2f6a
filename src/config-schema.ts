/**
 * Config Schema Validation
 *
 * Zod schemas for the service's YAML configuration. Defaults are filled in
 * by the schema so the loader only has to map the parsed output.
 */

import { z } from 'zod';

// --- Reusable Validators ---

// 0 asks the OS for a free port
const portSchema = z.number().int().min(0).max(65535);

const hostSchema = z.string().min(1).refine(
  (val) => {
    const ipv4 = /^(\d{1,3}\.){3}\d{1,3}$/;
    const hostname = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*$/;
    return val === 'localhost' || val === '0.0.0.0' || ipv4.test(val) || hostname.test(val);
  },
  { message: 'Invalid host: must be IP address or hostname' }
);

const streamUrlSchema = z.string().url().refine(
  (val) => /^(https?|wss?):\/\//.test(val),
  { message: 'Stream address must be an http(s) or ws(s) URL' }
);

const deviceIdSchema = z.string().min(1).max(128);

// --- Devices ---

const deviceSchema = z.object({
  id: deviceIdSchema,
  address: streamUrlSchema,
  type: z.enum(['sse', 'websocket']),
  maxReconnectAttempts: z.number().int().min(0).optional(),
}).refine(
  (d) => (d.type === 'sse') === /^https?:/.test(d.address),
  { message: 'sse devices need an http(s) address, websocket devices a ws(s) address', path: ['address'] }
);

// --- Sections ---

const serverConfigSchema = z.object({
  host: hostSchema.default('0.0.0.0'),
  port: portSchema.default(8080),
});

const reconnectConfigSchema = z.object({
  baseDelayMs: z.number().int().min(1).default(1000),
  maxDelayMs: z.number().int().min(1).default(30000),
  jitter: z.number().min(0).max(1).default(0),
  maxAttempts: z.number().int().min(0).default(5),
}).refine(
  (r) => r.maxDelayMs >= r.baseDelayMs,
  { message: 'maxDelayMs must be >= baseDelayMs', path: ['maxDelayMs'] }
);

const storageConfigSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('memory') }),
  z.object({ type: z.literal('yaml'), dataDir: z.string().min(1).default('./data/connections') }),
]);

const vendorConfigSchema = z.object({
  headers: z.record(z.string()).default({}),
  handshakeTimeoutMs: z.number().int().min(100).default(10000),
});

const loggingConfigSchema = z.object({
  // Unset: LOG_LEVEL, then 'info'
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
});

// --- Full Config Schema ---

export const appConfigSchema = z.object({
  server: serverConfigSchema.default({}),
  reconnect: reconnectConfigSchema.default({}),
  staleAfterMs: z.number().int().min(0).default(60000),
  storage: storageConfigSchema.default({ type: 'yaml' }),
  vendor: vendorConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
  devices: z.array(deviceSchema).default([]),
}).refine(
  (config) => new Set(config.devices.map((d) => d.id)).size === config.devices.length,
  { message: 'Duplicate device id detected', path: ['devices'] }
);

// --- Type Exports ---

export type AppConfig = z.output<typeof appConfigSchema>;

export function validateConfig(data: unknown): AppConfig {
  return appConfigSchema.parse(data);
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
