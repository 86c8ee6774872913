/**
 * Config Schema Validation
 *
 * Zod schemas for the monitor's YAML configuration. Every section is
 * optional; defaults are filled in here so the rest of the code works
 * with a fully populated Config.
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

const percentSchema = z.number().min(0).max(100);

// --- Sections ---

export const DEFAULT_TCP_HOST = '192.168.0.114';

const connectionSchema = z.object({
  tcpHost: hostSchema.default(DEFAULT_TCP_HOST),
  tcpPort: portSchema.default(4403),
  serialPort: z.string().min(1).optional(),
  baudRate: z.number().int().positive().default(115200),
  connectTimeoutMs: z.number().int().min(100).default(10000),
  fetchTimeoutMs: z.number().int().min(100).default(15000),
}).default({});

const samplingSchema = z.object({
  mode: z.enum(['oneshot', 'continuous']).default('continuous'),
  intervalSeconds: z.number().positive().default(30),
}).default({});

const alertsSchema = z.object({
  activeThresholdHours: z.number().positive().default(2),
  batteryThreshold: percentSchema.default(15),
  batteryMargin: z.number().min(0).max(50).default(5),
  criticalBatteryLevel: percentSchema.default(5),
}).default({}).refine(
  (alerts) => alerts.criticalBatteryLevel <= alerts.batteryThreshold,
  { message: 'criticalBatteryLevel must not exceed batteryThreshold', path: ['criticalBatteryLevel'] }
);

const historySchema = z.object({
  dataDir: z.string().min(1).default('data'),
  minSaveIntervalSeconds: z.number().min(0).default(0),
}).default({});

const httpSchema = z.object({
  enabled: z.boolean().default(false),
  host: z.string().min(1).default('127.0.0.1'),
  port: portSchema.default(8080),
}).default({});

const loggingSchema = z.object({
  verbose: z.boolean().default(false),
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  pretty: z.boolean().optional(),
}).default({});

const nodeIdSchema = z.string().min(1);

// --- Top-level Config Schema ---

export const configSchema = z.object({
  connection: connectionSchema,
  sampling: samplingSchema,
  alerts: alertsSchema,
  history: historySchema,
  http: httpSchema,
  logging: loggingSchema,
  favorites: z.array(nodeIdSchema).default([]),
  /** Extra or corrected hardware names, keyed by numeric model code */
  hardwareModels: z.record(z.string().regex(/^\d+$/, 'hardware model keys must be numeric codes'), z.string().min(1)).default({}),
});

export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

export function validateConfig(input: unknown): Config {
  return configSchema.parse(input);
}

/**
 * Format Zod validation errors into human-readable messages.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
