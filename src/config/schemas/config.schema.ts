import { z } from 'zod';

// =============================================================================
// Output Schemas
// =============================================================================

export const ExecConfigSchema = z.object({
  useServerTime: z.boolean().default(false),
});

export const InfluxDB1ConfigSchema = z.object({
  url: z.string(),
  port: z.number().default(8086),
  username: z.string().default('root'),
  password: z.string().default('root'),
  database: z.string().default('collectd'),
  ssl: z.boolean().default(false),
  verifySsl: z.boolean().default(false),
});

export const InfluxDB2ConfigSchema = z.object({
  url: z.string(),
  port: z.number().default(8086),
  token: z.string(),
  org: z.string().default('fritzbox'),
  bucket: z.string().default('fritzbox'),
  ssl: z.boolean().default(false),
  verifySsl: z.boolean().default(false),
});

// =============================================================================
// Router Connection
// =============================================================================

export const DEFAULT_ADDRESS = '169.254.1.1';
export const DEFAULT_PORT = 49000;

/**
 * Resolved connection settings. Checked when the connection is opened,
 * not when the raw plugin entries are resolved.
 */
export const ConnectionConfigSchema = z.object({
  address: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  user: z.string(),
  password: z.string(),
  reportHostname: z.string().optional(),
  instanceLabel: z.string().optional(),
});

// =============================================================================
// Main Config Schema
// =============================================================================

export const OutputsConfigSchema = z.object({
  exec: ExecConfigSchema.optional(),
  influxdb1: InfluxDB1ConfigSchema.optional(),
  influxdb2: InfluxDB2ConfigSchema.optional(),
}).refine(
  (data) => Object.values(data).some((v) => v !== undefined),
  { message: 'At least one output must be configured' }
);

// Raw key/value entries for the plugin; keys are checked by the plugin itself
export const PluginSectionSchema = z
  .record(z.string(), z.union([z.string(), z.number(), z.boolean()]))
  .default({});

export const HostConfigSchema = z.object({
  interval: z.number().int().positive().default(60),
  plugin: PluginSectionSchema,
  outputs: OutputsConfigSchema,
});

// Type exports
export type HostConfig = z.infer<typeof HostConfigSchema>;
export type OutputsConfig = z.infer<typeof OutputsConfigSchema>;
export type PluginSection = z.infer<typeof PluginSectionSchema>;
export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
