import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty', 'logfmt']);
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(9635),
  host: z.string().default('0.0.0.0'),
  nodeEnv: NodeEnvSchema.default('production'),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('logfmt'),
  dir: z.string().optional(),
  maxFiles: z.number().int().min(1).default(10),
  maxSize: z.string().default('10m'),
});

export const ExporterConfigSchema = z.object({
  name: z.string().default('disk-status-exporter'),
  version: z.string().default('unknown'),
});

export const HardwareConfigSchema = z.object({
  sysBlockPath: z.string().min(1).default('/sys/block'),
  devPath: z.string().min(1).default('/dev'),
  byIdPath: z.string().min(1).default('/dev/disk/by-id'),
  smartctlPath: z.string().min(1).default('smartctl'),
  smartctlDeviceType: z.string().min(1).default('sat'),
  probeTimeoutMs: z.number().int().min(1).default(10000),
  zpoolPath: z.string().min(1).default('zpool'),
  zpoolTimeoutMs: z.number().int().min(1).default(5000),
});

export const ScanConfigSchema = z.object({
  attempts: z.number().int().min(1).max(20).default(3),
  intervalMs: z.number().int().min(0).default(250),
  concurrency: z.number().int().min(1).max(64).default(4),
  cooldownMs: z.number().int().min(0).default(300000),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  server: ServerConfigSchema,
  logging: LoggingConfigSchema,
  exporter: ExporterConfigSchema,
  hardware: HardwareConfigSchema,
  scan: ScanConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type HardwareConfig = z.infer<typeof HardwareConfigSchema>;
export type ScanConfig = z.infer<typeof ScanConfigSchema>;
