import type { Config } from './schema.js';

/**
 * Default configuration values
 * These are used when no environment variables or config files override them
 */
export const defaultConfig: Config = {
  server: {
    port: 9635,
    host: '0.0.0.0',
    nodeEnv: 'production',
  },
  logging: {
    level: 'info',
    format: 'logfmt',
    dir: undefined,
    maxFiles: 10,
    maxSize: '10m',
  },
  exporter: {
    name: 'disk-status-exporter',
    version: 'unknown',
  },
  hardware: {
    sysBlockPath: '/sys/block',
    devPath: '/dev',
    byIdPath: '/dev/disk/by-id',
    smartctlPath: 'smartctl',
    smartctlDeviceType: 'sat',
    probeTimeoutMs: 10000,
    zpoolPath: 'zpool',
    zpoolTimeoutMs: 5000,
  },
  scan: {
    attempts: 3,
    intervalMs: 250,
    concurrency: 4,
    cooldownMs: 300000,
  },
};
