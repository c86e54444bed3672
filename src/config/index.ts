import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { ConfigSchema, type Config } from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError, toError } from '../errors/index.js';

type Section = keyof Config;
type RawConfig = Record<Section, Record<string, unknown>>;

const SECTIONS: readonly Section[] = ['server', 'logging', 'exporter', 'hardware', 'scan'];

interface EnvBinding {
  names: string[];
  section: Section;
  key: string;
  parse: (value: string) => unknown;
}

const asString = (value: string): string => value;
const asInt = (value: string): number => (/^-?\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN);
const asLower = (value: string): string => value.trim().toLowerCase();

/**
 * Environment variables understood by the exporter. The first name that is
 * set wins; bare LOG_LEVEL and VERSION are accepted for older deployments.
 */
const ENV_BINDINGS: EnvBinding[] = [
  { names: ['DISK_EXPORTER_PORT'], section: 'server', key: 'port', parse: asInt },
  { names: ['DISK_EXPORTER_HOST'], section: 'server', key: 'host', parse: asString },
  { names: ['NODE_ENV'], section: 'server', key: 'nodeEnv', parse: asString },

  { names: ['DISK_EXPORTER_LOG_LEVEL', 'LOG_LEVEL'], section: 'logging', key: 'level', parse: asLower },
  { names: ['DISK_EXPORTER_LOG_FORMAT'], section: 'logging', key: 'format', parse: asLower },
  { names: ['DISK_EXPORTER_LOG_DIR'], section: 'logging', key: 'dir', parse: asString },
  { names: ['DISK_EXPORTER_LOG_MAX_FILES'], section: 'logging', key: 'maxFiles', parse: asInt },
  { names: ['DISK_EXPORTER_LOG_MAX_SIZE'], section: 'logging', key: 'maxSize', parse: asString },

  { names: ['DISK_EXPORTER_VERSION', 'VERSION'], section: 'exporter', key: 'version', parse: asString },

  { names: ['DISK_EXPORTER_SYS_BLOCK_PATH'], section: 'hardware', key: 'sysBlockPath', parse: asString },
  { names: ['DISK_EXPORTER_DEV_PATH'], section: 'hardware', key: 'devPath', parse: asString },
  { names: ['DISK_EXPORTER_BY_ID_PATH'], section: 'hardware', key: 'byIdPath', parse: asString },
  { names: ['DISK_EXPORTER_SMARTCTL_PATH'], section: 'hardware', key: 'smartctlPath', parse: asString },
  { names: ['DISK_EXPORTER_SMARTCTL_DEVICE_TYPE'], section: 'hardware', key: 'smartctlDeviceType', parse: asLower },
  { names: ['DISK_EXPORTER_PROBE_TIMEOUT_MS'], section: 'hardware', key: 'probeTimeoutMs', parse: asInt },
  { names: ['DISK_EXPORTER_ZPOOL_PATH'], section: 'hardware', key: 'zpoolPath', parse: asString },
  { names: ['DISK_EXPORTER_ZPOOL_TIMEOUT_MS'], section: 'hardware', key: 'zpoolTimeoutMs', parse: asInt },

  { names: ['DISK_EXPORTER_SCAN_ATTEMPTS'], section: 'scan', key: 'attempts', parse: asInt },
  { names: ['DISK_EXPORTER_SCAN_INTERVAL_MS'], section: 'scan', key: 'intervalMs', parse: asInt },
  { names: ['DISK_EXPORTER_SCAN_CONCURRENCY'], section: 'scan', key: 'concurrency', parse: asInt },
  { names: ['DISK_EXPORTER_COOLDOWN_MS'], section: 'scan', key: 'cooldownMs', parse: asInt },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from environment variables and config files
 * Priority: Environment Variables > Config File > Defaults
 */
export class ConfigLoader {
  private raw: RawConfig;
  private config: Config;

  constructor() {
    // Load .env file if it exists
    loadEnv();

    this.raw = {
      server: { ...defaultConfig.server },
      logging: { ...defaultConfig.logging },
      exporter: { ...defaultConfig.exporter },
      hardware: { ...defaultConfig.hardware },
      scan: { ...defaultConfig.scan },
    };

    this.loadFromFile();
    this.loadFromEnv();
    this.config = this.validate();
  }

  /**
   * Load configuration from a JSON file, by default config/default.json
   */
  private loadFromFile(): void {
    const configPath =
      process.env['DISK_EXPORTER_CONFIG_FILE'] ?? join(process.cwd(), 'config', 'default.json');
    if (!existsSync(configPath)) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      console.warn(`Failed to load config file ${configPath}: ${toError(error).message}`);
      return;
    }

    if (!isRecord(parsed)) {
      console.warn(`Ignoring config file ${configPath}: top level is not an object`);
      return;
    }

    for (const section of SECTIONS) {
      const value = parsed[section];
      if (isRecord(value)) {
        Object.assign(this.raw[section], value);
      }
    }
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(): void {
    const env = process.env;

    for (const binding of ENV_BINDINGS) {
      const name = binding.names.find((candidate) => env[candidate] !== undefined);
      const value = name === undefined ? undefined : env[name];
      if (value !== undefined) {
        this.raw[binding.section][binding.key] = binding.parse(value);
      }
    }
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(): Config {
    const result = ConfigSchema.safeParse(this.raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Configuration validation failed: ${issues}`, {
        issues: result.error.issues,
      });
    }
    return result.data;
  }

  public getConfig(): Config {
    return this.config;
  }
}

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader();
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export type { Config, HardwareConfig, ScanConfig } from './schema.js';
