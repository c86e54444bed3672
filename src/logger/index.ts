import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import type { Config } from '../config/schema.js';
import { ExporterError } from '../errors/index.js';

/**
 * Logger module using Winston
 * Provides structured logging with different formats and transports
 */

/**
 * Render one logfmt value, quoting when it contains spaces, quotes or '='
 */
export function formatLogfmtValue(value: unknown): string {
  const text =
    typeof value === 'string'
      ? value
      : value instanceof Error
        ? value.message
        : typeof value === 'object' && value !== null
          ? JSON.stringify(value)
          : String(value);

  if (text === '' || /[\s"=\\]/.test(text)) {
    return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')}"`;
  }
  return text;
}

/**
 * Render a record as `key=value` pairs in insertion order
 */
export function formatLogfmt(fields: Record<string, unknown>): string {
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatLogfmtValue(value)}`)
    .join(' ');
}

export class Logger {
  private logger: winston.Logger;
  private config: Config['logging'];

  constructor(config: Config['logging'], instance?: winston.Logger) {
    this.config = config;
    if (instance) {
      this.logger = instance;
    } else {
      this.ensureLogDirectory();
      this.logger = this.createLogger();
    }
  }

  /**
   * Ensure log directory exists when file logging is enabled
   */
  private ensureLogDirectory(): void {
    if (this.config.dir && !existsSync(this.config.dir)) {
      mkdirSync(this.config.dir, { recursive: true });
    }
  }

  private createLogger(): winston.Logger {
    return winston.createLogger({
      level: this.config.level,
      format: this.getFormats(),
      transports: this.getTransports(),
      exitOnError: false,
    });
  }

  /**
   * Get log formats based on configuration
   */
  private getFormats(): winston.Logform.Format {
    const timestamp = winston.format.timestamp();

    const errors = winston.format.errors({ stack: true });

    switch (this.config.format) {
      case 'json':
        return winston.format.combine(timestamp, errors, winston.format.json());

      case 'pretty':
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, ...metadata }) => {
            let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
            if (Object.keys(metadata).length > 0) {
              msg += ` ${JSON.stringify(metadata, null, 2)}`;
            }
            return msg;
          })
        );

      case 'simple':
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.printf(({ timestamp, level, message }) => {
            return `${String(timestamp)} [${level}]: ${String(message)}`;
          })
        );

      case 'logfmt':
      default:
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.printf(({ timestamp, level, message, ...metadata }) => {
            return formatLogfmt({ ts: timestamp, level, msg: message, ...metadata });
          })
        );
    }
  }

  /**
   * Get transports based on configuration
   */
  private getTransports(): winston.transport[] {
    const transports: winston.transport[] = [new winston.transports.Console()];

    if (this.config.dir) {
      transports.push(
        new winston.transports.File({
          filename: join(this.config.dir, 'disk-exporter-combined.log'),
          maxsize: this.parseSize(this.config.maxSize),
          maxFiles: this.config.maxFiles,
        })
      );

      transports.push(
        new winston.transports.File({
          filename: join(this.config.dir, 'disk-exporter-error.log'),
          level: 'error',
          maxsize: this.parseSize(this.config.maxSize),
          maxFiles: this.config.maxFiles,
        })
      );
    }

    return transports;
  }

  /**
   * Parse size string to bytes
   */
  private parseSize(size: string): number {
    const units: Record<string, number> = {
      b: 1,
      k: 1024,
      m: 1024 * 1024,
      g: 1024 * 1024 * 1024,
    };

    const match = size.toLowerCase().match(/^(\d+)([bkmg])$/);
    const num = match?.[1];
    const unit = match?.[2];
    if (!num || !unit) {
      return 10 * 1024 * 1024;
    }

    return parseInt(num, 10) * (units[unit] ?? 1);
  }

  debug(message: string, metadata?: object): void {
    this.logger.debug(message, metadata);
  }

  info(message: string, metadata?: object): void {
    this.logger.info(message, metadata);
  }

  warn(message: string, metadata?: object): void {
    this.logger.warn(message, metadata);
  }

  /**
   * Log error message, flattening exporter error codes into the metadata
   */
  error(message: string, error?: Error, metadata?: object): void {
    const errorMetadata = error
      ? {
          error: error.message,
          ...(error instanceof ExporterError ? { code: error.code, severity: error.severity } : {}),
          ...metadata,
        }
      : metadata;

    this.logger.error(message, errorMetadata);
  }

  /**
   * Create child logger with additional metadata
   */
  child(metadata: object): Logger {
    return new Logger(this.config, this.logger.child(metadata));
  }

  /**
   * Flush and close all transports
   */
  close(): void {
    this.logger.close();
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get logger singleton
 */
export function getLogger(config?: Config['logging']): Logger {
  if (!loggerInstance && config) {
    loggerInstance = new Logger(config);
  } else if (!loggerInstance) {
    throw new Error('Logger not initialized. Call getLogger with config first.');
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}
