import { serve, type ServerType } from '@hono/node-server';
import type { Hono } from 'hono';
import type { Logger } from './logger/index.js';
import type { Config } from './config/schema.js';
import { LifecycleManager, type LifecycleOptions } from './lifecycle/index.js';
import { HealthManager, HealthStatus } from './health/index.js';
import { DiskScanner } from './hardware/index.js';
import { createExporterApp } from './http/app.js';
import { ErrorCode, ServerError, toError } from './errors/index.js';
import { commandExists } from './utils/exec.js';

/**
 * Disk Status Exporter
 * Owns the scanner, the HTTP listener and their lifecycle
 */
export class DiskStatusExporter {
  private logger: Logger;
  private config: Config;
  private lifecycle: LifecycleManager;
  private health: HealthManager;
  private scanner: DiskScanner;
  private app: Hono;
  private httpServer?: ServerType;

  constructor(config: Config, logger: Logger, lifecycleOptions?: LifecycleOptions) {
    this.config = config;
    this.logger = logger;

    this.scanner = new DiskScanner(config, logger.child({ component: 'scanner' }));
    this.lifecycle = new LifecycleManager(logger, lifecycleOptions);
    this.health = new HealthManager(logger);
    this.app = createExporterApp({
      scanner: this.scanner,
      health: this.health,
      logger: logger.child({ component: 'http' }),
      version: config.exporter.version,
    });

    this.setupLifecycleHooks();
    this.setupHealthChecks();
  }

  /**
   * Setup lifecycle hooks
   */
  private setupLifecycleHooks(): void {
    this.lifecycle.onStartup('log-configuration', async () => {
      const { scan, hardware } = this.config;
      this.logger.info('Initializing exporter', {
        name: this.config.exporter.name,
        version: this.config.exporter.version,
        attempts: scan.attempts,
        intervalMs: scan.intervalMs,
        concurrency: scan.concurrency,
        cooldownMs: scan.cooldownMs,
        deviceType: hardware.smartctlDeviceType,
      });
    });

    this.lifecycle.onStartup('check-smartctl', async () => {
      if (!(await commandExists(this.config.hardware.smartctlPath))) {
        this.logger.warn('smartctl not found, every disk will report error', {
          smartctlPath: this.config.hardware.smartctlPath,
        });
      }
    });

    this.lifecycle.onShutdown('close-http-server', async () => {
      await this.stop();
    });
  }

  /**
   * Setup health checks
   */
  private setupHealthChecks(): void {
    this.health.registerCheck(
      'smartctl',
      async () => {
        const available = await commandExists(this.config.hardware.smartctlPath);
        return {
          status: available ? HealthStatus.HEALTHY : HealthStatus.UNHEALTHY,
          message: available ? 'smartctl available' : 'smartctl not found',
          metadata: { path: this.config.hardware.smartctlPath },
        };
      },
      true
    );

    // Pool labels are optional, so a missing zpool never degrades readiness
    this.health.registerCheck('zpool', async () => {
      const available = await commandExists(this.config.hardware.zpoolPath);
      return {
        status: HealthStatus.HEALTHY,
        message: available ? 'zpool available' : 'zpool not found, pool labels disabled',
        metadata: { path: this.config.hardware.zpoolPath, available },
      };
    });

    this.health.registerCheck('last-scan', async () => {
      const error = this.scanner.getLastError();
      const snapshot = this.scanner.getLastSnapshot();
      if (error) {
        return { status: HealthStatus.DEGRADED, message: error.message };
      }
      return {
        status: HealthStatus.HEALTHY,
        message: snapshot ? 'Last scan succeeded' : 'No scan yet',
        metadata: snapshot
          ? { startedAt: snapshot.startedAt, durationMs: snapshot.durationMs, scannedHdds: snapshot.counters.scannedHdds }
          : undefined,
      };
    });
  }

  /**
   * Run startup hooks and start listening
   */
  async start(): Promise<void> {
    try {
      await this.lifecycle.startup();

      const { port, host } = this.config.server;
      await new Promise<void>((resolve) => {
        this.httpServer = serve({ fetch: this.app.fetch, port, hostname: host }, (info) => {
          this.logger.info('Exporter listening', { host, port: info.port });
          resolve();
        });
      });
    } catch (error) {
      const failure = new ServerError(
        'Failed to start exporter',
        ErrorCode.SERVER_START_FAILED,
        { port: this.config.server.port },
        toError(error)
      );
      this.logger.error(failure.message, failure);
      throw failure;
    }
  }

  /**
   * Stop accepting connections
   */
  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;

    this.logger.info('Closing HTTP listener');
    this.httpServer = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  getApp(): Hono {
    return this.app;
  }

  getScanner(): DiskScanner {
    return this.scanner;
  }

  getHealth(): HealthManager {
    return this.health;
  }

  getLifecycle(): LifecycleManager {
    return this.lifecycle;
  }
}
