/**
 * HTTP routes: Prometheus scrape, liveness and readiness
 */

import { Hono } from 'hono';
import type { Logger } from '../logger/index.js';
import { toError } from '../errors/index.js';
import { HealthStatus, type HealthManager } from '../health/index.js';
import { renderScanMetrics } from '../monitoring/index.js';
import type { ScanSnapshot } from '../types/disk.js';

export const METRICS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export interface ScanSource {
  scan(): Promise<ScanSnapshot>;
}

export interface ExporterAppOptions {
  scanner: ScanSource;
  health: HealthManager;
  logger: Logger;
  version: string;
}

export function createExporterApp({ scanner, health, logger, version }: ExporterAppOptions): Hono {
  const app = new Hono();

  app.get('/metrics', async (c) => {
    try {
      const snapshot = await scanner.scan();
      return c.body(renderScanMetrics(snapshot, version), 200, { 'Content-Type': METRICS_CONTENT_TYPE });
    } catch (error) {
      logger.error('Metrics scrape failed', toError(error));
      return c.text('scan failed\n', 500);
    }
  });

  app.get('/healthz', (c) => c.json({ status: 'ok' }));

  app.get('/readyz', async (c) => {
    const report = await health.check();
    return report.status === HealthStatus.UNHEALTHY ? c.json(report, 503) : c.json(report, 200);
  });

  return app;
}
