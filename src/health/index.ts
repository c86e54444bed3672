import type { Logger } from '../logger/index.js';
import { toError } from '../errors/index.js';

/**
 * Readiness checks for the exporter: is smartctl reachable, is zpool
 * available for pool labels, did the last scan succeed
 */

export enum HealthStatus {
  HEALTHY = 'healthy',
  DEGRADED = 'degraded',
  UNHEALTHY = 'unhealthy',
}

export interface HealthCheck {
  name: string;
  checker: () => Promise<HealthCheckResult>;
  critical: boolean; // If true, failure marks entire system as unhealthy
}

export interface HealthCheckResult {
  status: HealthStatus;
  message?: string;
  metadata?: Record<string, unknown>;
}

export interface CheckReport extends HealthCheckResult {
  critical: boolean;
  durationMs: number;
}

export interface SystemHealth {
  status: HealthStatus;
  timestamp: number;
  uptime: number;
  checks: Record<string, CheckReport>;
}

/**
 * A failing critical check makes the exporter unhealthy; any other
 * non-healthy result only degrades it
 */
export function aggregateStatus(reports: Iterable<CheckReport>): HealthStatus {
  let status = HealthStatus.HEALTHY;
  for (const report of reports) {
    if (report.status === HealthStatus.HEALTHY) continue;
    if (report.critical && report.status === HealthStatus.UNHEALTHY) {
      return HealthStatus.UNHEALTHY;
    }
    status = HealthStatus.DEGRADED;
  }
  return status;
}

export class HealthManager {
  private checks: Map<string, HealthCheck> = new Map();
  private startTime: number;

  constructor(
    private logger: Logger,
    private clock: () => number = Date.now
  ) {
    this.startTime = clock();
  }

  /**
   * Register a health check
   */
  registerCheck(name: string, checker: () => Promise<HealthCheckResult>, critical = false): void {
    this.checks.set(name, { name, checker, critical });
    this.logger.debug(`Registered health check: ${name} (critical: ${critical})`);
  }

  private async runCheck(check: HealthCheck): Promise<CheckReport> {
    const started = this.clock();
    try {
      const result = await check.checker();
      return { ...result, critical: check.critical, durationMs: this.clock() - started };
    } catch (error) {
      const failure = toError(error);
      this.logger.error(`Health check failed: ${check.name}`, failure);
      return {
        status: HealthStatus.UNHEALTHY,
        message: failure.message,
        critical: check.critical,
        durationMs: this.clock() - started,
      };
    }
  }

  /**
   * Run every check concurrently and aggregate
   */
  async check(): Promise<SystemHealth> {
    const checks = [...this.checks.values()];
    const reports = await Promise.all(checks.map((check) => this.runCheck(check)));

    const byName: Record<string, CheckReport> = {};
    checks.forEach((check, index) => {
      const report = reports[index];
      if (report) byName[check.name] = report;
    });

    const now = this.clock();
    return {
      status: aggregateStatus(reports),
      timestamp: now,
      uptime: now - this.startTime,
      checks: byName,
    };
  }
}
