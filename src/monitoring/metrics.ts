/**
 * Prometheus Metrics Module
 * Renders scan snapshots in the Prometheus text exposition format
 */

import { powerStateValue } from '../hardware/power-state.js';
import type { ScanResult, ScanSnapshot } from '../types/disk.js';

export type Labels = Record<string, string>;

export interface Gauge {
  name: string;
  value: number;
  labels: Labels;
}

interface MetricFamily {
  help: string;
  samples: Gauge[];
}

/**
 * Escape a label value: backslash, double quote and newline
 */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

export function formatLabels(labels: Labels): string {
  const pairs = Object.entries(labels).map(([key, value]) => `${key}="${escapeLabelValue(value)}"`);
  return pairs.length > 0 ? `{${pairs.join(',')}}` : '';
}

export function formatValue(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  return String(value);
}

/**
 * Metrics Registry
 * Gauge families keyed by name, rendered in the order they were first
 * described. Label order is kept as given.
 */
export class MetricsRegistry {
  private families: Map<string, MetricFamily> = new Map();

  /**
   * Register a family so its HELP and TYPE lines render even without samples
   */
  describe(name: string, help: string): void {
    if (!this.families.has(name)) {
      this.families.set(name, { help, samples: [] });
    }
  }

  /**
   * Set a gauge metric. A repeated name and label set replaces the value.
   */
  setGauge(name: string, help: string, value: number, labels: Labels = {}): void {
    this.describe(name, help);
    const family = this.families.get(name);
    if (!family) return;

    const key = formatLabels(labels);
    const existing = family.samples.find((sample) => formatLabels(sample.labels) === key);
    if (existing) {
      existing.value = value;
    } else {
      family.samples.push({ name, value, labels });
    }
  }

  /**
   * Export metrics in Prometheus text format
   */
  export(): string {
    const lines: string[] = [];

    for (const [name, family] of this.families) {
      lines.push(`# HELP ${name} ${family.help}`);
      lines.push(`# TYPE ${name} gauge`);
      for (const sample of family.samples) {
        lines.push(`${name}${formatLabels(sample.labels)} ${formatValue(sample.value)}`);
      }
    }

    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }

  reset(): void {
    this.families.clear();
  }
}

const HELP = {
  disk_info: 'Static labels describing the disk (type/pool). Always 1.',
  disk_power_state:
    'Current disk power state as a numeric code (0=standby, 1=idle, 2=active_or_idle, 3=idle_a, 4=idle_b, 5=idle_c, 6=active, 7=sleep, -1=unknown, -2=error).',
  disk_power_state_string: 'Current disk power state as a label (state=...). Always 1.',
  disk_exporter_devices_total: 'Block devices seen by the last scan, by outcome.',
  disk_exporter_scan_duration_seconds: 'Wall time of the last scan in seconds.',
  disk_exporter_cooldown_devices: 'Devices whose probes are suspended after a timeout.',
  disk_exporter_build_info: 'Exporter build information. Always 1.',
} as const;

function deviceLabels(result: ScanResult): Labels {
  return {
    device_id: result.persistentId,
    device: result.device,
    type: result.rotationalType,
    pool: result.pool,
  };
}

/**
 * Render one scan as exposition text
 */
export function renderScanMetrics(snapshot: ScanSnapshot, version: string): string {
  const registry = new MetricsRegistry();

  registry.describe('disk_power_state', HELP.disk_power_state);
  registry.describe('disk_power_state_string', HELP.disk_power_state_string);
  registry.describe('disk_info', HELP.disk_info);

  for (const result of snapshot.results) {
    const labels = deviceLabels(result);
    registry.setGauge('disk_info', HELP.disk_info, 1, labels);
    registry.setGauge('disk_power_state', HELP.disk_power_state, powerStateValue(result.state), labels);
    registry.setGauge('disk_power_state_string', HELP.disk_power_state_string, 1, {
      ...labels,
      state: result.state,
    });
  }

  const { counters } = snapshot;
  const kinds: Array<[string, number]> = [
    ['enumerated', counters.enumerated],
    ['scanned_hdds', counters.scannedHdds],
    ['skipped_non_rotational', counters.skippedNonRotational],
    ['skipped_virtual', counters.skippedVirtual],
  ];
  for (const [kind, count] of kinds) {
    registry.setGauge('disk_exporter_devices_total', HELP.disk_exporter_devices_total, count, { kind });
  }

  registry.setGauge(
    'disk_exporter_scan_duration_seconds',
    HELP.disk_exporter_scan_duration_seconds,
    snapshot.durationMs / 1000
  );
  registry.setGauge(
    'disk_exporter_cooldown_devices',
    HELP.disk_exporter_cooldown_devices,
    snapshot.cooldownDevices
  );
  registry.setGauge('disk_exporter_build_info', HELP.disk_exporter_build_info, 1, { version });

  return registry.export();
}
