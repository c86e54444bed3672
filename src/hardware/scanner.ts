/**
 * Concurrent multi-sample scan of every rotational disk
 */

import type { Logger } from '../logger/index.js';
import type { HardwareConfig, ScanConfig } from '../config/schema.js';
import { ErrorCode, ErrorSeverity, ExporterError, toError } from '../errors/index.js';
import { delay, mapWithConcurrency } from '../utils/concurrency.js';
import type { Device, DevicePaths, PoolAssignment, ScanResult, ScanSnapshot } from '../types/disk.js';
import { enumerateDevices } from './block-devices.js';
import { CooldownBreaker, type Clock } from './cooldown.js';
import { activityRank, highestPowerState, type PowerState } from './power-state.js';
import { PowerStateProber } from './smartctl.js';
import { baseDevicePath, getZpoolDeviceMap } from './zpool.js';

export interface Prober {
  probe(device: string): Promise<PowerState>;
}

export interface ScannerConfig {
  hardware: HardwareConfig;
  scan: ScanConfig;
}

export interface ScannerDeps {
  cooldown: CooldownBreaker;
  prober: Prober;
  resolvePools: () => Promise<PoolAssignment>;
  clock: Clock;
}

export const NO_POOL = 'none';

function devicePaths(hardware: HardwareConfig): DevicePaths {
  return {
    sysBlockPath: hardware.sysBlockPath,
    devPath: hardware.devPath,
    byIdPath: hardware.byIdPath,
  };
}

/**
 * Runs scans. Concurrent callers share the scan already in flight.
 */
export class DiskScanner {
  private readonly cooldown: CooldownBreaker;
  private readonly prober: Prober;
  private readonly resolvePools: () => Promise<PoolAssignment>;
  private readonly clock: Clock;
  private inFlight: Promise<ScanSnapshot> | null = null;
  private lastSnapshot: ScanSnapshot | null = null;
  private lastError: Error | null = null;

  constructor(
    private readonly config: ScannerConfig,
    private readonly logger: Logger,
    deps: Partial<ScannerDeps> = {}
  ) {
    const { hardware } = config;
    this.clock = deps.clock ?? Date.now;
    this.cooldown = deps.cooldown ?? new CooldownBreaker(config.scan.cooldownMs, this.clock);
    this.prober =
      deps.prober ??
      new PowerStateProber(
        this.cooldown,
        {
          smartctlPath: hardware.smartctlPath,
          deviceType: hardware.smartctlDeviceType,
          timeoutMs: hardware.probeTimeoutMs,
        },
        logger.child({ component: 'smartctl' })
      );
    this.resolvePools =
      deps.resolvePools ??
      (() =>
        getZpoolDeviceMap({
          zpoolPath: hardware.zpoolPath,
          timeoutMs: hardware.zpoolTimeoutMs,
          devPath: hardware.devPath,
          byIdPath: hardware.byIdPath,
          logger: logger.child({ component: 'zpool' }),
        }));
  }

  scan(): Promise<ScanSnapshot> {
    if (!this.inFlight) {
      this.inFlight = this.runScan().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  isScanning(): boolean {
    return this.inFlight !== null;
  }

  getLastSnapshot(): ScanSnapshot | null {
    return this.lastSnapshot;
  }

  getLastError(): Error | null {
    return this.lastError;
  }

  /**
   * Take `attempts` samples of one device, `intervalMs` apart, and keep
   * the most awake. Every attempt runs even once a sample reads active.
   */
  async sampleDevice(device: string): Promise<PowerState[]> {
    const { attempts, intervalMs } = this.config.scan;
    const samples: PowerState[] = [];

    for (let attempt = 0; attempt < attempts; attempt++) {
      if (attempt > 0) {
        await delay(intervalMs);
      }
      samples.push(await this.probeSafely(device));
    }

    return samples;
  }

  private async probeSafely(device: string): Promise<PowerState> {
    try {
      return await this.prober.probe(device);
    } catch (error) {
      this.logger.error('Unexpected probe failure', toError(error), { device });
      return 'error';
    }
  }

  private async scanDevice(device: Device, pools: PoolAssignment): Promise<ScanResult> {
    const samples = await this.sampleDevice(device.path);
    const state = highestPowerState(samples);

    return {
      device: device.path,
      persistentId: device.persistentId,
      rotationalType: device.rotationalType,
      pool: pools[baseDevicePath(device.path)] ?? NO_POOL,
      state,
      rank: activityRank(state),
      samples,
    };
  }

  private async runScan(): Promise<ScanSnapshot> {
    const startedAt = this.clock();

    try {
      const [pools, enumeration] = await Promise.all([
        this.resolvePools(),
        enumerateDevices(devicePaths(this.config.hardware), this.logger),
      ]);

      const results = await mapWithConcurrency(enumeration.candidates, this.config.scan.concurrency, (device) =>
        this.scanDevice(device, pools)
      );
      results.sort((a, b) => (a.device < b.device ? -1 : a.device > b.device ? 1 : 0));

      const snapshot: ScanSnapshot = {
        results,
        counters: enumeration.counters,
        startedAt,
        durationMs: this.clock() - startedAt,
        cooldownDevices: this.cooldown.size(),
      };

      this.logger.info('scan complete', {
        enumerated: snapshot.counters.enumerated,
        scanned_hdds: snapshot.counters.scannedHdds,
        skipped_non_rotational: snapshot.counters.skippedNonRotational,
        skipped_virtual: snapshot.counters.skippedVirtual,
        duration: `${(snapshot.durationMs / 1000).toFixed(3)}s`,
      });

      this.lastSnapshot = snapshot;
      this.lastError = null;
      return snapshot;
    } catch (error) {
      const failure = new ExporterError(
        'Scan failed',
        ErrorCode.SCAN_FAILED,
        ErrorSeverity.HIGH,
        undefined,
        toError(error)
      );
      this.lastError = failure;
      this.logger.error(failure.message, failure);
      throw failure;
    }
  }
}
