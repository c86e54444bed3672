/**
 * Disk and scan type definitions
 */

import type { PowerState } from '../hardware/power-state.js';

export type RotationalType = 'hdd' | 'ssd' | 'unknown';

export interface Device {
  path: string; // /dev/<kname>
  kname: string;
  rotationalType: RotationalType;
  isRotational: boolean;
  isVirtual: boolean;
  persistentId: string; // by-id path, or `path` when none exists
}

export interface EnumerationCounters {
  enumerated: number;
  scannedHdds: number;
  skippedNonRotational: number;
  skippedVirtual: number;
}

export interface EnumerationResult {
  devices: Device[]; // every enumerated device, sorted by path
  candidates: Device[]; // rotational and not virtual
  counters: EnumerationCounters;
}

/**
 * Base device path -> pool name
 */
export type PoolAssignment = Record<string, string>;

export interface ScanResult {
  device: string;
  persistentId: string;
  rotationalType: RotationalType;
  pool: string; // 'none' when the device backs no pool
  state: PowerState;
  rank: number; // activity rank, higher is more awake
  samples: PowerState[];
}

export interface ScanSnapshot {
  results: ScanResult[];
  counters: EnumerationCounters;
  startedAt: number; // epoch ms
  durationMs: number;
  cooldownDevices: number;
}

/**
 * Filesystem locations consulted during enumeration
 */
export interface DevicePaths {
  sysBlockPath: string;
  devPath: string;
  byIdPath: string;
}
