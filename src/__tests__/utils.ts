/**
 * Test utilities and helper functions
 */

import { mkdirSync, mkdtempSync, realpathSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join, relative } from 'path';
import { Logger } from '../logger/index.js';
import type { DevicePaths, ScanResult } from '../types/disk.js';

export interface FakeDisk {
  rotational?: string; // omit to leave queue/rotational unreadable
  vendor?: string;
  model?: string;
  devNode?: boolean; // create /dev/<kname>, default true
}

/**
 * A throwaway sysfs + /dev tree under the OS temp directory
 */
export class FakeHost {
  readonly root: string;
  readonly paths: DevicePaths;

  constructor() {
    this.root = realpathSync(mkdtempSync(join(tmpdir(), 'disk-exporter-host-')));
    this.paths = {
      sysBlockPath: join(this.root, 'sys', 'block'),
      devPath: join(this.root, 'dev'),
      byIdPath: join(this.root, 'dev', 'disk', 'by-id'),
    };
    mkdirSync(this.paths.sysBlockPath, { recursive: true });
    mkdirSync(this.paths.byIdPath, { recursive: true });
  }

  dev(name: string): string {
    return join(this.paths.devPath, name);
  }

  addDisk(kname: string, disk: FakeDisk = {}): string {
    const base = join(this.paths.sysBlockPath, kname);
    mkdirSync(join(base, 'queue'), { recursive: true });
    mkdirSync(join(base, 'device'), { recursive: true });

    if (disk.rotational !== undefined) {
      writeFileSync(join(base, 'queue', 'rotational'), `${disk.rotational}\n`);
    }
    if (disk.vendor !== undefined) {
      writeFileSync(join(base, 'device', 'vendor'), `${disk.vendor}\n`);
    }
    if (disk.model !== undefined) {
      writeFileSync(join(base, 'device', 'model'), `${disk.model}\n`);
    }
    if (disk.devNode !== false) {
      this.addDevNode(kname);
    }
    return this.dev(kname);
  }

  addDevNode(name: string): string {
    const path = this.dev(name);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, '');
    return path;
  }

  /**
   * Create /dev/disk/by-id/<name> pointing at /dev/<target> with a relative
   * link, the way udev does
   */
  addById(name: string, target: string): string {
    const link = join(this.paths.byIdPath, name);
    symlinkSync(relative(this.paths.byIdPath, this.dev(target)), link);
    return link;
  }

  cleanup(): void {
    rmSync(this.root, { recursive: true, force: true });
  }
}

/**
 * Logger that only reports errors
 */
export function createTestLogger(): Logger {
  return new Logger({ level: 'error', format: 'logfmt', maxFiles: 1, maxSize: '1m' });
}

/**
 * Create a scan result for testing
 */
export function createScanResult(overrides?: Partial<ScanResult>): ScanResult {
  return {
    device: '/dev/sda',
    persistentId: '/dev/disk/by-id/ata-TEST_DISK_A',
    rotationalType: 'hdd',
    pool: 'none',
    state: 'standby',
    rank: 3,
    samples: ['standby'],
    ...overrides,
  };
}
