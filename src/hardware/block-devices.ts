/**
 * Block device enumeration and classification from sysfs
 */

import * as fs from 'fs/promises';
import { basename, join } from 'path';
import type { Logger } from '../logger/index.js';
import { EnumerationError, toError } from '../errors/index.js';
import type {
  Device,
  DevicePaths,
  EnumerationCounters,
  EnumerationResult,
  RotationalType,
} from '../types/disk.js';
import { buildIdentityIndex, persistentIdName, resolvePersistentId } from './persistent-id.js';

/**
 * Kernel name prefixes that never name a physical disk: loopback, RAM-backed,
 * compressed RAM, floppy, optical, device-mapper, software RAID, zvols
 */
export const EXCLUDED_KNAME_PREFIXES = ['loop', 'ram', 'zram', 'fd', 'sr', 'dm-', 'md', 'zd'] as const;

export const VIRTUAL_MODEL_MARKERS = ['QEMU', 'VIRTUAL', 'VBOX', 'VMWARE'] as const;

export const VIRTUAL_ID_PREFIXES = ['scsi-0QEMU_', 'ata-QEMU_', 'virtio-'] as const;

export function isExcludedKname(kname: string): boolean {
  return EXCLUDED_KNAME_PREFIXES.some((prefix) => kname.startsWith(prefix));
}

/**
 * Read one attribute below /sys/block/<kname>; null on any failure
 */
async function readSysAttribute(
  paths: DevicePaths,
  kname: string,
  attribute: string,
  logger?: Logger
): Promise<string | null> {
  const path = join(paths.sysBlockPath, kname, attribute);
  try {
    return (await fs.readFile(path, 'utf-8')).trim();
  } catch (error) {
    const failure = new EnumerationError(`Cannot read ${attribute}`, { path }, toError(error));
    logger?.debug(failure.message, { device: kname, path, error: failure.originalError?.message });
    return null;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Sorted /dev/<kname> paths for every candidate whole disk
 */
export async function listBlockDevices(paths: DevicePaths, logger?: Logger): Promise<string[]> {
  let knames: string[];
  try {
    knames = await fs.readdir(paths.sysBlockPath);
  } catch (error) {
    logger?.warn('Block device directory unavailable', {
      path: paths.sysBlockPath,
      error: toError(error).message,
    });
    return [];
  }

  const candidates = knames.filter((kname) => !isExcludedKname(kname));
  const present = await Promise.all(
    candidates.map(async (kname) => {
      const device = join(paths.devPath, kname);
      return (await exists(device)) ? device : null;
    })
  );

  return present.filter((device): device is string => device !== null).sort();
}

export async function getRotationalType(
  device: string,
  paths: DevicePaths,
  logger?: Logger
): Promise<RotationalType> {
  const flag = await readSysAttribute(paths, basename(device), 'queue/rotational', logger);
  if (flag === '1') return 'hdd';
  if (flag === '0') return 'ssd';
  return 'unknown';
}

/**
 * Heuristic for hypervisor-provided disks. Unreadable vendor or model
 * strings count as "not virtual".
 */
export async function isVirtualDevice(
  device: string,
  persistentId: string,
  paths: DevicePaths,
  logger?: Logger
): Promise<boolean> {
  const kname = basename(device);
  const [vendor, model] = await Promise.all([
    readSysAttribute(paths, kname, 'device/vendor', logger),
    readSysAttribute(paths, kname, 'device/model', logger),
  ]);

  const labels = [vendor, model]
    .filter((value): value is string => value !== null)
    .map((value) => value.toUpperCase());
  if (labels.some((label) => VIRTUAL_MODEL_MARKERS.some((marker) => label.includes(marker)))) {
    return true;
  }

  const idName = persistentIdName(persistentId);
  return VIRTUAL_ID_PREFIXES.some((prefix) => idName.startsWith(prefix));
}

/**
 * Enumerate, classify and filter. Every enumerated device lands in exactly
 * one counter bucket: scanned, non-rotational (ssd or unknown) or virtual.
 */
export async function enumerateDevices(
  paths: DevicePaths,
  logger?: Logger
): Promise<EnumerationResult> {
  const devicePaths = await listBlockDevices(paths, logger);
  const identities = await buildIdentityIndex(paths.byIdPath);

  const devices: Device[] = [];
  const counters: EnumerationCounters = {
    enumerated: devicePaths.length,
    scannedHdds: 0,
    skippedNonRotational: 0,
    skippedVirtual: 0,
  };

  for (const path of devicePaths) {
    const rotationalType = await getRotationalType(path, paths, logger);
    const persistentId = await resolvePersistentId(path, identities);
    const isRotational = rotationalType === 'hdd';
    const isVirtual = isRotational ? await isVirtualDevice(path, persistentId, paths, logger) : false;

    if (!isRotational) {
      counters.skippedNonRotational++;
    } else if (isVirtual) {
      counters.skippedVirtual++;
    } else {
      counters.scannedHdds++;
    }

    devices.push({
      path,
      kname: basename(path),
      rotationalType,
      isRotational,
      isVirtual,
      persistentId,
    });
  }

  return {
    devices,
    candidates: devices.filter((device) => device.isRotational && !device.isVirtual),
    counters,
  };
}
