/**
 * Persistent device identity via /dev/disk/by-id symlinks
 */

import * as fs from 'fs/promises';
import { basename, join } from 'path';

/**
 * Identity prefixes preferred over vendor-specific or generic aliases
 */
export const PREFERRED_ID_PREFIXES = ['ata-', 'scsi-', 'wwn-', 'nvme-', 'usb-', 'virtio-'] as const;

export interface IdentityIndex {
  byIdPath: string;
  // realpath of the target device -> by-id entry names
  targets: Map<string, string[]>;
}

async function realpathOrSelf(path: string): Promise<string> {
  try {
    return await fs.realpath(path);
  } catch {
    return path;
  }
}

/**
 * Resolve every by-id entry once. Dangling links and a missing directory
 * produce an empty index rather than an error.
 */
export async function buildIdentityIndex(byIdPath: string): Promise<IdentityIndex> {
  const targets = new Map<string, string[]>();

  let names: string[];
  try {
    names = await fs.readdir(byIdPath);
  } catch {
    return { byIdPath, targets };
  }

  const resolved = await Promise.all(
    names.map(async (name) => {
      try {
        return { name, target: await fs.realpath(join(byIdPath, name)) };
      } catch {
        return null;
      }
    })
  );

  for (const entry of resolved) {
    if (!entry) continue;
    const existing = targets.get(entry.target);
    if (existing) {
      existing.push(entry.name);
    } else {
      targets.set(entry.target, [entry.name]);
    }
  }

  return { byIdPath, targets };
}

function hasPreferredPrefix(name: string): boolean {
  return PREFERRED_ID_PREFIXES.some((prefix) => name.startsWith(prefix));
}

/**
 * Total order over candidate names: preferred prefix first, then shorter,
 * then lexicographic (code unit order, independent of locale).
 */
export function compareIdentityNames(a: string, b: string): number {
  const preferredA = hasPreferredPrefix(a) ? 0 : 1;
  const preferredB = hasPreferredPrefix(b) ? 0 : 1;
  if (preferredA !== preferredB) return preferredA - preferredB;
  if (a.length !== b.length) return a.length - b.length;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function selectPersistentId(names: readonly string[]): string | undefined {
  return [...names].sort(compareIdentityNames)[0];
}

/**
 * Best by-id path for `device`, or `device` itself when no link targets it
 */
export async function resolvePersistentId(device: string, index: IdentityIndex): Promise<string> {
  const real = await realpathOrSelf(device);
  const best = selectPersistentId(index.targets.get(real) ?? []);
  return best === undefined ? device : join(index.byIdPath, best);
}

/**
 * One-shot lookup; scans should build the index once and reuse it
 */
export async function getPersistentId(device: string, byIdPath: string): Promise<string> {
  return resolvePersistentId(device, await buildIdentityIndex(byIdPath));
}

/**
 * Basename of a by-id path, or the kernel name for raw device paths
 */
export function persistentIdName(persistentId: string): string {
  return basename(persistentId);
}
