/**
 * zpool status wrapper mapping base disks to pool names
 */

import * as fs from 'fs/promises';
import { join } from 'path';
import { executeCommand } from '../utils/exec.js';
import type { Logger } from '../logger/index.js';
import { ErrorCode, TopologyError, toError } from '../errors/index.js';
import type { PoolAssignment } from '../types/disk.js';

export interface ZpoolOptions {
  zpoolPath: string;
  timeoutMs: number;
  devPath: string;
  byIdPath: string;
  logger?: Logger;
}

export interface ZpoolMember {
  pool: string;
  token: string;
  line: number;
}

export interface ZpoolParseResult {
  members: ZpoolMember[];
  anomalies: string[];
}

enum ScannerState {
  OUTSIDE = 'outside',
  AWAITING_CONFIG = 'awaiting_config',
  IN_CONFIG = 'in_config',
}

const POOL_MARKER = /^pool:\s*(\S*)/;
const CONFIG_MARKER = /^config:/;
const END_MARKER = /^errors:/;

/**
 * First-column tokens inside `config:` that name vdev groups or headings,
 * never a disk. One row per pattern.
 */
export const STRUCTURAL_TOKENS: readonly RegExp[] = [
  /^NAME$/,
  /^mirror(-\d+)?$/,
  /^raidz[123]?(-\d+)?$/,
  /^draid[123]?(:\S*)?(-\d+)?$/,
  /^spares?(-\d+)?$/,
  /^cache$/,
  /^logs?$/,
  /^special$/,
  /^dedup$/,
  /^stripe$/,
  /^replacing-\d+$/,
  /^indirect-\d+$/,
];

/**
 * Bare kernel names that zpool prints when -P is not honoured
 */
const KERNEL_NAME = /^(?:(?:s|v|h|xv)d[a-z]+\d*|nvme\d+n\d+(?:p\d+)?|mmcblk\d+(?:p\d+)?)$/;

/**
 * Partition suffixes per naming scheme. NVMe and MMC use a `p` separator
 * because their whole-disk names already end in digits.
 */
const PARTITION_SUFFIXES: readonly RegExp[] = [
  /^(nvme\d+n\d+)p\d+$/,
  /^(mmcblk\d+)p\d+$/,
  /^((?:s|v|h|xv)d[a-z]+)\d+$/,
];

/**
 * Strip a trailing partition number: /dev/sdc1 -> /dev/sdc,
 * /dev/nvme0n1p2 -> /dev/nvme0n1. Whole disks and unrecognised names are
 * returned unchanged, so /dev/nvme0n1 keeps its namespace digit.
 */
export function baseDevicePath(path: string): string {
  const slash = path.lastIndexOf('/');
  const dir = path.slice(0, slash + 1);
  const name = path.slice(slash + 1);

  for (const pattern of PARTITION_SUFFIXES) {
    const match = pattern.exec(name);
    if (match?.[1]) {
      return dir + match[1];
    }
  }
  return path;
}

function isStructural(token: string, pool: string | null): boolean {
  return token === pool || STRUCTURAL_TOKENS.some((pattern) => pattern.test(token));
}

/**
 * Scan `zpool status` text line by line and collect the device column of
 * every pool's config section. Malformed lines are reported as anomalies
 * and skipped.
 */
export function parseZpoolStatus(text: string): ZpoolParseResult {
  const members: ZpoolMember[] = [];
  const anomalies: string[] = [];

  let state = ScannerState.OUTSIDE;
  let pool: string | null = null;

  text.split('\n').forEach((raw, index) => {
    const line = raw.trim();
    if (line === '') return;

    const poolMatch = POOL_MARKER.exec(line);
    if (poolMatch) {
      pool = poolMatch[1] || null;
      state = ScannerState.AWAITING_CONFIG;
      if (!pool) anomalies.push(`line ${index + 1}: empty pool name`);
      return;
    }
    if (CONFIG_MARKER.test(line)) {
      state = ScannerState.IN_CONFIG;
      return;
    }
    if (END_MARKER.test(line)) {
      state = ScannerState.OUTSIDE;
      return;
    }
    if (state !== ScannerState.IN_CONFIG) return;

    const token = line.split(/\s+/)[0] ?? '';
    if (isStructural(token, pool)) return;

    if (!pool) {
      anomalies.push(`line ${index + 1}: device ${token} outside any pool`);
      return;
    }
    members.push({ pool, token, line: index + 1 });
  });

  return { members, anomalies };
}

async function realpathOrNull(path: string): Promise<string | null> {
  try {
    return await fs.realpath(path);
  } catch {
    return null;
  }
}

/**
 * Normalise one device-column token to a base device path, or null when
 * it names nothing resolvable
 */
export async function resolveMemberToken(
  token: string,
  options: Pick<ZpoolOptions, 'devPath' | 'byIdPath'>
): Promise<string | null> {
  if (token.startsWith('/')) {
    const real = await realpathOrNull(token);
    if (real) return baseDevicePath(real);
    // An identity link that no longer resolves cannot be tied to a kernel name
    return token.startsWith(`${options.byIdPath}/`) ? null : baseDevicePath(token);
  }

  if (KERNEL_NAME.test(token)) {
    return baseDevicePath(join(options.devPath, token));
  }

  const viaId = await realpathOrNull(join(options.byIdPath, token));
  return viaId ? baseDevicePath(viaId) : null;
}

/**
 * Resolve parsed members into base device -> pool. Later lines win when a
 * disk appears twice.
 */
export async function buildPoolAssignment(
  members: readonly ZpoolMember[],
  options: Pick<ZpoolOptions, 'devPath' | 'byIdPath' | 'logger'>
): Promise<PoolAssignment> {
  const resolved = await Promise.all(
    members.map(async (member) => ({ member, base: await resolveMemberToken(member.token, options) }))
  );

  const assignment: PoolAssignment = {};
  for (const { member, base } of resolved) {
    if (base === null) {
      options.logger?.debug('Skipping unresolvable zpool member', {
        pool: member.pool,
        token: member.token,
        line: member.line,
      });
      continue;
    }
    assignment[base] = member.pool;
  }
  return assignment;
}

/**
 * Run `zpool status -L -P` and map base devices to pool names. Never
 * throws: a missing binary, missing kernel module, timeout or parse
 * failure all produce an empty mapping.
 */
export async function getZpoolDeviceMap(options: ZpoolOptions): Promise<PoolAssignment> {
  const { logger } = options;
  const result = await executeCommand(options.zpoolPath, ['status', '-L', '-P'], {
    timeout: options.timeoutMs,
  });

  if (result.outcome === 'failed') {
    logger?.debug('zpool unavailable, pool labels disabled', { error: result.stderr });
    return {};
  }

  if (result.outcome === 'timeout' || result.exitCode !== 0) {
    const error = new TopologyError(
      result.outcome === 'timeout' ? 'zpool status timed out' : 'zpool status failed',
      ErrorCode.TOPOLOGY_UNAVAILABLE,
      { exitCode: result.exitCode, stderr: result.stderr }
    );
    logger?.warn(error.message, { code: error.code, exitCode: result.exitCode, stderr: result.stderr });
    return {};
  }

  try {
    const { members, anomalies } = parseZpoolStatus(result.stdout);
    for (const anomaly of anomalies) {
      logger?.debug('Skipped malformed zpool status line', {
        code: ErrorCode.TOPOLOGY_PARSE_ANOMALY,
        detail: anomaly,
      });
    }
    return await buildPoolAssignment(members, options);
  } catch (error) {
    const failure = new TopologyError(
      'Failed to parse zpool status',
      ErrorCode.TOPOLOGY_PARSE_ANOMALY,
      undefined,
      toError(error)
    );
    logger?.error(failure.message, failure);
    return {};
  }
}
