/**
 * Unit tests for zpool topology parsing
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { FakeHost } from '../__tests__/utils.js';
import { executeCommand } from '../utils/exec.js';
import {
  baseDevicePath,
  buildPoolAssignment,
  getZpoolDeviceMap,
  parseZpoolStatus,
  resolveMemberToken,
} from './zpool.js';

jest.mock('../utils/exec.js');

const mockedExec = jest.mocked(executeCommand);

const TWO_POOLS = `  pool: tank
 state: ONLINE
  scan: scrub repaired 0B in 01:02:03 with 0 errors on Sun Oct 11 01:26:04 2026
config:

\tNAME                                    STATE     READ WRITE CKSUM
\ttank                                    ONLINE       0     0     0
\t  mirror-0                              ONLINE       0     0     0
\t    /dev/disk/by-id/ata-DISK_A-part1    ONLINE       0     0     0
\t    /dev/sdd1                           ONLINE       0     0     0
\tlogs
\t  /dev/nvme0n1p2                        ONLINE       0     0     0
\tspares
\t  /dev/sdf                              AVAIL

errors: No known data errors

  pool: backup
 state: ONLINE
config:

\tNAME          STATE     READ WRITE CKSUM
\tbackup        ONLINE       0     0     0
\t  raidz2-0    ONLINE       0     0     0
\t    sdg       ONLINE       0     0     0
\t    sdh       ONLINE       0     0     0

errors: No known data errors
`;

describe('zpool topology', () => {
  describe('baseDevicePath', () => {
    it.each([
      ['/dev/sdc1', '/dev/sdc'],
      ['/dev/sdaa12', '/dev/sdaa'],
      ['/dev/vdb3', '/dev/vdb'],
      ['/dev/xvdf1', '/dev/xvdf'],
      ['/dev/nvme0n1p2', '/dev/nvme0n1'],
      ['/dev/mmcblk0p1', '/dev/mmcblk0'],
      ['/dev/nvme0n1', '/dev/nvme0n1'],
      ['/dev/sdc', '/dev/sdc'],
      ['/dev/weird7', '/dev/weird7'],
      ['sdd1', 'sdd'],
    ])('should map %s to %s', (input, expected) => {
      expect(baseDevicePath(input)).toBe(expected);
    });
  });

  describe('parseZpoolStatus', () => {
    it('should collect member tokens per pool and skip structural rows', () => {
      const { members, anomalies } = parseZpoolStatus(TWO_POOLS);

      expect(members.map(({ pool, token }) => [pool, token])).toEqual([
        ['tank', '/dev/disk/by-id/ata-DISK_A-part1'],
        ['tank', '/dev/sdd1'],
        ['tank', '/dev/nvme0n1p2'],
        ['tank', '/dev/sdf'],
        ['backup', 'sdg'],
        ['backup', 'sdh'],
      ]);
      expect(anomalies).toEqual([]);
    });

    it('should ignore lines outside config sections', () => {
      const text = 'status: One or more devices is degraded.\naction: Replace /dev/sdz\n';

      expect(parseZpoolStatus(text).members).toEqual([]);
    });

    it('should report devices seen before any pool name', () => {
      const { members, anomalies } = parseZpoolStatus('config:\n\tsda  ONLINE 0 0 0\n');

      expect(members).toEqual([]);
      expect(anomalies).toEqual(['line 2: device sda outside any pool']);
    });

    it('should skip replacing, spare and special vdev rows', () => {
      const text = [
        'pool: fast',
        'config:',
        '  NAME  STATE',
        '  fast  ONLINE',
        '    special',
        '      mirror-1',
        '        replacing-0',
        '          /dev/sdx',
        '          spare-1',
        '            /dev/sdy',
        '    dedup',
        '    cache',
        '      /dev/sdz',
        'errors: No known data errors',
        '  /dev/sdq',
      ].join('\n');

      expect(parseZpoolStatus(text).members.map((member) => member.token)).toEqual([
        '/dev/sdx',
        '/dev/sdy',
        '/dev/sdz',
      ]);
    });

    it('should return nothing for empty output', () => {
      expect(parseZpoolStatus('no pools available\n')).toEqual({ members: [], anomalies: [] });
    });
  });

  describe('member resolution', () => {
    let host: FakeHost;

    beforeEach(() => {
      host = new FakeHost();
    });

    afterEach(() => {
      host.cleanup();
    });

    it('should map identity partitions and bare partitions to their base disks', async () => {
      host.addDevNode('sdc1');
      const link = host.addById('ata-DISK_A-part1', 'sdc1');

      const assignment = await buildPoolAssignment(
        [
          { pool: 'tank', token: link, line: 1 },
          { pool: 'tank', token: 'sdd1', line: 2 },
        ],
        host.paths
      );

      expect(assignment).toEqual({
        [host.dev('sdc')]: 'tank',
        [host.dev('sdd')]: 'tank',
      });
    });

    it('should resolve bare identity names through the by-id directory', async () => {
      host.addDevNode('sde');
      host.addById('wwn-0x5000c500aaaa', 'sde');

      await expect(resolveMemberToken('wwn-0x5000c500aaaa', host.paths)).resolves.toBe(host.dev('sde'));
    });

    it('should drop dangling identity links', async () => {
      host.addById('ata-GONE', 'sdq');

      await expect(resolveMemberToken(`${host.paths.byIdPath}/ata-GONE`, host.paths)).resolves.toBeNull();
      await expect(resolveMemberToken('ata-GONE', host.paths)).resolves.toBeNull();
    });

    it('should keep absolute device paths that do not exist yet', async () => {
      await expect(resolveMemberToken('/nonexistent/dev/sdk2', host.paths)).resolves.toBe('/nonexistent/dev/sdk');
    });
  });

  describe('getZpoolDeviceMap', () => {
    let host: FakeHost;

    beforeEach(() => {
      host = new FakeHost();
      mockedExec.mockReset();
    });

    afterEach(() => {
      host.cleanup();
    });

    const options = () => ({ zpoolPath: 'zpool', timeoutMs: 5000, ...host.paths });

    it('should invoke zpool with full paths and the configured timeout', async () => {
      mockedExec.mockResolvedValue({ outcome: 'exited', stdout: '', stderr: '', exitCode: 0 });

      await getZpoolDeviceMap(options());

      expect(mockedExec).toHaveBeenCalledWith('zpool', ['status', '-L', '-P'], { timeout: 5000 });
    });

    it('should map every pool member', async () => {
      mockedExec.mockResolvedValue({
        outcome: 'exited',
        stdout: 'pool: backup\nconfig:\n  backup ONLINE\n    raidz2-0 ONLINE\n      sdg ONLINE\n      sdh1 ONLINE\n',
        stderr: '',
        exitCode: 0,
      });

      await expect(getZpoolDeviceMap(options())).resolves.toEqual({
        [host.dev('sdg')]: 'backup',
        [host.dev('sdh')]: 'backup',
      });
    });

    it('should return an empty map when zpool is missing', async () => {
      mockedExec.mockResolvedValue({ outcome: 'failed', stdout: '', stderr: 'spawn zpool ENOENT', exitCode: -1 });

      await expect(getZpoolDeviceMap(options())).resolves.toEqual({});
    });

    it('should return an empty map on timeout', async () => {
      mockedExec.mockResolvedValue({ outcome: 'timeout', stdout: '', stderr: '', exitCode: -1 });

      await expect(getZpoolDeviceMap(options())).resolves.toEqual({});
    });

    it('should return an empty map on a non-zero exit', async () => {
      mockedExec.mockResolvedValue({
        outcome: 'exited',
        stdout: 'pool: tank\nconfig:\n  sda ONLINE\n',
        stderr: 'The ZFS modules are not loaded.',
        exitCode: 1,
      });

      await expect(getZpoolDeviceMap(options())).resolves.toEqual({});
    });
  });
});
