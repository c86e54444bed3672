/**
 * Unit tests for persistent identity resolution
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { join } from 'path';
import { FakeHost } from '../__tests__/utils.js';
import {
  buildIdentityIndex,
  compareIdentityNames,
  getPersistentId,
  resolvePersistentId,
  selectPersistentId,
} from './persistent-id.js';

describe('Persistent identity', () => {
  let host: FakeHost;

  beforeEach(() => {
    host = new FakeHost();
  });

  afterEach(() => {
    host.cleanup();
  });

  describe('getPersistentId', () => {
    it('should return the device when the by-id directory is missing', async () => {
      const device = host.addDevNode('sdz');

      await expect(getPersistentId(device, join(host.root, 'no-such-dir'))).resolves.toBe(device);
    });

    it('should return the device when no link targets it', async () => {
      const device = host.addDevNode('sdz');
      host.addDevNode('sdy');
      host.addById('ata-OTHER', 'sdy');

      await expect(getPersistentId(device, host.paths.byIdPath)).resolves.toBe(device);
    });

    it('should prefer prefixed and shorter names', async () => {
      const device = host.addDevNode('sdz');
      host.addById('xyz-long-generic-id-123', 'sdz');
      host.addById('ata-NICE', 'sdz');
      host.addById('wwn-FAIR', 'sdz');

      await expect(getPersistentId(device, host.paths.byIdPath)).resolves.toBe(
        join(host.paths.byIdPath, 'ata-NICE')
      );
    });

    it('should ignore partition links and dangling links', async () => {
      const device = host.addDevNode('sdz');
      host.addDevNode('sdz1');
      host.addById('ata-DISK-part1', 'sdz1');
      host.addById('ata-GONE', 'sdq');
      host.addById('ata-DISK', 'sdz');

      await expect(getPersistentId(device, host.paths.byIdPath)).resolves.toBe(
        join(host.paths.byIdPath, 'ata-DISK')
      );
    });

    it('should be stable across repeated runs', async () => {
      const device = host.addDevNode('sdz');
      host.addById('wwn-0x5000c500a1b2c3d4', 'sdz');
      host.addById('ata-WDC_WD40EFRX-68N32N0_WD-TEST0001', 'sdz');
      host.addById('scsi-SATA_WDC_WD40EFRX', 'sdz');

      const first = await getPersistentId(device, host.paths.byIdPath);
      const second = await getPersistentId(device, host.paths.byIdPath);

      expect(first).toBe(join(host.paths.byIdPath, 'scsi-SATA_WDC_WD40EFRX'));
      expect(second).toBe(first);
    });
  });

  describe('buildIdentityIndex', () => {
    it('should group names by resolved target', async () => {
      host.addDevNode('sda');
      host.addDevNode('sdb');
      host.addById('ata-A', 'sda');
      host.addById('wwn-A', 'sda');
      host.addById('ata-B', 'sdb');

      const index = await buildIdentityIndex(host.paths.byIdPath);

      expect(index.targets.get(host.dev('sda'))?.sort()).toEqual(['ata-A', 'wwn-A']);
      expect(index.targets.get(host.dev('sdb'))).toEqual(['ata-B']);
    });

    it('should let one index resolve many devices', async () => {
      const sda = host.addDevNode('sda');
      const sdb = host.addDevNode('sdb');
      host.addById('ata-A', 'sda');

      const index = await buildIdentityIndex(host.paths.byIdPath);

      await expect(resolvePersistentId(sda, index)).resolves.toBe(
        join(host.paths.byIdPath, 'ata-A')
      );
      await expect(resolvePersistentId(sdb, index)).resolves.toBe(sdb);
    });
  });

  describe('selectPersistentId', () => {
    it('should order prefixed, then shorter, then lexicographic', () => {
      const names = ['abc', 'ata-LONGER-NAME', 'wwn-0x5000', 'usb-ZZ'];

      expect([...names].sort(compareIdentityNames)).toEqual([
        'usb-ZZ',
        'wwn-0x5000',
        'ata-LONGER-NAME',
        'abc',
      ]);
    });

    it('should break equal-length ties lexicographically', () => {
      expect(selectPersistentId(['wwn-FAIR', 'ata-NICE'])).toBe('ata-NICE');
    });

    it('should return undefined for no candidates', () => {
      expect(selectPersistentId([])).toBeUndefined();
    });
  });
});
