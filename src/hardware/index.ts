/**
 * Hardware module exports
 */

export {
  ACTIVITY_ORDER,
  POWER_STATE_VALUES,
  activityRank,
  highestPowerState,
  isPowerState,
  mergePowerStates,
  powerStateValue,
  toPowerState,
  type PowerState,
} from './power-state.js';

export {
  enumerateDevices,
  getRotationalType,
  isExcludedKname,
  isVirtualDevice,
  listBlockDevices,
} from './block-devices.js';

export {
  buildIdentityIndex,
  getPersistentId,
  resolvePersistentId,
  selectPersistentId,
  type IdentityIndex,
} from './persistent-id.js';

export {
  baseDevicePath,
  buildPoolAssignment,
  getZpoolDeviceMap,
  parseZpoolStatus,
  resolveMemberToken,
} from './zpool.js';

export { CooldownBreaker, type Clock } from './cooldown.js';

export { PowerStateProber, decodePowerState, buildSmartctlArgs, type PowerDecoding } from './smartctl.js';

export { DiskScanner, NO_POOL, type Prober, type ScannerConfig } from './scanner.js';
