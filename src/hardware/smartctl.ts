/**
 * smartctl wrapper reading drive power state without spinning drives up
 */

import { executeCommand } from '../utils/exec.js';
import type { Logger } from '../logger/index.js';
import { ErrorCode, ProbeError } from '../errors/index.js';
import type { PowerState } from './power-state.js';
import type { CooldownBreaker } from './cooldown.js';

export interface SmartctlOptions {
  smartctlPath: string;
  /** Passed as `-d <type>`; `auto` lets smartctl pick */
  deviceType: string;
  timeoutMs: number;
}

interface PhraseRule {
  pattern: RegExp;
  state: PowerState;
}

/**
 * Output that means the drive cannot report a power mode at all
 */
export const UNSUPPORTED_PATTERNS: readonly RegExp[] = [
  /SMART support is:\s*Unavailable/i,
  /Unable to detect device type/i,
  /Unknown USB bridge/i,
  /Read Device Identity failed/i,
  /Operation not supported/i,
];

/**
 * Power mode phrases, first match wins. Specific idle sub-states come
 * before bare IDLE, and ACTIVE or IDLE before bare ACTIVE.
 */
export const POWER_MODE_PHRASES: readonly PhraseRule[] = [
  { pattern: /\bSTANDBY\b/i, state: 'standby' },
  { pattern: /\bSLEEP\b/i, state: 'sleep' },
  { pattern: /\bIDLE_A\b/i, state: 'idle_a' },
  { pattern: /\bIDLE_B\b/i, state: 'idle_b' },
  { pattern: /\bIDLE_C\b/i, state: 'idle_c' },
  { pattern: /\bACTIVE\s+OR\s+IDLE\b/i, state: 'active_or_idle' },
  { pattern: /\bACTIVE\/IDLE\b/i, state: 'active_or_idle' },
  { pattern: /\bACTIVE\b/i, state: 'active' },
  { pattern: /\bIDLE\b/i, state: 'idle' },
];

const POWER_MODE_LINE = /Power mode (?:is|was):\s*(.+)/i;

function matchPhrase(text: string): PowerState | null {
  const rule = POWER_MODE_PHRASES.find(({ pattern }) => pattern.test(text));
  return rule ? rule.state : null;
}

function isUnsupportedOutput(output: string): boolean {
  return UNSUPPORTED_PATTERNS.some((pattern) => pattern.test(output));
}

/**
 * What a decoded state was read from
 */
export type DecodeBasis = 'unsupported' | 'mode-line' | 'phrase' | 'exit-status';

export interface PowerDecoding {
  state: PowerState;
  basis: DecodeBasis;
}

/**
 * Decode smartctl stdout into a power state.
 *
 * The `Power mode is:` line is decoded first when present, otherwise the
 * whole output is scanned. With no recognisable phrase a non-zero exit
 * is `unknown` and a clean exit is `active_or_idle`: smartctl exits
 * early with a non-zero status when it finds the drive spun down.
 */
export function decodePowerState(output: string, exitCode: number): PowerDecoding {
  if (isUnsupportedOutput(output)) {
    return { state: 'unknown', basis: 'unsupported' };
  }

  const modeLine = POWER_MODE_LINE.exec(output);
  const fromModeLine = modeLine?.[1] ? matchPhrase(modeLine[1]) : null;
  if (fromModeLine) {
    return { state: fromModeLine, basis: 'mode-line' };
  }

  const fromPhrase = matchPhrase(output);
  if (fromPhrase) {
    return { state: fromPhrase, basis: 'phrase' };
  }

  return { state: exitCode === 0 ? 'active_or_idle' : 'unknown', basis: 'exit-status' };
}

export function buildSmartctlArgs(device: string, deviceType: string): string[] {
  const typeArgs = deviceType === 'auto' ? [] : ['-d', deviceType];
  return ['-n', 'standby', '-i', ...typeArgs, device];
}

/**
 * Reads one power-state sample per call. Drives whose probe timed out are
 * left alone until their cooldown expires.
 */
export class PowerStateProber {
  constructor(
    private readonly cooldown: CooldownBreaker,
    private readonly options: SmartctlOptions,
    private readonly logger: Logger
  ) {}

  async probe(device: string): Promise<PowerState> {
    if (this.cooldown.isInCooldown(device)) {
      this.logger.debug('Device in cooldown, skipping probe', { device });
      return 'unknown';
    }

    const result = await executeCommand(
      this.options.smartctlPath,
      buildSmartctlArgs(device, this.options.deviceType),
      { timeout: this.options.timeoutMs }
    );

    if (result.outcome === 'timeout') {
      const expiresAt = this.cooldown.setCooldown(device);
      const error = new ProbeError('smartctl timeout', ErrorCode.PROBE_TIMEOUT, {
        device,
        timeoutMs: this.options.timeoutMs,
      });
      this.logger.warn(error.message, {
        device,
        code: error.code,
        cooldownUntil: new Date(expiresAt).toISOString(),
      });
      return 'unknown';
    }

    if (result.outcome === 'failed') {
      const error = new ProbeError('smartctl error', ErrorCode.PROBE_INVOCATION_FAILURE, {
        device,
        stderr: result.stderr,
      });
      this.logger.error(error.message, error, { device });
      return 'error';
    }

    const decoded = decodePowerState(result.stdout, result.exitCode);
    if (decoded.basis === 'unsupported') {
      this.logger.debug('Power mode not reported by device', {
        device,
        code: ErrorCode.PROBE_UNSUPPORTED,
      });
    }
    return decoded.state;
  }
}
