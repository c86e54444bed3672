/**
 * Canonical disk power states, their activity order and numeric codes
 */

/**
 * Every state in activity order, lowest first. Aggregation keeps the
 * highest-ranked sample, so a single awake reading wins over any number
 * of dormant ones.
 */
export const ACTIVITY_ORDER = [
  'error',
  'unknown',
  'sleep',
  'standby',
  'idle_a',
  'idle_b',
  'idle_c',
  'idle',
  'active_or_idle',
  'active',
] as const;

export type PowerState = (typeof ACTIVITY_ORDER)[number];

/**
 * Exported gauge values. Append-only: existing dashboards and alert rules
 * depend on the first five codes.
 */
export const POWER_STATE_VALUES: Readonly<Record<PowerState, number>> = {
  standby: 0,
  idle: 1,
  active_or_idle: 2,
  unknown: -1,
  error: -2,
  idle_a: 3,
  idle_b: 4,
  idle_c: 5,
  active: 6,
  sleep: 7,
};

const RANKS: ReadonlyMap<string, number> = new Map(
  ACTIVITY_ORDER.map((state, index): [string, number] => [state, index])
);

export function isPowerState(value: string): value is PowerState {
  return RANKS.has(value);
}

/**
 * Narrow arbitrary text to a state; anything unrecognised is `unknown`
 */
export function toPowerState(value: string): PowerState {
  const normalized = value.trim().toLowerCase();
  return isPowerState(normalized) ? normalized : 'unknown';
}

export function activityRank(state: PowerState): number {
  return RANKS.get(state) ?? 0;
}

/**
 * Keep whichever state is more active; ties keep `a`
 */
export function mergePowerStates(a: PowerState, b: PowerState): PowerState {
  return activityRank(b) > activityRank(a) ? b : a;
}

/**
 * Fold samples into the most active one. No samples means `unknown`.
 */
export function highestPowerState(samples: Iterable<PowerState>): PowerState {
  let highest: PowerState | undefined;
  for (const sample of samples) {
    highest = highest === undefined ? sample : mergePowerStates(highest, sample);
  }
  return highest ?? 'unknown';
}

export function powerStateValue(state: PowerState): number {
  return POWER_STATE_VALUES[state];
}
