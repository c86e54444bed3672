/**
 * Per-device probe cooldown
 */

export type Clock = () => number;

/**
 * Suppresses probing of a device for a fixed window after its probe timed
 * out, so an unresponsive drive does not stall every scrape. Entries
 * expire lazily on lookup.
 */
export class CooldownBreaker {
  private readonly until: Map<string, number> = new Map();

  constructor(
    private readonly durationMs: number,
    private readonly clock: Clock = Date.now
  ) {}

  /**
   * True while the device's cooldown has not elapsed
   */
  isInCooldown(device: string): boolean {
    const expiresAt = this.until.get(device);
    if (expiresAt === undefined) {
      return false;
    }

    if (this.clock() >= expiresAt) {
      this.until.delete(device);
      return false;
    }

    return true;
  }

  /**
   * Start (or restart) the device's cooldown window
   */
  setCooldown(device: string): number {
    const expiresAt = this.clock() + this.durationMs;
    this.until.set(device, expiresAt);
    return expiresAt;
  }

  /**
   * Number of devices currently suppressed. Drops expired entries first.
   */
  size(): number {
    this.prune();
    return this.until.size;
  }

  /**
   * Remove expired entries
   */
  prune(): number {
    const now = this.clock();
    let pruned = 0;

    for (const [device, expiresAt] of this.until.entries()) {
      if (now >= expiresAt) {
        this.until.delete(device);
        pruned++;
      }
    }

    return pruned;
  }
}
