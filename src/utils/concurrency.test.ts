/**
 * Unit tests for the bounded worker pool
 */

import { describe, it, expect } from '@jest/globals';
import { delay, mapWithConcurrency } from './concurrency.js';

interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function flushPending(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('mapWithConcurrency', () => {
  it('should keep results in input order', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (ms) => {
      await delay(ms);
      return ms * 2;
    });

    expect(results).toEqual([60, 20, 40]);
  });

  it('should never exceed the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 2, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight--;
    });

    expect(peak).toBe(2);
  });

  it('should queue excess items until a slot frees up', async () => {
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    const run = mapWithConcurrency([0, 1, 2], 2, async (index) => {
      started.push(index);
      await gates[index]?.promise;
      return index;
    });

    await flushPending();
    expect(started).toEqual([0, 1]);

    gates[1]?.resolve();
    await flushPending();
    expect(started).toEqual([0, 1, 2]);

    gates[0]?.resolve();
    gates[2]?.resolve();
    await expect(run).resolves.toEqual([0, 1, 2]);
  });

  it('should handle an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('should reject a non-positive limit', async () => {
    await expect(mapWithConcurrency([1], 0, async () => 1)).rejects.toThrow(RangeError);
  });
});

describe('delay', () => {
  it('should resolve immediately for zero', async () => {
    await expect(delay(0)).resolves.toBeUndefined();
  });
});
