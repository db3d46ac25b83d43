import { describe, expect, it } from 'vitest';

import { normalizeConcurrency, parseCsvArgument, runWithConcurrency } from '../../src/core/execution-loop.js';

describe('execution loop helpers', () => {
  it('parses CSV arguments into trimmed lists', () => {
    expect(parseCsvArgument(undefined)).toBeUndefined();
    expect(parseCsvArgument('')).toBeUndefined();
    expect(parseCsvArgument('  ')).toBeUndefined();
    expect(parseCsvArgument('svg, png,,')).toEqual(['svg', 'png']);
  });

  it('runs async work in bounded concurrency while preserving result ordering', async () => {
    const items = [5, 1, 4, 2, 3];
    let inFlight = 0;
    let maxInFlight = 0;

    const results = await runWithConcurrency(items, 2, async (item) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, item));
      inFlight -= 1;
      return item * 10;
    });

    expect(results).toEqual([50, 10, 40, 20, 30]);
    expect(maxInFlight).toBe(2);
  });

  it('hands each item to exactly one worker', async () => {
    const seen: number[] = [];
    await runWithConcurrency([0, 1, 2, 3, 4, 5, 6], 3, async (item) => {
      seen.push(item);
      await Promise.resolve();
      return item;
    });

    expect([...seen].sort((left, right) => left - right)).toEqual([0, 1, 2, 3, 4, 5, 6]);
  });

  it('returns an empty list without starting workers', async () => {
    let calls = 0;
    const results = await runWithConcurrency([], 4, async () => {
      calls += 1;
      return calls;
    });

    expect(results).toEqual([]);
    expect(calls).toBe(0);
  });

  it('clamps concurrency to a positive integer no larger than the item count', () => {
    expect(normalizeConcurrency(8, 3)).toBe(3);
    expect(normalizeConcurrency(2.7, 10)).toBe(2);
    expect(normalizeConcurrency(0, 10)).toBe(1);
    expect(normalizeConcurrency(Number.NaN, 10)).toBe(1);
  });
});
