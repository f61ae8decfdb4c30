/**
 * Conflation benchmarks.
 *
 * Measures write and drain throughput per policy for a hot key set.
 */

import { describe, it, expect } from 'vitest';
import { ConflatedContainer } from '../../src/core/container.js';
import {
  batchPolicy,
  lastValuePolicy,
  meanPolicy,
  modePolicy,
  ohlcPolicy,
  reducerPolicy,
} from '../../src/policies/index.js';
import type { AnyPolicy } from '../../src/core/policy-registry.js';

const policies: Array<{ name: string; create: () => AnyPolicy }> = [
  { name: 'last', create: () => lastValuePolicy<number>() },
  { name: 'ohlc', create: () => ohlcPolicy<number>() },
  { name: 'mean', create: () => meanPolicy() },
  { name: 'batch', create: () => batchPolicy<number>() },
  { name: 'mode', create: () => modePolicy<number>() },
  { name: 'reducer', create: () => reducerPolicy<number>((x, past) => x + past.length) },
];

function bench(policy: AnyPolicy, keys: number, writes: number, drains: number) {
  const c = new ConflatedContainer<number, unknown, unknown, unknown>(policy);
  const perDrain = writes / drains;
  let drainedItems = 0;

  const start = performance.now();
  for (let i = 0; i < writes; i++) {
    c.set(i % keys, i % 97);
    if ((i + 1) % perDrain === 0) {
      drainedItems += c.drain().items.length;
    }
  }
  const elapsedMs = performance.now() - start;

  return { elapsedMs, drainedItems, stats: c.stats() };
}

describe('Conflation benchmarks', () => {
  describe('100 keys, 100k writes, 100 drains', () => {
    for (const p of policies) {
      it(`${p.name}: write + drain`, () => {
        const result = bench(p.create(), 100, 100_000, 100);

        console.log(
          `  ${p.name}: ${(100_000 / result.elapsedMs).toFixed(0)} writes/ms, ` +
          `${result.drainedItems} items drained`,
        );

        expect(result.drainedItems).toBe(100 * 100);
        expect(result.stats.writes).toBe(100_000);
        expect(result.stats.inits).toBe(100);
      });
    }
  });
});
