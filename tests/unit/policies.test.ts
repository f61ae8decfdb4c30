/**
 * Unit tests for the built-in conflation policies.
 */

import { describe, it, expect } from 'vitest';
import {
  createBatchConflator,
  createConflator,
  createLastValueConflator,
  createMeanConflator,
  createModeConflator,
  createOhlcConflator,
  createReducerConflator,
  compareOrderable,
} from '../../src/policies/index.js';
import { TypeMismatchError } from '../../src/core/errors.js';

function sum(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

// ── Last Value ───────────────────────────────────────────────────

describe('last-value policy', () => {
  it('keeps the most recent write', () => {
    const c = createLastValueConflator<string, string>();
    c.set('k', 'first');
    c.set('k', 'second');
    expect(c.get('k')).toBe('second');
  });
});

// ── OHLC ─────────────────────────────────────────────────────────

describe('OHLC policy', () => {
  function ohlcAfter(values: number[]) {
    const c = createOhlcConflator<number>();
    for (const v of values) c.set(1, v);
    return c;
  }

  it('summarizes writes 0..4', () => {
    expect(ohlcAfter([0, 1, 2, 3, 4]).get(1)).toEqual({ open: 0, high: 4, low: 0, close: 4 });
  });

  it('tracks a new high', () => {
    expect(ohlcAfter([0, 1, 2, 3, 4, 5]).get(1)).toEqual({ open: 0, high: 5, low: 0, close: 5 });
  });

  it('tracks a new low', () => {
    expect(ohlcAfter([0, 1, 2, 3, 4, -1]).get(1)).toEqual({ open: 0, high: 4, low: -1, close: -1 });
  });

  it('updates close inside the range', () => {
    expect(ohlcAfter([0, 1, 2, 3, 4, 2]).get(1)).toEqual({ open: 0, high: 4, low: 0, close: 2 });
  });

  it('follows a sequence step by step', () => {
    const c = ohlcAfter([0, 1, 2, 3, 4]);
    c.set(1, 5);
    expect(c.get(1)).toEqual({ open: 0, high: 5, low: 0, close: 5 });
    c.set(1, -1);
    expect(c.get(1)).toEqual({ open: 0, high: 5, low: -1, close: -1 });
  });

  it('carries the summary across a reset', () => {
    const c = ohlcAfter([0, 1, 2, 3, 4]);
    c.reset();
    c.set(1, 7);
    expect(c.get(1)).toEqual({ open: 0, high: 7, low: 0, close: 7 });
  });

  it('orders strings and bigints naturally', () => {
    const words = createOhlcConflator<string, string>();
    for (const w of ['m', 'c', 'x', 'k']) words.set('w', w);
    expect(words.get('w')).toEqual({ open: 'm', high: 'x', low: 'c', close: 'k' });

    const big = createOhlcConflator<string, bigint>();
    for (const n of [10n, 2n, 30n]) big.set('n', n);
    expect(big.get('n')).toEqual({ open: 10n, high: 30n, low: 2n, close: 30n });
  });

  it('accepts a comparator for other types', () => {
    const c = createOhlcConflator<string, Date>((a, b) => a.getTime() - b.getTime());
    const d1 = new Date(Date.UTC(2024, 0, 2));
    const d0 = new Date(Date.UTC(2024, 0, 1));
    const d2 = new Date(Date.UTC(2024, 0, 3));
    c.set('t', d1);
    c.set('t', d0);
    c.set('t', d2);
    c.set('t', d1);
    expect(c.get('t')).toEqual({ open: d1, high: d2, low: d0, close: d1 });
  });

  it('rejects values of a different type than the open', () => {
    const c = createConflator<string>({ policy: 'ohlc' });
    c.set('k', 1);
    expect(() => c.set('k', '2')).toThrow(TypeMismatchError);
    expect(() => c.set('k', '2')).toThrow('OHLCConflator expected number, got string');
    expect(c.get('k')).toEqual({ open: 1, high: 1, low: 1, close: 1 });
  });

  it('rejects values without a natural order on the first write', () => {
    const c = createConflator<string>({ policy: 'ohlc' });
    expect(() => c.set('k', { price: 1 })).toThrow('OHLCConflator expected number, bigint or string, got object');
    expect(() => c.set('k', NaN)).toThrow('OHLCConflator expected number, bigint or string, got NaN');
    expect(c.data().size).toBe(0);
  });

  it('compareOrderable returns the sign of the order', () => {
    expect(compareOrderable(1, 2)).toBe(-1);
    expect(compareOrderable('b', 'a')).toBe(1);
    expect(compareOrderable(3n, 3n)).toBe(0);
  });
});

// ── Mean ─────────────────────────────────────────────────────────

describe('mean policy', () => {
  it('reports the running mean', () => {
    const c = createMeanConflator<string>();
    const means: number[] = [];
    for (const v of [1, 2, 3]) {
      c.set('k', v);
      means.push(c.get('k'));
    }
    expect(means).toEqual([1, 1.5, 2]);
  });

  it('starts a new mean after reset', () => {
    const c = createMeanConflator<string>();
    for (const v of [1, 2, 3]) c.set('k', v);
    c.reset();
    c.set('k', 5);
    expect(c.get('k')).toBe(5);
  });

  it('keeps the last mean visible through data() after reset', () => {
    const c = createMeanConflator<string>();
    c.set('k', 2);
    c.set('k', 4);
    c.reset();
    expect(c.data().get('k')).toBe(3);
  });

  it('averages each key separately', () => {
    const c = createMeanConflator<string>();
    c.set('a', 10);
    c.set('b', 1);
    c.set('a', 20);
    expect(c.get('a')).toBe(15);
    expect(c.get('b')).toBe(1);
  });

  it('rejects non-numeric input without touching the accumulator', () => {
    const c = createConflator<string>({ policy: 'mean' });
    c.set('k', 1);
    c.set('k', 2);
    expect(() => c.set('k', 'x')).toThrow('MeanConflator expected number, got string');
    expect(() => c.set('k', NaN)).toThrow('MeanConflator expected number, got NaN');
    c.set('k', 3);
    expect(c.get('k')).toBe(2);
  });
});

// ── Batch ────────────────────────────────────────────────────────

describe('batch policy', () => {
  it('accumulates writes in order', () => {
    const c = createBatchConflator<string, number>();
    for (let i = 0; i < 5; i++) c.set('k', i);
    expect(c.get('k')).toEqual([0, 1, 2, 3, 4]);
  });

  it('starts a fresh batch after reset', () => {
    const c = createBatchConflator<string, number>();
    for (let i = 0; i < 5; i++) c.set('k', i);
    c.reset();
    c.set('k', 9);
    expect(c.get('k')).toEqual([9]);
  });

  it('keeps the previous batch in data() until the key is written again', () => {
    const c = createBatchConflator<string, number>();
    c.set('k', 1);
    c.set('k', 2);
    c.reset();
    expect(c.data().get('k')).toEqual([1, 2]);
    c.set('k', 3);
    expect(c.data().get('k')).toEqual([3]);
  });

  it('hands out copies', () => {
    const c = createBatchConflator<string, number>();
    c.set('k', 1);
    c.set('k', 2);

    const read = c.get('k');
    read.push(99);
    const [value] = [...c.values()];
    value.length = 0;

    expect(c.get('k')).toEqual([1, 2]);
    c.set('k', 3);
    expect(read).toEqual([1, 2, 99]);
    expect(c.get('k')).toEqual([1, 2, 3]);
  });
});

// ── Mode ─────────────────────────────────────────────────────────

describe('mode policy', () => {
  it('reports the most frequent value and its count', () => {
    const c = createModeConflator<string, number>();
    for (const v of [1, 2, 2, 3, 3, 3]) c.set('k', v);
    expect(c.get('k')).toEqual({ value: 3, count: 3 });

    for (let i = 0; i < 3; i++) c.set('k', 1);
    expect(c.get('k')).toEqual({ value: 1, count: 4 });
  });

  it('keeps the lead with the first value to reach the top count', () => {
    const c = createModeConflator<string, string>();
    c.set('k', 'x');
    c.set('k', 'y');
    expect(c.get('k')).toEqual({ value: 'x', count: 1 });

    c.set('k', 'y');
    c.set('k', 'x');
    expect(c.get('k')).toEqual({ value: 'y', count: 2 });
  });

  it('counts from zero after reset', () => {
    const c = createModeConflator<string, number>();
    for (const v of [4, 4, 4]) c.set('k', v);
    c.reset();
    c.set('k', 7);
    expect(c.get('k')).toEqual({ value: 7, count: 1 });
  });
});

// ── Reducer ──────────────────────────────────────────────────────

describe('reducer policy', () => {
  it('applies the reducer to the new value and past values', () => {
    const c = createReducerConflator<string, number>((x, past) => x + sum(past));
    const results: number[] = [];
    for (const v of [1, 2, 3]) {
      c.set('k', v);
      results.push(c.get('k'));
    }
    expect(results).toEqual([1, 3, 6]);

    c.reset();
    c.set('k', 1);
    expect(c.get('k')).toBe(1);
  });

  it('passes past values oldest first, excluding the current write', () => {
    const calls: Array<[string, string[]]> = [];
    const c = createReducerConflator<number, string>((x, past) => {
      calls.push([x, [...past]]);
      return x;
    });
    c.set(1, 'a');
    c.set(1, 'b');
    c.set(1, 'c');
    expect(calls).toEqual([['a', []], ['b', ['a']], ['c', ['a', 'b']]]);
  });

  it('hands the reducer a copy of the history it may return', () => {
    const c = createReducerConflator<string, number, readonly number[]>((_x, past) => past);
    c.set('k', 1);
    expect(c.get('k')).toEqual([]);

    c.set('k', 2);
    const second = c.get('k');
    expect(second).toEqual([1]);

    c.set('k', 3);
    expect(second).toEqual([1]);
    expect(c.get('k')).toEqual([1, 2]);
  });

  it('may produce a different output type', () => {
    const c = createReducerConflator<string, number, { last: number; seen: number }>(
      (x, past) => ({ last: x, seen: past.length + 1 }),
    );
    c.set('k', 10);
    c.set('k', 20);
    expect(c.get('k')).toEqual({ last: 20, seen: 2 });
  });

  it('does not record a write the reducer rejected', () => {
    const c = createReducerConflator<string, number>((x, past) => {
      if (x < 0) throw new RangeError('negative');
      return x + sum(past);
    });
    c.set('k', 1);
    c.set('k', 2);
    expect(() => c.set('k', -1)).toThrow(RangeError);
    c.set('k', 3);
    expect(c.get('k')).toBe(6);
  });

  it('uses the display name it was given', () => {
    expect(createReducerConflator<string, number>((x) => x).toString()).toBe(
      '<ReducerConflator dirty:0 entries:0>',
    );
    expect(createReducerConflator<string, number>((x) => x, 'SumConflator').toString()).toBe(
      '<SumConflator dirty:0 entries:0>',
    );
  });
});

describe('policy names', () => {
  it('show up in toString()', () => {
    expect(createOhlcConflator().toString()).toBe('<OHLCConflator dirty:0 entries:0>');
    expect(createMeanConflator().toString()).toBe('<MeanConflator dirty:0 entries:0>');
    expect(createBatchConflator().toString()).toBe('<BatchConflator dirty:0 entries:0>');
    expect(createModeConflator().toString()).toBe('<ModeConflator dirty:0 entries:0>');
  });
});
