/**
 * Mode policy — most frequently written value of the interval.
 *
 * Ties go to the value that reached the top count first: a challenger
 * takes the lead only by exceeding it. With writes 1,2,2,3,3,3,1,1,1 the
 * result is 3 (count 3) until the fourth 1 arrives, then 1 (count 4).
 *
 * Values are counted with Map key equality (SameValueZero), so objects
 * are counted by identity.
 */

import type { ConflationPolicy, ModeResult, PolicyStep } from '../core/types.js';

export interface ModeState<T> {
  counts: Map<T, number>;
  leader: ModeResult<T>;
}

export class ModePolicy<T> implements ConflationPolicy<T, ModeResult<T>, ModeState<T>> {
  readonly name = 'ModeConflator';

  init(value: T): PolicyStep<ModeResult<T>, ModeState<T>> {
    const leader = { value, count: 1 };
    return { value: leader, raw: { counts: new Map([[value, 1]]), leader } };
  }

  merge(
    value: T,
    _current: ModeResult<T>,
    raw: ModeState<T> | undefined,
  ): PolicyStep<ModeResult<T>, ModeState<T>> {
    if (raw === undefined) return this.init(value);

    const count = (raw.counts.get(value) ?? 0) + 1;
    raw.counts.set(value, count);
    if (count > raw.leader.count) {
      raw.leader = { value, count };
    }
    return { value: raw.leader, raw };
  }

  resetRaw(): undefined {
    return undefined;
  }
}

export function modePolicy<T>(): ModePolicy<T> {
  return new ModePolicy<T>();
}
