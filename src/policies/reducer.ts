/**
 * Reducer policy — conflation by a caller-supplied function.
 *
 * The function receives the value being written and the values written
 * earlier in the interval (oldest first, not including the new one), as a
 * copy it may return or keep:
 *
 *   const sum = reducerPolicy<number>((x, past) => past.reduce((a, b) => a + b, x));
 *   // writes 1, 2, 3 → 1, 3, 6
 */

import type { ConflationPolicy, PolicyStep, Reducer } from '../core/types.js';

export class ReducerPolicy<In, Out> implements ConflationPolicy<In, Out, In[]> {
  constructor(
    private readonly reducer: Reducer<In, Out>,
    readonly name: string = 'ReducerConflator',
  ) {}

  init(value: In): PolicyStep<Out, In[]> {
    return { value: this.reducer(value, []), raw: [value] };
  }

  merge(value: In, _current: Out, raw: In[] | undefined): PolicyStep<Out, In[]> {
    if (raw === undefined) return this.init(value);
    // A returned or retained `past` must not grow with later writes.
    // Append only once the reducer has returned.
    const conflated = this.reducer(value, raw.slice());
    raw.push(value);
    return { value: conflated, raw };
  }

  resetRaw(): undefined {
    return undefined;
  }
}

export function reducerPolicy<In, Out = In>(reducer: Reducer<In, Out>, name?: string): ReducerPolicy<In, Out> {
  return new ReducerPolicy(reducer, name);
}

