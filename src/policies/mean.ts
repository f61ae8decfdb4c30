import type { ConflationPolicy, PolicyStep } from '../core/types.js';
import { TypeMismatchError, describeValue } from '../core/errors.js';

/** Running sum and count for one key in the current interval. */
export interface MeanState {
  readonly sum: number;
  readonly count: number;
}

/** Arithmetic mean of the writes since the last reset. */
export class MeanPolicy implements ConflationPolicy<number, number, MeanState> {
  readonly name = 'MeanConflator';

  init(value: number): PolicyStep<number, MeanState> {
    this.check(value);
    return { value, raw: { sum: value, count: 1 } };
  }

  merge(value: number, _current: number, raw: MeanState | undefined): PolicyStep<number, MeanState> {
    if (raw === undefined) return this.init(value);
    this.check(value);
    const sum = raw.sum + value;
    const count = raw.count + 1;
    return { value: sum / count, raw: { sum, count } };
  }

  resetRaw(): undefined {
    return undefined;
  }

  private check(value: unknown): void {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      throw new TypeMismatchError(this.name, 'number', describeValue(value));
    }
  }
}

export function meanPolicy(): MeanPolicy {
  return new MeanPolicy();
}
