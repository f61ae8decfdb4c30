import type { ConflationPolicy, PolicyStep } from '../core/types.js';

/**
 * Collects every write of the interval in order.
 *
 * The stored value and the raw buffer are the same array; reads go
 * through snapshot(), so callers always get their own copy. The buffer is
 * dropped on reset and the next write starts a new one.
 */
export class BatchPolicy<T> implements ConflationPolicy<T, T[], T[]> {
  readonly name = 'BatchConflator';

  init(value: T): PolicyStep<T[], T[]> {
    const buffer = [value];
    return { value: buffer, raw: buffer };
  }

  merge(value: T, _current: T[], raw: T[] | undefined): PolicyStep<T[], T[]> {
    if (raw === undefined) return this.init(value);
    raw.push(value);
    return { value: raw, raw };
  }

  resetRaw(): undefined {
    return undefined;
  }

  snapshot(value: T[]): T[] {
    return value.slice();
  }
}

export function batchPolicy<T>(): BatchPolicy<T> {
  return new BatchPolicy<T>();
}
