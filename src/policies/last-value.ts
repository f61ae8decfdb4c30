import type { ConflationPolicy, PolicyStep } from '../core/types.js';

/** Keeps only the most recent write. */
export class LastValuePolicy<T> implements ConflationPolicy<T, T> {
  readonly name = 'LastValueConflator';

  init(value: T): PolicyStep<T, undefined> {
    return { value, raw: undefined };
  }

  merge(value: T): PolicyStep<T, undefined> {
    return { value, raw: undefined };
  }
}

export function lastValuePolicy<T>(): LastValuePolicy<T> {
  return new LastValuePolicy<T>();
}
