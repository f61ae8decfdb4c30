/**
 * OHLC policy — Open, High, Low and Close of the writes to a key.
 *
 * There is no raw state: a write always merges against the stored value,
 * so after a reset the next write extends the retained summary instead of
 * starting a new one (open stays the first value ever written).
 */

import type { Compare, ConflationPolicy, Ohlc, Orderable, PolicyStep } from '../core/types.js';
import { TypeMismatchError, describeValue } from '../core/errors.js';

const NAME = 'OHLCConflator';

function isOrderable(value: unknown): value is Orderable {
  if (typeof value === 'number') return !Number.isNaN(value);
  return typeof value === 'bigint' || typeof value === 'string';
}

/**
 * Natural order of number, bigint and string. `b` must share the type of
 * `a`; mixing them (1 vs '1') is rejected rather than coerced.
 */
export function compareOrderable(a: unknown, b: unknown): number {
  if (!isOrderable(a)) {
    throw new TypeMismatchError(NAME, 'number, bigint or string', describeValue(a));
  }
  if (!isOrderable(b) || typeof b !== typeof a) {
    throw new TypeMismatchError(NAME, typeof a, describeValue(b));
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export class OhlcPolicy<T> implements ConflationPolicy<T, Ohlc<T>> {
  readonly name = NAME;

  constructor(private readonly compare: Compare<T>) {}

  init(value: T): PolicyStep<Ohlc<T>, undefined> {
    // Self-comparison validates the first write the same way later ones are.
    this.compare(value, value);
    return { value: { open: value, high: value, low: value, close: value }, raw: undefined };
  }

  merge(value: T, current: Ohlc<T>): PolicyStep<Ohlc<T>, undefined> {
    const aboveHigh = this.compare(current.high, value) < 0;
    const belowLow = this.compare(current.low, value) > 0;
    return {
      value: {
        open: current.open,
        high: aboveHigh ? value : current.high,
        low: belowLow ? value : current.low,
        close: value,
      },
      raw: undefined,
    };
  }
}

/**
 * OHLC over number, bigint or string using their natural order, or over
 * any type given a comparator.
 */
export function ohlcPolicy<T extends Orderable = number>(): OhlcPolicy<T>;
export function ohlcPolicy<T>(compare: Compare<T>): OhlcPolicy<T>;
export function ohlcPolicy<T>(compare: Compare<T> = compareOrderable): OhlcPolicy<T> {
  return new OhlcPolicy<T>(compare);
}
