/**
 * Core type definitions for keyed conflation.
 *
 * A conflator holds three stores per container:
 *
 *   values  — the conflated value for every key ever written (dirty or stale)
 *   raw     — policy-private accumulator state (sum/count, buffers, counters)
 *   dirty   — keys written since the last reset
 *
 * The container never inspects values or raw state itself; all of that
 * goes through a ConflationPolicy.
 */

// ── Policy Contract ──────────────────────────────────────────────

/** Result of a policy step: the new conflated value and its raw state. */
export interface PolicyStep<Out, Raw> {
  value: Out;
  raw: Raw;
}

/**
 * Strategy that folds writes for a single key into one conflated value.
 *
 * `merge` receives `raw === undefined` when the key has a retained value
 * but its raw state was dropped by a reset (or the policy keeps none).
 */
export interface ConflationPolicy<In, Out, Raw = undefined> {
  /** Display name, used by describe() and toString(). */
  readonly name: string;

  /** Build the conflated value for the first write of a key. */
  init(value: In): PolicyStep<Out, Raw>;

  /** Fold a later write into the current value. */
  merge(value: In, current: Out, raw: Raw | undefined): PolicyStep<Out, Raw>;

  /**
   * Called for every retained raw entry when the container resets.
   * Returning undefined drops the entry. Absent means keep.
   */
  resetRaw?(raw: Raw): Raw | undefined;

  /**
   * Applied to a stored value before it leaves the container, so that
   * internal buffers are never handed to callers.
   */
  snapshot?(value: Out): Out;
}

// ── Value Shapes ─────────────────────────────────────────────────

/** Open / High / Low / Close summary of the writes to a key. */
export interface Ohlc<T> {
  readonly open: T;
  readonly high: T;
  readonly low: T;
  readonly close: T;
}

/** Types with a built-in total order usable by the default OHLC comparator. */
export type Orderable = number | bigint | string;

/** Comparator returning <0, 0 or >0. */
export type Compare<T> = (a: T, b: T) => number;

/** Most frequent value of an interval and how often it was written. */
export interface ModeResult<T> {
  readonly value: T;
  readonly count: number;
}

/**
 * User conflation function: receives the value being written and the
 * values previously written to the key in this interval (oldest first).
 */
export type Reducer<In, Out = In> = (value: In, past: readonly In[]) => Out;

// ── Container Introspection ──────────────────────────────────────

/** Compact description of a container. */
export interface ContainerSummary {
  name: string;
  dirtyCount: number;
  totalEntries: number;
}

/** Cumulative write counters. */
export interface ContainerStats {
  /** Successful set() calls. */
  writes: number;
  /** Writes that created a new entry. */
  inits: number;
  /** Writes folded into an existing entry. */
  merges: number;
  /** reset() and drain() calls. */
  resets: number;
  /** merges / writes, or 0 before the first write. */
  conflationRatio: number;
}

/** The dirty items of one closed interval. */
export interface DrainedBatch<K, V> {
  /** Index of the interval that was closed (0 for the first). */
  interval: number;
  items: Array<[K, V]>;
}
