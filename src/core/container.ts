/**
 * ConflatedContainer — keyed store that collapses repeated writes.
 *
 * Producer writes accumulate per key through a ConflationPolicy. The
 * consumer reads only the keys written since the last reset (the dirty
 * set), then calls reset() (or drain(), which does both) to start the
 * next interval.
 *
 *   set()    → policy.init / policy.merge → key marked dirty
 *   get()    → value of a dirty key
 *   reset()  → dirty set cleared, raw state passed through policy.resetRaw
 *
 * Values of keys that were not written since the last reset are kept and
 * remain visible through data(); policies that carry history (OHLC)
 * merge against them on the next write.
 *
 * Not synchronized. Callers sharing a container between producers and
 * consumers must serialize set() against drain()/reset().
 */

import type {
  ConflationPolicy,
  ContainerStats,
  ContainerSummary,
  DrainedBatch,
  PolicyStep,
} from './types.js';
import { KeyNotDirtyError, KeyNotFoundError } from './errors.js';

export interface ContainerOptions {
  /** Display name; defaults to the policy name. */
  name?: string;
}

interface Entry<Out, Raw> {
  value: Out;
  /** Undefined once a reset has dropped the raw state. */
  raw: Raw | undefined;
}

export class ConflatedContainer<K, In, Out = In, Raw = undefined> implements Iterable<K> {
  readonly name: string;

  private readonly entries = new Map<K, Entry<Out, Raw>>();
  private readonly dirty = new Set<K>();

  private intervalIndex = 0;
  private writeCount = 0;
  private initCount = 0;
  private mergeCount = 0;

  constructor(
    readonly policy: ConflationPolicy<In, Out, Raw>,
    options: ContainerOptions = {},
  ) {
    this.name = options.name ?? policy.name;
  }

  // ── Writes ───────────────────────────────────────────────────

  /**
   * Fold `value` into the entry for `key` and mark the key dirty.
   *
   * The policy step runs to completion before anything is stored, so a
   * TypeMismatchError thrown by the policy leaves the container unchanged.
   */
  set(key: K, value: In): this {
    const existing = this.entries.get(key);
    let step: PolicyStep<Out, Raw>;

    if (existing === undefined) {
      step = this.policy.init(value);
      this.initCount++;
    } else {
      step = this.policy.merge(value, existing.value, existing.raw);
      this.mergeCount++;
    }

    this.entries.set(key, { value: step.value, raw: step.raw });
    this.dirty.add(key);
    this.writeCount++;
    return this;
  }

  /**
   * Remove a dirty key from every store.
   * @throws KeyNotFoundError if the key is not dirty.
   */
  delete(key: K): void {
    if (!this.dirty.has(key)) {
      throw new KeyNotFoundError(key);
    }
    this.dirty.delete(key);
    this.entries.delete(key);
  }

  // ── Reads ────────────────────────────────────────────────────

  /**
   * Conflated value of a dirty key.
   * @throws KeyNotDirtyError if the key was never written or not since the last reset.
   */
  get(key: K): Out {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      throw new KeyNotDirtyError(key, 'absent');
    }
    if (!this.dirty.has(key)) {
      throw new KeyNotDirtyError(key, 'stale');
    }
    return this.read(entry.value);
  }

  /** True if the key was written in the current interval. */
  contains(key: K): boolean {
    return this.dirty.has(key);
  }

  /** Alias of contains(). */
  isDirty(key: K): boolean {
    return this.dirty.has(key);
  }

  /** Number of dirty keys. */
  get size(): number {
    return this.dirty.size;
  }

  /** Index of the current interval (resets so far). */
  get interval(): number {
    return this.intervalIndex;
  }

  /** Dirty keys, as of the call. */
  keys(): IterableIterator<K> {
    return [...this.dirty][Symbol.iterator]();
  }

  /** Values of the dirty keys, as of the call. */
  values(): IterableIterator<Out> {
    return this.readEach([...this.dirty], (_key, value) => value);
  }

  /** [key, value] pairs of the dirty keys, as of the call. */
  items(): IterableIterator<[K, Out]> {
    return this.readEach([...this.dirty], (key, value): [K, Out] => [key, value]);
  }

  [Symbol.iterator](): Iterator<K> {
    return this.keys();
  }

  /** Every stored value, dirty or stale. Does not touch dirty state. */
  data(): ReadonlyMap<K, Out> {
    const out = new Map<K, Out>();
    for (const [key, entry] of this.entries) {
      out.set(key, this.read(entry.value));
    }
    return out;
  }

  // ── Interval Control ─────────────────────────────────────────

  /**
   * Close the current interval. Every dirty key becomes clean and its raw
   * state goes through policy.resetRaw; values are retained.
   */
  reset(): void {
    const resetRaw = this.policy.resetRaw;
    for (const key of this.dirty) {
      const entry = this.entries.get(key);
      if (entry !== undefined && entry.raw !== undefined && resetRaw !== undefined) {
        entry.raw = resetRaw.call(this.policy, entry.raw);
      }
    }
    this.dirty.clear();
    this.intervalIndex++;
  }

  /** Take the dirty items and reset in one step. */
  drain(): DrainedBatch<K, Out> {
    const interval = this.intervalIndex;
    const items = [...this.items()];
    this.reset();
    return { interval, items };
  }

  /** Drop every entry, dirty or stale. Counters are kept. */
  clear(): void {
    this.dirty.clear();
    this.entries.clear();
  }

  // ── Introspection ────────────────────────────────────────────

  describe(): ContainerSummary {
    return {
      name: this.name,
      dirtyCount: this.dirty.size,
      totalEntries: this.entries.size,
    };
  }

  stats(): ContainerStats {
    return {
      writes: this.writeCount,
      inits: this.initCount,
      merges: this.mergeCount,
      resets: this.intervalIndex,
      conflationRatio: this.writeCount === 0 ? 0 : this.mergeCount / this.writeCount,
    };
  }

  toString(): string {
    return `<${this.name} dirty:${this.dirty.size} entries:${this.entries.size}>`;
  }

  // ── Internals ────────────────────────────────────────────────

  private read(value: Out): Out {
    return this.policy.snapshot ? this.policy.snapshot(value) : value;
  }

  private *readEach<T>(keys: K[], pick: (key: K, value: Out) => T): Generator<T, void, undefined> {
    for (const key of keys) {
      const entry = this.entries.get(key);
      if (entry !== undefined) {
        yield pick(key, this.read(entry.value));
      }
    }
  }
}
