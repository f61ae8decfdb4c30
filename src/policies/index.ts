/**
 * Policies index — built-in policies, default registry and constructors.
 *
 * Usage (typed):
 *   const prices = createOhlcConflator<string>();
 *   prices.set('AAPL', 187.2);
 *
 * Usage (config-driven):
 *   const c = createConflator({ policy: 'mean', name: 'latency' });
 *
 * The default registry includes:
 *   - last:  LastValuePolicy
 *   - ohlc:  OhlcPolicy (natural order of number, bigint, string)
 *   - mean:  MeanPolicy
 *   - batch: BatchPolicy
 *   - mode:  ModePolicy
 */

import { PolicyRegistry } from '../core/policy-registry.js';
import { ConflatedContainer } from '../core/container.js';
import { mergeConfigs } from '../core/config.js';
import type { ConflatorConfig } from '../core/config.js';
import type { Compare, ModeResult, Ohlc, Orderable, Reducer } from '../core/types.js';
import { lastValuePolicy } from './last-value.js';
import { ohlcPolicy, compareOrderable } from './ohlc.js';
import { meanPolicy } from './mean.js';
import type { MeanState } from './mean.js';
import { batchPolicy } from './batch.js';
import { modePolicy } from './mode.js';
import type { ModeState } from './mode.js';
import { reducerPolicy } from './reducer.js';

/** Create a registry pre-loaded with the built-in policies. */
export function createDefaultRegistry(): PolicyRegistry {
  return new PolicyRegistry()
    .register('last', () => lastValuePolicy<unknown>())
    .register('ohlc', () => ohlcPolicy<unknown>(compareOrderable))
    .register('mean', () => meanPolicy())
    .register('batch', () => batchPolicy<unknown>())
    .register('mode', () => modePolicy<unknown>());
}

/**
 * Build a container from a (partial) config. Values are checked by the
 * policy at run time, since their type is not known statically.
 */
export function createConflator<K = unknown>(
  config: Partial<ConflatorConfig> = {},
  registry: PolicyRegistry = createDefaultRegistry(),
): ConflatedContainer<K, unknown, unknown, unknown> {
  const resolved = mergeConfigs(config);
  const policy = registry.create(resolved.policy);
  return new ConflatedContainer<K, unknown, unknown, unknown>(policy, { name: resolved.name });
}

// ── Typed Constructors ───────────────────────────────────────────

export function createLastValueConflator<K, V>(): ConflatedContainer<K, V> {
  return new ConflatedContainer<K, V>(lastValuePolicy<V>());
}

export function createOhlcConflator<K, V extends Orderable = number>(): ConflatedContainer<K, V, Ohlc<V>>;
export function createOhlcConflator<K, V>(compare: Compare<V>): ConflatedContainer<K, V, Ohlc<V>>;
export function createOhlcConflator<K, V>(compare?: Compare<V>): ConflatedContainer<K, V, Ohlc<V>> {
  return new ConflatedContainer<K, V, Ohlc<V>>(ohlcPolicy<V>(compare ?? compareOrderable));
}

export function createMeanConflator<K>(): ConflatedContainer<K, number, number, MeanState> {
  return new ConflatedContainer<K, number, number, MeanState>(meanPolicy());
}

export function createBatchConflator<K, V>(): ConflatedContainer<K, V, V[], V[]> {
  return new ConflatedContainer<K, V, V[], V[]>(batchPolicy<V>());
}

export function createModeConflator<K, V>(): ConflatedContainer<K, V, ModeResult<V>, ModeState<V>> {
  return new ConflatedContainer<K, V, ModeResult<V>, ModeState<V>>(modePolicy<V>());
}

/**
 * Container conflating with `reducer`. `name` is the display name shown
 * by describe() and toString().
 */
export function createReducerConflator<K, In, Out = In>(
  reducer: Reducer<In, Out>,
  name?: string,
): ConflatedContainer<K, In, Out, In[]> {
  return new ConflatedContainer<K, In, Out, In[]>(reducerPolicy(reducer, name));
}

export { LastValuePolicy, lastValuePolicy } from './last-value.js';
export { OhlcPolicy, ohlcPolicy, compareOrderable } from './ohlc.js';
export { MeanPolicy, meanPolicy, type MeanState } from './mean.js';
export { BatchPolicy, batchPolicy } from './batch.js';
export { ModePolicy, modePolicy, type ModeState } from './mode.js';
export { ReducerPolicy, reducerPolicy } from './reducer.js';
