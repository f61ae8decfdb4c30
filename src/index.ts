/**
 * Keyed conflation for fast producers and slow consumers.
 *
 * Writes for the same key collapse according to a policy; the consumer
 * reads only the keys written since it last called reset() or drain().
 */

export { ConflatedContainer, type ContainerOptions } from './core/container.js';
export { PolicyRegistry, createRegistry, type AnyPolicy, type PolicyFactory } from './core/policy-registry.js';
export {
  DEFAULT_CONFIG,
  mergeConfigs,
  parseConflatorConfig,
  type ConflatorConfig,
} from './core/config.js';
export { encodeBatch, decodeBatch, BATCH_MAGIC, BATCH_VERSION } from './core/codec.js';
export {
  ConflationError,
  KeyNotDirtyError,
  KeyNotFoundError,
  TypeMismatchError,
  UnknownPolicyError,
  ConfigError,
  CodecError,
  type NotDirtyReason,
} from './core/errors.js';
export type {
  ConflationPolicy,
  PolicyStep,
  Ohlc,
  Orderable,
  Compare,
  ModeResult,
  Reducer,
  ContainerSummary,
  ContainerStats,
  DrainedBatch,
} from './core/types.js';
export * from './policies/index.js';
