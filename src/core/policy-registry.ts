/**
 * Policy Registry — maps policy names to factories.
 *
 * Config-driven construction looks policies up here by name. The default
 * registry (createDefaultRegistry() in src/policies/index.ts) carries the
 * built-in policies; custom reducers are registered under names of the
 * caller's choosing:
 *
 *   const registry = createDefaultRegistry();
 *   registry.register('sum', () => reducerPolicy<number>((x, past) => ..., 'SumConflator'));
 *   const c = createConflator({ policy: 'sum' }, registry);
 */

import type { ConflationPolicy } from './types.js';
import { UnknownPolicyError } from './errors.js';

/** A policy with its value types erased; values are checked at run time. */
export type AnyPolicy = ConflationPolicy<unknown, unknown, unknown>;

/**
 * Builds a fresh policy instance. Policies may keep per-instance state, so
 * every container gets its own.
 */
export type PolicyFactory = () => AnyPolicy;

export class PolicyRegistry {
  private factories = new Map<string, PolicyFactory>();

  /** Register (or replace) the factory for a name. */
  register(name: string, factory: PolicyFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  get(name: string): PolicyFactory | undefined {
    return this.factories.get(name);
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  /** Registered names, in registration order. */
  get names(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Build a policy by name.
   * @throws UnknownPolicyError if nothing is registered under the name.
   */
  create(name: string): AnyPolicy {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new UnknownPolicyError(name, this.names);
    }
    return factory();
  }
}

/**
 * Create a new empty registry.
 *
 * For a registry pre-loaded with the built-in policies, use
 * createDefaultRegistry() from src/policies/index.ts.
 */
export function createRegistry(): PolicyRegistry {
  return new PolicyRegistry();
}
