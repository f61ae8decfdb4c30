/**
 * Conflator configuration model.
 *
 * A config names a registered policy and, optionally, the display name of
 * the container. Partial configs from several sources (defaults, a config
 * file, code) are merged left to right.
 */

import { ConfigError } from './errors.js';

// ── Configuration Schema ─────────────────────────────────────────

export interface ConflatorConfig {
  /**
   * Registered policy name. Built in: "last", "ohlc", "mean", "batch",
   * "mode". Custom reducers use whatever name they were registered under.
   */
  policy: string;

  /** Display name for describe() and toString(). Defaults to the policy's. */
  name?: string;
}

// ── Defaults ─────────────────────────────────────────────────────

export const DEFAULT_CONFIG: Readonly<ConflatorConfig> = {
  policy: 'last',
};

// ── Config Merging ───────────────────────────────────────────────

/**
 * Merge configuration sources over DEFAULT_CONFIG. Later sources win;
 * undefined fields do not override.
 */
export function mergeConfigs(...sources: Partial<ConflatorConfig>[]): ConflatorConfig {
  const result: ConflatorConfig = { ...DEFAULT_CONFIG };

  for (const source of sources) {
    if (source.policy !== undefined) result.policy = source.policy;
    if (source.name !== undefined) result.name = source.name;
  }

  return result;
}

// ── Validation ───────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate untyped input (parsed JSON, for example) as a partial config.
 * Unknown fields are rejected so that typos do not pass silently.
 */
export function parseConflatorConfig(input: unknown): Partial<ConflatorConfig> {
  if (!isRecord(input)) {
    throw new ConfigError('Conflator config must be an object');
  }

  const config: Partial<ConflatorConfig> = {};

  for (const [field, value] of Object.entries(input)) {
    switch (field) {
      case 'policy':
        if (typeof value !== 'string' || value.trim() === '') {
          throw new ConfigError('"policy" must be a non-empty string');
        }
        config.policy = value.trim();
        break;
      case 'name':
        if (typeof value !== 'string') {
          throw new ConfigError('"name" must be a string');
        }
        config.name = value;
        break;
      default:
        throw new ConfigError(`Unknown config field "${field}"`);
    }
  }

  return config;
}
