/**
 * Error classes. Every error raised by this package extends
 * ConflationError, so callers can catch the family with one instanceof.
 */

export class ConflationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConflationError';
  }
}

/** Why a key could not be read: never written, or written before the last reset. */
export type NotDirtyReason = 'absent' | 'stale';

/** get() on a key that is not dirty in the current interval. */
export class KeyNotDirtyError extends ConflationError {
  constructor(
    readonly key: unknown,
    readonly reason: NotDirtyReason,
  ) {
    super(
      reason === 'stale'
        ? `${String(key)} not found in dirty set (stale since last reset)`
        : `${String(key)} not found in dirty set`,
    );
    this.name = 'KeyNotDirtyError';
  }
}

/** delete() on a key that is not dirty. */
export class KeyNotFoundError extends ConflationError {
  constructor(readonly key: unknown) {
    super(`${String(key)} not found`);
    this.name = 'KeyNotFoundError';
  }
}

/** A policy received a value it cannot fold. */
export class TypeMismatchError extends ConflationError {
  constructor(
    readonly policy: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`${policy} expected ${expected}, got ${received}`);
    this.name = 'TypeMismatchError';
  }
}

export class UnknownPolicyError extends ConflationError {
  constructor(
    readonly policy: string,
    readonly available: string[],
  ) {
    super(
      `No policy registered as "${policy}". ` +
      `Available: ${available.join(', ') || 'none'}`,
    );
    this.name = 'UnknownPolicyError';
  }
}

export class ConfigError extends ConflationError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class CodecError extends ConflationError {
  constructor(message: string) {
    super(message);
    this.name = 'CodecError';
  }
}

/** Describe a runtime value for error messages. */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number' && Number.isNaN(value)) return 'NaN';
  return typeof value;
}
