/**
 * Batch codec — CBOR encoding of drained intervals.
 *
 * A DrainedBatch is written as a CBOR array:
 *
 *   ['cflt', version, interval, [[key, value], ...]]
 *
 * Keys and values round-trip as: numbers, strings, booleans, null,
 * undefined, arrays, plain objects with string keys, Uint8Arrays, bigints
 * and Maps. Bigints are always written as CBOR bignums (tags 2 and 3) so
 * small ones do not come back as numbers. Maps are written as an array of
 * [key, value] pairs under MAP_TAG, so any key type survives and plain
 * objects (OHLC and mode results) still decode as objects. Moving the bytes
 * is up to the host.
 */

import { encode, decode, Token, Tokenizer, Type } from 'cborg';
import type { EncodeOptions, TagDecoder } from 'cborg';
import { bigIntDecoder, bigNegIntDecoder } from 'cborg/taglib';
import type { DrainedBatch } from './types.js';
import { CodecError } from './errors.js';

export const BATCH_MAGIC = 'cflt';
export const BATCH_VERSION = 1;

/** Application tag for a Map carried as an array of [key, value] pairs. */
export const MAP_TAG = 0xcf17;

const TAG_BIGNUM = 2;
const TAG_NEG_BIGNUM = 3;

const ENCODE_OPTIONS: EncodeOptions = {
  typeEncoders: {
    bigint: encodeBigint,
    Map: encodeMap,
  },
};

const DECODE_TAGS: TagDecoder[] = [];
DECODE_TAGS[TAG_BIGNUM] = (inner: unknown) => bigIntDecoder(expectBytes(inner));
DECODE_TAGS[TAG_NEG_BIGNUM] = (inner: unknown) => bigNegIntDecoder(expectBytes(inner));
DECODE_TAGS[MAP_TAG] = decodeMap;

// ── Encode helpers ──────────────────────────────────────────────

function bigintToBytes(n: bigint): Uint8Array {
  const bytes: number[] = [];
  for (let rest = n; rest > 0n; rest >>= 8n) bytes.unshift(Number(rest & 0xffn));
  return Uint8Array.from(bytes);
}

function encodeBigint(n: bigint): Token[] {
  return n >= 0n
    ? [new Token(Type.tag, TAG_BIGNUM), new Token(Type.bytes, bigintToBytes(n))]
    : [new Token(Type.tag, TAG_NEG_BIGNUM), new Token(Type.bytes, bigintToBytes(-1n - n))];
}

/** Encode with the codec's options and replay the bytes as tokens. */
function tokensOf(value: unknown): Token[] {
  const tokenizer = new Tokenizer(encode(value, ENCODE_OPTIONS));
  const tokens: Token[] = [];
  while (!tokenizer.done()) tokens.push(tokenizer.next());
  return tokens;
}

function encodeMap(map: Map<unknown, unknown>): Token[] {
  return [new Token(Type.tag, MAP_TAG), ...tokensOf([...map])];
}

// ── Decode helpers ──────────────────────────────────────────────

function expectBytes(inner: unknown): Uint8Array {
  if (!(inner instanceof Uint8Array)) {
    throw new CodecError('bignum tag must wrap a byte string');
  }
  return inner;
}

function decodeMap(inner: unknown): Map<unknown, unknown> {
  if (!Array.isArray(inner)) {
    throw new CodecError('map tag must wrap an array of pairs');
  }
  const map = new Map<unknown, unknown>();
  for (const pair of inner) {
    if (!Array.isArray(pair) || pair.length !== 2) {
      throw new CodecError('map tag must wrap an array of pairs');
    }
    map.set(pair[0], pair[1]);
  }
  return map;
}

// ── Public API ──────────────────────────────────────────────────

/** Encode a drained batch. */
export function encodeBatch<K, V>(batch: DrainedBatch<K, V>): Uint8Array {
  try {
    return encode([BATCH_MAGIC, BATCH_VERSION, batch.interval, batch.items], ENCODE_OPTIONS);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CodecError(`Cannot encode batch for interval ${batch.interval}: ${reason}`);
  }
}

/**
 * Decode bytes written by encodeBatch. Keys and values come back untyped;
 * callers narrow them.
 */
export function decodeBatch(data: Uint8Array): DrainedBatch<unknown, unknown> {
  let tuple: unknown;
  try {
    tuple = decode(data, { tags: DECODE_TAGS });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CodecError(`Invalid batch: ${reason}`);
  }

  if (!Array.isArray(tuple) || tuple.length !== 4) {
    throw new CodecError('Invalid batch: expected a 4-element array');
  }

  const [magic, version, interval, rawItems] = tuple;
  if (magic !== BATCH_MAGIC) {
    throw new CodecError('Invalid batch: bad magic');
  }
  if (version !== BATCH_VERSION) {
    throw new CodecError(`Unsupported batch version: ${String(version)}`);
  }
  if (typeof interval !== 'number' || !Number.isInteger(interval) || interval < 0) {
    throw new CodecError('Invalid batch: interval must be a non-negative integer');
  }
  if (!Array.isArray(rawItems)) {
    throw new CodecError('Invalid batch: items must be an array');
  }

  const items: Array<[unknown, unknown]> = [];
  for (const item of rawItems) {
    if (!Array.isArray(item) || item.length !== 2) {
      throw new CodecError('Invalid batch: each item must be a [key, value] pair');
    }
    items.push([item[0], item[1]]);
  }

  return { interval, items };
}
