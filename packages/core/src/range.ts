// ============================================================================
// @enctab/core — Range Index Compiler
// ============================================================================
//
// Some indices (GB18030's four-byte ranges) are a handful of contiguous
// linear segments. They are stored as two parallel breakpoint tables and
// searched for the last breakpoint not above the code; the result keeps the
// code's offset from that breakpoint.
//
// Keys/values tables always start with a (0, 0) floor so the search never
// runs off the front; when the index itself starts at (0, 0) no floor is
// added.
// ============================================================================

import { assertInDomain } from './domain.js';
import { EmptyIndexError, IndexIntegrityError, UnsortedRangeError } from './errors.js';
import { type IndexEntry, type InvalidRange, type RangeTables, SENTINEL_U32 } from './types.js';

/** Exclusive bound on keys and values stored as u32. */
const U32_LIMIT = 0x1_0000_0000;

/** Encoding-specific options of a range index. */
export interface RangePolicy {
  /** Inclusive interior key range that maps to nothing. */
  invalidRange?: InvalidRange;
  /** Largest key accepted by forward lookups. */
  keyCeiling?: number;
  /** Largest value accepted by backward lookups. */
  valueCeiling?: number;
}

/**
 * Compile a range index from breakpoints ordered by key. Each entry's
 * `pointer` is the breakpoint key and its `scalar` the breakpoint value.
 *
 * @throws {EmptyIndexError} If there are no breakpoints
 * @throws {UnsortedRangeError} If keys or values are not strictly increasing
 *
 * @example
 * ```ts
 * const tables = compileRange([
 *   { pointer: 0, scalar: 0 },
 *   { pointer: 10, scalar: 100 },
 *   { pointer: 20, scalar: 300 },
 * ]);
 * rangeForward(tables, 15);   // → 105
 * rangeBackward(tables, 250); // → 160
 * ```
 */
export function compileRange(entries: readonly IndexEntry[], policy: RangePolicy = {}): RangeTables {
  if (entries.length === 0) {
    throw new EmptyIndexError('range');
  }

  for (let i = 0; i < entries.length; i++) {
    const { pointer: key, scalar: value } = entries[i];
    assertInDomain('pointer', key, U32_LIMIT);
    assertInDomain('scalar', value, U32_LIMIT);
    if (i > 0 && (key <= entries[i - 1].pointer || value <= entries[i - 1].scalar)) {
      throw new UnsortedRangeError(i, key, value);
    }
  }

  const { invalidRange } = policy;
  if (invalidRange !== undefined && invalidRange.end < invalidRange.start) {
    throw new IndexIntegrityError(
      `Invalid range [${invalidRange.start}, ${invalidRange.end}] is empty.`,
    );
  }

  const first = entries[0];
  const last = entries[entries.length - 1];
  const breakpoints =
    first.pointer === 0 && first.scalar === 0 ? entries : [{ pointer: 0, scalar: 0 }, ...entries];

  const tables: RangeTables = {
    kind: 'range',
    keys: Uint32Array.from(breakpoints, (entry) => entry.pointer),
    values: Uint32Array.from(breakpoints, (entry) => entry.scalar),
    minKey: first.pointer,
    maxKey: last.pointer,
    minValue: first.scalar,
    maxValue: last.scalar,
  };
  if (invalidRange !== undefined) tables.invalidRange = { ...invalidRange };
  if (policy.keyCeiling !== undefined) tables.keyCeiling = policy.keyCeiling;
  if (policy.valueCeiling !== undefined) tables.valueCeiling = policy.valueCeiling;
  return tables;
}

/**
 * Index of the last entry of `table` that is `<= code`.
 *
 * Power-of-two stepping: the first probe settles whether the answer lies in
 * the leading or trailing `2^k` entries, each following probe halves the
 * step. `table[0]` must be `<= code`.
 */
export function searchFloor(table: ArrayLike<number>, code: number): number {
  let step = 1;
  while (step * 2 <= table.length) step *= 2;

  let count = code >= table[step - 1] ? table.length - step + 1 : 0;
  for (step >>= 1; step > 0; step >>= 1) {
    if (code >= table[count + step - 1]) count += step;
  }
  return count - 1;
}

/**
 * Value for key `code`, or 0xFFFFFFFF when out of range.
 */
export function rangeForward(tables: RangeTables, code: number): number {
  if (!Number.isInteger(code) || code < tables.minKey) return SENTINEL_U32;
  const { invalidRange, keyCeiling } = tables;
  if (invalidRange !== undefined && code >= invalidRange.start && code <= invalidRange.end) {
    return SENTINEL_U32;
  }
  if (keyCeiling !== undefined && code > keyCeiling) return SENTINEL_U32;

  const i = searchFloor(tables.keys, code);
  return code - tables.keys[i] + tables.values[i];
}

/**
 * Key for value `code`, or 0xFFFFFFFF when out of range.
 */
export function rangeBackward(tables: RangeTables, code: number): number {
  if (!Number.isInteger(code) || code < tables.minValue) return SENTINEL_U32;
  if (tables.valueCeiling !== undefined && code > tables.valueCeiling) return SENTINEL_U32;

  const i = searchFloor(tables.values, code);
  return code - tables.values[i] + tables.keys[i];
}
