// ============================================================================
// @enctab/core — Multi-Byte Index Compiler
// ============================================================================
//
// Double-byte indices (Big5, EUC-KR, GB18030, JIS X 0208/0212) map up to
// 0xFFFF pointers to scalars anywhere in Unicode. The forward table is
// dense over [minKey, maxKey) and keeps the low 16 bits of each scalar;
// scalars beyond the BMP must sit in plane 2, whose extra bit lives in a
// one-bit-per-pointer bitplane. The backward table is a minimal trie.
//
// When several pointers share a scalar the smallest one is canonical and
// the others are duplicates, valid forward but never produced backward.
// ============================================================================

import { assertInDomain, inRange } from './domain.js';
import {
  AliasCollisionError,
  DuplicatePointerError,
  EmptyIndexError,
  IndexIntegrityError,
  RemapUnresolvedError,
  SupplementaryPlaneError,
} from './errors.js';
import { buildMinimalTrie, trieLookup } from './trie.js';
import {
  DEFAULT_LOWER_LIMIT,
  type IndexEntry,
  MULTI_BYTE_POINTER_LIMIT,
  type MultiByteTables,
  type RemapTable,
  SCALAR_LIMIT,
  SENTINEL_U16,
} from './types.js';

/** The only supplementary plane a multi-byte index may reach. */
const SUPPLEMENTARY_PLANE = 2;

/** Bit carrying the plane-2 flag in forward results. */
const MORE_BIT_SHIFT = 17;

/** Encoding-specific options of a multi-byte index. */
export interface MultiBytePolicy {
  /**
   * Inclusive pointer sub-range used by a sibling encoding that must not
   * produce it; backward results inside it are redirected to the canonical
   * pointer outside it.
   */
  remap?: { min: number; max: number };
  /**
   * Reserved pointers mapped forward to placeholder scalars `0..n-1`.
   * They are recorded as duplicates and never reachable backward.
   */
  aliases?: readonly number[];
}

/**
 * Compile a multi-byte index.
 *
 * @throws {DomainError} If a pointer is outside `[0, 0xFFFF)` or a scalar outside `[0, 0x110000)`
 * @throws {IndexIntegrityError} If a scalar is the reserved 0xFFFF
 * @throws {SupplementaryPlaneError} If a scalar above the BMP is outside plane 2
 * @throws {DuplicatePointerError} If a pointer repeats
 * @throws {AliasCollisionError} If an alias pointer or placeholder is taken
 * @throws {RemapUnresolvedError} If a remapped pointer has no counterpart
 * @throws {EmptyIndexError} If nothing is mapped
 *
 * @example
 * ```ts
 * const tables = compileMultiByte([
 *   { pointer: 0, scalar: 0x41 },
 *   { pointer: 1, scalar: 0x42 },
 *   { pointer: 2, scalar: 0x41 },
 * ]);
 * multiByteBackward(tables, 0x41); // → 0
 * tables.duplicates;               // → [2]
 * ```
 */
export function compileMultiByte(
  entries: readonly IndexEntry[],
  policy: MultiBytePolicy = {},
): MultiByteTables {
  const data = new Map<number, number>();
  for (const { pointer, scalar } of entries) {
    assertInDomain('pointer', pointer, MULTI_BYTE_POINTER_LIMIT);
    assertInDomain('scalar', scalar, SCALAR_LIMIT);
    if (scalar === SENTINEL_U16) {
      throw new IndexIntegrityError(`Scalar U+FFFF at pointer ${pointer} is reserved.`, {
        pointer,
        scalar,
      });
    }
    if (scalar > 0xffff && scalar >>> 16 !== SUPPLEMENTARY_PLANE) {
      throw new SupplementaryPlaneError(pointer, scalar);
    }
    if (data.has(pointer)) {
      throw new DuplicatePointerError(pointer);
    }
    data.set(pointer, scalar);
  }

  const inverse = new Map<number, number>();
  const duplicates: number[] = [];
  for (const [pointer, scalar] of sortedEntries(data)) {
    if (inverse.has(scalar)) {
      duplicates.push(pointer);
    } else {
      inverse.set(scalar, pointer);
    }
  }

  const aliases = policy.aliases ?? [];
  for (let placeholder = 0; placeholder < aliases.length; placeholder++) {
    const pointer = aliases[placeholder];
    assertInDomain('pointer', pointer, MULTI_BYTE_POINTER_LIMIT);
    if (data.has(pointer)) {
      throw new AliasCollisionError(pointer, placeholder, 'pointer');
    }
    if (inverse.has(placeholder)) {
      throw new AliasCollisionError(pointer, placeholder, 'scalar');
    }
    data.set(pointer, placeholder);
    duplicates.push(pointer);
  }

  if (data.size === 0) {
    throw new EmptyIndexError('multi-byte');
  }

  const trie = buildMinimalTrie(inverse, SCALAR_LIMIT, DEFAULT_LOWER_LIMIT);
  const mapped = sortedEntries(data);
  const minKey = mapped[0][0];
  const maxKey = mapped[mapped.length - 1][0] + 1;

  const forward = new Uint16Array(maxKey - minKey).fill(SENTINEL_U16);
  let forwardMore: Uint32Array | undefined;
  for (const [pointer, scalar] of mapped) {
    const code = pointer - minKey;
    forward[code] = scalar & 0xffff;
    if (scalar > 0xffff) {
      if (forwardMore === undefined) {
        forwardMore = new Uint32Array(Math.ceil((maxKey - minKey) / 32));
      }
      forwardMore[code >>> 5] |= 1 << (code & 31);
    }
  }

  const tables: MultiByteTables = {
    kind: 'multi-byte',
    minKey,
    maxKey,
    forward,
    backwardLower: Uint16Array.from(trie.lower, (pointer) => pointer ?? SENTINEL_U16),
    backwardUpper: Uint16Array.from(trie.upper),
    blockBits: trie.blockBits,
    duplicates: duplicates.sort((a, b) => a - b),
  };
  if (forwardMore !== undefined) tables.forwardMore = forwardMore;
  if (policy.remap !== undefined) tables.remap = buildRemap(data, policy.remap);
  return tables;
}

/**
 * For each pointer in `[min, max]`, find the canonical pointer of its scalar
 * among the pointers outside that range.
 */
function buildRemap(data: ReadonlyMap<number, number>, range: { min: number; max: number }): RemapTable {
  const { min, max } = range;
  assertInDomain('pointer', min, MULTI_BYTE_POINTER_LIMIT);
  assertInDomain('pointer', max, MULTI_BYTE_POINTER_LIMIT);
  if (max < min) {
    throw new IndexIntegrityError(`Remap range [${min}, ${max}] is empty.`);
  }

  const outside = new Map<number, number>();
  for (const [pointer, scalar] of sortedEntries(data)) {
    if ((pointer < min || pointer > max) && !outside.has(scalar)) {
      outside.set(scalar, pointer);
    }
  }

  const table = new Uint16Array(max - min + 1).fill(SENTINEL_U16);
  for (let pointer = min; pointer <= max; pointer++) {
    const scalar = data.get(pointer);
    if (scalar === undefined) continue;
    const counterpart = outside.get(scalar);
    if (counterpart === undefined) {
      throw new RemapUnresolvedError(pointer, scalar);
    }
    table[pointer - min] = counterpart;
  }

  return { min, max, table };
}

/** `[pointer, scalar]` pairs in ascending pointer order. */
function sortedEntries(data: ReadonlyMap<number, number>): Array<[number, number]> {
  return [...data].sort((a, b) => a[0] - b[0]);
}

// ── Lookups ─────────────────────────────────────────────────────────────────

/**
 * Scalar for `pointer`, or 0xFFFF when unmapped.
 */
export function multiByteForward(tables: MultiByteTables, pointer: number): number {
  const code = pointer - tables.minKey;
  if (!inRange(code, tables.maxKey - tables.minKey)) return SENTINEL_U16;
  const low = tables.forward[code];
  if (tables.forwardMore === undefined) return low;
  const more = (tables.forwardMore[code >>> 5] >>> (code & 31)) & 1;
  return low | (more << MORE_BIT_SHIFT);
}

/**
 * Canonical pointer for `scalar`, or 0xFFFF when unmapped.
 */
export function multiByteBackward(tables: MultiByteTables, scalar: number): number {
  if (!inRange(scalar, SCALAR_LIMIT)) return SENTINEL_U16;
  return trieLookup(tables.backwardLower, tables.backwardUpper, tables.blockBits, scalar);
}

/**
 * Like {@link multiByteBackward}, but pointers inside the remap range are
 * redirected to their counterpart outside it.
 */
export function multiByteBackwardRemapped(tables: MultiByteTables, scalar: number): number {
  const pointer = multiByteBackward(tables, scalar);
  const remap = tables.remap;
  if (remap !== undefined && pointer >= remap.min && pointer <= remap.max) {
    return remap.table[pointer - remap.min];
  }
  return pointer;
}
