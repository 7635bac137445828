// ============================================================================
// @enctab/core — Single-Byte Index Compiler
// ============================================================================
//
// 8-bit code pages map the upper half of the byte range (0x80..0xFF) to
// scalars. Pointers are 0..127; the forward table is direct, the backward
// table is a minimal trie storing the encoded byte (pointer + 0x80).
// ============================================================================

import { assertInDomain, inRange } from './domain.js';
import { DuplicatePointerError, DuplicateScalarError } from './errors.js';
import { buildMinimalTrie, trieLookup } from './trie.js';
import {
  DEFAULT_LOWER_LIMIT,
  type IndexEntry,
  SENTINEL_U16,
  SINGLE_BYTE_BASE,
  SINGLE_BYTE_POINTERS,
  SINGLE_BYTE_SCALAR_LIMIT,
  SINGLE_BYTE_UNMAPPED,
  type SingleByteTables,
} from './types.js';

/** Scalar domain handed to the trie builder. */
const BACKWARD_DOMAIN = 0x10000;

/**
 * Compile a single-byte index.
 *
 * The mapping must be injective: every pointer and every scalar may occur
 * at most once.
 *
 * @throws {DomainError} If a pointer is outside `[0, 128)` or a scalar outside `[0, 0xFFFF)`
 * @throws {DuplicatePointerError} If a pointer repeats
 * @throws {DuplicateScalarError} If a scalar repeats
 */
export function compileSingleByte(entries: readonly IndexEntry[]): SingleByteTables {
  const forward = new Uint16Array(SINGLE_BYTE_POINTERS).fill(SENTINEL_U16);
  const assigned = new Set<number>();
  const inverse = new Map<number, number>();

  for (const { pointer, scalar } of entries) {
    assertInDomain('pointer', pointer, SINGLE_BYTE_POINTERS);
    assertInDomain('scalar', scalar, SINGLE_BYTE_SCALAR_LIMIT);
    if (assigned.has(pointer)) {
      throw new DuplicatePointerError(pointer);
    }
    if (inverse.has(scalar)) {
      throw new DuplicateScalarError(pointer, scalar);
    }
    assigned.add(pointer);
    forward[pointer] = scalar;
    inverse.set(scalar, pointer);
  }

  const trie = buildMinimalTrie(inverse, BACKWARD_DOMAIN, DEFAULT_LOWER_LIMIT);

  return {
    kind: 'single-byte',
    forward,
    backwardLower: Uint8Array.from(trie.lower, (pointer) =>
      pointer === null ? SINGLE_BYTE_UNMAPPED : pointer + SINGLE_BYTE_BASE,
    ),
    backwardUpper: Uint16Array.from(trie.upper),
    blockBits: trie.blockBits,
  };
}

/**
 * Scalar for `pointer` (0..127), or 0xFFFF when unmapped.
 */
export function singleByteForward(tables: SingleByteTables, pointer: number): number {
  return inRange(pointer, SINGLE_BYTE_POINTERS) ? tables.forward[pointer] : SENTINEL_U16;
}

/**
 * Scalar for an encoded byte 0x80..0xFF, or 0xFFFF.
 */
export function singleByteForwardByte(tables: SingleByteTables, byte: number): number {
  return singleByteForward(tables, byte - SINGLE_BYTE_BASE);
}

/**
 * Encoded byte for `scalar`, or 0 when unmapped.
 */
export function singleByteBackward(tables: SingleByteTables, scalar: number): number {
  if (!inRange(scalar, BACKWARD_DOMAIN)) return SINGLE_BYTE_UNMAPPED;
  return trieLookup(tables.backwardLower, tables.backwardUpper, tables.blockBits, scalar);
}
