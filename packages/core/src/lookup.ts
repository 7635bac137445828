// ============================================================================
// @enctab/core — Lookup Contracts
// ============================================================================
//
// Tag-dispatched accessors over compiled tables. Each direction has its own
// "no mapping" value per variant:
//
//   kind         forward      backward
//   single-byte  0xFFFF       0
//   multi-byte   0xFFFF       0xFFFF
//   range        0xFFFFFFFF   0xFFFFFFFF
// ============================================================================

import { multiByteBackward, multiByteBackwardRemapped, multiByteForward } from './multi_byte.js';
import { rangeBackward, rangeForward } from './range.js';
import { singleByteBackward, singleByteForward } from './single_byte.js';
import {
  type IndexKind,
  type IndexTables,
  type MultiByteTables,
  SENTINEL_U16,
  SENTINEL_U32,
  SINGLE_BYTE_UNMAPPED,
} from './types.js';

/**
 * Map a pointer to its scalar.
 */
export function forward(tables: IndexTables, code: number): number {
  switch (tables.kind) {
    case 'single-byte':
      return singleByteForward(tables, code);
    case 'multi-byte':
      return multiByteForward(tables, code);
    case 'range':
      return rangeForward(tables, code);
  }
}

/**
 * Map a scalar to its canonical pointer. Single-byte tables answer with
 * the encoded byte rather than the pointer.
 */
export function backward(tables: IndexTables, code: number): number {
  switch (tables.kind) {
    case 'single-byte':
      return singleByteBackward(tables, code);
    case 'multi-byte':
      return multiByteBackward(tables, code);
    case 'range':
      return rangeBackward(tables, code);
  }
}

/**
 * Backward lookup honoring the table's remap range, if it has one.
 */
export function backwardRemapped(tables: MultiByteTables, code: number): number {
  return multiByteBackwardRemapped(tables, code);
}

export function forwardSentinel(kind: IndexKind): number {
  return kind === 'range' ? SENTINEL_U32 : SENTINEL_U16;
}

export function backwardSentinel(kind: IndexKind): number {
  switch (kind) {
    case 'single-byte':
      return SINGLE_BYTE_UNMAPPED;
    case 'multi-byte':
      return SENTINEL_U16;
    case 'range':
      return SENTINEL_U32;
  }
}
