// ============================================================================
// @enctab/core — Type Definitions & Table Constants
// ============================================================================
//
// Shared shapes for index input, the two-level trie and the three compiled
// table bundles. Bundles form a closed union tagged by `kind`.
// ============================================================================

/** One declared mapping from an index pointer to a Unicode scalar. */
export interface IndexEntry {
  pointer: number;
  scalar: number;
}

/** The ordered mapping for one encoding, as delivered by an index source. */
export interface IndexData {
  entries: IndexEntry[];
  /** Free-text commentary that preceded the mapping. */
  comments: string[];
}

/** Compiler variants. */
export type IndexKind = 'single-byte' | 'multi-byte' | 'range';

// ---- Sentinels & Domains ----

/** "No mapping" for 16-bit fields. */
export const SENTINEL_U16 = 0xffff;

/** "No mapping" for 32-bit range lookups. */
export const SENTINEL_U32 = 0xffffffff;

/** "No mapping" in the single-byte backward table. */
export const SINGLE_BYTE_UNMAPPED = 0;

/** Added to single-byte pointers to give the encoded byte. */
export const SINGLE_BYTE_BASE = 0x80;

/** Number of pointers in a single-byte index. */
export const SINGLE_BYTE_POINTERS = 128;

/** Exclusive bound on a single-byte scalar. */
export const SINGLE_BYTE_SCALAR_LIMIT = 0xffff;

/** Exclusive bound on a multi-byte pointer. */
export const MULTI_BYTE_POINTER_LIMIT = 0xffff;

/** Exclusive bound on any Unicode scalar. */
export const SCALAR_LIMIT = 0x110000;

/** Default ceiling on the trie's lower table (exclusive). */
export const DEFAULT_LOWER_LIMIT = 0x10000;

/** Largest trie block size examined, as a power of two. */
export const MAX_BLOCK_BITS = 20;

// ---- Trie ----

/**
 * Two-level block-deduplicated table.
 *
 * `lower` holds `2^blockBits`-sized blocks back to back, the first one
 * all-absent. `upper[i]` is the offset in `lower` of block `i`.
 */
export interface Trie<T = number> {
  blockBits: number;
  lower: Array<T | null>;
  upper: number[];
}

// ---- Table Bundles ----

export interface SingleByteTables {
  kind: 'single-byte';
  /** Scalar per pointer, {@link SENTINEL_U16} when unmapped. */
  forward: Uint16Array;
  /** Encoded byte (`pointer + 0x80`), 0 when unmapped. */
  backwardLower: Uint8Array;
  backwardUpper: Uint16Array;
  blockBits: number;
}

/** Pointer sub-range whose backward results are redirected. */
export interface RemapTable {
  /** Inclusive. */
  min: number;
  /** Inclusive. */
  max: number;
  /** Alternate canonical pointer for `min + i`, {@link SENTINEL_U16} when unmapped. */
  table: Uint16Array;
}

export interface MultiByteTables {
  kind: 'multi-byte';
  minKey: number;
  /** Exclusive. */
  maxKey: number;
  /** Low 16 bits of the scalar for `minKey + i`. */
  forward: Uint16Array;
  /** One bit per pointer: set when the scalar carries bit 17 (plane 2). */
  forwardMore?: Uint32Array;
  backwardLower: Uint16Array;
  backwardUpper: Uint16Array;
  blockBits: number;
  remap?: RemapTable;
  /** Pointers unreachable backward, ascending. */
  duplicates: number[];
}

/** Inclusive interior key range that maps to nothing. */
export interface InvalidRange {
  start: number;
  end: number;
}

export interface RangeTables {
  kind: 'range';
  /** Breakpoint keys, search floor first. */
  keys: Uint32Array;
  /** Breakpoint values, parallel to `keys`. */
  values: Uint32Array;
  minKey: number;
  maxKey: number;
  minValue: number;
  maxValue: number;
  invalidRange?: InvalidRange;
  /** Largest key accepted by forward lookups. */
  keyCeiling?: number;
  /** Largest value accepted by backward lookups. */
  valueCeiling?: number;
}

export type IndexTables = SingleByteTables | MultiByteTables | RangeTables;
