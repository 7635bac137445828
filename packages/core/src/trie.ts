// ============================================================================
// @enctab/core — Minimal Two-Level Trie
// ============================================================================
//
// Compresses a sparse scalar → pointer map into a lower table of
// deduplicated fixed-size blocks and an upper table of block offsets.
// Every block size from 2^0 to 2^MAX_BLOCK_BITS is tried; the smallest
// lower + upper total wins, and on a tie the larger block size wins.
//
// The partition stops at the block holding the largest mapped scalar.
// Any block past it would be all-absent and resolve to offset 0, which is
// what lookups return for block indices beyond the upper table.
// ============================================================================

import { DomainError, TrieCapacityError } from './errors.js';
import { logTrieChoice } from './logger.js';
import { DEFAULT_LOWER_LIMIT, MAX_BLOCK_BITS, type Trie } from './types.js';

interface Candidate {
  trie: Trie;
  total: number;
}

/**
 * Build the smallest two-level trie for `inverse` whose lower table stays
 * below `lowerLimit` entries.
 *
 * @param inverse - Scalar → pointer map (keys must lie in `[0, domainSize)`)
 * @param domainSize - Exclusive bound on the scalar domain
 * @param lowerLimit - Exclusive ceiling on the lower table length
 * @throws {DomainError} If a scalar lies outside the domain
 * @throws {TrieCapacityError} If no block size fits under `lowerLimit`
 *
 * @example
 * ```ts
 * const trie = buildMinimalTrie(new Map([[0x41, 0], [0x42, 1]]), 0x10000);
 * trieLookup(trie.lower, trie.upper, trie.blockBits, 0x42); // → 1
 * ```
 */
export function buildMinimalTrie(
  inverse: ReadonlyMap<number, number>,
  domainSize: number,
  lowerLimit: number = DEFAULT_LOWER_LIMIT,
): Trie {
  let extent = 0;
  for (const scalar of inverse.keys()) {
    if (!Number.isInteger(scalar) || scalar < 0 || scalar >= domainSize) {
      throw new DomainError('scalar', scalar, [0, domainSize]);
    }
    if (scalar + 1 > extent) extent = scalar + 1;
  }

  let best: Candidate | undefined;
  for (const candidate of candidates(inverse, extent, lowerLimit)) {
    // `<=` lets a later, larger block size take an equal total.
    if (best === undefined || candidate.total <= best.total) {
      best = candidate;
    }
  }

  if (best === undefined) {
    throw new TrieCapacityError(lowerLimit);
  }

  logTrieChoice(best.trie.blockBits, best.trie.lower.length, best.trie.upper.length);
  return best.trie;
}

function* candidates(
  inverse: ReadonlyMap<number, number>,
  extent: number,
  lowerLimit: number,
): Generator<Candidate> {
  for (let blockBits = 0; blockBits <= MAX_BLOCK_BITS; blockBits++) {
    // The seed block alone would already reach the ceiling.
    if (1 << blockBits >= lowerLimit) continue;

    const trie = buildCandidate(inverse, extent, blockBits, lowerLimit);
    if (trie !== undefined) {
      yield { trie, total: trie.lower.length + trie.upper.length };
    }
  }
}

function buildCandidate(
  inverse: ReadonlyMap<number, number>,
  extent: number,
  blockBits: number,
  lowerLimit: number,
): Trie | undefined {
  const size = 1 << blockBits;
  const lower: Array<number | null> = new Array<number | null>(size).fill(null);
  const upper: number[] = [];
  const offsets = new Map<string, number>([[blockKey(lower), 0]]);

  for (let start = 0; start < extent; start += size) {
    const block: Array<number | null> = [];
    for (let scalar = start; scalar < start + size; scalar++) {
      block.push(inverse.get(scalar) ?? null);
    }

    const key = blockKey(block);
    let offset = offsets.get(key);
    if (offset === undefined) {
      offset = lower.length;
      offsets.set(key, offset);
      for (const value of block) lower.push(value);
      if (lower.length >= lowerLimit) return undefined;
    }
    upper.push(offset);
  }

  return { blockBits, lower, upper };
}

/** Absent entries join as empty fields, so they never collide with a pointer. */
function blockKey(block: Array<number | null>): string {
  return block.join(',');
}

/**
 * Look `code` up in a two-level table. Block indices beyond the upper
 * table resolve to offset 0, the all-absent block.
 */
export function trieLookup<T>(
  lower: ArrayLike<T>,
  upper: ArrayLike<number>,
  blockBits: number,
  code: number,
): T {
  const blockIndex = code >>> blockBits;
  const offset = blockIndex < upper.length ? upper[blockIndex] : 0;
  return lower[offset + (code & ((1 << blockBits) - 1))];
}
