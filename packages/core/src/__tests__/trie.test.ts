import { describe, expect, it } from 'vitest';
import { DomainError, TrieCapacityError } from '../errors.js';
import { buildMinimalTrie, trieLookup } from '../trie.js';

function lookup(trie: ReturnType<typeof buildMinimalTrie>, code: number): number | null {
  return trieLookup(trie.lower, trie.upper, trie.blockBits, code);
}

describe('buildMinimalTrie', () => {
  it('builds a single absent block for an empty map', () => {
    const trie = buildMinimalTrie(new Map(), 0x10000);
    expect(trie).toEqual({ blockBits: 0, lower: [null], upper: [] });
    expect(lookup(trie, 0x41)).toBeNull();
  });

  it('picks the block size with the smallest lower + upper total', () => {
    // blockBits 0 → 2 + 6, 1 → 4 + 3, 2 → 8 + 2, 3 → 16 + 1
    const trie = buildMinimalTrie(new Map([[5, 7]]), 0x10000);
    expect(trie).toEqual({ blockBits: 1, lower: [null, null, null, 7], upper: [0, 0, 2] });
  });

  it('lets the larger block size win a tie', () => {
    // blockBits 0 → 3 + 2 and blockBits 1 → 4 + 1 both total 5
    const trie = buildMinimalTrie(
      new Map([
        [0, 1],
        [1, 2],
      ]),
      0x10000,
    );
    expect(trie).toEqual({ blockBits: 1, lower: [null, null, 1, 2], upper: [2] });
  });

  it('rejects candidates whose lower table reaches the limit', () => {
    const trie = buildMinimalTrie(
      new Map([
        [0, 1],
        [1, 2],
      ]),
      0x10000,
      4,
    );
    expect(trie).toEqual({ blockBits: 0, lower: [null, 1, 2], upper: [1, 2] });
  });

  it('throws when no candidate fits under the limit', () => {
    expect(() => buildMinimalTrie(new Map([[0, 1]]), 0x10000, 1)).toThrow(TrieCapacityError);
  });

  it('rejects scalars outside the domain', () => {
    expect(() => buildMinimalTrie(new Map([[10, 1]]), 10)).toThrow(DomainError);
    expect(() => buildMinimalTrie(new Map([[-1, 1]]), 10)).toThrow(DomainError);
  });

  it('reuses identical blocks', () => {
    const inverse = new Map<number, number>();
    for (let block = 0; block < 8; block++) {
      inverse.set(block * 16, 3);
      inverse.set(block * 16 + 1, 4);
    }
    const trie = buildMinimalTrie(inverse, 0x10000);
    const distinct = new Set(trie.upper);
    expect(distinct.size).toBeLessThan(trie.upper.length);
  });

  it('answers every code like the source map', () => {
    const inverse = new Map<number, number>();
    for (let i = 0; i < 300; i++) {
      inverse.set((i * 37) % 5000, i);
      inverse.set(0x4e00 + i * 3, 1000 + i);
    }
    const trie = buildMinimalTrie(inverse, 0x10000);

    expect(trie.lower.length).toBeLessThan(0x10000);
    for (let code = 0; code < 0x5200; code++) {
      expect(lookup(trie, code)).toBe(inverse.get(code) ?? null);
    }
    expect(lookup(trie, 0xffff)).toBeNull();
  });

  it('is deterministic', () => {
    const inverse = new Map<number, number>([
      [0x20ac, 0],
      [0x201a, 2],
      [0x192, 3],
      [0xa0, 32],
    ]);
    expect(buildMinimalTrie(inverse, 0x10000)).toEqual(buildMinimalTrie(inverse, 0x10000));
  });
});

describe('trieLookup', () => {
  it('falls back to the absent block past the upper table', () => {
    const trie = buildMinimalTrie(new Map([[5, 7]]), 0x10000);
    expect(lookup(trie, 5)).toBe(7);
    expect(lookup(trie, 4)).toBeNull();
    expect(lookup(trie, 100)).toBeNull();
  });
});
