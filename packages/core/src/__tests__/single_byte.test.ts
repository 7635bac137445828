import { describe, expect, it } from 'vitest';
import { DomainError, DuplicatePointerError, DuplicateScalarError } from '../errors.js';
import {
  compileSingleByte,
  singleByteBackward,
  singleByteForward,
  singleByteForwardByte,
} from '../single_byte.js';

const ENTRIES = [
  { pointer: 0, scalar: 0x20ac },
  { pointer: 2, scalar: 0x201a },
  { pointer: 3, scalar: 0x0192 },
  { pointer: 32, scalar: 0x00a0 },
  { pointer: 127, scalar: 0x00ff },
];

describe('compileSingleByte', () => {
  const tables = compileSingleByte(ENTRIES);

  it('builds a 128-entry forward table', () => {
    expect(tables.kind).toBe('single-byte');
    expect(tables.forward).toHaveLength(128);
    expect(singleByteForward(tables, 0)).toBe(0x20ac);
    expect(singleByteForward(tables, 127)).toBe(0x00ff);
  });

  it('returns 0xFFFF for unmapped or out-of-range pointers', () => {
    expect(singleByteForward(tables, 1)).toBe(0xffff);
    expect(singleByteForward(tables, 128)).toBe(0xffff);
    expect(singleByteForward(tables, -1)).toBe(0xffff);
  });

  it('maps encoded bytes forward', () => {
    expect(singleByteForwardByte(tables, 0x80)).toBe(0x20ac);
    expect(singleByteForwardByte(tables, 0xa0)).toBe(0x00a0);
    expect(singleByteForwardByte(tables, 0x41)).toBe(0xffff);
  });

  it('maps scalars back to encoded bytes', () => {
    expect(singleByteBackward(tables, 0x20ac)).toBe(0x80);
    expect(singleByteBackward(tables, 0x201a)).toBe(0x82);
    expect(singleByteBackward(tables, 0x00ff)).toBe(0xff);
  });

  it('returns 0 for unmapped scalars', () => {
    expect(singleByteBackward(tables, 0x41)).toBe(0);
    expect(singleByteBackward(tables, 0xffff)).toBe(0);
    expect(singleByteBackward(tables, 0x10000)).toBe(0);
  });

  it('round-trips every declared pointer', () => {
    for (const { pointer } of ENTRIES) {
      expect(singleByteBackward(tables, singleByteForward(tables, pointer))).toBe(pointer + 0x80);
    }
  });

  it('breaks a block-size tie toward the larger size', () => {
    // blockBits 2 and 3 both total 25; the larger wins
    const single = compileSingleByte([{ pointer: 0, scalar: 0x41 }]);
    expect(single.blockBits).toBe(3);
    expect(single.backwardLower).toHaveLength(16);
    expect(single.backwardUpper).toHaveLength(9);
    expect(singleByteBackward(single, 0x41)).toBe(0x80);
  });

  it('compiles an empty index', () => {
    const empty = compileSingleByte([]);
    expect(Array.from(empty.forward).every((v) => v === 0xffff)).toBe(true);
    expect(singleByteBackward(empty, 0x41)).toBe(0);
  });

  it('is deterministic', () => {
    expect(compileSingleByte(ENTRIES)).toEqual(compileSingleByte(ENTRIES));
  });
});

describe('compileSingleByte validation', () => {
  it('rejects pointers outside 0..127', () => {
    expect(() => compileSingleByte([{ pointer: 128, scalar: 0x41 }])).toThrow(DomainError);
  });

  it('rejects the reserved scalar 0xFFFF', () => {
    expect(() => compileSingleByte([{ pointer: 0, scalar: 0xffff }])).toThrow(DomainError);
  });

  it('rejects duplicate pointers', () => {
    expect(() =>
      compileSingleByte([
        { pointer: 4, scalar: 0x41 },
        { pointer: 4, scalar: 0x42 },
      ]),
    ).toThrow(DuplicatePointerError);
  });

  it('rejects duplicate scalars', () => {
    expect(() =>
      compileSingleByte([
        { pointer: 4, scalar: 0x41 },
        { pointer: 5, scalar: 0x41 },
      ]),
    ).toThrow(DuplicateScalarError);
  });
});
