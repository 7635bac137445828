import { describe, expect, it } from 'vitest';
import { backward, backwardRemapped, backwardSentinel, forward, forwardSentinel } from '../lookup.js';
import { compileMultiByte } from '../multi_byte.js';
import { compileRange } from '../range.js';
import { compileSingleByte } from '../single_byte.js';

describe('lookup contracts', () => {
  const single = compileSingleByte([{ pointer: 1, scalar: 0x201a }]);
  const multi = compileMultiByte(
    [
      { pointer: 3, scalar: 0x3000 },
      { pointer: 9, scalar: 0x3000 },
    ],
    { remap: { min: 0, max: 4 } },
  );
  const range = compileRange([
    { pointer: 0, scalar: 0 },
    { pointer: 10, scalar: 100 },
  ]);

  it('dispatches forward by kind', () => {
    expect(forward(single, 1)).toBe(0x201a);
    expect(forward(multi, 9)).toBe(0x3000);
    expect(forward(range, 12)).toBe(102);
  });

  it('dispatches backward by kind', () => {
    expect(backward(single, 0x201a)).toBe(0x81);
    expect(backward(multi, 0x3000)).toBe(3);
    expect(backward(range, 102)).toBe(12);
  });

  it('answers unmapped codes with the sentinel of their kind', () => {
    expect(forward(single, 0)).toBe(forwardSentinel('single-byte'));
    expect(backward(single, 0x41)).toBe(backwardSentinel('single-byte'));
    expect(forward(multi, 4)).toBe(forwardSentinel('multi-byte'));
    expect(backward(multi, 0x41)).toBe(backwardSentinel('multi-byte'));
  });

  it('names the sentinels', () => {
    expect(forwardSentinel('single-byte')).toBe(0xffff);
    expect(backwardSentinel('single-byte')).toBe(0);
    expect(backwardSentinel('multi-byte')).toBe(0xffff);
    expect(forwardSentinel('range')).toBe(0xffffffff);
    expect(backwardSentinel('range')).toBe(0xffffffff);
  });

  it('redirects remapped backward results', () => {
    expect(backwardRemapped(multi, 0x3000)).toBe(9);
  });
});
