// ============================================================================
// @enctab/core — Conformance Checks
// ============================================================================
//
// Exhaustive round-trip checks over compiled tables. They walk the whole
// pointer domain, so they are meant for build-time verification rather
// than hot paths.
// ============================================================================

import { multiByteBackward, multiByteBackwardRemapped, multiByteForward } from './multi_byte.js';
import { rangeBackward, rangeForward } from './range.js';
import { singleByteBackward, singleByteForwardByte } from './single_byte.js';
import {
  type IndexTables,
  type MultiByteTables,
  type RangeTables,
  SENTINEL_U16,
  SENTINEL_U32,
  SINGLE_BYTE_BASE,
  SINGLE_BYTE_POINTERS,
  type SingleByteTables,
} from './types.js';

export type ConformanceCheck = 'round-trip' | 'remap' | 'lookup';

/** One failed expectation. */
export interface Violation {
  check: ConformanceCheck;
  /** Pointer (or range key) the failure was found at. */
  code: number;
  message: string;
}

/**
 * Run every check that applies to `tables`. An empty result means the
 * tables are conformant.
 */
export function verifyIndex(tables: IndexTables): Violation[] {
  switch (tables.kind) {
    case 'single-byte':
      return verifySingleByte(tables);
    case 'multi-byte':
      return verifyMultiByte(tables);
    case 'range':
      return verifyRange(tables);
  }
}

function verifySingleByte(tables: SingleByteTables): Violation[] {
  const violations: Violation[] = [];
  for (let byte = SINGLE_BYTE_BASE; byte < SINGLE_BYTE_BASE + SINGLE_BYTE_POINTERS; byte++) {
    const scalar = singleByteForwardByte(tables, byte);
    if (scalar === SENTINEL_U16) continue;
    const back = singleByteBackward(tables, scalar);
    if (back !== byte) {
      violations.push({
        check: 'round-trip',
        code: byte,
        message: `backward(forward(${byte})) = backward(${scalar}) = ${back} != ${byte}`,
      });
    }
  }
  return violations;
}

function verifyMultiByte(tables: MultiByteTables): Violation[] {
  const violations: Violation[] = [];
  const duplicates = new Set(tables.duplicates);

  for (let pointer = 0; pointer <= 0xffff; pointer++) {
    if (duplicates.has(pointer)) continue;
    const scalar = multiByteForward(tables, pointer);
    if (scalar === SENTINEL_U16) continue;
    const back = multiByteBackward(tables, scalar);
    if (back !== pointer) {
      violations.push({
        check: 'round-trip',
        code: pointer,
        message: `backward(forward(${pointer})) = backward(${scalar}) = ${back} != ${pointer}`,
      });
    }
  }

  const remap = tables.remap;
  if (remap !== undefined) {
    for (let pointer = remap.min; pointer <= remap.max; pointer++) {
      const scalar = multiByteForward(tables, pointer);
      if (scalar === SENTINEL_U16) continue;
      const alternate = multiByteBackwardRemapped(tables, scalar);
      if (alternate === pointer || alternate === SENTINEL_U16) {
        violations.push({
          check: 'remap',
          code: pointer,
          message: `backwardRemapped(${scalar}) = ${alternate} does not leave the remap range`,
        });
      } else if (multiByteForward(tables, alternate) !== scalar) {
        violations.push({
          check: 'remap',
          code: pointer,
          message: `forward(backwardRemapped(${scalar})) = forward(${alternate}) != ${scalar}`,
        });
      }
    }
  }

  return violations;
}

function verifyRange(tables: RangeTables): Violation[] {
  const violations: Violation[] = [];

  const lookups: Array<[string, (code: number) => number, number, number]> = [
    ['forward', (code) => rangeForward(tables, code), tables.minKey, tables.maxKey],
    ['backward', (code) => rangeBackward(tables, code), tables.minValue, tables.maxValue],
  ];
  for (const [label, fn, min, max] of lookups) {
    for (let code = Math.max(min - 1, 0); code < max + 2; code++) {
      const result = fn(code);
      if (!Number.isInteger(result)) {
        violations.push({ check: 'lookup', code, message: `${label}(${code}) = ${result}` });
      }
    }
  }

  for (let key = tables.minKey; key < tables.maxKey + 2; key++) {
    const value = rangeForward(tables, key);
    if (value === SENTINEL_U32) continue;
    const back = rangeBackward(tables, value);
    if (back === SENTINEL_U32) continue;
    if (back !== key) {
      violations.push({
        check: 'round-trip',
        code: key,
        message: `backward(forward(${key})) = backward(${value}) = ${back} != ${key}`,
      });
    }
  }

  return violations;
}
