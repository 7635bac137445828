// ============================================================================
// @enctab/core — Index Text Parser
// ============================================================================
//
// Reads the line-oriented index format:
//
//   # free-text commentary
//   <pointer> <scalar> [description...]
//
// Integers are decimal or 0x-prefixed hexadecimal. Blank lines are skipped.
// Entry order is preserved; commentary keeps the text after '#'.
// ============================================================================

import { IndexParseError } from './errors.js';
import type { IndexData, IndexEntry } from './types.js';

const INTEGER = /^(?:0x[0-9a-f]+|\d+)$/i;

/**
 * Parse index text into entries and commentary.
 *
 * @throws {IndexParseError} If a data line lacks two integer fields
 *
 * @example
 * ```ts
 * parseIndexText('# cp-test\n0 0x20AC EURO SIGN\n');
 * // → { entries: [{ pointer: 0, scalar: 0x20ac }], comments: [' cp-test'] }
 * ```
 */
export function parseIndexText(text: string): IndexData {
  const entries: IndexEntry[] = [];
  const comments: string[] = [];

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line.length === 0) continue;
    if (line.startsWith('#')) {
      comments.push(line.slice(1));
      continue;
    }

    const [key, value] = line.split(/\s+/, 2);
    entries.push({
      pointer: parseInteger(key, i + 1),
      scalar: parseInteger(value, i + 1),
    });
  }

  return { entries, comments };
}

function parseInteger(field: string | undefined, line: number): number {
  if (field === undefined) {
    throw new IndexParseError(line, 'expected a pointer and a scalar');
  }
  if (!INTEGER.test(field)) {
    throw new IndexParseError(line, `"${field}" is not an integer`);
  }
  return Number(field);
}
