// ============================================================================
// @enctab/cli — JSON Table Dump
// ============================================================================

import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import type { CompiledIndex, IndexTables } from '@enctab/core';

/**
 * Where the dump of `index` goes: `<outDir>/<group>/<name_with_underscores>.json`.
 */
export function outputPath(outDir: string, index: CompiledIndex): string {
  return path.join(outDir, index.group, `${index.name.replace(/-/g, '_')}.json`);
}

/**
 * Plain-JSON form of a compiled index. Typed arrays become number arrays.
 */
export function toJson(index: CompiledIndex): Record<string, unknown> {
  return {
    name: index.name,
    group: index.group,
    kind: index.kind,
    byteSize: index.byteSize,
    comments: index.comments,
    tables: tablesToJson(index.tables),
  };
}

function tablesToJson(tables: IndexTables): Record<string, unknown> {
  switch (tables.kind) {
    case 'single-byte':
      return {
        forward: Array.from(tables.forward),
        backwardLower: Array.from(tables.backwardLower),
        backwardUpper: Array.from(tables.backwardUpper),
        blockBits: tables.blockBits,
      };
    case 'multi-byte':
      return {
        minKey: tables.minKey,
        maxKey: tables.maxKey,
        forward: Array.from(tables.forward),
        forwardMore: tables.forwardMore && Array.from(tables.forwardMore),
        backwardLower: Array.from(tables.backwardLower),
        backwardUpper: Array.from(tables.backwardUpper),
        blockBits: tables.blockBits,
        remap: tables.remap && {
          min: tables.remap.min,
          max: tables.remap.max,
          table: Array.from(tables.remap.table),
        },
        duplicates: tables.duplicates,
      };
    case 'range':
      return {
        keys: Array.from(tables.keys),
        values: Array.from(tables.values),
        minKey: tables.minKey,
        maxKey: tables.maxKey,
        minValue: tables.minValue,
        maxValue: tables.maxValue,
        invalidRange: tables.invalidRange,
        keyCeiling: tables.keyCeiling,
        valueCeiling: tables.valueCeiling,
      };
  }
}

/**
 * Write the dump of `index` under `outDir`, creating its group directory.
 * Returns the file path.
 */
export function writeIndex(outDir: string, index: CompiledIndex): string {
  const file = outputPath(outDir, index);
  mkdirSync(path.dirname(file), { recursive: true });
  writeFileSync(file, `${JSON.stringify(toJson(index), null, 2)}\n`);
  return file;
}
