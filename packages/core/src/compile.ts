// ============================================================================
// @enctab/core — Index Compilation
// ============================================================================
//
// Routes each registered encoding to its compiler and accounts for the
// size of the resulting tables. Batch builds isolate failures: one bad
// index is reported and the rest still compile.
// ============================================================================

import { logCompileFailure, timer } from './logger.js';
import { compileMultiByte } from './multi_byte.js';
import { compileRange } from './range.js';
import type { EncodingSpec } from './registry.js';
import { compileSingleByte } from './single_byte.js';
import type { IndexData, IndexKind, IndexTables } from './types.js';

/** A compiled encoding, ready to hand to an emitter. */
export interface CompiledIndex {
  name: string;
  group: string;
  kind: IndexKind;
  /** Commentary carried over from the index source. */
  comments: string[];
  tables: IndexTables;
  /** Total bytes of all stored tables. */
  byteSize: number;
}

export type CompileOutcome =
  | { ok: true; name: string; index: CompiledIndex }
  | { ok: false; name: string; error: Error };

/**
 * Compile one encoding with the compiler its registry entry names.
 */
export function compileIndex(spec: EncodingSpec, data: IndexData): CompiledIndex {
  const t = timer(`compile ${spec.name}`);
  const tables = compileTables(spec, data);
  const byteSize = tableByteSize(tables);
  t.endWith({ kind: spec.kind, byteSize });

  return {
    name: spec.name,
    group: spec.group,
    kind: spec.kind,
    comments: [...data.comments],
    tables,
    byteSize,
  };
}

function compileTables(spec: EncodingSpec, data: IndexData): IndexTables {
  switch (spec.kind) {
    case 'single-byte':
      return compileSingleByte(data.entries);
    case 'multi-byte':
      return compileMultiByte(data.entries, { remap: spec.remap, aliases: spec.aliases });
    case 'range':
      return compileRange(data.entries, {
        invalidRange: spec.invalidRange,
        keyCeiling: spec.keyCeiling,
        valueCeiling: spec.valueCeiling,
      });
  }
}

/**
 * Sum of the byte lengths of every table a bundle stores.
 */
export function tableByteSize(tables: IndexTables): number {
  switch (tables.kind) {
    case 'single-byte':
      return (
        tables.forward.byteLength + tables.backwardLower.byteLength + tables.backwardUpper.byteLength
      );
    case 'multi-byte':
      return (
        tables.forward.byteLength +
        (tables.forwardMore?.byteLength ?? 0) +
        tables.backwardLower.byteLength +
        tables.backwardUpper.byteLength +
        (tables.remap?.table.byteLength ?? 0)
      );
    case 'range':
      return tables.keys.byteLength + tables.values.byteLength;
  }
}

/**
 * Compile every encoding in `specs`. A failure while loading or compiling
 * one encoding is captured in its outcome and does not stop the others.
 *
 * @param load - Supplies the index data of an encoding
 */
export function compileAll(
  specs: readonly EncodingSpec[],
  load: (spec: EncodingSpec) => IndexData,
): CompileOutcome[] {
  return specs.map((spec): CompileOutcome => {
    try {
      return { ok: true, name: spec.name, index: compileIndex(spec, load(spec)) };
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      logCompileFailure(spec.name, error.message);
      return { ok: false, name: spec.name, error };
    }
  });
}
