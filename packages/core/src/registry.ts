// ============================================================================
// @enctab/core — Encoding Registry
// ============================================================================
//
// The per-encoding policy table: which compiler an index goes through, the
// group its output belongs to, and its optional special cases (remap
// range, alias pointers, range carve-out and ceilings). Loaded from a JSON
// manifest and validated here.
// ============================================================================

import { z } from 'zod';
import { RegistryError } from './errors.js';

const name = z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'must be lowercase letters, digits and dashes');
const pointer = z.number().int().min(0).max(0xfffe);
const u32 = z.number().int().min(0).max(0xffffffff);

const singleByteSpec = z
  .object({
    kind: z.literal('single-byte'),
    name,
    group: name,
  })
  .strict();

const multiByteSpec = z
  .object({
    kind: z.literal('multi-byte'),
    name,
    group: name,
    remap: z
      .object({ min: pointer, max: pointer })
      .strict()
      .refine((r) => r.min <= r.max, 'remap.min must not exceed remap.max')
      .optional(),
    aliases: z.array(pointer).optional(),
  })
  .strict();

const rangeSpec = z
  .object({
    kind: z.literal('range'),
    name,
    group: name,
    invalidRange: z
      .object({ start: u32, end: u32 })
      .strict()
      .refine((r) => r.start <= r.end, 'invalidRange.start must not exceed invalidRange.end')
      .optional(),
    keyCeiling: u32.optional(),
    valueCeiling: u32.optional(),
  })
  .strict();

export const encodingSpecSchema = z.discriminatedUnion('kind', [
  singleByteSpec,
  multiByteSpec,
  rangeSpec,
]);

export const registrySchema = z.object({
  encodings: z.array(encodingSpecSchema),
});

export type EncodingSpec = z.infer<typeof encodingSpecSchema>;
export type SingleByteSpec = z.infer<typeof singleByteSpec>;
export type MultiByteSpec = z.infer<typeof multiByteSpec>;
export type RangeSpec = z.infer<typeof rangeSpec>;

/**
 * Validate a registry manifest.
 *
 * @param json - Parsed manifest (`{ encodings: [...] }`)
 * @throws {RegistryError} If the manifest is malformed or names repeat
 */
export function parseRegistry(json: unknown): EncodingSpec[] {
  const result = registrySchema.safeParse(json);
  if (!result.success) {
    throw new RegistryError(
      'Invalid encoding registry',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const seen = new Set<string>();
  for (const spec of result.data.encodings) {
    if (seen.has(spec.name)) {
      throw new RegistryError(`Encoding "${spec.name}" is registered more than once`);
    }
    seen.add(spec.name);
  }
  return result.data.encodings;
}

/**
 * Keep the encodings whose name contains `filter`. An empty filter keeps all.
 */
export function filterRegistry(specs: readonly EncodingSpec[], filter: string): EncodingSpec[] {
  return specs.filter((spec) => spec.name.includes(filter));
}
