// ============================================================================
// @enctab/core — Error Types
// ============================================================================

/**
 * Base error class for all enctab errors.
 */
export class EnctabError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnctabError';
  }
}

// ---------------------------------------------------------------------------
// Index Integrity Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when an index mapping violates one of its integrity rules.
 * Compilation of the affected encoding stops; nothing partial is returned.
 */
export class IndexIntegrityError extends EnctabError {
  public readonly pointer?: number;
  public readonly scalar?: number;

  constructor(message: string, options?: { pointer?: number; scalar?: number }) {
    super(message);
    this.name = 'IndexIntegrityError';
    this.pointer = options?.pointer;
    this.scalar = options?.scalar;
  }
}

/**
 * Thrown when the same pointer is declared twice.
 */
export class DuplicatePointerError extends IndexIntegrityError {
  constructor(pointer: number) {
    super(`Pointer ${pointer} is declared more than once.`, { pointer });
    this.name = 'DuplicatePointerError';
  }
}

/**
 * Thrown when a single-byte index maps two pointers to one scalar.
 */
export class DuplicateScalarError extends IndexIntegrityError {
  constructor(pointer: number, scalar: number) {
    super(`Scalar ${hex(scalar)} at pointer ${pointer} is already mapped.`, { pointer, scalar });
    this.name = 'DuplicateScalarError';
  }
}

/**
 * Thrown when a pointer or scalar falls outside the declared domain.
 */
export class DomainError extends IndexIntegrityError {
  public readonly field: 'pointer' | 'scalar';
  public readonly value: number;
  public readonly bound: [number, number];

  constructor(field: 'pointer' | 'scalar', value: number, bound: [number, number]) {
    super(`${field} ${value} is outside [${bound[0]}, ${bound[1]}).`, {
      [field]: value,
    });
    this.name = 'DomainError';
    this.field = field;
    this.value = value;
    this.bound = bound;
  }
}

/**
 * Thrown when a scalar above the BMP lies outside supplementary plane 2.
 */
export class SupplementaryPlaneError extends IndexIntegrityError {
  constructor(pointer: number, scalar: number) {
    super(`Scalar ${hex(scalar)} at pointer ${pointer} is outside plane 2.`, { pointer, scalar });
    this.name = 'SupplementaryPlaneError';
  }
}

/**
 * Thrown when an alias pointer or its placeholder scalar is already taken.
 */
export class AliasCollisionError extends IndexIntegrityError {
  constructor(pointer: number, scalar: number, what: 'pointer' | 'scalar') {
    super(`Alias pointer ${pointer} (placeholder ${scalar}) collides with an assigned ${what}.`, {
      pointer,
      scalar,
    });
    this.name = 'AliasCollisionError';
  }
}

/**
 * Thrown when a pointer inside a remap range has no counterpart outside it.
 */
export class RemapUnresolvedError extends IndexIntegrityError {
  constructor(pointer: number, scalar: number) {
    super(`Remapped pointer ${pointer} (${hex(scalar)}) has no counterpart outside the range.`, {
      pointer,
      scalar,
    });
    this.name = 'RemapUnresolvedError';
  }
}

/**
 * Thrown when range breakpoints are not strictly increasing.
 */
export class UnsortedRangeError extends IndexIntegrityError {
  constructor(index: number, key: number, value: number) {
    super(`Range breakpoint #${index} (${key}, ${value}) is not strictly increasing.`, {
      pointer: key,
      scalar: value,
    });
    this.name = 'UnsortedRangeError';
  }
}

/**
 * Thrown when an index that needs at least one entry has none.
 */
export class EmptyIndexError extends IndexIntegrityError {
  constructor(kind: string) {
    super(`A ${kind} index needs at least one entry.`);
    this.name = 'EmptyIndexError';
  }
}

// ---------------------------------------------------------------------------
// Trie Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when no block size keeps the lower table under its ceiling.
 */
export class TrieCapacityError extends EnctabError {
  public readonly lowerLimit: number;

  constructor(lowerLimit: number) {
    super(`No trie block size keeps the lower table below ${lowerLimit} entries.`);
    this.name = 'TrieCapacityError';
    this.lowerLimit = lowerLimit;
  }
}

// ---------------------------------------------------------------------------
// Input Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when index text cannot be parsed.
 */
export class IndexParseError extends EnctabError {
  public readonly line: number;

  constructor(line: number, message: string) {
    super(`Line ${line}: ${message}`);
    this.name = 'IndexParseError';
    this.line = line;
  }
}

/**
 * Thrown when the encoding registry manifest is invalid.
 */
export class RegistryError extends EnctabError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'RegistryError';
    this.issues = issues;
  }
}

function hex(value: number): string {
  return `U+${value.toString(16).toUpperCase().padStart(4, '0')}`;
}
