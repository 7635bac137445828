// ============================================================================
// @enctab/core — Public API
// ============================================================================

// Trie
export { buildMinimalTrie, trieLookup } from './trie.js';

// Compilers
export {
  compileSingleByte,
  singleByteForward,
  singleByteForwardByte,
  singleByteBackward,
} from './single_byte.js';
export {
  compileMultiByte,
  multiByteForward,
  multiByteBackward,
  multiByteBackwardRemapped,
} from './multi_byte.js';
export type { MultiBytePolicy } from './multi_byte.js';
export { compileRange, rangeForward, rangeBackward, searchFloor } from './range.js';
export type { RangePolicy } from './range.js';

// Lookup contracts
export { forward, backward, backwardRemapped, forwardSentinel, backwardSentinel } from './lookup.js';

// Compilation & registry
export { compileIndex, compileAll, tableByteSize } from './compile.js';
export type { CompiledIndex, CompileOutcome } from './compile.js';
export { parseRegistry, filterRegistry, encodingSpecSchema, registrySchema } from './registry.js';
export type { EncodingSpec, SingleByteSpec, MultiByteSpec, RangeSpec } from './registry.js';

// Index source
export { parseIndexText } from './source.js';

// Conformance
export { verifyIndex } from './conformance.js';
export type { Violation, ConformanceCheck } from './conformance.js';

// Errors
export {
  EnctabError,
  IndexIntegrityError,
  DuplicatePointerError,
  DuplicateScalarError,
  DomainError,
  SupplementaryPlaneError,
  AliasCollisionError,
  RemapUnresolvedError,
  UnsortedRangeError,
  EmptyIndexError,
  TrieCapacityError,
  IndexParseError,
  RegistryError,
} from './errors.js';

// Logging
export {
  debug,
  info,
  warn,
  error,
  timer,
  Timer,
  onLog,
  setLogLevel,
  getLogLevel,
  isDebugEnabled,
} from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';

// Types
export type {
  IndexEntry,
  IndexData,
  IndexKind,
  Trie,
  SingleByteTables,
  MultiByteTables,
  RangeTables,
  RemapTable,
  InvalidRange,
  IndexTables,
} from './types.js';

export {
  SENTINEL_U16,
  SENTINEL_U32,
  SINGLE_BYTE_UNMAPPED,
  SINGLE_BYTE_BASE,
  SINGLE_BYTE_POINTERS,
  SCALAR_LIMIT,
  DEFAULT_LOWER_LIMIT,
  MAX_BLOCK_BITS,
} from './types.js';
