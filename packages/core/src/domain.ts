// ============================================================================
// @enctab/core — Domain Checks
// ============================================================================

import { DomainError } from './errors.js';

/** True when `value` is an integer in `[0, limit)`. */
export function inRange(value: number, limit: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < limit;
}

/**
 * @throws {DomainError} If `value` is not an integer in `[0, limit)`
 */
export function assertInDomain(field: 'pointer' | 'scalar', value: number, limit: number): void {
  if (!inRange(value, limit)) {
    throw new DomainError(field, value, [0, limit]);
  }
}
