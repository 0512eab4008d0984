/**
 * Contract violations
 *
 * Broken invariants (out-of-bounds cell access, updating a closed game,
 * impossible clear counts) are programming errors. They are thrown, never
 * clamped or recovered from. Rejected moves are not errors and never
 * reach this module.
 */

export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

/**
 * Throw a ContractViolationError unless `condition` holds.
 */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new ContractViolationError(message);
  }
}
