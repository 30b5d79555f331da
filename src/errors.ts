/**
 * timephrase/errors
 *
 * Precondition failures raised by the calculator and the facade.
 * Everything else in the library is plain arithmetic and does not throw.
 */

/**
 * Error thrown when a calculation is asked to run without any time units.
 * No unit means no expressible result, so there is nothing to recover to.
 */
export class EmptyUnitListError extends Error {
  readonly type = "EMPTY_UNIT_LIST" as const;

  constructor(message = "At least one time unit is required to calculate a duration") {
    super(message);
    this.name = "EmptyUnitListError";
  }
}

/**
 * Which instant was invalid.
 */
export type InstantRole = "then" | "reference";

/**
 * Error thrown when a `Date` whose time value is NaN reaches a calculation.
 */
export class InvalidInstantError extends Error {
  readonly type = "INVALID_INSTANT" as const;
  readonly role: InstantRole;

  constructor(role: InstantRole) {
    super(`Cannot compute a difference from an invalid ${role} date`);
    this.name = "InvalidInstantError";
    this.role = role;
  }
}

/**
 * Type guard for EmptyUnitListError.
 */
export function isEmptyUnitListError(error: unknown): error is EmptyUnitListError {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "EMPTY_UNIT_LIST"
  );
}

/**
 * Type guard for InvalidInstantError.
 */
export function isInvalidInstantError(error: unknown): error is InvalidInstantError {
  return (
    typeof error === "object" &&
    error !== null &&
    "type" in error &&
    error.type === "INVALID_INSTANT"
  );
}

export type TimePhraseError = EmptyUnitListError | InvalidInstantError;
