/**
 * timephrase/duration
 *
 * The result record of a calculation: "approximately `quantity` `unit`s,
 * with `delta` milliseconds left over". Durations are frozen once created.
 */

import type { TimeUnit } from "./time-unit";

// =============================================================================
// Duration Type
// =============================================================================

/**
 * One segment of a relative time.
 *
 * `quantity` carries the tense: negative for the past, positive for the
 * future. `delta` is the signed remainder that further decomposition
 * consumes.
 */
export interface Duration {
  readonly _tag: "Duration";
  readonly unit: TimeUnit;
  readonly quantity: number;
  readonly delta: number;
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * Create a frozen Duration.
 *
 * @example
 * ```typescript
 * const d = Duration.create(day, -3, 0)  // "3 days ago"
 * ```
 */
export function createDuration(unit: TimeUnit, quantity: number, delta: number): Duration {
  const duration: Duration = { _tag: "Duration", unit, quantity, delta };
  return Object.freeze(duration);
}

// =============================================================================
// Predicates
// =============================================================================

/**
 * A duration is in the past when its quantity is negative.
 */
export function isInPast(duration: Duration): boolean {
  return duration.quantity < 0;
}

/**
 * Everything that is not in the past is in the future, zero included.
 */
export function isInFuture(duration: Duration): boolean {
  return !isInPast(duration);
}

/**
 * Type guard to check if a value is a Duration.
 */
export function isDuration(value: unknown): value is Duration {
  return (
    typeof value === "object" &&
    value !== null &&
    "_tag" in value &&
    value._tag === "Duration" &&
    "quantity" in value &&
    typeof value.quantity === "number" &&
    "delta" in value &&
    typeof value.delta === "number"
  );
}

// =============================================================================
// Conversions
// =============================================================================

/**
 * Milliseconds accounted for by this segment, excluding its delta.
 */
export function toMillis(duration: Duration): number {
  return duration.quantity * Math.abs(duration.unit.millisPerUnit);
}

/**
 * Absolute quantity, bumped by one when the delta runs in the same
 * direction as the quantity and exceeds `tolerance` percent of a unit.
 * A delta pointing back towards zero (left by rounding a sub-unit
 * difference up to one unit) never adds another.
 *
 * @example
 * ```typescript
 * // 1 hour with 40 minutes left over, tolerance 50 → 2
 * Duration.quantityRounded(oneHourFortyMinutes, 50)
 * ```
 */
export function quantityRounded(duration: Duration, tolerance: number): number {
  let quantity = Math.abs(duration.quantity);
  if (duration.delta !== 0 && Math.sign(duration.delta) === Math.sign(duration.quantity)) {
    const percent = Math.abs((duration.delta / duration.unit.millisPerUnit) * 100);
    if (percent > tolerance) {
      quantity += 1;
    }
  }
  return quantity;
}

// =============================================================================
// Namespace Export
// =============================================================================

/**
 * Duration namespace with all functions for convenient access.
 *
 * @example
 * ```typescript
 * import { Duration } from "timephrase";
 *
 * const d = phrase.approximateDuration(then);
 * if (Duration.isInPast(d)) { ... }
 * ```
 */
export const Duration = {
  create: createDuration,
  isInPast,
  isInFuture,
  isDuration,
  toMillis,
  quantityRounded,
} as const;

export type { Duration as DurationType };
