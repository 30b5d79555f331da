/**
 * timephrase/calculator
 *
 * Picks the unit that best expresses a signed millisecond difference, and
 * decomposes a difference into a chain of units, largest first.
 *
 * Both functions work on a private copy of the unit list taken on entry, so
 * replacing a facade's units while a calculation runs has no effect on it.
 *
 * @example
 * ```typescript
 * const units = createDefaultUnits();
 * calculateDuration(-3 * UNIT_MILLIS.day, units);
 * // { unit: day, quantity: -3, delta: 0 }
 *
 * calculatePreciseDuration(90_061_000, [second, minute, hour, day]);
 * // [1 day, 1 hour, 1 minute, 1 second]
 * ```
 */

import { createDuration, type Duration } from "./duration";
import { EmptyUnitListError } from "./errors";
import type { TimeUnit } from "./time-unit";

// =============================================================================
// Types
// =============================================================================

export interface PreciseDurationOptions {
  /**
   * Receives a message when decomposition stops with a remainder left.
   */
  logger?: (message: string) => void;
}

// =============================================================================
// Single Duration
// =============================================================================

/**
 * How many instances of `units[index]` may be expressed before the next
 * unit takes over. A `maxQuantity` of 0 falls back to the integer ratio
 * between the next unit and this one; the last unit has no such fallback.
 *
 * A next unit less than twice as coarse gives a cap of 1, or 0 when it is
 * finer. The integer division is kept as is; order units by size.
 */
export function effectiveMaxQuantity(units: readonly TimeUnit[], index: number): number {
  const unit = units[index];
  const quantity = Math.abs(unit.maxQuantity);
  if (quantity === 0 && index < units.length - 1) {
    return Math.trunc(units[index + 1].millisPerUnit / unit.millisPerUnit);
  }
  return quantity;
}

/**
 * Express `differenceMillis` in the first unit whose capacity exceeds it,
 * or in the last unit when none does.
 *
 * A difference smaller than one instance of the chosen unit rounds to a
 * quantity of -1 or +1. A zero difference yields +1 of the finest
 * qualifying unit with a delta of 0.
 *
 * @throws {EmptyUnitListError} when `units` is empty
 */
export function calculateDuration(differenceMillis: number, units: readonly TimeUnit[]): Duration {
  if (units.length === 0) {
    throw new EmptyUnitListError();
  }

  const snapshot = units.slice();
  const absoluteDifference = Math.abs(differenceMillis);

  let index = snapshot.length - 1;
  for (let i = 0; i < snapshot.length - 1; i++) {
    const millisPerUnit = Math.abs(snapshot[i].millisPerUnit);
    if (millisPerUnit * effectiveMaxQuantity(snapshot, i) > absoluteDifference) {
      index = i;
      break;
    }
  }

  const unit = snapshot[index];
  const millisPerUnit = Math.abs(unit.millisPerUnit);

  if (differenceMillis === 0) {
    return createDuration(unit, 1, 0);
  }

  const quantity =
    millisPerUnit > absoluteDifference
      ? Math.sign(differenceMillis)
      : Math.trunc(differenceMillis / millisPerUnit);

  return createDuration(unit, quantity, differenceMillis - quantity * millisPerUnit);
}

// =============================================================================
// Precise Decomposition
// =============================================================================

/**
 * Decompose `differenceMillis` into durations, largest unit first, each one
 * expressing the previous one's delta.
 *
 * The chain never grows longer than the unit list. A list whose units
 * cannot consume each other's remainders (for example seconds and minutes
 * with no finer unit, given 1.5s) would otherwise round back and forth
 * forever; when the cap is hit the last delta is left non-zero and the
 * logger is told.
 *
 * For every non-zero difference, the sum of `quantity * millisPerUnit` over
 * the result plus the last element's `delta` equals `differenceMillis`.
 *
 * @throws {EmptyUnitListError} when `units` is empty
 */
export function calculatePreciseDuration(
  differenceMillis: number,
  units: readonly TimeUnit[],
  options: PreciseDurationOptions = {}
): Duration[] {
  const { logger = () => {} } = options;
  const snapshot = units.slice();

  let duration = calculateDuration(differenceMillis, snapshot);
  const result: Duration[] = [duration];

  while (duration.delta !== 0 && result.length < snapshot.length) {
    duration = calculateDuration(duration.delta, snapshot);
    result.push(duration);
  }

  if (duration.delta !== 0) {
    logger(
      `Precise duration stopped after ${result.length} segments with ${duration.delta}ms unaccounted for`
    );
  }

  return result;
}
