/**
 * timephrase
 *
 * Relative time phrases ("3 days ago", "moments from now") from the
 * difference between two instants.
 *
 * ## Overview
 *
 * The library is split in two layers:
 *
 * 1. **Calculation** (`calculator`): pure functions that pick the best unit
 *    for a signed millisecond difference, or decompose it into a chain of
 *    units. They only need a unit list.
 * 2. **Facade** (`time-phrase`): `createTimePhrase` holds a reference
 *    instant, a locale and the unit list, and renders results through each
 *    unit's phrase formatter.
 *
 * Units carry fixed millisecond ratios. Months and years are averages, so
 * this is not a calendar engine.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createTimePhrase } from 'timephrase';
 *
 * const phrase = createTimePhrase();
 * phrase.format(new Date(Date.now() - 100_000));  // "2 minutes ago"
 *
 * const chain = phrase.calculatePreciseDuration(someDate);
 * phrase.formatDurations(chain);  // "1 year 2 months 3 weeks ago"
 * ```
 */

// =============================================================================
// Duration
// =============================================================================

export {
  type Duration as DurationType,
  Duration,
  createDuration,
  isInPast,
  isInFuture,
  isDuration,
  quantityRounded,
} from "./duration";

// =============================================================================
// Units and formatting
// =============================================================================

export {
  type TimeFormat,
  type TimeUnit,
  type TimeUnitOptions,
  type DefaultUnitName,
  UNIT_MILLIS,
  createTimeUnit,
  createDefaultUnits,
  findUnit,
} from "./time-unit";

export {
  type SimpleTimeFormat,
  type SimpleTimeFormatOptions,
  DEFAULT_ROUNDING_TOLERANCE,
  createSimpleTimeFormat,
} from "./time-format";

// =============================================================================
// Calculation
// =============================================================================

export {
  type PreciseDurationOptions,
  calculateDuration,
  calculatePreciseDuration,
  effectiveMaxQuantity,
} from "./calculator";

// =============================================================================
// Facade
// =============================================================================

export {
  type TimePhrase,
  type TimePhraseOptions,
  createTimePhrase,
} from "./time-phrase";

// =============================================================================
// Errors
// =============================================================================

export {
  type InstantRole,
  type TimePhraseError,
  EmptyUnitListError,
  InvalidInstantError,
  isEmptyUnitListError,
  isInvalidInstantError,
} from "./errors";
