/**
 * timephrase/time-phrase
 *
 * Facade holding a reference instant, a locale and the active unit list.
 * Computes differences against the reference and renders them through each
 * unit's phrase formatter.
 *
 * Concurrent use of one instance is best effort: each calculation reads the
 * reference, locale and unit list once and works from those values. The
 * unit list is stored as a frozen array, so a `setUnits` never mutates a
 * list another calculation is iterating.
 *
 * @example
 * ```typescript
 * import { createTimePhrase } from "timephrase";
 *
 * const phrase = createTimePhrase();
 * phrase.format(new Date());                          // "moments from now"
 * phrase.format(new Date(Date.now() - 3 * 86400000)); // "3 days ago"
 * ```
 */

import { calculateDuration, calculatePreciseDuration } from "./calculator";
import type { Duration } from "./duration";
import { EmptyUnitListError, InvalidInstantError, type InstantRole } from "./errors";
import { createDefaultUnits, type TimeUnit } from "./time-unit";

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for a TimePhrase instance.
 */
export interface TimePhraseOptions {
  /**
   * Instant that differences are measured from. `null` reads the clock at
   * every call.
   * @default null
   */
  reference?: Date | null;

  /**
   * Locale for the default units. Units passed in `units` keep their own
   * locale until `setLocale` is called.
   * @default "en"
   */
  locale?: string;

  /**
   * Units, finest first.
   * @default createDefaultUnits(locale)
   */
  units?: readonly TimeUnit[];

  /**
   * Clock used when no reference is set.
   * @default Date.now
   */
  now?: () => number;

  /** Logger function */
  logger?: (message: string) => void;
}

export interface TimePhrase {
  /** Best single-unit duration between the reference (or now) and `then`. */
  approximateDuration(then: Date): Duration;
  /**
   * Chain of durations between the reference and `then`, largest first.
   * Fixes the reference to now when none is set, so later calls on this
   * instance measure from the same instant.
   */
  calculatePreciseDuration(then: Date): Duration[];
  /** Approximate and render `then`; a missing date means now. */
  format(then?: Date | null): string;
  formatDuration(duration: Duration): string;
  /** Render a chain, rounding only its last segment. */
  formatDurations(durations: readonly Duration[]): string;
  getReference(): Date | null;
  setReference(timestamp: Date | null): void;
  getUnits(): readonly TimeUnit[];
  setUnits(units: readonly TimeUnit[]): void;
  getLocale(): string;
  setLocale(locale: string): void;
  toString(): string;
}

// =============================================================================
// Implementation
// =============================================================================

function timeOf(date: Date, role: InstantRole): number {
  const time = date.getTime();
  if (Number.isNaN(time)) {
    throw new InvalidInstantError(role);
  }
  return time;
}

function freezeUnits(units: readonly TimeUnit[]): readonly TimeUnit[] {
  if (units.length === 0) {
    throw new EmptyUnitListError();
  }
  return Object.freeze(units.slice());
}

/**
 * Create a TimePhrase facade.
 *
 * @example
 * ```typescript
 * const phrase = createTimePhrase({
 *   reference: new Date("2024-01-01T00:00:00Z"),
 *   logger: (message) => pinoLogger.debug(message),
 * });
 *
 * const chain = phrase.calculatePreciseDuration(new Date("2024-01-02T01:01:00Z"));
 * phrase.formatDurations(chain);  // "1 day 1 hour 1 minute from now"
 * ```
 */
export function createTimePhrase(options: TimePhraseOptions = {}): TimePhrase {
  const { now = Date.now, logger = () => {} } = options;

  let reference: Date | null = options.reference ?? null;
  let locale = options.locale ?? "en";
  let units = freezeUnits(options.units ?? createDefaultUnits(locale));

  const referenceTime = (): number =>
    reference === null ? now() : timeOf(reference, "reference");

  const approximateDuration = (then: Date): Duration =>
    calculateDuration(timeOf(then, "then") - referenceTime(), units);

  const formatDuration = (duration: Duration): string => {
    const { format } = duration.unit;
    return format.decorate(duration, format.format(duration));
  };

  return {
    approximateDuration,

    calculatePreciseDuration(then: Date): Duration[] {
      if (reference === null) {
        reference = new Date(now());
        logger(`Reference fixed to ${reference.toISOString()}`);
      }
      const difference = timeOf(then, "then") - timeOf(reference, "reference");
      return calculatePreciseDuration(difference, units, { logger });
    },

    format(then?: Date | null): string {
      return formatDuration(approximateDuration(then ?? new Date(now())));
    },

    formatDuration,

    formatDurations(durations: readonly Duration[]): string {
      if (durations.length === 0) {
        return "";
      }
      const lastIndex = durations.length - 1;
      const text = durations
        .map((duration, i) =>
          i === lastIndex
            ? duration.unit.format.format(duration)
            : duration.unit.format.formatUnrounded(duration)
        )
        .join(" ");
      const last = durations[lastIndex];
      return last.unit.format.decorate(last, text);
    },

    getReference(): Date | null {
      return reference;
    },

    setReference(timestamp: Date | null): void {
      reference = timestamp;
    },

    getUnits(): readonly TimeUnit[] {
      return units;
    },

    setUnits(next: readonly TimeUnit[]): void {
      units = freezeUnits(next);
      logger(`Units replaced: ${units.length} units`);
    },

    getLocale(): string {
      return locale;
    },

    setLocale(next: string): void {
      // Throws a RangeError for malformed tags before any unit is touched
      Intl.getCanonicalLocales(next);
      for (const unit of units) {
        unit.setLocale(next);
      }
      locale = next;
      logger(`Locale changed to ${next}`);
    },

    toString(): string {
      const shown =
        reference === null
          ? "null"
          : Number.isNaN(reference.getTime())
            ? "Invalid Date"
            : reference.toISOString();
      return `TimePhrase [reference=${shown}, locale=${locale}]`;
    },
  };
}
