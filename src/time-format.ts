/**
 * timephrase/time-format
 *
 * Pattern-based phrase formatter used by the default units.
 *
 * `%n` in the pattern becomes the quantity (formatted for the current
 * locale) and `%u` the singular or plural unit name. Tense wording is added
 * by `decorate` from the past/future prefixes and suffixes.
 *
 * @example
 * ```typescript
 * const hours = createSimpleTimeFormat({ singularName: "hour", pluralName: "hours" });
 * hours.decorate(d, hours.format(d));  // "2 hours ago"
 * ```
 */

import { isInPast, quantityRounded, type Duration } from "./duration";
import type { TimeFormat } from "./time-unit";

// =============================================================================
// Types
// =============================================================================

export interface SimpleTimeFormatOptions {
  singularName: string;
  pluralName: string;

  /**
   * @default "%n %u"
   */
  pattern?: string;

  /** @default "" */
  futurePrefix?: string;
  /** @default "from now" */
  futureSuffix?: string;
  /** @default "" */
  pastPrefix?: string;
  /** @default "ago" */
  pastSuffix?: string;

  /**
   * Percentage of a unit the delta must exceed before the rounded quantity
   * goes up by one.
   * @default 50
   */
  roundingTolerance?: number;

  /**
   * BCP 47 tag used to format quantities.
   * @default "en"
   */
  locale?: string;
}

export interface SimpleTimeFormat extends TimeFormat {
  readonly locale: string;
  setLocale(locale: string): void;
}

// =============================================================================
// Implementation
// =============================================================================

export const DEFAULT_ROUNDING_TOLERANCE = 50;

export function createSimpleTimeFormat(options: SimpleTimeFormatOptions): SimpleTimeFormat {
  const {
    singularName,
    pluralName,
    pattern = "%n %u",
    futurePrefix = "",
    futureSuffix = "from now",
    pastPrefix = "",
    pastSuffix = "ago",
    roundingTolerance = DEFAULT_ROUNDING_TOLERANCE,
  } = options;

  let locale = options.locale ?? "en";
  let numbers = new Intl.NumberFormat(locale);

  const render = (duration: Duration, round: boolean): string => {
    const quantity = round
      ? quantityRounded(duration, roundingTolerance)
      : Math.abs(duration.quantity);
    const unit = quantity === 1 ? singularName : pluralName;
    return pattern
      .replace(/%n/g, () => numbers.format(quantity))
      .replace(/%u/g, () => unit);
  };

  return {
    get locale() {
      return locale;
    },

    setLocale(next: string): void {
      // Intl throws a RangeError for malformed tags; let it surface here
      numbers = new Intl.NumberFormat(next);
      locale = next;
    },

    format(duration: Duration): string {
      return render(duration, true);
    },

    formatUnrounded(duration: Duration): string {
      return render(duration, false);
    },

    decorate(duration: Duration, time: string): string {
      const parts = isInPast(duration)
        ? [pastPrefix, time, pastSuffix]
        : [futurePrefix, time, futureSuffix];
      return parts.join(" ").replace(/\s+/g, " ").trim();
    },
  };
}
