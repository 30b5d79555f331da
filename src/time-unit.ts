/**
 * timephrase/time-unit
 *
 * Time unit descriptors and the default unit list.
 *
 * A unit is plain data (a fixed millisecond ratio and a quantity cap) plus
 * the phrase formatter that renders durations expressed in it. Units never
 * subclass each other; a new granularity is just another record.
 *
 * @example
 * ```typescript
 * import { createTimeUnit, createSimpleTimeFormat } from "timephrase";
 *
 * const fortnight = createTimeUnit({
 *   name: "fortnight",
 *   millisPerUnit: 14 * UNIT_MILLIS.day,
 *   format: createSimpleTimeFormat({ singularName: "fortnight", pluralName: "fortnights" }),
 * });
 * ```
 */

import type { Duration } from "./duration";
import { createSimpleTimeFormat, type SimpleTimeFormatOptions } from "./time-format";

// =============================================================================
// Types
// =============================================================================

/**
 * Renders durations of one unit as text.
 */
export interface TimeFormat {
  /** Rounded rendering, e.g. "2 hours" for 1h40m. */
  format(duration: Duration): string;
  /** Truncated rendering used for intermediate segments of a chain. */
  formatUnrounded(duration: Duration): string;
  /** Wrap already rendered text with tense wording ("... ago"). */
  decorate(duration: Duration, time: string): string;
  /** Optional locale hook, called when the owning unit changes locale. */
  setLocale?(locale: string): void;
}

/**
 * One granularity of time.
 */
export interface TimeUnit {
  readonly name: string;
  /** Milliseconds in one instance of this unit. */
  readonly millisPerUnit: number;
  /**
   * How many instances may be expressed before switching to the next
   * coarser unit. `0` derives the cap from the ratio to the next unit.
   */
  readonly maxQuantity: number;
  readonly format: TimeFormat;
  setLocale(locale: string): void;
}

/**
 * Options for {@link createTimeUnit}.
 */
export interface TimeUnitOptions {
  name: string;
  millisPerUnit: number;
  /**
   * @default 0 (derived from the next unit)
   */
  maxQuantity?: number;
  format: TimeFormat;
}

// =============================================================================
// Constants
// =============================================================================

const MONTH = 2_629_743_830;
const YEAR = MONTH * 12;

/**
 * Fixed millisecond ratios of the built-in units. Months and years are
 * averages, not calendar-aware values.
 */
export const UNIT_MILLIS = {
  justNow: 1,
  millisecond: 1,
  second: 1_000,
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
  week: 604_800_000,
  month: MONTH,
  year: YEAR,
  decade: YEAR * 10,
  century: YEAR * 100,
  millennium: YEAR * 1_000,
} as const;

export type DefaultUnitName = keyof typeof UNIT_MILLIS;

/** Differences under a minute read as "moments". */
const JUST_NOW_MAX_QUANTITY = 60_000;

type UnitLabels = Pick<SimpleTimeFormatOptions, "singularName" | "pluralName" | "pattern">;

const ENGLISH_LABELS: Record<DefaultUnitName, UnitLabels> = {
  justNow: { singularName: "moments", pluralName: "moments", pattern: "%u" },
  millisecond: { singularName: "millisecond", pluralName: "milliseconds" },
  second: { singularName: "second", pluralName: "seconds" },
  minute: { singularName: "minute", pluralName: "minutes" },
  hour: { singularName: "hour", pluralName: "hours" },
  day: { singularName: "day", pluralName: "days" },
  week: { singularName: "week", pluralName: "weeks" },
  month: { singularName: "month", pluralName: "months" },
  year: { singularName: "year", pluralName: "years" },
  decade: { singularName: "decade", pluralName: "decades" },
  century: { singularName: "century", pluralName: "centuries" },
  millennium: { singularName: "millennium", pluralName: "millennia" },
};

const DEFAULT_ORDER: readonly DefaultUnitName[] = [
  "justNow",
  "millisecond",
  "second",
  "minute",
  "hour",
  "day",
  "week",
  "month",
  "year",
  "decade",
  "century",
  "millennium",
];

// =============================================================================
// Constructors
// =============================================================================

/**
 * Create a time unit. Locale changes are forwarded to the formatter when it
 * accepts one.
 */
export function createTimeUnit(options: TimeUnitOptions): TimeUnit {
  const { name, millisPerUnit, maxQuantity = 0, format } = options;
  return {
    name,
    millisPerUnit,
    maxQuantity,
    format,
    setLocale(locale: string): void {
      format.setLocale?.(locale);
    },
  };
}

/**
 * The built-in unit list, finest first: just now, millisecond, second,
 * minute, hour, day, week, month, year, decade, century, millennium.
 * Each call returns fresh units with their own formatters.
 */
export function createDefaultUnits(locale = "en"): TimeUnit[] {
  return DEFAULT_ORDER.map((name) =>
    createTimeUnit({
      name,
      millisPerUnit: UNIT_MILLIS[name],
      maxQuantity: name === "justNow" ? JUST_NOW_MAX_QUANTITY : 0,
      format: createSimpleTimeFormat({ ...ENGLISH_LABELS[name], locale }),
    })
  );
}

/**
 * Find a unit by name.
 */
export function findUnit(units: readonly TimeUnit[], name: string): TimeUnit | undefined {
  return units.find((unit) => unit.name === name);
}
