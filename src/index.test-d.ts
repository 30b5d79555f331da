/**
 * Type tests for timephrase
 * Checked by `tsc --noEmit`; nothing here runs.
 */
/* eslint-disable @typescript-eslint/no-unused-vars */
import { expectType } from "tsd";
import {
  Duration,
  calculateDuration,
  calculatePreciseDuration,
  createDefaultUnits,
  createTimePhrase,
  createTimeUnit,
  createSimpleTimeFormat,
  isInvalidInstantError,
  type DurationType,
  type InstantRole,
  type SimpleTimeFormat,
  type TimePhrase,
  type TimePhraseError,
  type TimeUnit,
} from "./index";

// =============================================================================
// TEST 1: calculator results are Durations
// =============================================================================

function _test1() {
  const units = createDefaultUnits();
  expectType<TimeUnit[]>(units);

  const single = calculateDuration(-90_000, units);
  expectType<DurationType>(single);
  expectType<number>(single.quantity);
  expectType<TimeUnit>(single.unit);

  const chain = calculatePreciseDuration(90_061_000, units, { logger: console.warn });
  expectType<DurationType[]>(chain);
}

// =============================================================================
// TEST 2: facade surface
// =============================================================================

function _test2() {
  const phrase = createTimePhrase({ reference: null, locale: "en" });
  expectType<TimePhrase>(phrase);
  expectType<Date | null>(phrase.getReference());
  expectType<readonly TimeUnit[]>(phrase.getUnits());
  expectType<string>(phrase.format());
  expectType<string>(phrase.formatDurations(phrase.calculatePreciseDuration(new Date())));
}

// =============================================================================
// TEST 3: Duration namespace and interface share a name
// =============================================================================

function _test3(d: Duration) {
  expectType<boolean>(Duration.isInPast(d));
  expectType<number>(Duration.quantityRounded(d, 50));
}

// =============================================================================
// TEST 4: custom units keep their formatter type
// =============================================================================

function _test4() {
  const format = createSimpleTimeFormat({ singularName: "fortnight", pluralName: "fortnights" });
  expectType<SimpleTimeFormat>(format);
  expectType<string>(format.locale);

  const fortnight = createTimeUnit({ name: "fortnight", millisPerUnit: 1_209_600_000, format });
  expectType<TimeUnit>(fortnight);
}

// =============================================================================
// TEST 5: error guards narrow
// =============================================================================

function _test5(error: unknown) {
  if (isInvalidInstantError(error)) {
    expectType<InstantRole>(error.role);
    expectType<"INVALID_INSTANT">(error.type);
  }
}

function _test6(error: TimePhraseError) {
  expectType<"EMPTY_UNIT_LIST" | "INVALID_INSTANT">(error.type);
  if (error.type === "INVALID_INSTANT") {
    expectType<InstantRole>(error.role);
  }
}
