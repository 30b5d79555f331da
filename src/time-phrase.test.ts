import { describe, it, expect, vi } from "vitest";
import { EmptyUnitListError, InvalidInstantError, isInvalidInstantError } from "./errors";
import { createTimePhrase, type TimePhrase } from "./time-phrase";
import { createDefaultUnits, findUnit, type TimeUnit } from "./time-unit";

const REFERENCE = new Date("2024-01-01T00:00:00.000Z");
const DAY = 86_400_000;

function at(offsetMillis: number): Date {
  return new Date(REFERENCE.getTime() + offsetMillis);
}

function pick(...names: string[]): TimeUnit[] {
  return createDefaultUnits().filter((unit) => names.includes(unit.name));
}

describe("createTimePhrase", () => {
  describe("approximateDuration", () => {
    it("measures from the reference", () => {
      const phrase = createTimePhrase({ reference: REFERENCE });
      const d = phrase.approximateDuration(at(-3 * DAY));
      expect(d.unit.name).toBe("day");
      expect(d.quantity).toBe(-3);
      expect(d.delta).toBe(0);
    });

    it("reads the clock when no reference is set", () => {
      const now = vi.fn(() => REFERENCE.getTime());
      const phrase = createTimePhrase({ now });

      const d = phrase.approximateDuration(at(-90_000));

      expect(d.unit.name).toBe("minute");
      expect(d.quantity).toBe(-1);
      expect(d.delta).toBe(-30_000);
      expect(now).toHaveBeenCalledTimes(1);
      expect(phrase.getReference()).toBeNull();
    });

    it("rejects an invalid target date", () => {
      const phrase = createTimePhrase({ reference: REFERENCE });
      expect(() => phrase.approximateDuration(new Date(Number.NaN))).toThrow(InvalidInstantError);
    });

    it("rejects an invalid reference", () => {
      const phrase = createTimePhrase({ reference: new Date("not a date") });
      let caught: unknown;
      try {
        phrase.approximateDuration(REFERENCE);
      } catch (error) {
        caught = error;
      }
      expect(isInvalidInstantError(caught)).toBe(true);
      if (isInvalidInstantError(caught)) {
        expect(caught.role).toBe("reference");
      }
    });
  });

  describe("calculatePreciseDuration", () => {
    it("decomposes against the reference", () => {
      const phrase = createTimePhrase({
        reference: REFERENCE,
        units: pick("second", "minute", "hour", "day"),
      });
      const chain = phrase.calculatePreciseDuration(at(90_061_000));
      expect(chain.map((d) => d.unit.name)).toEqual(["day", "hour", "minute", "second"]);
      expect(chain.map((d) => d.quantity)).toEqual([1, 1, 1, 1]);
    });

    it("fixes the reference to now on first use", () => {
      let clock = REFERENCE.getTime();
      const messages: string[] = [];
      const phrase = createTimePhrase({
        now: () => clock,
        logger: (message) => messages.push(message),
      });

      const first = phrase.calculatePreciseDuration(at(-2 * DAY));
      clock += 5 * DAY;
      const second = phrase.calculatePreciseDuration(at(-2 * DAY));

      expect(phrase.getReference()).toEqual(REFERENCE);
      expect(first[0].quantity).toBe(-2);
      expect(second[0].quantity).toBe(-2);
      expect(messages).toEqual(["Reference fixed to 2024-01-01T00:00:00.000Z"]);
    });

    it("returns one segment for the reference itself", () => {
      const phrase = createTimePhrase({ reference: REFERENCE });
      const chain = phrase.calculatePreciseDuration(REFERENCE);
      expect(chain).toHaveLength(1);
      expect(chain[0].unit.name).toBe("justNow");
      expect(chain[0].quantity).toBe(1);
      expect(chain[0].delta).toBe(0);
    });
  });

  describe("format", () => {
    it("renders past differences", () => {
      const phrase = createTimePhrase({ reference: REFERENCE });
      expect(phrase.format(at(-3 * DAY))).toBe("3 days ago");
    });

    it("renders future differences", () => {
      const phrase = createTimePhrase({ reference: REFERENCE });
      expect(phrase.format(at(2 * 3_600_000))).toBe("2 hours from now");
    });

    it("rounds to the nearest unit", () => {
      const phrase = createTimePhrase({ reference: REFERENCE });
      expect(phrase.format(at(-100_000))).toBe("2 minutes ago");
    });

    it("renders sub-minute differences as moments", () => {
      const phrase = createTimePhrase({ reference: REFERENCE });
      expect(phrase.format(at(-20_000))).toBe("moments ago");
    });

    it("treats a missing date as now", () => {
      const phrase = createTimePhrase({ now: () => REFERENCE.getTime() });
      expect(phrase.format(null)).toBe("moments from now");
      expect(phrase.format()).toBe("moments from now");
    });

    it("flips tense when the reference is in the future", () => {
      const phrase = createTimePhrase({ now: () => REFERENCE.getTime() });
      phrase.setReference(at(3 * DAY));
      expect(phrase.format(REFERENCE)).toBe("3 days ago");
      phrase.setReference(at(-3 * DAY));
      expect(phrase.format(REFERENCE)).toBe("3 days from now");
    });
  });

  describe("formatDurations", () => {
    const units = pick("second", "minute", "hour", "day");

    it("joins a chain and applies the last segment's tense", () => {
      const phrase = createTimePhrase({ reference: REFERENCE, units });
      expect(phrase.formatDurations(phrase.calculatePreciseDuration(at(90_061_000)))).toBe(
        "1 day 1 hour 1 minute 1 second from now"
      );
      expect(phrase.formatDurations(phrase.calculatePreciseDuration(at(-90_061_000)))).toBe(
        "1 day 1 hour 1 minute 1 second ago"
      );
    });

    it("rounds only the last segment", () => {
      const phrase = createTimePhrase({ reference: REFERENCE, units });
      const target = at(100 * 60_000);

      expect(phrase.formatDuration(phrase.approximateDuration(target))).toBe(
        "2 hours from now"
      );
      expect(phrase.formatDurations(phrase.calculatePreciseDuration(target))).toBe(
        "1 hour 40 minutes from now"
      );
    });

    it("renders an empty chain as an empty string", () => {
      expect(createTimePhrase().formatDurations([])).toBe("");
    });
  });

  describe("units", () => {
    it("returns a frozen copy", () => {
      const units = pick("minute", "hour");
      const phrase = createTimePhrase({ units });
      units.pop();

      expect(phrase.getUnits()).toHaveLength(2);
      expect(Object.isFrozen(phrase.getUnits())).toBe(true);
    });

    it("replaces the active list", () => {
      const messages: string[] = [];
      const phrase = createTimePhrase({
        reference: REFERENCE,
        logger: (message) => messages.push(message),
      });

      phrase.setUnits(pick("hour", "day"));

      expect(phrase.getUnits().map((unit) => unit.name)).toEqual(["hour", "day"]);
      expect(phrase.format(at(-20_000))).toBe("1 hour ago");
      expect(messages).toEqual(["Units replaced: 2 units"]);
    });

    it("rejects an empty list", () => {
      const phrase = createTimePhrase();
      expect(() => phrase.setUnits([])).toThrow(EmptyUnitListError);
      expect(() => createTimePhrase({ units: [] })).toThrow(EmptyUnitListError);
      expect(phrase.getUnits()).toHaveLength(12);
    });

    it("finishes a calculation on the list it started with", () => {
      let phrase: TimePhrase | undefined;
      const [second, minute, hour] = pick("second", "minute", "hour");
      const swapping: TimeUnit = {
        ...second,
        get maxQuantity() {
          phrase?.setUnits(pick("day"));
          return 0;
        },
      };
      phrase = createTimePhrase({ reference: REFERENCE, units: [swapping, minute, hour] });

      const d = phrase.approximateDuration(at(-90_000));

      expect(d.unit).toBe(minute);
      expect(d.quantity).toBe(-1);
      expect(phrase.getUnits().map((unit) => unit.name)).toEqual(["day"]);
    });
  });

  describe("locale", () => {
    it("defaults to English", () => {
      expect(createTimePhrase().getLocale()).toBe("en");
    });

    it("builds the default units for the given locale", () => {
      const phrase = createTimePhrase({ reference: REFERENCE, locale: "de" });
      expect(phrase.getLocale()).toBe("de");
      expect(phrase.format(at(-1_500))).toBe("moments ago");
    });

    it("propagates a new locale to every unit", () => {
      const messages: string[] = [];
      const phrase = createTimePhrase({
        reference: REFERENCE,
        units: pick("second", "day"),
        logger: (message) => messages.push(message),
      });
      const target = at(-1_234 * DAY);

      expect(phrase.format(target)).toBe("1,234 days ago");

      phrase.setLocale("de");

      expect(phrase.getLocale()).toBe("de");
      expect(phrase.format(target)).toBe("1.234 days ago");
      expect(messages).toEqual(["Locale changed to de"]);
    });

    it("rejects a malformed locale without changing anything", () => {
      const messages: string[] = [];
      const phrase = createTimePhrase({
        reference: REFERENCE,
        units: pick("second", "day"),
        logger: (message) => messages.push(message),
      });
      const target = at(-1_234 * DAY);

      expect(() => phrase.setLocale("not_a_locale!!")).toThrow(RangeError);

      expect(phrase.getLocale()).toBe("en");
      expect(phrase.format(target)).toBe("1,234 days ago");
      expect(messages).toEqual([]);
    });

    it("keeps the unit order", () => {
      const phrase = createTimePhrase();
      const before = phrase.getUnits();
      phrase.setLocale("fr");
      expect(phrase.getUnits()).toBe(before);
      expect(findUnit(phrase.getUnits(), "day")).toBe(before[5]);
    });
  });

  describe("toString", () => {
    it("shows reference and locale", () => {
      expect(createTimePhrase({ reference: REFERENCE }).toString()).toBe(
        "TimePhrase [reference=2024-01-01T00:00:00.000Z, locale=en]"
      );
    });

    it("shows a missing reference as null", () => {
      expect(String(createTimePhrase({ locale: "de" }))).toBe(
        "TimePhrase [reference=null, locale=de]"
      );
    });
  });
});
