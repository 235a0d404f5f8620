import { describe, it, expect } from "vitest";
import { InvalidTimeValue } from "../src/errors.js";
import { addUtcMonths, formatUtc, toUtcInstant } from "../src/time.js";

describe("toUtcInstant", () => {
  it("reads naive date-times as UTC", () => {
    expect(toUtcInstant("2021-09-20T18:00").toISOString()).toBe("2021-09-20T18:00:00.000Z");
    expect(toUtcInstant("2021-09-20 18:00:30").toISOString()).toBe("2021-09-20T18:00:30.000Z");
  });

  it("reads a bare date as midnight UTC", () => {
    expect(toUtcInstant("2021-09-20").toISOString()).toBe("2021-09-20T00:00:00.000Z");
  });

  it("applies explicit offsets", () => {
    expect(toUtcInstant("2021-09-20T18:00:00+01:00").toISOString()).toBe("2021-09-20T17:00:00.000Z");
    expect(toUtcInstant("2021-09-20T18:00:00-0230").toISOString()).toBe("2021-09-20T20:30:00.000Z");
    expect(toUtcInstant("2021-09-20T18:00:00Z").toISOString()).toBe("2021-09-20T18:00:00.000Z");
  });

  it("keeps fractional seconds to the millisecond", () => {
    expect(toUtcInstant("2021-09-20T18:00:00.1234Z").toISOString()).toBe("2021-09-20T18:00:00.123Z");
  });

  it("copies dates and accepts epoch milliseconds", () => {
    const d = new Date(Date.UTC(2020, 0, 1));
    const copy = toUtcInstant(d);
    expect(copy).not.toBe(d);
    expect(copy.getTime()).toBe(d.getTime());
    expect(toUtcInstant(0).toISOString()).toBe("1970-01-01T00:00:00.000Z");
  });

  it("rejects unparseable and out-of-range values", () => {
    expect(() => toUtcInstant("yesterday")).toThrow(InvalidTimeValue);
    expect(() => toUtcInstant("2021-02-30")).toThrow(InvalidTimeValue);
    expect(() => toUtcInstant("2021-09-20T24:00")).toThrow(InvalidTimeValue);
    expect(() => toUtcInstant(new Date(Number.NaN))).toThrow(InvalidTimeValue);
    expect(() => toUtcInstant(Number.POSITIVE_INFINITY)).toThrow(InvalidTimeValue);
  });
});

describe("formatUtc", () => {
  it("drops zero milliseconds", () => {
    expect(formatUtc(new Date(Date.UTC(2021, 8, 20, 18)))).toBe("2021-09-20T18:00:00Z");
    expect(formatUtc(new Date(Date.UTC(2021, 8, 20, 18, 0, 0, 5)))).toBe("2021-09-20T18:00:00.005Z");
  });
});

describe("addUtcMonths", () => {
  it("steps calendar months", () => {
    expect(addUtcMonths(new Date(Date.UTC(2021, 0, 1)), 1).toISOString()).toBe("2021-02-01T00:00:00.000Z");
    expect(addUtcMonths(new Date(Date.UTC(2021, 11, 1)), 2).toISOString()).toBe("2022-02-01T00:00:00.000Z");
  });
});
