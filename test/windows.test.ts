import { describe, it, expect } from "vitest";
import { InvalidRange } from "../src/errors.js";
import { MS_PER_DAY, MS_PER_HOUR, MS_PER_MINUTE } from "../src/time.js";
import type { Window } from "../src/types.js";
import { balancedBlocks, floorToPeriod, isPeriodAligned, splitByPeriod, splitRange } from "../src/windows.js";

const utc = (iso: string) => new Date(`${iso}Z`);
const iso = (ws: Window[]) => ws.map((w) => [w.start.toISOString(), w.end.toISOString()]);

describe("balancedBlocks", () => {
  it("gives remainders to the first blocks", () => {
    expect(balancedBlocks(32, 11)).toEqual([11, 11, 10]);
    expect(balancedBlocks(4, 3)).toEqual([2, 2]);
    expect(balancedBlocks(3, 3)).toEqual([3]);
  });
});

describe("splitRange", () => {
  it("returns one window when the range fits", () => {
    const ws = splitRange(utc("2021-09-20T18:00:00"), utc("2021-09-20T19:00:00"), MS_PER_HOUR);
    expect(iso(ws)).toEqual([["2021-09-20T18:00:00.000Z", "2021-09-20T19:00:00.000Z"]]);
  });

  it("tiles the range contiguously within the limit", () => {
    const cases: [number, number, number][] = [
      [7, 3, 1],
      [100, 7, 5],
      [48, 10, 2],
      [365, 30, 1],
    ];
    for (const [steps, maxSteps, stepHours] of cases) {
      const step = stepHours * MS_PER_HOUR;
      const start = utc("2020-01-01T00:00:00");
      const end = new Date(start.getTime() + steps * step);
      const ws = splitRange(start, end, maxSteps * step, step);

      expect(ws[0].start.getTime()).toBe(start.getTime());
      expect(ws[ws.length - 1].end.getTime()).toBe(end.getTime());
      expect(ws.length).toBe(Math.ceil(steps / maxSteps));
      for (let i = 0; i < ws.length; i++) {
        const w = ws[i];
        const len = w.end.getTime() - w.start.getTime();
        expect(len).toBeGreaterThan(0);
        expect(len).toBeLessThanOrEqual(maxSteps * step);
        expect(len % step).toBe(0);
        if (i > 0) expect(w.start.getTime()).toBe(ws[i - 1].end.getTime());
      }
    }
  });

  it("rejects empty, reversed and unevenly divided ranges", () => {
    const start = utc("2021-01-01T00:00:00");
    expect(() => splitRange(start, start, MS_PER_HOUR)).toThrow(InvalidRange);
    expect(() => splitRange(utc("2021-01-02T00:00:00"), start, MS_PER_HOUR)).toThrow(InvalidRange);
    expect(() => splitRange(start, utc("2021-01-01T00:45:00"), MS_PER_HOUR, 30 * MS_PER_MINUTE)).toThrow(
      InvalidRange,
    );
    expect(() => splitRange(start, utc("2021-01-01T02:00:00"), 0)).toThrow(InvalidRange);
    expect(() => splitRange(start, utc("2021-01-01T02:00:00"), 10 * MS_PER_MINUTE, MS_PER_HOUR)).toThrow(
      InvalidRange,
    );
  });
});

describe("splitByPeriod", () => {
  it("splits two hours of half-hour data under a 90 minute limit into two one-hour windows", () => {
    const ws = splitByPeriod(utc("2021-09-20T18:00:00"), utc("2021-09-20T20:00:00"), 90 * MS_PER_MINUTE, "halfHour");
    expect(iso(ws)).toEqual([
      ["2021-09-20T18:00:00.000Z", "2021-09-20T19:00:00.000Z"],
      ["2021-09-20T19:00:00.000Z", "2021-09-20T20:00:00.000Z"],
    ]);
  });

  it("aligns weeks on Mondays", () => {
    const ws = splitByPeriod(utc("2021-01-04T00:00:00"), utc("2021-02-01T00:00:00"), 14 * MS_PER_DAY, "week");
    expect(iso(ws)).toEqual([
      ["2021-01-04T00:00:00.000Z", "2021-01-18T00:00:00.000Z"],
      ["2021-01-18T00:00:00.000Z", "2021-02-01T00:00:00.000Z"],
    ]);
    expect(() =>
      splitByPeriod(utc("2021-01-05T00:00:00"), utc("2021-02-02T00:00:00"), 14 * MS_PER_DAY, "week"),
    ).toThrow(InvalidRange);
  });

  it("follows calendar months", () => {
    const ws = splitByPeriod(utc("2021-01-01T00:00:00"), utc("2022-01-01T00:00:00"), 100 * MS_PER_DAY, "month");
    expect(iso(ws)).toEqual([
      ["2021-01-01T00:00:00.000Z", "2021-04-01T00:00:00.000Z"],
      ["2021-04-01T00:00:00.000Z", "2021-07-01T00:00:00.000Z"],
      ["2021-07-01T00:00:00.000Z", "2021-10-01T00:00:00.000Z"],
      ["2021-10-01T00:00:00.000Z", "2022-01-01T00:00:00.000Z"],
    ]);
  });

  it("rejects a limit shorter than one period", () => {
    expect(() =>
      splitByPeriod(utc("2021-01-01T00:00:00"), utc("2021-01-03T00:00:00"), 12 * MS_PER_HOUR, "day"),
    ).toThrow(InvalidRange);
  });

  it("rejects unaligned bounds", () => {
    expect(() =>
      splitByPeriod(utc("2021-01-01T00:10:00"), utc("2021-01-01T02:10:00"), MS_PER_HOUR, "halfHour"),
    ).toThrow(InvalidRange);
  });
});

describe("isPeriodAligned", () => {
  it("checks each period's boundary", () => {
    expect(isPeriodAligned(utc("2021-01-01T10:30:00"), "halfHour")).toBe(true);
    expect(isPeriodAligned(utc("2021-01-01T10:30:00"), "hour")).toBe(false);
    expect(isPeriodAligned(utc("2021-01-04T00:00:00"), "week")).toBe(true);
    expect(isPeriodAligned(utc("2021-03-01T00:00:00"), "month")).toBe(true);
    expect(isPeriodAligned(utc("2021-03-02T00:00:00"), "month")).toBe(false);
  });
});

describe("floorToPeriod", () => {
  const floor = (s: string, p: Parameters<typeof floorToPeriod>[1]) => floorToPeriod(utc(s), p).toISOString();

  it("moves back to the start of the period", () => {
    expect(floor("2021-09-22T18:47:12", "halfHour")).toBe("2021-09-22T18:30:00.000Z");
    expect(floor("2021-09-22T18:47:12", "hour")).toBe("2021-09-22T18:00:00.000Z");
    expect(floor("2021-09-22T18:47:12", "day")).toBe("2021-09-22T00:00:00.000Z");
    // 2021-09-22 is a Wednesday; 2021-09-26 a Sunday.
    expect(floor("2021-09-22T18:47:12", "week")).toBe("2021-09-20T00:00:00.000Z");
    expect(floor("2021-09-26T23:59:59", "week")).toBe("2021-09-20T00:00:00.000Z");
    expect(floor("2021-09-22T18:47:12", "month")).toBe("2021-09-01T00:00:00.000Z");
  });

  it("leaves boundaries where they are", () => {
    expect(floor("2021-09-20T00:00:00", "week")).toBe("2021-09-20T00:00:00.000Z");
    expect(floor("2021-03-01T00:00:00", "month")).toBe("2021-03-01T00:00:00.000Z");
  });

  it("gives bounds splitByPeriod accepts", () => {
    const start = floorToPeriod(utc("2021-01-13T09:00:00"), "week");
    const end = floorToPeriod(utc("2021-02-03T09:00:00"), "week");
    expect(iso(splitByPeriod(start, end, 21 * MS_PER_DAY, "week"))).toEqual([
      ["2021-01-11T00:00:00.000Z", "2021-02-01T00:00:00.000Z"],
    ]);
  });
});
