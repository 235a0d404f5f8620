import { InvalidRange } from "./errors.js";
import { addUtcMonths, formatUtc, MS_PER_DAY, MS_PER_HOUR, MS_PER_MINUTE } from "./time.js";
import type { PeriodType, Window } from "./types.js";

const FIXED_PERIOD_MS: Record<Exclude<PeriodType, "month">, number> = {
  halfHour: 30 * MS_PER_MINUTE,
  hour: MS_PER_HOUR,
  day: MS_PER_DAY,
  week: 7 * MS_PER_DAY,
};

// A month is sized at its longest when comparing against a window limit.
const MONTH_MS = 31 * MS_PER_DAY;

export function periodMs(periodType: PeriodType): number {
  return periodType === "month" ? MONTH_MS : FIXED_PERIOD_MS[periodType];
}

/**
 * Shares `total` steps over the fewest blocks of at most `max` steps,
 * remainders going to the first blocks: 32 over max 11 gives 11, 11, 10.
 */
export function balancedBlocks(total: number, max: number): number[] {
  const count = Math.ceil(total / max);
  const base = Math.floor(total / count);
  const remainder = total % count;
  const blocks: number[] = [];
  for (let i = 0; i < count; i++) blocks.push(i < remainder ? base + 1 : base);
  return blocks;
}

function checkRange(start: Date, end: Date, maxWindowMs: number): void {
  const s = start.getTime();
  const e = end.getTime();
  if (!Number.isFinite(s) || !Number.isFinite(e)) throw new InvalidRange("Range bounds must be valid dates");
  if (e <= s) {
    throw new InvalidRange(`Range end ${formatUtc(end)} must be after start ${formatUtc(start)}`);
  }
  if (!Number.isFinite(maxWindowMs) || maxWindowMs <= 0) {
    throw new InvalidRange(`Max window must be a positive duration, got ${maxWindowMs}ms`);
  }
}

/**
 * Splits `[start, end)` into contiguous ascending windows no longer than
 * `maxWindowMs`, each a whole number of `stepMs`.
 */
export function splitRange(start: Date, end: Date, maxWindowMs: number, stepMs = 1): Window[] {
  checkRange(start, end, maxWindowMs);
  if (!Number.isFinite(stepMs) || stepMs <= 0) throw new InvalidRange(`Step must be positive, got ${stepMs}ms`);
  if (maxWindowMs < stepMs) {
    throw new InvalidRange(`Max window of ${maxWindowMs}ms is smaller than one ${stepMs}ms step`);
  }

  const span = end.getTime() - start.getTime();
  if (span % stepMs !== 0) {
    throw new InvalidRange(`Range ${formatUtc(start)} to ${formatUtc(end)} is not a whole number of ${stepMs}ms steps`);
  }
  if (span <= maxWindowMs) return [{ start: new Date(start.getTime()), end: new Date(end.getTime()) }];

  const blocks = balancedBlocks(span / stepMs, Math.floor(maxWindowMs / stepMs));
  const windows: Window[] = [];
  let cursor = start.getTime();
  for (const steps of blocks) {
    const next = cursor + steps * stepMs;
    windows.push({ start: new Date(cursor), end: new Date(next) });
    cursor = next;
  }
  return windows;
}

export function isPeriodAligned(d: Date, periodType: PeriodType): boolean {
  const t = d.getTime();
  switch (periodType) {
    case "halfHour":
    case "hour":
    case "day":
      return t % FIXED_PERIOD_MS[periodType] === 0;
    case "week":
      return t % MS_PER_DAY === 0 && d.getUTCDay() === 1;
    case "month":
      return t % MS_PER_DAY === 0 && d.getUTCDate() === 1;
  }
}

/** The latest period boundary at or before `d`. */
export function floorToPeriod(d: Date, periodType: PeriodType): Date {
  const t = d.getTime();
  switch (periodType) {
    case "halfHour":
    case "hour":
    case "day": {
      const step = FIXED_PERIOD_MS[periodType];
      return new Date(t - (((t % step) + step) % step));
    }
    case "week": {
      const day = floorToPeriod(d, "day");
      // getUTCDay: Sunday 0, Monday 1.
      const sinceMonday = (day.getUTCDay() + 6) % 7;
      return new Date(day.getTime() - sinceMonday * MS_PER_DAY);
    }
    case "month":
      return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), 1));
  }
}

function monthsBetween(start: Date, end: Date): number {
  return (end.getUTCFullYear() - start.getUTCFullYear()) * 12 + (end.getUTCMonth() - start.getUTCMonth());
}

/**
 * Like {@link splitRange}, but windows fall on reading-period boundaries.
 * Weeks start on Monday 00:00 UTC; months follow the calendar.
 *
 * Ranges are half-open: a run of whole weeks ends on the following Monday
 * 00:00, not on the Sunday, and a run of whole months ends on the 1st of
 * the next month, not on the last day. Use {@link floorToPeriod} to align
 * arbitrary instants.
 */
export function splitByPeriod(start: Date, end: Date, maxWindowMs: number, periodType: PeriodType): Window[] {
  checkRange(start, end, maxWindowMs);
  if (maxWindowMs < periodMs(periodType)) {
    throw new InvalidRange(`Max window of ${maxWindowMs}ms is smaller than one ${periodType} period`);
  }
  if (!isPeriodAligned(start, periodType) || !isPeriodAligned(end, periodType)) {
    throw new InvalidRange(
      `Range ${formatUtc(start)} to ${formatUtc(end)} must be aligned with the ${periodType} period`,
    );
  }

  if (periodType !== "month") return splitRange(start, end, maxWindowMs, FIXED_PERIOD_MS[periodType]);

  if (end.getTime() - start.getTime() <= maxWindowMs) {
    return [{ start: new Date(start.getTime()), end: new Date(end.getTime()) }];
  }
  const blocks = balancedBlocks(monthsBetween(start, end), Math.floor(maxWindowMs / MONTH_MS));
  const windows: Window[] = [];
  let cursor = new Date(start.getTime());
  for (const months of blocks) {
    const next = addUtcMonths(cursor, months);
    windows.push({ start: cursor, end: next });
    cursor = next;
  }
  return windows;
}
