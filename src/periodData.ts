import { addUtcMonths, MS_PER_DAY } from "./time.js";
import type { PeriodType, Reading } from "./types.js";
import { periodMs } from "./windows.js";

export type PeriodReading = Reading & {
  // Consumption from this reading to the next; null for the last one.
  periodValue: number | null;
};

const LONGEST_MONTH_MS = 31 * MS_PER_DAY;

function simple(before: Reading, after: Reading): PeriodReading {
  return { ...before, periodValue: after.value - before.value };
}

/**
 * Fills the gap between two cumulative readings with linearly estimated
 * ones at the expected period starts. The first anchor is included, the
 * second is not; estimated readings carry status 1.
 */
export function* interpolate(start: Reading, end: Reading, periodType: PeriodType): Generator<PeriodReading> {
  const t0 = start.timestamp.getTime();
  const tDelta = end.timestamp.getTime() - t0;
  const vDelta = end.value - start.value;

  if (periodType !== "month") {
    const step = periodMs(periodType);
    const count = Math.floor(tDelta / step);
    const periodValue = (step * vDelta) / tDelta;
    yield { ...start, periodValue };
    for (let n = 1; n < count; n++) {
      const since = n * step;
      yield {
        timestamp: new Date(t0 + since),
        value: start.value + (vDelta * since) / tDelta,
        status: 1,
        periodValue,
      };
    }
    return;
  }

  // Months differ in length, so each gets its share by duration.
  let at = start.timestamp;
  let value = start.value;
  let periodValue = 0;
  let first = true;
  while (at.getTime() < end.timestamp.getTime()) {
    const next = addUtcMonths(at, 1);
    value += periodValue;
    periodValue = (vDelta * (next.getTime() - at.getTime())) / tDelta;
    yield first ? { ...start, periodValue } : { timestamp: at, value, status: 1, periodValue };
    first = false;
    at = next;
  }
}

function* between(before: Reading, after: Reading, periodType: PeriodType): Generator<PeriodReading> {
  const gap = after.timestamp.getTime() - before.timestamp.getTime();
  if (periodType === "month") {
    if (gap <= LONGEST_MONTH_MS) yield simple(before, after);
    else yield* interpolate(before, after, periodType);
    return;
  }
  const step = periodMs(periodType);
  if (gap <= step) yield simple(before, after);
  else yield* interpolate(before, after, periodType);
}

/**
 * Turns cumulative (register total) readings into per-period consumption.
 * Timestamps mark the start of each period. Gaps in the data are filled by
 * {@link interpolate}.
 */
export async function* periodValues(
  readings: Iterable<Reading> | AsyncIterable<Reading>,
  periodType: PeriodType,
): AsyncGenerator<PeriodReading> {
  let before: Reading | undefined;
  for await (const after of readings) {
    if (before) yield* between(before, after, periodType);
    before = after;
  }
  if (before) yield { ...before, periodValue: null };
}
