import type { DcsSession } from "./dcsSession.js";
import { InvalidRange } from "./errors.js";
import { fetchReadings, type FetchReadingsOptions } from "./readings.js";
import { formatUtc, MS_PER_DAY, toUtcInstant } from "./time.js";
import type { Reading, ReadingsHeader, ReadingsQuery, ReadingsResult } from "./types.js";
import { splitByPeriod } from "./windows.js";

export const DEFAULT_MAX_WINDOW_MS = 365 * MS_PER_DAY;

function headerOf(result: ReadingsHeader): ReadingsHeader {
  return {
    id: result.id,
    name: result.name,
    startTime: result.startTime,
    endTime: result.endTime,
    periodType: result.periodType,
    unit: result.unit,
  };
}

async function* chainWindows(
  session: DcsSession,
  first: AsyncIterable<Reading>,
  rest: ReadingsQuery[],
  options: FetchReadingsOptions,
): AsyncGenerator<Reading> {
  yield* first;
  for (const query of rest) {
    const next = await fetchReadings(session, query, options);
    yield* next.readings;
  }
}

/**
 * Serves a range of any length by splitting it into period-aligned windows
 * of at most `maxWindowMs` and fetching them one after another, in time
 * order, over the same session. The result reads as a single query.
 *
 * Eager results are all-or-nothing: a failing window fails the call. A
 * streamed result raises the failing window's error from its iterator.
 */
export async function fetchWindowedReadings(
  session: DcsSession,
  query: ReadingsQuery,
  maxWindowMs: number = DEFAULT_MAX_WINDOW_MS,
  options: FetchReadingsOptions = {},
): Promise<ReadingsResult> {
  if (query.start === undefined || query.end === undefined) {
    throw new InvalidRange("start and end must both be given to fetch in windows");
  }
  if (query.periodCount !== undefined) {
    throw new InvalidRange("periodCount cannot be combined with windowed fetching");
  }

  const periodType = query.periodType ?? "halfHour";
  const start = toUtcInstant(query.start);
  const end = toUtcInstant(query.end);
  const windows = splitByPeriod(start, end, maxWindowMs, periodType);
  const queries = windows.map((w): ReadingsQuery => ({ ...query, start: w.start, end: w.end, periodType }));

  const [firstQuery, ...rest] = queries;
  if (!firstQuery) throw new InvalidRange(`No windows for ${formatUtc(start)} to ${formatUtc(end)}`);
  if (session.debug) {
    session.logger.log(
      `[dcs] ${formatUtc(start)} to ${formatUtc(end)} requested with a ${maxWindowMs}ms limit; ${queries.length} request(s)`,
    );
  }
  if (rest.length === 0) return fetchReadings(session, firstQuery, options);

  const first = await fetchReadings(session, firstQuery, options);

  if (first.mode === "streaming") {
    return {
      ...headerOf(first),
      endTime: end,
      mode: "streaming",
      readings: chainWindows(session, first.readings, rest, options),
    };
  }

  const readings: Reading[] = [...first.readings];
  let endTime = first.endTime;
  for (const q of rest) {
    const next = await fetchReadings(session, { ...q, stream: false }, options);
    for await (const r of next.readings) readings.push(r);
    endTime = next.endTime;
  }
  return { ...headerOf(first), endTime, mode: "eager", readings };
}
