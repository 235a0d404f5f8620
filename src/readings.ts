import { formatChannelId, parseChannelId } from "./channels.js";
import type { DcsSession, Send } from "./dcsSession.js";
import { InvalidChannel, InvalidRange, RequestFailed } from "./errors.js";
import { loadStreamingParser, type ParserLoader } from "./jsonStream.js";
import { decodeReadingsBody, decodeReadingsStream, type DecodeOptions } from "./readingDecoder.js";
import { readJsonBody, type DcsRequest, type QueryValue } from "./requestExecutor.js";
import { formatUtc, toUtcInstant } from "./time.js";
import { PERIOD_TYPES, type PeriodType, type ReadingsQuery, type ReadingsResult } from "./types.js";

export type FetchReadingsOptions = {
  /** Overrides how the incremental JSON parser is found; resolve to undefined to force eager decoding. */
  loadParser?: ParserLoader;
};

export type PreparedQuery = {
  channel: string;
  periodType: PeriodType;
  params: Record<string, QueryValue>;
};

export function prepareReadingsQuery(query: ReadingsQuery): PreparedQuery {
  const channel = formatChannelId(parseChannelId(query.channel));

  const given = [query.start, query.end, query.periodCount].filter((v) => v !== undefined).length;
  if (given !== 2) {
    throw new InvalidRange("Exactly two of start, end and periodCount must be given");
  }
  if (query.periodCount !== undefined && (!Number.isSafeInteger(query.periodCount) || query.periodCount <= 0)) {
    throw new InvalidRange(`periodCount must be a positive integer, got ${query.periodCount}`);
  }

  const periodType = query.periodType ?? "halfHour";
  if (!PERIOD_TYPES.includes(periodType)) throw new InvalidRange(`Unknown period type "${String(periodType)}"`);

  const start = query.start !== undefined ? toUtcInstant(query.start) : undefined;
  const end = query.end !== undefined ? toUtcInstant(query.end) : undefined;
  if (start && end && end.getTime() <= start.getTime()) {
    throw new InvalidRange(`Range end ${formatUtc(end)} must be after start ${formatUtc(start)}`);
  }

  return {
    channel,
    periodType,
    params: {
      id: channel,
      format: "standard",
      startTime: start && formatUtc(start),
      endTime: end && formatUtc(end),
      periodCount: query.periodCount,
      calibrated: query.calibrated ?? true,
      interpolated: query.interpolated ?? true,
      periodType,
    },
  };
}

async function sendReadings(send: Send, request: DcsRequest, channel: string): Promise<Response> {
  try {
    return await send(request);
  } catch (e) {
    if (e instanceof RequestFailed && (e.status === 403 || e.status === 404)) {
      throw new InvalidChannel(`${channel}: ${e.message}`, e.status, e.details);
    }
    throw e;
  }
}

/**
 * Fetches one bounded readings query. With `stream: true` the readings are
 * parsed as the body arrives and the session stays locked until they have
 * been consumed, iteration stops, another request needs the session (the
 * rest is then buffered) or the session signs out (the rest is dropped).
 * Without the incremental parser the result is eager.
 */
export async function fetchReadings(
  session: DcsSession,
  query: ReadingsQuery,
  options: FetchReadingsOptions = {},
): Promise<ReadingsResult> {
  const prepared = prepareReadingsQuery(query);
  const request: DcsRequest = {
    method: "GET",
    path: session.isAuthenticated ? "/readings" : "/public/readings",
    query: prepared.params,
    op: "readings",
  };
  const decode: DecodeOptions = {
    periodType: prepared.periodType,
    timeoutMs: session.timeoutMs,
    logger: session.logger,
    debug: session.debug,
  };

  const Parser = query.stream ? await (options.loadParser ?? loadStreamingParser)() : undefined;

  if (!Parser) {
    return session.withExclusiveAccess(async (send) => {
      const resp = await sendReadings(send, request, prepared.channel);
      return decodeReadingsBody(await readJsonBody(resp, "readings", session.timeoutMs), decode);
    });
  }

  const access = await session.acquireExclusiveAccess();
  let resp: Response;
  try {
    resp = await sendReadings(access.send, request, prepared.channel);
  } catch (e) {
    access.release();
    throw e;
  }
  const { result, handle } = await decodeReadingsStream(resp, Parser, access.release, decode);
  await access.track(handle);
  return result;
}
