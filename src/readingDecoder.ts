import { InvalidTimeValue, MalformedResponse } from "./errors.js";
import { IncrementalBody, type JsonParserClass, type StreamHandle } from "./jsonStream.js";
import type { Release } from "./mutex.js";
import type { Logger } from "./requestExecutor.js";
import { toUtcInstant } from "./time.js";
import type { EagerReadingsResult, Reading, ReadingsHeader, StreamingReadingsResult } from "./types.js";

const HEADER_FIELDS = ["id", "name", "startTime", "endTime", "periodType", "unit"] as const;

export type DecodeOptions = {
  // Used for the header when the server omits periodType.
  periodType: string;
  // Longest wait for any single chunk of a streamed body.
  timeoutMs: number;
  logger: Logger;
  debug: boolean;
};

function serverTime(v: unknown, what: string): Date {
  if (typeof v !== "string") throw new MalformedResponse(`${what} is missing or not a string`);
  try {
    return toUtcInstant(v);
  } catch (e) {
    if (e instanceof InvalidTimeValue) throw new MalformedResponse(`${what} is not a timestamp: ${e.message}`);
    throw e;
  }
}

export function decodeValue(v: unknown): number | undefined {
  if (typeof v === "number") return v;
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  if (/^[+-]?(inf|infinity)$/i.test(s)) return s.startsWith("-") ? -Infinity : Infinity;
  if (/^[+-]?nan$/i.test(s)) return NaN;
  if (s.length === 0) return undefined;
  const n = Number(s);
  return Number.isFinite(n) ? n : undefined;
}

export function decodeReading(raw: unknown, index: number): Reading {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new MalformedResponse(`readings[${index}] is not an object`);
  }
  const obj = raw as Record<string, unknown>;
  const value = decodeValue(obj.value);
  if (value === undefined) throw new MalformedResponse(`readings[${index}].value is not a number`);
  if (typeof obj.status !== "number" || !Number.isInteger(obj.status)) {
    throw new MalformedResponse(`readings[${index}].status is not an integer`);
  }
  return {
    timestamp: serverTime(obj.timestamp, `readings[${index}].timestamp`),
    value,
    status: obj.status,
  };
}

export function decodeHeader(fields: Record<string, unknown>, fallbackPeriodType: string): ReadingsHeader {
  const id = fields.id;
  return {
    id: typeof id === "string" || typeof id === "number" ? String(id) : undefined,
    name: typeof fields.name === "string" ? fields.name : undefined,
    startTime: serverTime(fields.startTime, "startTime"),
    endTime: serverTime(fields.endTime, "endTime"),
    periodType: typeof fields.periodType === "string" ? fields.periodType : fallbackPeriodType,
    unit: typeof fields.unit === "string" ? fields.unit : undefined,
  };
}

export function decodeReadingsBody(data: unknown, opts: DecodeOptions): EagerReadingsResult {
  if (!data || typeof data !== "object" || Array.isArray(data)) {
    throw new MalformedResponse("readings response is not an object");
  }
  const obj = data as Record<string, unknown>;
  if (!Array.isArray(obj.readings)) throw new MalformedResponse("readings response has no readings list");

  const header = decodeHeader(obj, opts.periodType);
  const readings = obj.readings.map((raw, i) => decodeReading(raw, i));
  if (opts.debug) opts.logger.log(`[dcs] all ${readings.length} readings retrieved`);
  return { ...header, mode: "eager", readings };
}

export type StreamedReadings = {
  result: StreamingReadingsResult;
  // Registered with the session so it can take its lock back.
  handle: StreamHandle;
};

/**
 * Decodes the header from the front of the body, then hands back a lazy
 * sequence of readings parsed as the rest of the body arrives. `release`
 * is called exactly once; see {@link IncrementalBody}.
 */
export async function decodeReadingsStream(
  resp: Response,
  Parser: JsonParserClass,
  release: Release,
  opts: DecodeOptions,
): Promise<StreamedReadings> {
  if (!resp.body) {
    release();
    throw new MalformedResponse("readings response has no body");
  }

  const header: Record<string, unknown> = {};
  let count = 0;
  const parser = new Parser({
    paths: [...HEADER_FIELDS.map((f) => `$.${f}`), "$.readings.*"],
    keepStack: false,
  });
  const body = new IncrementalBody<Reading>(resp.body.getReader(), parser, release, {
    op: "readings",
    timeoutMs: opts.timeoutMs,
    logger: opts.logger,
  });
  parser.onValue = ({ value, key }) => {
    if (typeof key === "number") body.push(decodeReading(value, count++));
    else if (typeof key === "string") header[key] = value;
  };

  let decoded: ReadingsHeader;
  try {
    // Header fields precede the readings list; anything after it is not seen here.
    await body.fill(() => count > 0);
    decoded = decodeHeader(header, opts.periodType);
  } catch (e) {
    await body.abort();
    throw e;
  }

  async function* readings(): AsyncGenerator<Reading> {
    yield* body.items();
    if (opts.debug) opts.logger.log(`[dcs] all ${count} readings retrieved`);
  }

  return { result: { ...decoded, mode: "streaming", readings: readings() }, handle: body };
}
