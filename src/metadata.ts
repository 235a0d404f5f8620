import type { DcsSession } from "./dcsSession.js";
import { MalformedResponse } from "./errors.js";
import { IncrementalBody, loadStreamingParser, type ParserLoader } from "./jsonStream.js";
import { readJsonBody } from "./requestExecutor.js";

// Passed through as the server sends them.
export type MeterInfo = Record<string, unknown>;
export type VirtualMeterInfo = Record<string, unknown>;

export type StreamListOptions = {
  loadParser?: ParserLoader;
};

async function getJson(session: DcsSession, path: string, op: string): Promise<unknown> {
  return session.withExclusiveAccess(async (send) => {
    const resp = await send({ method: "GET", path, op });
    return readJsonBody(resp, op, session.timeoutMs);
  });
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function listOf(data: unknown, op: string): Record<string, unknown>[] {
  if (!Array.isArray(data)) throw new MalformedResponse(`${op}: expected a list`);
  return data.map((item, i) => {
    if (!isRecord(item)) throw new MalformedResponse(`${op}: item ${i} is not an object`);
    return item;
  });
}

async function* fromList<T>(items: T[]): AsyncGenerator<T> {
  yield* items;
}

// Items are parsed as the list arrives; the session is held like a streamed readings result.
async function streamList(
  session: DcsSession,
  path: string,
  op: string,
  options: StreamListOptions,
): Promise<AsyncIterable<Record<string, unknown>>> {
  const Parser = await (options.loadParser ?? loadStreamingParser)();
  if (!Parser) return fromList(listOf(await getJson(session, path, op), op));

  const access = await session.acquireExclusiveAccess();
  let resp: Response;
  try {
    resp = await access.send({ method: "GET", path, op });
  } catch (e) {
    access.release();
    throw e;
  }
  if (!resp.body) {
    access.release();
    throw new MalformedResponse(`${op}: response has no body`);
  }

  const parser = new Parser({ paths: ["$.*"], keepStack: false });
  const body = new IncrementalBody<Record<string, unknown>>(resp.body.getReader(), parser, access.release, {
    op,
    timeoutMs: session.timeoutMs,
    logger: session.logger,
  });
  let index = 0;
  parser.onValue = ({ value, key }) => {
    if (typeof key !== "number") throw new MalformedResponse(`${op}: expected a list`);
    if (!isRecord(value)) throw new MalformedResponse(`${op}: item ${index} is not an object`);
    index++;
    body.push(value);
  };

  await access.track(body);
  return body.items();
}

export async function getStatus(session: DcsSession): Promise<Record<string, unknown>> {
  const data = await getJson(session, "/status", "status");
  if (!isRecord(data)) throw new MalformedResponse("status: expected an object");
  return data;
}

function metersPath(session: DcsSession): string {
  return session.isAuthenticated ? "/meters" : "/public/meters";
}

function virtualMetersPath(session: DcsSession): string {
  return session.isAuthenticated ? "/virtualMeters" : "/public/virtualMeters";
}

/** Meters visible to the session, with their registers. Unauthenticated sessions see the public list. */
export async function listMeters(session: DcsSession): Promise<MeterInfo[]> {
  return listOf(await getJson(session, metersPath(session), "meters"), "meters");
}

export async function listVirtualMeters(session: DcsSession): Promise<VirtualMeterInfo[]> {
  return listOf(await getJson(session, virtualMetersPath(session), "virtualMeters"), "virtualMeters");
}

/** Like {@link listMeters}, one meter at a time as the list downloads. */
export function streamMeters(session: DcsSession, options: StreamListOptions = {}): Promise<AsyncIterable<MeterInfo>> {
  return streamList(session, metersPath(session), "meters", options);
}

export function streamVirtualMeters(
  session: DcsSession,
  options: StreamListOptions = {},
): Promise<AsyncIterable<VirtualMeterInfo>> {
  return streamList(session, virtualMetersPath(session), "virtualMeters", options);
}
