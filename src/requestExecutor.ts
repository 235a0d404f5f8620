import type { ReadableStreamDefaultReader } from "node:stream/web";
import {
  DEFAULT_MAX_RATE_LIMIT_RETRIES,
  DEFAULT_MAX_RATE_LIMIT_WAIT_MS,
  DEFAULT_TIMEOUT_MS,
  type RateLimitPolicy,
} from "./config.js";
import { errMessage, MalformedResponse, RequestFailed, TransportError } from "./errors.js";

export type Logger = Pick<Console, "log" | "warn" | "error">;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type Sleep = (ms: number) => Promise<void>;

export type QueryValue = string | number | boolean | undefined;

export type DcsRequest = {
  method: "GET" | "POST";
  path: string;
  query?: Record<string, QueryValue>;
  json?: unknown;
  // Short label for log lines, e.g. "readings".
  op: string;
};

export type RequestExecutorOptions = {
  baseUrl: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  rateLimit?: Partial<RateLimitPolicy>;
  sleep?: Sleep;
  logger?: Logger;
  debug?: boolean;
  now?: () => number;
};

const SLOW_REQUEST_MS = 2000;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function isDebugEnabled(): boolean {
  return process.env.DCS_DEBUG === "1";
}

/** Holds the session cookies between requests. */
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  get size(): number {
    return this.cookies.size;
  }

  header(): string | undefined {
    if (this.cookies.size === 0) return undefined;
    return [...this.cookies].map(([name, value]) => `${name}=${value}`).join("; ");
  }

  store(headers: Headers, now: number = Date.now()): void {
    const setCookies = headers.getSetCookie?.() ?? [];
    for (const raw of setCookies) {
      const [pair = "", ...attrs] = raw.split(";");
      const eq = pair.indexOf("=");
      if (eq <= 0) continue;
      const name = pair.slice(0, eq).trim();
      const value = pair.slice(eq + 1).trim();

      let expired = value.length === 0;
      for (const attr of attrs) {
        const [k = "", v = ""] = attr.split("=", 2).map((s) => s.trim());
        const key = k.toLowerCase();
        if (key === "max-age" && Number(v) <= 0) expired = true;
        if (key === "expires") {
          const at = Date.parse(v);
          if (Number.isFinite(at) && at <= now) expired = true;
        }
      }

      if (expired) this.cookies.delete(name);
      else this.cookies.set(name, value);
    }
  }

  clear(): void {
    this.cookies.clear();
  }
}

function serverMessage(text: string, fallback: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) return fallback;
  let data: unknown;
  try {
    data = JSON.parse(trimmed);
  } catch {
    return trimmed;
  }
  if (typeof data === "string" && data.length > 0) return data;
  if (data && typeof data === "object" && !Array.isArray(data)) {
    const obj = data as Record<string, unknown>;
    for (const key of ["message", "error", "title", "detail"]) {
      const v = obj[key];
      if (typeof v === "string" && v.length > 0) return v;
    }
    const lines = Object.entries(obj).map(([k, v]) => `${k} : ${typeof v === "string" ? v : JSON.stringify(v)}`);
    if (lines.length > 0) return lines.join("\n");
  }
  return trimmed;
}

/** Parses a Retry-After value (delta seconds or an HTTP date) into milliseconds. */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null) return undefined;
  const v = value.trim();
  if (/^\d+(\.\d+)?$/.test(v)) return Math.round(Number(v) * 1000);
  const at = Date.parse(v);
  if (Number.isFinite(at)) return Math.max(0, at - now);
  return undefined;
}

export type BodyReader = ReadableStreamDefaultReader<Uint8Array>;

/** One read from a response body. Fails when nothing arrives within `timeoutMs`. */
export async function readChunk(reader: BodyReader, timeoutMs: number, op: string) {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const idle = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TransportError(`${op}: no response data for ${timeoutMs}ms`, { timeoutMs })),
      timeoutMs,
    );
  });
  try {
    return await Promise.race([reader.read(), idle]);
  } catch (e) {
    if (e instanceof TransportError) throw e;
    throw new TransportError(`${op}: failed reading response body: ${errMessage(e)}`, { cause: e });
  } finally {
    clearTimeout(timer);
  }
}

export async function readBodyText(resp: Response, op: string, timeoutMs: number = DEFAULT_TIMEOUT_MS): Promise<string> {
  const body = resp.body;
  if (!body) return "";
  const reader: BodyReader = body.getReader();
  const decoder = new TextDecoder();
  let text = "";
  try {
    for (;;) {
      const chunk = await readChunk(reader, timeoutMs, op);
      if (chunk.done) break;
      text += decoder.decode(chunk.value, { stream: true });
    }
  } catch (e) {
    const cancelled = await reader.cancel(e).then(
      () => true,
      () => false,
    );
    if (cancelled) throw e;
    throw new TransportError(`${op}: ${errMessage(e)} (body could not be cancelled)`, { cause: e });
  }
  return text + decoder.decode();
}

export async function readJsonBody(resp: Response, op: string, timeoutMs: number = DEFAULT_TIMEOUT_MS): Promise<unknown> {
  const text = await readBodyText(resp, op, timeoutMs);
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new MalformedResponse(`${op}: response is not valid JSON: ${errMessage(e)}`);
  }
}

export class RequestExecutor {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly rateLimit: RateLimitPolicy;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly debug: boolean;
  private readonly now: () => number;
  private nextReqId = 1;

  constructor(
    private readonly cookies: CookieJar,
    options: RequestExecutorOptions,
  ) {
    this.baseUrl = options.baseUrl.replace(/[\s/]+$/, "");
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.rateLimit = {
      defaultWaitMs: options.rateLimit?.defaultWaitMs,
      maxTotalWaitMs: options.rateLimit?.maxTotalWaitMs ?? DEFAULT_MAX_RATE_LIMIT_WAIT_MS,
      maxRetries: options.rateLimit?.maxRetries ?? DEFAULT_MAX_RATE_LIMIT_RETRIES,
    };
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? console;
    this.debug = options.debug ?? isDebugEnabled();
    this.now = options.now ?? Date.now;
  }

  url(request: Pick<DcsRequest, "path" | "query">): string {
    const params = new URLSearchParams();
    for (const [k, v] of Object.entries(request.query ?? {})) {
      if (v !== undefined) params.append(k, String(v));
    }
    const qs = params.toString();
    return `${this.baseUrl}${request.path}${qs ? `?${qs}` : ""}`;
  }

  /**
   * Performs one exchange. Must only be called while the session's
   * exclusive access is held. A 429 is waited out and retried as the
   * server advises, up to the policy's retry and total-wait limits; any
   * other non-2xx status is a {@link RequestFailed}.
   */
  async execute(request: DcsRequest): Promise<Response> {
    let waitedMs = 0;
    let retries = 0;
    for (;;) {
      const resp = await this.send(request);
      if (resp.status !== 429) {
        if (!resp.ok) throw await this.failure(resp, request);
        return resp;
      }

      const advised = parseRetryAfter(resp.headers.get("retry-after"), this.now());
      await this.discard(resp, request);
      const waitMs = advised ?? this.rateLimit.defaultWaitMs;
      if (waitMs === undefined) {
        throw new TransportError(`${request.op}: rate limited without a usable Retry-After header`, {
          retryAfter: resp.headers.get("retry-after"),
        });
      }
      if (retries >= this.rateLimit.maxRetries) {
        throw new RequestFailed(429, `${request.op}: still rate limited after ${retries} retries`);
      }
      if (waitedMs + waitMs > this.rateLimit.maxTotalWaitMs) {
        throw new RequestFailed(
          429,
          `${request.op}: still rate limited after waiting ${waitedMs}ms (budget ${this.rateLimit.maxTotalWaitMs}ms)`,
        );
      }

      this.logger.warn(`[dcs] rate limited op=${request.op}, retrying in ${waitMs}ms`);
      await this.sleep(waitMs);
      waitedMs += waitMs;
      retries++;
    }
  }

  private async send(request: DcsRequest): Promise<Response> {
    const reqId = this.nextReqId++;
    const url = this.url(request);
    const startedAt = this.now();

    const headers: Record<string, string> = { Accept: "application/json" };
    const cookie = this.cookies.header();
    if (cookie) headers.Cookie = cookie;
    let body: string | undefined;
    if (request.json !== undefined) {
      headers["Content-Type"] = "application/json; charset=UTF-8";
      body = JSON.stringify(request.json);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(new Error("timeout")), this.timeoutMs);

    if (this.debug) {
      this.logger.log(`[dcs][${reqId}] start op=${request.op} ${request.method} url=${url}`);
    }

    try {
      const resp = await this.fetchImpl(url, { method: request.method, headers, body, signal: controller.signal });
      this.cookies.store(resp.headers, this.now());
      const ms = this.now() - startedAt;
      if (this.debug || !resp.ok || ms > SLOW_REQUEST_MS) {
        this.logger.log(`[dcs][${reqId}] done op=${request.op} status=${resp.status} ${ms}ms url=${url}`);
      }
      return resp;
    } catch (e) {
      const ms = this.now() - startedAt;
      this.logger.error(`[dcs][${reqId}] fail op=${request.op} ${ms}ms url=${url} err=${errMessage(e)}`);
      throw new TransportError(`${request.op}: ${errMessage(e)}`, { url, cause: e });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async failure(resp: Response, request: DcsRequest): Promise<RequestFailed> {
    let text = "";
    try {
      text = await readBodyText(resp, request.op, this.timeoutMs);
    } catch (e) {
      this.logger.warn(`[dcs] could not read error body op=${request.op}: ${errMessage(e)}`);
    }
    const message = serverMessage(text, resp.statusText || `HTTP ${resp.status}`);
    return new RequestFailed(resp.status, message, { op: request.op, url: resp.url || this.url(request) });
  }

  private async discard(resp: Response, request: DcsRequest): Promise<void> {
    try {
      await resp.body?.cancel();
    } catch (e) {
      this.logger.warn(`[dcs] could not discard body op=${request.op}: ${errMessage(e)}`);
    }
  }
}
