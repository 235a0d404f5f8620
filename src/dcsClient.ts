import type { DcsConfig } from "./config.js";
import { DcsSession, type DcsSessionOptions, type SignInResult } from "./dcsSession.js";
import { DEFAULT_MAX_WINDOW_MS, fetchWindowedReadings } from "./largeReadings.js";
import {
  getStatus,
  listMeters,
  listVirtualMeters,
  streamMeters,
  streamVirtualMeters,
  type MeterInfo,
  type VirtualMeterInfo,
} from "./metadata.js";
import { fetchReadings, type FetchReadingsOptions } from "./readings.js";
import type { ReadingsQuery, ReadingsResult } from "./types.js";

export type DcsClientOptions = DcsSessionOptions & FetchReadingsOptions;

/** Turns a loaded config into client options. */
export function clientOptions(config: DcsConfig): DcsClientOptions {
  return {
    baseUrl: config.baseUrl,
    credentials: config.credentials,
    debug: config.debug,
    timeoutMs: config.timeoutMs,
    rateLimit: config.rateLimit,
  };
}

/**
 * Convenience front for a {@link DcsSession}: metadata, single readings
 * queries and windowed ("large") readings queries over one session.
 *
 * @example
 * ```ts
 * await withDcsClient({ baseUrl, credentials }, async (dcs) => {
 *   const result = await dcs.largeReadings(
 *     { channel: "R123", start: "2020-01-01", end: "2025-01-01", stream: true },
 *     365 * 24 * 3600_000,
 *   );
 *   for await (const r of result.readings) console.log(r.timestamp, r.value);
 * });
 * ```
 */
export class DcsClient {
  readonly session: DcsSession;
  private readonly fetchOptions: FetchReadingsOptions;

  constructor(options: DcsClientOptions) {
    this.session = new DcsSession(options);
    this.fetchOptions = { loadParser: options.loadParser };
  }

  static async open(options: DcsClientOptions): Promise<DcsClient> {
    const client = new DcsClient(options);
    if (options.credentials) {
      await client.signIn(options.credentials.username, options.credentials.password);
    } else {
      client.session.logger.warn("[dcs] no credentials given; using unauthenticated mode until signIn is called");
    }
    return client;
  }

  signIn(username: string, password: string): Promise<SignInResult> {
    return this.session.signIn(username, password);
  }

  signOut(): Promise<void> {
    return this.session.signOut();
  }

  status(): Promise<Record<string, unknown>> {
    return getStatus(this.session);
  }

  meters(): Promise<MeterInfo[]> {
    return listMeters(this.session);
  }

  virtualMeters(): Promise<VirtualMeterInfo[]> {
    return listVirtualMeters(this.session);
  }

  streamMeters(): Promise<AsyncIterable<MeterInfo>> {
    return streamMeters(this.session, this.fetchOptions);
  }

  streamVirtualMeters(): Promise<AsyncIterable<VirtualMeterInfo>> {
    return streamVirtualMeters(this.session, this.fetchOptions);
  }

  readings(query: ReadingsQuery): Promise<ReadingsResult> {
    return fetchReadings(this.session, query, this.fetchOptions);
  }

  largeReadings(query: ReadingsQuery, maxWindowMs: number = DEFAULT_MAX_WINDOW_MS): Promise<ReadingsResult> {
    return fetchWindowedReadings(this.session, query, maxWindowMs, this.fetchOptions);
  }
}

/** Opens a client for the duration of `fn`; signing out afterwards also drops any stream left open. */
export async function withDcsClient<T>(options: DcsClientOptions, fn: (client: DcsClient) => Promise<T>): Promise<T> {
  const client = await DcsClient.open(options);
  try {
    return await fn(client);
  } finally {
    await client.signOut();
  }
}
