import type { JSONParser } from "@streamparser/json";
import { DcsError, errMessage, MalformedResponse, TransportError } from "./errors.js";
import type { Release } from "./mutex.js";
import { readChunk, type BodyReader, type Logger } from "./requestExecutor.js";

export type JsonParserClass = typeof JSONParser;

/** Resolves to the incremental JSON parser, or undefined when it is not installed. */
export type ParserLoader = () => Promise<JsonParserClass | undefined>;

let parserSupport: Promise<JsonParserClass | undefined> | undefined;

export const loadStreamingParser: ParserLoader = () => {
  parserSupport ??= import("@streamparser/json").then(
    (mod) => mod.JSONParser,
    (e: unknown) => {
      console.warn(`[dcs] incremental JSON parser unavailable, bodies will be decoded eagerly: ${errMessage(e)}`);
      return undefined;
    },
  );
  return parserSupport;
};

/**
 * An open streamed body that holds the session. The session uses it to
 * take the lock back when someone else needs it or when signing out.
 */
export type StreamHandle = {
  // Reads the rest of the body into memory, then releases the session.
  detach(): Promise<void>;
  // Drops the rest of the body and releases the session; further reads fail.
  abort(): Promise<void>;
};

export type IncrementalBodyOptions = {
  // Label for errors and log lines, e.g. "readings".
  op: string;
  // Longest wait for any single chunk.
  timeoutMs: number;
  logger: Logger;
};

/**
 * Feeds a response body into an incremental JSON parser one chunk at a
 * time. Items pushed by the parser's callbacks are handed out by
 * {@link items}. `release` is called exactly once, when the body has been
 * read to the end, fails, is detached, aborted, or the consumer stops.
 */
export class IncrementalBody<T> implements StreamHandle {
  private readonly queue: T[] = [];
  private chain: Promise<void> = Promise.resolve();
  private ended = false;
  private parsed = false;
  private closed = false;
  private settled = false;
  private failure?: { error: unknown };

  constructor(
    private readonly reader: BodyReader,
    private readonly parser: JSONParser,
    private readonly release: Release,
    private readonly opts: IncrementalBodyOptions,
  ) {
    // The parser ends itself once the top-level value closes.
    parser.onEnd = () => {
      this.parsed = true;
    };
  }

  push(item: T): void {
    this.queue.push(item);
  }

  /** Reads until `enough()` holds or the body ends. */
  async fill(enough: () => boolean): Promise<void> {
    while (!enough() && !this.ended) await this.pump();
  }

  async *items(): AsyncGenerator<T> {
    try {
      for (;;) {
        if (this.closed) throw this.closedError();
        const next = this.queue.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }
        if (this.failure) throw this.failure.error;
        if (this.ended) return;
        await this.pump();
      }
    } finally {
      await this.settle();
    }
  }

  async detach(): Promise<void> {
    if (this.settled) return;
    try {
      while (!this.ended) await this.pump();
    } catch (e) {
      // Raised to the consumer once the buffered items run out.
      this.failure = { error: e };
    }
    await this.settle();
  }

  async abort(): Promise<void> {
    this.closed = true;
    this.queue.length = 0;
    await this.settle();
  }

  // Reads never overlap, whoever asks for them.
  private pump(): Promise<void> {
    this.chain = this.chain.then(() => this.readOnce());
    return this.chain;
  }

  private async readOnce(): Promise<void> {
    if (this.ended) return;
    const chunk = await readChunk(this.reader, this.opts.timeoutMs, this.opts.op);
    if (this.closed) throw this.closedError();
    try {
      if (chunk.done) {
        this.ended = true;
        if (!this.parsed) this.parser.end();
        if (!this.parsed) {
          throw new MalformedResponse(`${this.opts.op} response ended before the JSON document was complete`);
        }
      } else {
        this.parser.write(chunk.value);
      }
    } catch (e) {
      if (e instanceof DcsError) throw e;
      throw new MalformedResponse(`${this.opts.op} response is not valid JSON: ${errMessage(e)}`);
    }
  }

  private async settle(): Promise<void> {
    if (this.settled) return;
    this.settled = true;
    if (!this.ended) {
      try {
        await this.reader.cancel();
      } catch (e) {
        this.opts.logger.warn(`[dcs] could not cancel ${this.opts.op} body: ${errMessage(e)}`);
      }
    }
    this.release();
  }

  private closedError(): TransportError {
    return new TransportError(`${this.opts.op}: stream was closed before it was read to the end`);
  }
}
