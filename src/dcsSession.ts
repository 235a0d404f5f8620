import { DEFAULT_TIMEOUT_MS, type RateLimitPolicy } from "./config.js";
import { errMessage, MalformedResponse, RequestFailed } from "./errors.js";
import type { StreamHandle } from "./jsonStream.js";
import { Mutex, type Release } from "./mutex.js";
import {
  CookieJar,
  readJsonBody,
  RequestExecutor,
  type DcsRequest,
  type FetchLike,
  type Logger,
  type Sleep,
} from "./requestExecutor.js";

export type Credentials = {
  username: string;
  password: string;
};

export type DcsSessionOptions = {
  /** Root of the web API, e.g. `https://dcs.example.org/dcswebapi`. */
  baseUrl: string;
  credentials?: Credentials;
  fetch?: FetchLike;
  timeoutMs?: number;
  rateLimit?: Partial<RateLimitPolicy>;
  sleep?: Sleep;
  logger?: Logger;
  debug?: boolean;
};

export type SessionState = "unauthenticated" | "authenticated";

export type SignInResult =
  | { ok: true; username: string; role: string }
  | { ok: false; status?: number; message: string };

export type Send = (request: DcsRequest) => Promise<Response>;

/** A held exclusive-access slot. `send` stops working once released. */
export type ExclusiveAccess = {
  send: Send;
  release: Release;
  /**
   * Hands the slot over to a streamed body that outlives the call. The
   * session can then detach or abort the stream to get its lock back.
   */
  track: (handle: StreamHandle) => Promise<void>;
};

type Account = {
  username: string;
  role: string;
};

/**
 * One authenticated conversation with a DCS server. Every request made
 * through a session is serialized, so at most one is in flight at a time
 * no matter how many callers share it.
 *
 * A streamed result keeps the session while it is being read. When another
 * request is made meanwhile, including from inside the loop reading the
 * stream, the rest of the body is buffered and the session moves on.
 * Signing out drops any stream still open.
 */
export class DcsSession {
  readonly baseUrl: string;
  readonly logger: Logger;
  readonly debug: boolean;
  readonly timeoutMs: number;

  private readonly lock = new Mutex();
  private readonly streams = new Set<StreamHandle>();
  private waiting = 0;
  private readonly cookies = new CookieJar();
  private readonly executor: RequestExecutor;
  private account?: Account;

  constructor(options: DcsSessionOptions) {
    this.baseUrl = options.baseUrl;
    this.logger = options.logger ?? console;
    this.debug = options.debug ?? process.env.DCS_DEBUG === "1";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.executor = new RequestExecutor(this.cookies, { ...options, logger: this.logger, debug: this.debug });
  }

  /** Creates a session, signing in straight away when credentials are given. */
  static async open(options: DcsSessionOptions): Promise<DcsSession> {
    const session = new DcsSession(options);
    if (options.credentials) {
      await session.signIn(options.credentials.username, options.credentials.password);
    } else {
      session.logger.warn("[dcs] no credentials given; using unauthenticated mode until signIn is called");
    }
    return session;
  }

  get state(): SessionState {
    return this.account ? "authenticated" : "unauthenticated";
  }

  get isAuthenticated(): boolean {
    return this.account !== undefined;
  }

  get username(): string | undefined {
    return this.account?.username;
  }

  get role(): string | undefined {
    return this.account?.role;
  }

  url(request: Pick<DcsRequest, "path" | "query">): string {
    return this.executor.url(request);
  }

  /**
   * Waits for the session, then hands out a slot that must be released.
   * Prefer {@link withExclusiveAccess}; this form exists for results that
   * outlive the call, such as streamed response bodies.
   */
  async acquireExclusiveAccess(): Promise<ExclusiveAccess> {
    await this.detachStreams();
    this.waiting++;
    let unlock: Release;
    try {
      unlock = await this.lock.acquire();
    } finally {
      this.waiting--;
    }

    let released = false;
    let stream: StreamHandle | undefined;
    return {
      send: (request) => {
        if (released) return Promise.reject(new Error(`${request.op}: exclusive access already released`));
        return this.executor.execute(request);
      },
      release: () => {
        if (released) return;
        released = true;
        if (stream) this.streams.delete(stream);
        unlock();
      },
      track: async (handle) => {
        if (released) return;
        stream = handle;
        this.streams.add(handle);
        // Callers queued up while the body was being opened.
        if (this.waiting > 0) await handle.detach();
      },
    };
  }

  /** Buffers the rest of every open stream so their lock is freed. */
  private async detachStreams(): Promise<void> {
    for (const handle of [...this.streams]) await handle.detach();
  }

  /** Drops every open stream. Their readers fail from then on. */
  async closeStreams(): Promise<void> {
    for (const handle of [...this.streams]) await handle.abort();
  }

  async withExclusiveAccess<T>(fn: (send: Send) => Promise<T>): Promise<T> {
    const access = await this.acquireExclusiveAccess();
    try {
      return await fn(access.send);
    } finally {
      access.release();
    }
  }

  /**
   * Signs in, replacing any current sign-in. A rejection by the server is
   * returned as `{ ok: false }` and leaves the session usable for a retry.
   */
  async signIn(username: string, password: string): Promise<SignInResult> {
    if (this.account || this.cookies.size > 0) await this.signOut();

    try {
      const data = await this.withExclusiveAccess(async (send) => {
        const resp = await send({
          method: "POST",
          path: "/authentication/signin",
          json: { username, password },
          op: "signin",
        });
        return readJsonBody(resp, "signin", this.timeoutMs);
      });

      const obj = data && typeof data === "object" ? (data as Record<string, unknown>) : {};
      if (typeof obj.role !== "string") throw new MalformedResponse("signin: response has no role");
      const account = {
        username: typeof obj.username === "string" ? obj.username : username,
        role: obj.role,
      };
      this.account = account;
      this.logger.log(`[dcs] signed in as '${account.username}' with ${account.role} privileges`);
      return { ok: true, ...account };
    } catch (e) {
      if (!(e instanceof RequestFailed) && !(e instanceof MalformedResponse)) throw e;
      this.account = undefined;
      this.cookies.clear();
      const status = e instanceof RequestFailed ? e.status : undefined;
      this.logger.error(`[dcs] sign-in failed for '${username}'${status ? ` (${status})` : ""}: ${e.message}`);
      return { ok: false, status, message: e.message };
    }
  }

  /**
   * Best-effort sign-out. Closes any open stream first, always leaves the
   * session unauthenticated and never throws.
   */
  async signOut(): Promise<void> {
    await this.closeStreams();
    const hadCredential = this.account !== undefined || this.cookies.size > 0;
    if (!hadCredential) return;

    try {
      await this.withExclusiveAccess(async (send) => {
        const resp = await send({ method: "POST", path: "/authentication/signout", op: "signout" });
        await resp.body?.cancel();
      });
      this.logger.log("[dcs] signed out");
    } catch (e) {
      this.logger.warn(`[dcs] sign-out request failed, discarding credentials anyway: ${errMessage(e)}`);
    } finally {
      this.account = undefined;
      this.cookies.clear();
    }
  }
}

/** Opens a session for the duration of `fn` and always signs out afterwards. */
export async function withDcsSession<T>(
  options: DcsSessionOptions,
  fn: (session: DcsSession) => Promise<T>,
): Promise<T> {
  const session = await DcsSession.open(options);
  try {
    return await fn(session);
  } finally {
    await session.signOut();
  }
}
