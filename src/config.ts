import { env as processEnv } from "node:process";

type Env = Record<string, string | undefined>;

export type RateLimitPolicy = {
  /** Wait used when a 429 carries no usable Retry-After; unset fails the request. */
  defaultWaitMs?: number;
  /** Upper bound on the summed waits for one request. */
  maxTotalWaitMs: number;
  /** Upper bound on 429 retries for one request, however short the advised waits. */
  maxRetries: number;
};

export type DcsConfig = {
  baseUrl: string;
  credentials?: {
    username: string;
    password: string;
  };
  debug: boolean;
  timeoutMs: number;
  rateLimit: RateLimitPolicy;
};

export const DEFAULT_TIMEOUT_MS = 120_000;
export const DEFAULT_MAX_RATE_LIMIT_WAIT_MS = 15 * 60_000;
export const DEFAULT_MAX_RATE_LIMIT_RETRIES = 30;

function required(env: Env, name: string): string {
  const v = env[name];
  if (!v) throw new Error(`Missing env var: ${name}`);
  return v;
}

function optional(env: Env, name: string): string | undefined {
  const v = env[name];
  return v && v.length > 0 ? v : undefined;
}

function optionalMs(env: Env, name: string): number | undefined {
  const v = optional(env, name);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isFinite(n) || n < 0) throw new Error(`${name} must be a non-negative number of milliseconds`);
  return n;
}

function optionalCount(env: Env, name: string): number | undefined {
  const v = optional(env, name);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isSafeInteger(n) || n < 0) throw new Error(`${name} must be a non-negative integer`);
  return n;
}

export function loadConfig(env: Env = processEnv): DcsConfig {
  const baseUrl = required(env, "DCS_URL");
  try {
    new URL(baseUrl);
  } catch {
    throw new Error(`DCS_URL is not a valid URL: ${baseUrl}`);
  }

  const username = optional(env, "DCS_USERNAME");
  const password = optional(env, "DCS_PASSWORD");

  return {
    baseUrl,
    credentials: username !== undefined && password !== undefined ? { username, password } : undefined,
    debug: env.DCS_DEBUG === "1",
    timeoutMs: optionalMs(env, "DCS_TIMEOUT_MS") ?? DEFAULT_TIMEOUT_MS,
    rateLimit: {
      defaultWaitMs: optionalMs(env, "DCS_RATE_LIMIT_DEFAULT_WAIT_MS"),
      maxTotalWaitMs: optionalMs(env, "DCS_RATE_LIMIT_MAX_WAIT_MS") ?? DEFAULT_MAX_RATE_LIMIT_WAIT_MS,
      maxRetries: optionalCount(env, "DCS_RATE_LIMIT_MAX_RETRIES") ?? DEFAULT_MAX_RATE_LIMIT_RETRIES,
    },
  };
}
