import { readCsv, readInt, readOptionalString, readString, type EnvSource } from "./env.js";

/** Public GitHub REST endpoint used when no override is configured. */
export const DEFAULT_GITHUB_API_BASE_URL = "https://api.github.com";
/** Media type requested on every call. */
export const GITHUB_ACCEPT_HEADER = "application/vnd.github.v3+json";
const DEFAULT_USER_AGENT = "repo-scope/1.0";
const DEFAULT_TIMEOUT_MS = 20_000;
const DEFAULT_RATE_PERMITS = 1;
const DEFAULT_RATE_WINDOW_MS = 1_000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 1_000;
const DEFAULT_QUOTA_LOW_WATER = 100;
/** Statuses treated as transient upstream conditions. */
export const DEFAULT_RETRIABLE_STATUSES: readonly number[] = Object.freeze([429, 500, 502, 503, 504]);

/** Token-bucket settings bounding the outbound call rate of one process. */
export interface RateLimitConfig {
  /** Permits granted per window (R). */
  readonly permits: number;
  /** Window length in milliseconds (T). */
  readonly windowMs: number;
}

/** Retry settings applied by the resilient call primitive. */
export interface RetryConfig {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly retriableStatuses: ReadonlySet<number>;
}

/** Aggregated configuration consumed by {@link GithubClient}. */
export interface GithubConfig {
  readonly baseUrl: string;
  readonly token: string | null;
  readonly userAgent: string;
  readonly accept: string;
  readonly timeoutMs: number;
  /** Remaining-quota level under which an advisory is emitted. */
  readonly quotaLowWater: number;
  readonly rateLimit: RateLimitConfig;
  readonly retry: RetryConfig;
}

function parseStatuses(values: readonly string[]): number[] {
  const statuses: number[] = [];
  for (const value of values) {
    if (!/^\d{3}$/.test(value)) {
      continue;
    }
    const status = Number.parseInt(value, 10);
    if (status >= 400 && status <= 599) {
      statuses.push(status);
    }
  }
  return statuses;
}

/** Loads the GitHub access configuration from environment variables. */
export function loadGithubConfig(env: EnvSource = process.env): GithubConfig {
  const baseUrl = readString("GITHUB_API_BASE_URL", DEFAULT_GITHUB_API_BASE_URL, env).replace(/\/+$/, "");
  const statuses = parseStatuses(
    readCsv("GITHUB_RETRY_STATUSES", DEFAULT_RETRIABLE_STATUSES.map(String), env),
  );

  return {
    baseUrl,
    token: readOptionalString("GITHUB_TOKEN", env) ?? null,
    userAgent: readString("GITHUB_USER_AGENT", DEFAULT_USER_AGENT, env),
    accept: GITHUB_ACCEPT_HEADER,
    timeoutMs: readInt("GITHUB_TIMEOUT_MS", DEFAULT_TIMEOUT_MS, { min: 1, max: 300_000 }, env),
    quotaLowWater: readInt("GITHUB_QUOTA_LOW_WATER", DEFAULT_QUOTA_LOW_WATER, { min: 0 }, env),
    rateLimit: {
      permits: readInt("GITHUB_RATE_PERMITS", DEFAULT_RATE_PERMITS, { min: 1, max: 1_000 }, env),
      windowMs: readInt("GITHUB_RATE_WINDOW_MS", DEFAULT_RATE_WINDOW_MS, { min: 1, max: 3_600_000 }, env),
    },
    retry: {
      maxAttempts: readInt("GITHUB_RETRY_MAX_ATTEMPTS", DEFAULT_MAX_ATTEMPTS, { min: 1, max: 10 }, env),
      baseDelayMs: readInt("GITHUB_RETRY_BASE_DELAY_MS", DEFAULT_BASE_DELAY_MS, { min: 0, max: 60_000 }, env),
      retriableStatuses: new Set(statuses.length > 0 ? statuses : DEFAULT_RETRIABLE_STATUSES),
    },
  };
}

/** Secrets that must never reach a log line. */
export function collectGithubRedactionTokens(config: GithubConfig): string[] {
  return config.token ? [config.token] : [];
}
