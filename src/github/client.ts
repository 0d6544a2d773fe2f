import { z } from "zod";

import type { GithubConfig, RetryConfig } from "../config/github.js";
import type { StructuredLogger } from "../logger.js";
import { runtimeClearTimeout, runtimeSetTimeout } from "../runtime/timers.js";
import type { Clock } from "./clock.js";
import { AuthenticationError, UnexpectedError, type ErrorKind, type GithubApiError } from "./errors.js";
import { notifySafely, silentSink, type ProgressSink } from "./notifier.js";
import type { RateBudget } from "./rateBudget.js";
import {
  backoffDelayMs,
  classifyAttempt,
  describeAttempt,
  failureFromAttempt,
  type AttemptResult,
} from "./retryPolicy.js";

/** Every call issued by the tool servers is a read. */
export type HttpMethod = "GET" | "HEAD";

export type QueryParams = Readonly<Record<string, string | number | boolean | null | undefined>>;

export interface CallSuccess<T = unknown> {
  readonly ok: true;
  readonly status: number;
  readonly payload: T;
  readonly headers: Headers;
  readonly attempts: number;
}

export interface CallFailure {
  readonly ok: false;
  readonly error: GithubApiError;
}

/** Terminal result of one logical call after all of its attempts. */
export type CallOutcome<T = unknown> = CallSuccess<T> | CallFailure;

export interface ExecuteOptions {
  /** Overrides the configured attempt budget for this call. */
  readonly maxAttempts?: number;
  readonly sink?: ProgressSink;
}

/** Collaborators injected into {@link GithubClient}. */
export interface GithubClientDependencies {
  readonly config: GithubConfig;
  readonly budget: RateBudget;
  readonly clock: Clock;
  readonly logger: StructuredLogger;
  readonly fetchImpl?: typeof fetch;
}

/**
 * Resilient access to the GitHub REST API. Each attempt first takes a permit
 * from the shared {@link RateBudget}, then issues the request under a fixed
 * timeout. Transient results are retried with exponential backoff until the
 * attempt budget runs out; terminal results end the call immediately.
 *
 * {@link execute} never throws: it always settles with a {@link CallOutcome}.
 */
export class GithubClient {
  private readonly config: GithubConfig;
  private readonly budget: RateBudget;
  private readonly clock: Clock;
  private readonly logger: StructuredLogger;
  private readonly fetchImpl: typeof fetch;

  constructor(dependencies: GithubClientDependencies) {
    this.config = dependencies.config;
    this.budget = dependencies.budget;
    this.clock = dependencies.clock;
    this.logger = dependencies.logger;
    this.fetchImpl = dependencies.fetchImpl ?? fetch;
  }

  get retryPolicy(): RetryConfig {
    return this.config.retry;
  }

  /** Throws {@link AuthenticationError} when no credential is configured. */
  assertCredential(): void {
    if (!this.config.token) {
      throw new AuthenticationError("GITHUB_TOKEN is not configured; the GitHub API cannot be queried.");
    }
  }

  async execute(
    method: HttpMethod,
    endpoint: string,
    params: QueryParams = {},
    options: ExecuteOptions = {},
  ): Promise<CallOutcome> {
    const sink = options.sink ?? silentSink;
    const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? this.config.retry.maxAttempts));
    const url = this.buildUrl(endpoint, params);
    let lastFailure: AttemptResult | null = null;

    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      const denied = await this.takePermit(method, endpoint, attempt);
      if (denied) {
        return { ok: false, error: denied };
      }
      const startedAt = this.clock.now();
      const result = await this.performAttempt(method, url);
      const verdict = classifyAttempt(result, this.config.retry.retriableStatuses);

      this.logger.debug("github_call_attempt", {
        method,
        endpoint,
        attempt: attempt + 1,
        max_attempts: maxAttempts,
        result: describeAttempt(result),
        verdict,
        duration_ms: this.clock.now() - startedAt,
      });

      if (result.type === "response") {
        await this.inspectQuota(result.headers, endpoint, sink);
      }

      if (verdict === "success" && result.type === "response") {
        return this.parseSuccess(result, attempt + 1, endpoint);
      }
      if (verdict === "terminal") {
        return { ok: false, error: failureFromAttempt(result, attempt + 1, endpoint) };
      }

      lastFailure = result;
      if (attempt + 1 < maxAttempts) {
        const delayMs = backoffDelayMs(this.config.retry.baseDelayMs, attempt);
        this.logger.warn("github_call_retry", {
          method,
          endpoint,
          attempt: attempt + 1,
          max_attempts: maxAttempts,
          reason: describeAttempt(result),
          delay_ms: delayMs,
        });
        await notifySafely(this.logger, () =>
          sink.info(
            `${describeAttempt(result)} from ${endpoint}; retry ${attempt + 1}/${maxAttempts - 1} in ${(delayMs / 1000).toFixed(1)}s`,
          ),
        );
        try {
          await this.clock.sleep(delayMs);
        } catch (error) {
          return {
            ok: false,
            error: new UnexpectedError(`The retry pause before attempt ${attempt + 2} against ${endpoint} failed.`, {
              attempts: attempt + 1,
              endpoint,
              cause: error,
            }),
          };
        }
      }
    }

    if (lastFailure) {
      const error = failureFromAttempt(lastFailure, maxAttempts, endpoint);
      this.logger.warn("github_call_exhausted", { method, endpoint, attempts: maxAttempts, code: error.code });
      return { ok: false, error };
    }
    return {
      ok: false,
      error: new UnexpectedError(`All ${maxAttempts} attempts against ${endpoint} failed without a result.`, {
        attempts: maxAttempts,
        endpoint,
      }),
    };
  }

  /**
   * Issues a GET through {@link execute} and validates the payload with
   * {@link schema}. Failures are thrown as {@link GithubApiError}.
   */
  async getJson<T>(
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params: QueryParams = {},
    options: ExecuteOptions = {},
  ): Promise<T> {
    const outcome = await this.execute("GET", endpoint, params, options);
    if (!outcome.ok) {
      throw outcome.error;
    }
    return this.validatePayload(outcome, endpoint, schema);
  }

  /**
   * Like {@link getJson}, but a failure whose kind is listed in
   * {@link absentKinds} means the resource is absent and resolves with `null`.
   */
  async getOptionalJson<T>(
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    absentKinds: readonly ErrorKind[] = ["not_found"],
    params: QueryParams = {},
    options: ExecuteOptions = {},
  ): Promise<T | null> {
    const outcome = await this.execute("GET", endpoint, params, options);
    if (!outcome.ok) {
      if (absentKinds.includes(outcome.error.kind)) {
        this.logger.debug("github_resource_absent", { endpoint, code: outcome.error.code });
        return null;
      }
      throw outcome.error;
    }
    return this.validatePayload(outcome, endpoint, schema);
  }

  private validatePayload<T>(
    outcome: CallSuccess,
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): T {
    const parsed = schema.safeParse(outcome.payload);
    if (!parsed.success) {
      throw new UnexpectedError(`GitHub returned an unexpected payload for ${endpoint}.`, {
        status: outcome.status,
        attempts: outcome.attempts,
        endpoint,
        details: { issues: parsed.error.issues },
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  /** Resolves with `null` once a permit is held, or with the failure that ends the call. */
  private async takePermit(method: HttpMethod, endpoint: string, attemptsSoFar: number): Promise<GithubApiError | null> {
    try {
      await this.budget.acquire();
      return null;
    } catch (error) {
      this.logger.error("github_rate_budget_failed", {
        method,
        endpoint,
        attempt: attemptsSoFar + 1,
        message: error instanceof Error ? error.message : String(error),
      });
      return new UnexpectedError(`No rate-limit permit could be obtained for ${endpoint}.`, {
        attempts: attemptsSoFar,
        endpoint,
        cause: error,
      });
    }
  }

  private buildUrl(endpoint: string, params: QueryParams): URL {
    const path = endpoint.startsWith("/") ? endpoint : `/${endpoint}`;
    const url = new URL(`${this.config.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== null) {
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  private buildHeaders(): Headers {
    const headers = new Headers({
      Accept: this.config.accept,
      "User-Agent": this.config.userAgent,
    });
    if (this.config.token) {
      headers.set("Authorization", `token ${this.config.token}`);
    }
    return headers;
  }

  private async performAttempt(method: HttpMethod, url: URL): Promise<AttemptResult> {
    const controller = new AbortController();
    const timeoutMs = this.config.timeoutMs;
    const timer = runtimeSetTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: this.buildHeaders(),
        signal: controller.signal,
        redirect: "follow",
      });
      const body = method === "HEAD" ? "" : await response.text();
      return { type: "response", status: response.status, headers: response.headers, body };
    } catch (error) {
      if (controller.signal.aborted || isAbortError(error)) {
        return { type: "timeout", timeoutMs, error };
      }
      return { type: "network", error };
    } finally {
      runtimeClearTimeout(timer);
    }
  }

  private parseSuccess(
    result: Extract<AttemptResult, { type: "response" }>,
    attempts: number,
    endpoint: string,
  ): CallOutcome {
    if (result.body.trim().length === 0) {
      return { ok: true, status: result.status, payload: null, headers: result.headers, attempts };
    }
    try {
      const payload: unknown = JSON.parse(result.body);
      return { ok: true, status: result.status, payload, headers: result.headers, attempts };
    } catch (error) {
      return {
        ok: false,
        error: new UnexpectedError(`GitHub returned a body that is not valid JSON for ${endpoint}.`, {
          status: result.status,
          attempts,
          endpoint,
          cause: error,
        }),
      };
    }
  }

  /** Emits an advisory when the remaining upstream quota drops under the low-water mark. */
  private async inspectQuota(headers: Headers, endpoint: string, sink: ProgressSink): Promise<void> {
    const raw = headers.get("x-ratelimit-remaining");
    if (raw === null || !/^\d+$/.test(raw.trim())) {
      return;
    }
    const remaining = Number.parseInt(raw.trim(), 10);
    if (remaining >= this.config.quotaLowWater) {
      return;
    }
    this.logger.warn("github_quota_low", { endpoint, remaining, low_water: this.config.quotaLowWater });
    await notifySafely(this.logger, () => sink.warning(`Only ${remaining} GitHub API requests remaining.`));
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}
