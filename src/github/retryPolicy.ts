import {
  createGithubError,
  describeHttpFailure,
  kindForStatus,
  type GithubApiError,
} from "./errors.js";

/** Raw result of one attempt, before any retry decision. */
export type AttemptResult =
  | {
      readonly type: "response";
      readonly status: number;
      readonly headers: Headers;
      readonly body: string;
    }
  | { readonly type: "timeout"; readonly timeoutMs: number; readonly error: unknown }
  | { readonly type: "network"; readonly error: unknown };

export type AttemptVerdict = "success" | "transient" | "terminal";

/**
 * Single retry decision point: 2xx succeeds, statuses in the retriable set and
 * transport failures are transient, everything else is terminal.
 */
export function classifyAttempt(result: AttemptResult, retriableStatuses: ReadonlySet<number>): AttemptVerdict {
  if (result.type !== "response") {
    return "transient";
  }
  if (result.status >= 200 && result.status < 300) {
    return "success";
  }
  return retriableStatuses.has(result.status) ? "transient" : "terminal";
}

/** Delay inserted after the attempt with zero-based index {@link attemptIndex}. */
export function backoffDelayMs(baseDelayMs: number, attemptIndex: number): number {
  return baseDelayMs * 2 ** attemptIndex;
}

/** Short label used in retry notifications and logs. */
export function describeAttempt(result: AttemptResult): string {
  switch (result.type) {
    case "response":
      return `HTTP ${result.status}`;
    case "timeout":
      return `timeout after ${result.timeoutMs}ms`;
    case "network":
      return "network error";
  }
}

/** Translates the last failed attempt into the caller-facing error. */
export function failureFromAttempt(result: AttemptResult, attempts: number, endpoint: string): GithubApiError {
  switch (result.type) {
    case "response":
      return createGithubError(kindForStatus(result.status), describeHttpFailure(result.status, result.body), {
        status: result.status,
        attempts,
        endpoint,
      });
    case "timeout":
      return createGithubError("timeout", `GitHub API did not respond within ${result.timeoutMs}ms.`, {
        attempts,
        endpoint,
        cause: result.error,
      });
    case "network": {
      const reason = result.error instanceof Error ? result.error.message : String(result.error);
      return createGithubError("network", `Network error while contacting the GitHub API: ${reason}`, {
        attempts,
        endpoint,
        cause: result.error,
      });
    }
  }
}
