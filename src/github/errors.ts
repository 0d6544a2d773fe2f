/** Closed set of failure categories surfaced by the GitHub access layer. */
export const ERROR_KINDS = [
  "authentication",
  "authorization",
  "not_found",
  "rate_limited",
  "upstream_server",
  "timeout",
  "network",
  "validation",
  "unexpected",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Stable machine-readable code attached to each {@link ErrorKind}. */
export const ERROR_CODES = {
  authentication: "E-GITHUB-AUTH",
  authorization: "E-GITHUB-FORBIDDEN",
  not_found: "E-GITHUB-NOT-FOUND",
  rate_limited: "E-GITHUB-RATE-LIMITED",
  upstream_server: "E-GITHUB-UPSTREAM",
  timeout: "E-GITHUB-TIMEOUT",
  network: "E-GITHUB-NETWORK",
  validation: "E-GITHUB-VALIDATION",
  unexpected: "E-GITHUB-UNEXPECTED",
} as const satisfies Record<ErrorKind, string>;

export type GithubErrorCode = (typeof ERROR_CODES)[ErrorKind];

/** Hints forwarded to MCP clients alongside the error code. */
const ERROR_HINTS: Record<ErrorKind, string> = {
  authentication: "check_token",
  authorization: "check_token_scopes",
  not_found: "check_owner_and_repo",
  rate_limited: "retry_later",
  upstream_server: "retry_later",
  timeout: "retry_later",
  network: "check_connectivity",
  validation: "invalid_input",
  unexpected: "report_issue",
};

/** Kinds that describe a transient condition which outlived the retry budget. */
const TRANSIENT_KINDS: ReadonlySet<ErrorKind> = new Set(["rate_limited", "upstream_server", "timeout", "network"]);

export interface GithubErrorOptions {
  /** Last HTTP status observed, or `null` when no response was received. */
  readonly status?: number | null;
  /** Number of attempts performed before giving up. */
  readonly attempts?: number;
  readonly endpoint?: string | null;
  readonly details?: unknown;
  readonly cause?: unknown;
}

/**
 * Terminal failure of a logical GitHub call. Every subclass pins one
 * {@link ErrorKind}; callers branch on `kind` or `code` rather than on the
 * transport's exception hierarchy.
 */
export class GithubApiError extends Error {
  public readonly kind: ErrorKind;
  public readonly code: GithubErrorCode;
  public readonly hint: string;
  public readonly status: number | null;
  public readonly attempts: number;
  public readonly endpoint: string | null;
  public readonly details?: unknown;

  constructor(kind: ErrorKind, message: string, options: GithubErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "GithubApiError";
    this.kind = kind;
    this.code = ERROR_CODES[kind];
    this.hint = ERROR_HINTS[kind];
    this.status = options.status ?? null;
    this.attempts = options.attempts ?? 0;
    this.endpoint = options.endpoint ?? null;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }

  /** Whether the underlying condition was transient (retries were exhausted). */
  get retriable(): boolean {
    return TRANSIENT_KINDS.has(this.kind);
  }
}

export class AuthenticationError extends GithubApiError {
  constructor(message: string, options?: GithubErrorOptions) {
    super("authentication", message, options);
    this.name = "AuthenticationError";
  }
}

export class AuthorizationError extends GithubApiError {
  constructor(message: string, options?: GithubErrorOptions) {
    super("authorization", message, options);
    this.name = "AuthorizationError";
  }
}

export class NotFoundError extends GithubApiError {
  constructor(message: string, options?: GithubErrorOptions) {
    super("not_found", message, options);
    this.name = "NotFoundError";
  }
}

export class RateLimitedError extends GithubApiError {
  constructor(message: string, options?: GithubErrorOptions) {
    super("rate_limited", message, options);
    this.name = "RateLimitedError";
  }
}

export class UpstreamServerError extends GithubApiError {
  constructor(message: string, options?: GithubErrorOptions) {
    super("upstream_server", message, options);
    this.name = "UpstreamServerError";
  }
}

export class TimeoutError extends GithubApiError {
  constructor(message: string, options?: GithubErrorOptions) {
    super("timeout", message, options);
    this.name = "TimeoutError";
  }
}

export class NetworkError extends GithubApiError {
  constructor(message: string, options?: GithubErrorOptions) {
    super("network", message, options);
    this.name = "NetworkError";
  }
}

/** Caller-supplied arguments failed a local precondition; nothing was sent upstream. */
export class ValidationError extends GithubApiError {
  constructor(message: string, options?: GithubErrorOptions) {
    super("validation", message, options);
    this.name = "ValidationError";
  }
}

export class UnexpectedError extends GithubApiError {
  constructor(message: string, options?: GithubErrorOptions) {
    super("unexpected", message, options);
    this.name = "UnexpectedError";
  }
}

const ERROR_CONSTRUCTORS: Record<ErrorKind, new (message: string, options?: GithubErrorOptions) => GithubApiError> = {
  authentication: AuthenticationError,
  authorization: AuthorizationError,
  not_found: NotFoundError,
  rate_limited: RateLimitedError,
  upstream_server: UpstreamServerError,
  timeout: TimeoutError,
  network: NetworkError,
  validation: ValidationError,
  unexpected: UnexpectedError,
};

/** Builds the {@link GithubApiError} subclass matching {@link kind}. */
export function createGithubError(kind: ErrorKind, message: string, options?: GithubErrorOptions): GithubApiError {
  const Constructor = ERROR_CONSTRUCTORS[kind];
  return new Constructor(message, options);
}

/** Maps a terminal HTTP status onto the taxonomy. */
export function kindForStatus(status: number): ErrorKind {
  switch (status) {
    case 401:
      return "authentication";
    case 403:
      return "authorization";
    case 404:
      return "not_found";
    case 429:
      return "rate_limited";
    default:
      return status >= 500 ? "upstream_server" : "unexpected";
  }
}

/** Caller-facing description of a failed HTTP exchange. */
export function describeHttpFailure(status: number, body: string): string {
  switch (kindForStatus(status)) {
    case "authentication":
      return "GitHub rejected the credential. Check GITHUB_TOKEN.";
    case "authorization":
      return "Access denied. Check the permissions granted to the GitHub token.";
    case "not_found":
      return "Resource not found. Check the owner and repository name.";
    case "rate_limited":
      return "GitHub API rate limit exceeded. Try again later.";
    case "upstream_server":
      return `GitHub API server error (HTTP ${status}).`;
    default: {
      const excerpt = body.trim().slice(0, 200);
      return excerpt.length > 0 ? `GitHub API error (HTTP ${status}): ${excerpt}` : `GitHub API error (HTTP ${status}).`;
    }
  }
}

/**
 * Converts anything thrown inside the access layer into a {@link GithubApiError}.
 * Foreign errors become {@link UnexpectedError} and keep their description.
 */
export function toGithubError(error: unknown): GithubApiError {
  if (error instanceof GithubApiError) {
    return error;
  }
  const description = error instanceof Error ? error.message : String(error);
  return new UnexpectedError(`Unexpected failure: ${description}`, { cause: error });
}
