import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { RepositoryComparator } from "./comparison/aggregator.js";
import type { EnvSource } from "./config/env.js";
import { collectGithubRedactionTokens, loadGithubConfig, type GithubConfig } from "./config/github.js";
import { GithubClient } from "./github/client.js";
import { systemClock, type Clock } from "./github/clock.js";
import { RateBudget } from "./github/rateBudget.js";
import { StructuredLogger } from "./logger.js";
import { registerGithubTools, type ServerProfile } from "./tools/index.js";

export const SERVER_NAME = "repo-scope";
export const SERVER_VERSION = "1.0.0";

export interface RuntimeOptions {
  readonly profile: ServerProfile;
  readonly env?: EnvSource;
  readonly clock?: Clock;
  readonly fetchImpl?: typeof fetch;
  /** Prebuilt logger; otherwise one is created from {@link logFile} and {@link logWrite}. */
  readonly logger?: StructuredLogger;
  readonly logFile?: string | null;
  readonly logWrite?: (line: string) => void;
}

/** Process-wide collaborators of one tool server. */
export interface ServerRuntime {
  readonly profile: ServerProfile;
  readonly config: GithubConfig;
  readonly logger: StructuredLogger;
  readonly clock: Clock;
  /** The single permit source shared by every call issued by this process. */
  readonly budget: RateBudget;
  readonly client: GithubClient;
  readonly comparator: RepositoryComparator;
  readonly server: McpServer;
  readonly tools: readonly string[];
}

/**
 * Wires configuration, logger, clock, rate budget, client and comparator,
 * then registers the tools of {@link RuntimeOptions.profile} on a fresh MCP
 * server.
 */
export function createRuntime(options: RuntimeOptions): ServerRuntime {
  const config = loadGithubConfig(options.env);
  const clock = options.clock ?? systemClock;
  const logger =
    options.logger ??
    new StructuredLogger({
      logFile: options.logFile ?? null,
      redactSecrets: collectGithubRedactionTokens(config),
      server: options.profile,
      ...(options.logWrite ? { write: options.logWrite } : {}),
    });

  const budget = new RateBudget(config.rateLimit, clock);
  const client = new GithubClient({ config, budget, clock, logger, fetchImpl: options.fetchImpl });
  const comparator = new RepositoryComparator({ client, clock, logger });

  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { logging: {}, tools: {} } },
  );
  const tools = registerGithubTools(server, options.profile, { client, comparator, clock, logger });

  if (!config.token) {
    logger.warn("github_token_missing", { hint: "set GITHUB_TOKEN before calling the tools" });
  }
  logger.info("runtime_configured", {
    profile: options.profile,
    tools,
    base_url: config.baseUrl,
    rate_limit: config.rateLimit,
    retry: {
      max_attempts: config.retry.maxAttempts,
      base_delay_ms: config.retry.baseDelayMs,
      statuses: [...config.retry.retriableStatuses],
    },
    timeout_ms: config.timeoutMs,
  });

  return { profile: options.profile, config, logger, clock, budget, client, comparator, server, tools };
}
