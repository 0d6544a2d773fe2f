/**
 * Helpers shared by the GitHub tool modules so every handler returns the same
 * dual-shaped envelope: a human readable text block plus the structured payload
 * and the operation metadata map.
 */
import type { RequestHandlerExtra } from "@modelcontextprotocol/sdk/shared/protocol.js";
import type { CallToolResult, ServerNotification, ServerRequest } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import type { RepositoryComparator } from "../comparison/aggregator.js";
import type { GithubClient, QueryParams } from "../github/client.js";
import type { Clock } from "../github/clock.js";
import { createMcpSink, notifySafely, type ProgressSink } from "../github/notifier.js";
import type { StructuredLogger } from "../logger.js";
import { githubToolError } from "../server/toolErrors.js";

/** Structured payload type surfaced by MCP tool responses. */
type ToolStructuredContent = NonNullable<CallToolResult["structuredContent"]>;

export type RpcExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

/** Collaborators injected into every GitHub tool handler. */
export interface GithubToolContext {
  readonly client: GithubClient;
  readonly comparator: RepositoryComparator;
  readonly clock: Clock;
  readonly logger: StructuredLogger;
}

/** Operation-scoped metadata attached under `_meta`. */
export type ToolMeta = {
  operation: string;
  owner?: string;
  repo?: string;
  [key: string]: unknown;
};

/**
 * Envelope returned by successful handlers. Callers always receive both the
 * text rendering and the structured payload.
 */
export function buildToolSuccessResult<TStructured extends ToolStructuredContent>(
  text: string,
  structured: TStructured,
  meta: ToolMeta,
): CallToolResult & { structuredContent: TStructured } {
  return {
    isError: false,
    content: [{ type: "text", text }],
    structuredContent: structured,
    _meta: meta,
  };
}

/** Builds the `/repos/{owner}/{repo}` prefix with both segments escaped. */
export function repositoryPath(owner: string, repo: string): string {
  return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
}

/** Renders an ISO timestamp as `YYYY-MM-DD`, or a dash when absent. */
export function formatDay(value: string | null): string {
  return value ? value.slice(0, 10) : "-";
}

/** Page size and page cap of every paginated listing walked by the tools. */
export const PAGE_SIZE = 100;
export const MAX_PAGES = 10;

/**
 * Walks a paginated listing page by page and stops after the first short page
 * or after {@link MAX_PAGES} pages.
 */
export async function fetchPages<T>(
  context: GithubToolContext,
  endpoint: string,
  schema: z.ZodType<T[], z.ZodTypeDef, unknown>,
  params: QueryParams,
  sink: ProgressSink,
  label: string,
): Promise<T[]> {
  const items: T[] = [];
  for (let page = 1; page <= MAX_PAGES; page += 1) {
    await notifySafely(context.logger, () => sink.progress(10 + page * 5, 100, `fetching ${label} page ${page}`));
    const batch = await context.client.getJson(endpoint, schema, { ...params, per_page: PAGE_SIZE, page }, { sink });
    items.push(...batch);
    if (batch.length < PAGE_SIZE) {
      break;
    }
  }
  return items;
}

/** Share of {@link part} in {@link total} as a percentage rounded to two decimals. */
export function percentage(part: number, total: number): number {
  return total > 0 ? Math.round((part / total) * 10_000) / 100 : 0;
}

/** Counter entries sorted by descending count; ties keep insertion order. */
export function rankCounts(counts: Iterable<[string, number]>): Array<[string, number]> {
  return [...counts].sort((left, right) => right[1] - left[1]);
}

/** Increments the counter of {@link key}. */
export function tally(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

/** Lenient owner/repo shape advertised to clients; constraints live in the parse schemas. */
export const RepositoryIdentityShape = {
  owner: z.string().describe("Repository owner (user or organisation)."),
  repo: z.string().describe("Repository name."),
} as const;

export const RepositoryIdentitySchema = z.object({
  owner: z.string().trim().min(1, "owner must not be empty"),
  repo: z.string().trim().min(1, "repo must not be empty"),
});

/**
 * Runs one tool invocation: parses the raw arguments, binds a notification
 * sink to the request and converts any thrown failure into the uniform error
 * envelope.
 */
export async function invokeGithubTool<TInput>(
  context: GithubToolContext,
  toolName: string,
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>,
  input: unknown,
  extra: RpcExtra,
  run: (parsed: TInput, sink: ProgressSink) => Promise<CallToolResult>,
): Promise<CallToolResult> {
  const sink = createMcpSink(extra, context.logger);
  try {
    const parsed = schema.parse(input ?? {});
    context.logger.info(`${toolName}_requested`, { request_id: extra.requestId });
    return await run(parsed, sink);
  } catch (error) {
    const response = githubToolError(context.logger, toolName, error, { request_id: extra.requestId });
    await notifySafely(context.logger, () => sink.error(`${toolName} failed: ${response.structuredContent.message}`));
    return response;
  }
}

/** Advisory severities from most to least urgent. */
export const SEVERITY_ORDER = ["critical", "high", "medium", "low", "unknown"] as const;

/**
 * Counts severities in {@link SEVERITY_ORDER}; unlisted values follow in the
 * order they first appear. Absent severities are left out.
 */
export function countBySeverity(severities: Iterable<string>): Record<string, number> {
  const counts = new Map<string, number>();
  for (const severity of SEVERITY_ORDER) {
    counts.set(severity, 0);
  }
  for (const severity of severities) {
    tally(counts, severity);
  }
  return Object.fromEntries([...counts].filter(([, count]) => count > 0));
}
