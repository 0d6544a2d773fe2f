import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { issueListSchema, searchTotalSchema, type IssueListPayload } from "../github/schemas.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  fetchPages,
  formatDay,
  invokeGithubTool,
  repositoryPath,
  type GithubToolContext,
} from "./shared.js";

export const ISSUES_SUMMARY_TOOL_NAME = "get_repository_issues_summary" as const;

const RECENT_ISSUES = 10;
const PRIORITIES = ["critical", "high", "medium", "low"] as const;

export const IssueStateSchema = z.enum(["open", "closed", "all"]);
export type IssueState = z.infer<typeof IssueStateSchema>;

const IssuesSummaryInputShape = {
  ...RepositoryIdentityShape,
  state: z.string().optional().describe("Issue state filter: open, closed or all (default open)."),
  labels: z.array(z.string()).optional().describe("Only count issues carrying every listed label."),
} as const;

export const IssuesSummaryInputSchema = RepositoryIdentitySchema.extend({
  state: IssueStateSchema.default("open"),
  labels: z.array(z.string().trim().min(1)).max(20).optional(),
});

export type IssuesSummaryInput = z.infer<typeof IssuesSummaryInputSchema>;

export type IssueDigest = {
  number: number;
  title: string;
  state: string;
  labels: string[];
  created_at: string | null;
  updated_at: string | null;
  comments_count: number;
  assignees_count: number;
};

export type IssuesSummary = {
  owner: string;
  repo: string;
  state: IssueState;
  labels: string[];
  total_issues: number;
  open_issues: number;
  closed_issues: number;
  fetched_issues: number;
  counts_source: "search" | "fetched";
  issues_by_label: Record<string, number>;
  issues_by_priority: Record<string, number>;
  recent_issues: IssueDigest[];
};

type IssueRecord = IssueListPayload[number];

/**
 * Pages through the issue listing (pull requests excluded), then asks the
 * search API for the repository-wide open and closed totals. When a search
 * call fails the totals fall back to the fetched issues.
 */
export async function collectIssuesSummary(
  context: GithubToolContext,
  input: IssuesSummaryInput,
  sink: ProgressSink = silentSink,
): Promise<IssuesSummary> {
  const { client, logger } = context;
  const { owner, repo, state } = input;
  const labels = input.labels ?? [];
  client.assertCredential();

  const listing = await fetchPages(
    context,
    `${repositoryPath(owner, repo)}/issues`,
    issueListSchema,
    { state, sort: "updated", direction: "desc", labels: labels.length > 0 ? labels.join(",") : undefined },
    sink,
    "issues",
  );
  const issues = listing.filter((issue) => issue.pull_request === undefined);

  await notifySafely(logger, () => sink.progress(70, 100, "counting open and closed issues"));
  const openTotal = await searchIssueCount(context, owner, repo, "open", sink);
  const closedTotal = openTotal === null ? null : await searchIssueCount(context, owner, repo, "closed", sink);

  let open: number;
  let closed: number;
  let source: IssuesSummary["counts_source"];
  if (openTotal !== null && closedTotal !== null) {
    open = openTotal;
    closed = closedTotal;
    source = "search";
  } else {
    logger.warn("issues_summary_search_fallback", { owner, repo });
    open = issues.filter((issue) => issue.state === "open").length;
    closed = issues.filter((issue) => issue.state === "closed").length;
    source = "fetched";
  }

  await notifySafely(logger, () => sink.progress(100, 100));
  return {
    owner,
    repo,
    state,
    labels,
    total_issues: open + closed,
    open_issues: open,
    closed_issues: closed,
    fetched_issues: issues.length,
    counts_source: source,
    issues_by_label: countByLabel(issues),
    issues_by_priority: countByPriority(issues),
    recent_issues: issues.slice(0, RECENT_ISSUES).map(digestIssue),
  };
}

async function searchIssueCount(
  context: GithubToolContext,
  owner: string,
  repo: string,
  state: "open" | "closed",
  sink: ProgressSink,
): Promise<number | null> {
  const outcome = await context.client.execute(
    "GET",
    "/search/issues",
    { q: `repo:${owner}/${repo} type:issue state:${state}`, per_page: 1 },
    { sink },
  );
  if (!outcome.ok) {
    return null;
  }
  const parsed = searchTotalSchema.safeParse(outcome.payload);
  return parsed.success ? parsed.data.total_count : null;
}

function labelNames(issue: IssueRecord): string[] {
  return issue.labels.map((label) => label.name).filter((name) => name.length > 0);
}

export function countByLabel(issues: readonly IssueRecord[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const issue of issues) {
    for (const name of labelNames(issue)) {
      counts[name] = (counts[name] ?? 0) + 1;
    }
  }
  return counts;
}

/** Counts `priority: <level>` labels; an issue contributes to its highest level only. */
export function countByPriority(issues: readonly IssueRecord[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const issue of issues) {
    const names = new Set(labelNames(issue).map((name) => name.toLowerCase()));
    const level = PRIORITIES.find((priority) => names.has(`priority: ${priority}`));
    if (level) {
      counts[level] = (counts[level] ?? 0) + 1;
    }
  }
  return counts;
}

function digestIssue(issue: IssueRecord): IssueDigest {
  return {
    number: issue.number,
    title: issue.title,
    state: issue.state,
    labels: labelNames(issue),
    created_at: issue.created_at,
    updated_at: issue.updated_at,
    comments_count: issue.comments,
    assignees_count: issue.assignees?.length ?? 0,
  };
}

export function renderIssuesSummary(summary: IssuesSummary): string {
  const lines = [
    `Issues summary: ${summary.owner}/${summary.repo} (state: ${summary.state})`,
    "",
    `Total: ${summary.total_issues} (open ${summary.open_issues}, closed ${summary.closed_issues})`,
  ];
  const labels = Object.entries(summary.issues_by_label).sort((a, b) => b[1] - a[1]);
  if (labels.length > 0) {
    lines.push("", "By label:", ...labels.map(([label, count]) => `  - ${label}: ${count}`));
  }
  const priorities = PRIORITIES.filter((priority) => summary.issues_by_priority[priority] !== undefined);
  if (priorities.length > 0) {
    lines.push(
      "",
      "By priority:",
      ...priorities.map((priority) => `  - ${priority}: ${summary.issues_by_priority[priority]}`),
    );
  }
  if (summary.recent_issues.length > 0) {
    lines.push(
      "",
      "Recently updated:",
      ...summary.recent_issues.map(
        (issue) => `  - #${issue.number} ${issue.title} [${issue.state}] updated ${formatDay(issue.updated_at)}`,
      ),
    );
  }
  return lines.join("\n");
}

export function registerIssuesSummaryTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    ISSUES_SUMMARY_TOOL_NAME,
    {
      title: "Issues summary",
      description:
        "Summarises the issues of a GitHub repository: open and closed totals, counts per label and priority, and the most recently updated issues.",
      inputSchema: IssuesSummaryInputShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        ISSUES_SUMMARY_TOOL_NAME,
        IssuesSummaryInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const summary = await collectIssuesSummary(context, parsed, sink);
          return buildToolSuccessResult(renderIssuesSummary(summary), summary, {
            operation: ISSUES_SUMMARY_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
            state: parsed.state,
            counts_source: summary.counts_source,
          });
        },
      ),
  );
}
