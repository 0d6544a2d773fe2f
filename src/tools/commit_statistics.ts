import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { ValidationError } from "../github/errors.js";
import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { DAY_MS, commitDate, commitListSchema, parseGithubTimestamp } from "../github/schemas.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  fetchPages,
  formatDay,
  invokeGithubTool,
  percentage,
  rankCounts,
  repositoryPath,
  tally,
  type GithubToolContext,
} from "./shared.js";

export const COMMIT_STATISTICS_TOOL_NAME = "get_commit_statistics" as const;

const TOP_AUTHORS = 10;

/** Monday first, matching ISO weeks. */
export const WEEKDAYS = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday"] as const;

export type Weekday = (typeof WEEKDAYS)[number];

const CommitStatisticsInputShape = {
  ...RepositoryIdentityShape,
  since: z.string().optional().describe("Start of the period: YYYY-MM-DD, an ISO timestamp or 'N days ago' (default '30 days ago')."),
  until: z.string().optional().describe("End of the period: YYYY-MM-DD, an ISO timestamp or 'now' (default 'now')."),
} as const;

export const CommitStatisticsInputSchema = RepositoryIdentitySchema.extend({
  since: z.string().trim().min(1).default("30 days ago"),
  until: z.string().trim().min(1).default("now"),
});

export type CommitStatisticsInput = z.infer<typeof CommitStatisticsInputSchema>;

export type AuthorShare = {
  name: string;
  commits: number;
  percentage: number;
};

export type CommitStatistics = {
  owner: string;
  repo: string;
  period: { since: string; until: string };
  total_commits: number;
  unique_authors: number;
  top_authors: AuthorShare[];
  activity_by_weekday: Record<Weekday, number>;
  busiest_weekday: Weekday | null;
};

const DAYS_AGO = /^(\d+)\s+days?\s+ago$/i;

/**
 * Resolves a period bound against {@link now}. Accepts `now`, `N days ago`,
 * a calendar day (read as UTC midnight) or any ISO timestamp.
 */
export function resolvePeriodBound(value: string, now: number, field: "since" | "until"): Date {
  const trimmed = value.trim();
  if (trimmed.toLowerCase() === "now") {
    return new Date(now);
  }
  const relative = DAYS_AGO.exec(trimmed);
  if (relative) {
    return new Date(now - Number(relative[1]) * DAY_MS);
  }
  const parsed = parseGithubTimestamp(trimmed);
  if (!parsed) {
    throw new ValidationError(`${field} must be YYYY-MM-DD, an ISO timestamp, 'N days ago' or 'now' (received "${value}").`, {
      details: { field, value },
    });
  }
  return parsed;
}

function weekdayOf(date: Date): Weekday {
  // getUTCDay() counts from Sunday.
  return WEEKDAYS[(date.getUTCDay() + 6) % 7];
}

export async function collectCommitStatistics(
  context: GithubToolContext,
  input: CommitStatisticsInput,
  sink: ProgressSink = silentSink,
): Promise<CommitStatistics> {
  const { client, clock, logger } = context;
  const now = clock.now();
  const since = resolvePeriodBound(input.since, now, "since");
  const until = resolvePeriodBound(input.until, now, "until");
  if (since.getTime() > until.getTime()) {
    throw new ValidationError("since must not be later than until.", {
      details: { since: since.toISOString(), until: until.toISOString() },
    });
  }
  client.assertCredential();

  const commits = await fetchPages(
    context,
    `${repositoryPath(input.owner, input.repo)}/commits`,
    commitListSchema,
    { since: since.toISOString(), until: until.toISOString() },
    sink,
    "commits",
  );
  await notifySafely(logger, () => sink.progress(90, 100, "aggregating commits"));

  const authors = new Map<string, number>();
  const weekdays: Record<Weekday, number> = {
    Monday: 0,
    Tuesday: 0,
    Wednesday: 0,
    Thursday: 0,
    Friday: 0,
    Saturday: 0,
    Sunday: 0,
  };
  for (const commit of commits) {
    tally(authors, commit.commit.author?.name ?? "Unknown");
    const date = commitDate(commit);
    if (date) {
      weekdays[weekdayOf(date)] += 1;
    }
  }

  const busiest = WEEKDAYS.reduce<Weekday | null>(
    (best, day) => (weekdays[day] > 0 && (best === null || weekdays[day] > weekdays[best]) ? day : best),
    null,
  );

  await notifySafely(logger, () => sink.progress(100, 100));
  return {
    owner: input.owner,
    repo: input.repo,
    period: { since: since.toISOString(), until: until.toISOString() },
    total_commits: commits.length,
    unique_authors: authors.size,
    top_authors: rankCounts(authors)
      .slice(0, TOP_AUTHORS)
      .map(([name, count]) => ({ name, commits: count, percentage: percentage(count, commits.length) })),
    activity_by_weekday: weekdays,
    busiest_weekday: busiest,
  };
}

export function renderCommitStatistics(statistics: CommitStatistics): string {
  const lines = [
    `Commit statistics: ${statistics.owner}/${statistics.repo}`,
    `Period: ${formatDay(statistics.period.since)} to ${formatDay(statistics.period.until)}`,
    "",
    `Commits: ${statistics.total_commits}`,
    `Authors: ${statistics.unique_authors}`,
  ];
  if (statistics.total_commits === 0) {
    lines.push("", "No commits in this period.");
    return lines.join("\n");
  }
  lines.push(
    "",
    "Top authors:",
    ...statistics.top_authors.map(
      (author, index) => `  ${index + 1}. ${author.name}: ${author.commits} commits (${author.percentage}%)`,
    ),
    "",
    "By weekday:",
    ...rankCounts(Object.entries(statistics.activity_by_weekday)).map(([day, count]) => `  - ${day}: ${count}`),
  );
  return lines.join("\n");
}

export function registerCommitStatisticsTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    COMMIT_STATISTICS_TOOL_NAME,
    {
      title: "Commit statistics",
      description: "Counts the commits of a GitHub repository over a period by author and by weekday.",
      inputSchema: CommitStatisticsInputShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        COMMIT_STATISTICS_TOOL_NAME,
        CommitStatisticsInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const statistics = await collectCommitStatistics(context, parsed, sink);
          return buildToolSuccessResult(renderCommitStatistics(statistics), statistics, {
            operation: COMMIT_STATISTICS_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
            since: parsed.since,
            until: parsed.until,
          });
        },
      ),
  );
}
