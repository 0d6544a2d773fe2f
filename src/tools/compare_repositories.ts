import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { type ComparisonMetric, type ComparisonReport } from "../comparison/aggregator.js";
import { notifySafely } from "../github/notifier.js";
import { buildToolSuccessResult, invokeGithubTool, type GithubToolContext } from "./shared.js";

export const COMPARE_REPOSITORIES_TOOL_NAME = "compare_repositories" as const;

/**
 * Target count and metric names are checked by the comparator so that they
 * surface as validation errors of the comparison rather than schema errors.
 */
const CompareRepositoriesInputShape = {
  repositories: z
    .array(z.object({ owner: z.string(), repo: z.string() }))
    .describe("Between 2 and 5 repositories, each given as { owner, repo }."),
  metrics: z
    .array(z.string())
    .optional()
    .describe("Metrics to compare: open_issues, open_prs, stars, forks, watchers, last_commit_age."),
} as const;

export const CompareRepositoriesInputSchema = z.object(CompareRepositoriesInputShape);

const METRIC_LABELS: Record<ComparisonMetric, string> = {
  open_issues: "Open issues",
  open_prs: "Open pull requests",
  stars: "Stars",
  forks: "Forks",
  watchers: "Watchers",
  last_commit_age: "Last commit age (days)",
};

export function renderComparison(report: ComparisonReport): string {
  const lines = [
    "Repository comparison",
    "",
    `Repositories: ${report.targets.map((slot) => slot.target).join(", ")}`,
    `Compared at: ${report.compared_at}`,
  ];

  for (const metric of report.metrics_compared) {
    const column = report.metrics[metric];
    if (!column || Object.keys(column).length === 0) {
      continue;
    }
    lines.push("", `${METRIC_LABELS[metric]}:`);
    for (const [target, value] of Object.entries(column)) {
      lines.push(`  - ${target}: ${value === null ? "unknown" : value}`);
    }
  }

  const failures = report.targets.filter((slot) => slot.status === "failed");
  if (failures.length > 0) {
    lines.push("", "Unavailable:");
    for (const slot of failures) {
      if (slot.status === "failed") {
        lines.push(`  - ${slot.target}: ${slot.error.message} [${slot.error.code}]`);
      }
    }
  }

  const { most_active, most_popular, most_forked } = report.rankings;
  if (most_active || most_popular || most_forked) {
    lines.push("", "Summary:");
    if (most_active) lines.push(`  Most active: ${most_active}`);
    if (most_popular) lines.push(`  Most popular: ${most_popular}`);
    if (most_forked) lines.push(`  Most forked: ${most_forked}`);
  }
  return lines.join("\n");
}

export function registerCompareRepositoriesTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    COMPARE_REPOSITORIES_TOOL_NAME,
    {
      title: "Compare repositories",
      description:
        "Compares 2 to 5 GitHub repositories in parallel and names the most active, most popular and most forked one. A repository that cannot be read is reported as failed without aborting the comparison.",
      inputSchema: CompareRepositoriesInputShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        COMPARE_REPOSITORIES_TOOL_NAME,
        CompareRepositoriesInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          await notifySafely(context.logger, () => sink.info(`Comparing ${parsed.repositories.length} repositories`));
          const report = await context.comparator.compare(parsed.repositories, parsed.metrics, sink);
          return buildToolSuccessResult(renderComparison(report), report, {
            operation: COMPARE_REPOSITORIES_TOOL_NAME,
            repositories: report.targets.map((slot) => slot.target),
            metrics_compared: report.metrics_compared,
            failed: report.failed,
          });
        },
      ),
  );
}
