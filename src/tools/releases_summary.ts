import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { releaseListSchema } from "../github/schemas.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  formatDay,
  invokeGithubTool,
  repositoryPath,
  type GithubToolContext,
} from "./shared.js";

export const RELEASES_SUMMARY_TOOL_NAME = "get_releases_summary" as const;

const ReleasesSummaryInputShape = {
  ...RepositoryIdentityShape,
  limit: z.number().optional().describe("Number of releases to inspect (1-50, default 10)."),
} as const;

export const ReleasesSummaryInputSchema = RepositoryIdentitySchema.extend({
  limit: z.number().int().min(1).max(50).default(10),
});

export type ReleasesSummaryInput = z.infer<typeof ReleasesSummaryInputSchema>;

export type ReleaseDigest = {
  tag_name: string;
  name: string | null;
  published_at: string | null;
  prerelease: boolean;
  draft: boolean;
};

export type ReleasesSummary = {
  owner: string;
  repo: string;
  total_releases: number;
  latest_release: { tag_name: string; published_at: string | null; prerelease: boolean } | null;
  releases: ReleaseDigest[];
};

export async function collectReleasesSummary(
  context: GithubToolContext,
  input: ReleasesSummaryInput,
  sink: ProgressSink = silentSink,
): Promise<ReleasesSummary> {
  const { client, logger } = context;
  client.assertCredential();

  await notifySafely(logger, () => sink.progress(20, 100, "fetching releases"));
  const releases = await client.getJson(
    `${repositoryPath(input.owner, input.repo)}/releases`,
    releaseListSchema,
    { per_page: input.limit },
    { sink },
  );
  await notifySafely(logger, () => sink.progress(100, 100));

  const digests = releases.slice(0, input.limit).map((release) => ({
    tag_name: release.tag_name,
    name: release.name,
    published_at: release.published_at,
    prerelease: release.prerelease,
    draft: release.draft,
  }));
  const [latest] = digests;
  return {
    owner: input.owner,
    repo: input.repo,
    total_releases: digests.length,
    latest_release: latest
      ? { tag_name: latest.tag_name, published_at: latest.published_at, prerelease: latest.prerelease }
      : null,
    releases: digests,
  };
}

export function renderReleasesSummary(summary: ReleasesSummary): string {
  const lines = [`Releases: ${summary.owner}/${summary.repo}`, ""];
  if (!summary.latest_release) {
    lines.push("No releases published.");
    return lines.join("\n");
  }
  lines.push(
    `Latest: ${summary.latest_release.tag_name} (${formatDay(summary.latest_release.published_at)})`,
    "",
    `Last ${summary.total_releases}:`,
  );
  for (const release of summary.releases) {
    const markers = [release.prerelease ? " (pre-release)" : "", release.draft ? " (draft)" : ""].join("");
    const title = release.name && release.name !== release.tag_name ? ` ${release.name}` : "";
    lines.push(`  - ${release.tag_name}${title}${markers}: ${formatDay(release.published_at)}`);
  }
  return lines.join("\n");
}

export function registerReleasesSummaryTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    RELEASES_SUMMARY_TOOL_NAME,
    {
      title: "Releases summary",
      description: "Summarises the most recent releases of a GitHub repository.",
      inputSchema: ReleasesSummaryInputShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        RELEASES_SUMMARY_TOOL_NAME,
        ReleasesSummaryInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const summary = await collectReleasesSummary(context, parsed, sink);
          return buildToolSuccessResult(renderReleasesSummary(summary), summary, {
            operation: RELEASES_SUMMARY_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
            limit: parsed.limit,
          });
        },
      ),
  );
}
