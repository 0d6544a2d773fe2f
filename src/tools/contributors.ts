import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { contributorListSchema } from "../github/schemas.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  invokeGithubTool,
  repositoryPath,
  type GithubToolContext,
} from "./shared.js";

export const CONTRIBUTORS_TOOL_NAME = "get_repository_contributors" as const;

const ContributorsInputShape = {
  ...RepositoryIdentityShape,
  top_n: z.number().optional().describe("Number of contributors to return (1-100, default 10)."),
} as const;

export const ContributorsInputSchema = RepositoryIdentitySchema.extend({
  top_n: z.number().int().min(1).max(100).default(10),
});

export type ContributorsInput = z.infer<typeof ContributorsInputSchema>;

export type ContributorDigest = {
  login: string;
  contributions: number;
  avatar_url: string;
  type: string;
  site_admin: boolean;
};

export type ContributorsSummary = {
  owner: string;
  repo: string;
  total_contributors: number;
  top_contributors: ContributorDigest[];
};

export async function collectContributors(
  context: GithubToolContext,
  input: ContributorsInput,
  sink: ProgressSink = silentSink,
): Promise<ContributorsSummary> {
  const { client, logger } = context;
  client.assertCredential();

  await notifySafely(logger, () => sink.progress(20, 100, "fetching contributors"));
  const contributors = await client.getJson(
    `${repositoryPath(input.owner, input.repo)}/contributors`,
    contributorListSchema,
    { per_page: input.top_n, anon: "false" },
    { sink },
  );
  await notifySafely(logger, () => sink.progress(100, 100));

  return {
    owner: input.owner,
    repo: input.repo,
    total_contributors: contributors.length,
    top_contributors: contributors.slice(0, input.top_n).map((contributor) => ({
      login: contributor.login,
      contributions: contributor.contributions,
      avatar_url: contributor.avatar_url,
      type: contributor.type,
      site_admin: contributor.site_admin,
    })),
  };
}

export function renderContributors(summary: ContributorsSummary): string {
  const lines = [`Top contributors: ${summary.owner}/${summary.repo}`, ""];
  if (summary.top_contributors.length === 0) {
    lines.push("No contributors found.");
    return lines.join("\n");
  }
  summary.top_contributors.forEach((contributor, index) => {
    const suffix = contributor.type === "User" ? "" : ` (${contributor.type})`;
    lines.push(`${index + 1}. ${contributor.login}${suffix}: ${contributor.contributions} contributions`);
  });
  return lines.join("\n");
}

export function registerContributorsTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    CONTRIBUTORS_TOOL_NAME,
    {
      title: "Repository contributors",
      description: "Lists the top contributors of a GitHub repository ranked by contribution count.",
      inputSchema: ContributorsInputShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        CONTRIBUTORS_TOOL_NAME,
        ContributorsInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const summary = await collectContributors(context, parsed, sink);
          return buildToolSuccessResult(renderContributors(summary), summary, {
            operation: CONTRIBUTORS_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
            top_n: parsed.top_n,
          });
        },
      ),
  );
}
