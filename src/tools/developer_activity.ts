import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { commitListSchema } from "../github/schemas.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  fetchPages,
  invokeGithubTool,
  percentage,
  repositoryPath,
  type GithubToolContext,
} from "./shared.js";

export const DEVELOPER_ACTIVITY_TOOL_NAME = "get_developer_activity" as const;

const DeveloperActivityInputShape = {
  ...RepositoryIdentityShape,
  top_n: z.number().optional().describe("Number of developers to return (1-50, default 10)."),
} as const;

export const DeveloperActivityInputSchema = RepositoryIdentitySchema.extend({
  top_n: z.number().int().min(1).max(50).default(10),
});

export type DeveloperActivityInput = z.infer<typeof DeveloperActivityInputSchema>;

export type DeveloperDigest = {
  login: string;
  name: string;
  commits: number;
  percentage: number;
};

export type DeveloperActivity = {
  owner: string;
  repo: string;
  total_commits: number;
  /** Commits whose author email maps to no GitHub account are left out of the ranking. */
  unattributed_commits: number;
  unique_developers: number;
  top_developers: DeveloperDigest[];
};

export async function collectDeveloperActivity(
  context: GithubToolContext,
  input: DeveloperActivityInput,
  sink: ProgressSink = silentSink,
): Promise<DeveloperActivity> {
  const { client, logger } = context;
  client.assertCredential();

  const commits = await fetchPages(
    context,
    `${repositoryPath(input.owner, input.repo)}/commits`,
    commitListSchema,
    {},
    sink,
    "commits",
  );

  const developers = new Map<string, { name: string; commits: number }>();
  let unattributed = 0;
  for (const commit of commits) {
    const login = commit.author?.login;
    if (!login) {
      unattributed += 1;
      continue;
    }
    const entry = developers.get(login) ?? { name: commit.commit.author?.name ?? login, commits: 0 };
    entry.commits += 1;
    developers.set(login, entry);
  }

  await notifySafely(logger, () => sink.progress(100, 100));
  const ranked = [...developers.entries()].sort((left, right) => right[1].commits - left[1].commits);
  return {
    owner: input.owner,
    repo: input.repo,
    total_commits: commits.length,
    unattributed_commits: unattributed,
    unique_developers: developers.size,
    top_developers: ranked.slice(0, input.top_n).map(([login, entry]) => ({
      login,
      name: entry.name,
      commits: entry.commits,
      percentage: percentage(entry.commits, commits.length),
    })),
  };
}

export function renderDeveloperActivity(activity: DeveloperActivity): string {
  const lines = [
    `Developer activity: ${activity.owner}/${activity.repo}`,
    "",
    `Commits analysed: ${activity.total_commits}`,
    `Developers: ${activity.unique_developers}`,
  ];
  if (activity.top_developers.length === 0) {
    lines.push("", "No commits attributed to GitHub accounts.");
    return lines.join("\n");
  }
  lines.push(
    "",
    `Top ${activity.top_developers.length}:`,
    ...activity.top_developers.map(
      (developer, index) =>
        `  ${index + 1}. ${developer.name} (@${developer.login}): ${developer.commits} commits (${developer.percentage}%)`,
    ),
  );
  return lines.join("\n");
}

export function registerDeveloperActivityTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    DEVELOPER_ACTIVITY_TOOL_NAME,
    {
      title: "Developer activity",
      description: "Ranks the developers of a GitHub repository by the commits of its recent history.",
      inputSchema: DeveloperActivityInputShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        DEVELOPER_ACTIVITY_TOOL_NAME,
        DeveloperActivityInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const activity = await collectDeveloperActivity(context, parsed, sink);
          return buildToolSuccessResult(renderDeveloperActivity(activity), activity, {
            operation: DEVELOPER_ACTIVITY_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
            top_n: parsed.top_n,
          });
        },
      ),
  );
}
