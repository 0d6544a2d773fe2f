import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import {
  commitListSchema,
  daysSince,
  latestCommitDate,
  repositorySchema,
  searchTotalSchema,
} from "../github/schemas.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  formatDay,
  invokeGithubTool,
  repositoryPath,
  type GithubToolContext,
} from "./shared.js";

export const REPOSITORY_HEALTH_TOOL_NAME = "get_repository_health" as const;

export type RepositoryHealth = {
  owner: string;
  repo: string;
  open_issues_count: number;
  open_prs_count: number;
  stars_count: number;
  forks_count: number;
  watchers_count: number;
  last_commit_date: string | null;
  last_commit_age_days: number | null;
  is_archived: boolean;
  is_disabled: boolean;
  default_branch: string;
  language: string | null;
  created_at: string | null;
  updated_at: string | null;
  pushed_at: string | null;
};

/**
 * Metadata, open pull request count and latest commit of one repository. Only
 * the metadata call is mandatory; the two others degrade to `0` and `null`.
 */
export async function collectRepositoryHealth(
  context: GithubToolContext,
  owner: string,
  repo: string,
  sink: ProgressSink = silentSink,
): Promise<RepositoryHealth> {
  const { client, clock, logger } = context;
  client.assertCredential();
  const base = repositoryPath(owner, repo);

  await notifySafely(logger, () => sink.progress(10, 100, "fetching repository metadata"));
  const repository = await client.getJson(base, repositorySchema, {}, { sink });

  await notifySafely(logger, () => sink.progress(40, 100, "counting open pull requests"));
  let openPrs = 0;
  const search = await client.execute(
    "GET",
    "/search/issues",
    { q: `repo:${owner}/${repo} type:pr state:open`, per_page: 1 },
    { sink },
  );
  const searchTotal = search.ok ? searchTotalSchema.safeParse(search.payload) : null;
  if (searchTotal?.success) {
    openPrs = searchTotal.data.total_count;
  } else {
    logger.debug("repository_health_pr_count_unavailable", { owner, repo });
  }

  await notifySafely(logger, () => sink.progress(70, 100, "reading the latest commit"));
  const commits = await client.execute("GET", `${base}/commits`, { per_page: 1 }, { sink });
  const commitList = commits.ok ? commitListSchema.safeParse(commits.payload) : null;
  const lastCommit = commitList?.success ? latestCommitDate(commitList.data) : null;

  await notifySafely(logger, () => sink.progress(100, 100));
  return {
    owner,
    repo,
    open_issues_count: Math.max(0, repository.open_issues_count - openPrs),
    open_prs_count: openPrs,
    stars_count: repository.stargazers_count,
    forks_count: repository.forks_count,
    watchers_count: repository.watchers_count,
    last_commit_date: lastCommit ? lastCommit.toISOString() : null,
    last_commit_age_days: daysSince(lastCommit, clock.now()),
    is_archived: repository.archived,
    is_disabled: repository.disabled,
    default_branch: repository.default_branch,
    language: repository.language,
    created_at: repository.created_at,
    updated_at: repository.updated_at,
    pushed_at: repository.pushed_at,
  };
}

export function renderRepositoryHealth(health: RepositoryHealth): string {
  const activity =
    health.last_commit_age_days === null
      ? "unknown"
      : `${formatDay(health.last_commit_date)} (${health.last_commit_age_days} days ago)`;
  const flags = [health.is_archived ? "archived" : null, health.is_disabled ? "disabled" : null].filter(
    (flag): flag is string => flag !== null,
  );
  return [
    `Repository health: ${health.owner}/${health.repo}`,
    "",
    `Open issues: ${health.open_issues_count}`,
    `Open pull requests: ${health.open_prs_count}`,
    `Stars: ${health.stars_count}`,
    `Forks: ${health.forks_count}`,
    `Watchers: ${health.watchers_count}`,
    `Last commit: ${activity}`,
    `Default branch: ${health.default_branch}`,
    `Language: ${health.language ?? "-"}`,
    `Created: ${formatDay(health.created_at)}`,
    `Status: ${flags.length > 0 ? flags.join(", ") : "active"}`,
  ].join("\n");
}

export function registerRepositoryHealthTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    REPOSITORY_HEALTH_TOOL_NAME,
    {
      title: "Repository health",
      description:
        "Summarises the health of a GitHub repository: open issues and pull requests, stars, forks, watchers and the age of the latest commit.",
      inputSchema: RepositoryIdentityShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        REPOSITORY_HEALTH_TOOL_NAME,
        RepositoryIdentitySchema,
        input,
        extra,
        async ({ owner, repo }, sink): Promise<CallToolResult> => {
          const health = await collectRepositoryHealth(context, owner, repo, sink);
          return buildToolSuccessResult(renderRepositoryHealth(health), health, {
            operation: REPOSITORY_HEALTH_TOOL_NAME,
            owner,
            repo,
          });
        },
      ),
  );
}
