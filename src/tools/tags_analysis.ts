import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { tagListSchema } from "../github/schemas.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  invokeGithubTool,
  repositoryPath,
  type GithubToolContext,
} from "./shared.js";
import { compareVersions, parseVersion, type ParsedVersion } from "./versions.js";

export const TAGS_ANALYSIS_TOOL_NAME = "analyze_repository_tags" as const;

const TagsAnalysisInputShape = {
  ...RepositoryIdentityShape,
  limit: z.number().optional().describe("Number of tags to inspect (1-100, default 20)."),
} as const;

export const TagsAnalysisInputSchema = RepositoryIdentitySchema.extend({
  limit: z.number().int().min(1).max(100).default(20),
});

export type TagsAnalysisInput = z.infer<typeof TagsAnalysisInputSchema>;

export type TagDigest = {
  name: string;
  commit_sha: string;
  semantic_version: boolean;
  prerelease: boolean;
};

export type TagsAnalysis = {
  owner: string;
  repo: string;
  total_tags: number;
  latest_tag: { name: string; commit_sha: string } | null;
  highest_version: string | null;
  versioning: {
    semantic_tags: number;
    prerelease_tags: number;
    other_tags: number;
  };
  tags: TagDigest[];
};

export async function collectTagsAnalysis(
  context: GithubToolContext,
  input: TagsAnalysisInput,
  sink: ProgressSink = silentSink,
): Promise<TagsAnalysis> {
  const { client, logger } = context;
  client.assertCredential();

  await notifySafely(logger, () => sink.progress(20, 100, "fetching tags"));
  const tags = await client.getJson(
    `${repositoryPath(input.owner, input.repo)}/tags`,
    tagListSchema,
    { per_page: input.limit },
    { sink },
  );
  await notifySafely(logger, () => sink.progress(100, 100));

  let highest: { name: string; version: ParsedVersion } | null = null;
  const digests: TagDigest[] = [];
  for (const tag of tags.slice(0, input.limit)) {
    const version = parseVersion(tag.name);
    if (version && (!highest || compareVersions(version, highest.version) > 0)) {
      highest = { name: tag.name, version };
    }
    digests.push({
      name: tag.name,
      commit_sha: tag.commit.sha,
      semantic_version: version !== null,
      prerelease: version !== null && version.prerelease !== null,
    });
  }

  const [latest] = digests;
  const semantic = digests.filter((tag) => tag.semantic_version).length;
  return {
    owner: input.owner,
    repo: input.repo,
    total_tags: digests.length,
    latest_tag: latest ? { name: latest.name, commit_sha: latest.commit_sha } : null,
    highest_version: highest ? highest.name : null,
    versioning: {
      semantic_tags: semantic,
      prerelease_tags: digests.filter((tag) => tag.prerelease).length,
      other_tags: digests.length - semantic,
    },
    tags: digests,
  };
}

function shortSha(sha: string): string {
  return sha.length > 0 ? sha.slice(0, 7) : "-";
}

export function renderTagsAnalysis(analysis: TagsAnalysis): string {
  const lines = [`Tags: ${analysis.owner}/${analysis.repo}`, ""];
  if (!analysis.latest_tag) {
    lines.push("No tags found.");
    return lines.join("\n");
  }
  const { versioning } = analysis;
  lines.push(
    `Listed: ${analysis.total_tags}`,
    `Latest listed: ${analysis.latest_tag.name} (commit ${shortSha(analysis.latest_tag.commit_sha)})`,
    `Highest version: ${analysis.highest_version ?? "-"}`,
    `Semantic versions: ${versioning.semantic_tags} (${versioning.prerelease_tags} pre-release), other tags: ${versioning.other_tags}`,
    "",
    "Tags:",
    ...analysis.tags.map((tag, index) => `  ${index + 1}. ${tag.name} (commit ${shortSha(tag.commit_sha)})`),
  );
  return lines.join("\n");
}

export function registerTagsAnalysisTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    TAGS_ANALYSIS_TOOL_NAME,
    {
      title: "Tags analysis",
      description: "Lists the tags of a GitHub repository and reports how they follow semantic versioning.",
      inputSchema: TagsAnalysisInputShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        TAGS_ANALYSIS_TOOL_NAME,
        TagsAnalysisInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const analysis = await collectTagsAnalysis(context, parsed, sink);
          return buildToolSuccessResult(renderTagsAnalysis(analysis), analysis, {
            operation: TAGS_ANALYSIS_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
            limit: parsed.limit,
          });
        },
      ),
  );
}
