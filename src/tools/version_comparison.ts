import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { refComparisonSchema, releaseListSchema } from "../github/schemas.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  invokeGithubTool,
  repositoryPath,
  type GithubToolContext,
} from "./shared.js";
import {
  classifyVersionChange,
  parseVersion,
  versionDirection,
  type VersionChange,
  type VersionDirection,
} from "./versions.js";

export const VERSION_COMPARISON_TOOL_NAME = "compare_release_versions" as const;

const RELEASES_CONSIDERED = 10;

const VersionComparisonInputShape = {
  ...RepositoryIdentityShape,
  version1: z.string().optional().describe("Newer version (default: latest release)."),
  version2: z.string().optional().describe("Older version (default: the release before the latest)."),
} as const;

export const VersionComparisonInputSchema = RepositoryIdentitySchema.extend({
  version1: z.string().trim().min(1).optional(),
  version2: z.string().trim().min(1).optional(),
});

export type VersionComparisonInput = z.infer<typeof VersionComparisonInputSchema>;

export type RefChanges = {
  status: string;
  ahead_by: number;
  behind_by: number;
  total_commits: number;
  files_changed: number;
};

export type VersionComparison = {
  owner: string;
  repo: string;
  version1: string | null;
  version2: string | null;
  comparison_available: boolean;
  releases_found: number;
  latest_release: string | null;
  /** Change from `version2` to `version1`; null when either name is not a version. */
  change: VersionChange | null;
  direction: VersionDirection | null;
  changes: RefChanges | null;
  recommendation: string | null;
};

const RECOMMENDATIONS: Record<VersionChange, string> = {
  major: "Major version change: review breaking changes before upgrading.",
  minor: "Minor version change: new features, no breaking changes expected.",
  patch: "Patch version change: fixes only, upgrading is low risk.",
  prerelease: "Pre-release change: avoid relying on it in production.",
  none: "Both names designate the same version.",
};

/**
 * Resolves the two versions (defaulting to the two most recent releases),
 * classifies the semantic-version change between them and reads the commit
 * distance through the ref comparison endpoint when both refs exist.
 */
export async function collectVersionComparison(
  context: GithubToolContext,
  input: VersionComparisonInput,
  sink: ProgressSink = silentSink,
): Promise<VersionComparison> {
  const { client, logger } = context;
  const base = repositoryPath(input.owner, input.repo);
  client.assertCredential();

  await notifySafely(logger, () => sink.progress(20, 100, "fetching releases"));
  const releases = await client.getJson(`${base}/releases`, releaseListSchema, { per_page: RELEASES_CONSIDERED }, { sink });

  const version1 = input.version1 ?? releases[0]?.tag_name ?? null;
  const version2 = input.version2 ?? releases[1]?.tag_name ?? null;
  const result: VersionComparison = {
    owner: input.owner,
    repo: input.repo,
    version1,
    version2,
    comparison_available: version1 !== null && version2 !== null,
    releases_found: releases.length,
    latest_release: releases[0]?.tag_name ?? null,
    change: null,
    direction: null,
    changes: null,
    recommendation: null,
  };
  if (version1 === null || version2 === null) {
    await notifySafely(logger, () => sink.progress(100, 100));
    return result;
  }

  const newer = parseVersion(version1);
  const older = parseVersion(version2);
  if (newer && older) {
    const change = classifyVersionChange(older, newer);
    result.change = change;
    result.direction = versionDirection(older, newer);
    result.recommendation = RECOMMENDATIONS[change];
  } else {
    result.recommendation = "Names are not semantic versions: check the changelog between both refs.";
  }

  await notifySafely(logger, () => sink.progress(60, 100, "comparing refs"));
  const comparison = await client.getOptionalJson(
    `${base}/compare/${encodeURIComponent(version2)}...${encodeURIComponent(version1)}`,
    refComparisonSchema,
    ["not_found"],
    {},
    { sink },
  );
  if (comparison) {
    result.changes = {
      status: comparison.status,
      ahead_by: comparison.ahead_by,
      behind_by: comparison.behind_by,
      total_commits: comparison.total_commits,
      files_changed: comparison.files.length,
    };
  } else {
    logger.warn("version_comparison_refs_unavailable", { owner: input.owner, repo: input.repo, version1, version2 });
  }

  await notifySafely(logger, () => sink.progress(100, 100));
  return result;
}

export function renderVersionComparison(comparison: VersionComparison): string {
  const lines = [`Version comparison: ${comparison.owner}/${comparison.repo}`, ""];
  if (comparison.version1 === null || comparison.version2 === null) {
    lines.push("Not enough releases to compare.", `Releases found: ${comparison.releases_found}`);
    if (comparison.latest_release) {
      lines.push(`Latest release: ${comparison.latest_release}`);
    }
    return lines.join("\n");
  }
  lines.push(`${comparison.version2} -> ${comparison.version1}`);
  if (comparison.change && comparison.direction) {
    lines.push(`Change: ${comparison.change} (${comparison.direction})`);
  }
  if (comparison.changes) {
    const { ahead_by, behind_by, files_changed } = comparison.changes;
    lines.push(`Commits: ${ahead_by} ahead, ${behind_by} behind; files changed: ${files_changed}`);
  } else {
    lines.push("Commit comparison unavailable.");
  }
  if (comparison.recommendation) {
    lines.push("", comparison.recommendation);
  }
  return lines.join("\n");
}

export function registerVersionComparisonTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    VERSION_COMPARISON_TOOL_NAME,
    {
      title: "Release version comparison",
      description:
        "Compares two release versions of a GitHub repository (by default the two latest) and classifies the change.",
      inputSchema: VersionComparisonInputShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        VERSION_COMPARISON_TOOL_NAME,
        VersionComparisonInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const comparison = await collectVersionComparison(context, parsed, sink);
          return buildToolSuccessResult(renderVersionComparison(comparison), comparison, {
            operation: VERSION_COMPARISON_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
          });
        },
      ),
  );
}
