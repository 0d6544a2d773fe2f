import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { branchDetailSchema, branchListSchema, commitDate, daysSince } from "../github/schemas.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  fetchPages,
  invokeGithubTool,
  repositoryPath,
  type GithubToolContext,
} from "./shared.js";

export const BRANCH_ANALYSIS_TOOL_NAME = "get_branch_analysis" as const;

/** Branches whose head commit is looked up; the listing itself carries no dates. */
export const BRANCH_DETAIL_LIMIT = 20;
const ACTIVE_SHOWN = 10;
const INACTIVE_SHOWN = 5;

const BranchAnalysisInputShape = {
  ...RepositoryIdentityShape,
  days_threshold: z.number().optional().describe("Days since the last commit under which a branch counts as active (1-365, default 90)."),
} as const;

export const BranchAnalysisInputSchema = RepositoryIdentitySchema.extend({
  days_threshold: z.number().int().min(1).max(365).default(90),
});

export type BranchAnalysisInput = z.infer<typeof BranchAnalysisInputSchema>;

export type BranchDigest = {
  name: string;
  protected: boolean;
  last_commit_days_ago: number;
  sha: string;
};

export type BranchAnalysis = {
  owner: string;
  repo: string;
  days_threshold: number;
  total_branches: number;
  active_branches_count: number;
  inactive_branches_count: number;
  /** Branches past {@link BRANCH_DETAIL_LIMIT} or whose head commit date is unknown. */
  unchecked_branches_count: number;
  protected_branches_count: number;
  active_branches: BranchDigest[];
  inactive_branches: BranchDigest[];
  protected_branches: string[];
};

/**
 * Lists every branch, then reads the head commit of the first
 * {@link BRANCH_DETAIL_LIMIT} of them to split them into active and inactive
 * branches around the day threshold.
 */
export async function collectBranchAnalysis(
  context: GithubToolContext,
  input: BranchAnalysisInput,
  sink: ProgressSink = silentSink,
): Promise<BranchAnalysis> {
  const { client, clock, logger } = context;
  const base = repositoryPath(input.owner, input.repo);
  client.assertCredential();

  const branches = await fetchPages(context, `${base}/branches`, branchListSchema, {}, sink, "branches");

  const active: BranchDigest[] = [];
  const inactive: BranchDigest[] = [];
  const inspected = branches.slice(0, BRANCH_DETAIL_LIMIT);
  for (const [index, branch] of inspected.entries()) {
    await notifySafely(logger, () =>
      sink.progress(60 + Math.floor((index * 35) / inspected.length), 100, `inspecting branch ${branch.name}`),
    );
    const detail = await client.getOptionalJson(
      `${base}/branches/${encodeURIComponent(branch.name)}`,
      branchDetailSchema,
      ["not_found"],
      {},
      { sink },
    );
    const age = detail ? daysSince(commitDate(detail.commit), clock.now()) : null;
    if (age === null) {
      continue;
    }
    const digest: BranchDigest = {
      name: branch.name,
      protected: branch.protected,
      last_commit_days_ago: age,
      sha: branch.commit.sha.slice(0, 7),
    };
    (age <= input.days_threshold ? active : inactive).push(digest);
  }

  active.sort((left, right) => left.last_commit_days_ago - right.last_commit_days_ago);
  inactive.sort((left, right) => right.last_commit_days_ago - left.last_commit_days_ago);
  const protectedBranches = branches.filter((branch) => branch.protected).map((branch) => branch.name);

  await notifySafely(logger, () => sink.progress(100, 100));
  return {
    owner: input.owner,
    repo: input.repo,
    days_threshold: input.days_threshold,
    total_branches: branches.length,
    active_branches_count: active.length,
    inactive_branches_count: inactive.length,
    unchecked_branches_count: branches.length - active.length - inactive.length,
    protected_branches_count: protectedBranches.length,
    active_branches: active.slice(0, ACTIVE_SHOWN),
    inactive_branches: inactive.slice(0, INACTIVE_SHOWN),
    protected_branches: protectedBranches,
  };
}

export function renderBranchAnalysis(analysis: BranchAnalysis): string {
  const lines = [
    `Branches: ${analysis.owner}/${analysis.repo}`,
    "",
    `Total: ${analysis.total_branches}`,
    `Active (<= ${analysis.days_threshold} days): ${analysis.active_branches_count}`,
    `Inactive (> ${analysis.days_threshold} days): ${analysis.inactive_branches_count}`,
    `Not checked: ${analysis.unchecked_branches_count}`,
    `Protected: ${analysis.protected_branches_count}`,
  ];
  const describe = (branch: BranchDigest): string =>
    `  - ${branch.name}${branch.protected ? " (protected)" : ""}: last commit ${branch.last_commit_days_ago} days ago`;
  if (analysis.active_branches.length > 0) {
    lines.push("", "Most recently active:", ...analysis.active_branches.map(describe));
  }
  if (analysis.inactive_branches.length > 0) {
    lines.push("", "Longest inactive:", ...analysis.inactive_branches.map(describe));
  }
  return lines.join("\n");
}

export function registerBranchAnalysisTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    BRANCH_ANALYSIS_TOOL_NAME,
    {
      title: "Branch analysis",
      description: "Splits the branches of a GitHub repository into active, inactive and protected branches.",
      inputSchema: BranchAnalysisInputShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        BRANCH_ANALYSIS_TOOL_NAME,
        BranchAnalysisInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const analysis = await collectBranchAnalysis(context, parsed, sink);
          return buildToolSuccessResult(renderBranchAnalysis(analysis), analysis, {
            operation: BRANCH_ANALYSIS_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
            days_threshold: parsed.days_threshold,
          });
        },
      ),
  );
}
