import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { repositorySchema, type ContentEntry } from "../github/schemas.js";
import { listRootEntries } from "./repository_files.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  invokeGithubTool,
  percentage,
  repositoryPath,
  type GithubToolContext,
} from "./shared.js";

export const COMPLIANCE_CHECK_TOOL_NAME = "check_repository_compliance" as const;

/** Community files a compliant repository carries at its root. */
export const COMPLIANCE_FILES = ["LICENSE", "README", "CONTRIBUTING", "CODE_OF_CONDUCT", "SECURITY"] as const;

export type ComplianceFile = (typeof COMPLIANCE_FILES)[number];

export const ComplianceCheckInputSchema = RepositoryIdentitySchema;

export type ComplianceReport = {
  owner: string;
  repo: string;
  compliance_score: number;
  max_score: number;
  percentage: number;
  /** Root file matched for each community file found. */
  found_files: Partial<Record<ComplianceFile, string>>;
  missing_files: ComplianceFile[];
  settings: {
    license: string | null;
    has_description: boolean;
    has_issues: boolean;
    archived: boolean;
  };
  recommendations: string[];
};

/** Root file whose name before the first dot is {@link wanted}, compared case-insensitively. */
export function matchCommunityFile(entries: readonly ContentEntry[], wanted: ComplianceFile): string | undefined {
  return entries.find((entry) => {
    if (entry.type !== "file") {
      return false;
    }
    const dot = entry.name.indexOf(".");
    const stem = dot === -1 ? entry.name : entry.name.slice(0, dot);
    return stem.toUpperCase() === wanted;
  })?.name;
}

export async function collectComplianceReport(
  context: GithubToolContext,
  input: { owner: string; repo: string },
  sink: ProgressSink = silentSink,
): Promise<ComplianceReport> {
  const { client, logger } = context;
  client.assertCredential();

  await notifySafely(logger, () => sink.progress(20, 100, "fetching repository settings"));
  const repository = await client.getJson(repositoryPath(input.owner, input.repo), repositorySchema, {}, { sink });
  await notifySafely(logger, () => sink.progress(60, 100, "looking for community files"));
  const entries = await listRootEntries(context, input.owner, input.repo, sink);

  const found: Partial<Record<ComplianceFile, string>> = {};
  const missing: ComplianceFile[] = [];
  for (const wanted of COMPLIANCE_FILES) {
    const name = matchCommunityFile(entries, wanted);
    if (name) {
      found[wanted] = name;
    } else {
      missing.push(wanted);
    }
  }

  const score = COMPLIANCE_FILES.length - missing.length;
  const recommendations = missing.map((file) => `Add a ${file} file.`);
  const description = repository.description?.trim() ?? "";
  if (description.length === 0) {
    recommendations.push("Add a repository description.");
  }

  await notifySafely(logger, () => sink.progress(100, 100));
  return {
    owner: input.owner,
    repo: input.repo,
    compliance_score: score,
    max_score: COMPLIANCE_FILES.length,
    percentage: percentage(score, COMPLIANCE_FILES.length),
    found_files: found,
    missing_files: missing,
    settings: {
      license: repository.license?.spdx_id ?? null,
      has_description: description.length > 0,
      has_issues: repository.has_issues,
      archived: repository.archived,
    },
    recommendations,
  };
}

export function renderComplianceReport(report: ComplianceReport): string {
  const lines = [
    `Compliance: ${report.owner}/${report.repo}`,
    "",
    `Score: ${report.compliance_score}/${report.max_score} (${report.percentage}%)`,
  ];
  for (const file of COMPLIANCE_FILES) {
    const name = report.found_files[file];
    lines.push(`  ${name ? "[x]" : "[ ]"} ${file}${name ? ` (${name})` : ""}`);
  }
  lines.push(
    "",
    `License: ${report.settings.license ?? "none detected"}`,
    `Description: ${report.settings.has_description ? "yes" : "no"}`,
    `Issues enabled: ${report.settings.has_issues ? "yes" : "no"}`,
    `Archived: ${report.settings.archived ? "yes" : "no"}`,
  );
  if (report.recommendations.length > 0) {
    lines.push("", "Recommendations:", ...report.recommendations.map((line) => `  - ${line}`));
  }
  return lines.join("\n");
}

export function registerComplianceCheckTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    COMPLIANCE_CHECK_TOOL_NAME,
    {
      title: "Compliance check",
      description: "Checks a GitHub repository for its community files (license, readme, contributing guide, code of conduct, security policy).",
      inputSchema: RepositoryIdentityShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        COMPLIANCE_CHECK_TOOL_NAME,
        ComplianceCheckInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const report = await collectComplianceReport(context, parsed, sink);
          return buildToolSuccessResult(renderComplianceReport(report), report, {
            operation: COMPLIANCE_CHECK_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
          });
        },
      ),
  );
}
