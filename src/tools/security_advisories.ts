import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { repositorySchema, securityAdvisoryListSchema } from "../github/schemas.js";
import { findRootFile, listRootEntries } from "./repository_files.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  countBySeverity,
  invokeGithubTool,
  repositoryPath,
  type GithubToolContext,
} from "./shared.js";

export const SECURITY_ADVISORIES_TOOL_NAME = "check_security_advisories" as const;

const ADVISORIES_SHOWN = 10;

export const SecurityAdvisoriesInputSchema = RepositoryIdentitySchema;

export type AdvisoryDigest = {
  ghsa_id: string;
  cve_id: string | null;
  severity: string;
  summary: string;
  state: string;
  published_at: string | null;
};

export type SecurityAdvisoryReport = {
  owner: string;
  repo: string;
  security_status: {
    private: boolean;
    archived: boolean;
    security_policy: "present" | "missing";
  };
  /** False when the advisories listing is hidden from the configured token. */
  advisories_available: boolean;
  total_advisories: number;
  advisories_by_severity: Record<string, number>;
  advisories: AdvisoryDigest[];
  recommendations: string[];
};

export async function collectSecurityAdvisories(
  context: GithubToolContext,
  input: { owner: string; repo: string },
  sink: ProgressSink = silentSink,
): Promise<SecurityAdvisoryReport> {
  const { client, logger } = context;
  client.assertCredential();
  const base = repositoryPath(input.owner, input.repo);

  await notifySafely(logger, () => sink.progress(10, 100, "fetching repository"));
  const repository = await client.getJson(base, repositorySchema, {}, { sink });
  await notifySafely(logger, () => sink.progress(40, 100, "looking for a security policy"));
  const entries = await listRootEntries(context, input.owner, input.repo, sink);
  const hasPolicy = findRootFile(entries, "SECURITY.md") !== undefined;

  await notifySafely(logger, () => sink.progress(70, 100, "fetching security advisories"));
  const advisories = await client.getOptionalJson(
    `${base}/security-advisories`,
    securityAdvisoryListSchema,
    ["authorization", "not_found"],
    { per_page: 100 },
    { sink },
  );
  const listed = advisories ?? [];

  const recommendations: string[] = [];
  if (!hasPolicy) {
    recommendations.push("Add a SECURITY.md file describing how to report vulnerabilities.");
  }
  if (repository.archived) {
    recommendations.push("The repository is archived and no longer receives security fixes.");
  }
  const urgent = listed.filter((advisory) => advisory.severity === "critical" || advisory.severity === "high").length;
  if (urgent > 0) {
    recommendations.push(`Review the ${urgent} critical or high severity advisories.`);
  }
  if (recommendations.length === 0) {
    recommendations.push("No security concerns detected.");
  }

  await notifySafely(logger, () => sink.progress(100, 100));
  return {
    owner: input.owner,
    repo: input.repo,
    security_status: {
      private: repository.private,
      archived: repository.archived,
      security_policy: hasPolicy ? "present" : "missing",
    },
    advisories_available: advisories !== null,
    total_advisories: listed.length,
    advisories_by_severity: countBySeverity(listed.map((advisory) => advisory.severity)),
    advisories: listed.slice(0, ADVISORIES_SHOWN).map((advisory) => ({
      ghsa_id: advisory.ghsa_id,
      cve_id: advisory.cve_id,
      severity: advisory.severity,
      summary: advisory.summary,
      state: advisory.state,
      published_at: advisory.published_at,
    })),
    recommendations,
  };
}

export function renderSecurityAdvisories(report: SecurityAdvisoryReport): string {
  const status = report.security_status;
  const lines = [
    `Security advisories: ${report.owner}/${report.repo}`,
    "",
    `Visibility: ${status.private ? "private" : "public"}${status.archived ? ", archived" : ""}`,
    `Security policy: ${status.security_policy}`,
  ];
  if (!report.advisories_available) {
    lines.push("Advisories: not visible to the configured token");
  } else {
    const bySeverity = Object.entries(report.advisories_by_severity)
      .map(([severity, count]) => `${severity} ${count}`)
      .join(", ");
    lines.push(`Advisories: ${report.total_advisories}${bySeverity ? ` (${bySeverity})` : ""}`);
    for (const advisory of report.advisories) {
      lines.push(`  - ${advisory.ghsa_id} [${advisory.severity}] ${advisory.summary}`);
    }
  }
  lines.push("", "Recommendations:", ...report.recommendations.map((line) => `  - ${line}`));
  return lines.join("\n");
}

export function registerSecurityAdvisoriesTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    SECURITY_ADVISORIES_TOOL_NAME,
    {
      title: "Security advisories",
      description: "Reports the security policy and published security advisories of a GitHub repository.",
      inputSchema: RepositoryIdentityShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        SECURITY_ADVISORIES_TOOL_NAME,
        SecurityAdvisoriesInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const report = await collectSecurityAdvisories(context, parsed, sink);
          return buildToolSuccessResult(renderSecurityAdvisories(report), report, {
            operation: SECURITY_ADVISORIES_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
          });
        },
      ),
  );
}
