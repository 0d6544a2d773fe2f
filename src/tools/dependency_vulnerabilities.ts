import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { dependabotAlertListSchema } from "../github/schemas.js";
import { DEPENDENCY_MANIFESTS, findRootFile, listRootEntries } from "./repository_files.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  SEVERITY_ORDER,
  buildToolSuccessResult,
  countBySeverity,
  invokeGithubTool,
  repositoryPath,
  type GithubToolContext,
} from "./shared.js";

export const DEPENDENCY_VULNERABILITIES_TOOL_NAME = "analyze_dependency_vulnerabilities" as const;

const ALERTS_SHOWN = 10;

export const DependencyVulnerabilitiesInputSchema = RepositoryIdentitySchema;

export type AlertDigest = {
  number: number;
  package: string;
  ecosystem: string;
  severity: string;
  summary: string;
  manifest_path: string | null;
};

export type DependencyVulnerabilityReport = {
  owner: string;
  repo: string;
  dependency_files: string[];
  /** False when Dependabot alerts are disabled or hidden from the configured token. */
  alerts_available: boolean;
  open_alerts: number;
  alerts_by_severity: Record<string, number>;
  alerts: AlertDigest[];
  recommendations: string[];
};

function severityRank(severity: string): number {
  const index = SEVERITY_ORDER.findIndex((known) => known === severity);
  return index === -1 ? SEVERITY_ORDER.length : index;
}

export async function collectDependencyVulnerabilities(
  context: GithubToolContext,
  input: { owner: string; repo: string },
  sink: ProgressSink = silentSink,
): Promise<DependencyVulnerabilityReport> {
  const { client, logger } = context;
  client.assertCredential();

  await notifySafely(logger, () => sink.progress(20, 100, "listing dependency manifests"));
  const entries = await listRootEntries(context, input.owner, input.repo, sink);
  const files = DEPENDENCY_MANIFESTS.flatMap((manifest) => {
    const entry = findRootFile(entries, manifest);
    return entry ? [entry.name] : [];
  });

  await notifySafely(logger, () => sink.progress(60, 100, "fetching Dependabot alerts"));
  const alerts = await client.getOptionalJson(
    `${repositoryPath(input.owner, input.repo)}/dependabot/alerts`,
    dependabotAlertListSchema,
    ["authorization", "not_found"],
    { state: "open", per_page: 100 },
    { sink },
  );
  const open = (alerts ?? []).filter((alert) => alert.state === "open");
  const ranked = [...open].sort(
    (left, right) => severityRank(left.security_advisory.severity) - severityRank(right.security_advisory.severity),
  );

  const recommendations: string[] = [];
  if (open.length > 0) {
    recommendations.push(`Resolve the ${open.length} open Dependabot alerts, starting with the most severe.`);
  }
  if (alerts === null && files.length > 0) {
    recommendations.push("Enable Dependabot alerts to track known vulnerabilities.");
  }
  if (files.length > 0) {
    recommendations.push("Keep dependencies up to date.");
  }

  await notifySafely(logger, () => sink.progress(100, 100));
  return {
    owner: input.owner,
    repo: input.repo,
    dependency_files: files,
    alerts_available: alerts !== null,
    open_alerts: open.length,
    alerts_by_severity: countBySeverity(open.map((alert) => alert.security_advisory.severity)),
    alerts: ranked.slice(0, ALERTS_SHOWN).map((alert) => ({
      number: alert.number,
      package: alert.dependency.package.name,
      ecosystem: alert.dependency.package.ecosystem,
      severity: alert.security_advisory.severity,
      summary: alert.security_advisory.summary,
      manifest_path: alert.dependency.manifest_path,
    })),
    recommendations,
  };
}

export function renderDependencyVulnerabilities(report: DependencyVulnerabilityReport): string {
  const lines = [
    `Dependency vulnerabilities: ${report.owner}/${report.repo}`,
    "",
    `Manifests: ${report.dependency_files.length > 0 ? report.dependency_files.join(", ") : "none found"}`,
  ];
  if (!report.alerts_available) {
    lines.push("Dependabot alerts: unavailable (disabled or not visible to the configured token)");
  } else {
    lines.push(`Open Dependabot alerts: ${report.open_alerts}`);
    for (const alert of report.alerts) {
      lines.push(`  - #${alert.number} ${alert.package} (${alert.ecosystem}) [${alert.severity}] ${alert.summary}`);
    }
  }
  if (report.recommendations.length > 0) {
    lines.push("", "Recommendations:", ...report.recommendations.map((line) => `  - ${line}`));
  }
  return lines.join("\n");
}

export function registerDependencyVulnerabilitiesTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    DEPENDENCY_VULNERABILITIES_TOOL_NAME,
    {
      title: "Dependency vulnerabilities",
      description: "Lists the dependency manifests and open Dependabot alerts of a GitHub repository.",
      inputSchema: RepositoryIdentityShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        DEPENDENCY_VULNERABILITIES_TOOL_NAME,
        DependencyVulnerabilitiesInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const report = await collectDependencyVulnerabilities(context, parsed, sink);
          return buildToolSuccessResult(renderDependencyVulnerabilities(report), report, {
            operation: DEPENDENCY_VULNERABILITIES_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
          });
        },
      ),
  );
}
