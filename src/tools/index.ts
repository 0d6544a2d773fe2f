import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { ACTIVITY_TIMELINE_TOOL_NAME, registerActivityTimelineTool } from "./activity_timeline.js";
import { BRANCH_ANALYSIS_TOOL_NAME, registerBranchAnalysisTool } from "./branch_analysis.js";
import { CODE_SEARCH_TOOL_NAME, registerCodeSearchTool } from "./code_search.js";
import { COMMIT_STATISTICS_TOOL_NAME, registerCommitStatisticsTool } from "./commit_statistics.js";
import { COMPARE_REPOSITORIES_TOOL_NAME, registerCompareRepositoriesTool } from "./compare_repositories.js";
import { COMPLIANCE_CHECK_TOOL_NAME, registerComplianceCheckTool } from "./compliance_check.js";
import { CONTRIBUTORS_TOOL_NAME, registerContributorsTool } from "./contributors.js";
import { DEPENDENCIES_TOOL_NAME, registerDependenciesTool } from "./dependencies.js";
import {
  DEPENDENCY_VULNERABILITIES_TOOL_NAME,
  registerDependencyVulnerabilitiesTool,
} from "./dependency_vulnerabilities.js";
import { DEVELOPER_ACTIVITY_TOOL_NAME, registerDeveloperActivityTool } from "./developer_activity.js";
import { EVENTS_ANALYSIS_TOOL_NAME, registerEventsAnalysisTool } from "./events_analysis.js";
import { FILE_TREE_TOOL_NAME, registerFileTreeTool } from "./file_tree.js";
import { ISSUES_SUMMARY_TOOL_NAME, registerIssuesSummaryTool } from "./issues_summary.js";
import { RELEASES_SUMMARY_TOOL_NAME, registerReleasesSummaryTool } from "./releases_summary.js";
import { REPOSITORY_HEALTH_TOOL_NAME, registerRepositoryHealthTool } from "./repository_health.js";
import { SECURITY_ADVISORIES_TOOL_NAME, registerSecurityAdvisoriesTool } from "./security_advisories.js";
import type { GithubToolContext } from "./shared.js";
import { TAGS_ANALYSIS_TOOL_NAME, registerTagsAnalysisTool } from "./tags_analysis.js";
import { VERSION_COMPARISON_TOOL_NAME, registerVersionComparisonTool } from "./version_comparison.js";
import { WEBHOOKS_LIST_TOOL_NAME, registerWebhooksListTool } from "./webhooks_list.js";

/** Tool groups a server process can expose. */
export const SERVER_PROFILES = [
  "health",
  "comparison",
  "releases",
  "activity",
  "events",
  "code",
  "security",
  "all",
] as const;

export type ServerProfile = (typeof SERVER_PROFILES)[number];

export function isServerProfile(value: string): value is ServerProfile {
  return SERVER_PROFILES.some((profile) => profile === value);
}

type ToolRegistration = {
  readonly name: string;
  readonly register: (server: McpServer, context: GithubToolContext) => void;
};

const HEALTH_TOOLS: readonly ToolRegistration[] = [
  { name: REPOSITORY_HEALTH_TOOL_NAME, register: registerRepositoryHealthTool },
  { name: ISSUES_SUMMARY_TOOL_NAME, register: registerIssuesSummaryTool },
  { name: CONTRIBUTORS_TOOL_NAME, register: registerContributorsTool },
];

const COMPARISON_TOOLS: readonly ToolRegistration[] = [
  { name: COMPARE_REPOSITORIES_TOOL_NAME, register: registerCompareRepositoriesTool },
];

const RELEASES_TOOLS: readonly ToolRegistration[] = [
  { name: RELEASES_SUMMARY_TOOL_NAME, register: registerReleasesSummaryTool },
  { name: TAGS_ANALYSIS_TOOL_NAME, register: registerTagsAnalysisTool },
  { name: VERSION_COMPARISON_TOOL_NAME, register: registerVersionComparisonTool },
];

const ACTIVITY_TOOLS: readonly ToolRegistration[] = [
  { name: COMMIT_STATISTICS_TOOL_NAME, register: registerCommitStatisticsTool },
  { name: BRANCH_ANALYSIS_TOOL_NAME, register: registerBranchAnalysisTool },
  { name: DEVELOPER_ACTIVITY_TOOL_NAME, register: registerDeveloperActivityTool },
];

const EVENTS_TOOLS: readonly ToolRegistration[] = [
  { name: ACTIVITY_TIMELINE_TOOL_NAME, register: registerActivityTimelineTool },
  { name: EVENTS_ANALYSIS_TOOL_NAME, register: registerEventsAnalysisTool },
  { name: WEBHOOKS_LIST_TOOL_NAME, register: registerWebhooksListTool },
];

const CODE_TOOLS: readonly ToolRegistration[] = [
  { name: FILE_TREE_TOOL_NAME, register: registerFileTreeTool },
  { name: CODE_SEARCH_TOOL_NAME, register: registerCodeSearchTool },
  { name: DEPENDENCIES_TOOL_NAME, register: registerDependenciesTool },
];

const SECURITY_TOOLS: readonly ToolRegistration[] = [
  { name: SECURITY_ADVISORIES_TOOL_NAME, register: registerSecurityAdvisoriesTool },
  { name: DEPENDENCY_VULNERABILITIES_TOOL_NAME, register: registerDependencyVulnerabilitiesTool },
  { name: COMPLIANCE_CHECK_TOOL_NAME, register: registerComplianceCheckTool },
];

const PROFILE_TOOLS: Record<ServerProfile, readonly ToolRegistration[]> = {
  health: HEALTH_TOOLS,
  comparison: COMPARISON_TOOLS,
  releases: RELEASES_TOOLS,
  activity: ACTIVITY_TOOLS,
  events: EVENTS_TOOLS,
  code: CODE_TOOLS,
  security: SECURITY_TOOLS,
  all: [
    ...HEALTH_TOOLS,
    ...COMPARISON_TOOLS,
    ...RELEASES_TOOLS,
    ...ACTIVITY_TOOLS,
    ...EVENTS_TOOLS,
    ...CODE_TOOLS,
    ...SECURITY_TOOLS,
  ],
};

/** Names of the tools exposed by {@link profile}, in registration order. */
export function toolsForProfile(profile: ServerProfile): string[] {
  return PROFILE_TOOLS[profile].map((tool) => tool.name);
}

/** Registers every tool of {@link profile} on {@link server}; returns their names. */
export function registerGithubTools(server: McpServer, profile: ServerProfile, context: GithubToolContext): string[] {
  for (const tool of PROFILE_TOOLS[profile]) {
    tool.register(server, context);
  }
  return toolsForProfile(profile);
}
