import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import {
  DEPENDENCY_MANIFESTS,
  findRootFile,
  isParsableManifest,
  listRootEntries,
  parseDependencies,
  readTextFile,
} from "./repository_files.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  invokeGithubTool,
  type GithubToolContext,
} from "./shared.js";

export const DEPENDENCIES_TOOL_NAME = "analyze_dependencies" as const;

const DEPENDENCIES_SHOWN = 50;

export const DependenciesInputSchema = RepositoryIdentitySchema;

export type ManifestAnalysis = {
  file: string;
  dependencies_count: number;
  dependencies: string[];
};

export type DependencyAnalysis = {
  owner: string;
  repo: string;
  found_files: string[];
  analysis: ManifestAnalysis[];
  total_dependencies: number;
};

/**
 * Finds the dependency manifests at the repository root and reads the
 * dependency names of the formats it can parse. Other manifests are only
 * reported as present.
 */
export async function collectDependencyAnalysis(
  context: GithubToolContext,
  input: { owner: string; repo: string },
  sink: ProgressSink = silentSink,
): Promise<DependencyAnalysis> {
  const { client, logger } = context;
  client.assertCredential();

  await notifySafely(logger, () => sink.progress(10, 100, "listing repository root"));
  const entries = await listRootEntries(context, input.owner, input.repo, sink);
  const found: string[] = [];
  for (const manifest of DEPENDENCY_MANIFESTS) {
    const entry = findRootFile(entries, manifest);
    if (entry) {
      found.push(entry.name);
    }
  }

  const analysis: ManifestAnalysis[] = [];
  for (const file of found) {
    if (!isParsableManifest(file)) {
      continue;
    }
    const content = await readTextFile(context, input.owner, input.repo, file, sink);
    if (content === null) {
      continue;
    }
    const names = parseDependencies(file, content);
    analysis.push({ file, dependencies_count: names.length, dependencies: names.slice(0, DEPENDENCIES_SHOWN) });
  }

  await notifySafely(logger, () => sink.progress(100, 100));
  return {
    owner: input.owner,
    repo: input.repo,
    found_files: found,
    analysis,
    total_dependencies: analysis.reduce((sum, manifest) => sum + manifest.dependencies_count, 0),
  };
}

export function renderDependencyAnalysis(result: DependencyAnalysis): string {
  const lines = [`Dependencies: ${result.owner}/${result.repo}`, ""];
  if (result.found_files.length === 0) {
    lines.push("No dependency manifests found at the repository root.");
    return lines.join("\n");
  }
  lines.push(`Manifests: ${result.found_files.join(", ")}`, `Dependencies declared: ${result.total_dependencies}`);
  for (const manifest of result.analysis) {
    lines.push("", `${manifest.file} (${manifest.dependencies_count}):`);
    const shown = manifest.dependencies.slice(0, 10);
    lines.push(...shown.map((name) => `  - ${name}`));
    if (manifest.dependencies_count > shown.length) {
      lines.push(`  ... and ${manifest.dependencies_count - shown.length} more`);
    }
  }
  return lines.join("\n");
}

export function registerDependenciesTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    DEPENDENCIES_TOOL_NAME,
    {
      title: "Dependency analysis",
      description: "Finds the dependency manifests of a GitHub repository and lists the dependencies they declare.",
      inputSchema: RepositoryIdentityShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        DEPENDENCIES_TOOL_NAME,
        DependenciesInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const result = await collectDependencyAnalysis(context, parsed, sink);
          return buildToolSuccessResult(renderDependencyAnalysis(result), result, {
            operation: DEPENDENCIES_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
          });
        },
      ),
  );
}
