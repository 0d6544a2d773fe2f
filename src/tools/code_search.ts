import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { codeSearchSchema } from "../github/schemas.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  invokeGithubTool,
  type GithubToolContext,
} from "./shared.js";

export const CODE_SEARCH_TOOL_NAME = "search_code_in_repository" as const;

const CodeSearchInputShape = {
  ...RepositoryIdentityShape,
  query: z.string().describe("Text to search for."),
  language: z.string().optional().describe("Restrict matches to one language (e.g. typescript)."),
  path: z.string().optional().describe("Restrict matches to files under this path."),
  limit: z.number().optional().describe("Number of matches to return (1-50, default 10)."),
} as const;

const optionalQualifier = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

export const CodeSearchInputSchema = RepositoryIdentitySchema.extend({
  query: z.string().trim().min(1, "query must not be empty").max(256),
  language: optionalQualifier,
  path: optionalQualifier,
  limit: z.number().int().min(1).max(50).default(10),
});

export type CodeSearchInput = z.infer<typeof CodeSearchInputSchema>;

export type CodeMatch = { name: string; path: string; html_url: string };

export type CodeSearch = {
  owner: string;
  repo: string;
  query: string;
  search_query: string;
  total_count: number;
  incomplete_results: boolean;
  results: CodeMatch[];
};

/** Search query scoped to one repository, with the optional qualifiers appended. */
export function buildCodeSearchQuery(input: CodeSearchInput): string {
  const parts = [input.query, `repo:${input.owner}/${input.repo}`];
  if (input.language) {
    parts.push(`language:${input.language}`);
  }
  if (input.path) {
    parts.push(`path:${input.path}`);
  }
  return parts.join(" ");
}

export async function collectCodeSearch(
  context: GithubToolContext,
  input: CodeSearchInput,
  sink: ProgressSink = silentSink,
): Promise<CodeSearch> {
  const { client, logger } = context;
  client.assertCredential();

  const searchQuery = buildCodeSearchQuery(input);
  await notifySafely(logger, () => sink.progress(20, 100, "searching code"));
  const payload = await client.getJson("/search/code", codeSearchSchema, { q: searchQuery, per_page: input.limit }, { sink });
  await notifySafely(logger, () => sink.progress(100, 100));

  return {
    owner: input.owner,
    repo: input.repo,
    query: input.query,
    search_query: searchQuery,
    total_count: payload.total_count,
    incomplete_results: payload.incomplete_results,
    results: payload.items.slice(0, input.limit).map((item) => ({
      name: item.name,
      path: item.path,
      html_url: item.html_url,
    })),
  };
}

export function renderCodeSearch(search: CodeSearch): string {
  const lines = [`Code search: ${search.owner}/${search.repo}`, `Query: ${search.search_query}`, ""];
  if (search.results.length === 0) {
    lines.push("No matches found.");
    return lines.join("\n");
  }
  lines.push(`Matches: ${search.total_count} (showing ${search.results.length})`);
  if (search.incomplete_results) {
    lines.push("The search timed out upstream; counts may be incomplete.");
  }
  for (const [index, match] of search.results.entries()) {
    lines.push(`  ${index + 1}. ${match.name} (${match.path})`);
    if (match.html_url) {
      lines.push(`     ${match.html_url}`);
    }
  }
  return lines.join("\n");
}

export function registerCodeSearchTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    CODE_SEARCH_TOOL_NAME,
    {
      title: "Code search",
      description: "Searches the code of a GitHub repository, optionally narrowed by language or path.",
      inputSchema: CodeSearchInputShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        CODE_SEARCH_TOOL_NAME,
        CodeSearchInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const search = await collectCodeSearch(context, parsed, sink);
          return buildToolSuccessResult(renderCodeSearch(search), search, {
            operation: CODE_SEARCH_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
          });
        },
      ),
  );
}
