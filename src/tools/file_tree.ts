import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import { contentListingSchema, type ContentEntry } from "../github/schemas.js";
import { encodeRepositoryPath } from "./repository_files.js";
import {
  RepositoryIdentitySchema,
  RepositoryIdentityShape,
  buildToolSuccessResult,
  invokeGithubTool,
  rankCounts,
  repositoryPath,
  tally,
  type GithubToolContext,
} from "./shared.js";

export const FILE_TREE_TOOL_NAME = "get_file_tree" as const;

/** Listings requested beyond the starting one. */
const MAX_EXPANDED_DIRECTORIES = 10;
const DIRECTORIES_SHOWN = 20;
const FILES_SHOWN = 30;
const EXTENSIONS_SHOWN = 10;

const FileTreeInputShape = {
  ...RepositoryIdentityShape,
  path: z.string().optional().describe("Directory to start from (default: repository root)."),
  max_depth: z.number().optional().describe("Levels of directories to walk (1-5, default 2)."),
} as const;

export const FileTreeInputSchema = RepositoryIdentitySchema.extend({
  path: z
    .string()
    .default("")
    .transform((value) => value.trim().replace(/^\/+|\/+$/g, "")),
  max_depth: z.number().int().min(1).max(5).default(2),
});

export type FileTreeInput = z.infer<typeof FileTreeInputSchema>;

export type TreeDirectory = { name: string; path: string; depth: number };

export type TreeFile = { name: string; path: string; size: number; depth: number };

export type FileTree = {
  owner: string;
  repo: string;
  path: string;
  max_depth: number;
  directories_count: number;
  files_count: number;
  total_size_bytes: number;
  /** True when some directory within the depth limit was left unexpanded. */
  truncated: boolean;
  extensions: Array<{ extension: string; files: number }>;
  directories: TreeDirectory[];
  files: TreeFile[];
};

function extensionOf(name: string): string {
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : "(none)";
}

function byPath<T extends { path: string }>(left: T, right: T): number {
  return left.path.localeCompare(right.path);
}

/**
 * Walks the contents API breadth first from {@link FileTreeInput.path}. A
 * missing starting directory raises `not_found`, except at the root of an
 * empty repository, which lists nothing.
 */
export async function collectFileTree(
  context: GithubToolContext,
  input: FileTreeInput,
  sink: ProgressSink = silentSink,
): Promise<FileTree> {
  const { client, logger } = context;
  client.assertCredential();

  const contentsPath = `${repositoryPath(input.owner, input.repo)}/contents`;
  const listDirectory = async (path: string, first: boolean): Promise<ContentEntry[]> => {
    const endpoint = path ? `${contentsPath}/${encodeRepositoryPath(path)}` : contentsPath;
    if (first && !path) {
      return (await client.getOptionalJson(endpoint, contentListingSchema, ["not_found"], {}, { sink })) ?? [];
    }
    return client.getJson(endpoint, contentListingSchema, {}, { sink });
  };

  const directories: TreeDirectory[] = [];
  const files: TreeFile[] = [];
  const queue: Array<{ path: string; depth: number }> = [];
  let expanded = 0;
  let truncated = false;

  await notifySafely(logger, () => sink.progress(10, 100, `listing ${input.path || "/"}`));
  let pending: { path: string; depth: number } | undefined = { path: input.path, depth: 1 };
  let first = true;
  while (pending) {
    const entries = await listDirectory(pending.path, first);
    first = false;
    for (const entry of entries) {
      if (entry.type === "dir") {
        directories.push({ name: entry.name, path: entry.path, depth: pending.depth });
        if (pending.depth < input.max_depth) {
          if (expanded < MAX_EXPANDED_DIRECTORIES) {
            expanded += 1;
            queue.push({ path: entry.path, depth: pending.depth + 1 });
          } else {
            truncated = true;
          }
        }
      } else if (entry.type === "file") {
        files.push({ name: entry.name, path: entry.path, size: entry.size, depth: pending.depth });
      }
    }
    pending = queue.shift();
    if (pending) {
      const next = pending.path;
      await notifySafely(logger, () => sink.progress(10 + expanded * 8, 100, `listing ${next}`));
    }
  }

  const extensions = new Map<string, number>();
  for (const file of files) {
    tally(extensions, extensionOf(file.name));
  }

  await notifySafely(logger, () => sink.progress(100, 100));
  return {
    owner: input.owner,
    repo: input.repo,
    path: input.path || "/",
    max_depth: input.max_depth,
    directories_count: directories.length,
    files_count: files.length,
    total_size_bytes: files.reduce((sum, file) => sum + file.size, 0),
    truncated,
    extensions: rankCounts(extensions)
      .slice(0, EXTENSIONS_SHOWN)
      .map(([extension, count]) => ({ extension, files: count })),
    directories: [...directories].sort(byPath).slice(0, DIRECTORIES_SHOWN),
    files: [...files].sort(byPath).slice(0, FILES_SHOWN),
  };
}

export function formatSize(bytes: number): string {
  return bytes < 1024 ? `${bytes} B` : `${(bytes / 1024).toFixed(1)} KB`;
}

export function renderFileTree(tree: FileTree): string {
  const lines = [
    `File tree: ${tree.owner}/${tree.repo} (${tree.path})`,
    "",
    `Directories: ${tree.directories_count}`,
    `Files: ${tree.files_count} (${formatSize(tree.total_size_bytes)})`,
  ];
  if (tree.truncated) {
    lines.push(`Only the first ${MAX_EXPANDED_DIRECTORIES} subdirectories were expanded.`);
  }
  if (tree.extensions.length > 0) {
    lines.push(`File types: ${tree.extensions.map((entry) => `${entry.extension} (${entry.files})`).join(", ")}`);
  }
  if (tree.directories.length > 0) {
    lines.push("", "Directories:", ...tree.directories.map((directory) => `  - ${directory.path}/`));
  }
  if (tree.files.length > 0) {
    lines.push("", "Files:", ...tree.files.map((file) => `  - ${file.path} (${formatSize(file.size)})`));
  }
  return lines.join("\n");
}

export function registerFileTreeTool(server: McpServer, context: GithubToolContext): void {
  server.registerTool(
    FILE_TREE_TOOL_NAME,
    {
      title: "File tree",
      description: "Lists the directories and files of a GitHub repository down to a given depth.",
      inputSchema: FileTreeInputShape,
    },
    async (input: unknown, extra) =>
      invokeGithubTool(
        context,
        FILE_TREE_TOOL_NAME,
        FileTreeInputSchema,
        input,
        extra,
        async (parsed, sink): Promise<CallToolResult> => {
          const tree = await collectFileTree(context, parsed, sink);
          return buildToolSuccessResult(renderFileTree(tree), tree, {
            operation: FILE_TREE_TOOL_NAME,
            owner: parsed.owner,
            repo: parsed.repo,
            max_depth: parsed.max_depth,
          });
        },
      ),
  );
}
