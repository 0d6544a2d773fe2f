/**
 * Access to repository files through the contents API, plus the parsers that
 * read dependency names out of the common manifest formats.
 */
import { z } from "zod";

import { notifySafely, type ProgressSink } from "../github/notifier.js";
import { contentFileSchema, contentListingSchema, type ContentEntry } from "../github/schemas.js";
import { repositoryPath, type GithubToolContext } from "./shared.js";

/** Manifest files recognised at the repository root. */
export const DEPENDENCY_MANIFESTS = [
  "requirements.txt",
  "pyproject.toml",
  "setup.py",
  "package.json",
  "pom.xml",
  "build.gradle",
  "go.mod",
  "Cargo.toml",
  "composer.json",
  "Gemfile",
] as const;

/** Escapes each segment of a repository path, keeping the separators. */
export function encodeRepositoryPath(path: string): string {
  return path
    .split("/")
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join("/");
}

/** Entries at the repository root; an empty repository has none. */
export async function listRootEntries(
  context: GithubToolContext,
  owner: string,
  repo: string,
  sink: ProgressSink,
): Promise<ContentEntry[]> {
  const entries = await context.client.getOptionalJson(
    `${repositoryPath(owner, repo)}/contents`,
    contentListingSchema,
    ["not_found"],
    {},
    { sink },
  );
  return entries ?? [];
}

/** Root files named {@link name}, compared case-insensitively. */
export function findRootFile(entries: readonly ContentEntry[], name: string): ContentEntry | undefined {
  const wanted = name.toLowerCase();
  return entries.find((entry) => entry.type === "file" && entry.name.toLowerCase() === wanted);
}

/** Decoded text of a file, or `null` when it does not exist or is not a regular file. */
export async function readTextFile(
  context: GithubToolContext,
  owner: string,
  repo: string,
  path: string,
  sink: ProgressSink,
): Promise<string | null> {
  await notifySafely(context.logger, () => sink.info(`reading ${path}`));
  const file = await context.client.getOptionalJson(
    `${repositoryPath(owner, repo)}/contents/${encodeRepositoryPath(path)}`,
    contentFileSchema,
    ["not_found"],
    {},
    { sink },
  );
  if (!file || file.type !== "file" || file.content === undefined) {
    return null;
  }
  if (file.encoding !== undefined && file.encoding !== "base64") {
    return file.content;
  }
  return Buffer.from(file.content, "base64").toString("utf8");
}

const packageJsonSchema = z
  .object({
    dependencies: z.record(z.unknown()).optional(),
    devDependencies: z.record(z.unknown()).optional(),
  })
  .passthrough();

function parseRequirements(content: string): string[] {
  const names: string[] = [];
  for (const raw of content.split("\n")) {
    const line = raw.trim();
    if (line.length === 0 || line.startsWith("#") || line.startsWith("-")) {
      continue;
    }
    const [name] = line.split(/[\s=<>~!;[@]/);
    if (name) {
      names.push(name);
    }
  }
  return names;
}

function parsePackageJson(content: string): string[] {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch {
    return [];
  }
  const parsed = packageJsonSchema.safeParse(document);
  if (!parsed.success) {
    return [];
  }
  return [...Object.keys(parsed.data.dependencies ?? {}), ...Object.keys(parsed.data.devDependencies ?? {})];
}

/**
 * Reads PEP 621 requirement strings (`"httpx>=0.27",`) anywhere and Poetry
 * style `name = "…"` entries inside dependency tables, skipping `python`.
 */
function parsePyproject(content: string): string[] {
  const names: string[] = [];
  let inDependencyTable = false;
  for (const raw of content.split("\n")) {
    const line = raw.trim();
    const table = /^\[+([^\]]+)\]+$/.exec(line);
    if (table) {
      inDependencyTable = table[1].trim().endsWith("dependencies");
      continue;
    }
    const requirement = /^"([A-Za-z0-9][A-Za-z0-9._-]*)\s*(?:\[[^\]]*\])?\s*(?:[<>=~!;]|",?$)/.exec(line);
    if (requirement) {
      names.push(requirement[1]);
      continue;
    }
    const entry = /^([A-Za-z0-9][A-Za-z0-9._-]*)\s*=\s*["{]/.exec(line);
    if (inDependencyTable && entry && entry[1].toLowerCase() !== "python") {
      names.push(entry[1]);
    }
  }
  return names;
}

function parseGoMod(content: string): string[] {
  const names: string[] = [];
  let inRequireBlock = false;
  for (const raw of content.split("\n")) {
    const line = raw.replace(/\/\/.*$/, "").trim();
    if (line === "require (") {
      inRequireBlock = true;
      continue;
    }
    if (inRequireBlock && line === ")") {
      inRequireBlock = false;
      continue;
    }
    const single = /^require\s+(\S+)\s+\S+$/.exec(line);
    if (single) {
      names.push(single[1]);
    } else if (inRequireBlock && line.length > 0) {
      const [name] = line.split(/\s+/);
      names.push(name);
    }
  }
  return names;
}

const PARSERS: Partial<Record<string, (content: string) => string[]>> = {
  "requirements.txt": parseRequirements,
  "package.json": parsePackageJson,
  "pyproject.toml": parsePyproject,
  "go.mod": parseGoMod,
};

/** Manifests whose dependency list {@link parseDependencies} can read. */
export function isParsableManifest(fileName: string): boolean {
  return PARSERS[fileName] !== undefined;
}

/** Dependency names declared by a manifest, in declaration order and without duplicates. */
export function parseDependencies(fileName: string, content: string): string[] {
  const parser = PARSERS[fileName];
  return parser ? [...new Set(parser(content))] : [];
}
