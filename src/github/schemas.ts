import { z } from "zod";

/**
 * Lenient views over the GitHub REST payloads the tools read. Only the fields
 * consumed downstream are declared; unknown keys pass through untouched and
 * missing counters default to zero the way the API documents them.
 */

const count = z.number().int().nonnegative().catch(0);
const nullableString = z.string().nullable().optional().transform((value) => value ?? null);

export const repositorySchema = z
  .object({
    full_name: z.string().optional(),
    stargazers_count: count,
    forks_count: count,
    watchers_count: count,
    open_issues_count: count,
    private: z.boolean().default(false),
    archived: z.boolean().default(false),
    disabled: z.boolean().default(false),
    has_issues: z.boolean().default(true),
    default_branch: z.string().default("main"),
    description: nullableString,
    language: nullableString,
    license: z
      .object({ spdx_id: nullableString, name: nullableString })
      .passthrough()
      .nullable()
      .default(null),
    created_at: nullableString,
    updated_at: nullableString,
    pushed_at: nullableString,
  })
  .passthrough();

export type RepositoryPayload = z.infer<typeof repositorySchema>;

export const searchTotalSchema = z
  .object({
    total_count: count,
  })
  .passthrough();

const gitSignatureSchema = z
  .object({ name: nullableString, date: nullableString })
  .passthrough()
  .nullable()
  .optional();

/** GitHub account linked to a commit; absent when the author email matches no account. */
const accountSchema = z.object({ login: z.string() }).passthrough().nullable().optional();

const commitSchema = z
  .object({
    sha: z.string().optional(),
    author: accountSchema,
    commit: z
      .object({
        author: gitSignatureSchema,
        committer: gitSignatureSchema,
      })
      .passthrough(),
  })
  .passthrough();

export const commitListSchema = z.array(commitSchema);

export type CommitListPayload = z.infer<typeof commitListSchema>;

const labelSchema = z.union([
  z.string().transform((name) => ({ name })),
  z.object({ name: z.string().default("") }).passthrough(),
]);

export const issueListSchema = z.array(
  z
    .object({
      number: z.number().int(),
      title: z.string().default(""),
      state: z.string().default("open"),
      labels: z.array(labelSchema).default([]),
      assignees: z.array(z.unknown()).nullable().default([]),
      comments: count,
      created_at: nullableString,
      updated_at: nullableString,
      pull_request: z.unknown().optional(),
    })
    .passthrough(),
);

export type IssueListPayload = z.infer<typeof issueListSchema>;

/** Repositories without commits answer `204 No Content`, read here as an empty list. */
export const contributorListSchema = z
  .array(
    z
      .object({
        login: z.string().default("Unknown"),
        contributions: count,
        avatar_url: z.string().default(""),
        type: z.string().default("User"),
        site_admin: z.boolean().default(false),
      })
      .passthrough(),
  )
  .nullable()
  .transform((list) => list ?? []);

export type ContributorListPayload = z.infer<typeof contributorListSchema>;

export const releaseListSchema = z.array(
  z
    .object({
      tag_name: z.string(),
      name: nullableString,
      published_at: nullableString,
      prerelease: z.boolean().default(false),
      draft: z.boolean().default(false),
    })
    .passthrough(),
);

export type ReleaseListPayload = z.infer<typeof releaseListSchema>;

export const tagListSchema = z.array(
  z
    .object({
      name: z.string(),
      commit: z.object({ sha: z.string().default("") }).passthrough().default({ sha: "" }),
    })
    .passthrough(),
);

export type TagListPayload = z.infer<typeof tagListSchema>;

export const branchListSchema = z.array(
  z
    .object({
      name: z.string(),
      protected: z.boolean().default(false),
      commit: z.object({ sha: z.string().default("") }).passthrough().default({ sha: "" }),
    })
    .passthrough(),
);

export type BranchListPayload = z.infer<typeof branchListSchema>;

/** `GET /repos/{owner}/{repo}/branches/{branch}` embeds the full head commit. */
export const branchDetailSchema = z
  .object({
    name: z.string(),
    protected: z.boolean().default(false),
    commit: commitSchema,
  })
  .passthrough();

/** Comparison of two refs (`GET /repos/{owner}/{repo}/compare/{base}...{head}`). */
export const refComparisonSchema = z
  .object({
    status: z.string().default("unknown"),
    ahead_by: count,
    behind_by: count,
    total_commits: count,
    files: z.array(z.unknown()).default([]),
  })
  .passthrough();

export const eventListSchema = z
  .array(
    z
      .object({
        type: z.string().nullable().default("Unknown").transform((value) => value ?? "Unknown"),
        created_at: nullableString,
        actor: z.object({ login: z.string() }).passthrough().nullable().optional(),
      })
      .passthrough(),
  )
  .nullable()
  .transform((list) => list ?? []);

export type EventListPayload = z.infer<typeof eventListSchema>;

export const hookListSchema = z.array(
  z
    .object({
      id: z.number().int(),
      name: z.string().default("web"),
      active: z.boolean().default(false),
      events: z.array(z.string()).default([]),
      config: z.object({ url: nullableString, content_type: nullableString }).passthrough().default({}),
      updated_at: nullableString,
    })
    .passthrough(),
);

export type HookListPayload = z.infer<typeof hookListSchema>;

const contentEntrySchema = z
  .object({
    type: z.string(),
    name: z.string(),
    path: z.string(),
    size: count,
    content: z.string().optional(),
    encoding: z.string().optional(),
  })
  .passthrough();

export type ContentEntry = z.infer<typeof contentEntrySchema>;

/** A directory answers with its entries, a file with a single entry; both read as a list. */
export const contentListingSchema = z
  .union([z.array(contentEntrySchema), contentEntrySchema])
  .transform((value) => (Array.isArray(value) ? value : [value]));

export const contentFileSchema = contentEntrySchema;

export const codeSearchSchema = z
  .object({
    total_count: count,
    incomplete_results: z.boolean().default(false),
    items: z
      .array(
        z
          .object({
            name: z.string(),
            path: z.string(),
            html_url: z.string().default(""),
            repository: z.object({ full_name: z.string() }).passthrough().nullable().optional(),
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough();

export type CodeSearchPayload = z.infer<typeof codeSearchSchema>;

const severity = z.string().nullable().optional().transform((value) => (value ?? "unknown").toLowerCase());

export const securityAdvisoryListSchema = z.array(
  z
    .object({
      ghsa_id: z.string(),
      cve_id: nullableString,
      summary: z.string().default(""),
      severity,
      state: z.string().default("published"),
      published_at: nullableString,
    })
    .passthrough(),
);

export type SecurityAdvisoryListPayload = z.infer<typeof securityAdvisoryListSchema>;

export const dependabotAlertListSchema = z.array(
  z
    .object({
      number: z.number().int(),
      state: z.string().default("open"),
      dependency: z
        .object({
          package: z.object({ ecosystem: z.string().default("unknown"), name: z.string().default("unknown") }).passthrough(),
          manifest_path: nullableString,
        })
        .passthrough(),
      security_advisory: z.object({ summary: z.string().default(""), severity }).passthrough(),
    })
    .passthrough(),
);

export type DependabotAlertListPayload = z.infer<typeof dependabotAlertListSchema>;

/** Parses an ISO-8601 timestamp returned by GitHub; invalid input yields `null`. */
export function parseGithubTimestamp(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export const DAY_MS = 86_400_000;

/** Whole days elapsed between {@link date} and {@link now}, floored. */
export function daysSince(date: Date | null, now: number): number | null {
  if (!date) {
    return null;
  }
  return Math.floor((now - date.getTime()) / DAY_MS);
}

/** Author date of the newest commit in a `per_page=1` listing. */
export function latestCommitDate(commits: CommitListPayload): Date | null {
  const [latest] = commits;
  if (!latest) {
    return null;
  }
  return commitDate(latest);
}

/** Author date of a commit, falling back to the committer date. */
export function commitDate(commit: CommitListPayload[number]): Date | null {
  return parseGithubTimestamp(commit.commit.author?.date ?? commit.commit.committer?.date ?? null);
}
