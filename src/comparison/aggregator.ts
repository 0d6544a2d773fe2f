import type { StructuredLogger } from "../logger.js";
import type { GithubClient } from "../github/client.js";
import type { Clock } from "../github/clock.js";
import { ValidationError, toGithubError, type ErrorKind } from "../github/errors.js";
import { notifySafely, silentSink, type ProgressSink } from "../github/notifier.js";
import {
  commitListSchema,
  daysSince,
  latestCommitDate,
  repositorySchema,
  searchTotalSchema,
} from "../github/schemas.js";

/** Metrics a comparison can report, in their canonical order. */
export const COMPARISON_METRICS = [
  "open_issues",
  "open_prs",
  "stars",
  "forks",
  "watchers",
  "last_commit_age",
] as const;

export type ComparisonMetric = (typeof COMPARISON_METRICS)[number];

export const MIN_COMPARISON_TARGETS = 2;
export const MAX_COMPARISON_TARGETS = 5;

export type ComparisonTarget = {
  readonly owner: string;
  readonly repo: string;
};

/** Metric values of one target. `last_commit_age` is `null` when unknown. */
export type MetricBag = {
  open_issues?: number;
  open_prs?: number;
  stars?: number;
  forks?: number;
  watchers?: number;
  last_commit_age?: number | null;
};

export type TargetFailure = {
  code: string;
  kind: ErrorKind;
  message: string;
  status: number | null;
};

export type SucceededSlot = {
  target: string;
  owner: string;
  repo: string;
  status: "succeeded";
  metrics: MetricBag;
  last_commit_date: string | null;
  language: string | null;
  archived: boolean;
};

export type FailedSlot = {
  target: string;
  owner: string;
  repo: string;
  status: "failed";
  error: TargetFailure;
};

export type TargetSlot = SucceededSlot | FailedSlot;

export type ComparisonRankings = {
  most_active?: string;
  most_popular?: string;
  most_forked?: string;
};

export type ComparisonReport = {
  compared_at: string;
  metrics_compared: ComparisonMetric[];
  targets: TargetSlot[];
  /** metric → (target → value), restricted to succeeded targets. */
  metrics: Partial<Record<ComparisonMetric, Record<string, number | null>>>;
  rankings: ComparisonRankings;
  succeeded: number;
  failed: number;
};

export interface RepositoryComparatorDependencies {
  readonly client: GithubClient;
  readonly clock: Clock;
  readonly logger: StructuredLogger;
}

/**
 * Fan-out over comparison targets. Every target runs its own sequence of
 * resilient calls concurrently with the others; the aggregate settles only
 * once every target reached `succeeded` or `failed`, and a failed target keeps
 * its slot in the report.
 */
export class RepositoryComparator {
  private readonly client: GithubClient;
  private readonly clock: Clock;
  private readonly logger: StructuredLogger;

  constructor(dependencies: RepositoryComparatorDependencies) {
    this.client = dependencies.client;
    this.clock = dependencies.clock;
    this.logger = dependencies.logger;
  }

  async compare(
    targets: readonly ComparisonTarget[],
    metricNames?: readonly string[],
    sink: ProgressSink = silentSink,
  ): Promise<ComparisonReport> {
    const normalised = validateTargets(targets);
    const metrics = resolveMetrics(metricNames);
    this.client.assertCredential();

    let completed = 0;
    const settled = await Promise.allSettled(
      normalised.map(async (target) => {
        try {
          return await this.collectTarget(target, metrics);
        } finally {
          completed += 1;
          await notifySafely(this.logger, () =>
            sink.progress(completed, normalised.length, `${formatTarget(target)} done`),
          );
        }
      }),
    );

    const slots: TargetSlot[] = [];
    for (const [index, outcome] of settled.entries()) {
      const target = normalised[index];
      if (outcome.status === "fulfilled") {
        slots.push(outcome.value);
        continue;
      }
      const error = toGithubError(outcome.reason);
      this.logger.warn("compare_target_failed", {
        target: formatTarget(target),
        code: error.code,
        status: error.status,
        attempts: error.attempts,
        message: error.message,
      });
      await notifySafely(this.logger, () => sink.error(`${formatTarget(target)}: ${error.message}`));
      slots.push({
        target: formatTarget(target),
        owner: target.owner,
        repo: target.repo,
        status: "failed",
        error: { code: error.code, kind: error.kind, message: error.message, status: error.status },
      });
    }

    const successes = slots.filter((slot): slot is SucceededSlot => slot.status === "succeeded");
    return {
      compared_at: new Date(this.clock.now()).toISOString(),
      metrics_compared: metrics,
      targets: slots,
      metrics: tabulateMetrics(successes, metrics),
      rankings: deriveRankings(successes, metrics),
      succeeded: successes.length,
      failed: slots.length - successes.length,
    };
  }

  private async collectTarget(
    target: ComparisonTarget,
    metrics: readonly ComparisonMetric[],
  ): Promise<SucceededSlot> {
    const base = `/repos/${encodeURIComponent(target.owner)}/${encodeURIComponent(target.repo)}`;
    const repository = await this.client.getJson(base, repositorySchema);

    const wants = new Set(metrics);
    let openPrs = 0;
    if (wants.has("open_prs") || wants.has("open_issues")) {
      const search = await this.client.execute("GET", "/search/issues", {
        q: `repo:${target.owner}/${target.repo} type:pr state:open`,
        per_page: 1,
      });
      const parsed = search.ok ? searchTotalSchema.safeParse(search.payload) : null;
      if (parsed?.success) {
        openPrs = parsed.data.total_count;
      } else {
        this.logger.debug("compare_pr_count_unavailable", { target: formatTarget(target) });
      }
    }

    let lastCommit: Date | null = null;
    if (wants.has("last_commit_age")) {
      const commits = await this.client.execute("GET", `${base}/commits`, { per_page: 1 });
      const parsed = commits.ok ? commitListSchema.safeParse(commits.payload) : null;
      if (parsed?.success) {
        lastCommit = latestCommitDate(parsed.data);
      } else {
        this.logger.debug("compare_last_commit_unavailable", { target: formatTarget(target) });
      }
    }

    const values: Required<MetricBag> = {
      open_issues: Math.max(0, repository.open_issues_count - openPrs),
      open_prs: openPrs,
      stars: repository.stargazers_count,
      forks: repository.forks_count,
      watchers: repository.watchers_count,
      last_commit_age: daysSince(lastCommit, this.clock.now()),
    };
    const bag: MetricBag = {};
    for (const metric of metrics) {
      assignMetric(bag, values, metric);
    }

    return {
      target: formatTarget(target),
      owner: target.owner,
      repo: target.repo,
      status: "succeeded",
      metrics: bag,
      last_commit_date: lastCommit ? lastCommit.toISOString() : null,
      language: repository.language,
      archived: repository.archived,
    };
  }
}

function assignMetric(bag: MetricBag, values: Required<MetricBag>, metric: ComparisonMetric): void {
  switch (metric) {
    case "open_issues":
      bag.open_issues = values.open_issues;
      return;
    case "open_prs":
      bag.open_prs = values.open_prs;
      return;
    case "stars":
      bag.stars = values.stars;
      return;
    case "forks":
      bag.forks = values.forks;
      return;
    case "watchers":
      bag.watchers = values.watchers;
      return;
    case "last_commit_age":
      bag.last_commit_age = values.last_commit_age;
      return;
  }
}

export function formatTarget(target: ComparisonTarget): string {
  return `${target.owner}/${target.repo}`;
}

/**
 * Checks the local preconditions of a comparison. Raised errors are
 * {@link ValidationError}s and nothing is sent upstream.
 */
export function validateTargets(targets: readonly ComparisonTarget[]): ComparisonTarget[] {
  if (targets.length < MIN_COMPARISON_TARGETS || targets.length > MAX_COMPARISON_TARGETS) {
    throw new ValidationError(
      `A comparison needs between ${MIN_COMPARISON_TARGETS} and ${MAX_COMPARISON_TARGETS} repositories (received ${targets.length}).`,
      { details: { count: targets.length } },
    );
  }

  const seen = new Set<string>();
  const normalised: ComparisonTarget[] = [];
  for (const [index, target] of targets.entries()) {
    const owner = target.owner.trim();
    const repo = target.repo.trim();
    if (owner.length === 0 || repo.length === 0) {
      throw new ValidationError(`Repository #${index + 1} must provide both owner and repo.`, {
        details: { index },
      });
    }
    const key = `${owner}/${repo}`.toLowerCase();
    if (seen.has(key)) {
      throw new ValidationError(`Repository ${owner}/${repo} is listed more than once.`, {
        details: { index, target: `${owner}/${repo}` },
      });
    }
    seen.add(key);
    normalised.push({ owner, repo });
  }
  return normalised;
}

function isComparisonMetric(value: string): value is ComparisonMetric {
  return COMPARISON_METRICS.some((metric) => metric === value);
}

/** Resolves requested metric names; an absent or empty list selects every metric. */
export function resolveMetrics(metricNames?: readonly string[]): ComparisonMetric[] {
  if (!metricNames || metricNames.length === 0) {
    return [...COMPARISON_METRICS];
  }
  const unknown = metricNames.filter((name) => !isComparisonMetric(name));
  if (unknown.length > 0) {
    throw new ValidationError(`Unknown comparison metric(s): ${unknown.join(", ")}.`, {
      details: { unknown, supported: [...COMPARISON_METRICS] },
    });
  }
  return COMPARISON_METRICS.filter((metric) => metricNames.includes(metric));
}

function tabulateMetrics(
  successes: readonly SucceededSlot[],
  metrics: readonly ComparisonMetric[],
): ComparisonReport["metrics"] {
  const table: ComparisonReport["metrics"] = {};
  for (const metric of metrics) {
    const column: Record<string, number | null> = {};
    for (const slot of successes) {
      column[slot.target] = slot.metrics[metric] ?? null;
    }
    table[metric] = column;
  }
  return table;
}

/**
 * Picks the first target holding the best score. `null` scores never beat a
 * known one but still win when every score is unknown.
 */
function pickLeader(
  successes: readonly SucceededSlot[],
  score: (slot: SucceededSlot) => number | null,
  better: (candidate: number, incumbent: number) => boolean,
): string | undefined {
  let leader: SucceededSlot | undefined;
  let best: number | null = null;
  for (const slot of successes) {
    const value = score(slot);
    if (!leader) {
      leader = slot;
      best = value;
      continue;
    }
    if (value !== null && (best === null || better(value, best))) {
      leader = slot;
      best = value;
    }
  }
  return leader?.target;
}

/** Rankings over succeeded targets; a ranking is present only when its metric was requested. */
export function deriveRankings(
  successes: readonly SucceededSlot[],
  metrics: readonly ComparisonMetric[],
): ComparisonRankings {
  const rankings: ComparisonRankings = {};
  if (successes.length === 0) {
    return rankings;
  }
  const wants = new Set(metrics);
  if (wants.has("last_commit_age")) {
    const leader = pickLeader(successes, (slot) => slot.metrics.last_commit_age ?? null, (a, b) => a < b);
    if (leader) rankings.most_active = leader;
  }
  if (wants.has("stars")) {
    const leader = pickLeader(successes, (slot) => slot.metrics.stars ?? null, (a, b) => a > b);
    if (leader) rankings.most_popular = leader;
  }
  if (wants.has("forks")) {
    const leader = pickLeader(successes, (slot) => slot.metrics.forks ?? null, (a, b) => a > b);
    if (leader) rankings.most_forked = leader;
  }
  return rankings;
}
