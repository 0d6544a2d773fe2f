import { expect } from "chai";
import sinon from "sinon";

import {
  COMPARISON_METRICS,
  deriveRankings,
  resolveMetrics,
  validateTargets,
  type ComparisonReport,
  type SucceededSlot,
} from "../src/comparison/aggregator.js";
import { AuthenticationError, ValidationError } from "../src/github/errors.js";
import type { ProgressSink } from "../src/github/notifier.js";
import {
  commitsBody,
  createGithubHarness,
  isPrSearch,
  repositoryBody,
  type FetchRoute,
} from "./helpers/github.js";

function prSearchFor(target: string, total: number): FetchRoute {
  return {
    match: (url) => isPrSearch(url) && (url.searchParams.get("q") ?? "").startsWith(`repo:${target} `),
    replies: [{ status: 200, body: { total_count: total, items: [] } }],
  };
}

/** alpha: fewer stars, fresh commit. beta: more stars, month-old commit. */
const TWO_TARGET_ROUTES: FetchRoute[] = [
  {
    match: "/repos/octo/alpha",
    replies: [{ status: 200, body: repositoryBody({ stargazers_count: 100, forks_count: 5, open_issues_count: 12 }) }],
  },
  {
    match: "/repos/octo/beta",
    replies: [{ status: 200, body: repositoryBody({ stargazers_count: 500, forks_count: 3, open_issues_count: 4 }) }],
  },
  prSearchFor("octo/alpha", 2),
  prSearchFor("octo/beta", 10),
  { match: "/repos/octo/alpha/commits", replies: [{ status: 200, body: commitsBody("2024-05-30T00:00:00Z") }] },
  { match: "/repos/octo/beta/commits", replies: [{ status: 200, body: commitsBody("2024-05-02T00:00:00Z") }] },
];

const ALPHA = { owner: "octo", repo: "alpha" };
const BETA = { owner: "octo", repo: "beta" };

async function captureFailure(run: () => Promise<unknown>): Promise<unknown> {
  try {
    await run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("RepositoryComparator", () => {
  it("collects every metric and ranks the targets", async () => {
    const harness = createGithubHarness(TWO_TARGET_ROUTES);

    const report = await harness.comparator.compare([ALPHA, BETA]);

    expect(report.compared_at).to.equal("2024-06-01T00:00:00.000Z");
    expect(report.metrics_compared).to.deep.equal([...COMPARISON_METRICS]);
    expect(report.succeeded).to.equal(2);
    expect(report.failed).to.equal(0);
    expect(report.metrics).to.deep.equal({
      open_issues: { "octo/alpha": 10, "octo/beta": 0 },
      open_prs: { "octo/alpha": 2, "octo/beta": 10 },
      stars: { "octo/alpha": 100, "octo/beta": 500 },
      forks: { "octo/alpha": 5, "octo/beta": 3 },
      watchers: { "octo/alpha": 10, "octo/beta": 10 },
      last_commit_age: { "octo/alpha": 2, "octo/beta": 30 },
    });
    expect(report.rankings).to.deep.equal({
      most_active: "octo/alpha",
      most_popular: "octo/beta",
      most_forked: "octo/alpha",
    });
    expect(report.targets[0]).to.deep.include({
      target: "octo/alpha",
      status: "succeeded",
      last_commit_date: "2024-05-30T00:00:00.000Z",
      language: "TypeScript",
      archived: false,
    });
  });

  it("keeps one slot per target when some of them fail", async () => {
    const harness = createGithubHarness([
      ...TWO_TARGET_ROUTES,
      { match: "/repos/octo/flaky", replies: [{ status: 503 }] },
    ]);
    const missing = { owner: "octo", repo: "missing" };

    const report = await harness.comparator.compare([ALPHA, missing, BETA, { owner: "octo", repo: "flaky" }]);

    expect(report.targets.map((slot) => [slot.target, slot.status])).to.deep.equal([
      ["octo/alpha", "succeeded"],
      ["octo/missing", "failed"],
      ["octo/beta", "succeeded"],
      ["octo/flaky", "failed"],
    ]);
    expect(report.succeeded).to.equal(2);
    expect(report.failed).to.equal(2);

    const [, notFound, , flaky] = report.targets;
    expect(notFound.status === "failed" && notFound.error).to.deep.equal({
      code: "E-GITHUB-NOT-FOUND",
      kind: "not_found",
      message: "Resource not found. Check the owner and repository name.",
      status: 404,
    });
    expect(flaky.status === "failed" && flaky.error).to.deep.include({
      code: "E-GITHUB-UPSTREAM",
      kind: "upstream_server",
      status: 503,
    });
    expect(Object.keys(report.metrics.stars ?? {})).to.deep.equal(["octo/alpha", "octo/beta"]);
    expect(report.rankings.most_popular).to.equal("octo/beta");
    expect(harness.logger.find("compare_target_failed")).to.have.length(2);
  });

  it("spaces every upstream call of a multi-target comparison by the rate window", async () => {
    const gamma = { owner: "octo", repo: "gamma" };
    const harness = createGithubHarness(
      [
        ...TWO_TARGET_ROUTES,
        { match: "/repos/octo/gamma", replies: [{ status: 200, body: repositoryBody({ stargazers_count: 7 }) }] },
        prSearchFor("octo/gamma", 0),
        { match: "/repos/octo/gamma/commits", replies: [{ status: 200, body: commitsBody("2024-05-31T00:00:00Z") }] },
      ],
      { rateLimit: { permits: 1, windowMs: 1_000 } },
    );
    const acquire = sinon.spy(harness.budget, "acquire");

    const report = await harness.comparator.compare([ALPHA, BETA, gamma]);
    const grants = await Promise.all(acquire.returnValues);

    expect(report.succeeded).to.equal(3);
    expect(harness.fetchStub.callCount).to.equal(9);
    expect(grants.map((grant) => grant - grants[0])).to.deep.equal([
      0, 1_000, 2_000, 3_000, 4_000, 5_000, 6_000, 7_000, 8_000,
    ]);
    for (let index = 1; index < grants.length; index += 1) {
      expect(grants[index] - grants[index - 1]).to.be.at.least(1_000);
    }
  });

  it("reports progress once per settled target and forwards failures", async () => {
    const harness = createGithubHarness(TWO_TARGET_ROUTES);
    const sink = {
      info: sinon.stub<[string], Promise<void>>().resolves(),
      warning: sinon.stub<[string], Promise<void>>().resolves(),
      error: sinon.stub<[string], Promise<void>>().resolves(),
      progress: sinon.stub<[number, number, string?], Promise<void>>().resolves(),
    } satisfies ProgressSink;

    await harness.comparator.compare([ALPHA, { owner: "octo", repo: "missing" }], ["stars"], sink);

    expect(sink.progress.callCount).to.equal(2);
    expect(sink.progress.getCalls().map((call) => [call.args[0], call.args[1]])).to.deep.equal([
      [1, 2],
      [2, 2],
    ]);
    sinon.assert.calledOnceWithExactly(
      sink.error,
      "octo/missing: Resource not found. Check the owner and repository name.",
    );
  });

  it("skips the calls a restricted metric list does not need", async () => {
    const harness = createGithubHarness(TWO_TARGET_ROUTES);

    const report = await harness.comparator.compare([ALPHA, BETA], ["stars", "forks"]);

    const paths = harness.fetchStub.getCalls().map((call) => new URL(String(call.args[0])).pathname);
    expect(paths.sort()).to.deep.equal(["/repos/octo/alpha", "/repos/octo/beta"]);
    expect(report.metrics_compared).to.deep.equal(["stars", "forks"]);
    expect(report.targets[0].status === "succeeded" && report.targets[0].metrics).to.deep.equal({
      stars: 100,
      forks: 5,
    });
    expect(report.rankings).to.deep.equal({ most_popular: "octo/beta", most_forked: "octo/alpha" });
  });

  it("treats an unavailable pull request count as zero", async () => {
    const harness = createGithubHarness([
      TWO_TARGET_ROUTES[0],
      TWO_TARGET_ROUTES[1],
      { match: (url) => isPrSearch(url), replies: [{ status: 422, body: { message: "Validation Failed" } }] },
    ]);

    const report = await harness.comparator.compare([ALPHA, BETA], ["open_issues", "open_prs"]);

    expect(report.succeeded).to.equal(2);
    expect(report.metrics.open_prs).to.deep.equal({ "octo/alpha": 0, "octo/beta": 0 });
    expect(report.metrics.open_issues).to.deep.equal({ "octo/alpha": 12, "octo/beta": 4 });
    expect(harness.logger.find("compare_pr_count_unavailable")).to.have.length(2);
  });

  it("reports an unknown commit age as null and ranks it last", async () => {
    const harness = createGithubHarness([
      TWO_TARGET_ROUTES[0],
      TWO_TARGET_ROUTES[1],
      { match: "/repos/octo/alpha/commits", replies: [{ status: 409, body: { message: "Git Repository is empty." } }] },
      TWO_TARGET_ROUTES[5],
    ]);

    const report = await harness.comparator.compare([ALPHA, BETA], ["last_commit_age"]);

    expect(report.metrics.last_commit_age).to.deep.equal({ "octo/alpha": null, "octo/beta": 30 });
    expect(report.rankings).to.deep.equal({ most_active: "octo/beta" });
    expect(report.targets[0].status === "succeeded" && report.targets[0].last_commit_date).to.equal(null);
  });

  it("rejects invalid target lists before contacting GitHub", async () => {
    const harness = createGithubHarness(TWO_TARGET_ROUTES);
    const six = Array.from({ length: 6 }, (_, index) => ({ owner: "octo", repo: `r${index}` }));

    const tooFew = await captureFailure(() => harness.comparator.compare([ALPHA]));
    const tooMany = await captureFailure(() => harness.comparator.compare(six));
    const duplicated = await captureFailure(() =>
      harness.comparator.compare([ALPHA, { owner: "Octo", repo: "Alpha" }]),
    );
    const badMetric = await captureFailure(() => harness.comparator.compare([ALPHA, BETA], ["stars", "karma"]));

    expect(tooFew).to.be.instanceOf(ValidationError);
    expect(tooFew).to.have.property("message", "A comparison needs between 2 and 5 repositories (received 1).");
    expect(tooMany).to.have.property("message", "A comparison needs between 2 and 5 repositories (received 6).");
    expect(duplicated).to.have.property("message", "Repository Octo/Alpha is listed more than once.");
    expect(badMetric).to.have.property("message", "Unknown comparison metric(s): karma.");
    sinon.assert.notCalled(harness.fetchStub);
  });

  it("requires a credential", async () => {
    const harness = createGithubHarness(TWO_TARGET_ROUTES, { token: null });

    const failure = await captureFailure(() => harness.comparator.compare([ALPHA, BETA]));

    expect(failure).to.be.instanceOf(AuthenticationError);
    sinon.assert.notCalled(harness.fetchStub);
  });
});

describe("comparison helpers", () => {
  it("trims targets and rejects blank components", () => {
    expect(validateTargets([{ owner: " octo ", repo: "alpha" }, BETA])).to.deep.equal([ALPHA, BETA]);
    expect(() => validateTargets([ALPHA, { owner: "octo", repo: "  " }])).to.throw(
      ValidationError,
      "Repository #2 must provide both owner and repo.",
    );
  });

  it("returns requested metrics in canonical order", () => {
    expect(resolveMetrics(["last_commit_age", "stars"])).to.deep.equal(["stars", "last_commit_age"]);
    expect(resolveMetrics([])).to.deep.equal([...COMPARISON_METRICS]);
    expect(resolveMetrics()).to.deep.equal([...COMPARISON_METRICS]);
  });

  it("keeps the first target on ties", () => {
    const slot = (target: string, stars: number): SucceededSlot => ({
      target,
      owner: "octo",
      repo: target,
      status: "succeeded",
      metrics: { stars, last_commit_age: null },
      last_commit_date: null,
      language: null,
      archived: false,
    });
    const rankings: ComparisonReport["rankings"] = deriveRankings(
      [slot("first", 7), slot("second", 7)],
      ["stars", "last_commit_age"],
    );

    expect(rankings).to.deep.equal({ most_active: "first", most_popular: "first" });
    expect(deriveRankings([], ["stars"])).to.deep.equal({});
  });
});
