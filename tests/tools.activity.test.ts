import { expect } from "chai";

import { BRANCH_ANALYSIS_TOOL_NAME } from "../src/tools/branch_analysis.js";
import { COMMIT_STATISTICS_TOOL_NAME, resolvePeriodBound } from "../src/tools/commit_statistics.js";
import { DEVELOPER_ACTIVITY_TOOL_NAME } from "../src/tools/developer_activity.js";
import { TEST_NOW, createGithubHarness } from "./helpers/github.js";
import { openToolSession, resultText } from "./helpers/mcp.js";

function requestedUrl(harness: ReturnType<typeof createGithubHarness>, call: number): URL {
  return new URL(String(harness.fetchStub.getCall(call).args[0]));
}

function branchDetail(name: string, date: string): Record<string, unknown> {
  return { name, commit: { sha: "0000000", commit: { author: { name: "dev", date }, committer: { name: "dev", date } } } };
}

describe("resolvePeriodBound", () => {
  it("reads relative, calendar and keyword bounds", () => {
    expect(resolvePeriodBound("now", TEST_NOW, "until").toISOString()).to.equal("2024-06-01T00:00:00.000Z");
    expect(resolvePeriodBound("7 days ago", TEST_NOW, "since").toISOString()).to.equal("2024-05-25T00:00:00.000Z");
    expect(resolvePeriodBound("1 day ago", TEST_NOW, "since").toISOString()).to.equal("2024-05-31T00:00:00.000Z");
    expect(resolvePeriodBound("2024-03-15", TEST_NOW, "since").toISOString()).to.equal("2024-03-15T00:00:00.000Z");
  });

  it("rejects anything else", () => {
    expect(() => resolvePeriodBound("last week", TEST_NOW, "since")).to.throw(
      `since must be YYYY-MM-DD, an ISO timestamp, 'N days ago' or 'now' (received "last week").`,
    );
  });
});

describe("get_commit_statistics tool", () => {
  it("counts commits by author and weekday over the period", async () => {
    const harness = createGithubHarness([
      {
        match: "/repos/octo/widget/commits",
        replies: [
          {
            status: 200,
            body: [
              { commit: { author: { name: "alice", date: "2024-05-27T10:00:00Z" } } },
              { commit: { author: { name: "alice", date: "2024-05-28T09:00:00Z" } } },
              { commit: { author: { name: "bob", date: "2024-05-27T15:00:00Z" } } },
              { commit: { author: null, committer: { name: "web-flow", date: "2024-05-31T08:00:00Z" } } },
            ],
          },
        ],
      },
    ]);
    const session = await openToolSession(harness, "activity");

    try {
      const result = await session.call(COMMIT_STATISTICS_TOOL_NAME, { owner: "octo", repo: "widget", since: "2024-05-01" });

      expect(result.structuredContent).to.deep.equal({
        owner: "octo",
        repo: "widget",
        period: { since: "2024-05-01T00:00:00.000Z", until: "2024-06-01T00:00:00.000Z" },
        total_commits: 4,
        unique_authors: 3,
        top_authors: [
          { name: "alice", commits: 2, percentage: 50 },
          { name: "bob", commits: 1, percentage: 25 },
          { name: "Unknown", commits: 1, percentage: 25 },
        ],
        activity_by_weekday: {
          Monday: 2,
          Tuesday: 1,
          Wednesday: 0,
          Thursday: 0,
          Friday: 1,
          Saturday: 0,
          Sunday: 0,
        },
        busiest_weekday: "Monday",
      });
      expect(resultText(result)).to.equal(
        [
          "Commit statistics: octo/widget",
          "Period: 2024-05-01 to 2024-06-01",
          "",
          "Commits: 4",
          "Authors: 3",
          "",
          "Top authors:",
          "  1. alice: 2 commits (50%)",
          "  2. bob: 1 commits (25%)",
          "  3. Unknown: 1 commits (25%)",
          "",
          "By weekday:",
          "  - Monday: 2",
          "  - Tuesday: 1",
          "  - Friday: 1",
          "  - Wednesday: 0",
          "  - Thursday: 0",
          "  - Saturday: 0",
          "  - Sunday: 0",
        ].join("\n"),
      );
      const url = requestedUrl(harness, 0);
      expect(url.searchParams.get("since")).to.equal("2024-05-01T00:00:00.000Z");
      expect(url.searchParams.get("until")).to.equal("2024-06-01T00:00:00.000Z");
      expect(url.searchParams.get("per_page")).to.equal("100");
    } finally {
      await session.close();
    }
  });

  it("defaults to the last thirty days", async () => {
    const harness = createGithubHarness([{ match: "/repos/octo/widget/commits", replies: [{ status: 200, body: [] }] }]);
    const session = await openToolSession(harness, "activity");

    try {
      const result = await session.call(COMMIT_STATISTICS_TOOL_NAME, { owner: "octo", repo: "widget" });

      expect(result.structuredContent).to.deep.include({ total_commits: 0, busiest_weekday: null });
      expect(resultText(result)).to.equal(
        [
          "Commit statistics: octo/widget",
          "Period: 2024-05-02 to 2024-06-01",
          "",
          "Commits: 0",
          "Authors: 0",
          "",
          "No commits in this period.",
        ].join("\n"),
      );
    } finally {
      await session.close();
    }
  });

  it("rejects a period that ends before it starts", async () => {
    const harness = createGithubHarness([]);
    const session = await openToolSession(harness, "activity");

    try {
      const result = await session.call(COMMIT_STATISTICS_TOOL_NAME, {
        owner: "octo",
        repo: "widget",
        since: "now",
        until: "2 days ago",
      });

      expect(result.isError).to.equal(true);
      expect(result.structuredContent).to.deep.include({ error: "E-GITHUB-VALIDATION" });
      expect(harness.fetchStub.callCount).to.equal(0);
    } finally {
      await session.close();
    }
  });
});

describe("get_branch_analysis tool", () => {
  it("splits branches around the activity threshold", async () => {
    const harness = createGithubHarness([
      {
        match: "/repos/octo/widget/branches",
        replies: [
          {
            status: 200,
            body: [
              { name: "main", protected: true, commit: { sha: "1234567890" } },
              { name: "feature/login", commit: { sha: "abcdef0123" } },
              { name: "old-spike", commit: { sha: "fedcba9876" } },
              { name: "ghost", commit: { sha: "0f0f0f0f0f" } },
            ],
          },
        ],
      },
      { match: "/repos/octo/widget/branches/main", replies: [{ status: 200, body: branchDetail("main", "2024-05-29T00:00:00Z") }] },
      {
        match: "/repos/octo/widget/branches/feature%2Flogin",
        replies: [{ status: 200, body: branchDetail("feature/login", "2024-05-11T12:00:00Z") }],
      },
      {
        match: "/repos/octo/widget/branches/old-spike",
        replies: [{ status: 200, body: branchDetail("old-spike", "2023-12-04T00:00:00Z") }],
      },
    ]);
    const session = await openToolSession(harness, "activity");

    try {
      const result = await session.call(BRANCH_ANALYSIS_TOOL_NAME, { owner: "octo", repo: "widget", days_threshold: 30 });

      expect(result.structuredContent).to.deep.equal({
        owner: "octo",
        repo: "widget",
        days_threshold: 30,
        total_branches: 4,
        active_branches_count: 2,
        inactive_branches_count: 1,
        unchecked_branches_count: 1,
        protected_branches_count: 1,
        active_branches: [
          { name: "main", protected: true, last_commit_days_ago: 3, sha: "1234567" },
          { name: "feature/login", protected: false, last_commit_days_ago: 20, sha: "abcdef0" },
        ],
        inactive_branches: [{ name: "old-spike", protected: false, last_commit_days_ago: 180, sha: "fedcba9" }],
        protected_branches: ["main"],
      });
      expect(resultText(result)).to.equal(
        [
          "Branches: octo/widget",
          "",
          "Total: 4",
          "Active (<= 30 days): 2",
          "Inactive (> 30 days): 1",
          "Not checked: 1",
          "Protected: 1",
          "",
          "Most recently active:",
          "  - main (protected): last commit 3 days ago",
          "  - feature/login: last commit 20 days ago",
          "",
          "Longest inactive:",
          "  - old-spike: last commit 180 days ago",
        ].join("\n"),
      );
      expect(harness.fetchStub.callCount).to.equal(5);
    } finally {
      await session.close();
    }
  });
});

describe("get_developer_activity tool", () => {
  it("ranks developers by their attributed commits", async () => {
    const harness = createGithubHarness([
      {
        match: "/repos/octo/widget/commits",
        replies: [
          {
            status: 200,
            body: [
              { author: { login: "alice" }, commit: { author: { name: "Alice Liddell" } } },
              { author: { login: "bob" }, commit: { author: { name: "Bob" } } },
              { author: { login: "alice" }, commit: { author: { name: "A. Liddell" } } },
              { author: null, commit: { author: { name: "Anon" } } },
            ],
          },
        ],
      },
    ]);
    const session = await openToolSession(harness, "activity");

    try {
      const result = await session.call(DEVELOPER_ACTIVITY_TOOL_NAME, { owner: "octo", repo: "widget", top_n: 1 });

      expect(result.structuredContent).to.deep.equal({
        owner: "octo",
        repo: "widget",
        total_commits: 4,
        unattributed_commits: 1,
        unique_developers: 2,
        top_developers: [{ login: "alice", name: "Alice Liddell", commits: 2, percentage: 50 }],
      });
      expect(resultText(result)).to.equal(
        [
          "Developer activity: octo/widget",
          "",
          "Commits analysed: 4",
          "Developers: 2",
          "",
          "Top 1:",
          "  1. Alice Liddell (@alice): 2 commits (50%)",
        ].join("\n"),
      );
    } finally {
      await session.close();
    }
  });

  it("follows the commit listing onto its next page", async () => {
    const fullPage = Array.from({ length: 100 }, () => ({ author: { login: "carol" }, commit: { author: { name: "Carol" } } }));
    const harness = createGithubHarness([
      {
        match: "/repos/octo/widget/commits",
        replies: [
          { status: 200, body: fullPage },
          { status: 200, body: [{ author: { login: "dave" }, commit: { author: { name: "Dave" } } }] },
        ],
      },
    ]);
    const session = await openToolSession(harness, "activity");

    try {
      const result = await session.call(DEVELOPER_ACTIVITY_TOOL_NAME, { owner: "octo", repo: "widget" });

      expect(result.structuredContent).to.deep.include({
        total_commits: 101,
        top_developers: [
          { login: "carol", name: "Carol", commits: 100, percentage: 99.01 },
          { login: "dave", name: "Dave", commits: 1, percentage: 0.99 },
        ],
      });
      expect(harness.fetchStub.callCount).to.equal(2);
      expect(requestedUrl(harness, 1).searchParams.get("page")).to.equal("2");
    } finally {
      await session.close();
    }
  });
});
