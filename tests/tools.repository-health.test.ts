import { expect } from "chai";

import {
  REPOSITORY_HEALTH_TOOL_NAME,
  collectRepositoryHealth,
  renderRepositoryHealth,
} from "../src/tools/repository_health.js";
import { commitsBody, createGithubHarness, isPrSearch, repositoryBody, type FetchRoute } from "./helpers/github.js";
import { flushNotifications, openToolSession, resultText } from "./helpers/mcp.js";

const HEALTHY_ROUTES: FetchRoute[] = [
  {
    match: "/repos/octo/widget",
    replies: [{ status: 200, body: repositoryBody({ open_issues_count: 7, stargazers_count: 42 }) }],
  },
  { match: isPrSearch, replies: [{ status: 200, body: { total_count: 3, items: [] } }] },
  { match: "/repos/octo/widget/commits", replies: [{ status: 200, body: commitsBody("2024-05-30T00:00:00Z") }] },
];

describe("get_repository_health tool", () => {
  it("returns the health report as text and structured content", async () => {
    const harness = createGithubHarness(HEALTHY_ROUTES);
    const session = await openToolSession(harness, "health");

    try {
      const result = await session.call(REPOSITORY_HEALTH_TOOL_NAME, { owner: "octo", repo: "widget" });

      expect(result.isError).to.equal(false);
      expect(result.structuredContent).to.deep.equal({
        owner: "octo",
        repo: "widget",
        open_issues_count: 4,
        open_prs_count: 3,
        stars_count: 42,
        forks_count: 2,
        watchers_count: 10,
        last_commit_date: "2024-05-30T00:00:00.000Z",
        last_commit_age_days: 2,
        is_archived: false,
        is_disabled: false,
        default_branch: "main",
        language: "TypeScript",
        created_at: "2020-01-01T00:00:00Z",
        updated_at: "2024-05-30T00:00:00Z",
        pushed_at: "2024-05-30T00:00:00Z",
      });
      expect(resultText(result)).to.equal(
        [
          "Repository health: octo/widget",
          "",
          "Open issues: 4",
          "Open pull requests: 3",
          "Stars: 42",
          "Forks: 2",
          "Watchers: 10",
          "Last commit: 2024-05-30 (2 days ago)",
          "Default branch: main",
          "Language: TypeScript",
          "Created: 2020-01-01",
          "Status: active",
        ].join("\n"),
      );
      expect(result._meta).to.deep.equal({ operation: REPOSITORY_HEALTH_TOOL_NAME, owner: "octo", repo: "widget" });
      expect(harness.logger.find("get_repository_health_requested")).to.have.length(1);
    } finally {
      await session.close();
    }
  });

  it("returns the error envelope for a missing repository", async () => {
    const harness = createGithubHarness([]);
    const session = await openToolSession(harness, "health");

    try {
      const result = await session.call(REPOSITORY_HEALTH_TOOL_NAME, { owner: "octo", repo: "missing" });
      await flushNotifications();

      expect(result.isError).to.equal(true);
      expect(result.structuredContent).to.deep.equal({
        ok: false,
        error: "E-GITHUB-NOT-FOUND",
        tool: REPOSITORY_HEALTH_TOOL_NAME,
        message: "Resource not found. Check the owner and repository name.",
        hint: "check_owner_and_repo",
      });
      expect(JSON.parse(resultText(result))).to.deep.equal(result.structuredContent);
      expect(harness.fetchStub.callCount).to.equal(1);
      expect(harness.logger.find("get_repository_health_failed")).to.have.length(1);
      expect(session.messages.map((message) => [message.level, message.data])).to.deep.include([
        "error",
        "get_repository_health failed: Resource not found. Check the owner and repository name.",
      ]);
    } finally {
      await session.close();
    }
  });

  it("rejects blank identifiers as validation errors", async () => {
    const harness = createGithubHarness(HEALTHY_ROUTES);
    const session = await openToolSession(harness, "health");

    try {
      const result = await session.call(REPOSITORY_HEALTH_TOOL_NAME, { owner: "   ", repo: "widget" });

      expect(result.isError).to.equal(true);
      expect(result.structuredContent).to.deep.include({
        ok: false,
        error: "E-GITHUB-VALIDATION",
        message: "Invalid tool input.",
        hint: "invalid_input",
      });
      expect(harness.fetchStub.callCount).to.equal(0);
    } finally {
      await session.close();
    }
  });

  it("reports a missing credential without contacting GitHub", async () => {
    const harness = createGithubHarness(HEALTHY_ROUTES, { token: null });
    const session = await openToolSession(harness, "health");

    try {
      const result = await session.call(REPOSITORY_HEALTH_TOOL_NAME, { owner: "octo", repo: "widget" });

      expect(result.structuredContent).to.deep.include({ error: "E-GITHUB-AUTH", hint: "check_token" });
      expect(harness.fetchStub.callCount).to.equal(0);
    } finally {
      await session.close();
    }
  });
});

describe("collectRepositoryHealth", () => {
  it("degrades the optional calls to zero pull requests and an unknown commit", async () => {
    const harness = createGithubHarness([
      {
        match: "/repos/octo/widget",
        replies: [{ status: 200, body: repositoryBody({ archived: true, language: null }) }],
      },
      { match: isPrSearch, replies: [{ status: 403, body: { message: "Forbidden" } }] },
      { match: "/repos/octo/widget/commits", replies: [{ status: 409, body: { message: "Git Repository is empty." } }] },
    ]);

    const health = await collectRepositoryHealth(harness.context, "octo", "widget");

    expect(health.open_prs_count).to.equal(0);
    expect(health.open_issues_count).to.equal(5);
    expect(health.last_commit_date).to.equal(null);
    expect(health.last_commit_age_days).to.equal(null);

    const text = renderRepositoryHealth(health).split("\n");
    expect(text).to.include("Last commit: unknown");
    expect(text).to.include("Language: -");
    expect(text).to.include("Status: archived");
  });
});
