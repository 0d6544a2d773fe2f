import { expect } from "chai";

import { TAGS_ANALYSIS_TOOL_NAME } from "../src/tools/tags_analysis.js";
import { VERSION_COMPARISON_TOOL_NAME } from "../src/tools/version_comparison.js";
import {
  classifyVersionChange,
  compareVersions,
  parseVersion,
  versionDirection,
  type ParsedVersion,
} from "../src/tools/versions.js";
import { createGithubHarness } from "./helpers/github.js";
import { openToolSession, resultText } from "./helpers/mcp.js";

function version(name: string): ParsedVersion {
  const parsed = parseVersion(name);
  if (!parsed) {
    throw new Error(`expected ${name} to parse`);
  }
  return parsed;
}

describe("versions", () => {
  it("reads tag names with prefixes and pre-release suffixes", () => {
    expect(parseVersion("v1.2.3-4")).to.deep.equal({ major: 1, minor: 2, patch: 3, prerelease: "4" });
    expect(parseVersion("release-2.0")).to.deep.equal({ major: 2, minor: 0, patch: 0, prerelease: null });
    expect(parseVersion("pkg@1.2.0+build.7")).to.deep.equal({ major: 1, minor: 2, patch: 0, prerelease: null });
    expect(parseVersion("nightly")).to.equal(null);
  });

  it("orders pre-releases before their release", () => {
    const names = ["1.0.0", "1.0.0-beta", "1.0.0-alpha.1", "1.0.0-alpha", "0.9.12"];

    const sorted = [...names].sort((left, right) => compareVersions(version(left), version(right)));

    expect(sorted).to.deep.equal(["0.9.12", "1.0.0-alpha", "1.0.0-alpha.1", "1.0.0-beta", "1.0.0"]);
  });

  it("classifies the largest differing component", () => {
    expect(classifyVersionChange(version("1.2.3"), version("2.0.0"))).to.equal("major");
    expect(classifyVersionChange(version("1.2.3"), version("1.3.0"))).to.equal("minor");
    expect(classifyVersionChange(version("1.2.3"), version("1.2.4"))).to.equal("patch");
    expect(classifyVersionChange(version("1.2.3-rc.1"), version("1.2.3"))).to.equal("prerelease");
    expect(classifyVersionChange(version("v1.2.3"), version("1.2.3"))).to.equal("none");
  });

  it("tells upgrades from downgrades", () => {
    expect(versionDirection(version("1.0.0"), version("1.10.0"))).to.equal("upgrade");
    expect(versionDirection(version("2.0.0"), version("1.9.9"))).to.equal("downgrade");
    expect(versionDirection(version("v3.1"), version("3.1.0"))).to.equal("same");
  });
});

describe("analyze_repository_tags tool", () => {
  it("summarises the versioning of the listed tags", async () => {
    const harness = createGithubHarness([
      {
        match: "/repos/octo/widget/tags",
        replies: [
          {
            status: 200,
            body: [
              { name: "v1.9.3", commit: { sha: "a1b2c3d4e5f6" } },
              { name: "v1.10.0", commit: { sha: "b2c3d4e5f6a7" } },
              { name: "v1.10.0-rc.2", commit: { sha: "c3d4e5f6a7b8" } },
              { name: "nightly", commit: { sha: "d4e5f6a7b8c9" } },
            ],
          },
        ],
      },
    ]);
    const session = await openToolSession(harness, "releases");

    try {
      const result = await session.call(TAGS_ANALYSIS_TOOL_NAME, { owner: "octo", repo: "widget", limit: 4 });

      expect(result.structuredContent).to.deep.include({
        total_tags: 4,
        latest_tag: { name: "v1.9.3", commit_sha: "a1b2c3d4e5f6" },
        highest_version: "v1.10.0",
        versioning: { semantic_tags: 3, prerelease_tags: 1, other_tags: 1 },
      });
      expect(resultText(result)).to.equal(
        [
          "Tags: octo/widget",
          "",
          "Listed: 4",
          "Latest listed: v1.9.3 (commit a1b2c3d)",
          "Highest version: v1.10.0",
          "Semantic versions: 3 (1 pre-release), other tags: 1",
          "",
          "Tags:",
          "  1. v1.9.3 (commit a1b2c3d)",
          "  2. v1.10.0 (commit b2c3d4e)",
          "  3. v1.10.0-rc.2 (commit c3d4e5f)",
          "  4. nightly (commit d4e5f6a)",
        ].join("\n"),
      );
      expect(new URL(String(harness.fetchStub.firstCall.args[0])).searchParams.get("per_page")).to.equal("4");
    } finally {
      await session.close();
    }
  });

  it("reports a repository without tags", async () => {
    const harness = createGithubHarness([{ match: "/repos/octo/widget/tags", replies: [{ status: 200, body: [] }] }]);
    const session = await openToolSession(harness, "releases");

    try {
      const result = await session.call(TAGS_ANALYSIS_TOOL_NAME, { owner: "octo", repo: "widget" });

      expect(result.structuredContent).to.deep.include({ total_tags: 0, latest_tag: null, highest_version: null });
      expect(resultText(result)).to.equal("Tags: octo/widget\n\nNo tags found.");
      expect(new URL(String(harness.fetchStub.firstCall.args[0])).searchParams.get("per_page")).to.equal("20");
    } finally {
      await session.close();
    }
  });
});

describe("compare_release_versions tool", () => {
  it("compares the two latest releases by default", async () => {
    const harness = createGithubHarness([
      {
        match: "/repos/octo/widget/releases",
        replies: [{ status: 200, body: [{ tag_name: "v2.1.0" }, { tag_name: "v2.0.3" }] }],
      },
      {
        match: "/repos/octo/widget/compare/v2.0.3...v2.1.0",
        replies: [
          { status: 200, body: { status: "ahead", ahead_by: 12, behind_by: 0, total_commits: 12, files: [{}, {}, {}] } },
        ],
      },
    ]);
    const session = await openToolSession(harness, "releases");

    try {
      const result = await session.call(VERSION_COMPARISON_TOOL_NAME, { owner: "octo", repo: "widget" });

      expect(result.structuredContent).to.deep.equal({
        owner: "octo",
        repo: "widget",
        version1: "v2.1.0",
        version2: "v2.0.3",
        comparison_available: true,
        releases_found: 2,
        latest_release: "v2.1.0",
        change: "minor",
        direction: "upgrade",
        changes: { status: "ahead", ahead_by: 12, behind_by: 0, total_commits: 12, files_changed: 3 },
        recommendation: "Minor version change: new features, no breaking changes expected.",
      });
      expect(resultText(result)).to.equal(
        [
          "Version comparison: octo/widget",
          "",
          "v2.0.3 -> v2.1.0",
          "Change: minor (upgrade)",
          "Commits: 12 ahead, 0 behind; files changed: 3",
          "",
          "Minor version change: new features, no breaking changes expected.",
        ].join("\n"),
      );
    } finally {
      await session.close();
    }
  });

  it("still answers when the refs cannot be compared", async () => {
    const harness = createGithubHarness([
      { match: "/repos/octo/widget/releases", replies: [{ status: 200, body: [] }] },
    ]);
    const session = await openToolSession(harness, "releases");

    try {
      const result = await session.call(VERSION_COMPARISON_TOOL_NAME, {
        owner: "octo",
        repo: "widget",
        version1: "main",
        version2: "legacy",
      });

      expect(result.isError).to.not.equal(true);
      expect(result.structuredContent).to.deep.include({ change: null, direction: null, changes: null });
      expect(resultText(result)).to.equal(
        [
          "Version comparison: octo/widget",
          "",
          "legacy -> main",
          "Commit comparison unavailable.",
          "",
          "Names are not semantic versions: check the changelog between both refs.",
        ].join("\n"),
      );
      expect(harness.logger.find("version_comparison_refs_unavailable")).to.have.length(1);
    } finally {
      await session.close();
    }
  });

  it("explains when fewer than two releases exist", async () => {
    const harness = createGithubHarness([
      { match: "/repos/octo/widget/releases", replies: [{ status: 200, body: [{ tag_name: "v0.1.0" }] }] },
    ]);
    const session = await openToolSession(harness, "releases");

    try {
      const result = await session.call(VERSION_COMPARISON_TOOL_NAME, { owner: "octo", repo: "widget" });

      expect(result.structuredContent).to.deep.include({ comparison_available: false, version2: null });
      expect(resultText(result)).to.equal(
        ["Version comparison: octo/widget", "", "Not enough releases to compare.", "Releases found: 1", "Latest release: v0.1.0"].join(
          "\n",
        ),
      );
      expect(harness.fetchStub.callCount).to.equal(1);
    } finally {
      await session.close();
    }
  });
});
