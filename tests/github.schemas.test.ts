import { expect } from "chai";

import {
  commitListSchema,
  contributorListSchema,
  daysSince,
  issueListSchema,
  latestCommitDate,
  parseGithubTimestamp,
  repositorySchema,
} from "../src/github/schemas.js";

describe("GitHub payload schemas", () => {
  it("defaults missing repository fields", () => {
    const repository = repositorySchema.parse({ stargazers_count: 3, forks_count: -1 });

    expect(repository).to.deep.include({
      stargazers_count: 3,
      forks_count: 0,
      watchers_count: 0,
      open_issues_count: 0,
      archived: false,
      default_branch: "main",
      language: null,
      pushed_at: null,
    });
  });

  it("accepts labels given as strings or objects", () => {
    const [issue] = issueListSchema.parse([{ number: 1, labels: ["bug", { name: "docs", color: "fff" }] }]);

    expect(issue.labels.map((label) => label.name)).to.deep.equal(["bug", "docs"]);
    expect(issue.state).to.equal("open");
    expect(issue.comments).to.equal(0);
  });

  it("reads a bodiless contributor listing as empty", () => {
    expect(contributorListSchema.parse(null)).to.deep.equal([]);
  });

  it("takes the author date of the newest commit, else the committer date", () => {
    const authored = commitListSchema.parse([
      { commit: { author: { date: "2024-05-30T08:00:00Z" }, committer: { date: "2024-05-31T08:00:00Z" } } },
    ]);
    const committed = commitListSchema.parse([{ commit: { author: null, committer: { date: "2024-05-31T08:00:00Z" } } }]);

    expect(latestCommitDate(authored)?.toISOString()).to.equal("2024-05-30T08:00:00.000Z");
    expect(latestCommitDate(committed)?.toISOString()).to.equal("2024-05-31T08:00:00.000Z");
    expect(latestCommitDate([])).to.equal(null);
  });

  it("counts whole elapsed days", () => {
    const now = Date.UTC(2024, 5, 1, 12);

    expect(daysSince(new Date("2024-05-31T13:00:00Z"), now)).to.equal(0);
    expect(daysSince(new Date("2024-05-31T12:00:00Z"), now)).to.equal(1);
    expect(daysSince(null, now)).to.equal(null);
  });

  it("ignores unparsable timestamps", () => {
    expect(parseGithubTimestamp("not a date")).to.equal(null);
    expect(parseGithubTimestamp(undefined)).to.equal(null);
  });
});
