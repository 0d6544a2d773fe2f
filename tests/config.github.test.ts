import { expect } from "chai";

import {
  DEFAULT_GITHUB_API_BASE_URL,
  GITHUB_ACCEPT_HEADER,
  collectGithubRedactionTokens,
  loadGithubConfig,
} from "../src/config/github.js";

describe("config/github", () => {
  it("applies the documented defaults", () => {
    const config = loadGithubConfig({});

    expect(config.baseUrl).to.equal(DEFAULT_GITHUB_API_BASE_URL);
    expect(config.token).to.equal(null);
    expect(config.userAgent).to.equal("repo-scope/1.0");
    expect(config.accept).to.equal(GITHUB_ACCEPT_HEADER);
    expect(config.timeoutMs).to.equal(20_000);
    expect(config.quotaLowWater).to.equal(100);
    expect(config.rateLimit).to.deep.equal({ permits: 1, windowMs: 1_000 });
    expect(config.retry.maxAttempts).to.equal(3);
    expect(config.retry.baseDelayMs).to.equal(1_000);
    expect([...config.retry.retriableStatuses]).to.deep.equal([429, 500, 502, 503, 504]);
  });

  it("reads overrides from the environment", () => {
    const config = loadGithubConfig({
      GITHUB_API_BASE_URL: "https://ghe.example.test/api/v3///",
      GITHUB_TOKEN: "test-token",
      GITHUB_TIMEOUT_MS: "30000",
      GITHUB_RATE_PERMITS: "5",
      GITHUB_RATE_WINDOW_MS: "2000",
      GITHUB_RETRY_MAX_ATTEMPTS: "4",
      GITHUB_RETRY_BASE_DELAY_MS: "250",
      GITHUB_RETRY_STATUSES: "503, 504",
      GITHUB_QUOTA_LOW_WATER: "10",
    });

    expect(config.baseUrl).to.equal("https://ghe.example.test/api/v3");
    expect(config.token).to.equal("test-token");
    expect(config.timeoutMs).to.equal(30_000);
    expect(config.rateLimit).to.deep.equal({ permits: 5, windowMs: 2_000 });
    expect(config.retry.maxAttempts).to.equal(4);
    expect(config.retry.baseDelayMs).to.equal(250);
    expect([...config.retry.retriableStatuses]).to.deep.equal([503, 504]);
    expect(config.quotaLowWater).to.equal(10);
  });

  it("ignores retriable statuses outside the 4xx/5xx range", () => {
    const config = loadGithubConfig({ GITHUB_RETRY_STATUSES: "200,abc,302" });
    expect([...config.retry.retriableStatuses]).to.deep.equal([429, 500, 502, 503, 504]);
  });

  it("keeps the retry budget within bounds", () => {
    const config = loadGithubConfig({ GITHUB_RETRY_MAX_ATTEMPTS: "0", GITHUB_RATE_PERMITS: "-1" });
    expect(config.retry.maxAttempts).to.equal(3);
    expect(config.rateLimit.permits).to.equal(1);
  });

  it("lists the token as a redaction secret", () => {
    expect(collectGithubRedactionTokens(loadGithubConfig({ GITHUB_TOKEN: "test-token" }))).to.deep.equal([
      "test-token",
    ]);
    expect(collectGithubRedactionTokens(loadGithubConfig({}))).to.deep.equal([]);
  });
});
