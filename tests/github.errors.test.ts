import { expect } from "chai";

import {
  AuthenticationError,
  AuthorizationError,
  ERROR_CODES,
  GithubApiError,
  UnexpectedError,
  ValidationError,
  createGithubError,
  describeHttpFailure,
  kindForStatus,
  toGithubError,
} from "../src/github/errors.js";

describe("GitHub error taxonomy", () => {
  it("maps statuses onto kinds", () => {
    expect(kindForStatus(401)).to.equal("authentication");
    expect(kindForStatus(403)).to.equal("authorization");
    expect(kindForStatus(404)).to.equal("not_found");
    expect(kindForStatus(429)).to.equal("rate_limited");
    expect(kindForStatus(502)).to.equal("upstream_server");
    expect(kindForStatus(422)).to.equal("unexpected");
  });

  it("builds the subclass matching a kind with its code and hint", () => {
    const error = createGithubError("authorization", "denied", { status: 403, attempts: 1, endpoint: "/repos/a/b" });

    expect(error).to.be.instanceOf(AuthorizationError);
    expect(error).to.be.instanceOf(GithubApiError);
    expect(error.name).to.equal("AuthorizationError");
    expect(error.code).to.equal("E-GITHUB-FORBIDDEN");
    expect(error.hint).to.equal("check_token_scopes");
    expect(error.status).to.equal(403);
    expect(error.retriable).to.equal(false);
  });

  it("flags transient kinds as retriable", () => {
    expect(createGithubError("rate_limited", "slow down").retriable).to.equal(true);
    expect(createGithubError("timeout", "late").retriable).to.equal(true);
    expect(new ValidationError("bad input").retriable).to.equal(false);
  });

  it("exposes one stable code per kind", () => {
    expect(new AuthenticationError("x").code).to.equal(ERROR_CODES.authentication);
    expect(new ValidationError("x").code).to.equal("E-GITHUB-VALIDATION");
    expect(new UnexpectedError("x").code).to.equal("E-GITHUB-UNEXPECTED");
  });

  it("describes HTTP failures for callers", () => {
    expect(describeHttpFailure(404, "")).to.equal("Resource not found. Check the owner and repository name.");
    expect(describeHttpFailure(422, '{"message":"Validation Failed"}')).to.equal(
      'GitHub API error (HTTP 422): {"message":"Validation Failed"}',
    );
    expect(describeHttpFailure(418, "  ")).to.equal("GitHub API error (HTTP 418).");
  });

  it("wraps foreign errors without losing their description", () => {
    const cause = new TypeError("boom");
    const wrapped = toGithubError(cause);

    expect(wrapped).to.be.instanceOf(UnexpectedError);
    expect(wrapped.message).to.equal("Unexpected failure: boom");
    expect(wrapped.cause).to.equal(cause);

    const original = new ValidationError("bad");
    expect(toGithubError(original)).to.equal(original);
  });
});
