import assert from "assert/strict";
import { defaultBranchPrefix, loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

suite("config", () => {
  test("defaults", () => {
    const config = loadConfig({}, () => "alice");
    assert.deepStrictEqual(config, {
      gitBinary: "git",
      branchPrefix: "alice",
      trailerPrefix: "Change-Id:",
      baseBranch: undefined,
      remote: undefined,
      timeoutMs: 30000,
      retries: 3,
      gitlabUrl: "https://gitlab.com",
      githubOwner: undefined,
      githubRepo: undefined,
    });
  });

  test("reads overrides from the environment", () => {
    const config = loadConfig(
      {
        GITPUBLISH_BRANCH_PREFIX: "team",
        GITPUBLISH_CHANGE_ID_PREFIX: "X-Change:",
        GITPUBLISH_BASE_BRANCH: "develop",
        GITPUBLISH_REMOTE: "upstream",
        GITPUBLISH_TIMEOUT_MS: "5000",
        GITPUBLISH_RETRIES: "0",
        GITLAB_URL: "https://gitlab.example.test",
      },
      () => "alice",
    );
    assert.strictEqual(config.branchPrefix, "team");
    assert.strictEqual(config.trailerPrefix, "X-Change:");
    assert.strictEqual(config.baseBranch, "develop");
    assert.strictEqual(config.remote, "upstream");
    assert.strictEqual(config.timeoutMs, 5000);
    assert.strictEqual(config.retries, 0);
    assert.strictEqual(config.gitlabUrl, "https://gitlab.example.test");
  });

  test("empty variables count as unset", () => {
    const config = loadConfig(
      { GITPUBLISH_BRANCH_PREFIX: "", GITPUBLISH_RETRIES: "" },
      () => "bob",
    );
    assert.strictEqual(config.branchPrefix, "bob");
    assert.strictEqual(config.retries, 3);
  });

  test("rejects a non-numeric timeout", () => {
    assert.throws(
      () => loadConfig({ GITPUBLISH_TIMEOUT_MS: "soon" }, () => "alice"),
      ConfigError,
    );
  });

  test("rejects a branch prefix git cannot use", () => {
    assert.throws(
      () => loadConfig({ GITPUBLISH_BRANCH_PREFIX: "a b" }, () => "alice"),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.message.includes("GITPUBLISH_BRANCH_PREFIX"),
    );
  });

  test("sanitizes the user name used as default prefix", () => {
    assert.strictEqual(defaultBranchPrefix("Jane Doe"), "Jane-Doe");
    assert.strictEqual(defaultBranchPrefix("DOMAIN\\jane"), "DOMAIN-jane");
    assert.strictEqual(defaultBranchPrefix("..."), "user");
  });
});
