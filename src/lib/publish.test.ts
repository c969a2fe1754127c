import assert from "assert/strict";
import { mkdtemp, readFile, rm, writeFile, mkdir } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { getChangeId } from "./changeId.js";
import type { GitPublishConfig } from "./config.js";
import {
  DuplicateChangeIdError,
  HookConflictError,
  RemoteLookupError,
} from "./errors.js";
import { operationChangeId } from "./execute.js";
import { COMMIT_MSG_HOOK } from "./hook.js";
import { publish, resolvePublishTarget } from "./publish.js";
import { InMemoryGit, InMemoryReviewHost, objectId } from "./testUtils.js";

const CONFIG: GitPublishConfig = {
  gitBinary: "git",
  branchPrefix: "alice",
  trailerPrefix: "Change-Id:",
  timeoutMs: 1_000,
  retries: 0,
  gitlabUrl: "https://gitlab.com",
};

function fixture() {
  const git = new InMemoryGit();
  const host = new InMemoryReviewHost();
  const buildHost = () => Promise.resolve(host);
  return { git, host, buildHost };
}

suite("publish", () => {
  test("tags new commits and opens a chain of reviews", async () => {
    const { git, host, buildHost } = fixture();
    git.addCommit("First\n\nWhy it matters.\n");
    git.addCommit("Second\n");

    const result = await publish(git, CONFIG, buildHost);

    assert.strictEqual(result.tagged.length, 2);
    const [first, second] = result.tagged.map((tag) => tag.changeId);
    assert.deepStrictEqual(
      git.messages().map((message) => getChangeId(message, "Change-Id:")),
      [first, second],
    );
    assert.strictEqual(result.report?.success, true);
    assert.deepStrictEqual(
      host.calls.filter((call) => call.startsWith("createReview")),
      [
        `createReview ${first} -> main "First"`,
        `createReview ${second} -> ${first} "Second"`,
      ],
    );
    assert.strictEqual(host.branches.get(second), git.head());
  });

  test("finds nothing to do on a second run", async () => {
    const { git, host, buildHost } = fixture();
    git.addCommit("First\n");
    git.addCommit("Second\n");
    await publish(git, CONFIG, buildHost);
    const tip = git.head();

    const result = await publish(git, CONFIG, buildHost);

    assert.deepStrictEqual(result.tagged, []);
    assert.deepStrictEqual(
      result.plan.operations.map((operation) => operation.kind),
      ["noop", "noop"],
    );
    assert.strictEqual(result.report?.success, true);
    assert.strictEqual(git.head(), tip);
    assert.strictEqual(host.reviews.length, 2);
  });

  test("stashes uncommitted changes around the run", async () => {
    const { git, buildHost } = fixture();
    git.addCommit("First\n");
    git.dirty = true;

    await publish(git, CONFIG, buildHost);

    assert.deepStrictEqual(git.calls, [
      "stashPush",
      "updateRef refs/heads/feature",
      "stashPop",
    ]);
    assert.strictEqual(git.dirty, true);
  });

  test("restores uncommitted changes when the run fails", async () => {
    const { git, host, buildHost } = fixture();
    git.addCommit("First\n");
    git.dirty = true;
    host.failBranchListing = 1;

    await assert.rejects(publish(git, CONFIG, buildHost), RemoteLookupError);

    assert.deepStrictEqual(git.calls, ["stashPush", "stashPop"]);
    assert.strictEqual(git.dirty, true);
    assert.deepStrictEqual(git.stash, []);
  });

  test("plans without touching anything on a dry run", async () => {
    const { git, host, buildHost } = fixture();
    git.addCommit("First\n");
    git.addCommit("Second\n");
    const tip = git.head();

    const result = await publish(git, CONFIG, buildHost, { dryRun: true });

    assert.strictEqual(result.report, undefined);
    assert.deepStrictEqual(result.plan.operations.map(operationChangeId), [
      `(untagged ${objectId(2).slice(0, 7)})`,
      `(untagged ${objectId(3).slice(0, 7)})`,
    ]);
    assert.strictEqual(git.head(), tip);
    assert.deepStrictEqual(git.calls, []);
    assert.deepStrictEqual(host.calls, ["findBranches alice"]);
  });

  test("refuses a stack with a repeated change id before contacting the host", async () => {
    const { git, host, buildHost } = fixture();
    git.addCommit("First\n\nChange-Id: alice/0001\n");
    git.addCommit("Second\n\nChange-Id: alice/0001\n");

    await assert.rejects(publish(git, CONFIG, buildHost), DuplicateChangeIdError);
    assert.deepStrictEqual(host.calls, []);
  });

  test("stops before mutating when already interrupted", async () => {
    const { git, host, buildHost } = fixture();
    git.addCommit("First\n");
    const controller = new AbortController();
    controller.abort();

    await assert.rejects(
      publish(git, CONFIG, buildHost, { signal: controller.signal }),
      { message: "Run was interrupted" },
    );
    assert.deepStrictEqual(host.calls, []);
  });
});

suite("publish hook installation", () => {
  let gitDir: string;

  setup(async () => {
    gitDir = await mkdtemp(join(tmpdir(), "git-publish-run-"));
  });

  teardown(async () => {
    await rm(gitDir, { recursive: true, force: true });
  });

  test("installs the commit-msg hook before publishing", async () => {
    const git = new InMemoryGit();
    const host = new InMemoryReviewHost();
    git.gitDir = gitDir;
    git.addCommit("First\n");
    let installed = 0;

    const result = await publish(git, CONFIG, () => Promise.resolve(host), {
      installHook: true,
      callbacks: { onHookInstalled: () => installed++ },
    });

    assert.strictEqual(installed, 1);
    assert.strictEqual(
      await readFile(join(gitDir, "hooks", "commit-msg"), "utf8"),
      COMMIT_MSG_HOOK,
    );
    assert.strictEqual(result.report?.success, true);
  });

  test("stays quiet when the hook is already installed", async () => {
    const git = new InMemoryGit();
    git.gitDir = gitDir;
    await mkdir(join(gitDir, "hooks"));
    await writeFile(join(gitDir, "hooks", "commit-msg"), COMMIT_MSG_HOOK);
    let installed = 0;

    await publish(git, CONFIG, () => Promise.resolve(new InMemoryReviewHost()), {
      installHook: true,
      callbacks: { onHookInstalled: () => installed++ },
    });

    assert.strictEqual(installed, 0);
  });

  test("aborts before contacting the host when another hook is in place", async () => {
    const git = new InMemoryGit();
    const host = new InMemoryReviewHost();
    git.gitDir = gitDir;
    git.addCommit("First\n");
    await mkdir(join(gitDir, "hooks"));
    await writeFile(join(gitDir, "hooks", "commit-msg"), "#!/bin/sh\nexit 0\n");

    await assert.rejects(
      publish(git, CONFIG, () => Promise.resolve(host), { installHook: true }),
      HookConflictError,
    );
    assert.deepStrictEqual(host.calls, []);
    assert.deepStrictEqual(git.calls, []);
  });

  test("leaves hooks alone on a dry run", async () => {
    const git = new InMemoryGit();
    git.gitDir = gitDir;

    await publish(git, CONFIG, () => Promise.resolve(new InMemoryReviewHost()), {
      installHook: true,
      dryRun: true,
    });

    await assert.rejects(readFile(join(gitDir, "hooks", "commit-msg"), "utf8"));
  });
});

suite("publish target", () => {
  test("follows the upstream branch", async () => {
    const git = new InMemoryGit();
    git.upstream = { remote: "upstream", branch: "develop" };

    const target = await resolvePublishTarget(git, {});

    assert.deepStrictEqual(target, {
      remote: "upstream",
      baseBranch: "develop",
      baseRef: "refs/remotes/upstream/develop",
      tipRef: "HEAD",
      branchRef: "refs/heads/feature",
    });
  });

  test("prefers explicit configuration", async () => {
    const git = new InMemoryGit();

    const target = await resolvePublishTarget(git, { baseBranch: "release" });

    assert.strictEqual(target.remote, "origin");
    assert.strictEqual(target.baseRef, "refs/remotes/origin/release");
  });

  test("falls back to origin/main on a detached head", async () => {
    const git = new InMemoryGit();
    git.currentBranch = undefined;

    const target = await resolvePublishTarget(git, {});

    assert.strictEqual(target.baseRef, "refs/remotes/origin/main");
    assert.strictEqual(target.branchRef, "HEAD");
  });
});
