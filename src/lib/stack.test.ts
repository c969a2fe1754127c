import assert from "assert/strict";
import {
  EmptyStackError,
  MissingChangeIdError,
  NonLinearStackError,
  NotAStackError,
} from "./errors.js";
import { commitBody, commitSubject, readStackRange, toLocalEntries } from "./stack.js";
import { InMemoryGit, objectId } from "./testUtils.js";

const BASE = "refs/remotes/origin/main";

suite("stack reader", () => {
  test("reads commits base to tip", async () => {
    const git = new InMemoryGit();
    const first = git.addCommit("First\n");
    const second = git.addCommit("Second\n");

    const range = await readStackRange(git, BASE, "HEAD");

    assert.strictEqual(range.baseCommit, await git.revParse(BASE));
    assert.deepStrictEqual(
      range.commits.map((commit) => commit.commitId),
      [first, second],
    );
  });

  test("fails when the tip is the base", async () => {
    const git = new InMemoryGit();
    await assert.rejects(readStackRange(git, BASE, "HEAD"), EmptyStackError);
  });

  test("fails when the base is not an ancestor", async () => {
    const git = new InMemoryGit();
    git.addCommit("Local\n");
    // Move the remote base onto a commit the local branch does not contain
    git.refs.set(BASE, objectId(999));
    git.commits.set(objectId(999), {
      commitId: objectId(999),
      treeId: objectId(1000),
      parents: [],
      authorName: "Test",
      authorEmail: "test@example.com",
      authorDate: "2024-01-01T00:00:00+00:00",
      message: "Diverged\n",
    });

    await assert.rejects(readStackRange(git, BASE, "HEAD"), NotAStackError);
  });

  test("fails on a merge commit", async () => {
    const git = new InMemoryGit();
    const first = git.addCommit("First\n");
    const merge = git.addCommit("Merge\n");
    const mergeCommit = git.commits.get(merge);
    assert.ok(mergeCommit);
    mergeCommit.parents = [first, objectId(500)];

    await assert.rejects(
      readStackRange(git, BASE, "HEAD"),
      (error: unknown) =>
        error instanceof NonLinearStackError && error.commitId === merge,
    );
  });
});

suite("stack entries", () => {
  test("subject and body", () => {
    const message = "Add widget\n\nExplains why.\n\nChange-Id: alice/0001\n";
    assert.strictEqual(commitSubject(message), "Add widget");
    assert.strictEqual(commitBody(message, "Change-Id:"), "Explains why.");
  });

  test("assigns positions from the base", async () => {
    const git = new InMemoryGit();
    git.addCommit("First\n\nChange-Id: alice/0001\n");
    git.addCommit("Second\n\nChange-Id: alice/0002\n");
    const range = await readStackRange(git, BASE, "HEAD");

    const entries = toLocalEntries(range.commits, "Change-Id:");

    assert.deepStrictEqual(
      entries.map((entry) => [entry.changeId, entry.position, entry.subject]),
      [
        ["alice/0001", 0, "First"],
        ["alice/0002", 1, "Second"],
      ],
    );
  });

  test("requires every commit to be tagged", async () => {
    const git = new InMemoryGit();
    git.addCommit("First\n\nChange-Id: alice/0001\n");
    const untagged = git.addCommit("Second\n");
    const range = await readStackRange(git, BASE, "HEAD");

    assert.throws(
      () => toLocalEntries(range.commits, "Change-Id:"),
      (error: unknown) =>
        error instanceof MissingChangeIdError && error.commitId === untagged,
    );
  });
});
