import assert from "assert/strict";
import { DirtyTreeError } from "./errors.js";
import { InMemoryGit } from "./testUtils.js";
import { withStashedWorkingTree } from "./workingTree.js";

suite("stashed working tree", () => {
  test("runs directly on a clean tree", async () => {
    const git = new InMemoryGit();

    const result = await withStashedWorkingTree(git, () => Promise.resolve(42));

    assert.strictEqual(result, 42);
    assert.deepStrictEqual(git.calls, []);
  });

  test("stashes and restores around the task", async () => {
    const git = new InMemoryGit();
    git.dirty = true;
    let dirtyDuringTask: boolean | undefined;

    await withStashedWorkingTree(git, async () => {
      dirtyDuringTask = await git.isWorkingTreeDirty();
    });

    assert.strictEqual(dirtyDuringTask, false);
    assert.strictEqual(git.dirty, true);
    assert.deepStrictEqual(git.calls, ["stashPush", "stashPop"]);
  });

  test("restores changes and rethrows when the task fails", async () => {
    const git = new InMemoryGit();
    git.dirty = true;

    await assert.rejects(
      withStashedWorkingTree(git, () => Promise.reject(new Error("boom"))),
      { message: "boom" },
    );
    assert.strictEqual(git.dirty, true);
    assert.deepStrictEqual(git.stash, []);
  });

  test("keeps the task error when the restore fails too", async () => {
    const git = new InMemoryGit();
    git.dirty = true;
    const failure = new Error("boom");

    await assert.rejects(
      withStashedWorkingTree(git, () => {
        git.stash.length = 0;
        return Promise.reject(failure);
      }),
      (error: unknown) =>
        error instanceof DirtyTreeError &&
        error.cause === failure &&
        error.message ===
          "Could not restore stashed changes; run 'git stash pop' manually (No stash entries found.). The run had failed with: boom",
    );
  });
});
