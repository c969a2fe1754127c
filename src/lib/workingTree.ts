import { DirtyTreeError, toError } from "./errors.js";
import type { GitFunctions } from "./gitUtils.js";
import { logger } from "./logger.js";

const STASH_MESSAGE = "git-publish: autostash";

/**
 * Run `task` with uncommitted changes stashed away, restoring them on every
 * exit path. When both the task and the restore fail, the task's error is
 * kept as the cause.
 */
export async function withStashedWorkingTree<T>(
  git: Pick<GitFunctions, "isWorkingTreeDirty" | "stashPush" | "stashPop">,
  task: () => Promise<T>,
): Promise<T> {
  let stashed = false;
  if (await git.isWorkingTreeDirty()) {
    try {
      stashed = await git.stashPush(STASH_MESSAGE);
    } catch (error) {
      throw new DirtyTreeError(
        `Could not stash uncommitted changes: ${toError(error).message}`,
        { cause: error },
      );
    }
    logger.debug(stashed ? "Stashed uncommitted changes" : "Nothing to stash");
  }

  let result: T;
  try {
    result = await task();
  } catch (error) {
    if (stashed) {
      try {
        await git.stashPop();
      } catch (popError) {
        throw new DirtyTreeError(
          `Could not restore stashed changes; run 'git stash pop' manually (${toError(popError).message}). The run had failed with: ${toError(error).message}`,
          { cause: error },
        );
      }
    }
    throw error;
  }

  if (stashed) {
    try {
      await git.stashPop();
    } catch (error) {
      throw new DirtyTreeError(
        `Could not restore stashed changes; run 'git stash pop' manually: ${toError(error).message}`,
        { cause: error },
      );
    }
    logger.debug("Restored stashed changes");
  }
  return result;
}
