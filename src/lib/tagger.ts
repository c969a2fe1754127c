import { appendChangeId, createChangeId, getChangeId } from "./changeId.js";
import { DirtyTreeError, toError } from "./errors.js";
import type { GitFunctions } from "./gitUtils.js";
import { logger } from "./logger.js";
import type { StackRange } from "./stack.js";

export interface TagOptions {
  branchPrefix: string;
  trailerPrefix: string;
  /** The ref that points at the stack tip, e.g. `refs/heads/main` or `HEAD`. */
  ref: string;
  /** ChangeIds already in use elsewhere, e.g. on remote branches. */
  takenChangeIds?: Iterable<string>;
}

export interface TagResult {
  tagged: Array<{ originalCommitId: string; changeId: string }>;
  tip: string;
}

/**
 * Give every commit in the range a ChangeId trailer. Commits are recreated
 * oldest first so every descendant of a tagged commit is re-parented; the
 * ref is only moved once all new commits exist, so a failure leaves the
 * branch untouched. Callers must re-read the range afterwards.
 */
export async function tagStack(
  git: Pick<GitFunctions, "isWorkingTreeDirty" | "createCommit" | "updateRef">,
  range: StackRange,
  options: TagOptions,
): Promise<TagResult> {
  const originalTip =
    range.commits[range.commits.length - 1]?.commitId ?? range.baseCommit;

  const missing = range.commits.filter(
    (commit) => getChangeId(commit.message, options.trailerPrefix) === undefined,
  );
  if (missing.length === 0) {
    return { tagged: [], tip: originalTip };
  }

  if (await git.isWorkingTreeDirty()) {
    throw new DirtyTreeError(
      "Working tree has uncommitted changes; commit or stash them before tagging",
    );
  }

  const taken = new Set<string>(options.takenChangeIds ?? []);
  for (const commit of range.commits) {
    const changeId = getChangeId(commit.message, options.trailerPrefix);
    if (changeId) taken.add(changeId);
  }

  const tagged: TagResult["tagged"] = [];
  let parent = range.baseCommit;
  let rewriting = false;

  for (const commit of range.commits) {
    let message = commit.message;
    if (getChangeId(message, options.trailerPrefix) === undefined) {
      const changeId = createChangeId(options.branchPrefix, taken);
      taken.add(changeId);
      message = appendChangeId(message, changeId, options.trailerPrefix);
      tagged.push({ originalCommitId: commit.commitId, changeId });
      rewriting = true;
    }

    if (rewriting) {
      parent = await git.createCommit(commit, parent, message);
      logger.debug(`Rewrote ${commit.commitId} as ${parent}`);
    } else {
      parent = commit.commitId;
    }
  }

  try {
    await git.updateRef(options.ref, parent, originalTip);
  } catch (error) {
    throw new DirtyTreeError(
      `Could not move ${options.ref} to the tagged commits: ${toError(error).message}`,
      { cause: error },
    );
  }

  logger.info(`Added ChangeIds to ${tagged.length} commit(s)`);
  return { tagged, tip: parent };
}
