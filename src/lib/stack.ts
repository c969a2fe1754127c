import { getChangeId, stripChangeId } from "./changeId.js";
import {
  EmptyStackError,
  MissingChangeIdError,
  NonLinearStackError,
  NotAStackError,
} from "./errors.js";
import type { GitFunctions } from "./gitUtils.js";
import { logger } from "./logger.js";
import type { CommitEntry, LocalEntry } from "./types.js";

export interface StackRange {
  baseCommit: string;
  commits: CommitEntry[]; // oldest first
}

/**
 * Read the linear range of commits between `base` and `tip`.
 */
export async function readStackRange(
  git: Pick<GitFunctions, "revParse" | "isAncestor" | "getCommitRange">,
  base: string,
  tip: string,
): Promise<StackRange> {
  const baseCommit = await git.revParse(base);
  const tipCommit = await git.revParse(tip);

  if (baseCommit === tipCommit) {
    throw new EmptyStackError(base);
  }
  if (!(await git.isAncestor(baseCommit, tipCommit))) {
    throw new NotAStackError(base, tip);
  }

  const commits = await git.getCommitRange(baseCommit, tipCommit);
  if (commits.length === 0) {
    throw new EmptyStackError(base);
  }

  let expectedParent = baseCommit;
  for (const commit of commits) {
    if (commit.parents.length !== 1 || commit.parents[0] !== expectedParent) {
      throw new NonLinearStackError(commit.commitId);
    }
    expectedParent = commit.commitId;
  }

  if (expectedParent !== tipCommit) {
    // The range walked did not end at the tip, so tip is reached through a side branch
    throw new NonLinearStackError(tipCommit);
  }

  logger.debug(`Read ${commits.length} commits between ${base} and ${tip}`);
  return { baseCommit, commits };
}

export function commitSubject(message: string): string {
  return message.trim().split("\n")[0]?.trim() ?? "";
}

export function commitBody(message: string, trailerPrefix: string): string {
  const lines = message.trim().split("\n");
  return stripChangeId(lines.slice(1).join("\n"), trailerPrefix).trim();
}

/**
 * Turn a range whose commits all carry a ChangeId into stack entries.
 */
export function toLocalEntries(
  commits: CommitEntry[],
  trailerPrefix: string,
): LocalEntry[] {
  return commits.map((commit, position) => {
    const changeId = getChangeId(commit.message, trailerPrefix);
    if (!changeId) {
      throw new MissingChangeIdError(commit.commitId);
    }
    return {
      changeId,
      commitId: commit.commitId,
      subject: commitSubject(commit.message),
      body: commitBody(commit.message, trailerPrefix),
      position,
    };
  });
}
