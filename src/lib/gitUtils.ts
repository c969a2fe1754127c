import { execFile } from "child_process";
import * as v from "valibot";
import type { GitPublishConfig } from "./config.js";
import { GitCommandError } from "./errors.js";
import { logger } from "./logger.js";
import type { CommitEntry } from "./types.js";

export type PushResult = { kind: "ok" } | { kind: "rejected"; detail: string };

export interface Upstream {
  remote: string;
  branch: string;
}

// Types for dependency injection
export type GitFunctions = {
  revParse: (ref: string) => Promise<string>;
  isAncestor: (ancestor: string, descendant: string) => Promise<boolean>;
  /** Commits in `base..tip`, oldest first. */
  getCommitRange: (base: string, tip: string) => Promise<CommitEntry[]>;
  isWorkingTreeDirty: () => Promise<boolean>;
  /** Returns false when there was nothing to stash. */
  stashPush: (message: string) => Promise<boolean>;
  stashPop: () => Promise<void>;
  /** Write a commit object with the tree and author of `commit` on top of `parent`. */
  createCommit: (
    commit: CommitEntry,
    parent: string,
    message: string,
  ) => Promise<string>;
  /** Compare-and-swap a ref; fails if it no longer points at `oldValue`. */
  updateRef: (ref: string, newValue: string, oldValue: string) => Promise<void>;
  getCurrentBranch: () => Promise<string | undefined>;
  getUpstream: (branch: string) => Promise<Upstream | undefined>;
  getRemoteUrl: (remote: string) => Promise<string>;
  forcePush: (
    remote: string,
    commitId: string,
    branch: string,
  ) => Promise<PushResult>;
  getGitDir: () => Promise<string>;
};

/**
 * Create configured GitFunctions from a config object
 */
export function createGitFunctions(
  config: Pick<GitPublishConfig, "gitBinary" | "timeoutMs">,
): GitFunctions {
  const git = (args: string[], options?: GitRunOptions) =>
    runGit(config, args, options);

  return {
    revParse: async (ref) =>
      (await git(["rev-parse", "--verify", "--quiet", `${ref}^{commit}`])).trim(),
    isAncestor: (ancestor, descendant) =>
      isAncestor(config, ancestor, descendant),
    getCommitRange: (base, tip) => getCommitRange(config, base, tip),
    isWorkingTreeDirty: async () =>
      (await git(["status", "--porcelain", "--untracked-files=normal"])).trim() !==
      "",
    stashPush: (message) => stashPush(config, message),
    stashPop: async () => {
      await git(["stash", "pop", "--index"]);
    },
    createCommit: (commit, parent, message) =>
      createCommit(config, commit, parent, message),
    updateRef: async (ref, newValue, oldValue) => {
      await git(["update-ref", "-m", "git-publish: add ChangeId", ref, newValue, oldValue]);
    },
    getCurrentBranch: async () => {
      const result = await tryGit(config, ["symbolic-ref", "--quiet", "--short", "HEAD"]);
      return result?.trim() || undefined;
    },
    getUpstream: (branch) => getUpstream(config, branch),
    getRemoteUrl: async (remote) =>
      (await git(["remote", "get-url", remote])).trim(),
    forcePush: (remote, commitId, branch) =>
      forcePush(config, remote, commitId, branch),
    getGitDir: async () =>
      (await git(["rev-parse", "--absolute-git-dir"])).trim(),
  };
}

interface GitRunOptions {
  input?: string;
  env?: NodeJS.ProcessEnv;
}

interface GitFailure {
  error: Error & { code?: number | string | null };
  stdout: string;
  stderr: string;
}

function execGit(
  config: Pick<GitPublishConfig, "gitBinary" | "timeoutMs">,
  args: string[],
  options: GitRunOptions = {},
): Promise<{ stdout: string; stderr: string } | GitFailure> {
  return new Promise((resolve) => {
    const child = execFile(
      config.gitBinary,
      args,
      {
        timeout: config.timeoutMs,
        maxBuffer: 64 * 1024 * 1024,
        env: options.env ? { ...process.env, ...options.env } : process.env,
      },
      (error, stdout, stderr) => {
        if (error) {
          resolve({ error, stdout, stderr });
          return;
        }
        resolve({ stdout, stderr });
      },
    );
    if (options.input !== undefined) {
      child.stdin?.end(options.input);
    }
  });
}

function isFailure(
  result: { stdout: string; stderr: string } | GitFailure,
): result is GitFailure {
  return "error" in result;
}

async function runGit(
  config: Pick<GitPublishConfig, "gitBinary" | "timeoutMs">,
  args: string[],
  options?: GitRunOptions,
): Promise<string> {
  const result = await execGit(config, args, options);
  if (isFailure(result)) {
    logger.error(`git ${args[0]} failed: ${result.error.message}`);
    throw new GitCommandError(args, result.stderr, { cause: result.error });
  }
  if (result.stderr) {
    logger.debug(`git ${args[0]} stderr: ${result.stderr.trim()}`);
  }
  return result.stdout;
}

async function tryGit(
  config: Pick<GitPublishConfig, "gitBinary" | "timeoutMs">,
  args: string[],
): Promise<string | undefined> {
  const result = await execGit(config, args);
  return isFailure(result) ? undefined : result.stdout;
}

async function isAncestor(
  config: Pick<GitPublishConfig, "gitBinary" | "timeoutMs">,
  ancestor: string,
  descendant: string,
): Promise<boolean> {
  const args = ["merge-base", "--is-ancestor", ancestor, descendant];
  const result = await execGit(config, args);
  if (!isFailure(result)) {
    return true;
  }
  // Exit status 1 means "not an ancestor"; anything else is a real failure
  if (result.error.code === 1) {
    return false;
  }
  throw new GitCommandError(args, result.stderr, { cause: result.error });
}

const FIELD_SEPARATOR = "\x1f";
const RECORD_SEPARATOR = "\x1e";
const ObjectIdSchema = v.pipe(v.string(), v.regex(/^[0-9a-f]{40,64}$/));

const CommitEntrySchema = v.object({
  commitId: ObjectIdSchema,
  treeId: ObjectIdSchema,
  parents: v.array(ObjectIdSchema),
  authorName: v.string(),
  authorEmail: v.string(),
  authorDate: v.pipe(v.string(), v.nonEmpty()),
  message: v.string(),
});

export function parseCommitLog(stdout: string): CommitEntry[] {
  const commits: CommitEntry[] = [];

  for (const record of stdout.split(RECORD_SEPARATOR)) {
    const trimmed = record.replace(/^\n+/, "");
    if (trimmed === "") continue;

    const [commitId, treeId, parents, authorName, authorEmail, authorDate, ...rest] =
      trimmed.split(FIELD_SEPARATOR);
    try {
      commits.push(
        v.parse(CommitEntrySchema, {
          commitId,
          treeId,
          parents: parents ? parents.split(" ").filter(Boolean) : [],
          authorName,
          authorEmail,
          authorDate,
          message: rest.join(FIELD_SEPARATOR),
        }),
      );
    } catch (parseError) {
      logger.error(`Failed to parse git log record: ${trimmed}`, parseError);
      throw new Error(
        `Failed to parse git log output: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
      );
    }
  }

  return commits;
}

async function getCommitRange(
  config: Pick<GitPublishConfig, "gitBinary" | "timeoutMs">,
  base: string,
  tip: string,
): Promise<CommitEntry[]> {
  const format = ["%H", "%T", "%P", "%an", "%ae", "%aI", "%B"].join("%x1f") + "%x1e";
  const stdout = await runGit(config, [
    "log",
    "--topo-order",
    "--reverse",
    `--format=${format}`,
    `${base}..${tip}`,
  ]);
  return parseCommitLog(stdout);
}

async function stashPush(
  config: Pick<GitPublishConfig, "gitBinary" | "timeoutMs">,
  message: string,
): Promise<boolean> {
  const before = await tryGit(config, ["rev-parse", "--quiet", "--verify", "refs/stash"]);
  await runGit(config, ["stash", "push", "--include-untracked", "--message", message]);
  const after = await tryGit(config, ["rev-parse", "--quiet", "--verify", "refs/stash"]);
  return after !== undefined && after !== before;
}

async function createCommit(
  config: Pick<GitPublishConfig, "gitBinary" | "timeoutMs">,
  commit: CommitEntry,
  parent: string,
  message: string,
): Promise<string> {
  const stdout = await runGit(
    config,
    ["commit-tree", commit.treeId, "-p", parent, "-F", "-"],
    {
      input: message,
      env: {
        GIT_AUTHOR_NAME: commit.authorName,
        GIT_AUTHOR_EMAIL: commit.authorEmail,
        GIT_AUTHOR_DATE: commit.authorDate,
      },
    },
  );
  return stdout.trim();
}

async function getUpstream(
  config: Pick<GitPublishConfig, "gitBinary" | "timeoutMs">,
  branch: string,
): Promise<Upstream | undefined> {
  const remote = await tryGit(config, ["config", "--get", `branch.${branch}.remote`]);
  const merge = await tryGit(config, ["config", "--get", `branch.${branch}.merge`]);
  if (!remote?.trim() || !merge?.trim()) {
    return undefined;
  }
  return {
    remote: remote.trim(),
    branch: merge.trim().replace(/^refs\/heads\//, ""),
  };
}

const REJECTION_PATTERN = /\[(remote )?rejected\]|protected branch|pre-receive hook declined/i;

async function forcePush(
  config: Pick<GitPublishConfig, "gitBinary" | "timeoutMs">,
  remote: string,
  commitId: string,
  branch: string,
): Promise<PushResult> {
  const args = [
    "push",
    "--force",
    "--porcelain",
    remote,
    `${commitId}:refs/heads/${branch}`,
  ];
  const result = await execGit(config, args);
  if (!isFailure(result)) {
    logger.debug(`Successfully pushed ${commitId} to ${remote}/${branch}`);
    return { kind: "ok" };
  }

  const output = `${result.stdout}\n${result.stderr}`;
  if (REJECTION_PATTERN.test(output)) {
    const detail =
      output
        .split("\n")
        .find((line) => REJECTION_PATTERN.test(line))
        ?.trim() ?? "rejected";
    logger.warn(`Push to ${remote}/${branch} rejected: ${detail}`);
    return { kind: "rejected", detail };
  }
  throw new GitCommandError(args, result.stderr, { cause: result.error });
}
