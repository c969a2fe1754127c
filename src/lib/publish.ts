import { getChangeId } from "./changeId.js";
import type { GitPublishConfig } from "./config.js";
import { CancelledError } from "./errors.js";
import { executePlan, type ExecutionCallbacks } from "./execute.js";
import type { GitFunctions } from "./gitUtils.js";
import { installCommitMessageHook } from "./hook.js";
import { logger } from "./logger.js";
import { assertUniqueChangeIds, reconcile } from "./reconcile.js";
import { resolveRemoteState } from "./resolver.js";
import type { ReviewHost } from "./reviewHost.js";
import {
  commitBody,
  commitSubject,
  readStackRange,
  toLocalEntries,
  type StackRange,
} from "./stack.js";
import { tagStack, type TagResult } from "./tagger.js";
import type { CommitEntry, ExecutionReport, LocalEntry, Plan, RemoteState } from "./types.js";
import { withStashedWorkingTree } from "./workingTree.js";

export interface PublishTarget {
  remote: string;
  baseBranch: string;
  baseRef: string;
  tipRef: string;
  /** Ref moved when commits are tagged. */
  branchRef: string;
}

export interface PublishCallbacks extends ExecutionCallbacks {
  onHookInstalled?: () => void;
  onTargetResolved?: (target: PublishTarget) => void;
  onStackRead?: (range: StackRange) => void;
  onRemoteResolved?: (remote: RemoteState) => void;
  onTagged?: (tagged: TagResult["tagged"]) => void;
  onPlanReady?: (plan: Plan) => void;
}

export interface PublishOptions {
  dryRun?: boolean;
  /** Install the commit-msg hook first when it is missing (not on a dry run). */
  installHook?: boolean;
  signal?: AbortSignal;
  callbacks?: PublishCallbacks;
}

export interface PublishResult {
  target: PublishTarget;
  plan: Plan;
  tagged: TagResult["tagged"];
  report?: ExecutionReport; // absent on a dry run
}

export type ReviewHostFactory = (
  remote: string,
  remoteUrl: string,
) => Promise<ReviewHost>;

/**
 * Work out which remote and base branch the current branch publishes to:
 * explicit configuration first, then the branch's upstream, then defaults.
 */
export async function resolvePublishTarget(
  git: Pick<GitFunctions, "getCurrentBranch" | "getUpstream">,
  config: Pick<GitPublishConfig, "remote" | "baseBranch">,
): Promise<PublishTarget> {
  const currentBranch = await git.getCurrentBranch();
  const upstream = currentBranch
    ? await git.getUpstream(currentBranch)
    : undefined;

  const remote = config.remote ?? upstream?.remote ?? "origin";
  const baseBranch = config.baseBranch ?? upstream?.branch ?? "main";
  return {
    remote,
    baseBranch,
    baseRef: `refs/remotes/${remote}/${baseBranch}`,
    tipRef: "HEAD",
    branchRef: currentBranch ? `refs/heads/${currentBranch}` : "HEAD",
  };
}

/**
 * Stack entries for a range that may still contain untagged commits; those
 * get a placeholder identifier that is never pushed.
 */
export function previewEntries(
  commits: CommitEntry[],
  trailerPrefix: string,
): LocalEntry[] {
  return commits.map((commit, position) => ({
    changeId:
      getChangeId(commit.message, trailerPrefix) ??
      `(untagged ${commit.commitId.slice(0, 7)})`,
    commitId: commit.commitId,
    subject: commitSubject(commit.message),
    body: commitBody(commit.message, trailerPrefix),
    position,
  }));
}

function throwIfCancelled(signal: AbortSignal | undefined) {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/**
 * One full run: read the stack, resolve remote state, tag untagged commits,
 * reconcile and execute. Every precondition is checked before anything is
 * mutated, and uncommitted changes are stashed for the mutating part.
 */
export async function publish(
  git: GitFunctions,
  config: GitPublishConfig,
  buildHost: ReviewHostFactory,
  options: PublishOptions = {},
): Promise<PublishResult> {
  const { callbacks, signal } = options;

  if (options.installHook && !options.dryRun) {
    const hook = await installCommitMessageHook(await git.getGitDir());
    if (hook === "installed") {
      callbacks?.onHookInstalled?.();
    }
  }

  const target = await resolvePublishTarget(git, config);
  callbacks?.onTargetResolved?.(target);

  const remoteUrl = await git.getRemoteUrl(target.remote);
  const host = await buildHost(target.remote, remoteUrl);

  const initialRange = await readStackRange(git, target.baseRef, target.tipRef);
  callbacks?.onStackRead?.(initialRange);

  const preview = previewEntries(initialRange.commits, config.trailerPrefix);
  assertUniqueChangeIds(preview);
  throwIfCancelled(signal);

  const resolveOptions = {
    branchPrefix: config.branchPrefix,
    knownChangeIds: preview.map((entry) => entry.changeId),
    retries: config.retries,
  };

  if (options.dryRun) {
    const remoteState = await resolveRemoteState(host, resolveOptions);
    callbacks?.onRemoteResolved?.(remoteState);
    const plan = reconcile(
      { baseBranch: target.baseBranch, entries: preview },
      remoteState,
    );
    callbacks?.onPlanReady?.(plan);
    return { target, plan, tagged: [] };
  }

  return withStashedWorkingTree(git, async () => {
    const remoteState = await resolveRemoteState(host, resolveOptions);
    callbacks?.onRemoteResolved?.(remoteState);
    throwIfCancelled(signal);

    const { tagged } = await tagStack(git, initialRange, {
      branchPrefix: config.branchPrefix,
      trailerPrefix: config.trailerPrefix,
      ref: target.branchRef,
      takenChangeIds: remoteState.entries.keys(),
    });

    let range = initialRange;
    if (tagged.length > 0) {
      callbacks?.onTagged?.(tagged);
      // Hashes changed from the first tagged commit upwards
      range = await readStackRange(git, target.baseRef, target.tipRef);
    }

    const stack = {
      baseBranch: target.baseBranch,
      entries: toLocalEntries(range.commits, config.trailerPrefix),
    };
    const plan = reconcile(stack, remoteState);
    callbacks?.onPlanReady?.(plan);
    throwIfCancelled(signal);

    const report = await executePlan(plan, host, remoteState.entries, {
      signal,
      callbacks,
    });
    logger.debug(
      `Run finished: ${report.outcomes.length} operations, success=${report.success}`,
    );
    return { target, plan, tagged, report };
  });
}
