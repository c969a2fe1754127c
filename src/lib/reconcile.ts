import { branchNameFor } from "./changeId.js";
import { DuplicateChangeIdError } from "./errors.js";
import { logger } from "./logger.js";
import type {
  LocalEntry,
  Operation,
  Plan,
  RemoteState,
  Stack,
  StackOperation,
} from "./types.js";

/**
 * Fail when two commits carry the same ChangeId. Which one is authoritative
 * is never guessed.
 */
export function assertUniqueChangeIds(entries: LocalEntry[]): void {
  const commitsById = new Map<string, string[]>();
  for (const entry of entries) {
    const commits = commitsById.get(entry.changeId) ?? [];
    commits.push(entry.commitId);
    commitsById.set(entry.changeId, commits);
  }
  for (const [changeId, commits] of commitsById) {
    if (commits.length > 1) {
      throw new DuplicateChangeIdError(changeId, commits);
    }
  }
}

/**
 * The branch a review at `position` should target: the base branch for the
 * bottom entry, otherwise the planned branch of the entry below it.
 */
export function expectedTarget(stack: Stack, position: number): string {
  if (position === 0) {
    return stack.baseBranch;
  }
  return branchNameFor(stack.entries[position - 1].changeId);
}

function planEntry(
  stack: Stack,
  entry: LocalEntry,
  remoteState: RemoteState,
): StackOperation {
  const target = expectedTarget(stack, entry.position);
  const remote = remoteState.entries.get(entry.changeId);

  if (!remote) {
    return { kind: "create", entry, target };
  }

  if (remote.kind === "unknown") {
    // Re-push but never create: a review may already exist for this branch
    return { kind: "update", entry, remote, reason: "unknown-remote" };
  }

  if (!remote.review) {
    return { kind: "create", entry, target, existingBranch: remote };
  }

  const reviewed = { ...remote, review: remote.review };
  const targetChanged = remote.review.targetBranch !== target;

  if (remote.commitId !== entry.commitId) {
    return {
      kind: "update",
      entry,
      remote: reviewed,
      reason: "content-changed",
      ...(targetChanged ? { retargetTo: target } : {}),
    };
  }

  if (targetChanged) {
    return { kind: "retarget", entry, remote: reviewed, target };
  }

  return { kind: "noop", entry, remote: reviewed };
}

/**
 * Compare the local stack against the remote entries and plan the operations
 * that bring the remote side in line. Stack operations come first, base to
 * tip, followed by the close-and-delete of every orphaned entry.
 */
export function reconcile(stack: Stack, remoteState: RemoteState): Plan {
  assertUniqueChangeIds(stack.entries);

  const operations: Operation[] = stack.entries.map((entry) =>
    planEntry(stack, entry, remoteState),
  );
  const warnings = [...remoteState.warnings];

  const localIds = new Set(stack.entries.map((entry) => entry.changeId));
  for (const remote of remoteState.entries.values()) {
    if (localIds.has(remote.changeId)) continue;

    if (remote.kind === "unknown") {
      warnings.push(
        `Not deleting ${remote.branch}: its review state could not be determined`,
      );
      continue;
    }
    operations.push({ kind: "close-and-delete", remote });
  }

  logger.debug(
    `Planned ${operations.map((operation) => operation.kind).join(", ")}`,
  );
  return { baseBranch: stack.baseBranch, operations, warnings };
}

export function isNoOpPlan(plan: Plan): boolean {
  return plan.operations.every((operation) => operation.kind === "noop");
}
