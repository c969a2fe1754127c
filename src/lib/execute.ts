import { branchNameFor } from "./changeId.js";
import { PushRejectedError, toError } from "./errors.js";
import { logger } from "./logger.js";
import type { ReviewChanges, ReviewHost } from "./reviewHost.js";
import type {
  CloseAndDeleteOperation,
  CreateOperation,
  ExecutionReport,
  Operation,
  OperationOutcome,
  Plan,
  RemoteEntry,
  RetargetOperation,
  ReviewMetadata,
  StackOperation,
  UpdateOperation,
} from "./types.js";

export interface ExecutionCallbacks {
  onOperationStarted?: (operation: Operation) => void;
  onOperationCompleted?: (outcome: OperationOutcome) => void;
  onError?: (error: Error, context: string) => void;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  callbacks?: ExecutionCallbacks;
}

export function operationChangeId(operation: Operation): string {
  return operation.kind === "close-and-delete"
    ? operation.remote.changeId
    : operation.entry.changeId;
}

/** What to change on an existing review, or undefined when it is current. */
function reviewChanges(
  review: ReviewMetadata,
  title: string,
  targetBranch: string | undefined,
): ReviewChanges | undefined {
  const changes: ReviewChanges = {};
  if (targetBranch !== undefined && targetBranch !== review.targetBranch) {
    changes.targetBranch = targetBranch;
  }
  if (title !== review.title) {
    changes.title = title;
  }
  return Object.keys(changes).length > 0 ? changes : undefined;
}

class MissingTargetError extends Error {
  constructor(target: string) {
    super(`Target branch ${target} was not published in this run`);
  }
}

/**
 * Applies a plan. Stack operations run one at a time from base to tip so a
 * review never targets a branch that does not exist yet; orphans are closed
 * and deleted only once every stack operation has succeeded. A failed
 * operation is recorded and the run moves on.
 */
class PlanExecutor {
  private readonly outcomes: OperationOutcome[] = [];
  private readonly warnings: string[] = [];
  private readonly remote: Map<string, RemoteEntry>;
  // Branches this run meant to create but could not
  private readonly unpublished = new Set<string>();
  private cancelled = false;

  constructor(
    private readonly host: ReviewHost,
    private readonly options: ExecuteOptions,
    initialRemote: Map<string, RemoteEntry>,
  ) {
    this.remote = new Map(initialRemote);
  }

  async run(plan: Plan): Promise<ExecutionReport> {
    const stackOperations = plan.operations.filter(
      (operation): operation is StackOperation =>
        operation.kind !== "close-and-delete",
    );
    const deletions = plan.operations.filter(
      (operation): operation is CloseAndDeleteOperation =>
        operation.kind === "close-and-delete",
    );

    for (const operation of stackOperations) {
      if (this.checkCancelled(operation)) continue;
      this.options.callbacks?.onOperationStarted?.(operation);
      this.record(await this.applyStackOperation(operation));
    }

    const stackFailed = this.outcomes.some(
      (outcome) => outcome.status === "failed" || outcome.status === "skipped",
    );
    if (deletions.length > 0 && stackFailed) {
      this.warnings.push(
        "Obsolete reviews were left open because an earlier operation did not succeed",
      );
    }

    // Orphans are independent of each other, so they are closed concurrently
    const deletionOutcomes = await Promise.all(
      deletions.map((operation) => {
        if (stackFailed) {
          return this.skipped(operation, "an earlier operation did not succeed");
        }
        if (this.checkCancelled(operation, false)) {
          return this.skipped(operation, "run was interrupted");
        }
        this.options.callbacks?.onOperationStarted?.(operation);
        return this.closeAndDelete(operation);
      }),
    );
    deletionOutcomes.forEach((outcome) => this.record(outcome));

    return {
      success:
        !this.cancelled &&
        this.outcomes.every(
          (outcome) => outcome.status !== "failed" && outcome.status !== "skipped",
        ),
      cancelled: this.cancelled,
      outcomes: this.outcomes,
      warnings: this.warnings,
      remote: this.remote,
    };
  }

  private checkCancelled(operation: Operation, record = true): boolean {
    if (!this.options.signal?.aborted) {
      return false;
    }
    this.cancelled = true;
    if (record) {
      this.record(this.skipped(operation, "run was interrupted"));
    }
    return true;
  }

  private record(outcome: OperationOutcome) {
    this.outcomes.push(outcome);
    if (outcome.error) {
      this.options.callbacks?.onError?.(
        outcome.error,
        `${outcome.operation} ${outcome.changeId}`,
      );
    }
    this.options.callbacks?.onOperationCompleted?.(outcome);
  }

  private skipped(operation: Operation, reason: string): OperationOutcome {
    return {
      changeId: operationChangeId(operation),
      operation: operation.kind,
      status: "skipped",
      error: new Error(`Skipped: ${reason}`),
    };
  }

  private failed(operation: Operation, error: unknown): OperationOutcome {
    const err = toError(error);
    logger.error(
      `${operation.kind} ${operationChangeId(operation)} failed: ${err.message}`,
    );
    return {
      changeId: operationChangeId(operation),
      operation: operation.kind,
      status: "failed",
      error: err,
    };
  }

  private async applyStackOperation(
    operation: StackOperation,
  ): Promise<OperationOutcome> {
    switch (operation.kind) {
      case "create":
        return this.create(operation);
      case "update":
        return this.update(operation);
      case "retarget":
        return this.retarget(operation);
      case "noop":
        return {
          changeId: operation.entry.changeId,
          operation: "noop",
          status: "no-op",
          review: operation.remote.review,
        };
    }
  }

  private async push(branch: string, commitId: string): Promise<void> {
    const result = await this.host.pushBranch(branch, commitId);
    if (result.kind === "rejected") {
      throw new PushRejectedError(branch, result.detail);
    }
  }

  private async create(operation: CreateOperation): Promise<OperationOutcome> {
    const { entry, target } = operation;
    const branch = branchNameFor(entry.changeId);

    if (this.unpublished.has(target)) {
      this.unpublished.add(branch);
      return this.skipped(operation, `target branch ${target} was not published`);
    }

    try {
      await this.push(branch, entry.commitId);
    } catch (error) {
      if (!operation.existingBranch) {
        this.unpublished.add(branch);
      }
      return this.failed(operation, error);
    }
    this.remote.set(entry.changeId, {
      kind: "resolved",
      changeId: entry.changeId,
      branch,
      commitId: entry.commitId,
    });

    try {
      const review = await this.host.createReview(
        branch,
        target,
        entry.subject,
        entry.body,
      );
      this.remote.set(entry.changeId, {
        kind: "resolved",
        changeId: entry.changeId,
        branch,
        commitId: entry.commitId,
        review,
      });
      logger.info(`Created review ${review.url} for ${entry.changeId}`);
      return {
        changeId: entry.changeId,
        operation: "create",
        status: "created",
        review,
      };
    } catch (error) {
      return this.failed(operation, error);
    }
  }

  private async update(operation: UpdateOperation): Promise<OperationOutcome> {
    const { entry, remote } = operation;

    try {
      await this.push(remote.branch, entry.commitId);
    } catch (error) {
      return this.failed(operation, error);
    }

    if (remote.kind === "unknown") {
      this.remote.set(entry.changeId, { ...remote, commitId: entry.commitId });
      this.warnings.push(
        `Pushed ${remote.branch} but left its review untouched: ${remote.reason}`,
      );
      return { changeId: entry.changeId, operation: "update", status: "updated" };
    }

    let review = remote.review;
    this.remote.set(entry.changeId, { ...remote, commitId: entry.commitId });

    if (
      operation.retargetTo !== undefined &&
      this.unpublished.has(operation.retargetTo)
    ) {
      return this.failed(operation, new MissingTargetError(operation.retargetTo));
    }
    const changes = reviewChanges(review, entry.subject, operation.retargetTo);
    if (changes) {
      try {
        await this.host.updateReview(review.id, changes);
      } catch (error) {
        return this.failed(operation, error);
      }
      review = { ...review, ...changes };
      this.remote.set(entry.changeId, {
        ...remote,
        commitId: entry.commitId,
        review,
      });
    }

    return {
      changeId: entry.changeId,
      operation: "update",
      status: "updated",
      review,
    };
  }

  private async retarget(operation: RetargetOperation): Promise<OperationOutcome> {
    const { entry, remote, target } = operation;

    if (this.unpublished.has(target)) {
      return this.skipped(operation, `target branch ${target} was not published`);
    }

    const changes = reviewChanges(remote.review, entry.subject, target) ?? {
      targetBranch: target,
    };
    try {
      await this.host.updateReview(remote.review.id, changes);
    } catch (error) {
      return this.failed(operation, error);
    }

    const review = { ...remote.review, ...changes };
    this.remote.set(entry.changeId, { ...remote, review });
    return {
      changeId: entry.changeId,
      operation: "retarget",
      status: "retargeted",
      review,
    };
  }

  private async closeAndDelete(
    operation: CloseAndDeleteOperation,
  ): Promise<OperationOutcome> {
    const { remote } = operation;

    if (remote.review) {
      try {
        await this.host.closeReview(remote.review.id);
      } catch (error) {
        // The branch stays so the open review is not left dangling
        return this.failed(operation, error);
      }
      this.remote.set(remote.changeId, { ...remote, review: undefined });
    }

    try {
      const deleted = await this.host.deleteBranch(remote.branch);
      if (deleted === "not-found") {
        logger.debug(`Branch ${remote.branch} had already been deleted`);
      }
    } catch (error) {
      return this.failed(operation, error);
    }
    this.remote.delete(remote.changeId);

    return {
      changeId: remote.changeId,
      operation: "close-and-delete",
      status: "closed",
      review: remote.review && { ...remote.review, state: "closed" },
    };
  }
}

export function executePlan(
  plan: Plan,
  host: ReviewHost,
  remote: Map<string, RemoteEntry>,
  options: ExecuteOptions = {},
): Promise<ExecutionReport> {
  return new PlanExecutor(host, options, remote).run(plan);
}
