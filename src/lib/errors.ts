export type GitPublishErrorCode =
  | "dirty-tree"
  | "not-a-stack"
  | "non-linear-stack"
  | "empty-stack"
  | "duplicate-change-id"
  | "missing-change-id"
  | "remote-lookup"
  | "push-rejected"
  | "review-api"
  | "credential"
  | "config"
  | "unsupported-platform"
  | "hook-conflict"
  | "git-command"
  | "cancelled";

export class GitPublishError extends Error {
  constructor(
    public readonly code: GitPublishErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DirtyTreeError extends GitPublishError {
  constructor(
    message = "Working tree has uncommitted changes",
    options?: { cause?: unknown },
  ) {
    super("dirty-tree", message, options);
  }
}

export class NotAStackError extends GitPublishError {
  constructor(
    public readonly base: string,
    public readonly tip: string,
  ) {
    super(
      "not-a-stack",
      `${base} is not an ancestor of ${tip}; rebase onto ${base} first`,
    );
  }
}

export class NonLinearStackError extends GitPublishError {
  constructor(public readonly commitId: string) {
    super(
      "non-linear-stack",
      `Merge commit ${commitId} cannot be published; the stack must be linear`,
    );
  }
}

export class EmptyStackError extends GitPublishError {
  constructor(public readonly base: string) {
    super("empty-stack", `Nothing to publish: no commits on top of ${base}`);
  }
}

export class DuplicateChangeIdError extends GitPublishError {
  constructor(
    public readonly changeId: string,
    public readonly commitIds: string[],
  ) {
    super(
      "duplicate-change-id",
      `ChangeId ${changeId} appears on more than one commit: ${commitIds.join(", ")}`,
    );
  }
}

export class MissingChangeIdError extends GitPublishError {
  constructor(public readonly commitId: string) {
    super(
      "missing-change-id",
      `Commit ${commitId} doesn't have a ChangeId trailer`,
    );
  }
}

export class RemoteLookupError extends GitPublishError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("remote-lookup", message, options);
  }
}

export class PushRejectedError extends GitPublishError {
  constructor(
    public readonly branch: string,
    public readonly detail: string,
  ) {
    super("push-rejected", `Push to ${branch} was rejected: ${detail}`);
  }
}

export class ReviewApiError extends GitPublishError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("review-api", message, options);
  }
}

export class CredentialError extends GitPublishError {
  constructor(message: string) {
    super("credential", message);
  }
}

export class ConfigError extends GitPublishError {
  constructor(message: string) {
    super("config", message);
  }
}

export class UnsupportedPlatformError extends GitPublishError {
  constructor(public readonly remoteUrl: string) {
    super(
      "unsupported-platform",
      `Unknown Git platform for remote ${remoteUrl}`,
    );
  }
}

export class HookConflictError extends GitPublishError {
  constructor(public readonly hookPath: string) {
    super(
      "hook-conflict",
      `commit-msg script ${hookPath} must be removed first`,
    );
  }
}

export class GitCommandError extends GitPublishError {
  constructor(
    public readonly args: string[],
    public readonly stderr: string,
    options?: { cause?: unknown },
  ) {
    super(
      "git-command",
      `git ${args.join(" ")} failed${stderr ? `: ${stderr.trim()}` : ""}`,
      options,
    );
  }
}

export class CancelledError extends GitPublishError {
  constructor() {
    super("cancelled", "Run was interrupted");
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
