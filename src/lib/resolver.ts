import pRetry from "p-retry";
import { changeIdNamespace } from "./changeId.js";
import { RemoteLookupError, toError } from "./errors.js";
import { logger } from "./logger.js";
import type { ReviewHost } from "./reviewHost.js";
import type { BranchRef, RemoteEntry, RemoteState } from "./types.js";

export interface ResolveOptions {
  branchPrefix: string;
  /** ChangeIds in the local stack; those outside `branchPrefix` are looked up one by one. */
  knownChangeIds?: Iterable<string>;
  retries: number;
  /** Base delay between attempts; doubles each attempt up to maxTimeout. */
  minTimeout?: number;
  maxTimeout?: number;
}

function withRetries<T>(
  description: string,
  operation: () => Promise<T>,
  options: ResolveOptions,
): Promise<T> {
  return pRetry(operation, {
    retries: options.retries,
    factor: 2,
    minTimeout: options.minTimeout ?? 500,
    maxTimeout: options.maxTimeout ?? 5_000,
    randomize: true,
    onFailedAttempt: (error) => {
      logger.debug(
        `${description} failed (attempt ${error.attemptNumber}, ${error.retriesLeft} retries left): ${error.message}`,
      );
    },
  });
}

async function listBranches(
  host: Pick<ReviewHost, "findBranches">,
  namespace: string,
  options: ResolveOptions,
): Promise<BranchRef[]> {
  try {
    return await withRetries(
      `Listing branches under ${namespace}/`,
      () => host.findBranches(namespace),
      options,
    );
  } catch (error) {
    throw new RemoteLookupError(
      `Could not list remote branches under ${namespace}/: ${toError(error).message}`,
      { cause: error },
    );
  }
}

/**
 * Build the identifier-keyed view of what the review host holds for this
 * tool's branches. Branch listing must succeed; a failed review lookup only
 * degrades that one branch to an `unknown` entry.
 */
export async function resolveRemoteState(
  host: Pick<ReviewHost, "findBranches" | "findReview">,
  options: ResolveOptions,
): Promise<RemoteState> {
  // Other namespaces are only searched for ChangeIds already known here;
  // the rest of their branches belong to someone else.
  const foreignIds = new Map<string, Set<string>>();
  for (const changeId of options.knownChangeIds ?? []) {
    const namespace = changeIdNamespace(changeId);
    if (!namespace || namespace === options.branchPrefix) continue;
    const ids = foreignIds.get(namespace) ?? new Set<string>();
    ids.add(changeId);
    foreignIds.set(namespace, ids);
  }

  const branches = new Map<string, BranchRef>();
  for (const branch of await listBranches(host, options.branchPrefix, options)) {
    branches.set(branch.name, branch);
  }
  for (const [namespace, ids] of foreignIds) {
    for (const branch of await listBranches(host, namespace, options)) {
      if (ids.has(branch.name)) branches.set(branch.name, branch);
    }
  }

  const resolved = await Promise.all(
    Array.from(branches.values()).map(async (branch): Promise<RemoteEntry> => {
      try {
        const review = await withRetries(
          `Looking up review for ${branch.name}`,
          () => host.findReview(branch.name),
          options,
        );
        return {
          kind: "resolved",
          changeId: branch.name,
          branch: branch.name,
          commitId: branch.commitId,
          review,
        };
      } catch (error) {
        const reason = toError(error).message;
        logger.warn(`Review lookup for ${branch.name} failed: ${reason}`);
        return {
          kind: "unknown",
          changeId: branch.name,
          branch: branch.name,
          commitId: branch.commitId,
          reason,
        };
      }
    }),
  );

  const entries = new Map<string, RemoteEntry>();
  const warnings: string[] = [];
  for (const entry of resolved) {
    entries.set(entry.changeId, entry);
    if (entry.kind === "unknown") {
      warnings.push(`Review lookup for ${entry.branch} failed: ${entry.reason}`);
    }
  }

  logger.debug(
    `Resolved ${entries.size} remote entries (${warnings.length} unknown)`,
  );
  return { entries, warnings };
}
