import type { GitFunctions, PushResult, Upstream } from "./gitUtils.js";
import type { ReviewChanges, ReviewHost } from "./reviewHost.js";
import type { BranchRef, CommitEntry, LocalEntry, ReviewMetadata, Stack } from "./types.js";

/** A 40-hex id whose abbreviated form is distinct for every `n`. */
export function objectId(n: number): string {
  return n.toString(16).padStart(40, "0").split("").reverse().join("");
}

export function entry(
  changeId: string,
  commitId: string,
  position: number,
): LocalEntry {
  return {
    changeId,
    commitId,
    subject: `Subject of ${changeId}`,
    body: "",
    position,
  };
}

/** Stack from `[changeId, commitId]` pairs, base first. */
export function stackOf(
  baseBranch: string,
  items: Array<[string, string]>,
): Stack {
  return {
    baseBranch,
    entries: items.map(([changeId, commitId], position) =>
      entry(changeId, commitId, position),
    ),
  };
}

/**
 * A code host kept in memory. Failures are injected per branch or review.
 */
export class InMemoryReviewHost implements ReviewHost {
  readonly platform = "github";
  readonly branches = new Map<string, string>();
  readonly reviews: ReviewMetadata[] = [];
  readonly calls: string[] = [];

  readonly rejectPushesTo = new Set<string>();
  readonly failLookupsFor = new Map<string, number>(); // branch -> remaining failures
  readonly failCloseFor = new Set<number>();
  readonly failCreateFor = new Set<string>();
  failBranchListing = 0;

  private nextReviewId = 1;

  openReview(
    sourceBranch: string,
    targetBranch: string,
    title = `Subject of ${sourceBranch}`,
  ): ReviewMetadata {
    const review: ReviewMetadata = {
      id: this.nextReviewId++,
      url: `https://example.test/pulls/${this.nextReviewId - 1}`,
      title,
      sourceBranch,
      targetBranch,
      state: "open",
    };
    this.reviews.push(review);
    return review;
  }

  openReviewFor(branch: string): ReviewMetadata | undefined {
    return this.reviews.find(
      (review) => review.sourceBranch === branch && review.state === "open",
    );
  }

  findBranches(prefix: string): Promise<BranchRef[]> {
    this.calls.push(`findBranches ${prefix}`);
    if (this.failBranchListing > 0) {
      this.failBranchListing--;
      return Promise.reject(new Error("listing unavailable"));
    }
    return Promise.resolve(
      Array.from(this.branches.entries())
        .filter(([name]) => name.startsWith(`${prefix}/`))
        .map(([name, commitId]) => ({ name, commitId })),
    );
  }

  findReview(branchName: string): Promise<ReviewMetadata | undefined> {
    this.calls.push(`findReview ${branchName}`);
    const failures = this.failLookupsFor.get(branchName) ?? 0;
    if (failures > 0) {
      this.failLookupsFor.set(branchName, failures - 1);
      return Promise.reject(new Error(`lookup failed for ${branchName}`));
    }
    const review = this.openReviewFor(branchName);
    return Promise.resolve(review && { ...review });
  }

  pushBranch(name: string, commitId: string): Promise<PushResult> {
    this.calls.push(`push ${name} ${commitId}`);
    if (this.rejectPushesTo.has(name)) {
      return Promise.resolve({ kind: "rejected", detail: "protected branch" });
    }
    this.branches.set(name, commitId);
    return Promise.resolve({ kind: "ok" });
  }

  deleteBranch(name: string): Promise<"ok" | "not-found"> {
    this.calls.push(`deleteBranch ${name}`);
    return Promise.resolve(this.branches.delete(name) ? "ok" : "not-found");
  }

  createReview(
    sourceBranch: string,
    targetBranch: string,
    title: string,
  ): Promise<ReviewMetadata> {
    this.calls.push(`createReview ${sourceBranch} -> ${targetBranch} "${title}"`);
    if (this.failCreateFor.has(sourceBranch)) {
      return Promise.reject(new Error(`cannot create review for ${sourceBranch}`));
    }
    if (!this.branches.has(targetBranch) && targetBranch !== "main") {
      return Promise.reject(new Error(`target ${targetBranch} does not exist`));
    }
    return Promise.resolve({ ...this.openReview(sourceBranch, targetBranch, title) });
  }

  updateReview(reviewId: number, changes: ReviewChanges): Promise<void> {
    const target =
      changes.targetBranch !== undefined ? ` -> ${changes.targetBranch}` : "";
    const title = changes.title !== undefined ? ` "${changes.title}"` : "";
    this.calls.push(`updateReview ${reviewId}${target}${title}`);
    const review = this.reviews.find((candidate) => candidate.id === reviewId);
    if (!review) {
      return Promise.reject(new Error(`no review ${reviewId}`));
    }
    Object.assign(review, changes);
    return Promise.resolve();
  }

  closeReview(reviewId: number): Promise<void> {
    this.calls.push(`closeReview ${reviewId}`);
    if (this.failCloseFor.has(reviewId)) {
      return Promise.reject(new Error(`cannot close ${reviewId}`));
    }
    const review = this.reviews.find((candidate) => candidate.id === reviewId);
    if (review) review.state = "closed";
    return Promise.resolve();
  }
}

/**
 * A linear repository kept in memory: commits, refs, a working tree flag and
 * a stash.
 */
export class InMemoryGit implements GitFunctions {
  readonly commits = new Map<string, CommitEntry>();
  readonly refs = new Map<string, string>();
  readonly stash: string[] = [];
  readonly calls: string[] = [];
  dirty = false;
  currentBranch: string | undefined = "feature";
  upstream: Upstream | undefined = { remote: "origin", branch: "main" };
  remoteUrl = "git@github.com:acme/widgets.git";
  gitDir = "/repo/.git";

  private nextId = 1;

  constructor() {
    const root = this.commit([], "Initial commit\n");
    this.refs.set("refs/remotes/origin/main", root);
    this.refs.set("refs/heads/feature", root);
  }

  private headRef(): string {
    return this.currentBranch ? `refs/heads/${this.currentBranch}` : "HEAD";
  }

  private commit(parents: string[], message: string, treeId?: string): string {
    const commitId = objectId(this.nextId++);
    this.commits.set(commitId, {
      commitId,
      treeId: treeId ?? objectId(0x10000 + this.nextId),
      parents,
      authorName: "Test",
      authorEmail: "test@example.com",
      authorDate: "2024-01-01T00:00:00+00:00",
      message,
    });
    return commitId;
  }

  /** Commit on top of the current head and move the branch. */
  addCommit(message: string): string {
    const parent = this.refs.get(this.headRef());
    const commitId = this.commit(parent ? [parent] : [], message);
    this.refs.set(this.headRef(), commitId);
    return commitId;
  }

  head(): string {
    const head = this.refs.get(this.headRef());
    if (!head) throw new Error("no HEAD");
    return head;
  }

  messages(): string[] {
    return this.rangeFrom(this.refs.get("refs/remotes/origin/main") ?? "", this.head()).map(
      (commit) => commit.message,
    );
  }

  private rangeFrom(base: string, tip: string): CommitEntry[] {
    const commits: CommitEntry[] = [];
    let current: string | undefined = tip;
    while (current && current !== base) {
      const commit = this.commits.get(current);
      if (!commit) break;
      commits.push(commit);
      current = commit.parents[0];
    }
    return commits.reverse();
  }

  revParse(ref: string): Promise<string> {
    const resolved =
      ref === "HEAD"
        ? this.refs.get(this.headRef())
        : (this.refs.get(ref) ?? (this.commits.has(ref) ? ref : undefined));
    return resolved
      ? Promise.resolve(resolved)
      : Promise.reject(new Error(`unknown revision ${ref}`));
  }

  isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    let current: string | undefined = descendant;
    while (current) {
      if (current === ancestor) return Promise.resolve(true);
      current = this.commits.get(current)?.parents[0];
    }
    return Promise.resolve(false);
  }

  getCommitRange(base: string, tip: string): Promise<CommitEntry[]> {
    return Promise.resolve(this.rangeFrom(base, tip));
  }

  isWorkingTreeDirty(): Promise<boolean> {
    return Promise.resolve(this.dirty);
  }

  stashPush(message: string): Promise<boolean> {
    this.calls.push("stashPush");
    if (!this.dirty) return Promise.resolve(false);
    this.stash.push(message);
    this.dirty = false;
    return Promise.resolve(true);
  }

  stashPop(): Promise<void> {
    this.calls.push("stashPop");
    if (this.stash.pop() === undefined) {
      return Promise.reject(new Error("No stash entries found."));
    }
    this.dirty = true;
    return Promise.resolve();
  }

  createCommit(commit: CommitEntry, parent: string, message: string): Promise<string> {
    return Promise.resolve(this.commit([parent], message, commit.treeId));
  }

  updateRef(ref: string, newValue: string, oldValue: string): Promise<void> {
    const name = ref === "HEAD" ? this.headRef() : ref;
    if (this.refs.get(name) !== oldValue) {
      return Promise.reject(new Error(`cannot lock ref '${ref}'`));
    }
    this.calls.push(`updateRef ${ref}`);
    this.refs.set(name, newValue);
    return Promise.resolve();
  }

  getCurrentBranch(): Promise<string | undefined> {
    return Promise.resolve(this.currentBranch);
  }

  getUpstream(): Promise<Upstream | undefined> {
    return Promise.resolve(this.upstream);
  }

  getRemoteUrl(): Promise<string> {
    return Promise.resolve(this.remoteUrl);
  }

  forcePush(): Promise<PushResult> {
    return Promise.resolve({ kind: "ok" });
  }

  getGitDir(): Promise<string> {
    return Promise.resolve(this.gitDir);
  }
}
