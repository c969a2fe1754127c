import type { PushResult } from "./gitUtils.js";
import type { BranchRef, ReviewMetadata } from "./types.js";

export type Platform = "github" | "gitlab";

/** Fields of an existing review to change; absent fields are left alone. */
export interface ReviewChanges {
  targetBranch?: string;
  title?: string;
}

/**
 * Everything the resolver and executor need from a code host. One
 * implementation exists per platform; nothing outside those implementations
 * branches on the platform.
 */
export interface ReviewHost {
  readonly platform: Platform;
  /** Branches named `<prefix>/...` with their current tips. */
  findBranches(prefix: string): Promise<BranchRef[]>;
  /** The open review whose source is `branchName`, if any. */
  findReview(branchName: string): Promise<ReviewMetadata | undefined>;
  pushBranch(name: string, commitId: string): Promise<PushResult>;
  deleteBranch(name: string): Promise<"ok" | "not-found">;
  createReview(
    sourceBranch: string,
    targetBranch: string,
    title: string,
    body: string,
  ): Promise<ReviewMetadata>;
  updateReview(reviewId: number, changes: ReviewChanges): Promise<void>;
  closeReview(reviewId: number): Promise<void>;
}
