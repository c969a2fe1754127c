import { Octokit, RequestError } from "octokit";
import * as v from "valibot";
import { ReviewApiError, toError } from "./errors.js";
import type { GitFunctions, PushResult } from "./gitUtils.js";
import { logger } from "./logger.js";
import type { ReviewChanges, ReviewHost } from "./reviewHost.js";
import type { BranchRef, ReviewMetadata } from "./types.js";

export interface GitHubConfig {
  owner: string;
  repo: string;
  octokit: Octokit;
}

const PullRequestSchema = v.object({
  number: v.number(),
  html_url: v.string(),
  title: v.string(),
  state: v.picklist(["open", "closed"]),
  head: v.object({ ref: v.string() }),
  base: v.object({ ref: v.string() }),
});

const MatchingRefSchema = v.object({
  ref: v.string(),
  object: v.object({ sha: v.string() }),
});

export function toReviewMetadata(pullRequest: unknown): ReviewMetadata {
  const pr = v.parse(PullRequestSchema, pullRequest);
  return {
    id: pr.number,
    url: pr.html_url,
    title: pr.title,
    sourceBranch: pr.head.ref,
    targetBranch: pr.base.ref,
    state: pr.state,
  };
}

export class GitHubReviewHost implements ReviewHost {
  readonly platform = "github";

  constructor(
    private readonly github: GitHubConfig,
    private readonly git: Pick<GitFunctions, "forcePush">,
    private readonly remote: string,
    private readonly timeoutMs: number,
  ) {}

  private requestOptions() {
    return { request: { signal: AbortSignal.timeout(this.timeoutMs) } };
  }

  async findBranches(prefix: string): Promise<BranchRef[]> {
    const { octokit, owner, repo } = this.github;
    const refs = await octokit.paginate(octokit.rest.git.listMatchingRefs, {
      owner,
      repo,
      ref: `heads/${prefix}/`,
      per_page: 100,
      ...this.requestOptions(),
    });

    return refs.map((raw) => {
      const ref = v.parse(MatchingRefSchema, raw);
      return {
        name: ref.ref.replace(/^refs\/heads\//, ""),
        commitId: ref.object.sha,
      };
    });
  }

  async findReview(branchName: string): Promise<ReviewMetadata | undefined> {
    const { octokit, owner, repo } = this.github;
    const result = await octokit.rest.pulls.list({
      owner,
      repo,
      head: `${owner}:${branchName}`,
      state: "open",
      ...this.requestOptions(),
    });

    const pr = result.data[0];
    return pr ? toReviewMetadata(pr) : undefined;
  }

  pushBranch(name: string, commitId: string): Promise<PushResult> {
    return this.git.forcePush(this.remote, commitId, name);
  }

  async deleteBranch(name: string): Promise<"ok" | "not-found"> {
    const { octokit, owner, repo } = this.github;
    try {
      await octokit.rest.git.deleteRef({
        owner,
        repo,
        ref: `heads/${name}`,
        ...this.requestOptions(),
      });
      return "ok";
    } catch (error) {
      // GitHub answers 422 "Reference does not exist" for a missing branch
      if (
        error instanceof RequestError &&
        (error.status === 404 || error.status === 422)
      ) {
        logger.debug(`Branch ${name} was already gone`);
        return "not-found";
      }
      throw new ReviewApiError(
        `Failed to delete branch ${name}: ${toError(error).message}`,
        { cause: error },
      );
    }
  }

  async createReview(
    sourceBranch: string,
    targetBranch: string,
    title: string,
    body: string,
  ): Promise<ReviewMetadata> {
    const { octokit, owner, repo } = this.github;
    try {
      const result = await octokit.rest.pulls.create({
        owner,
        repo,
        title,
        body,
        head: sourceBranch,
        base: targetBranch,
        ...this.requestOptions(),
      });
      return toReviewMetadata(result.data);
    } catch (error) {
      throw new ReviewApiError(
        `Failed to create pull request for ${sourceBranch}: ${toError(error).message}`,
        { cause: error },
      );
    }
  }

  async updateReview(reviewId: number, changes: ReviewChanges): Promise<void> {
    const { octokit, owner, repo } = this.github;
    try {
      await octokit.rest.pulls.update({
        owner,
        repo,
        pull_number: reviewId,
        base: changes.targetBranch,
        title: changes.title,
        ...this.requestOptions(),
      });
    } catch (error) {
      throw new ReviewApiError(
        `Failed to update pull request #${reviewId}: ${toError(error).message}`,
        { cause: error },
      );
    }
  }

  async closeReview(reviewId: number): Promise<void> {
    const { octokit, owner, repo } = this.github;
    try {
      await octokit.rest.pulls.update({
        owner,
        repo,
        pull_number: reviewId,
        state: "closed",
        ...this.requestOptions(),
      });
    } catch (error) {
      throw new ReviewApiError(
        `Failed to close pull request #${reviewId}: ${toError(error).message}`,
        { cause: error },
      );
    }
  }
}
