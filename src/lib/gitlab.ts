import { Gitlab } from "@gitbeaker/rest";
import * as v from "valibot";
import { ReviewApiError, toError } from "./errors.js";
import type { GitFunctions, PushResult } from "./gitUtils.js";
import { logger } from "./logger.js";
import type { ReviewChanges, ReviewHost } from "./reviewHost.js";
import type { BranchRef, ReviewMetadata } from "./types.js";

export interface GitLabConfig {
  host: string;
  token: string;
  projectPath: string; // e.g. "group/subgroup/project"
}

const MergeRequestSchema = v.object({
  iid: v.number(),
  web_url: v.string(),
  title: v.string(),
  state: v.string(),
  source_branch: v.string(),
  target_branch: v.string(),
});

const BranchSchema = v.object({
  name: v.string(),
  commit: v.object({ id: v.string() }),
});

const ErrorStatusSchema = v.object({
  cause: v.object({
    response: v.object({ status: v.number() }),
  }),
});

export function toMergeRequestMetadata(mergeRequest: unknown): ReviewMetadata {
  const mr = v.parse(MergeRequestSchema, mergeRequest);
  return {
    id: mr.iid,
    url: mr.web_url,
    title: mr.title,
    sourceBranch: mr.source_branch,
    targetBranch: mr.target_branch,
    state: mr.state === "opened" ? "open" : "closed",
  };
}

function responseStatus(error: unknown): number | undefined {
  const result = v.safeParse(ErrorStatusSchema, error);
  return result.success ? result.output.cause.response.status : undefined;
}

export class GitLabReviewHost implements ReviewHost {
  readonly platform = "gitlab";
  private readonly api: InstanceType<typeof Gitlab>;

  constructor(
    private readonly gitlab: GitLabConfig,
    private readonly git: Pick<GitFunctions, "forcePush">,
    private readonly remote: string,
    timeoutMs: number,
  ) {
    this.api = new Gitlab({
      host: gitlab.host,
      token: gitlab.token,
      queryTimeout: timeoutMs,
    });
  }

  async findBranches(prefix: string): Promise<BranchRef[]> {
    const branches = await this.api.Branches.all(this.gitlab.projectPath, {
      search: `^${prefix}/`,
    });

    return branches
      .map((raw) => v.parse(BranchSchema, raw))
      .filter((branch) => branch.name.startsWith(`${prefix}/`))
      .map((branch) => ({ name: branch.name, commitId: branch.commit.id }));
  }

  async findReview(branchName: string): Promise<ReviewMetadata | undefined> {
    const mergeRequests = await this.api.MergeRequests.all({
      projectId: this.gitlab.projectPath,
      sourceBranch: branchName,
      state: "opened",
    });

    const mr = mergeRequests[0];
    return mr ? toMergeRequestMetadata(mr) : undefined;
  }

  pushBranch(name: string, commitId: string): Promise<PushResult> {
    return this.git.forcePush(this.remote, commitId, name);
  }

  async deleteBranch(name: string): Promise<"ok" | "not-found"> {
    try {
      await this.api.Branches.remove(this.gitlab.projectPath, name);
      return "ok";
    } catch (error) {
      if (responseStatus(error) === 404) {
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
    try {
      const mr = await this.api.MergeRequests.create(
        this.gitlab.projectPath,
        sourceBranch,
        targetBranch,
        title,
        { description: body, removeSourceBranch: true },
      );
      return toMergeRequestMetadata(mr);
    } catch (error) {
      throw new ReviewApiError(
        `Failed to create merge request for ${sourceBranch}: ${toError(error).message}`,
        { cause: error },
      );
    }
  }

  async updateReview(reviewId: number, changes: ReviewChanges): Promise<void> {
    try {
      await this.api.MergeRequests.edit(this.gitlab.projectPath, reviewId, {
        targetBranch: changes.targetBranch,
        title: changes.title,
      });
    } catch (error) {
      throw new ReviewApiError(
        `Failed to update merge request !${reviewId}: ${toError(error).message}`,
        { cause: error },
      );
    }
  }

  async closeReview(reviewId: number): Promise<void> {
    try {
      await this.api.MergeRequests.edit(this.gitlab.projectPath, reviewId, {
        stateEvent: "close",
      });
    } catch (error) {
      throw new ReviewApiError(
        `Failed to close merge request !${reviewId}: ${toError(error).message}`,
        { cause: error },
      );
    }
  }
}
