import { Octokit } from "octokit";
import { getGitHubAuth, getGitLabAuth, runCommand } from "./auth.js";
import type { AuthFailure, AuthSuccess, CommandRunner } from "./auth.js";
import type { GitPublishConfig } from "./config.js";
import { CredentialError, UnsupportedPlatformError } from "./errors.js";
import { GitHubReviewHost } from "./github.js";
import { GitLabReviewHost } from "./gitlab.js";
import type { GitFunctions } from "./gitUtils.js";
import { logger } from "./logger.js";
import type { Platform, ReviewHost } from "./reviewHost.js";

export interface RemoteLocation {
  host: string;
  namespace: string; // "owner/repo" or "group/subgroup/project"
  platform: Platform | "unknown";
}

/**
 * Parse a git remote URL. Supports:
 * - HTTPS: https://github.com/owner/repo.git
 * - SSH: ssh://git@gitlab.com:2222/group/project.git
 * - scp-like: git@github.com:owner/repo.git
 */
export function parseRemoteUrl(
  remoteUrl: string,
  gitlabUrl = "https://gitlab.com",
): RemoteLocation | undefined {
  let host: string;
  let path: string;

  const scpLike = /^(?:[^@/\s]+@)?([^:/\s]+):(?!\/\/)(.+)$/.exec(remoteUrl);
  if (scpLike && !/^[a-z][a-z0-9+.-]*:\/\//i.test(remoteUrl)) {
    host = scpLike[1];
    path = scpLike[2];
  } else {
    try {
      const url = new URL(remoteUrl);
      host = url.hostname;
      path = url.pathname;
    } catch {
      return undefined;
    }
  }

  const namespace = path
    .replace(/^\/+/, "")
    .replace(/\/+$/, "")
    .replace(/\.git$/, "");
  if (!namespace.includes("/")) {
    return undefined;
  }

  return { host, namespace, platform: detectPlatform(host, gitlabUrl) };
}

function detectPlatform(host: string, gitlabUrl: string): RemoteLocation["platform"] {
  const lower = host.toLowerCase();
  if (lower === "github.com" || lower.endsWith(".github.com")) {
    return "github";
  }
  let configuredGitlab: string | undefined;
  try {
    configuredGitlab = new URL(gitlabUrl).hostname.toLowerCase();
  } catch {
    configuredGitlab = undefined;
  }
  if (lower.includes("gitlab") || lower === configuredGitlab) {
    return "gitlab";
  }
  return "unknown";
}

function requireToken(
  auth: AuthSuccess | AuthFailure,
  message: string,
): string {
  if (auth.kind === "failure") {
    throw new CredentialError(message);
  }
  logger.debug(`Using ${auth.config.source} credentials`);
  return auth.config.token;
}

/**
 * Pick the review host implementation for a remote and authenticate it.
 * Credentials are resolved here, before any remote call is made.
 */
export async function buildReviewHost(
  remote: string,
  remoteUrl: string,
  config: GitPublishConfig,
  git: Pick<GitFunctions, "forcePush">,
  env: Record<string, string | undefined> = process.env,
  run: CommandRunner = runCommand,
): Promise<ReviewHost> {
  const location = parseRemoteUrl(remoteUrl, config.gitlabUrl);
  if (!location || location.platform === "unknown") {
    throw new UnsupportedPlatformError(remoteUrl);
  }

  if (location.platform === "github") {
    const token = requireToken(
      await getGitHubAuth(env, run),
      "No GitHub token found. Set GITHUB_TOKEN (or GH_TOKEN), or run 'gh auth login'.",
    );
    const [namespaceOwner, namespaceRepo] = location.namespace.split("/");
    return new GitHubReviewHost(
      {
        owner: config.githubOwner ?? namespaceOwner,
        repo: config.githubRepo ?? namespaceRepo,
        octokit: new Octokit({ auth: token }),
      },
      git,
      remote,
      config.timeoutMs,
    );
  }

  const token = requireToken(
    getGitLabAuth(env),
    "Empty environment variable GITLAB_TOKEN.",
  );
  const configuredHost = new URL(config.gitlabUrl);
  const host =
    configuredHost.hostname === location.host
      ? configuredHost.origin
      : `https://${location.host}`;
  return new GitLabReviewHost(
    { host, token, projectPath: location.namespace },
    git,
    remote,
    config.timeoutMs,
  );
}
