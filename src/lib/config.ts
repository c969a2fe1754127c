import { userInfo } from "os";
import * as v from "valibot";
import { ConfigError } from "./errors.js";

export interface GitPublishConfig {
  gitBinary: string;
  branchPrefix: string;
  trailerPrefix: string;
  baseBranch?: string; // resolved from the upstream branch when unset
  remote?: string;
  timeoutMs: number;
  retries: number;
  gitlabUrl: string;
  githubOwner?: string;
  githubRepo?: string;
}

const NAMESPACE_PATTERN = /^[A-Za-z0-9._-]+$/;

const IntegerFromEnv = (fallback: number, min: number) =>
  v.optional(
    v.pipe(
      v.string(),
      v.trim(),
      v.transform(Number),
      v.number(),
      v.integer(),
      v.minValue(min),
    ),
    String(fallback),
  );

const EnvSchema = v.object({
  GIT_BINARY: v.optional(v.pipe(v.string(), v.nonEmpty()), "git"),
  GITPUBLISH_BRANCH_PREFIX: v.optional(
    v.pipe(
      v.string(),
      v.regex(
        NAMESPACE_PATTERN,
        "GITPUBLISH_BRANCH_PREFIX may only contain letters, digits, '.', '_' and '-'",
      ),
    ),
  ),
  GITPUBLISH_CHANGE_ID_PREFIX: v.optional(
    v.pipe(v.string(), v.trim(), v.nonEmpty()),
    "Change-Id:",
  ),
  GITPUBLISH_BASE_BRANCH: v.optional(v.pipe(v.string(), v.nonEmpty())),
  GITPUBLISH_REMOTE: v.optional(v.pipe(v.string(), v.nonEmpty())),
  GITPUBLISH_TIMEOUT_MS: IntegerFromEnv(30_000, 1),
  GITPUBLISH_RETRIES: IntegerFromEnv(3, 0),
  GITLAB_URL: v.optional(v.pipe(v.string(), v.url()), "https://gitlab.com"),
  GITHUB_OWNER: v.optional(v.pipe(v.string(), v.nonEmpty())),
  GITHUB_REPO: v.optional(v.pipe(v.string(), v.nonEmpty())),
});

/**
 * Default namespace for ChangeIds and branches: the OS user name with anything
 * git would reject in a ref component replaced.
 */
export function defaultBranchPrefix(username: string): string {
  const sanitized = username.replace(/[^A-Za-z0-9._-]+/g, "-");
  return sanitized.replace(/^[.-]+/, "") || "user";
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  username: () => string = () => userInfo().username,
): GitPublishConfig {
  // Treat empty variables as unset, like most shells' ${VAR:-default}
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const result = v.safeParse(EnvSchema, present);
  if (!result.success) {
    const issues = result.issues
      .map((issue) => {
        const key = issue.path?.map((item) => String(item.key)).join(".");
        return key ? `${key}: ${issue.message}` : issue.message;
      })
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const parsed = result.output;
  return {
    gitBinary: parsed.GIT_BINARY,
    branchPrefix:
      parsed.GITPUBLISH_BRANCH_PREFIX ?? defaultBranchPrefix(username()),
    trailerPrefix: parsed.GITPUBLISH_CHANGE_ID_PREFIX,
    baseBranch: parsed.GITPUBLISH_BASE_BRANCH,
    remote: parsed.GITPUBLISH_REMOTE,
    timeoutMs: parsed.GITPUBLISH_TIMEOUT_MS,
    retries: parsed.GITPUBLISH_RETRIES,
    gitlabUrl: parsed.GITLAB_URL,
    githubOwner: parsed.GITHUB_OWNER,
    githubRepo: parsed.GITHUB_REPO,
  };
}
