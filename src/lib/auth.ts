// AIDEV-NOTE: Token lookup is pure: it returns structured results and never prints.
// The CLI turns an AuthFailure into a CredentialError before any remote call.

import { execFile } from "child_process";
import { logger } from "./logger.js";

export interface AuthConfig {
  token: string;
  source: "env-var" | "gh-cli" | "git-credential";
}

// AIDEV-NOTE: Result types for clean separation of auth logic from presentation
export interface AuthSuccess {
  kind: "success";
  config: AuthConfig;
}

export interface AuthFailure {
  kind: "failure";
  reason: "no-auth-found";
}

/** Runs a helper program; resolves to its stdout, or null when it fails. */
export type CommandRunner = (
  file: string,
  args: string[],
  input?: string,
) => Promise<string | null>;

export const runCommand: CommandRunner = (file, args, input) =>
  new Promise((resolve) => {
    const child = execFile(file, args, { timeout: 10_000 }, (error, stdout) => {
      if (error) {
        logger.debug(`${file} ${args.join(" ")} failed: ${error.message}`);
        resolve(null);
        return;
      }
      resolve(stdout);
    });
    if (input !== undefined) {
      child.stdin?.end(input);
    }
  });

/**
 * Get token from environment variable
 */
function getEnvironmentToken(
  env: Record<string, string | undefined>,
  names: string[],
): string | null {
  for (const name of names) {
    const token = env[name]?.trim();
    if (token) {
      logger.debug(`Found token in environment variable ${name}`);
      return token;
    }
  }
  return null;
}

/**
 * Check if GitHub CLI is available and authenticated
 */
async function getGitHubCLIAuth(run: CommandRunner): Promise<string | null> {
  const token = (await run("gh", ["auth", "token"]))?.trim();
  if (token) {
    logger.debug("Found GitHub CLI authentication");
    return token;
  }
  return null;
}

/**
 * Ask git's credential helpers for a password stored for the host
 */
async function getGitCredentialAuth(
  run: CommandRunner,
  host: string,
): Promise<string | null> {
  const output = await run(
    "git",
    ["credential", "fill"],
    `protocol=https\nhost=${host}\n\n`,
  );
  const passwordLine = output
    ?.split("\n")
    .find((line) => line.startsWith("password="));
  const token = passwordLine?.slice("password=".length).trim();
  if (token) {
    logger.debug(`Found credential for ${host} in git credential store`);
    return token;
  }
  return null;
}

/**
 * Get GitHub authentication token using the following priority:
 * 1. Environment variables (GITHUB_TOKEN or GH_TOKEN)
 * 2. GitHub CLI (if available and authenticated)
 * 3. git credential helper for github.com
 */
export async function getGitHubAuth(
  env: Record<string, string | undefined> = process.env,
  run: CommandRunner = runCommand,
): Promise<AuthSuccess | AuthFailure> {
  const envToken = getEnvironmentToken(env, ["GITHUB_TOKEN", "GH_TOKEN"]);
  if (envToken) {
    return { kind: "success", config: { token: envToken, source: "env-var" } };
  }

  const ghCliToken = await getGitHubCLIAuth(run);
  if (ghCliToken) {
    return { kind: "success", config: { token: ghCliToken, source: "gh-cli" } };
  }

  const credentialToken = await getGitCredentialAuth(run, "github.com");
  if (credentialToken) {
    return {
      kind: "success",
      config: { token: credentialToken, source: "git-credential" },
    };
  }

  return { kind: "failure", reason: "no-auth-found" };
}

export function getGitLabAuth(
  env: Record<string, string | undefined> = process.env,
): AuthSuccess | AuthFailure {
  const token = getEnvironmentToken(env, ["GITLAB_TOKEN"]);
  if (token) {
    return { kind: "success", config: { token, source: "env-var" } };
  }
  return { kind: "failure", reason: "no-auth-found" };
}
