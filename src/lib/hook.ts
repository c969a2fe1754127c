import { chmod, mkdir, readFile, writeFile } from "fs/promises";
import { join } from "path";
import { appendChangeId, createChangeId, getChangeId } from "./changeId.js";
import type { GitPublishConfig } from "./config.js";
import { HookConflictError } from "./errors.js";
import { logger } from "./logger.js";

export const COMMIT_MSG_HOOK = `#!/bin/sh
git-publish --message-file "$1"
`;

/**
 * commit-msg hook mode: append a ChangeId trailer to the message file unless
 * it already has one. Returns the ChangeId now in the message.
 */
export async function updateCommitMessageFile(
  path: string,
  config: Pick<GitPublishConfig, "branchPrefix" | "trailerPrefix">,
): Promise<string> {
  const message = await readFile(path, "utf8");
  const existing = getChangeId(message, config.trailerPrefix);
  if (existing) {
    return existing;
  }

  const changeId = createChangeId(config.branchPrefix);
  await writeFile(path, appendChangeId(message, changeId, config.trailerPrefix));
  logger.debug(`Added ChangeId ${changeId} to ${path}`);
  return changeId;
}

/**
 * Install the commit-msg hook into `<gitDir>/hooks`. An identical hook is
 * left alone; any other existing hook is a conflict.
 */
export async function installCommitMessageHook(
  gitDir: string,
): Promise<"installed" | "already-installed"> {
  const hooksDir = join(gitDir, "hooks");
  const hookPath = join(hooksDir, "commit-msg");

  let current: string | undefined;
  try {
    current = await readFile(hookPath, "utf8");
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
      throw error;
    }
  }

  if (current !== undefined) {
    if (current !== COMMIT_MSG_HOOK) {
      throw new HookConflictError(hookPath);
    }
    return "already-installed";
  }

  await mkdir(hooksDir, { recursive: true });
  await writeFile(hookPath, COMMIT_MSG_HOOK);
  await chmod(hookPath, 0o775);
  return "installed";
}
