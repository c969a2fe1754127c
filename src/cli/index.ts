#!/usr/bin/env node

import { loadConfig, type GitPublishConfig } from "../lib/config.js";
import { GitPublishError, toError } from "../lib/errors.js";
import { createGitFunctions, type GitFunctions } from "../lib/gitUtils.js";
import { installCommitMessageHook, updateCommitMessageFile } from "../lib/hook.js";
import { buildReviewHost } from "../lib/hosts.js";
import { publish } from "../lib/publish.js";
import { formatPlan, formatSummary } from "../lib/summary.js";
import { VERSION } from "../version.js";

const PROGRAM = "git-publish";

function showHelp() {
  console.log(`${PROGRAM} ${VERSION} - publish a stack of commits as chained reviews`);
  console.log("");
  console.log("USAGE:");
  console.log(`  ${PROGRAM} [COMMAND] [OPTIONS]`);
  console.log("");
  console.log("COMMANDS:");
  console.log("  (none)                  Publish every commit above the base branch");
  console.log("    --dry-run             Show the plan without changing anything");
  console.log("  install-hook            Install the commit-msg hook that adds ChangeIds");
  console.log("  --message-file <path>   Add a ChangeId to a commit message file");
  console.log("  help, --help, -h        Show this help message");
  console.log("  --version, -v           Show the version");
  console.log("");
  console.log("ENVIRONMENT:");
  console.log("  GITPUBLISH_BRANCH_PREFIX     Branch namespace (default: user name)");
  console.log("  GITPUBLISH_CHANGE_ID_PREFIX  Trailer prefix (default: Change-Id:)");
  console.log("  GITPUBLISH_BASE_BRANCH       Base branch (default: upstream branch)");
  console.log("  GITPUBLISH_REMOTE            Remote (default: upstream remote)");
  console.log("  GITHUB_TOKEN, GH_TOKEN       GitHub token (or 'gh auth login')");
  console.log("  GITLAB_TOKEN, GITLAB_URL     GitLab token and instance URL");
}

function fail(message: string): void {
  console.error(`${PROGRAM} error: ${message}`);
  process.exitCode = 1;
}

function info(message: string) {
  console.log(`${PROGRAM} info: ${message}`);
}

/**
 * Abort the run on the first interrupt so cleanup can still happen; a second
 * interrupt exits immediately.
 */
function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSignal = () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    console.error(`${PROGRAM}: interrupted, finishing cleanup...`);
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
  };
}

async function publishCommand(
  git: GitFunctions,
  config: GitPublishConfig,
  dryRun: boolean,
): Promise<void> {
  const { signal, dispose } = interruptSignal();
  try {
    const result = await publish(
      git,
      config,
      (remote, remoteUrl) => buildReviewHost(remote, remoteUrl, config, git),
      {
        dryRun,
        installHook: true,
        signal,
        callbacks: {
          onHookInstalled: () => console.log("commit-msg hook installed"),
          onTargetResolved: (target) =>
            info(`Publishing onto ${target.remote}/${target.baseBranch}`),
          onTagged: (tagged) =>
            info(`Added ChangeIds to ${tagged.length} commit(s)`),
        },
      },
    );

    if (!result.report) {
      console.log(formatPlan(result.plan));
      return;
    }

    console.log(formatSummary(result.report));
    if (result.report.cancelled) {
      fail("Run was interrupted");
    } else if (!result.report.success) {
      fail("Some operations failed; fix the cause and run again");
    }
  } finally {
    dispose();
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const command = argv[0];

  if (command === "help" || command === "--help" || command === "-h") {
    showHelp();
    return;
  }
  if (command === "--version" || command === "-v") {
    console.log(`${PROGRAM} ${VERSION}`);
    return;
  }

  try {
    const config = loadConfig();
    const git = createGitFunctions(config);

    if (command === "--message-file" || command === "-m") {
      const path = argv[1];
      if (!path) {
        fail("--message-file requires a path");
        return;
      }
      await updateCommitMessageFile(path, config);
      return;
    }

    if (command === "install-hook") {
      const outcome = await installCommitMessageHook(await git.getGitDir());
      info(
        outcome === "installed"
          ? "commit-msg hook installed"
          : "commit-msg hook already installed",
      );
      return;
    }

    if (command !== undefined && command !== "--dry-run") {
      fail(`Unknown command '${command}'. Run '${PROGRAM} help' for usage.`);
      return;
    }

    await publishCommand(git, config, command === "--dry-run");
  } catch (error) {
    const err = toError(error);
    fail(err instanceof GitPublishError ? err.message : `${err.name}: ${err.message}`);
  }
}

void main();
