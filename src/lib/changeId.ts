import { randomInt } from "crypto";

const TOKEN_PATTERN = /^[A-Za-z0-9._-]+$/;
const MAX_SHORT_ATTEMPTS = 64;

/**
 * Find the ChangeId trailer in the last paragraph of a commit message.
 * The prefix match is case-sensitive.
 */
export function getChangeId(
  message: string,
  trailerPrefix: string,
): string | undefined {
  const paragraphs = message.trim().split(/\n\s*\n/);
  const lastParagraph = paragraphs[paragraphs.length - 1] ?? "";

  for (const line of lastParagraph.split("\n")) {
    if (line.startsWith(trailerPrefix)) {
      const changeId = line.slice(trailerPrefix.length).trim();
      return changeId || undefined;
    }
  }
  return undefined;
}

export function appendChangeId(
  message: string,
  changeId: string,
  trailerPrefix: string,
): string {
  return `${message.trim()}\n\n${trailerPrefix} ${changeId}\n`;
}

export function stripChangeId(message: string, trailerPrefix: string): string {
  return message
    .split("\n")
    .filter((line) => !line.startsWith(trailerPrefix))
    .join("\n")
    .trimEnd();
}

export function changeIdNamespace(changeId: string): string | undefined {
  const slash = changeId.indexOf("/");
  return slash > 0 ? changeId.slice(0, slash) : undefined;
}

export function isValidChangeId(changeId: string, branchPrefix: string): boolean {
  if (!changeId.startsWith(`${branchPrefix}/`)) {
    return false;
  }
  return TOKEN_PATTERN.test(changeId.slice(branchPrefix.length + 1));
}

/**
 * The branch that carries a ChangeId is named after the ChangeId itself, so
 * the mapping round-trips without any stored state.
 */
export function branchNameFor(changeId: string): string {
  return changeId;
}

export function changeIdForBranch(
  branchName: string,
  branchPrefix: string,
): string | undefined {
  return isValidChangeId(branchName, branchPrefix) ? branchName : undefined;
}

/**
 * Generate `<branchPrefix>/<hex token>` that is not in `taken`. Tokens are 16
 * random bits; after repeated collisions the token widens to 32 bits.
 */
export function createChangeId(
  branchPrefix: string,
  taken: ReadonlySet<string> = new Set(),
  random: (bits: 16 | 32) => number = (bits) => randomInt(0, 2 ** bits),
): string {
  for (let attempt = 0; ; attempt++) {
    const bits = attempt < MAX_SHORT_ATTEMPTS ? 16 : 32;
    const token = random(bits)
      .toString(16)
      .padStart(bits / 4, "0");
    const changeId = `${branchPrefix}/${token}`;
    if (!taken.has(changeId)) {
      return changeId;
    }
  }
}
