import type { ExecutionReport, Operation, Plan } from "./types.js";
import { operationChangeId } from "./execute.js";

export function describeOperation(operation: Operation): string {
  switch (operation.kind) {
    case "create":
      return `create → ${operation.target}`;
    case "update":
      if (operation.reason === "unknown-remote") {
        return "update (force push, review unknown)";
      }
      return operation.retargetTo
        ? `update, retarget → ${operation.retargetTo}`
        : "update";
    case "retarget":
      return `retarget ${operation.remote.review.targetBranch} → ${operation.target}`;
    case "noop":
      return "no-op";
    case "close-and-delete":
      return "close and delete";
  }
}

function columns(rows: Array<[string, string]>): string[] {
  const width = Math.max(0, ...rows.map(([left]) => left.length));
  return rows.map(([left, right]) => `${left.padEnd(width)}  ${right}`);
}

export function formatPlan(plan: Plan): string {
  const lines = columns(
    plan.operations.map((operation) => [
      operationChangeId(operation),
      describeOperation(operation),
    ]),
  );
  for (const warning of plan.warnings) {
    lines.push(`warning: ${warning}`);
  }
  return lines.join("\n");
}

export function formatSummary(report: ExecutionReport): string {
  const lines = columns(
    report.outcomes.map((outcome) => {
      let result: string = outcome.status;
      if (outcome.error) {
        result += `: ${outcome.error.message}`;
      } else if (outcome.review && outcome.status !== "no-op") {
        result += ` ${outcome.review.url}`;
      }
      return [outcome.changeId, `${outcome.operation}  ${result}`];
    }),
  );
  for (const warning of report.warnings) {
    lines.push(`warning: ${warning}`);
  }
  if (report.cancelled) {
    lines.push("Run was interrupted before all operations were applied");
  }
  return lines.join("\n");
}
