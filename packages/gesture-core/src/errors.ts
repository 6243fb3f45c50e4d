import type { ZodIssue } from "zod";

function describeIssues(issues: readonly ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/** A landmark set the core cannot index safely. Reported to the acquisition side, never swallowed. */
export class MalformedHandError extends Error {
  constructor(
    readonly handIndex: number | undefined,
    readonly issues: readonly ZodIssue[]
  ) {
    super(
      handIndex === undefined
        ? `Malformed hand frame: ${describeIssues(issues)}`
        : `Malformed landmarks for hand ${handIndex}: ${describeIssues(issues)}`
    );
    this.name = "MalformedHandError";
  }
}

export class InvalidOptionsError extends Error {
  constructor(readonly issues: readonly ZodIssue[]) {
    super(`Invalid gesture options: ${describeIssues(issues)}`);
    this.name = "InvalidOptionsError";
  }
}
