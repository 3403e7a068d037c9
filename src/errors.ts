import type { ErrorKind, StepError, StepId } from "./types/contracts.js";

export type IssueCode =
  | "malformed"
  | "empty_id"
  | "duplicate_id"
  | "unknown_dependency"
  | "unknown_capability"
  | "cycle";

export interface ValidationIssue {
  code: IssueCode;
  message: string;
  step_ids: StepId[];
}

/** Structural problem with a plan; nothing from the plan is scheduled. */
export class PlanValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(issues.map(i => i.message).join("; ") || "invalid plan");
    this.name = "PlanValidationError";
    this.issues = issues;
  }
}

/** Failure scoped to a single step. */
export class ExecutionError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = "ExecutionError";
    this.kind = kind;
  }

  toStepError(): StepError {
    return { kind: this.kind, message: this.message };
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
