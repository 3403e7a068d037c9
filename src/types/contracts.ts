export type StepId = string;

export const CAPABILITIES = ["coder", "file", "web", "casual"] as const;

export type Capability = (typeof CAPABILITIES)[number];

export type StepStatus = "pending" | "ready" | "running" | "completed" | "failed" | "blocked";

export type ErrorKind = "failed" | "timeout" | "cancelled";

export interface StepError {
  kind: ErrorKind;
  message: string;
}

export interface Step {
  readonly id: StepId;
  readonly capability: Capability;
  readonly dependencies: readonly StepId[];
  readonly description: string;
  status: StepStatus;
  result?: string;
  error?: StepError;
  blocked_by?: StepId;
  attempts: number;
  duration_ms?: number;
  /** position in settlement order, set once the step reaches a terminal status */
  settled?: number;
}

export interface Plan {
  readonly steps: readonly Step[];
  readonly index: ReadonlyMap<StepId, Step>;
}

/** A step as it comes off the wire, before validation. */
export interface DraftStep {
  id: string;
  agent: string;
  need: string[];
  task: string;
}

export interface DraftPlan {
  steps: DraftStep[];
}

/** Results of a step's declared dependencies, keyed by step id. */
export type ExecutionContext = Readonly<Record<StepId, string>>;

export type FailurePolicy = "best-effort" | "fail-fast";

export type Outcome = "AllCompleted" | "PartialFailure" | "TotalFailure";

export interface ReportEntry {
  id: StepId;
  capability: Capability;
  status: StepStatus;
  result?: string;
  error?: StepError;
  blocked_by?: StepId;
  attempts: number;
  duration_ms?: number;
}

export interface ExecutionReport {
  outcome: Outcome;
  steps: ReportEntry[];
  counts: Record<StepStatus, number>;
}

export function isCapability(value: string): value is Capability {
  return CAPABILITIES.some(c => c === value);
}
