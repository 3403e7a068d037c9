import type { ExecutionReport, Outcome, Plan, ReportEntry, Step, StepStatus } from "../types/contracts.js";

/**
 * Reads the plan's step state into a report. Steps appear in settlement
 * order; anything not settled follows in declaration order. Pure, so a
 * terminal plan always reports the same way.
 */
export function aggregate(plan: Plan): ExecutionReport {
  const counts: Record<StepStatus, number> = {
    pending: 0, ready: 0, running: 0, completed: 0, failed: 0, blocked: 0
  };
  for (const s of plan.steps) counts[s.status] += 1;

  const settled = plan.steps
    .filter((s): s is Step & { settled: number } => s.settled !== undefined)
    .sort((a, b) => a.settled - b.settled);
  const unsettled = plan.steps.filter(s => s.settled === undefined);

  return {
    outcome: outcomeOf(counts, plan.steps.length),
    steps: [...settled, ...unsettled].map(toEntry),
    counts
  };
}

export function outcomeOf(counts: Record<StepStatus, number>, total: number): Outcome {
  if (counts.completed === total) return "AllCompleted";
  if (counts.completed === 0) return "TotalFailure";
  return "PartialFailure";
}

function toEntry(s: Step): ReportEntry {
  const entry: ReportEntry = { id: s.id, capability: s.capability, status: s.status, attempts: s.attempts };
  if (s.status === "completed" && s.result !== undefined) entry.result = s.result;
  if (s.status === "failed" && s.error) entry.error = { ...s.error };
  if (s.blocked_by !== undefined) entry.blocked_by = s.blocked_by;
  if (s.duration_ms !== undefined) entry.duration_ms = s.duration_ms;
  return entry;
}
