import type { DraftPlan, DraftStep, Plan, Step, StepId } from "../types/contracts.js";
import { isCapability } from "../types/contracts.js";
import { PlanValidationError, type ValidationIssue } from "../errors.js";

export type ValidationResult =
  | { ok: true; plan: Plan }
  | { ok: false; error: PlanValidationError };

type Mark = "visiting" | "visited";

/**
 * Structural checks, in order: ids, dependency references, capabilities,
 * cycles. Every issue found is reported; any issue rejects the whole plan.
 */
export function validatePlan(draft: DraftPlan): ValidationResult {
  const issues: ValidationIssue[] = [];
  const byId = new Map<StepId, DraftStep>();

  for (const [i, step] of draft.steps.entries()) {
    if (step.id.trim() === "") {
      issues.push({ code: "empty_id", message: `step at position ${i} has an empty id`, step_ids: [] });
      continue;
    }
    if (byId.has(step.id)) {
      issues.push({ code: "duplicate_id", message: `duplicate step id "${step.id}"`, step_ids: [step.id] });
      continue;
    }
    byId.set(step.id, step);
  }

  for (const step of byId.values()) {
    for (const dep of step.need) {
      if (!byId.has(dep)) {
        issues.push({
          code: "unknown_dependency",
          message: `step "${step.id}" depends on unknown step "${dep}"`,
          step_ids: [step.id, dep]
        });
      }
    }
  }

  for (const step of byId.values()) {
    if (!isCapability(step.agent.trim().toLowerCase())) {
      issues.push({
        code: "unknown_capability",
        message: `step "${step.id}" uses unknown capability "${step.agent}"`,
        step_ids: [step.id]
      });
    }
  }

  const cycle = findCycle(byId);
  if (cycle) {
    issues.push({
      code: "cycle",
      message: `dependency cycle: ${[...cycle, cycle[0]].join(" -> ")}`,
      step_ids: cycle
    });
  }

  if (issues.length > 0) return { ok: false, error: new PlanValidationError(issues) };
  return { ok: true, plan: toPlan(byId) };
}

/** Like validatePlan, but throws the PlanValidationError. */
export function assertValidPlan(draft: DraftPlan): Plan {
  const res = validatePlan(draft);
  if (!res.ok) throw res.error;
  return res.plan;
}

/**
 * DFS over step -> dependency edges with an explicit stack, so long chains
 * cannot overflow the call stack. Returns the first cycle found, in path order.
 */
function findCycle(byId: ReadonlyMap<StepId, DraftStep>): StepId[] | undefined {
  const marks = new Map<StepId, Mark>();

  for (const root of byId.keys()) {
    if (marks.has(root)) continue;
    const path: { id: StepId; next: number }[] = [{ id: root, next: 0 }];
    marks.set(root, "visiting");

    while (path.length) {
      const top = path[path.length - 1];
      const need = byId.get(top.id)?.need ?? [];
      if (top.next < need.length) {
        const dep = need[top.next++];
        if (!byId.has(dep)) continue;
        const mark = marks.get(dep);
        if (mark === "visiting") {
          const ids = path.map(f => f.id);
          return ids.slice(ids.indexOf(dep));
        }
        if (mark === undefined) {
          marks.set(dep, "visiting");
          path.push({ id: dep, next: 0 });
        }
        continue;
      }
      path.pop();
      marks.set(top.id, "visited");
    }
  }
  return undefined;
}

function toPlan(byId: ReadonlyMap<StepId, DraftStep>): Plan {
  const steps: Step[] = [];
  const index = new Map<StepId, Step>();
  for (const d of byId.values()) {
    const capability = d.agent.trim().toLowerCase();
    if (!isCapability(capability)) throw new Error(`step "${d.id}" has no recognised capability`);
    const step: Step = {
      id: d.id,
      capability,
      dependencies: [...new Set(d.need)],
      description: d.task,
      status: "pending",
      attempts: 0
    };
    steps.push(step);
    index.set(step.id, step);
  }
  return { steps, index };
}
