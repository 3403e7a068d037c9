// src/orchestrator/run.ts
// Concurrent plan scheduler: ready queue + bounded worker pool, per-capability
// tokens, context snapshots from the blackboard, failure containment.

import type { ExecutionReport, FailurePolicy, Plan, Step, StepId } from "../types/contracts.js";
import { CAPABILITIES } from "../types/contracts.js";
import { createBlackboard, record, snapshot, type Blackboard } from "../blackboard/index.js";
import { ExecutionError, errorMessage } from "../errors.js";
import { aggregate } from "./aggregate.js";
import type { Dispatcher, DispatchOutcome } from "./dispatch.js";
import { CapabilityGate, DEFAULT_CONCURRENCY, type ConcurrencyLimits } from "./gate.js";
import { COLOR, fmtMs, logStep, preview } from "./log.js";
import { dispatchWithPolicy, resolvePolicy, type PolicyDefaults } from "./policy.js";
import { buildGraph, type StepGraph } from "./topo.js";

export interface RunOptions extends PolicyDefaults {
  /** size of the worker pool (default 4) */
  maxWorkers?: number;
  failurePolicy?: FailurePolicy;
  runId?: string;
}

export const DEFAULT_MAX_WORKERS = 4;

export async function runPlan(plan: Plan, dispatcher: Dispatcher, opts: RunOptions = {}): Promise<ExecutionReport> {
  const started = plan.steps.find(s => s.status !== "pending");
  if (started) {
    throw new Error(`plan has already been run (step "${started.id}" is ${started.status})`);
  }
  const maxWorkers = opts.maxWorkers ?? DEFAULT_MAX_WORKERS;
  if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
    throw new Error(`maxWorkers must be a positive integer, got ${maxWorkers}`);
  }

  const runId = opts.runId || new Date().toISOString().replace(/[:.]/g, "-");
  const t0 = Date.now();
  logStep(`${COLOR.cyan("▶ run")} ${runId} ${COLOR.gray(`— ${plan.steps.length} steps, ${maxWorkers} workers, ${opts.failurePolicy ?? "best-effort"}`)}`);

  await new PlanRun(plan, dispatcher, opts, maxWorkers).drive();

  const report = aggregate(plan);
  logStep(`${report.outcome === "AllCompleted" ? COLOR.green("■ run") : COLOR.red("■ run")} ${runId} ${report.outcome} ${COLOR.gray("(" + fmtMs(Date.now() - t0) + ")")}`);
  return report;
}

export function concurrencyLimits(opts: PolicyDefaults): ConcurrencyLimits {
  const limits: ConcurrencyLimits = { ...DEFAULT_CONCURRENCY };
  for (const cap of CAPABILITIES) {
    const n = opts.capabilities?.[cap]?.concurrency;
    if (n !== undefined) limits[cap] = n;
  }
  return limits;
}

class PlanRun {
  private readonly graph: StepGraph;
  private readonly remaining = new Map<StepId, number>();
  private readonly blackboard: Blackboard = createBlackboard();
  private readonly gate: CapabilityGate;
  private readonly controller = new AbortController();
  private readonly inFlight = new Map<StepId, Promise<void>>();
  private ready: StepId[] = [];
  private settledCount = 0;
  private startedCount = 0;
  private cancelledBy: StepId | undefined;

  constructor(
    private readonly plan: Plan,
    private readonly dispatcher: Dispatcher,
    private readonly opts: RunOptions,
    private readonly maxWorkers: number
  ) {
    this.graph = buildGraph(plan);
    this.gate = new CapabilityGate(concurrencyLimits(opts));
    for (const [id, node] of this.graph.nodes) this.remaining.set(id, node.indegree);
  }

  async drive(): Promise<void> {
    for (const id of this.graph.roots) this.markReady(this.step(id));
    for (;;) {
      this.launch();
      if (this.inFlight.size === 0) break;
      await Promise.race(this.inFlight.values());
    }
  }

  private step(id: StepId): Step {
    const s = this.plan.index.get(id);
    if (!s) throw new Error(`unknown step "${id}"`);
    return s;
  }

  private markReady(step: Step) {
    step.status = "ready";
    this.ready.push(step.id);
  }

  /** Fill free worker slots with ready steps whose capability has a free token. */
  private launch() {
    let i = 0;
    while (i < this.ready.length && this.inFlight.size < this.maxWorkers) {
      const step = this.step(this.ready[i]);
      if (!this.gate.tryAcquire(step.capability)) {
        i++;
        continue;
      }
      this.ready.splice(i, 1);
      this.start(step);
    }
  }

  private start(step: Step) {
    step.status = "running";
    const context = snapshot(this.blackboard, step.dependencies);
    const policy = resolvePolicy(this.opts, step.capability);
    const t0 = Date.now();
    const goal = preview(step.description);
    logStep(`${COLOR.cyan("▶ step")} ${++this.startedCount}/${this.plan.steps.length} ${step.id} ${COLOR.gray(`[${step.capability}]`)} ${goal ? COLOR.gray("— " + goal) : ""}`);

    // a timed-out executor that ignores its signal keeps the worker and token until it returns
    let overrun: Promise<void> | undefined;
    const task = dispatchWithPolicy(this.dispatcher, step, context, policy, this.controller.signal, {
      onRetry: (attempt, waitMs, error) => {
        logStep(COLOR.yellow(`  ↻ retry ${step.id} #${attempt} in ${fmtMs(waitMs)} — ${error.message}`));
      },
      onOverrun: running => {
        overrun = running;
      }
    })
      .catch((e: unknown): DispatchOutcome => ({ ok: false, error: new ExecutionError("failed", errorMessage(e)) }))
      .then(out => this.settle(step, out, Date.now() - t0))
      .then(() => overrun)
      .finally(() => {
        this.gate.release(step.capability);
        this.inFlight.delete(step.id);
      });
    this.inFlight.set(step.id, task);
  }

  private settle(step: Step, out: DispatchOutcome, ms: number) {
    step.duration_ms = ms;
    if (this.cancelledBy !== undefined) {
      this.fail(step, new ExecutionError("cancelled", `result discarded: run cancelled after step "${this.cancelledBy}" failed`));
      return;
    }
    if (!out.ok) {
      this.fail(step, out.error);
      return;
    }

    record(this.blackboard, step.id, out.result);
    step.status = "completed";
    step.result = out.result;
    this.markSettled(step);
    logStep(`${COLOR.green("✓ done")} ${step.id} ${COLOR.gray("(" + fmtMs(ms) + ")")}`);

    for (const depId of this.graph.nodes.get(step.id)?.dependents ?? []) {
      const left = (this.remaining.get(depId) ?? 0) - 1;
      this.remaining.set(depId, left);
      const dependent = this.step(depId);
      if (left === 0 && dependent.status === "pending") this.markReady(dependent);
    }
  }

  private fail(step: Step, error: ExecutionError) {
    const stepError = error.toStepError();
    step.status = "failed";
    step.error = stepError;
    this.markSettled(step);
    logStep(`${COLOR.red("✗ " + error.kind)} ${step.id} ${COLOR.gray("— " + preview(error.message, 160))}`);

    this.blockDependents(step.id);
    if (this.opts.failurePolicy === "fail-fast" && this.cancelledBy === undefined) this.cancel(step.id);
  }

  /** Everything transitively depending on `failedId` that has not run yet. */
  private blockDependents(failedId: StepId) {
    const stack = [...(this.graph.nodes.get(failedId)?.dependents ?? [])];
    while (stack.length) {
      const id = stack.pop();
      if (id === undefined) break;
      const s = this.step(id);
      if (s.status !== "pending" && s.status !== "ready") continue;
      this.block(s, failedId);
      stack.push(...(this.graph.nodes.get(id)?.dependents ?? []));
    }
  }

  private cancel(failedId: StepId) {
    this.cancelledBy = failedId;
    this.controller.abort(new ExecutionError("cancelled", `fail-fast: step "${failedId}" failed`));
    this.ready = [];
    for (const s of this.plan.steps) {
      if (s.status === "pending" || s.status === "ready") this.block(s, failedId);
    }
    if (this.inFlight.size > 1) {
      logStep(COLOR.yellow(`  ⊘ fail-fast: waiting on ${this.inFlight.size - 1} running step(s), results will be discarded`));
    }
  }

  private block(s: Step, cause: StepId) {
    s.status = "blocked";
    s.blocked_by = cause;
    this.ready = this.ready.filter(id => id !== s.id);
    this.markSettled(s);
    logStep(`${COLOR.magenta("⊘ blocked")} ${s.id} ${COLOR.gray(`(needs ${cause})`)}`);
  }

  private markSettled(s: Step) {
    s.settled = this.settledCount++;
  }
}
