import { setTimeout as delay } from "node:timers/promises";
import type { Capability, ExecutionContext, Step } from "../types/contracts.js";
import type { Dispatcher, DispatchOutcome } from "./dispatch.js";
import { ExecutionError } from "../errors.js";

export interface RetryOptions {
  retries?: number;
  backoffMs?: number;
}

export interface CapabilityOptions extends RetryOptions {
  concurrency?: number;
  timeoutMs?: number;
}

export interface PolicyDefaults extends RetryOptions {
  timeoutMs?: number;
  capabilities?: Partial<Record<Capability, CapabilityOptions>>;
}

export interface StepPolicy {
  /** 0 disables the timeout */
  timeoutMs: number;
  retries: number;
  backoffMs: number;
}

export function resolvePolicy(defaults: PolicyDefaults, capability: Capability): StepPolicy {
  const own = defaults.capabilities?.[capability];
  return {
    timeoutMs: own?.timeoutMs ?? defaults.timeoutMs ?? 0,
    retries: own?.retries ?? defaults.retries ?? 0,
    backoffMs: own?.backoffMs ?? defaults.backoffMs ?? 1000
  };
}

export function backoffFor(policy: StepPolicy, attempt: number): number {
  return policy.backoffMs * 2 ** attempt;
}

export interface AttemptHooks {
  onRetry?: (attempt: number, waitMs: number, error: ExecutionError) => void;
  /**
   * The last attempt timed out but its executor has not returned yet.
   * `running` settles when it does.
   */
  onOverrun?: (running: Promise<void>) => void;
}

interface Attempt {
  outcome: DispatchOutcome;
  /** set when the timeout fired before the executor returned */
  running?: Promise<void>;
}

/**
 * Dispatches up to `retries + 1` times, each attempt under the timeout.
 * `runSignal` aborting (fail-fast) is forwarded to the executor and stops
 * further attempts. A retry never starts while the previous attempt's
 * executor is still running.
 */
export async function dispatchWithPolicy(
  dispatcher: Dispatcher,
  step: Step,
  context: ExecutionContext,
  policy: StepPolicy,
  runSignal: AbortSignal,
  hooks: AttemptHooks = {}
): Promise<DispatchOutcome> {
  let last: DispatchOutcome = { ok: false, error: new ExecutionError("cancelled", "run cancelled before dispatch") };
  for (let attempt = 0; attempt <= policy.retries; attempt++) {
    if (runSignal.aborted) break;
    step.attempts = attempt + 1;
    const res = await attemptOnce(dispatcher, step, context, policy.timeoutMs, runSignal);
    last = res.outcome;
    if (last.ok || attempt === policy.retries || runSignal.aborted) {
      if (res.running) hooks.onOverrun?.(res.running);
      break;
    }
    const waitMs = backoffFor(policy, attempt);
    hooks.onRetry?.(attempt + 1, waitMs, last.error);
    await delay(waitMs, undefined, { signal: runSignal }).catch((e: unknown) => {
      if (!runSignal.aborted) throw e;
    });
    await res.running;
  }
  return last;
}

async function attemptOnce(
  dispatcher: Dispatcher,
  step: Step,
  context: ExecutionContext,
  timeoutMs: number,
  runSignal: AbortSignal
): Promise<Attempt> {
  const controller = new AbortController();
  const forward = () => controller.abort(runSignal.reason);
  runSignal.addEventListener("abort", forward, { once: true });
  const timedOut = () => new ExecutionError("timeout", `step "${step.id}" timed out after ${timeoutMs}ms`);

  const t0 = Date.now();
  const state = { returned: false };
  const dispatched = dispatcher.dispatch(step, context, controller.signal).finally(() => {
    state.returned = true;
  });
  let timer: NodeJS.Timeout | undefined;
  const racers: Promise<DispatchOutcome>[] = [dispatched];
  if (timeoutMs > 0) {
    racers.push(new Promise<DispatchOutcome>(resolve => {
      timer = setTimeout(() => {
        const error = timedOut();
        controller.abort(error);
        resolve({ ok: false, error });
      }, timeoutMs);
    }));
  }
  try {
    const outcome = await Promise.race(racers);
    if (!state.returned) {
      return { outcome, running: dispatched.then(() => undefined, () => undefined) };
    }
    // an executor that blocks the event loop finishes before the timer can fire
    if (timeoutMs > 0 && Date.now() - t0 > timeoutMs) {
      return { outcome: { ok: false, error: timedOut() } };
    }
    return { outcome };
  } finally {
    clearTimeout(timer);
    runSignal.removeEventListener("abort", forward);
  }
}
