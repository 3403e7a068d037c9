import type { Capability, ExecutionContext } from "./contracts.js";

export type ExecutorResult =
  | { ok: true; output: string }
  | { ok: false; error: string };

/**
 * Uniform contract every capability implementation supplies.
 * Implementations may answer synchronously or return a promise; the
 * signal fires on timeout or fail-fast cancellation.
 */
export interface Executor {
  name: string;
  execute(task: string, context: ExecutionContext, signal: AbortSignal): ExecutorResult | Promise<ExecutorResult>;
}

export type ExecutorRegistry = { readonly [C in Capability]: Executor };
