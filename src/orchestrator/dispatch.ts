import type { ExecutionContext, Step } from "../types/contracts.js";
import type { ExecutorRegistry, ExecutorResult } from "../types/executors.js";
import { ExecutionError, errorMessage } from "../errors.js";

export type DispatchOutcome =
  | { ok: true; result: string }
  | { ok: false; error: ExecutionError };

export interface Dispatcher {
  dispatch(step: Step, context: ExecutionContext, signal: AbortSignal): Promise<DispatchOutcome>;
}

/** Lookup-and-forward: picks the executor for the step's capability. */
export function createDispatcher(registry: ExecutorRegistry): Dispatcher {
  return {
    async dispatch(step, context, signal) {
      const executor = registry[step.capability];
      let out: ExecutorResult;
      try {
        out = await executor.execute(step.description, context, signal);
      } catch (e) {
        return { ok: false, error: new ExecutionError("failed", `${executor.name}: ${errorMessage(e)}`) };
      }
      if (out.ok) return { ok: true, result: out.output };
      return { ok: false, error: new ExecutionError("failed", `${executor.name}: ${out.error}`) };
    }
  };
}
