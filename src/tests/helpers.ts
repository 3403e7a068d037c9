import { assertValidPlan } from '../orchestrator/validate.js';
import type { Capability, ExecutionContext, Plan } from '../types/contracts.js';
import type { Executor, ExecutorRegistry } from '../types/executors.js';

export interface StepSpec {
  id: string;
  agent?: string;
  need?: string[];
  task?: string;
}

/** Valid plan whose step tasks default to the step id. */
export function makePlan(specs: StepSpec[]): Plan {
  return assertValidPlan({
    steps: specs.map(s => ({ id: s.id, agent: s.agent ?? 'Casual', need: s.need ?? [], task: s.task ?? s.id }))
  });
}

export const SCENARIO: StepSpec[] = [
  { id: '1', agent: 'Web', need: [] },
  { id: '2', agent: 'Web', need: ['1'] },
  { id: '3', agent: 'File', need: ['1'] },
  { id: '4', agent: 'Coder', need: ['2', '3'] },
  { id: '5', agent: 'Casual', need: ['1', '2', '3', '4'] }
];

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export interface Trace {
  events: string[];
  contexts: Record<string, ExecutionContext>;
  active: Record<Capability, number>;
  peak: Record<Capability, number>;
  activeTotal: number;
  peakTotal: number;
  abortedAtEnd: string[];
}

export interface Behavior {
  delayMs?: Record<string, number>;
  defaultDelayMs?: number;
  fail?: string[];
}

export function newTrace(): Trace {
  const zero = () => ({ coder: 0, file: 0, web: 0, casual: 0 });
  return { events: [], contexts: {}, active: zero(), peak: zero(), activeTotal: 0, peakTotal: 0, abortedAtEnd: [] };
}

/**
 * Executors that treat the task text as the step id, sleep, and record what
 * they saw. Results are `result <id>`; failures `boom <id>`.
 */
export function tracingRegistry(trace: Trace, behavior: Behavior = {}): ExecutorRegistry {
  const make = (cap: Capability): Executor => ({
    name: cap,
    async execute(task, context, signal) {
      trace.events.push(`start:${task}`);
      trace.contexts[task] = context;
      trace.active[cap] += 1;
      trace.activeTotal += 1;
      trace.peak[cap] = Math.max(trace.peak[cap], trace.active[cap]);
      trace.peakTotal = Math.max(trace.peakTotal, trace.activeTotal);
      await sleep(behavior.delayMs?.[task] ?? behavior.defaultDelayMs ?? 5);
      trace.active[cap] -= 1;
      trace.activeTotal -= 1;
      trace.events.push(`end:${task}`);
      if (signal.aborted) trace.abortedAtEnd.push(task);
      if (behavior.fail?.includes(task)) return { ok: false, error: `boom ${task}` };
      return { ok: true, output: `result ${task}` };
    }
  });
  return {
    coder: make('coder'),
    file: make('file'),
    web: make('web'),
    casual: make('casual')
  };
}

export function uniformRegistry(executor: Executor): ExecutorRegistry {
  return { coder: executor, file: executor, web: executor, casual: executor };
}
