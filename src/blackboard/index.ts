import type { ExecutionContext, StepId } from "../types/contracts.js";

/** Per-run store of completed results. Each step id is written at most once. */
export type Blackboard = Map<StepId, string>;

export function createBlackboard(): Blackboard {
  return new Map();
}

export function record(bb: Blackboard, id: StepId, value: string): void {
  if (bb.has(id)) throw new Error(`blackboard: "${id}" already recorded`);
  bb.set(id, value);
}

export function read(bb: Blackboard, id: StepId): string | undefined {
  return bb.get(id);
}

/**
 * Frozen view holding exactly the completed results among `ids`. Built with
 * Object.fromEntries so ids such as "__proto__" stay own keys.
 */
export function snapshot(bb: Blackboard, ids: readonly StepId[]): ExecutionContext {
  const entries: [StepId, string][] = [];
  for (const id of ids) {
    const value = read(bb, id);
    if (value !== undefined) entries.push([id, value]);
  }
  return Object.freeze(Object.fromEntries(entries));
}
