import { describe, it, expect } from 'vitest';
import { aggregate, outcomeOf } from '../orchestrator/aggregate.js';
import { runPlan } from '../orchestrator/run.js';
import { createDispatcher } from '../orchestrator/dispatch.js';
import { SCENARIO, makePlan, newTrace, tracingRegistry } from './helpers.js';

describe('aggregate', () => {
  it('is idempotent on a terminal plan', async () => {
    const plan = makePlan(SCENARIO);
    const report = await runPlan(plan, createDispatcher(tracingRegistry(newTrace(), { fail: ['3'] })));
    expect(aggregate(plan)).toEqual(report);
    expect(aggregate(plan)).toEqual(aggregate(plan));
  });

  it('counts statuses', async () => {
    const plan = makePlan(SCENARIO);
    const report = await runPlan(plan, createDispatcher(tracingRegistry(newTrace(), { fail: ['3'] })));
    expect(report.counts).toEqual({ pending: 0, ready: 0, running: 0, completed: 2, failed: 1, blocked: 2 });
  });

  it('lists unsettled steps after settled ones, in declaration order', () => {
    const plan = makePlan([{ id: 'a' }, { id: 'b' }, { id: 'c' }]);
    const [a, b, c] = plan.steps;
    c.status = 'completed';
    c.result = 'C';
    c.settled = 0;
    a.status = 'failed';
    a.error = { kind: 'failed', message: 'x' };
    a.settled = 1;
    expect(aggregate(plan).steps.map(s => s.id)).toEqual(['c', 'a', 'b']);
    expect(b.status).toBe('pending');
  });

  it('derives the overall outcome', () => {
    const counts = { pending: 0, ready: 0, running: 0, completed: 0, failed: 0, blocked: 0 };
    expect(outcomeOf({ ...counts, completed: 3 }, 3)).toBe('AllCompleted');
    expect(outcomeOf({ ...counts, completed: 1, blocked: 2 }, 3)).toBe('PartialFailure');
    expect(outcomeOf({ ...counts, failed: 1, blocked: 2 }, 3)).toBe('TotalFailure');
    expect(outcomeOf(counts, 0)).toBe('AllCompleted');
  });
});
