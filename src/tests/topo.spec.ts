import { describe, it, expect } from 'vitest';
import { buildGraph, topoOrder } from '../orchestrator/topo.js';
import { SCENARIO, makePlan } from './helpers.js';

describe('dependency graph', () => {
  it('computes in-degrees, dependents and roots', () => {
    const g = buildGraph(makePlan(SCENARIO));
    expect(g.roots).toEqual(['1']);
    expect(Object.fromEntries([...g.nodes].map(([id, n]) => [id, n.indegree]))).toEqual({ 1: 0, 2: 1, 3: 1, 4: 2, 5: 4 });
    expect(g.nodes.get('1')?.dependents).toEqual(['2', '3', '5']);
    expect(g.nodes.get('2')?.dependents).toEqual(['4', '5']);
    expect(g.nodes.get('4')?.dependents).toEqual(['5']);
  });

  it('is deterministic', () => {
    const plan = makePlan(SCENARIO);
    expect(buildGraph(plan)).toEqual(buildGraph(plan));
  });

  it('orders steps topologically', () => {
    expect(topoOrder(buildGraph(makePlan(SCENARIO)))).toEqual(['1', '2', '3', '4', '5']);
  });

  it('keeps independent roots in declaration order', () => {
    const plan = makePlan([{ id: 'b' }, { id: 'a' }, { id: 'c', need: ['a', 'b'] }]);
    expect(topoOrder(buildGraph(plan))).toEqual(['b', 'a', 'c']);
  });
});
