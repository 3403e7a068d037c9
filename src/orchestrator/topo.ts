import type { Plan, StepId } from "../types/contracts.js";

export interface GraphNode {
  indegree: number;
  dependents: StepId[];
}

export interface StepGraph {
  nodes: Map<StepId, GraphNode>;
  roots: StepId[];
}

export function buildGraph(plan: Plan): StepGraph {
  const nodes = new Map<StepId, GraphNode>();
  for (const step of plan.steps) {
    nodes.set(step.id, { indegree: step.dependencies.length, dependents: [] });
  }
  for (const step of plan.steps) {
    for (const dep of step.dependencies) {
      const node = nodes.get(dep);
      if (!node) throw new Error(`step "${step.id}" depends on unknown step "${dep}"`);
      node.dependents.push(step.id);
    }
  }
  const roots = plan.steps.filter(s => s.dependencies.length === 0).map(s => s.id);
  return { nodes, roots };
}

export function topoOrder(graph: StepGraph): StepId[] {
  const indeg = new Map<StepId, number>();
  for (const [id, node] of graph.nodes) indeg.set(id, node.indegree);
  const q: StepId[] = [...graph.roots];
  const out: StepId[] = [];
  while (q.length) {
    const u = q.shift();
    if (u === undefined) break;
    out.push(u);
    for (const v of graph.nodes.get(u)?.dependents ?? []) {
      const d = (indeg.get(v) ?? 0) - 1;
      indeg.set(v, d);
      if (d === 0) q.push(v);
    }
  }
  if (out.length !== graph.nodes.size) {
    throw new Error("Graph has cycles");
  }
  return out;
}
