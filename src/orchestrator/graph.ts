import type { CallExpression, DependencyNode, ExecutionPlan, Placeholder } from "../types/plan.js";
import { CycleError, DuplicatePlaceholderError, UnknownReferenceError } from "./errors.js";

/**
 * Builds the dependency graph for one plan. Edges come only from argument references.
 * Throws before anything runs if a placeholder is defined twice, referenced without a
 * definition, or sits on a cycle.
 */
export function buildExecutionPlan(text: string, calls: CallExpression[]): ExecutionPlan {
  const nodes = new Map<Placeholder, DependencyNode>();

  for (const call of calls) {
    const id = call.output_placeholder;
    const existing = nodes.get(id);
    if (existing) throw new DuplicatePlaceholderError(id, [existing.call.function_name, call.function_name]);

    const deps: Placeholder[] = [];
    for (const arg of call.arguments) {
      if (arg.kind === "ref" && !deps.includes(arg.name)) deps.push(arg.name);
    }
    nodes.set(id, { id, call, dependencies: deps, status: "pending" });
  }

  for (const node of nodes.values()) {
    for (const dep of node.dependencies) {
      if (!nodes.has(dep)) throw new UnknownReferenceError(dep, node.id);
    }
  }

  const cycle = findCycle(nodes);
  if (cycle) throw new CycleError(cycle);

  return { text, calls, nodes, order: topoSort(nodes) };
}

/** Depth-first walk along dependency edges; returns the first path that closes on itself. */
export function findCycle(nodes: Map<Placeholder, DependencyNode>): Placeholder[] | null {
  const state = new Map<Placeholder, "visiting" | "done">();
  const path: Placeholder[] = [];

  const visit = (id: Placeholder): Placeholder[] | null => {
    state.set(id, "visiting");
    path.push(id);
    for (const dep of nodes.get(id)?.dependencies ?? []) {
      const s = state.get(dep);
      if (s === "visiting") return [...path.slice(path.indexOf(dep)), dep];
      if (s === undefined) {
        const found = visit(dep);
        if (found) return found;
      }
    }
    path.pop();
    state.set(id, "done");
    return null;
  };

  for (const id of nodes.keys()) {
    if (state.has(id)) continue;
    const found = visit(id);
    if (found) return found;
  }
  return null;
}

export function topoSort(nodes: Map<Placeholder, DependencyNode>): Placeholder[] {
  const indeg = new Map<Placeholder, number>();
  const dependents = new Map<Placeholder, Placeholder[]>();
  for (const [id, node] of nodes) {
    indeg.set(id, node.dependencies.length);
    dependents.set(id, []);
  }
  for (const [id, node] of nodes) {
    for (const dep of node.dependencies) dependents.get(dep)?.push(id);
  }

  const q: Placeholder[] = [...nodes.keys()].filter(k => indeg.get(k) === 0);
  const out: Placeholder[] = [];
  while (q.length) {
    const u = q.shift();
    if (u === undefined) break;
    out.push(u);
    for (const v of dependents.get(u) ?? []) {
      const d = (indeg.get(v) ?? 0) - 1;
      indeg.set(v, d);
      if (d === 0) q.push(v);
    }
  }
  if (out.length !== nodes.size) {
    const stuck = [...nodes.keys()].filter(k => !out.includes(k));
    throw new CycleError(findCycle(nodes) ?? stuck);
  }
  return out;
}
