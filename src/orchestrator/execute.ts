import type { DependencyNode, ExecutionPlan, Placeholder } from "../types/plan.js";
import type { ToolRegistry } from "../types/tools.js";
import { invokeTool, type InvokeOutcome } from "../tools/invoke.js";
import { lookupTool } from "../tools/registry.js";
import { logTool } from "../log.js";
import { RunCancelledError, ToolExecutionError } from "./errors.js";

export const DEFAULT_MAX_CONCURRENCY = 4;

export interface ExecuteOptions {
  /** Upper bound on tool invocations in flight at once. */
  maxConcurrency?: number;
  toolTimeoutMs?: number;
  signal?: AbortSignal;
}

interface Completion {
  id: Placeholder;
  outcome: InvokeOutcome;
  ms: number;
}

/** Results of every node that reached done, keyed by placeholder. */
export function collectResults(plan: ExecutionPlan): Record<Placeholder, unknown> {
  const out: Record<Placeholder, unknown> = {};
  for (const id of plan.order) {
    const node = plan.nodes.get(id);
    if (node?.status === "done") out[id] = node.result;
  }
  return out;
}

function resolveArgs(node: DependencyNode, plan: ExecutionPlan): unknown[] {
  return node.call.arguments.map(arg => {
    if (arg.kind === "literal") return arg.value;
    const dep = plan.nodes.get(arg.name);
    if (dep?.status !== "done") throw new Error(`internal: ${node.id} dispatched before ${arg.name} was done`);
    return dep.result;
  });
}

/**
 * Walks the plan in dependency order and runs each node's tool.
 *
 * This function is the only writer of node status and results; in-flight tool calls just
 * resolve to a completion record. After the first failure nothing new is dispatched, calls
 * already running are allowed to finish, then a ToolExecutionError is thrown for that node.
 * An aborted signal wins over tool failures and ends the walk with RunCancelledError.
 */
export async function executePlan(plan: ExecutionPlan, tools: ToolRegistry, opts: ExecuteOptions = {}): Promise<ExecutionPlan> {
  const limit = Math.max(1, Math.floor(opts.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY));
  const inflight = new Map<Placeholder, Promise<Completion>>();
  let seq = 0;
  let failed: DependencyNode | undefined;

  const promote = () => {
    for (const id of plan.order) {
      const node = plan.nodes.get(id);
      if (node?.status !== "pending") continue;
      if (node.dependencies.every(d => plan.nodes.get(d)?.status === "done")) node.status = "ready";
    }
  };

  const dispatch = (node: DependencyNode) => {
    const args = resolveArgs(node, plan);
    node.resolved_args = args;
    node.status = "running";
    node.dispatch_seq = seq++;

    const spec = lookupTool(tools, node.call.function_name);
    const started = Date.now();
    const work: Promise<InvokeOutcome> = spec
      ? invokeTool(spec, args, { timeoutMs: opts.toolTimeoutMs, signal: opts.signal })
      : Promise.resolve<InvokeOutcome>({ ok: false, error: `no tool named ${node.call.function_name}` });
    inflight.set(node.id, work.then(outcome => ({ id: node.id, outcome, ms: Date.now() - started })));
  };

  const settle = ({ id, outcome, ms }: Completion): DependencyNode | undefined => {
    const node = plan.nodes.get(id);
    if (!node) return undefined;
    node.complete_seq = seq++;
    if (outcome.ok) {
      node.result = outcome.output;
      node.status = "done";
    } else {
      node.error = outcome.error;
      node.status = "failed";
    }
    logTool(id, node.call.function_name, node.resolved_args ?? [], ms, outcome.ok ? undefined : outcome.error);
    return node.status === "failed" ? node : undefined;
  };

  for (;;) {
    if (!failed && !opts.signal?.aborted) {
      promote();
      for (const id of plan.order) {
        if (inflight.size >= limit) break;
        const node = plan.nodes.get(id);
        if (node?.status === "ready") dispatch(node);
      }
    }
    if (inflight.size === 0) break;
    const done = await Promise.race(inflight.values());
    inflight.delete(done.id);
    const f = settle(done);
    if (f && !failed) failed = f;
  }

  // tools see the same signal, so after an abort their failures are the cancellation itself
  if (opts.signal?.aborted) throw new RunCancelledError("execution");
  if (failed) {
    throw new ToolExecutionError(
      failed.id,
      failed.call.function_name,
      failed.resolved_args ?? [],
      failed.error ?? "unknown error",
      collectResults(plan)
    );
  }

  const unfinished = plan.order.filter(id => plan.nodes.get(id)?.status !== "done");
  if (unfinished.length) throw new Error(`internal: walk ended with unfinished nodes: ${unfinished.join(", ")}`);
  return plan;
}
