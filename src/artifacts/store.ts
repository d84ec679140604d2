import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { ExecutionPlan } from "../types/plan.js";
import { logWarn } from "../log.js";

export function saveArtifact(runId: string, fileName: string, content: string, root = "runs") {
  const dir = join(root, runId);
  mkdirSync(dir, { recursive: true });
  const path = join(dir, fileName);
  writeFileSync(path, content, "utf-8");
  return path;
}

/** Best effort: a failed write is logged and the run goes on. */
export function writeArtifact(runId: string | undefined, name: string, content: string | object, root?: string) {
  if (!runId) return undefined;
  try {
    const text = typeof content === "string" ? content : JSON.stringify(content, null, 2);
    return saveArtifact(runId, name, text, root);
  } catch (e: unknown) {
    logWarn(`could not write artifact ${name}: ${e instanceof Error ? e.message : String(e)}`);
    return undefined;
  }
}

export function graphSnapshot(plan: ExecutionPlan) {
  return {
    order: plan.order,
    nodes: plan.order.flatMap(id => {
      const n = plan.nodes.get(id);
      if (!n) return [];
      return [{
        id: n.id,
        function: n.call.function_name,
        args: n.call.arguments.map(a => (a.kind === "ref" ? { ref: a.name } : a.value)),
        dependencies: n.dependencies,
        status: n.status,
        resolved_args: n.resolved_args,
        result: n.result,
        error: n.error,
        dispatch_seq: n.dispatch_seq,
        complete_seq: n.complete_seq
      }];
    })
  };
}
