import type { CallExpression, ExecutionPlan } from "../types/plan.js";
import { RewriteError } from "./errors.js";

export function renderValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") return String(value);
  if (value === null || value === undefined) return "null";
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Replaces each call expression with its rendered result in one left-to-right pass over
 * the original text. Spans are the ones captured at parse time; text between and around
 * them, including inert markers, is copied through untouched.
 */
export function rewritePlan(text: string, calls: CallExpression[], plan: ExecutionPlan): string {
  const ordered = [...calls].sort((a, b) => a.source_span.start - b.source_span.start);
  let out = "";
  let pos = 0;

  for (const call of ordered) {
    const id = call.output_placeholder;
    const { start, end } = call.source_span;
    if (start < pos) throw new RewriteError(id, `span ${start}-${end} overlaps the previous expression`);
    if (text.slice(start, end) !== call.source_span.text) {
      throw new RewriteError(id, "span no longer matches the plan text");
    }

    const node = plan.nodes.get(id);
    if (!node) throw new RewriteError(id, "no node in the execution plan");
    if (node.status === "failed") throw new RewriteError(id, `its call failed: ${node.error ?? "unknown error"}`);
    if (node.status !== "done") throw new RewriteError(id, `node is ${node.status}, never executed`);

    out += text.slice(pos, start) + renderValue(node.result);
    pos = end;
  }
  return out + text.slice(pos);
}
