import type { CompletionArgs, CompletionOut } from '../types/llm.js';
import type { LLMProvider } from '../llm/provider.js';
import type { ToolResult, ToolSpec } from '../types/tools.js';
import type { DependencyNode, ExecutionPlan } from '../types/plan.js';
import { parsePlan } from '../orchestrator/parser.js';
import { buildExecutionPlan } from '../orchestrator/graph.js';

/** Replies with queued strings in order; records every request. */
export class ScriptedProvider implements LLMProvider {
  readonly calls: CompletionArgs[] = [];
  constructor(private replies: Array<string | Error>) {}

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    this.calls.push(args);
    const next = this.replies.shift();
    if (next === undefined) throw new Error('no scripted reply left');
    if (next instanceof Error) throw next;
    return { content: next };
  }
}

export function tool(
  name: string,
  fn: (args: unknown[], signal?: AbortSignal) => unknown | Promise<unknown>,
  arity = 2
): ToolSpec {
  return {
    name,
    params: Array.from({ length: arity }, (_, i) => ({ name: `a${i}`, type: 'any' })),
    returns: 'any',
    async invoke(args, ctx): Promise<ToolResult> {
      return { name, ok: true, output: await fn(args, ctx.signal) };
    }
  };
}

/** A tool that never settles by itself; it rejects once its call is aborted. */
export function untilAborted(name: string): ToolSpec {
  return {
    name,
    params: [{ name: 'a0', type: 'any' }],
    returns: 'any',
    invoke: (_args, ctx) =>
      new Promise<ToolResult>((_, reject) => {
        ctx.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      })
  };
}

export function deferred<T = void>() {
  let resolve: (v: T) => void = () => {};
  const promise = new Promise<T>(r => { resolve = r; });
  return { promise, resolve };
}

export const sleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

export function planFor(text: string, toolNames: string[]): ExecutionPlan {
  return buildExecutionPlan(text, parsePlan(text, toolNames).calls);
}

export function nodeOf(plan: ExecutionPlan, id: string): DependencyNode {
  const n = plan.nodes.get(id);
  if (!n) throw new Error(`no node ${id}`);
  return n;
}

export const SALLY =
  'Sally has [FUNC add(3, 2) = y1] apples... multiplies by 3, [FUNC multiply(y1, 3) = y2] apples.';

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}
