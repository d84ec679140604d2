// src/orchestrator/run.ts
// One task end to end: plan prompt -> model -> parse -> graph -> execute -> rewrite -> refine prompt -> model.
// Core stages throw; this module turns every fatal error into a tagged RunOutcome.

import type { ExecutionPlan, ParseDiagnostic, Placeholder } from "../types/plan.js";
import type { ToolRegistry } from "../types/tools.js";
import type { LLMProvider } from "../llm/provider.js";
import { renderPlanPrompt, renderRefinePrompt } from "../prompt/renderer.js";
import { writeArtifact, graphSnapshot } from "../artifacts/store.js";
import { logStage, logDone, logWarn, logFail } from "../log.js";
import { parsePlan } from "./parser.js";
import { buildExecutionPlan } from "./graph.js";
import { executePlan, collectResults } from "./execute.js";
import { rewritePlan } from "./rewrite.js";
import { PlanEngineError, RunCancelledError, ToolExecutionError } from "./errors.js";

export type Stage = "plan" | "graph" | "execute" | "rewrite" | "refine" | "cancelled";

export interface SolveOptions {
  maxConcurrency?: number;
  toolTimeoutMs?: number;
  signal?: AbortSignal;
  /** When set, stage outputs are written under runs/<runId>/. */
  runId?: string;
  artifactsRoot?: string;
}

export interface RunOptions extends SolveOptions {
  provider: LLMProvider;
  tools: ToolRegistry;
  question: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  /** Skip the planning call and execute this plan text instead. */
  planText?: string;
}

export interface SolveSuccess {
  ok: true;
  plan_text: string;
  filled_plan: string;
  results: Record<Placeholder, unknown>;
  diagnostics: ParseDiagnostic[];
  plan: ExecutionPlan;
}

export interface RunFailure {
  ok: false;
  stage: Stage;
  reason: string;
  error: Error;
  /** Results of nodes that finished before the run stopped. */
  results: Record<Placeholder, unknown>;
  diagnostics: ParseDiagnostic[];
  plan_text?: string;
}

export type SolveOutcome = SolveSuccess | RunFailure;
export type RunOutcome = (SolveSuccess & { answer: string }) | RunFailure;

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

function failure(
  stage: Stage,
  e: unknown,
  extra: { results?: Record<Placeholder, unknown>; diagnostics?: ParseDiagnostic[]; plan_text?: string; runId?: string; root?: string }
): RunFailure {
  const error = toError(e);
  const actual: Stage = error instanceof RunCancelledError ? "cancelled" : stage;
  const out: RunFailure = {
    ok: false,
    stage: actual,
    reason: error.message,
    error,
    results: extra.results ?? {},
    diagnostics: extra.diagnostics ?? [],
    plan_text: extra.plan_text
  };
  logFail(actual, error.message);
  writeArtifact(extra.runId, "failure.json", {
    stage: actual,
    reason: error.message,
    kind: error instanceof PlanEngineError ? error.kind : "internal",
    results: out.results
  }, extra.root);
  return out;
}

function checkCancelled(signal: AbortSignal | undefined, where: string) {
  if (signal?.aborted) throw new RunCancelledError(where);
}

/** The model-free middle of a run: parse, build, execute and rewrite an existing plan text. */
export async function solvePlan(planText: string, tools: ToolRegistry, opts: SolveOptions = {}): Promise<SolveOutcome> {
  const { runId, artifactsRoot: root } = opts;
  writeArtifact(runId, "plan.txt", planText, root);

  const { calls, diagnostics } = parsePlan(planText, Object.keys(tools));
  for (const d of diagnostics) logWarn(`${d.code} at ${d.span.start}: ${d.message} (${d.span.text})`);
  if (diagnostics.length) writeArtifact(runId, "diagnostics.json", diagnostics, root);

  let plan: ExecutionPlan;
  try {
    checkCancelled(opts.signal, "graph construction");
    plan = buildExecutionPlan(planText, calls);
  } catch (e: unknown) {
    return failure("graph", e, { diagnostics, plan_text: planText, runId, root });
  }

  const t0 = Date.now();
  logStage("execute", `${plan.order.length} call(s)`);
  try {
    await executePlan(plan, tools, {
      maxConcurrency: opts.maxConcurrency,
      toolTimeoutMs: opts.toolTimeoutMs,
      signal: opts.signal
    });
  } catch (e: unknown) {
    writeArtifact(runId, "graph.json", graphSnapshot(plan), root);
    const results = e instanceof ToolExecutionError ? e.partialResults : collectResults(plan);
    return failure(opts.signal?.aborted ? "cancelled" : "execute", e, { results, diagnostics, plan_text: planText, runId, root });
  }
  logDone("execute", Date.now() - t0);

  const results = collectResults(plan);
  writeArtifact(runId, "graph.json", graphSnapshot(plan), root);
  writeArtifact(runId, "results.json", results, root);

  let filled: string;
  try {
    filled = rewritePlan(planText, calls, plan);
  } catch (e: unknown) {
    return failure("rewrite", e, { results, diagnostics, plan_text: planText, runId, root });
  }
  writeArtifact(runId, "filled.txt", filled, root);

  return { ok: true, plan_text: planText, filled_plan: filled, results, diagnostics, plan };
}

/** Runs one task. Never throws for a failed run; the reason is in the returned outcome. */
export async function runTask(opts: RunOptions): Promise<RunOutcome> {
  const { provider, tools, question, model, signal, runId, artifactsRoot: root } = opts;

  let planText: string;
  if (opts.planText !== undefined) {
    planText = opts.planText;
  } else {
    const tPlan = Date.now();
    logStage("plan", question.slice(0, 96));
    try {
      checkCancelled(signal, "planning");
      const out = await provider.complete({
        model,
        messages: renderPlanPrompt(tools, question),
        temperature: opts.temperature ?? 0,
        max_tokens: opts.maxTokens,
        signal
      });
      planText = out.content;
    } catch (e: unknown) {
      return failure(signal?.aborted ? "cancelled" : "plan", e, { runId, root });
    }
    logDone("plan", Date.now() - tPlan);
  }

  const solved = await solvePlan(planText, tools, opts);
  if (!solved.ok) return solved;

  const tRefine = Date.now();
  logStage("refine");
  let answer: string;
  try {
    checkCancelled(signal, "refinement");
    const out = await provider.complete({
      model,
      messages: renderRefinePrompt(question, solved.filled_plan),
      temperature: opts.temperature ?? 0,
      max_tokens: opts.maxTokens,
      signal
    });
    answer = out.content.trim();
  } catch (e: unknown) {
    return failure(signal?.aborted ? "cancelled" : "refine", e, {
      results: solved.results,
      diagnostics: solved.diagnostics,
      plan_text: planText,
      runId,
      root
    });
  }
  logDone("refine", Date.now() - tRefine);
  writeArtifact(runId, "answer.txt", answer, root);

  return { ...solved, answer };
}
