export { parsePlan, hasMarkers, MARKER } from './orchestrator/parser.js';
export { buildExecutionPlan, findCycle, topoSort } from './orchestrator/graph.js';
export { executePlan, collectResults, DEFAULT_MAX_CONCURRENCY, type ExecuteOptions } from './orchestrator/execute.js';
export { rewritePlan, renderValue } from './orchestrator/rewrite.js';
export {
  runTask,
  solvePlan,
  type RunOptions,
  type SolveOptions,
  type RunOutcome,
  type SolveOutcome,
  type RunFailure,
  type Stage
} from './orchestrator/run.js';
export * from './orchestrator/errors.js';
export { buildToolRegistry, defaultTools, lookupTool, type ToolGroup } from './tools/registry.js';
export { invokeTool, type InvokeOutcome } from './tools/invoke.js';
export { renderSignature, renderPlanPrompt, renderRefinePrompt } from './prompt/renderer.js';
export type { LLMProvider } from './llm/provider.js';
export { OpenAIChatCompletions } from './llm/openai.js';
export { OpenAIResponses } from './llm/openai_responses.js';
export { createProvider } from './llm/factory.js';
export { loadConfig, type EngineConfig } from './config.js';
export type * from './types/plan.js';
export type * from './types/tools.js';
export type * from './types/llm.js';
