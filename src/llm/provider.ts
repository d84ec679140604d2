import type { CompletionArgs, CompletionOut } from "../types/llm.js";

/** Text in, text out. Serves as both the plan source and the refinement sink. */
export interface LLMProvider {
  complete(args: CompletionArgs): Promise<CompletionOut>;
}
