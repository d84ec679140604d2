import type { EngineConfig } from "../config.js";
import type { LLMProvider } from "./provider.js";
import { OpenAIChatCompletions } from "./openai.js";
import { OpenAIResponses } from "./openai_responses.js";
import { logWarn } from "../log.js";

export function createProvider(config: Pick<EngineConfig, "apiKey" | "baseUrl" | "apiStyle">): LLMProvider {
  if (!config.apiKey) {
    logWarn("OPENAI_API_KEY not set. Model calls will fail.");
  }
  const key = config.apiKey || "DUMMY";
  return config.apiStyle === "responses"
    ? new OpenAIResponses(key, config.baseUrl)
    : new OpenAIChatCompletions(key, config.baseUrl);
}
