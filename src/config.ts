import { z } from "zod";
import { ConfigError } from "./orchestrator/errors.js";

const intFromEnv = (fallback: number) =>
  z.preprocess(
    v => (v === undefined || v === "" ? fallback : Number(v)),
    z.number().int().min(1)
  );

export const ConfigSchema = z.object({
  MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_API_STYLE: z.preprocess(
    v => (typeof v === "string" ? v.toLowerCase() : v),
    z.enum(["chat", "responses"]).default("chat")
  ),
  TEMPERATURE: z.preprocess(
    v => (v === undefined || v === "" ? 0 : Number(v)),
    z.number().min(0).max(2)
  ),
  MAX_CONCURRENCY: intFromEnv(4),
  TOOL_TIMEOUT_MS: intFromEnv(30_000),
  RUN_ID: z.string().min(1).optional(),
});

export interface EngineConfig {
  model: string;
  apiKey?: string;
  baseUrl: string;
  apiStyle: "chat" | "responses";
  temperature: number;
  maxConcurrency: number;
  toolTimeoutMs: number;
  runId?: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`));
  }
  const c = parsed.data;
  return {
    model: c.MODEL,
    apiKey: c.OPENAI_API_KEY || undefined,
    baseUrl: c.OPENAI_BASE_URL,
    apiStyle: c.OPENAI_API_STYLE,
    temperature: c.TEMPERATURE,
    maxConcurrency: c.MAX_CONCURRENCY,
    toolTimeoutMs: c.TOOL_TIMEOUT_MS,
    runId: c.RUN_ID,
  };
}
