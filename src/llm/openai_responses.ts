import { z } from "zod";
import type { CompletionArgs, CompletionOut } from "../types/llm.js";
import type { LLMProvider } from "./provider.js";
import { ProviderError } from "../orchestrator/errors.js";

const ContentSegment = z.object({ type: z.string(), text: z.string().optional() });

const ResponsesBody = z.object({
  status: z.string().optional(),
  output_text: z.string().optional(),
  output: z.array(z.object({
    type: z.string().optional(),
    role: z.string().optional(),
    content: z.union([z.string(), z.array(ContentSegment)]).optional()
  })).optional(),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).optional()
});

type ResponsesBody = z.infer<typeof ResponsesBody>;

/** Pulls assistant text out of a Responses API body, trying the consolidated field first. */
export function extractResponseText(data: ResponsesBody): string {
  if (data.output_text) return data.output_text;
  const msg = (data.output ?? []).find(x => x.role === "assistant");
  if (!msg?.content) return "";
  if (typeof msg.content === "string") return msg.content;
  return msg.content
    .filter(c => c.type === "output_text" || c.type === "text")
    .map(c => c.text ?? "")
    .join("");
}

/**
 * OpenAI "Responses" API adapter. Chat-style messages become the `input` array;
 * system messages go in as role "system" which the API accepts alongside user turns.
 */
export class OpenAIResponses implements LLMProvider {
  constructor(private apiKey: string, private baseUrl = "https://api.openai.com/v1") {}

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const url = `${this.baseUrl}/responses`;
    const payload = {
      model: args.model,
      input: args.messages.map(m => ({ role: m.role, content: m.content })),
      temperature: args.temperature ?? 0,
      max_output_tokens: args.max_tokens ?? 800
    };

    const res = await fetch(url, {
      method: "POST",
      headers: {
        "Authorization": `Bearer ${this.apiKey}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify(payload),
      signal: args.signal
    });

    if (!res.ok) {
      const text = await res.text();
      throw new ProviderError(`Responses HTTP ${res.status}: ${text}`, res.status);
    }
    const parsed = ResponsesBody.safeParse(await res.json());
    if (!parsed.success) {
      throw new ProviderError(`Responses body did not match expected shape: ${parsed.error.message}`);
    }
    const data = parsed.data;

    return {
      content: extractResponseText(data),
      finish_reason: data.status === "completed" ? "stop" : data.status === "incomplete" ? "length" : undefined,
      usage: data.usage
        ? {
            prompt_tokens: data.usage.input_tokens,
            completion_tokens: data.usage.output_tokens,
            total_tokens: data.usage.input_tokens + data.usage.output_tokens
          }
        : undefined
    };
  }
}
