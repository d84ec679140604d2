import { z } from "zod";
import type { CompletionArgs, CompletionOut } from "../types/llm.js";
import type { LLMProvider } from "./provider.js";
import { ProviderError } from "../orchestrator/errors.js";

const ChatResponse = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }),
    finish_reason: z.string().nullable().optional()
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
    total_tokens: z.number()
  }).optional()
});

export function normalizeFinishReason(reason: string | null | undefined): CompletionOut["finish_reason"] {
  return reason === "stop" || reason === "length" || reason === "content_filter" ? reason : undefined;
}

export class OpenAIChatCompletions implements LLMProvider {
  constructor(
    private apiKey: string,
    private baseUrl: string = 'https://api.openai.com/v1'
  ) {}

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const url = `${this.baseUrl}/chat/completions`;
    const body = {
      model: args.model,
      messages: args.messages.map(m => ({ role: m.role, content: m.content })),
      temperature: args.temperature ?? 0,
      max_tokens: args.max_tokens ?? 800,
      stop: args.stop?.length ? args.stop : undefined
    };

    const res = await fetch(url, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'authorization': `Bearer ${this.apiKey}`
      },
      body: JSON.stringify(body),
      signal: args.signal
    });
    if (!res.ok) {
      const text = await res.text();
      throw new ProviderError(`LLM HTTP ${res.status}: ${text}`, res.status);
    }
    const parsed = ChatResponse.safeParse(await res.json());
    if (!parsed.success) {
      throw new ProviderError(`LLM response did not match chat/completions shape: ${parsed.error.message}`);
    }
    const choice = parsed.data.choices[0];
    return {
      content: choice.message.content ?? '',
      finish_reason: normalizeFinishReason(choice.finish_reason),
      usage: parsed.data.usage
    };
  }
}
