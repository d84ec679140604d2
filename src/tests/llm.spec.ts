import { describe, it, expect, vi, afterEach } from 'vitest';
import { OpenAIChatCompletions } from '../llm/openai.js';
import { OpenAIResponses, extractResponseText } from '../llm/openai_responses.js';
import { ProviderError } from '../orchestrator/errors.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OpenAIChatCompletions', () => {
  it('posts messages and returns the first choice', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(JSON.stringify({
      choices: [{ message: { content: 'plan text' }, finish_reason: 'stop' }]
    })));
    vi.stubGlobal('fetch', fetchMock);

    const out = await new OpenAIChatCompletions('test-secret', 'https://llm.test/v1').complete({
      model: 'm',
      messages: [{ role: 'user', content: 'hi' }]
    });
    expect(out).toEqual({ content: 'plan text', finish_reason: 'stop', usage: undefined });
    expect(fetchMock.mock.calls[0][0]).toBe('https://llm.test/v1/chat/completions');
  });

  it('throws ProviderError on a non-2xx response', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 500 })));
    const p = new OpenAIChatCompletions('test-secret').complete({ model: 'm', messages: [] });
    await expect(p).rejects.toBeInstanceOf(ProviderError);
    await expect(p).rejects.toThrow('LLM HTTP 500: nope');
  });
});

describe('OpenAIResponses', () => {
  it('joins text segments of the assistant message', () => {
    expect(extractResponseText({
      output: [{ role: 'assistant', content: [{ type: 'output_text', text: 'a' }, { type: 'output_text', text: 'b' }] }]
    })).toBe('ab');
  });

  it('prefers output_text and maps usage', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({
      status: 'completed',
      output_text: 'done',
      usage: { input_tokens: 3, output_tokens: 4 }
    }))));
    const out = await new OpenAIResponses('test-secret').complete({ model: 'm', messages: [] });
    expect(out).toEqual({
      content: 'done',
      finish_reason: 'stop',
      usage: { prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 }
    });
  });
});
