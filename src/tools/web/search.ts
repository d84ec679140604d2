import { z } from "zod";
import type { ToolSpec } from "../../types/tools.js";

const TavilyResponse = z.object({
  results: z.array(z.object({
    url: z.string(),
    title: z.string().optional(),
    content: z.string().optional()
  })).default([])
});

/**
 * Tavily web search. Returns the top snippets joined as plain text so the result can be
 * substituted straight into a plan.
 * Env:
 *  - TAVILY_API_KEY (required)
 *  - TAVILY_BASE_URL (optional, default: https://api.tavily.com/search)
 */
export const webSearch: ToolSpec = {
  name: "web.search",
  description: "Search the web and return the most relevant snippets.",
  params: [{ name: "query", type: "string" }, { name: "k", type: "number", optional: true }],
  returns: "string",
  async invoke(args, ctx) {
    const query = typeof args[0] === "string" ? args[0].trim() : "";
    const k = typeof args[1] === "number" && args[1] > 0 ? Math.floor(args[1]) : 3;
    const apiKey = process.env.TAVILY_API_KEY;
    const baseUrl = process.env.TAVILY_BASE_URL || "https://api.tavily.com/search";
    if (!query) return { name: this.name, ok: false, output: null, error: "missing query" };
    if (!apiKey) return { name: this.name, ok: false, output: null, error: "TAVILY_API_KEY not set" };

    const res = await fetch(baseUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ api_key: apiKey, query, max_results: k }),
      signal: ctx.signal
    });
    if (!res.ok) return { name: this.name, ok: false, output: null, error: `HTTP ${res.status}` };
    const data = TavilyResponse.safeParse(await res.json());
    if (!data.success) return { name: this.name, ok: false, output: null, error: "unexpected search response" };

    const text = data.data.results
      .slice(0, k)
      .map(r => (r.content || r.title || "").trim())
      .filter(Boolean)
      .join("\n");
    return { name: this.name, ok: true, output: text };
  }
};
