import type { ToolSpec } from "../../types/tools.js";

export const httpRequest: ToolSpec = {
  name: "http.request",
  description: "Fetch a URL and return the response body as text.",
  params: [
    { name: "url", type: "string" },
    { name: "method", type: "string", optional: true },
    { name: "body", type: "string", optional: true }
  ],
  returns: "string",
  async invoke(args, ctx) {
    const url = typeof args[0] === "string" ? args[0] : "";
    const method = String(args[1] ?? "GET").toUpperCase();
    const body = args[2] === undefined ? undefined : typeof args[2] === "string" ? args[2] : JSON.stringify(args[2]);
    if (!url) return { name: this.name, ok: false, output: null, error: "missing url" };
    if (!/^https?:\/\//i.test(url)) return { name: this.name, ok: false, output: null, error: `not an http(s) url: ${url}` };
    const res = await fetch(url, { method, body, signal: ctx.signal });
    const text = await res.text();
    return { name: this.name, ok: res.ok, output: text, error: res.ok ? undefined : `HTTP ${res.status}` };
  }
};
