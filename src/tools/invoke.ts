import type { ToolSpec } from "../types/tools.js";

export type InvokeOutcome =
  | { ok: true; output: unknown }
  | { ok: false; error: string };

export interface InvokeOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * The single boundary between the graph walker and a tool. Thrown errors, `ok: false`
 * results and timeouts all come back as `{ ok: false, error }`; this never rejects.
 */
export async function invokeTool(spec: ToolSpec, args: unknown[], opts: InvokeOptions = {}): Promise<InvokeOutcome> {
  const ctrl = new AbortController();
  const onAbort = () => ctrl.abort(opts.signal?.reason);
  opts.signal?.addEventListener("abort", onAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<InvokeOutcome>(resolve => {
    if (!opts.timeoutMs) return;
    timer = setTimeout(() => {
      ctrl.abort(new Error("timeout"));
      resolve({ ok: false, error: `timed out after ${opts.timeoutMs}ms` });
    }, opts.timeoutMs);
  });

  const call = (async (): Promise<InvokeOutcome> => {
    try {
      const res = await spec.invoke(args, { signal: ctrl.signal });
      if (!res.ok) return { ok: false, error: res.error || `${spec.name} reported failure` };
      return { ok: true, output: res.output };
    } catch (e: unknown) {
      return { ok: false, error: e instanceof Error ? e.message : String(e) };
    }
  })();

  try {
    return await Promise.race([call, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
    opts.signal?.removeEventListener("abort", onAbort);
  }
}
