export interface ToolResult {
  name: string;
  output: unknown;
  ok: boolean;
  error?: string;
}

export interface ToolParam {
  name: string;
  type: string;
  optional?: boolean;
}

export interface ToolContext {
  signal?: AbortSignal;
}

export interface ToolSpec {
  name: string;
  description?: string;
  params: ToolParam[];
  returns: string;
  invoke(args: unknown[], ctx: ToolContext): Promise<ToolResult>;
}

export type ToolRegistry = Record<string, ToolSpec>;
