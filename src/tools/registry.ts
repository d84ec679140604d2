import type { ToolRegistry, ToolSpec } from "../types/tools.js";
import { add, subtract, multiply, divide } from "./math/arithmetic.js";
import { webSearch } from "./web/search.js";
import { httpRequest } from "./http/request.js";

export type ToolGroup = "math" | "web" | "http";

const GROUPS: Record<ToolGroup, ToolSpec[]> = {
  math: [add, subtract, multiply, divide],
  web: [webSearch],
  http: [httpRequest],
};

export function isToolGroup(s: string): s is ToolGroup {
  return Object.prototype.hasOwnProperty.call(GROUPS, s);
}

export function defaultTools(groups: ToolGroup[] = ["math", "web", "http"]): ToolSpec[] {
  return groups.flatMap(g => GROUPS[g]);
}

/** Built once per run from the caller's tool list. */
export function buildToolRegistry(specs: ToolSpec[] = defaultTools()): ToolRegistry {
  const reg: ToolRegistry = {};
  for (const spec of specs) {
    if (Object.prototype.hasOwnProperty.call(reg, spec.name)) {
      throw new Error(`buildToolRegistry: duplicate tool name: ${spec.name}`);
    }
    reg[spec.name] = spec;
  }
  return reg;
}

export function lookupTool(reg: ToolRegistry, name: string): ToolSpec | undefined {
  return Object.prototype.hasOwnProperty.call(reg, name) ? reg[name] : undefined;
}
