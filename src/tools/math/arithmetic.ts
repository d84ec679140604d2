import { z } from "zod";
import type { ToolSpec } from "../../types/tools.js";

const NUMERIC = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?\s*$/;
// numbers, or strings that spell one; "" and booleans are rejected
const Operand = z.union([z.number(), z.string().regex(NUMERIC).transform(Number)]).pipe(z.number().finite());
const Operands = z.tuple([Operand, Operand]);

function binary(name: string, description: string, fn: (a: number, b: number) => number | string): ToolSpec {
  return {
    name,
    description,
    params: [{ name: "a", type: "number" }, { name: "b", type: "number" }],
    returns: "number",
    async invoke(args) {
      const parsed = Operands.safeParse(args);
      if (!parsed.success) {
        return { name, ok: false, output: null, error: `expected two numbers, got ${JSON.stringify(args)}` };
      }
      const [a, b] = parsed.data;
      const out = fn(a, b);
      if (typeof out === "string") return { name, ok: false, output: null, error: out };
      return { name, ok: true, output: out };
    }
  };
}

export const add = binary("add", "Add two numbers.", (a, b) => a + b);
export const subtract = binary("subtract", "Subtract b from a.", (a, b) => a - b);
export const multiply = binary("multiply", "Multiply two numbers.", (a, b) => a * b);
export const divide = binary("divide", "Divide a by b.", (a, b) => (b === 0 ? "division by zero" : a / b));
