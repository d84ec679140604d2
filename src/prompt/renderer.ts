import type { Message } from "../types/llm.js";
import type { ToolRegistry, ToolSpec } from "../types/tools.js";

export function renderSignature(spec: ToolSpec): string {
  const params = spec.params.map(p => `${p.name}${p.optional ? "?" : ""}: ${p.type}`).join(", ");
  const desc = spec.description ? ` — ${spec.description}` : "";
  return `${spec.name}(${params}) -> ${spec.returns}${desc}`;
}

const PLAN_RULES = [
  "Write a step-by-step solution in plain prose. Wherever a value must be computed or looked up,",
  "do not compute it yourself; write a call marker instead:",
  "  [FUNC <name>(<arg>, <arg>, ...) = <placeholder>]",
  "Rules:",
  "- <name> must be one of the functions listed below.",
  "- Placeholders are y1, y2, y3, ... and each one is defined exactly once.",
  "- An argument is a number, true/false, a \"double-quoted string\", or a placeholder defined by another call.",
  "- Never use a placeholder inside a quoted string; pass it bare.",
  "- Do not state any computed value; later prose refers to results only through their placeholders.",
  "- If no function is needed, answer in prose with no markers."
];

const DEMO = [
  "Example question: Sally has 3 apples and buys 2 more. Then she triples what she has. How many apples does she have?",
  "Example plan: Sally has [FUNC add(3, 2) = y1] apples after buying more. Tripling gives [FUNC multiply(y1, 3) = y2] apples."
];

export function renderPlanPrompt(tools: ToolRegistry, question: string): Message[] {
  const signatures = Object.values(tools).map(t => `- ${renderSignature(t)}`);
  const sys: Message = {
    role: "system",
    content: [...PLAN_RULES, "", "Available functions:", ...signatures].join("\n")
  };
  const user: Message = {
    role: "user",
    content: [...DEMO, "", `Question: ${question}`, "Plan:"].join("\n")
  };
  return [sys, user];
}

export function renderRefinePrompt(question: string, filledPlan: string): Message[] {
  return [
    {
      role: "system",
      content: [
        "You are given a question and a worked solution whose computed values are already filled in.",
        "Answer the question using those values. Do not recompute or change them.",
        "Reply with the final answer only."
      ].join("\n")
    },
    {
      role: "user",
      content: ["QUESTION:", question, "", "SOLUTION:", filledPlan].join("\n")
    }
  ];
}
