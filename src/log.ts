// Console logging in stage/tool lines. Env flags:
//   QUIET=1      silence everything
//   LOG_STEPS=0  hide stage lines (on by default)
//   LOG_TOOLS=1  show one line per tool invocation

export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
  magenta: (s: string) => `\x1b[35m${s}${COLOR.reset}`,
};

const QUIET = process.env.QUIET === "1";
export const LOG_STEPS = !QUIET && (process.env.LOG_STEPS ?? "1") !== "0";
export const LOG_TOOLS = !QUIET && (process.env.LOG_TOOLS ?? "0") === "1";

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

function preview(value: unknown, max = 140): string {
  let s: string;
  try { s = typeof value === "string" ? value : JSON.stringify(value); } catch { s = String(value); }
  return s.length > max ? s.slice(0, max) + "…" : s;
}

export function logStage(stage: string, detail?: string) {
  if (!LOG_STEPS) return;
  console.log(`${COLOR.cyan("▶ " + stage)} ${detail ? COLOR.gray("— " + detail) : ""}`);
}

export function logDone(stage: string, ms: number, detail?: string) {
  if (!LOG_STEPS) return;
  console.log(`${COLOR.green("✓ " + stage)} ${COLOR.gray("(" + fmtMs(ms) + (detail ? "; " + detail : "") + ")")}`);
}

export function logTool(placeholder: string, name: string, args: unknown[], ms: number, error?: string) {
  if (!LOG_TOOLS) return;
  const head = COLOR.yellow(`    ↳ ${placeholder} = ${name}(${preview(args)})`);
  const tail = error ? COLOR.red(`[failed: ${preview(error, 80)}]`) : COLOR.gray(`[${fmtMs(ms)}]`);
  console.log(`${head} ${tail}`);
}

export function logWarn(message: string) {
  if (QUIET) return;
  console.warn(COLOR.magenta(`[warn] ${message}`));
}

export function logFail(stage: string, reason: string) {
  if (QUIET) return;
  console.error(`${COLOR.red("✗ " + stage)} ${reason}`);
}
