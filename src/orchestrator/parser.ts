// src/orchestrator/parser.ts
// Scanner for the bracketed call syntax embedded in plan text:
//   [FUNC <name>(<arg>, <arg>, ...) = <placeholder>]
// Malformed or unknown expressions are reported as diagnostics and stay in the text as inert prose.

import type {
  ArgToken,
  CallExpression,
  Literal,
  ParseDiagnostic,
  ParseResult,
  SourceSpan,
} from "../types/plan.js";

export const MARKER = "[FUNC";

const NAME_CHAR = /[\w.\-]/;
const IDENT_START = /[A-Za-z_]/;
const IDENT_CHAR = /\w/;
const WS = /\s/;

const IDENTIFIER = /^[A-Za-z_]\w*$/;
/** Placeholder shape: a letter prefix and a number, as in y1, y2, out_3 ... */
const PLACEHOLDER_SHAPE = /^([A-Za-z_]+)\d+$/;
const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(?:\d+\.\d*|\.\d+|\d+)(?:[eE][+-]?\d+)?$/;
const BOOLEAN = /^(?:true|false)$/i;
const LEADING_ZERO = /^[+-]?0\d/;

interface RawArg {
  text: string;
  quoted: boolean;
}

interface RawCall {
  name: string;
  args: RawArg[];
  output: string;
  span: SourceSpan;
}

type ScanOutcome =
  | { ok: true; call: RawCall }
  | { ok: false; message: string; end: number };

/** Cursor over the plan text; every scanning step below moves it forward only. */
class Cursor {
  constructor(readonly text: string, public pos: number) {}

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.pos);
  }

  skipWs(): void {
    while (!this.done && WS.test(this.peek())) this.pos++;
  }

  take(re: RegExp, first: RegExp = re): string {
    const start = this.pos;
    if (!this.done && first.test(this.peek())) {
      this.pos++;
      while (!this.done && re.test(this.peek())) this.pos++;
    }
    return this.text.slice(start, this.pos);
  }

  expect(ch: string): boolean {
    if (this.peek() !== ch) return false;
    this.pos++;
    return true;
  }
}

function fail(message: string, cur: Cursor): ScanOutcome {
  return { ok: false, message, end: cur.pos };
}

/**
 * Reads the argument list after the opening parenthesis, up to and including the matching ')'.
 * Commas split arguments only at depth zero and outside quotes.
 */
function scanArgs(cur: Cursor): RawArg[] | string {
  const args: RawArg[] = [];
  let buf = "";
  let parens = 0;
  let brackets = 0;
  let quote: string | null = null;

  const flush = (closing: boolean): string | null => {
    const trimmed = buf.trim();
    buf = "";
    if (!trimmed) {
      // f() is an empty list; f(1,) and f(,1) are not
      if (closing && args.length === 0) return null;
      return "empty argument";
    }
    args.push(classifyRaw(trimmed));
    return null;
  };

  while (!cur.done) {
    const ch = cur.peek();
    if (quote) {
      buf += ch;
      cur.pos++;
      if (ch === "\\" && !cur.done) {
        buf += cur.peek();
        cur.pos++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if ((ch === '"' || ch === "'") && !buf.trim()) {
      // only a quote that starts the argument opens a string; Uber's stays one bare word
      quote = ch;
    } else if (ch === "(") {
      parens++;
    } else if (ch === ")") {
      if (parens === 0) {
        cur.pos++;
        return flush(true) ?? args;
      }
      parens--;
    } else if (ch === "[") {
      if (cur.text.startsWith(MARKER, cur.pos)) return "nested [FUNC marker inside arguments";
      brackets++;
    } else if (ch === "]") {
      if (brackets === 0) return "argument list not closed before ']'";
      brackets--;
    } else if (ch === "," && parens === 0 && brackets === 0) {
      const err = flush(false);
      if (err) return err;
      cur.pos++;
      continue;
    }
    buf += ch;
    cur.pos++;
  }
  return quote ? "unterminated string literal" : "unterminated argument list";
}

function classifyRaw(token: string): RawArg {
  const first = token.charAt(0);
  if ((first === '"' || first === "'") && token.length >= 2 && token.endsWith(first)) {
    const body = token.slice(1, -1);
    // the closing quote must be the one that opened the token, not an escaped one
    if (isSingleQuotedString(body, first)) return { text: unescape(body), quoted: true };
  }
  return { text: token, quoted: false };
}

function isSingleQuotedString(body: string, quote: string): boolean {
  for (let i = 0; i < body.length; i++) {
    const ch = body.charAt(i);
    if (ch === "\\") i++;
    else if (ch === quote) return false;
  }
  // a trailing lone backslash would have escaped the closing quote
  return !/(^|[^\\])(\\\\)*\\$/.test(body);
}

function unescape(body: string): string {
  return body.replace(/\\(.)/gs, (_, c: string) => (c === "n" ? "\n" : c === "t" ? "\t" : c));
}

function scanExpression(text: string, start: number): ScanOutcome {
  const cur = new Cursor(text, start + MARKER.length);
  if (!WS.test(cur.peek())) return fail("expected whitespace after [FUNC", cur);
  cur.skipWs();

  const name = cur.take(NAME_CHAR);
  if (!name) return fail("expected function name", cur);
  cur.skipWs();
  if (!cur.expect("(")) return fail(`expected '(' after ${name}`, cur);

  const args = scanArgs(cur);
  if (typeof args === "string") return fail(args, cur);

  cur.skipWs();
  if (!cur.expect("=")) return fail("expected '= <placeholder>' after argument list", cur);
  cur.skipWs();
  const output = cur.take(IDENT_CHAR, IDENT_START);
  if (!output) return fail("expected placeholder name after '='", cur);
  cur.skipWs();
  if (!cur.expect("]")) return fail(`expected ']' after placeholder ${output}`, cur);

  return {
    ok: true,
    call: { name, args, output, span: { start, end: cur.pos, text: text.slice(start, cur.pos) } },
  };
}

/** Numbers that would not survive the trip through a double (02139, 2^64) stay as written. */
function coerceLiteral(raw: string): Literal {
  if (INTEGER.test(raw)) {
    const n = Number(raw);
    return LEADING_ZERO.test(raw) || !Number.isSafeInteger(n) ? raw : n;
  }
  if (FLOAT.test(raw)) {
    const n = Number(raw);
    return LEADING_ZERO.test(raw) || !Number.isFinite(n) ? raw : n;
  }
  if (BOOLEAN.test(raw)) return raw.toLowerCase() === "true";
  return raw;
}

function placeholderPrefix(name: string): string | undefined {
  return PLACEHOLDER_SHAPE.exec(name)?.[1];
}

/**
 * Decides whether one argument is a placeholder reference.
 * Quoted text is always a literal. An unquoted bare identifier is a reference when a call in
 * this plan defines it, or when it is numbered in the same series as a defined placeholder
 * (y5 next to y1 and y2); the latter fails later as an unknown reference. Q3 or FY2023 in a
 * plan whose placeholders are y1, y2 stay literals.
 */
function classifyArg(arg: RawArg, placeholders: ReadonlySet<string>, prefixes: ReadonlySet<string>): ArgToken {
  if (arg.quoted) return { kind: "literal", value: arg.text, raw: arg.text };
  if (IDENTIFIER.test(arg.text) && !BOOLEAN.test(arg.text)) {
    const prefix = placeholderPrefix(arg.text);
    if (placeholders.has(arg.text) || (prefix !== undefined && prefixes.has(prefix))) {
      return { kind: "ref", name: arg.text, raw: arg.text };
    }
  }
  return { kind: "literal", value: coerceLiteral(arg.text), raw: arg.text };
}

/** Extracts call expressions in textual order. Never throws on bad input. */
export function parsePlan(text: string, toolNames: Iterable<string>): ParseResult {
  const known = new Set(toolNames);
  const raw: RawCall[] = [];
  const diagnostics: ParseDiagnostic[] = [];

  let from = 0;
  while (from < text.length) {
    const start = text.indexOf(MARKER, from);
    if (start === -1) break;
    const outcome = scanExpression(text, start);
    if (!outcome.ok) {
      const end = Math.max(outcome.end, start + MARKER.length);
      diagnostics.push({
        code: "malformed",
        message: outcome.message,
        span: { start, end, text: text.slice(start, end) },
      });
      from = start + MARKER.length;
      continue;
    }
    const { call } = outcome;
    if (!known.has(call.name)) {
      diagnostics.push({ code: "unknown_function", message: `unknown function ${call.name}`, span: call.span });
    } else {
      raw.push(call);
    }
    from = call.span.end;
  }

  const placeholders = new Set(raw.map(c => c.output));
  const prefixes = new Set<string>();
  for (const id of placeholders) {
    const prefix = placeholderPrefix(id);
    if (prefix !== undefined) prefixes.add(prefix);
  }
  const calls: CallExpression[] = raw.map(c => ({
    function_name: c.name,
    arguments: c.args.map(a => classifyArg(a, placeholders, prefixes)),
    output_placeholder: c.output,
    source_span: c.span,
  }));

  return { calls, diagnostics };
}

/** True when the text still holds anything that looks like a call marker. */
export function hasMarkers(text: string): boolean {
  return text.includes(MARKER);
}
