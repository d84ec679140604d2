export type Placeholder = string;

export type Literal = string | number | boolean;

export type ArgToken =
  | { kind: "literal"; value: Literal; raw: string }
  | { kind: "ref"; name: Placeholder; raw: string };

export interface SourceSpan {
  start: number;
  end: number; // exclusive
  text: string;
}

export interface CallExpression {
  function_name: string;
  arguments: ArgToken[];
  output_placeholder: Placeholder;
  source_span: SourceSpan;
}

export type DiagnosticCode = "malformed" | "unknown_function";

export interface ParseDiagnostic {
  code: DiagnosticCode;
  message: string;
  span: SourceSpan;
}

export interface ParseResult {
  calls: CallExpression[];
  diagnostics: ParseDiagnostic[];
}

export type NodeStatus = "pending" | "ready" | "running" | "done" | "failed";

export interface DependencyNode {
  id: Placeholder;
  call: CallExpression;
  dependencies: Placeholder[];
  status: NodeStatus;
  resolved_args?: unknown[];
  result?: unknown;
  error?: string;
  dispatch_seq?: number;
  complete_seq?: number;
}

export interface ExecutionPlan {
  text: string;
  calls: CallExpression[];
  nodes: Map<Placeholder, DependencyNode>;
  /** Topological order, textual order among ties. */
  order: Placeholder[];
}
