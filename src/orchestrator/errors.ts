import type { Placeholder } from "../types/plan.js";

export type ErrorKind =
  | "duplicate_placeholder"
  | "unknown_reference"
  | "cycle"
  | "tool_execution"
  | "rewrite"
  | "cancelled"
  | "provider"
  | "config";

export abstract class PlanEngineError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DuplicatePlaceholderError extends PlanEngineError {
  readonly kind = "duplicate_placeholder";

  constructor(readonly placeholder: Placeholder, readonly functions: [string, string]) {
    super(`placeholder ${placeholder} is defined twice (by ${functions[0]} and ${functions[1]})`);
  }
}

export class UnknownReferenceError extends PlanEngineError {
  readonly kind = "unknown_reference";

  constructor(readonly placeholder: Placeholder, readonly referencedBy: Placeholder) {
    super(`${referencedBy} references ${placeholder}, which no call in the plan defines`);
  }
}

export class CycleError extends PlanEngineError {
  readonly kind = "cycle";

  /** Placeholders on the cycle in path order; the first one is repeated at the end. */
  constructor(readonly cycle: Placeholder[]) {
    super(`dependency cycle: ${cycle.join(" -> ")}`);
  }
}

export class ToolExecutionError extends PlanEngineError {
  readonly kind = "tool_execution";

  constructor(
    readonly placeholder: Placeholder,
    readonly functionName: string,
    readonly args: unknown[],
    readonly reason: string,
    /** Results of nodes that completed before the walk stopped. */
    readonly partialResults: Record<Placeholder, unknown>
  ) {
    super(`${functionName}(${args.map(a => JSON.stringify(a)).join(", ")}) = ${placeholder} failed: ${reason}`);
  }
}

export class RewriteError extends PlanEngineError {
  readonly kind = "rewrite";

  constructor(readonly placeholder: Placeholder, detail: string) {
    super(`cannot substitute ${placeholder}: ${detail}`);
  }
}

export class RunCancelledError extends PlanEngineError {
  readonly kind = "cancelled";

  constructor(where: string) {
    super(`run cancelled during ${where}`);
  }
}

export class ProviderError extends PlanEngineError {
  readonly kind = "provider";

  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ConfigError extends PlanEngineError {
  readonly kind = "config";

  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
  }
}
