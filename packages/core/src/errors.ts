import type { SwitchboardErrorCode, SwitchboardErrorShape } from "@switchboard/types";

/**
 * Base class for every error the router core raises on purpose.
 */
export class SwitchboardError extends Error implements SwitchboardErrorShape {
  readonly code: SwitchboardErrorCode;

  constructor(code: SwitchboardErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A tool call matched no handoff, escalate or registered tool. */
export class RoutingError extends SwitchboardError {
  constructor(
    message: string,
    readonly router: string,
    readonly toolName?: string,
  ) {
    super("ROUTING_ERROR", message);
  }
}

/** The graph literal was rejected at construction. */
export class GraphConfigError extends SwitchboardError {
  constructor(message: string) {
    super("GRAPH_CONFIG_ERROR", message);
  }
}

export class RetryExhaustedError extends SwitchboardError {
  constructor(
    readonly agent: string,
    readonly attempts: number,
  ) {
    super("RETRY_EXHAUSTED", `Agent "${agent}" returned no usable output after ${attempts} attempts`);
  }
}

export class TimeoutError extends SwitchboardError {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super("TIMEOUT", `${operation} timed out after ${timeoutMs}ms`);
  }
}

export class RecursionLimitError extends SwitchboardError {
  constructor(readonly maxSteps: number) {
    super("RECURSION_LIMIT", `Graph exceeded ${maxSteps} steps without reaching an end`);
  }
}

export class ContractViolationError extends SwitchboardError {
  constructor(message: string) {
    super("CONTRACT_VIOLATION", message);
  }
}

export class ModelError extends SwitchboardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MODEL_ERROR", message, options);
  }
}

export class ToolNotFoundError extends SwitchboardError {
  constructor(readonly toolName: string) {
    super("TOOL_NOT_FOUND", `Tool "${toolName}" not found`);
  }
}

export class ConfigError extends SwitchboardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_ERROR", message, options);
  }
}

export class CheckpointError extends SwitchboardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CHECKPOINT_ERROR", message, options);
  }
}

/**
 * Render an error the way it is shown back to a model: constructor name
 * plus quoted message, e.g. `TypeError("x is undefined")`.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}(${JSON.stringify(err.message)})`;
  }
  return String(err);
}
