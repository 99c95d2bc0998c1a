/**
 * A tool as the model sees it: name, description and JSON Schema of its
 * arguments.
 */
export interface ToolSpec {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>;
}

export interface ToolContext {
  /** Aborted when the per-call timeout fires. */
  readonly signal: AbortSignal;
}

/** An executable tool bound to an agent's tool set. */
export interface NativeTool {
  readonly spec: ToolSpec;
  execute(args: Record<string, unknown>, ctx: ToolContext): Promise<unknown>;
}

/** A registry of native tool implementations. */
export interface NativeToolRegistry {
  get(toolName: string): NativeTool | undefined;
  list(): NativeTool[];
}
