import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { GraphConfigError } from "@switchboard/core";
import type { NativeTool, NativeToolRegistry, ToolContext, ToolSpec } from "@switchboard/types";

export interface ToolDefinition<S extends z.ZodTypeAny> {
  readonly name: string;
  readonly description: string;
  readonly schema: S;
  execute(args: z.output<S>, ctx: ToolContext): unknown;
}

/**
 * Describe a tool to the model: its arguments schema is derived from zod,
 * inlined and stripped of the `$schema` header providers reject.
 */
export function toolSpec(name: string, description: string, schema: z.ZodTypeAny): ToolSpec {
  const jsonSchema = zodToJsonSchema(schema, {
    target: "jsonSchema7",
    $refStrategy: "none",
  });
  const parameters = Object.fromEntries(
    Object.entries(jsonSchema).filter(([key]) => key !== "$schema" && key !== "definitions"),
  );
  return { name, description, parameters };
}

/**
 * Bind a zod schema and an implementation into a NativeTool. Arguments are
 * validated before `execute` sees them; a ZodError surfaces as a tool
 * failure the executor reports back to the model.
 */
export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): NativeTool {
  return {
    spec: toolSpec(definition.name, definition.description, definition.schema),
    async execute(args, ctx) {
      const parsed = definition.schema.parse(args);
      return definition.execute(parsed, ctx);
    },
  };
}

export function createToolRegistry(tools: ReadonlyArray<NativeTool>): NativeToolRegistry {
  const byName = new Map<string, NativeTool>();
  for (const tool of tools) {
    if (byName.has(tool.spec.name)) {
      throw new GraphConfigError(`Tool "${tool.spec.name}" is registered twice`);
    }
    byName.set(tool.spec.name, tool);
  }
  return {
    get: (toolName) => byName.get(toolName),
    list: () => [...byName.values()],
  };
}
