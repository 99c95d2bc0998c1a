export { ScriptedModelAdapter, parseToolArguments } from "./model-adapter.js";
export type { ModelAdapter, ModelRequest, GenerationResult, ScriptStep } from "./model-adapter.js";
export { OllamaAdapter } from "./ollama-adapter.js";
export type { OllamaAdapterOptions } from "./ollama-adapter.js";
export { OpenAIAdapter } from "./openai-adapter.js";
export type { OpenAIAdapterOptions } from "./openai-adapter.js";
export { defineTool, toolSpec, createToolRegistry } from "./tools.js";
export type { ToolDefinition } from "./tools.js";
export {
  ESCALATE_TOOL,
  HandoffArgsSchema,
  EscalateArgsSchema,
  escalateTool,
  handoffTool,
  handoffToolName,
} from "./handoff-tools.js";
export { buildCoordinatorPrompt, buildSpecialistPrompt } from "./prompts.js";
export type { DelegateSummary } from "./prompts.js";
export {
  AgentInvoker,
  RETRY_DIRECTIVE,
  APOLOGY_TEXT,
  DEFAULT_MAX_RETRIES,
} from "./agent-invoker.js";
export type { AgentInvokerOptions, ExhaustionPolicy } from "./agent-invoker.js";
export { createToolNode, formatToolOutput, toolErrorText } from "./tool-executor.js";
export type { ToolNodeOptions } from "./tool-executor.js";
export { defineWorkflow, AgentWorkflow } from "./workflow.js";
export type {
  WorkflowOptions,
  SpecialistDefinition,
  CoordinatorDefinition,
  InvokerSettings,
} from "./workflow.js";
