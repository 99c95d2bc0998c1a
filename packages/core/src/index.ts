export { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";
export {
  createLogger,
  consoleSink,
  fileSink,
  silentSink,
  silentLogger,
} from "./logger.js";
export type { Logger, LoggerOptions, LogSink } from "./logger.js";
export {
  SwitchboardError,
  RoutingError,
  GraphConfigError,
  RetryExhaustedError,
  TimeoutError,
  RecursionLimitError,
  ContractViolationError,
  ModelError,
  ToolNotFoundError,
  ConfigError,
  CheckpointError,
  describeError,
} from "./errors.js";
export { withTimeout } from "./timeout.js";
export { KeyedMutex } from "./keyed-mutex.js";
export { AGENT_CONTEXTS, COORDINATOR, formatName } from "./agents.js";
export {
  userMessage,
  assistantMessage,
  toolMessage,
  lastMessage,
  toolCallsOf,
  contentText,
  hasText,
  isEmptyResponse,
  appendMessages,
  assertToolRepliesCorrelated,
  interruptedCallReplies,
} from "./messages.js";
export {
  noopDialog,
  popDialog,
  pushDialog,
  reduceDialogStack,
  activeAgent,
} from "./dialog-stack.js";
export { emptySessionState, applyUpdate } from "./state.js";
export { START, END } from "./constants.js";
export {
  createCoordinatorRouter,
  createSpecialistRouter,
  createSessionStartRouter,
} from "./routing.js";
export type {
  Router,
  CoordinatorRouterOptions,
  SpecialistRouterOptions,
  SessionStartRouterOptions,
} from "./routing.js";
export { createEntryNode, createExitNode, LEAVE_SKILL } from "./transitions.js";
export type { EntryNodeOptions, ExitNodeOptions } from "./transitions.js";
export { CompiledGraph, compileGraph, validateGraph, DEFAULT_MAX_STEPS } from "./graph.js";
export type { GraphNode, GraphEdge, GraphDefinition, CompileOptions, NodeContext } from "./graph.js";
export { ConfigSchema, parseConfig, loadConfig } from "./config.js";
export type { SwitchboardConfig } from "./config.js";
