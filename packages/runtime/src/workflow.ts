import {
  COORDINATOR,
  CompiledGraph,
  LEAVE_SKILL,
  compileGraph,
  contentText,
  createCoordinatorRouter,
  createEntryNode,
  createExitNode,
  createSessionStartRouter,
  createSpecialistRouter,
  formatName,
  lastMessage,
  silentLogger,
  userMessage,
  type GraphDefinition,
  type GraphEdge,
  type GraphNode,
  type Logger,
} from "@switchboard/core";
import type {
  AgentContext,
  CheckpointStore,
  EventBus,
  NativeTool,
  SessionId,
  SessionState,
} from "@switchboard/types";
import { AgentInvoker, type ExhaustionPolicy } from "./agent-invoker.js";
import { ESCALATE_TOOL, escalateTool, handoffTool, handoffToolName } from "./handoff-tools.js";
import type { ModelAdapter } from "./model-adapter.js";
import { buildCoordinatorPrompt, buildSpecialistPrompt } from "./prompts.js";
import { createToolNode } from "./tool-executor.js";
import { createToolRegistry } from "./tools.js";

export interface SpecialistDefinition {
  readonly context: AgentContext;
  readonly model: ModelAdapter;
  readonly tools?: ReadonlyArray<NativeTool>;
  /** One line on what the agent does; shown to the coordinator and the agent. */
  readonly description?: string;
  readonly systemPrompt?: string;
}

export interface CoordinatorDefinition {
  readonly model: ModelAdapter;
  readonly tools?: ReadonlyArray<NativeTool>;
  readonly systemPrompt?: string;
}

export interface InvokerSettings {
  readonly maxRetries?: number;
  readonly onExhausted?: ExhaustionPolicy;
  readonly timeoutMs?: number;
}

export interface WorkflowOptions {
  readonly coordinator: CoordinatorDefinition;
  readonly specialists: ReadonlyArray<SpecialistDefinition>;
  readonly checkpointer: CheckpointStore;
  readonly bus?: EventBus;
  readonly logger?: Logger;
  readonly invoker?: InvokerSettings;
  readonly toolTimeoutMs?: number;
  readonly maxSteps?: number;
}

const toolsNodeName = (agent: string) => `${agent}_tools`;
const entryNodeName = (agent: AgentContext) => `enter_${agent}`;

function describeSpecialist(specialist: SpecialistDefinition): string {
  return specialist.description ?? `Handles tasks for the ${formatName(specialist.context)}.`;
}

/**
 * Assemble the coordinator/specialist topology:
 *
 *   START ─route_to_workflow→ primary_assistant | <agent>
 *   primary_assistant ─→ enter_<agent> | primary_assistant_tools | END
 *   enter_<agent> → <agent> ─→ <agent>_tools | leave_skill | END
 *   <agent>_tools → <agent>,  leave_skill → primary_assistant
 */
export function defineWorkflow(options: WorkflowOptions): GraphDefinition {
  const { coordinator, specialists, bus } = options;
  const invoker = options.invoker ?? {};
  const nodes: GraphNode[] = [];
  const edges: GraphEdge[] = [];

  const coordinatorTools = createToolRegistry(coordinator.tools ?? []);
  const coordinatorToolsNode = toolsNodeName(COORDINATOR);
  nodes.push(
    new AgentInvoker({
      name: COORDINATOR,
      model: coordinator.model,
      tools: [
        ...specialists.map((s) => handoffTool(s.context, s.description)),
        ...coordinatorTools.list().map((t) => t.spec),
      ],
      systemPrompt:
        coordinator.systemPrompt ??
        buildCoordinatorPrompt(
          specialists.map((s) => ({ context: s.context, description: describeSpecialist(s) })),
        ),
      ...invoker,
      bus,
    }),
    createToolNode({
      name: coordinatorToolsNode,
      tools: coordinatorTools,
      timeoutMs: options.toolTimeoutMs,
      bus,
    }),
    createExitNode({ name: LEAVE_SKILL, escalateTool: ESCALATE_TOOL }),
  );
  edges.push(
    {
      from: COORDINATOR,
      router: createCoordinatorRouter({
        handoffs: new Map(specialists.map((s) => [handoffToolName(s.context), entryNodeName(s.context)])),
        toolNames: coordinatorTools.list().map((t) => t.spec.name),
        toolsNode: coordinatorToolsNode,
      }),
    },
    { from: coordinatorToolsNode, to: COORDINATOR },
    { from: LEAVE_SKILL, to: COORDINATOR },
  );

  for (const specialist of specialists) {
    const agent = specialist.context;
    const registry = createToolRegistry(specialist.tools ?? []);
    const specs = registry.list().map((t) => t.spec);

    nodes.push(
      createEntryNode({ agent, escalateTool: ESCALATE_TOOL }),
      new AgentInvoker({
        name: agent,
        model: specialist.model,
        tools: [...specs, escalateTool],
        systemPrompt:
          specialist.systemPrompt ??
          buildSpecialistPrompt(agent, describeSpecialist(specialist), specs, ESCALATE_TOOL),
        ...invoker,
        bus,
      }),
      createToolNode({
        name: toolsNodeName(agent),
        tools: registry,
        timeoutMs: options.toolTimeoutMs,
        bus,
      }),
    );
    edges.push(
      { from: entryNodeName(agent), to: agent },
      {
        from: agent,
        router: createSpecialistRouter({
          agent,
          escalateTool: ESCALATE_TOOL,
          toolsNode: toolsNodeName(agent),
          exitNode: LEAVE_SKILL,
        }),
      },
      { from: toolsNodeName(agent), to: agent },
    );
  }

  return {
    nodes,
    edges,
    entry: createSessionStartRouter({
      coordinator: COORDINATOR,
      agents: specialists.map((s) => s.context),
    }),
  };
}

/**
 * The compiled multi-agent workflow. Each `handleMessage` call is one user
 * turn; state lives in the checkpointer under the session id.
 */
export class AgentWorkflow {
  readonly graph: CompiledGraph;
  private readonly logger: Logger;

  constructor(options: WorkflowOptions) {
    this.logger = options.logger ?? silentLogger;
    this.graph = compileGraph(defineWorkflow(options), {
      checkpointer: options.checkpointer,
      bus: options.bus,
      logger: this.logger.child("graph"),
      maxSteps: options.maxSteps,
    });
  }

  /** Run one user turn and return the text of the final message. */
  async handleMessage(sessionId: SessionId, text: string): Promise<string> {
    this.logger.info("User turn", { sessionId, length: text.length });
    const state = await this.graph.invoke(sessionId, { messages: [userMessage(text, "user")] });
    const last = lastMessage(state.messages);
    return last ? contentText(last.content) : "";
  }

  getState(sessionId: SessionId): Promise<SessionState> {
    return this.graph.getState(sessionId);
  }
}
