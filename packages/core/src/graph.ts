import type {
  CheckpointStore,
  EventBus,
  SessionId,
  SessionState,
  SessionUpdate,
  TraceContext,
} from "@switchboard/types";
import { createEvent, createTraceContext } from "./bus.js";
import { END, START } from "./constants.js";
import { GraphConfigError, RecursionLimitError, RoutingError, describeError } from "./errors.js";
import { KeyedMutex } from "./keyed-mutex.js";
import { interruptedCallReplies } from "./messages.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Router } from "./routing.js";
import { applyUpdate, emptySessionState } from "./state.js";

export interface NodeContext {
  readonly sessionId: SessionId;
  /** The checkpoint step this node's output will be written as. */
  readonly step: number;
  readonly traceCtx: TraceContext;
  readonly logger: Logger;
}

/** One executable step: an agent, a tool executor or a transition handler. */
export interface GraphNode {
  readonly name: string;
  run(state: SessionState, ctx: NodeContext): SessionUpdate | Promise<SessionUpdate>;
}

export type GraphEdge =
  | { readonly from: string; readonly to: string }
  | { readonly from: string; readonly router: Router };

/**
 * A graph literal: every node, exactly one outgoing edge per node, and the
 * router that picks the first node of each turn.
 */
export interface GraphDefinition {
  readonly nodes: ReadonlyArray<GraphNode>;
  readonly edges: ReadonlyArray<GraphEdge>;
  readonly entry: Router;
}

export interface CompileOptions {
  readonly checkpointer: CheckpointStore;
  readonly bus?: EventBus;
  readonly logger?: Logger;
  /** Maximum node executions per turn. */
  readonly maxSteps?: number;
}

export const DEFAULT_MAX_STEPS = 50;

/**
 * Reject a graph literal whose edges name undeclared nodes, whose nodes
 * lack (or duplicate) an outgoing edge, or whose routers can return a
 * target that is not a node.
 */
export function validateGraph(definition: GraphDefinition): Map<string, GraphEdge> {
  if (definition.nodes.length === 0) {
    throw new GraphConfigError("Graph must contain at least one node");
  }

  const names = new Set<string>();
  for (const node of definition.nodes) {
    if (node.name === START || node.name === END) {
      throw new GraphConfigError(`Node name "${node.name}" is reserved`);
    }
    if (names.has(node.name)) {
      throw new GraphConfigError(`Node "${node.name}" already exists`);
    }
    names.add(node.name);
  }

  const checkTarget = (from: string, target: string, allowEnd: boolean) => {
    if (target === END && allowEnd) return;
    if (!names.has(target)) {
      throw new GraphConfigError(`Edge from "${from}" targets undeclared node "${target}"`);
    }
  };

  const outgoing = new Map<string, GraphEdge>();
  for (const edge of definition.edges) {
    if (!names.has(edge.from)) {
      throw new GraphConfigError(`Edge source "${edge.from}" is not a declared node`);
    }
    if (outgoing.has(edge.from)) {
      throw new GraphConfigError(`Node "${edge.from}" has more than one outgoing edge`);
    }
    if ("to" in edge) {
      checkTarget(edge.from, edge.to, true);
    } else {
      if (edge.router.targets.length === 0) {
        throw new GraphConfigError(`Router "${edge.router.name}" declares no targets`);
      }
      for (const target of edge.router.targets) checkTarget(edge.from, target, true);
    }
    outgoing.set(edge.from, edge);
  }

  for (const name of names) {
    if (!outgoing.has(name)) {
      throw new GraphConfigError(`Node "${name}" has no outgoing edge`);
    }
  }

  for (const target of definition.entry.targets) checkTarget(START, target, false);

  return outgoing;
}

/**
 * Drives a validated graph one node at a time. State is merged after every
 * node and checkpointed under the session id before routing on.
 */
export class CompiledGraph {
  private readonly nodes: Map<string, GraphNode>;
  private readonly edges: Map<string, GraphEdge>;
  private readonly locks = new KeyedMutex();
  private readonly checkpointer: CheckpointStore;
  private readonly bus?: EventBus;
  private readonly logger: Logger;
  private readonly maxSteps: number;

  constructor(
    private readonly definition: GraphDefinition,
    options: CompileOptions,
  ) {
    this.edges = validateGraph(definition);
    this.nodes = new Map(definition.nodes.map((node) => [node.name, node]));
    this.checkpointer = options.checkpointer;
    this.bus = options.bus;
    this.logger = options.logger ?? silentLogger;
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  }

  get nodeNames(): string[] {
    return [...this.nodes.keys()];
  }

  /**
   * Merge `input` into the session and run until a router returns END.
   * Calls for the same session id are serialized.
   */
  async invoke(sessionId: SessionId, input: SessionUpdate): Promise<SessionState> {
    return this.locks.run(sessionId, () => this.execute(sessionId, input));
  }

  /** Latest persisted state; empty for an unknown session. */
  async getState(sessionId: SessionId): Promise<SessionState> {
    const checkpoint = await this.checkpointer.get(sessionId);
    return checkpoint?.state ?? emptySessionState();
  }

  /** The node that follows `from` given the state after it ran. */
  nextNode(from: string, state: SessionState): string {
    if (from === START) return this.resolve(this.definition.entry, state);

    const edge = this.edges.get(from);
    if (!edge) {
      throw new GraphConfigError(`Node "${from}" has no outgoing edge`);
    }
    return "to" in edge ? edge.to : this.resolve(edge.router, state);
  }

  /** Mermaid flowchart of the topology; dotted arrows are conditional. */
  toMermaid(): string {
    const lines = ["flowchart TD"];
    for (const target of this.definition.entry.targets) {
      lines.push(`  ${START} -.-> ${target}`);
    }
    for (const edge of this.definition.edges) {
      if ("to" in edge) {
        lines.push(`  ${edge.from} --> ${edge.to}`);
      } else {
        for (const target of edge.router.targets) {
          lines.push(`  ${edge.from} -.-> ${target}`);
        }
      }
    }
    return lines.join("\n");
  }

  private resolve(router: Router, state: SessionState): string {
    const target = router.route(state);
    if (!router.targets.includes(target)) {
      throw new RoutingError(`Router "${router.name}" returned undeclared target "${target}"`, router.name);
    }
    return target;
  }

  private async execute(sessionId: SessionId, input: SessionUpdate): Promise<SessionState> {
    const traceCtx = createTraceContext();
    const latest = await this.checkpointer.get(sessionId);
    let step = latest?.step ?? 0;
    const previous = latest?.state ?? emptySessionState();
    const replies = interruptedCallReplies(previous.messages);
    if (replies.length > 0) {
      this.logger.warn("Answering tool calls left open by an interrupted turn", {
        sessionId,
        toolCallIds: replies.map((reply) => reply.toolCallId),
      });
    }
    let state = applyUpdate(applyUpdate(previous, { messages: replies }), input);
    await this.persist(sessionId, ++step, START, state);

    let current: string | undefined;
    let executed = 0;
    try {
      let next = this.nextNode(START, state);
      await this.bus?.publish(createEvent("graph.run.start", { sessionId, entry: next }, traceCtx));

      while (next !== END) {
        if (executed >= this.maxSteps) {
          throw new RecursionLimitError(this.maxSteps);
        }
        const node = this.nodes.get(next);
        if (!node) {
          throw new GraphConfigError(`Unknown node "${next}"`);
        }

        current = node.name;
        const update = await node.run(state, {
          sessionId,
          step: step + 1,
          traceCtx: createTraceContext(traceCtx),
          logger: this.logger.child(node.name),
        });
        state = applyUpdate(state, update);
        await this.persist(sessionId, ++step, node.name, state);
        executed++;

        next = this.nextNode(node.name, state);
        this.logger.debug("Step complete", { sessionId, step, node: node.name, next });
        await this.bus?.publish(
          createEvent(
            "graph.step",
            {
              sessionId,
              step,
              node: node.name,
              next,
              messages: update.messages ?? [],
              dialogState: state.dialogState,
            },
            traceCtx,
          ),
        );
      }
    } catch (err) {
      this.logger.error("Graph run failed", { sessionId, node: current, error: describeError(err) });
      await this.bus?.publish(
        createEvent("graph.run.error", { sessionId, node: current, error: describeError(err) }, traceCtx),
      );
      throw err;
    }

    await this.bus?.publish(createEvent("graph.run.complete", { sessionId, steps: executed }, traceCtx));
    return state;
  }

  private async persist(
    sessionId: SessionId,
    step: number,
    node: string,
    state: SessionState,
  ): Promise<void> {
    await this.checkpointer.put({
      sessionId,
      step,
      node,
      state,
      createdAt: new Date().toISOString(),
    });
  }
}

export function compileGraph(definition: GraphDefinition, options: CompileOptions): CompiledGraph {
  return new CompiledGraph(definition, options);
}
