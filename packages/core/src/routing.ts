import type { AgentContext, SessionState } from "@switchboard/types";
import { END } from "./constants.js";
import { RoutingError } from "./errors.js";
import { lastMessage, toolCallsOf } from "./messages.js";

/**
 * A pure decision function from session state to the next node name.
 * `targets` lists every value `route` may return; the graph checks them
 * against its declared nodes at construction.
 */
export interface Router {
  readonly name: string;
  readonly targets: ReadonlyArray<string>;
  route(state: SessionState): string;
}

export interface CoordinatorRouterOptions {
  readonly name?: string;
  /** Handoff tool name → entry node of the agent it hands off to. */
  readonly handoffs: ReadonlyMap<string, string>;
  /** Tools the coordinator executes itself. */
  readonly toolNames: ReadonlyArray<string>;
  readonly toolsNode: string;
}

/**
 * Routes the coordinator's turn on its first tool call: a handoff enters
 * the matching agent, a registered tool goes to the coordinator's tool
 * node, no call ends the turn. Anything else is a RoutingError.
 */
export function createCoordinatorRouter(options: CoordinatorRouterOptions): Router {
  const name = options.name ?? "route_primary_assistant";
  const tools = new Set(options.toolNames);

  return {
    name,
    targets: [...new Set(options.handoffs.values()), options.toolsNode, END],
    route(state) {
      const calls = toolCallsOf(lastMessage(state.messages));
      if (calls.length === 0) return END;

      const first = calls[0];
      const entry = options.handoffs.get(first.name);
      if (entry) return entry;
      if (tools.has(first.name)) return options.toolsNode;

      throw new RoutingError(`Unrecognized tool call "${first.name}"`, name, first.name);
    },
  };
}

export interface SpecialistRouterOptions {
  readonly agent: AgentContext;
  /** Name of the complete-or-escalate tool. */
  readonly escalateTool: string;
  readonly toolsNode: string;
  readonly exitNode: string;
}

/**
 * Routes a specialised agent's turn: no call ends the turn, any escalate
 * call leaves the agent, every other batch goes to its own tool node. The
 * tool node answers names the agent does not have with an error reply.
 */
export function createSpecialistRouter(options: SpecialistRouterOptions): Router {
  return {
    name: `route_${options.agent}`,
    targets: [options.toolsNode, options.exitNode, END],
    route(state) {
      const calls = toolCallsOf(lastMessage(state.messages));
      if (calls.length === 0) return END;

      if (calls.some((call) => call.name === options.escalateTool)) {
        return options.exitNode;
      }
      return options.toolsNode;
    },
  };
}

export interface SessionStartRouterOptions {
  readonly coordinator: string;
  readonly agents: ReadonlyArray<AgentContext>;
}

/**
 * Each delegated workflow answers the user directly, so a new user turn
 * goes back to whichever agent is on top of the dialog stack.
 */
export function createSessionStartRouter(options: SessionStartRouterOptions): Router {
  const name = "route_to_workflow";
  const agents = new Set<string>(options.agents);

  return {
    name,
    targets: [options.coordinator, ...options.agents],
    route(state) {
      const stack = state.dialogState;
      if (stack.length === 0) return options.coordinator;

      const top = stack[stack.length - 1];
      if (!agents.has(top)) {
        throw new RoutingError(`Dialog stack names unknown agent "${top}"`, name);
      }
      return top;
    },
  };
}
