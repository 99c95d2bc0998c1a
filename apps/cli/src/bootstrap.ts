import path from "node:path";
import {
  ConfigError,
  InMemoryEventBus,
  consoleSink,
  createLogger,
  fileSink,
  type Logger,
  type SwitchboardConfig,
} from "@switchboard/core";
import { InMemoryCheckpointStore, SQLiteCheckpointStore } from "@switchboard/persistence";
import {
  AgentWorkflow,
  OllamaAdapter,
  OpenAIAdapter,
  type ModelAdapter,
} from "@switchboard/runtime";
import { createArchitectTools, createCoderTools, createTesterTools } from "@switchboard/skills";
import type { CheckpointStore } from "@switchboard/types";
import type { CliOptions } from "./args.js";

export interface ModelTuning {
  readonly temperature?: number;
  readonly numPredict?: number;
}

export function createModelAdapter(
  config: SwitchboardConfig,
  model: string,
  logger: Logger,
  tuning: ModelTuning = {},
): ModelAdapter {
  if (config.provider === "openai") {
    if (!config.openai.apiKey) {
      throw new ConfigError("provider is openai but no API key is configured (OPENAI_API_KEY)");
    }
    return new OpenAIAdapter({
      apiKey: config.openai.apiKey,
      baseUrl: config.openai.baseUrl,
      model,
      temperature: tuning.temperature,
      logger,
    });
  }
  return new OllamaAdapter({
    model,
    baseUrl: config.ollama.baseUrl,
    temperature: tuning.temperature,
    numPredict: tuning.numPredict,
    logger,
  });
}

export function createLoggerFromConfig(config: SwitchboardConfig): Logger {
  return createLogger({
    component: "switchboard",
    level: config.logging.level,
    sink: config.logging.file ? fileSink(path.resolve(config.logging.file)) : consoleSink,
  });
}

export interface Application {
  readonly workflow: AgentWorkflow;
  readonly bus: InMemoryEventBus;
  readonly logger: Logger;
  close(): void;
}

/**
 * Wire config and flags into a running workflow: models per agent, tool
 * sets confined to the workspace, and the configured checkpointer. The
 * store is opened last and closed again if the workflow cannot be built.
 */
export function createApplication(config: SwitchboardConfig, options: CliOptions): Application {
  const logger = createLoggerFromConfig(config);
  const bus = new InMemoryEventBus(logger.child("bus"));
  const modelLogger = logger.child("model");

  const models = {
    primary: createModelAdapter(config, options.primaryModel ?? config.models.primary, modelLogger, {
      temperature: 0.1,
      numPredict: -2,
    }),
    architect: createModelAdapter(config, options.architectModel ?? config.models.architect, modelLogger),
    coder: createModelAdapter(config, options.coderModel ?? config.models.coder, modelLogger),
    tester: createModelAdapter(config, options.testerModel ?? config.models.tester, modelLogger),
  };

  const toolsetOptions = {
    workspaceDir: config.tools.workspaceDir,
    commandTimeoutMs: config.tools.timeoutMs,
  };

  const sqlite =
    config.persistence.driver === "sqlite" ? new SQLiteCheckpointStore(config.persistence.path) : undefined;
  const checkpointer: CheckpointStore = sqlite ?? new InMemoryCheckpointStore();

  try {
    const workflow = new AgentWorkflow({
      coordinator: { model: models.primary },
      specialists: [
        {
          context: "architect_assistant",
          model: models.architect,
          tools: createArchitectTools(toolsetOptions),
          description: "Designs the project layout and creates its directories and skeleton files.",
        },
        {
          context: "coder_assistant",
          model: models.coder,
          tools: createCoderTools(toolsetOptions),
          description: "Writes the implementation into the files the architect created.",
        },
        {
          context: "tester_assistant",
          model: models.tester,
          tools: createTesterTools(toolsetOptions),
          description: "Writes unit tests for the implementation and runs them.",
        },
      ],
      checkpointer,
      bus,
      logger,
      invoker: config.invoker,
      toolTimeoutMs: config.tools.timeoutMs,
      maxSteps: config.graph.maxSteps,
    });

    return {
      workflow,
      bus,
      logger,
      close: () => sqlite?.close(),
    };
  } catch (err) {
    sqlite?.close();
    throw err;
  }
}
