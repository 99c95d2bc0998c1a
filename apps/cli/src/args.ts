import { parseArgs } from "node:util";

export interface CliOptions {
  readonly primaryModel?: string;
  readonly architectModel?: string;
  readonly coderModel?: string;
  readonly testerModel?: string;
  /** Conversation thread to resume or start. */
  readonly threadId: string;
  readonly silent: boolean;
  readonly configPath?: string;
  readonly drawGraph?: string;
  readonly help: boolean;
}

export const USAGE = `Usage: switchboard [options]

  -p, --primary-model-name <name>    model for the primary assistant
  -a, --architect-model-name <name>  model for the architect assistant
  -c, --coder-model-name <name>      model for the coder assistant
      --tester-model-name <name>     model for the tester assistant
  -t, --thread-id <id>               conversation thread id (default: 0)
  -s, --silent                       do not log graph steps
      --config <file>                YAML configuration file
      --draw-graph <file>            write the graph as a Mermaid flowchart and exit
  -h, --help                         show this help`;

/** Parse command-line flags; unknown flags throw. */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    options: {
      "primary-model-name": { type: "string", short: "p" },
      "architect-model-name": { type: "string", short: "a" },
      "coder-model-name": { type: "string", short: "c" },
      "tester-model-name": { type: "string" },
      "thread-id": { type: "string", short: "t" },
      silent: { type: "boolean", short: "s", default: false },
      config: { type: "string" },
      "draw-graph": { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const threadId = values["thread-id"]?.trim();
  return {
    primaryModel: values["primary-model-name"],
    architectModel: values["architect-model-name"],
    coderModel: values["coder-model-name"],
    testerModel: values["tester-model-name"],
    threadId: threadId ? threadId : "0",
    silent: values.silent ?? false,
    configPath: values.config,
    drawGraph: values["draw-graph"],
    help: values.help ?? false,
  };
}
