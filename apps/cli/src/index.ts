import fs from "node:fs/promises";
import path from "node:path";
import { describeError, loadConfig } from "@switchboard/core";
import type { SessionId } from "@switchboard/types";
import { USAGE, parseCliArgs } from "./args.js";
import { createApplication } from "./bootstrap.js";
import { runRepl } from "./repl.js";

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const config = await loadConfig(options.configPath);
  const app = createApplication(config, options);

  try {
    if (options.drawGraph) {
      const file = path.resolve(options.drawGraph);
      await fs.writeFile(file, `${app.workflow.graph.toMermaid()}\n`, "utf8");
      console.log(`Graph written to ${file}`);
      return;
    }

    if (!options.silent) {
      app.bus.subscribe("graph.step", (event) => {
        const { node, next, step, messages } = event.payload;
        app.logger.info("Graph step", { step, node, next, messages });
      });
    }

    const sessionId = options.threadId as SessionId;
    app.logger.info("Session started", { sessionId, provider: config.provider });
    await runRepl({
      handler: app.workflow,
      sessionId,
      input: process.stdin,
      output: process.stdout,
      logger: app.logger,
    });
  } finally {
    app.close();
  }
}

main().catch((err: unknown) => {
  console.error(`Fatal: ${describeError(err)}`);
  process.exitCode = 1;
});
