import fs from "node:fs/promises";
import { existsSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, parseConfig } from "@switchboard/core";
import { parseCliArgs } from "./args.js";
import { createApplication } from "./bootstrap.js";

describe("createApplication", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "switchboard-app-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const configFor = (dbPath: string, provider: "ollama" | "openai", apiKey?: string) =>
    parseConfig({
      provider,
      openai: apiKey ? { apiKey } : {},
      persistence: { driver: "sqlite", path: dbPath },
      tools: { workspaceDir: dir },
    });

  it("does not open the store when a model cannot be configured", () => {
    const dbPath = path.join(dir, "db", "switchboard.db");

    expect(() => createApplication(configFor(dbPath, "openai"), parseCliArgs([]))).toThrow(ConfigError);
    expect(existsSync(path.dirname(dbPath))).toBe(false);
  });

  it("opens the configured store and closes it", () => {
    const dbPath = path.join(dir, "db", "switchboard.db");

    const app = createApplication(configFor(dbPath, "openai", "test-secret"), parseCliArgs([]));
    app.close();

    expect(existsSync(dbPath)).toBe(true);
  });
});
