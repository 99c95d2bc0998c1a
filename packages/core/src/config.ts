import fs from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

export const ConfigSchema = z.object({
  provider: z.enum(["ollama", "openai"]).default("ollama"),
  ollama: z
    .object({
      baseUrl: z.string().url().default("http://localhost:11434"),
    })
    .default({}),
  openai: z
    .object({
      baseUrl: z.string().url().default("https://api.openai.com/v1"),
      apiKey: z.string().optional(),
    })
    .default({}),
  models: z
    .object({
      primary: z.string().default("llama3.1:8b"),
      architect: z.string().default("llama3.1:8b"),
      coder: z.string().default("llama3.1:8b"),
      tester: z.string().default("llama3.1:8b"),
    })
    .default({}),
  invoker: z
    .object({
      maxRetries: z.number().int().min(0).default(3),
      onExhausted: z.enum(["error", "apology"]).default("error"),
      timeoutMs: z.number().int().positive().default(120_000),
    })
    .default({}),
  tools: z
    .object({
      timeoutMs: z.number().int().positive().default(60_000),
      workspaceDir: z.string().default("./workspace"),
    })
    .default({}),
  graph: z
    .object({
      maxSteps: z.number().int().positive().default(50),
    })
    .default({}),
  persistence: z
    .object({
      driver: z.enum(["memory", "sqlite"]).default("sqlite"),
      path: z.string().default("./data/switchboard.db"),
    })
    .default({}),
  logging: z
    .object({
      level: LogLevelSchema.default("info"),
      file: z.string().optional(),
    })
    .default({}),
});

export type SwitchboardConfig = z.infer<typeof ConfigSchema>;

type Env = Readonly<Record<string, string | undefined>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Environment variables win over the file. Only set keys are applied.
 */
function applyEnv(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const section = (key: string): Record<string, unknown> => {
    const value = raw[key];
    return isRecord(value) ? { ...value } : {};
  };

  const merged: Record<string, unknown> = { ...raw };
  if (env.SWITCHBOARD_PROVIDER) merged.provider = env.SWITCHBOARD_PROVIDER;
  if (env.OLLAMA_URL) merged.ollama = { ...section("ollama"), baseUrl: env.OLLAMA_URL };

  const openai = section("openai");
  if (env.OPENAI_API_KEY) openai.apiKey = env.OPENAI_API_KEY;
  if (env.OPENAI_BASE_URL) openai.baseUrl = env.OPENAI_BASE_URL;
  if (Object.keys(openai).length > 0) merged.openai = openai;

  if (env.SWITCHBOARD_LOG_LEVEL) {
    merged.logging = { ...section("logging"), level: env.SWITCHBOARD_LOG_LEVEL };
  }
  if (env.SWITCHBOARD_DB_PATH) {
    merged.persistence = { ...section("persistence"), path: env.SWITCHBOARD_DB_PATH };
  }
  return merged;
}

/**
 * Parse and validate a config object, filling defaults.
 */
export function parseConfig(raw: unknown, env: Env = {}): SwitchboardConfig {
  if (raw !== undefined && raw !== null && !isRecord(raw)) {
    throw new ConfigError("Config root must be a mapping");
  }
  const base: Record<string, unknown> = isRecord(raw) ? { ...raw } : {};
  const result = ConfigSchema.safeParse(applyEnv(base, env));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Load config from a YAML file. A missing file yields the defaults (plus
 * environment overrides); an unreadable or invalid one is a ConfigError.
 */
export async function loadConfig(
  path?: string,
  env: Env = process.env,
): Promise<SwitchboardConfig> {
  if (!path) return parseConfig(undefined, env);

  let text: string;
  try {
    text = await fs.readFile(path, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return parseConfig(undefined, env);
    }
    throw new ConfigError(`Cannot read config file ${path}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid YAML`, { cause: err });
  }
  return parseConfig(raw, env);
}
