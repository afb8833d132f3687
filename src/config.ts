import { z } from "zod";
import { readFileSync, existsSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { homedir } from "node:os";

// --- Schemas ---

/** OpenAI-style function tool, forwarded verbatim when a run enables tools. */
export const ToolDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  parameters: z.record(z.string(), z.unknown()).default({ type: "object", properties: {} }),
});

export const WorkerConfigSchema = z.object({
  /** Roster key used in run submissions */
  key: z.string().min(1).regex(/^[a-zA-Z0-9_.-]+$/, "worker keys are alphanumeric with _ . -"),
  displayName: z.string().optional(),
  /** Role text handed to the gateway as the system prompt */
  roleContext: z.string().default(""),
  enabled: z.boolean().default(true),

  transport: z.enum(["openai-compat", "ollama"]).default("ollama"),
  model: z.string().describe("Model name served by the endpoint (e.g. 'qwen3', 'gpt-4o-mini')"),
  endpoint: z.string().default("http://localhost:11434").describe("Base URL of the worker API"),
  apiKey: z.string().optional().describe("Bearer token for openai-compat endpoints"),
  tools: z.array(ToolDefinitionSchema).default([]),
});

export const ConfigSchema = z.object({
  /** User identifier. Determines the data directory: data/<user>/. */
  user: z.string().default("default"),

  workers: z.array(WorkerConfigSchema).default([
    {
      key: "analyst",
      displayName: "Analyst",
      roleContext: "You are a careful analyst. Weigh evidence before committing to a position.",
      transport: "ollama",
      model: "qwen3",
      endpoint: "http://localhost:11434",
    },
    {
      key: "skeptic",
      displayName: "Skeptic",
      roleContext: "You are a skeptic. Look for hidden assumptions and failure modes.",
      transport: "ollama",
      model: "llama3",
      endpoint: "http://localhost:11434",
    },
  ]),

  engine: z
    .object({
      /** Max concurrent worker calls inside one fan-out phase (per deployment, not per protocol). */
      concurrency: z.number().int().min(1).max(64).default(4),
      /** Per-call timeout in milliseconds. */
      timeoutMs: z.number().int().min(1).default(120_000),
      /** Extra attempts for timeout / rate_limited / unavailable failures. */
      retries: z.number().int().min(0).max(5).default(1),
      /** Base delay for exponential retry backoff. */
      retryBaseMs: z.number().int().min(0).default(1000),
      /** Events kept per run for late subscribers that ask for replay. */
      backlogSize: z.number().int().min(0).default(64),
      /** Finished results kept in memory for wait/getRun; older ones are read from the store. */
      retainedRuns: z.number().int().min(0).default(32),
      /** What an evidence-elimination round does when the leaders tie. */
      evidenceTiePolicy: z.enum(["eliminate_none", "eliminate_tied"]).default("eliminate_none"),
    })
    .default({}),

  database: z
    .object({
      path: z.string().default("./data/conclave.db"),
    })
    .default({}),

  logging: z
    .object({
      /** info.log purge config (global metrics file) */
      info: z.object({
        purge: z.enum(["date", "size"]).default("date"),
        maxDays: z.number().int().min(1).default(30),
        maxBytes: z.number().int().min(0).default(50 * 1024 * 1024),
      }).default({}),
      /** Per-run debug log purge config (<dataDir>/logs/runs/) */
      runs: z.object({
        purge: z.enum(["count", "date", "size"]).default("count"),
        maxFiles: z.number().int().min(1).default(50),
        maxDays: z.number().int().min(1).default(14),
        maxBytes: z.number().int().min(0).default(100 * 1024 * 1024),
      }).default({}),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;
export type EngineConfig = Config["engine"];
export type ToolDefinition = z.infer<typeof ToolDefinitionSchema>;

/** Directory where the loaded config file was found (null if defaults used). */
let loadedConfigDir: string | null = null;

/** Reset loadedConfigDir to null. Exported for testing only. */
export function resetLoadedConfigDir(): void {
  loadedConfigDir = null;
}

/**
 * Base data directory for a user.
 * - If a config file was loaded: <configDir>/data/<user>/
 * - Otherwise: XDG_DATA_HOME/conclave/<user> (fallback ~/.local/share/conclave/<user>)
 */
export function getUserDataDir(config: Config): string {
  if (loadedConfigDir) {
    return resolve(loadedConfigDir, "data", config.user);
  }
  const xdg = process.env.XDG_DATA_HOME || resolve(homedir(), ".local", "share");
  return resolve(xdg, "conclave", config.user);
}

/** Database path, resolved against the config directory when relative. */
export function getDatabasePath(config: Config): string {
  return resolve(loadedConfigDir ?? getUserDataDir(config), config.database.path);
}

// --- Loader ---

export const CONFIG_FILENAMES = ["conclave.config.json", ".conclaverc.json"];

function parseFile(path: string): Config {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return ConfigSchema.parse(raw);
}

export function loadConfig(explicitPath?: string): Config {
  if (explicitPath) {
    loadedConfigDir = dirname(resolve(explicitPath));
    return parseFile(explicitPath);
  }

  for (const filename of CONFIG_FILENAMES) {
    const fullPath = resolve(process.cwd(), filename);
    if (existsSync(fullPath)) {
      loadedConfigDir = dirname(fullPath);
      return parseFile(fullPath);
    }
  }

  // No config file found: use defaults (XDG path via getUserDataDir)
  loadedConfigDir = null;
  return ConfigSchema.parse({});
}
