#!/usr/bin/env node

/**
 * Conclave CLI: run coordination protocols over a roster of model workers.
 *
 * Commands:
 *   conclave protocols
 *   conclave workers
 *   conclave run <protocol> "question" [--workers a,b] [--options x,y] [--rounds n] [--tools]
 *   conclave runs [--limit n] [--protocol id]
 *   conclave show <runId> [--json]
 *   conclave init
 *   conclave start
 */

import { parseArgs } from "node:util";
import { writeFileSync, existsSync } from "node:fs";
import { loadConfig, getUserDataDir, type Config } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { setLogLevel, initFileLogging } from "./logger.js";
import { createRuntime, formatEvent, formatProtocol, formatResult, formatRunSummary } from "./runtime.js";
import { ProtocolRegistry } from "./protocol/registry.js";

const USAGE = `Usage: conclave <command> [options]

Commands:
  protocols                 List the protocol catalogue
  workers                   List configured workers
  run <protocol> <question> Run a protocol and print its events live
  runs [--limit n]          List recent runs (newest first)
  show <runId> [--json]     Show a stored run
  init                      Create conclave.config.json
  start                     Start MCP server (stdio)

Options for run:
  --workers <a,b>           Comma-separated worker keys (default: all enabled)
  --options <x,y>           Candidates / choices / initiatives, comma-separated
  --rounds <n>              Round count for looping protocols
  --tools                   Forward each worker's configured tools

Global:
  --verbose                 Show info-level logs on stderr
  --debug                   Show all logs (debug level) on stderr
  --help                    Show this help
  --version                 Show version

Environment:
  CONCLAVE_LOG_LEVEL        Set log level: error, warn (default), info, debug

Examples:
  conclave run parallel_synthesis "Should we split the billing service?"
  conclave run borda_count "Which database for the event log?" --options "Postgres,ClickHouse,Kafka"
  conclave run delphi "How many weeks to migrate auth?" --rounds 4
`;

function splitList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
}

async function main() {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.includes("--debug")) {
    setLogLevel("debug");
  } else if (rawArgs.includes("--verbose")) {
    setLogLevel("info");
  }
  const args = rawArgs.filter((a) => a !== "--verbose" && a !== "--debug");

  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    console.log(USAGE);
    process.exit(0);
  }

  if (args[0] === "--version" || args[0] === "-v") {
    console.log("conclave v0.1.0");
    process.exit(0);
  }

  const command = args[0];

  // "init" has no config yet; "start" sets up its own logging
  let config: Config | null = null;
  if (command !== "init" && command !== "start") {
    config = loadConfig();
    initFileLogging(getUserDataDir(config), config.logging);
  }

  switch (command) {
    case "protocols":
      cmdProtocols();
      break;
    case "workers":
      if (config) cmdWorkers(config);
      break;
    case "run":
      if (config) await cmdRun(config, args.slice(1));
      break;
    case "runs":
      if (config) await cmdRuns(config, args.slice(1));
      break;
    case "show":
      if (config) await cmdShow(config, args.slice(1));
      break;
    case "init":
      cmdInit();
      break;
    case "start":
      cmdStart();
      break;
    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(USAGE);
      process.exit(1);
  }
}

function cmdProtocols() {
  const registry = new ProtocolRegistry();
  console.log(`Protocol catalogue v${registry.version}:\n`);
  for (const summary of registry.summaries()) {
    console.log(formatProtocol(summary));
  }
}

function cmdWorkers(config: Config) {
  console.log("Configured workers:\n");
  for (const w of config.workers) {
    const status = w.enabled ? "enabled" : "disabled";
    const tools = w.tools.length > 0 ? ` [tools: ${w.tools.map((t) => t.name).join(", ")}]` : "";
    console.log(`  ${w.key} (${w.transport}/${w.model} @ ${w.endpoint}): ${status}${tools}`);
  }
}

async function cmdRun(config: Config, args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      workers: { type: "string" },
      options: { type: "string" },
      rounds: { type: "string" },
      tools: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  const [protocolId, question] = positionals;
  if (!protocolId || !question) {
    console.error("Error: run requires a protocol and a question\n");
    console.log('Usage: conclave run <protocol> "your question" [--workers a,b] [--options x,y] [--rounds n]');
    process.exit(1);
  }

  const rounds = values.rounds !== undefined ? parseInt(values.rounds, 10) : undefined;
  if (rounds !== undefined && (isNaN(rounds) || rounds < 1)) {
    console.error(`Error: --rounds must be a positive integer (got "${values.rounds}")`);
    process.exit(1);
  }

  const { coordinator, store, defaultRoster } = await createRuntime(config);

  let runId: string;
  try {
    runId = coordinator.submit({
      protocolId,
      question,
      rosterKeys: splitList(values.workers) ?? defaultRoster,
      options: splitList(values.options),
      rounds,
      toolsEnabled: values.tools,
    });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`Error: ${err.message}`);
      await store.close();
      process.exit(1);
    }
    throw err;
  }

  coordinator.subscribe(runId, (event) => {
    const line = formatEvent(event);
    if (line !== null) console.log(line);
  });

  const onInterrupt = () => {
    console.error("\nCancelling run...");
    coordinator.cancel(runId);
  };
  process.once("SIGINT", onInterrupt);

  const result = await coordinator.wait(runId);
  process.off("SIGINT", onInterrupt);

  console.log("\n" + "=".repeat(60) + "\n");
  console.log(formatResult(result));

  const { perWorker } = result.cost;
  if (Object.keys(perWorker).length > 1) {
    console.log("Per worker:");
    for (const [key, tokens] of Object.entries(perWorker)) {
      console.log(`  ${key}: ${(tokens.inputTokens + tokens.outputTokens).toLocaleString()} tokens`);
    }
  }

  await store.close();
  if (result.status === "failed" || result.status === "aborted") process.exitCode = 1;
}

async function cmdRuns(config: Config, args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      limit: { type: "string", default: "20" },
      protocol: { type: "string" },
    },
  });
  const limit = parseInt(values.limit, 10);
  if (isNaN(limit) || limit < 1) {
    console.error(`Error: --limit must be a positive integer (got "${values.limit}")`);
    process.exit(1);
  }

  const { store } = await createRuntime(config);
  const runs = await store.listRuns({ limit, protocolId: values.protocol });
  if (runs.length === 0) {
    console.log("No runs yet.");
  } else {
    for (const run of runs) console.log(formatRunSummary(run));
  }
  await store.close();
}

async function cmdShow(config: Config, args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: { json: { type: "boolean", default: false } },
    allowPositionals: true,
  });
  const runId = positionals[0];
  if (!runId) {
    console.error("Error: show requires a run id");
    process.exit(1);
  }

  const { store } = await createRuntime(config);
  const result = await store.getRun(runId);
  await store.close();
  if (!result) {
    console.error(`Run "${runId}" not found`);
    process.exit(1);
  }
  console.log(values.json ? JSON.stringify(result, null, 2) : formatResult(result));
}

function cmdInit() {
  const filename = "conclave.config.json";
  if (existsSync(filename)) {
    console.log(`${filename} already exists. Skipping.`);
    return;
  }

  const defaultConfig = {
    user: "default",
    workers: [
      {
        key: "analyst",
        roleContext: "You are a careful analyst. Weigh evidence before committing to a position.",
        transport: "ollama",
        model: "qwen3",
        endpoint: "http://localhost:11434",
        enabled: true,
      },
      {
        key: "skeptic",
        roleContext: "You are a skeptic. Look for hidden assumptions and failure modes.",
        transport: "ollama",
        model: "llama3",
        endpoint: "http://localhost:11434",
        enabled: true,
      },
      {
        key: "planner",
        roleContext: "You are a pragmatic planner. Favour options that can ship.",
        transport: "openai-compat",
        model: "gpt-4o-mini",
        endpoint: "https://api.openai.com",
        apiKey: "",
        enabled: false,
      },
    ],
    engine: { concurrency: 4, timeoutMs: 120000, retries: 1 },
    database: { path: "./data/conclave.db" },
  };

  writeFileSync(filename, JSON.stringify(defaultConfig, null, 2) + "\n");
  console.log(`Created ${filename}`);
  console.log("Edit it to configure workers and endpoints.");
}

function cmdStart() {
  console.error("Starting Conclave MCP server (stdio)...");
  import("./server.js").catch((err) => {
    console.error("Failed to start server:", err);
    process.exit(1);
  });
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
