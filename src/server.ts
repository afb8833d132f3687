#!/usr/bin/env node

/**
 * Conclave MCP Server: stdio transport.
 *
 * Exposes 4 tools: list_protocols, run_protocol, get_run, list_runs.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, getUserDataDir } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { createLogger, initFileLogging } from "./logger.js";
import { createRuntime, formatResult } from "./runtime.js";
import {
  ListProtocolsInputSchema,
  RunProtocolInputSchema,
  GetRunInputSchema,
  ListRunsInputSchema,
} from "./tools.js";

const log = createLogger("server");

const config = loadConfig();
initFileLogging(getUserDataDir(config), config.logging);

function text(body: string, isError = false) {
  return { content: [{ type: "text" as const, text: body }], isError };
}

async function main() {
  const { coordinator, store, defaultRoster } = await createRuntime(config);

  const server = new McpServer({
    name: "conclave",
    version: "0.1.0",
  });

  server.tool(
    "list_protocols",
    "List the coordination protocols this server can run",
    ListProtocolsInputSchema.shape,
    async (args) => {
      const summaries = coordinator.registry
        .summaries()
        .filter((p) => !args.category || p.category === args.category);
      return text(JSON.stringify({ catalogueVersion: coordinator.registry.version, protocols: summaries }, null, 2));
    },
  );

  server.tool(
    "run_protocol",
    "Run a coordination protocol over the configured workers and return its result",
    RunProtocolInputSchema.shape,
    async (args) => {
      log.debug("run_protocol invoked:", JSON.stringify(args));
      try {
        const result = await coordinator.run({
          protocolId: args.protocol,
          question: args.question,
          rosterKeys: args.workers ?? defaultRoster,
          options: args.options,
          rounds: args.rounds,
          toolsEnabled: args.tools,
        });
        return text(formatResult(result), result.status === "failed");
      } catch (err) {
        if (err instanceof ConfigurationError) return text(`Error: ${err.message}`, true);
        throw err;
      }
    },
  );

  server.tool(
    "get_run",
    "Fetch a finished run by id",
    GetRunInputSchema.shape,
    async (args) => {
      const result = await store.getRun(args.run_id);
      if (!result) return text(`Run "${args.run_id}" not found`, true);
      const body = args.include_phases ? JSON.stringify(result, null, 2) : formatResult(result);
      return text(body);
    },
  );

  server.tool(
    "list_runs",
    "List recent runs, newest first",
    ListRunsInputSchema.shape,
    async (args) => {
      const runs = await store.listRuns({ protocolId: args.protocol, limit: args.limit });
      return text(JSON.stringify(runs, null, 2));
    },
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("MCP server started (stdio)");

  // Graceful shutdown: cancel what is still running and let it persist
  const shutdown = async () => {
    const active = coordinator.activeRuns();
    if (active.length > 0) log.info(`cancelling ${active.length} active run(s)`);
    for (const runId of active) coordinator.cancel(runId);
    await Promise.allSettled(active.map((runId) => coordinator.wait(runId)));
    await server.close();
    await store.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      log.error("shutdown failed:", err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  console.error("Conclave MCP server failed to start:", err);
  process.exit(1);
});
