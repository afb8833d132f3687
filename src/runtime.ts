/**
 * Wiring shared by the CLI and the MCP server: config → gateway, workers,
 * store and coordinator. Also the plain-text renderings both surfaces print.
 */

import { getDatabasePath, type Config } from "./config.js";
import { RunCoordinator } from "./engine/run-coordinator.js";
import { describeArtifact } from "./engine/context.js";
import { totalTokenCount } from "./engine/cost.js";
import type { RunEvent } from "./engine/events.js";
import type { RunResult } from "./engine/types.js";
import { RoutingGateway, toWorker } from "./gateway/index.js";
import { truncate } from "./logger.js";
import type { ProtocolSummary } from "./protocol/registry.js";
import type { IRunStore, RunSummary } from "./store/interfaces.js";
import { SqliteRunStore } from "./store/sqlite.js";

export interface Runtime {
  coordinator: RunCoordinator;
  store: IRunStore;
  /** Keys of enabled workers, in config order */
  defaultRoster: string[];
}

export async function createRuntime(config: Config, store?: IRunStore): Promise<Runtime> {
  const enabled = config.workers.filter((w) => w.enabled);
  const runStore = store ?? new SqliteRunStore(getDatabasePath(config));
  await runStore.initialize();

  const coordinator = new RunCoordinator({
    gateway: new RoutingGateway(enabled),
    workers: enabled.map(toWorker),
    engine: config.engine,
    store: runStore,
  });
  return { coordinator, store: runStore, defaultRoster: enabled.map((w) => w.key) };
}

// --- Renderings ---

export function formatProtocol(p: ProtocolSummary): string {
  const rounds = p.rounds ? ` | rounds ${p.rounds.default} (${p.rounds.min}-${p.rounds.max}, stop: ${p.rounds.stop})` : "";
  const needs = p.requiresOptions ? ` | needs --options (${p.requiresOptions})` : "";
  return `${p.id} [${p.category}] ${p.minAgents}-${p.maxAgents} workers${rounds}${needs}\n  ${p.description}`;
}

export function formatEvent(event: RunEvent): string | null {
  switch (event.type) {
    case "run_start":
      return `▶ ${event.payload.protocolId} with ${event.payload.roster.map((w) => w.key).join(", ")}`;
    case "phase_start": {
      const { phaseId, kind, round } = event.payload;
      return `  ${round > 0 ? `[round ${round}] ` : ""}${phaseId} (${kind})`;
    }
    case "worker_output":
      return `    ${event.payload.workerKey}: ${truncate(event.payload.text.replace(/\s+/g, " "), 160)}`;
    case "worker_failure":
      return `    ${event.payload.workerKey}: FAILED (${event.payload.reason}) ${event.payload.message}`;
    case "aggregate_result":
      return `    = ${truncate(describeArtifact(event.payload.artifact).replace(/\n/g, " | "), 200)}`;
    case "round_boundary":
      return `  -- end of round ${event.payload.roundNumber}`;
    case "synthesis":
      return null;
    case "error":
      return `  ! ${event.payload.reason}: ${event.payload.message}`;
    case "run_complete":
      return `■ ${event.payload.status} in ${(event.payload.elapsedMs / 1000).toFixed(1)}s`;
  }
}

export function formatResult(result: RunResult): string {
  const tokens = totalTokenCount(result.cost.totalTokens);
  const cost = result.cost.totalCostUsd > 0 ? ` | Cost: $${result.cost.totalCostUsd.toFixed(4)}` : "";
  const lines = [
    `**${result.protocolId}**: ${result.status}${result.roundsRun > 0 ? ` after ${result.roundsRun} round(s)` : ""}`,
    "",
    result.finalArtifact ? describeArtifact(result.finalArtifact) : "(no artifact)",
  ];
  if (result.error) lines.push("", `Error (${result.error.reason}): ${result.error.message}`);
  lines.push(
    "",
    `---\nRun ${result.runId} | ${result.phaseResults.length} phases | ${(result.timings.elapsedMs / 1000).toFixed(1)}s | Tokens: ${tokens}${cost}`,
  );
  return lines.join("\n");
}

export function formatRunSummary(r: RunSummary): string {
  return `${r.runId}  ${r.completedAt.slice(0, 19)}  ${r.protocolId}  ${r.status}  ${truncate(r.question, 60)}`;
}
