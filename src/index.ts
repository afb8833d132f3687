/**
 * Conclave: public API.
 *
 * Re-exports the engine, the protocol catalogue, the aggregation library and
 * the gateways for programmatic use (e.g. embedding the coordinator in your
 * own Node.js service with your own gateway).
 */

// --- Engine ---
export { RunCoordinator } from "./engine/run-coordinator.js";
export type { RunCoordinatorOptions } from "./engine/run-coordinator.js";
export { RunEventStream } from "./engine/events.js";
export type { RunEvent, RunEventType, RunEventPayloads, RunEventListener, SubscribeOptions } from "./engine/events.js";
export { ConcurrencyLimiter } from "./engine/concurrency.js";
export type { CostReport } from "./engine/cost.js";
export { isTerminal, TERMINAL_STATUSES } from "./engine/types.js";
export type {
  RunStatus, RunSubmission, RunResult, RunSnapshot, RunError, RunTimings,
} from "./engine/types.js";

// --- Protocols ---
export { ProtocolRegistry, validateDefinition } from "./protocol/registry.js";
export type { ProtocolSummary } from "./protocol/registry.js";
export { CATALOGUE, CATALOGUE_VERSION } from "./protocol/catalogue/index.js";
export { parseArtifact, extractJson } from "./protocol/parsers.js";
export type {
  ProtocolDefinition, PhaseSpec, PhaseResult, PhaseContext, AggregateArtifact, WorkerArtifact,
  LoopPolicy, StopPredicate,
} from "./protocol/types.js";

// --- Aggregation ---
export * from "./aggregation/index.js";

// --- Gateways ---
export { RoutingGateway, OllamaGateway, OpenAICompatGateway, createGateway, toWorker } from "./gateway/index.js";
export type {
  IWorkerGateway, InvokeResult, WorkerInvocation, Worker, FailureReason, TokenUsage,
} from "./gateway/index.js";

// --- Store ---
export { SqliteRunStore } from "./store/sqlite.js";
export type { IRunStore, RunSummary, ListRunsOptions } from "./store/interfaces.js";

// --- Config & errors ---
export { loadConfig, getUserDataDir, ConfigSchema } from "./config.js";
export type { Config, WorkerConfig, EngineConfig } from "./config.js";
export { ConfigurationError, InvariantError, ArtifactParseError } from "./errors.js";
export { createRuntime } from "./runtime.js";
