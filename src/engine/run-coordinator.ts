/**
 * RunCoordinator: binds a protocol, a roster and a question into a Run.
 *
 * Responsibilities:
 * - Validate submissions (protocol, roster, options, rounds) before a Run exists
 * - Start runs on a later tick so callers can subscribe before run_start
 * - Own cancellation, cost accounting and status transitions
 * - Emit exactly one terminal run_complete per run, then freeze the result
 * - Hand finished runs to the injected store (failures logged, never fatal)
 * - Drop a run's live state once it is terminal, keeping a bounded set of
 *   recent results for wait and getRun
 */

import { randomUUID } from "node:crypto";
import { ConfigSchema, type EngineConfig } from "../config.js";
import { ConfigurationError, InvariantError } from "../errors.js";
import type { IWorkerGateway, Worker } from "../gateway/base.js";
import { createLogger, createRunLog } from "../logger.js";
import { ProtocolRegistry } from "../protocol/registry.js";
import type { AggregateArtifact, PhaseResult, ProtocolDefinition } from "../protocol/types.js";
import type { IRunStore } from "../store/interfaces.js";
import { ConcurrencyLimiter } from "./concurrency.js";
import { CostAccumulator, totalTokenCount } from "./cost.js";
import { RunEventStream, type RunEvent, type RunEventListener, type SubscribeOptions } from "./events.js";
import { PhaseExecutor } from "./phase-executor.js";
import { RoundController, type ControllerOutcome } from "./round-controller.js";
import {
  isTerminal,
  type RunError, type RunResult, type RunSnapshot, type RunStatus, type RunSubmission,
} from "./types.js";

const log = createLogger("coordinator");

export interface RunCoordinatorOptions {
  gateway: IWorkerGateway;
  /** Workers a submission may name */
  workers: readonly Worker[];
  registry?: ProtocolRegistry;
  engine?: Partial<EngineConfig>;
  store?: IRunStore | null;
}

interface RunRecord {
  readonly runId: string;
  readonly def: ProtocolDefinition;
  readonly question: string;
  readonly roster: readonly Worker[];
  readonly options: readonly string[];
  readonly rounds: number;
  readonly toolsEnabled: boolean;
  readonly stream: RunEventStream;
  readonly abort: AbortController;
  readonly cost: CostAccumulator;
  readonly history: PhaseResult[];
  status: RunStatus;
  startedAt: string | null;
  completedAt: string | null;
  readonly done: Promise<RunResult>;
}

const STATUS_RANK: Record<RunStatus, number> = {
  pending: 0,
  running: 1,
  succeeded: 2,
  succeeded_without_convergence: 2,
  failed: 2,
  aborted: 2,
};

function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export class RunCoordinator {
  readonly registry: ProtocolRegistry;
  private readonly gateway: IWorkerGateway;
  private readonly workers: Map<string, Worker>;
  private readonly engine: EngineConfig;
  private readonly store: IRunStore | null;
  private readonly limiter: ConcurrencyLimiter;
  /** Runs not yet terminal */
  private readonly runs = new Map<string, RunRecord>();
  /** Recent frozen results, least recently used first */
  private readonly finished = new Map<string, RunResult>();

  constructor(options: RunCoordinatorOptions) {
    this.gateway = options.gateway;
    this.workers = new Map(options.workers.map((w) => [w.key, w]));
    this.registry = options.registry ?? new ProtocolRegistry();
    this.engine = { ...ConfigSchema.parse({}).engine, ...options.engine };
    this.store = options.store ?? null;
    this.limiter = new ConcurrencyLimiter(this.engine.concurrency);
  }

  // ── Submission ────────────────────────────────────────────────────────

  /**
   * Validate and schedule a run. The run starts on a later tick; subscribe
   * before then to see every event from run_start on.
   * @throws ConfigurationError when the submission is invalid
   */
  submit(submission: RunSubmission): string {
    const def = this.registry.get(submission.protocolId);
    const question = submission.question.trim();
    if (!question) throw new ConfigurationError("question must not be empty");

    const roster = this.resolveRoster(def, submission.rosterKeys);
    const options = this.resolveOptions(def, submission.options);
    const rounds = this.resolveRounds(def, submission.rounds);

    const runId = randomUUID();
    const record: RunRecord = {
      runId,
      def,
      question,
      roster,
      options,
      rounds,
      toolsEnabled: submission.toolsEnabled ?? false,
      stream: new RunEventStream(runId, this.engine.backlogSize),
      abort: new AbortController(),
      cost: new CostAccumulator(),
      history: [],
      status: "pending",
      startedAt: null,
      completedAt: null,
      done: nextTick().then(() => this.execute(record)),
    };
    this.runs.set(runId, record);

    log.info(`run ${runId} submitted: ${def.id}, ${roster.length} workers` + (def.loop ? `, ${rounds} rounds` : ""));
    return runId;
  }

  /**
   * Resolves with the frozen result once the run is terminal.
   * @throws ConfigurationError for a run neither active nor recently finished
   */
  wait(runId: string): Promise<RunResult> {
    const record = this.runs.get(runId);
    if (record) return record.done;
    return Promise.resolve(this.recall(runId));
  }

  /** Submit and wait; `onEvent` is attached before the run starts. */
  async run(submission: RunSubmission, onEvent?: RunEventListener): Promise<RunResult> {
    const runId = this.submit(submission);
    if (onEvent) this.subscribe(runId, onEvent);
    return this.wait(runId);
  }

  /**
   * Request cancellation. In-flight calls are aborted; the run ends with
   * status "aborted". Returns false when the run is already terminal.
   */
  cancel(runId: string): boolean {
    const record = this.runs.get(runId);
    if (!record) {
      this.recall(runId);
      return false;
    }
    if (isTerminal(record.status) || record.abort.signal.aborted) return false;
    log.info(`run ${runId}: cancel requested`);
    record.abort.abort();
    return true;
  }

  /** A finished run emits nothing more; subscribing to one is a no-op. */
  subscribe(runId: string, listener: RunEventListener, options?: SubscribeOptions): () => void {
    const record = this.runs.get(runId);
    if (record) return record.stream.subscribe(listener, options);
    this.recall(runId);
    return () => {};
  }

  events(runId: string, options?: SubscribeOptions): AsyncIterableIterator<RunEvent> {
    const record = this.runs.get(runId);
    if (record) return record.stream.iterate(options);
    this.recall(runId);
    return (async function* () {})();
  }

  getRun(runId: string): RunSnapshot | undefined {
    const record = this.runs.get(runId);
    if (!record) {
      return this.finished.has(runId) ? snapshotOf(this.recall(runId)) : undefined;
    }
    return {
      runId: record.runId,
      protocolId: record.def.id,
      question: record.question,
      status: record.status,
      roster: [...record.roster],
      startedAt: record.startedAt,
      completedAt: record.completedAt,
      phaseResults: [...record.history],
    };
  }

  /** Run ids that have not finished. */
  activeRuns(): string[] {
    return [...this.runs.values()].filter((r) => !isTerminal(r.status)).map((r) => r.runId);
  }

  // ── Validation ────────────────────────────────────────────────────────

  private resolveRoster(def: ProtocolDefinition, keys: readonly string[]): Worker[] {
    const seen = new Set<string>();
    const roster: Worker[] = [];
    const unknown: string[] = [];
    for (const key of keys) {
      if (seen.has(key)) throw new ConfigurationError(`worker "${key}" appears twice in the roster`);
      seen.add(key);
      const worker = this.workers.get(key);
      if (worker) roster.push(worker);
      else unknown.push(key);
    }
    if (unknown.length > 0) {
      throw new ConfigurationError(
        `unknown worker(s): ${unknown.join(", ")}. Known: ${[...this.workers.keys()].join(", ") || "(none)"}`,
      );
    }
    if (roster.length < def.minAgents || roster.length > def.maxAgents) {
      throw new ConfigurationError(
        `protocol "${def.id}" takes ${def.minAgents}-${def.maxAgents} workers, got ${roster.length}`,
      );
    }
    return roster;
  }

  private resolveOptions(def: ProtocolDefinition, raw: readonly string[] | undefined): string[] {
    const options = [...new Set((raw ?? []).map((o) => o.trim()).filter((o) => o.length > 0))];
    if (def.requiresOptions && options.length < 2) {
      throw new ConfigurationError(`protocol "${def.id}" needs at least 2 ${def.requiresOptions}`);
    }
    return options;
  }

  private resolveRounds(def: ProtocolDefinition, rounds: number | undefined): number {
    if (!def.loop) {
      if (rounds !== undefined) throw new ConfigurationError(`protocol "${def.id}" has no rounds`);
      return 0;
    }
    if (rounds === undefined) return def.loop.defaultRounds;
    if (!Number.isInteger(rounds) || rounds < def.loop.minRounds || rounds > def.loop.maxRounds) {
      throw new ConfigurationError(
        `protocol "${def.id}" takes ${def.loop.minRounds}-${def.loop.maxRounds} rounds, got ${rounds}`,
      );
    }
    return rounds;
  }

  // ── Execution ─────────────────────────────────────────────────────────

  /** A recently finished result, marked most recently used. */
  private recall(runId: string): RunResult {
    const result = this.finished.get(runId);
    if (!result) throw new ConfigurationError(`unknown run "${runId}"`);
    this.finished.delete(runId);
    this.finished.set(runId, result);
    return result;
  }

  private retire(result: RunResult): void {
    this.runs.delete(result.runId);
    this.finished.set(result.runId, result);
    for (const runId of this.finished.keys()) {
      if (this.finished.size <= this.engine.retainedRuns) break;
      this.finished.delete(runId);
    }
  }

  private transition(record: RunRecord, next: RunStatus): void {
    if (isTerminal(record.status) || STATUS_RANK[next] <= STATUS_RANK[record.status]) {
      throw new InvariantError(`run ${record.runId}: illegal status change ${record.status} → ${next}`);
    }
    record.status = next;
  }

  private async execute(record: RunRecord): Promise<RunResult> {
    const start = Date.now();
    const { runId, def, stream } = record;
    this.transition(record, "running");
    const startedAt = new Date(start).toISOString();
    record.startedAt = startedAt;

    const runLog = createRunLog(runId);
    runLog?.write("info", `run ${runId} | ${def.id} | question: ${record.question}`);
    runLog?.write("info", `roster: ${record.roster.map((w) => w.key).join(", ")}`);

    stream.publish({
      type: "run_start",
      payload: { protocolId: def.id, question: record.question, roster: [...record.roster], rounds: record.rounds },
    });

    const executor = new PhaseExecutor({
      gateway: this.gateway,
      limiter: this.limiter,
      settings: this.engine,
      stream,
      cost: record.cost,
      runLog,
    });
    const controller = new RoundController(
      def,
      executor,
      {
        runId,
        question: record.question,
        roster: record.roster,
        options: record.options,
        toolsEnabled: record.toolsEnabled,
        signal: record.abort.signal,
      },
      record.rounds,
      stream,
      record.history,
    );

    let outcome: ControllerOutcome;
    try {
      outcome = await controller.run();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`run ${runId}: engine error:`, message);
      outcome = {
        status: "failed",
        converged: false,
        roundsRun: controller.roundsRun,
        failure: { phaseIndex: record.history.length, phaseId: "", reason: "internal_error", message },
      };
    }

    const status: RunStatus =
      outcome.status === "aborted" ? "aborted"
      : outcome.status === "failed" ? "failed"
      : outcome.converged ? "succeeded"
      : "succeeded_without_convergence";

    let error: RunError | undefined;
    if (outcome.failure) {
      error = {
        phaseIndex: outcome.failure.phaseIndex,
        phaseId: outcome.failure.phaseId || undefined,
        reason: outcome.failure.reason,
        message: outcome.failure.message,
      };
      stream.publish({ type: "error", payload: { phaseIndex: error.phaseIndex, reason: error.reason, message: error.message } });
    } else if (status === "aborted") {
      error = { reason: "cancelled", message: "run cancelled" };
    }

    const completedAt = new Date();
    const elapsedMs = completedAt.getTime() - start;
    this.transition(record, status);
    const completedIso = completedAt.toISOString();
    record.completedAt = completedIso;

    const cost = record.cost.report();
    const result: RunResult = deepFreeze({
      runId,
      protocolId: def.id,
      catalogueVersion: this.registry.version,
      question: record.question,
      roster: [...record.roster],
      options: [...record.options],
      status,
      converged: outcome.converged && status !== "failed" && status !== "aborted",
      roundsRun: outcome.roundsRun,
      phaseResults: [...record.history],
      finalArtifact: finalArtifact(record.history),
      cost,
      timings: {
        startedAt,
        completedAt: completedIso,
        elapsedMs,
        perPhase: record.history.map((r) => ({
          phaseIndex: r.phaseIndex,
          phaseId: r.phaseId,
          round: r.round,
          elapsedMs: r.elapsedMs,
        })),
      },
      error,
    });

    stream.publish({ type: "run_complete", payload: { status, elapsedMs, cost } });
    log.info(`run ${runId} ${status} in ${elapsedMs}ms, ${totalTokenCount(cost.totalTokens)} tokens`);
    runLog?.write("info", `run ${status} in ${elapsedMs}ms (${cost.calls} calls, ${totalTokenCount(cost.totalTokens)} tokens)`);

    await this.persist(result);
    this.retire(result);
    return result;
  }

  private async persist(result: RunResult): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.saveRun(result);
    } catch (err) {
      log.error(`run ${result.runId}: could not save result:`, err instanceof Error ? err.message : String(err));
    }
  }
}

function snapshotOf(result: RunResult): RunSnapshot {
  return {
    runId: result.runId,
    protocolId: result.protocolId,
    question: result.question,
    status: result.status,
    roster: [...result.roster],
    startedAt: result.timings.startedAt,
    completedAt: result.timings.completedAt,
    phaseResults: result.phaseResults,
  };
}

/** The last artifact a run produced, skipping branch decisions. */
function finalArtifact(history: readonly PhaseResult[]): AggregateArtifact | null {
  for (let i = history.length - 1; i >= 0; i--) {
    const artifact = history[i].aggregatedArtifact;
    if (artifact && artifact.kind !== "branch") return artifact;
  }
  return null;
}
