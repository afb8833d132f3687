/**
 * PhaseExecutor: runs one phase of a protocol.
 *
 * Fan-out style phases call workers through the shared concurrency limiter,
 * with a per-call timeout enforced here even if a gateway ignores its own,
 * retries with backoff for transient failures, and artifact parsing at the
 * boundary. Aggregate phases call exactly one aggregation function
 * synchronously on the source phase's parsed outputs.
 */

import type { EngineConfig } from "../config.js";
import { ArtifactParseError } from "../errors.js";
import {
  failure, RETRYABLE_FAILURES,
  type InvokeResult, type IWorkerGateway, type Worker, type WorkerInvocation,
} from "../gateway/base.js";
import { createLogger, truncate, type RunLog } from "../logger.js";
import {
  calibrateSecondPrice, checkConstraints, eliminateHypotheses, enumerateItems, findFeedbackLoops,
  mergeCausalEdges, mergeEvidenceVotes, tallyMajorityStage, tallyRankedChoice, testConvergence,
} from "../aggregation/index.js";
import { parseArtifact } from "../protocol/parsers.js";
import {
  latestArtifact, latestResult,
  type AggregateArtifact, type AggregatePhase, type ArtifactKind, type BranchPhase, type ContextSelector,
  type FailurePolicy, type FanOutPhase, type LlmAggregatePhase, type PhaseContext, type PhaseFailure,
  type PhaseResult, type PhaseSpec, type PhaseStatus, type SynthesizePhase, type TargetSelector,
  type WorkerArtifact, type WorkerFailure, type WorkerOutcome,
} from "../protocol/types.js";
import { Backoff } from "./backoff.js";
import type { ConcurrencyLimiter } from "./concurrency.js";
import { renderContext } from "./context.js";
import type { CostAccumulator } from "./cost.js";
import type { RunEventStream } from "./events.js";

const log = createLogger("executor");

export interface ExecutionContext extends PhaseContext {
  readonly toolsEnabled: boolean;
  readonly signal: AbortSignal;
}

export type ExecutorSettings = Pick<EngineConfig, "timeoutMs" | "retries" | "retryBaseMs" | "evidenceTiePolicy">;

export interface PhaseExecutorDeps {
  gateway: IWorkerGateway;
  limiter: ConcurrencyLimiter;
  settings: ExecutorSettings;
  stream: RunEventStream;
  cost: CostAccumulator;
  runLog?: RunLog | null;
}

interface CallSpec {
  phaseId: string;
  phaseIndex: number;
  parse: ArtifactKind;
  /** Vocabulary parsed references are mapped onto; empty accepts any text */
  choices: readonly string[];
  context: ContextSelector;
  prompt: (worker: Worker) => string;
}

type Outcome = { artifact: AggregateArtifact } | { failure: PhaseFailure };

/** Resolve a target selector to roster members, keeping the selector's order for explicit lists. */
export function resolveTargets(selector: TargetSelector, ctx: PhaseContext): Worker[] {
  if (selector === "all") return [...ctx.roster];
  if (selector === "first") return ctx.roster.slice(0, 1);
  const keys = typeof selector === "function" ? selector(ctx) : selector;
  const out: Worker[] = [];
  for (const key of keys) {
    const worker = ctx.roster.find((w) => w.key === key);
    if (worker && !out.includes(worker)) out.push(worker);
  }
  return out;
}

function collect<K extends WorkerArtifact["kind"]>(
  result: PhaseResult | undefined,
  kind: K,
): Array<Extract<WorkerArtifact, { kind: K }>> {
  const out: Array<Extract<WorkerArtifact, { kind: K }>> = [];
  if (!result) return out;
  for (const outcome of Object.values(result.perWorkerOutputs)) {
    if (outcome.ok && outcome.artifact && isKind(outcome.artifact, kind)) out.push(outcome.artifact);
  }
  return out;
}

function isKind<K extends WorkerArtifact["kind"]>(
  artifact: WorkerArtifact,
  kind: K,
): artifact is Extract<WorkerArtifact, { kind: K }> {
  return artifact.kind === kind;
}

export class PhaseExecutor {
  constructor(private readonly deps: PhaseExecutorDeps) {}

  async execute(phase: PhaseSpec, phaseIndex: number, ctx: ExecutionContext): Promise<PhaseResult> {
    const start = Date.now();
    this.deps.stream.publish({
      type: "phase_start",
      payload: { phaseIndex, phaseId: phase.id, kind: phase.kind, round: ctx.round },
    });
    this.deps.runLog?.write("info", `phase ${phaseIndex} ${phase.id} (${phase.kind}) round ${ctx.round}`);

    const partial = await this.dispatch(phase, phaseIndex, ctx);
    const result: PhaseResult = {
      phaseIndex,
      phaseId: phase.id,
      kind: phase.kind,
      round: ctx.round,
      elapsedMs: Date.now() - start,
      ...partial,
    };

    if (result.failure) {
      log.warn(`phase ${phase.id} ${result.status}: ${result.failure.message}`);
      this.deps.runLog?.write("warn", `phase ${phase.id} ${result.status}: ${result.failure.message}`);
    } else {
      log.debug(`phase ${phase.id} done in ${result.elapsedMs}ms`);
    }
    return result;
  }

  private async dispatch(
    phase: PhaseSpec,
    phaseIndex: number,
    ctx: ExecutionContext,
  ): Promise<Pick<PhaseResult, "status" | "perWorkerOutputs" | "aggregatedArtifact" | "failure">> {
    switch (phase.kind) {
      case "fan_out":
        return this.fanOut(phase, phaseIndex, ctx);
      case "llm_aggregate":
        return this.llmAggregate(phase, phaseIndex, ctx);
      case "synthesize":
        return this.synthesize(phase, phaseIndex, ctx);
      case "aggregate":
        return this.finishAggregate(phaseIndex, phase.id, this.aggregate(phase, ctx));
      case "branch":
        return this.finishAggregate(phaseIndex, phase.id, { artifact: this.branch(phase, ctx) });
    }
  }

  // ── Worker phases ─────────────────────────────────────────────────────

  private async fanOut(phase: FanOutPhase, phaseIndex: number, ctx: ExecutionContext) {
    const targets = resolveTargets(phase.targets ?? "all", ctx);
    const outputs = await this.callAll(targets, ctx, {
      phaseId: phase.id,
      phaseIndex,
      parse: phase.parse ?? "text",
      choices: phase.choicesFrom ? (enumerationIds(ctx, phase.choicesFrom) ?? []) : ctx.options,
      context: phase.context ?? "history",
      prompt: (worker) => phase.prompt(ctx, worker),
    });
    const verdict = this.applyPolicy(outputs, targets.length, phase.failurePolicy ?? "best_effort", phase.minSuccesses ?? 1, ctx);
    return { ...verdict, perWorkerOutputs: outputs, aggregatedArtifact: null };
  }

  private async llmAggregate(phase: LlmAggregatePhase, phaseIndex: number, ctx: ExecutionContext) {
    const targets = resolveTargets(phase.targets ?? "first", ctx);
    const outputs = await this.callAll(targets, ctx, {
      phaseId: phase.id,
      phaseIndex,
      parse: phase.parse ?? "text",
      choices: [],
      context: phase.context ?? phase.sources,
      prompt: (worker) => phase.prompt(ctx, worker),
    });
    const verdict = this.applyPolicy(outputs, targets.length, phase.failurePolicy ?? "best_effort", 1, ctx);
    let artifact: AggregateArtifact | null = null;
    if (verdict.status === "succeeded") {
      for (const [workerKey, outcome] of Object.entries(outputs)) {
        if (!outcome.ok) continue;
        artifact = { kind: "llm_aggregate", workerKey, text: outcome.text };
        this.deps.stream.publish({ type: "aggregate_result", payload: { phaseIndex, phaseId: phase.id, artifact } });
        break;
      }
    }
    return { ...verdict, perWorkerOutputs: outputs, aggregatedArtifact: artifact };
  }

  private async synthesize(phase: SynthesizePhase, phaseIndex: number, ctx: ExecutionContext) {
    const chosen = phase.synthesizer?.(ctx) ?? null;
    const worker = ctx.roster.find((w) => w.key === chosen) ?? ctx.roster[0];
    const outputs = await this.callAll(worker ? [worker] : [], ctx, {
      phaseId: phase.id,
      phaseIndex,
      parse: "text",
      choices: [],
      context: phase.context ?? "history",
      prompt: (w) => phase.prompt(ctx, w),
    });
    const verdict = this.applyPolicy(outputs, worker ? 1 : 0, "strict", 1, ctx);
    const outcome = worker ? outputs[worker.key] : undefined;
    let artifact: AggregateArtifact | null = null;
    if (verdict.status === "succeeded" && worker && outcome?.ok) {
      artifact = { kind: "synthesis", workerKey: worker.key, text: outcome.text };
      this.deps.stream.publish({ type: "synthesis", payload: { phaseIndex, workerKey: worker.key, text: outcome.text } });
    }
    return { ...verdict, perWorkerOutputs: outputs, aggregatedArtifact: artifact };
  }

  /**
   * Decide a worker phase's status from its outcomes.
   * Cancellation marks a strict phase aborted; a best-effort phase keeps
   * whatever arrived and is judged on its quorum like any other.
   */
  private applyPolicy(
    outputs: Record<string, WorkerOutcome>,
    targetCount: number,
    policy: FailurePolicy,
    minSuccesses: number,
    ctx: ExecutionContext,
  ): { status: PhaseStatus; failure?: PhaseFailure } {
    if (targetCount === 0) {
      return { status: "failed", failure: { reason: "no_target", message: "no roster member matches the phase targets" } };
    }
    const all = Object.values(outputs);
    const ok = all.filter((o) => o.ok).length;
    const failed = all.length - ok;

    if (policy === "strict" && failed > 0) {
      if (ctx.signal.aborted) {
        return { status: "aborted", failure: { reason: "cancelled", message: "run cancelled during a strict phase" } };
      }
      return { status: "failed", failure: { reason: "worker_failure", message: `${failed}/${all.length} workers failed` } };
    }
    if (ok < minSuccesses) {
      return {
        status: "failed",
        failure: { reason: "insufficient_quorum", message: `${ok} of ${all.length} workers answered, ${minSuccesses} required` },
      };
    }
    return { status: "succeeded" };
  }

  private async callAll(
    targets: readonly Worker[],
    ctx: ExecutionContext,
    spec: CallSpec,
  ): Promise<Record<string, WorkerOutcome>> {
    const priorContext = renderContext(ctx.history, spec.context);
    const settled = await Promise.all(
      targets.map(async (worker) => [worker.key, await this.callWorker(worker, priorContext, ctx, spec)] as const),
    );
    const outputs: Record<string, WorkerOutcome> = {};
    for (const [key, outcome] of settled) outputs[key] = outcome;
    return outputs;
  }

  /** One worker, with retries for transient failures. Never throws for worker-side problems. */
  private async callWorker(
    worker: Worker,
    priorContext: string[],
    ctx: ExecutionContext,
    spec: CallSpec,
  ): Promise<WorkerOutcome> {
    const { settings, limiter, cost, stream, runLog } = this.deps;
    const prompt = spec.prompt(worker);
    const backoff = new Backoff({ baseMs: settings.retryBaseMs });
    const started = Date.now();
    let attempts = 0;

    runLog?.write("debug", `--- ${worker.key} prompt (${spec.phaseId}) ---\n${prompt}`);

    for (;;) {
      attempts++;
      const result = await limiter.run(() =>
        this.invokeWithTimeout({
          worker,
          prompt,
          priorContext,
          toolsEnabled: ctx.toolsEnabled,
          timeoutMs: settings.timeoutMs,
        }, ctx.signal),
      );
      cost.record(worker.key, spec.phaseId, result.ok ? result.tokens : undefined);

      if (result.ok) {
        runLog?.write("debug", `--- ${worker.key} response (${result.durationMs}ms) ---\n${result.text}`);
        let artifact: WorkerArtifact | undefined;
        try {
          artifact = parseArtifact(spec.parse, worker.key, result.text, spec.choices);
        } catch (err) {
          if (!(err instanceof ArtifactParseError)) throw err;
          return this.reportFailure(spec, worker, {
            ok: false,
            reason: "malformed",
            message: err.message,
            durationMs: Date.now() - started,
            attempts,
          });
        }
        stream.publish({
          type: "worker_output",
          payload: { workerKey: worker.key, phaseIndex: spec.phaseIndex, text: result.text },
        });
        return {
          ok: true,
          text: result.text,
          artifact,
          tokens: result.tokens,
          toolCalls: result.toolCalls,
          durationMs: Date.now() - started,
          attempts,
        };
      }

      const retryable = RETRYABLE_FAILURES.has(result.reason) && attempts <= settings.retries && !ctx.signal.aborted;
      if (!retryable) {
        return this.reportFailure(spec, worker, {
          ok: false,
          reason: result.reason,
          message: result.message,
          durationMs: Date.now() - started,
          attempts,
        });
      }
      log.warn(`${worker.key} ${result.reason} in ${spec.phaseId}, retry ${attempts}/${settings.retries}: ${truncate(result.message, 200)}`);
      await backoff.wait(ctx.signal);
    }
  }

  private reportFailure(spec: CallSpec, worker: Worker, outcome: WorkerFailure): WorkerOutcome {
    log.warn(`${worker.key} failed in ${spec.phaseId}: ${outcome.reason} ${truncate(outcome.message, 200)}`);
    this.deps.runLog?.write("error", `${worker.key} failed: ${outcome.reason} ${outcome.message}`);
    this.deps.stream.publish({
      type: "worker_failure",
      payload: { workerKey: worker.key, phaseIndex: spec.phaseIndex, reason: outcome.reason, message: outcome.message },
    });
    return outcome;
  }

  /**
   * Race one gateway call against the timeout and the run's signal.
   * The gateway gets its own signal, aborted on either.
   */
  private invokeWithTimeout(invocation: Omit<WorkerInvocation, "signal">, runSignal: AbortSignal): Promise<InvokeResult> {
    const controller = new AbortController();
    const started = Date.now();
    const { timeoutMs } = invocation;

    return new Promise<InvokeResult>((resolve) => {
      let settled = false;
      const settle = (result: InvokeResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        runSignal.removeEventListener("abort", onAbort);
        resolve(result);
      };
      const onAbort = (): void => {
        controller.abort();
        settle(failure("cancelled", "run cancelled", Date.now() - started));
      };
      const timer = setTimeout(() => {
        controller.abort();
        settle(failure("timeout", `no response within ${timeoutMs}ms`, Date.now() - started));
      }, timeoutMs);

      if (runSignal.aborted) {
        onAbort();
        return;
      }
      runSignal.addEventListener("abort", onAbort, { once: true });

      void this.deps.gateway.invoke({ ...invocation, signal: controller.signal }).then(settle, (err: unknown) => {
        settle(failure("unavailable", err instanceof Error ? err.message : String(err), Date.now() - started));
      });
    });
  }

  // ── Deterministic phases ──────────────────────────────────────────────

  private finishAggregate(phaseIndex: number, phaseId: string, outcome: Outcome) {
    if ("failure" in outcome) {
      return { status: "failed" as const, perWorkerOutputs: {}, aggregatedArtifact: null, failure: outcome.failure };
    }
    this.deps.stream.publish({ type: "aggregate_result", payload: { phaseIndex, phaseId, artifact: outcome.artifact } });
    return { status: "succeeded" as const, perWorkerOutputs: {}, aggregatedArtifact: outcome.artifact };
  }

  private branch(phase: BranchPhase, ctx: ExecutionContext): AggregateArtifact {
    const condition = phase.condition(ctx);
    return { kind: "branch", condition, next: condition ? phase.onTrue : phase.onFalse };
  }

  private aggregate(phase: AggregatePhase, ctx: ExecutionContext): Outcome {
    const source = latestResult(ctx.history, phase.source);
    const params = phase.params ?? {};
    const minInputs = phase.minInputs ?? 1;

    if (!source || source.status !== "succeeded") {
      return quorumFailure(`source phase "${phase.source}" produced no usable output`);
    }
    const enough = (count: number): boolean => count >= minInputs;
    const shortBy = (count: number): Outcome =>
      quorumFailure(`${count} usable inputs from "${phase.source}", ${minInputs} required`);

    const itemIds = (): string[] | undefined => (params.itemsFrom ? enumerationIds(ctx, params.itemsFrom) : undefined);

    switch (phase.algorithm) {
      case "ranked_choice": {
        const ballots = collect(source, "ballot").map((a) => a.ballot);
        if (!enough(ballots.length)) return shortBy(ballots.length);
        return { artifact: { kind: "ranked_choice", result: tallyRankedChoice(itemIds() ?? ctx.options, ballots) } };
      }

      case "evidence_elimination": {
        const perWorker = collect(source, "evidence").map((a) => a.cells);
        if (!enough(perWorker.length)) return shortBy(perWorker.length);
        const matrix = mergeEvidenceVotes(perWorker);
        const hypotheses = itemIds() ?? [...new Set(matrix.map((c) => c.hypothesisId))].sort();
        const result = eliminateHypotheses(hypotheses, matrix, {
          maxRounds: params.eliminationRounds,
          tiePolicy: this.deps.settings.evidenceTiePolicy,
        });
        return { artifact: { kind: "evidence_elimination", result } };
      }

      case "second_price": {
        const bids = collect(source, "bid").map((a) => a.bid);
        const result = enough(bids.length) ? calibrateSecondPrice(bids) : null;
        return result ? { artifact: { kind: "second_price", result } } : shortBy(bids.length);
      }

      case "convergence": {
        const values = collect(source, "estimate").map((a) => a.estimate.value);
        const result = enough(values.length)
          ? testConvergence(values, { relativeThreshold: params.relativeThreshold, absoluteFloor: params.absoluteFloor })
          : null;
        return result ? { artifact: { kind: "convergence", result } } : shortBy(values.length);
      }

      case "causal_loops": {
        const perWorker = collect(source, "edges").map((a) => a.edges);
        if (!enough(perWorker.length)) return shortBy(perWorker.length);
        const result = findFeedbackLoops(mergeCausalEdges(perWorker), { maxLength: params.maxLoopLength });
        return { artifact: { kind: "causal_loops", result } };
      }

      case "majority_stage": {
        const perWorker = collect(source, "stage_votes");
        if (!enough(perWorker.length)) return shortBy(perWorker.length);
        const votes = perWorker.flatMap((a) => a.votes);
        const result = tallyMajorityStage(itemIds() ?? ctx.options, params.labels ?? [], votes);
        return { artifact: { kind: "majority_stage", result } };
      }

      case "enumeration": {
        const proposals: Array<{ workerKey: string; items: string[] }> = [];
        for (const [workerKey, outcome] of Object.entries(source.perWorkerOutputs)) {
          if (outcome.ok && outcome.artifact?.kind === "items") proposals.push({ workerKey, items: outcome.artifact.items });
        }
        if (!enough(proposals.length)) return shortBy(proposals.length);
        return { artifact: { kind: "enumeration", items: enumerateItems(proposals, params.prefix) } };
      }

      case "constraint_check": {
        const assents = collect(source, "assent").map((a) => a.assent);
        if (!enough(assents.length)) return shortBy(assents.length);
        const quorum = params.quorum ?? Object.keys(source.perWorkerOutputs).length;
        return { artifact: { kind: "constraint_check", result: checkConstraints(assents, quorum) } };
      }
    }
  }
}

function enumerationIds(ctx: PhaseContext, phaseId: string): string[] | undefined {
  return latestArtifact(ctx.history, phaseId, "enumeration")?.items.map((i) => i.id);
}

function quorumFailure(message: string): Outcome {
  return { failure: { reason: "insufficient_quorum", message } };
}
