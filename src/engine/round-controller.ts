/**
 * RoundController: walks one run's phase graph.
 *
 * States: init → phase_running → round_check → (phase_running | synthesizing) → done.
 * Phases before the loop run once, the loop body runs once per round until
 * the stop predicate holds or the round count is spent, and the tail runs
 * once. History is append-only; every prompt sees all earlier rounds.
 */

import { InvariantError } from "../errors.js";
import { createLogger } from "../logger.js";
import {
  latestResult,
  type PhaseResult, type PhaseSpec, type ProtocolDefinition, type StopPredicate,
} from "../protocol/types.js";
import type { RunEventStream } from "./events.js";
import type { ExecutionContext, PhaseExecutor } from "./phase-executor.js";

const log = createLogger("controller");

export type ControllerState = "init" | "phase_running" | "round_check" | "synthesizing" | "done";

export interface ControllerFailure {
  phaseIndex: number;
  phaseId: string;
  reason: string;
  message: string;
}

export interface ControllerOutcome {
  status: "completed" | "failed" | "aborted";
  /** Whether the stop predicate held (always true without a loop or under round_cap) */
  converged: boolean;
  roundsRun: number;
  failure?: ControllerFailure;
}

export type RunFrame = Omit<ExecutionContext, "round" | "totalRounds" | "history">;

type SegmentOutcome = { kind: "ok" } | { kind: "aborted" } | { kind: "failed"; failure: ControllerFailure };

export class RoundController {
  private state: ControllerState = "init";
  private rounds = 0;

  constructor(
    private readonly def: ProtocolDefinition,
    private readonly executor: PhaseExecutor,
    private readonly frame: RunFrame,
    private readonly totalRounds: number,
    private readonly stream: RunEventStream,
    /** Owned by the caller; this controller only appends */
    private readonly history: PhaseResult[],
  ) {}

  get roundsRun(): number {
    return this.rounds;
  }

  /** @throws InvariantError when called a second time */
  async run(): Promise<ControllerOutcome> {
    if (this.state !== "init") throw new InvariantError(`${this.def.id}: controller already ${this.state}`);
    const { phases, loop } = this.def;
    const start = loop ? phases.findIndex((p) => p.id === loop.startPhase) : phases.length;
    const end = loop ? phases.findIndex((p) => p.id === loop.endPhase) : phases.length - 1;

    this.state = "phase_running";
    const head = await this.runSegment(0, start, 0);
    if (head.kind !== "ok") return this.finish(head, false);

    let converged = true;
    if (loop) {
      converged = false;
      for (let round = 1; round <= this.totalRounds; round++) {
        this.state = "phase_running";
        const body = await this.runSegment(start, end + 1, round);
        if (body.kind !== "ok") return this.finish(body, false);

        this.state = "round_check";
        this.rounds = round;
        this.stream.publish({ type: "round_boundary", payload: { roundNumber: round } });
        if (this.stopHolds(loop.stop, round)) {
          log.info(`${this.def.id}: stop predicate met after round ${round}`);
          converged = true;
          break;
        }
      }
      if (loop.stop.type === "round_cap") converged = true;
      if (!converged) log.info(`${this.def.id}: ${this.totalRounds} rounds without meeting ${loop.stop.type}`);

      this.state = "synthesizing";
      const tail = await this.runSegment(end + 1, phases.length, 0);
      if (tail.kind !== "ok") return this.finish(tail, converged);
    }

    return this.finish({ kind: "ok" }, converged);
  }

  private finish(outcome: SegmentOutcome, converged: boolean): ControllerOutcome {
    this.state = "done";
    switch (outcome.kind) {
      case "ok":
        return { status: "completed", converged, roundsRun: this.rounds };
      case "aborted":
        return { status: "aborted", converged, roundsRun: this.rounds };
      case "failed":
        return { status: "failed", converged, roundsRun: this.rounds, failure: outcome.failure };
    }
  }

  private stopHolds(stop: StopPredicate, round: number): boolean {
    if (stop.type === "round_cap") return false;
    const result = latestResult(this.history, stop.phase);
    if (!result || result.round !== round) return false;
    const artifact = result.aggregatedArtifact;
    if (stop.type === "convergence") return artifact?.kind === "convergence" && artifact.result.converged;
    return artifact?.kind === "constraint_check" && artifact.result.satisfied;
  }

  /**
   * Run phases [from, to). Consecutive independent phases run together on
   * the same history snapshot and are appended in declaration order.
   * A branch result moves the cursor to its target.
   */
  private async runSegment(from: number, to: number, round: number): Promise<SegmentOutcome> {
    const { phases } = this.def;
    let i = from;

    while (i < to) {
      if (this.frame.signal.aborted) return { kind: "aborted" };

      let j = i + 1;
      if (phases[i].independent) {
        while (j < to && phases[j].independent) j++;
      }
      const group: PhaseSpec[] = phases.slice(i, j);
      const ctx: ExecutionContext = {
        ...this.frame,
        round,
        totalRounds: this.totalRounds,
        history: [...this.history],
      };
      const base = this.history.length;
      const results = await Promise.all(group.map((phase, k) => this.executor.execute(phase, base + k, ctx)));
      this.history.push(...results);

      for (const result of results) {
        if (result.status === "aborted") return { kind: "aborted" };
        if (result.status === "failed") {
          if (this.frame.signal.aborted) return { kind: "aborted" };
          return {
            kind: "failed",
            failure: {
              phaseIndex: result.phaseIndex,
              phaseId: result.phaseId,
              reason: result.failure?.reason ?? "phase_failed",
              message: result.failure?.message ?? `phase ${result.phaseId} failed`,
            },
          };
        }
      }
      if (this.frame.signal.aborted) return { kind: "aborted" };

      const last = results[results.length - 1].aggregatedArtifact;
      if (last?.kind === "branch") {
        const target = phases.findIndex((p) => p.id === last.next);
        log.debug(`${this.def.id}: branch → ${last.next}`);
        i = target > i ? target : j;
      } else {
        i = j;
      }
    }
    return { kind: "ok" };
  }
}

