/**
 * Protocol model.
 *
 * A protocol is a finite phase graph built from five phase kinds. Definitions
 * are plain data plus a few pure functions (prompt builders, branch
 * conditions) and are frozen once the registry has validated them.
 */

import type { FailureReason, ToolCallTrace, TokenUsage, Worker } from "../gateway/base.js";
import type {
  Assent, Ballot, CausalEdge, CausalLoopResult, ConstraintCheckResult, ConvergenceResult,
  EliminationResult, EnumeratedItem, EvidenceCell, Estimate, MajorityStageResult,
  RankedChoiceResult, SealedBid, SecondPriceResult, StageVote,
} from "../aggregation/base.js";

// ── Artifacts ────────────────────────────────────────────────────────────

/** What a fan-out phase expects each worker's text to contain. */
export type ArtifactKind =
  | "text"
  | "ballot"
  | "evidence"
  | "bid"
  | "estimate"
  | "edges"
  | "stage_votes"
  | "items"
  | "assent";

export type WorkerArtifact =
  | { kind: "ballot"; ballot: Ballot }
  | { kind: "evidence"; cells: EvidenceCell[] }
  | { kind: "bid"; bid: SealedBid }
  | { kind: "estimate"; estimate: Estimate }
  | { kind: "edges"; edges: CausalEdge[] }
  | { kind: "stage_votes"; votes: StageVote[] }
  | { kind: "items"; items: string[] }
  | { kind: "assent"; assent: Assent };

export type AggregateArtifact =
  | { kind: "ranked_choice"; result: RankedChoiceResult }
  | { kind: "evidence_elimination"; result: EliminationResult }
  | { kind: "second_price"; result: SecondPriceResult }
  | { kind: "convergence"; result: ConvergenceResult }
  | { kind: "causal_loops"; result: CausalLoopResult }
  | { kind: "majority_stage"; result: MajorityStageResult }
  | { kind: "enumeration"; items: EnumeratedItem[] }
  | { kind: "constraint_check"; result: ConstraintCheckResult }
  | { kind: "llm_aggregate"; workerKey: string; text: string }
  | { kind: "synthesis"; workerKey: string; text: string }
  | { kind: "branch"; condition: boolean; next: string };

export type AggregateKind = AggregateArtifact["kind"];

// ── Phase results ────────────────────────────────────────────────────────

export interface WorkerSuccess {
  ok: true;
  text: string;
  artifact?: WorkerArtifact;
  tokens?: TokenUsage;
  toolCalls?: ToolCallTrace[];
  durationMs: number;
  attempts: number;
}

export interface WorkerFailure {
  ok: false;
  reason: FailureReason;
  message: string;
  durationMs: number;
  attempts: number;
}

export type WorkerOutcome = WorkerSuccess | WorkerFailure;

export type PhaseStatus = "succeeded" | "failed" | "aborted";

export type PhaseFailureReason = "insufficient_quorum" | "worker_failure" | "cancelled" | "no_target";

export interface PhaseFailure {
  reason: PhaseFailureReason;
  message: string;
}

export type PhaseKind = PhaseSpec["kind"];

export interface PhaseResult {
  /** Position in the run's history; strictly increasing */
  phaseIndex: number;
  phaseId: string;
  kind: PhaseKind;
  /** 0 outside the loop, 1..n inside it */
  round: number;
  status: PhaseStatus;
  perWorkerOutputs: Record<string, WorkerOutcome>;
  aggregatedArtifact: AggregateArtifact | null;
  failure?: PhaseFailure;
  elapsedMs: number;
}

// ── Run context seen by prompt builders and conditions ──────────────────

export interface PhaseContext {
  readonly runId: string;
  readonly question: string;
  readonly roster: readonly Worker[];
  /** Caller-supplied options (candidates, initiatives, …), possibly empty */
  readonly options: readonly string[];
  readonly round: number;
  readonly totalRounds: number;
  /** Every PhaseResult recorded so far, oldest first */
  readonly history: readonly PhaseResult[];
}

export type PromptBuilder = (ctx: PhaseContext, worker: Worker) => string;

/** Which roster members a phase addresses. */
export type TargetSelector =
  | "all"
  | "first"
  | readonly string[]
  | ((ctx: PhaseContext) => readonly string[]);

/** Which earlier phases are rendered into a call's prior context. */
export type ContextSelector = "none" | "history" | readonly string[];

export type FailurePolicy = "strict" | "best_effort";

// ── Phase specs ──────────────────────────────────────────────────────────

interface PhaseBase {
  id: string;
  /** Runs together with adjacent phases that are also marked independent */
  independent?: boolean;
}

export interface FanOutPhase extends PhaseBase {
  kind: "fan_out";
  prompt: PromptBuilder;
  /** Default "text" */
  parse?: ArtifactKind;
  /**
   * Enumeration phase whose item ids ballots, bids and stage votes must name;
   * the run's options otherwise
   */
  choicesFrom?: string;
  /** Default "all" */
  targets?: TargetSelector;
  /** Default "best_effort" */
  failurePolicy?: FailurePolicy;
  /** Default 1 */
  minSuccesses?: number;
  /** Default "history" */
  context?: ContextSelector;
}

export interface LlmAggregatePhase extends PhaseBase {
  kind: "llm_aggregate";
  prompt: PromptBuilder;
  /** Phases whose outputs the aggregator reads */
  sources: readonly string[];
  /** Default "first" */
  targets?: TargetSelector;
  parse?: ArtifactKind;
  failurePolicy?: FailurePolicy;
  /** Defaults to `sources` */
  context?: ContextSelector;
}

export type AggregateAlgorithm =
  | "ranked_choice"
  | "evidence_elimination"
  | "second_price"
  | "convergence"
  | "causal_loops"
  | "majority_stage"
  | "enumeration"
  | "constraint_check";

export interface AggregateParams {
  /** Enumeration phase supplying options, hypotheses or subjects; run options otherwise */
  itemsFrom?: string;
  /** Id prefix for enumeration */
  prefix?: string;
  /** Majority-stage label set */
  labels?: readonly string[];
  relativeThreshold?: number;
  absoluteFloor?: number;
  maxLoopLength?: number;
  /** Evidence-elimination rounds */
  eliminationRounds?: number;
  /** Constraint-check assent quorum; defaults to the source phase's target count */
  quorum?: number;
}

export interface AggregatePhase extends PhaseBase {
  kind: "aggregate";
  algorithm: AggregateAlgorithm;
  source: string;
  params?: AggregateParams;
  /** Default 1 */
  minInputs?: number;
}

export interface SynthesizePhase extends PhaseBase {
  kind: "synthesize";
  prompt: PromptBuilder;
  /** Worker key to synthesize; first roster member when absent or unknown */
  synthesizer?: (ctx: PhaseContext) => string | null;
  context?: ContextSelector;
}

export interface BranchPhase extends PhaseBase {
  kind: "branch";
  condition: (ctx: PhaseContext) => boolean;
  onTrue: string;
  onFalse: string;
}

export type PhaseSpec = FanOutPhase | LlmAggregatePhase | AggregatePhase | SynthesizePhase | BranchPhase;

// ── Loop and definition ──────────────────────────────────────────────────

export type StopPredicate =
  | { type: "round_cap" }
  /** Stop once the named convergence aggregate reports convergence */
  | { type: "convergence"; phase: string }
  /** Stop once the named constraint-check aggregate is satisfied */
  | { type: "constraint"; phase: string };

export interface LoopPolicy {
  /** First and last phase ids of the round body, inclusive */
  startPhase: string;
  endPhase: string;
  defaultRounds: number;
  minRounds: number;
  maxRounds: number;
  stop: StopPredicate;
}

export type ProtocolCategory = "synthesis" | "deliberation" | "voting" | "analysis" | "estimation" | "planning";

export interface ProtocolDefinition {
  id: string;
  name: string;
  description: string;
  category: ProtocolCategory;
  minAgents: number;
  maxAgents: number;
  /** What the caller's options list means, when the protocol needs one */
  requiresOptions?: string;
  phases: readonly PhaseSpec[];
  loop?: LoopPolicy;
}

// ── Helpers over history ─────────────────────────────────────────────────

/** Most recent result for a phase id, or undefined when it has not run. */
export function latestResult(history: readonly PhaseResult[], phaseId: string): PhaseResult | undefined {
  for (let i = history.length - 1; i >= 0; i--) {
    if (history[i].phaseId === phaseId) return history[i];
  }
  return undefined;
}

/** Aggregated artifact of the most recent run of `phaseId`, narrowed to `kind`. */
export function latestArtifact<K extends AggregateKind>(
  history: readonly PhaseResult[],
  phaseId: string,
  kind: K,
): Extract<AggregateArtifact, { kind: K }> | undefined {
  const artifact = latestResult(history, phaseId)?.aggregatedArtifact;
  return artifact && isArtifactOfKind(artifact, kind) ? artifact : undefined;
}

function isArtifactOfKind<K extends AggregateKind>(
  artifact: AggregateArtifact,
  kind: K,
): artifact is Extract<AggregateArtifact, { kind: K }> {
  return artifact.kind === kind;
}

/** Successful outputs of a phase result, in roster order of insertion. */
export function successes(result: PhaseResult | undefined): Array<[string, WorkerSuccess]> {
  if (!result) return [];
  const out: Array<[string, WorkerSuccess]> = [];
  for (const [key, outcome] of Object.entries(result.perWorkerOutputs)) {
    if (outcome.ok) out.push([key, outcome]);
  }
  return out;
}
