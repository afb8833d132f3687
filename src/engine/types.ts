import type { Worker } from "../gateway/base.js";
import type { AggregateArtifact, PhaseResult } from "../protocol/types.js";
import type { CostReport } from "./cost.js";

export type RunStatus =
  | "pending"
  | "running"
  | "succeeded"
  | "succeeded_without_convergence"
  | "failed"
  | "aborted";

export const TERMINAL_STATUSES: ReadonlySet<RunStatus> = new Set([
  "succeeded",
  "succeeded_without_convergence",
  "failed",
  "aborted",
]);

export function isTerminal(status: RunStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface RunSubmission {
  protocolId: string;
  question: string;
  rosterKeys: string[];
  rounds?: number;
  toolsEnabled?: boolean;
  /** Options, choices or initiatives for protocols that declare `requiresOptions` */
  options?: string[];
}

export interface RunError {
  phaseIndex?: number;
  phaseId?: string;
  reason: string;
  message: string;
}

export interface RunTimings {
  startedAt: string;
  completedAt: string;
  elapsedMs: number;
  perPhase: Array<{ phaseIndex: number; phaseId: string; round: number; elapsedMs: number }>;
}

export interface RunResult {
  runId: string;
  protocolId: string;
  catalogueVersion: string;
  question: string;
  roster: Worker[];
  options: string[];
  status: RunStatus;
  /** False when the loop ran out of rounds before its stop predicate held */
  converged: boolean;
  roundsRun: number;
  phaseResults: PhaseResult[];
  /** Last aggregated artifact produced, synthesis when the run got that far */
  finalArtifact: AggregateArtifact | null;
  cost: CostReport;
  timings: RunTimings;
  error?: RunError;
}

/** Live view of a run the coordinator still holds. */
export interface RunSnapshot {
  runId: string;
  protocolId: string;
  question: string;
  status: RunStatus;
  roster: Worker[];
  startedAt: string | null;
  completedAt: string | null;
  phaseResults: readonly PhaseResult[];
}
