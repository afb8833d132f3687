/**
 * Run history store interface.
 *
 * The engine never requires a store; when one is injected the coordinator
 * hands it every finished run. All methods are async so a remote backend
 * can implement the same interface.
 */

import type { RunResult, RunStatus } from "../engine/types.js";

export interface RunSummary {
  runId: string;
  protocolId: string;
  question: string;
  status: RunStatus;
  converged: boolean;
  startedAt: string;
  completedAt: string;
  elapsedMs: number;
  totalTokens: number;
}

export interface ListRunsOptions {
  protocolId?: string;
  status?: RunStatus;
  /** Default 20 */
  limit?: number;
}

export interface IRunStore {
  initialize(): Promise<void>;
  close(): Promise<void>;

  /** Insert or replace the stored result for `result.runId`. */
  saveRun(result: RunResult): Promise<void>;
  getRun(runId: string): Promise<RunResult | null>;
  /** Newest first. */
  listRuns(options?: ListRunsOptions): Promise<RunSummary[]>;
  deleteRun(runId: string): Promise<boolean>;
}
