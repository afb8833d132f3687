/**
 * SQLite run store using better-sqlite3.
 *
 * One row per run: indexed summary columns plus the full result as JSON.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { RunResult, RunStatus } from "../engine/types.js";
import { totalTokenCount } from "../engine/cost.js";
import type { IRunStore, ListRunsOptions, RunSummary } from "./interfaces.js";

interface RunRow {
  run_id: string;
  protocol_id: string;
  question: string;
  status: RunStatus;
  converged: number;
  started_at: string;
  completed_at: string;
  elapsed_ms: number;
  total_tokens: number;
  result_json: string;
}

type SummaryRow = Omit<RunRow, "result_json">;

function toSummary(row: SummaryRow): RunSummary {
  return {
    runId: row.run_id,
    protocolId: row.protocol_id,
    question: row.question,
    status: row.status,
    converged: row.converged === 1,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    elapsedMs: row.elapsed_ms,
    totalTokens: row.total_tokens,
  };
}

function reviveResult(json: string): RunResult {
  const result: RunResult = JSON.parse(json);
  return result;
}

export class SqliteRunStore implements IRunStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
  }

  async initialize(): Promise<void> {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id TEXT PRIMARY KEY,
        protocol_id TEXT NOT NULL,
        question TEXT NOT NULL,
        status TEXT NOT NULL,
        converged INTEGER NOT NULL DEFAULT 0,
        started_at TEXT NOT NULL,
        completed_at TEXT NOT NULL,
        elapsed_ms INTEGER NOT NULL DEFAULT 0,
        total_tokens INTEGER NOT NULL DEFAULT 0,
        result_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_runs_protocol_completed ON runs(protocol_id, completed_at);
      CREATE INDEX IF NOT EXISTS idx_runs_completed ON runs(completed_at);
    `);
  }

  async close(): Promise<void> {
    this.db.close();
  }

  async saveRun(result: RunResult): Promise<void> {
    this.db
      .prepare(`
        INSERT OR REPLACE INTO runs
          (run_id, protocol_id, question, status, converged, started_at, completed_at, elapsed_ms, total_tokens, result_json)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        result.runId,
        result.protocolId,
        result.question,
        result.status,
        result.converged ? 1 : 0,
        result.timings.startedAt,
        result.timings.completedAt,
        result.timings.elapsedMs,
        totalTokenCount(result.cost.totalTokens),
        JSON.stringify(result),
      );
  }

  async getRun(runId: string): Promise<RunResult | null> {
    const row = this.db
      .prepare<[string], Pick<RunRow, "result_json">>("SELECT result_json FROM runs WHERE run_id = ?")
      .get(runId);
    return row ? reviveResult(row.result_json) : null;
  }

  async listRuns(options: ListRunsOptions = {}): Promise<RunSummary[]> {
    const where: string[] = [];
    const params: Array<string | number> = [];
    if (options.protocolId) {
      where.push("protocol_id = ?");
      params.push(options.protocolId);
    }
    if (options.status) {
      where.push("status = ?");
      params.push(options.status);
    }
    params.push(Math.max(1, options.limit ?? 20));

    const sql =
      "SELECT run_id, protocol_id, question, status, converged, started_at, completed_at, elapsed_ms, total_tokens FROM runs" +
      (where.length > 0 ? ` WHERE ${where.join(" AND ")}` : "") +
      " ORDER BY completed_at DESC, rowid DESC LIMIT ?";
    const rows = this.db.prepare<Array<string | number>, SummaryRow>(sql).all(...params);
    return rows.map(toSummary);
  }

  async deleteRun(runId: string): Promise<boolean> {
    const info = this.db.prepare<[string]>("DELETE FROM runs WHERE run_id = ?").run(runId);
    return info.changes > 0;
  }
}
