/**
 * SQLite run store tests: save, replace, lookup, listing and delete.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { SqliteRunStore } from "../store/sqlite.js";
import { CostAccumulator } from "../engine/cost.js";
import type { RunResult, RunStatus } from "../engine/types.js";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

let store: SqliteRunStore;
let tmpDir: string;

beforeEach(async () => {
  tmpDir = mkdtempSync(join(tmpdir(), "conclave-test-"));
  store = new SqliteRunStore(join(tmpDir, "nested", "runs.db"));
  await store.initialize();
});

afterEach(async () => {
  await store.close();
  rmSync(tmpDir, { recursive: true, force: true });
});

// --- Helper ---

function makeResult(runId: string, completedAt: string, overrides: Partial<RunResult> = {}): RunResult {
  const cost = new CostAccumulator();
  cost.record("w1", "ask", { inputTokens: 100, outputTokens: 20 });
  const status: RunStatus = "succeeded";
  return {
    runId,
    protocolId: "parallel_synthesis",
    catalogueVersion: "1",
    question: `question for ${runId}`,
    roster: [{ key: "w1", displayName: "W1", roleContext: "" }],
    options: [],
    status,
    converged: true,
    roundsRun: 0,
    phaseResults: [],
    finalArtifact: { kind: "synthesis", workerKey: "w1", text: "done" },
    cost: cost.report(),
    timings: { startedAt: completedAt, completedAt, elapsedMs: 42, perPhase: [] },
    ...overrides,
  };
}

describe("SqliteRunStore", () => {
  it("round-trips a saved result", async () => {
    const result = makeResult("run-a", "2026-01-01T10:00:00.000Z");
    await store.saveRun(result);
    expect(await store.getRun("run-a")).toEqual(result);
  });

  it("returns null for an unknown run", async () => {
    expect(await store.getRun("missing")).toBeNull();
  });

  it("replaces a result saved twice under the same id", async () => {
    await store.saveRun(makeResult("run-a", "2026-01-01T10:00:00.000Z"));
    await store.saveRun(makeResult("run-a", "2026-01-01T10:00:00.000Z", { status: "failed", converged: false }));

    const runs = await store.listRuns();
    expect(runs).toHaveLength(1);
    expect(runs[0]).toMatchObject({ runId: "run-a", status: "failed", converged: false });
  });

  it("lists summaries newest first", async () => {
    await store.saveRun(makeResult("run-old", "2026-01-01T10:00:00.000Z"));
    await store.saveRun(makeResult("run-new", "2026-01-02T10:00:00.000Z"));

    const runs = await store.listRuns();

    expect(runs.map((r) => r.runId)).toEqual(["run-new", "run-old"]);
    expect(runs[0]).toEqual({
      runId: "run-new",
      protocolId: "parallel_synthesis",
      question: "question for run-new",
      status: "succeeded",
      converged: true,
      startedAt: "2026-01-02T10:00:00.000Z",
      completedAt: "2026-01-02T10:00:00.000Z",
      elapsedMs: 42,
      totalTokens: 120,
    });
  });

  it("filters by protocol and status, and honours the limit", async () => {
    await store.saveRun(makeResult("run-1", "2026-01-01T10:00:00.000Z"));
    await store.saveRun(makeResult("run-2", "2026-01-02T10:00:00.000Z", { protocolId: "delphi" }));
    await store.saveRun(makeResult("run-3", "2026-01-03T10:00:00.000Z", { protocolId: "delphi", status: "aborted" }));

    expect((await store.listRuns({ protocolId: "delphi" })).map((r) => r.runId)).toEqual(["run-3", "run-2"]);
    expect((await store.listRuns({ protocolId: "delphi", status: "aborted" })).map((r) => r.runId)).toEqual(["run-3"]);
    expect((await store.listRuns({ limit: 1 })).map((r) => r.runId)).toEqual(["run-3"]);
  });

  it("deletes runs", async () => {
    await store.saveRun(makeResult("run-a", "2026-01-01T10:00:00.000Z"));
    expect(await store.deleteRun("run-a")).toBe(true);
    expect(await store.deleteRun("run-a")).toBe(false);
    expect(await store.getRun("run-a")).toBeNull();
  });
});
