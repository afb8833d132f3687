import { describe, it, expect } from "vitest";
import { ConfigSchema } from "../config.js";
import { CostAccumulator } from "../engine/cost.js";
import type { RunEvent } from "../engine/events.js";
import type { RunResult } from "../engine/types.js";
import { ProtocolRegistry } from "../protocol/registry.js";
import { createRuntime, formatEvent, formatProtocol, formatResult, formatRunSummary } from "../runtime.js";
import { MemoryStore } from "./memory-store.js";

function result(overrides: Partial<RunResult> = {}): RunResult {
  return {
    runId: "run-1",
    protocolId: "delphi",
    catalogueVersion: "1",
    question: "How many weeks?",
    roster: [],
    options: [],
    status: "succeeded",
    converged: true,
    roundsRun: 2,
    phaseResults: [],
    finalArtifact: { kind: "synthesis", workerKey: "w1", text: "Ship in 6 weeks." },
    cost: new CostAccumulator().report(),
    timings: { startedAt: "2026-03-01T09:00:00.000Z", completedAt: "2026-03-01T09:00:01.500Z", elapsedMs: 1500, perPhase: [] },
    ...overrides,
  };
}

describe("createRuntime", () => {
  it("builds a coordinator over the enabled workers and initializes the store", async () => {
    const config = ConfigSchema.parse({
      workers: [
        { key: "a", model: "m" },
        { key: "b", model: "m", enabled: false },
        { key: "c", model: "m" },
      ],
    });
    const store = new MemoryStore();

    const runtime = await createRuntime(config, store);

    expect(runtime.defaultRoster).toEqual(["a", "c"]);
    expect(runtime.store).toBe(store);
    expect(store.initialized).toBe(true);
    expect(() =>
      runtime.coordinator.submit({ protocolId: "parallel_synthesis", question: "q", rosterKeys: ["a", "b"] }),
    ).toThrow("unknown worker(s): b. Known: a, c");
  });
});

describe("renderings", () => {
  it("formats a protocol summary", () => {
    const delphi = new ProtocolRegistry().summaries().find((s) => s.id === "delphi");
    expect(delphi && formatProtocol(delphi)).toBe(
      "delphi [estimation] 3-10 workers | rounds 3 (1-6, stop: convergence(convergence))\n" +
        "  Rounds of anonymous numeric estimates with quartile feedback until the interquartile range converges.",
    );
  });

  it("formats a finished run", () => {
    expect(formatResult(result())).toBe(
      "**delphi**: succeeded after 2 round(s)\n\nShip in 6 weeks.\n\n---\nRun run-1 | 0 phases | 1.5s | Tokens: 0",
    );
  });

  it("includes the error of a failed run", () => {
    const failed = result({
      status: "failed",
      roundsRun: 0,
      finalArtifact: null,
      error: { reason: "insufficient_quorum", message: "0 of 3 workers answered, 1 required" },
    });
    expect(formatResult(failed).split("\n").slice(0, 5)).toEqual([
      "**delphi**: failed",
      "",
      "(no artifact)",
      "",
      "Error (insufficient_quorum): 0 of 3 workers answered, 1 required",
    ]);
  });

  it("formats events and hides synthesis", () => {
    const base = { runId: "run-1", seq: 3, timestamp: "2026-03-01T09:00:00.000Z" };
    const phaseStart: RunEvent = {
      ...base,
      type: "phase_start",
      payload: { phaseIndex: 2, phaseId: "estimates", kind: "fan_out", round: 2 },
    };
    const synthesis: RunEvent = { ...base, type: "synthesis", payload: { phaseIndex: 4, workerKey: "w1", text: "x" } };

    expect(formatEvent(phaseStart)).toBe("  [round 2] estimates (fan_out)");
    expect(formatEvent(synthesis)).toBeNull();
  });

  it("formats a stored run summary", () => {
    expect(
      formatRunSummary({
        runId: "run-1",
        protocolId: "delphi",
        question: "How many weeks?",
        status: "succeeded",
        converged: true,
        startedAt: "2026-03-01T09:00:00.000Z",
        completedAt: "2026-03-01T09:00:01.500Z",
        elapsedMs: 1500,
        totalTokens: 0,
      }),
    ).toBe("run-1  2026-03-01T09:00:01  delphi  succeeded  How many weeks?");
  });
});
