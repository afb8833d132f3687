import { describe, it, expect } from "vitest";
import { PhaseExecutor, type ExecutionContext, type ExecutorSettings } from "../engine/phase-executor.js";
import { ConcurrencyLimiter } from "../engine/concurrency.js";
import { CostAccumulator } from "../engine/cost.js";
import { RunEventStream, type RunEvent } from "../engine/events.js";
import type { IWorkerGateway } from "../gateway/base.js";
import type { AggregatePhase, FanOutPhase, PhaseResult, PhaseSpec } from "../protocol/types.js";
import { FakeGateway, fail, reply, stall, worker } from "./fake-gateway.js";

const roster = [worker("w1"), worker("w2")];

function setup(gateway: IWorkerGateway, overrides: Partial<ExecutorSettings> = {}) {
  const stream = new RunEventStream("run-1");
  const events: RunEvent[] = [];
  stream.subscribe((e) => events.push(e));
  const cost = new CostAccumulator();
  const executor = new PhaseExecutor({
    gateway,
    limiter: new ConcurrencyLimiter(4),
    settings: { timeoutMs: 1000, retries: 0, retryBaseMs: 0, evidenceTiePolicy: "eliminate_none", ...overrides },
    stream,
    cost,
  });
  return { executor, events, cost };
}

function context(overrides: Partial<ExecutionContext> = {}): ExecutionContext {
  return {
    runId: "run-1",
    question: "Which option?",
    roster,
    options: ["A", "B"],
    round: 0,
    totalRounds: 0,
    history: [],
    toolsEnabled: false,
    signal: new AbortController().signal,
    ...overrides,
  };
}

const ask: FanOutPhase = { id: "ask", kind: "fan_out", prompt: (_ctx, w) => `Hello ${w.key}` };

describe("PhaseExecutor: fan-out", () => {
  it("collects every worker's text and publishes worker_output", async () => {
    const gateway = new FakeGateway((inv) => reply(`answer from ${inv.worker.key}`));
    const { executor, events } = setup(gateway);

    const result = await executor.execute(ask, 0, context());

    expect(result.status).toBe("succeeded");
    expect(result.perWorkerOutputs.w1).toMatchObject({ ok: true, text: "answer from w1", attempts: 1 });
    expect(gateway.callsFor("w2")[0].prompt).toBe("Hello w2");
    expect(events[0]).toMatchObject({ type: "phase_start", payload: { phaseIndex: 0, phaseId: "ask", kind: "fan_out", round: 0 } });
    expect(events.filter((e) => e.type === "worker_output")).toHaveLength(2);
  });

  it("keeps going under best_effort when one worker fails", async () => {
    const gateway = new FakeGateway((inv) => (inv.worker.key === "w2" ? fail("unavailable", "down") : reply("ok")));
    const { executor, events } = setup(gateway);

    const result = await executor.execute(ask, 0, context());

    expect(result.status).toBe("succeeded");
    expect(result.perWorkerOutputs.w2).toMatchObject({ ok: false, reason: "unavailable", message: "down", attempts: 1 });
    const failure = events.find((e) => e.type === "worker_failure");
    expect(failure?.payload).toEqual({ workerKey: "w2", phaseIndex: 0, reason: "unavailable", message: "down" });
  });

  it("fails a strict phase on any worker failure", async () => {
    const gateway = new FakeGateway((inv) => (inv.worker.key === "w2" ? fail("unavailable") : reply("ok")));
    const { executor } = setup(gateway);

    const result = await executor.execute({ ...ask, failurePolicy: "strict" }, 0, context());

    expect(result.status).toBe("failed");
    expect(result.failure).toEqual({ reason: "worker_failure", message: "1/2 workers failed" });
  });

  it("fails below minSuccesses", async () => {
    const gateway = new FakeGateway((inv) => (inv.worker.key === "w2" ? fail("unavailable") : reply("ok")));
    const { executor } = setup(gateway);

    const result = await executor.execute({ ...ask, minSuccesses: 2 }, 0, context());

    expect(result.failure).toEqual({ reason: "insufficient_quorum", message: "1 of 2 workers answered, 2 required" });
  });

  it("fails with no_target when nobody matches", async () => {
    const { executor } = setup(new FakeGateway(() => reply("ok")));
    const result = await executor.execute({ ...ask, targets: ["nobody"] }, 0, context());
    expect(result.failure?.reason).toBe("no_target");
  });

  it("retries transient failures", async () => {
    const gateway = new FakeGateway((_inv, attempt) => (attempt === 1 ? fail("rate_limited") : reply("second try")));
    const { executor, cost } = setup(gateway, { retries: 1 });

    const result = await executor.execute({ ...ask, targets: ["w1"] }, 0, context());

    expect(result.perWorkerOutputs.w1).toMatchObject({ ok: true, text: "second try", attempts: 2 });
    expect(gateway.callsFor("w1")).toHaveLength(2);
    expect(cost.report().calls).toBe(2);
  });

  it("gives up after the retry budget", async () => {
    const gateway = new FakeGateway(() => fail("timeout"));
    const { executor } = setup(gateway, { retries: 2 });

    const result = await executor.execute({ ...ask, targets: ["w1"] }, 0, context());

    expect(result.perWorkerOutputs.w1).toMatchObject({ ok: false, reason: "timeout", attempts: 3 });
    expect(gateway.calls).toHaveLength(3);
  });

  it("enforces the timeout even when the gateway never answers", async () => {
    const gateway = new FakeGateway((inv) => stall(inv));
    const { executor } = setup(gateway, { timeoutMs: 20 });

    const result = await executor.execute({ ...ask, targets: ["w1"] }, 0, context());

    expect(result.perWorkerOutputs.w1).toMatchObject({ ok: false, reason: "timeout", message: "no response within 20ms" });
    expect(gateway.calls[0].signal?.aborted).toBe(true);
  });

  it("marks unparseable artifacts malformed without retrying", async () => {
    const gateway = new FakeGateway(() => reply("I prefer A, honestly."));
    const { executor } = setup(gateway, { retries: 2 });

    const result = await executor.execute({ ...ask, parse: "ballot", targets: ["w1"] }, 0, context());

    expect(result.perWorkerOutputs.w1).toMatchObject({ ok: false, reason: "malformed", attempts: 1 });
    expect(gateway.calls).toHaveLength(1);
  });

  it("aborts a strict phase when the run is cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const gateway = new FakeGateway(() => reply("ok"));
    const { executor } = setup(gateway);

    const result = await executor.execute({ ...ask, failurePolicy: "strict" }, 0, context({ signal: controller.signal }));

    expect(result.status).toBe("aborted");
    expect(result.failure?.reason).toBe("cancelled");
    expect(gateway.calls).toHaveLength(0);
  });

  it("records token usage per worker and phase", async () => {
    const gateway = new FakeGateway(() => reply("ok", { inputTokens: 10, outputTokens: 5 }));
    const { executor, cost } = setup(gateway);

    await executor.execute(ask, 0, context());

    const report = cost.report();
    expect(report.totalTokens).toMatchObject({ inputTokens: 20, outputTokens: 10 });
    expect(report.perWorker.w1).toMatchObject({ inputTokens: 10, outputTokens: 5 });
    expect(report.perPhase.ask).toMatchObject({ inputTokens: 20, outputTokens: 10 });
  });

  it("renders earlier phases into prior context", async () => {
    const earlier: PhaseResult = {
      phaseIndex: 0,
      phaseId: "opening",
      kind: "fan_out",
      round: 0,
      status: "succeeded",
      perWorkerOutputs: { w1: { ok: true, text: "I back A.", durationMs: 1, attempts: 1 } },
      aggregatedArtifact: null,
      elapsedMs: 1,
    };
    const gateway = new FakeGateway(() => reply("ok"));
    const { executor } = setup(gateway);

    await executor.execute({ ...ask, targets: ["w2"] }, 1, context({ history: [earlier] }));

    expect(gateway.calls[0].priorContext).toEqual(["[opening]\nw1:\nI back A."]);
  });
});

describe("PhaseExecutor: aggregate and synthesize", () => {
  const ballots: FanOutPhase = { id: "ballots", kind: "fan_out", parse: "ballot", prompt: () => "rank" };
  const tally: AggregatePhase = { id: "tally", kind: "aggregate", algorithm: "ranked_choice", source: "ballots" };

  it("tallies parsed ballots from the source phase", async () => {
    const gateway = new FakeGateway(() => reply('{"ranking": ["A", "B"]}'));
    const { executor, events } = setup(gateway);

    const first = await executor.execute(ballots, 0, context());
    const result = await executor.execute(tally, 1, context({ history: [first] }));

    expect(result.status).toBe("succeeded");
    expect(result.aggregatedArtifact?.kind).toBe("ranked_choice");
    if (result.aggregatedArtifact?.kind === "ranked_choice") {
      expect(result.aggregatedArtifact.result.winner).toBe("A");
      expect(result.aggregatedArtifact.result.standings.map((s) => s.score)).toEqual([2, 0]);
    }
    expect(events.some((e) => e.type === "aggregate_result")).toBe(true);
  });

  it("counts ballots whose entries differ from the options only in case or punctuation", async () => {
    const rankings: Record<string, string[]> = {
      w1: ["postgres", "kafka"],
      w2: ["Kafka", "Postgres"],
      w3: ["postgres.", "Kafka"],
    };
    const gateway = new FakeGateway((inv) => reply(JSON.stringify({ ranking: rankings[inv.worker.key] })));
    const { executor } = setup(gateway);
    const ctx = context({ roster: [...roster, worker("w3")], options: ["Postgres", "Kafka"] });

    const first = await executor.execute(ballots, 0, ctx);
    const result = await executor.execute(tally, 1, { ...ctx, history: [first] });

    expect(result.aggregatedArtifact?.kind).toBe("ranked_choice");
    if (result.aggregatedArtifact?.kind === "ranked_choice") {
      expect(result.aggregatedArtifact.result.winner).toBe("Postgres");
      expect(result.aggregatedArtifact.result.standings.map((s) => [s.option, s.score])).toEqual([
        ["Postgres", 2],
        ["Kafka", 1],
      ]);
      expect(result.aggregatedArtifact.result.ballotsCounted).toBe(3);
    }
  });

  it("drops a ballot naming an unknown option as malformed", async () => {
    const gateway = new FakeGateway((inv) =>
      reply(JSON.stringify({ ranking: inv.worker.key === "w1" ? ["Postgres", "Kafka"] : ["Redis", "Kafka"] })),
    );
    const { executor } = setup(gateway);
    const ctx = context({ options: ["Postgres", "Kafka"] });

    const first = await executor.execute(ballots, 0, ctx);
    const result = await executor.execute(tally, 1, { ...ctx, history: [first] });

    expect(first.perWorkerOutputs.w2).toMatchObject({
      ok: false,
      reason: "malformed",
      message: 'option "Redis" matches none of: Postgres, Kafka',
    });
    if (result.aggregatedArtifact?.kind === "ranked_choice") {
      expect(result.aggregatedArtifact.result.ballotsCounted).toBe(1);
      expect(result.aggregatedArtifact.result.winner).toBe("Postgres");
    }
    expect(result.aggregatedArtifact?.kind).toBe("ranked_choice");
  });

  it("fails when the source has too few usable inputs", async () => {
    const gateway = new FakeGateway((inv) => reply(inv.worker.key === "w1" ? '{"ranking": ["A"]}' : "no ballot"));
    const { executor } = setup(gateway);

    const first = await executor.execute(ballots, 0, context());
    const result = await executor.execute({ ...tally, minInputs: 2 }, 1, context({ history: [first] }));

    expect(result.status).toBe("failed");
    expect(result.failure).toEqual({
      reason: "insufficient_quorum",
      message: '1 usable inputs from "ballots", 2 required',
    });
  });

  it("fails when the source never ran", async () => {
    const { executor } = setup(new FakeGateway(() => reply("ok")));
    const result = await executor.execute(tally, 0, context());
    expect(result.failure?.message).toBe('source phase "ballots" produced no usable output');
  });

  it("synthesizes with the chosen worker", async () => {
    const gateway = new FakeGateway((inv) => reply(`summary by ${inv.worker.key}`));
    const { executor, events } = setup(gateway);
    const phase: PhaseSpec = { id: "wrap", kind: "synthesize", prompt: () => "sum up", synthesizer: () => "w2" };

    const result = await executor.execute(phase, 0, context());

    expect(result.aggregatedArtifact).toEqual({ kind: "synthesis", workerKey: "w2", text: "summary by w2" });
    expect(events.find((e) => e.type === "synthesis")?.payload).toEqual({ phaseIndex: 0, workerKey: "w2", text: "summary by w2" });
  });

  it("falls back to the first roster member for an unknown synthesizer", async () => {
    const gateway = new FakeGateway((inv) => reply(`summary by ${inv.worker.key}`));
    const { executor } = setup(gateway);
    const phase: PhaseSpec = { id: "wrap", kind: "synthesize", prompt: () => "sum up", synthesizer: () => "ghost" };

    const result = await executor.execute(phase, 0, context());

    expect(result.aggregatedArtifact).toEqual({ kind: "synthesis", workerKey: "w1", text: "summary by w1" });
  });

  it("evaluates branch conditions", async () => {
    const { executor } = setup(new FakeGateway(() => reply("ok")));
    const phase: PhaseSpec = {
      id: "check",
      kind: "branch",
      condition: (ctx) => ctx.options.length > 1,
      onTrue: "more",
      onFalse: "done",
    };
    const result = await executor.execute(phase, 0, context());
    expect(result.aggregatedArtifact).toEqual({ kind: "branch", condition: true, next: "more" });
  });
});
