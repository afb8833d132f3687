import { describe, it, expect } from "vitest";
import { ProtocolRegistry, validateDefinition, segmentOf } from "../protocol/registry.js";
import { CATALOGUE, CATALOGUE_VERSION } from "../protocol/catalogue/index.js";
import { ConfigurationError } from "../errors.js";
import type { PhaseSpec, ProtocolDefinition } from "../protocol/types.js";

const ask: PhaseSpec = { id: "ask", kind: "fan_out", prompt: () => "q" };
const wrap: PhaseSpec = { id: "wrap", kind: "synthesize", prompt: () => "s" };

function def(overrides: Partial<ProtocolDefinition>): ProtocolDefinition {
  return {
    id: "test",
    name: "Test",
    description: "test protocol",
    category: "synthesis",
    minAgents: 1,
    maxAgents: 4,
    phases: [ask, wrap],
    ...overrides,
  };
}

describe("catalogue", () => {
  it("validates every shipped protocol", () => {
    for (const protocol of CATALOGUE) {
      expect(() => validateDefinition(protocol)).not.toThrow();
    }
  });

  it("has ten protocols with unique ids", () => {
    const registry = new ProtocolRegistry();
    expect(registry.list()).toHaveLength(10);
    expect(registry.version).toBe(CATALOGUE_VERSION);
    expect(registry.has("delphi")).toBe(true);
    expect(registry.has("borda_count")).toBe(true);
    expect(registry.has("one_two_four_all")).toBe(true);
  });

  it("freezes definitions", () => {
    const registry = new ProtocolRegistry();
    const delphi = registry.get("delphi");
    expect(Object.isFrozen(delphi)).toBe(true);
    expect(Object.isFrozen(delphi.phases)).toBe(true);
  });

  it("summarizes loop settings", () => {
    const summary = new ProtocolRegistry().summaries().find((s) => s.id === "delphi");
    expect(summary?.rounds).toEqual({ default: 3, min: 1, max: 6, stop: "convergence(convergence)" });
    expect(summary?.phases).toEqual(["estimates (fan_out)", "convergence (aggregate)", "report (synthesize)"]);
  });

  it("rejects unknown ids", () => {
    const registry = new ProtocolRegistry();
    expect(() => registry.get("nope")).toThrow(ConfigurationError);
  });

  it("rejects duplicate protocol ids", () => {
    expect(() => new ProtocolRegistry([def({}), def({})])).toThrow('duplicate protocol id "test"');
  });
});

describe("validateDefinition", () => {
  it("rejects duplicate phase ids", () => {
    expect(() => validateDefinition(def({ phases: [ask, ask] }))).toThrow('protocol "test": duplicate phase id "ask"');
  });

  it("rejects inverted agent bounds", () => {
    expect(() => validateDefinition(def({ minAgents: 3, maxAgents: 2 }))).toThrow("maxAgents must be >= minAgents");
  });

  it("rejects reads from phases that run later", () => {
    const tally: PhaseSpec = { id: "tally", kind: "aggregate", algorithm: "ranked_choice", source: "ask" };
    expect(() => validateDefinition(def({ phases: [tally, ask] }))).toThrow(
      'phase "tally" reads "ask", which does not run before it',
    );
  });

  it("rejects a stop phase of the wrong algorithm", () => {
    const tally: PhaseSpec = { id: "tally", kind: "aggregate", algorithm: "ranked_choice", source: "ask" };
    const bad = def({
      phases: [ask, tally, wrap],
      loop: {
        startPhase: "ask",
        endPhase: "tally",
        defaultRounds: 2,
        minRounds: 1,
        maxRounds: 3,
        stop: { type: "convergence", phase: "tally" },
      },
    });
    expect(() => validateDefinition(bad)).toThrow('stop phase "tally" must be a convergence aggregate');
  });

  it("rejects default rounds outside the range", () => {
    const bad = def({
      loop: { startPhase: "ask", endPhase: "ask", defaultRounds: 5, minRounds: 1, maxRounds: 3, stop: { type: "round_cap" } },
    });
    expect(() => validateDefinition(bad)).toThrow("minRounds <= defaultRounds <= maxRounds");
  });

  it("rejects backward branches", () => {
    const branch: PhaseSpec = { id: "check", kind: "branch", condition: () => true, onTrue: "ask", onFalse: "wrap" };
    expect(() => validateDefinition(def({ phases: [ask, branch, wrap] }))).toThrow(
      'branch "check" must jump forward, not to "ask"',
    );
  });

  it("rejects branches that leave the loop body", () => {
    const branch: PhaseSpec = { id: "check", kind: "branch", condition: () => true, onTrue: "more", onFalse: "wrap" };
    const more: PhaseSpec = { id: "more", kind: "fan_out", prompt: () => "m" };
    const bad = def({
      phases: [ask, branch, more, wrap],
      loop: { startPhase: "ask", endPhase: "more", defaultRounds: 1, minRounds: 1, maxRounds: 2, stop: { type: "round_cap" } },
    });
    expect(() => validateDefinition(bad)).toThrow('branch "check" jumps across the loop boundary');
  });

  it("rejects an independent phase reading its own group", () => {
    const a: PhaseSpec = { id: "a", kind: "fan_out", prompt: () => "a", independent: true };
    const b: PhaseSpec = { id: "b", kind: "fan_out", prompt: () => "b", independent: true, context: ["a"] };
    expect(() => validateDefinition(def({ phases: [a, b, wrap] }))).toThrow(
      'independent phase "b" reads "a" from its own group',
    );
  });

  it("places phases in loop segments", () => {
    const delphi = new ProtocolRegistry().get("delphi");
    expect([0, 1, 2].map((i) => segmentOf(delphi, i))).toEqual([1, 1, 2]);
  });
});
