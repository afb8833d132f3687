import type { ProtocolDefinition } from "../types.js";
import { latestArtifact } from "../types.js";
import { JSON_ONLY, itemsBlock, lines, questionBlock, roleLine } from "./prompts.js";

/** Analysis of competing hypotheses: hypotheses are judged by what contradicts them. */
export const ach: ProtocolDefinition = {
  id: "ach",
  name: "Analysis of Competing Hypotheses",
  description:
    "Enumerate hypotheses and evidence, score every pair, and eliminate the hypothesis with the most inconsistent evidence.",
  category: "analysis",
  minAgents: 3,
  maxAgents: 8,
  phases: [
    {
      id: "hypotheses",
      kind: "fan_out",
      parse: "items",
      context: "none",
      prompt: (ctx, worker) =>
        lines(
          roleLine(worker),
          questionBlock(ctx),
          "Propose mutually exclusive hypotheses that could answer the question, including unpopular ones.",
          `${JSON_ONLY} Format: {"items": ["hypothesis", ...]}`,
        ),
    },
    { id: "hypothesis_list", kind: "aggregate", algorithm: "enumeration", source: "hypotheses", params: { prefix: "H" } },
    {
      id: "evidence",
      kind: "fan_out",
      parse: "items",
      context: ["hypothesis_list"],
      prompt: (ctx, worker) =>
        lines(
          roleLine(worker),
          questionBlock(ctx),
          itemsBlock(ctx, "hypothesis_list", "Hypotheses"),
          "List facts, observations and assumptions that bear on these hypotheses.",
          `${JSON_ONLY} Format: {"items": ["evidence", ...]}`,
        ),
    },
    { id: "evidence_list", kind: "aggregate", algorithm: "enumeration", source: "evidence", params: { prefix: "E" } },
    {
      id: "matrix",
      kind: "fan_out",
      parse: "evidence",
      context: "none",
      prompt: (ctx, worker) =>
        lines(
          roleLine(worker),
          questionBlock(ctx),
          itemsBlock(ctx, "hypothesis_list", "Hypotheses"),
          itemsBlock(ctx, "evidence_list", "Evidence"),
          "For every evidence/hypothesis pair, judge whether the evidence is consistent (C), inconsistent (I) or neutral (N) with the hypothesis.",
          `${JSON_ONLY} Format: {"scores": [{"evidence": "E1", "hypothesis": "H1", "verdict": "C"}, ...]}`,
        ),
    },
    {
      id: "elimination",
      kind: "aggregate",
      algorithm: "evidence_elimination",
      source: "matrix",
      params: { itemsFrom: "hypothesis_list" },
    },
    {
      id: "tie_check",
      kind: "branch",
      condition: (ctx) => (latestArtifact(ctx.history, "elimination", "evidence_elimination")?.result.tiedSurvivors.length ?? 0) > 0,
      onTrue: "tie_review",
      onFalse: "synthesis",
    },
    {
      id: "tie_review",
      kind: "llm_aggregate",
      sources: ["hypothesis_list", "evidence_list", "elimination"],
      prompt: (ctx) =>
        lines(
          questionBlock(ctx),
          "Elimination stopped because several hypotheses are tied on inconsistent evidence. " +
            "Name the evidence that would separate them and say which one you would test first.",
        ),
    },
    {
      id: "synthesis",
      kind: "synthesize",
      prompt: (ctx) =>
        lines(
          questionBlock(ctx),
          "Report which hypotheses survived, which were eliminated and by what evidence, " +
            "and how sensitive the conclusion is to the most diagnostic evidence.",
        ),
    },
  ],
};

export const causalLoopMapping: ProtocolDefinition = {
  id: "causal_loop_mapping",
  name: "Causal Loop Mapping",
  description: "Agree on system variables, collect signed causal links, and classify the feedback loops they form.",
  category: "analysis",
  minAgents: 2,
  maxAgents: 8,
  phases: [
    {
      id: "variables",
      kind: "fan_out",
      parse: "items",
      context: "none",
      prompt: (ctx, worker) =>
        lines(
          roleLine(worker),
          questionBlock(ctx),
          "Name the variables (quantities that can rise or fall) that drive this system.",
          `${JSON_ONLY} Format: {"items": ["variable", ...]}`,
        ),
    },
    { id: "variable_list", kind: "aggregate", algorithm: "enumeration", source: "variables", params: { prefix: "V" } },
    {
      id: "links",
      kind: "fan_out",
      parse: "edges",
      context: "none",
      prompt: (ctx, worker) =>
        lines(
          roleLine(worker),
          questionBlock(ctx),
          itemsBlock(ctx, "variable_list", "Variables"),
          'List direct causal links between these variables by id. Polarity "+" means both move the same way, "-" means opposite.',
          `${JSON_ONLY} Format: {"links": [{"from": "V1", "to": "V2", "polarity": "+"}, ...]}`,
        ),
    },
    { id: "loops", kind: "aggregate", algorithm: "causal_loops", source: "links", params: { maxLoopLength: 8 } },
    {
      id: "narrative",
      kind: "synthesize",
      prompt: (ctx) =>
        lines(
          questionBlock(ctx),
          itemsBlock(ctx, "variable_list", "Variables"),
          "Explain the reinforcing and balancing loops found, which ones dominate, and where an intervention would have leverage.",
        ),
    },
  ],
};
