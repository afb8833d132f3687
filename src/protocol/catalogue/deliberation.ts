import type { PhaseContext, ProtocolDefinition } from "../types.js";
import { latestArtifact, latestResult } from "../types.js";
import { JSON_ONLY, itemsBlock, lines, questionBlock, roleLine, roundLine } from "./prompts.js";

export const parallelSynthesis: ProtocolDefinition = {
  id: "parallel_synthesis",
  name: "Parallel Synthesis",
  description: "Independent analyses and risk scans from every worker, merged into one answer by a synthesizer.",
  category: "synthesis",
  minAgents: 2,
  maxAgents: 8,
  phases: [
    {
      id: "perspectives",
      kind: "fan_out",
      independent: true,
      context: "none",
      prompt: (ctx, worker) =>
        lines(
          roleLine(worker),
          questionBlock(ctx),
          "Give your own analysis from your role's perspective. State your conclusion first, then the reasoning that supports it.",
        ),
    },
    {
      id: "risks",
      kind: "fan_out",
      independent: true,
      context: "none",
      prompt: (ctx, worker) =>
        lines(
          roleLine(worker),
          questionBlock(ctx),
          "List the most important risks, blind spots or failure modes someone answering this question could miss.",
        ),
    },
    {
      id: "synthesis",
      kind: "synthesize",
      prompt: (ctx) =>
        lines(
          questionBlock(ctx),
          "Above are independent analyses and risk scans from several participants. " +
            "Write one integrated answer: where they agree, where they disagree and why, and which risks change the conclusion.",
        ),
    },
  ],
};

// ── 1-2-4-All ───────────────────────────────────────────────────────────

const MERGE_STAGES = ["solo", "pairs", "quads"] as const;

/** Roster keys cut into consecutive groups of `size`; the last may be short. */
function groupsOf(ctx: PhaseContext, size: number): string[][] {
  const keys = ctx.roster.map((w) => w.key);
  const groups: string[][] = [];
  for (let i = 0; i < keys.length; i += size) groups.push(keys.slice(i, i + size));
  return groups;
}

function groupContaining(ctx: PhaseContext, size: number, key: string): string[] {
  return groupsOf(ctx, size).find((g) => g.includes(key)) ?? [key];
}

function answerOf(ctx: PhaseContext, phaseId: string, key: string): string | undefined {
  const outcome = latestResult(ctx.history, phaseId)?.perWorkerOutputs[key];
  return outcome?.ok ? outcome.text : undefined;
}

/**
 * Text standing for a group at a merge level (0 solo, 1 pair, 2 quad): the
 * group leader's merge when it exists, otherwise its halves one level down.
 * Odd members carry forward unmerged this way.
 */
function groupText(ctx: PhaseContext, keys: readonly string[], level: number): string {
  const merged = answerOf(ctx, MERGE_STAGES[level], keys[0]);
  if (merged !== undefined) return merged;
  if (level === 0) return "(no ideas recorded)";
  const half = 2 ** (level - 1);
  return [keys.slice(0, half), keys.slice(half)]
    .filter((g) => g.length > 0)
    .map((g) => groupText(ctx, g, level - 1))
    .join("\n\n");
}

/** Progressive merging: solo ideas, merged in pairs, then fours, then all. */
export const oneTwoFourAll: ProtocolDefinition = {
  id: "one_two_four_all",
  name: "1-2-4-All",
  description: "Solo ideation, merged in pairs, then in fours, then into one synthesis; odd groups carry forward.",
  category: "synthesis",
  minAgents: 2,
  maxAgents: 8,
  phases: [
    {
      id: "solo",
      kind: "fan_out",
      context: "none",
      prompt: (ctx, worker) =>
        lines(
          roleLine(worker),
          questionBlock(ctx),
          "Generate your best ideas from your role's perspective. Think independently and be specific.",
          "Produce a numbered list of 3-7 distinct ideas with a brief rationale for each.",
        ),
    },
    {
      id: "pairs",
      kind: "llm_aggregate",
      sources: ["solo"],
      context: "none",
      targets: (ctx) => groupsOf(ctx, 2).filter((g) => g.length === 2).map((g) => g[0]),
      prompt: (ctx, worker) => {
        const [a, b] = groupContaining(ctx, 2, worker.key);
        return lines(
          questionBlock(ctx),
          `Participant A's ideas:\n${groupText(ctx, [a], 0)}`,
          `Participant B's ideas:\n${b ? groupText(ctx, [b], 0) : "(none)"}`,
          "Merge these into one list of 4-8 refined ideas. Keep shared themes, surface productive tensions, " +
            "and note which ideas came from A, from B, or from the merge.",
        );
      },
    },
    {
      id: "quad_check",
      kind: "branch",
      condition: (ctx) => ctx.roster.length > 2,
      onTrue: "quads",
      onFalse: "synthesis",
    },
    {
      id: "quads",
      kind: "llm_aggregate",
      sources: ["solo", "pairs"],
      context: "none",
      targets: (ctx) => groupsOf(ctx, 4).filter((g) => g.length > 2).map((g) => g[0]),
      prompt: (ctx, worker) => {
        const group = groupContaining(ctx, 4, worker.key);
        return lines(
          questionBlock(ctx),
          `Group 1 output:\n${groupText(ctx, group.slice(0, 2), 1)}`,
          `Group 2 output:\n${groupText(ctx, group.slice(2), 1)}`,
          "Merge these into a ranked list of 5-8 recommendations. Keep the ideas that survived pair-level scrutiny " +
            "and drop redundancy without losing nuance.",
        );
      },
    },
    {
      id: "synthesis",
      kind: "synthesize",
      context: "none",
      prompt: (ctx) =>
        lines(
          questionBlock(ctx),
          ...groupsOf(ctx, 4).map((g) => `Group (${g.join(", ")}):\n${groupText(ctx, g, 2)}`),
          "Synthesize these group outputs into one response: an executive summary, the top recommendations " +
            "ranked with rationale, tensions the groups left unresolved, and next steps.",
        ),
    },
  ],
};

export const multiRoundDebate: ProtocolDefinition = {
  id: "multi_round_debate",
  name: "Multi-Round Debate",
  description: "Opening positions, then rebuttal rounds over the full transcript, closed by a moderator verdict.",
  category: "deliberation",
  minAgents: 2,
  maxAgents: 6,
  phases: [
    {
      id: "openings",
      kind: "fan_out",
      context: "none",
      prompt: (ctx, worker) =>
        lines(roleLine(worker), questionBlock(ctx), "State your opening position and your strongest argument for it."),
    },
    {
      id: "rebuttals",
      kind: "fan_out",
      prompt: (ctx, worker) =>
        lines(
          roleLine(worker),
          questionBlock(ctx),
          roundLine(ctx),
          "Respond to the other participants. Concede points that are right, rebut the ones that are not, and restate your current position.",
        ),
    },
    {
      id: "verdict",
      kind: "synthesize",
      prompt: (ctx) =>
        lines(
          questionBlock(ctx),
          "You are the moderator. Summarize the debate, name the position best supported by the arguments, and record any dissent that survived.",
        ),
    },
  ],
  loop: {
    startPhase: "rebuttals",
    endPhase: "rebuttals",
    defaultRounds: 2,
    minRounds: 1,
    maxRounds: 5,
    stop: { type: "round_cap" },
  },
};

export const constraintNegotiation: ProtocolDefinition = {
  id: "constraint_negotiation",
  name: "Constraint Negotiation",
  description: "Workers declare hard constraints; a drafter revises a proposal until every reviewer assents.",
  category: "deliberation",
  minAgents: 2,
  maxAgents: 6,
  phases: [
    {
      id: "constraints",
      kind: "fan_out",
      parse: "items",
      context: "none",
      prompt: (ctx, worker) =>
        lines(
          roleLine(worker),
          questionBlock(ctx),
          "List the hard constraints any acceptable answer must satisfy from your role's point of view.",
          `${JSON_ONLY} Format: {"items": ["constraint", ...]}`,
        ),
    },
    { id: "constraint_list", kind: "aggregate", algorithm: "enumeration", source: "constraints", params: { prefix: "C" } },
    {
      id: "proposal",
      kind: "llm_aggregate",
      sources: ["constraint_list"],
      context: "history",
      prompt: (ctx) =>
        lines(
          questionBlock(ctx),
          roundLine(ctx),
          itemsBlock(ctx, "constraint_list", "Constraints"),
          ctx.round > 1
            ? "Revise the previous proposal so that it resolves every violation the reviewers reported."
            : "Draft a proposal that satisfies every constraint.",
        ),
    },
    {
      id: "review",
      kind: "fan_out",
      parse: "assent",
      context: ["constraint_list", "proposal"],
      prompt: (ctx, worker) =>
        lines(
          roleLine(worker),
          questionBlock(ctx),
          "Check the latest proposal against the constraints. Report every constraint it violates, by id.",
          `${JSON_ONLY} Format: {"satisfied": true|false, "violations": ["C1: why", ...]}`,
        ),
    },
    { id: "check", kind: "aggregate", algorithm: "constraint_check", source: "review" },
    {
      id: "agreement",
      kind: "synthesize",
      prompt: (ctx) => {
        const check = latestArtifact(ctx.history, "check", "constraint_check");
        return lines(
          questionBlock(ctx),
          check?.result.satisfied
            ? "All reviewers accepted the proposal. Write the final agreed answer."
            : "The reviewers did not all accept the proposal. Write the best available answer and list the open violations.",
        );
      },
    },
  ],
  loop: {
    startPhase: "proposal",
    endPhase: "check",
    defaultRounds: 3,
    minRounds: 1,
    maxRounds: 6,
    stop: { type: "constraint", phase: "check" },
  },
};
