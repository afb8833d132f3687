import type { ProtocolDefinition } from "../types.js";
import { latestArtifact } from "../types.js";
import { JSON_ONLY, lines, optionsBlock, questionBlock, roleLine } from "./prompts.js";

export const ECOCYCLE_STAGES = ["birth", "maturity", "creative_destruction", "renewal"] as const;

export const bordaCount: ProtocolDefinition = {
  id: "borda_count",
  name: "Borda Count",
  description: "Every worker ranks the options; positional points decide, with a head-to-head tie-break.",
  category: "voting",
  minAgents: 3,
  maxAgents: 10,
  requiresOptions: "options to rank",
  phases: [
    {
      id: "ballots",
      kind: "fan_out",
      parse: "ballot",
      context: "none",
      prompt: (ctx, worker) =>
        lines(
          roleLine(worker),
          questionBlock(ctx),
          optionsBlock("Options", ctx.options),
          "Rank every option from best to worst, using the option text exactly as written.",
          `${JSON_ONLY} Format: {"ranking": ["best option", ..., "worst option"]}`,
        ),
    },
    { id: "tally", kind: "aggregate", algorithm: "ranked_choice", source: "ballots" },
    {
      id: "summary",
      kind: "synthesize",
      prompt: (ctx) => {
        const tally = latestArtifact(ctx.history, "tally", "ranked_choice");
        const tie = tally?.result.unresolvedTie;
        return lines(
          questionBlock(ctx),
          tie
            ? `The vote ended in an unresolved tie between: ${tie.join(", ")}. Explain what separates them; do not pick a winner.`
            : "Explain the outcome of the vote and the main reasons voters ranked the options as they did.",
        );
      },
    },
  ],
};

export const vickreyAuction: ProtocolDefinition = {
  id: "vickrey_auction",
  name: "Vickrey Auction",
  description: "Sealed confidence bids; the top bidder wins but is credited with the runner-up's confidence.",
  category: "voting",
  minAgents: 2,
  maxAgents: 8,
  requiresOptions: "choices to bid on",
  phases: [
    {
      id: "bids",
      kind: "fan_out",
      parse: "bid",
      context: "none",
      prompt: (ctx, worker) =>
        lines(
          roleLine(worker),
          questionBlock(ctx),
          optionsBlock("Choices", ctx.options),
          "Pick the choice you believe is correct and bid your confidence in it from 0 to 100. " +
            "Bids are sealed; overbidding does not help you, because the winner is credited with the second-highest bid.",
          `${JSON_ONLY} Format: {"choice": "choice text", "confidence": 0-100}`,
        ),
    },
    { id: "auction", kind: "aggregate", algorithm: "second_price", source: "bids" },
    {
      id: "rationale",
      kind: "synthesize",
      synthesizer: (ctx) => latestArtifact(ctx.history, "auction", "second_price")?.result.winner.workerKey ?? null,
      prompt: (ctx) => {
        const auction = latestArtifact(ctx.history, "auction", "second_price")?.result;
        return lines(
          questionBlock(ctx),
          auction
            ? `Your bid on "${auction.winner.choice}" won at a calibrated confidence of ${auction.calibratedConfidence}. ` +
                "Justify the choice and address the strongest competing bid."
            : "Justify the winning choice.",
        );
      },
    },
  ],
};

export const ecocyclePlanning: ProtocolDefinition = {
  id: "ecocycle_planning",
  name: "Ecocycle Planning",
  description: "Place each initiative on the ecocycle by majority vote, arbitrate contested placements, then plan.",
  category: "planning",
  minAgents: 2,
  maxAgents: 8,
  requiresOptions: "initiatives to place",
  phases: [
    {
      id: "placements",
      kind: "fan_out",
      parse: "stage_votes",
      context: "none",
      prompt: (ctx, worker) =>
        lines(
          roleLine(worker),
          questionBlock(ctx),
          optionsBlock("Initiatives", ctx.options),
          `Place every initiative in one ecocycle stage: ${ECOCYCLE_STAGES.join(", ")}.`,
          `${JSON_ONLY} Format: {"assessments": [{"subject": "initiative text", "stage": "maturity"}, ...]}`,
        ),
    },
    {
      id: "stages",
      kind: "aggregate",
      algorithm: "majority_stage",
      source: "placements",
      params: { labels: ECOCYCLE_STAGES },
    },
    {
      id: "contested_check",
      kind: "branch",
      condition: (ctx) => (latestArtifact(ctx.history, "stages", "majority_stage")?.result.contested.length ?? 0) > 0,
      onTrue: "arbitration",
      onFalse: "plan",
    },
    {
      id: "arbitration",
      kind: "llm_aggregate",
      sources: ["placements", "stages"],
      prompt: (ctx) => {
        const contested = latestArtifact(ctx.history, "stages", "majority_stage")?.result.contested ?? [];
        return lines(
          questionBlock(ctx),
          optionsBlock("Contested initiatives", contested),
          "No stage won a majority for these initiatives. Lay out the case for each competing stage and say what would settle it.",
        );
      },
    },
    {
      id: "plan",
      kind: "synthesize",
      prompt: (ctx) =>
        lines(
          questionBlock(ctx),
          "Write an ecocycle plan: what to start, what to sustain, what to let go of, and what to renew, " +
            "keeping contested placements marked as such.",
        ),
    },
  ],
};
