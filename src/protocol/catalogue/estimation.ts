import type { ProtocolDefinition } from "../types.js";
import { latestArtifact } from "../types.js";
import { JSON_ONLY, lines, questionBlock, roleLine, roundLine } from "./prompts.js";

/** Anonymous numeric estimation rounds, fed back as quartiles until the spread narrows. */
export const delphi: ProtocolDefinition = {
  id: "delphi",
  name: "Delphi",
  description: "Rounds of anonymous numeric estimates with quartile feedback until the interquartile range converges.",
  category: "estimation",
  minAgents: 3,
  maxAgents: 10,
  phases: [
    {
      id: "estimates",
      kind: "fan_out",
      parse: "estimate",
      context: "none",
      prompt: (ctx, worker) => {
        const previous = latestArtifact(ctx.history, "convergence", "convergence")?.result;
        const feedback = previous
          ? `Last round the group's median was ${previous.median} (interquartile range ${previous.q1} to ${previous.q3}). ` +
            "Revise your estimate if you find reason to; explain briefly if you stay outside that range."
          : "Give your independent estimate.";
        return lines(
          roleLine(worker),
          questionBlock(ctx),
          roundLine(ctx),
          feedback,
          `${JSON_ONLY} Format: {"value": number, "low": number, "high": number}`,
        );
      },
    },
    { id: "convergence", kind: "aggregate", algorithm: "convergence", source: "estimates", minInputs: 2 },
    {
      id: "report",
      kind: "synthesize",
      prompt: (ctx) => {
        const last = latestArtifact(ctx.history, "convergence", "convergence")?.result;
        return lines(
          questionBlock(ctx),
          last
            ? `Final median ${last.median}, interquartile range ${last.q1} to ${last.q3} ` +
                `(${last.converged ? "converged" : "did not converge"}).`
            : "",
          "Report the group estimate, the spread, and the arguments that moved estimates between rounds.",
        );
      },
    },
  ],
  loop: {
    startPhase: "estimates",
    endPhase: "convergence",
    defaultRounds: 3,
    minRounds: 1,
    maxRounds: 6,
    stop: { type: "convergence", phase: "convergence" },
  },
};
