import type { Worker } from "../../gateway/base.js";
import { latestArtifact, type PhaseContext } from "../types.js";

export const JSON_ONLY = "Reply with a single JSON object and nothing else.";

export function questionBlock(ctx: PhaseContext): string {
  return `Question: ${ctx.question}`;
}

export function roleLine(worker: Worker): string {
  return `You are participating as ${worker.displayName}.`;
}

export function roundLine(ctx: PhaseContext): string {
  return ctx.round > 0 ? `Round ${ctx.round} of ${ctx.totalRounds}.` : "";
}

export function optionsBlock(title: string, options: readonly string[]): string {
  return `${title}:\n${options.map((o) => `- ${o}`).join("\n")}`;
}

/** Render an enumeration phase's items as "<id>: <text>" lines. */
export function itemsBlock(ctx: PhaseContext, phaseId: string, title: string): string {
  const artifact = latestArtifact(ctx.history, phaseId, "enumeration");
  if (!artifact || artifact.items.length === 0) return `${title}: (none)`;
  return `${title}:\n${artifact.items.map((i) => `${i.id}: ${i.text}`).join("\n")}`;
}

export function lines(...parts: string[]): string {
  return parts.filter((p) => p.length > 0).join("\n\n");
}
