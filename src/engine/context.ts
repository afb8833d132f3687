import type { AggregateArtifact, ContextSelector, PhaseResult } from "../protocol/types.js";

/** Human-readable rendering of an aggregate artifact for a worker's prior context. */
export function describeArtifact(artifact: AggregateArtifact): string {
  switch (artifact.kind) {
    case "llm_aggregate":
    case "synthesis":
      return artifact.text;
    case "enumeration":
      return artifact.items.map((i) => `${i.id}: ${i.text}`).join("\n");
    case "ranked_choice":
      return artifact.result.standings.map((s, i) => `${i + 1}. ${s.option} (${s.score} pts)`).join("\n") +
        (artifact.result.unresolvedTie ? `\nUnresolved tie: ${artifact.result.unresolvedTie.join(", ")}` : "");
    case "convergence": {
      const r = artifact.result;
      return `median ${r.median}, IQR ${r.q1}–${r.q3} (${r.iqr}), ${r.converged ? "converged" : "not converged"}`;
    }
    case "constraint_check": {
      const r = artifact.result;
      if (r.satisfied) return `All ${r.assents} reviewers satisfied.`;
      return r.outstanding.map((o) => `${o.workerKey}: ${o.violations.join("; ") || "not satisfied"}`).join("\n");
    }
    case "branch":
      return `→ ${artifact.next}`;
    default:
      return JSON.stringify(artifact.result, null, 2);
  }
}

function renderResult(result: PhaseResult): string | null {
  const title = result.round > 0 ? `[${result.phaseId} · round ${result.round}]` : `[${result.phaseId}]`;
  if (result.kind === "branch") return null;

  if (result.aggregatedArtifact && result.kind !== "synthesize" && result.kind !== "llm_aggregate") {
    return `${title}\n${describeArtifact(result.aggregatedArtifact)}`;
  }

  const parts: string[] = [];
  for (const [key, outcome] of Object.entries(result.perWorkerOutputs)) {
    if (outcome.ok) parts.push(`${key}:\n${outcome.text}`);
  }
  return parts.length > 0 ? `${title}\n${parts.join("\n\n")}` : null;
}

/**
 * Prior-context blocks for a worker call: one block per recorded phase the
 * selector admits, oldest first. Failed phases contribute nothing.
 */
export function renderContext(history: readonly PhaseResult[], selector: ContextSelector): string[] {
  if (selector === "none") return [];
  const admitted =
    selector === "history" ? history : history.filter((r) => selector.includes(r.phaseId));

  const blocks: string[] = [];
  for (const result of admitted) {
    if (result.status !== "succeeded") continue;
    const block = renderResult(result);
    if (block) blocks.push(block);
  }
  return blocks;
}
