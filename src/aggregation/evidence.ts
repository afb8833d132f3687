import type {
  EliminationResult, Elimination, EvidenceCell, EvidenceTiePolicy, Verdict,
} from "./base.js";

const VERDICTS: readonly Verdict[] = ["consistent", "inconsistent", "neutral"];

function cellKey(evidenceId: string, hypothesisId: string): string {
  return `${evidenceId}\u0000${hypothesisId}`;
}

/**
 * Merge several workers' verdicts into one matrix.
 * Each (evidence, hypothesis) cell takes the verdict with the most votes;
 * a split between leaders merges to "neutral". A worker's repeated cell
 * counts once (its first verdict).
 */
export function mergeEvidenceVotes(cellsByWorker: readonly (readonly EvidenceCell[])[]): EvidenceCell[] {
  const buckets = new Map<string, { evidenceId: string; hypothesisId: string; votes: Record<Verdict, number> }>();

  for (const cells of cellsByWorker) {
    const seen = new Set<string>();
    for (const cell of cells) {
      const key = cellKey(cell.evidenceId, cell.hypothesisId);
      if (seen.has(key)) continue;
      seen.add(key);
      let bucket = buckets.get(key);
      if (!bucket) {
        bucket = {
          evidenceId: cell.evidenceId,
          hypothesisId: cell.hypothesisId,
          votes: { consistent: 0, inconsistent: 0, neutral: 0 },
        };
        buckets.set(key, bucket);
      }
      bucket.votes[cell.verdict]++;
    }
  }

  return [...buckets.values()].map(({ evidenceId, hypothesisId, votes }) => {
    const top = Math.max(votes.consistent, votes.inconsistent, votes.neutral);
    const leaders = VERDICTS.filter((v) => votes[v] === top);
    const verdict: Verdict = leaders.length === 1 ? leaders[0] : "neutral";
    return { evidenceId, hypothesisId, verdict };
  });
}

export interface EliminationOptions {
  /** Elimination rounds to attempt (default 1) */
  maxRounds?: number;
  tiePolicy?: EvidenceTiePolicy;
}

/**
 * Evidence-consistency elimination.
 *
 * A hypothesis scores one point per "inconsistent" verdict against it;
 * confirmations are not counted. Each round removes the survivor with the
 * strictly highest score. When the lead is shared, "eliminate_none" stops and
 * flags the tied survivors, while "eliminate_tied" removes every leader as
 * long as someone with a lower score remains. The last survivor is never removed.
 */
export function eliminateHypotheses(
  hypothesisIds: readonly string[],
  matrix: readonly EvidenceCell[],
  options: EliminationOptions = {},
): EliminationResult {
  const maxRounds = options.maxRounds ?? 1;
  const tiePolicy = options.tiePolicy ?? "eliminate_none";
  const known = new Set(hypothesisIds);
  const cells = matrix.filter((c) => known.has(c.hypothesisId));

  const scores: Record<string, number> = {};
  for (const id of hypothesisIds) scores[id] = 0;
  for (const cell of cells) {
    if (cell.verdict === "inconsistent") scores[cell.hypothesisId]++;
  }

  let survivors = [...hypothesisIds];
  const eliminated: Elimination[] = [];
  let tiedSurvivors: string[] = [];
  let roundsRun = 0;

  while (roundsRun < maxRounds && survivors.length > 1) {
    const top = Math.max(...survivors.map((id) => scores[id]));
    const leaders = survivors.filter((id) => scores[id] === top);

    let removed: string[];
    if (leaders.length === 1) {
      removed = leaders;
    } else if (tiePolicy === "eliminate_tied" && leaders.length < survivors.length) {
      removed = leaders;
    } else {
      tiedSurvivors = leaders;
      break;
    }

    roundsRun++;
    for (const id of removed) {
      eliminated.push({ hypothesisId: id, round: roundsRun, inconsistencies: scores[id] });
    }
    survivors = survivors.filter((id) => !removed.includes(id));
  }

  return {
    scores,
    eliminated,
    survivors,
    tiedSurvivors,
    roundsRun,
    diagnosticity: rankDiagnosticity(hypothesisIds, cells),
    matrix: cells,
  };
}

/**
 * Evidence is diagnostic when its verdicts differ across hypotheses:
 * score = distinct verdicts / hypotheses. Missing cells read as neutral.
 */
export function rankDiagnosticity(
  hypothesisIds: readonly string[],
  matrix: readonly EvidenceCell[],
): Array<{ evidenceId: string; score: number }> {
  const byEvidence = new Map<string, Map<string, Verdict>>();
  for (const cell of matrix) {
    let row = byEvidence.get(cell.evidenceId);
    if (!row) {
      row = new Map();
      byEvidence.set(cell.evidenceId, row);
    }
    row.set(cell.hypothesisId, cell.verdict);
  }

  const denominator = Math.max(hypothesisIds.length, 1);
  return [...byEvidence.entries()]
    .map(([evidenceId, row]) => {
      const distinct = new Set(hypothesisIds.map((h) => row.get(h) ?? "neutral"));
      return { evidenceId, score: distinct.size / denominator };
    })
    .sort((a, b) => b.score - a.score);
}
