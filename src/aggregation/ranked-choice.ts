import type { Ballot, RankedChoiceResult, RankedStanding } from "./base.js";

/**
 * Positional (Borda) tally with a pairwise tie-break.
 *
 * With K options, the option at rank r (0 = best) on a ballot earns K-1-r
 * points. Unknown options and repeated entries are dropped from a ballot
 * before ranks are assigned; options a ballot leaves out earn nothing from it.
 *
 * Options sharing a score are ordered by head-to-head majority inside that
 * group only: an option beating more of its tied peers ranks higher. Members
 * left with equal pairwise wins stay tied. If that happens at the top, the
 * result names no winner and lists the tie in `unresolvedTie`.
 */
export function tallyRankedChoice(options: readonly string[], ballots: readonly Ballot[]): RankedChoiceResult {
  const k = options.length;
  const known = new Set(options);
  const rankings = ballots.map((b) => normalizeRanking(b.ranking, known));

  const scores = new Map<string, number>(options.map((o) => [o, 0]));
  for (const ranking of rankings) {
    ranking.forEach((option, r) => {
      scores.set(option, (scores.get(option) ?? 0) + (k - 1 - r));
    });
  }
  const scoreOf = (o: string): number => scores.get(o) ?? 0;

  // Group by score, highest first; input order inside a group
  const groups = new Map<number, string[]>();
  for (const option of options) {
    const s = scoreOf(option);
    const group = groups.get(s);
    if (group) group.push(option);
    else groups.set(s, [option]);
  }
  const orderedScores = [...groups.keys()].sort((a, b) => b - a);

  const standings: RankedStanding[] = [];
  const unresolvedGroups: string[][] = [];
  let tieBreakApplied = false;
  let unresolvedTie: string[] | null = null;

  for (const [groupIndex, score] of orderedScores.entries()) {
    const group = groups.get(score) ?? [];
    if (group.length === 1) {
      standings.push({ option: group[0], score, pairwiseWins: 0 });
      continue;
    }

    tieBreakApplied = true;
    const wins = pairwiseWins(group, rankings);
    const sorted = [...group].sort((a, b) => (wins.get(b) ?? 0) - (wins.get(a) ?? 0));

    // Split into runs of equal win counts; any run longer than one stays tied
    let i = 0;
    let firstRun = true;
    while (i < sorted.length) {
      const w = wins.get(sorted[i]) ?? 0;
      let j = i;
      while (j < sorted.length && (wins.get(sorted[j]) ?? 0) === w) j++;
      const run = sorted.slice(i, j);
      if (run.length > 1) {
        unresolvedGroups.push(run);
        if (groupIndex === 0 && firstRun) unresolvedTie = run;
      }
      for (const option of run) standings.push({ option, score, pairwiseWins: w });
      firstRun = false;
      i = j;
    }
  }

  const ranking = standings.map((s) => s.option);
  const winner = ranking.length > 0 && unresolvedTie === null ? ranking[0] : null;
  const margin = standings.length >= 2 ? standings[0].score - standings[1].score : 0;

  return {
    standings,
    ranking,
    winner,
    unresolvedTie,
    unresolvedGroups,
    tieBreakApplied,
    ballotsCounted: rankings.length,
    margin,
  };
}

function normalizeRanking(ranking: readonly string[], known: ReadonlySet<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const option of ranking) {
    if (!known.has(option) || seen.has(option)) continue;
    seen.add(option);
    out.push(option);
  }
  return out;
}

/** For each option, how many peers in `group` it beats head-to-head. */
function pairwiseWins(group: readonly string[], rankings: readonly string[][]): Map<string, number> {
  const wins = new Map<string, number>(group.map((o) => [o, 0]));
  const position = (ranking: readonly string[], option: string): number => {
    const idx = ranking.indexOf(option);
    return idx === -1 ? Number.POSITIVE_INFINITY : idx;
  };

  for (let i = 0; i < group.length; i++) {
    for (let j = i + 1; j < group.length; j++) {
      const a = group[i];
      const b = group[j];
      let aOverB = 0;
      let bOverA = 0;
      for (const ranking of rankings) {
        const pa = position(ranking, a);
        const pb = position(ranking, b);
        if (pa < pb) aOverB++;
        else if (pb < pa) bOverA++;
      }
      if (aOverB > bOverA) wins.set(a, (wins.get(a) ?? 0) + 1);
      else if (bOverA > aOverB) wins.set(b, (wins.get(b) ?? 0) + 1);
    }
  }
  return wins;
}
