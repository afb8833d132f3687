import { describe, it, expect } from "vitest";
import {
  tallyRankedChoice,
  mergeEvidenceVotes,
  eliminateHypotheses,
  calibrateSecondPrice,
  quantile,
  testConvergence,
  mergeCausalEdges,
  findFeedbackLoops,
  tallyMajorityStage,
  enumerateItems,
  normalizeItemText,
  matchOption,
  checkConstraints,
  type Ballot,
  type EvidenceCell,
} from "../aggregation/index.js";

describe("tallyRankedChoice", () => {
  it("awards K-1-r points and picks the top scorer", () => {
    const ballots: Ballot[] = [
      { workerKey: "w1", ranking: ["A", "B", "C"] },
      { workerKey: "w2", ranking: ["A", "C", "B"] },
      { workerKey: "w3", ranking: ["B", "A", "C"] },
    ];
    const result = tallyRankedChoice(["A", "B", "C"], ballots);
    expect(result.standings.map((s) => [s.option, s.score])).toEqual([["A", 5], ["B", 3], ["C", 1]]);
    expect(result.winner).toBe("A");
    expect(result.margin).toBe(2);
    expect(result.tieBreakApplied).toBe(false);
    expect(result.ballotsCounted).toBe(3);
  });

  it("conserves points: total equals ballots × K(K-1)/2 for complete ballots", () => {
    const options = ["A", "B", "C", "D"];
    const ballots: Ballot[] = [
      { workerKey: "w1", ranking: ["D", "A", "B", "C"] },
      { workerKey: "w2", ranking: ["B", "D", "C", "A"] },
      { workerKey: "w3", ranking: ["C", "A", "D", "B"] },
      { workerKey: "w4", ranking: ["A", "B", "C", "D"] },
      { workerKey: "w5", ranking: ["B", "C", "A", "D"] },
    ];
    const result = tallyRankedChoice(options, ballots);
    const total = result.standings.reduce((sum, s) => sum + s.score, 0);
    expect(total).toBe(5 * (4 * 3) / 2);
  });

  it("reports a Condorcet cycle among tied options as an unresolved tie", () => {
    const result = tallyRankedChoice(["A", "B", "C"], [
      { workerKey: "w1", ranking: ["A", "B", "C"] },
      { workerKey: "w2", ranking: ["B", "C", "A"] },
      { workerKey: "w3", ranking: ["C", "A", "B"] },
    ]);
    expect(result.standings.every((s) => s.score === 3)).toBe(true);
    expect(result.tieBreakApplied).toBe(true);
    expect(result.winner).toBeNull();
    expect(result.unresolvedTie).toEqual(["A", "B", "C"]);
    expect(result.unresolvedGroups).toEqual([["A", "B", "C"]]);
  });

  it("breaks a score tie by head-to-head majority", () => {
    const result = tallyRankedChoice(["A", "B", "C"], [
      { workerKey: "w1", ranking: ["A", "C", "B"] },
      { workerKey: "w2", ranking: ["B", "A", "C"] },
      { workerKey: "w3", ranking: ["B", "A", "C"] },
    ]);
    expect(result.ranking).toEqual(["B", "A", "C"]);
    expect(result.winner).toBe("B");
    expect(result.standings[0]).toEqual({ option: "B", score: 4, pairwiseWins: 1 });
    expect(result.standings[1]).toEqual({ option: "A", score: 4, pairwiseWins: 0 });
    expect(result.unresolvedTie).toBeNull();
    expect(result.margin).toBe(0);
  });

  it("drops unknown and repeated entries before ranking", () => {
    const result = tallyRankedChoice(["A", "B", "C"], [{ workerKey: "w1", ranking: ["X", "A", "A", "B"] }]);
    expect(result.standings.map((s) => [s.option, s.score])).toEqual([["A", 2], ["B", 1], ["C", 0]]);
  });
});

describe("evidence elimination", () => {
  const matrix: EvidenceCell[] = [
    { evidenceId: "E1", hypothesisId: "H1", verdict: "inconsistent" },
    { evidenceId: "E2", hypothesisId: "H1", verdict: "inconsistent" },
    { evidenceId: "E3", hypothesisId: "H1", verdict: "inconsistent" },
    { evidenceId: "E1", hypothesisId: "H2", verdict: "inconsistent" },
    { evidenceId: "E2", hypothesisId: "H2", verdict: "consistent" },
    { evidenceId: "E3", hypothesisId: "H2", verdict: "consistent" },
  ];

  it("eliminates the hypothesis with the most inconsistencies", () => {
    const result = eliminateHypotheses(["H1", "H2"], matrix);
    expect(result.scores).toEqual({ H1: 3, H2: 1 });
    expect(result.eliminated).toEqual([{ hypothesisId: "H1", round: 1, inconsistencies: 3 }]);
    expect(result.survivors).toEqual(["H2"]);
    expect(result.tiedSurvivors).toEqual([]);
  });

  it("ranks evidence by diagnosticity", () => {
    const result = eliminateHypotheses(["H1", "H2"], matrix);
    expect(result.diagnosticity).toEqual([
      { evidenceId: "E2", score: 1 },
      { evidenceId: "E3", score: 1 },
      { evidenceId: "E1", score: 0.5 },
    ]);
  });

  const tied: EvidenceCell[] = [
    { evidenceId: "E1", hypothesisId: "H1", verdict: "inconsistent" },
    { evidenceId: "E2", hypothesisId: "H1", verdict: "inconsistent" },
    { evidenceId: "E1", hypothesisId: "H2", verdict: "inconsistent" },
    { evidenceId: "E2", hypothesisId: "H2", verdict: "inconsistent" },
    { evidenceId: "E1", hypothesisId: "H3", verdict: "consistent" },
  ];

  it("stops on a tied lead under eliminate_none", () => {
    const result = eliminateHypotheses(["H1", "H2", "H3"], tied);
    expect(result.eliminated).toEqual([]);
    expect(result.survivors).toEqual(["H1", "H2", "H3"]);
    expect(result.tiedSurvivors).toEqual(["H1", "H2"]);
    expect(result.roundsRun).toBe(0);
  });

  it("removes every tied leader under eliminate_tied", () => {
    const result = eliminateHypotheses(["H1", "H2", "H3"], tied, { tiePolicy: "eliminate_tied" });
    expect(result.eliminated.map((e) => e.hypothesisId)).toEqual(["H1", "H2"]);
    expect(result.survivors).toEqual(["H3"]);
  });

  it("never removes the last survivors when all are tied", () => {
    const result = eliminateHypotheses(["H1", "H2"], tied, { tiePolicy: "eliminate_tied", maxRounds: 3 });
    expect(result.survivors).toEqual(["H1", "H2"]);
    expect(result.tiedSurvivors).toEqual(["H1", "H2"]);
  });

  it("merges worker verdicts by plurality, splits to neutral", () => {
    const merged = mergeEvidenceVotes([
      [{ evidenceId: "E1", hypothesisId: "H1", verdict: "inconsistent" }],
      [{ evidenceId: "E1", hypothesisId: "H1", verdict: "consistent" }],
    ]);
    expect(merged).toEqual([{ evidenceId: "E1", hypothesisId: "H1", verdict: "neutral" }]);

    const majority = mergeEvidenceVotes([
      [{ evidenceId: "E1", hypothesisId: "H1", verdict: "inconsistent" }],
      [{ evidenceId: "E1", hypothesisId: "H1", verdict: "consistent" }],
      [{ evidenceId: "E1", hypothesisId: "H1", verdict: "inconsistent" }],
    ]);
    expect(majority[0].verdict).toBe("inconsistent");
  });
});

describe("calibrateSecondPrice", () => {
  it("reports the runner-up's confidence for the winner", () => {
    const result = calibrateSecondPrice([
      { workerKey: "a", choice: "A", confidence: 90 },
      { workerKey: "b", choice: "B", confidence: 70 },
      { workerKey: "c", choice: "A", confidence: 60 },
    ]);
    expect(result?.winner.choice).toBe("A");
    expect(result?.calibratedConfidence).toBe(70);
    expect(result?.calibrated).toBe(true);
    expect(result?.tiedAtTop).toBe(false);
    expect(result?.distribution).toEqual({ A: [90, 60], B: [70] });
    expect(result?.consensus).toBeCloseTo(2 / 3);
  });

  it("breaks exact ties by worker key and flags them", () => {
    const result = calibrateSecondPrice([
      { workerKey: "zed", choice: "X", confidence: 80 },
      { workerKey: "amy", choice: "Y", confidence: 80 },
    ]);
    expect(result?.winner.workerKey).toBe("amy");
    expect(result?.tiedAtTop).toBe(true);
    expect(result?.calibratedConfidence).toBe(80);
  });

  it("leaves a lone bid uncalibrated", () => {
    const result = calibrateSecondPrice([{ workerKey: "a", choice: "A", confidence: 55 }]);
    expect(result?.calibratedConfidence).toBe(55);
    expect(result?.calibrated).toBe(false);
  });

  it("returns null without bids", () => {
    expect(calibrateSecondPrice([])).toBeNull();
  });
});

describe("convergence", () => {
  it("interpolates quantiles linearly", () => {
    expect(quantile([1, 2, 3, 4], 0.25)).toBe(1.75);
    expect(quantile([1, 2, 3, 4], 0.5)).toBe(2.5);
    expect(quantile([7], 0.75)).toBe(7);
  });

  it("converges on a tight cluster", () => {
    const result = testConvergence([40, 41, 39, 42, 40]);
    expect(result).toMatchObject({ count: 5, median: 40, q1: 40, q3: 41, iqr: 1, converged: true });
    expect(result?.threshold).toBeCloseTo(6);
  });

  it("does not converge on a wide spread", () => {
    const result = testConvergence([10, 50, 100, 30, 80]);
    expect(result?.median).toBe(50);
    expect(result?.iqr).toBe(50);
    expect(result?.converged).toBe(false);
  });

  it("uses the absolute floor when the median is zero", () => {
    const result = testConvergence([0, 0, 0]);
    expect(result?.threshold).toBe(1e-6);
    expect(result?.converged).toBe(true);
  });

  it("ignores non-finite values and returns null when none remain", () => {
    expect(testConvergence([Number.NaN, Number.POSITIVE_INFINITY])).toBeNull();
    expect(testConvergence([5, Number.NaN])?.count).toBe(1);
  });
});

describe("causal loops", () => {
  it("merges links by majority polarity and drops self links", () => {
    const merged = mergeCausalEdges([
      [{ from: "demand", to: "price", polarity: "+" }, { from: "x", to: "x", polarity: "+" }],
      [{ from: "demand", to: "price", polarity: "-" }],
      [{ from: " demand ", to: "price", polarity: "-" }],
    ]);
    expect(merged).toEqual([{ from: "demand", to: "price", polarity: "-" }]);
  });

  it("keeps the first polarity on a tied vote", () => {
    const merged = mergeCausalEdges([
      [{ from: "a", to: "b", polarity: "+" }],
      [{ from: "a", to: "b", polarity: "-" }],
    ]);
    expect(merged[0].polarity).toBe("+");
  });

  it("classifies loops by the parity of negative links", () => {
    const result = findFeedbackLoops([
      { from: "A", to: "B", polarity: "+" },
      { from: "B", to: "A", polarity: "+" },
      { from: "X", to: "Y", polarity: "+" },
      { from: "Y", to: "Z", polarity: "-" },
      { from: "Z", to: "X", polarity: "+" },
    ]);
    expect(result.loops).toEqual([
      { id: "R1", path: ["A", "B"], polarities: ["+", "+"], kind: "reinforcing" },
      { id: "B1", path: ["X", "Y", "Z"], polarities: ["+", "-", "+"], kind: "balancing" },
    ]);
    expect(result.reinforcing).toBe(1);
    expect(result.balancing).toBe(1);
  });

  it("reports each cycle once and respects the length cap", () => {
    const ring = [
      { from: "a", to: "b", polarity: "+" as const },
      { from: "b", to: "c", polarity: "+" as const },
      { from: "c", to: "a", polarity: "-" as const },
    ];
    expect(findFeedbackLoops(ring).loops).toHaveLength(1);
    expect(findFeedbackLoops(ring, { maxLength: 2 }).loops).toHaveLength(0);
  });
});

describe("tallyMajorityStage", () => {
  const labels = ["birth", "maturity", "creative_destruction", "renewal"];

  it("assigns a label held by a strict majority", () => {
    const result = tallyMajorityStage(["CRM"], labels, [
      { workerKey: "a", subject: "CRM", label: "Maturity" },
      { workerKey: "b", subject: "CRM", label: "maturity" },
      { workerKey: "c", subject: "CRM", label: "renewal" },
    ]);
    expect(result.outcomes[0]).toEqual({
      subject: "CRM",
      winner: "maturity",
      contested: false,
      counts: { birth: 0, maturity: 2, creative_destruction: 0, renewal: 1 },
      votes: 3,
    });
    expect(result.contested).toEqual([]);
  });

  it("marks split subjects contested and ignores bad labels and repeat votes", () => {
    const result = tallyMajorityStage(["Blog"], labels, [
      { workerKey: "a", subject: "Blog", label: "birth" },
      { workerKey: "a", subject: "Blog", label: "renewal" },
      { workerKey: "b", subject: "Blog", label: "renewal" },
      { workerKey: "c", subject: "Blog", label: "unknown" },
    ]);
    expect(result.outcomes[0].votes).toBe(2);
    expect(result.outcomes[0].winner).toBeNull();
    expect(result.contested).toEqual(["Blog"]);
  });

  it("appends subjects that were not listed", () => {
    const result = tallyMajorityStage(["A"], labels, [{ workerKey: "a", subject: "B", label: "birth" }]);
    expect(result.outcomes.map((o) => o.subject)).toEqual(["A", "B"]);
    expect(result.contested).toEqual(["A"]);
  });
});

describe("enumerateItems", () => {
  it("normalizes case, spacing and trailing punctuation", () => {
    expect(normalizeItemText("  Budget   under 10k. ")).toBe("budget under 10k");
  });

  it("numbers distinct items in first-seen order and keeps the first wording", () => {
    const items = enumerateItems(
      [
        { workerKey: "a", items: ["Ship by June", "Stay on budget"] },
        { workerKey: "b", items: ["ship by june.", "Keep the API stable", "  "] },
      ],
      "C",
    );
    expect(items).toEqual([
      { id: "C1", text: "Ship by June", proposedBy: ["a", "b"] },
      { id: "C2", text: "Stay on budget", proposedBy: ["a"] },
      { id: "C3", text: "Keep the API stable", proposedBy: ["b"] },
    ]);
  });
});

describe("matchOption", () => {
  const options = ["Postgres", "Kafka", "Kafka Streams"];

  it("prefers an exact match over a looser one", () => {
    expect(matchOption("Kafka", options)).toBe("Kafka");
    expect(matchOption("kafka streams", options)).toBe("Kafka Streams");
  });

  it("ignores case and trailing punctuation", () => {
    expect(matchOption("postgres.", options)).toBe("Postgres");
  });

  it("falls back to containment, first option first", () => {
    expect(matchOption("Managed Postgres 16", options)).toBe("Postgres");
    expect(matchOption("streams", options)).toBe("Kafka Streams");
  });

  it("returns null when nothing matches", () => {
    expect(matchOption("Redis", options)).toBeNull();
    expect(matchOption("  ", options)).toBeNull();
  });
});

describe("checkConstraints", () => {
  it("is satisfied when the quorum answered without violations", () => {
    const result = checkConstraints(
      [
        { workerKey: "a", satisfied: true, violations: [] },
        { workerKey: "b", satisfied: true, violations: [] },
      ],
      2,
    );
    expect(result).toEqual({ satisfied: true, assents: 2, outstanding: [] });
  });

  it("lists outstanding objections", () => {
    const result = checkConstraints([
      { workerKey: "a", satisfied: true, violations: [] },
      { workerKey: "b", satisfied: false, violations: ["C2"] },
    ]);
    expect(result.satisfied).toBe(false);
    expect(result.outstanding).toEqual([{ workerKey: "b", violations: ["C2"] }]);
  });

  it("is not satisfied below quorum", () => {
    expect(checkConstraints([{ workerKey: "a", satisfied: true, violations: [] }], 2).satisfied).toBe(false);
  });
});
