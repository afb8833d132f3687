/**
 * Aggregation artifacts.
 *
 * Every algorithm in this directory is a pure function from typed per-worker
 * artifacts to one typed result. Nothing here suspends or touches I/O, so each
 * can be replayed from a stored PhaseResult.
 */

// ── Per-worker artifacts (parsed from worker text at the phase boundary) ──

export interface Ballot {
  workerKey: string;
  /** Options, best first */
  ranking: string[];
}

export type Verdict = "consistent" | "inconsistent" | "neutral";

export interface EvidenceCell {
  hypothesisId: string;
  evidenceId: string;
  verdict: Verdict;
}

export interface SealedBid {
  workerKey: string;
  choice: string;
  /** 0-100 */
  confidence: number;
}

export interface Estimate {
  workerKey: string;
  value: number;
  low: number;
  high: number;
}

export type Polarity = "+" | "-";

export interface CausalEdge {
  from: string;
  to: string;
  polarity: Polarity;
}

export interface StageVote {
  workerKey: string;
  subject: string;
  label: string;
}

export interface Assent {
  workerKey: string;
  satisfied: boolean;
  violations: string[];
}

// ── Results ─────────────────────────────────────────────────────────────

export interface RankedStanding {
  option: string;
  score: number;
  /** Head-to-head wins against options sharing its score (0 when untied) */
  pairwiseWins: number;
}

export interface RankedChoiceResult {
  standings: RankedStanding[];
  /** Final order; members of an unresolved group keep their input order */
  ranking: string[];
  winner: string | null;
  /** Options tied for first that pairwise comparison could not separate */
  unresolvedTie: string[] | null;
  /** Every group (any position) left tied after pairwise comparison */
  unresolvedGroups: string[][];
  tieBreakApplied: boolean;
  ballotsCounted: number;
  margin: number;
}

export type EvidenceTiePolicy = "eliminate_none" | "eliminate_tied";

export interface Elimination {
  hypothesisId: string;
  round: number;
  inconsistencies: number;
}

export interface EliminationResult {
  /** Inconsistent-verdict count per hypothesis */
  scores: Record<string, number>;
  eliminated: Elimination[];
  survivors: string[];
  /** Survivors that stopped elimination by tying for the lead */
  tiedSurvivors: string[];
  roundsRun: number;
  /** Evidence ids ordered by diagnosticity, most differentiating first */
  diagnosticity: Array<{ evidenceId: string; score: number }>;
  matrix: EvidenceCell[];
}

export interface SecondPriceResult {
  winner: SealedBid;
  /** Second-highest confidence, or the winner's own when it bid alone */
  calibratedConfidence: number;
  calibrated: boolean;
  /** Another bid matched the winner's confidence */
  tiedAtTop: boolean;
  distribution: Record<string, number[]>;
  /** Share of bids that picked the winner's choice */
  consensus: number;
}

export interface ConvergenceResult {
  count: number;
  median: number;
  q1: number;
  q3: number;
  iqr: number;
  threshold: number;
  converged: boolean;
}

export type LoopKind = "reinforcing" | "balancing";

export interface FeedbackLoop {
  id: string;
  path: string[];
  /** polarities[i] labels the edge path[i] → path[(i + 1) % n] */
  polarities: Polarity[];
  kind: LoopKind;
}

export interface CausalLoopResult {
  edges: CausalEdge[];
  loops: FeedbackLoop[];
  reinforcing: number;
  balancing: number;
}

export interface StageOutcome {
  subject: string;
  winner: string | null;
  contested: boolean;
  counts: Record<string, number>;
  votes: number;
}

export interface MajorityStageResult {
  outcomes: StageOutcome[];
  contested: string[];
}

export interface EnumeratedItem {
  id: string;
  text: string;
  proposedBy: string[];
}

export interface ConstraintCheckResult {
  satisfied: boolean;
  assents: number;
  outstanding: Array<{ workerKey: string; violations: string[] }>;
}
