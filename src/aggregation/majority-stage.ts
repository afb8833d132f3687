import type { MajorityStageResult, StageOutcome, StageVote } from "./base.js";

/**
 * Per-subject majority vote over a fixed label set.
 *
 * Labels are compared case-insensitively; votes carrying a label outside
 * `labels` are ignored, and only a worker's first vote on a subject counts.
 * A label wins when it holds more than half of the subject's valid votes;
 * otherwise the subject is contested. Subjects are reported in `subjects`
 * order, followed by any others that received votes.
 */
export function tallyMajorityStage(
  subjects: readonly string[],
  labels: readonly string[],
  votes: readonly StageVote[],
): MajorityStageResult {
  const allowed = labels.map((l) => l.trim().toLowerCase());
  const allowedSet = new Set(allowed);

  const order = [...subjects];
  const bySubject = new Map<string, Map<string, string>>();
  for (const subject of subjects) bySubject.set(subject, new Map());

  for (const vote of votes) {
    const label = vote.label.trim().toLowerCase();
    if (!allowedSet.has(label)) continue;
    let ballots = bySubject.get(vote.subject);
    if (!ballots) {
      ballots = new Map();
      bySubject.set(vote.subject, ballots);
      order.push(vote.subject);
    }
    if (!ballots.has(vote.workerKey)) ballots.set(vote.workerKey, label);
  }

  const outcomes: StageOutcome[] = order.map((subject) => {
    const ballots = bySubject.get(subject) ?? new Map<string, string>();
    const counts: Record<string, number> = {};
    for (const label of allowed) counts[label] = 0;
    for (const label of ballots.values()) counts[label]++;

    const total = ballots.size;
    const winner = allowed.find((label) => counts[label] * 2 > total) ?? null;
    return { subject, winner, contested: winner === null, counts, votes: total };
  });

  return {
    outcomes,
    contested: outcomes.filter((o) => o.contested).map((o) => o.subject),
  };
}
