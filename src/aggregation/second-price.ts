import type { SealedBid, SecondPriceResult } from "./base.js";

/**
 * Second-price (Vickrey) calibration of sealed confidence bids.
 *
 * The highest-confidence bid wins, with worker key order breaking exact ties.
 * The confidence reported for the winner is the runner-up's bid, never the
 * winner's own. A lone bid has nothing to calibrate against: its own
 * confidence is reported with `calibrated: false`.
 *
 * Returns null for an empty bid set.
 */
export function calibrateSecondPrice(bids: readonly SealedBid[]): SecondPriceResult | null {
  if (bids.length === 0) return null;

  const ranked = [...bids].sort(
    (a, b) => b.confidence - a.confidence || a.workerKey.localeCompare(b.workerKey),
  );
  const winner = ranked[0];
  const runnerUp = ranked.length > 1 ? ranked[1] : undefined;

  const distribution: Record<string, number[]> = {};
  for (const bid of bids) {
    (distribution[bid.choice] ??= []).push(bid.confidence);
  }

  const sameChoice = bids.filter((b) => b.choice === winner.choice).length;

  return {
    winner,
    calibratedConfidence: runnerUp?.confidence ?? winner.confidence,
    calibrated: runnerUp !== undefined,
    tiedAtTop: runnerUp?.confidence === winner.confidence,
    distribution,
    consensus: sameChoice / bids.length,
  };
}
