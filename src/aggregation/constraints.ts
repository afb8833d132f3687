import type { Assent, ConstraintCheckResult } from "./base.js";

/** Satisfied when at least `quorum` workers answered and none reports a violation. */
export function checkConstraints(assents: readonly Assent[], quorum = 1): ConstraintCheckResult {
  const outstanding = assents
    .filter((a) => !a.satisfied)
    .map((a) => ({ workerKey: a.workerKey, violations: [...a.violations] }));

  return {
    satisfied: assents.length >= quorum && outstanding.length === 0,
    assents: assents.length,
    outstanding,
  };
}
