export * from "./base.js";
export { tallyRankedChoice } from "./ranked-choice.js";
export { mergeEvidenceVotes, eliminateHypotheses, rankDiagnosticity } from "./evidence.js";
export type { EliminationOptions } from "./evidence.js";
export { calibrateSecondPrice } from "./second-price.js";
export { quantile, testConvergence } from "./convergence.js";
export type { ConvergenceOptions } from "./convergence.js";
export { mergeCausalEdges, findFeedbackLoops } from "./causal-loops.js";
export type { LoopSearchOptions } from "./causal-loops.js";
export { tallyMajorityStage } from "./majority-stage.js";
export { enumerateItems, matchOption, normalizeItemText } from "./enumerate.js";
export { checkConstraints } from "./constraints.js";
