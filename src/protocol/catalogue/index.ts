import type { ProtocolDefinition } from "../types.js";
import { ach, causalLoopMapping } from "./analysis.js";
import { constraintNegotiation, multiRoundDebate, oneTwoFourAll, parallelSynthesis } from "./deliberation.js";
import { delphi } from "./estimation.js";
import { bordaCount, ecocyclePlanning, vickreyAuction } from "./voting.js";

/** Bumped whenever a definition's phase graph or prompts change. */
export const CATALOGUE_VERSION = "1.1.0";

export const CATALOGUE: readonly ProtocolDefinition[] = [
  parallelSynthesis,
  oneTwoFourAll,
  multiRoundDebate,
  constraintNegotiation,
  ach,
  delphi,
  vickreyAuction,
  bordaCount,
  ecocyclePlanning,
  causalLoopMapping,
];

export { ECOCYCLE_STAGES } from "./voting.js";
