/**
 * Protocol pipeline registry.
 *
 * Holds the closed catalogue. Every definition is validated and deep-frozen
 * when the registry is built, so a malformed phase graph fails at startup
 * rather than halfway through a run.
 */

import { ConfigurationError } from "../errors.js";
import { createLogger } from "../logger.js";
import { CATALOGUE, CATALOGUE_VERSION } from "./catalogue/index.js";
import type { AggregateAlgorithm, ContextSelector, PhaseSpec, ProtocolDefinition } from "./types.js";

const log = createLogger("registry");

/** Which segment of the graph a phase index falls in: 0 before the loop, 1 inside, 2 after. */
export function segmentOf(def: ProtocolDefinition, index: number): 0 | 1 | 2 {
  if (!def.loop) return 0;
  const start = def.phases.findIndex((p) => p.id === def.loop?.startPhase);
  const end = def.phases.findIndex((p) => p.id === def.loop?.endPhase);
  if (index < start) return 0;
  if (index <= end) return 1;
  return 2;
}

/** Phase ids a phase reads from, for ordering checks. */
function referencedPhases(phase: PhaseSpec): string[] {
  const fromContext = (c: ContextSelector | undefined): string[] =>
    c === undefined || c === "none" || c === "history" ? [] : [...c];

  switch (phase.kind) {
    case "fan_out":
      return phase.choicesFrom ? [...fromContext(phase.context), phase.choicesFrom] : fromContext(phase.context);
    case "llm_aggregate":
      return [...phase.sources, ...fromContext(phase.context)];
    case "aggregate":
      return phase.params?.itemsFrom ? [phase.source, phase.params.itemsFrom] : [phase.source];
    case "synthesize":
      return fromContext(phase.context);
    case "branch":
      return [];
  }
}

const STOP_ALGORITHM: Record<"convergence" | "constraint", AggregateAlgorithm> = {
  convergence: "convergence",
  constraint: "constraint_check",
};

/**
 * Check a definition's phase graph.
 * @throws ConfigurationError naming the first problem found
 */
export function validateDefinition(def: ProtocolDefinition): void {
  const fail = (msg: string): never => {
    throw new ConfigurationError(`protocol "${def.id}": ${msg}`);
  };

  if (!def.id) fail("missing id");
  if (def.phases.length === 0) fail("no phases");
  if (!Number.isInteger(def.minAgents) || def.minAgents < 1) fail("minAgents must be an integer >= 1");
  if (!Number.isInteger(def.maxAgents) || def.maxAgents < def.minAgents) fail("maxAgents must be >= minAgents");

  const indexOf = new Map<string, number>();
  def.phases.forEach((phase, i) => {
    if (!phase.id) fail(`phase ${i} has no id`);
    if (indexOf.has(phase.id)) fail(`duplicate phase id "${phase.id}"`);
    indexOf.set(phase.id, i);
  });

  if (def.loop) {
    const { startPhase, endPhase, defaultRounds, minRounds, maxRounds, stop } = def.loop;
    const start = indexOf.get(startPhase);
    const end = indexOf.get(endPhase);
    if (start === undefined) fail(`loop start "${startPhase}" is not a phase`);
    if (end === undefined) fail(`loop end "${endPhase}" is not a phase`);
    if (start !== undefined && end !== undefined && start > end) fail("loop start comes after loop end");
    if (!Number.isInteger(minRounds) || minRounds < 1) fail("loop minRounds must be an integer >= 1");
    if (!(minRounds <= defaultRounds && defaultRounds <= maxRounds)) {
      fail("loop rounds must satisfy minRounds <= defaultRounds <= maxRounds");
    }
    if (stop.type !== "round_cap") {
      const at = indexOf.get(stop.phase);
      const target = at === undefined ? undefined : def.phases[at];
      if (at === undefined || target === undefined) {
        fail(`stop phase "${stop.phase}" is not a phase`);
      } else if (segmentOf(def, at) !== 1) {
        fail(`stop phase "${stop.phase}" is outside the loop body`);
      } else if (target.kind !== "aggregate" || target.algorithm !== STOP_ALGORITHM[stop.type]) {
        fail(`stop phase "${stop.phase}" must be a ${STOP_ALGORITHM[stop.type]} aggregate`);
      }
    }
  }

  def.phases.forEach((phase, i) => {
    for (const ref of referencedPhases(phase)) {
      const at = indexOf.get(ref);
      if (at === undefined) fail(`phase "${phase.id}" reads unknown phase "${ref}"`);
      else if (at >= i) fail(`phase "${phase.id}" reads "${ref}", which does not run before it`);
      else if (phase.independent && def.phases[at].independent && independentRun(def, at, i)) {
        fail(`independent phase "${phase.id}" reads "${ref}" from its own group`);
      }
    }

    switch (phase.kind) {
      case "fan_out":
        if (phase.minSuccesses !== undefined && phase.minSuccesses < 1) fail(`phase "${phase.id}": minSuccesses must be >= 1`);
        break;
      case "aggregate":
        if (phase.minInputs !== undefined && phase.minInputs < 1) fail(`phase "${phase.id}": minInputs must be >= 1`);
        break;
      case "branch":
        if (phase.independent) fail(`branch "${phase.id}" cannot be independent`);
        for (const target of [phase.onTrue, phase.onFalse]) {
          const at = indexOf.get(target);
          if (at === undefined) fail(`branch "${phase.id}" targets unknown phase "${target}"`);
          else if (at <= i) fail(`branch "${phase.id}" must jump forward, not to "${target}"`);
          else if (segmentOf(def, at) !== segmentOf(def, i)) fail(`branch "${phase.id}" jumps across the loop boundary`);
        }
        break;
      default:
        break;
    }
  });
}

/** True when every phase from `from` to `to` is marked independent (one concurrent group). */
function independentRun(def: ProtocolDefinition, from: number, to: number): boolean {
  for (let i = from; i <= to; i++) {
    if (!def.phases[i].independent) return false;
  }
  return segmentOf(def, from) === segmentOf(def, to);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export interface ProtocolSummary {
  id: string;
  name: string;
  description: string;
  category: string;
  minAgents: number;
  maxAgents: number;
  requiresOptions?: string;
  phases: string[];
  rounds?: { default: number; min: number; max: number; stop: string };
}

export class ProtocolRegistry {
  private readonly byId = new Map<string, ProtocolDefinition>();

  constructor(
    definitions: readonly ProtocolDefinition[] = CATALOGUE,
    readonly version: string = CATALOGUE_VERSION,
  ) {
    for (const def of definitions) {
      validateDefinition(def);
      if (this.byId.has(def.id)) throw new ConfigurationError(`duplicate protocol id "${def.id}"`);
      this.byId.set(def.id, deepFreeze(def));
    }
    log.debug("catalogue", version, "loaded:", this.byId.size, "protocols");
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** @throws ConfigurationError for unknown ids */
  get(id: string): ProtocolDefinition {
    const def = this.byId.get(id);
    if (!def) {
      throw new ConfigurationError(`unknown protocol "${id}". Known: ${[...this.byId.keys()].join(", ")}`);
    }
    return def;
  }

  list(): ProtocolDefinition[] {
    return [...this.byId.values()];
  }

  summaries(): ProtocolSummary[] {
    return this.list().map((def) => ({
      id: def.id,
      name: def.name,
      description: def.description,
      category: def.category,
      minAgents: def.minAgents,
      maxAgents: def.maxAgents,
      requiresOptions: def.requiresOptions,
      phases: def.phases.map((p) => `${p.id} (${p.kind})`),
      rounds: def.loop
        ? {
            default: def.loop.defaultRounds,
            min: def.loop.minRounds,
            max: def.loop.maxRounds,
            stop: def.loop.stop.type === "round_cap" ? "round_cap" : `${def.loop.stop.type}(${def.loop.stop.phase})`,
          }
        : undefined,
    }));
  }
}
