/**
 * Artifact parsers.
 *
 * Worker text is read at the phase boundary: the first JSON candidate that
 * validates against the phase's schema becomes the typed artifact. Candidates
 * are tried in order: the whole text, each fenced code block, then the
 * outermost {...} span. When none validates, ArtifactParseError is thrown and
 * the executor records the worker as "malformed".
 */

import { z } from "zod";
import { ArtifactParseError } from "../errors.js";
import type { Polarity, Verdict } from "../aggregation/base.js";
import { matchOption } from "../aggregation/enumerate.js";
import type { ArtifactKind, WorkerArtifact } from "./types.js";

// ── Schemas ──────────────────────────────────────────────────────────────

const text = z.string().trim().min(1);

const verdict = z.string().transform((raw, ctx): Verdict => {
  const v = raw.trim().toLowerCase();
  if (v === "c" || v === "consistent") return "consistent";
  if (v === "i" || v === "inconsistent") return "inconsistent";
  if (v === "n" || v === "neutral" || v === "na" || v === "n/a") return "neutral";
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown verdict "${raw}"` });
  return z.NEVER;
});

const polarity = z.string().transform((raw, ctx): Polarity => {
  const p = raw.trim().toLowerCase();
  if (p === "+" || p === "positive" || p === "same") return "+";
  if (p === "-" || p === "negative" || p === "opposite") return "-";
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown polarity "${raw}"` });
  return z.NEVER;
});

/** Numbers, or strings holding one; null, "", booleans and arrays are rejected. */
function numeric(inner: z.ZodNumber) {
  return z.preprocess((v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v), inner);
}

const itemEntry = z.union([text, z.object({ text }).transform((o) => o.text)]);

export const BallotSchema = z.object({ ranking: z.array(text).min(1) });

export const EvidenceSchema = z.object({
  scores: z
    .array(z.object({ evidence: text, hypothesis: text, verdict }))
    .min(1),
});

export const BidSchema = z.object({
  choice: text,
  confidence: numeric(z.number().min(0).max(100)),
});

export const EstimateSchema = z.object({
  value: numeric(z.number().finite()),
  low: numeric(z.number().finite()).optional(),
  high: numeric(z.number().finite()).optional(),
});

export const EdgesSchema = z.object({
  links: z.array(z.object({ from: text, to: text, polarity })),
});

export const StageVotesSchema = z.object({
  assessments: z.array(z.object({ subject: text, stage: text })).min(1),
});

export const ItemsSchema = z.object({ items: z.array(itemEntry).min(1) });

export const AssentSchema = z.object({
  satisfied: z.boolean(),
  violations: z.array(text).default([]),
});

// ── Extraction ───────────────────────────────────────────────────────────

function collectCandidates(raw: string): string[] {
  const candidates: string[] = [];
  const trimmed = raw.trim();
  candidates.push(trimmed);

  const fenced = /```(?:json)?\s*\n([\s\S]*?)```/g;
  let match: RegExpExecArray | null;
  while ((match = fenced.exec(raw)) !== null) {
    if (match[1]) candidates.push(match[1].trim());
  }

  const braces = trimmed.match(/\{[\s\S]*\}/);
  if (braces) candidates.push(braces[0]);

  return candidates;
}

/** Extract the first JSON value in `raw` that satisfies `schema`. */
export function extractJson<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const candidates = collectCandidates(raw);
  let lastIssue: string | undefined;

  for (const candidate of candidates) {
    let value: unknown;
    try {
      value = JSON.parse(candidate);
    } catch {
      continue;
    }
    const result = schema.safeParse(value);
    if (result.success) return result.data;
    lastIssue = result.error.issues[0]?.message;
  }

  throw new ArtifactParseError(
    `no valid JSON in response (${raw.length} chars, ${candidates.length} candidates` +
      (lastIssue ? `; last issue: ${lastIssue})` : ")"),
    raw,
  );
}

/**
 * Resolve each reference against `choices`. An empty choice list accepts
 * anything as written; otherwise one unmatched reference rejects the answer.
 */
function canonical(refs: readonly string[], choices: readonly string[], what: string, raw: string): string[] {
  if (choices.length === 0) return [...refs];
  return refs.map((ref) => {
    const match = matchOption(ref, choices);
    if (match === null) throw new ArtifactParseError(`${what} "${ref}" matches none of: ${choices.join(", ")}`, raw);
    return match;
  });
}

/**
 * Parse a worker's text into the artifact its phase expects.
 * Ballot entries, bid choices and stage subjects are mapped onto `choices`.
 * Returns undefined for plain-text phases.
 */
export function parseArtifact(
  kind: ArtifactKind,
  workerKey: string,
  raw: string,
  choices: readonly string[] = [],
): WorkerArtifact | undefined {
  switch (kind) {
    case "text":
      return undefined;

    case "ballot": {
      const { ranking } = extractJson(raw, BallotSchema);
      return { kind, ballot: { workerKey, ranking: canonical(ranking, choices, "option", raw) } };
    }

    case "evidence": {
      const { scores } = extractJson(raw, EvidenceSchema);
      return {
        kind,
        cells: scores.map((s) => ({ evidenceId: s.evidence, hypothesisId: s.hypothesis, verdict: s.verdict })),
      };
    }

    case "bid": {
      const { choice, confidence } = extractJson(raw, BidSchema);
      const [resolved] = canonical([choice], choices, "choice", raw);
      return { kind, bid: { workerKey, choice: resolved, confidence } };
    }

    case "estimate": {
      const { value, low, high } = extractJson(raw, EstimateSchema);
      return {
        kind,
        estimate: {
          workerKey,
          value,
          low: Math.min(low ?? value, value),
          high: Math.max(high ?? value, value),
        },
      };
    }

    case "edges": {
      const { links } = extractJson(raw, EdgesSchema);
      return { kind, edges: links };
    }

    case "stage_votes": {
      const { assessments } = extractJson(raw, StageVotesSchema);
      const subjects = canonical(assessments.map((a) => a.subject), choices, "subject", raw);
      return { kind, votes: assessments.map((a, i) => ({ workerKey, subject: subjects[i], label: a.stage })) };
    }

    case "items": {
      const { items } = extractJson(raw, ItemsSchema);
      return { kind, items };
    }

    case "assent": {
      const { satisfied, violations } = extractJson(raw, AssentSchema);
      return { kind, assent: { workerKey, satisfied, violations } };
    }
  }
}
