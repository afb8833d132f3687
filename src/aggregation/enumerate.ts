import type { EnumeratedItem } from "./base.js";

export function normalizeItemText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim().replace(/[.,;:!?]+$/, "");
}

/**
 * Merge item lists proposed by several workers into one numbered list.
 * Items that normalize to the same text collapse into the first proposal's
 * wording; ids run `<prefix>1, <prefix>2…` in first-seen order.
 */
export function enumerateItems(
  proposals: ReadonlyArray<{ workerKey: string; items: readonly string[] }>,
  prefix = "I",
): EnumeratedItem[] {
  const byKey = new Map<string, EnumeratedItem>();

  for (const { workerKey, items } of proposals) {
    for (const raw of items) {
      const text = raw.trim();
      const key = normalizeItemText(text);
      if (!key) continue;
      const existing = byKey.get(key);
      if (existing) {
        if (!existing.proposedBy.includes(workerKey)) existing.proposedBy.push(workerKey);
        continue;
      }
      byKey.set(key, { id: `${prefix}${byKey.size + 1}`, text, proposedBy: [workerKey] });
    }
  }

  return [...byKey.values()];
}

/**
 * Map a worker's free-text reference onto one of `options`.
 * Tried in order: exact text, normalized text, then containment either way.
 * The first option that matches at the earliest step wins; null when none does.
 */
export function matchOption(candidate: string, options: readonly string[]): string | null {
  if (options.includes(candidate)) return candidate;
  const key = normalizeItemText(candidate);
  if (!key) return null;
  const normalized = options.map((o) => normalizeItemText(o));
  const exact = normalized.indexOf(key);
  if (exact !== -1) return options[exact];
  const partial = normalized.findIndex((o) => o.length > 0 && (o.includes(key) || key.includes(o)));
  return partial === -1 ? null : options[partial];
}
