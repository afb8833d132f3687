import type { CausalEdge, CausalLoopResult, FeedbackLoop, Polarity } from "./base.js";

/**
 * Merge causal links proposed by several workers.
 * Links are keyed by (from, to); the polarity with more votes wins and a tie
 * keeps the polarity voted first. Self-links and blank endpoints are dropped.
 */
export function mergeCausalEdges(edgesByWorker: readonly (readonly CausalEdge[])[]): CausalEdge[] {
  const buckets = new Map<string, { from: string; to: string; first: Polarity; plus: number; minus: number }>();

  for (const edges of edgesByWorker) {
    for (const edge of edges) {
      const from = edge.from.trim();
      const to = edge.to.trim();
      if (!from || !to || from === to) continue;
      const key = `${from}\u0000${to}`;
      let bucket = buckets.get(key);
      if (!bucket) {
        bucket = { from, to, first: edge.polarity, plus: 0, minus: 0 };
        buckets.set(key, bucket);
      }
      if (edge.polarity === "+") bucket.plus++;
      else bucket.minus++;
    }
  }

  return [...buckets.values()].map(({ from, to, first, plus, minus }) => ({
    from,
    to,
    polarity: plus > minus ? "+" : minus > plus ? "-" : first,
  }));
}

export interface LoopSearchOptions {
  /** Longest cycle (in nodes) the search follows (default 8) */
  maxLength?: number;
}

/**
 * Find elementary feedback loops in a polarity-labelled causal graph.
 *
 * Depth-first search from every node, following only nodes that sort after
 * the start and are not already on the path, so each cycle is reported once
 * in its canonical rotation (smallest node first). An even number of "-"
 * links makes a loop reinforcing, an odd number balancing.
 */
export function findFeedbackLoops(edges: readonly CausalEdge[], options: LoopSearchOptions = {}): CausalLoopResult {
  const maxLength = options.maxLength ?? 8;
  const merged = mergeCausalEdges([edges]);

  const adjacency = new Map<string, Array<{ to: string; polarity: Polarity }>>();
  const nodes = new Set<string>();
  for (const edge of merged) {
    nodes.add(edge.from);
    nodes.add(edge.to);
    const out = adjacency.get(edge.from) ?? [];
    out.push({ to: edge.to, polarity: edge.polarity });
    adjacency.set(edge.from, out);
  }
  for (const out of adjacency.values()) {
    out.sort((a, b) => compare(a.to, b.to));
  }

  const found: Array<{ path: string[]; polarities: Polarity[] }> = [];
  const seen = new Set<string>();

  const search = (start: string, path: string[], polarities: Polarity[], onPath: Set<string>): void => {
    const current = path[path.length - 1];
    for (const { to, polarity } of adjacency.get(current) ?? []) {
      if (to === start) {
        const key = canonicalKey(path);
        if (!seen.has(key)) {
          seen.add(key);
          found.push({ path: [...path], polarities: [...polarities, polarity] });
        }
      } else if (compare(to, start) > 0 && !onPath.has(to) && path.length < maxLength) {
        onPath.add(to);
        path.push(to);
        polarities.push(polarity);
        search(start, path, polarities, onPath);
        polarities.pop();
        path.pop();
        onPath.delete(to);
      }
    }
  };

  for (const start of [...nodes].sort(compare)) {
    search(start, [start], [], new Set([start]));
  }

  let r = 0;
  let b = 0;
  const loops: FeedbackLoop[] = found.map(({ path, polarities }) => {
    const negatives = polarities.filter((p) => p === "-").length;
    const kind = negatives % 2 === 0 ? "reinforcing" : "balancing";
    const id = kind === "reinforcing" ? `R${++r}` : `B${++b}`;
    return { id, path, polarities, kind };
  });

  return { edges: merged, loops, reinforcing: r, balancing: b };
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Rotate a cycle so its smallest node comes first, then join. */
function canonicalKey(path: readonly string[]): string {
  let min = 0;
  for (let i = 1; i < path.length; i++) {
    if (compare(path[i], path[min]) < 0) min = i;
  }
  return [...path.slice(min), ...path.slice(0, min)].join("\u0000");
}
