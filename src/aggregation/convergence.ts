import type { ConvergenceResult } from "./base.js";

export interface ConvergenceOptions {
  /** Converged when IQR < relativeThreshold × |median| (default 0.15) */
  relativeThreshold?: number;
  /** Threshold used instead when the median is exactly 0 (default 1e-6) */
  absoluteFloor?: number;
}

/** Linear-interpolation quantile over an ascending array. */
export function quantile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return Number.NaN;
  const pos = (sorted.length - 1) * p;
  const lower = Math.floor(pos);
  const upper = Math.ceil(pos);
  if (lower === upper) return sorted[lower];
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (pos - lower);
}

/**
 * Statistical convergence test over one round of numeric estimates.
 * Non-finite values are ignored; returns null when nothing is left.
 */
export function testConvergence(
  values: readonly number[],
  options: ConvergenceOptions = {},
): ConvergenceResult | null {
  const relativeThreshold = options.relativeThreshold ?? 0.15;
  const absoluteFloor = options.absoluteFloor ?? 1e-6;

  const sorted = values.filter((v) => Number.isFinite(v)).sort((a, b) => a - b);
  if (sorted.length === 0) return null;

  const median = quantile(sorted, 0.5);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const iqr = q3 - q1;
  const threshold = median === 0 ? absoluteFloor : relativeThreshold * Math.abs(median);

  return {
    count: sorted.length,
    median,
    q1,
    q3,
    iqr,
    threshold,
    converged: iqr < threshold,
  };
}
