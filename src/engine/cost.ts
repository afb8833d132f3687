import type { TokenUsage } from "../gateway/base.js";

export interface CostReport {
  totalTokens: TokenUsage;
  totalCostUsd: number;
  calls: number;
  perWorker: Record<string, TokenUsage>;
  perPhase: Record<string, TokenUsage>;
}

export function emptyTokens(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0 };
}

export function addTokens(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    costUsd: (a.costUsd ?? 0) + (b.costUsd ?? 0) || undefined,
  };
}

export function totalTokenCount(t: TokenUsage): number {
  return t.inputTokens + t.outputTokens;
}

/**
 * Per-run usage counters. Each `record` is one synchronous update, so calls
 * completing concurrently on the event loop never lose a write.
 */
export class CostAccumulator {
  private total = emptyTokens();
  private calls = 0;
  private readonly perWorker = new Map<string, TokenUsage>();
  private readonly perPhase = new Map<string, TokenUsage>();

  record(workerKey: string, phaseId: string, tokens: TokenUsage | undefined): void {
    this.calls++;
    if (!tokens) return;
    this.total = addTokens(this.total, tokens);
    this.perWorker.set(workerKey, addTokens(this.perWorker.get(workerKey) ?? emptyTokens(), tokens));
    this.perPhase.set(phaseId, addTokens(this.perPhase.get(phaseId) ?? emptyTokens(), tokens));
  }

  report(): CostReport {
    return {
      totalTokens: { ...this.total },
      totalCostUsd: this.total.costUsd ?? 0,
      calls: this.calls,
      perWorker: Object.fromEntries(this.perWorker),
      perPhase: Object.fromEntries(this.perPhase),
    };
  }
}
