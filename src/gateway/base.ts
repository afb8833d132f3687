/**
 * Worker gateway interface.
 *
 * A gateway wraps whatever serves a reasoning worker (an HTTP model endpoint,
 * a fake in tests) and gives the engine one uniform call. Failures come back
 * as values, never as thrown errors, and no retries happen here.
 */

export interface Worker {
  /** Roster key, unique within a deployment */
  readonly key: string;
  readonly displayName: string;
  /** Role text passed through to the worker as its system prompt */
  readonly roleContext: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  /** Monetary cost if the endpoint reports it */
  costUsd?: number;
}

export type FailureReason = "timeout" | "rate_limited" | "malformed" | "cancelled" | "unavailable";

/** Failures worth another attempt; the other two are final. */
export const RETRYABLE_FAILURES: ReadonlySet<FailureReason> = new Set(["timeout", "rate_limited", "unavailable"]);

export interface ToolCallTrace {
  name: string;
  arguments: string;
}

export interface InvokeSuccess {
  ok: true;
  text: string;
  tokens?: TokenUsage;
  /** Tool calls the worker asked for, when tools were enabled */
  toolCalls?: ToolCallTrace[];
  durationMs: number;
}

export interface InvokeFailure {
  ok: false;
  reason: FailureReason;
  message: string;
  durationMs: number;
}

export type InvokeResult = InvokeSuccess | InvokeFailure;

export interface WorkerInvocation {
  worker: Worker;
  prompt: string;
  /** Accumulated context blocks (earlier phases, round history), opaque to the engine */
  priorContext: string[];
  toolsEnabled: boolean;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface IWorkerGateway {
  invoke(invocation: WorkerInvocation): Promise<InvokeResult>;
}

export function failure(reason: FailureReason, message: string, durationMs: number): InvokeFailure {
  return { ok: false, reason, message, durationMs };
}

/** Join prior context blocks and the prompt into the single user message most endpoints take. */
export function composeUserMessage(prompt: string, priorContext: string[]): string {
  if (priorContext.length === 0) return prompt;
  return `${priorContext.join("\n\n")}\n\n---\n\n${prompt}`;
}

/** Transport-level error raised inside HTTP gateways and mapped to a FailureReason at the edge. */
export class GatewayError extends Error {
  constructor(
    public readonly reason: FailureReason,
    message: string,
  ) {
    super(message);
    this.name = "GatewayError";
  }
}

/** Map an HTTP status to a failure reason. */
export function reasonForStatus(status: number): FailureReason {
  if (status === 429) return "rate_limited";
  if (status === 408 || status === 504) return "timeout";
  return "unavailable";
}
