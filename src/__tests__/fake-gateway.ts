/**
 * In-process gateway for engine tests. Each call is answered by a responder
 * function; every invocation is recorded.
 */

import {
  failure,
  type FailureReason, type InvokeResult, type IWorkerGateway, type TokenUsage, type Worker, type WorkerInvocation,
} from "../gateway/base.js";

export type Responder = (invocation: WorkerInvocation, attempt: number) => InvokeResult | Promise<InvokeResult>;

export class FakeGateway implements IWorkerGateway {
  readonly calls: WorkerInvocation[] = [];

  constructor(private readonly respond: Responder) {}

  async invoke(invocation: WorkerInvocation): Promise<InvokeResult> {
    this.calls.push(invocation);
    const attempt = this.calls.filter((c) => c.worker.key === invocation.worker.key).length;
    return this.respond(invocation, attempt);
  }

  callsFor(workerKey: string): WorkerInvocation[] {
    return this.calls.filter((c) => c.worker.key === workerKey);
  }
}

export function reply(text: string, tokens?: TokenUsage): InvokeResult {
  return { ok: true, text, tokens, durationMs: 1 };
}

export function fail(reason: FailureReason, message: string = reason): InvokeResult {
  return failure(reason, message, 1);
}

/** Never answers on its own; settles as cancelled once the call's signal aborts. */
export function stall(invocation: WorkerInvocation): Promise<InvokeResult> {
  return new Promise((resolve) => {
    invocation.signal?.addEventListener("abort", () => resolve(failure("cancelled", "aborted", 0)), { once: true });
  });
}

export function worker(key: string): Worker {
  return { key, displayName: key, roleContext: `You are ${key}.` };
}
