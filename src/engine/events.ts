/**
 * Run event stream: one producer (the run), many consumers.
 *
 * Delivery is synchronous and in `seq` order. A bounded backlog lets late
 * subscribers replay recent events. The stream closes after `run_complete`;
 * anything emitted later is dropped.
 */

import { EventEmitter } from "node:events";
import type { FailureReason, Worker } from "../gateway/base.js";
import type { AggregateArtifact, PhaseKind } from "../protocol/types.js";
import { createLogger } from "../logger.js";
import type { CostReport } from "./cost.js";
import type { RunStatus } from "./types.js";

const log = createLogger("events");

export interface RunEventPayloads {
  run_start: { protocolId: string; question: string; roster: Worker[]; rounds: number };
  phase_start: { phaseIndex: number; phaseId: string; kind: PhaseKind; round: number };
  worker_output: { workerKey: string; phaseIndex: number; text: string };
  worker_failure: { workerKey: string; phaseIndex: number; reason: FailureReason; message: string };
  aggregate_result: { phaseIndex: number; phaseId: string; artifact: AggregateArtifact };
  round_boundary: { roundNumber: number };
  synthesis: { phaseIndex: number; workerKey: string; text: string };
  error: { phaseIndex?: number; reason: string; message: string };
  run_complete: { status: RunStatus; elapsedMs: number; cost: CostReport };
}

export type RunEventType = keyof RunEventPayloads;

export type RunEvent = {
  [K in RunEventType]: {
    runId: string;
    seq: number;
    type: K;
    payload: RunEventPayloads[K];
    timestamp: string;
  };
}[RunEventType];

/** An event before the stream stamps it with run id, seq and time. */
export type RunEventInput = {
  [K in RunEventType]: { type: K; payload: RunEventPayloads[K] };
}[RunEventType];

export type RunEventListener = (event: RunEvent) => void;

export interface SubscribeOptions {
  /** Deliver the backlog before live events */
  replay?: boolean;
}

export class RunEventStream extends EventEmitter {
  private seq = 0;
  private closed = false;
  private readonly backlog: RunEvent[] = [];

  constructor(
    readonly runId: string,
    private readonly backlogSize = 64,
  ) {
    super();
    this.setMaxListeners(0);
  }

  /**
   * Stamp and deliver an event. Returns null, delivering nothing,
   * once the stream is closed.
   */
  publish(input: RunEventInput): RunEvent | null {
    if (this.closed) {
      log.debug(`run ${this.runId}: dropped ${input.type} after close`);
      return null;
    }
    const event: RunEvent = { ...input, runId: this.runId, seq: ++this.seq, timestamp: new Date().toISOString() };
    if (this.backlogSize > 0) {
      this.backlog.push(event);
      if (this.backlog.length > this.backlogSize) this.backlog.shift();
    }
    this.emit("event", event);
    if (event.type === "run_complete") {
      this.closed = true;
      this.emit("close");
    }
    return event;
  }

  /**
   * Listen for events. A listener that throws is logged and skipped;
   * it never reaches the producer. Returns the unsubscribe function.
   */
  subscribe(listener: RunEventListener, options: SubscribeOptions = {}): () => void {
    const guarded = (event: RunEvent): void => {
      try {
        listener(event);
      } catch (err) {
        log.error(`run ${this.runId}: subscriber failed on ${event.type}:`, err instanceof Error ? err.message : String(err));
      }
    };
    if (options.replay) {
      for (const event of this.backlog) guarded(event);
    }
    if (this.closed) return () => {};
    this.on("event", guarded);
    return () => {
      this.off("event", guarded);
    };
  }

  /** `for await` view; ends after `run_complete` (or at once if already closed). */
  iterate(options: SubscribeOptions = {}): AsyncIterableIterator<RunEvent> {
    const queue: RunEvent[] = [];
    let waiting: ((result: IteratorResult<RunEvent, undefined>) => void) | null = null;

    const deliver = (event: RunEvent): void => {
      if (waiting) {
        const resolve = waiting;
        waiting = null;
        resolve({ value: event, done: false });
      } else {
        queue.push(event);
      }
    };
    const onClose = (): void => {
      if (waiting) {
        const resolve = waiting;
        waiting = null;
        resolve({ value: undefined, done: true });
      }
    };

    const unsubscribe = this.subscribe(deliver, options);
    this.once("close", onClose);
    let finished = false;
    const finish = (): void => {
      finished = true;
      unsubscribe();
      this.off("close", onClose);
    };

    const end: IteratorResult<RunEvent, undefined> = { value: undefined, done: true };
    const iterator: AsyncIterableIterator<RunEvent> = {
      next: (): Promise<IteratorResult<RunEvent, undefined>> => {
        const event = queue.shift();
        if (event) {
          const item: IteratorResult<RunEvent, undefined> = { value: event, done: false };
          return Promise.resolve(item);
        }
        if (finished || this.closed) {
          finish();
          return Promise.resolve(end);
        }
        return new Promise((resolve) => {
          waiting = resolve;
        });
      },
      return: (): Promise<IteratorResult<RunEvent, undefined>> => {
        queue.length = 0;
        finish();
        return Promise.resolve(end);
      },
      [Symbol.asyncIterator]: () => iterator,
    };
    return iterator;
  }
}
