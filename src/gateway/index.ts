import type { IWorkerGateway, InvokeResult, Worker, WorkerInvocation } from "./base.js";
import { failure } from "./base.js";
import type { WorkerConfig } from "../config.js";
import { OllamaGateway } from "./ollama.js";
import { OpenAICompatGateway } from "./openai-compat.js";
import { createLogger } from "../logger.js";

const log = createLogger("gateway");

/** Create the gateway that serves one configured worker. */
export function createGateway(config: WorkerConfig): IWorkerGateway {
  switch (config.transport) {
    case "openai-compat":
      log.debug("creating OpenAICompatGateway for", config.key, "model=" + config.model);
      return new OpenAICompatGateway(config);
    case "ollama":
      log.debug("creating OllamaGateway for", config.key, "model=" + config.model);
      return new OllamaGateway(config);
  }
}

export function toWorker(config: WorkerConfig): Worker {
  return {
    key: config.key,
    displayName: config.displayName ?? config.key,
    roleContext: config.roleContext,
  };
}

/**
 * Dispatches each invocation to the gateway registered for its worker key.
 * This is what the run coordinator gets when workers come from config.
 */
export class RoutingGateway implements IWorkerGateway {
  private readonly routes = new Map<string, IWorkerGateway>();

  constructor(configs: WorkerConfig[] = []) {
    for (const c of configs) {
      this.register(c.key, createGateway(c));
    }
  }

  register(workerKey: string, gateway: IWorkerGateway): this {
    this.routes.set(workerKey, gateway);
    return this;
  }

  async invoke(invocation: WorkerInvocation): Promise<InvokeResult> {
    const gateway = this.routes.get(invocation.worker.key);
    if (!gateway) {
      return failure("unavailable", `No gateway registered for worker "${invocation.worker.key}"`, 0);
    }
    return gateway.invoke(invocation);
  }
}

export { OllamaGateway } from "./ollama.js";
export { OpenAICompatGateway } from "./openai-compat.js";
export type {
  IWorkerGateway, InvokeResult, InvokeSuccess, InvokeFailure, WorkerInvocation,
  Worker, FailureReason, TokenUsage, ToolCallTrace,
} from "./base.js";
