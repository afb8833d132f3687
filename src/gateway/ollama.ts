import { z } from "zod";
import type {
  IWorkerGateway, InvokeResult, WorkerInvocation, TokenUsage, ToolCallTrace,
} from "./base.js";
import { composeUserMessage, failure, GatewayError } from "./base.js";
import { parseBody, requestJson } from "./http.js";
import type { ToolDefinition, WorkerConfig } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("ollama");

const OllamaChatSchema = z.object({
  message: z.object({
    content: z.string().optional(),
    tool_calls: z.array(z.object({
      function: z.object({ name: z.string().optional(), arguments: z.record(z.string(), z.unknown()).optional() }).optional(),
    })).optional(),
  }).optional(),
  done: z.boolean().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

/**
 * Gateway for Ollama via its native HTTP API (POST /api/chat).
 * Role context goes in as the system message; tools are forwarded
 * only when the run enables them.
 */
export class OllamaGateway implements IWorkerGateway {
  readonly name: string;
  private readonly model: string;
  private readonly endpoint: string;
  private readonly tools: ToolDefinition[];

  constructor(config: WorkerConfig) {
    this.name = config.key;
    this.model = config.model;
    this.endpoint = config.endpoint.replace(/\/+$/, "");
    this.tools = config.tools;
  }

  async invoke(invocation: WorkerInvocation): Promise<InvokeResult> {
    const { worker, prompt, priorContext, toolsEnabled, timeoutMs, signal } = invocation;
    const start = Date.now();
    log.debug(this.name, "invoke start, model=" + this.model + ", prompt length:", prompt.length);

    const messages = [
      ...(worker.roleContext ? [{ role: "system", content: worker.roleContext }] : []),
      { role: "user", content: composeUserMessage(prompt, priorContext) },
    ];

    const body: Record<string, unknown> = {
      model: this.model,
      messages,
      stream: false,
    };
    if (toolsEnabled && this.tools.length > 0) {
      body.tools = this.tools.map((t) => ({ type: "function", function: t }));
    }

    let raw: string;
    try {
      raw = await requestJson({
        method: "POST",
        url: `${this.endpoint}/api/chat`,
        body,
        timeoutMs,
        signal,
        label: `Ollama ${this.name}`,
      });
    } catch (err) {
      const reason = err instanceof GatewayError ? err.reason : "unavailable";
      const message = err instanceof Error ? err.message : String(err);
      log.warn(this.name, reason + ":", message);
      return failure(reason, message, Date.now() - start);
    }
    const durationMs = Date.now() - start;

    const parsed = parseBody(raw, OllamaChatSchema);
    if (!parsed?.message) {
      return failure("malformed", `${this.name}: response has no message`, durationMs);
    }
    const message = parsed.message;

    // Ollama reports token counts directly; local models have no monetary cost
    const tokens: TokenUsage | undefined =
      parsed.prompt_eval_count !== undefined || parsed.eval_count !== undefined
        ? {
            inputTokens: parsed.prompt_eval_count ?? 0,
            outputTokens: parsed.eval_count ?? 0,
          }
        : undefined;

    const toolCalls: ToolCallTrace[] = (message.tool_calls ?? []).map((c) => ({
      name: c.function?.name ?? "unknown",
      arguments: JSON.stringify(c.function?.arguments ?? {}),
    }));

    const text = (message.content ?? "").trim();
    if (!text && toolCalls.length === 0) {
      return failure("malformed", `${this.name}: response has no content`, durationMs);
    }

    log.info(this.name, "invoke complete:", durationMs + "ms" +
      (tokens ? `, ${tokens.inputTokens + tokens.outputTokens} tokens` : ""));

    return {
      ok: true,
      text,
      tokens,
      toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
      durationMs,
    };
  }
}
