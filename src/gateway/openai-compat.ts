import { z } from "zod";
import type {
  IWorkerGateway, InvokeResult, WorkerInvocation, TokenUsage, ToolCallTrace,
} from "./base.js";
import { composeUserMessage, failure, GatewayError } from "./base.js";
import { parseBody, requestJson } from "./http.js";
import type { ToolDefinition, WorkerConfig } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("openai-compat");

interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullish(),
      tool_calls: z.array(z.object({
        function: z.object({ name: z.string().optional(), arguments: z.string().optional() }).optional(),
      })).optional(),
    }).optional(),
    finish_reason: z.string().nullish(),
  })).optional(),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).optional(),
});

/**
 * Gateway for any OpenAI-compatible chat completions API.
 *
 * Works with: LM Studio, Ollama (/v1), vLLM, llama.cpp, LocalAI,
 * Groq, Mistral, Deepseek, Together AI, Fireworks, OpenAI.
 *
 * Uses the standard POST /v1/chat/completions endpoint.
 */
export class OpenAICompatGateway implements IWorkerGateway {
  readonly name: string;
  private readonly endpoint: string;
  private readonly apiKey: string | undefined;
  private readonly model: string;
  private readonly tools: ToolDefinition[];

  constructor(config: WorkerConfig) {
    this.name = config.key;
    this.endpoint = config.endpoint.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.tools = config.tools;
  }

  async invoke(invocation: WorkerInvocation): Promise<InvokeResult> {
    const { worker, prompt, priorContext, toolsEnabled, timeoutMs, signal } = invocation;
    const start = Date.now();
    log.debug(this.name, "invoke start, model=" + this.model + ", prompt length:", prompt.length);

    const messages: ChatMessage[] = [];
    if (worker.roleContext) {
      messages.push({ role: "system", content: worker.roleContext });
    }
    messages.push({ role: "user", content: composeUserMessage(prompt, priorContext) });

    const body: Record<string, unknown> = {
      model: this.model,
      messages,
      stream: false,
    };
    if (toolsEnabled && this.tools.length > 0) {
      body.tools = this.tools.map((t) => ({ type: "function", function: t }));
    }

    const url = `${this.endpoint}/v1/chat/completions`;
    let raw: string;
    try {
      raw = await requestJson({
        method: "POST",
        url,
        body,
        headers: this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : undefined,
        timeoutMs,
        signal,
        label: this.name,
      });
    } catch (err) {
      const reason = err instanceof GatewayError ? err.reason : "unavailable";
      const message = err instanceof Error ? err.message : String(err);
      log.warn(this.name, reason + ":", message);
      return failure(reason, message, Date.now() - start);
    }
    const durationMs = Date.now() - start;

    const parsed = parseBody(raw, ChatCompletionSchema);
    if (!parsed) {
      return failure("malformed", `${this.name}: response is not a chat completion`, durationMs);
    }

    const message = parsed.choices?.[0]?.message;
    if (!message) {
      return failure("malformed", `${this.name}: empty response from ${url}`, durationMs);
    }

    const toolCalls: ToolCallTrace[] = (message.tool_calls ?? []).map((c) => ({
      name: c.function?.name ?? "unknown",
      arguments: c.function?.arguments ?? "",
    }));

    const tokens: TokenUsage | undefined = parsed.usage
      ? {
          inputTokens: parsed.usage.prompt_tokens ?? 0,
          outputTokens: parsed.usage.completion_tokens ?? 0,
          // Cost not available from most OpenAI-compat APIs
        }
      : undefined;

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
