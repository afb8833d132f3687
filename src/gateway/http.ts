import http from "node:http";
import https from "node:https";
import type { z } from "zod";
import { GatewayError, reasonForStatus } from "./base.js";

export interface JsonRequest {
  method: "GET" | "POST";
  url: string;
  body?: object;
  headers?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Label used in error messages */
  label: string;
}

/**
 * Minimal JSON-over-HTTP request. Uses the http module (not fetch) so the
 * timeout, abort and status handling stay in one place.
 * Rejects with GatewayError carrying the matching FailureReason.
 */
export function requestJson(req: JsonRequest): Promise<string> {
  return new Promise((resolve, reject) => {
    if (req.signal?.aborted) {
      reject(new GatewayError("cancelled", `${req.label}: cancelled before request`));
      return;
    }

    const parsed = new URL(req.url);
    const isHttps = parsed.protocol === "https:";
    const transport = isHttps ? https : http;

    const headers: Record<string, string> = {
      "Accept": "application/json",
      ...req.headers,
    };

    const payload = req.body ? JSON.stringify(req.body) : undefined;
    if (payload) {
      headers["Content-Type"] = "application/json";
      headers["Content-Length"] = String(Buffer.byteLength(payload));
    }

    let settled = false;
    const settle = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      req.signal?.removeEventListener("abort", onAbort);
      fn();
    };

    const request = transport.request(
      {
        hostname: parsed.hostname,
        port: parsed.port || (isHttps ? 443 : 80),
        path: parsed.pathname + parsed.search,
        method: req.method,
        headers,
        timeout: req.timeoutMs,
      },
      (res) => {
        let data = "";
        res.setEncoding("utf-8");
        res.on("data", (chunk: string) => (data += chunk));
        res.on("end", () => {
          const status = res.statusCode ?? 0;
          if (status >= 400) {
            settle(() => reject(new GatewayError(reasonForStatus(status), `${req.label} API error ${status}: ${data.slice(0, 500)}`)));
          } else {
            settle(() => resolve(data));
          }
        });
        res.on("error", (err) => {
          settle(() => reject(new GatewayError("unavailable", `${req.label} response error: ${err.message}`)));
        });
      },
    );

    function onAbort(): void {
      request.destroy();
      settle(() => reject(new GatewayError("cancelled", `${req.label}: request cancelled`)));
    }
    req.signal?.addEventListener("abort", onAbort, { once: true });

    request.on("timeout", () => {
      request.destroy();
      settle(() => reject(new GatewayError("timeout", `${req.label} request timeout after ${req.timeoutMs}ms`)));
    });

    request.on("error", (err) => {
      settle(() => reject(new GatewayError("unavailable", `${req.label} HTTP ${req.method} error: ${err.message}`)));
    });

    if (payload) {
      request.write(payload);
    }
    request.end();
  });
}

/** Parse a response body against a schema; null when it is not JSON or does not match. */
export function parseBody<T extends z.ZodTypeAny>(raw: string, schema: T): z.infer<T> | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = schema.safeParse(json);
  return result.success ? result.data : null;
}
