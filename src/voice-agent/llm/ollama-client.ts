/**
 * Ollama LLM Client
 *
 * HTTP client for the local Ollama server. Both the conversational model and
 * the command model are reached through `/api/generate`. Failures come back
 * as an OracleOutcome and are never thrown.
 */

import type {
  LanguageOracle,
  LLMServerStatus,
  OracleOutcome,
  OracleRequest,
  RelayConfig,
} from "../types.js";
import { withTimeout, isTimeoutError, formatTimeoutMessage } from "../utils/retry.js";

/**
 * Ollama model info
 */
export interface OllamaModel {
  name: string;
  modified_at: string;
  size: number;
  digest: string;
}

/**
 * Read the `response` field of a generate reply, if it has one
 */
function responseField(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || !("response" in value)) {
    return undefined;
  }
  return typeof value.response === "string" ? value.response : undefined;
}

/**
 * Concatenate the `response` pieces of a streamed NDJSON body.
 * Returns undefined if any line is not a generate chunk.
 */
export function joinStreamedChunks(body: string): string | undefined {
  let text = "";
  for (const line of body.split("\n")) {
    if (line.trim().length === 0) continue;

    let chunk: unknown;
    try {
      chunk = JSON.parse(line);
    } catch {
      return undefined;
    }

    const piece = responseField(chunk);
    if (piece === undefined) return undefined;
    text += piece;
  }
  return text;
}

/**
 * Client for the Ollama LLM server
 */
export class OllamaClient implements LanguageOracle {
  private baseUrl: string;
  private timeoutMs: number;

  constructor(config: Pick<RelayConfig, "ollamaUrl" | "oracleTimeoutMs">) {
    this.baseUrl = config.ollamaUrl.replace(/\/+$/, "");
    this.timeoutMs = config.oracleTimeoutMs;
  }

  /**
   * Send a prompt to `/api/generate`
   */
  async generate(request: OracleRequest): Promise<OracleOutcome> {
    const startTime = Date.now();

    let reply: { status: number; body: string };
    try {
      reply = await withTimeout(
        async (signal) => {
          const response = await fetch(`${this.baseUrl}/api/generate`, {
            method: "POST",
            headers: {
              "Content-Type": "application/json",
              Accept: "application/json",
            },
            body: JSON.stringify({
              model: request.model,
              prompt: request.prompt,
              stream: request.stream,
            }),
            signal,
          });
          return { status: response.status, body: await response.text() };
        },
        this.timeoutMs,
        `Ollama (${request.model})`
      );
    } catch (error) {
      if (isTimeoutError(error)) {
        console.warn(`[OllamaClient] ${formatTimeoutMessage(error.serviceName, error.timeoutMs)}`);
        return { kind: "timeout", timeoutMs: error.timeoutMs };
      }

      const errorMessage = error instanceof Error ? error.message : "Unknown error";
      console.error(`[OllamaClient] Error querying Ollama: ${errorMessage}`);
      return { kind: "unavailable", error: `Ollama request failed: ${errorMessage}` };
    }

    const { status, body } = reply;
    if (status < 200 || status >= 300) {
      console.error(`[OllamaClient] Ollama API error: ${status} - ${body}`);
      return { kind: "unavailable", error: `Ollama API error: ${status}` };
    }

    const text = request.stream ? joinStreamedChunks(body) : this.parseSingle(body);
    if (text === undefined) {
      return { kind: "malformed", raw: body };
    }

    return {
      kind: "ok",
      text,
      model: request.model,
      duration_ms: Date.now() - startTime,
    };
  }

  private parseSingle(body: string): string | undefined {
    try {
      return responseField(JSON.parse(body));
    } catch {
      return undefined;
    }
  }

  /**
   * Check if the Ollama server is healthy and list its models
   */
  async checkHealth(): Promise<LLMServerStatus> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        method: "GET",
        headers: { Accept: "application/json" },
      });

      if (!response.ok) {
        return { healthy: false, url: this.baseUrl, models: [] };
      }

      const data = (await response.json()) as { models?: OllamaModel[] };
      return {
        healthy: true,
        url: this.baseUrl,
        models: (data.models ?? []).map((m) => m.name),
      };
    } catch {
      return { healthy: false, url: this.baseUrl, models: [] };
    }
  }
}

export function createOllamaClient(
  config: Pick<RelayConfig, "ollamaUrl" | "oracleTimeoutMs">
): OllamaClient {
  return new OllamaClient(config);
}
