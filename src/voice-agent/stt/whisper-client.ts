/**
 * Whisper STT Client
 *
 * HTTP client for the local Whisper STT server.
 * Retries transport failures with exponential backoff.
 */

import type { RelayConfig, STTServerStatus } from "../types.js";
import { withRetry, formatRetryMessage, type RetryConfig } from "../utils/retry.js";

/**
 * Transcription result from the Whisper server
 */
export type TranscriptionResult =
  | { success: true; text: string; language?: string; duration_ms?: number }
  | { success: false; error: string };

const DEFAULT_STT_RETRY_CONFIG: Partial<RetryConfig> = {
  maxAttempts: 3,
  initialDelayMs: 500,
  backoffMultiplier: 2,
  maxDelayMs: 4000,
};

export class WhisperClient {
  private baseUrl: string;
  private language?: string;
  private retryConfig: Partial<RetryConfig>;

  constructor(
    config: Pick<RelayConfig, "sttServerUrl" | "language">,
    retryConfig: Partial<RetryConfig> = {}
  ) {
    this.baseUrl = config.sttServerUrl.replace(/\/+$/, "");
    this.language = config.language;
    this.retryConfig = { ...DEFAULT_STT_RETRY_CONFIG, ...retryConfig };
  }

  /**
   * Check if the Whisper server is healthy and ready
   */
  async checkHealth(): Promise<STTServerStatus> {
    try {
      const response = await fetch(`${this.baseUrl}/health`, {
        method: "GET",
        headers: { Accept: "application/json" },
      });

      if (!response.ok) {
        return { healthy: false, model: "unknown", modelLoaded: false, url: this.baseUrl };
      }

      const data = (await response.json()) as {
        status?: string;
        model?: string;
        model_loaded?: boolean;
      };

      return {
        healthy: data.status === "healthy",
        model: data.model || "unknown",
        modelLoaded: data.model_loaded || false,
        url: this.baseUrl,
      };
    } catch {
      return { healthy: false, model: "unknown", modelLoaded: false, url: this.baseUrl };
    }
  }

  /**
   * Transcribe a WAV recording
   */
  async transcribe(wav: Buffer): Promise<TranscriptionResult> {
    const url = new URL(`${this.baseUrl}/transcribe`);
    if (this.language) {
      url.searchParams.set("language", this.language);
    }

    const maxAttempts = this.retryConfig.maxAttempts ?? 3;

    const result = await withRetry(
      async () => {
        const formData = new FormData();
        formData.append("file", new Blob([new Uint8Array(wav)], { type: "audio/wav" }), "audio.wav");

        const response = await fetch(url.toString(), { method: "POST", body: formData });

        if (!response.ok) {
          const errorData = (await response.json().catch(() => ({}))) as { error?: string };
          throw new Error(errorData.error || `HTTP ${response.status}: ${response.statusText}`);
        }

        const data = (await response.json()) as {
          success?: boolean;
          text?: string;
          language?: string;
          duration_ms?: number;
          error?: string;
        };

        if (!data.success) {
          throw new Error(data.error || "Transcription failed");
        }

        return data;
      },
      {
        ...this.retryConfig,
        onRetry: (attempt, _error, delayMs) => {
          const message = formatRetryMessage(attempt, maxAttempts, "STT server");
          console.warn(`[WhisperClient] ${message}. Waiting ${delayMs}ms...`);
        },
      }
    );

    if (!result.success) {
      return {
        success: false,
        error: `Transcription request failed: ${result.error.message}`,
      };
    }

    return {
      success: true,
      text: result.result.text ?? "",
      language: result.result.language,
      duration_ms: result.result.duration_ms,
    };
  }
}

export function createWhisperClient(config: Pick<RelayConfig, "sttServerUrl" | "language">): WhisperClient {
  return new WhisperClient(config);
}
