/**
 * Command-line TTS Engine
 *
 * Speaks through `espeak-ng` (falling back to `espeak`) or the macOS `say`
 * command. Each call waits for the process to exit, so consecutive calls
 * never overlap.
 */

import { spawn, type ChildProcess } from "node:child_process";
import type { TTSProviderType, TTSSettings } from "../types.js";
import { buildSpeechArgs, type TTSEngine, type TTSResult } from "./tts-engine.js";

const BINARIES: Record<"espeak" | "say", string[]> = {
  espeak: ["espeak-ng", "espeak"],
  say: ["say"],
};

/**
 * Resolve whether a binary is on PATH
 */
function which(binary: string): Promise<boolean> {
  return new Promise((resolve) => {
    const child = spawn("which", [binary], { stdio: "ignore" });
    child.on("exit", (code) => resolve(code === 0));
    child.on("error", () => resolve(false));
  });
}

export class CommandTTSEngine implements TTSEngine {
  readonly name: string;
  private provider: Exclude<TTSProviderType, "auto" | "silent">;
  private settings: TTSSettings;
  private binary: string | null = null;

  constructor(provider: Exclude<TTSProviderType, "auto" | "silent">, settings: TTSSettings) {
    this.provider = provider;
    this.settings = settings;
    this.name = provider === "say" ? "macOS say" : "espeak";
  }

  async speak(text: string): Promise<TTSResult> {
    if (!text || text.trim().length === 0) {
      return { success: true, duration_ms: 0 };
    }

    const binary = this.binary ?? BINARIES[this.provider][0];
    const startTime = Date.now();

    return new Promise((resolve) => {
      let child: ChildProcess;
      try {
        child = spawn(binary, buildSpeechArgs(this.provider, text, this.settings), {
          stdio: ["ignore", "ignore", "pipe"],
        });
      } catch (error) {
        resolve({
          success: false,
          error: `TTS error: ${error instanceof Error ? error.message : String(error)}`,
          duration_ms: Date.now() - startTime,
        });
        return;
      }

      let stderr = "";
      child.stderr?.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      child.on("exit", (code) => {
        const duration_ms = Date.now() - startTime;
        if (code === 0) {
          resolve({ success: true, duration_ms });
        } else {
          resolve({ success: false, error: stderr.trim() || `Exit code: ${code}`, duration_ms });
        }
      });

      child.on("error", (error) => {
        resolve({
          success: false,
          error: `TTS error: ${error.message}`,
          duration_ms: Date.now() - startTime,
        });
      });
    });
  }

  async checkAvailable(): Promise<{ available: boolean; error?: string }> {
    for (const candidate of BINARIES[this.provider]) {
      if (await which(candidate)) {
        this.binary = candidate;
        return { available: true };
      }
    }

    return {
      available: false,
      error: `None of ${BINARIES[this.provider].join(", ")} found on PATH`,
    };
  }
}
