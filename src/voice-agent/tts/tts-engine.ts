/**
 * TTS Engine Interface
 *
 * Abstract interface for text-to-speech engines.
 * Implementations shell out to espeak-ng / espeak on Linux or `say` on macOS.
 */

import type { TTSProviderType, TTSSettings } from "../types.js";

/**
 * TTS result
 */
export interface TTSResult {
  /** Whether speech was successful */
  success: boolean;

  /** Error message if failed */
  error?: string;

  /** Duration of speech in milliseconds */
  duration_ms?: number;
}

/**
 * TTS Engine interface
 */
export interface TTSEngine {
  /** Engine name, for logs */
  readonly name: string;

  /**
   * Speak text (blocking - waits for completion)
   */
  speak(text: string): Promise<TTSResult>;

  /**
   * Check if engine is available
   */
  checkAvailable(): Promise<{ available: boolean; error?: string }>;
}

/**
 * Arguments for one utterance, per engine
 */
export function buildSpeechArgs(
  provider: Exclude<TTSProviderType, "auto" | "silent">,
  text: string,
  settings: TTSSettings
): string[] {
  const args: string[] = [];

  if (settings.voice) {
    args.push("-v", settings.voice);
  }

  if (settings.rate) {
    args.push(provider === "say" ? "-r" : "-s", String(settings.rate));
  }

  // End of options, so text starting with "-" is not taken as a flag
  if (provider === "espeak") {
    args.push("--");
  }

  args.push(text);
  return args;
}

/**
 * Provider used by "auto" on a given platform
 */
export function resolveProvider(
  provider: TTSProviderType,
  platform: NodeJS.Platform = process.platform
): Exclude<TTSProviderType, "auto"> {
  if (provider !== "auto") {
    return provider;
  }
  return platform === "darwin" ? "say" : "espeak";
}

/**
 * TTS Engine factory. Falls back to the silent engine when the chosen
 * binary is missing.
 */
export async function createTTSEngine(settings: TTSSettings): Promise<TTSEngine> {
  const provider = resolveProvider(settings.provider);

  if (provider === "silent") {
    const { SilentTTSEngine } = await import("./silent-tts.js");
    return new SilentTTSEngine();
  }

  const { CommandTTSEngine } = await import("./command-tts.js");
  const engine = new CommandTTSEngine(provider, settings);
  const available = await engine.checkAvailable();
  if (available.available) {
    return engine;
  }

  console.warn(`[TTS] ${engine.name} not available, speech will be printed only:`, available.error);
  const { SilentTTSEngine } = await import("./silent-tts.js");
  return new SilentTTSEngine();
}
