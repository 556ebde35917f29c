/**
 * Silent TTS Engine
 *
 * Used with `--tts silent` and when no speech binary is installed. Text is
 * still echoed by the caller. Keeps only the most recent lines.
 */

import type { TTSEngine, TTSResult } from "./tts-engine.js";

export class SilentTTSEngine implements TTSEngine {
  readonly name = "silent";
  private spoken: string[] = [];
  private historySize: number;

  constructor(options: { historySize?: number } = {}) {
    this.historySize = options.historySize || 50;
  }

  async speak(text: string): Promise<TTSResult> {
    this.spoken.push(text);
    if (this.spoken.length > this.historySize) {
      this.spoken = this.spoken.slice(-this.historySize);
    }
    return { success: true, duration_ms: 0 };
  }

  async checkAvailable(): Promise<{ available: boolean; error?: string }> {
    return { available: true };
  }

  /**
   * Recent speak() text, oldest first
   */
  getSpoken(): readonly string[] {
    return this.spoken;
  }
}
