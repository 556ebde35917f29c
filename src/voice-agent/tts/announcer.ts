/**
 * Announcer
 *
 * Prints a line and speaks it, waiting for playback to finish. Speech
 * failures are reported and otherwise ignored.
 */

import type { TTSEngine } from "./tts-engine.js";
import { RelayErrorCode, type RelayErrorHandler } from "../utils/error-handler.js";

export class Announcer {
  private engine: TTSEngine;
  private errorHandler: RelayErrorHandler;

  constructor(engine: TTSEngine, errorHandler: RelayErrorHandler) {
    this.engine = engine;
    this.errorHandler = errorHandler;
  }

  /**
   * Speak `text`, echoing `printed` (defaults to `text`) first
   */
  async announce(text: string, printed: string = text): Promise<void> {
    console.log(printed);

    let error: string | undefined;
    try {
      const result = await this.engine.speak(text);
      error = result.success ? undefined : result.error ?? "unknown error";
    } catch (speakError) {
      error = speakError instanceof Error ? speakError.message : String(speakError);
    }

    if (error !== undefined) {
      this.errorHandler.report(RelayErrorCode.SPEECH_FAILURE, `${this.engine.name}: ${error}`);
    }
  }
}
