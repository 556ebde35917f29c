/**
 * Transcription Gateways
 *
 * Produce one utterance per listen call. The voice gateway records a phrase
 * and sends it to Whisper; the keyboard gateway reads a typed line instead.
 */

import type { ListenOutcome, TranscriptionGateway, TypedInput } from "../types.js";
import type { AudioRecorder } from "./audio-recorder.js";
import type { WhisperClient } from "./whisper-client.js";

export class VoiceTranscriptionGateway implements TranscriptionGateway {
  private recorder: AudioRecorder;
  private whisper: Pick<WhisperClient, "transcribe">;

  constructor(recorder: AudioRecorder, whisper: Pick<WhisperClient, "transcribe">) {
    this.recorder = recorder;
    this.whisper = whisper;
  }

  async listen(timeoutSeconds: number): Promise<ListenOutcome> {
    console.log(`Listening (up to ${timeoutSeconds} seconds)...`);

    const recording = await this.recorder.record(timeoutSeconds);
    if (recording.kind === "timeout") {
      console.log(`No speech detected within ${timeoutSeconds} seconds.`);
      return { kind: "timeout" };
    }
    if (recording.kind === "error") {
      console.error(`[Transcription] Recorder error: ${recording.error}`);
      return { kind: "error", error: recording.error };
    }

    const result = await this.whisper.transcribe(recording.wav);
    if (!result.success) {
      console.error(`[Transcription] STT error: ${result.error}`);
      return { kind: "error", error: result.error };
    }

    const text = result.text.trim();
    if (text.length === 0) {
      console.log("Could not understand the audio.");
      return { kind: "unintelligible" };
    }

    console.log(`You said: ${text}`);
    return { kind: "ok", text };
  }
}

export class KeyboardTranscriptionGateway implements TranscriptionGateway {
  private typedInput: TypedInput;
  private prompt: string;

  constructor(typedInput: TypedInput, prompt: string = "> ") {
    this.typedInput = typedInput;
    this.prompt = prompt;
  }

  async listen(timeoutSeconds: number): Promise<ListenOutcome> {
    const line = await this.typedInput.ask(this.prompt, timeoutSeconds);
    if (line === undefined) {
      return { kind: "timeout" };
    }

    const text = line.trim();
    return text.length === 0 ? { kind: "unintelligible" } : { kind: "ok", text };
  }
}
