import { beforeEach, describe, expect, it, vi } from "vitest";
import { KeyboardTranscriptionGateway, VoiceTranscriptionGateway } from "./transcription-gateway.js";
import type { AudioRecorder, RecordingOutcome } from "./audio-recorder.js";
import type { TranscriptionResult } from "./whisper-client.js";

const WAV = Buffer.from("RIFF");

function recorderReturning(outcome: RecordingOutcome): AudioRecorder & { timeouts: number[] } {
  const timeouts: number[] = [];
  return {
    timeouts,
    async record(timeoutSeconds) {
      timeouts.push(timeoutSeconds);
      return outcome;
    },
  };
}

function whisperReturning(result: TranscriptionResult) {
  return { transcribe: vi.fn(async (_wav: Buffer) => result) };
}

describe("VoiceTranscriptionGateway", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("transcribes a recorded phrase", async () => {
    const recorder = recorderReturning({ kind: "audio", wav: WAV, duration_ms: 900 });
    const whisper = whisperReturning({ success: true, text: " open the calculator " });

    const outcome = await new VoiceTranscriptionGateway(recorder, whisper).listen(15);

    expect(outcome).toEqual({ kind: "ok", text: "open the calculator" });
    expect(recorder.timeouts).toEqual([15]);
    expect(whisper.transcribe).toHaveBeenCalledWith(WAV);
    expect(console.log).toHaveBeenCalledWith("You said: open the calculator");
  });

  it("times out without calling the STT server", async () => {
    const whisper = whisperReturning({ success: true, text: "unused" });

    const outcome = await new VoiceTranscriptionGateway(recorderReturning({ kind: "timeout" }), whisper).listen(5);

    expect(outcome).toEqual({ kind: "timeout" });
    expect(whisper.transcribe).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledWith("No speech detected within 5 seconds.");
  });

  it("treats blank transcripts as unintelligible", async () => {
    const gateway = new VoiceTranscriptionGateway(
      recorderReturning({ kind: "audio", wav: WAV, duration_ms: 100 }),
      whisperReturning({ success: true, text: "  " })
    );

    expect(await gateway.listen(5)).toEqual({ kind: "unintelligible" });
  });

  it("passes on recorder and STT errors", async () => {
    const broken = new VoiceTranscriptionGateway(
      recorderReturning({ kind: "error", error: "no microphone" }),
      whisperReturning({ success: true, text: "unused" })
    );
    const down = new VoiceTranscriptionGateway(
      recorderReturning({ kind: "audio", wav: WAV, duration_ms: 100 }),
      whisperReturning({ success: false, error: "Transcription request failed: fetch failed" })
    );

    expect(await broken.listen(5)).toEqual({ kind: "error", error: "no microphone" });
    expect(await down.listen(5)).toEqual({
      kind: "error",
      error: "Transcription request failed: fetch failed",
    });
  });
});

describe("KeyboardTranscriptionGateway", () => {
  it("maps typed lines to listen outcomes", async () => {
    const answers: Array<string | undefined> = ["  run the backup script ", "", undefined];
    const ask = vi.fn(async (_question: string, _timeoutSeconds: number) => answers.shift());
    const gateway = new KeyboardTranscriptionGateway({ ask });

    expect(await gateway.listen(15)).toEqual({ kind: "ok", text: "run the backup script" });
    expect(await gateway.listen(15)).toEqual({ kind: "unintelligible" });
    expect(await gateway.listen(15)).toEqual({ kind: "timeout" });
    expect(ask).toHaveBeenCalledWith("> ", 15);
  });
});
