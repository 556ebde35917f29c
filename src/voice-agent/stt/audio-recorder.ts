/**
 * Audio Recorder
 *
 * Captures one spoken phrase from the default microphone with SoX `rec`.
 * SoX's silence effect drops leading silence and stops after a pause, so the
 * first byte on stdout means speech has started.
 */

import { spawn } from "node:child_process";

export const SAMPLE_RATE = 16000;

/**
 * Outcome of one recording attempt
 */
export type RecordingOutcome =
  | { kind: "audio"; wav: Buffer; duration_ms: number }
  | { kind: "timeout" }
  | { kind: "error"; error: string };

export interface AudioRecorder {
  /** Wait up to `timeoutSeconds` for speech to start, then record the phrase */
  record(timeoutSeconds: number): Promise<RecordingOutcome>;
}

/**
 * Wrap 16-bit mono PCM in a WAV container
 */
export function encodeWav(pcm: Buffer, sampleRate: number = SAMPLE_RATE): Buffer {
  const header = Buffer.alloc(44);
  const byteRate = sampleRate * 2;

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16); // fmt chunk size
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(1, 22); // mono
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(2, 32); // block align
  header.writeUInt16LE(16, 34); // bits per sample
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}

/**
 * SoX arguments for one silence-trimmed phrase of raw PCM on stdout
 */
export function buildRecordArgs(maxRecordingSeconds: number, sampleRate: number = SAMPLE_RATE): string[] {
  return [
    "-q",
    "-c", "1",
    "-r", String(sampleRate),
    "-b", "16",
    "-e", "signed-integer",
    "-t", "raw",
    "-",
    "silence", "1", "0.1", "1%", "1", "1.5", "1%",
    "trim", "0", String(maxRecordingSeconds),
  ];
}

export class SoxAudioRecorder implements AudioRecorder {
  private maxRecordingSeconds: number;
  private binary: string;

  constructor(options: { maxRecordingSeconds: number; binary?: string }) {
    this.maxRecordingSeconds = options.maxRecordingSeconds;
    this.binary = options.binary ?? "rec";
  }

  record(timeoutSeconds: number): Promise<RecordingOutcome> {
    return new Promise((resolve) => {
      const startTime = Date.now();
      const chunks: Buffer[] = [];
      let stderr = "";
      let timedOut = false;

      const child = spawn(this.binary, buildRecordArgs(this.maxRecordingSeconds), {
        stdio: ["ignore", "pipe", "pipe"],
      });

      const silenceTimer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
      }, timeoutSeconds * 1000);

      // trim should end the phrase; this only guards a wedged recorder
      const hardStop = setTimeout(() => {
        child.kill("SIGTERM");
      }, (timeoutSeconds + this.maxRecordingSeconds + 5) * 1000);

      child.stdout?.on("data", (data: Buffer) => {
        if (chunks.length === 0) {
          clearTimeout(silenceTimer);
        }
        chunks.push(data);
      });

      child.stderr?.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      child.on("close", (code, signal) => {
        clearTimeout(silenceTimer);
        clearTimeout(hardStop);

        if (timedOut && chunks.length === 0) {
          resolve({ kind: "timeout" });
          return;
        }

        if (chunks.length === 0) {
          resolve({
            kind: "error",
            error: stderr.trim() || `Recorder exited with ${signal ?? `code ${code}`} and no audio`,
          });
          return;
        }

        resolve({
          kind: "audio",
          wav: encodeWav(Buffer.concat(chunks)),
          duration_ms: Date.now() - startTime,
        });
      });

      child.on("error", (error) => {
        clearTimeout(silenceTimer);
        clearTimeout(hardStop);
        resolve({ kind: "error", error: `Could not start ${this.binary}: ${error.message}` });
      });
    });
  }
}

export function createAudioRecorder(options: { maxRecordingSeconds: number }): SoxAudioRecorder {
  return new SoxAudioRecorder(options);
}
