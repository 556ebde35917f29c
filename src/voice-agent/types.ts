/**
 * Voice Relay TypeScript Interfaces
 *
 * Type definitions for the voice-driven command relay.
 */

/**
 * Where utterances come from
 */
export type InputSource = "voice" | "keyboard";

/**
 * Outcome of a single listen call.
 *
 * The failure kinds are kept apart for logging; callers that only need the
 * text use `transcriptOf()`.
 */
export type ListenOutcome =
  | { kind: "ok"; text: string }
  | { kind: "timeout" }
  | { kind: "unintelligible" }
  | { kind: "error"; error: string };

/**
 * Outcome of a single oracle request
 */
export type OracleOutcome =
  | { kind: "ok"; text: string; model: string; duration_ms: number }
  | { kind: "timeout"; timeoutMs: number }
  | { kind: "unavailable"; error: string }
  | { kind: "malformed"; raw: string };

/**
 * Request sent to the generation endpoint
 */
export interface OracleRequest {
  model: string;
  prompt: string;
  stream: boolean;
}

/**
 * Anything that turns a prompt into free text
 */
export interface LanguageOracle {
  generate(request: OracleRequest): Promise<OracleOutcome>;
}

/**
 * Anything that can produce an utterance
 */
export interface TranscriptionGateway {
  listen(timeoutSeconds: number): Promise<ListenOutcome>;
}

/**
 * Blocking line prompt used when voice input is missing
 */
export interface TypedInput {
  /** Resolves with the typed line, or undefined on timeout / closed input */
  ask(question: string, timeoutSeconds: number): Promise<string | undefined>;
}

/**
 * Shell command produced by the command model
 */
export interface SynthesizedCommand {
  /** Literal command text */
  command: string;

  /** Any other keys the model returned */
  details: Record<string, unknown>;
}

/**
 * Result of a synthesis attempt
 */
export type SynthesisResult =
  | { success: true; command: SynthesizedCommand; raw: string }
  | {
      success: false;
      reason: "oracle" | "parse" | "shape";
      error: string;
      raw?: string;
    };

/**
 * Result from running an approved command
 */
export type ExecutionResult =
  | {
      success: true;
      program: string;
      args: string[];
      exitCode: 0;
      duration_ms: number;
    }
  | {
      success: false;
      program?: string;
      args?: string[];
      exitCode?: number;
      error: string;
      duration_ms: number;
    };

/**
 * Anything that runs an approved command
 */
export interface CommandRunner {
  execute(commandText: string): Promise<ExecutionResult>;
}

/**
 * Relay session states
 */
export type RelaySessionState =
  | "idle"
  | "listening"
  | "conversational"
  | "command_detected"
  | "awaiting_confirm_1"
  | "synthesizing"
  | "awaiting_confirm_2"
  | "executing"
  | "aborted";

/**
 * How a single loop iteration ended
 */
export type CycleOutcome =
  | "no_input"
  | "conversation"
  | "no_reply"
  | "not_confirmed"
  | "synthesis_failed"
  | "execution_canceled"
  | "executed"
  | "execution_failed"
  | "cycle_failed";

/**
 * Report of a single loop iteration
 */
export interface CycleReport {
  outcome: CycleOutcome;

  /** Transcribed text, when there was one */
  utterance?: string;

  /** Synthesized command text, when synthesis succeeded */
  command?: string;

  /** Summary that was spoken, if any */
  summary?: string;

  /** Conversational reply, if any */
  reply?: string;

  /** Executor result, when the command ran */
  execution?: ExecutionResult;

  /** What went wrong, for cycle_failed */
  error?: string;
}

/**
 * Text-to-speech providers
 */
export type TTSProviderType = "auto" | "espeak" | "say" | "silent";

/**
 * Speech output settings
 */
export interface TTSSettings {
  provider: TTSProviderType;

  /** Voice name passed to the engine, engine default when unset */
  voice?: string;

  /** Speech rate in words per minute */
  rate: number;
}

/**
 * Notification side-channel settings
 */
export interface NotifySettings {
  enabled: boolean;

  /** KDE Connect device id, all reachable devices when unset */
  device?: string;
}

/**
 * Relay configuration, built once at startup
 */
export interface RelayConfig {
  /** Ollama server URL */
  ollamaUrl: string;

  /** Model for free-form conversation and summaries */
  conversationModel: string;

  /** Model for natural-language-to-command translation */
  commandModel: string;

  /** Per-request oracle timeout */
  oracleTimeoutMs: number;

  /** Whisper STT server URL */
  sttServerUrl: string;

  /** Language hint for STT (auto-detect if not set) */
  language?: string;

  input: InputSource;

  listenTimeoutSeconds: number;
  maxRecordingSeconds: number;
  issueConfirmTimeoutSeconds: number;
  executeConfirmTimeoutSeconds: number;
  typedFallbackTimeoutSeconds: number;

  /** Pause after a command cycle before the microphone reopens */
  cooldownMs: number;

  /** Kill executed commands after this long, 0 waits forever */
  executionTimeoutMs: number;

  /** Trigger words for the keyword classifier, in match order */
  commandKeywords: string[];

  tts: TTSSettings;
  notify: NotifySettings;

  /** Overrides host detection when set */
  systemProfile?: string;

  verbose: boolean;
}

/**
 * Default relay configuration
 */
export const DEFAULT_RELAY_CONFIG: RelayConfig = {
  ollamaUrl: "http://localhost:11434",
  conversationModel: "llama3.2:3b",
  commandModel: "qwen2.5-coder:3b",
  oracleTimeoutMs: 60000,
  sttServerUrl: "http://localhost:5001",
  input: "voice",
  listenTimeoutSeconds: 15,
  maxRecordingSeconds: 30,
  issueConfirmTimeoutSeconds: 15,
  executeConfirmTimeoutSeconds: 5,
  typedFallbackTimeoutSeconds: 30,
  cooldownMs: 3000,
  executionTimeoutMs: 0,
  commandKeywords: ["open", "launch", "execute", "run", "shutdown"],
  tts: {
    provider: "auto",
    rate: 170,
  },
  notify: {
    enabled: false,
  },
  verbose: false,
};

/**
 * Whisper STT server status
 */
export interface STTServerStatus {
  healthy: boolean;
  model: string;
  modelLoaded: boolean;
  url: string;
}

/**
 * Ollama server status
 */
export interface LLMServerStatus {
  healthy: boolean;
  url: string;
  models: string[];
}

/**
 * Collapse a listen outcome to its text
 */
export function transcriptOf(outcome: ListenOutcome): string | undefined {
  return outcome.kind === "ok" ? outcome.text : undefined;
}
