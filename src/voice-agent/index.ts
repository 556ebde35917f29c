/**
 * Voice Relay Module Exports
 */

// Types
export * from "./types.js";

// Config
export { loadRelayConfig, ConfigError, type LoadConfigOptions } from "./config/config-loader.js";
export { detectSystemProfile, formatSystemProfile, parseOsRelease } from "./system/system-profile.js";

// LLM
export { OllamaClient, createOllamaClient, type OllamaModel } from "./llm/ollama-client.js";
export {
  KeywordCommandClassifier,
  createCommandClassifier,
  DEFAULT_COMMAND_KEYWORDS,
  type CommandClassifier,
} from "./llm/command-classifier.js";
export {
  CommandSynthesizer,
  createCommandSynthesizer,
  buildCommandPrompt,
  stripCodeFence,
} from "./llm/command-synthesizer.js";
export { CommandSummarizer, createCommandSummarizer } from "./llm/command-summarizer.js";

// STT
export { WhisperClient, createWhisperClient, type TranscriptionResult } from "./stt/whisper-client.js";
export { SoxAudioRecorder, createAudioRecorder, type AudioRecorder } from "./stt/audio-recorder.js";
export { VoiceTranscriptionGateway, KeyboardTranscriptionGateway } from "./stt/transcription-gateway.js";
export { TerminalTypedInput, createTypedInput } from "./stt/typed-input.js";

// TTS
export { createTTSEngine, type TTSEngine, type TTSResult } from "./tts/tts-engine.js";
export { Announcer } from "./tts/announcer.js";

// Pipeline
export { ConfirmationGate, isVoiceApproval, isTypedApproval } from "./confirm/confirmation-gate.js";
export { CommandExecutor, createCommandExecutor, splitCommand } from "./executor/command-executor.js";
export { KdeConnectNotifier, createNotifier, type CommandNotifier } from "./notify/notification-pusher.js";
export {
  RelaySession,
  createRelaySession,
  type RelaySessionDeps,
  type RelaySessionOptions,
  type StateChangeEvent,
} from "./session/relay-session.js";
export { createRelay, type Relay } from "./relay.js";

// Utils
export {
  RelayErrorHandler,
  createErrorHandler,
  RelayErrorCode,
  type RelayError,
  type RecoveryAction,
} from "./utils/error-handler.js";
