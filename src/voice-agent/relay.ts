/**
 * Relay wiring
 *
 * Builds every component from one frozen configuration.
 */

import type { RelayConfig, TranscriptionGateway, TypedInput } from "./types.js";
import { createOllamaClient, type OllamaClient } from "./llm/ollama-client.js";
import { createCommandClassifier } from "./llm/command-classifier.js";
import { createCommandSynthesizer } from "./llm/command-synthesizer.js";
import { createCommandSummarizer } from "./llm/command-summarizer.js";
import { createAudioRecorder } from "./stt/audio-recorder.js";
import { createWhisperClient, type WhisperClient } from "./stt/whisper-client.js";
import { KeyboardTranscriptionGateway, VoiceTranscriptionGateway } from "./stt/transcription-gateway.js";
import { createTypedInput } from "./stt/typed-input.js";
import { createTTSEngine, type TTSEngine } from "./tts/tts-engine.js";
import { Announcer } from "./tts/announcer.js";
import { ConfirmationGate } from "./confirm/confirmation-gate.js";
import { createCommandExecutor } from "./executor/command-executor.js";
import { createNotifier } from "./notify/notification-pusher.js";
import { createRelaySession, type RelaySession } from "./session/relay-session.js";
import { createErrorHandler, type RelayErrorHandler } from "./utils/error-handler.js";

export interface Relay {
  session: RelaySession;
  oracle: OllamaClient;
  whisper: WhisperClient;
  tts: TTSEngine;
  errorHandler: RelayErrorHandler;
}

export interface RelayOverrides {
  typedInput?: TypedInput;
  tts?: TTSEngine;
}

function createGateway(config: Readonly<RelayConfig>, whisper: WhisperClient, typedInput: TypedInput): TranscriptionGateway {
  if (config.input === "keyboard") {
    return new KeyboardTranscriptionGateway(typedInput);
  }
  return new VoiceTranscriptionGateway(
    createAudioRecorder({ maxRecordingSeconds: config.maxRecordingSeconds }),
    whisper
  );
}

/**
 * Assemble a relay session and the clients behind it
 */
export async function createRelay(
  config: Readonly<RelayConfig>,
  systemProfile: string,
  overrides: RelayOverrides = {}
): Promise<Relay> {
  const errorHandler = createErrorHandler();
  const oracle = createOllamaClient(config);
  const whisper = createWhisperClient(config);
  const typedInput = overrides.typedInput ?? createTypedInput();
  const tts = overrides.tts ?? (await createTTSEngine(config.tts));
  const announcer = new Announcer(tts, errorHandler);
  const gateway = createGateway(config, whisper, typedInput);

  const session = createRelaySession(
    {
      gateway,
      classifier: createCommandClassifier(config.commandKeywords),
      gate: new ConfirmationGate(announcer, gateway, typedInput, {
        typedFallbackTimeoutSeconds: config.typedFallbackTimeoutSeconds,
      }),
      synthesizer: createCommandSynthesizer(oracle, config.commandModel),
      summarizer: createCommandSummarizer(oracle, config.conversationModel),
      executor: createCommandExecutor({ timeoutMs: config.executionTimeoutMs }),
      announcer,
      oracle,
      errorHandler,
      notifier: createNotifier(config.notify),
    },
    {
      systemProfile,
      conversationModel: config.conversationModel,
      listenTimeoutSeconds: config.listenTimeoutSeconds,
      issueConfirmTimeoutSeconds: config.issueConfirmTimeoutSeconds,
      executeConfirmTimeoutSeconds: config.executeConfirmTimeoutSeconds,
      cooldownMs: config.cooldownMs,
    }
  );

  return { session, oracle, whisper, tts, errorHandler };
}
