#!/usr/bin/env node

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { loadRelayConfig, ConfigError, type RawConfig } from "./voice-agent/config/config-loader.js";
import { detectSystemProfile } from "./voice-agent/system/system-profile.js";
import { createRelay } from "./voice-agent/relay.js";
import type { StateChangeEvent } from "./voice-agent/session/relay-session.js";
import { createOllamaClient } from "./voice-agent/llm/ollama-client.js";
import { createWhisperClient } from "./voice-agent/stt/whisper-client.js";
import type { RelayConfig } from "./voice-agent/types.js";

const packageJson = JSON.parse(
  readFileSync(new URL("../package.json", import.meta.url), "utf-8")
) as { version: string };

interface CliOptions {
  config?: string;
  ollamaUrl?: string;
  conversationModel?: string;
  commandModel?: string;
  sttUrl?: string;
  input?: string;
  tts?: string;
  cooldown?: string;
  notify?: boolean;
  notifyDevice?: string;
  verbose?: boolean;
}

/**
 * Map CLI flags onto config keys; unset flags are left out
 */
function overridesFromOptions(options: CliOptions): RawConfig {
  const overrides: RawConfig = {};

  if (options.ollamaUrl) overrides.ollamaUrl = options.ollamaUrl;
  if (options.conversationModel) overrides.conversationModel = options.conversationModel;
  if (options.commandModel) overrides.commandModel = options.commandModel;
  if (options.sttUrl) overrides.sttServerUrl = options.sttUrl;
  if (options.input) overrides.input = options.input;
  if (options.cooldown) overrides.cooldownMs = options.cooldown;
  if (options.tts) overrides.tts = { provider: options.tts };
  if (options.verbose) overrides.verbose = true;

  if (options.notify || options.notifyDevice) {
    overrides.notify = {
      enabled: true,
      ...(options.notifyDevice ? { device: options.notifyDevice } : {}),
    };
  }

  return overrides;
}

function resolveConfig(program: Command): Readonly<RelayConfig> {
  const options = program.opts<CliOptions>();
  const config = loadRelayConfig({
    configPath: options.config,
    overrides: overridesFromOptions(options),
  });

  if (!config.verbose) {
    console.debug = () => undefined;
  }
  return config;
}

function fail(error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
  } else if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error("An unexpected error occurred");
  }
  process.exit(1);
}

const program = new Command();

program
  .name("voice-relay")
  .description("Voice-driven command relay with double confirmation")
  .version(packageJson.version)
  .option("-c, --config <path>", "YAML configuration file")
  .option("--ollama-url <url>", "Ollama server URL")
  .option("--conversation-model <name>", "Model for conversation and summaries")
  .option("--command-model <name>", "Model for command generation")
  .option("--stt-url <url>", "Whisper STT server URL")
  .option("--input <source>", "Input source: voice or keyboard")
  .option("--tts <provider>", "Speech output: auto, espeak, say or silent")
  .option("--cooldown <ms>", "Pause after each command cycle")
  .option("--notify", "Push proposed commands to a phone with KDE Connect")
  .option("--notify-device <id>", "KDE Connect device id (implies --notify)")
  .option("-v, --verbose", "Show diagnostic output");

program
  .command("listen", { isDefault: true })
  .description("Run the listen/confirm/execute loop until killed")
  .action(async () => {
    try {
      const config = resolveConfig(program);
      const relay = await createRelay(config, detectSystemProfile(config.systemProfile));
      relay.session.on("state_change", ({ to }: StateChangeEvent) => {
        console.debug(`[RelaySession] state -> ${to}`);
      });
      process.once("SIGINT", () => {
        console.log(`\nStopped after ${relay.session.getCycleCount()} cycles.`);
        console.log(relay.errorHandler.formatSummary());
        process.exit(130);
      });
      await relay.session.run();
    } catch (error) {
      fail(error);
    }
  });

program
  .command("profile")
  .description("Print the system profile sent to the command model")
  .action(() => {
    try {
      const config = resolveConfig(program);
      console.log(detectSystemProfile(config.systemProfile));
    } catch (error) {
      fail(error);
    }
  });

program
  .command("check")
  .description("Check that the Ollama and Whisper servers are reachable")
  .action(async () => {
    try {
      const config = resolveConfig(program);
      const llm = await createOllamaClient(config).checkHealth();
      const stt = await createWhisperClient(config).checkHealth();

      console.log(`Ollama  ${llm.url}: ${llm.healthy ? "ok" : "unreachable"}`);
      for (const model of [config.conversationModel, config.commandModel]) {
        const present = llm.models.some((m) => m === model || m.startsWith(`${model}:`));
        console.log(`  ${model}: ${present ? "available" : "missing (ollama pull " + model + ")"}`);
      }
      console.log(
        `Whisper ${stt.url}: ${stt.healthy ? `ok (model ${stt.model}${stt.modelLoaded ? ", loaded" : ""})` : "unreachable"}`
      );

      if (config.input === "voice" && !stt.healthy) {
        process.exitCode = 1;
      }
      if (!llm.healthy) {
        process.exitCode = 1;
      }
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
