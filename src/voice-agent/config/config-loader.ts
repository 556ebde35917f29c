/**
 * Relay Config Loader
 *
 * Builds the relay configuration once at startup.
 * Precedence: defaults < YAML file < RELAY_* environment < CLI overrides.
 */

import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import type {
  InputSource,
  NotifySettings,
  RelayConfig,
  TTSProviderType,
  TTSSettings,
} from "../types.js";
import { DEFAULT_RELAY_CONFIG } from "../types.js";

const INPUT_SOURCES: readonly InputSource[] = ["voice", "keyboard"];
const TTS_PROVIDERS: readonly TTSProviderType[] = ["auto", "espeak", "say", "silent"];

/**
 * Raised when a config source holds a value of the wrong shape
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(`${source}: ${message}`);
    this.name = "ConfigError";
  }
}

/**
 * Loosely-typed config layer, before validation
 */
export type RawConfig = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Path to a YAML config file */
  configPath?: string;

  /** Environment to read RELAY_* variables from */
  env?: Record<string, string | undefined>;

  /** Values from CLI flags */
  overrides?: RawConfig;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read and parse a YAML config file
 */
export function readConfigFile(configPath: string): RawConfig {
  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `cannot read file (${error instanceof Error ? error.message : String(error)})`,
      configPath
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `invalid YAML (${error instanceof Error ? error.message : String(error)})`,
      configPath
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError("top level must be a mapping", configPath);
  }
  return parsed;
}

/**
 * Map RELAY_* environment variables onto config keys
 */
export function configFromEnv(env: Record<string, string | undefined>): RawConfig {
  const raw: RawConfig = {};
  const strings: Array<[string, string]> = [
    ["RELAY_OLLAMA_URL", "ollamaUrl"],
    ["RELAY_CONVERSATION_MODEL", "conversationModel"],
    ["RELAY_COMMAND_MODEL", "commandModel"],
    ["RELAY_STT_URL", "sttServerUrl"],
    ["RELAY_LANGUAGE", "language"],
    ["RELAY_INPUT", "input"],
    ["RELAY_SYSTEM_PROFILE", "systemProfile"],
  ];

  for (const [name, key] of strings) {
    const value = env[name];
    if (value !== undefined && value.trim().length > 0) {
      raw[key] = value.trim();
    }
  }

  const provider = env.RELAY_TTS_PROVIDER;
  if (provider !== undefined && provider.trim().length > 0) {
    raw.tts = { provider: provider.trim() };
  }

  const verbose = env.RELAY_VERBOSE;
  if (verbose !== undefined && verbose.length > 0) {
    raw.verbose = verbose === "1" || verbose.toLowerCase() === "true";
  }

  return raw;
}

/**
 * Validates one layer at a time and folds it into the running config
 */
class ConfigBuilder {
  private config: RelayConfig;

  constructor() {
    this.config = {
      ...DEFAULT_RELAY_CONFIG,
      commandKeywords: [...DEFAULT_RELAY_CONFIG.commandKeywords],
      tts: { ...DEFAULT_RELAY_CONFIG.tts },
      notify: { ...DEFAULT_RELAY_CONFIG.notify },
    };
  }

  apply(raw: RawConfig, source: string): this {
    const c = this.config;
    const str = (key: string): string | undefined => this.string(raw, key, source);
    const num = (key: string, min: number): number | undefined => this.number(raw, key, min, source);

    c.ollamaUrl = this.url(str("ollamaUrl"), "ollamaUrl", source) ?? c.ollamaUrl;
    c.conversationModel = str("conversationModel") ?? c.conversationModel;
    c.commandModel = str("commandModel") ?? c.commandModel;
    c.oracleTimeoutMs = num("oracleTimeoutMs", 1) ?? c.oracleTimeoutMs;
    c.sttServerUrl = this.url(str("sttServerUrl"), "sttServerUrl", source) ?? c.sttServerUrl;
    c.language = str("language") ?? c.language;
    c.listenTimeoutSeconds = num("listenTimeoutSeconds", 1) ?? c.listenTimeoutSeconds;
    c.maxRecordingSeconds = num("maxRecordingSeconds", 1) ?? c.maxRecordingSeconds;
    c.issueConfirmTimeoutSeconds = num("issueConfirmTimeoutSeconds", 1) ?? c.issueConfirmTimeoutSeconds;
    c.executeConfirmTimeoutSeconds = num("executeConfirmTimeoutSeconds", 1) ?? c.executeConfirmTimeoutSeconds;
    c.typedFallbackTimeoutSeconds = num("typedFallbackTimeoutSeconds", 1) ?? c.typedFallbackTimeoutSeconds;
    c.cooldownMs = num("cooldownMs", 0) ?? c.cooldownMs;
    c.executionTimeoutMs = num("executionTimeoutMs", 0) ?? c.executionTimeoutMs;
    c.systemProfile = str("systemProfile") ?? c.systemProfile;

    const input = str("input");
    if (input !== undefined) {
      c.input = this.oneOf(input, INPUT_SOURCES, "input", source);
    }

    if (raw.commandKeywords !== undefined) {
      c.commandKeywords = this.keywords(raw.commandKeywords, source);
    }

    if (raw.verbose !== undefined) {
      if (typeof raw.verbose !== "boolean") {
        throw new ConfigError("verbose must be a boolean", source);
      }
      c.verbose = raw.verbose;
    }

    if (raw.tts !== undefined) {
      c.tts = this.tts(raw.tts, c.tts, source);
    }

    if (raw.notify !== undefined) {
      c.notify = this.notify(raw.notify, c.notify, source);
    }

    return this;
  }

  build(): Readonly<RelayConfig> {
    Object.freeze(this.config.commandKeywords);
    Object.freeze(this.config.tts);
    Object.freeze(this.config.notify);
    return Object.freeze(this.config);
  }

  private string(raw: RawConfig, key: string, source: string): string | undefined {
    const value = raw[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "string" || value.trim().length === 0) {
      throw new ConfigError(`${key} must be a non-empty string`, source);
    }
    return value.trim();
  }

  private number(raw: RawConfig, key: string, min: number, source: string): number | undefined {
    const value = raw[key];
    if (value === undefined || value === null) return undefined;

    const parsed = typeof value === "string" ? Number(value) : value;
    if (typeof parsed !== "number" || !Number.isFinite(parsed) || parsed < min) {
      throw new ConfigError(`${key} must be a number >= ${min}`, source);
    }
    return parsed;
  }

  private url(value: string | undefined, key: string, source: string): string | undefined {
    if (value === undefined) return undefined;
    try {
      new URL(value);
    } catch {
      throw new ConfigError(`${key} is not a valid URL: ${value}`, source);
    }
    return value;
  }

  private oneOf<T extends string>(value: string, allowed: readonly T[], key: string, source: string): T {
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new ConfigError(`${key} must be one of ${allowed.join(", ")}`, source);
    }
    return match;
  }

  private keywords(value: unknown, source: string): string[] {
    const list = typeof value === "string" ? value.split(",") : value;
    if (!Array.isArray(list)) {
      throw new ConfigError("commandKeywords must be a list of words", source);
    }

    const words: string[] = [];
    for (const item of list) {
      if (typeof item !== "string") {
        throw new ConfigError("commandKeywords must be a list of words", source);
      }
      const word = item.trim().toLowerCase();
      if (word.length > 0) words.push(word);
    }

    if (words.length === 0) {
      throw new ConfigError("commandKeywords must not be empty", source);
    }
    return words;
  }

  private tts(value: unknown, current: TTSSettings, source: string): TTSSettings {
    if (!isRecord(value)) {
      throw new ConfigError("tts must be a mapping", source);
    }

    const next: TTSSettings = { ...current };
    const provider = this.string(value, "provider", source);
    if (provider !== undefined) {
      next.provider = this.oneOf(provider, TTS_PROVIDERS, "tts.provider", source);
    }
    next.voice = this.string(value, "voice", source) ?? next.voice;

    // 80-450 WPM covers both espeak and say
    const rate = this.number(value, "rate", 80, source);
    if (rate !== undefined) {
      if (rate > 450) {
        throw new ConfigError("tts.rate must be <= 450", source);
      }
      next.rate = rate;
    }
    return next;
  }

  private notify(value: unknown, current: NotifySettings, source: string): NotifySettings {
    if (!isRecord(value)) {
      throw new ConfigError("notify must be a mapping", source);
    }

    const next: NotifySettings = { ...current };
    if (value.enabled !== undefined) {
      if (typeof value.enabled !== "boolean") {
        throw new ConfigError("notify.enabled must be a boolean", source);
      }
      next.enabled = value.enabled;
    }
    next.device = this.string(value, "device", source) ?? next.device;
    return next;
  }
}

/**
 * Build the frozen relay configuration
 *
 * @throws ConfigError when any layer holds an invalid value
 */
export function loadRelayConfig(options: LoadConfigOptions = {}): Readonly<RelayConfig> {
  const builder = new ConfigBuilder();

  if (options.configPath) {
    builder.apply(readConfigFile(options.configPath), options.configPath);
  }
  builder.apply(configFromEnv(options.env ?? process.env), "environment");
  if (options.overrides) {
    builder.apply(options.overrides, "command line");
  }

  return builder.build();
}
