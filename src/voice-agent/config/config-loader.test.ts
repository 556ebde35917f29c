import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError, configFromEnv, loadRelayConfig, readConfigFile } from "./config-loader.js";
import { DEFAULT_RELAY_CONFIG } from "../types.js";

describe("loadRelayConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "relay-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const path = join(dir, "relay.yaml");
    writeFileSync(path, content);
    return path;
  }

  it("returns the defaults with no sources", () => {
    expect(loadRelayConfig({ env: {} })).toEqual(DEFAULT_RELAY_CONFIG);
  });

  it("reads values from a YAML file", () => {
    const configPath = writeConfig(
      [
        "conversationModel: mistral:7b",
        "cooldownMs: 0",
        "commandKeywords: [Open, start]",
        "tts:",
        "  provider: silent",
        "notify:",
        "  enabled: true",
        "  device: phone-1",
      ].join("\n")
    );

    const config = loadRelayConfig({ configPath, env: {} });

    expect(config.conversationModel).toBe("mistral:7b");
    expect(config.cooldownMs).toBe(0);
    expect(config.commandKeywords).toEqual(["open", "start"]);
    expect(config.tts).toEqual({ provider: "silent", rate: 170 });
    expect(config.notify).toEqual({ enabled: true, device: "phone-1" });
    expect(config.commandModel).toBe("qwen2.5-coder:3b");
  });

  it("layers environment over the file and flags over both", () => {
    const configPath = writeConfig("commandModel: file-model\nconversationModel: file-chat\n");

    const config = loadRelayConfig({
      configPath,
      env: { RELAY_COMMAND_MODEL: "env-model", RELAY_CONVERSATION_MODEL: "env-chat" },
      overrides: { conversationModel: "flag-chat", cooldownMs: "500" },
    });

    expect(config.commandModel).toBe("env-model");
    expect(config.conversationModel).toBe("flag-chat");
    expect(config.cooldownMs).toBe(500);
  });

  it("freezes the result", () => {
    const config = loadRelayConfig({ env: {} });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.tts)).toBe(true);
    expect(Object.isFrozen(config.commandKeywords)).toBe(true);
  });

  it("does not share state with the defaults", () => {
    loadRelayConfig({ env: {}, overrides: { commandKeywords: "boot" } });
    expect(DEFAULT_RELAY_CONFIG.commandKeywords).toEqual(["open", "launch", "execute", "run", "shutdown"]);
  });

  it("names the source of an invalid value", () => {
    expect(() => loadRelayConfig({ env: { RELAY_INPUT: "telepathy" } })).toThrow(
      new ConfigError("input must be one of voice, keyboard", "environment")
    );
    expect(() => loadRelayConfig({ env: {}, overrides: { cooldownMs: -1 } })).toThrow(
      "command line: cooldownMs must be a number >= 0"
    );
  });

  it.each([
    ["ollamaUrl: not a url", "ollamaUrl is not a valid URL: not a url"],
    ["listenTimeoutSeconds: soon", "listenTimeoutSeconds must be a number >= 1"],
    ["commandKeywords: []", "commandKeywords must not be empty"],
    ["verbose: maybe", "verbose must be a boolean"],
    ["tts:\n  rate: 900", "tts.rate must be <= 450"],
    ["tts: loud", "tts must be a mapping"],
    ["notify:\n  enabled: yes please", "notify.enabled must be a boolean"],
  ])("rejects %j", (content, message) => {
    const configPath = writeConfig(content);
    expect(() => loadRelayConfig({ configPath, env: {} })).toThrow(`${configPath}: ${message}`);
  });
});

describe("readConfigFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "relay-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("treats an empty file as no settings", () => {
    const path = join(dir, "empty.yaml");
    writeFileSync(path, "");
    expect(readConfigFile(path)).toEqual({});
  });

  it("rejects a top-level list", () => {
    const path = join(dir, "list.yaml");
    writeFileSync(path, "- a\n- b\n");
    expect(() => readConfigFile(path)).toThrow(`${path}: top level must be a mapping`);
  });

  it("reports a missing file as a ConfigError", () => {
    expect(() => readConfigFile(join(dir, "missing.yaml"))).toThrow(ConfigError);
  });
});

describe("configFromEnv", () => {
  it("maps RELAY_* variables and ignores blanks", () => {
    expect(
      configFromEnv({
        RELAY_OLLAMA_URL: " http://gpu-box:11434 ",
        RELAY_STT_URL: "",
        RELAY_TTS_PROVIDER: "espeak",
        RELAY_VERBOSE: "TRUE",
        HOME: "/home/test",
      })
    ).toEqual({
      ollamaUrl: "http://gpu-box:11434",
      tts: { provider: "espeak" },
      verbose: true,
    });
  });
});
