/**
 * Command Synthesizer
 *
 * Turns a spoken instruction into a shell command by asking the command
 * model for a JSON object with a single "command" key. The reply is
 * untrusted: anything that is not that exact shape is rejected, and nothing
 * here ever runs the command.
 */

import type {
  LanguageOracle,
  OracleOutcome,
  SynthesisResult,
  SynthesizedCommand,
} from "../types.js";

/**
 * Desktop-specific guidance, matched against the system profile
 */
interface DesktopHint {
  pattern: RegExp;
  instruction: string;
}

const DESKTOP_HINTS: DesktopHint[] = [
  {
    pattern: /\b(kde|plasma)\b/i,
    instruction:
      "Do not output generic commands such as 'gnome-terminal'; instead, use 'konsole' or another KDE-compatible terminal.",
  },
  {
    pattern: /\b(gnome|ubuntu:gnome|unity)\b/i,
    instruction:
      "Do not output KDE-specific commands such as 'konsole'; instead, use 'gnome-terminal' or another GNOME-compatible application.",
  },
  {
    pattern: /\bxfce\b/i,
    instruction:
      "Do not output commands for other desktops such as 'gnome-terminal' or 'konsole'; instead, use 'xfce4-terminal' or another XFCE-compatible application.",
  },
];

const GENERIC_DESKTOP_INSTRUCTION =
  "Only use programs that exist on this operating system and desktop environment.";

/**
 * Pick the desktop instruction for a system profile
 */
export function desktopInstruction(systemProfile: string): string {
  const hint = DESKTOP_HINTS.find((h) => h.pattern.test(systemProfile));
  return hint ? hint.instruction : GENERIC_DESKTOP_INSTRUCTION;
}

/**
 * Build the prompt sent to the command model
 */
export function buildCommandPrompt(rawUtterance: string, systemProfile: string): string {
  return (
    `This system is running on ${systemProfile}. ` +
    "Please convert the following instruction into a JSON object with a single key 'command' " +
    "that is appropriate for this environment. " +
    `${desktopInstruction(systemProfile)} ` +
    `Instruction: ${rawUtterance}`
  );
}

/**
 * Remove a leading ```json marker and a trailing ``` marker
 */
export function stripCodeFence(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith("```json")) {
    cleaned = cleaned.slice("```json".length).trim();
  }
  if (cleaned.endsWith("```")) {
    cleaned = cleaned.slice(0, -3).trim();
  }
  return cleaned;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed reply as a SynthesizedCommand
 */
export function toSynthesizedCommand(value: unknown): SynthesizedCommand | undefined {
  if (!isPlainObject(value)) return undefined;

  const { command, ...details } = value;
  if (typeof command !== "string" || command.trim().length === 0) {
    return undefined;
  }

  return { command: command.trim(), details };
}

function oracleFailure(outcome: Exclude<OracleOutcome, { kind: "ok" }>): SynthesisResult {
  switch (outcome.kind) {
    case "timeout":
      return {
        success: false,
        reason: "oracle",
        error: `Command model timed out after ${outcome.timeoutMs}ms`,
      };
    case "unavailable":
      return { success: false, reason: "oracle", error: outcome.error };
    case "malformed":
      return {
        success: false,
        reason: "oracle",
        error: "Command model returned an unreadable reply",
        raw: outcome.raw,
      };
  }
}

/**
 * Command Synthesizer class
 */
export class CommandSynthesizer {
  private oracle: LanguageOracle;
  private model: string;

  constructor(oracle: LanguageOracle, model: string) {
    this.oracle = oracle;
    this.model = model;
  }

  /**
   * Ask the command model for a command. Failure is an ordinary outcome.
   */
  async synthesize(rawUtterance: string, systemProfile: string): Promise<SynthesisResult> {
    const prompt = buildCommandPrompt(rawUtterance, systemProfile);
    console.debug(`[CommandSynthesizer] Command prompt: ${prompt}`);

    const outcome = await this.oracle.generate({ model: this.model, prompt, stream: false });

    if (outcome.kind !== "ok") {
      return oracleFailure(outcome);
    }

    const raw = outcome.text;
    console.debug(`[CommandSynthesizer] Command model response text: ${raw}`);

    const cleaned = stripCodeFence(raw);
    let parsed: unknown;
    try {
      parsed = JSON.parse(cleaned);
    } catch (parseError) {
      return {
        success: false,
        reason: "parse",
        error: `Failed to parse command response as JSON: ${
          parseError instanceof Error ? parseError.message : "Unknown"
        }`,
        raw,
      };
    }

    const command = toSynthesizedCommand(parsed);
    if (!command) {
      return {
        success: false,
        reason: "shape",
        error: "Command response has no 'command' string",
        raw,
      };
    }

    return { success: true, command, raw };
  }
}

export function createCommandSynthesizer(oracle: LanguageOracle, model: string): CommandSynthesizer {
  return new CommandSynthesizer(oracle, model);
}
