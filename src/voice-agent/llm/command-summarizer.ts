/**
 * Command Summarizer
 *
 * Asks the conversational model for a one-sentence description of a
 * synthesized command, read out before the second confirmation.
 */

import type { LanguageOracle } from "../types.js";

export function buildSummaryPrompt(commandText: string): string {
  return `Summarize in one sentence what the following command does: ${commandText}`;
}

export class CommandSummarizer {
  private oracle: LanguageOracle;
  private model: string;

  constructor(oracle: LanguageOracle, model: string) {
    this.oracle = oracle;
    this.model = model;
  }

  /**
   * Returns an empty string when no summary could be produced
   */
  async summarize(commandText: string): Promise<string> {
    const outcome = await this.oracle.generate({
      model: this.model,
      prompt: buildSummaryPrompt(commandText),
      stream: false,
    });

    if (outcome.kind !== "ok") {
      console.warn(`[CommandSummarizer] No summary available (${outcome.kind})`);
      return "";
    }

    return outcome.text.trim();
  }
}

export function createCommandSummarizer(oracle: LanguageOracle, model: string): CommandSummarizer {
  return new CommandSummarizer(oracle, model);
}
