import { beforeEach, describe, expect, it, vi } from "vitest";
import { CommandSummarizer, buildSummaryPrompt } from "./command-summarizer.js";
import type { LanguageOracle, OracleOutcome } from "../types.js";

describe("CommandSummarizer", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("sends the summary prompt to the given model", async () => {
    const generate = vi.fn<LanguageOracle["generate"]>().mockResolvedValue({
      kind: "ok",
      text: "  Opens the KDE calculator.\n",
      model: "chat-model",
      duration_ms: 3,
    });
    const summarizer = new CommandSummarizer({ generate }, "chat-model");

    expect(await summarizer.summarize("kcalc")).toBe("Opens the KDE calculator.");
    expect(generate).toHaveBeenCalledWith({
      model: "chat-model",
      prompt: "Summarize in one sentence what the following command does: kcalc",
      stream: false,
    });
  });

  it("returns an empty string when the model fails", async () => {
    const outcomes: OracleOutcome[] = [
      { kind: "timeout", timeoutMs: 10 },
      { kind: "unavailable", error: "down" },
      { kind: "malformed", raw: "<html>" },
    ];

    for (const outcome of outcomes) {
      const summarizer = new CommandSummarizer({ generate: async () => outcome }, "chat-model");
      expect(await summarizer.summarize("kcalc")).toBe("");
    }
  });

  it("builds the prompt from the command text", () => {
    expect(buildSummaryPrompt("ls -la")).toBe(
      "Summarize in one sentence what the following command does: ls -la"
    );
  });
});
