import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  ConfirmationGate,
  TYPED_FALLBACK_PROMPT,
  isTypedApproval,
  isVoiceApproval,
} from "./confirmation-gate.js";
import { Announcer } from "../tts/announcer.js";
import { SilentTTSEngine } from "../tts/silent-tts.js";
import { createErrorHandler } from "../utils/error-handler.js";
import type { ListenOutcome, TranscriptionGateway, TypedInput } from "../types.js";

function gatewayReturning(outcome: ListenOutcome | Error): TranscriptionGateway & { calls: number[] } {
  const calls: number[] = [];
  return {
    calls,
    async listen(timeoutSeconds) {
      calls.push(timeoutSeconds);
      if (outcome instanceof Error) throw outcome;
      return outcome;
    },
  };
}

function typedReturning(answer: string | undefined): TypedInput & { questions: string[] } {
  const questions: string[] = [];
  return {
    questions,
    async ask(question) {
      questions.push(question);
      return answer;
    },
  };
}

function buildGate(gateway: TranscriptionGateway, typed: TypedInput) {
  const tts = new SilentTTSEngine();
  const gate = new ConfirmationGate(new Announcer(tts, createErrorHandler()), gateway, typed, {
    typedFallbackTimeoutSeconds: 30,
  });
  return { gate, tts };
}

describe("approval rules", () => {
  it("accepts spoken answers containing yes or run it", () => {
    expect(isVoiceApproval("Yes please")).toBe(true);
    expect(isVoiceApproval("okay RUN IT")).toBe(true);
    expect(isVoiceApproval("yesterday")).toBe(true);
  });

  it("rejects any other spoken answer", () => {
    expect(isVoiceApproval("no")).toBe(false);
    expect(isVoiceApproval("sure")).toBe(false);
    expect(isVoiceApproval("run")).toBe(false);
    expect(isVoiceApproval("")).toBe(false);
  });

  it("accepts only an exact typed yes", () => {
    expect(isTypedApproval("Yes")).toBe(true);
    expect(isTypedApproval("  YES \n")).toBe(true);
    expect(isTypedApproval("sure")).toBe(false);
    expect(isTypedApproval("yes please")).toBe(false);
    expect(isTypedApproval("y")).toBe(false);
    expect(isTypedApproval("")).toBe(false);
    expect(isTypedApproval(undefined)).toBe(false);
  });
});

describe("ConfirmationGate", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "debug").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("speaks the prompt and listens with the given timeout", async () => {
    const gateway = gatewayReturning({ kind: "ok", text: "yes" });
    const typed = typedReturning("no");
    const { gate, tts } = buildGate(gateway, typed);

    expect(await gate.confirm("Run it?", 15)).toBe(true);
    expect(tts.getSpoken()).toEqual(["Run it?"]);
    expect(gateway.calls).toEqual([15]);
    expect(typed.questions).toEqual([]);
  });

  it("denies a spoken no without asking for typed input", async () => {
    const typed = typedReturning("yes");
    const { gate } = buildGate(gatewayReturning({ kind: "ok", text: "no thanks" }), typed);

    expect(await gate.confirm("Run it?", 5)).toBe(false);
    expect(typed.questions).toEqual([]);
  });

  it.each<ListenOutcome>([
    { kind: "timeout" },
    { kind: "unintelligible" },
    { kind: "error", error: "STT down" },
  ])("falls back to typed input after $kind", async (outcome) => {
    const typed = typedReturning("Yes");
    const { gate } = buildGate(gatewayReturning(outcome), typed);

    expect(await gate.confirm("Run it?", 5)).toBe(true);
    expect(typed.questions).toEqual([TYPED_FALLBACK_PROMPT]);
  });

  it("denies a typed answer other than yes", async () => {
    const { gate } = buildGate(gatewayReturning({ kind: "timeout" }), typedReturning("sure"));
    expect(await gate.confirm("Run it?", 5)).toBe(false);
  });

  it("denies when the typed prompt times out", async () => {
    const { gate } = buildGate(gatewayReturning({ kind: "timeout" }), typedReturning(undefined));
    expect(await gate.confirm("Run it?", 5)).toBe(false);
  });

  it("denies when listening throws", async () => {
    const typed = typedReturning("yes");
    const { gate } = buildGate(gatewayReturning(new Error("microphone unplugged")), typed);

    expect(await gate.confirm("Run it?", 5)).toBe(false);
    expect(typed.questions).toEqual([]);
  });

  it("denies when typed input throws", async () => {
    const typed: TypedInput = {
      ask: async () => {
        throw new Error("stdin closed");
      },
    };
    const { gate } = buildGate(gatewayReturning({ kind: "timeout" }), typed);

    expect(await gate.confirm("Run it?", 5)).toBe(false);
  });
});
