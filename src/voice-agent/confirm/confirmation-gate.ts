/**
 * Confirmation Gate
 *
 * Yes/no checkpoint in front of synthesis and execution. The prompt is
 * spoken, a spoken answer is awaited, and a typed answer is requested when
 * nothing usable was heard. Every error resolves to `false`.
 */

import { transcriptOf, type TranscriptionGateway, type TypedInput } from "../types.js";
import type { Announcer } from "../tts/announcer.js";

export const TYPED_FALLBACK_PROMPT = "No voice input detected. Type yes or no: ";

/**
 * Decision for a spoken answer: contains "yes" or "run it"
 */
export function isVoiceApproval(response: string): boolean {
  const lower = response.toLowerCase();
  return lower.includes("yes") || lower.includes("run it");
}

/**
 * Decision for a typed answer: exactly "yes", ignoring case and padding
 */
export function isTypedApproval(response: string | undefined): boolean {
  return response !== undefined && response.trim().toLowerCase() === "yes";
}

export interface ConfirmationGateOptions {
  /** How long to wait for the typed fallback */
  typedFallbackTimeoutSeconds: number;
}

export class ConfirmationGate {
  private announcer: Announcer;
  private gateway: TranscriptionGateway;
  private typedInput: TypedInput;
  private typedFallbackTimeoutSeconds: number;

  constructor(
    announcer: Announcer,
    gateway: TranscriptionGateway,
    typedInput: TypedInput,
    options: ConfirmationGateOptions
  ) {
    this.announcer = announcer;
    this.gateway = gateway;
    this.typedInput = typedInput;
    this.typedFallbackTimeoutSeconds = options.typedFallbackTimeoutSeconds;
  }

  /**
   * Ask `promptText` and wait for an answer
   */
  async confirm(promptText: string, timeoutSeconds: number): Promise<boolean> {
    try {
      await this.announcer.announce(promptText);

      const spoken = transcriptOf(await this.gateway.listen(timeoutSeconds));
      if (spoken !== undefined) {
        console.debug(`[ConfirmationGate] Voice confirmation response: ${spoken}`);
        return isVoiceApproval(spoken);
      }

      const typed = await this.typedInput.ask(TYPED_FALLBACK_PROMPT, this.typedFallbackTimeoutSeconds);
      if (typed === undefined) {
        console.log("No typed answer received.");
      }
      return isTypedApproval(typed);
    } catch (error) {
      console.error(
        "[ConfirmationGate] Voice confirmation error:",
        error instanceof Error ? error.message : error
      );
      return false;
    }
  }
}
