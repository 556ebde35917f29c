/**
 * Relay Session
 *
 * The listen → classify → confirm → synthesize → confirm → execute loop.
 * One utterance is handled to completion before the next listen; there is no
 * queueing and no cancellation. A synthesized command reaches the executor
 * only when both confirmation gates returned true in the same cycle.
 *
 * Uses EventEmitter to publish state changes.
 */

import { EventEmitter } from "node:events";
import type {
  CommandRunner,
  CycleReport,
  LanguageOracle,
  ListenOutcome,
  RelaySessionState,
  TranscriptionGateway,
} from "../types.js";
import type { CommandClassifier } from "../llm/command-classifier.js";
import type { CommandSynthesizer } from "../llm/command-synthesizer.js";
import type { CommandSummarizer } from "../llm/command-summarizer.js";
import type { ConfirmationGate } from "../confirm/confirmation-gate.js";
import type { CommandNotifier } from "../notify/notification-pusher.js";
import type { Announcer } from "../tts/announcer.js";
import { RelayErrorCode, type RelayErrorHandler } from "../utils/error-handler.js";

export const ISSUE_CONFIRM_PROMPT =
  "Command detected. Do you want to issue this command? Please say yes or no.";
export const EXECUTE_CONFIRM_PROMPT =
  "Do you want to execute the above command? Please say yes or no.";

/**
 * Timing knobs for the loop
 */
export interface RelaySessionTimings {
  listenTimeoutSeconds: number;
  issueConfirmTimeoutSeconds: number;
  executeConfirmTimeoutSeconds: number;
  cooldownMs: number;
}

/**
 * Collaborators wired in at startup
 */
export interface RelaySessionDeps {
  gateway: TranscriptionGateway;
  classifier: CommandClassifier;
  gate: Pick<ConfirmationGate, "confirm">;
  synthesizer: Pick<CommandSynthesizer, "synthesize">;
  summarizer: Pick<CommandSummarizer, "summarize">;
  executor: CommandRunner;
  announcer: Pick<Announcer, "announce">;
  oracle: LanguageOracle;
  errorHandler: RelayErrorHandler;
  notifier?: CommandNotifier;
  /** Injected so tests can skip the real cooldown */
  sleep?: (ms: number) => Promise<void>;
}

export interface RelaySessionOptions extends RelaySessionTimings {
  systemProfile: string;
  conversationModel: string;
}

/**
 * State change event payload
 */
export interface StateChangeEvent {
  from: RelaySessionState;
  to: RelaySessionState;
  timestamp: Date;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RelaySession extends EventEmitter {
  private deps: RelaySessionDeps;
  private options: RelaySessionOptions;
  private sleep: (ms: number) => Promise<void>;
  private state: RelaySessionState = "idle";
  private cycles = 0;

  constructor(deps: RelaySessionDeps, options: RelaySessionOptions) {
    super();
    this.deps = deps;
    this.options = options;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  getState(): RelaySessionState {
    return this.state;
  }

  getCycleCount(): number {
    return this.cycles;
  }

  /**
   * Loop until the process is killed
   */
  async run(): Promise<never> {
    console.log("Starting voice command interface...");
    console.log(`System profile: ${this.options.systemProfile}`);

    for (;;) {
      const report = await this.runCycle();
      if (report.outcome !== "no_input") {
        console.log("\n--- Waiting for next input ---\n");
      }
    }
  }

  /**
   * Listen once and handle whatever was heard
   */
  async runCycle(): Promise<CycleReport> {
    this.setState("listening");

    let outcome: ListenOutcome;
    try {
      outcome = await this.deps.gateway.listen(this.options.listenTimeoutSeconds);
    } catch (error) {
      outcome = { kind: "error", error: errorMessage(error) };
    }

    if (outcome.kind !== "ok") {
      const detail = outcome.kind === "error" ? `error: ${outcome.error}` : outcome.kind;
      this.deps.errorHandler.report(RelayErrorCode.TRANSCRIPTION_MISS, detail);
      this.setState("idle");
      return { outcome: "no_input" };
    }

    return this.handleUtterance(outcome.text);
  }

  /**
   * Route one utterance through the conversational or command branch
   */
  async handleUtterance(utterance: string): Promise<CycleReport> {
    this.cycles++;
    const isCommand = this.deps.classifier.classify(utterance);

    let report: CycleReport;
    try {
      if (isCommand) {
        this.setState("command_detected");
        report = await this.commandCycle(utterance);
      } else {
        report = await this.converse(utterance);
      }
    } catch (error) {
      const message = errorMessage(error);
      this.deps.errorHandler.report(RelayErrorCode.CYCLE_FAILURE, message);
      this.setState("aborted");
      report = { outcome: "cycle_failed", utterance, error: message };
    }

    if (isCommand) {
      // Let speech output finish before the microphone reopens
      await this.sleep(this.options.cooldownMs);
    }
    this.setState("idle");
    return report;
  }

  private async converse(utterance: string): Promise<CycleReport> {
    this.setState("conversational");

    const outcome = await this.deps.oracle.generate({
      model: this.options.conversationModel,
      prompt: utterance,
      stream: false,
    });

    if (outcome.kind !== "ok") {
      this.recordOracleFailure(outcome.kind, "conversational model");
      console.log("No valid response from the conversational model.");
      return { outcome: "no_reply", utterance };
    }

    const reply = outcome.text.trim();
    await this.deps.announcer.announce(reply, `Conversational LLM response: ${reply}`);
    return { outcome: "conversation", utterance, reply };
  }

  private async commandCycle(utterance: string): Promise<CycleReport> {
    console.debug("[RelaySession] Command detected in input.");

    this.setState("awaiting_confirm_1");
    const issue = await this.deps.gate.confirm(
      ISSUE_CONFIRM_PROMPT,
      this.options.issueConfirmTimeoutSeconds
    );
    if (!issue) {
      this.deps.errorHandler.report(RelayErrorCode.CONFIRMATION_DENIED, `not issued: ${utterance}`);
      console.log("Command not confirmed.");
      this.setState("aborted");
      return { outcome: "not_confirmed", utterance };
    }

    this.setState("synthesizing");
    const synthesis = await this.deps.synthesizer.synthesize(utterance, this.options.systemProfile);
    if (!synthesis.success) {
      this.deps.errorHandler.report(
        synthesis.reason === "oracle" ? RelayErrorCode.ORACLE_UNAVAILABLE : RelayErrorCode.PARSE_FAILURE,
        synthesis.error
      );
      console.log("Could not generate a valid command.");
      this.setState("aborted");
      return { outcome: "synthesis_failed", utterance };
    }

    const command = synthesis.command.command;
    await this.deps.announcer.announce(`Proposed command: ${command}`, `Command generated: ${command}`);

    if (this.deps.notifier) {
      const pushed = await this.deps.notifier.push(command);
      if (!pushed) {
        this.deps.errorHandler.report(RelayErrorCode.NOTIFICATION_FAILURE, command);
      }
    }

    const summary = await this.deps.summarizer.summarize(command);
    if (summary) {
      await this.deps.announcer.announce(`Summary: ${summary}`, `Command summary: ${summary}`);
    } else {
      console.log("No summary generated.");
    }

    this.setState("awaiting_confirm_2");
    const execute = await this.deps.gate.confirm(
      EXECUTE_CONFIRM_PROMPT,
      this.options.executeConfirmTimeoutSeconds
    );
    if (!execute) {
      this.deps.errorHandler.report(RelayErrorCode.CONFIRMATION_DENIED, `not executed: ${command}`);
      console.log("Command execution canceled.");
      this.setState("aborted");
      return { outcome: "execution_canceled", utterance, command, summary: summary || undefined };
    }

    this.setState("executing");
    const execution = await this.deps.executor.execute(command);
    if (!execution.success) {
      this.deps.errorHandler.report(RelayErrorCode.EXECUTION_FAILURE, `${command}: ${execution.error}`);
    }

    return {
      outcome: execution.success ? "executed" : "execution_failed",
      utterance,
      command,
      summary: summary || undefined,
      execution,
    };
  }

  private recordOracleFailure(kind: "timeout" | "unavailable" | "malformed", what: string): void {
    const code =
      kind === "timeout"
        ? RelayErrorCode.ORACLE_TIMEOUT
        : kind === "unavailable"
          ? RelayErrorCode.ORACLE_UNAVAILABLE
          : RelayErrorCode.ORACLE_MALFORMED;
    this.deps.errorHandler.report(code, `${what}: ${kind}`);
  }

  private setState(next: RelaySessionState): void {
    if (next === this.state) return;

    const event: StateChangeEvent = { from: this.state, to: next, timestamp: new Date() };
    this.state = next;
    this.emit("state_change", event);
  }
}

export function createRelaySession(deps: RelaySessionDeps, options: RelaySessionOptions): RelaySession {
  return new RelaySession(deps, options);
}
