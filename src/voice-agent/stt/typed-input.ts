/**
 * Terminal line input with a deadline, used for the typed confirmation
 * fallback and for keyboard input mode.
 *
 * One readline interface is kept for the life of the input. Lines that
 * arrive while nobody is asking are queued and answer the next question,
 * so piped input is never dropped.
 */

import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { TypedInput } from "../types.js";

export class TerminalTypedInput implements TypedInput {
  private input: Readable;
  private output: Writable;
  private rl?: Interface;
  private pending: string[] = [];
  private waiter?: (line: string | undefined) => void;
  private inputClosed = false;

  constructor(input: Readable = process.stdin, output: Writable = process.stdout) {
    this.input = input;
    this.output = output;
  }

  async ask(question: string, timeoutSeconds: number): Promise<string | undefined> {
    this.attach();
    this.output.write(question);

    const queued = this.pending.shift();
    if (queued !== undefined) return queued;
    if (this.inputClosed) return undefined;

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        this.output.write("\n");
        resolve(undefined);
      }, timeoutSeconds * 1000);

      this.waiter = (line) => {
        clearTimeout(timer);
        resolve(line);
      };
    });
  }

  private attach(): void {
    if (this.rl) return;

    const rl = createInterface({ input: this.input, terminal: false });
    rl.on("line", (line) => {
      const waiter = this.waiter;
      if (waiter) {
        this.waiter = undefined;
        waiter(line);
      } else {
        this.pending.push(line);
      }
    });
    rl.on("close", () => {
      this.inputClosed = true;
      const waiter = this.waiter;
      this.waiter = undefined;
      waiter?.(undefined);
    });
    this.rl = rl;
  }
}

export function createTypedInput(): TerminalTypedInput {
  return new TerminalTypedInput();
}
