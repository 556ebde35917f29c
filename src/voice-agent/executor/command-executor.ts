/**
 * Command Executor
 *
 * Runs an approved command as a child process, without a shell. The command
 * text is split on whitespace; quotes are not interpreted, so an argument
 * cannot contain spaces. The child shares the relay's terminal.
 */

import { spawn, type ChildProcess } from "node:child_process";
import type { CommandRunner, ExecutionResult } from "../types.js";

export interface CommandExecutorOptions {
  /** Working directory for the child */
  cwd?: string;

  /** Kill the child after this many milliseconds; 0 waits forever */
  timeoutMs?: number;
}

/**
 * Split command text into program and bare arguments
 */
export function splitCommand(commandText: string): { program: string; args: string[] } | undefined {
  const tokens = commandText.split(/\s+/).filter((token) => token.length > 0);
  const [program, ...args] = tokens;
  return program === undefined ? undefined : { program, args };
}

export class CommandExecutor implements CommandRunner {
  private cwd: string;
  private timeoutMs: number;

  constructor(options: CommandExecutorOptions = {}) {
    this.cwd = options.cwd || process.cwd();
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  async execute(commandText: string): Promise<ExecutionResult> {
    const startTime = Date.now();
    const parts = splitCommand(commandText);

    if (!parts) {
      return { success: false, error: "No command provided", duration_ms: 0 };
    }

    const { program, args } = parts;
    const result = await this.spawnAndWait(program, args, startTime);

    if (result.success) {
      console.log("Command executed successfully.");
    } else {
      console.error(`Command execution failed: ${result.error}`);
    }
    return result;
  }

  private spawnAndWait(program: string, args: string[], startTime: number): Promise<ExecutionResult> {
    return new Promise((resolve) => {
      let timedOut = false;
      let timeoutId: NodeJS.Timeout | undefined;

      let child: ChildProcess;
      try {
        child = spawn(program, args, { cwd: this.cwd, stdio: "inherit" });
      } catch (error) {
        // Invalid arguments (e.g. NUL bytes) throw before any process exists
        resolve({
          success: false,
          program,
          args,
          error: error instanceof Error ? error.message : String(error),
          duration_ms: Date.now() - startTime,
        });
        return;
      }

      if (this.timeoutMs > 0) {
        timeoutId = setTimeout(() => {
          timedOut = true;
          child.kill("SIGTERM");
        }, this.timeoutMs);
      }

      child.on("close", (code, signal) => {
        clearTimeout(timeoutId);
        const duration_ms = Date.now() - startTime;

        if (code === 0 && !timedOut) {
          resolve({ success: true, program, args, exitCode: 0, duration_ms });
          return;
        }

        let error: string;
        if (timedOut) {
          error = `Command timed out after ${this.timeoutMs}ms`;
        } else if (code === null) {
          error = `Command terminated by ${signal ?? "signal"}`;
        } else {
          error = `Command returned non-zero exit status ${code}`;
        }

        resolve({ success: false, program, args, exitCode: code ?? undefined, error, duration_ms });
      });

      child.on("error", (error) => {
        clearTimeout(timeoutId);
        resolve({
          success: false,
          program,
          args,
          error: error.message,
          duration_ms: Date.now() - startTime,
        });
      });
    });
  }
}

export function createCommandExecutor(options: CommandExecutorOptions = {}): CommandExecutor {
  return new CommandExecutor(options);
}
