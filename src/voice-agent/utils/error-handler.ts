/**
 * Error Handler
 *
 * Failure taxonomy for the relay. Every code except CONFIG_INVALID is
 * non-fatal: the session records it and goes back to listening.
 */

/**
 * Relay error codes
 */
export enum RelayErrorCode {
  // Input (1xx)
  TRANSCRIPTION_MISS = 100,

  // Oracle (2xx)
  ORACLE_TIMEOUT = 200,
  ORACLE_UNAVAILABLE = 201,
  ORACLE_MALFORMED = 202,
  PARSE_FAILURE = 203,

  // Pipeline (3xx)
  CONFIRMATION_DENIED = 300,
  EXECUTION_FAILURE = 301,

  // Side channels (4xx)
  SPEECH_FAILURE = 400,
  NOTIFICATION_FAILURE = 401,

  // Internal (5xx)
  CYCLE_FAILURE = 500,

  // Startup (9xx)
  CONFIG_INVALID = 900,
}

/**
 * Recovery hint attached to a recorded error
 */
export interface RecoveryAction {
  type: "listen_again" | "abort_cycle" | "ignore" | "fix_config";
  description: string;

  /** Shell command that may fix the underlying problem */
  alternative?: string;
}

/**
 * A recorded relay error
 */
export interface RelayError {
  code: RelayErrorCode;
  message: string;
  recovery: RecoveryAction;
  fatal: boolean;
  timestamp: Date;
}

export interface ErrorStats {
  total: number;
  byCode: Partial<Record<RelayErrorCode, number>>;
  lastError?: Date;
}

/**
 * Recovery hint for each code
 */
export function suggestRecovery(code: RelayErrorCode): RecoveryAction {
  switch (code) {
    case RelayErrorCode.TRANSCRIPTION_MISS:
      return { type: "listen_again", description: "Nothing was heard, listening again" };

    case RelayErrorCode.ORACLE_TIMEOUT:
      return {
        type: "abort_cycle",
        description: "The model took too long, try a smaller model or raise oracleTimeoutMs",
      };

    case RelayErrorCode.ORACLE_UNAVAILABLE:
      return {
        type: "abort_cycle",
        description: "Start the Ollama server",
        alternative: "ollama serve",
      };

    case RelayErrorCode.ORACLE_MALFORMED:
    case RelayErrorCode.PARSE_FAILURE:
      return { type: "abort_cycle", description: "Rephrase the instruction and try again" };

    case RelayErrorCode.CONFIRMATION_DENIED:
      return { type: "abort_cycle", description: "Command dropped at your request" };

    case RelayErrorCode.EXECUTION_FAILURE:
      return {
        type: "abort_cycle",
        description: "The command failed; arguments are split on whitespace and never quoted",
      };

    case RelayErrorCode.SPEECH_FAILURE:
      return {
        type: "ignore",
        description: "Install a speech engine or run with --tts silent",
        alternative: "sudo apt install espeak-ng",
      };

    case RelayErrorCode.NOTIFICATION_FAILURE:
      return { type: "ignore", description: "Check that kdeconnect-cli can reach the device" };

    case RelayErrorCode.CYCLE_FAILURE:
      return { type: "abort_cycle", description: "Unexpected failure, the cycle was dropped" };

    case RelayErrorCode.CONFIG_INVALID:
      return { type: "fix_config", description: "Fix the configuration file or flags" };
  }
}

/**
 * Codes that are part of normal operation and are not shown
 */
const QUIET_CODES: ReadonlySet<RelayErrorCode> = new Set([
  RelayErrorCode.TRANSCRIPTION_MISS,
  RelayErrorCode.CONFIRMATION_DENIED,
]);

/**
 * Bounded in-memory error log
 */
export class RelayErrorHandler {
  private errorLog: RelayError[] = [];
  private maxLogSize: number;

  constructor(options: { maxLogSize?: number } = {}) {
    this.maxLogSize = options.maxLogSize || 100;
  }

  /**
   * Record an error and return it
   */
  record(code: RelayErrorCode, message: string): RelayError {
    const error: RelayError = {
      code,
      message,
      recovery: suggestRecovery(code),
      fatal: code === RelayErrorCode.CONFIG_INVALID,
      timestamp: new Date(),
    };

    this.errorLog.push(error);
    if (this.errorLog.length > this.maxLogSize) {
      this.errorLog = this.errorLog.slice(-this.maxLogSize);
    }

    return error;
  }

  /**
   * Record an error and print it with its recovery hint
   */
  report(code: RelayErrorCode, message: string): RelayError {
    const error = this.record(code, message);
    if (!QUIET_CODES.has(code)) {
      console.warn(this.formatError(error));
    }
    return error;
  }

  getStats(): ErrorStats {
    const byCode: Partial<Record<RelayErrorCode, number>> = {};
    for (const error of this.errorLog) {
      byCode[error.code] = (byCode[error.code] ?? 0) + 1;
    }

    return {
      total: this.errorLog.length,
      byCode,
      lastError: this.errorLog.at(-1)?.timestamp,
    };
  }

  /**
   * Format error for display
   */
  formatError(error: RelayError): string {
    let message = `[${error.code}] ${error.message}`;
    message += `\n  Recovery: ${error.recovery.description}`;
    if (error.recovery.alternative) {
      message += `\n  Try: ${error.recovery.alternative}`;
    }
    return message;
  }

  /**
   * One line per code, for the exit summary
   */
  formatSummary(): string {
    const { total, byCode } = this.getStats();
    const lines = [`${total} error${total === 1 ? "" : "s"} recorded`];
    for (const [code, count] of Object.entries(byCode)) {
      lines.push(`  ${RelayErrorCode[Number(code)]}: ${count}`);
    }
    return lines.join("\n");
  }
}

export function createErrorHandler(options: { maxLogSize?: number } = {}): RelayErrorHandler {
  return new RelayErrorHandler(options);
}
