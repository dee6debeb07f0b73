/**
 * Structured logging to stderr for MCP server observability
 * All logs go to stderr since stdout is reserved for MCP protocol
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogFields = Record<string, unknown>;

export interface LogEvent extends LogFields {
  ts: string;
  level: LogLevel;
  event: string;
  tool?: string;
  duration_ms?: number;
  err_code?: string;
  err_message?: string;
}

/**
 * Read the `code` of an error-like value, if it has a string or numeric one
 */
export function errorCodeOf(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err) {
    const { code } = err;
    if (typeof code === "string" || typeof code === "number") {
      return String(code);
    }
  }
  return undefined;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  return LEVELS.find((level) => level === value) ?? "info";
}

export class Logger {
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = "info") {
    this.#minLevel = minLevel;
  }

  get level(): LogLevel {
    return this.#minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, data?: LogFields): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ...data,
      ts: new Date().toISOString(),
      level,
      event,
    };

    // Always use stderr to avoid polluting stdout (MCP protocol channel)
    console.error(JSON.stringify(logEvent));
  }

  debug(event: string, data?: LogFields): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: LogFields): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: LogFields): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: LogFields): void {
    this.log("error", event, data);
  }

  // Helper for tool execution logging
  toolCall(tool: string, duration_ms: number, success: boolean, err?: Error): void {
    if (success) {
      this.info("tool.success", { tool, duration_ms });
    } else {
      this.error("tool.error", {
        tool,
        duration_ms,
        err_code: errorCodeOf(err) ?? "UNKNOWN",
        err_message: err?.message ?? "unknown error",
      });
    }
  }
}

// Singleton logger instance
export const logger = new Logger(parseLogLevel(process.env.LOG_LEVEL));
