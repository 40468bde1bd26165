import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ResultAsync } from "neverthrow";
import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

const SESSION_PREFIX = "daemon-console-session-";
const SESSION_SUFFIX = ".log";

interface LoggerConfig {
  sessionId: string;
  keepSessions?: number; // Number of old sessions to keep (default: 5)
  directory?: string;
}

class Logger {
  private pinoLogger: pino.Logger;
  private sessionId: string;
  private logFilePath: string;
  private keepSessions: number;
  private directory: string;

  constructor(config: LoggerConfig) {
    this.sessionId = config.sessionId;
    this.keepSessions = config.keepSessions ?? 5;
    this.directory = config.directory ?? tmpdir();
    this.logFilePath = Logger.getSessionFilePath(this.sessionId, this.directory);

    this.pinoLogger = pino(
      {
        level: "debug",
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({
        dest: this.logFilePath,
        sync: false,
      }),
    );
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.debug({ context, data }, message);
  }

  info(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.info({ context, data }, message);
  }

  warn(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.warn({ context, data }, message);
  }

  error(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.error({ context, data }, message);
  }

  getSessionId(): string {
    return this.sessionId;
  }

  getLogFilePath(): string {
    return this.logFilePath;
  }

  // Clean up old session files, keeping only the most recent N sessions
  cleanupOldSessions(): ResultAsync<void, { message: string }> {
    return ResultAsync.fromPromise(fs.readdir(this.directory), () => ({
      message: "Failed to read log directory",
    })).andThen((files) => {
      const stale = Logger.sessionIdsFrom(files)
        .slice(this.keepSessions)
        .map((id) =>
          ResultAsync.fromPromise(
            fs.unlink(Logger.getSessionFilePath(id, this.directory)),
            () => ({ message: `Failed to delete old log file: ${id}` }),
          ),
        );

      return ResultAsync.combine(stale).map(() => undefined);
    });
  }

  // Session ids found among file names, newest first
  static sessionIdsFrom(files: string[]): string[] {
    return files
      .filter((f) => f.startsWith(SESSION_PREFIX) && f.endsWith(SESSION_SUFFIX))
      .map((f) => f.slice(SESSION_PREFIX.length, -SESSION_SUFFIX.length))
      .sort((a, b) => b.localeCompare(a));
  }

  static getSessionFilePath(sessionId: string, directory = tmpdir()): string {
    return join(directory, `${SESSION_PREFIX}${sessionId}${SESSION_SUFFIX}`);
  }

  // Flush any pending writes
  close(): ResultAsync<void, { message: string }> {
    return ResultAsync.fromPromise(
      new Promise<void>((resolve, reject) => {
        this.pinoLogger.flush((error) => {
          if (error) reject(error);
          else resolve();
        });
      }),
      (error) => ({
        message: error instanceof Error ? error.message : "Failed to flush logger",
      }),
    );
  }
}

// Singleton logger instance
let globalLogger: Logger | null = null;

export function sessionIdFor(date: Date): string {
  return date.toISOString().replace(/[:.]/g, "-").replace("T", "-").split("Z")[0];
}

// Initialize the global logger with a session ID based on current timestamp
export function initializeLogger(
  options: { sessionId?: string; keepSessions?: number } = {},
): ResultAsync<Logger, { message: string }> {
  const id = options.sessionId || sessionIdFor(new Date());

  return ResultAsync.fromPromise(
    Promise.resolve().then(
      () => new Logger({ sessionId: id, keepSessions: options.keepSessions }),
    ),
    (error) => ({
      message:
        error instanceof Error
          ? `Logger initialization failed: ${error.message}`
          : "Logger initialization failed",
    }),
  ).map((logger) => {
    globalLogger = logger;

    // Clean up old sessions in the background
    void logger.cleanupOldSessions().mapErr((error) => {
      logger.warn("Failed to cleanup old log sessions", "logger", error);
    });

    return logger;
  });
}

// Convenience functions for logging
export const log = {
  debug: (message: string, context?: string, data?: unknown) =>
    globalLogger?.debug(message, context, data),
  info: (message: string, context?: string, data?: unknown) =>
    globalLogger?.info(message, context, data),
  warn: (message: string, context?: string, data?: unknown) =>
    globalLogger?.warn(message, context, data),
  error: (message: string, context?: string, data?: unknown) =>
    globalLogger?.error(message, context, data),
};

export { Logger };
