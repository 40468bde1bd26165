import type React from "react";
import chalk from "chalk";
import { log } from "./logger";

type FatalEvent = "uncaughtException" | "unhandledRejection";

export interface ErrorHost {
  on(event: FatalEvent, listener: (reason: unknown) => void): unknown;
  off(event: FatalEvent, listener: (reason: unknown) => void): unknown;
  exit(code: number): void;
}

export function describeError(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) return { message: error.message, stack: error.stack };
  return { message: String(error) };
}

/**
 * Log anything that escapes, run `onFatal` (terminal release) and exit 1.
 * Returns a function that removes the handlers.
 */
export function setupGlobalErrorHandlers(
  onFatal: () => void,
  host: ErrorHost = process,
): () => void {
  const fatal = (kind: FatalEvent) => (reason: unknown) => {
    const details = describeError(reason);
    log.error(`Unhandled ${kind}`, "error-handler", details);
    onFatal();
    console.error(chalk.red(`Fatal error: ${details.message}`));
    host.exit(1);
  };

  const onException = fatal("uncaughtException");
  const onRejection = fatal("unhandledRejection");
  host.on("uncaughtException", onException);
  host.on("unhandledRejection", onRejection);

  return () => {
    host.off("uncaughtException", onException);
    host.off("unhandledRejection", onRejection);
  };
}

export function logReactError(error: Error, errorInfo: React.ErrorInfo): void {
  log.error("Dashboard render failed", "react", {
    ...describeError(error),
    componentStack: errorInfo.componentStack,
  });
}
