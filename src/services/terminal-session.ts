import { err, ok, type Result } from "neverthrow";
import { log } from "./logger";

const ENTER_ALT_SCREEN = "\u001B[?1049h";
const LEAVE_ALT_SCREEN = "\u001B[?1049l";
const SHOW_CURSOR = "\u001B[?25h";

// Conventional 128 + signal number
const SIGNAL_EXIT_CODES = {
  SIGINT: 130,
  SIGTERM: 143,
  SIGHUP: 129,
} as const;

type SessionSignal = keyof typeof SIGNAL_EXIT_CODES;

const SESSION_SIGNALS: readonly SessionSignal[] = ["SIGINT", "SIGTERM", "SIGHUP"];

export interface TerminalOutput {
  readonly isTTY?: boolean;
  write(chunk: string): boolean;
}

export interface TerminalInput {
  readonly isTTY?: boolean;
}

export interface SignalHost {
  on(event: SessionSignal | "exit", listener: () => void): unknown;
  off(event: SessionSignal | "exit", listener: () => void): unknown;
  exit(code: number): void;
}

export interface TerminalSession {
  /** Leaves the alternate screen. Only the first call has an effect. */
  release(): void;
}

export type TerminalError = { message: string };

export interface AcquireTerminalOptions {
  output?: TerminalOutput;
  input?: TerminalInput;
  host?: SignalHost;
}

/**
 * Switch to the alternate screen and guarantee the switch back on every
 * way out: explicit release, process exit, or a terminating signal.
 */
export function acquireTerminal({
  output = process.stdout,
  input = process.stdin,
  host = process,
}: AcquireTerminalOptions = {}): Result<TerminalSession, TerminalError> {
  if (!output.isTTY || !input.isTTY) {
    return err({
      message: "An interactive terminal is required (stdin and stdout must be a TTY)",
    });
  }

  const write = (chunk: string) => {
    try {
      output.write(chunk);
    } catch (error) {
      log.warn("Terminal write failed", "terminal", {
        message: error instanceof Error ? error.message : String(error),
      });
    }
  };

  let released = false;
  const signalListeners = new Map<SessionSignal, () => void>();

  const release = () => {
    if (released) return;
    released = true;
    host.off("exit", release);
    for (const [signal, listener] of signalListeners) host.off(signal, listener);
    write(LEAVE_ALT_SCREEN + SHOW_CURSOR);
  };

  for (const signal of SESSION_SIGNALS) {
    const listener = () => {
      release();
      host.exit(SIGNAL_EXIT_CODES[signal]);
    };
    signalListeners.set(signal, listener);
    host.on(signal, listener);
  }
  host.on("exit", release);

  write(ENTER_ALT_SCREEN);
  return ok({ release });
}
