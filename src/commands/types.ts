import type { ActivityLogger } from "../services/activity-log";
import type { DaemonClient } from "../services/daemon-client";
import type { AppAction, AppState } from "../state/app-state";
import type { KeyInputEvent } from "../types/events";

export interface CommandContext {
  getState(): AppState;
  dispatch(action: AppAction): void;
  client: DaemonClient;
  activity: ActivityLogger;
}

export interface Command {
  description: string;
  canExecute?(context: CommandContext): boolean;
  execute(context: CommandContext): void | Promise<void>;
}

export interface InputHandler {
  /** Higher runs first */
  priority: number;
  canHandle(context: CommandContext): boolean;
  /** The command bound to this key, or null to let the next handler try */
  handleInput(event: KeyInputEvent, context: CommandContext): Command | null;
}
