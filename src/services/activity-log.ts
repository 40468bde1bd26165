import type { AppAction } from "../state/app-state";
import type { ActivityLevel } from "../types/domain";
import { formatClock } from "../utils/formatters";
import { log } from "./logger";

/**
 * Activity logger interface - what commands use to report to the operator
 */
export interface ActivityLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type Clock = () => Date;

/**
 * Appends entries to the in-app activity log and mirrors each one into the
 * session log file.
 */
export class ActivityLogService implements ActivityLogger {
  constructor(
    private readonly dispatch: (action: AppAction) => void,
    private readonly clock: Clock = () => new Date(),
  ) {}

  info(message: string): void {
    this.append("INFO", message);
    log.info(message, "activity");
  }

  warn(message: string): void {
    this.append("WARN", message);
    log.warn(message, "activity");
  }

  error(message: string): void {
    this.append("ERROR", message);
    log.error(message, "activity");
  }

  private append(level: ActivityLevel, message: string): void {
    this.dispatch({
      type: "ADD_LOG",
      payload: { timestamp: formatClock(this.clock()), level, message },
    });
  }
}

/**
 * Factory function to create an activity log bound to a dispatch function
 */
export function createActivityLog(
  dispatch: (action: AppAction) => void,
  clock?: Clock,
): ActivityLogService {
  return new ActivityLogService(dispatch, clock);
}
