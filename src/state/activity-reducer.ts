import type { LogEntry } from "../types/domain";
import type { AppAction } from "./app-state";

export interface ActivityState {
  logs: readonly LogEntry[];
  scroll: number;
}

export type ActivityAction =
  | { type: "ADD_LOG"; payload: LogEntry }
  | { type: "SCROLL_LOGS_UP" }
  | { type: "SCROLL_LOGS_DOWN" };

export const initialActivityState: ActivityState = {
  logs: [],
  scroll: 0,
};

function lastIndex(logs: readonly LogEntry[]): number {
  return Math.max(0, logs.length - 1);
}

/**
 * Pure reducer for the activity log.
 * Appending always jumps the scroll offset to the newest entry; explicit
 * scrolling stays within [0, len - 1] until the next append.
 */
export function activityReducer(
  state: ActivityState,
  action: AppAction,
): ActivityState {
  switch (action.type) {
    case "ADD_LOG": {
      const logs = [...state.logs, action.payload];
      return { logs, scroll: lastIndex(logs) };
    }

    case "SCROLL_LOGS_UP":
      return { ...state, scroll: Math.max(state.scroll - 1, 0) };

    case "SCROLL_LOGS_DOWN":
      return {
        ...state,
        scroll: Math.min(state.scroll + 1, lastIndex(state.logs)),
      };

    default:
      return state;
  }
}
