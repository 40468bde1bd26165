import type { AppAction } from "./app-state";

export interface TerminalState {
  rows: number;
  cols: number;
}

export interface UIState {
  shouldQuit: boolean;
  terminal: TerminalState;
  statusMessage: string | null;
}

export type UIAction =
  | { type: "QUIT" }
  | { type: "SET_TERMINAL_SIZE"; payload: TerminalState }
  | { type: "SET_STATUS_MESSAGE"; payload: string }
  | { type: "CLEAR_STATUS_MESSAGE" };

export function createInitialUIState(terminal: TerminalState): UIState {
  return {
    shouldQuit: false,
    terminal,
    statusMessage: null,
  };
}

/**
 * Pure reducer for UI state
 * Handles the quit flag, terminal size and the transient footer message
 */
export function uiReducer(state: UIState, action: AppAction): UIState {
  switch (action.type) {
    case "QUIT":
      return { ...state, shouldQuit: true };

    case "SET_TERMINAL_SIZE":
      return { ...state, terminal: { ...action.payload } };

    case "SET_STATUS_MESSAGE":
      return { ...state, statusMessage: action.payload };

    case "CLEAR_STATUS_MESSAGE":
      return { ...state, statusMessage: null };

    default:
      return state;
  }
}
