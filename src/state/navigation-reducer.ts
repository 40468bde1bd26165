import {
  CONTROL_ACTIONS,
  type FocusedPanel,
  PANELS,
} from "../types/domain";
import type { AppAction } from "./app-state";

export interface NavigationState {
  focusedPanel: FocusedPanel;
  selectedAction: number;
}

export type NavigationAction =
  | { type: "FOCUS_NEXT" }
  | { type: "FOCUS_PREV" }
  | { type: "SELECT_NEXT_ACTION" }
  | { type: "SELECT_PREV_ACTION" };

export const initialNavigationState: NavigationState = {
  focusedPanel: "status",
  selectedAction: 0,
};

/**
 * Cyclic step through the fixed panel order. Wraps in both directions.
 */
export function stepPanel(panel: FocusedPanel, delta: number): FocusedPanel {
  const n = PANELS.length;
  const idx = PANELS.indexOf(panel);
  return PANELS[(((idx + delta) % n) + n) % n];
}

/**
 * Pure reducer for panel focus and the Controls selection.
 * The selection is clamped to the action list, it never wraps.
 */
export function navigationReducer(
  state: NavigationState,
  action: AppAction,
): NavigationState {
  switch (action.type) {
    case "FOCUS_NEXT":
      return { ...state, focusedPanel: stepPanel(state.focusedPanel, 1) };

    case "FOCUS_PREV":
      return { ...state, focusedPanel: stepPanel(state.focusedPanel, -1) };

    case "SELECT_NEXT_ACTION":
      return {
        ...state,
        selectedAction: Math.min(
          state.selectedAction + 1,
          CONTROL_ACTIONS.length - 1,
        ),
      };

    case "SELECT_PREV_ACTION":
      return {
        ...state,
        selectedAction: Math.max(state.selectedAction - 1, 0),
      };

    default:
      return state;
  }
}
