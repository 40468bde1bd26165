import {
  type ActivityAction,
  type ActivityState,
  activityReducer,
  initialActivityState,
} from "./activity-reducer";
import {
  type ConnectionAction,
  type ConnectionState,
  connectionReducer,
  initialConnectionState,
} from "./connection-reducer";
import {
  initialNavigationState,
  type NavigationAction,
  type NavigationState,
  navigationReducer,
} from "./navigation-reducer";
import {
  createInitialUIState,
  type TerminalState,
  type UIAction,
  type UIState,
  uiReducer,
} from "./ui-reducer";

// Re-export types from individual reducers
export type {
  ActivityState,
  ConnectionState,
  NavigationState,
  TerminalState,
  UIState,
};

export interface AppState {
  // Fixed at construction
  address: string;
  startedAt: number;

  connection: ConnectionState;
  navigation: NavigationState;
  activity: ActivityState;
  ui: UIState;
}

export type AppAction =
  | NavigationAction
  | ActivityAction
  | ConnectionAction
  | UIAction;

export interface InitialStateOptions {
  address: string;
  startedAt?: number;
  terminal?: TerminalState;
}

export function createInitialState({
  address,
  startedAt = Date.now(),
  terminal = { rows: 24, cols: 80 },
}: InitialStateOptions): AppState {
  return {
    address,
    startedAt,
    connection: initialConnectionState,
    navigation: initialNavigationState,
    activity: initialActivityState,
    ui: createInitialUIState(terminal),
  };
}

// Combined reducer; every slice sees every action and ignores the rest
export function appStateReducer(state: AppState, action: AppAction): AppState {
  return {
    ...state,
    connection: connectionReducer(state.connection, action),
    navigation: navigationReducer(state.navigation, action),
    activity: activityReducer(state.activity, action),
    ui: uiReducer(state.ui, action),
  };
}

/**
 * Single owner of the application state. Only the main loop (through the
 * dispatcher) writes to it; renders read immutable snapshots.
 */
export class StateStore {
  private state: AppState;

  constructor(initial: AppState) {
    this.state = initial;
  }

  getState = (): AppState => this.state;

  dispatch = (action: AppAction): void => {
    this.state = appStateReducer(this.state, action);
  };
}
