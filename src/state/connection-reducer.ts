import type {
  ConnectionStatus,
  DaemonMetrics,
  DaemonStatus,
} from "../types/domain";
import type { AppAction } from "./app-state";

export interface ConnectionState {
  status: ConnectionStatus;
  daemonStatus: DaemonStatus | null;
  daemonMetrics: DaemonMetrics | null;
}

export type ConnectionAction =
  | { type: "SET_CONNECTION_STATUS"; payload: ConnectionStatus }
  | { type: "SET_DAEMON_STATUS"; payload: DaemonStatus }
  | { type: "SET_DAEMON_METRICS"; payload: DaemonMetrics };

export const initialConnectionState: ConnectionState = {
  status: { kind: "disconnected" },
  daemonStatus: null,
  daemonMetrics: null,
};

/**
 * Pure reducer for the connection lifecycle and the last known snapshots.
 * Snapshots only exist while connected: leaving the connected state drops
 * them, and snapshots arriving while not connected are ignored.
 */
export function connectionReducer(
  state: ConnectionState,
  action: AppAction,
): ConnectionState {
  switch (action.type) {
    case "SET_CONNECTION_STATUS":
      if (action.payload.kind === "connected") {
        return { ...state, status: action.payload };
      }
      return {
        status: action.payload,
        daemonStatus: null,
        daemonMetrics: null,
      };

    case "SET_DAEMON_STATUS":
      if (state.status.kind !== "connected") return state;
      return { ...state, daemonStatus: action.payload };

    case "SET_DAEMON_METRICS":
      if (state.status.kind !== "connected") return state;
      return { ...state, daemonMetrics: action.payload };

    default:
      return state;
  }
}
