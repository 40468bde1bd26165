// Domain types used across the console (stable)

export type ConnectionStatus =
  | { kind: "disconnected" }
  | { kind: "connecting" }
  | { kind: "connected" }
  | { kind: "error"; message: string };

export const PANELS = ["status", "controls", "logs"] as const;
export type FocusedPanel = (typeof PANELS)[number];

export const CONTROL_ACTIONS = ["start", "stop", "restart", "reload"] as const;
export type ControlAction = (typeof CONTROL_ACTIONS)[number];

export const CONTROL_ACTION_LABELS: Record<ControlAction, string> = {
  start: "Start",
  stop: "Stop",
  restart: "Restart",
  reload: "Reload",
};

export type ActivityLevel = "INFO" | "WARN" | "ERROR";

export type LogEntry = Readonly<{
  timestamp: string; // HH:MM:SS, local time
  level: ActivityLevel;
  message: string;
}>;

// "unrecognized" covers any wire value outside the known set
export type DaemonState =
  | "unknown"
  | "starting"
  | "running"
  | "stopping"
  | "stopped"
  | "error"
  | "unrecognized";

export type DaemonStatus = {
  state: DaemonState;
  stateCode: number;
  version: string;
  uptimeSeconds: number;
  message: string;
};

export type DaemonMetrics = {
  cpuUsagePercent: number;
  memoryBytes: number;
  memoryLimitBytes: number;
  connectionsActive: number;
  requestsTotal: number;
  errorsTotal: number;
};

export type ControlResult = {
  success: boolean;
  message: string;
};
