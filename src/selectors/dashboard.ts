import type { AppState } from "../state/app-state";
import {
  CONTROL_ACTIONS,
  type ConnectionStatus,
  type ControlAction,
  type DaemonMetrics,
  type DaemonStatus,
  type LogEntry,
} from "../types/domain";
import { formatBytes, formatPercent } from "../utils/formatters";

const STATE_LABELS = {
  unknown: "Unknown",
  starting: "Starting",
  running: "Running",
  stopping: "Stopping",
  stopped: "Stopped",
  error: "Error",
  unrecognized: "Invalid",
} as const;

// Header (3) + footer (3) + the logs panel border (2) and title (1)
const LOG_PANEL_OVERHEAD = 9;

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function currentAction(state: AppState): ControlAction {
  return CONTROL_ACTIONS[state.navigation.selectedAction];
}

export function daemonStateLabel(status: DaemonStatus | null): string {
  return status ? STATE_LABELS[status.state] : "N/A";
}

export function connectionLabel(status: ConnectionStatus): {
  text: string;
  color: string;
} {
  switch (status.kind) {
    case "connected":
      return { text: "Connected", color: "green" };
    case "connecting":
      return { text: "Connecting...", color: "yellow" };
    case "disconnected":
      return { text: "Disconnected", color: "red" };
    case "error":
      return { text: status.message, color: "red" };
  }
}

export type GaugeModel = {
  ratio: number;
  label: string;
};

export function cpuGauge(metrics: DaemonMetrics): GaugeModel {
  const pct = Math.min(100, Math.max(0, metrics.cpuUsagePercent));
  return { ratio: clamp01(pct / 100), label: `CPU: ${formatPercent(pct)}` };
}

export function memoryGauge(metrics: DaemonMetrics): GaugeModel {
  const ratio =
    metrics.memoryLimitBytes > 0
      ? clamp01(metrics.memoryBytes / metrics.memoryLimitBytes)
      : 0;
  return {
    ratio,
    label: `Memory: ${formatBytes(metrics.memoryBytes)} / ${formatBytes(metrics.memoryLimitBytes)} (${formatPercent(ratio * 100)})`,
  };
}

export function logViewportHeight(state: AppState): number {
  return Math.max(1, state.ui.terminal.rows - LOG_PANEL_OVERHEAD);
}

/**
 * Entries shown in the logs panel: from the scroll offset, at most one
 * viewport's worth.
 */
export function visibleLogs(state: AppState): readonly LogEntry[] {
  const { logs, scroll } = state.activity;
  return logs.slice(scroll, scroll + logViewportHeight(state));
}
