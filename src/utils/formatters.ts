/**
 * Pure formatting utility functions
 */

import type { ActivityLevel, DaemonState } from "../types/domain";

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

/**
 * Format a byte count with binary units and one decimal place: 1.4GB, 512B
 */
export function formatBytes(bytes: number): string {
  if (bytes >= GB) return `${(bytes / GB).toFixed(1)}GB`;
  if (bytes >= MB) return `${(bytes / MB).toFixed(1)}MB`;
  if (bytes >= KB) return `${(bytes / KB).toFixed(1)}KB`;
  return `${bytes}B`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * Wall-clock time as HH:MM:SS in local time
 */
export function formatClock(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Convert a number of seconds to a compact duration: 45s, 3m 12s, 2h 5m, 3d 4h
 */
export function formatDuration(totalSeconds: number): string {
  const s = Math.max(0, Math.floor(totalSeconds));
  if (s < 60) return `${s}s`;
  const m = Math.floor(s / 60);
  if (m < 60) return `${m}m ${s % 60}s`;
  const h = Math.floor(m / 60);
  if (h < 24) return `${h}h ${m % 60}m`;
  const d = Math.floor(h / 24);
  return `${d}d ${h % 24}h`;
}

/**
 * Format number with thousands separator
 */
export function formatNumber(num: number): string {
  return num.toLocaleString("en-US");
}

/**
 * Get color styling for a daemon state
 */
export function colorForState(state: DaemonState): {
  color?: string;
  dimColor?: boolean;
} {
  switch (state) {
    case "running":
      return { color: "green" };
    case "starting":
    case "stopping":
      return { color: "yellow" };
    case "error":
    case "unrecognized":
      return { color: "red" };
    case "stopped":
      return { color: "gray" };
    default:
      return { dimColor: true };
  }
}

export function colorForLevel(level: ActivityLevel): string {
  if (level === "ERROR") return "red";
  if (level === "WARN") return "yellow";
  return "green";
}
