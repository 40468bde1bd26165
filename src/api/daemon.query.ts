import type { ResultAsync } from "neverthrow";
import type { DaemonMetrics, DaemonState, DaemonStatus } from "../types/domain";
import { type DaemonSession, type RpcError, unary } from "./transport";

// Wire order of the DaemonState enum
const WIRE_STATES: readonly DaemonState[] = [
  "unknown",
  "starting",
  "running",
  "stopping",
  "stopped",
  "error",
];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function numberField(raw: Record<string, unknown>, key: string): number {
  const value = raw[key];
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "string") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

export function stringField(raw: Record<string, unknown>, key: string): string {
  const value = raw[key];
  return typeof value === "string" ? value : "";
}

export function decodeDaemonState(code: number): DaemonState {
  if (Number.isInteger(code) && code >= 0 && code < WIRE_STATES.length) {
    return WIRE_STATES[code];
  }
  return "unrecognized";
}

export function decodeStatus(raw: unknown): DaemonStatus {
  const rec = isRecord(raw) ? raw : {};
  const stateCode = numberField(rec, "state");
  return {
    state: decodeDaemonState(stateCode),
    stateCode,
    version: stringField(rec, "version"),
    uptimeSeconds: numberField(rec, "uptimeSeconds"),
    message: stringField(rec, "message"),
  };
}

export function decodeMetrics(raw: unknown): DaemonMetrics {
  const rec = isRecord(raw) ? raw : {};
  return {
    cpuUsagePercent: numberField(rec, "cpuUsagePercent"),
    memoryBytes: numberField(rec, "memoryBytes"),
    memoryLimitBytes: numberField(rec, "memoryLimitBytes"),
    connectionsActive: numberField(rec, "connectionsActive"),
    requestsTotal: numberField(rec, "requestsTotal"),
    errorsTotal: numberField(rec, "errorsTotal"),
  };
}

export function getStatus(
  session: DaemonSession,
): ResultAsync<DaemonStatus, RpcError> {
  return unary(session, "GetStatus", {}).map(decodeStatus);
}

export function getMetrics(
  session: DaemonSession,
): ResultAsync<DaemonMetrics, RpcError> {
  return unary(session, "GetMetrics", {}).map(decodeMetrics);
}
