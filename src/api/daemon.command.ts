import type { ResultAsync } from "neverthrow";
import type { ControlAction, ControlResult } from "../types/domain";
import { isRecord } from "./daemon.query";
import { type DaemonSession, type RpcError, unary } from "./transport";

// ControlCommand enum values on the wire
export const CONTROL_COMMAND_CODES: Record<ControlAction, number> = {
  start: 0,
  stop: 1,
  restart: 2,
  reload: 3,
};

export function decodeControlResult(raw: unknown): ControlResult {
  if (!isRecord(raw)) return { success: false, message: "" };
  return {
    success: raw.success === true,
    message: typeof raw.message === "string" ? raw.message : "",
  };
}

export function sendControl(
  session: DaemonSession,
  action: ControlAction,
): ResultAsync<ControlResult, RpcError> {
  return unary(session, "Control", {
    command: CONTROL_COMMAND_CODES[action],
  }).map(decodeControlResult);
}
