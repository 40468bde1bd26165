// src/__tests__/test-utils.ts
/**
 * Test utilities and fakes for unit testing
 * This file contains only utilities and does not have its own tests
 */
import { errAsync, ok, okAsync, type Result, type ResultAsync } from "neverthrow";
import type { CommandContext } from "../commands/types";
import { notConnectedError, type RpcError } from "../api/transport";
import { createActivityLog } from "../services/activity-log";
import type { DaemonClient } from "../services/daemon-client";
import { type AppState, createInitialState, StateStore } from "../state/app-state";
import type {
  ControlAction,
  ControlResult,
  DaemonMetrics,
  DaemonStatus,
} from "../types/domain";

export const TEST_ADDRESS = "127.0.0.1:50051";

// Fixed wall clock for activity timestamps: 09:05:07 local time
export const fixedClock = () => new Date(2024, 0, 15, 9, 5, 7);

export function createStatus(overrides: Partial<DaemonStatus> = {}): DaemonStatus {
  return {
    state: "running",
    stateCode: 2,
    version: "1.2.3",
    uptimeSeconds: 3725,
    message: "all good",
    ...overrides,
  };
}

export function createMetrics(overrides: Partial<DaemonMetrics> = {}): DaemonMetrics {
  return {
    cpuUsagePercent: 57.3,
    memoryBytes: 1_500_000_000,
    memoryLimitBytes: 2 * 1024 * 1024 * 1024,
    connectionsActive: 12,
    requestsTotal: 12345,
    errorsTotal: 7,
    ...overrides,
  };
}

function fromResult<T>(result: Result<T, RpcError>): ResultAsync<T, RpcError> {
  return result.isOk() ? okAsync(result.value) : errAsync(result.error);
}

/**
 * In-process stand-in for the gRPC client. Each call answers with the
 * matching `*Result` field and is recorded in `calls`.
 */
export class FakeDaemonClient implements DaemonClient {
  connected = false;
  calls: string[] = [];
  connectResult: Result<void, RpcError> = ok(undefined);
  statusResult: Result<DaemonStatus, RpcError> = ok(createStatus());
  metricsResult: Result<DaemonMetrics, RpcError> = ok(createMetrics());
  controlResult: Result<ControlResult, RpcError> = ok({
    success: true,
    message: "done",
  });

  isConnected(): boolean {
    return this.connected;
  }

  connect(address: string): ResultAsync<void, RpcError> {
    this.calls.push(`connect ${address}`);
    if (this.connectResult.isOk()) this.connected = true;
    return fromResult(this.connectResult);
  }

  disconnect(): void {
    this.calls.push("disconnect");
    this.connected = false;
  }

  getStatus(): ResultAsync<DaemonStatus, RpcError> {
    this.calls.push("getStatus");
    if (!this.connected) return errAsync(notConnectedError());
    return fromResult(this.statusResult);
  }

  getMetrics(): ResultAsync<DaemonMetrics, RpcError> {
    this.calls.push("getMetrics");
    if (!this.connected) return errAsync(notConnectedError());
    return fromResult(this.metricsResult);
  }

  sendControl(action: ControlAction): ResultAsync<ControlResult, RpcError> {
    this.calls.push(`control ${action}`);
    if (!this.connected) return errAsync(notConnectedError());
    return fromResult(this.controlResult);
  }
}

export interface TestHarness {
  store: StateStore;
  client: FakeDaemonClient;
  context: CommandContext;
}

export function createTestHarness(
  initial: AppState = createInitialState({ address: TEST_ADDRESS, startedAt: 0 }),
  client: FakeDaemonClient = new FakeDaemonClient(),
): TestHarness {
  const store = new StateStore(initial);
  const context: CommandContext = {
    getState: store.getState,
    dispatch: store.dispatch,
    client,
    activity: createActivityLog(store.dispatch, fixedClock),
  };
  return { store, client, context };
}

/** Activity log rendered as "LEVEL message" lines */
export function logLines(state: AppState): string[] {
  return state.activity.logs.map((entry) => `${entry.level} ${entry.message}`);
}

export function stripAnsi(text: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escapes
  return text.replace(/\u001B\[[0-9;?]*[A-Za-z]/g, "");
}

/** Connected state carrying both snapshots */
export function createConnectedState(overrides: Partial<AppState> = {}): AppState {
  const base = createInitialState({ address: TEST_ADDRESS, startedAt: 0 });
  return {
    ...base,
    connection: {
      status: { kind: "connected" },
      daemonStatus: createStatus(),
      daemonMetrics: createMetrics(),
    },
    ...overrides,
  };
}
