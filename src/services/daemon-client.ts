import { errAsync, type ResultAsync } from "neverthrow";
import { sendControl } from "../api/daemon.command";
import { getMetrics, getStatus } from "../api/daemon.query";
import {
  connectChannel,
  type DaemonSession,
  loadDaemonMethods,
  notConnectedError,
  PROTO_PATH,
  type RpcError,
  toGrpcTarget,
} from "../api/transport";
import type {
  ControlAction,
  ControlResult,
  DaemonMetrics,
  DaemonStatus,
} from "../types/domain";
import { log } from "./logger";

export type { RpcError };

export const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
export const DEFAULT_CALL_TIMEOUT_MS = 10_000;

/**
 * Connection lifecycle plus the daemon's remote operations.
 *
 * `isConnected` only says a session exists; whether the daemon is still
 * reachable is found out by the next call. Callers guard against
 * connecting twice.
 */
export interface DaemonClient {
  isConnected(): boolean;
  connect(address: string): ResultAsync<void, RpcError>;
  disconnect(): void;
  getStatus(): ResultAsync<DaemonStatus, RpcError>;
  getMetrics(): ResultAsync<DaemonMetrics, RpcError>;
  sendControl(action: ControlAction): ResultAsync<ControlResult, RpcError>;
}

export interface GrpcDaemonClientOptions {
  connectTimeoutMs?: number;
  callTimeoutMs?: number;
  protoPath?: string;
}

export class GrpcDaemonClient implements DaemonClient {
  private session: DaemonSession | null = null;
  private readonly connectTimeoutMs: number;
  private readonly callTimeoutMs: number;
  private readonly protoPath: string;

  constructor(options: GrpcDaemonClientOptions = {}) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.protoPath = options.protoPath ?? PROTO_PATH;
  }

  isConnected(): boolean {
    return this.session !== null;
  }

  connect(address: string): ResultAsync<void, RpcError> {
    return toGrpcTarget(address)
      .andThen((target) =>
        loadDaemonMethods(this.protoPath).map((methods) => ({ target, methods })),
      )
      .asyncAndThen(({ target, methods }) => {
        log.debug("Connecting", "daemon-client", {
          target,
          connectTimeoutMs: this.connectTimeoutMs,
        });
        return connectChannel(target, this.connectTimeoutMs).map((client) => {
          this.session = { client, methods, callTimeoutMs: this.callTimeoutMs };
        });
      })
      .mapErr((error) => {
        log.warn("Connect failed", "daemon-client", error);
        return error;
      });
  }

  disconnect(): void {
    if (!this.session) return;
    this.session.client.close();
    this.session = null;
    log.debug("Session closed", "daemon-client");
  }

  getStatus(): ResultAsync<DaemonStatus, RpcError> {
    if (!this.session) return errAsync(notConnectedError());
    return getStatus(this.session);
  }

  getMetrics(): ResultAsync<DaemonMetrics, RpcError> {
    if (!this.session) return errAsync(notConnectedError());
    return getMetrics(this.session);
  }

  sendControl(action: ControlAction): ResultAsync<ControlResult, RpcError> {
    if (!this.session) return errAsync(notConnectedError());
    return sendControl(this.session, action);
  }
}
