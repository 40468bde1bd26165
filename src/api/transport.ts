import { fileURLToPath } from "node:url";
import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import { err, ok, Result, ResultAsync } from "neverthrow";

export const PROTO_PATH = fileURLToPath(
  new URL("../../proto/daemon.proto", import.meta.url),
);
export const SERVICE_NAME = "daemon.DaemonService";
export const DEFAULT_PORT = 50051;

export type RpcErrorKind =
  | "not-connected"
  | "timeout"
  | "unavailable"
  | "invalid-address"
  | "rpc";

export type RpcError = {
  kind: RpcErrorKind;
  message: string;
  code?: number;
};

export type DaemonMethodName = "GetStatus" | "GetMetrics" | "Control";
export type UnaryMethod = protoLoader.MethodDefinition<object, object>;
export type DaemonMethods = Record<DaemonMethodName, UnaryMethod>;

export interface DaemonSession {
  client: grpc.Client;
  methods: DaemonMethods;
  callTimeoutMs: number;
}

const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: false,
  longs: Number,
  enums: Number,
  defaults: true,
  oneofs: true,
};

export function notConnectedError(): RpcError {
  return { kind: "not-connected", message: "Not connected to daemon" };
}

/**
 * Turn an operator-supplied address into a plaintext gRPC target.
 * `http://` is accepted and stripped; any other scheme is refused.
 */
export function toGrpcTarget(address: string): Result<string, RpcError> {
  let target = address.trim();
  if (/^http:\/\//i.test(target)) target = target.slice("http://".length);
  target = target.replace(/\/+$/, "");

  if (!target) {
    return err({ kind: "invalid-address", message: "Daemon address is empty" });
  }
  if (target.includes("://") || target.includes("/")) {
    return err({
      kind: "invalid-address",
      message: `Unsupported daemon address: ${address} (only plaintext host:port is supported)`,
    });
  }

  if (target.startsWith("[")) {
    if (/\]:\d+$/.test(target)) return ok(target);
    if (target.endsWith("]")) return ok(`${target}:${DEFAULT_PORT}`);
    return err({ kind: "invalid-address", message: `Malformed daemon address: ${address}` });
  }

  const colons = target.split(":").length - 1;
  if (colons === 0) return ok(`${target}:${DEFAULT_PORT}`);
  if (colons === 1) {
    if (/:\d+$/.test(target)) return ok(target);
    return err({ kind: "invalid-address", message: `Malformed daemon address: ${address}` });
  }
  // Bare IPv6 literal: gRPC would otherwise dial 443
  return ok(`[${target}]:${DEFAULT_PORT}`);
}

function isServiceDefinition(
  definition: protoLoader.AnyDefinition | undefined,
): definition is protoLoader.ServiceDefinition {
  return definition !== undefined && !("format" in definition);
}

const methodCache = new Map<string, DaemonMethods>();

/**
 * Load the daemon service's method table from the .proto file at run time
 */
export function loadDaemonMethods(
  protoPath: string = PROTO_PATH,
): Result<DaemonMethods, RpcError> {
  const cached = methodCache.get(protoPath);
  if (cached) return ok(cached);

  const load = Result.fromThrowable(
    () => protoLoader.loadSync(protoPath, LOADER_OPTIONS),
    (error): RpcError => ({
      kind: "rpc",
      message: `Failed to load ${protoPath}: ${error instanceof Error ? error.message : String(error)}`,
    }),
  );

  return load().andThen((packageDefinition) => {
    const service = packageDefinition[SERVICE_NAME];
    if (!isServiceDefinition(service)) {
      return err<DaemonMethods, RpcError>({
        kind: "rpc",
        message: `Service ${SERVICE_NAME} not found in ${protoPath}`,
      });
    }

    const { GetStatus, GetMetrics, Control } = service;
    if (!GetStatus || !GetMetrics || !Control) {
      return err<DaemonMethods, RpcError>({
        kind: "rpc",
        message: `Service ${SERVICE_NAME} is missing methods`,
      });
    }

    const methods: DaemonMethods = { GetStatus, GetMetrics, Control };
    methodCache.set(protoPath, methods);
    return ok<DaemonMethods, RpcError>(methods);
  });
}

function isServiceError(error: unknown): error is grpc.ServiceError {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "number" &&
    "details" in error
  );
}

export function toRpcError(error: unknown): RpcError {
  if (isServiceError(error)) {
    const message = error.details || error.message;
    switch (error.code) {
      case grpc.status.DEADLINE_EXCEEDED:
        return { kind: "timeout", message, code: error.code };
      case grpc.status.UNAVAILABLE:
        return { kind: "unavailable", message, code: error.code };
      default:
        return { kind: "rpc", message, code: error.code };
    }
  }

  if (error instanceof Error) {
    const kind = /deadline/i.test(error.message) ? "timeout" : "unavailable";
    return { kind, message: error.message };
  }

  return { kind: "rpc", message: String(error) };
}

/**
 * Open a plaintext channel and wait until it is ready, or fail at the
 * connect deadline.
 */
export function connectChannel(
  target: string,
  connectTimeoutMs: number,
): ResultAsync<grpc.Client, RpcError> {
  return ResultAsync.fromPromise(
    new Promise<grpc.Client>((resolve, reject) => {
      const client = new grpc.Client(target, grpc.credentials.createInsecure());
      client.waitForReady(Date.now() + connectTimeoutMs, (error) => {
        if (error) {
          client.close();
          reject(error);
          return;
        }
        resolve(client);
      });
    }),
    toRpcError,
  );
}

/**
 * One request/response exchange with the per-call deadline applied
 */
export function unary(
  session: DaemonSession,
  method: DaemonMethodName,
  request: object,
): ResultAsync<unknown, RpcError> {
  const definition = session.methods[method];

  return ResultAsync.fromPromise(
    new Promise<unknown>((resolve, reject) => {
      session.client.makeUnaryRequest(
        definition.path,
        definition.requestSerialize,
        definition.responseDeserialize,
        request,
        new grpc.Metadata(),
        { deadline: Date.now() + session.callTimeoutMs },
        (error, value) => {
          if (error) reject(error);
          else resolve(value);
        },
      );
    }),
    toRpcError,
  );
}
